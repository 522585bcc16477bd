/**
 * Error types raised by the WAF sync tool
 */
import type { CloudflareApiMessage } from '../types/cloudflare';

/**
 * Raised for a non-2xx response, an unsuccessful envelope or an unreadable
 * body from the Cloudflare API
 */
export class CloudflareApiError extends Error {
  public readonly status: number;
  public readonly endpoint: string;
  public readonly apiErrors: CloudflareApiMessage[];

  constructor(message: string, status: number, endpoint: string, apiErrors: CloudflareApiMessage[] = []) {
    super(message);
    this.name = 'CloudflareApiError';
    this.status = status;
    this.endpoint = endpoint;
    this.apiErrors = apiErrors;

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, CloudflareApiError);
    }
  }
}

/**
 * Raised when the rule template file is missing, is not JSON or does not
 * match the template schema
 */
export class RuleTemplateFileError extends Error {
  public readonly filePath: string;

  constructor(message: string, filePath: string) {
    super(message);
    this.name = 'RuleTemplateFileError';
    this.filePath = filePath;
  }
}

export const getErrorMessage = (error: unknown): string =>
  error instanceof Error ? error.message : String(error);
