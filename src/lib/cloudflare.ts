import type {
  CloudflareApiMessage,
  CloudflareApiResponse,
  CloudflareRuleset,
  CloudflareZone,
  CreateRulePayload,
  SyncConfig,
  UpdateRulePayload
} from '../types/cloudflare';
import { z } from 'zod';
import { CloudflareApiError, getErrorMessage } from './errors';
import {
  ApiEnvelopeSchema,
  CloudflareRulesetSchema,
  CloudflareZoneSchema,
  DEFAULT_API_BASE_URL
} from './validation';

const ZONES_PER_PAGE = 50;

/**
 * The subset of the Cloudflare API the sync needs. The fetcher and the
 * synchronizer only talk to this interface, so tests can hand them a fake.
 */
export interface WafApiClient {
  listZones(): Promise<CloudflareZone[]>;
  listZoneRulesets(zoneId: string): Promise<CloudflareRuleset[]>;
  getZoneRuleset(zoneId: string, rulesetId: string): Promise<CloudflareRuleset>;
  createRule(zoneId: string, rulesetId: string, payload: CreateRulePayload): Promise<CloudflareRuleset>;
  updateRule(zoneId: string, rulesetId: string, ruleId: string, payload: UpdateRulePayload): Promise<CloudflareRuleset>;
}

export function buildAuthHeaders(apiToken: string): Record<string, string> {
  return {
    'Authorization': `Bearer ${apiToken}`,
    'Content-Type': 'application/json',
  };
}

// Error details from a failed response body, when it is a Cloudflare envelope
function parseApiErrors(text: string): CloudflareApiMessage[] {
  try {
    const envelope = ApiEnvelopeSchema.safeParse(JSON.parse(text));
    return envelope.success ? envelope.data.errors : [];
  } catch {
    return [];
  }
}

export class CloudflareAPI implements WafApiClient {
  private apiToken: string;
  private baseUrl: string;

  constructor(config: Pick<SyncConfig, 'apiToken'> & Partial<Pick<SyncConfig, 'apiBaseUrl'>>) {
    this.apiToken = config.apiToken;
    this.baseUrl = (config.apiBaseUrl ?? DEFAULT_API_BASE_URL).replace(/\/+$/, '');
  }

  private async makeRequest<T>(
    endpoint: string,
    resultSchema: z.ZodType<T, z.ZodTypeDef, unknown>,
    options: RequestInit = {}
  ): Promise<CloudflareApiResponse<T>> {
    const response = await fetch(`${this.baseUrl}${endpoint}`, {
      ...options,
      headers: buildAuthHeaders(this.apiToken),
    });

    const text = await response.text();

    if (!response.ok) {
      console.error(`[CloudflareAPI] Request failed (${response.status}) for endpoint: ${endpoint}`, text);
      throw new CloudflareApiError(
        `Cloudflare API error: ${response.status} - ${text}`,
        response.status,
        endpoint,
        parseApiErrors(text)
      );
    }

    let body: unknown;
    try {
      body = JSON.parse(text);
    } catch (error) {
      console.error(`[CloudflareAPI] JSON parsing error for endpoint ${endpoint}:`, error);
      throw new CloudflareApiError(`JSON parsing error for ${endpoint}: ${getErrorMessage(error)}`, response.status, endpoint);
    }

    const envelope = ApiEnvelopeSchema.safeParse(body);
    if (!envelope.success) {
      throw new CloudflareApiError(`Unexpected response shape for ${endpoint}`, response.status, endpoint);
    }

    if (!envelope.data.success) {
      const details = envelope.data.errors.map(e => `${e.code}: ${e.message}`).join('; ');
      console.error(`[CloudflareAPI] Request unsuccessful for endpoint: ${endpoint}`, details);
      throw new CloudflareApiError(
        `Cloudflare API error: ${details || 'request was not successful'}`,
        response.status,
        endpoint,
        envelope.data.errors
      );
    }

    const result = resultSchema.safeParse(envelope.data.result);
    if (!result.success) {
      const issues = result.error.issues.map(issue => `${issue.path.join('.')}: ${issue.message}`).join(', ');
      throw new CloudflareApiError(`Unexpected result for ${endpoint}: ${issues}`, response.status, endpoint);
    }

    return { ...envelope.data, result: result.data };
  }

  async listZones(): Promise<CloudflareZone[]> {
    const zones: CloudflareZone[] = [];
    let page = 1;
    let totalPages = 1;

    do {
      const response = await this.makeRequest(`/zones?page=${page}&per_page=${ZONES_PER_PAGE}`, z.array(CloudflareZoneSchema));
      zones.push(...response.result);
      totalPages = response.result_info?.total_pages || 1;
      page++;
    } while (page <= totalPages);

    console.log(`[CloudflareAPI] Listed ${zones.length} zones`);
    return zones;
  }

  async listZoneRulesets(zoneId: string): Promise<CloudflareRuleset[]> {
    const response = await this.makeRequest(`/zones/${zoneId}/rulesets`, z.array(CloudflareRulesetSchema));
    return response.result;
  }

  async getZoneRuleset(zoneId: string, rulesetId: string): Promise<CloudflareRuleset> {
    const response = await this.makeRequest(`/zones/${zoneId}/rulesets/${rulesetId}`, CloudflareRulesetSchema);
    if (!response.result.rules) {
      response.result.rules = [];
    }
    return response.result;
  }

  async createRule(zoneId: string, rulesetId: string, payload: CreateRulePayload): Promise<CloudflareRuleset> {
    const response = await this.makeRequest(`/zones/${zoneId}/rulesets/${rulesetId}/rules`, CloudflareRulesetSchema, {
      method: 'POST',
      body: JSON.stringify(payload),
    });
    return response.result;
  }

  async updateRule(zoneId: string, rulesetId: string, ruleId: string, payload: UpdateRulePayload): Promise<CloudflareRuleset> {
    const response = await this.makeRequest(`/zones/${zoneId}/rulesets/${rulesetId}/rules/${ruleId}`, CloudflareRulesetSchema, {
      method: 'PATCH',
      body: JSON.stringify(payload),
    });
    return response.result;
  }
}
