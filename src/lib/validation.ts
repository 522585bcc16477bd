/**
 * Validation schemas for configuration, rule templates and Cloudflare
 * API responses using Zod
 */
import { z } from 'zod';
import type { CloudflareRule, CloudflareRuleset, CloudflareZone } from '../types/cloudflare';

export const DEFAULT_API_BASE_URL = 'https://api.cloudflare.com/client/v4';
export const DEFAULT_TEMPLATES_FILE = 'waf-rules.json';

export const DomainNameSchema = z.string()
  .min(1, 'Domain name is required')
  .max(253, 'Domain name too long')
  .regex(/^[a-zA-Z0-9.-]+$/, 'Domain name contains invalid characters')
  .refine(
    (domain) => !domain.startsWith('.') && !domain.endsWith('.'),
    'Domain name cannot start or end with a dot'
  );

export const RuleNameSchema = z.string()
  .min(1, 'Rule name is required')
  .max(500, 'Rule name too long');

export const SyncConfigSchema = z.object({
  apiToken: z.string().default(''),
  apiBaseUrl: z.string().url('API base URL must be a valid URL').default(DEFAULT_API_BASE_URL),
  templatesFile: z.string().min(1, 'Templates file path is required').default(DEFAULT_TEMPLATES_FILE)
});

export const RulePositionSchema = z.object({
  index: z.number().int().positive('Position index is 1-based')
});

export const RuleTemplateSchema = z.object({
  name: RuleNameSchema,
  action: z.string().min(1, 'Rule action is required'),
  expression: z.string().min(1, 'Rule expression is required'),
  enabled: z.boolean().default(true),
  position: RulePositionSchema.optional(),
  action_parameters: z.record(z.unknown()).optional()
});

export const RuleTemplateFileSchema = z.array(RuleTemplateSchema);

// Validates and formats the Zod issues into one message
export const validateInput = <S extends z.ZodTypeAny>(schema: S, data: unknown): z.output<S> => {
  try {
    return schema.parse(data);
  } catch (error) {
    if (error instanceof z.ZodError) {
      const errorMessages = error.issues.map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`);
      throw new Error(`Validation failed: ${errorMessages.join(', ')}`);
    }
    throw error;
  }
};

// Cloudflare API response shapes. Unknown keys are stripped.
const ApiMessageSchema = z.object({
  code: z.number(),
  message: z.string()
});

export const ApiEnvelopeSchema = z.object({
  success: z.boolean(),
  errors: z.array(ApiMessageSchema).default([]),
  messages: z.array(ApiMessageSchema).default([]),
  result: z.unknown(),
  result_info: z.object({
    page: z.number(),
    per_page: z.number(),
    count: z.number(),
    total_count: z.number(),
    total_pages: z.number()
  }).partial().optional()
});

export const CloudflareZoneSchema: z.ZodType<CloudflareZone, z.ZodTypeDef, unknown> = z.object({
  id: z.string(),
  name: z.string(),
  status: z.string().optional(),
  paused: z.boolean().optional()
});

export const CloudflareRuleSchema: z.ZodType<CloudflareRule, z.ZodTypeDef, unknown> = z.object({
  id: z.string(),
  expression: z.string(),
  action: z.string(),
  action_parameters: z.record(z.unknown()).optional(),
  description: z.string().optional(),
  enabled: z.boolean().optional(),
  logging: z.object({ enabled: z.boolean().optional() }).optional(),
  ref: z.string().optional(),
  version: z.string().optional(),
  last_updated: z.string().optional(),
  created_on: z.string().optional()
});

export const CloudflareRulesetSchema: z.ZodType<CloudflareRuleset, z.ZodTypeDef, unknown> = z.object({
  id: z.string(),
  name: z.string(),
  description: z.string().optional(),
  kind: z.string(),
  version: z.string(),
  rules: z.array(CloudflareRuleSchema).optional(),
  last_updated: z.string().optional(),
  phase: z.string()
});
