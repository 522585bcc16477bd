export * from './types/cloudflare';
export { CloudflareAPI, buildAuthHeaders } from './lib/cloudflare';
export type { WafApiClient } from './lib/cloudflare';
export { loadEnvFile, resolveConfig } from './lib/config';
export { CloudflareApiError, RuleTemplateFileError } from './lib/errors';
export { formatProgressLine, writeProgress } from './lib/progressReporter';
export { RuleSynchronizer, buildCreatePayload, buildUpdatePayload, setZoneWafRules } from './lib/ruleSync';
export { findRuleTemplate, instantiateTemplate, loadRuleTemplates } from './lib/templates';
export { getZones, assignRulePositions } from './lib/zoneFetcher';
