export interface CloudflareZone {
  id: string;
  name: string;
  status?: string;
  paused?: boolean;
}

export interface CloudflareApiMessage {
  code: number;
  message: string;
}

export interface CloudflareApiResponse<T> {
  success: boolean;
  errors: CloudflareApiMessage[];
  messages: CloudflareApiMessage[];
  result: T;
  result_info?: {
    page?: number;
    per_page?: number;
    count?: number;
    total_count?: number;
    total_pages?: number;
  };
}

// Action parameters differ per action (block response, skip products, ...)
export type ActionParameters = Record<string, unknown>;

export interface RulePosition {
  index: number;
}

export interface CloudflareRuleset {
  id: string;
  name: string;
  description?: string;
  kind: string;
  version: string;
  rules?: CloudflareRule[];
  last_updated?: string;
  phase: string;
}

export interface CloudflareRule {
  id: string;
  expression: string;
  action: string;
  action_parameters?: ActionParameters;
  description?: string;
  enabled?: boolean;
  logging?: {
    enabled?: boolean;
  };
  ref?: string;
  version?: string;
  last_updated?: string;
  created_on?: string;
}

/**
 * A rule as held in memory after a fetch. Cloudflare does not return the
 * position of a rule, so `position.index` is the 1-based place of the rule
 * in the ruleset response.
 */
export interface ZoneRule extends CloudflareRule {
  position: RulePosition;
}

export interface Zone {
  id: string;
  name: string;
  defaultRulesetId?: string;
  wafRules: ZoneRule[];
}

/**
 * Desired state for one rule, keyed by `name`. The expression may contain
 * `{domain}`, replaced with the zone name when applied.
 */
export interface RuleTemplate {
  name: string;
  action: string;
  expression: string;
  enabled: boolean;
  position?: RulePosition;
  action_parameters?: ActionParameters;
}

export interface CreateRulePayload {
  description: string;
  action: string;
  expression: string;
  enabled: boolean;
  position?: RulePosition;
  action_parameters?: ActionParameters;
}

export interface UpdateRulePayload {
  id: string;
  description?: string;
  action: string;
  expression: string;
  enabled: boolean;
  position?: RulePosition;
  action_parameters?: ActionParameters;
  logging?: {
    enabled?: boolean;
  };
  ref?: string;
}

export interface ProgressUpdate {
  activity: string;
  status: string;
  currentOperation: string;
  percent: number;
}

export type ProgressReporter = (update: ProgressUpdate) => void;

export type RuleSyncAction = 'created' | 'updated' | 'failed' | 'skipped';

export interface RuleSyncResult {
  ruleName: string;
  zoneId: string;
  domainName: string;
  action: RuleSyncAction;
  ruleId?: string;
  error?: string;
}

export interface SyncReport {
  runId: string;
  results: RuleSyncResult[];
  // Name of the rule that stopped the run because it has no template
  aborted?: string;
  summary: {
    created: number;
    updated: number;
    failed: number;
    skipped: number;
  };
}

export interface SyncConfig {
  apiToken: string;
  apiBaseUrl: string;
  templatesFile: string;
}
