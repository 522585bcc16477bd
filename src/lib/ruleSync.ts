/**
 * Applies rule templates to the `default` ruleset of each zone: a rule whose
 * description matches the template name is patched, otherwise it is created.
 */
import { v4 as uuidv4 } from 'uuid';
import type {
  CreateRulePayload,
  ProgressReporter,
  RuleSyncResult,
  RuleTemplate,
  SyncReport,
  UpdateRulePayload,
  ZoneRule
} from '../types/cloudflare';
import type { WafApiClient } from './cloudflare';
import { getErrorMessage } from './errors';
import { findRuleTemplate, instantiateTemplate, loadRuleTemplates } from './templates';
import { getZones } from './zoneFetcher';

export interface SyncOptions {
  sites?: string[];
  // Check every rule name against the templates before changing any zone
  validateFirst?: boolean;
  onProgress?: ProgressReporter;
}

export interface SetZoneWafRulesOptions extends SyncOptions {
  ruleNames: string[];
  templatesFile: string;
}

export function buildCreatePayload(ruleName: string, desired: RuleTemplate): CreateRulePayload {
  const payload: CreateRulePayload = {
    description: ruleName,
    action: desired.action,
    expression: desired.expression,
    enabled: desired.enabled,
  };

  if (desired.position) {
    payload.position = { index: desired.position.index };
  }
  if (desired.action_parameters) {
    payload.action_parameters = desired.action_parameters;
  }

  return payload;
}

/**
 * PATCH body for an existing rule. `action_parameters` is only sent when the
 * rule already has it, and `position` only when the index changes: Cloudflare
 * rejects a move to the rule's current position.
 */
export function buildUpdatePayload(existing: ZoneRule, desired: RuleTemplate): UpdateRulePayload {
  const payload: UpdateRulePayload = {
    id: existing.id,
    description: existing.description,
    action: desired.action,
    expression: desired.expression,
    enabled: desired.enabled,
  };

  if (existing.ref !== undefined) {
    payload.ref = existing.ref;
  }
  if (existing.logging !== undefined) {
    payload.logging = existing.logging;
  }
  if (existing.action_parameters !== undefined) {
    payload.action_parameters = desired.action_parameters ?? existing.action_parameters;
  }
  if (desired.position && desired.position.index !== existing.position.index) {
    payload.position = { index: desired.position.index };
  }

  return payload;
}

function summarize(results: RuleSyncResult[]): SyncReport['summary'] {
  return {
    created: results.filter(r => r.action === 'created').length,
    updated: results.filter(r => r.action === 'updated').length,
    failed: results.filter(r => r.action === 'failed').length,
    skipped: results.filter(r => r.action === 'skipped').length,
  };
}

export class RuleSynchronizer {
  private api: WafApiClient;
  private templates: RuleTemplate[];

  constructor(api: WafApiClient, templates: RuleTemplate[]) {
    this.api = api;
    this.templates = templates;
  }

  /**
   * Rule names are processed in order, each across every zone. A name with
   * no template stops the run; rules already applied for earlier names stay.
   * A failed create or update is recorded and the next zone is attempted.
   */
  async sync(ruleNames: string[], options: SyncOptions = {}): Promise<SyncReport> {
    const runId = uuidv4();
    const log = `[RuleSync ${runId.slice(0, 8)}]`;
    const results: RuleSyncResult[] = [];
    const report = (aborted?: string): SyncReport => ({
      runId,
      results,
      ...(aborted !== undefined ? { aborted } : {}),
      summary: summarize(results),
    });

    if (options.validateFirst) {
      const missing = ruleNames.find(name => !findRuleTemplate(this.templates, name));
      if (missing !== undefined) {
        console.error(`${log} Rule "${missing}" is not defined in the rule templates. Nothing was changed.`);
        return report(missing);
      }
    }

    const zones = await getZones(this.api, { sites: options.sites, onProgress: options.onProgress });
    console.log(`${log} Syncing ${ruleNames.length} rule(s) across ${zones.length} zone(s)`);

    for (const ruleName of ruleNames) {
      const template = findRuleTemplate(this.templates, ruleName);
      if (!template) {
        console.error(`${log} Rule "${ruleName}" is not defined in the rule templates. Stopping.`);
        return report(ruleName);
      }

      for (const zone of zones) {
        if (!zone.defaultRulesetId) {
          results.push({ ruleName, zoneId: zone.id, domainName: zone.name, action: 'skipped' });
          continue;
        }

        const desired = instantiateTemplate(template, zone.name);
        const existing = zone.wafRules.find(rule => rule.description === ruleName);

        if (!existing) {
          try {
            await this.api.createRule(zone.id, zone.defaultRulesetId, buildCreatePayload(ruleName, desired));
            console.log(`${log} Created rule "${ruleName}" on ${zone.name}`);
            results.push({ ruleName, zoneId: zone.id, domainName: zone.name, action: 'created' });
          } catch (error) {
            console.error(`${log} Failed to create rule "${ruleName}" on ${zone.name}:`, error);
            results.push({ ruleName, zoneId: zone.id, domainName: zone.name, action: 'failed', error: getErrorMessage(error) });
          }
          continue;
        }

        try {
          await this.api.updateRule(zone.id, zone.defaultRulesetId, existing.id, buildUpdatePayload(existing, desired));
          console.log(`${log} Updated rule "${ruleName}" (${existing.id}) on ${zone.name}`);
          results.push({ ruleName, zoneId: zone.id, domainName: zone.name, action: 'updated', ruleId: existing.id });
        } catch (error) {
          console.error(`${log} Failed to update rule "${ruleName}" (${existing.id}) on ${zone.name}:`, error);
          results.push({
            ruleName,
            zoneId: zone.id,
            domainName: zone.name,
            action: 'failed',
            ruleId: existing.id,
            error: getErrorMessage(error)
          });
        }
      }
    }

    return report();
  }
}

/**
 * Loads the template file, then syncs `ruleNames` to every matching zone.
 * A missing or invalid template file throws before any API call.
 */
export async function setZoneWafRules(api: WafApiClient, options: SetZoneWafRulesOptions): Promise<SyncReport> {
  const { ruleNames, templatesFile, ...syncOptions } = options;
  const templates = await loadRuleTemplates(templatesFile);
  return new RuleSynchronizer(api, templates).sync(ruleNames, syncOptions);
}
