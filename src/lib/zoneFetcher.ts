/**
 * Reads zones and the rules of each zone's `default` ruleset
 */
import type { CloudflareRule, ProgressReporter, Zone, ZoneRule } from '../types/cloudflare';
import type { WafApiClient } from './cloudflare';
import { percentComplete, writeProgress } from './progressReporter';

export const DEFAULT_RULESET_NAME = 'default';

export interface GetZonesOptions {
  sites?: string[];
  onProgress?: ProgressReporter;
}

/**
 * Gives each rule its 1-based place in the response. Cloudflare returns
 * rules in evaluation order but without an explicit position.
 */
export function assignRulePositions(rules: CloudflareRule[]): ZoneRule[] {
  return rules.map((rule, index) => ({
    ...rule,
    position: { index: index + 1 }
  }));
}

/**
 * Lists zones, optionally limited to `sites`, and loads the rules of each
 * zone's `default` ruleset. Zones keep provider order. Zones without a
 * `default` ruleset come back with no ruleset id and no rules.
 * Any API failure propagates.
 */
export async function getZones(api: WafApiClient, options: GetZonesOptions = {}): Promise<Zone[]> {
  const { sites, onProgress = writeProgress } = options;

  const allZones = await api.listZones();
  const zones = sites && sites.length > 0
    ? allZones.filter(zone => sites.includes(zone.name))
    : allZones;

  if (sites && sites.length > 0) {
    const missing = sites.filter(site => !zones.some(zone => zone.name === site));
    if (missing.length > 0) {
      console.warn(`[ZoneFetcher] Sites not found among account zones: ${missing.join(', ')}`);
    }
  }

  const result: Zone[] = [];

  for (let i = 0; i < zones.length; i++) {
    const zone = zones[i];
    const rulesets = await api.listZoneRulesets(zone.id);
    const defaultRuleset = rulesets.find(ruleset => ruleset.name === DEFAULT_RULESET_NAME);

    if (defaultRuleset) {
      const ruleset = await api.getZoneRuleset(zone.id, defaultRuleset.id);
      result.push({
        id: zone.id,
        name: zone.name,
        defaultRulesetId: defaultRuleset.id,
        wafRules: assignRulePositions(ruleset.rules ?? [])
      });
    } else {
      result.push({ id: zone.id, name: zone.name, wafRules: [] });
    }

    onProgress({
      activity: 'Fetching zones',
      status: `Zone ${zone.name}`,
      currentOperation: `${i + 1} of ${zones.length}`,
      percent: percentComplete(i + 1, zones.length)
    });
  }

  return result;
}
