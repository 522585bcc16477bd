import { assignRulePositions, getZones } from '@/lib/zoneFetcher';
import { formatProgressLine, percentComplete } from '@/lib/progressReporter';
import type { ProgressUpdate } from '@/types/cloudflare';
import { FakeWafApi } from './fakeWafApi';

describe('getZones', () => {
  let updates: ProgressUpdate[];
  const onProgress = (update: ProgressUpdate) => {
    updates.push(update);
  };

  beforeEach(() => {
    updates = [];
    jest.spyOn(console, 'warn').mockImplementation(() => {});
  });

  afterEach(() => {
    jest.restoreAllMocks();
  });

  it('returns every zone in provider order when no sites are given', async () => {
    const api = new FakeWafApi()
      .addZone('z1', 'example.com', [])
      .addZone('z2', 'example.org')
      .addZone('z3', 'example.net', []);

    const zones = await getZones(api, { onProgress });

    expect(zones.map(z => z.name)).toEqual(['example.com', 'example.org', 'example.net']);
  });

  it('keeps only the requested sites, each once, in provider order', async () => {
    const api = new FakeWafApi()
      .addZone('z1', 'example.com', [])
      .addZone('z2', 'example.org', [])
      .addZone('z3', 'example.net', []);

    const zones = await getZones(api, { sites: ['example.net', 'example.com', 'unknown.test'], onProgress });

    expect(zones.map(z => z.id)).toEqual(['z1', 'z3']);
    expect(api.calls).not.toContain('listZoneRulesets z2');
    expect(console.warn).toHaveBeenCalledWith('[ZoneFetcher] Sites not found among account zones: unknown.test');
  });

  it('returns a zone once when its site is requested twice', async () => {
    const api = new FakeWafApi()
      .addZone('z1', 'example.com', [])
      .addZone('z2', 'example.org', []);

    const zones = await getZones(api, { sites: ['example.com', 'example.com'], onProgress });

    expect(zones.map(z => z.id)).toEqual(['z1']);
    expect(api.calls).toEqual(['listZones', 'listZoneRulesets z1', 'getZoneRuleset z1 rs-z1']);
    expect(updates).toHaveLength(1);
  });

  it('numbers the default ruleset rules from 1 in response order', async () => {
    const api = new FakeWafApi().addZone('z1', 'example.com', [
      { id: 'a', description: 'A', action: 'block', expression: 'true' },
      { id: 'b', description: 'B', action: 'log', expression: 'true' },
      { id: 'c', description: 'C', action: 'skip', expression: 'true' },
    ]);

    const [zone] = await getZones(api, { onProgress });

    expect(zone.defaultRulesetId).toBe('rs-z1');
    expect(zone.wafRules.map(rule => [rule.id, rule.position.index])).toEqual([['a', 1], ['b', 2], ['c', 3]]);
  });

  it('leaves zones without a default ruleset with no rules', async () => {
    const api = new FakeWafApi().addZone('z1', 'example.com');

    const zones = await getZones(api, { onProgress });

    expect(zones).toEqual([{ id: 'z1', name: 'example.com', wafRules: [] }]);
    expect(api.calls).toEqual(['listZones', 'listZoneRulesets z1']);
  });

  it('reports progress once per zone', async () => {
    const api = new FakeWafApi()
      .addZone('z1', 'example.com', [])
      .addZone('z2', 'example.org', [])
      .addZone('z3', 'example.net', []);

    await getZones(api, { onProgress });

    expect(updates).toEqual([
      { activity: 'Fetching zones', status: 'Zone example.com', currentOperation: '1 of 3', percent: 33 },
      { activity: 'Fetching zones', status: 'Zone example.org', currentOperation: '2 of 3', percent: 67 },
      { activity: 'Fetching zones', status: 'Zone example.net', currentOperation: '3 of 3', percent: 100 },
    ]);
  });

  it('propagates API failures', async () => {
    const api = new FakeWafApi().addZone('z1', 'example.com', []);
    jest.spyOn(api, 'listZoneRulesets').mockRejectedValue(new Error('403 Forbidden'));

    await expect(getZones(api, { onProgress })).rejects.toThrow('403 Forbidden');
  });
});

describe('assignRulePositions', () => {
  it('returns an empty list for an empty ruleset', () => {
    expect(assignRulePositions([])).toEqual([]);
  });
});

describe('progress reporter', () => {
  it('formats one line per update', () => {
    expect(formatProgressLine({
      activity: 'Fetching zones',
      status: 'Zone example.com',
      currentOperation: '1 of 4',
      percent: 25,
    })).toBe('Fetching zones: Zone example.com - 1 of 4 [25%]');
  });

  it('rounds the percentage', () => {
    expect(percentComplete(1, 3)).toBe(33);
    expect(percentComplete(2, 3)).toBe(67);
    expect(percentComplete(0, 0)).toBe(100);
  });
});
