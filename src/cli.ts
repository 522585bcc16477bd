#!/usr/bin/env node
/**
 * waf-sync - command line entry point
 *
 *   waf-sync zones [--site example.com]...
 *   waf-sync sync --rule "Block bad bots" [--rule ...] [--site example.com]...
 */
import { parseArgs } from 'util';
import type { SyncReport, Zone } from './types/cloudflare';
import { CloudflareAPI } from './lib/cloudflare';
import { DEFAULT_ENV_FILE, loadEnvFile, resolveConfig } from './lib/config';
import { RuleTemplateFileError, getErrorMessage } from './lib/errors';
import { setZoneWafRules } from './lib/ruleSync';
import { DomainNameSchema, RuleNameSchema, validateInput } from './lib/validation';
import { getZones } from './lib/zoneFetcher';

export const USAGE = `Usage:
  waf-sync zones [--site <domain>]...
  waf-sync sync --rule <name> [--rule <name>]... [--site <domain>]... [--templates <file>] [--validate-first]

Common options:
  --env-file <file>   key=value file with CLOUDFLARE_API_TOKEN (default: ${DEFAULT_ENV_FILE})
  --token <token>     API token, overrides the env file
  --base-url <url>    API base URL, overrides the env file
  -h, --help          Show this help`;

export class UsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'UsageError';
  }
}

export interface CliArguments {
  command: 'zones' | 'sync';
  sites: string[];
  ruleNames: string[];
  templatesFile?: string;
  validateFirst: boolean;
  envFile: string;
  token?: string;
  baseUrl?: string;
}

const CLI_OPTIONS = {
  site: { type: 'string', multiple: true },
  rule: { type: 'string', multiple: true },
  templates: { type: 'string' },
  'validate-first': { type: 'boolean' },
  'env-file': { type: 'string' },
  token: { type: 'string' },
  'base-url': { type: 'string' },
  help: { type: 'boolean', short: 'h' },
} as const;

function readArgs(argv: string[]) {
  try {
    return parseArgs({ args: argv, allowPositionals: true, options: CLI_OPTIONS });
  } catch (error) {
    throw new UsageError(getErrorMessage(error));
  }
}

export function parseCliArguments(argv: string[]): CliArguments | 'help' {
  const parsed = readArgs(argv);
  const { values, positionals } = parsed;
  if (values.help) {
    return 'help';
  }

  const [command, ...extra] = positionals;
  if (command !== 'zones' && command !== 'sync') {
    throw new UsageError(command ? `Unknown command: ${command}` : 'A command is required');
  }
  if (extra.length > 0) {
    throw new UsageError(`Unexpected arguments: ${extra.join(' ')}`);
  }

  const sites = (values.site ?? []).map(site => {
    try {
      return validateInput(DomainNameSchema, site);
    } catch (error) {
      throw new UsageError(`Invalid --site "${site}": ${getErrorMessage(error)}`);
    }
  });
  const ruleNames = (values.rule ?? []).map(rule => {
    try {
      return validateInput(RuleNameSchema, rule);
    } catch (error) {
      throw new UsageError(`Invalid --rule "${rule}": ${getErrorMessage(error)}`);
    }
  });

  if (command === 'sync' && ruleNames.length === 0) {
    throw new UsageError('sync needs at least one --rule');
  }

  return {
    command,
    sites,
    ruleNames,
    templatesFile: values.templates,
    validateFirst: values['validate-first'] ?? false,
    envFile: values['env-file'] ?? DEFAULT_ENV_FILE,
    token: values.token,
    baseUrl: values['base-url'],
  };
}

export function formatZone(zone: Zone): string[] {
  const lines = [`${zone.name} (${zone.id}) default ruleset: ${zone.defaultRulesetId ?? 'none'}`];
  for (const rule of zone.wafRules) {
    lines.push(`  ${rule.position.index}. ${rule.description ?? '(no description)'} [${rule.action}] ${rule.enabled === false ? 'disabled' : 'enabled'}`);
  }
  return lines;
}

export function formatReport(report: SyncReport): string[] {
  const { created, updated, failed, skipped } = report.summary;
  const lines = [`Sync ${report.runId}: ${created} created, ${updated} updated, ${failed} failed, ${skipped} skipped`];
  for (const result of report.results.filter(r => r.action === 'failed')) {
    lines.push(`  FAILED ${result.ruleName} on ${result.domainName}: ${result.error ?? 'unknown error'}`);
  }
  if (report.aborted !== undefined) {
    lines.push(`  Stopped: rule "${report.aborted}" has no template`);
  }
  return lines;
}

export async function main(argv: string[] = process.argv.slice(2)): Promise<number> {
  let args: CliArguments | 'help';
  try {
    args = parseCliArguments(argv);
  } catch (error) {
    console.error(getErrorMessage(error));
    console.error(USAGE);
    return 2;
  }

  if (args === 'help') {
    console.log(USAGE);
    return 0;
  }

  const env = { ...process.env };
  loadEnvFile(args.envFile, env);
  const config = resolveConfig(env, {
    apiToken: args.token,
    apiBaseUrl: args.baseUrl,
    templatesFile: args.templatesFile,
  });
  const api = new CloudflareAPI(config);

  if (args.command === 'zones') {
    const zones = await getZones(api, { sites: args.sites });
    for (const zone of zones) {
      formatZone(zone).forEach(line => console.log(line));
    }
    return 0;
  }

  try {
    const report = await setZoneWafRules(api, {
      ruleNames: args.ruleNames,
      sites: args.sites,
      templatesFile: config.templatesFile,
      validateFirst: args.validateFirst,
    });
    formatReport(report).forEach(line => console.log(line));
    return report.aborted !== undefined || report.summary.failed > 0 ? 1 : 0;
  } catch (error) {
    if (error instanceof RuleTemplateFileError) {
      console.error(error.message);
      return 1;
    }
    throw error;
  }
}

if (require.main === module) {
  main().then(
    (code) => {
      process.exitCode = code;
    },
    (error: unknown) => {
      console.error('waf-sync failed:', error);
      process.exitCode = 1;
    }
  );
}
