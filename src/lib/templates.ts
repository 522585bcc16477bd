/**
 * Rule template file: the desired state of every named WAF rule
 */
import { promises as fs } from 'fs';
import { resolve } from 'path';
import type { RuleTemplate } from '../types/cloudflare';
import { RuleTemplateFileError, getErrorMessage } from './errors';
import { RuleTemplateFileSchema, validateInput } from './validation';

export const DOMAIN_PLACEHOLDER = '{domain}';

/**
 * Reads and validates the template file.
 * @throws RuleTemplateFileError when the file is missing, not JSON or malformed
 */
export async function loadRuleTemplates(filePath: string): Promise<RuleTemplate[]> {
  const fullPath = resolve(filePath);
  let content: string;

  try {
    content = await fs.readFile(fullPath, 'utf-8');
  } catch (error) {
    throw new RuleTemplateFileError(`Rule template file ${fullPath} could not be read: ${getErrorMessage(error)}`, fullPath);
  }

  let data: unknown;
  try {
    data = JSON.parse(content);
  } catch (error) {
    throw new RuleTemplateFileError(`Rule template file ${fullPath} is not valid JSON: ${getErrorMessage(error)}`, fullPath);
  }

  try {
    const templates = validateInput(RuleTemplateFileSchema, data);
    console.log(`[Templates] Loaded ${templates.length} rule templates from ${fullPath}`);
    return templates;
  } catch (error) {
    throw new RuleTemplateFileError(`Rule template file ${fullPath} is invalid: ${getErrorMessage(error)}`, fullPath);
  }
}

export function findRuleTemplate(templates: RuleTemplate[], name: string): RuleTemplate | undefined {
  return templates.find(template => template.name === name);
}

/**
 * Copy of the template for one zone, with every `{domain}` in the
 * expression replaced by the zone name. The template itself is untouched.
 */
export function instantiateTemplate(template: RuleTemplate, domain: string): RuleTemplate {
  const copy = structuredClone(template);
  copy.expression = copy.expression.split(DOMAIN_PLACEHOLDER).join(domain);
  return copy;
}
