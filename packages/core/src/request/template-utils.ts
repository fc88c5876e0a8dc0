/**
 * Utility functions for handling URL templates
 */

import { parseTemplate as urlParseTemplate } from 'url-template';

/**
 * A template interface for expansion
 */
export type TemplateInterface = ReturnType<typeof urlParseTemplate>;

/**
 * Parse a URI template string
 * @param template - Template string with variables like {varName}
 * @returns A template interface for expansion
 */
export function parseTemplate(template: string): TemplateInterface {
  return urlParseTemplate(template);
}

/**
 * Names of the variables a template expands, in order of appearance
 * @param template - Template string with variables like {varName}
 */
export function templateVariables(template: string): string[] {
  return Array.from(template.matchAll(/\{([^}]+)\}/g), (match) => match[1] ?? '').filter(Boolean);
}
