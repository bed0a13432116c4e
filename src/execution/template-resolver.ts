/**
 * Template Resolver - Substitutes placeholders in step parameters
 * Handles pattern scanning, parsing, and substitution against the context store
 *
 * Supported forms: `{key}`, `{key.path.0}` and `${key}`
 * Substitution never throws: placeholders that do not resolve stay literal
 */

import type { ParamValue, StepParams } from '../types/index.js';
import type { LookupResult } from '../context/context-store.js';

/**
 * Anything placeholders can be resolved against
 */
export interface TemplateScope {
  lookup(path: string): LookupResult;
}

const PLACEHOLDER_PATTERN = /\$?\{\s*([A-Za-z_][\w-]*(?:\.[\w-]+)*)\s*\}/g;

/**
 * Scan a string for placeholders
 *
 * @example
 * scanTemplate('pod {step1.pods.0} in ${namespace}') → ['{step1.pods.0}', '${namespace}']
 * scanTemplate('{"not": "a placeholder"}') → []
 */
export function scanTemplate(text: string): string[] {
  return text.match(PLACEHOLDER_PATTERN) ?? [];
}

/**
 * Extract the dotted reference from a placeholder
 *
 * @example
 * parsePlaceholder('${step1.pods}') → 'step1.pods'
 */
export function parsePlaceholder(placeholder: string): string {
  return placeholder.replace(/^\$?\{\s*/, '').replace(/\s*\}$/, '');
}

/**
 * Convert an arbitrary tool value into a parameter value
 * `undefined` becomes null; non-JSON values are stringified
 */
export function toParamValue(value: unknown): ParamValue {
  if (value === null || value === undefined) return null;
  if (typeof value === 'string' || typeof value === 'number' || typeof value === 'boolean') {
    return value;
  }
  if (Array.isArray(value)) {
    return value.map(toParamValue);
  }
  if (typeof value === 'object') {
    const entries = Object.entries(value).map(([key, entry]): [string, ParamValue] => [
      key,
      toParamValue(entry),
    ]);
    return Object.fromEntries(entries);
  }
  return String(value);
}

function stringifyInline(value: unknown): string {
  if (typeof value === 'string') return value;
  return JSON.stringify(value) ?? String(value);
}

/**
 * Substitute every placeholder in a string
 * A string that is exactly one resolvable placeholder takes the referenced value with its type
 *
 * @example
 * store.set('prev_pod', 'nginx-123')
 * substituteTemplate('{prev_pod}', store) → 'nginx-123'
 * substituteTemplate('logs of {prev_pod}', store) → 'logs of nginx-123'
 */
export function substituteTemplate(text: string, scope: TemplateScope): ParamValue {
  const placeholders = scanTemplate(text);
  if (placeholders.length === 0) {
    return text;
  }

  if (placeholders.length === 1 && placeholders[0] === text.trim()) {
    const lookup = scope.lookup(parsePlaceholder(placeholders[0]));
    return lookup.found ? toParamValue(lookup.value) : text;
  }

  return text.replace(PLACEHOLDER_PATTERN, (placeholder: string, reference: string) => {
    const lookup = scope.lookup(reference);
    return lookup.found ? stringifyInline(lookup.value) : placeholder;
  });
}

/**
 * Substitute placeholders in a parameter value, descending into lists and objects
 */
export function substituteValue(value: ParamValue, scope: TemplateScope): ParamValue {
  if (typeof value === 'string') {
    return substituteTemplate(value, scope);
  }
  if (Array.isArray(value)) {
    return value.map((item) => substituteValue(item, scope));
  }
  if (value !== null && typeof value === 'object') {
    return substituteParams(value, scope);
  }
  return value;
}

/**
 * Substitute placeholders in every parameter of a step
 * Returns a new mapping with the same keys
 */
export function substituteParams(params: StepParams, scope: TemplateScope): StepParams {
  const resolved: StepParams = {};
  for (const [key, value] of Object.entries(params)) {
    resolved[key] = substituteValue(value, scope);
  }
  return resolved;
}

/**
 * Whether a parameter still needs a value
 * Absent, null, blank strings and empty lists count as unresolved
 */
export function isUnresolved(value: ParamValue | undefined): boolean {
  if (value === undefined || value === null) return true;
  if (typeof value === 'string') return value.trim().length === 0;
  if (Array.isArray(value)) return value.length === 0;
  return false;
}
