/**
 * Context Store - Results of earlier steps within one run
 * Read by the parameter resolver through placeholder paths like `step1.pods.0`
 *
 * Keys written per successful step:
 * - `stepN` (1-based plan position) → the whole value
 * - the tool name → the whole value (a later call of the same tool wins)
 * - every top-level key of an object value
 */

import type { StepResult } from '../types/index.js';

export type LookupResult = { found: true; value: unknown } | { found: false };

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export class ContextStore {
  private variables = new Map<string, unknown>();
  private results: StepResult[] = [];

  /**
   * Append a step result; only successful results become variables
   */
  record(result: StepResult): void {
    this.results.push(result);
    if (!result.ok) return;

    if (isRecord(result.value)) {
      for (const [key, value] of Object.entries(result.value)) {
        this.variables.set(key, value);
      }
    }
    this.variables.set(result.toolName, result.value);
    this.variables.set(`step${this.results.length}`, result.value);
  }

  set(key: string, value: unknown): void {
    this.variables.set(key, value);
  }

  has(key: string): boolean {
    return this.variables.has(key);
  }

  get(key: string): unknown {
    return this.variables.get(key);
  }

  keys(): string[] {
    return Array.from(this.variables.keys());
  }

  /**
   * Resolve a dotted path; numeric segments index into arrays
   *
   * @example
   * store.set('step1', { pods: ['a', 'b'] })
   * store.lookup('step1.pods.1') → { found: true, value: 'b' }
   */
  lookup(path: string): LookupResult {
    const [head, ...rest] = path.split('.');
    if (head === undefined || !this.variables.has(head)) {
      return { found: false };
    }

    let value: unknown = this.variables.get(head);
    for (const segment of rest) {
      if (Array.isArray(value) && /^\d+$/.test(segment)) {
        const index = Number(segment);
        if (index >= value.length) return { found: false };
        value = value[index];
      } else if (isRecord(value) && Object.prototype.hasOwnProperty.call(value, segment)) {
        value = value[segment];
      } else {
        return { found: false };
      }
    }

    return { found: true, value };
  }

  /**
   * Results recorded so far, in execution order
   */
  getResults(): StepResult[] {
    return [...this.results];
  }
}
