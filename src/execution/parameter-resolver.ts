/**
 * Parameter Resolver - Fills step parameters before invocation
 *
 * Two phases per step:
 * 1. Template substitution from the context store
 * 2. Repair: for parameters still empty, a digest call over the results so far
 *    followed by a resolution call that answers with the full parameter mapping
 *
 * Each unresolved parameter triggers at most one repair.
 */

import { z } from 'zod';
import type { CompletionService } from '../services/completion-service.js';
import type { ContextStore } from '../context/context-store.js';
import { parseTolerantJson } from '../parsers/json-repair.js';
import { ParamValueSchema } from '../schemas/config.schema.js';
import type { Step, StepParams, StepResult } from '../types/index.js';
import { formatResultsForPrompt } from './output-summarizer.js';
import { isUnresolved, substituteParams } from './template-resolver.js';

/**
 * Error raised when a repair answer carries no usable `params` object
 */
export class ResolutionParseError extends Error {
  constructor(
    message: string,
    public readonly parameter: string,
    public readonly rawText: string
  ) {
    super(message);
    this.name = 'ResolutionParseError';
  }
}

export type ResolutionOutcome =
  | { ok: true; params: StepParams; repairedKeys: string[] }
  | { ok: false; error: ResolutionParseError };

const ResolutionAnswerSchema = z.object({
  params: z.record(ParamValueSchema),
});

/**
 * Declared keys whose values still need a value, in declaration order
 */
export function findUnresolvedKeys(params: StepParams): string[] {
  return Object.keys(params).filter((key) => isUnresolved(params[key]));
}

export function buildDigestPrompt(results: readonly StepResult[]): string {
  return `Summarize these tool call results: ${formatResultsForPrompt(results)}\nProvide a neat minimal summary.`;
}

export function buildResolutionPrompt(
  step: Step,
  params: StepParams,
  parameter: string,
  digest: string
): string {
  return [
    'Given the previous tool outputs, read carefully and take the appropriate value from them ' +
      `for the parameter "${parameter}" of the workflow step below. ` +
      'Make sure each value has the correct type (string, number, list, ...).',
    'Return the tool call only, as JSON of the form {"tool_name": "...", "params": {...}}, ' +
      'with the same parameters as the workflow step and no extra characters.',
    `Workflow step: ${JSON.stringify({ tool_name: step.tool_name, params })}`,
    `Previous tool results: ${digest}`,
  ].join('\n');
}

/**
 * Extract the `params` object from a resolution answer
 *
 * @throws ResolutionParseError when the answer is not JSON or has no `params` object
 */
export function parseResolutionAnswer(rawText: string, parameter: string): StepParams {
  const parsed = parseTolerantJson(rawText);
  if (parsed.kind === 'empty') {
    throw new ResolutionParseError('resolution answer was empty', parameter, rawText);
  }
  if (parsed.kind === 'invalid') {
    throw new ResolutionParseError(
      `resolution answer is not JSON (${parsed.reason})`,
      parameter,
      rawText
    );
  }

  const validation = ResolutionAnswerSchema.safeParse(parsed.value);
  if (!validation.success) {
    throw new ResolutionParseError('resolution answer has no "params" object', parameter, rawText);
  }
  return validation.data.params;
}

export class ParameterResolver {
  constructor(private readonly completion: CompletionService) {}

  /**
   * Resolve a step's parameters against the results of earlier steps
   * Completion service failures propagate; unusable repair answers become a failed outcome
   */
  async resolve(step: Step, store: ContextStore): Promise<ResolutionOutcome> {
    let params = substituteParams(step.params, store);
    const attempted = new Set<string>();

    for (const key of Object.keys(params)) {
      if (attempted.has(key) || !isUnresolved(params[key])) continue;

      const pending = findUnresolvedKeys(params);
      const digest = await this.completion.complete(buildDigestPrompt(store.getResults()));
      const answer = await this.completion.complete(buildResolutionPrompt(step, params, key, digest));

      let repaired: StepParams;
      try {
        repaired = substituteParams(parseResolutionAnswer(answer, key), store);
      } catch (error) {
        if (error instanceof ResolutionParseError) {
          return { ok: false, error };
        }
        throw error;
      }

      params = { ...params, ...repaired };
      attempted.add(key);
      // One repair answer may cover several pending parameters
      for (const pendingKey of pending) {
        if (pendingKey in repaired) {
          attempted.add(pendingKey);
        }
      }
    }

    return {
      ok: true,
      params,
      repairedKeys: Array.from(attempted).filter((key) => !isUnresolved(params[key])),
    };
  }
}
