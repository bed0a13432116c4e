/**
 * Output Summarizer - Streams the final answer for a finished run
 * Combines the execution trace with the context specification in one streaming completion
 */

import type { CompletionService } from '../services/completion-service.js';
import type { StepResult } from '../types/index.js';

/**
 * Receives summary text as the completion service produces it
 */
export type FragmentListener = (fragment: string) => void;

/**
 * Render step results the way prompts show them
 * One JSON entry per step: `{tool_name, result}` or `{tool_name, error}`
 *
 * @example
 * formatResultsForPrompt([{ ok: true, toolName: 'pod_status_summary', value: { Running: 3 }, durationMs: 5 }])
 * → '[{"tool_name":"pod_status_summary","result":{"Running":3}}]'
 */
export function formatResultsForPrompt(results: readonly StepResult[]): string {
  return JSON.stringify(
    results.map((result) =>
      result.ok
        ? { tool_name: result.toolName, result: result.value ?? null }
        : { tool_name: result.toolName, error: result.error }
    )
  );
}

/**
 * Build the final summarization prompt
 */
export function buildSummaryPrompt(results: readonly StepResult[], contextSpecification: string): string {
  return (
    `Summarize these tool call results: ${formatResultsForPrompt(results)}\n` +
    'Provide a neat minimal summary. Interpret the results based on the context specification ' +
    `and apply the policy it describes to them. The context specification is: ${contextSpecification}`
  );
}

export class OutputSummarizer {
  constructor(private readonly completion: CompletionService) {}

  /**
   * Stream the summary for a trace and return the concatenated text
   *
   * @param onFragment - Called with each fragment in arrival order
   */
  async summarize(
    results: readonly StepResult[],
    contextSpecification: string,
    onFragment?: FragmentListener
  ): Promise<string> {
    let summary = '';
    for await (const fragment of this.completion.completeStream(
      buildSummaryPrompt(results, contextSpecification)
    )) {
      summary += fragment;
      onFragment?.(fragment);
    }
    return summary;
  }
}
