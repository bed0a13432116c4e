/**
 * Step Executor - Invokes one tool call with resolved parameters
 * Every failure except service unavailability becomes a failed StepResult
 * Integrates with SpinnerManager for visual progress feedback
 */

import type { StepParams, StepResult } from '../types/index.js';
import type { ToolRegistry } from '../tools/tool-registry.js';
import { ServiceUnavailableError, describeError } from '../services/service-errors.js';
import type { ResolutionParseError } from './parameter-resolver.js';
import type { SpinnerManager } from '../ui/spinner-manager.js';

/**
 * Failed result for a step whose parameters could not be resolved
 * The tool is never invoked for such a step
 */
export function resolutionFailure(
  toolName: string,
  error: ResolutionParseError,
  durationMs: number
): StepResult {
  return {
    ok: false,
    toolName,
    error: `Parameter resolution failed: ${error.message}`,
    durationMs,
  };
}

/**
 * Failed result for a planner entry that never named a usable tool call
 */
export function malformedStepFailure(toolName: string, problem: string): StepResult {
  return {
    ok: false,
    toolName,
    error: `Malformed plan step: ${problem}`,
    durationMs: 0,
  };
}

export class StepExecutor {
  constructor(
    private readonly registry: ToolRegistry,
    private readonly spinnerManager?: SpinnerManager
  ) {}

  /**
   * Execute a single tool call
   *
   * @param stepLabel - Position shown in progress output, e.g. 'step 2/3'
   * @throws ServiceUnavailableError when the tool registry cannot be reached
   */
  async execute(stepLabel: string, toolName: string, params: StepParams): Promise<StepResult> {
    const startTime = Date.now();
    this.spinnerManager?.start(stepLabel, toolName);

    try {
      const value = await this.registry.invoke(toolName, params);
      const durationMs = Date.now() - startTime;
      this.spinnerManager?.succeed(`${toolName} completed`);
      return { ok: true, toolName, value, durationMs };
    } catch (error) {
      const message = describeError(error);
      this.spinnerManager?.fail(message);

      if (error instanceof ServiceUnavailableError) {
        throw error;
      }

      return { ok: false, toolName, error: message, durationMs: Date.now() - startTime };
    }
  }
}
