/**
 * Workflow Runner - Drives one run: plan, then resolve and execute each step in order
 *
 * PLANNING → EXECUTING(0) → … → EXECUTING(n-1) → DONE
 * Per-step failures are data in the trace; only service failures abort a run
 */

import { randomBytes } from 'crypto';
import { PlanGenerator } from '../agents/plan-generator.js';
import { ContextStore } from '../context/context-store.js';
import { ParameterResolver } from '../execution/parameter-resolver.js';
import { StepExecutor, malformedStepFailure, resolutionFailure } from '../execution/step-executor.js';
import type { AppConfig } from '../schemas/config.schema.js';
import type { CompletionService } from '../services/completion-service.js';
import type { ContextSpecificationProvider } from '../services/context-provider.js';
import type { ToolRegistry } from '../tools/tool-registry.js';
import type { ExecutionTrace, StepResult, WorkflowPhase, WorkflowRunResult } from '../types/index.js';
import type { UIManager } from '../ui/ui-manager.js';

/**
 * Collaborators of a runner
 */
export interface WorkflowRunnerDeps {
  completion: CompletionService;
  registry: ToolRegistry;
  contextProvider: ContextSpecificationProvider;
  ui: UIManager;
}

export interface WorkflowRunnerOptions {
  /** Called on every phase transition */
  onPhase?: (phase: WorkflowPhase) => void;
}

/**
 * Generate a unique runId combining a prefix, timestamp, and random hash
 *
 * @example
 * generateRunId('ops') → 'ops-2026-02-01T143245123Z-a7f3d2'
 */
export function generateRunId(prefix: string): string {
  const timestamp = new Date().toISOString().replace(/[:.]/g, '');
  const randomHash = randomBytes(4).toString('hex').substring(0, 6);
  return `${prefix}-${timestamp}-${randomHash}`;
}

export class WorkflowRunner {
  private planGenerator: PlanGenerator;
  private resolver: ParameterResolver;
  private executor: StepExecutor;
  private onPhase: ((phase: WorkflowPhase) => void) | undefined;

  constructor(
    config: Pick<AppConfig, 'planner'>,
    private readonly deps: WorkflowRunnerDeps,
    options: WorkflowRunnerOptions = {}
  ) {
    this.planGenerator = new PlanGenerator(deps.completion, deps.registry.list(), {
      maxSteps: config.planner.maxSteps,
    });
    this.resolver = new ParameterResolver(deps.completion);
    this.executor = new StepExecutor(deps.registry, deps.ui.getSpinnerManager());
    this.onPhase = options.onPhase;
  }

  /**
   * Run a query to completion
   *
   * @throws ServiceUnavailableError when a collaborator cannot be reached
   */
  async run(query: string): Promise<WorkflowRunResult> {
    const startTime = Date.now();
    const runId = generateRunId('ops');
    const { ui } = this.deps;

    const contextSpecification = await this.deps.contextProvider.fetchSpecification();
    ui.debug(`[${runId}] fetched context specification (${contextSpecification.length} chars)`);

    this.onPhase?.({ kind: 'planning' });
    const generated = await this.planGenerator.generate(query, contextSpecification);
    for (const warning of generated.warnings) {
      ui.warn(warning);
    }
    ui.debug(`[${runId}] plan (${generated.source}): ${JSON.stringify(generated.plan)}`);

    const store = new ContextStore();
    const trace: ExecutionTrace = [];
    const total = generated.plan.length;

    for (const [index, step] of generated.plan.entries()) {
      this.onPhase?.({ kind: 'executing', index, total, step });
      const stepStart = Date.now();

      if (step.invalid !== undefined) {
        const failure = malformedStepFailure(step.tool_name, step.invalid);
        trace.push(failure);
        store.record(failure);
        continue;
      }

      const resolution = await this.resolver.resolve(step, store);
      let result: StepResult;
      if (resolution.ok) {
        if (resolution.repairedKeys.length > 0) {
          ui.debug(`[${runId}] repaired ${step.tool_name} parameters: ${resolution.repairedKeys.join(', ')}`);
        }
        result = await this.executor.execute(`step ${index + 1}/${total}`, step.tool_name, resolution.params);
      } else {
        ui.warn(`Could not resolve parameters for ${step.tool_name}: ${resolution.error.message}`);
        result = resolutionFailure(step.tool_name, resolution.error, Date.now() - stepStart);
      }

      trace.push(result);
      store.record(result);
    }

    this.onPhase?.({ kind: 'done' });

    return {
      runId,
      query,
      plan: generated.plan,
      planSource: generated.source,
      trace,
      contextSpecification,
      durationMs: Date.now() - startTime,
    };
  }
}
