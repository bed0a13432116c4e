/**
 * Plan Generator - Turns a natural-language query into an ordered list of tool calls
 * The completion model plans; this module builds its prompt and validates its answer
 */

import type { CompletionService } from '../services/completion-service.js';
import { parseTolerantJson } from '../parsers/json-repair.js';
import { StepSchema } from '../schemas/config.schema.js';
import { formatCatalogForPrompt } from '../tools/tool-catalog.js';
import type { Plan, PlanSource, Step, ToolSignature } from '../types/index.js';

export interface PlanGeneratorOptions {
  /** Upper bound on plan length; longer answers are truncated */
  maxSteps: number;
}

export interface GeneratedPlan {
  plan: Plan;
  source: PlanSource;
  /** Raw planner answer */
  rawText: string;
  /** Truncation notices and the fallback reason, if any */
  warnings: string[];
}

/**
 * Outcome of reading a planner answer
 * `reason` explains why the fallback plan applies
 */
export type PlanParseResult = { ok: true; plan: Plan; warnings: string[] } | { ok: false; reason: string };

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Build the planning prompt
 */
export function buildPlanningPrompt(
  query: string,
  contextSpecification: string,
  tools: ToolSignature[],
  maxSteps: number
): string {
  return [
    'You are an assistant that converts natural language queries into a sequence of available MCP tool calls.',
    'Return ONLY JSON: a list of steps, each with "tool_name" (string) and "params" (object). ' +
      `Arrange the calls in a logical flow, with a minimum of 1 call and a maximum of ${maxSteps} calls.`,
    'If a parameter cannot be filled from the information you have, set it to an empty string.',
    'To pass the output of an earlier call, use {stepN} or {stepN.field} as the parameter value (N starts at 1).',
    'The context specification below comes from the context provider. Based on the query, decide which ' +
      'workload, metric and other parameters from the specification apply to the tool calls, and compose ' +
      `further calls from the topology it describes. The specification is: ${contextSpecification}`,
    'Available tools:',
    formatCatalogForPrompt(tools),
    `Natural language query: ${query}`,
  ].join('\n');
}

/**
 * Single-step plan used when the planner answer is unusable
 * Names the query as the tool, which the executor then reports as unknown
 */
export function fallbackPlan(query: string): Plan {
  return [{ tool_name: query.trim(), params: {} }];
}

/**
 * Turn one planner entry into a step
 * Malformed entries keep their position and carry the reason they cannot run
 */
function toStep(candidate: unknown): { step: Step; problem?: string } {
  const validation = StepSchema.safeParse(candidate);
  if (validation.success) {
    return { step: validation.data };
  }

  const problem = validation.error.errors
    .map((err) => `${err.path.join('.') || 'step'}: ${err.message}`)
    .join('; ');
  const toolName = isRecord(candidate) ? String(candidate.tool_name ?? '').trim() : '';
  return { step: { tool_name: toolName, params: {}, invalid: problem }, problem };
}

/**
 * Read a planner answer into a plan
 * Only empty, non-JSON, scalar or step-less answers fail
 *
 * @example
 * parsePlan('[{"tool_name":"pods_exceeding_cpu","params":{"threshold":0.9}}]', 3)
 * → { ok: true, plan: [{ tool_name: 'pods_exceeding_cpu', params: { threshold: 0.9 } }], warnings: [] }
 */
export function parsePlan(rawText: string, maxSteps: number): PlanParseResult {
  const parsed = parseTolerantJson(rawText);
  if (parsed.kind === 'empty') {
    return { ok: false, reason: 'planner answer was empty' };
  }
  if (parsed.kind === 'invalid') {
    return { ok: false, reason: `planner answer is not JSON (${parsed.reason})` };
  }

  let candidates: unknown[];
  const value = parsed.value;
  if (Array.isArray(value)) {
    candidates = value;
  } else if (isRecord(value)) {
    if (Array.isArray(value.steps)) {
      candidates = value.steps;
    } else if (Array.isArray(value.workflow)) {
      candidates = value.workflow;
    } else {
      candidates = [value];
    }
  } else {
    return { ok: false, reason: 'planner answer is neither a step nor a list of steps' };
  }

  const warnings: string[] = [];
  if (candidates.length > maxSteps) {
    warnings.push(`Planner proposed ${candidates.length} steps; keeping the first ${maxSteps}`);
  }

  const steps = candidates.slice(0, maxSteps).map((candidate, index) => {
    const { step, problem } = toStep(candidate);
    if (problem !== undefined) {
      warnings.push(`Step ${index + 1} is malformed and will be recorded as failed (${problem})`);
    }
    return step;
  });

  const [first, ...rest] = steps;
  if (first === undefined) {
    return { ok: false, reason: 'planner answer contains no steps' };
  }

  return { ok: true, plan: [first, ...rest], warnings };
}

export class PlanGenerator {
  constructor(
    private readonly completion: CompletionService,
    private readonly tools: ToolSignature[],
    private readonly options: PlanGeneratorOptions
  ) {}

  /**
   * Generate a plan; always returns a nonempty plan
   * Completion service failures propagate
   */
  async generate(query: string, contextSpecification: string): Promise<GeneratedPlan> {
    const rawText = await this.completion.complete(
      buildPlanningPrompt(query, contextSpecification, this.tools, this.options.maxSteps)
    );

    const parsed = parsePlan(rawText, this.options.maxSteps);
    if (parsed.ok) {
      return { plan: parsed.plan, source: 'model', rawText, warnings: parsed.warnings };
    }
    return {
      plan: fallbackPlan(query),
      source: 'fallback',
      rawText,
      warnings: [`Falling back to a single-step plan: ${parsed.reason}`],
    };
  }
}
