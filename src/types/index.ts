/**
 * Ops Copilot - Core Type Definitions
 * Shared by the planner, resolver, executor, runner and summarizer
 */

/**
 * Any value a planned step can carry as a parameter
 * `null`, `''` and `[]` are the "still unknown" markers
 */
export type ParamValue =
  | string
  | number
  | boolean
  | null
  | ParamValue[]
  | { [key: string]: ParamValue };

/**
 * Parameter mapping of a single step
 */
export type StepParams = Record<string, ParamValue>;

/**
 * A single tool invocation request produced by the planner
 */
export interface Step {
  /** Tool name as registered in the tool registry */
  tool_name: string;
  /** Parameter mapping; values may still contain placeholders or be empty */
  params: StepParams;
  /** Set when the planner entry was malformed; the step fails without a tool call */
  invalid?: string;
}

/**
 * Ordered, nonempty sequence of steps for one run
 */
export type Plan = [Step, ...Step[]];

/**
 * Where the plan came from
 * 'fallback' means the planner answer could not be used
 */
export type PlanSource = 'model' | 'fallback';

/**
 * Declared parameter of a tool
 */
export interface ToolParameter {
  name: string;
  /** Type as written in the tool's signature (e.g. 'float', 'Optional[List[str]]') */
  type: string;
  /** Default value, when the tool declares one */
  default?: ParamValue;
  /** Whether the tool requires the parameter (no default) */
  required?: boolean;
}

/**
 * Declared signature of a tool
 * Rendered into the planning prompt; never enforced before invocation
 */
export interface ToolSignature {
  name: string;
  description?: string;
  parameters: ToolParameter[];
}

/**
 * Successful step outcome
 */
export interface StepSuccess {
  ok: true;
  toolName: string;
  /** Value returned by the tool */
  value: unknown;
  durationMs: number;
}

/**
 * Failed step outcome (tool error, unknown tool, timeout or unresolved parameters)
 */
export interface StepFailure {
  ok: false;
  toolName: string;
  error: string;
  durationMs: number;
}

export type StepResult = StepSuccess | StepFailure;

/**
 * One StepResult per Step, in plan order
 */
export type ExecutionTrace = StepResult[];

/**
 * Runner state machine phases
 */
export type WorkflowPhase =
  | { kind: 'planning' }
  | { kind: 'executing'; index: number; total: number; step: Step }
  | { kind: 'done' };

/**
 * Everything a finished run produced
 */
export interface WorkflowRunResult {
  /** Unique identifier for this run */
  runId: string;
  /** Query sent to the planner (including conversation prefix) */
  query: string;
  plan: Plan;
  planSource: PlanSource;
  trace: ExecutionTrace;
  /** Context specification fetched at run start */
  contextSpecification: string;
  durationMs: number;
}

/**
 * Result of one conversational turn
 * Aborted runs surface as 'failed' instead of throwing
 */
export type TurnOutcome =
  | { status: 'answered'; answer: string; run: WorkflowRunResult }
  | { status: 'failed'; error: Error };
