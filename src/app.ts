/**
 * Application wiring - Builds a copilot session from a validated configuration
 */

import { CopilotSession } from './engine/copilot-session.js';
import { WorkflowRunner, type WorkflowRunnerOptions } from './engine/workflow-runner.js';
import { OutputSummarizer } from './execution/output-summarizer.js';
import type { AppConfig } from './schemas/config.schema.js';
import { OllamaCompletionService, type CompletionService } from './services/completion-service.js';
import { HttpContextProvider, type ContextSpecificationProvider } from './services/context-provider.js';
import { McpToolCapability } from './tools/mcp-capability.js';
import { loadToolCatalog } from './tools/tool-catalog.js';
import { ToolRegistry, type ToolCapability } from './tools/tool-registry.js';
import type { WorkflowPhase } from './types/index.js';
import type { UIManager } from './ui/ui-manager.js';

/**
 * Replaceable collaborators; defaults talk to the configured services
 */
export interface CopilotOverrides {
  completion?: CompletionService;
  contextProvider?: ContextSpecificationProvider;
  capability?: ToolCapability;
}

export interface Copilot {
  session: CopilotSession;
  registry: ToolRegistry;
  /** Release network resources held by the default tool capability */
  close(): Promise<void>;
}

/**
 * Progress lines for runner phases
 */
export function phaseReporter(ui: UIManager): (phase: WorkflowPhase) => void {
  return (phase) => {
    switch (phase.kind) {
      case 'planning':
        ui.log(ui.status('Planning tool calls...', 'info'));
        break;
      case 'executing':
        ui.debug(`step ${phase.index + 1}/${phase.total}: ${phase.step.tool_name} ${JSON.stringify(phase.step.params)}`);
        break;
      case 'done':
        ui.log(ui.status('Summarizing results...', 'info'));
        break;
    }
  };
}

export async function createCopilot(
  config: AppConfig,
  ui: UIManager,
  overrides: CopilotOverrides = {},
  runnerOptions: WorkflowRunnerOptions = { onPhase: phaseReporter(ui) }
): Promise<Copilot> {
  const signatures = await loadToolCatalog(config.tools.catalogPath);

  // Connects on first invocation only
  const mcp = new McpToolCapability(config.tools.serverUrl);
  const registry = new ToolRegistry({ timeoutMs: config.tools.timeoutMs });
  registry.registerCatalog(signatures, overrides.capability ?? mcp);

  const completion = overrides.completion ?? new OllamaCompletionService(config.completion);
  const contextProvider = overrides.contextProvider ?? new HttpContextProvider(config.contextProvider);

  const runner = new WorkflowRunner(config, { completion, registry, contextProvider, ui }, runnerOptions);
  const session = new CopilotSession(runner, new OutputSummarizer(completion));

  return {
    session,
    registry,
    close: () => mcp.close(),
  };
}
