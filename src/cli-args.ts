/**
 * Command-line argument parsing for the ops-copilot CLI
 */

export interface ParsedArgs {
  configPath?: string;
  query?: string;
  showContext?: boolean;
  help?: boolean;
  version?: boolean;
  error?: string;
}

/**
 * Parse command-line arguments
 *
 * @example
 * parseArgs(['--query', 'pods over 90% cpu']) → { query: 'pods over 90% cpu' }
 */
export function parseArgs(args: string[]): ParsedArgs {
  const parsed: ParsedArgs = {};

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];

    if (arg === '--help' || arg === '-h') {
      parsed.help = true;
    } else if (arg === '--version') {
      parsed.version = true;
    } else if (arg === '--show-context') {
      parsed.showContext = true;
    } else if (arg === '--config' || arg === '-c') {
      const value = args[++i];
      if (!value) {
        parsed.error = '--config requires a file path';
      } else {
        parsed.configPath = value;
      }
    } else if (arg === '--query' || arg === '-q') {
      const value = args[++i];
      if (!value || value.trim().length === 0) {
        parsed.error = '--query requires a question';
      } else {
        parsed.query = value;
      }
    } else {
      parsed.error = `Unknown option: ${arg}`;
    }
  }

  return parsed;
}

export function usageText(version: string): string {
  return `
Ops Copilot v${version}

Usage:
  ops-copilot [options]

Without --query, starts an interactive session:
  type a question, 'clear' to reset the conversation, 'exit' to quit.

Options:
  --config, -c <path>     Configuration file (default: config/copilot.yaml, or $OPS_COPILOT_CONFIG)
  --query, -q <text>      Answer one question and exit (status 0 if answered, 1 otherwise)
  --show-context          Print the carried conversation before each prompt
  --help, -h              Show this help message
  --version               Show version

Environment:
  OLLAMA_URL, OLLAMA_MODEL, MCP_SERVER_URL, CONTEXT_PROVIDER_URL override the configuration file.
  DEBUG=1 prints plans and repairs; NO_COLORS=1, NO_SPINNERS=1, NO_FRAMES=1, SILENT=1 reduce output.
`;
}
