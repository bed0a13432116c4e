/**
 * Conversation Shell - Line-oriented loop around a copilot session
 * `exit` ends the loop, `clear` resets the conversation, anything else is a question
 */

import { createInterface } from 'readline';
import inquirer from 'inquirer';
import type { CopilotSession } from '../engine/copilot-session.js';
import type { TurnOutcome } from '../types/index.js';
import type { UIManager } from '../ui/ui-manager.js';

export type ShellCommand =
  | { kind: 'exit' }
  | { kind: 'clear' }
  | { kind: 'empty' }
  | { kind: 'query'; text: string };

/**
 * Next input line, or null once input is exhausted
 */
export type LineSource = () => Promise<string | null>;

/**
 * Classify one line of shell input
 *
 * @example
 * parseShellInput('  EXIT ') → { kind: 'exit' }
 * parseShellInput('top pods by cpu') → { kind: 'query', text: 'top pods by cpu' }
 */
export function parseShellInput(line: string): ShellCommand {
  const text = line.trim();
  if (text.length === 0) return { kind: 'empty' };

  switch (text.toLowerCase()) {
    case 'exit':
      return { kind: 'exit' };
    case 'clear':
      return { kind: 'clear' };
    default:
      return { kind: 'query', text };
  }
}

/**
 * Interactive line source backed by an inquirer input prompt
 */
export function inquirerLineSource(message: string): LineSource {
  return async () => {
    const { query } = await inquirer.prompt<{ query: string }>([
      {
        type: 'input',
        name: 'query',
        message,
      },
    ]);
    return query;
  };
}

/**
 * Line source for piped input; resolves null at end of stream
 */
export function streamLineSource(input: NodeJS.ReadableStream): LineSource {
  const lines = createInterface({ input, crlfDelay: Infinity })[Symbol.asyncIterator]();
  return async () => {
    const next = await lines.next();
    return next.done ? null : next.value;
  };
}

export interface ConversationShellOptions {
  /** Defaults to an inquirer prompt */
  readLine?: LineSource;
  /** Print the carried conversation before each prompt */
  showContext?: boolean;
}

export class ConversationShell {
  private readLine: LineSource;
  private showContext: boolean;

  constructor(
    private readonly session: CopilotSession,
    private readonly ui: UIManager,
    options: ConversationShellOptions = {}
  ) {
    this.readLine = options.readLine ?? inquirerLineSource("Enter your query ('clear' resets history, 'exit' quits):");
    this.showContext = options.showContext ?? false;
  }

  /**
   * Run until `exit` or end of input
   */
  async run(): Promise<void> {
    this.ui.log(this.ui.header('Ops Copilot', "Ask about your cluster. 'clear' resets history, 'exit' quits."));

    for (;;) {
      if (this.showContext) {
        const context = this.session.getContext();
        this.ui.log(this.ui.frameBox(context ? context.split('\n') : ['(empty)'], 'Current context'));
      }

      const line = await this.readLine();
      if (line === null) return;

      const command = parseShellInput(line);
      switch (command.kind) {
        case 'exit':
          return;
        case 'clear':
          this.session.clear();
          this.ui.log(this.ui.status('Conversation history cleared', 'success'));
          break;
        case 'empty':
          break;
        case 'query':
          await this.handleQuery(command.text);
          break;
      }
    }
  }

  /**
   * Run one turn, printing the answer as it streams
   */
  async handleQuery(query: string): Promise<TurnOutcome> {
    let streamed = false;
    const outcome = await this.session.ask(query, (fragment) => {
      streamed = true;
      this.ui.write(fragment);
    });

    if (outcome.status === 'failed') {
      this.ui.error(this.ui.status(`${outcome.error.name}: ${outcome.error.message}`, 'error'));
      return outcome;
    }

    if (streamed) {
      this.ui.write('\n');
    }

    const { run } = outcome;
    const succeeded = run.trace.filter((result) => result.ok).length;
    const source = run.planSource === 'fallback' ? ', fallback plan' : '';
    this.ui.log(
      this.ui.format(
        `${succeeded}/${run.trace.length} tool calls succeeded${source} · ${(run.durationMs / 1000).toFixed(1)}s · ${run.runId}`,
        'subtle'
      )
    );
    return outcome;
  }
}
