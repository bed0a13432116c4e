/**
 * Copilot Session - One conversation: runs turns and carries their answers forward
 */

import { ConversationContext } from '../context/conversation-context.js';
import type { FragmentListener, OutputSummarizer } from '../execution/output-summarizer.js';
import type { TurnOutcome } from '../types/index.js';
import type { WorkflowRunner } from './workflow-runner.js';

export class CopilotSession {
  private context = new ConversationContext();

  constructor(
    private readonly runner: WorkflowRunner,
    private readonly summarizer: OutputSummarizer
  ) {}

  /**
   * Run one turn: the query is prefixed with the conversation so far
   * A failed turn leaves the conversation untouched
   */
  async ask(query: string, onFragment?: FragmentListener): Promise<TurnOutcome> {
    try {
      const run = await this.runner.run(this.context.prefix(query));
      const answer = await this.summarizer.summarize(run.trace, run.contextSpecification, onFragment);
      this.context.append(answer);
      return { status: 'answered', answer, run };
    } catch (error) {
      return {
        status: 'failed',
        error: error instanceof Error ? error : new Error(String(error)),
      };
    }
  }

  clear(): void {
    this.context.clear();
  }

  getContext(): string {
    return this.context.toString();
  }
}
