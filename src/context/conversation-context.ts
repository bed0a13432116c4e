/**
 * Conversation Context - Text carried from one turn to the next
 * Holds only final answers; raw traces never land here
 */

export class ConversationContext {
  private text = '';

  /**
   * Append a turn's final answer
   */
  append(answer: string): void {
    if (answer.length === 0) return;
    this.text = this.text.length === 0 ? answer : `${this.text}\n${answer}`;
  }

  clear(): void {
    this.text = '';
  }

  isEmpty(): boolean {
    return this.text.length === 0;
  }

  toString(): string {
    return this.text;
  }

  /**
   * Prefix a new query with the accumulated context
   *
   * @example
   * context.prefix('which pods restarted?') → 'which pods restarted?'   // empty context
   * context.prefix('and now?')              → 'Earlier answer\nand now?'
   */
  prefix(query: string): string {
    return this.text.length === 0 ? query : `${this.text}\n${query}`;
  }
}
