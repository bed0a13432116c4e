/**
 * Errors raised by external collaborators (completion service, tool registry, context provider)
 * These are the only failures that abort a workflow run
 */

export type ServiceName = 'completion' | 'tools' | 'context-provider';

/**
 * Error thrown when an external service cannot be reached or answers with a failure
 */
export class ServiceUnavailableError extends Error {
  constructor(
    message: string,
    public readonly service: ServiceName,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = 'ServiceUnavailableError';
  }
}

/**
 * Render any thrown value as a message
 */
export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
