/**
 * Tool Registry - Resolves tool names to typed operation descriptors at call time
 * Parameters are forwarded as-is: signatures are informational and never enforced here
 */

import type { StepParams, ToolSignature } from '../types/index.js';

/**
 * Something that can run a named tool
 */
export interface ToolCapability {
  invoke(toolName: string, params: StepParams): Promise<unknown>;
}

/**
 * Registered tool: declared signature plus the capability that runs it
 */
export interface ToolDescriptor {
  signature: ToolSignature;
  capability: ToolCapability;
}

/**
 * Error thrown when a step names a tool the registry does not know
 */
export class UnknownToolError extends Error {
  constructor(
    public readonly toolName: string,
    public readonly availableTools: string[]
  ) {
    super(
      `Unknown tool '${toolName}'. Available tools: ${availableTools.join(', ') || 'none'}`
    );
    this.name = 'UnknownToolError';
  }
}

/**
 * Error thrown when a tool runs but reports a failure
 */
export class ToolInvocationError extends Error {
  constructor(message: string, public readonly toolName: string) {
    super(message);
    this.name = 'ToolInvocationError';
  }
}

/**
 * Error thrown when a tool does not answer within the registry timeout
 */
export class ToolTimeoutError extends ToolInvocationError {
  constructor(toolName: string, public readonly timeoutMs: number) {
    super(`Tool '${toolName}' timed out after ${timeoutMs}ms`, toolName);
    this.name = 'ToolTimeoutError';
  }
}

export interface ToolRegistryOptions {
  /** Upper bound for a single invocation, in milliseconds */
  timeoutMs?: number;
}

export class ToolRegistry {
  private tools = new Map<string, ToolDescriptor>();
  private timeoutMs: number | undefined;

  constructor(options: ToolRegistryOptions = {}) {
    this.timeoutMs = options.timeoutMs;
  }

  register(signature: ToolSignature, capability: ToolCapability): void {
    this.tools.set(signature.name, { signature, capability });
  }

  /**
   * Register every signature of a catalog against one capability
   */
  registerCatalog(signatures: ToolSignature[], capability: ToolCapability): void {
    for (const signature of signatures) {
      this.register(signature, capability);
    }
  }

  /**
   * Signatures of all registered tools, in registration order
   */
  list(): ToolSignature[] {
    return Array.from(this.tools.values(), (descriptor) => descriptor.signature);
  }

  /**
   * Invoke a tool by name
   *
   * @throws UnknownToolError if the name is not registered
   * @throws ToolTimeoutError if the capability does not settle in time
   */
  async invoke(toolName: string, params: StepParams): Promise<unknown> {
    const descriptor = this.tools.get(toolName);
    if (!descriptor) {
      throw new UnknownToolError(toolName, Array.from(this.tools.keys()));
    }

    const invocation = descriptor.capability.invoke(toolName, params);
    if (this.timeoutMs === undefined) {
      return invocation;
    }

    const timeoutMs = this.timeoutMs;
    let timer: NodeJS.Timeout | undefined;
    const timeout = new Promise<never>((_, reject) => {
      timer = setTimeout(() => reject(new ToolTimeoutError(toolName, timeoutMs)), timeoutMs);
    });

    try {
      return await Promise.race([invocation, timeout]);
    } finally {
      clearTimeout(timer);
    }
  }
}
