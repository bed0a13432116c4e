/**
 * MCP Capability - Runs tools on a remote MCP server over Streamable HTTP
 * Connects lazily on first use and reuses the session for the rest of the process
 */

import { Client } from '@modelcontextprotocol/sdk/client/index.js';
import { StreamableHTTPClientTransport } from '@modelcontextprotocol/sdk/client/streamableHttp.js';
import type { Transport } from '@modelcontextprotocol/sdk/shared/transport.js';
import { McpError } from '@modelcontextprotocol/sdk/types.js';
import type { StepParams } from '../types/index.js';
import { ServiceUnavailableError, describeError } from '../services/service-errors.js';
import { ToolInvocationError, type ToolCapability } from './tool-registry.js';

const CLIENT_INFO = { name: 'ops-copilot', version: '0.1.0' };

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function parseMaybeJson(text: string): unknown {
  try {
    return JSON.parse(text);
  } catch {
    return text;
  }
}

/**
 * Turn an MCP tool result into a plain value
 * structuredContent wins, then JSON-decoded text content, then raw text
 *
 * @throws ToolInvocationError when the server flags the result as an error
 */
export function normalizeToolResult(toolName: string, result: Record<string, unknown>): unknown {
  const content = Array.isArray(result.content) ? result.content : [];
  const texts = content
    .filter(isRecord)
    .filter((item) => item.type === 'text' && typeof item.text === 'string')
    .map((item) => String(item.text));

  if (result.isError === true) {
    throw new ToolInvocationError(texts.join('\n') || `Tool '${toolName}' reported an error`, toolName);
  }

  if (result.structuredContent !== undefined) {
    return result.structuredContent;
  }

  if ('toolResult' in result) {
    return result.toolResult;
  }

  if (texts.length === 1) {
    return parseMaybeJson(texts[0]);
  }
  if (texts.length > 1) {
    return texts.map(parseMaybeJson);
  }

  return content;
}

export interface McpToolCapabilityOptions {
  client?: Client;
  /** Defaults to Streamable HTTP against the server URL */
  createTransport?: () => Transport;
}

export class McpToolCapability implements ToolCapability {
  private client: Client;
  private createTransport: () => Transport;
  private connection: Promise<void> | null = null;

  constructor(
    private readonly serverUrl: string,
    options: McpToolCapabilityOptions = {}
  ) {
    this.client = options.client ?? new Client(CLIENT_INFO);
    this.createTransport =
      options.createTransport ?? (() => new StreamableHTTPClientTransport(new URL(serverUrl)));
  }

  async invoke(toolName: string, params: StepParams): Promise<unknown> {
    await this.connect();

    let result: Record<string, unknown>;
    try {
      result = await this.client.callTool({ name: toolName, arguments: params });
    } catch (error) {
      // Protocol errors come from the server itself (bad arguments, unknown tool)
      if (error instanceof McpError) {
        throw new ToolInvocationError(error.message, toolName);
      }
      throw new ServiceUnavailableError(
        `MCP server ${this.serverUrl} failed during '${toolName}': ${describeError(error)}`,
        'tools',
        { cause: error }
      );
    }

    return normalizeToolResult(toolName, result);
  }

  async close(): Promise<void> {
    if (this.connection) {
      this.connection = null;
      await this.client.close();
    }
  }

  private connect(): Promise<void> {
    if (!this.connection) {
      this.connection = Promise.resolve()
        .then(() => this.client.connect(this.createTransport()))
        .catch((error: unknown) => {
          this.connection = null;
          throw new ServiceUnavailableError(
            `MCP server ${this.serverUrl} is unreachable: ${describeError(error)}`,
            'tools',
            { cause: error }
          );
        });
    }
    return this.connection;
  }
}
