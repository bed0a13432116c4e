import { describe, it, expect, afterEach } from 'vitest';
import { z } from 'zod';
import { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { InMemoryTransport } from '@modelcontextprotocol/sdk/inMemory.js';
import type { Transport } from '@modelcontextprotocol/sdk/shared/transport.js';
import { McpToolCapability, normalizeToolResult } from '../../src/tools/mcp-capability.js';
import { ToolInvocationError } from '../../src/tools/tool-registry.js';
import { ServiceUnavailableError } from '../../src/services/service-errors.js';

class UnreachableTransport implements Transport {
  async start(): Promise<void> {
    throw new Error('connect ECONNREFUSED 127.0.0.1:9000');
  }

  async send(): Promise<void> {}

  async close(): Promise<void> {}
}

describe('normalizeToolResult', () => {
  it('prefers structured content', () => {
    expect(
      normalizeToolResult('pod_status_summary', {
        content: [{ type: 'text', text: 'ignored' }],
        structuredContent: { Running: 3 },
      })
    ).toEqual({ Running: 3 });
  });

  it('decodes a single JSON text item', () => {
    expect(normalizeToolResult('pods_exceeding_cpu', { content: [{ type: 'text', text: '["nginx-123"]' }] })).toEqual([
      'nginx-123',
    ]);
  });

  it('keeps plain text as a string', () => {
    expect(normalizeToolResult('node_disk_usage', { content: [{ type: 'text', text: 'all nodes below 70%' }] })).toBe(
      'all nodes below 70%'
    );
  });

  it('returns a list for several text items', () => {
    expect(
      normalizeToolResult('x', {
        content: [
          { type: 'text', text: '1' },
          { type: 'text', text: 'two' },
        ],
      })
    ).toEqual([1, 'two']);
  });

  it('returns the legacy toolResult field', () => {
    expect(normalizeToolResult('x', { toolResult: { ok: true } })).toEqual({ ok: true });
  });

  it('raises tool errors with their text', () => {
    expect(() =>
      normalizeToolResult('pod_event_timeline', {
        isError: true,
        content: [{ type: 'text', text: 'pod not found' }],
      })
    ).toThrow(new ToolInvocationError('pod not found', 'pod_event_timeline'));
    expect(() => normalizeToolResult('pod_event_timeline', { isError: true, content: [] })).toThrow(
      "Tool 'pod_event_timeline' reported an error"
    );
  });
});

describe('McpToolCapability', () => {
  let server: McpServer | undefined;
  let capability: McpToolCapability | undefined;

  afterEach(async () => {
    await capability?.close();
    await server?.close();
    capability = undefined;
    server = undefined;
  });

  async function connectedCapability(): Promise<McpToolCapability> {
    server = new McpServer({ name: 'monitoring-test', version: '1.0.0' });
    server.tool('pods_exceeding_cpu', 'Pods above a CPU ratio', { threshold: z.number() }, async ({ threshold }) => ({
      content: [{ type: 'text', text: JSON.stringify(threshold >= 0.9 ? ['nginx-123'] : ['nginx-123', 'redis-7']) }],
    }));
    server.tool('node_disk_usage', 'Disk usage per node', async () => {
      throw new Error('disk probe failed');
    });

    const [clientTransport, serverTransport] = InMemoryTransport.createLinkedPair();
    await server.connect(serverTransport);
    return new McpToolCapability('memory://monitoring', { createTransport: () => clientTransport });
  }

  it('calls tools on the server and decodes their JSON text', async () => {
    capability = await connectedCapability();

    await expect(capability.invoke('pods_exceeding_cpu', { threshold: 0.9 })).resolves.toEqual(['nginx-123']);
    await expect(capability.invoke('pods_exceeding_cpu', { threshold: 0.5 })).resolves.toEqual([
      'nginx-123',
      'redis-7',
    ]);
  });

  it('reports tool failures as invocation errors', async () => {
    capability = await connectedCapability();

    await expect(capability.invoke('node_disk_usage', {})).rejects.toBeInstanceOf(ToolInvocationError);
    await expect(capability.invoke('node_disk_usage', {})).rejects.toThrow(/disk probe failed/);
  });

  it('reports unknown server tools as invocation errors', async () => {
    capability = await connectedCapability();

    await expect(capability.invoke('not_a_tool', {})).rejects.toBeInstanceOf(ToolInvocationError);
  });

  it('treats an unreachable server as unavailable and retries the connection', async () => {
    let attempts = 0;
    capability = new McpToolCapability('http://localhost:9000/mcp', {
      createTransport: () => {
        attempts++;
        return new UnreachableTransport();
      },
    });

    const first = capability.invoke('pods_exceeding_cpu', {});
    await expect(first).rejects.toBeInstanceOf(ServiceUnavailableError);
    await expect(first).rejects.toThrow(
      'MCP server http://localhost:9000/mcp is unreachable: connect ECONNREFUSED 127.0.0.1:9000'
    );

    await expect(capability.invoke('pods_exceeding_cpu', {})).rejects.toBeInstanceOf(ServiceUnavailableError);
    expect(attempts).toBe(2);
  });
});
