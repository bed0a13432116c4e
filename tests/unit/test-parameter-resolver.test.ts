import { describe, it, expect, beforeEach } from 'vitest';
import { ContextStore } from '../../src/context/context-store.js';
import {
  ParameterResolver,
  ResolutionParseError,
  findUnresolvedKeys,
  parseResolutionAnswer,
} from '../../src/execution/parameter-resolver.js';
import { ServiceUnavailableError } from '../../src/services/service-errors.js';
import { ScriptedCompletion } from '../helpers/fakes.js';

describe('ParameterResolver', () => {
  let store: ContextStore;

  beforeEach(() => {
    store = new ContextStore();
    store.record({ ok: true, toolName: 'pods_exceeding_cpu', value: { pods: ['nginx-123'] }, durationMs: 4 });
  });

  it('substitutes placeholders without calling the model', async () => {
    const completion = new ScriptedCompletion();
    const resolver = new ParameterResolver(completion);

    const outcome = await resolver.resolve(
      { tool_name: 'pod_event_timeline', params: { pod_name: '{step1.pods.0}', window: '30m' } },
      store
    );

    expect(outcome).toEqual({ ok: true, params: { pod_name: 'nginx-123', window: '30m' }, repairedKeys: [] });
    expect(completion.prompts).toEqual([]);
  });

  it('repairs an empty parameter with a digest call and a resolution call', async () => {
    const completion = new ScriptedCompletion([
      'Pod nginx-123 exceeds CPU.',
      '```json\n{"tool_name":"pod_event_timeline","params":{"pod_name":"nginx-123","window":"30m"}}\n```',
    ]);
    const resolver = new ParameterResolver(completion);

    const outcome = await resolver.resolve(
      { tool_name: 'pod_event_timeline', params: { pod_name: '', window: '30m' } },
      store
    );

    expect(outcome).toEqual({
      ok: true,
      params: { pod_name: 'nginx-123', window: '30m' },
      repairedKeys: ['pod_name'],
    });
    expect(completion.prompts).toHaveLength(2);
    expect(completion.prompts[0]).toBe(
      'Summarize these tool call results: [{"tool_name":"pods_exceeding_cpu","result":{"pods":["nginx-123"]}}]\n' +
        'Provide a neat minimal summary.'
    );
    expect(completion.prompts[1]).toContain('for the parameter "pod_name" of the workflow step below');
    expect(completion.prompts[1]).toContain(
      'Workflow step: {"tool_name":"pod_event_timeline","params":{"pod_name":"","window":"30m"}}'
    );
    expect(completion.prompts[1]).toContain('Previous tool results: Pod nginx-123 exceeds CPU.');
  });

  it('lets one repair answer cover several parameters', async () => {
    const completion = new ScriptedCompletion([
      'digest',
      '{"params":{"pod_name":"nginx-123","namespace":"shop"}}',
    ]);
    const resolver = new ParameterResolver(completion);

    const outcome = await resolver.resolve(
      { tool_name: 'pod_event_timeline', params: { pod_name: '', namespace: null } },
      store
    );

    expect(outcome).toEqual({
      ok: true,
      params: { pod_name: 'nginx-123', namespace: 'shop' },
      repairedKeys: ['pod_name', 'namespace'],
    });
    expect(completion.prompts).toHaveLength(2);
  });

  it('repairs each parameter at most once', async () => {
    const completion = new ScriptedCompletion(['digest', '{"params":{"pod_name":""}}']);
    const resolver = new ParameterResolver(completion);

    const outcome = await resolver.resolve({ tool_name: 'pod_event_timeline', params: { pod_name: '' } }, store);

    expect(outcome).toEqual({ ok: true, params: { pod_name: '' }, repairedKeys: [] });
    expect(completion.prompts).toHaveLength(2);
  });

  it('runs a second repair for a parameter the first answer left out', async () => {
    const completion = new ScriptedCompletion(['digest', '{"params":{"a":"x"}}', 'digest', '{"params":{"b":"y"}}']);
    const resolver = new ParameterResolver(completion);

    const outcome = await resolver.resolve({ tool_name: 'correlate_metrics', params: { a: '', b: '' } }, store);

    expect(outcome).toEqual({ ok: true, params: { a: 'x', b: 'y' }, repairedKeys: ['a', 'b'] });
    expect(completion.prompts).toHaveLength(4);
  });

  it('substitutes placeholders found in repaired values', async () => {
    const completion = new ScriptedCompletion(['digest', '{"params":{"pod_name":"{step1.pods.0}"}}']);
    const resolver = new ParameterResolver(completion);

    const outcome = await resolver.resolve({ tool_name: 'pod_event_timeline', params: { pod_name: [] } }, store);

    expect(outcome).toEqual({ ok: true, params: { pod_name: 'nginx-123' }, repairedKeys: ['pod_name'] });
  });

  it('fails the step when the repair answer is not JSON', async () => {
    const completion = new ScriptedCompletion(['digest', 'I could not find the pod name']);
    const resolver = new ParameterResolver(completion);

    const outcome = await resolver.resolve({ tool_name: 'pod_event_timeline', params: { pod_name: '' } }, store);

    expect(outcome.ok).toBe(false);
    if (!outcome.ok) {
      expect(outcome.error).toBeInstanceOf(ResolutionParseError);
      expect(outcome.error.parameter).toBe('pod_name');
      expect(outcome.error.rawText).toBe('I could not find the pod name');
      expect(outcome.error.message).toMatch(/^resolution answer is not JSON/);
    }
  });

  it('fails the step when the repair answer has no params object', async () => {
    const completion = new ScriptedCompletion(['digest', '{"tool_name":"pod_event_timeline"}']);
    const resolver = new ParameterResolver(completion);

    const outcome = await resolver.resolve({ tool_name: 'pod_event_timeline', params: { pod_name: '' } }, store);

    expect(outcome.ok).toBe(false);
    if (!outcome.ok) {
      expect(outcome.error.message).toBe('resolution answer has no "params" object');
    }
  });

  it('propagates completion service failures', async () => {
    const completion = new ScriptedCompletion([new ServiceUnavailableError('down', 'completion')]);
    const resolver = new ParameterResolver(completion);

    await expect(
      resolver.resolve({ tool_name: 'pod_event_timeline', params: { pod_name: '' } }, store)
    ).rejects.toBeInstanceOf(ServiceUnavailableError);
  });

  describe('helpers', () => {
    it('lists unresolved keys in declaration order', () => {
      expect(findUnresolvedKeys({ a: 'x', b: '', c: null, d: [] })).toEqual(['b', 'c', 'd']);
    });

    it('keeps extra keys from the answer', () => {
      expect(parseResolutionAnswer('{"params":{"pod_name":"a","extra":1}}', 'pod_name')).toEqual({
        pod_name: 'a',
        extra: 1,
      });
    });

    it('rejects an empty answer', () => {
      expect(() => parseResolutionAnswer('   ', 'pod_name')).toThrow('resolution answer was empty');
    });
  });
});
