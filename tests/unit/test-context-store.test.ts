import { describe, it, expect } from 'vitest';
import { ContextStore } from '../../src/context/context-store.js';
import { ConversationContext } from '../../src/context/conversation-context.js';

describe('ContextStore', () => {
  it('stores a successful result under its position, tool name and top-level keys', () => {
    const store = new ContextStore();
    const value = { pods: ['nginx-123', 'redis-7'], threshold: 0.9 };
    store.record({ ok: true, toolName: 'pods_exceeding_cpu', value, durationMs: 3 });

    expect(store.get('step1')).toEqual(value);
    expect(store.get('pods_exceeding_cpu')).toEqual(value);
    expect(store.get('pods')).toEqual(['nginx-123', 'redis-7']);
    expect(store.get('threshold')).toBe(0.9);
  });

  it('does not expose failed results as variables but keeps their position', () => {
    const store = new ContextStore();
    store.record({ ok: false, toolName: 'show pods', error: "Unknown tool 'show pods'", durationMs: 0 });
    store.record({ ok: true, toolName: 'node_disk_usage', value: 'ok', durationMs: 1 });

    expect(store.has('step1')).toBe(false);
    expect(store.has('show pods')).toBe(false);
    expect(store.keys()).toEqual(['node_disk_usage', 'step2']);
    expect(store.getResults()).toHaveLength(2);
  });

  it('resolves dotted paths through objects and arrays', () => {
    const store = new ContextStore();
    store.set('step1', { pods: ['a', 'b'], meta: { namespace: 'shop' } });

    expect(store.lookup('step1.pods.1')).toEqual({ found: true, value: 'b' });
    expect(store.lookup('step1.meta.namespace')).toEqual({ found: true, value: 'shop' });
    expect(store.lookup('step1.pods.5')).toEqual({ found: false });
    expect(store.lookup('step1.missing')).toEqual({ found: false });
    expect(store.lookup('nope')).toEqual({ found: false });
  });

  it('finds stored null values', () => {
    const store = new ContextStore();
    store.set('namespace', null);
    expect(store.lookup('namespace')).toEqual({ found: true, value: null });
  });

  it('returns a copy of the results', () => {
    const store = new ContextStore();
    store.getResults().push({ ok: true, toolName: 'x', value: 1, durationMs: 0 });
    expect(store.getResults()).toEqual([]);
  });
});

describe('ConversationContext', () => {
  it('passes queries through while empty', () => {
    const context = new ConversationContext();
    expect(context.prefix('which pods restarted?')).toBe('which pods restarted?');
    expect(context.isEmpty()).toBe(true);
  });

  it('prefixes queries with earlier answers', () => {
    const context = new ConversationContext();
    context.append('Pod nginx-123 is above 90% CPU.');
    context.append('Disks are fine.');

    expect(context.toString()).toBe('Pod nginx-123 is above 90% CPU.\nDisks are fine.');
    expect(context.prefix('and memory?')).toBe('Pod nginx-123 is above 90% CPU.\nDisks are fine.\nand memory?');
  });

  it('ignores empty answers', () => {
    const context = new ConversationContext();
    context.append('');
    expect(context.isEmpty()).toBe(true);
  });

  it('clears to the empty string', () => {
    const context = new ConversationContext();
    context.append('Disks are fine.');
    context.clear();
    expect(context.toString()).toBe('');
    expect(context.prefix('node disk usage')).toBe('node disk usage');
  });
});
