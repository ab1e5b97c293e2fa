import { describe, expect, it } from 'vitest';
import { AbortRegistry } from './abort-registry.js';

describe('AbortRegistry', () => {
  it('aborts the stream when its trigger is deleted', () => {
    const registry = new AbortRegistry();
    const handle = registry.register('t1');

    expect(registry.isActivelyStreaming('t1')).toBe(true);
    expect(registry.tryAbort('t1')).toBe(true);
    expect(handle.signal.aborted).toBe(true);
    expect(registry.isActivelyStreaming('t1')).toBe(false);
  });

  it('aborts the stream when a tracked reply is deleted', () => {
    const registry = new AbortRegistry();
    const handle = registry.register('t1');
    handle.track('r1');

    expect(registry.tryAbort('r1')).toBe(true);
    expect(handle.signal.aborted).toBe(true);
  });

  it('returns false for unknown ids', () => {
    expect(new AbortRegistry().tryAbort('nope')).toBe(false);
  });

  it('forgets every id on dispose', () => {
    const registry = new AbortRegistry();
    const handle = registry.register('t1');
    handle.track('r1');
    handle.dispose();

    expect(registry.tryAbort('t1')).toBe(false);
    expect(registry.tryAbort('r1')).toBe(false);
    expect(handle.signal.aborted).toBe(false);
  });

  it('does not let an old stream dispose a newer registration of the same id', () => {
    const registry = new AbortRegistry();
    const older = registry.register('t1');
    const newer = registry.register('t1');
    older.dispose();

    expect(registry.tryAbort('t1')).toBe(true);
    expect(newer.signal.aborted).toBe(true);
  });

  it('aborts every active stream once', () => {
    const registry = new AbortRegistry();
    const a = registry.register('a');
    a.track('a-reply');
    const b = registry.register('b');

    expect(registry.tryAbortAll()).toBe(2);
    expect(a.signal.aborted && b.signal.aborted).toBe(true);
    expect(registry.tryAbortAll()).toBe(0);
  });
});
