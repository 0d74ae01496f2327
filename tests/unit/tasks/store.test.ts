import { describe, it, expect, vi, beforeEach } from 'vitest';
import { TaskStore, DuplicateTaskError, isTerminal } from '../../../src/tasks/store.js';
import { getMetricsCollector, resetMetricsCollector } from '../../../src/monitoring/metrics.js';

vi.mock('../../../src/utils/logger.js', () => ({
  logger: {
    child: () => ({
      debug: vi.fn(),
      info: vi.fn(),
      warn: vi.fn(),
      error: vi.fn(),
    }),
  },
}));

const T0 = new Date('2026-01-01T00:00:00Z');
const at = (seconds: number) => new Date(T0.getTime() + seconds * 1000);

describe('TaskStore', () => {
  let store: TaskStore;

  beforeEach(() => {
    resetMetricsCollector();
    store = new TaskStore({ retentionMs: 60_000, maxRetained: 3 });
  });

  describe('create', () => {
    it('should start tasks as accepted with empty outputs', () => {
      store.create('t-1', {}, T0);

      expect(store.view('t-1')).toEqual({
        task_id: 't-1',
        status: 'accepted',
        outputs: {},
        evidence: [],
      });
      expect(store.get('t-1')?.createdAt).toEqual(T0);
    });

    it('should refuse a second task with the same id', () => {
      store.create('t-1');

      expect(() => store.create('t-1')).toThrow(DuplicateTaskError);
      expect(() => store.create('t-1')).toThrow('task already exists');
    });

    it('should emit task:created', () => {
      const listener = vi.fn();
      store.on('task:created', listener);

      store.create('t-1');

      expect(listener).toHaveBeenCalledWith('t-1', expect.objectContaining({ status: 'accepted' }));
    });
  });

  describe('update', () => {
    it('should merge the patch and bump updatedAt', () => {
      store.create('t-1', {}, T0);

      const updated = store.update('t-1', { status: 'working', idem: 'abc' }, at(5));

      expect(updated).toBe(true);
      expect(store.view('t-1')).toEqual({
        task_id: 't-1',
        status: 'working',
        outputs: {},
        evidence: [],
        idem: 'abc',
      });
      expect(store.get('t-1')?.updatedAt).toEqual(at(5));
    });

    it('should return false for unknown tasks', () => {
      expect(store.update('missing', { status: 'working' })).toBe(false);
    });

    it('should emit task:finished once on reaching a terminal status', () => {
      const finished = vi.fn();
      store.on('task:finished', finished);
      store.create('t-1');

      store.update('t-1', { status: 'working' });
      store.update('t-1', { status: 'completed' });
      store.update('t-1', { outputs: { late: true } });

      expect(finished).toHaveBeenCalledTimes(1);
      expect(finished).toHaveBeenCalledWith('t-1', expect.objectContaining({ status: 'completed' }));
    });
  });

  describe('view', () => {
    it('should return null for unknown tasks', () => {
      expect(store.view('missing')).toBeNull();
    });

    it('should leave out internal fields', () => {
      store.create('t-1', { idempotencyKey: 'key-1', callback: 'https://hooks.test/done' });

      const view = store.view('t-1');

      expect(view).not.toHaveProperty('callback');
      expect(view).not.toHaveProperty('idempotencyKey');
      expect(view).not.toHaveProperty('createdAt');
    });
  });

  describe('findByIdempotencyKey', () => {
    it('should find a task by its key', () => {
      store.create('t-1', { idempotencyKey: 'key-1' });

      expect(store.findByIdempotencyKey('key-1')?.taskId).toBe('t-1');
      expect(store.findByIdempotencyKey('key-2')).toBeNull();
    });
  });

  describe('prune', () => {
    it('should drop finished tasks past retention', () => {
      store.create('old', { idempotencyKey: 'k-old' }, T0);
      store.update('old', { status: 'completed' }, T0);
      store.create('fresh', {}, T0);
      store.update('fresh', { status: 'error' }, at(30));

      const removed = store.prune(at(61).getTime());

      expect(removed).toBe(1);
      expect(store.has('old')).toBe(false);
      expect(store.has('fresh')).toBe(true);
      expect(store.findByIdempotencyKey('k-old')).toBeNull();
    });

    it('should never drop tasks still in flight', () => {
      store.create('running', {}, T0);
      store.update('running', { status: 'working' }, T0);

      expect(store.prune(at(3600).getTime())).toBe(0);
      expect(store.has('running')).toBe(true);
    });

    it('should evict the oldest finished tasks when over capacity', () => {
      for (const id of ['a', 'b', 'c', 'd', 'e']) {
        store.create(id, {}, T0);
      }
      store.update('a', { status: 'working' }, T0);
      store.update('b', { status: 'completed' }, T0);
      store.update('c', { status: 'completed' }, T0);
      store.update('d', { status: 'completed' }, T0);

      const removed = store.prune(T0.getTime());

      expect(removed).toBe(2);
      expect([...['a', 'b', 'c', 'd', 'e'].filter((id) => store.has(id))]).toEqual(['a', 'd', 'e']);
    });
  });

  describe('counts', () => {
    it('should count tasks per status and publish gauges', () => {
      store.create('a');
      store.create('b');
      store.create('c');
      store.update('b', { status: 'working' });
      store.update('c', { status: 'error' });

      expect(store.counts()).toEqual({ accepted: 1, working: 1, completed: 0, error: 1 });
      expect(store.size).toBe(3);

      const metrics = getMetricsCollector();
      expect(metrics.getValue('tasks_inflight_current')).toBe(2);
      expect(metrics.getValue('tasks_retained_current')).toBe(3);
    });

    it('should keep counts in step with repeated patches and pruning', () => {
      store.create('a', {}, T0);
      store.create('b', {}, T0);
      store.update('a', { status: 'working' }, T0);
      store.update('a', { status: 'working', outputs: { step: 1 } }, T0);
      store.update('a', { status: 'completed' }, T0);
      store.update('b', { outputs: { step: 1 } }, T0);

      expect(store.counts()).toEqual({ accepted: 1, working: 0, completed: 1, error: 0 });

      store.prune(at(3601).getTime());

      expect(store.counts()).toEqual({ accepted: 1, working: 0, completed: 0, error: 0 });
      expect(getMetricsCollector().getValue('tasks_inflight_current')).toBe(1);
      expect(getMetricsCollector().getValue('tasks_retained_current')).toBe(1);
    });

    it('should hand out a copy of the counts', () => {
      store.create('a');
      store.counts().accepted = 42;

      expect(store.counts().accepted).toBe(1);
    });

    it('should empty on clear', () => {
      store.create('a', { idempotencyKey: 'k' });
      store.clear();

      expect(store.counts()).toEqual({ accepted: 0, working: 0, completed: 0, error: 0 });
      expect(store.size).toBe(0);
      expect(store.findByIdempotencyKey('k')).toBeNull();
    });
  });

  it('should treat completed and error as terminal', () => {
    expect(isTerminal('completed')).toBe(true);
    expect(isTerminal('error')).toBe(true);
    expect(isTerminal('accepted')).toBe(false);
    expect(isTerminal('working')).toBe(false);
  });
});
