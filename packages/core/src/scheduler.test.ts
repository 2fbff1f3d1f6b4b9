import { describe, it, expect, vi } from 'vitest';
import { createGraph } from './graph';
import { ExecutionContext, ROOT_UNIT, type UnitId } from './context';
import { Scheduler, type SchedulerHost } from './scheduler';
import type { Value } from './value';
import type { ErrorContext, UpdateFlags } from './types';

const STEP: UpdateFlags = { skipAnimation: false, animationStep: true };
const WRITE: UpdateFlags = { skipAnimation: false, animationStep: false };

function setup(host: Partial<SchedulerHost> = {}, maxFlushPasses = 100) {
  const context = new ExecutionContext();
  const applied: number[] = [];
  const updates: UpdateFlags[] = [];
  const phases: string[] = [];
  const onError = vi.fn((_error: unknown, ctx: ErrorContext) => {
    phases.push(ctx.phase);
  });
  const scheduler = new Scheduler(
    {
      recompute: host.recompute ?? (() => true),
      propagate:
        host.propagate ??
        ((node: Value<unknown>, update: UpdateFlags) => {
          applied.push(node.id);
          updates.push(update);
        }),
    },
    context,
    { mode: 'deferred', maxFlushPasses, onError }
  );
  // Nodes only; edges are set by hand so the scheduler is tested on its own.
  const g = createGraph();
  return { scheduler, context, applied, updates, onError, phases, g };
}

describe('scheduler', () => {
  it('applies a node only after its pending dependencies', () => {
    const { scheduler, applied, g } = setup();
    const x = g.value(0);
    const y = g.value(0);
    y.dependencies.add(x);

    scheduler.enqueue(y, WRITE);
    scheduler.enqueue(x, WRITE);
    expect(scheduler.flush()).toBe(2);

    expect(applied).toEqual([x.id, y.id]);
    expect(scheduler.pendingCount()).toBe(0);
  });

  it('keeps one entry per node and merges its flags', () => {
    const { scheduler, applied, updates, g } = setup();
    const x = g.value(0);

    scheduler.enqueue(x, { skipAnimation: true, animationStep: true });
    scheduler.enqueue(x, WRITE);
    expect(scheduler.pendingCount()).toBe(1);
    scheduler.flush();

    expect(applied).toEqual([x.id]);
    expect(updates).toEqual([{ skipAnimation: true, animationStep: false }]);
  });

  it('skips the computation for animation steps', () => {
    const recompute = vi.fn(() => true);
    const { scheduler, applied, g } = setup({ recompute });
    const a = g.value(1);
    const c = g.computed((use) => use(a));

    scheduler.enqueue(c, STEP);
    scheduler.flush();
    expect(recompute).not.toHaveBeenCalled();
    expect(applied).toEqual([c.id]);

    scheduler.enqueue(c, WRITE);
    scheduler.flush();
    expect(recompute).toHaveBeenCalledTimes(1);
  });

  it('stops at a computation that reports no change', () => {
    const { scheduler, applied, g } = setup({ recompute: () => false });
    const a = g.value(1);
    const c = g.computed((use) => use(a));

    scheduler.enqueue(c, WRITE);
    expect(scheduler.flush()).toBe(1);
    expect(applied).toEqual([]);
  });

  it('drops cancelled and destroyed entries', () => {
    const { scheduler, applied, g } = setup();
    const x = g.value(0);
    const y = g.value(0);

    scheduler.enqueue(x, WRITE);
    scheduler.enqueue(y, WRITE);
    scheduler.cancel(x);
    y.destroyed = true;
    scheduler.flush();

    expect(applied).toEqual([]);
    expect(scheduler.isPending(y)).toBe(false);
  });

  it('ignores enqueues for destroyed nodes', () => {
    const { scheduler, g } = setup();
    const x = g.value(0);
    x.destroy();
    scheduler.enqueue(x, WRITE);
    expect(scheduler.isPending(x)).toBe(false);
  });

  it('reports a cycle among pending nodes and breaks it', () => {
    const { scheduler, applied, phases, g } = setup();
    const x = g.value(0);
    const y = g.value(0);
    x.dependencies.add(y);
    y.dependencies.add(x);

    scheduler.enqueue(x, WRITE);
    scheduler.enqueue(y, WRITE);
    scheduler.flush();

    expect(phases).toEqual(['cycle']);
    expect(applied).toEqual([x.id, y.id]);
  });

  it('gives up after maxFlushPasses and keeps the rest queued', () => {
    let scheduler: Scheduler | undefined;
    const ctx = setup(
      {
        propagate: (node) => scheduler?.enqueue(node, WRITE),
      },
      5
    );
    scheduler = ctx.scheduler;
    const x = ctx.g.value(0);

    scheduler.enqueue(x, WRITE);
    expect(scheduler.flush()).toBe(5);
    expect(ctx.phases).toEqual(['flush']);
    expect(scheduler.isPending(x)).toBe(true);
  });

  it('picks up work queued while a flush is running', () => {
    let scheduler: Scheduler | undefined;
    const order: number[] = [];
    const ctx = setup({
      propagate: (node) => {
        order.push(node.id);
        if (node === x) scheduler?.enqueue(y, WRITE);
      },
    });
    scheduler = ctx.scheduler;
    const x = ctx.g.value(0);
    const y = ctx.g.value(0);

    scheduler.enqueue(x, WRITE);
    expect(scheduler.flush()).toBe(2);
    expect(order).toEqual([x.id, y.id]);
  });

  it('returns 0 from a nested flush', () => {
    let scheduler: Scheduler | undefined;
    const nested: number[] = [];
    const ctx = setup({
      propagate: () => {
        nested.push(scheduler?.flush() ?? -1);
      },
    });
    scheduler = ctx.scheduler;
    scheduler.enqueue(ctx.g.value(0), WRITE);
    scheduler.flush();
    expect(nested).toEqual([0]);
  });

  it('applies on enqueue in immediate mode', () => {
    const { scheduler, applied, g } = setup();
    const x = g.value(0);
    scheduler.setMode('immediate');
    expect(scheduler.getMode()).toBe('immediate');

    scheduler.enqueue(x, WRITE);
    expect(applied).toEqual([x.id]);
  });

  it('runs each applied node in its own unit', () => {
    let context: ExecutionContext | undefined;
    const units: UnitId[] = [];
    const ctx = setup({
      propagate: () => {
        if (context) units.push(context.activeUnit());
      },
    });
    context = ctx.context;

    ctx.scheduler.enqueue(ctx.g.value(0), WRITE);
    ctx.scheduler.enqueue(ctx.g.value(0), WRITE);
    ctx.scheduler.flush();

    expect(units).toHaveLength(2);
    expect(units[0]).not.toBe(units[1]);
    expect(units).not.toContain(ROOT_UNIT);
    expect(ctx.context.activeUnit()).toBe(ROOT_UNIT);
  });

  it('never lets a diamond observe a half-updated state', () => {
    const g = createGraph();
    const a = g.value(1);
    const b = g.computed((use) => use(a) + 1);
    const c = g.computed((use) => use(a) * 2);
    const seen: number[] = [];
    g.computed((use) => {
      const v = use(b) + use(c);
      seen.push(v);
      return v;
    });

    a.set(2);
    g.tick();

    expect(seen).toEqual([4, 7]);
  });

  it('waits for the longer of two uneven paths before recomputing', () => {
    const g = createGraph();
    const a = g.value(1);
    const b = g.computed((use) => use(a) + 1);
    const c = g.computed((use) => use(b) + 1);
    const e = g.computed((use) => use(c) + 1);
    const seen: number[][] = [];
    const d = g.computed((use) => {
      seen.push([use(e), use(a)]);
      return use(e) + use(a);
    });
    const fired: number[] = [];
    d.onChange((v) => fired.push(v));

    a.set(10);
    a.set(11);
    g.tick();

    expect(seen).toEqual([
      [4, 1],
      [14, 11],
    ]);
    expect(fired).toEqual([25]);
  });

  it('blocks on a pending node two levels up', () => {
    const { scheduler, applied, g } = setup();
    const x = g.value(0);
    const y = g.value(0);
    const z = g.value(0);
    y.dependencies.add(x);
    z.dependencies.add(y);

    scheduler.enqueue(z, WRITE);
    scheduler.enqueue(x, WRITE);
    expect(scheduler.flush()).toBe(2);
    expect(applied).toEqual([x.id, z.id]);
  });
});
