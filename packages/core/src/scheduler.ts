import type { ExecutionContext } from './context';
import type { Value } from './value';
import type { ErrorReporter, UpdateFlags, UpdateMode } from './types';

/** What the scheduler needs from the graph to apply an update. */
export interface SchedulerHost {
  /** Re-runs the node's computation; true when the value changed. */
  recompute(node: Value<unknown>): boolean;
  propagate(node: Value<unknown>, update: UpdateFlags): void;
}

export interface SchedulerOptions {
  mode: UpdateMode;
  maxFlushPasses: number;
  onError: ErrorReporter;
}

/**
 * Batches node updates and applies them in dependency order.
 *
 * Writes only mark a node pending; `flush()` applies every pending node once,
 * after every pending node upstream of it, so repeated writes within a tick
 * collapse into a single downstream pass and paths of different lengths
 * settle before the node they meet at.
 */
export class Scheduler {
  private readonly pending = new Map<Value<unknown>, UpdateFlags>();
  private mode: UpdateMode;
  private flushing = false;

  constructor(
    private readonly host: SchedulerHost,
    private readonly context: ExecutionContext,
    private readonly options: SchedulerOptions
  ) {
    this.mode = options.mode;
  }

  getMode(): UpdateMode {
    return this.mode;
  }

  setMode(mode: UpdateMode): void {
    this.mode = mode;
    if (mode === 'immediate') this.flush();
  }

  enqueue(node: Value<unknown>, update: UpdateFlags): void {
    if (node.destroyed) return;
    const prev = this.pending.get(node);
    this.pending.set(
      node,
      prev
        ? {
            skipAnimation: prev.skipAnimation || update.skipAnimation,
            animationStep: prev.animationStep && update.animationStep,
          }
        : { ...update }
    );
    if (this.mode === 'immediate') this.flush();
  }

  cancel(node: Value<unknown>): void {
    this.pending.delete(node);
  }

  isPending(node: Value<unknown>): boolean {
    return this.pending.has(node);
  }

  pendingCount(): number {
    return this.pending.size;
  }

  isFlushing(): boolean {
    return this.flushing;
  }

  /** True while any pending node sits upstream of `node`, however far. */
  private blocked(node: Value<unknown>): boolean {
    const visited = new Set<Value<unknown>>([node]);
    const stack = [...node.dependencies];
    while (stack.length > 0) {
      const dep = stack.pop();
      if (!dep || visited.has(dep)) continue;
      if (this.pending.has(dep)) return true;
      visited.add(dep);
      stack.push(...dep.dependencies);
    }
    return false;
  }

  private apply(node: Value<unknown>, update: UpdateFlags): void {
    this.pending.delete(node);
    const unit = this.context.spawnUnit('cascade');
    try {
      this.context.runInUnit(unit, () => {
        if (node.computation && !update.animationStep) {
          if (!this.host.recompute(node)) return;
        }
        this.host.propagate(node, update);
      });
    } finally {
      this.context.releaseUnit(unit);
    }
  }

  /**
   * Applies pending updates until none are left. Returns how many were applied.
   * Calls made while a flush is running return 0; the running flush picks up
   * anything they queued.
   */
  flush(): number {
    if (this.flushing) return 0;
    this.flushing = true;
    let applied = 0;
    let passes = 0;
    try {
      while (this.pending.size > 0) {
        passes += 1;
        if (passes > this.options.maxFlushPasses) {
          this.options.onError(
            new Error(
              `Scheduler.flush: gave up after ${this.options.maxFlushPasses} passes with ${this.pending.size} updates pending`
            ),
            { phase: 'flush' }
          );
          break;
        }

        let progressed = false;
        for (const node of [...this.pending.keys()]) {
          const update = this.pending.get(node);
          if (!update || node.destroyed) {
            this.pending.delete(node);
            continue;
          }
          if (this.blocked(node)) continue;
          this.apply(node, update);
          applied += 1;
          progressed = true;
        }

        if (!progressed) {
          // Every pending node waits on another pending node.
          const first = this.pending.entries().next();
          if (first.done) break;
          const [node, update] = first.value;
          this.options.onError(
            new Error(`Scheduler.flush: dependency cycle through ${node}`),
            { phase: 'cycle', node }
          );
          this.apply(node, update);
          applied += 1;
        }
      }
    } finally {
      this.flushing = false;
    }
    return applied;
  }
}
