import type { Graph } from '../graph';

/**
 * Source of animation frames. `request` callbacks receive a time in ms; the
 * returned function cancels the request.
 */
export interface FrameScheduler {
  request(cb: (nowMs: number) => void): () => void;
}

export interface FrameLoop {
  start(): void;
  stop(): void;
  isRunning(): boolean;
}

export interface FrameLoopOptions {
  scheduler?: FrameScheduler;
  /** Largest step handed to `graph.tick()`, in seconds. */
  maxDelta?: number;
}

const FRAME_MS = 1000 / 60;

/** ~60Hz frames on Node timers. */
export const timerFrameScheduler: FrameScheduler = {
  request(cb) {
    const id = setTimeout(() => cb(performance.now()), FRAME_MS);
    return () => clearTimeout(id);
  },
};

/**
 * Drives `graph.tick(dt)` from a frame source until stopped.
 */
export function createFrameLoop(
  graph: Graph,
  opts: FrameLoopOptions = {}
): FrameLoop {
  const scheduler = opts.scheduler ?? timerFrameScheduler;
  const maxDelta = opts.maxDelta ?? 0.1;

  let running = false;
  let cancelFrame: (() => void) | null = null;
  let lastFrameTime: number | null = null;

  function frame(nowMs: number) {
    if (!running) return;
    const delta =
      lastFrameTime === null ? 0 : Math.max(0, nowMs - lastFrameTime) / 1000;
    lastFrameTime = nowMs;
    try {
      graph.tick(Math.min(maxDelta, delta));
    } finally {
      if (running) cancelFrame = scheduler.request(frame);
    }
  }

  return {
    start() {
      if (running) return;
      running = true;
      lastFrameTime = null;
      cancelFrame = scheduler.request(frame);
    },

    stop() {
      if (!running) return;
      running = false;
      cancelFrame?.();
      cancelFrame = null;
    },

    isRunning() {
      return running;
    },
  };
}
