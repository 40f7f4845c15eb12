import type { CycleLog } from "./cycle_log.js";
import type { LastResultStore } from "./result_store.js";
import { asNewsroomError } from "./pipeline/errors.js";
import type { CycleLogger, CyclePhase } from "./pipeline/orchestrator.js";
import type { CycleResult } from "./pipeline/schemas.js";
import { newCycleId, nowIso } from "./pipeline/utils.js";

export type CycleRequest = {
  cycleId: string;
  topic: string;
  maxIterations: number;
};

export type CycleHooks = {
  log: CycleLogger;
  onPhase: (phase: CyclePhase, iteration: number) => void;
};

export type CycleFn = (request: CycleRequest, hooks: CycleHooks) => Promise<CycleResult>;

export type ActiveCycle = CycleRequest & {
  phase: CyclePhase | "starting";
  iteration: number;
  startedAt: string;
};

function crashedResult(cycle: ActiveCycle, err: unknown): CycleResult {
  const error = asNewsroomError(err);
  return {
    cycle_id: cycle.cycleId,
    status: "error",
    topic: cycle.topic,
    max_iterations: cycle.maxIterations,
    iterations: cycle.iteration,
    error_message: error.message,
    error_kind: error.name,
    started_at: cycle.startedAt,
    finished_at: nowIso()
  };
}

/**
 * Runs triggered cycles in the background, at most `concurrency` at a time,
 * and files each finished result in the LastResultStore. Triggers beyond the
 * limit wait in a FIFO queue.
 */
export class CycleExecutor {
  private readonly concurrency: number;
  private readonly running = new Map<string, ActiveCycle>();
  private readonly queue: CycleRequest[] = [];
  private idleWaiters: Array<() => void> = [];

  constructor(
    private readonly runCycle: CycleFn,
    private readonly store: LastResultStore,
    private readonly log: CycleLog,
    options?: {
      concurrency?: number;
    }
  ) {
    this.concurrency = Math.max(1, options?.concurrency ?? 1);
  }

  /** Queues a cycle and returns immediately with its id. */
  trigger(topic: string, maxIterations: number): CycleRequest {
    const request: CycleRequest = { cycleId: newCycleId(topic), topic, maxIterations };
    this.queue.push(request);
    if (this.running.size >= this.concurrency) {
      this.log.write("INFO", `Queued behind ${this.running.size} running cycle(s)`, request.cycleId);
    }
    this.drain();
    return request;
  }

  activeCycles(): ActiveCycle[] {
    return [...this.running.values()].map((cycle) => ({ ...cycle }));
  }

  queuedCycles(): CycleRequest[] {
    return this.queue.map((request) => ({ ...request }));
  }

  /** Resolves once nothing is running or queued. */
  idle(): Promise<void> {
    if (this.running.size === 0 && this.queue.length === 0) return Promise.resolve();
    return new Promise((resolve) => this.idleWaiters.push(resolve));
  }

  private drain(): void {
    while (this.running.size < this.concurrency) {
      const next = this.queue.shift();
      if (!next) break;
      void this.start(next);
    }
    if (this.running.size === 0 && this.queue.length === 0) {
      const waiters = this.idleWaiters;
      this.idleWaiters = [];
      for (const resolve of waiters) resolve();
    }
  }

  private async start(request: CycleRequest): Promise<void> {
    const cycle: ActiveCycle = { ...request, phase: "starting", iteration: 0, startedAt: nowIso() };
    this.running.set(request.cycleId, cycle);
    const log = this.log.forCycle(request.cycleId);

    let result: CycleResult;
    try {
      result = await this.runCycle(request, {
        log,
        onPhase: (phase, iteration) => {
          cycle.phase = phase;
          cycle.iteration = iteration;
        }
      });
    } catch (err) {
      // The orchestrator reports its own failures; this only catches a broken CycleFn.
      result = crashedResult(cycle, err);
      log.error(`Cycle crashed: ${result.error_message ?? "unknown error"}`);
    }

    this.store.set(result);
    log.info(`Cycle finished with status ${result.status} after ${result.iterations} iteration(s)`);
    this.running.delete(request.cycleId);
    this.drain();
  }
}
