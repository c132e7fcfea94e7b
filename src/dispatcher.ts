import type { ChunkEvent, ChunkOutcome, SearchTask } from "./types";
import type { SearchEngine } from "./ripgrep";
import { WorkerPool } from "./worker-pool";
import { statusManager } from "./status";

export interface DispatchOptions {
  /** Stop once this many matches have been collected. Undefined means unbounded. */
  resultBudget?: number;
  /** External cancellation, e.g. the request's wall-clock timeout. */
  signal?: AbortSignal;
}

/**
 * Fans chunk search tasks out over a bounded pool and yields outcomes in completion order.
 *
 * Every task is submitted up front; the pool alone limits concurrency. Once the running
 * match total reaches the budget the shared signal is aborted: queued tasks come back as
 * `cancelled`, in-flight engines kill their subprocess, and any match list that still
 * arrives after the cutoff is turned into `cancelled` so it cannot contribute.
 */
export class SearchDispatcher {
  private readonly engine: SearchEngine;
  private readonly maxWorkers: number;

  public constructor(engine: SearchEngine, maxWorkers: number) {
    this.engine = engine;
    this.maxWorkers = maxWorkers;
  }

  public async *dispatch(
    tasks: readonly SearchTask[],
    opts: DispatchOptions = {},
  ): AsyncGenerator<ChunkEvent, void, undefined> {
    if (tasks.length === 0) return;
    const budget = opts.resultBudget;
    const controller = new AbortController();
    const external = opts.signal;
    const onExternalAbort = () => controller.abort(external?.reason);
    if (external?.aborted) controller.abort(external.reason);
    else external?.addEventListener("abort", onExternalAbort, { once: true });

    const pool = new WorkerPool<SearchTask, ChunkOutcome>(this.maxWorkers, (task, signal) =>
      this.engine.search(task, signal),
    );
    statusManager.incChunksDispatched(tasks.length);
    const { results, done } = pool.run(tasks, controller.signal);

    let collected = 0;
    let budgetReached = budget !== undefined && budget <= 0;
    if (budgetReached) controller.abort(new Error("result budget reached"));

    try {
      for await (const r of results) {
        let outcome: ChunkOutcome;
        if (r.status === "cancelled") {
          outcome = { kind: "cancelled" };
        } else if (r.status === "failed") {
          outcome = {
            kind: "error",
            cause: r.error instanceof Error ? r.error.message : String(r.error),
          };
        } else {
          outcome = r.value;
        }

        if (outcome.kind === "matches") {
          if (budgetReached) {
            outcome = { kind: "cancelled" };
          } else {
            collected += outcome.matches.length;
            if (budget !== undefined && collected >= budget) {
              budgetReached = true;
              controller.abort(new Error("result budget reached"));
            }
          }
        } else if (outcome.kind === "error") {
          statusManager.incChunksFailed();
        }

        yield { task: r.task, outcome };
      }
    } finally {
      // Consumer stopped early or finished: make sure no subprocess outlives the stream.
      controller.abort(new Error("dispatch finished"));
      external?.removeEventListener("abort", onExternalAbort);
      await done;
    }
  }
}
