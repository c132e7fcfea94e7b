import { describe, it, expect, beforeEach, afterEach } from "vitest";
import fs from "node:fs";
import path from "node:path";
import { SearchDispatcher } from "../src/dispatcher";
import type { SearchEngine } from "../src/ripgrep";
import { statusManager } from "../src/status";
import type { ChunkEvent, ChunkOutcome, SearchTask } from "../src/types";
import { FakeEngine, makeTempDir, removeDir } from "./helpers";

// Five 20-byte lines, two matches each.
const SEGMENT = "NEEDLE NEEDLE xxxxx\n";

function tasksFor(file: string, count: number, pattern = "NEEDLE"): SearchTask[] {
  return Array.from({ length: count }, (_, i) => ({
    descriptor: {
      filePath: file,
      startOffset: i * SEGMENT.length,
      endOffset: (i + 1) * SEGMENT.length,
      sequenceIndex: i,
    },
    pattern,
    passthroughFlags: [],
    sourcePath: file,
  }));
}

async function collect(gen: AsyncGenerator<ChunkEvent, void, undefined>): Promise<ChunkEvent[]> {
  const out: ChunkEvent[] = [];
  for await (const ev of gen) out.push(ev);
  return out;
}

describe("SearchDispatcher", () => {
  let dir: string;
  let file: string;

  beforeEach(() => {
    dir = makeTempDir("dispatcher-");
    file = path.join(dir, "data.txt");
    fs.writeFileSync(file, SEGMENT.repeat(5));
  });

  afterEach(() => {
    removeDir(dir);
  });

  it("yields one event per task and respects the worker limit", async () => {
    const engine = new FakeEngine({ delayMs: () => 5 });
    const before = statusManager.getStatus().counters.chunksDispatched;
    const events = await collect(new SearchDispatcher(engine, 2).dispatch(tasksFor(file, 5)));

    expect(events).toHaveLength(5);
    expect(engine.maxConcurrent).toBe(2);
    expect(statusManager.getStatus().counters.chunksDispatched - before).toBe(5);
    const seqs = events.map((e) => e.task.descriptor.sequenceIndex).sort();
    expect(seqs).toEqual([0, 1, 2, 3, 4]);
    for (const e of events) {
      expect(e.outcome.kind).toBe("matches");
      if (e.outcome.kind === "matches") {
        const start = e.task.descriptor.startOffset;
        expect(e.outcome.matches.map((m) => m.byteOffset)).toEqual([start, start + 7]);
      }
    }
  });

  it("stops dispatching once the result budget is reached", async () => {
    const engine = new FakeEngine({ delayMs: (t) => t.descriptor.sequenceIndex * 40 });
    const events = await collect(
      new SearchDispatcher(engine, 5).dispatch(tasksFor(file, 5), { resultBudget: 3 }),
    );

    expect(events).toHaveLength(5);
    expect(events.slice(0, 2).map((e) => e.task.descriptor.sequenceIndex)).toEqual([0, 1]);
    expect(events.slice(0, 2).map((e) => e.outcome.kind)).toEqual(["matches", "matches"]);
    expect(events.slice(2).map((e) => e.outcome.kind)).toEqual([
      "cancelled",
      "cancelled",
      "cancelled",
    ]);
  });

  it("cancels everything when the external signal is already aborted", async () => {
    const engine = new FakeEngine();
    const controller = new AbortController();
    controller.abort();
    const events = await collect(
      new SearchDispatcher(engine, 3).dispatch(tasksFor(file, 3), { signal: controller.signal }),
    );
    expect(engine.calls).toHaveLength(0);
    expect(events.map((e) => e.outcome.kind)).toEqual(["cancelled", "cancelled", "cancelled"]);
  });

  it("turns engine errors and throws into error outcomes", async () => {
    class ThrowingEngine implements SearchEngine {
      public async search(task: SearchTask): Promise<ChunkOutcome> {
        if (task.descriptor.sequenceIndex === 0) throw new Error("spawn exploded");
        return { kind: "error", cause: "rg exited with code 2: bad regex" };
      }
    }
    const before = statusManager.getStatus().counters.chunksFailed;
    const dispatcher = new SearchDispatcher(new ThrowingEngine(), 1);
    const events = await collect(dispatcher.dispatch(tasksFor(file, 2)));

    expect(events.map((e) => e.outcome)).toEqual([
      { kind: "error", cause: "spawn exploded" },
      { kind: "error", cause: "rg exited with code 2: bad regex" },
    ]);
    expect(statusManager.getStatus().counters.chunksFailed - before).toBe(2);
  });

  it("cancels in-flight work when the consumer stops early", async () => {
    const engine = new FakeEngine({
      delayMs: (t) => (t.descriptor.sequenceIndex === 0 ? 0 : 60_000),
    });
    const gen = new SearchDispatcher(engine, 5).dispatch(tasksFor(file, 5));
    const started = Date.now();
    for await (const ev of gen) {
      expect(ev.task.descriptor.sequenceIndex).toBe(0);
      break;
    }
    expect(Date.now() - started).toBeLessThan(5_000);
  });

  it("yields nothing for an empty task list", async () => {
    const events = await collect(new SearchDispatcher(new FakeEngine(), 2).dispatch([]));
    expect(events).toEqual([]);
  });
});
