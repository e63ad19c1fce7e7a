import { setTimeout as sleep } from "node:timers/promises";
import { describe, expect, test, vi } from "vitest";
import { createMemorySink } from "../alerting/sinks";
import { createIngestor } from "../ingest/ingestor";
import { createRateLimiter } from "../ratelimit/rate-limiter";
import { createMemoryStore } from "../store/memory-store";
import type { MonitorStore } from "../store/types";
import {
  checkIn,
  createClock,
  createMonitorRecord,
  createRacingStore,
  cronConfig,
  intervalConfig,
  monitorKey,
} from "../test-utils";
import type { MonitorConfig } from "../types/monitor";
import { createLocalLock, type LeaderLock } from "./lock";
import { decideSweep, createSweepDetector } from "./sweep-detector";

const CREATED_AT = "2026-03-09T12:00:00.000Z";

async function setup(config: MonitorConfig, createdAt = CREATED_AT, store?: MonitorStore) {
  const backing = store ?? createMemoryStore();
  await backing.create(createMonitorRecord(config, new Date(createdAt)));
  const sink = createMemorySink();
  const clock = createClock(createdAt);
  const sweep = createSweepDetector({ store: backing, sink, clock, casBaseDelayMs: 1 });
  const ingestor = createIngestor({
    store: backing,
    rateLimiter: createRateLimiter(),
    sink,
    clock,
    casBaseDelayMs: 1,
  });
  return { store: backing, sink, clock, sweep, ingestor };
}

describe("sweep detector", () => {
  test("nightly job with no start is Missed once its margin passes", async () => {
    const { store, sink, sweep } = await setup(cronConfig());

    const report = await sweep.runOnce(new Date("2026-03-10T02:11:00Z"));

    expect(report).toEqual({ monitors: 1, missed: 1, timedOut: 0, failed: 0 });
    const record = await store.get(monitorKey());
    expect(record?.runs).toHaveLength(1);
    expect(record?.runs[0]?.expectedAt).toBe("2026-03-10T02:00:00.000Z");
    expect(record?.runs[0]?.terminalStatus).toBe("missed");
    expect(record?.sweptThrough).toBe("2026-03-10T02:00:00.000Z");
    expect(record?.state.status).toBe("down");
    expect(sink.events.map((e) => [e.transition, e.cause])).toEqual([["Degraded", "missed"]]);
  });

  test("a start after the Missed decision is recorded as late", async () => {
    const { store, sweep, ingestor, clock } = await setup(cronConfig());
    await sweep.runOnce(new Date("2026-03-10T02:11:00Z"));

    clock.set("2026-03-10T02:15:00Z");
    const result = await ingestor.ingest(
      checkIn("in_progress", "2026-03-10T02:15:00Z", { checkInId: "run-1" }),
    );

    expect(result.outcome).toBe("late");
    expect(result.expectedAt).toBe("2026-03-10T02:00:00.000Z");
    const record = await store.get(monitorKey());
    expect(record?.runs).toHaveLength(1);
    expect(record?.runs[0]?.terminalStatus).toBe("missed");
  });

  test("still inside the margin nothing is decided", async () => {
    const { store, sweep } = await setup(cronConfig());

    const report = await sweep.runOnce(new Date("2026-03-10T02:10:00Z"));

    expect(report.missed).toBe(0);
    const record = await store.get(monitorKey());
    expect(record?.runs).toEqual([]);
    expect(record?.version).toBe(1);
  });

  test("a second pass does not decide the same occurrence twice", async () => {
    const { store, sink, sweep } = await setup(cronConfig());

    await sweep.runOnce(new Date("2026-03-10T02:11:00Z"));
    const second = await sweep.runOnce(new Date("2026-03-10T02:12:00Z"));

    expect(second.missed).toBe(0);
    const record = await store.get(monitorKey());
    expect(record?.runs).toHaveLength(1);
    expect(sink.events).toHaveLength(1);
  });

  test("a started run is not marked Missed", async () => {
    const { store, sweep, ingestor, clock } = await setup(cronConfig());

    clock.set("2026-03-10T02:01:00Z");
    await ingestor.ingest(checkIn("in_progress", "2026-03-10T02:01:00Z", { checkInId: "job-1" }));
    const report = await sweep.runOnce(new Date("2026-03-10T02:20:00Z"));

    expect(report).toEqual({ monitors: 1, missed: 0, timedOut: 0, failed: 0 });
    const record = await store.get(monitorKey());
    expect(record?.runs).toHaveLength(1);
    expect(record?.runs[0]?.terminalStatus).toBeUndefined();
    expect(record?.sweptThrough).toBe("2026-03-10T02:00:00.000Z");
  });

  test("a run past its max runtime times out and a later finish is late", async () => {
    const { store, sink, sweep, ingestor, clock } = await setup(cronConfig());

    clock.set("2026-03-10T02:01:00Z");
    await ingestor.ingest(checkIn("in_progress", "2026-03-10T02:01:00Z", { checkInId: "job-1" }));

    expect((await sweep.runOnce(new Date("2026-03-10T02:31:00Z"))).timedOut).toBe(0);
    const report = await sweep.runOnce(new Date("2026-03-10T02:32:00Z"));
    expect(report.timedOut).toBe(1);

    clock.set("2026-03-10T02:40:00Z");
    const finish = await ingestor.ingest(
      checkIn("ok", "2026-03-10T02:40:00Z", { checkInId: "job-1" }),
    );

    expect(finish.outcome).toBe("late");
    const record = await store.get(monitorKey());
    expect(record?.runs[0]?.terminalStatus).toBe("timeout");
    expect(record?.runs[0]?.durationSeconds).toBe(1860);
    expect(record?.state.status).toBe("down");
    expect(sink.events.map((e) => [e.transition, e.cause])).toEqual([["Degraded", "timeout"]]);
  });

  test("max runtime 0 never times out", async () => {
    const { store, sweep, ingestor, clock } = await setup(cronConfig({ maxRuntime: 0 }));

    clock.set("2026-03-10T02:01:00Z");
    await ingestor.ingest(checkIn("in_progress", "2026-03-10T02:01:00Z", { checkInId: "job-1" }));
    const report = await sweep.runOnce(new Date("2026-03-10T08:00:00Z"));

    expect(report.timedOut).toBe(0);
    const record = await store.get(monitorKey());
    expect(record?.runs[0]?.terminalStatus).toBeUndefined();
  });

  test("catch-up is bounded per pass and resumes from the cursor", async () => {
    const createdAt = "2026-03-10T00:00:00.000Z";
    const config = intervalConfig({ value: 5, unit: "minute", checkinMargin: 1 });
    const { store, sweep } = await setup(config, createdAt);
    const detector = createSweepDetector({ store, sink: createMemorySink(), maxCatchup: 5 });
    const now = new Date("2026-03-10T01:00:00Z");

    // 00:05 through 00:55 are past their margin at 01:00
    const passes = [
      await detector.runOnce(now),
      await detector.runOnce(now),
      await detector.runOnce(now),
    ];

    expect(passes.map((p) => p.missed)).toEqual([5, 5, 1]);
    const record = await store.get(monitorKey());
    expect(record?.runs).toHaveLength(11);
    expect(record?.sweptThrough).toBe("2026-03-10T00:55:00.000Z");
    expect((await sweep.runOnce(now)).missed).toBe(0);
  });

  test("a finish that commits first makes the Missed decision moot", async () => {
    const inner = createMemoryStore();
    const outcomes: string[] = [];
    let ingestor: ReturnType<typeof createIngestor> | undefined;

    const racing = createRacingStore(inner, async () => {
      if (!ingestor) return;
      const result = await ingestor.ingest(checkIn("ok", "2026-03-10T02:09:00Z"));
      outcomes.push(result.outcome);
    });
    const { store, sweep } = await setup(cronConfig(), CREATED_AT, racing);
    const clock = createClock("2026-03-10T02:09:00Z");
    ingestor = createIngestor({
      store: inner,
      rateLimiter: createRateLimiter(),
      sink: createMemorySink(),
      clock,
    });

    const report = await sweep.runOnce(new Date("2026-03-10T02:11:00Z"));

    expect(outcomes).toEqual(["heartbeat"]);
    expect(report.missed).toBe(0);
    const record = await store.get(monitorKey());
    expect(record?.runs).toHaveLength(1);
    expect(record?.runs[0]?.terminalStatus).toBe("ok");
    expect(record?.state.status).toBe("up");
  });

  test("a failing monitor is counted and the pass continues", async () => {
    const store = createMemoryStore();
    await store.create(createMonitorRecord(cronConfig(), new Date(CREATED_AT)));
    await store.create(
      createMonitorRecord(cronConfig(), new Date(CREATED_AT), monitorKey("broken")),
    );
    const failing: MonitorStore = {
      ...store,
      async get(key) {
        if (key.slug === "broken") throw new Error("disk on fire");
        return store.get(key);
      },
    };
    const sweep = createSweepDetector({
      store: failing,
      sink: createMemorySink(),
      casMaxAttempts: 1,
    });

    const report = await sweep.runOnce(new Date("2026-03-10T02:11:00Z"));

    expect(report).toEqual({ monitors: 2, missed: 1, timedOut: 0, failed: 1 });
  });
});

describe("sweep loop", () => {
  test("start sweeps right away and stop releases the lock", async () => {
    const store = createMemoryStore();
    const list = vi.spyOn(store, "list");
    const lock = createLocalLock();
    const sweep = createSweepDetector({ store, sink: createMemorySink(), lock });

    sweep.start();
    await vi.waitFor(() => expect(list).toHaveBeenCalledTimes(1));
    expect(lock.isHeld()).toBe(true);
    await sweep.stop();

    expect(sweep.isRunning()).toBe(false);
    expect(lock.isHeld()).toBe(false);
  });

  test("stop waits out a pending lock acquisition and never sweeps after it", async () => {
    const store = createMemoryStore();
    const list = vi.spyOn(store, "list");
    let held = false;
    const slowLock: LeaderLock = {
      name: "slow",
      async acquire() {
        await sleep(20);
        held = true;
        return true;
      },
      isHeld: () => held,
      async release() {
        held = false;
      },
    };
    const sweep = createSweepDetector({ store, sink: createMemorySink(), lock: slowLock });

    sweep.start();
    await sweep.stop();
    await sleep(50);

    expect(list).not.toHaveBeenCalled();
    expect(slowLock.isHeld()).toBe(false);
  });
});

describe("decideSweep", () => {
  test("returns no write when nothing is due", () => {
    const record = createMonitorRecord(cronConfig(), new Date(CREATED_AT));
    const decision = decideSweep(record, new Date("2026-03-09T13:00:00Z"), 60);
    expect(decision.next).toBeNull();
    expect(decision.result.closed).toEqual([]);
  });

  test("captures margin and max runtime on the Missed run", () => {
    const record = createMonitorRecord(
      cronConfig({ checkinMargin: 5, maxRuntime: 45 }),
      new Date(CREATED_AT),
    );
    const decision = decideSweep(record, new Date("2026-03-10T02:06:00Z"), 60);
    const run = decision.next?.runs[0];
    expect(run?.checkinMargin).toBe(5);
    expect(run?.maxRuntime).toBe(45);
    expect(run?.startedAt).toBeUndefined();
    expect(run?.finishedAt).toBe("2026-03-10T02:06:00.000Z");
  });
});
