import { describe, expect, test } from "vitest";
import { createMemorySink } from "../alerting/sinks";
import {
  DeadlineExceededError,
  MonitorNotFoundError,
  RateLimitedError,
  ValidationError,
} from "../lib/errors";
import { createRateLimiter } from "../ratelimit/rate-limiter";
import { createMemoryStore } from "../store/memory-store";
import type { MonitorStore } from "../store/types";
import {
  checkIn,
  createClock,
  createFlakyStore,
  createMonitorRecord,
  cronConfig,
  intervalConfig,
  monitorKey,
} from "../test-utils";
import type { MonitorConfig } from "../types/monitor";
import { createIngestor } from "./ingestor";

async function setup(options: {
  config?: MonitorConfig;
  createdAt?: string;
  store?: MonitorStore;
  rateLimit?: number;
}) {
  const createdAt = options.createdAt ?? "2026-03-09T12:00:00.000Z";
  const store = options.store ?? createMemoryStore();
  if (options.config) {
    await store.create(createMonitorRecord(options.config, new Date(createdAt)));
  }
  const sink = createMemorySink();
  const clock = createClock(createdAt);
  const ingestor = createIngestor({
    store,
    sink,
    clock,
    rateLimiter: createRateLimiter({ max: options.rateLimit ?? 6 }),
    casBaseDelayMs: 1,
  });
  return { store, sink, clock, ingestor };
}

describe("createIngestor", () => {
  describe("start check-ins", () => {
    test("opens a run keyed by the check-in id", async () => {
      const { store, ingestor, clock } = await setup({ config: cronConfig() });
      clock.set("2026-03-10T02:01:00Z");

      const result = await ingestor.ingest(
        checkIn("in_progress", "2026-03-10T02:01:00Z", { checkInId: "run-a" }),
      );

      expect(result).toEqual({
        checkInId: "run-a",
        runId: "run-a",
        expectedAt: "2026-03-10T02:00:00.000Z",
        outcome: "started",
        transition: undefined,
      });
      const record = await store.get(monitorKey());
      expect(record?.runs[0]?.startedAt).toBe("2026-03-10T02:01:00.000Z");
      expect(record?.state.lastRunId).toBe("run-a");
      expect(record?.state.lastExpectedRunAt).toBe("2026-03-10T02:00:00.000Z");
    });

    test("first writer wins for the same occurrence", async () => {
      const { store, ingestor } = await setup({ config: cronConfig() });

      await ingestor.ingest(checkIn("in_progress", "2026-03-10T02:01:00Z", { checkInId: "a" }));
      const second = await ingestor.ingest(
        checkIn("in_progress", "2026-03-10T02:02:00Z", { checkInId: "b" }),
      );

      expect(second.outcome).toBe("duplicate");
      expect(second.runId).toBe("a");
      expect(second.checkInId).toBe("b");
      const record = await store.get(monitorKey());
      expect(record?.runs.map((run) => run.runId)).toEqual(["a"]);
    });

    test("first writer wins when two starts race", async () => {
      const flaky = createFlakyStore(createMemoryStore());
      const { store, ingestor } = await setup({ config: cronConfig(), store: flaky });

      const results = await Promise.all([
        ingestor.ingest(checkIn("in_progress", "2026-03-10T02:01:00Z", { checkInId: "a" })),
        ingestor.ingest(checkIn("in_progress", "2026-03-10T02:02:00Z", { checkInId: "b" })),
      ]);

      expect(results.map((result) => result.outcome)).toEqual(["started", "duplicate"]);
      expect(results.map((result) => result.runId)).toEqual(["a", "a"]);
      // The loser's write conflicted and its retry saw the winner's run
      expect(flaky.calls.compareAndSwap).toBe(2);
      const record = await store.get(monitorKey());
      expect(record?.runs.map((run) => run.runId)).toEqual(["a"]);
      expect(record?.version).toBe(2);
    });

    test("a resent start is a duplicate", async () => {
      const { ingestor } = await setup({ config: cronConfig() });

      await ingestor.ingest(checkIn("in_progress", "2026-03-10T02:01:00Z", { checkInId: "a" }));
      const resent = await ingestor.ingest(
        checkIn("in_progress", "2026-03-10T02:01:00Z", { checkInId: "a" }),
      );

      expect(resent.outcome).toBe("duplicate");
    });

    test("requires a check-in id", async () => {
      const { ingestor } = await setup({ config: cronConfig() });

      await expect(
        ingestor.ingest(checkIn("in_progress", "2026-03-10T02:01:00Z")),
      ).rejects.toBeInstanceOf(ValidationError);
    });
  });

  describe("finish check-ins", () => {
    test("closes the run by id and derives the duration", async () => {
      const { store, ingestor } = await setup({ config: cronConfig() });

      await ingestor.ingest(checkIn("in_progress", "2026-03-10T02:01:00Z", { checkInId: "a" }));
      const finish = await ingestor.ingest(
        checkIn("ok", "2026-03-10T02:11:00Z", { checkInId: "a" }),
      );

      expect(finish.outcome).toBe("completed");
      const run = (await store.get(monitorKey()))?.runs[0];
      expect(run?.terminalStatus).toBe("ok");
      expect(run?.finishedAt).toBe("2026-03-10T02:11:00.000Z");
      expect(run?.durationSeconds).toBe(600);
    });

    test("a client duration wins over the derived one", async () => {
      const { store, ingestor } = await setup({ config: cronConfig() });

      await ingestor.ingest(checkIn("in_progress", "2026-03-10T02:01:00Z", { checkInId: "a" }));
      await ingestor.ingest(
        checkIn("ok", "2026-03-10T02:11:00Z", { checkInId: "a", durationSeconds: 42 }),
      );

      expect((await store.get(monitorKey()))?.runs[0]?.durationSeconds).toBe(42);
    });

    test("a finish without an id closes the latest open run", async () => {
      const { store, ingestor } = await setup({ config: cronConfig() });

      await ingestor.ingest(checkIn("in_progress", "2026-03-10T02:01:00Z", { checkInId: "a" }));
      const finish = await ingestor.ingest(checkIn("error", "2026-03-10T02:05:00Z"));

      expect(finish.outcome).toBe("completed");
      expect(finish.runId).toBe("a");
      expect(finish.checkInId).toBe("a");
      expect((await store.get(monitorKey()))?.runs[0]?.terminalStatus).toBe("error");
    });

    test("a terminal run is never overwritten", async () => {
      const { store, ingestor } = await setup({ config: cronConfig() });

      await ingestor.ingest(checkIn("in_progress", "2026-03-10T02:01:00Z", { checkInId: "a" }));
      await ingestor.ingest(checkIn("ok", "2026-03-10T02:05:00Z", { checkInId: "a" }));
      const again = await ingestor.ingest(
        checkIn("error", "2026-03-10T02:06:00Z", { checkInId: "a" }),
      );

      expect(again.outcome).toBe("late");
      const record = await store.get(monitorKey());
      expect(record?.runs[0]?.terminalStatus).toBe("ok");
      expect(record?.state.consecutiveFailures).toBe(0);
    });

    test("a finish with no matching run is a heartbeat", async () => {
      const { store, ingestor } = await setup({ config: cronConfig() });

      const result = await ingestor.ingest(
        checkIn("ok", "2026-03-10T02:03:00Z", { checkInId: "hb-1", durationSeconds: 120 }),
      );

      expect(result.outcome).toBe("heartbeat");
      expect(result.runId).toBe("hb-1");
      const run = (await store.get(monitorKey()))?.runs[0];
      expect(run?.expectedAt).toBe("2026-03-10T02:00:00.000Z");
      expect(run?.startedAt).toBe("2026-03-10T02:01:00.000Z");
      expect(run?.terminalStatus).toBe("ok");
    });

    test("a finish with an unseen id leaves another client's run open", async () => {
      const { store, ingestor } = await setup({ config: cronConfig({ expr: "0 * * * *" }) });

      await ingestor.ingest(
        checkIn("in_progress", "2026-03-10T02:00:30Z", { checkInId: "job-A" }),
      );
      const result = await ingestor.ingest(
        checkIn("error", "2026-03-10T03:00:10Z", { checkInId: "job-B" }),
      );

      expect(result.outcome).toBe("heartbeat");
      expect(result.runId).toBe("job-B");
      const record = await store.get(monitorKey());
      expect(
        record?.runs.map((run) => [run.runId, run.expectedAt, run.terminalStatus ?? "open"]),
      ).toEqual([
        ["job-A", "2026-03-10T02:00:00.000Z", "open"],
        ["job-B", "2026-03-10T03:00:00.000Z", "error"],
      ]);
    });

    test("an unseen finish id does not take over a started occurrence", async () => {
      const { store, ingestor } = await setup({ config: cronConfig() });

      await ingestor.ingest(checkIn("in_progress", "2026-03-10T02:01:00Z", { checkInId: "a" }));
      const result = await ingestor.ingest(
        checkIn("ok", "2026-03-10T02:05:00Z", { checkInId: "b" }),
      );

      expect(result.outcome).toBe("duplicate");
      expect(result.runId).toBe("a");
      const record = await store.get(monitorKey());
      expect(record?.runs).toHaveLength(1);
      expect(record?.runs[0]?.terminalStatus).toBeUndefined();
      expect(record?.version).toBe(2);
    });

    test("a heartbeat without an id answers with the synthesized run id", async () => {
      const { ingestor } = await setup({ config: cronConfig() });

      const result = await ingestor.ingest(checkIn("ok", "2026-03-10T02:03:00Z"));

      expect(result.outcome).toBe("heartbeat");
      expect(result.checkInId).toBe(result.runId);
    });
  });

  describe("thresholds", () => {
    test("degrades and recovers with hysteresis", async () => {
      const { store, sink, ingestor } = await setup({
        config: intervalConfig({ failureThreshold: 2, recoveryThreshold: 1 }),
        createdAt: "2026-03-10T00:00:00.000Z",
      });

      const first = await ingestor.ingest(checkIn("error", "2026-03-10T00:05:00Z"));
      const second = await ingestor.ingest(checkIn("error", "2026-03-10T00:10:00Z"));
      const third = await ingestor.ingest(checkIn("ok", "2026-03-10T00:15:00Z"));

      expect(first.transition).toBeUndefined();
      expect(second.transition?.transition).toBe("Degraded");
      expect(second.transition?.consecutiveCount).toBe(2);
      expect(third.transition?.transition).toBe("Recovered");
      expect(sink.events.map((event) => event.transition)).toEqual(["Degraded", "Recovered"]);
      expect((await store.get(monitorKey()))?.state.status).toBe("up");
    });

    test("a retried write emits its transition once", async () => {
      const flaky = createFlakyStore(createMemoryStore(), { casFailures: 1 });
      const { sink, ingestor } = await setup({ config: cronConfig(), store: flaky });

      const result = await ingestor.ingest(checkIn("error", "2026-03-10T02:03:00Z"));

      expect(result.transition?.transition).toBe("Degraded");
      expect(flaky.calls.compareAndSwap).toBe(2);
      expect(sink.events).toHaveLength(1);
    });
  });

  describe("monitor resolution", () => {
    test("creates the monitor from an attached config", async () => {
      const { store, ingestor, clock } = await setup({});
      clock.set("2026-03-10T02:01:00Z");

      await ingestor.ingest(
        checkIn("in_progress", "2026-03-10T02:01:00Z", { checkInId: "a" }),
        cronConfig(),
      );

      const record = await store.get(monitorKey());
      expect(record?.createdAt).toBe("2026-03-10T02:01:00.000Z");
      expect(record?.sweptThrough).toBe("2026-03-10T02:00:00.000Z");
      expect(record?.runs).toHaveLength(1);
    });

    test("retries a store failure while creating the monitor", async () => {
      const flaky = createFlakyStore(createMemoryStore(), { getFailures: 1 });
      const { ingestor } = await setup({ store: flaky });

      const result = await ingestor.ingest(
        checkIn("in_progress", "2026-03-10T02:01:00Z", { checkInId: "a" }),
        cronConfig(),
      );

      expect(result.outcome).toBe("started");
      // failed read, retried read, then the read before the run is opened
      expect(flaky.calls.get).toBe(3);
    });

    test("an unknown monitor without config is rejected", async () => {
      const { ingestor } = await setup({});

      await expect(
        ingestor.ingest(checkIn("ok", "2026-03-10T02:01:00Z")),
      ).rejects.toBeInstanceOf(MonitorNotFoundError);
    });

    test("a config change applies to new runs only", async () => {
      const { store, ingestor } = await setup({ config: cronConfig({ maxRuntime: 30 }) });

      await ingestor.ingest(checkIn("in_progress", "2026-03-10T02:01:00Z", { checkInId: "a" }));
      await ingestor.ingest(
        checkIn("in_progress", "2026-03-11T02:01:00Z", { checkInId: "b" }),
        cronConfig({ maxRuntime: 60 }),
      );

      const record = await store.get(monitorKey());
      expect(record?.config.maxRuntime).toBe(60);
      expect(record?.runs.map((run) => [run.runId, run.maxRuntime])).toEqual([
        ["a", 30],
        ["b", 60],
      ]);
    });
  });

  describe("limits", () => {
    test("rate-limited check-ins are not stored", async () => {
      const { store, ingestor } = await setup({ config: cronConfig(), rateLimit: 2 });

      await ingestor.ingest(checkIn("ok", "2026-03-10T02:01:00Z"));
      await ingestor.ingest(checkIn("ok", "2026-03-11T02:01:00Z"));
      const rejected = ingestor.ingest(checkIn("ok", "2026-03-12T02:01:00Z"));

      await expect(rejected).rejects.toBeInstanceOf(RateLimitedError);
      const record = await store.get(monitorKey());
      expect(record?.runs).toHaveLength(2);
      expect(await store.listCheckIns(monitorKey(), 10)).toHaveLength(2);
    });

    test("an aborted signal stops ingestion", async () => {
      const { ingestor } = await setup({ config: cronConfig() });

      await expect(
        ingestor.ingest(checkIn("ok", "2026-03-10T02:01:00Z"), undefined, {
          signal: AbortSignal.abort(),
        }),
      ).rejects.toBeInstanceOf(DeadlineExceededError);
    });
  });
});
