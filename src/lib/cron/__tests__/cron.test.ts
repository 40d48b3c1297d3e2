import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import {
  AlreadyExistsError,
  ConfigError,
  ParseError,
  RegistryStateError,
  TaskError,
} from "../../core/errors.js";
import { NilLocker } from "../../locker/nil-locker.js";
import { SemaphoreLocker } from "../../locker/semaphore-locker.js";
import { Cron } from "../cron.js";

const T0 = new Date("2024-01-01T00:00:00.000Z");

describe("Cron", () => {
  beforeEach(() => {
    vi.useFakeTimers();
    vi.setSystemTime(T0);
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  describe("registration", () => {
    it("keeps the first job when a name is reused", async () => {
      const cron = new Cron(new NilLocker(), { lockTtl: 500 });
      const first = vi.fn();
      const second = vi.fn();
      cron.add("job1", "0 * * * * * *", first);
      expect(() => cron.add("job1", "1 * * * * * *", second)).toThrow(
        new AlreadyExistsError("job1"),
      );

      cron.startFrom(new Date("2024-01-01T00:00:30Z"));
      expect(cron.jobs()).toEqual([
        { name: "job1", state: "armed", nextRun: new Date("2024-01-01T00:01:00Z") },
      ]);

      await vi.advanceTimersByTimeAsync(62_000);
      expect(first).toHaveBeenCalledTimes(1);
      expect(second).not.toHaveBeenCalled();
      cron.stop();
    });

    it("rejects a whole batch with a duplicate inside it", () => {
      const cron = new Cron(new NilLocker());
      const task = vi.fn();
      expect(() =>
        cron.addJob(
          { name: "a", expr: "@every 1m", task },
          { name: "b", expr: "@every 1m", task },
          { name: "a", expr: "@every 2m", task },
        ),
      ).toThrow(AlreadyExistsError);
      expect(cron.jobs()).toEqual([]);
    });

    it("rejects a whole batch that clashes with the registry", () => {
      const cron = new Cron(new NilLocker());
      const task = vi.fn();
      cron.add("a", "@every 1m", task);
      expect(() =>
        cron.addJob({ name: "b", expr: "@every 1m", task }, { name: "a", expr: "@every 1m", task }),
      ).toThrow(AlreadyExistsError);
      expect(cron.jobs().map((j) => j.name)).toEqual(["a"]);
    });

    it("names the job whose expression fails to parse", () => {
      const cron = new Cron(new NilLocker());
      const task = vi.fn();
      let caught: unknown;
      try {
        cron.addJob(
          { name: "x", expr: "@every 1m", task },
          { name: "y", expr: "not a cron", task },
        );
      } catch (err) {
        caught = err;
      }
      expect(caught).toBeInstanceOf(ParseError);
      if (caught instanceof ParseError) {
        expect(caught.job).toBe("y");
        expect(caught.message).toBe(
          'add job y: parse "not a cron": expected 5, 6 or 7 fields, got 3',
        );
      }
      expect(cron.jobs()).toEqual([]);
    });

    it("rejects an empty name", () => {
      const cron = new Cron(new NilLocker());
      expect(() => cron.add("  ", "@every 1m", vi.fn())).toThrow(ConfigError);
    });

    it("rejects a lock TTL that is not shorter than a fixed interval", () => {
      expect(() => new Cron(new NilLocker(), { lockTtl: 1000 }).add("fast", "@every 1s", vi.fn()))
        .toThrow("add job fast: lock TTL 1000ms must be shorter than the interval 1000ms");
      expect(() =>
        new Cron(new NilLocker(), { lockTtl: 500 }).add("fast", "@every 1s", vi.fn()),
      ).not.toThrow();
    });

    it("accepts a cron job whose gap is not longer than the lock TTL", () => {
      const cron = new Cron(new NilLocker(), { lockTtl: 2000 });
      expect(() => cron.add("tight", "*/2 * * * * *", vi.fn())).not.toThrow();
      cron.start();
      expect(cron.jobs()).toEqual([
        { name: "tight", state: "armed", nextRun: new Date("2024-01-01T00:00:02Z") },
      ]);
      cron.stop();
    });

    it("rejects an interval beyond the duration range", () => {
      const cron = new Cron(new NilLocker());
      expect(() => cron.add("huge", "@every 3000000000h", vi.fn())).toThrow(
        'add job huge: parse "3000000000h": invalid duration',
      );
      expect(cron.jobs()).toEqual([]);
    });

    it("rejects an unknown time zone", () => {
      expect(() => new Cron(new NilLocker(), { timezone: "Atlantis/Capital" })).toThrow(
        ConfigError,
      );
    });
  });

  describe("lifecycle", () => {
    it("refuses registration after start", () => {
      const cron = new Cron(new NilLocker());
      cron.start();
      expect(() => cron.add("late", "@every 1m", vi.fn())).toThrow(
        new RegistryStateError("cannot register jobs: cron is started"),
      );
      cron.stop();
    });

    it("refuses a second start and a restart", () => {
      const cron = new Cron(new NilLocker());
      cron.start();
      expect(() => cron.start()).toThrow(RegistryStateError);
      cron.stop();
      cron.stop();
      expect(() => cron.startFrom(T0)).toThrow(
        new RegistryStateError("cannot start: cron is stopped"),
      );
    });

    it("starts from the given instant", () => {
      const cron = new Cron(new NilLocker());
      cron.add("tick", "@every 10s", vi.fn());
      cron.startFrom(new Date("2024-01-01T00:00:05Z"));
      expect(cron.jobs()[0]?.nextRun?.toISOString()).toBe("2024-01-01T00:00:15.000Z");
      cron.stop();
    });

    it("reports job states across the lifecycle", () => {
      const cron = new Cron(new NilLocker());
      cron.add("tick", "@every 10s", vi.fn());
      expect(cron.jobs()[0]?.state).toBe("idle");
      cron.start();
      expect(cron.jobs()[0]?.state).toBe("armed");
      cron.stop();
      expect(cron.jobs()).toEqual([{ name: "tick", state: "halted", nextRun: null }]);
      expect(vi.getTimerCount()).toBe(0);
    });

    it("routes task failures to the error handler", async () => {
      const errors: Error[] = [];
      const cron = new Cron(new NilLocker(), {
        lockTtl: 500,
        errorHandler: (err) => void errors.push(err),
      });
      cron.add("flaky", "@every 1s", () => {
        throw new Error("disk full");
      });
      cron.start();

      await vi.advanceTimersByTimeAsync(1000);
      cron.stop();

      expect(errors).toHaveLength(1);
      expect(errors[0]).toBeInstanceOf(TaskError);
      expect(errors[0]?.message).toBe("run job flaky: disk full");
    });
  });

  it("runs each activation once across instances sharing a locker", async () => {
    const locker = new SemaphoreLocker();
    const runs: string[] = [];
    const instances = [1, 2, 3].map((id) => {
      const cron = new Cron(locker, { lockTtl: 500 });
      cron.add("report", "*/2 * * * * *", ({ scheduledAt }) => {
        runs.push(`${id}@${scheduledAt.toISOString()}`);
      });
      cron.start();
      return cron;
    });

    await vi.advanceTimersByTimeAsync(6000);
    for (const cron of instances) cron.stop();

    expect(runs).toEqual([
      "1@2024-01-01T00:00:02.000Z",
      "1@2024-01-01T00:00:04.000Z",
      "1@2024-01-01T00:00:06.000Z",
    ]);
  });
});

describe("Cron in real time", () => {
  it("fires every second close to the expected instants", async () => {
    const t0 = Date.now();
    const seen: number[] = [];
    const cron = new Cron(new SemaphoreLocker(), { lockTtl: 500 });
    cron.add("pulse", "* * * * * * *", () => {
      seen.push(Date.now());
    });
    cron.start();

    await new Promise((resolve) => setTimeout(resolve, 3500));
    cron.stop();

    expect(seen.length).toBeGreaterThanOrEqual(3);
    seen.slice(0, 3).forEach((ts, i) => {
      expect(Math.abs(ts - (t0 + (i + 1) * 1000))).toBeLessThanOrEqual(1000);
    });
  });
});
