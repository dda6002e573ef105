import { describe, it, expect, vi, afterEach } from "vitest";
import { HousekeepingJob } from "../housekeepingJob";
import { silentLogger } from "../../test/fixtures";

const sweeper = (result = { purged: 0, timedOut: 0 }) => ({ sweep: vi.fn(() => result) });
const refresher = (outcome = true) => ({ refresh: vi.fn(async () => outcome) });

describe("HousekeepingJob", () => {
  afterEach(() => {
    vi.useRealTimers();
  });

  it("reports what the sweep removed", async () => {
    const job = new HousekeepingJob(sweeper({ purged: 2, timedOut: 1 }), refresher(), silentLogger());

    await expect(job.runOnce()).resolves.toEqual({ purged: 2, timedOut: 1, catalogRefreshed: null, skipped: false });
  });

  it("leaves the catalog alone when periodic refresh is disabled", async () => {
    let clock = 0;
    const catalog = refresher();
    const job = new HousekeepingJob(sweeper(), catalog, silentLogger(), { now: () => clock });

    clock += 24 * 60 * 60 * 1000;
    await job.runOnce();

    expect(catalog.refresh).not.toHaveBeenCalled();
  });

  it("refreshes the catalog once the refresh interval has passed", async () => {
    let clock = 1_000;
    const catalog = refresher(false);
    const job = new HousekeepingJob(sweeper(), catalog, silentLogger(), { catalogRefreshMs: 5_000, now: () => clock });

    clock = 5_999;
    expect((await job.runOnce()).catalogRefreshed).toBeNull();

    clock = 6_000;
    expect((await job.runOnce()).catalogRefreshed).toBe(false);

    clock = 7_000;
    expect((await job.runOnce()).catalogRefreshed).toBeNull();
    expect(catalog.refresh).toHaveBeenCalledTimes(1);
  });

  it("skips an iteration while the previous one is still running", async () => {
    let release = () => {};
    const catalog = {
      refresh: vi.fn(
        () =>
          new Promise<boolean>((resolve) => {
            release = () => resolve(true);
          })
      ),
    };
    let clock = 0;
    const job = new HousekeepingJob(sweeper(), catalog, silentLogger(), { catalogRefreshMs: 10, now: () => clock });
    clock = 10;

    const first = job.runOnce();
    await expect(job.runOnce()).resolves.toEqual({ purged: 0, timedOut: 0, catalogRefreshed: null, skipped: true });

    release();
    await expect(first).resolves.toMatchObject({ catalogRefreshed: true, skipped: false });
  });

  it("logs and survives a failing sweep", async () => {
    const logger = silentLogger();
    const error = vi.spyOn(logger, "error");
    const job = new HousekeepingJob(
      {
        sweep: () => {
          throw new Error("registry corrupted");
        },
      },
      refresher(),
      logger
    );

    await expect(job.runOnce()).resolves.toMatchObject({ skipped: false, purged: 0 });
    expect(error).toHaveBeenCalledTimes(1);
  });

  it("sweeps on its interval until stopped", async () => {
    vi.useFakeTimers();
    const coordinator = sweeper();
    const job = new HousekeepingJob(coordinator, refresher(), silentLogger(), { intervalMs: 1_000 });

    job.start();
    await vi.advanceTimersByTimeAsync(3_000);
    expect(coordinator.sweep).toHaveBeenCalledTimes(3);

    job.stop();
    await vi.advanceTimersByTimeAsync(3_000);
    expect(coordinator.sweep).toHaveBeenCalledTimes(3);
  });
});
