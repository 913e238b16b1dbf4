import { StoreUnavailableError } from "../errors.js";
import { errMessage, logger } from "../logger.js";
import { interruptibleSleep } from "../utils.js";
import type { SourceSummary } from "./pipeline.js";
import type { PollTarget } from "./types.js";

export type PollingLoopOptions = {
  name: string;
  intervalMs: number;
  /** Consecutive store failures (source runs or target listings) after which the loop halts. */
  maxStoreFailures?: number;
};

/** What a loop polls: the current targets, and one run of a single target. */
export interface SourceRunner {
  listTargets(): Promise<PollTarget[]>;
  runSource(target: PollTarget): Promise<SourceSummary>;
}

/**
 * Every interval, starts a run for each target whose previous run has
 * finished. A slow source is skipped until it completes; the other sources
 * keep their own cadence.
 */
export class PollingLoop {
  private running = false;
  private halted = false;
  private wake: (() => void) | null = null;
  private storeFailures = 0;
  private readonly inFlight = new Map<string, Promise<void>>();

  constructor(
    private readonly opts: PollingLoopOptions,
    private readonly runner: SourceRunner
  ) {}

  get isRunning(): boolean {
    return this.running;
  }

  get isHalted(): boolean {
    return this.halted;
  }

  get inFlightCount(): number {
    return this.inFlight.size;
  }

  /** Dispatch one round; returns false once the loop has halted. */
  async tick(): Promise<boolean> {
    if (this.halted) return false;

    let targets: PollTarget[];
    try {
      targets = await this.runner.listTargets();
    } catch (err) {
      logger.error("poller.targets.failed", { loop: this.opts.name, error: errMessage(err) });
      if (err instanceof StoreUnavailableError) this.noteStoreFailure();
      return !this.halted;
    }

    let started = 0;
    let skipped = 0;
    for (const target of targets) {
      if (this.inFlight.has(target.id)) {
        skipped++;
        continue;
      }
      this.launch(target);
      started++;
    }
    if (skipped > 0) logger.info("poller.skipped_busy", { loop: this.opts.name, skipped });
    logger.debug("poller.tick", { loop: this.opts.name, started, skipped });
    return true;
  }

  private launch(target: PollTarget): void {
    const run = this.runner
      .runSource(target)
      .then(
        (summary) => this.record(summary),
        (err: unknown) => {
          logger.error("poller.source.failed", { loop: this.opts.name, source: target.label, error: errMessage(err) });
          if (err instanceof StoreUnavailableError) this.noteStoreFailure();
        }
      )
      .finally(() => {
        this.inFlight.delete(target.id);
      });
    this.inFlight.set(target.id, run);
  }

  private record(summary: SourceSummary): void {
    if (summary.storeFailure) {
      this.noteStoreFailure();
      return;
    }
    if (!summary.failed) this.storeFailures = 0;
  }

  private noteStoreFailure(): void {
    this.storeFailures++;
    const max = this.opts.maxStoreFailures ?? 3;
    if (this.storeFailures >= max && !this.halted) {
      this.halted = true;
      logger.error("poller.halted", { loop: this.opts.name, consecutiveStoreFailures: this.storeFailures });
      this.stop();
    }
  }

  /** Resolves once every run started so far has finished. */
  async settled(): Promise<void> {
    await Promise.allSettled([...this.inFlight.values()]);
  }

  /** Resolves when the loop is stopped or halts, after in-flight runs finish. */
  async start(): Promise<void> {
    if (this.running) return;
    this.running = true;
    logger.info("poller.started", { loop: this.opts.name, intervalMs: this.opts.intervalMs });

    while (this.running) {
      const keepGoing = await this.tick();
      if (!keepGoing || !this.running) break;
      const { promise, wake } = interruptibleSleep(this.opts.intervalMs);
      this.wake = wake;
      await promise;
      this.wake = null;
    }

    this.running = false;
    await this.settled();
    logger.info("poller.stopped", { loop: this.opts.name, halted: this.halted });
  }

  stop(): void {
    this.running = false;
    this.wake?.();
  }
}
