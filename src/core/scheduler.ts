import type { Logger } from "../common/logger";

export interface ScheduledJob {
  readonly name: string;
  readonly intervalMs: number;
  run(): Promise<unknown>;
}

/**
 * Runs every job once on start and then on its own interval. Jobs are
 * single-flight: a tick that fires while the job's previous run is still
 * going is dropped. A failing job never affects the others.
 */
export class IngestionScheduler {
  private readonly jobs: ScheduledJob[];
  private readonly logger: Logger;
  private readonly timers: NodeJS.Timeout[] = [];
  private readonly inFlight = new Map<string, Promise<void>>();
  private running = false;

  constructor(jobs: ScheduledJob[], logger: Logger) {
    const names = new Set<string>();
    for (const job of jobs) {
      if (names.has(job.name)) throw new Error(`Duplicate job name: ${job.name}`);
      if (!(job.intervalMs > 0)) throw new Error(`Job ${job.name} needs a positive interval`);
      names.add(job.name);
    }
    this.jobs = jobs;
    this.logger = logger;
  }

  get isRunning(): boolean {
    return this.running;
  }

  start() {
    if (this.running) return;
    this.running = true;
    for (const job of this.jobs) {
      this.logger
        .with()
        .str("job", job.name)
        .num("intervalSec", job.intervalMs / 1000)
        .logger()
        .info("Scheduling job");
      void this.tick(job);
      this.timers.push(setInterval(() => void this.tick(job), job.intervalMs));
    }
  }

  /** Clears all timers and resolves once in-flight runs have finished. */
  async stop(): Promise<void> {
    this.running = false;
    for (const timer of this.timers.splice(0)) clearInterval(timer);
    await Promise.all(this.inFlight.values());
    this.logger.info("Scheduler stopped");
  }

  /** Starts a run of one job unless one is already active; returns its completion. */
  tick(job: ScheduledJob): Promise<void> {
    const active = this.inFlight.get(job.name);
    if (active) {
      this.logger
        .with()
        .str("job", job.name)
        .logger()
        .warn("Job still running; skipping tick");
      return active;
    }

    const run = job
      .run()
      .then(
        () => undefined,
        (err: unknown) => {
          this.logger
            .with()
            .str("job", job.name)
            .error(err)
            .logger()
            .error("Job failed");
        }
      )
      .finally(() => this.inFlight.delete(job.name));
    this.inFlight.set(job.name, run);
    return run;
  }
}
