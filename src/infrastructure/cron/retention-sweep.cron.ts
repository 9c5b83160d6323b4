import * as cron from "node-cron";
import { SweepExpiredJobsUseCase } from "../../application/use-cases/sweep-expired-jobs.use-case";

export class RetentionSweepCron {
  private task: cron.ScheduledTask | null = null;
  private isRunning = false;

  constructor(
    private sweepExpiredJobsUseCase: SweepExpiredJobsUseCase,
    private schedule: string = "*/10 * * * *"
  ) {
    if (!cron.validate(schedule)) {
      throw new Error(`Invalid cron schedule for retention sweep: "${schedule}"`);
    }
  }

  start(): void {
    if (this.task) {
      console.log("[RetentionSweepCron] Cron job is already running");
      return;
    }

    this.task = cron.schedule(this.schedule, () => this.runOnce());

    console.log(`[RetentionSweepCron] Started retention sweep (schedule: ${this.schedule})`);
  }

  /**
   * One sweep cycle; overlapping cycles are skipped
   */
  async runOnce(): Promise<void> {
    if (this.isRunning) {
      console.log("[RetentionSweepCron] Previous run is still in progress, skipping this execution");
      return;
    }

    this.isRunning = true;
    const startTime = Date.now();

    try {
      const result = await this.sweepExpiredJobsUseCase.execute();
      const duration = Date.now() - startTime;
      console.log(
        `[RetentionSweepCron] Sweep completed in ${duration}ms: ` +
          `${result.jobsRemoved} jobs, ${result.entriesRemoved} stale entries removed`
      );
    } catch (error) {
      const duration = Date.now() - startTime;
      console.error(`[RetentionSweepCron] Error in sweep cycle (${duration}ms):`, error);
    } finally {
      this.isRunning = false;
    }
  }

  stop(): void {
    if (this.task) {
      this.task.stop();
      this.task = null;
      console.log("[RetentionSweepCron] Stopped cron job");
    }
  }

  isActive(): boolean {
    return this.task !== null;
  }
}
