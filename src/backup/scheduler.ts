import { errorMessage } from "../core/errors.js";
import { silentLogger, type Logger } from "../core/logger.js";
import type { BackupOrchestrator, BackupRunResult } from "./orchestrator.js";

/** Fixed-interval backup ticks. A tick that finds a run in flight is skipped by the orchestrator. */
export class BackupScheduler {
  private timer: NodeJS.Timeout | null = null;
  private current: Promise<BackupRunResult | null> | null = null;

  constructor(
    private readonly orchestrator: Pick<BackupOrchestrator, "runOnce">,
    private readonly intervalMs: number,
    private readonly logger: Logger = silentLogger,
  ) {}

  start(): void {
    if (this.timer) return;
    this.timer = setInterval(() => {
      void this.tick();
    }, this.intervalMs);
    this.timer.unref();
    this.logger.info("backup scheduler started", { intervalMinutes: Math.round(this.intervalMs / 60000) });
  }

  async stop(): Promise<void> {
    if (this.timer) clearInterval(this.timer);
    this.timer = null;
    await this.current;
  }

  /** One scheduled run. Never rejects. */
  tick(): Promise<BackupRunResult | null> {
    const run = this.orchestrator
      .runOnce("schedule")
      .then((res) => {
        if (res.skipped) this.logger.warn("scheduled backup skipped", { reason: res.reason });
        return res;
      })
      .catch((e: unknown) => {
        this.logger.error("scheduled backup crashed", { error: errorMessage(e) });
        return null;
      });
    this.current = run;
    return run;
  }
}
