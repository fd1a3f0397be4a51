import type { FileWatcher } from "../ports/file-watcher";
import type { Logger } from "../ports/logger";
import { silentLogger } from "../ports/logger";
import { describeError } from "../application/errors";
import { createPathFilter, createWatchIgnore, type PathFilter } from "../adapters/path-filter";

export const DEFAULT_QUIET_PERIOD_MS = 2000;

export type WatchServiceDeps = {
  watcher: FileWatcher;
  /** One backup run; failures are logged and watching goes on. */
  runBackup: () => Promise<unknown>;
  logger?: Logger;
  quietPeriodMs?: number;
};

/**
 * Runs a backup once the source has been quiet for a while. Runs never
 * overlap; changes seen during a run schedule exactly one more.
 */
export class WatchService {
  private readonly logger: Logger;
  private readonly quietPeriodMs: number;
  private timer: NodeJS.Timeout | null = null;
  private running: Promise<void> | null = null;
  private rerun = false;
  private stopped = true;
  private runs = 0;

  constructor(private readonly deps: WatchServiceDeps) {
    this.logger = deps.logger ?? silentLogger;
    this.quietPeriodMs = deps.quietPeriodMs ?? DEFAULT_QUIET_PERIOD_MS;
  }

  get completedRuns(): number {
    return this.runs;
  }

  async start(sourceRoot: string, filter: PathFilter = createPathFilter()): Promise<void> {
    if (!this.stopped) return;
    this.stopped = false;

    this.deps.watcher.onEvent((event) => {
      this.logger.debug("change detected", { type: event.type, path: event.path });
      this.schedule();
    });
    this.deps.watcher.onError?.((err) => {
      this.logger.error("file watcher error", { error: describeError(err) });
    });

    await this.deps.watcher.start({ rootDir: sourceRoot, ignore: createWatchIgnore(sourceRoot, filter) });
    this.logger.info("watching for changes", { source: sourceRoot, quietPeriodMs: this.quietPeriodMs });
  }

  /** Runs a backup right away, or once more after the one in flight. */
  trigger(): Promise<void> {
    if (this.running) {
      this.rerun = true;
      return this.running;
    }
    this.running = this.loop().finally(() => {
      this.running = null;
    });
    return this.running;
  }

  async stop(): Promise<void> {
    this.stopped = true;
    if (this.timer) {
      clearTimeout(this.timer);
      this.timer = null;
    }
    await this.deps.watcher.stop();
    await this.running;
  }

  private schedule() {
    if (this.stopped) return;
    if (this.timer) clearTimeout(this.timer);
    this.timer = setTimeout(() => {
      this.timer = null;
      void this.trigger();
    }, this.quietPeriodMs);
  }

  private async loop(): Promise<void> {
    do {
      this.rerun = false;
      try {
        await this.deps.runBackup();
      } catch (err) {
        this.logger.error("backup run failed", { error: describeError(err) });
      }
      this.runs += 1;
    } while (this.rerun && !this.stopped);
  }
}
