import { ProgressMode } from "../config";
import { Logger } from "../observability";

export interface ProgressHandle {
  advance(bytes: number): void;
  finish(): void;
}

export interface ProgressReporter {
  readonly enabled: boolean;
  start(label: string, totalBytes?: number): ProgressHandle;
}

const NOOP_HANDLE: ProgressHandle = {
  advance: () => undefined,
  finish: () => undefined,
};

export class NoopProgressReporter implements ProgressReporter {
  readonly enabled = false;

  start(): ProgressHandle {
    return NOOP_HANDLE;
  }
}

export class LogProgressReporter implements ProgressReporter {
  readonly enabled = true;
  private readonly logger: Logger;
  private readonly stepPercent: number;

  constructor(logger: Logger, stepPercent = 10) {
    this.logger = logger;
    this.stepPercent = stepPercent;
  }

  start(label: string, totalBytes?: number): ProgressHandle {
    const logger = this.logger;
    const step = this.stepPercent;
    let received = 0;
    let nextPercent = step;

    return {
      advance(bytes: number): void {
        received += bytes;
        if (!totalBytes) {
          return;
        }
        const percent = Math.floor((received / totalBytes) * 100);
        if (percent < nextPercent) {
          return;
        }
        logger.info("download_progress", { file: label, percent: Math.min(percent, 100), bytes: received, totalBytes });
        nextPercent = (Math.floor(percent / step) + 1) * step;
      },
      finish(): void {
        logger.info("download_progress_done", { file: label, bytes: received, totalBytes });
      },
    };
  }
}

export function createProgressReporter(mode: ProgressMode, logger: Logger): ProgressReporter {
  return mode === "log" ? new LogProgressReporter(logger) : new NoopProgressReporter();
}
