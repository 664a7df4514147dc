import ora from 'ora';
import { BuildPhase } from '../types/Dist';
import { logger } from './Logger';

type Spinner = ReturnType<typeof ora>;

export interface ProgressReporter {
  phase(phase: BuildPhase, message: string): void;
  /** Called before a child process runs so its echoed output is not drawn over */
  pause(): void;
  fail(message: string): void;
}

/** Plain timestamped lines on stderr */
export class LoggerReporter implements ProgressReporter {
  phase(_phase: BuildPhase, message: string): void {
    logger.step(message);
  }

  pause(): void {}

  fail(message: string): void {
    logger.error(message);
  }
}

/**
 * One spinner line per phase; the previous phase is marked done when the next starts.
 */
export class SpinnerReporter implements ProgressReporter {
  private spinner: Spinner | null = null;

  phase(phase: BuildPhase, message: string): void {
    this.spinner?.succeed();
    if (phase === 'done') {
      this.spinner = null;
      logger.success(message);
      return;
    }
    this.spinner = ora({ text: message, stream: process.stderr }).start();
  }

  pause(): void {
    this.spinner?.stopAndPersist({ symbol: '•' });
    this.spinner = null;
  }

  fail(message: string): void {
    if (this.spinner) {
      this.spinner.fail(message);
      this.spinner = null;
      return;
    }
    logger.error(message);
  }
}
