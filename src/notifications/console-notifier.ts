import { type Logger, logger as defaultLogger } from '../utils/logger';
import { isAtLeast, NotificationLevel } from './notification-level';
import type { Notifier } from './notifier';

/**
 * Minimal writable used for the progress line
 */
export type ProgressStream = {
  isTTY?: boolean;
  write(chunk: string): boolean;
};

/**
 * Console notifier for terminal output with configurable minimum level
 */
export class ConsoleNotifier implements Notifier {
  private lastProgressLength = 0;
  private minLevel: NotificationLevel;
  private logger: Logger;
  private stream: ProgressStream;

  constructor(
    minLevel: NotificationLevel = NotificationLevel.INFO,
    logger: Logger = defaultLogger,
    stream: ProgressStream = process.stderr,
  ) {
    this.minLevel = minLevel;
    this.logger = logger;
    this.stream = stream;
  }

  notify(level: NotificationLevel, message: string): void {
    if (!isAtLeast(level, this.minLevel)) {
      return;
    }

    // Clear an active progress line so the log appears cleanly
    this.clearProgress();

    switch (level) {
      case NotificationLevel.DEBUG:
        this.logger.debug(message);
        break;
      case NotificationLevel.INFO:
        this.logger.info(message);
        break;
      case NotificationLevel.SUCCESS:
        this.logger.success(message);
        break;
      case NotificationLevel.WARNING:
        this.logger.warning(message);
        break;
      case NotificationLevel.ERROR:
        this.logger.error(message);
        break;
      case NotificationLevel.HIGHLIGHT:
        this.logger.highlight(message);
        break;
    }
  }

  /**
   * Progress is only drawn on a terminal; piped output would fill up with carriage returns
   */
  progress(message: string): void {
    if (!this.stream.isTTY) {
      return;
    }
    this.clearProgress();
    this.stream.write(`\r${message}`);
    this.lastProgressLength = message.length;
  }

  endProgress(): void {
    if (this.lastProgressLength > 0) {
      this.stream.write('\n');
      this.lastProgressLength = 0;
    }
  }

  private clearProgress(): void {
    if (this.lastProgressLength > 0) {
      this.stream.write(`\r${' '.repeat(this.lastProgressLength)}\r`);
      this.lastProgressLength = 0;
    }
  }
}
