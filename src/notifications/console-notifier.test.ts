import { beforeEach, describe, expect, it, vi } from 'vitest';
import { Logger } from '../utils/logger';
import { ConsoleNotifier } from './console-notifier';
import { NotificationLevel } from './notifier';

describe('ConsoleNotifier', () => {
  let logger: Logger;
  let written: string[];
  let stream: { isTTY: boolean; write: (chunk: string) => boolean };

  beforeEach(() => {
    logger = new Logger({ useColors: false, write: () => {} });
    written = [];
    stream = {
      isTTY: true,
      write: (chunk: string) => {
        written.push(chunk);
        return true;
      },
    };
  });

  it('should route each level to the matching logger method', () => {
    const info = vi.spyOn(logger, 'info');
    const success = vi.spyOn(logger, 'success');
    const warning = vi.spyOn(logger, 'warning');
    const error = vi.spyOn(logger, 'error');
    const highlight = vi.spyOn(logger, 'highlight');
    const notifier = new ConsoleNotifier(NotificationLevel.DEBUG, logger, stream);

    notifier.notify(NotificationLevel.INFO, 'i');
    notifier.notify(NotificationLevel.SUCCESS, 's');
    notifier.notify(NotificationLevel.WARNING, 'w');
    notifier.notify(NotificationLevel.ERROR, 'e');
    notifier.notify(NotificationLevel.HIGHLIGHT, 'h');

    expect(info).toHaveBeenCalledWith('i');
    expect(success).toHaveBeenCalledWith('s');
    expect(warning).toHaveBeenCalledWith('w');
    expect(error).toHaveBeenCalledWith('e');
    expect(highlight).toHaveBeenCalledWith('h');
  });

  it('should drop notifications below the minimum level', () => {
    const info = vi.spyOn(logger, 'info');
    const warning = vi.spyOn(logger, 'warning');
    const notifier = new ConsoleNotifier(NotificationLevel.WARNING, logger, stream);

    notifier.notify(NotificationLevel.INFO, 'quiet');
    notifier.notify(NotificationLevel.WARNING, 'loud');

    expect(info).not.toHaveBeenCalled();
    expect(warning).toHaveBeenCalledWith('loud');
  });

  it('should overwrite the progress line and finish it with a newline', () => {
    const notifier = new ConsoleNotifier(NotificationLevel.INFO, logger, stream);

    notifier.progress('10%');
    notifier.progress('20%');
    notifier.endProgress();

    expect(written).toEqual(['\r10%', '\r   \r', '\r20%', '\n']);
  });

  it('should clear the progress line before logging', () => {
    const notifier = new ConsoleNotifier(NotificationLevel.INFO, logger, stream);

    notifier.progress('abc');
    notifier.notify(NotificationLevel.INFO, 'log line');
    notifier.endProgress();

    expect(written).toEqual(['\rabc', '\r   \r']);
  });

  it('should not draw progress when the stream is not a terminal', () => {
    stream.isTTY = false;
    const notifier = new ConsoleNotifier(NotificationLevel.INFO, logger, stream);

    notifier.progress('50%');
    notifier.endProgress();

    expect(written).toEqual([]);
  });
});
