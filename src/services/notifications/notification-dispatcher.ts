import { EventDispatcher, PositionEvent, TraderHealth } from '../../types/monitor';
import { describeError } from '../../utils/error-handler';
import { logger } from '../../utils/logger';
import { formatMonitorStarted, formatMonitorStopped, formatPositionEvent } from './notification-templates';
import { TelegramNotifier } from './telegram-notifier';

/**
 * Formats a position event and sends it. Delivery errors propagate to the
 * monitor, which logs them.
 */
export class NotificationDispatcher implements EventDispatcher {
  constructor(private readonly notifier: Pick<TelegramNotifier, 'send'>) {}

  async dispatch(event: PositionEvent, alias: string): Promise<void> {
    await this.notifier.send(formatPositionEvent(event, alias));
  }

  /**
   * Lifecycle notices. A failed send is logged and never blocks startup or
   * shutdown.
   */
  async announceStarted(healths: TraderHealth[], pollIntervalSeconds: number): Promise<boolean> {
    return this.sendNotice('started', formatMonitorStarted(healths, pollIntervalSeconds));
  }

  async announceStopped(): Promise<boolean> {
    return this.sendNotice('stopped', formatMonitorStopped());
  }

  private async sendNotice(notice: string, message: string): Promise<boolean> {
    try {
      await this.notifier.send(message);
      return true;
    } catch (error) {
      logger.warn('Failed to send lifecycle notice', { notice, error: describeError(error) });
      return false;
    }
  }
}
