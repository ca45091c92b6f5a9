/**
 * Notification channel that writes reports to the structured logger.
 * Used when a target has no channel and no webhook is configured.
 */

import { NotificationChannel } from '../adapters/interfaces';
import { logger as rootLogger, Logger } from '../logger';

export class LogChannel implements NotificationChannel {
  private readonly log: Logger;

  constructor(log?: Logger) {
    this.log = log ?? rootLogger.child({ module: 'report' });
  }

  async send(message: string, meta: { sessionId: string; targetId: string }): Promise<void> {
    this.log.info(message, { sessionId: meta.sessionId, targetId: meta.targetId });
  }
}
