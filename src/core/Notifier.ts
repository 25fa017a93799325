/**
 * Holdgate Notifier
 * Default NotificationTransport: writes the review request to the log so an
 * operator tailing holdgate.log sees it. Real deployments inject a chat or
 * session-channel transport instead.
 */

import chalk from 'chalk';
import { NotificationTransport, ReviewPayload } from '../types';
import { logger } from './Logger';

export class LogTransport implements NotificationTransport {
  notify(target: string, payload: ReviewPayload): void {
    logger.info(
      `${chalk.cyan('Holdgate:')} review requested from ${chalk.bold(target)} for ` +
        `${payload.operation} ${payload.scope} (${payload.reason})`,
      {
        interactionId: payload.interactionId,
        session: payload.session,
        riskScore: payload.riskScore,
        confidence: payload.confidence,
        expectedResponse: payload.expectedResponse,
      }
    );
  }
}
