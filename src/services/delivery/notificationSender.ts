/**
 * Notification sender
 *
 * Turns gate decisions and audit results into published messages and
 * records exactly one Notification / Alert per NotableReport, only after
 * SNS confirms the publish. Topics with no confirmed subscribers are
 * recorded without publishing so they are not retried forever.
 */
import { DeliveryError } from '../../lib/errors';
import { weekdayOf } from '../../lib/localTime';
import { logger } from '../../lib/logger';
import {
  buildAlertMessage,
  buildNoRunsMessage,
  buildNotableRunsMessage,
  GroomingMessage,
} from '../../lib/messages/groomingMessages';
import { generateUUID } from '../../lib/uuid';
import type { Alert, GroomingStore, Notification, NotifyDecision, Resort } from '../../types/grooming';
import type { AlertCandidate } from '../alertAuditor';
import type { TopicPublisher } from './snsPublisher';

export interface NotificationSenderOptions {
  reportSiteUrl: string;
  alertTopicArn: string | null;
}

export interface AlertDeliverySummary {
  sent: number;
  failed: number;
}

export class NotificationSender {
  constructor(
    private readonly store: GroomingStore,
    private readonly publisher: TopicPublisher,
    private readonly options: NotificationSenderOptions
  ) {}

  /**
   * Deliver a gate decision; resolves to the recorded Notification, or null for `none`
   */
  async deliverDecision(resort: Resort, decision: NotifyDecision, now: Date): Promise<Notification | null> {
    if (decision.type === 'none') {
      return null;
    }

    const { notableReport } = decision;
    const log = logger.child({ resortId: resort.resortId, date: notableReport.date, kind: decision.type });

    let message: GroomingMessage;
    if (decision.type === 'send') {
      const runs = await this.store.getRunsByIds(resort.resortId, notableReport.runIds);
      message = buildNotableRunsMessage({
        resort,
        date: notableReport.date,
        runNames: runs.map((run) => run.name),
        reportSiteUrl: this.options.reportSiteUrl,
      });
    } else {
      message = buildNoRunsMessage({
        resort,
        date: notableReport.date,
        reportSiteUrl: this.options.reportSiteUrl,
      });
    }

    let messageId: string | null = null;
    const subscribers = await this.publisher.confirmedSubscriptions(resort.topicArn);
    if (subscribers === 0) {
      log.info('Topic has zero confirmed subscribers; recording without sending', {
        topicArn: resort.topicArn,
      });
    } else {
      messageId = await this.publisher.publishReport(resort.topicArn, message, weekdayOf(notableReport.date));
    }

    const notification: Notification = {
      notificationId: generateUUID(),
      kind: decision.type === 'send' ? 'normal' : 'no_runs',
      sentAt: now.toISOString(),
      messageId,
    };
    await this.store.putNotification(resort.resortId, notableReport.date, notification);

    log.info('Notification recorded', {
      notificationId: notification.notificationId,
      messageId,
      subscribers,
    });
    return notification;
  }

  /**
   * Publish one operational alert per candidate; failures stay unrecorded for the next sweep
   */
  async deliverAlerts(candidates: AlertCandidate[], now: Date): Promise<AlertDeliverySummary> {
    const summary: AlertDeliverySummary = { sent: 0, failed: 0 };
    if (candidates.length === 0) {
      return summary;
    }

    const alertTopicArn = this.options.alertTopicArn;
    if (!alertTopicArn) {
      logger.error('ALERT_TOPIC_ARN not configured; alerts cannot be delivered', undefined, {
        pending: candidates.length,
      });
      summary.failed = candidates.length;
      return summary;
    }

    for (const { resort, notableReport } of candidates) {
      const { subject, message } = buildAlertMessage(resort, notableReport.date);
      try {
        const messageId = await this.publisher.publishAlert(alertTopicArn, subject, message);
        const alert: Alert = { alertId: generateUUID(), raisedAt: now.toISOString(), messageId };
        await this.store.putAlert(resort.resortId, notableReport.date, alert);
        summary.sent++;
      } catch (error) {
        if (!(error instanceof DeliveryError)) throw error;
        logger.warn('Alert delivery failed; will retry next sweep', {
          resortId: resort.resortId,
          date: notableReport.date,
          error: error.message,
        });
        summary.failed++;
      }
    }

    return summary;
  }
}
