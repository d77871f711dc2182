/**
 * SNS delivery client
 *
 * Thin wrapper over the SNS topic API: confirmed-subscriber counts and
 * publishing. A publish only counts as delivered when SNS hands back a
 * MessageId.
 */
import {
  GetTopicAttributesCommand,
  PublishCommand,
  PublishCommandInput,
  SNSClient,
} from '@aws-sdk/client-sns';
import { DeliveryError } from '../../lib/errors';
import { logger } from '../../lib/logger';
import type { GroomingMessage } from '../../lib/messages/groomingMessages';

export interface TopicPublisher {
  confirmedSubscriptions(topicArn: string): Promise<number>;
  publishReport(topicArn: string, message: GroomingMessage, dayOfWeek: string): Promise<string>;
  publishAlert(topicArn: string, subject: string, message: string): Promise<string>;
}

export class SnsPublisher implements TopicPublisher {
  constructor(private readonly sns: SNSClient) {}

  async confirmedSubscriptions(topicArn: string): Promise<number> {
    const result = await this.sns.send(new GetTopicAttributesCommand({ TopicArn: topicArn }));
    const confirmed = Number(result.Attributes?.['SubscriptionsConfirmed'] ?? '0');
    return Number.isFinite(confirmed) ? confirmed : 0;
  }

  /**
   * Publish one message with per-protocol bodies (email, sms)
   */
  async publishReport(topicArn: string, message: GroomingMessage, dayOfWeek: string): Promise<string> {
    return this.publish({
      TopicArn: topicArn,
      MessageStructure: 'json',
      Message: JSON.stringify({ default: message.email, email: message.email, sms: message.sms }),
      Subject: message.subject,
      MessageAttributes: {
        day_of_week: { DataType: 'String', StringValue: dayOfWeek },
      },
    });
  }

  async publishAlert(topicArn: string, subject: string, message: string): Promise<string> {
    return this.publish({ TopicArn: topicArn, Subject: subject, Message: message });
  }

  private async publish(input: PublishCommandInput): Promise<string> {
    const topicArn = input.TopicArn ?? '';
    let messageId: string | undefined;

    try {
      const result = await this.sns.send(new PublishCommand(input));
      messageId = result.MessageId;
    } catch (error) {
      throw new DeliveryError(topicArn, error instanceof Error ? error.message : String(error));
    }

    if (!messageId) {
      throw new DeliveryError(topicArn, 'no MessageId in SNS response');
    }

    logger.info('Posted message to topic', { topicArn, messageId });
    return messageId;
  }
}
