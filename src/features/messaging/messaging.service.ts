import { Response } from 'express';
import twilio from 'twilio';
import { ServiceContainer } from '../../core/container';
import { logger, maskSender, trackEvent } from '../../core/observability/logging';
import { recordTurn } from '../../core/observability/metrics';
import { senderIdFromAddress } from '../../core/messaging/twilio/twilio.service';
import { InboundMessage } from '../turn/turn.types';
import { twilioWebhookSchema } from './messaging.types';

/** Twilio expects TwiML back; replies go out through the REST API instead. */
export function emptyTwimlResponse(): string {
  return new twilio.twiml.MessagingResponse().toString();
}

export class MessagingService {
  constructor(private services: ServiceContainer, private now: () => Date = () => new Date()) {}

  /** Returns null when the payload lacks a sender or a message body. */
  parseInboundMessage(body: unknown): InboundMessage | null {
    const parsed = twilioWebhookSchema.safeParse(body);
    if (!parsed.success) {
      logger.warn({ issues: parsed.error.issues.map(issue => issue.path.join('.')) }, "Malformed Twilio webhook payload");
      return null;
    }

    const senderId = senderIdFromAddress(parsed.data.From);
    if (senderId === '') {
      logger.warn("Twilio webhook payload has an empty sender address");
      return null;
    }

    return {
      senderId,
      text: parsed.data.Body,
      receivedAt: this.now(),
      messageSid: parsed.data.MessageSid,
    };
  }

  async handleWebhookMessage(body: unknown, res: Response): Promise<void> {
    const message = this.parseInboundMessage(body);

    if (!message) {
      recordTurn('rejected');
      res.status(400).send("Missing 'From' or 'Body' in webhook payload.");
      return;
    }

    trackEvent("text_message_received", {
      userPhone: maskSender(message.senderId),
      messageLength: message.text.length,
      timestamp: message.receivedAt.toISOString()
    });

    try {
      const outcome = await this.services.turnHandler.handleTurn(message);
      logger.info(
        { phone: maskSender(message.senderId), messageSid: message.messageSid, status: outcome.status, feedbackRecorded: outcome.feedbackRecorded },
        "Turn completed"
      );
      res.status(200).type('text/xml').send(emptyTwimlResponse());
    } catch (error) {
      logger.error({ err: error, phone: maskSender(message.senderId), messageSid: message.messageSid }, "Error processing webhook message");
      res.status(500).send("Internal server error while processing webhook.");
    }
  }
}
