import twilio, { Twilio } from 'twilio';
import { logger, maskSender } from '../../observability/logging';
import { markdownToWhatsApp, splitMessageByLength } from '../message-formatters';
import { SendResult, TwilioOutboundMessage, TwilioSettings } from './twilio.types';

/**
 * Strips the channel prefix Twilio puts on addresses
 * ("whatsapp:+1555" -> "+1555").
 */
export function senderIdFromAddress(address: string): string {
  const separator = address.lastIndexOf(':');
  return (separator === -1 ? address : address.slice(separator + 1)).trim();
}

export class TwilioMessagingService {
  private client: Twilio | null = null;

  constructor(private readonly settings: TwilioSettings, client?: Twilio) {
    if (!settings.fromNumber || (!client && (!settings.accountSid || !settings.authToken))) {
      logger.error("TWILIO_ACCOUNT_SID, TWILIO_AUTH_TOKEN or TWILIO_WHATSAPP_NUMBER is not set. Reply delivery will be disabled.");
      return;
    }
    this.client = client ?? twilio(settings.accountSid, settings.authToken);
    logger.info({ channel: settings.channel }, "Twilio messaging service initialized.");
  }

  /** Adds the channel prefix Twilio expects on both ends of a WhatsApp message. */
  toAddress(phone: string): string {
    if (this.settings.channel !== 'whatsapp' || phone.startsWith('whatsapp:')) {
      return phone;
    }
    return `whatsapp:${phone}`;
  }

  async sendMessageRaw(toPhone: string, text: string): Promise<boolean> {
    if (!this.client || !this.settings.fromNumber) {
      logger.error("Twilio messaging service not initialized. Cannot send message.");
      return false;
    }

    const message: TwilioOutboundMessage = {
      from: this.toAddress(this.settings.fromNumber),
      to: this.toAddress(toPhone),
      body: text,
    };

    try {
      const result = await this.client.messages.create(message);
      logger.trace({ sid: result.sid, phone: maskSender(toPhone) }, "Twilio message queued");
      return true;
    } catch (error) {
      logger.error({ err: error, phone: maskSender(toPhone) }, "Exception sending Twilio message");
      return false;
    }
  }

  /**
   * Sends a reply, converting markdown for WhatsApp and splitting it into
   * chunks Twilio accepts. Chunks are sent in order; a failed chunk is counted,
   * not thrown.
   */
  async sendMessage(toPhone: string, text: string): Promise<SendResult> {
    const formatted = this.settings.channel === 'whatsapp' ? markdownToWhatsApp(text) : text.trim();
    const messages = splitMessageByLength(formatted, this.settings.maxMessageLength);

    if (messages.length === 0) {
      logger.warn("No messages to send after processing text");
      return { successful: 0, failed: 0, results: [] };
    }

    const results: boolean[] = [];
    let successful = 0;
    let failed = 0;

    for (let i = 0; i < messages.length; i++) {
      const result = await this.sendMessageRaw(toPhone, messages[i]);
      results.push(result);
      if (result) {
        successful++;
      } else {
        failed++;
      }

      // Keep multi-part replies in order on the handset
      if (i < messages.length - 1 && this.settings.chunkDelayMs > 0) {
        await new Promise(resolve => setTimeout(resolve, this.settings.chunkDelayMs));
      }
    }

    logger.trace({ total: messages.length, successful, failed }, "Message sending completed");
    return { successful, failed, results };
  }

  isInitialized(): boolean {
    return !!(this.client && this.settings.fromNumber);
  }
}
