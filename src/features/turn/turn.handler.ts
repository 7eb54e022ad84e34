import { logger, maskSender, trackEvent } from '../../core/observability/logging';
import { recordDeliveryFailure, recordGenerationFailure, recordTurn } from '../../core/observability/metrics';
import { DeliveryError, GenerationError } from '../../core/errors';
import { extractFeedback } from '../feedback/feedback.utils';
import { InboundMessage, TurnDependencies, TurnOutcome } from './turn.types';

/**
 * Handles one inbound message: one generation call, one delivery to the
 * sender, and a feedback row when the text carries the feedback keyword.
 * Holds no state between turns.
 */
export class TurnHandler {
  constructor(private readonly deps: TurnDependencies) {}

  async handleTurn(message: InboundMessage): Promise<TurnOutcome> {
    const { senderId } = message;
    const text = message.text.trim();

    if (text === '') {
      logger.info({ phone: maskSender(senderId) }, "Empty message, nothing to answer");
      recordTurn('ignored');
      return { status: 'ignored', feedbackRecorded: false };
    }

    const feedback = extractFeedback(text);
    const composed = await this.composeReply(senderId, text);
    const { status } = composed;
    const reply = status === 'replied' && feedback === null
      ? this.withFeedbackInvitation(composed.reply)
      : composed.reply;

    const deliveryError = await this.deliver(senderId, reply);

    // Feedback is the user's data: it is stored even when the reply was lost
    const feedbackRecorded = feedback !== null
      ? await this.deps.feedback.recordFeedback(senderId, feedback, message.receivedAt)
      : false;

    if (deliveryError) {
      recordDeliveryFailure();
      recordTurn('delivery_failed');
      throw deliveryError;
    }

    recordTurn(status);
    trackEvent("response_sent", {
      userPhone: maskSender(senderId),
      responseLength: reply.length,
      status,
    });
    return { status, reply, feedbackRecorded };
  }

  private async composeReply(senderId: string, text: string): Promise<{ reply: string; status: 'replied' | 'fallback' }> {
    try {
      const generated = await this.deps.generator.generateReply(text);
      const reply = generated.text.trim();
      if (reply === '') {
        throw new GenerationError('Generation returned no text');
      }
      return { reply, status: 'replied' };
    } catch (error) {
      recordGenerationFailure();
      logger.warn({ err: error, phone: maskSender(senderId) }, "Generation failed, sending fallback reply");
      return { reply: this.deps.settings.fallbackReply, status: 'fallback' };
    }
  }

  private withFeedbackInvitation(reply: string): string {
    const invitation = this.deps.settings.feedbackInvitation?.trim();
    return invitation ? `${reply}\n\n${invitation}` : reply;
  }

  private async deliver(senderId: string, reply: string): Promise<DeliveryError | null> {
    try {
      const sent = await this.deps.messenger.sendMessage(senderId, reply);
      if (sent.successful === 0) {
        return new DeliveryError(senderId);
      }
      if (sent.failed > 0) {
        logger.warn({ phone: maskSender(senderId), successful: sent.successful, failed: sent.failed }, "Reply delivered partially");
      }
      return null;
    } catch (error) {
      return new DeliveryError(senderId, { cause: error });
    }
  }
}
