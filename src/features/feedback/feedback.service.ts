import { logger, maskSender } from '../../core/observability/logging';
import { recordFeedback } from '../../core/observability/metrics';
import { FeedbackRecord, FeedbackStore } from './feedback.types';
import { formatFeedbackTimestamp } from './feedback.utils';

export class FeedbackService {
  constructor(private readonly store: FeedbackStore | null, private readonly timezone: string) {
    if (!store) {
      logger.warn("No feedback spreadsheet configured. Feedback will be dropped.");
    }
  }

  isEnabled(): boolean {
    return this.store !== null;
  }

  /**
   * Appends one feedback row. Failures are logged and reported as false;
   * the row is not retried.
   */
  async recordFeedback(senderId: string, feedback: string, at: Date): Promise<boolean> {
    if (!this.store) {
      logger.warn({ phone: maskSender(senderId) }, "Dropping feedback, no store configured");
      recordFeedback('dropped');
      return false;
    }

    const record: FeedbackRecord = {
      senderId,
      feedback,
      timestamp: formatFeedbackTimestamp(at, this.timezone),
    };

    try {
      await this.store.append(record);
      recordFeedback('appended');
      return true;
    } catch (error) {
      logger.error({ err: error, phone: maskSender(senderId) }, "Error saving feedback");
      recordFeedback('failed');
      return false;
    }
  }
}
