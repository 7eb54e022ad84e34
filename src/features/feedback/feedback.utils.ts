import { DateTime } from 'luxon';
import { FeedbackRecord } from './feedback.types';

// "feedback: ...", "Feedback - ...", "FEEDBACK ..."
const FEEDBACK_PATTERN = /^\s*feedback(?:\s*[:\-]\s*|\s+)(\S[\s\S]*)$/i;

/**
 * Returns the feedback text of a message that starts with the feedback
 * keyword, or null when the message is not feedback.
 */
export function extractFeedback(text: string): string | null {
  const match = FEEDBACK_PATTERN.exec(text);
  if (!match) {
    return null;
  }
  const feedback = match[1].trim();
  return feedback === '' ? null : feedback;
}

export function formatFeedbackTimestamp(at: Date, timezone: string): string {
  return DateTime.fromJSDate(at, { zone: timezone }).toFormat('yyyy-MM-dd HH:mm:ss');
}

/** Column order of the feedback sheet. */
export function toFeedbackRow(record: FeedbackRecord): string[] {
  return [record.senderId, record.feedback, record.timestamp];
}
