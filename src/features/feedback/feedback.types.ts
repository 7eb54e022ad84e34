export interface FeedbackRecord {
  senderId: string;
  feedback: string;
  /** Local time in the configured zone, "yyyy-MM-dd HH:mm:ss" */
  timestamp: string;
}

/** Append-only tabular storage for feedback rows. */
export interface FeedbackStore {
  append(record: FeedbackRecord): Promise<void>;
}

export const FEEDBACK_HEADER = ['Phone', 'Feedback', 'Time'] as const;
