import { GeneratedReply } from '../generation/generation.types';
import { SendResult } from '../../core/messaging/twilio/twilio.types';

export interface InboundMessage {
  senderId: string;
  text: string;
  receivedAt: Date;
  messageSid?: string;
}

export interface ReplyGenerator {
  generateReply(text: string): Promise<GeneratedReply>;
}

export interface ReplyMessenger {
  sendMessage(to: string, text: string): Promise<SendResult>;
}

export interface FeedbackRecorder {
  recordFeedback(senderId: string, feedback: string, at: Date): Promise<boolean>;
}

export interface TurnSettings {
  /** Sent instead of a generated reply when generation fails */
  fallbackReply: string;
  /** Footer for generated replies that tells users how to leave feedback */
  feedbackInvitation?: string;
}

export interface TurnDependencies {
  generator: ReplyGenerator;
  messenger: ReplyMessenger;
  feedback: FeedbackRecorder;
  settings: TurnSettings;
}

export type TurnStatus = 'replied' | 'fallback' | 'ignored';

export interface TurnOutcome {
  status: TurnStatus;
  reply?: string;
  feedbackRecorded: boolean;
}
