import type { TwilioChannel } from '../../config';

export interface TwilioSettings {
  accountSid?: string;
  authToken?: string;
  fromNumber?: string;
  channel: TwilioChannel;
  maxMessageLength: number;
  chunkDelayMs: number;
}

export interface TwilioOutboundMessage {
  from: string;
  to: string;
  body: string;
}

export interface SendResult {
  successful: number;
  failed: number;
  results: boolean[];
}
