import { z } from 'zod';
import { IANAZone } from 'luxon';
import { ConfigError } from '../errors';

export const DEFAULT_SYSTEM_PROMPT = [
  "You're a career counsellor helping Pakistani high school students.",
  'From what the student tells you, suggest 3–5 realistic career paths that might suit a student from Pakistan.',
  'For each option, include:',
  '- A simple explanation',
  '- How this career is doing in Pakistan',
  '- Which degree is usually needed',
  '- Top universities in Pakistan offering it',
  'At the end, briefly explain how to get into each university you mentioned (which admission tests to take and how to prepare).',
  'Make sure all information is accurate. Reply as if you are talking directly to the student.',
].join('\n');

export const DEFAULT_FEEDBACK_INVITATION =
  'Was this bot helpful? Reply with "feedback:" followed by your thoughts to send us feedback or suggestions.';

export const DEFAULT_FALLBACK_REPLY =
  "⚠️ Sorry, I couldn't come up with an answer right now. Please try again in a few minutes.";

const booleanFlag = (fallback: boolean) =>
  z
    .enum(['true', 'false', '1', '0'])
    .optional()
    .transform((value) => (value === undefined ? fallback : value === 'true' || value === '1'));

const optionalString = z
  .string()
  .optional()
  .transform((value) => (value && value.trim() !== '' ? value.trim() : undefined));

const envSchema = z.object({
  PORT: z.coerce.number().int().positive().default(8080),
  PUBLIC_BASE_URL: optionalString,

  OPENAI_API_KEY: optionalString,
  OPENAI_MODEL_NAME: z.string().default('gpt-3.5-turbo'),
  OPENAI_TEMPERATURE: z.coerce.number().min(0).max(2).default(0.7),
  OPENAI_MAX_TOKENS: z.coerce.number().int().positive().default(750),
  OPENAI_TIMEOUT_MS: z.coerce.number().int().positive().optional(),
  OPENAI_MAX_RETRIES: z.coerce.number().int().min(0).default(2),
  SYSTEM_PROMPT: optionalString,
  FALLBACK_REPLY: optionalString,
  FEEDBACK_INVITATION: z.string().optional(),

  TWILIO_ACCOUNT_SID: optionalString,
  TWILIO_AUTH_TOKEN: optionalString,
  TWILIO_WHATSAPP_NUMBER: optionalString,
  TWILIO_CHANNEL: z.enum(['whatsapp', 'sms']).default('whatsapp'),
  TWILIO_VALIDATE_SIGNATURE: booleanFlag(true),
  MESSAGE_MAX_LENGTH: z.coerce.number().int().min(1).max(1600).default(1500),
  MESSAGE_CHUNK_DELAY_MS: z.coerce.number().int().min(0).default(1000),

  GOOGLE_SHEETS_SPREADSHEET_ID: optionalString,
  GOOGLE_SHEETS_RANGE: z.string().default('Feedback!A:C'),
  GOOGLE_SERVICE_ACCOUNT_EMAIL: optionalString,
  GOOGLE_PRIVATE_KEY: optionalString,
  FEEDBACK_TIMEZONE: z
    .string()
    .default('UTC')
    .refine((zone) => IANAZone.isValidZone(zone), { message: 'not a known IANA time zone' }),
});

export type TwilioChannel = 'whatsapp' | 'sms';

export interface SheetsConfig {
  spreadsheetId: string;
  range: string;
  clientEmail: string;
  privateKey: string;
}

export interface AppConfig {
  server: {
    port: number;
  };
  publicBaseUrl?: string;
  openai: {
    apiKey?: string;
    model: string;
    temperature: number;
    maxTokens: number;
    timeoutMs?: number;
    maxRetries: number;
  };
  turn: {
    systemPrompt: string;
    fallbackReply: string;
    /** Appended to generated replies; empty disables it. */
    feedbackInvitation: string;
  };
  twilio: {
    accountSid?: string;
    authToken?: string;
    fromNumber?: string;
    channel: TwilioChannel;
    validateSignature: boolean;
    maxMessageLength: number;
    chunkDelayMs: number;
  };
  /** Absent when no spreadsheet is configured; feedback is then dropped. */
  sheets?: SheetsConfig;
  feedback: {
    timezone: string;
  };
}

/**
 * Builds the application configuration from environment variables.
 * Throws ConfigError listing every invalid or inconsistent variable.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    throw new ConfigError(
      parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`)
    );
  }
  const vars = parsed.data;
  const issues: string[] = [];

  if (vars.TWILIO_VALIDATE_SIGNATURE && !vars.PUBLIC_BASE_URL) {
    issues.push('PUBLIC_BASE_URL: required when TWILIO_VALIDATE_SIGNATURE is enabled');
  }

  const sheetVars = [
    vars.GOOGLE_SHEETS_SPREADSHEET_ID,
    vars.GOOGLE_SERVICE_ACCOUNT_EMAIL,
    vars.GOOGLE_PRIVATE_KEY,
  ];
  let sheets: SheetsConfig | undefined;
  if (vars.GOOGLE_SHEETS_SPREADSHEET_ID && vars.GOOGLE_SERVICE_ACCOUNT_EMAIL && vars.GOOGLE_PRIVATE_KEY) {
    sheets = {
      spreadsheetId: vars.GOOGLE_SHEETS_SPREADSHEET_ID,
      range: vars.GOOGLE_SHEETS_RANGE,
      clientEmail: vars.GOOGLE_SERVICE_ACCOUNT_EMAIL,
      // Keys pasted into .env files carry literal "\n" sequences
      privateKey: vars.GOOGLE_PRIVATE_KEY.replace(/\\n/g, '\n'),
    };
  } else if (sheetVars.some((value) => value !== undefined)) {
    issues.push(
      'GOOGLE_SHEETS_SPREADSHEET_ID, GOOGLE_SERVICE_ACCOUNT_EMAIL and GOOGLE_PRIVATE_KEY must be set together'
    );
  }

  if (issues.length > 0) {
    throw new ConfigError(issues);
  }

  return {
    server: { port: vars.PORT },
    publicBaseUrl: vars.PUBLIC_BASE_URL?.replace(/\/+$/, ''),
    openai: {
      apiKey: vars.OPENAI_API_KEY,
      model: vars.OPENAI_MODEL_NAME,
      temperature: vars.OPENAI_TEMPERATURE,
      maxTokens: vars.OPENAI_MAX_TOKENS,
      timeoutMs: vars.OPENAI_TIMEOUT_MS,
      maxRetries: vars.OPENAI_MAX_RETRIES,
    },
    turn: {
      systemPrompt: vars.SYSTEM_PROMPT ?? DEFAULT_SYSTEM_PROMPT,
      fallbackReply: vars.FALLBACK_REPLY ?? DEFAULT_FALLBACK_REPLY,
      feedbackInvitation: (vars.FEEDBACK_INVITATION ?? DEFAULT_FEEDBACK_INVITATION).trim(),
    },
    twilio: {
      accountSid: vars.TWILIO_ACCOUNT_SID,
      authToken: vars.TWILIO_AUTH_TOKEN,
      fromNumber: vars.TWILIO_WHATSAPP_NUMBER,
      channel: vars.TWILIO_CHANNEL,
      validateSignature: vars.TWILIO_VALIDATE_SIGNATURE,
      maxMessageLength: vars.MESSAGE_MAX_LENGTH,
      chunkDelayMs: vars.MESSAGE_CHUNK_DELAY_MS,
    },
    sheets,
    feedback: {
      timezone: vars.FEEDBACK_TIMEZONE,
    },
  };
}
