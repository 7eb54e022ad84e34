import { DEFAULT_FALLBACK_REPLY, DEFAULT_FEEDBACK_INVITATION, DEFAULT_SYSTEM_PROMPT, loadConfig } from './index';
import { ConfigError } from '../errors';

describe('loadConfig', () => {
  const minimal = { TWILIO_VALIDATE_SIGNATURE: 'false' };

  it('applies defaults', () => {
    const config = loadConfig(minimal);

    expect(config.server.port).toBe(8080);
    expect(config.openai).toEqual({
      apiKey: undefined,
      model: 'gpt-3.5-turbo',
      temperature: 0.7,
      maxTokens: 750,
      timeoutMs: undefined,
      maxRetries: 2,
    });
    expect(config.turn).toEqual({
      systemPrompt: DEFAULT_SYSTEM_PROMPT,
      fallbackReply: DEFAULT_FALLBACK_REPLY,
      feedbackInvitation: DEFAULT_FEEDBACK_INVITATION,
    });
    expect(config.twilio.channel).toBe('whatsapp');
    expect(config.twilio.validateSignature).toBe(false);
    expect(config.twilio.maxMessageLength).toBe(1500);
    expect(config.twilio.chunkDelayMs).toBe(1000);
    expect(config.sheets).toBeUndefined();
    expect(config.feedback.timezone).toBe('UTC');
  });

  it('parses numeric and boolean variables', () => {
    const config = loadConfig({
      PORT: '3000',
      OPENAI_TEMPERATURE: '0.2',
      OPENAI_TIMEOUT_MS: '15000',
      TWILIO_VALIDATE_SIGNATURE: '1',
      PUBLIC_BASE_URL: 'https://relay.example.com/',
    });

    expect(config.server.port).toBe(3000);
    expect(config.openai.temperature).toBe(0.2);
    expect(config.openai.timeoutMs).toBe(15000);
    expect(config.twilio.validateSignature).toBe(true);
    expect(config.publicBaseUrl).toBe('https://relay.example.com');
  });

  it('requires PUBLIC_BASE_URL while signatures are validated', () => {
    expect(() => loadConfig({})).toThrow(ConfigError);
  });

  it('builds the sheets settings and expands escaped newlines in the key', () => {
    const config = loadConfig({
      ...minimal,
      GOOGLE_SHEETS_SPREADSHEET_ID: 'sheet-123',
      GOOGLE_SERVICE_ACCOUNT_EMAIL: 'relay@example.iam.gserviceaccount.com',
      GOOGLE_PRIVATE_KEY: 'line1\\nline2',
    });

    expect(config.sheets).toEqual({
      spreadsheetId: 'sheet-123',
      range: 'Feedback!A:C',
      clientEmail: 'relay@example.iam.gserviceaccount.com',
      privateKey: 'line1\nline2',
    });
  });

  it('rejects a partial sheets configuration', () => {
    expect(() => loadConfig({ ...minimal, GOOGLE_SHEETS_SPREADSHEET_ID: 'sheet-123' })).toThrow(
      /must be set together/
    );
  });

  it('reports every invalid variable', () => {
    try {
      loadConfig({ ...minimal, TWILIO_CHANNEL: 'fax', OPENAI_TEMPERATURE: '5' });
      throw new Error('expected loadConfig to throw');
    } catch (error) {
      expect(error).toBeInstanceOf(ConfigError);
      const issues = error instanceof ConfigError ? error.issues : [];
      expect(issues).toHaveLength(2);
      expect(issues.some(issue => issue.startsWith('TWILIO_CHANNEL'))).toBe(true);
      expect(issues.some(issue => issue.startsWith('OPENAI_TEMPERATURE'))).toBe(true);
    }
  });

  it('accepts an IANA feedback time zone', () => {
    expect(loadConfig({ ...minimal, FEEDBACK_TIMEZONE: 'Asia/Karachi' }).feedback.timezone).toBe('Asia/Karachi');
  });

  it('rejects an unknown feedback time zone', () => {
    expect(() => loadConfig({ ...minimal, FEEDBACK_TIMEZONE: 'Asia/Karachee' })).toThrow(
      'Invalid configuration: FEEDBACK_TIMEZONE: not a known IANA time zone'
    );
  });

  it('lets an empty FEEDBACK_INVITATION turn the invitation off', () => {
    expect(loadConfig({ ...minimal, FEEDBACK_INVITATION: '' }).turn.feedbackInvitation).toBe('');
  });

  it('mentions the feedback keyword in the default invitation', () => {
    expect(DEFAULT_FEEDBACK_INVITATION).toContain('"feedback:"');
  });
});
