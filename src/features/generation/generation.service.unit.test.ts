import { HumanMessage, SystemMessage } from '@langchain/core/messages';
import { ChatOpenAI } from '@langchain/openai';
import { GenerationService, contentToText, createChatModel } from './generation.service';
import { GenerationError } from '../../core/errors';

jest.mock('../../core/observability/logging', () => ({
  logger: {
    info: jest.fn(),
    error: jest.fn(),
    warn: jest.fn(),
  },
  trackMetric: jest.fn(),
}));

const SYSTEM_PROMPT = 'You are a career counsellor.';

describe('GenerationService', () => {
  let invoke: jest.Mock;
  let service: GenerationService;

  beforeEach(() => {
    invoke = jest.fn();
    const llm = { invoke, model: 'gpt-3.5-turbo', temperature: 0.7 } as unknown as ChatOpenAI;
    service = new GenerationService(llm, SYSTEM_PROMPT);
  });

  it('sends the preamble and the user text and returns the completion', async () => {
    invoke.mockResolvedValue({ content: 'Consider biomedical research or healthcare.' });

    const reply = await service.generateReply('What career suits someone who likes biology?');

    expect(reply).toEqual({ text: 'Consider biomedical research or healthcare.' });
    expect(invoke).toHaveBeenCalledTimes(1);
    const [messages] = invoke.mock.calls[0];
    expect(messages).toHaveLength(2);
    expect(messages[0]).toBeInstanceOf(SystemMessage);
    expect(messages[0].content).toBe(SYSTEM_PROMPT);
    expect(messages[1]).toBeInstanceOf(HumanMessage);
    expect(messages[1].content).toBe('What career suits someone who likes biology?');
  });

  it('trims the completion', async () => {
    invoke.mockResolvedValue({ content: '\n  Try data science.  \n' });
    await expect(service.generateReply('hi')).resolves.toEqual({ text: 'Try data science.' });
  });

  it('wraps SDK failures in GenerationError', async () => {
    invoke.mockRejectedValue(new Error('Request timed out.'));

    const result = service.generateReply('hi');

    await expect(result).rejects.toBeInstanceOf(GenerationError);
    await expect(result).rejects.toThrow('Generation failed: Request timed out.');
  });

  it('treats a blank completion as a failure', async () => {
    invoke.mockResolvedValue({ content: '   ' });
    await expect(service.generateReply('hi')).rejects.toThrow('Generation returned no text');
  });

  it('exposes the model settings', () => {
    expect(service.model).toBe('gpt-3.5-turbo');
    expect(service.temperature).toBe(0.7);
  });
});

describe('contentToText', () => {
  it('joins the text parts of structured content', () => {
    expect(
      contentToText([
        { type: 'text', text: 'Hello ' },
        { type: 'image_url', image_url: 'https://example.com/a.png' },
        { type: 'text', text: 'there' },
      ])
    ).toBe('Hello there');
  });
});

describe('createChatModel', () => {
  it('configures the chat model from settings', () => {
    const llm = createChatModel({
      model: 'gpt-4o-mini',
      temperature: 0.2,
      maxTokens: 300,
      maxRetries: 0,
      apiKey: 'test-key',
    });

    expect(llm.model).toBe('gpt-4o-mini');
    expect(llm.temperature).toBe(0.2);
    expect(llm.maxTokens).toBe(300);
  });
});
