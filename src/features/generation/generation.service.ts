import { BaseMessage, HumanMessage, SystemMessage } from '@langchain/core/messages';
import { ChatOpenAI } from '@langchain/openai';
import { logger, trackMetric } from '../../core/observability/logging';
import { GenerationError, errorMessage } from '../../core/errors';
import { GeneratedReply, GenerationSettings } from './generation.types';

export function createChatModel(settings: GenerationSettings): ChatOpenAI {
  return new ChatOpenAI({
    model: settings.model,
    temperature: settings.temperature,
    maxTokens: settings.maxTokens,
    timeout: settings.timeoutMs,
    maxRetries: settings.maxRetries,
    apiKey: settings.apiKey,
  });
}

/** Flattens message content parts into plain text. */
export function contentToText(content: BaseMessage['content']): string {
  if (typeof content === 'string') {
    return content;
  }
  return content
    .map(part => ('text' in part && typeof part.text === 'string' ? part.text : ''))
    .join('');
}

export class GenerationService {
  constructor(private readonly llm: ChatOpenAI, private readonly systemPrompt: string) {}

  get model(): string {
    return this.llm.model;
  }

  get temperature(): number | undefined {
    return this.llm.temperature;
  }

  /**
   * One completion for one user message, prefixed with the fixed counsellor
   * preamble. Throws GenerationError when the call fails or the model
   * answers with nothing.
   */
  async generateReply(text: string): Promise<GeneratedReply> {
    const startTime = Date.now();
    let content: BaseMessage['content'];

    try {
      const result = await this.llm.invoke([
        new SystemMessage(this.systemPrompt),
        new HumanMessage(text),
      ]);
      content = result.content;
    } catch (error) {
      logger.error({ err: error, model: this.llm.model }, "Error calling the generation service");
      throw new GenerationError(`Generation failed: ${errorMessage(error)}`, { cause: error });
    }

    trackMetric("generation_time_ms", Date.now() - startTime, { model: this.llm.model });

    const reply = contentToText(content).trim();
    if (reply === '') {
      logger.warn({ model: this.llm.model }, "Generation service returned an empty completion");
      throw new GenerationError('Generation returned no text');
    }
    return { text: reply };
  }
}
