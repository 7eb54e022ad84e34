import { ChatOpenAI } from '@langchain/openai';
import { AppConfig } from './config';
import { logger } from './observability/logging';
import { TwilioMessagingService } from './messaging/twilio/twilio.service';
import { createChatModel, GenerationService } from '../features/generation/generation.service';
import { FeedbackService } from '../features/feedback/feedback.service';
import { createSheetsClient, SheetsFeedbackStore } from '../features/feedback/sheets-feedback.store';
import { TurnHandler } from '../features/turn/turn.handler';

export class ServiceContainer {
  public llm!: ChatOpenAI;
  public generationService!: GenerationService;
  public twilioService!: TwilioMessagingService;
  public feedbackStore!: SheetsFeedbackStore | null;
  public feedbackService!: FeedbackService;
  public turnHandler!: TurnHandler;

  constructor(public readonly config: AppConfig) {}

  async initialize(): Promise<void> {
    const { config } = this;

    this.llm = createChatModel(config.openai);
    this.generationService = new GenerationService(this.llm, config.turn.systemPrompt);

    this.twilioService = new TwilioMessagingService(config.twilio);

    this.feedbackStore = config.sheets
      ? new SheetsFeedbackStore(createSheetsClient(config.sheets), config.sheets.spreadsheetId, config.sheets.range)
      : null;
    this.feedbackService = new FeedbackService(this.feedbackStore, config.feedback.timezone);

    if (this.feedbackStore) {
      try {
        await this.feedbackStore.ensureHeader();
      } catch (error) {
        // Appends do not depend on the header row
        logger.error({ err: error }, "Could not check the feedback sheet header");
      }
    }

    this.turnHandler = new TurnHandler({
      generator: this.generationService,
      messenger: this.twilioService,
      feedback: this.feedbackService,
      settings: {
        fallbackReply: config.turn.fallbackReply,
        feedbackInvitation: config.turn.feedbackInvitation,
      },
    });
  }
}
