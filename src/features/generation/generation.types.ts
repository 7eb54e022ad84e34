export interface GeneratedReply {
  text: string;
}

export interface GenerationSettings {
  model: string;
  temperature: number;
  maxTokens: number;
  timeoutMs?: number;
  maxRetries: number;
  apiKey?: string;
}
