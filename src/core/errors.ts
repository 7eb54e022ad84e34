export class ConfigError extends Error {
  constructor(public readonly issues: string[]) {
    super(`Invalid configuration: ${issues.join('; ')}`);
    this.name = 'ConfigError';
  }
}

/** The model call failed or produced no usable text. */
export class GenerationError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'GenerationError';
  }
}

/** No part of a reply reached the sender. */
export class DeliveryError extends Error {
  constructor(public readonly recipient: string, options?: { cause?: unknown }) {
    super(`Failed to deliver reply to ...${recipient.slice(-4)}`, options);
    this.name = 'DeliveryError';
  }
}

export const errorMessage = (error: unknown): string =>
  error instanceof Error ? error.message : String(error);
