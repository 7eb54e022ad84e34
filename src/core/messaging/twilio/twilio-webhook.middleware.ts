import { Request, Response, NextFunction, RequestHandler } from 'express';
import twilio from 'twilio';
import { logger } from '../../observability/logging';

export interface TwilioSignatureOptions {
  enabled: boolean;
  authToken?: string;
  /** Public origin Twilio posts to, e.g. https://relay.example.com */
  publicBaseUrl?: string;
}

/** Form fields as Express' urlencoded parser leaves them. */
export function toFormParams(body: unknown): Record<string, string> {
  const params: Record<string, string> = {};
  if (typeof body !== 'object' || body === null) {
    return params;
  }
  for (const [key, value] of Object.entries(body)) {
    if (typeof value === 'string') {
      params[key] = value;
    }
  }
  return params;
}

/**
 * Rejects webhook calls whose X-Twilio-Signature does not match the request
 * URL and form parameters signed with the account auth token.
 */
export const createTwilioSignatureMiddleware = (options: TwilioSignatureOptions): RequestHandler => {
  return (req: Request, res: Response, next: NextFunction) => {
    if (!options.enabled) {
      next();
      return;
    }

    const signature = req.header('x-twilio-signature');
    if (!signature) {
      logger.warn('Missing X-Twilio-Signature header in Twilio webhook request.');
      res.sendStatus(401);
      return;
    }

    if (!options.authToken || !options.publicBaseUrl) {
      logger.error('TWILIO_AUTH_TOKEN or PUBLIC_BASE_URL is not configured.');
      res.sendStatus(500);
      return;
    }

    try {
      const url = `${options.publicBaseUrl}${req.originalUrl}`;
      const valid = twilio.validateRequest(options.authToken, signature, url, toFormParams(req.body));

      if (!valid) {
        logger.warn({ url }, 'Invalid Twilio webhook signature.');
        res.sendStatus(403);
        return;
      }

      next();
    } catch (error) {
      logger.error({ err: error }, 'Error verifying Twilio webhook signature');
      res.sendStatus(500);
    }
  };
};
