import express from "express";
import { ServiceContainer } from './core/container';
import { MessagingService } from './features/messaging/messaging.service';
import { createTwilioSignatureMiddleware } from './core/messaging/twilio/twilio-webhook.middleware';
import { logger } from './core/observability/logging';
import { getPackageVersion } from './core/config/config.version-info';
import { metricsRegistry } from './core/observability/metrics';

export function setupRoutes(app: express.Application, services: ServiceContainer): void {
  const messagingService = new MessagingService(services);
  const { config } = services;

  const verifyTwilioSignature = createTwilioSignatureMiddleware({
    enabled: config.twilio.validateSignature,
    authToken: config.twilio.authToken,
    publicBaseUrl: config.publicBaseUrl,
  });

  // Prometheus Metrics Endpoint
  app.get("/metrics", async (_req, res) => {
    try {
      res.set('Content-Type', metricsRegistry.contentType);
      res.end(await metricsRegistry.metrics());
    } catch (error) {
      logger.error({ err: error }, "Error rendering metrics");
      res.status(500).end();
    }
  });

  // Inbound messages (Twilio WhatsApp / SMS)
  app.post("/webhook", express.urlencoded({ extended: false }), verifyTwilioSignature, async (req, res) => {
    try {
      await messagingService.handleWebhookMessage(req.body, res);
    } catch (error) {
      logger.error({ err: error }, "Error in /webhook endpoint");
      res.status(500).send("Internal server error while processing webhook.");
    }
  });

  // Health check endpoint
  app.get("/health", (_req, res) => {
    res.json({
      timestamp: new Date().toISOString(),
      version: {
        package: getPackageVersion(),
      },
      services: {
        twilio: services.twilioService.isInitialized() ? "enabled" : "failed",
        openai: {
          model: services.generationService.model,
          temperature: services.generationService.temperature,
        },
        feedbackSheet: services.feedbackService.isEnabled() ? "enabled" : "disabled",
      }
    });
  });

  // Root endpoint
  app.get("/", (_req, res) => {
    res.send("career relay is running");
  });
}
