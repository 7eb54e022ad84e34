import { Registry, Counter, collectDefaultMetrics } from 'prom-client';

export const metricsRegistry = new Registry();

collectDefaultMetrics({ register: metricsRegistry, prefix: 'career_relay_' });

// --- Turns ---
export const turnsTotal = new Counter({
  name: 'career_relay_turns_total',
  help: 'Inbound messages handled, by outcome',
  registers: [metricsRegistry],
  labelNames: ['outcome']
});

export const generationFailuresTotal = new Counter({
  name: 'career_relay_generation_failures_total',
  help: 'Generation calls that failed or returned no text',
  registers: [metricsRegistry]
});

export const deliveryFailuresTotal = new Counter({
  name: 'career_relay_delivery_failures_total',
  help: 'Replies that could not be delivered to the sender',
  registers: [metricsRegistry]
});

// --- Feedback ---
export const feedbackRecordsTotal = new Counter({
  name: 'career_relay_feedback_records_total',
  help: 'Feedback appends to the spreadsheet store, by status',
  registers: [metricsRegistry],
  labelNames: ['status']
});

// --- Errors ---
export const errorsTotal = new Counter({
  name: 'career_relay_errors_total',
  help: 'Error level log lines, by component',
  registers: [metricsRegistry],
  labelNames: ['component']
});

export type TurnOutcomeLabel = 'replied' | 'fallback' | 'ignored' | 'delivery_failed' | 'rejected';

export const recordTurn = (outcome: TurnOutcomeLabel) => {
  turnsTotal.inc({ outcome });
};

export const recordGenerationFailure = () => {
  generationFailuresTotal.inc();
};

export const recordDeliveryFailure = () => {
  deliveryFailuresTotal.inc();
};

export const recordFeedback = (status: 'appended' | 'failed' | 'dropped') => {
  feedbackRecordsTotal.inc({ status });
};

export const recordError = (component: string) => {
  errorsTotal.inc({ component });
};
