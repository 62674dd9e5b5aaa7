import client from 'prom-client';

export const registry = new client.Registry();
client.collectDefaultMetrics({ register: registry });

// ───── HTTP ─────

export const httpRequestDuration = new client.Histogram({
  name: 'http_request_duration_seconds',
  help: 'HTTP request duration',
  labelNames: ['method', 'route', 'status_code'] as const,
  buckets: [0.05, 0.1, 0.25, 0.5, 1, 2.5, 5, 10, 30],
  registers: [registry],
});

// ───── Turn pipeline ─────

export const turnsProcessed = new client.Counter({
  name: 'turns_processed_total',
  help: 'Turns that reached a final disposition',
  labelNames: ['disposition', 'tier', 'category'] as const,
  registers: [registry],
});

export const turnsSuspended = new client.Counter({
  name: 'turns_suspended_total',
  help: 'Turns suspended awaiting a human confirmation',
  registers: [registry],
});

export const turnsCancelled = new client.Counter({
  name: 'turns_cancelled_total',
  help: 'Turns discarded by caller cancellation before evaluation',
  registers: [registry],
});

export const stageDuration = new client.Histogram({
  name: 'turn_stage_duration_seconds',
  help: 'Duration of each pipeline stage',
  labelNames: ['stage'] as const,
  buckets: [0.005, 0.05, 0.25, 0.5, 1, 2.5, 5, 10, 30],
  registers: [registry],
});

export const persistenceFailures = new client.Counter({
  name: 'turn_persistence_failures_total',
  help: 'History appends that failed after a disposition was computed',
  registers: [registry],
});

export const safetyPreFilterMatches = new client.Counter({
  name: 'safety_prefilter_matches_total',
  help: 'Messages short-circuited by the safety pre-filter',
  labelNames: ['trigger'] as const,
  registers: [registry],
});

export const classifierFallbacks = new client.Counter({
  name: 'classifier_fallbacks_total',
  help: 'Classifications replaced by the unknown-category default',
  registers: [registry],
});

export const outstandingDetections = new client.Counter({
  name: 'outstanding_detections_total',
  help: 'Outstanding detector verdicts',
  labelNames: ['outstanding', 'source'] as const,
  registers: [registry],
});

export const evalTierOneViolations = new client.Counter({
  name: 'eval_fast_fail_violations_total',
  help: 'Replies stopped by the fast-fail evaluation tier',
  labelNames: ['violation'] as const,
  registers: [registry],
});

// ───── Inference ─────

export const inferenceRequests = new client.Counter({
  name: 'inference_requests_total',
  help: 'Inference calls by purpose and outcome',
  labelNames: ['purpose', 'status'] as const,
  registers: [registry],
});

export const inferenceCostUsd = new client.Counter({
  name: 'inference_cost_usd_total',
  help: 'Estimated inference spend',
  labelNames: ['purpose', 'model'] as const,
  registers: [registry],
});

export const llmRequestDuration = new client.Histogram({
  name: 'llm_request_duration_seconds',
  help: 'LLM provider request duration',
  labelNames: ['provider', 'model', 'status'] as const,
  buckets: [0.25, 0.5, 1, 2, 5, 10, 20, 30],
  registers: [registry],
});

export const llmProviderFailovers = new client.Counter({
  name: 'llm_provider_failovers_total',
  help: 'Failovers between LLM providers',
  labelNames: ['from_provider', 'to_provider', 'reason'] as const,
  registers: [registry],
});

export const llmTokenUsage = new client.Counter({
  name: 'llm_token_usage_total',
  help: 'Tokens consumed per provider and model',
  labelNames: ['provider', 'model', 'token_type'] as const,
  registers: [registry],
});

// ───── Tools & governance ─────

export const toolCallDuration = new client.Histogram({
  name: 'tool_call_duration_seconds',
  help: 'Action executor call duration',
  labelNames: ['tool', 'status'] as const,
  buckets: [0.05, 0.1, 0.25, 0.5, 1, 2.5, 5, 15],
  registers: [registry],
});

export const toolRetries = new client.Counter({
  name: 'tool_retries_total',
  help: 'Tool calls retried after a failed attempt',
  labelNames: ['tool'] as const,
  registers: [registry],
});

export const governedToolCalls = new client.Counter({
  name: 'governed_tool_calls_total',
  help: 'Tool calls by governance mode and terminal state',
  labelNames: ['tool', 'mode', 'state'] as const,
  registers: [registry],
});

export const governanceViolations = new client.Counter({
  name: 'governance_violations_total',
  help: 'Rejected tool calls and refused transitions',
  labelNames: ['kind'] as const,
  registers: [registry],
});

export const confirmationsResolved = new client.Counter({
  name: 'confirmations_resolved_total',
  help: 'Confirmation resolutions by outcome',
  labelNames: ['outcome'] as const,
  registers: [registry],
});

export const toolCallStateTransitions = new client.Counter({
  name: 'tool_call_state_transitions_total',
  help: 'Tool call state transitions',
  labelNames: ['from', 'to'] as const,
  registers: [registry],
});

export const duplicateMessages = new client.Counter({
  name: 'duplicate_messages_total',
  help: 'Inbound messages dropped as duplicates',
  registers: [registry],
});

export async function getMetrics(): Promise<string> {
  return registry.metrics();
}

export function getContentType(): string {
  return registry.contentType;
}
