import { InferenceMeta, InferencePurpose } from './inference-service';

export interface InferenceCallRecord {
  purpose: InferencePurpose;
  provider?: string;
  model?: string;
  latencyMs: number;
  totalTokens: number;
  costUsd: number;
}

export interface TurnCost {
  calls: InferenceCallRecord[];
  totalCostUsd: number;
  totalTokens: number;
  totalLatencyMs: number;
}

/** Per-turn accumulator of inference cost and latency */
export class CostLedger {
  private readonly calls: InferenceCallRecord[];

  /** `initial` carries calls already made for the turn, e.g. before it was suspended */
  constructor(initial: InferenceCallRecord[] = []) {
    this.calls = [...initial];
  }

  record(purpose: InferencePurpose, meta: InferenceMeta): void {
    this.calls.push({
      purpose,
      provider: meta.provider,
      model: meta.model,
      latencyMs: meta.latencyMs,
      totalTokens: meta.usage?.totalTokens ?? 0,
      costUsd: meta.costUsd,
    });
  }

  count(purpose?: InferencePurpose): number {
    return purpose ? this.calls.filter((c) => c.purpose === purpose).length : this.calls.length;
  }

  summary(): TurnCost {
    return {
      calls: [...this.calls],
      totalCostUsd: Number(this.calls.reduce((sum, c) => sum + c.costUsd, 0).toFixed(6)),
      totalTokens: this.calls.reduce((sum, c) => sum + c.totalTokens, 0),
      totalLatencyMs: this.calls.reduce((sum, c) => sum + c.latencyMs, 0),
    };
  }
}
