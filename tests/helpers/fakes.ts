import {
  InferenceErrorKind,
  InferenceMeta,
  InferencePurpose,
  InferenceResult,
  InferenceService,
  InferenceRequest,
} from '../../src/llm/inference-service';
import { ReplyTemplates } from '../../src/assembler/response-assembler';
import { KnowledgeEntry } from '../../src/knowledge/types';
import { KnowledgeService } from '../../src/knowledge/knowledge-service';
import { loadSeedAccounts, MockCommercePlatform } from '../../src/platform/mock-platform';

export type FakeReply = { data: unknown } | { error: InferenceErrorKind } | { hang: true };
type Handler = (userContent: string) => FakeReply | Promise<FakeReply>;

export const FAKE_META: InferenceMeta = {
  provider: 'openai',
  model: 'gpt-4.1-mini',
  latencyMs: 5,
  usage: { promptTokens: 100, completionTokens: 20, totalTokens: 120 },
  costUsd: 0.0001,
};

/**
 * Scripted inference: one handler per purpose. Replies go through the
 * caller's validator like real model output does.
 */
export class FakeInference implements InferenceService {
  readonly calls: Array<{ purpose: InferencePurpose; system: string; user: string }> = [];
  private readonly handlers = new Map<InferencePurpose, Handler>();

  on(purpose: InferencePurpose, reply: FakeReply | Handler): this {
    this.handlers.set(purpose, typeof reply === 'function' ? reply : () => reply);
    return this;
  }

  count(purpose?: InferencePurpose): number {
    return purpose ? this.calls.filter((c) => c.purpose === purpose).length : this.calls.length;
  }

  async infer<T>(prompt: InferenceRequest<T>): Promise<InferenceResult<T>> {
    const system = prompt.messages.find((m) => m.role === 'system')?.content ?? '';
    const user = prompt.messages.filter((m) => m.role === 'user').map((m) => m.content).join('\n');
    this.calls.push({ purpose: prompt.purpose, system, user });

    const handler = this.handlers.get(prompt.purpose);
    if (!handler) {
      return { ok: false, error: { kind: 'service', message: `no scripted reply for ${prompt.purpose}` }, meta: FAKE_META };
    }
    const reply = await handler(user);
    if ('hang' in reply) {
      return new Promise<InferenceResult<T>>(() => undefined);
    }
    if ('error' in reply) {
      return { ok: false, error: { kind: reply.error, message: reply.error }, meta: FAKE_META };
    }
    if (!prompt.validate(reply.data)) {
      return { ok: false, error: { kind: 'malformed', message: 'schema mismatch' }, meta: FAKE_META };
    }
    return { ok: true, data: reply.data, meta: FAKE_META };
  }
}

// ───── Canned model outputs ─────

export function classification(
  primary: string,
  overrides: Record<string, unknown> = {},
): FakeReply {
  return {
    data: {
      primary_category: primary,
      secondary_category: null,
      urgency: 'low',
      sentiment: 'positive',
      identifier: null,
      escalation_signal: false,
      ...overrides,
    },
  };
}

export function generation(reply: string, toolCalls: Array<{ name: string; args?: Record<string, unknown> }> = []): FakeReply {
  return {
    data: {
      reply,
      tool_calls: toolCalls.map((c) => ({ name: c.name, args: c.args ?? {} })),
    },
  };
}

export function verdict(
  decision: 'send' | 'draft' | 'escalate' = 'send',
  confidence: 'low' | 'medium' | 'high' = 'high',
  checks: Partial<Record<'safety' | 'tone' | 'accuracy' | 'completeness', number>> = {},
): FakeReply {
  return {
    data: {
      decision,
      confidence,
      checks: { safety: 1, tone: 0.95, accuracy: 0.95, completeness: 0.9, ...checks },
    },
  };
}

export const NOT_OUTSTANDING: FakeReply = { data: { is_outstanding: false, trigger: 'none', confidence: 'high' } };

// ───── Fixtures ─────

/** One opener and one closer per list, so framing is the same for every session */
export const TEST_TEMPLATES: ReplyTemplates = {
  openers: {
    shipping: ['Shipping opener.'],
    payment: ['Payment opener.'],
    subscription: ['Subscription opener.'],
    damage: ['Damage opener.'],
    retention: ['Retention opener.'],
    gratitude: ['Gratitude opener.'],
    general: ['General opener.'],
  },
  closers: ['Closing line.'],
  sign_off: ['Warm regards,', 'The Support Team'],
};

export const TEST_KNOWLEDGE: Record<string, KnowledgeEntry[]> = {
  general: [
    { id: 'gen-1', title: 'Feedback', content: 'We share customer compliments with the packing team.', tags: ['thanks', 'feedback'] },
  ],
  subscription: [
    { id: 'sub-1', title: 'Pausing', content: 'Subscriptions can be paused for one to three months.', tags: ['pause', 'skip'] },
  ],
  shipping: [
    { id: 'ship-1', title: 'Delivery times', content: 'Boxes usually arrive within ten business days.', tags: ['delivery', 'tracking'] },
  ],
  'outstanding-cases': [
    {
      id: 'oc-1',
      title: 'Reaction after eating product',
      content: 'Customer reported hives and swelling after tasting the spice blend.',
      tags: ['allergic_reaction', 'hives', 'swelling'],
    },
  ],
};

export function testKnowledge(): KnowledgeService {
  return new KnowledgeService('/nonexistent-knowledge-dir', TEST_KNOWLEDGE);
}

export function testPlatform(): MockCommercePlatform {
  return new MockCommercePlatform(loadSeedAccounts());
}
