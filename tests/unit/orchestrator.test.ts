import { buildPipeline, Pipeline } from '../../src/app';
import { HANDOFF_REPLY } from '../../src/safety/pre-filter';
import { InvalidTurnError, TurnOutcome, CompletedTurn, SuspendedTurnOutcome } from '../../src/orchestrator/types';
import { TurnRequest } from '../../src/config/types';
import { HistoryStore } from '../../src/memory/types';
import { MockCommercePlatform } from '../../src/platform/mock-platform';
import {
  classification,
  FakeInference,
  generation,
  NOT_OUTSTANDING,
  TEST_TEMPLATES,
  testKnowledge,
  testPlatform,
  verdict,
} from '../helpers/fakes';

const MAYA = 'maya.levin@example.com';
const HOUR_MS = 60 * 60 * 1000;

function completed(outcome: TurnOutcome): CompletedTurn {
  if (outcome.status !== 'completed') throw new Error(`expected completed turn, got ${outcome.status}`);
  return outcome;
}

function suspended(outcome: TurnOutcome): SuspendedTurnOutcome {
  if (outcome.status !== 'awaiting_confirmation') throw new Error(`expected suspended turn, got ${outcome.status}`);
  return outcome;
}

describe('Orchestrator', () => {
  let fake: FakeInference;
  let platform: MockCommercePlatform;
  let pipeline: Pipeline;

  const turn = (text: string, overrides: Partial<TurnRequest> = {}): TurnRequest => ({
    text,
    channel: 'chat',
    session: { sessionId: 'sess-1', contactEmail: MAYA },
    ...overrides,
  });

  const build = (history?: HistoryStore) => {
    pipeline = buildPipeline({
      inference: fake,
      platform,
      knowledge: testKnowledge(),
      templates: TEST_TEMPLATES,
      history,
    });
  };

  beforeEach(() => {
    fake = new FakeInference();
    platform = testPlatform();
    build();
  });

  describe('safety pre-filter', () => {
    it('should escalate a legal threat without any inference call', async () => {
      const outcome = completed(await pipeline.orchestrator.processTurn(turn('I will sue you if my box is late again')));

      expect(outcome.evalResult).toEqual({
        disposition: 'escalate',
        confidence: 'high',
        reasons: ['legal_threat'],
        tier: 'fast-fail',
      });
      expect(outcome.reply.text).toBe(HANDOFF_REPLY);
      expect(outcome.reply.wrapped).toBe(false);
      expect(outcome.classification).toBeUndefined();
      expect(fake.count()).toBe(0);
    });

    it('should record the escalated turn in history as unknown', async () => {
      await pipeline.orchestrator.processTurn(turn('I am calling my lawyer today'));

      const [record] = await pipeline.history.recentTurns('sess-1', 5);
      expect(record.category).toBe('unknown');
      expect(record.disposition).toBe('escalate');
      expect(record.reply).toBe(HANDOFF_REPLY);
    });
  });

  describe('straight-through turns', () => {
    it('should send a gratitude reply framed with the customer name', async () => {
      fake
        .on('classify', classification('gratitude'))
        .on('generate', generation('Thank you so much for the kind words!'))
        .on('outstanding', NOT_OUTSTANDING)
        .on('judge', verdict());

      const outcome = completed(
        await pipeline.orchestrator.processTurn(turn('Thank you so much, the last box was lovely!')),
      );

      expect(outcome.evalResult).toEqual({
        disposition: 'send',
        confidence: 'high',
        reasons: [],
        tier: 'judge',
        scores: { safety: 1, tone: 0.95, accuracy: 0.95, completeness: 0.9 },
      });
      expect(outcome.reply.text).toBe(
        'Dear Maya,\n\nGratitude opener.\n\nThank you so much for the kind words!\n\nClosing line.\n\nWarm regards,\nThe Support Team',
      );
      expect(outcome.reply.format).toBe('text');
      expect(outcome.persisted).toBe(true);
      expect(outcome.degraded).toBe(false);
      expect(fake.count()).toBe(4);
      expect(outcome.cost.calls).toHaveLength(4);
      expect(outcome.cost.totalTokens).toBe(480);
    });

    it('should draft with unclassified when the classifier times out', async () => {
      fake
        .on('classify', { error: 'timeout' })
        .on('generate', generation('We have your message and will look into it.'))
        .on('outstanding', NOT_OUTSTANDING)
        .on('judge', verdict());

      const outcome = completed(await pipeline.orchestrator.processTurn(turn('Something about my order')));

      expect(fake.count('classify')).toBe(2);
      expect(outcome.classification?.fallback).toBe(true);
      expect(outcome.evalResult.disposition).toBe('draft');
      expect(outcome.evalResult.reasons).toEqual(['unclassified', 'auto_send_disabled']);
    });

    it('should draft when a rule flags an outstanding case', async () => {
      fake
        .on('classify', classification('customization_request'))
        .on('generate', generation('I am so sorry to hear that. Our team will look into the blend.'))
        .on('judge', verdict());

      const outcome = completed(
        await pipeline.orchestrator.processTurn(turn('The spice blend in my box gave me hives')),
      );

      expect(fake.count('outstanding')).toBe(0);
      expect(outcome.outstanding).toEqual({ isOutstanding: true, trigger: 'allergic_reaction', confidence: 'high' });
      expect(outcome.evalResult.disposition).toBe('draft');
      expect(outcome.evalResult.reasons).toEqual(['outstanding_signal:allergic_reaction']);

      const [record] = await pipeline.history.recentTurns('sess-1', 1);
      expect(record.outstandingTrigger).toBe('allergic_reaction');
    });

    it('should mark the turn degraded when outstanding detection fails', async () => {
      fake
        .on('classify', classification('gratitude'))
        .on('generate', generation('Thank you for the lovely note!'))
        .on('outstanding', { error: 'service' })
        .on('judge', verdict());

      const outcome = completed(await pipeline.orchestrator.processTurn(turn('Thanks a lot for the lovely note')));

      expect(outcome.degraded).toBe(true);
      expect(outcome.outstanding?.trigger).toBe('detection_error');
      expect(outcome.evalResult.disposition).toBe('draft');
      expect(outcome.evalResult.reasons).toEqual(['outstanding_unverified', 'degraded']);
    });

    it('should escalate with generation_failed when the draft cannot be produced', async () => {
      fake
        .on('classify', classification('gratitude'))
        .on('generate', { error: 'malformed' })
        .on('outstanding', NOT_OUTSTANDING);

      const outcome = completed(await pipeline.orchestrator.processTurn(turn('Thanks a lot for the lovely note')));

      expect(outcome.evalResult).toEqual({
        disposition: 'escalate',
        confidence: 'high',
        reasons: ['generation_failed'],
        tier: 'fast-fail',
      });
      expect(outcome.reply.text).toBe(HANDOFF_REPLY);
      expect(outcome.degraded).toBe(true);
      expect(fake.count('judge')).toBe(0);
    });

    it('should drop tool calls outside the category allow-list', async () => {
      fake
        .on('classify', classification('gratitude'))
        .on('generate', generation('Thank you!', [{ name: 'pause_subscription', args: { duration_months: 1 } }]))
        .on('outstanding', NOT_OUTSTANDING)
        .on('judge', verdict());

      const outcome = completed(await pipeline.orchestrator.processTurn(turn('Thanks a lot for the lovely note')));

      expect(outcome.toolCalls).toEqual([]);
      expect(outcome.rejectedToolCalls).toEqual([
        { name: 'pause_subscription', args: { duration_months: 1 }, reason: 'tool_not_allowed' },
      ]);
      expect(outcome.evalResult.disposition).toBe('send');
    });

    it('should run read-only tools and substitute their result into the reply', async () => {
      fake
        .on('classify', classification('shipping_or_delivery_question', { sentiment: 'neutral' }))
        .on('generate', generation('Here is the latest: {{track_package}}', [{ name: 'track_package' }]))
        .on('outstanding', NOT_OUTSTANDING)
        .on('judge', verdict());

      const outcome = completed(await pipeline.orchestrator.processTurn(turn('Where is my box?')));

      expect(outcome.toolCalls).toHaveLength(1);
      expect(outcome.toolCalls[0].state).toBe('completed');
      expect(outcome.reply.text).toContain(
        'Here is the latest: Order ord_501 is in transit with UPS (tracking number 1Z999AA10000000001), estimated delivery 2026-10-21.',
      );
    });

    it('should still return the disposition when history cannot be written', async () => {
      build({
        recentTurns: async () => [],
        append: async () => {
          throw new Error('disk full');
        },
      });
      fake
        .on('classify', classification('gratitude'))
        .on('generate', generation('Thank you!'))
        .on('outstanding', NOT_OUTSTANDING)
        .on('judge', verdict());

      const outcome = completed(await pipeline.orchestrator.processTurn(turn('Thanks a lot for the lovely note')));

      expect(outcome.persisted).toBe(false);
      expect(outcome.evalResult.disposition).toBe('send');
    });

    it('should emit turn_finalized once per turn', async () => {
      const finalized = jest.fn();
      pipeline.events.on('turn_finalized', finalized);

      await pipeline.orchestrator.processTurn(turn('I want to sue'));

      expect(finalized).toHaveBeenCalledTimes(1);
      expect(finalized.mock.calls[0][0].persisted).toBe(true);
    });
  });

  describe('validation', () => {
    it('should reject an empty message', async () => {
      await expect(pipeline.orchestrator.processTurn(turn('   '))).rejects.toMatchObject({ reason: 'empty_message' });
    });

    it('should reject an oversized message', async () => {
      await expect(pipeline.orchestrator.processTurn(turn('a'.repeat(8001)))).rejects.toBeInstanceOf(InvalidTurnError);
    });

    it('should reject an unsupported channel', async () => {
      const request: TurnRequest = JSON.parse('{"text":"hello","channel":"fax"}');
      await expect(pipeline.orchestrator.processTurn(request)).rejects.toMatchObject({ reason: 'invalid_channel' });
    });

    it('should assign a session id when none is given', async () => {
      const outcome = await pipeline.orchestrator.processTurn({ text: 'I will sue', channel: 'email' });
      expect(outcome.sessionId).toMatch(/^[0-9a-f-]{36}$/);
    });
  });

  describe('cancellation', () => {
    it('should discard a turn cancelled before it starts', async () => {
      const controller = new AbortController();
      controller.abort();

      const outcome = await pipeline.orchestrator.processTurn(turn('Thanks!'), { signal: controller.signal });

      expect(outcome).toMatchObject({ status: 'cancelled', stage: 'pre_filter' });
      expect(await pipeline.history.recentTurns('sess-1', 5)).toEqual([]);
    });

    it('should stop between stages when the caller cancels mid-turn', async () => {
      const controller = new AbortController();
      fake.on('classify', () => {
        controller.abort();
        return classification('gratitude');
      });

      const outcome = await pipeline.orchestrator.processTurn(turn('Thanks!'), { signal: controller.signal });

      expect(outcome).toMatchObject({ status: 'cancelled', stage: 'context' });
      expect(fake.count('generate')).toBe(0);
    });
  });

  describe('confirmation flow', () => {
    const pauseTurn = async (): Promise<SuspendedTurnOutcome> => {
      fake
        .on('classify', classification('skip_or_pause_request', { sentiment: 'neutral' }))
        .on('generate', generation('Your pause request has been sent to our team for confirmation.', [
          { name: 'pause_subscription', args: { duration_months: 2 } },
        ]))
        .on('outstanding', NOT_OUTSTANDING)
        .on('judge', verdict());
      return suspended(await pipeline.orchestrator.processTurn(turn('Can I pause my subscription for two months?')));
    };

    it('should suspend on a confirm-required call without judging', async () => {
      const outcome = await pauseTurn();

      expect(outcome.pendingCalls).toHaveLength(1);
      expect(outcome.pendingCalls[0]).toMatchObject({
        tool: 'pause_subscription',
        label: 'Pause subscription',
        args: { duration_months: 2 },
        sessionId: 'sess-1',
      });
      expect(outcome.cost.calls).toHaveLength(3);
      expect(fake.count('judge')).toBe(0);
      expect(await pipeline.orchestrator.pendingConfirmations('sess-1')).toHaveLength(1);
    });

    it('should note a rejected action in the resumed reply', async () => {
      const pauseSpy = jest.spyOn(platform, 'pauseSubscription');
      const { pendingCalls } = await pauseTurn();

      const ack = await pipeline.orchestrator.resolveConfirmation(pendingCalls[0].callId, false, { actor: 'agent-7' });

      expect(ack.accepted).toBe(true);
      expect(ack.state).toBe('cancelled');
      expect(pauseSpy).not.toHaveBeenCalled();
      expect(ack.outcome?.reply.notes).toEqual(['Pause subscription: this action was not taken.']);
      expect(ack.outcome?.toolCalls[0].cancelReason).toBe('rejected');
      expect(ack.outcome?.cost.calls).toHaveLength(4);
      expect(await pipeline.orchestrator.pendingConfirmations('sess-1')).toEqual([]);
    });

    it('should execute an approved action exactly once', async () => {
      const pauseSpy = jest.spyOn(platform, 'pauseSubscription');
      const { pendingCalls } = await pauseTurn();
      const callId = pendingCalls[0].callId;

      const first = await pipeline.orchestrator.resolveConfirmation(callId, true);
      const second = await pipeline.orchestrator.resolveConfirmation(callId, true);

      expect(first.accepted).toBe(true);
      expect(first.state).toBe('completed');
      expect(first.result?.success).toBe(true);
      expect(first.outcome?.evalResult.disposition).toBe('send');
      expect(first.outcome?.reply.notes).toEqual([]);
      expect(second).toMatchObject({ accepted: false, alreadyResolved: true, state: 'completed' });
      expect(second.outcome).toBeUndefined();
      expect(pauseSpy).toHaveBeenCalledTimes(1);
      expect(pauseSpy).toHaveBeenCalledWith('cus_1001', 2, expect.anything());
    });

    it('should treat an approval after the deadline as expired', async () => {
      const pauseSpy = jest.spyOn(platform, 'pauseSubscription');
      const { pendingCalls } = await pauseTurn();

      const ack = await pipeline.orchestrator.resolveConfirmation(pendingCalls[0].callId, true, {
        now: pendingCalls[0].deadline + 1,
      });

      expect(ack).toMatchObject({ accepted: true, reason: 'confirmation_expired', state: 'cancelled' });
      expect(pauseSpy).not.toHaveBeenCalled();
    });

    it('should expire overdue confirmations and resume their turns', async () => {
      await pauseTurn();

      const swept = await pipeline.orchestrator.expireOverdueConfirmations(Date.now() + 2 * HOUR_MS);

      expect(swept).toEqual({ expired: 1, resumed: 1 });
      const [record] = await pipeline.history.recentTurns('sess-1', 1);
      expect(record.reply).toContain('Pause subscription: this action was not taken.');
    });

    it('should report an unknown call id', async () => {
      const ack = await pipeline.orchestrator.resolveConfirmation('no-such-call', true);
      expect(ack).toEqual({ callId: 'no-such-call', accepted: false, reason: 'unknown_call' });
    });

    it('should cancel the action when the suspension cannot be stored', async () => {
      jest.spyOn(pipeline.confirmations, 'suspend').mockRejectedValue(new Error('store down'));

      fake
        .on('classify', classification('skip_or_pause_request', { sentiment: 'neutral' }))
        .on('generate', generation('Your pause request has been sent to our team for confirmation.', [
          { name: 'pause_subscription', args: { duration_months: 2 } },
        ]))
        .on('outstanding', NOT_OUTSTANDING)
        .on('judge', verdict());

      const outcome = completed(
        await pipeline.orchestrator.processTurn(turn('Can I pause my subscription for two months?')),
      );

      expect(outcome.toolCalls[0].state).toBe('cancelled');
      expect(outcome.toolCalls[0].cancelReason).toBe('confirmation_unavailable');
      expect(outcome.reply.notes).toEqual([
        'Pause subscription: we could not process this request, so no change was made.',
      ]);
    });
  });
});
