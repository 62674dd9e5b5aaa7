import { allSettled, GovernContext, ToolCallGovernor } from '../../src/governance/tool-call-governor';
import { InMemoryConfirmationStore } from '../../src/governance/confirmation-store';
import { TurnEventBus } from '../../src/governance/events';
import { DisplayPayload, GovernedToolCall, SuspendedTurn } from '../../src/governance/types';
import { ProposedToolCall } from '../../src/generator/response-generator';
import { ActionToolName, ToolContext, ToolName, ToolResult } from '../../src/tools/types';

const NOW = 1_800_000_000_000;
const DEADLINE_MS = 60_000;

function propose(name: ToolName, args: Record<string, unknown> = {}, callId = `call-${name}`): ProposedToolCall {
  return { callId, turnId: 'turn-1', name, args };
}

function suspendedTurn(calls: GovernedToolCall[]): SuspendedTurn {
  return {
    turn: { turnId: 'turn-1', sessionId: 'sess-1', text: 'Please skip November', channel: 'chat', receivedAt: NOW },
    classification: {
      primary: 'skip_or_pause_request',
      urgency: 'low',
      sentiment: 'neutral',
      escalationSignal: false,
      fallback: false,
    },
    outstanding: { isOutstanding: false, trigger: 'none', confidence: 'high' },
    degraded: false,
    draftBody: 'Your request has been sent for confirmation.',
    customer: { name: 'Maya Levin', email: 'maya.levin@example.com' },
    rejectedToolCalls: [],
    displays: [],
    callIds: calls.map((c) => c.callId),
    costCalls: [],
    suspendedAt: NOW,
  };
}

describe('ToolCallGovernor', () => {
  let execute: jest.Mock<Promise<ToolResult>, [ActionToolName, Record<string, unknown>, ToolContext]>;
  let store: InMemoryConfirmationStore;
  let events: TurnEventBus;
  let governor: ToolCallGovernor;
  let ctx: GovernContext;

  beforeEach(() => {
    execute = jest.fn<Promise<ToolResult>, [ActionToolName, Record<string, unknown>, ToolContext]>();
    execute.mockResolvedValue({ success: true, data: { status: 'active' } });
    store = new InMemoryConfirmationStore();
    events = new TurnEventBus();
    governor = new ToolCallGovernor({ execute }, store, events, { confirmationDeadlineMs: DEADLINE_MS });
    ctx = {
      turnId: 'turn-1',
      sessionId: 'sess-1',
      customerEmail: 'maya.levin@example.com',
      suspend: (calls: GovernedToolCall[], _displays: DisplayPayload[]) => store.suspend(suspendedTurn(calls), calls),
    };
  });

  describe('govern', () => {
    it('should execute read-only calls immediately', async () => {
      const outcome = await governor.govern([propose('get_subscription')], ctx, NOW);

      expect(execute).toHaveBeenCalledWith('get_subscription', {}, {
        turnId: 'turn-1',
        sessionId: 'sess-1',
        customerEmail: 'maya.levin@example.com',
      });
      expect(outcome.calls[0].state).toBe('completed');
      expect(outcome.calls[0].result).toEqual({ success: true, data: { status: 'active' } });
      expect(outcome.pending).toEqual([]);
    });

    it('should fetch display calls through their read-only tool', async () => {
      const ready = jest.fn();
      events.on('display_ready', ready);

      const outcome = await governor.govern([propose('show_tracking', { order_id: 'ord_501' })], ctx, NOW);

      expect(execute).toHaveBeenCalledWith('track_package', { order_id: 'ord_501' }, expect.anything());
      expect(outcome.calls[0].state).toBe('displayed');
      expect(outcome.displays).toEqual([
        { callId: 'call-show_tracking', tool: 'show_tracking', widget: 'tracking', success: true, data: { status: 'active' } },
      ]);
      expect(ready).toHaveBeenCalledTimes(1);
    });

    it('should park confirm-required calls without executing them', async () => {
      const awaiting = jest.fn();
      events.on('awaiting_confirmation', awaiting);

      const outcome = await governor.govern([propose('skip_month', { month: '2026-11' })], ctx, NOW);

      expect(execute).not.toHaveBeenCalled();
      expect(outcome.calls[0].state).toBe('awaiting_confirmation');
      expect(outcome.pending).toEqual([
        {
          callId: 'call-skip_month',
          turnId: 'turn-1',
          sessionId: 'sess-1',
          tool: 'skip_month',
          label: 'Skip a month',
          args: { month: '2026-11' },
          deadline: NOW + DEADLINE_MS,
        },
      ]);
      expect(awaiting).toHaveBeenCalledWith(outcome.pending[0]);
      expect(await store.pendingForSession('sess-1')).toHaveLength(1);
    });

    it('should cancel a confirm-required call with invalid arguments', async () => {
      const suspend = jest.fn().mockResolvedValue(undefined);

      const outcome = await governor.govern(
        [propose('pause_subscription', { duration_months: 7 })],
        { ...ctx, suspend },
        NOW,
      );

      expect(outcome.calls[0].state).toBe('cancelled');
      expect(outcome.calls[0].cancelReason).toBe('invalid_arguments');
      expect(suspend).not.toHaveBeenCalled();
      expect(outcome.pending).toEqual([]);
    });

    it('should cancel parked calls when the suspension cannot be stored', async () => {
      const cancelled = jest.fn();
      events.on('action_cancelled', cancelled);

      const outcome = await governor.govern(
        [propose('skip_month', { month: '2026-11' })],
        { ...ctx, suspend: jest.fn().mockRejectedValue(new Error('store down')) },
        NOW,
      );

      expect(outcome.pending).toEqual([]);
      expect(outcome.calls[0].state).toBe('cancelled');
      expect(outcome.calls[0].cancelReason).toBe('confirmation_unavailable');
      expect(outcome.calls[0].transitions.map((t) => t.to)).toEqual(['awaiting_confirmation', 'rejected', 'cancelled']);
      expect(cancelled).toHaveBeenCalledWith(expect.objectContaining({ reason: 'confirmation_unavailable' }));
    });

    it('should park the normalized arguments that will execute', async () => {
      const outcome = await governor.govern(
        [propose('pause_subscription', { duration_months: '2', note: 'before the holidays' })],
        ctx,
        NOW,
      );

      expect(outcome.calls[0].args).toEqual({ duration_months: 2 });
      expect(outcome.pending[0].args).toEqual({ duration_months: 2 });
      expect((await store.getCall(outcome.calls[0].callId))?.args).toEqual({ duration_months: 2 });
    });

    it('should keep proposal order across modes', async () => {
      const outcome = await governor.govern(
        [propose('skip_month', { month: '2026-11' }), propose('get_subscription'), propose('show_tracking')],
        ctx,
        NOW,
      );

      expect(outcome.calls.map((c) => c.name)).toEqual(['skip_month', 'get_subscription', 'show_tracking']);
      expect(allSettled(outcome.calls)).toBe(false);
    });
  });

  describe('resolve', () => {
    const park = async () => {
      const outcome = await governor.govern([propose('skip_month', { month: '2026-11' })], ctx, NOW);
      execute.mockClear();
      return outcome.pending[0].callId;
    };

    it('should execute an approved call with the stored customer', async () => {
      const callId = await park();

      const resolution = await governor.resolve(callId, true, { actor: 'agent-7', now: NOW + 1000 });

      expect(resolution.status).toBe('resolved');
      expect(execute).toHaveBeenCalledWith('skip_month', { month: '2026-11' }, {
        turnId: 'turn-1',
        sessionId: 'sess-1',
        customerEmail: 'maya.levin@example.com',
      });
      const stored = await store.getCall(callId);
      expect(stored?.state).toBe('completed');
      expect(stored?.resolvedBy).toBe('agent-7');
      expect(allSettled(stored ? [stored] : [])).toBe(true);
    });

    it('should execute at most once under concurrent approvals', async () => {
      const callId = await park();

      const results = await Promise.all([
        governor.resolve(callId, true, { now: NOW + 1000 }),
        governor.resolve(callId, true, { now: NOW + 1000 }),
      ]);

      expect(execute).toHaveBeenCalledTimes(1);
      expect(results.map((r) => r.status).sort()).toEqual(['already_resolved', 'resolved']);
    });

    it('should cancel a rejected call without executing it', async () => {
      const callId = await park();

      const resolution = await governor.resolve(callId, false, { now: NOW + 1000 });

      expect(execute).not.toHaveBeenCalled();
      expect(resolution).toMatchObject({ status: 'resolved', expired: false });
      const stored = await store.getCall(callId);
      expect(stored?.cancelReason).toBe('rejected');
      expect(stored?.transitions.map((t) => t.to)).toEqual(['awaiting_confirmation', 'rejected', 'cancelled']);
    });

    it('should reject an approval that arrives at the deadline', async () => {
      const callId = await park();

      const resolution = await governor.resolve(callId, true, { now: NOW + DEADLINE_MS });

      expect(execute).not.toHaveBeenCalled();
      expect(resolution).toMatchObject({ status: 'resolved', expired: true });
      expect((await store.getCall(callId))?.cancelReason).toBe('confirmation_expired');
    });

    it('should report an already resolved call', async () => {
      const callId = await park();
      await governor.resolve(callId, false, { now: NOW + 1000 });

      const again = await governor.resolve(callId, true, { now: NOW + 2000 });

      expect(again.status).toBe('already_resolved');
      expect(execute).not.toHaveBeenCalled();
    });

    it('should leave the call resolvable when storing an approval fails', async () => {
      const callId = await park();
      const saveCall = store.saveCall.bind(store);
      jest.spyOn(store, 'saveCall').mockRejectedValueOnce(new Error('store down')).mockImplementation(saveCall);

      await expect(governor.resolve(callId, true, { now: NOW + 1000 })).rejects.toThrow('store down');

      expect(execute).not.toHaveBeenCalled();
      expect((await store.getCall(callId))?.state).toBe('awaiting_confirmation');

      const swept = await governor.resolve(callId, false, { actor: 'deadline', now: NOW + DEADLINE_MS + 60_000 });

      expect(swept).toMatchObject({ status: 'resolved', expired: true });
      const stored = await store.getCall(callId);
      expect(stored?.state).toBe('cancelled');
      expect(stored?.cancelReason).toBe('confirmation_expired');
      expect(execute).not.toHaveBeenCalled();
    });

    it('should let a rejection be retried after a failed store write', async () => {
      const callId = await park();
      const saveCall = store.saveCall.bind(store);
      jest.spyOn(store, 'saveCall').mockRejectedValueOnce(new Error('store down')).mockImplementation(saveCall);

      await expect(governor.resolve(callId, false, { now: NOW + 1000 })).rejects.toThrow('store down');
      const retried = await governor.resolve(callId, false, { now: NOW + 2000 });

      expect(retried).toMatchObject({ status: 'resolved', expired: false });
      expect((await store.getCall(callId))?.cancelReason).toBe('rejected');
    });

    it('should report an unknown call', async () => {
      expect(await governor.resolve('missing', true)).toEqual({ status: 'unknown_call', callId: 'missing' });
    });

    it('should list pending confirmations for a session', async () => {
      await park();

      const pending = await governor.pendingForSession('sess-1');

      expect(pending.map((p) => p.tool)).toEqual(['skip_month']);
      expect(await governor.pendingForSession('sess-2')).toEqual([]);
    });
  });
});
