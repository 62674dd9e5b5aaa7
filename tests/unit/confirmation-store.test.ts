import { InMemoryConfirmationStore } from '../../src/governance/confirmation-store';
import { GovernedToolCall, SuspendedTurn } from '../../src/governance/types';

const HOUR_MS = 60 * 60 * 1000;

function parkedCall(callId: string, turnId: string): GovernedToolCall {
  return {
    callId,
    turnId,
    sessionId: 'sess-1',
    name: 'skip_month',
    args: { month: '2026-11' },
    mode: 'confirm_required',
    state: 'awaiting_confirmation',
    deadline: 2 * HOUR_MS,
    transitions: [],
  };
}

function suspended(turnId: string, calls: GovernedToolCall[]): SuspendedTurn {
  return {
    turn: { turnId, sessionId: 'sess-1', text: 'Please skip November', channel: 'chat', receivedAt: 0 },
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
    rejectedToolCalls: [],
    displays: [],
    callIds: calls.map((c) => c.callId),
    costCalls: [],
    suspendedAt: 0,
  };
}

describe('InMemoryConfirmationStore', () => {
  let clock: number;
  let store: InMemoryConfirmationStore;

  beforeEach(() => {
    clock = 0;
    store = new InMemoryConfirmationStore(24 * HOUR_MS, () => clock);
  });

  it('should grant a resolution claim once until it is released', async () => {
    expect(await store.claimResolution('c1')).toBe(true);
    expect(await store.claimResolution('c1')).toBe(false);

    await store.releaseResolution('c1');

    expect(await store.claimResolution('c1')).toBe(true);
  });

  it('should evict turns past retention with their calls and claims', async () => {
    const old = parkedCall('c1', 't-1');
    await store.suspend(suspended('t-1', [old]), [old]);
    await store.claimResolution('c1');
    await store.claimResume('t-1');

    clock = 25 * HOUR_MS;
    const fresh = parkedCall('c2', 't-2');
    await store.suspend(suspended('t-2', [fresh]), [fresh]);

    expect(await store.loadTurn('t-1')).toBeNull();
    expect(await store.getCall('c1')).toBeNull();
    expect(await store.claimResolution('c1')).toBe(true);
    expect(await store.claimResume('t-1')).toBe(true);
    expect((await store.getCall('c2'))?.state).toBe('awaiting_confirmation');
  });

  it('should keep turns inside the retention window', async () => {
    const call = parkedCall('c1', 't-1');
    await store.suspend(suspended('t-1', [call]), [call]);

    clock = 23 * HOUR_MS;

    expect(store.evictExpired()).toBe(0);
    expect(await store.loadTurn('t-1')).not.toBeNull();
  });
});
