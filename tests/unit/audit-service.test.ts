import { AuditService } from '../../src/audit/audit-service';
import { InMemoryAuditStore, verifyChain } from '../../src/audit/audit-store';

describe('AuditService', () => {
  let store: InMemoryAuditStore;
  let audit: AuditService;

  beforeEach(async () => {
    store = new InMemoryAuditStore();
    audit = new AuditService(store);
    await audit.init();
  });

  it('should chain each event to its predecessor', async () => {
    const first = await audit.record({
      category: 'tool_execution',
      action: 'tool_executed',
      actor: 'system',
      sessionId: 'sess-1',
      details: { tool: 'track_package' },
    });
    const second = await audit.record({
      category: 'confirmation',
      action: 'confirmation_approved',
      actor: 'agent-7',
      sessionId: 'sess-1',
      callId: 'call-1',
    });

    expect(first.previousHash).toBe('genesis');
    expect(second.previousHash).toBe(first.dataHash);
    expect(second.callId).toBe('call-1');
    expect(await store.head()).toBe(second.dataHash);
    expect(await audit.verifyIntegrity()).toEqual({ valid: true });
  });

  it('should keep the chain intact under concurrent appends', async () => {
    await Promise.all([
      audit.record({ category: 'turn', action: 'turn_finalized', actor: 'pipeline', sessionId: 'sess-1' }),
      audit.record({ category: 'turn', action: 'turn_finalized', actor: 'pipeline', sessionId: 'sess-2' }),
      audit.record({ category: 'governance_violation', action: 'tool_not_allowed', actor: 'pipeline', sessionId: 'sess-1' }),
    ]);

    const events = await store.query({});
    expect(events).toHaveLength(3);
    expect(await audit.verifyIntegrity()).toEqual({ valid: true });
  });

  it('should detect a modified event', async () => {
    const event = await audit.record({
      category: 'confirmation',
      action: 'confirmation_rejected',
      actor: 'agent-7',
      sessionId: 'sess-1',
    });
    await audit.record({ category: 'turn', action: 'turn_finalized', actor: 'pipeline', sessionId: 'sess-1' });

    const [stored] = await store.query({});
    stored.actor = 'someone-else';

    expect(await audit.verifyIntegrity()).toEqual({ valid: false, brokenAt: event.eventId });
  });

  it('should detect a broken link between events', async () => {
    await audit.record({ category: 'turn', action: 'turn_finalized', actor: 'pipeline' });
    const second = await audit.record({ category: 'turn', action: 'turn_finalized', actor: 'pipeline' });

    const events = await store.query({});
    expect(verifyChain([events[1]])).toEqual({ valid: false, brokenAt: second.eventId });
  });

  it('should redact contact details', async () => {
    const event = await audit.record({
      category: 'turn',
      action: 'turn_finalized',
      actor: 'pipeline',
      details: { note: 'from maya.levin@example.com' },
    });

    expect(event.details).toEqual({ note: 'from [EMAIL_REDACTED]' });
  });

  it('should filter the trail by session and category', async () => {
    await audit.record({ category: 'turn', action: 'turn_finalized', actor: 'pipeline', sessionId: 'sess-1', turnId: 't-1' });
    await audit.record({ category: 'governance_violation', action: 'tool_not_allowed', actor: 'pipeline', sessionId: 'sess-1' });
    await audit.record({ category: 'turn', action: 'turn_finalized', actor: 'pipeline', sessionId: 'sess-2' });

    const trail = await audit.trail({ sessionId: 'sess-1', category: 'turn' });

    expect(trail).toHaveLength(1);
    expect(trail[0]).toMatchObject({ sessionId: 'sess-1', turnId: 't-1', action: 'turn_finalized' });
  });

  it('should return only the most recent events under a limit', async () => {
    await audit.record({ category: 'turn', action: 'turn_finalized', actor: 'pipeline', turnId: 't-1' });
    await audit.record({ category: 'turn', action: 'turn_finalized', actor: 'pipeline', turnId: 't-2' });

    const trail = await audit.trail({ limit: 1 });

    expect(trail.map((e) => e.turnId)).toEqual(['t-2']);
  });

  it('should continue an existing chain after a restart', async () => {
    const last = await audit.record({ category: 'turn', action: 'turn_finalized', actor: 'pipeline', sessionId: 'sess-1' });

    const restarted = new AuditService(store);
    await restarted.init();
    const next = await restarted.record({ category: 'turn', action: 'turn_finalized', actor: 'pipeline', sessionId: 'sess-1' });

    expect(next.previousHash).toBe(last.dataHash);
    expect(await restarted.verifyIntegrity()).toEqual({ valid: true });
  });
});
