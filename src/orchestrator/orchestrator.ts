import { v4 as uuidv4 } from 'uuid';
import type { Logger } from 'pino';
import {
  CancelledTurn,
  CompletedTurn,
  ConfirmationAck,
  InvalidTurnError,
  PipelineStage,
  TurnOutcome,
} from './types';
import {
  CHANNELS,
  ClassificationResult,
  ConversationTurn,
  EvalResult,
  OutstandingResult,
  SessionHint,
  TurnRequest,
} from '../config/types';
import { CategoryConfigTable } from '../config/category-config';
import { check as preFilterCheck, HANDOFF_REPLY } from '../safety/pre-filter';
import { MessageClassifier } from '../classifier/message-classifier';
import { ContextAssembler } from '../context/context-assembler';
import { GenerationResult, RejectedToolCall, ResponseGenerator } from '../generator/response-generator';
import { DETECTION_ERROR, OutstandingDetector } from '../outstanding/outstanding-detector';
import { allSettled, ToolCallGovernor } from '../governance/tool-call-governor';
import { ConfirmationStore } from '../governance/confirmation-store';
import { TurnEventBus } from '../governance/events';
import { DisplayPayload, GovernedToolCall, PendingConfirmation, SuspendedTurn } from '../governance/types';
import { AssembledReply, ResponseAssembler } from '../assembler/response-assembler';
import { EvaluationGate } from '../evaluation/evaluation-gate';
import { HistoryStore } from '../memory/types';
import { CostLedger } from '../llm/cost-ledger';
import { withTimeout } from '../resilience/timeout';
import { getAuditService } from '../audit/audit-service';
import { AuditAction, AuditCategory } from '../audit/types';
import { logger } from '../observability/logger';
import { createTraceContext, endSpan, startSpan, summarizeSpans, TraceContext } from '../observability/trace';
import {
  persistenceFailures,
  stageDuration,
  turnsCancelled,
  turnsProcessed,
  turnsSuspended,
} from '../observability/metrics';

export interface OrchestratorDeps {
  classifier: MessageClassifier;
  context: ContextAssembler;
  generator: ResponseGenerator;
  detector: OutstandingDetector;
  governor: ToolCallGovernor;
  assembler: ResponseAssembler;
  gate: EvaluationGate;
  history: HistoryStore;
  confirmations: ConfirmationStore;
  events: TurnEventBus;
  categories: CategoryConfigTable;
}

export interface OrchestratorOptions {
  maxMessageChars: number;
  /** Upper bound on the generator/detector join */
  joinTimeoutMs: number;
}

/** Everything the tail of the pipeline needs, whether the turn ran straight through or resumed */
interface FinalizeInput {
  turn: ConversationTurn;
  session?: SessionHint;
  classification: ClassificationResult;
  outstanding: OutstandingResult;
  degraded: boolean;
  draftBody: string;
  customerName?: string;
  calls: GovernedToolCall[];
  displays: DisplayPayload[];
  rejectedToolCalls: RejectedToolCall[];
  ledger: CostLedger;
  trace: TraceContext;
  log: Logger;
}

const HANDOFF_ASSEMBLED: AssembledReply = { text: HANDOFF_REPLY, format: 'text', wrapped: false, notes: [] };

/**
 * Runs one customer turn through the pipeline and owns every intermediate
 * result until the turn reaches a disposition or suspends on a confirmation.
 *
 * processTurn:  pre-filter → classify → context → (generate ‖ detect) → govern
 *               → assemble → evaluate → persist
 * resume:       resolveConfirmation → (all calls terminal) → assemble → evaluate → persist
 */
export class Orchestrator {
  private readonly log = logger.child({ component: 'orchestrator' });

  constructor(
    private readonly deps: OrchestratorDeps,
    private readonly options: OrchestratorOptions,
  ) {}

  async processTurn(request: TurnRequest, opts: { signal?: AbortSignal; now?: number } = {}): Promise<TurnOutcome> {
    const text = this.validate(request);
    const signal = opts.signal;
    const turn: ConversationTurn = {
      turnId: uuidv4(),
      sessionId: request.session?.sessionId || uuidv4(),
      text,
      channel: request.channel,
      receivedAt: opts.now ?? Date.now(),
    };
    const trace = createTraceContext({ turnId: turn.turnId, sessionId: turn.sessionId, channel: turn.channel });
    const log = this.log.child({ turnId: turn.turnId, sessionId: turn.sessionId, channel: turn.channel });
    const ledger = new CostLedger();

    if (signal?.aborted) return this.cancelled(turn, 'pre_filter', log);

    // 1. Safety pre-filter
    const match = await this.stage(trace, 'pre_filter', async () => preFilterCheck(text));
    if (match) {
      log.warn({ trigger: match.trigger }, 'Safety pre-filter matched; escalating');
      this.audit('escalation', 'safety_prefilter', turn, { trigger: match.trigger });
      return this.finishEarly(turn, {
        evalResult: { disposition: 'escalate', confidence: 'high', reasons: [match.trigger], tier: 'fast-fail' },
        ledger,
        trace,
        log,
      });
    }

    // 2. Classification
    if (signal?.aborted) return this.cancelled(turn, 'classify', log);
    const classification = await this.stage(trace, 'classify', () =>
      this.deps.classifier.classify(text, turn.channel, { signal, ledger }),
    );
    const category = classification.primary;
    log.info({ category, fallback: classification.fallback, urgency: classification.urgency }, 'Message classified');

    // 3. Context
    if (signal?.aborted) return this.cancelled(turn, 'context', log);
    const identifier = classification.identifier ?? request.session?.contactEmail?.toLowerCase();
    const bundle = await this.stage(trace, 'context', () =>
      this.deps.context.assemble(identifier, turn.sessionId, category, { signal }),
    );
    if (bundle.omitted.length > 0) {
      log.warn({ omitted: bundle.omitted }, 'Context assembled without some lookups');
    }

    // 4. Generation and outstanding detection, joined
    if (signal?.aborted) return this.cancelled(turn, 'generate', log);
    const joinMs = this.options.joinTimeoutMs;
    const [generated, detected] = await this.stage(trace, 'generate', () =>
      Promise.allSettled([
        withTimeout(
          'generate',
          joinMs,
          (s) => this.deps.generator.generate(category, bundle, text, { turnId: turn.turnId, signal: s, ledger }),
          signal,
        ),
        withTimeout(
          'outstanding',
          joinMs,
          (s) => this.deps.detector.detect(identifier, text, { signal: s, ledger }),
          signal,
        ),
      ]),
    );
    if (signal?.aborted) return this.cancelled(turn, 'govern', log);

    let outstanding: OutstandingResult;
    if (detected.status === 'fulfilled') {
      outstanding = detected.value;
    } else {
      log.warn({ err: detected.reason }, 'Outstanding detector did not finish; continuing degraded');
      outstanding = { ...DETECTION_ERROR };
    }
    const generation: GenerationResult =
      generated.status === 'fulfilled'
        ? generated.value
        : { ok: false, error: generated.reason instanceof Error ? generated.reason.name : 'join_failed' };
    const degraded = outstanding.trigger === DETECTION_ERROR.trigger || !generation.ok;

    if (!generation.ok) {
      log.error({ error: generation.error }, 'Generation failed; escalating');
      return this.finishEarly(turn, {
        evalResult: { disposition: 'escalate', confidence: 'high', reasons: ['generation_failed'], tier: 'fast-fail' },
        classification,
        outstanding,
        degraded,
        ledger,
        trace,
        log,
      });
    }

    // 5. Tool governance
    const customer = bundle.identity ? { name: bundle.identity.name, email: bundle.identity.email } : undefined;
    const governance = await this.stage(trace, 'govern', () =>
      this.deps.governor.govern(generation.toolCalls, {
        turnId: turn.turnId,
        sessionId: turn.sessionId,
        customerEmail: customer?.email,
        suspend: (calls, displays) => {
          const state: SuspendedTurn = {
            turn,
            session: request.session,
            classification,
            outstanding,
            degraded,
            draftBody: generation.draftBody,
            customer,
            rejectedToolCalls: generation.rejected,
            displays,
            callIds: calls.map((c) => c.callId),
            costCalls: ledger.summary().calls,
            suspendedAt: Date.now(),
          };
          return this.deps.confirmations.suspend(state, calls);
        },
      }),
    );

    // A persisted suspension outlives any cancellation: the reviewer still gets the calls
    if (governance.pending.length > 0) {
      turnsSuspended.inc();
      log.info({ pending: governance.pending.length, spans: summarizeSpans(trace) }, 'Turn suspended awaiting confirmation');
      return {
        status: 'awaiting_confirmation',
        turnId: turn.turnId,
        sessionId: turn.sessionId,
        classification,
        pendingCalls: governance.pending,
        toolCalls: governance.calls,
        displays: governance.displays,
        cost: ledger.summary(),
      };
    }
    if (signal?.aborted) return this.cancelled(turn, 'assemble', log);

    return this.finalize({
      turn,
      session: request.session,
      classification,
      outstanding,
      degraded,
      draftBody: generation.draftBody,
      customerName: customer?.name,
      calls: governance.calls,
      displays: governance.displays,
      rejectedToolCalls: generation.rejected,
      ledger,
      trace,
      log,
    });
  }

  /**
   * Apply a reviewer decision to a pending call. When it was the last open
   * call of its turn, the turn resumes and the completed outcome is returned.
   */
  async resolveConfirmation(
    callId: string,
    approve: boolean,
    opts: { actor?: string; now?: number } = {},
  ): Promise<ConfirmationAck> {
    const resolution = await this.deps.governor.resolve(callId, approve, opts);

    switch (resolution.status) {
      case 'unknown_call':
        return { callId, accepted: false, reason: 'unknown_call' };
      case 'already_resolved':
        return {
          callId,
          accepted: false,
          alreadyResolved: true,
          state: resolution.call.state,
          result: resolution.call.result,
        };
      case 'resolved': {
        const { call, expired } = resolution;
        const outcome = await this.resume(call.turnId);
        return {
          callId,
          accepted: true,
          reason: expired ? 'confirmation_expired' : undefined,
          state: call.state,
          result: call.result,
          outcome,
        };
      }
    }
  }

  /** Reject every pending call whose deadline has passed; their turns resume */
  async expireOverdueConfirmations(now = Date.now()): Promise<{ expired: number; resumed: number }> {
    const overdue = await this.deps.confirmations.overdue(now);
    let expired = 0;
    let resumed = 0;
    for (const callId of overdue) {
      try {
        const ack = await this.resolveConfirmation(callId, false, { actor: 'system', now });
        if (ack.accepted) expired++;
        if (ack.outcome) resumed++;
      } catch (err) {
        this.log.error({ err, callId }, 'Failed to expire overdue confirmation');
      }
    }
    if (overdue.length > 0) {
      this.log.info({ overdue: overdue.length, expired, resumed }, 'Overdue confirmations swept');
    }
    return { expired, resumed };
  }

  async pendingConfirmations(sessionId: string): Promise<PendingConfirmation[]> {
    return this.deps.governor.pendingForSession(sessionId);
  }

  // ───── Resume ─────

  private async resume(turnId: string): Promise<CompletedTurn | undefined> {
    const log = this.log.child({ turnId });
    const suspended = await this.deps.confirmations.loadTurn(turnId);
    if (!suspended) {
      log.warn('Suspended turn not found; cannot resume');
      return undefined;
    }

    const calls = await this.deps.confirmations.getCalls(suspended.callIds);
    if (calls.length !== suspended.callIds.length) {
      log.error({ expected: suspended.callIds.length, found: calls.length }, 'Suspended turn is missing calls');
      return undefined;
    }
    if (!allSettled(calls)) return undefined;
    if (!(await this.deps.confirmations.claimResume(turnId))) {
      log.info('Turn already resumed elsewhere');
      return undefined;
    }

    const { turn } = suspended;
    log.info({ sessionId: turn.sessionId }, 'Resuming suspended turn');
    return this.finalize({
      turn,
      session: suspended.session,
      classification: suspended.classification,
      outstanding: suspended.outstanding,
      degraded: suspended.degraded,
      draftBody: suspended.draftBody,
      customerName: suspended.customer?.name,
      calls,
      displays: suspended.displays,
      rejectedToolCalls: suspended.rejectedToolCalls,
      ledger: new CostLedger(suspended.costCalls),
      trace: createTraceContext({ turnId: turn.turnId, sessionId: turn.sessionId, channel: turn.channel }),
      log: log.child({ sessionId: turn.sessionId, resumed: true }),
    });
  }

  // ───── Tail of the pipeline ─────

  private async finalize(input: FinalizeInput): Promise<CompletedTurn> {
    const { turn, classification, trace } = input;
    const config = this.deps.categories.get(classification.primary);

    const reply = await this.stage(trace, 'assemble', async () =>
      this.deps.assembler.assemble({
        body: input.draftBody,
        templateGroup: config.templateGroup,
        sessionId: turn.sessionId,
        channel: turn.channel,
        customerName: input.customerName,
        contactName: input.session?.contactName,
        messageText: turn.text,
        calls: input.calls,
      }),
    );

    // Once a reply exists the gate always reaches a disposition
    const evalResult = await this.stage(trace, 'evaluate', () =>
      this.deps.gate.evaluate(
        {
          customerText: turn.text,
          reply: reply.text,
          category: classification.primary,
          outstanding: input.outstanding,
          degraded: input.degraded,
          toolEvidence: input.calls.map((call) => ({
            tool: call.name,
            state: call.state,
            success: call.result?.success,
            data: call.result?.data,
          })),
        },
        { ledger: input.ledger },
      ),
    );

    return this.complete(turn, {
      evalResult,
      reply,
      classification,
      outstanding: input.outstanding,
      toolCalls: input.calls,
      displays: input.displays,
      rejectedToolCalls: input.rejectedToolCalls,
      degraded: input.degraded,
      ledger: input.ledger,
      trace,
      log: input.log,
    });
  }

  /** Turns that end without a reply to grade: pre-filter matches and generation failures */
  private finishEarly(
    turn: ConversationTurn,
    parts: {
      evalResult: EvalResult;
      classification?: ClassificationResult;
      outstanding?: OutstandingResult;
      degraded?: boolean;
      ledger: CostLedger;
      trace: TraceContext;
      log: Logger;
    },
  ): Promise<CompletedTurn> {
    return this.complete(turn, {
      ...parts,
      reply: HANDOFF_ASSEMBLED,
      toolCalls: [],
      displays: [],
      rejectedToolCalls: [],
      degraded: parts.degraded ?? false,
    });
  }

  private async complete(
    turn: ConversationTurn,
    parts: {
      evalResult: EvalResult;
      reply: AssembledReply;
      classification?: ClassificationResult;
      outstanding?: OutstandingResult;
      toolCalls: GovernedToolCall[];
      displays: DisplayPayload[];
      rejectedToolCalls: RejectedToolCall[];
      degraded: boolean;
      ledger: CostLedger;
      trace: TraceContext;
      log: Logger;
    },
  ): Promise<CompletedTurn> {
    const { evalResult, log } = parts;
    const category = parts.classification?.primary ?? 'unknown';

    let persisted = true;
    try {
      await this.deps.history.append(turn, {
        category,
        disposition: evalResult.disposition,
        tier: evalResult.tier,
        reasons: evalResult.reasons,
        reply: parts.reply.text,
        outstandingTrigger: parts.outstanding?.isOutstanding ? parts.outstanding.trigger : undefined,
      });
    } catch (err) {
      persisted = false;
      persistenceFailures.inc();
      log.error({ err }, 'History append failed; returning disposition unpersisted');
    }

    const cost = parts.ledger.summary();
    turnsProcessed.inc({ disposition: evalResult.disposition, tier: evalResult.tier, category });
    this.audit('turn', 'turn_finalized', turn, {
      category,
      disposition: evalResult.disposition,
      tier: evalResult.tier,
      reasons: evalResult.reasons,
      persisted,
      costUsd: cost.totalCostUsd,
    });
    this.deps.events.emit('turn_finalized', { turnId: turn.turnId, sessionId: turn.sessionId, evalResult, persisted });

    log.info(
      {
        category,
        disposition: evalResult.disposition,
        tier: evalResult.tier,
        reasons: evalResult.reasons,
        persisted,
        costUsd: cost.totalCostUsd,
        spans: summarizeSpans(parts.trace),
      },
      'Turn finalized',
    );

    return {
      status: 'completed',
      turnId: turn.turnId,
      sessionId: turn.sessionId,
      evalResult,
      reply: parts.reply,
      classification: parts.classification,
      outstanding: parts.outstanding,
      toolCalls: parts.toolCalls,
      displays: parts.displays,
      rejectedToolCalls: parts.rejectedToolCalls,
      degraded: parts.degraded,
      persisted,
      cost,
    };
  }

  // ───── Helpers ─────

  private validate(request: TurnRequest): string {
    if (!CHANNELS.some((channel) => channel === request.channel)) {
      throw new InvalidTurnError('invalid_channel', `Unsupported channel: ${String(request.channel)}`);
    }
    const text = typeof request.text === 'string' ? request.text.trim() : '';
    if (text.length === 0) {
      throw new InvalidTurnError('empty_message', 'Message text is empty');
    }
    if (text.length > this.options.maxMessageChars) {
      throw new InvalidTurnError(
        'message_too_long',
        `Message exceeds ${this.options.maxMessageChars} characters`,
      );
    }
    return text;
  }

  private cancelled(turn: ConversationTurn, stage: PipelineStage, log: Logger): CancelledTurn {
    turnsCancelled.inc();
    log.info({ stage }, 'Turn cancelled by caller; discarded');
    return { status: 'cancelled', turnId: turn.turnId, sessionId: turn.sessionId, stage };
  }

  private async stage<T>(trace: TraceContext, name: PipelineStage, work: () => Promise<T>): Promise<T> {
    const span = startSpan(trace, name);
    try {
      const result = await work();
      stageDuration.observe({ stage: name }, endSpan(span) / 1000);
      return result;
    } catch (err) {
      stageDuration.observe({ stage: name }, endSpan(span, 'error') / 1000);
      throw err;
    }
  }

  private audit<C extends AuditCategory>(
    category: C,
    action: AuditAction<C>,
    turn: ConversationTurn,
    details: Record<string, unknown>,
  ): void {
    getAuditService()?.recordQuietly({
      category,
      action,
      actor: 'pipeline',
      sessionId: turn.sessionId,
      turnId: turn.turnId,
      details: { channel: turn.channel, ...details },
    });
  }
}
