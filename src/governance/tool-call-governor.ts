import { ConfirmationStore } from './confirmation-store';
import { TurnEventBus } from './events';
import { isTerminal, ToolCallStateMachine, toolCallStateMachine } from './tool-call-state';
import { CancelReason, DisplayPayload, GovernedToolCall, PendingConfirmation } from './types';
import { ProposedToolCall } from '../generator/response-generator';
import { TOOL_CATALOG } from '../tools/catalog';
import { validateToolArgs } from '../tools/handlers';
import {
  ActionExecutor,
  ConfirmRequiredToolName,
  isConfirmRequiredTool,
  isDisplayTool,
  isReadOnlyTool,
  ReadOnlyToolName,
  ToolContext,
} from '../tools/types';
import { getAuditService } from '../audit/audit-service';
import { AuditAction, AuditCategory } from '../audit/types';
import { logger } from '../observability/logger';
import { confirmationsResolved, governanceViolations, governedToolCalls } from '../observability/metrics';

export interface GovernContext {
  turnId: string;
  sessionId: string;
  customerEmail?: string;
  /**
   * Persists the suspended turn. Called once, after every proposal has been
   * governed, when at least one call awaits confirmation.
   */
  suspend(calls: GovernedToolCall[], displays: DisplayPayload[]): Promise<void>;
}

export interface GovernanceOutcome {
  /** Every governed call, in proposal order */
  calls: GovernedToolCall[];
  displays: DisplayPayload[];
  pending: PendingConfirmation[];
}

export type Resolution =
  | { status: 'unknown_call'; callId: string }
  | { status: 'already_resolved'; call: GovernedToolCall }
  | { status: 'resolved'; call: GovernedToolCall; expired: boolean };

export interface GovernorOptions {
  confirmationDeadlineMs: number;
}

/**
 * Applies the static governance mode of each proposed call.
 *
 * - read-only: executed now, in order
 * - display-only: fetched through the read-only path, then shown
 * - confirm-required: parked until `resolve` supplies an explicit decision
 *
 * No confirm-required call executes without a claimed approval.
 */
export class ToolCallGovernor {
  private readonly log = logger.child({ component: 'tool-governor' });

  constructor(
    private readonly executor: ActionExecutor,
    private readonly store: ConfirmationStore,
    private readonly events: TurnEventBus,
    private readonly options: GovernorOptions,
    private readonly machine: ToolCallStateMachine = toolCallStateMachine,
  ) {}

  async govern(proposed: ProposedToolCall[], ctx: GovernContext, now = Date.now()): Promise<GovernanceOutcome> {
    const log = this.log.child({ turnId: ctx.turnId, sessionId: ctx.sessionId });
    const toolCtx: ToolContext = { turnId: ctx.turnId, sessionId: ctx.sessionId, customerEmail: ctx.customerEmail };
    const calls: GovernedToolCall[] = [];
    const displays: DisplayPayload[] = [];
    const parked: GovernedToolCall[] = [];

    for (const proposal of proposed) {
      const name = proposal.name;
      const call: GovernedToolCall = {
        callId: proposal.callId,
        turnId: ctx.turnId,
        sessionId: ctx.sessionId,
        name,
        args: proposal.args,
        mode: TOOL_CATALOG[name].mode,
        state: 'proposed',
        transitions: [],
      };
      calls.push(call);

      if (isReadOnlyTool(name)) {
        await this.executeReadOnly(call, name, toolCtx);
      } else if (isDisplayTool(name)) {
        const entry = TOOL_CATALOG[name];
        displays.push(await this.fetchDisplay(call, entry.fetchVia, entry.widget, toolCtx));
      } else {
        const checked = validateToolArgs(name, proposal.args);
        if (!checked.ok) {
          log.warn({ tool: name, problem: checked.problem }, 'Confirm-required call refused: invalid arguments');
          this.cancel(call, 'invalid_arguments');
          continue;
        }
        // the reviewer sees exactly what will execute
        call.args = checked.args;
        this.machine.transition(call, 'awaiting_confirmation', 'confirmation_required', now);
        call.deadline = now + this.options.confirmationDeadlineMs;
        parked.push(call);
      }
    }

    const pending: PendingConfirmation[] = [];
    if (parked.length > 0) {
      try {
        await ctx.suspend(calls, displays);
        for (const call of parked) {
          const notice = toPendingConfirmation(call);
          if (notice) {
            pending.push(notice);
            governedToolCalls.inc({ tool: call.name, mode: call.mode, state: call.state });
            this.events.emit('awaiting_confirmation', notice);
          }
        }
        log.info({ pending: parked.map((c) => c.name) }, 'Turn suspended awaiting confirmation');
      } catch (err) {
        log.error({ err }, 'Suspended turn could not be persisted; confirmation calls cancelled');
        for (const call of parked) {
          this.machine.transition(call, 'rejected', 'confirmation_unavailable');
          this.cancel(call, 'confirmation_unavailable');
        }
      }
    }

    return { calls, displays, pending };
  }

  /**
   * Apply an approve/reject decision to a parked call. Idempotent per call id:
   * only the first resolution is applied and the executor runs at most once.
   */
  async resolve(callId: string, approve: boolean, opts: { actor?: string; now?: number } = {}): Promise<Resolution> {
    const now = opts.now ?? Date.now();
    const actor = opts.actor ?? 'reviewer';
    const log = this.log.child({ callId });

    const call = await this.store.getCall(callId);
    if (!call) {
      return { status: 'unknown_call', callId };
    }
    if (call.state !== 'awaiting_confirmation') {
      return { status: 'already_resolved', call };
    }
    if (!(await this.store.claimResolution(callId))) {
      log.info('Confirmation already claimed; ignoring repeat resolution');
      const latest = await this.store.getCall(callId);
      return { status: 'already_resolved', call: latest ?? call };
    }

    const expired = call.deadline !== undefined && now >= call.deadline;
    call.resolvedBy = actor;

    // Until the decision is stored the call is still awaiting; a failure there
    // gives the claim back so a retry or the deadline sweep can resolve it.
    let decided = false;
    try {
      if (approve && !expired) {
        const turn = await this.store.loadTurn(call.turnId);
        this.machine.transition(call, 'confirmed', 'approved', now);
        this.machine.transition(call, 'executing', 'approved', now);
        await this.store.saveCall(call);
        decided = true;

        const toolCtx: ToolContext = { turnId: call.turnId, sessionId: call.sessionId, customerEmail: turn?.customer?.email };
        const result = await this.executor.execute(confirmTool(call), call.args, toolCtx);
        call.result = result;
        this.machine.transition(call, 'completed', result.success ? 'executed' : 'execution_failed');
        await this.store.saveCall(call);

        confirmationsResolved.inc({ outcome: 'approved' });
        governedToolCalls.inc({ tool: call.name, mode: call.mode, state: call.state });
        this.events.emit('action_result', { callId, turnId: call.turnId, sessionId: call.sessionId, tool: call.name, result });
        this.audit('confirmation', 'confirmation_approved', actor, call, { success: result.success });
        log.info({ tool: call.name, success: result.success }, 'Confirmed call executed');
      } else {
        const reason: CancelReason = expired ? 'confirmation_expired' : 'rejected';
        this.machine.transition(call, 'rejected', reason, now);
        this.machine.transition(call, 'cancelled', reason, now);
        call.cancelReason = reason;
        await this.store.saveCall(call);
        decided = true;

        this.announceCancel(call, reason);
        confirmationsResolved.inc({ outcome: expired ? 'expired' : 'rejected' });
        this.audit('confirmation', expired ? 'confirmation_expired' : 'confirmation_rejected', actor, call, {});
        log.info({ tool: call.name, reason }, 'Confirmation call cancelled');
      }
    } catch (err) {
      if (!decided) {
        log.error({ err }, 'Resolution could not be stored; releasing the claim');
        await this.store.releaseResolution(callId);
      }
      throw err;
    }

    return { status: 'resolved', call, expired };
  }

  async pendingForSession(sessionId: string): Promise<PendingConfirmation[]> {
    const calls = await this.store.pendingForSession(sessionId);
    return calls.map(toPendingConfirmation).filter((p): p is PendingConfirmation => p !== null);
  }

  // ───── Modes ─────

  private async executeReadOnly(call: GovernedToolCall, tool: ReadOnlyToolName, ctx: ToolContext): Promise<void> {
    this.machine.transition(call, 'executing', 'read_only');
    call.result = await this.executor.execute(tool, call.args, ctx);
    this.machine.transition(call, 'completed', call.result.success ? 'executed' : 'execution_failed');
    governedToolCalls.inc({ tool: call.name, mode: call.mode, state: call.state });
  }

  private async fetchDisplay(
    call: GovernedToolCall,
    fetchVia: ReadOnlyToolName,
    widget: string,
    ctx: ToolContext,
  ): Promise<DisplayPayload> {
    this.machine.transition(call, 'fetching', 'display_only');
    const result = await this.executor.execute(fetchVia, call.args, ctx);
    call.result = result;
    this.machine.transition(call, 'displayed', result.success ? 'fetched' : 'fetch_failed');
    governedToolCalls.inc({ tool: call.name, mode: call.mode, state: call.state });

    const payload: DisplayPayload = {
      callId: call.callId,
      tool: call.name,
      widget,
      success: result.success,
      data: result.data,
    };
    this.events.emit('display_ready', { ...payload, turnId: call.turnId, sessionId: call.sessionId });
    return payload;
  }

  private cancel(call: GovernedToolCall, reason: CancelReason, now = Date.now()): void {
    if (!this.machine.transition(call, 'cancelled', reason, now)) return;
    call.cancelReason = reason;
    this.announceCancel(call, reason);
  }

  private announceCancel(call: GovernedToolCall, reason: CancelReason): void {
    governedToolCalls.inc({ tool: call.name, mode: call.mode, state: call.state });
    if (reason === 'invalid_arguments' || reason === 'confirmation_unavailable') {
      governanceViolations.inc({ kind: reason });
      this.audit('governance_violation', reason, 'pipeline', call, {});
    }
    this.events.emit('action_cancelled', {
      callId: call.callId,
      turnId: call.turnId,
      sessionId: call.sessionId,
      tool: call.name,
      reason,
    });
  }

  private audit<C extends AuditCategory>(
    category: C,
    action: AuditAction<C>,
    actor: string,
    call: GovernedToolCall,
    details: Record<string, unknown>,
  ): void {
    getAuditService()?.recordQuietly({
      category,
      action,
      actor,
      sessionId: call.sessionId,
      turnId: call.turnId,
      callId: call.callId,
      details: { tool: call.name, ...details },
    });
  }
}

function confirmTool(call: GovernedToolCall): ConfirmRequiredToolName {
  const name = call.name;
  if (!isConfirmRequiredTool(name)) {
    throw new Error(`${name} is not a confirm-required tool`);
  }
  return name;
}

export function toPendingConfirmation(call: GovernedToolCall): PendingConfirmation | null {
  const entry = TOOL_CATALOG[call.name];
  if (entry.mode !== 'confirm_required' || call.state !== 'awaiting_confirmation' || call.deadline === undefined) {
    return null;
  }
  return {
    callId: call.callId,
    turnId: call.turnId,
    sessionId: call.sessionId,
    tool: call.name,
    label: entry.label,
    args: call.args,
    deadline: call.deadline,
  };
}

/** True once no call of the turn is still waiting on a decision */
export function allSettled(calls: GovernedToolCall[]): boolean {
  return calls.every((call) => isTerminal(call.state));
}
