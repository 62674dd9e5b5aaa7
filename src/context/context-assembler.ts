import type { Logger } from 'pino';
import { AccountFact, ContextBundle, ContextField, HistoryEntry } from './types';
import { Category } from '../config/types';
import { AccountLookup, CustomerRecord, IdentityLookup, Shipment, SubscriptionState, SupportInteraction, Transaction } from '../platform/types';
import { HistoryStore, TurnRecord } from '../memory/types';
import { withTimeout } from '../resilience/timeout';
import { logger } from '../observability/logger';

export interface ContextLimits {
  /** Turns kept verbatim */
  verbatimTurns: number;
  /** Turns read from history in total; the ones past the verbatim window are summarized */
  summaryWindow: number;
  maxAccountFacts: number;
  maxReplyChars: number;
  /** Serialized bundle size limit, in characters */
  charBudget: number;
  lookupTimeoutMs: number;
}

export interface ContextDeps {
  identity: IdentityLookup;
  accounts: AccountLookup;
  history: HistoryStore;
}

type FactSource = 'shipments' | 'transactions' | 'support';

/** Which account records matter for a category, in priority order after the subscription */
const FACT_SOURCES: Record<Category, FactSource[]> = {
  shipping_or_delivery_question: ['shipments'],
  payment_question: ['transactions'],
  frequency_change_request: ['transactions'],
  skip_or_pause_request: ['shipments', 'transactions'],
  recipient_or_address_change: ['shipments'],
  customization_request: ['shipments'],
  damaged_or_leaking_item_report: ['shipments', 'support'],
  gratitude: [],
  retention_primary_request: ['support', 'transactions'],
  retention_repeated_request: ['support', 'transactions'],
  unknown: ['shipments'],
};

/**
 * Builds the bounded evidence bundle for the generator. Every lookup is
 * optional: a failure is recorded in `omitted` and the bundle is still returned.
 */
export class ContextAssembler {
  private readonly log = logger.child({ component: 'context-assembler' });

  constructor(
    private readonly deps: ContextDeps,
    private readonly limits: ContextLimits,
  ) {}

  async assemble(
    identifier: string | undefined,
    sessionId: string,
    category: Category,
    opts: { signal?: AbortSignal } = {},
  ): Promise<ContextBundle> {
    const omitted: ContextField[] = [];
    const log = this.log.child({ sessionId, category });

    const [identity, history] = await Promise.all([
      this.lookupIdentity(identifier, opts.signal, log).catch(() => {
        omitted.push('identity');
        return undefined;
      }),
      this.lookup('history', () => this.readHistory(sessionId), opts.signal, log).catch(() => {
        omitted.push('history');
        return [];
      }),
    ]);

    let accountFacts: AccountFact[] = [];
    if (identity) {
      try {
        accountFacts = await this.lookup('account', (signal) => this.collectFacts(identity, category, signal), opts.signal, log);
      } catch {
        omitted.push('account');
      }
    }

    const verbatim = history.slice(0, this.limits.verbatimTurns);
    const older = history.slice(this.limits.verbatimTurns);

    const bundle: ContextBundle = {
      sessionId,
      category,
      identity,
      accountFacts,
      history: verbatim.map((turn) => this.toEntry(turn)),
      olderSummary: older.length > 0 ? summarizeTurns(older) : undefined,
      riskFlag: history.find((turn) => turn.outstandingTrigger)?.outstandingTrigger,
      omitted,
      truncated: false,
    };

    return applyBudget(bundle, this.limits.charBudget);
  }

  private async lookupIdentity(
    identifier: string | undefined,
    callerSignal: AbortSignal | undefined,
    log: Logger,
  ): Promise<CustomerRecord | undefined> {
    if (!identifier) return undefined;
    const record = await this.lookup('identity', (signal) => this.deps.identity.findByIdentifier(identifier, signal), callerSignal, log);
    return record ?? undefined;
  }

  private async lookup<T>(
    field: ContextField,
    work: (signal: AbortSignal) => Promise<T>,
    callerSignal: AbortSignal | undefined,
    log: Logger,
  ): Promise<T> {
    try {
      return await withTimeout(`context:${field}`, this.limits.lookupTimeoutMs, work, callerSignal);
    } catch (err) {
      log.warn({ err, field }, 'Context lookup failed; field omitted');
      throw err;
    }
  }

  private readHistory(sessionId: string): Promise<TurnRecord[]> {
    return this.deps.history.recentTurns(sessionId, Math.max(this.limits.summaryWindow, this.limits.verbatimTurns));
  }

  private async collectFacts(customer: CustomerRecord, category: Category, signal: AbortSignal): Promise<AccountFact[]> {
    const { accounts } = this.deps;
    const limit = this.limits.maxAccountFacts;
    const sources = FACT_SOURCES[category];

    const [subscription, ...groups] = await Promise.all([
      accounts.getSubscription(customer.customerId, signal),
      ...sources.map((source): Promise<AccountFact[]> => {
        switch (source) {
          case 'shipments':
            return accounts.getShipments(customer.customerId, limit, signal).then((items) => items.map(shipmentFact));
          case 'transactions':
            return accounts.getTransactions(customer.customerId, limit, signal).then((items) => items.map(transactionFact));
          case 'support':
            return accounts.getSupportHistory(customer.customerId, limit, signal).then((items) => items.map(supportFact));
        }
      }),
    ]);

    const facts: AccountFact[] = subscription ? [subscriptionFact(subscription)] : [];
    for (const group of groups) facts.push(...group);
    return facts.slice(0, limit);
  }

  private toEntry(turn: TurnRecord): HistoryEntry {
    return {
      turnId: turn.turnId,
      receivedAt: turn.receivedAt,
      category: turn.category,
      disposition: turn.disposition,
      customerText: turn.text,
      reply: truncate(turn.reply, this.limits.maxReplyChars),
    };
  }
}

// ───── Formatting ─────

function money(amount: number): string {
  return `$${amount.toFixed(2)}`;
}

function subscriptionFact(sub: SubscriptionState): AccountFact {
  const parts = [`Subscription ${sub.subscriptionId}: ${sub.status}, ${sub.frequency}`];
  if (sub.status === 'paused' && sub.pausedUntil) parts.push(`paused until ${sub.pausedUntil}`);
  parts.push(`next charge ${sub.nextChargeDate}`, `last charge ${money(sub.lastChargeAmount)}`);
  if (sub.skippedMonths.length > 0) parts.push(`skipped ${sub.skippedMonths.join(', ')}`);
  return { kind: 'subscription', text: parts.join(', ') };
}

function shipmentFact(s: Shipment): AccountFact {
  const eta = s.estimatedDelivery ? `, estimated ${s.estimatedDelivery}` : '';
  return {
    kind: 'shipment',
    text: `Order ${s.orderId}: ${s.status} via ${s.carrier}, shipped ${s.shippedAt}${eta}, last event: ${s.lastEvent}`,
  };
}

function transactionFact(t: Transaction): AccountFact {
  return { kind: 'transaction', text: `Charge ${t.id} on ${t.date}: ${money(t.amount)} ${t.status} (${t.description})` };
}

function supportFact(s: SupportInteraction): AccountFact {
  return { kind: 'support', text: `Support contact on ${s.date} (${s.category}): ${s.summary}` };
}

export function truncate(text: string, maxChars: number): string {
  if (text.length <= maxChars) return text;
  return `${text.slice(0, Math.max(0, maxChars - 3))}...`;
}

/**
 * One-line digest of older turns, most recent first:
 * "3 earlier turns: payment_question (draft), shipping_or_delivery_question x2 (send)"
 */
export function summarizeTurns(turns: TurnRecord[]): string {
  const groups: Array<{ category: Category; count: number; lastDisposition: string }> = [];
  for (const turn of turns) {
    const group = groups.find((g) => g.category === turn.category);
    if (group) {
      group.count++;
    } else {
      groups.push({ category: turn.category, count: 1, lastDisposition: turn.disposition });
    }
  }
  const parts = groups.map((g) => `${g.category}${g.count > 1 ? ` x${g.count}` : ''} (${g.lastDisposition})`);
  const noun = turns.length === 1 ? 'turn' : 'turns';
  return `${turns.length} earlier ${noun}: ${parts.join(', ')}`;
}

export function bundleSize(bundle: ContextBundle): number {
  return JSON.stringify(bundle).length;
}

/** The newest customer message is never cut below this many characters */
const NEWEST_TEXT_FLOOR = 1000;

/**
 * Enforce the character budget. The older-turn summary goes first, then
 * account facts from the end, then history text from the oldest entry
 * forward. Entries are shortened, never dropped, and the newest customer
 * message keeps at least NEWEST_TEXT_FLOOR characters.
 */
export function applyBudget(bundle: ContextBundle, charBudget: number): ContextBundle {
  if (bundleSize(bundle) <= charBudget) return bundle;

  const result: ContextBundle = {
    ...bundle,
    accountFacts: [...bundle.accountFacts],
    history: bundle.history.map((entry) => ({ ...entry })),
    truncated: true,
  };
  if (result.olderSummary !== undefined) {
    delete result.olderSummary;
  }
  while (bundleSize(result) > charBudget && result.accountFacts.length > 0) {
    result.accountFacts.pop();
  }

  for (let i = result.history.length - 1; i >= 0; i--) {
    const entry = result.history[i];
    const floor = i === 0 ? NEWEST_TEXT_FLOOR : 0;
    entry.reply = shrink(entry.reply, bundleSize(result) - charBudget, 0);
    entry.customerText = shrink(entry.customerText, bundleSize(result) - charBudget, floor);
    if (bundleSize(result) <= charBudget) break;
  }
  return result;
}

/** Cut `excess` characters from the end of `text`, keeping at least `floor` */
function shrink(text: string, excess: number, floor: number): string {
  if (excess <= 0 || text.length <= floor) return text;
  const target = Math.max(floor, text.length - excess - 3);
  return target <= 3 ? '' : truncate(text, target);
}

/** Prompt rendering of a bundle */
export function renderContext(bundle: ContextBundle): string {
  const lines: string[] = [];
  if (bundle.identity) {
    lines.push(`Customer: ${bundle.identity.name} (member since ${bundle.identity.joinedAt}, ${bundle.identity.totalOrders} orders)`);
  } else {
    lines.push('Customer: not identified');
  }
  if (bundle.riskFlag) {
    lines.push(`Risk flag from an earlier turn: ${bundle.riskFlag}`);
  }
  if (bundle.accountFacts.length > 0) {
    lines.push('', 'Account:', ...bundle.accountFacts.map((f) => `- ${f.text}`));
  }
  if (bundle.history.length > 0) {
    lines.push('', 'Recent conversation (newest first):');
    for (const entry of bundle.history) {
      lines.push(`- Customer: ${entry.customerText}`);
      if (entry.reply) lines.push(`  Reply (${entry.disposition}): ${entry.reply}`);
    }
  }
  if (bundle.olderSummary) {
    lines.push('', `Earlier: ${bundle.olderSummary}`);
  }
  if (bundle.omitted.length > 0) {
    lines.push('', `Unavailable: ${bundle.omitted.join(', ')}`);
  }
  return lines.join('\n');
}
