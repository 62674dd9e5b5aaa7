import * as fs from 'fs';
import * as path from 'path';
import Ajv from 'ajv';
import {
  Address,
  BoxContents,
  CommercePlatform,
  CustomerRecord,
  DamageClaim,
  DeliveryFrequency,
  Shipment,
  SubscriptionState,
  SupportInteraction,
  Transaction,
} from './types';
import { logger } from '../observability/logger';

export interface SeedAccount {
  customer: CustomerRecord;
  subscription: SubscriptionState | null;
  transactions: Transaction[];
  shipments: Shipment[];
  supportHistory: SupportInteraction[];
  boxes: BoxContents[];
}

const SEED_SCHEMA = {
  type: 'array',
  items: {
    type: 'object',
    properties: {
      customer: {
        type: 'object',
        required: ['customerId', 'email', 'name', 'joinedAt', 'totalOrders', 'lifetimeValue'],
      },
      subscription: { type: ['object', 'null'] },
      transactions: { type: 'array' },
      shipments: { type: 'array' },
      supportHistory: { type: 'array' },
      boxes: { type: 'array' },
    },
    required: ['customer', 'subscription', 'transactions', 'shipments', 'supportHistory', 'boxes'],
  },
};

const validateSeed = new Ajv({ allErrors: true, allowUnionTypes: true }).compile<SeedAccount[]>(SEED_SCHEMA);

const DEFAULT_SEED_FILE = path.resolve(__dirname, '..', '..', 'data', 'sample-customers.json');

/** Read the sample accounts shipped with the repo */
export function loadSeedAccounts(filePath = DEFAULT_SEED_FILE): SeedAccount[] {
  const parsed: unknown = JSON.parse(fs.readFileSync(filePath, 'utf-8'));
  if (!validateSeed(parsed)) {
    const errors = validateSeed.errors?.map((e) => `${e.instancePath} ${e.message}`).join('; ');
    throw new Error(`Invalid seed accounts in ${filePath}: ${errors}`);
  }
  return parsed;
}

/**
 * In-memory commerce platform for local development and tests.
 * Mutations apply to a private copy of the seed.
 */
export class MockCommercePlatform implements CommercePlatform {
  private readonly accounts = new Map<string, SeedAccount>();
  private readonly emailIndex = new Map<string, string>();
  private claimCounter = 1;

  constructor(seed: SeedAccount[]) {
    for (const account of structuredClone(seed)) {
      this.accounts.set(account.customer.customerId, account);
      this.emailIndex.set(account.customer.email.toLowerCase(), account.customer.customerId);
    }
  }

  async findByIdentifier(identifier: string): Promise<CustomerRecord | null> {
    const customerId = this.emailIndex.get(identifier.trim().toLowerCase());
    return customerId ? (this.accounts.get(customerId)?.customer ?? null) : null;
  }

  async getSubscription(customerId: string): Promise<SubscriptionState | null> {
    return this.account(customerId).subscription;
  }

  async getTransactions(customerId: string, limit: number): Promise<Transaction[]> {
    return newestFirst(this.account(customerId).transactions, (t) => t.date).slice(0, limit);
  }

  async getShipments(customerId: string, limit: number): Promise<Shipment[]> {
    return newestFirst(this.account(customerId).shipments, (s) => s.shippedAt).slice(0, limit);
  }

  async getSupportHistory(customerId: string, limit: number): Promise<SupportInteraction[]> {
    return newestFirst(this.account(customerId).supportHistory, (s) => s.date).slice(0, limit);
  }

  async getBoxContents(customerId: string, month: string): Promise<BoxContents | null> {
    return this.account(customerId).boxes.find((b) => b.month === month) ?? null;
  }

  async pauseSubscription(customerId: string, months: number): Promise<SubscriptionState> {
    const sub = this.activeSubscription(customerId);
    const until = new Date();
    until.setUTCMonth(until.getUTCMonth() + months);
    sub.status = 'paused';
    sub.pausedUntil = until.toISOString().slice(0, 10);
    logger.info({ customerId, months }, '[MOCK] Subscription paused');
    return sub;
  }

  async skipMonth(customerId: string, month: string): Promise<SubscriptionState> {
    const sub = this.activeSubscription(customerId);
    if (!sub.skippedMonths.includes(month)) sub.skippedMonths.push(month);
    logger.info({ customerId, month }, '[MOCK] Month skipped');
    return sub;
  }

  async changeFrequency(customerId: string, frequency: DeliveryFrequency): Promise<SubscriptionState> {
    const sub = this.activeSubscription(customerId);
    sub.frequency = frequency;
    logger.info({ customerId, frequency }, '[MOCK] Frequency changed');
    return sub;
  }

  async changeAddress(customerId: string, address: Address): Promise<SubscriptionState> {
    const sub = this.activeSubscription(customerId);
    sub.address = { ...address };
    logger.info({ customerId }, '[MOCK] Address changed');
    return sub;
  }

  async createDamageClaim(customerId: string, itemDescription: string, damageDescription: string): Promise<DamageClaim> {
    this.account(customerId);
    const claim: DamageClaim = {
      claimId: `DMG-MOCK-${this.claimCounter++}`,
      status: 'pending_review',
      itemDescription,
      damageDescription,
      createdAt: new Date().toISOString(),
    };
    logger.info({ customerId, claimId: claim.claimId }, '[MOCK] Damage claim created');
    return claim;
  }

  async requestPhotos(customerId: string, claimId: string | undefined): Promise<{ uploadUrl: string; claimId?: string }> {
    this.account(customerId);
    const ref = claimId ?? `pending-${customerId}`;
    return { uploadUrl: `https://uploads.example.com/claims/${encodeURIComponent(ref)}`, claimId };
  }

  async healthCheck(): Promise<boolean> {
    return true;
  }

  private account(customerId: string): SeedAccount {
    const account = this.accounts.get(customerId);
    if (!account) throw new Error(`Customer ${customerId} not found`);
    return account;
  }

  private activeSubscription(customerId: string): SubscriptionState {
    const sub = this.account(customerId).subscription;
    if (!sub) throw new Error(`Customer ${customerId} has no subscription`);
    if (sub.status === 'cancelled') throw new Error(`Subscription ${sub.subscriptionId} is cancelled`);
    return sub;
  }
}

function newestFirst<T>(items: T[], dateOf: (item: T) => string): T[] {
  return [...items].sort((a, b) => dateOf(b).localeCompare(dateOf(a)));
}
