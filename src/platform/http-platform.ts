import Ajv, { ValidateFunction } from 'ajv';
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

const DEFAULT_TIMEOUT_MS = 10_000;

const ajv = new Ajv({ allErrors: true });

const customerValidator = ajv.compile<CustomerRecord>({
  type: 'object',
  required: ['customerId', 'email', 'name', 'joinedAt', 'totalOrders', 'lifetimeValue'],
});
const subscriptionValidator = ajv.compile<SubscriptionState>({
  type: 'object',
  required: ['subscriptionId', 'status', 'frequency', 'nextChargeDate', 'lastChargeAmount', 'skippedMonths', 'address'],
});
const transactionsValidator = ajv.compile<Transaction[]>({
  type: 'array',
  items: { type: 'object', required: ['id', 'date', 'amount', 'status'] },
});
const shipmentsValidator = ajv.compile<Shipment[]>({
  type: 'array',
  items: { type: 'object', required: ['orderId', 'status', 'carrier', 'trackingNumber', 'shippedAt'] },
});
const supportValidator = ajv.compile<SupportInteraction[]>({
  type: 'array',
  items: { type: 'object', required: ['date', 'category', 'summary'] },
});
const boxValidator = ajv.compile<BoxContents>({
  type: 'object',
  required: ['month', 'items'],
});
const claimValidator = ajv.compile<DamageClaim>({
  type: 'object',
  required: ['claimId', 'status', 'createdAt'],
});
const uploadValidator = ajv.compile<{ uploadUrl: string; claimId?: string }>({
  type: 'object',
  required: ['uploadUrl'],
});

/**
 * REST client for the commerce platform API.
 */
export class HttpCommercePlatform implements CommercePlatform {
  private readonly log = logger.child({ component: 'http-platform' });

  constructor(
    private readonly baseUrl: string,
    private readonly apiKey: string,
  ) {}

  async findByIdentifier(identifier: string, signal?: AbortSignal): Promise<CustomerRecord | null> {
    const query = new URLSearchParams({ email: identifier.trim().toLowerCase() });
    return this.request('GET', `/customers/lookup?${query}`, customerValidator, { signal, allowNotFound: true });
  }

  async getSubscription(customerId: string, signal?: AbortSignal): Promise<SubscriptionState | null> {
    return this.request('GET', `/customers/${enc(customerId)}/subscription`, subscriptionValidator, {
      signal,
      allowNotFound: true,
    });
  }

  async getTransactions(customerId: string, limit: number, signal?: AbortSignal): Promise<Transaction[]> {
    return this.required('GET', `/customers/${enc(customerId)}/transactions?limit=${limit}`, transactionsValidator, signal);
  }

  async getShipments(customerId: string, limit: number, signal?: AbortSignal): Promise<Shipment[]> {
    return this.required('GET', `/customers/${enc(customerId)}/shipments?limit=${limit}`, shipmentsValidator, signal);
  }

  async getSupportHistory(customerId: string, limit: number, signal?: AbortSignal): Promise<SupportInteraction[]> {
    return this.required('GET', `/customers/${enc(customerId)}/support-history?limit=${limit}`, supportValidator, signal);
  }

  async getBoxContents(customerId: string, month: string, signal?: AbortSignal): Promise<BoxContents | null> {
    return this.request('GET', `/customers/${enc(customerId)}/boxes/${enc(month)}`, boxValidator, {
      signal,
      allowNotFound: true,
    });
  }

  async pauseSubscription(customerId: string, months: number, signal?: AbortSignal): Promise<SubscriptionState> {
    return this.required('POST', `/customers/${enc(customerId)}/subscription/pause`, subscriptionValidator, signal, {
      durationMonths: months,
    });
  }

  async skipMonth(customerId: string, month: string, signal?: AbortSignal): Promise<SubscriptionState> {
    return this.required('POST', `/customers/${enc(customerId)}/subscription/skip`, subscriptionValidator, signal, { month });
  }

  async changeFrequency(customerId: string, frequency: DeliveryFrequency, signal?: AbortSignal): Promise<SubscriptionState> {
    return this.required('PATCH', `/customers/${enc(customerId)}/subscription`, subscriptionValidator, signal, { frequency });
  }

  async changeAddress(customerId: string, address: Address, signal?: AbortSignal): Promise<SubscriptionState> {
    return this.required('PUT', `/customers/${enc(customerId)}/subscription/address`, subscriptionValidator, signal, address);
  }

  async createDamageClaim(
    customerId: string,
    itemDescription: string,
    damageDescription: string,
    signal?: AbortSignal,
  ): Promise<DamageClaim> {
    return this.required('POST', `/customers/${enc(customerId)}/claims`, claimValidator, signal, {
      itemDescription,
      damageDescription,
    });
  }

  async requestPhotos(customerId: string, claimId: string | undefined, signal?: AbortSignal): Promise<{ uploadUrl: string; claimId?: string }> {
    return this.required('POST', `/customers/${enc(customerId)}/photo-requests`, uploadValidator, signal, { claimId });
  }

  async healthCheck(): Promise<boolean> {
    try {
      const res = await fetch(`${this.baseUrl}/health`, { signal: AbortSignal.timeout(3000) });
      return res.ok;
    } catch (err) {
      this.log.warn({ err }, 'Platform health check failed');
      return false;
    }
  }

  // ───── Private ─────

  private async required<T>(
    method: string,
    route: string,
    validator: ValidateFunction<T>,
    signal?: AbortSignal,
    body?: unknown,
  ): Promise<T> {
    const result = await this.request(method, route, validator, { signal, body });
    if (result === null) throw new Error(`Platform ${method} ${route} returned no data`);
    return result;
  }

  private async request<T>(
    method: string,
    route: string,
    validator: ValidateFunction<T>,
    opts: { signal?: AbortSignal; body?: unknown; allowNotFound?: boolean },
  ): Promise<T | null> {
    const res = await fetch(`${this.baseUrl}${route}`, {
      method,
      headers: {
        Authorization: `Bearer ${this.apiKey}`,
        'Content-Type': 'application/json',
      },
      body: opts.body === undefined ? undefined : JSON.stringify(opts.body),
      signal: opts.signal ?? AbortSignal.timeout(DEFAULT_TIMEOUT_MS),
    });

    if (res.status === 404 && opts.allowNotFound) return null;
    if (!res.ok) {
      throw new Error(`Platform API error: ${res.status} ${res.statusText} (${method} ${route.split('?')[0]})`);
    }

    const payload: unknown = await res.json();
    if (!validator(payload)) {
      this.log.warn({ route: route.split('?')[0], errors: validator.errors }, 'Unexpected platform response shape');
      throw new Error('Platform API returned an unexpected response');
    }
    return payload;
  }
}

function enc(value: string): string {
  return encodeURIComponent(value);
}
