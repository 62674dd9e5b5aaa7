/**
 * Commerce platform collaborator: customer identity, account state and
 * subscription actions.
 */

export type SubscriptionStatus = 'active' | 'paused' | 'cancelled';
export type DeliveryFrequency = 'monthly' | 'bi-monthly' | 'quarterly';

export interface Address {
  street: string;
  city: string;
  postalCode: string;
  country: string;
  state?: string;
}

export interface CustomerRecord {
  customerId: string;
  email: string;
  name: string;
  joinedAt: string;
  totalOrders: number;
  lifetimeValue: number;
}

export interface SubscriptionState {
  subscriptionId: string;
  status: SubscriptionStatus;
  frequency: DeliveryFrequency;
  nextChargeDate: string;
  lastChargeAmount: number;
  pausedUntil?: string;
  skippedMonths: string[];
  address: Address;
}

export interface Transaction {
  id: string;
  date: string;
  amount: number;
  status: 'paid' | 'failed' | 'refunded';
  description: string;
}

export interface Shipment {
  orderId: string;
  status: 'processing' | 'in_transit' | 'out_for_delivery' | 'delivered' | 'exception';
  carrier: string;
  trackingNumber: string;
  shippedAt: string;
  estimatedDelivery?: string;
  lastEvent: string;
}

export interface BoxContents {
  month: string;
  items: string[];
}

export interface SupportInteraction {
  date: string;
  category: string;
  summary: string;
}

export interface DamageClaim {
  claimId: string;
  status: 'pending_review' | 'awaiting_photos' | 'approved';
  itemDescription: string;
  damageDescription: string;
  createdAt: string;
}

export interface IdentityLookup {
  findByIdentifier(identifier: string, signal?: AbortSignal): Promise<CustomerRecord | null>;
}

export interface AccountLookup {
  getSubscription(customerId: string, signal?: AbortSignal): Promise<SubscriptionState | null>;
  getTransactions(customerId: string, limit: number, signal?: AbortSignal): Promise<Transaction[]>;
  getShipments(customerId: string, limit: number, signal?: AbortSignal): Promise<Shipment[]>;
  getSupportHistory(customerId: string, limit: number, signal?: AbortSignal): Promise<SupportInteraction[]>;
  getBoxContents(customerId: string, month: string, signal?: AbortSignal): Promise<BoxContents | null>;
}

export interface SubscriptionActions {
  pauseSubscription(customerId: string, months: number, signal?: AbortSignal): Promise<SubscriptionState>;
  skipMonth(customerId: string, month: string, signal?: AbortSignal): Promise<SubscriptionState>;
  changeFrequency(customerId: string, frequency: DeliveryFrequency, signal?: AbortSignal): Promise<SubscriptionState>;
  changeAddress(customerId: string, address: Address, signal?: AbortSignal): Promise<SubscriptionState>;
  createDamageClaim(
    customerId: string,
    itemDescription: string,
    damageDescription: string,
    signal?: AbortSignal,
  ): Promise<DamageClaim>;
  requestPhotos(customerId: string, claimId: string | undefined, signal?: AbortSignal): Promise<{ uploadUrl: string; claimId?: string }>;
}

export interface CommercePlatform extends IdentityLookup, AccountLookup, SubscriptionActions {
  healthCheck(): Promise<boolean>;
}
