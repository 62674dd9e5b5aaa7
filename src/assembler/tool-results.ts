import { ToolName } from '../tools/types';

function read(data: unknown, key: string): unknown {
  if (typeof data !== 'object' || data === null) return undefined;
  return Object.getOwnPropertyDescriptor(data, key)?.value;
}

function readString(data: unknown, key: string): string | undefined {
  const value = read(data, key);
  return typeof value === 'string' ? value : undefined;
}

function subscriptionSentence(data: unknown): string {
  const status = readString(data, 'status');
  const frequency = readString(data, 'frequency');
  const next = readString(data, 'nextChargeDate');
  const pausedUntil = readString(data, 'pausedUntil');
  if (!status) return '';
  if (status === 'paused' && pausedUntil) {
    return `Your subscription is paused until ${pausedUntil}.`;
  }
  const plan = frequency ? ` (${frequency})` : '';
  const charge = next && status === 'active' ? `, and your next charge is on ${next}` : '';
  return `Your subscription is ${status}${plan}${charge}.`;
}

function shipmentSentence(data: unknown): string {
  const orderId = readString(data, 'orderId');
  const status = readString(data, 'status');
  if (!orderId || !status) return 'We could not find a recent shipment on your account.';
  const carrier = readString(data, 'carrier');
  const tracking = readString(data, 'trackingNumber');
  const eta = readString(data, 'estimatedDelivery');
  const via = carrier ? ` with ${carrier}` : '';
  const ref = tracking ? ` (tracking number ${tracking})` : '';
  const arrival = eta ? `, estimated delivery ${eta}` : '';
  return `Order ${orderId} is ${status.replace(/_/g, ' ')}${via}${ref}${arrival}.`;
}

/**
 * Text substituted for a `{{tool_name}}` placeholder. An empty string means
 * the tool has nothing to say inline and the placeholder is dropped.
 */
export function formatToolResult(tool: ToolName, data: unknown): string {
  switch (tool) {
    case 'generate_cancel_link':
      return readString(data, 'url') ?? '';
    case 'track_package':
    case 'show_tracking':
      return shipmentSentence(data);
    case 'get_subscription':
    case 'pause_subscription':
    case 'skip_month':
    case 'change_frequency':
    case 'change_address':
      return subscriptionSentence(data);
    case 'create_damage_claim': {
      const claimId = readString(data, 'claimId');
      return claimId ? `Your damage claim ${claimId} has been opened.` : '';
    }
    case 'request_photos': {
      const url = readString(data, 'uploadUrl');
      return url ? `You can upload photos of the damage here: ${url}` : '';
    }
    case 'get_box_contents':
    case 'show_box_contents': {
      const items = read(data, 'items');
      if (!Array.isArray(items) || items.length === 0) return '';
      return `This box includes: ${items.filter((i): i is string => typeof i === 'string').join(', ')}.`;
    }
    case 'get_customer_history':
    case 'get_payment_history':
    case 'show_payment_history':
    case 'show_order_history':
      return '';
  }
}
