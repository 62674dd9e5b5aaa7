import Ajv, { ValidateFunction } from 'ajv';
import { TOOL_CATALOG } from './catalog';
import { ActionToolName, ToolArgs } from './types';
import { generateCancelLink, CancelLinkSettings } from './cancel-link';
import { CommercePlatform, CustomerRecord } from '../platform/types';

// removeAdditional drops argument keys the model invented instead of failing the call
const ajv = new Ajv({ allErrors: true, coerceTypes: true, removeAdditional: 'all' });

type ArgValidators = { [K in ActionToolName]: ValidateFunction<ToolArgs[K]> };

const validators: ArgValidators = {
  get_subscription: ajv.compile<ToolArgs['get_subscription']>(TOOL_CATALOG.get_subscription.inputSchema),
  get_customer_history: ajv.compile<ToolArgs['get_customer_history']>(TOOL_CATALOG.get_customer_history.inputSchema),
  get_payment_history: ajv.compile<ToolArgs['get_payment_history']>(TOOL_CATALOG.get_payment_history.inputSchema),
  track_package: ajv.compile<ToolArgs['track_package']>(TOOL_CATALOG.track_package.inputSchema),
  get_box_contents: ajv.compile<ToolArgs['get_box_contents']>(TOOL_CATALOG.get_box_contents.inputSchema),
  generate_cancel_link: ajv.compile<ToolArgs['generate_cancel_link']>(TOOL_CATALOG.generate_cancel_link.inputSchema),
  pause_subscription: ajv.compile<ToolArgs['pause_subscription']>(TOOL_CATALOG.pause_subscription.inputSchema),
  skip_month: ajv.compile<ToolArgs['skip_month']>(TOOL_CATALOG.skip_month.inputSchema),
  change_frequency: ajv.compile<ToolArgs['change_frequency']>(TOOL_CATALOG.change_frequency.inputSchema),
  change_address: ajv.compile<ToolArgs['change_address']>(TOOL_CATALOG.change_address.inputSchema),
  create_damage_claim: ajv.compile<ToolArgs['create_damage_claim']>(TOOL_CATALOG.create_damage_claim.inputSchema),
  request_photos: ajv.compile<ToolArgs['request_photos']>(TOOL_CATALOG.request_photos.inputSchema),
};

export class ToolArgumentError extends Error {
  constructor(readonly toolName: ActionToolName, detail: string) {
    super(`Invalid input for ${toolName}: ${detail}`);
    this.name = 'ToolArgumentError';
  }
}

export class CustomerRequiredError extends Error {
  constructor(readonly toolName: ActionToolName) {
    super(`${toolName} requires an identified customer`);
    this.name = 'CustomerRequiredError';
  }
}

function parseArgs<K extends ActionToolName>(name: K, validate: ValidateFunction<ToolArgs[K]>, args: Record<string, unknown>): ToolArgs[K] {
  const copy: unknown = structuredClone(args);
  if (!validate(copy)) {
    throw new ToolArgumentError(name, validate.errors?.map((e) => `${e.instancePath} ${e.message}`).join('; ') ?? 'unknown');
  }
  return copy;
}

export interface HandlerDeps {
  platform: CommercePlatform;
  cancelLink: CancelLinkSettings;
}

export type ArgCheck = { ok: true; args: Record<string, unknown> } | { ok: false; problem: string };

/**
 * Validate arguments without executing (used before a call is parked for
 * confirmation). On success `args` is the normalized copy the handler will see.
 */
export function validateToolArgs(name: ActionToolName, args: Record<string, unknown>): ArgCheck {
  const copy = structuredClone(args);
  const validate = validators[name];
  if (validate(copy)) return { ok: true, args: copy };
  return { ok: false, problem: validate.errors?.map((e) => `${e.instancePath} ${e.message}`).join('; ') ?? 'invalid arguments' };
}

function currentMonth(now = new Date()): string {
  return now.toISOString().slice(0, 7);
}

/**
 * Run one action against the platform. Exhaustive over the closed tool set:
 * adding a tool name without a case here fails to compile.
 */
export async function dispatchTool(
  name: ActionToolName,
  rawArgs: Record<string, unknown>,
  customerEmail: string | undefined,
  deps: HandlerDeps,
  signal?: AbortSignal,
): Promise<unknown> {
  const { platform } = deps;

  const customer = async (): Promise<CustomerRecord> => {
    if (!customerEmail) throw new CustomerRequiredError(name);
    const record = await platform.findByIdentifier(customerEmail, signal);
    if (!record) throw new CustomerRequiredError(name);
    return record;
  };

  switch (name) {
    case 'get_subscription': {
      parseArgs(name, validators.get_subscription, rawArgs);
      const { customerId } = await customer();
      return platform.getSubscription(customerId, signal);
    }
    case 'get_customer_history': {
      const args = parseArgs(name, validators.get_customer_history, rawArgs);
      const { customerId, totalOrders, joinedAt } = await customer();
      const limit = args.limit ?? 3;
      const [shipments, support] = await Promise.all([
        platform.getShipments(customerId, limit, signal),
        platform.getSupportHistory(customerId, limit, signal),
      ]);
      return { totalOrders, joinedAt, recentOrders: shipments, supportHistory: support };
    }
    case 'get_payment_history': {
      const args = parseArgs(name, validators.get_payment_history, rawArgs);
      const { customerId } = await customer();
      return platform.getTransactions(customerId, args.limit ?? 5, signal);
    }
    case 'track_package': {
      const args = parseArgs(name, validators.track_package, rawArgs);
      const { customerId } = await customer();
      const shipments = await platform.getShipments(customerId, 10, signal);
      const shipment = args.order_id ? shipments.find((s) => s.orderId === args.order_id) : shipments[0];
      return shipment ?? null;
    }
    case 'get_box_contents': {
      const args = parseArgs(name, validators.get_box_contents, rawArgs);
      const { customerId } = await customer();
      return platform.getBoxContents(customerId, args.month ?? currentMonth(), signal);
    }
    case 'generate_cancel_link': {
      parseArgs(name, validators.generate_cancel_link, rawArgs);
      const { email } = await customer();
      return generateCancelLink(email, deps.cancelLink);
    }
    case 'pause_subscription': {
      const args = parseArgs(name, validators.pause_subscription, rawArgs);
      const { customerId } = await customer();
      return platform.pauseSubscription(customerId, args.duration_months, signal);
    }
    case 'skip_month': {
      const args = parseArgs(name, validators.skip_month, rawArgs);
      const { customerId } = await customer();
      return platform.skipMonth(customerId, args.month, signal);
    }
    case 'change_frequency': {
      const args = parseArgs(name, validators.change_frequency, rawArgs);
      const { customerId } = await customer();
      return platform.changeFrequency(customerId, args.new_frequency, signal);
    }
    case 'change_address': {
      const args = parseArgs(name, validators.change_address, rawArgs);
      const { customerId } = await customer();
      return platform.changeAddress(
        customerId,
        { street: args.street, city: args.city, postalCode: args.postal_code, country: args.country, state: args.state },
        signal,
      );
    }
    case 'create_damage_claim': {
      const args = parseArgs(name, validators.create_damage_claim, rawArgs);
      const { customerId } = await customer();
      return platform.createDamageClaim(customerId, args.item_description, args.damage_description, signal);
    }
    case 'request_photos': {
      const args = parseArgs(name, validators.request_photos, rawArgs);
      const { customerId } = await customer();
      return platform.requestPhotos(customerId, args.claim_id, signal);
    }
    default: {
      const unhandled: never = name;
      throw new Error(`No handler for tool ${String(unhandled)}`);
    }
  }
}
