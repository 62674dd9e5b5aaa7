import {
  ConfirmRequiredToolName,
  DisplayToolName,
  ReadOnlyToolName,
  ToolName,
} from './types';

interface ToolSpecBase {
  description: string;
  /** JSON Schema for the arguments the model may pass */
  inputSchema: Record<string, unknown>;
}

export interface ReadOnlyToolSpec extends ToolSpecBase {
  mode: 'read_only';
}

export interface ConfirmRequiredToolSpec extends ToolSpecBase {
  mode: 'confirm_required';
  /** Short human label shown on the confirmation form and in reply notes */
  label: string;
}

export interface DisplayToolSpec extends ToolSpecBase {
  mode: 'display_only';
  /** Read-only tool whose result the widget renders */
  fetchVia: ReadOnlyToolName;
  widget: string;
}

type ToolCatalog = { [K in ReadOnlyToolName]: ReadOnlyToolSpec } &
  { [K in ConfirmRequiredToolName]: ConfirmRequiredToolSpec } &
  { [K in DisplayToolName]: DisplayToolSpec };

const NO_ARGS = { type: 'object', properties: {}, additionalProperties: false };

const LIMIT_ARGS = {
  type: 'object',
  properties: { limit: { type: 'integer', minimum: 1, maximum: 12 } },
  additionalProperties: false,
};

const TRACK_ARGS = {
  type: 'object',
  properties: { order_id: { type: 'string', minLength: 1 } },
  additionalProperties: false,
};

const MONTH_ARGS = {
  type: 'object',
  properties: { month: { type: 'string', pattern: '^\\d{4}-\\d{2}$' } },
  additionalProperties: false,
};

/**
 * Static tool → governance mode table. The mode of a call is read from here,
 * never from the model output.
 */
export const TOOL_CATALOG: ToolCatalog = {
  // ─── Read-only ───
  get_subscription: {
    mode: 'read_only',
    description: 'Current subscription status, frequency, next charge date and shipping address.',
    inputSchema: NO_ARGS,
  },
  get_customer_history: {
    mode: 'read_only',
    description: 'Recent orders and prior support interactions for the customer.',
    inputSchema: LIMIT_ARGS,
  },
  get_payment_history: {
    mode: 'read_only',
    description: 'Recent charges and refunds.',
    inputSchema: LIMIT_ARGS,
  },
  track_package: {
    mode: 'read_only',
    description: 'Carrier status for the latest shipment, or a specific order.',
    inputSchema: TRACK_ARGS,
  },
  get_box_contents: {
    mode: 'read_only',
    description: 'Items in a monthly box (defaults to the current month).',
    inputSchema: MONTH_ARGS,
  },
  generate_cancel_link: {
    mode: 'read_only',
    description: 'Signed self-service cancellation link for the customer.',
    inputSchema: NO_ARGS,
  },

  // ─── Confirm-required ───
  pause_subscription: {
    mode: 'confirm_required',
    label: 'Pause subscription',
    description: 'Pause the subscription for 1 to 3 months.',
    inputSchema: {
      type: 'object',
      properties: { duration_months: { type: 'integer', minimum: 1, maximum: 3 } },
      required: ['duration_months'],
      additionalProperties: false,
    },
  },
  skip_month: {
    mode: 'confirm_required',
    label: 'Skip a month',
    description: 'Skip one upcoming monthly box.',
    inputSchema: {
      type: 'object',
      properties: { month: { type: 'string', pattern: '^\\d{4}-\\d{2}$' } },
      required: ['month'],
      additionalProperties: false,
    },
  },
  change_frequency: {
    mode: 'confirm_required',
    label: 'Change delivery frequency',
    description: 'Change how often boxes are delivered.',
    inputSchema: {
      type: 'object',
      properties: { new_frequency: { type: 'string', enum: ['monthly', 'bi-monthly', 'quarterly'] } },
      required: ['new_frequency'],
      additionalProperties: false,
    },
  },
  change_address: {
    mode: 'confirm_required',
    label: 'Update shipping address',
    description: 'Replace the shipping address on the subscription.',
    inputSchema: {
      type: 'object',
      properties: {
        street: { type: 'string', minLength: 3 },
        city: { type: 'string', minLength: 2 },
        postal_code: { type: 'string', minLength: 2 },
        country: { type: 'string', minLength: 2 },
        state: { type: 'string' },
      },
      required: ['street', 'city', 'postal_code', 'country'],
      additionalProperties: false,
    },
  },
  create_damage_claim: {
    mode: 'confirm_required',
    label: 'Open damage claim',
    description: 'Open a claim for a damaged or leaking item.',
    inputSchema: {
      type: 'object',
      properties: {
        item_description: { type: 'string', minLength: 2 },
        damage_description: { type: 'string', minLength: 2 },
      },
      required: ['item_description', 'damage_description'],
      additionalProperties: false,
    },
  },
  request_photos: {
    mode: 'confirm_required',
    label: 'Request photos of the damage',
    description: 'Send the customer an upload link for damage photos.',
    inputSchema: {
      type: 'object',
      properties: { claim_id: { type: 'string', minLength: 1 } },
      additionalProperties: false,
    },
  },

  // ─── Display-only ───
  show_tracking: {
    mode: 'display_only',
    fetchVia: 'track_package',
    widget: 'tracking',
    description: 'Show the tracking widget.',
    inputSchema: TRACK_ARGS,
  },
  show_payment_history: {
    mode: 'display_only',
    fetchVia: 'get_payment_history',
    widget: 'payment_history',
    description: 'Show the payment history widget.',
    inputSchema: LIMIT_ARGS,
  },
  show_order_history: {
    mode: 'display_only',
    fetchVia: 'get_customer_history',
    widget: 'order_history',
    description: 'Show the order history widget.',
    inputSchema: LIMIT_ARGS,
  },
  show_box_contents: {
    mode: 'display_only',
    fetchVia: 'get_box_contents',
    widget: 'box_contents',
    description: 'Show the box contents widget.',
    inputSchema: MONTH_ARGS,
  },
};

/** Prompt-facing description of a set of tools */
export function describeTools(names: readonly ToolName[]): Array<{ name: ToolName; description: string; args: Record<string, unknown> }> {
  return names.map((name) => ({
    name,
    description: TOOL_CATALOG[name].description,
    args: TOOL_CATALOG[name].inputSchema,
  }));
}
