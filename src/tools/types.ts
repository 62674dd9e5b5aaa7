// ───── Closed tool identifiers ─────

export const READ_ONLY_TOOLS = [
  'get_subscription',
  'get_customer_history',
  'get_payment_history',
  'track_package',
  'get_box_contents',
  'generate_cancel_link',
] as const;

export const CONFIRM_REQUIRED_TOOLS = [
  'pause_subscription',
  'skip_month',
  'change_frequency',
  'change_address',
  'create_damage_claim',
  'request_photos',
] as const;

export const DISPLAY_ONLY_TOOLS = [
  'show_tracking',
  'show_payment_history',
  'show_order_history',
  'show_box_contents',
] as const;

export type ReadOnlyToolName = (typeof READ_ONLY_TOOLS)[number];
export type ConfirmRequiredToolName = (typeof CONFIRM_REQUIRED_TOOLS)[number];
export type DisplayToolName = (typeof DISPLAY_ONLY_TOOLS)[number];

/** Tools the action executor can run */
export type ActionToolName = ReadOnlyToolName | ConfirmRequiredToolName;
export type ToolName = ActionToolName | DisplayToolName;

export const TOOL_NAMES: readonly ToolName[] = [
  ...READ_ONLY_TOOLS,
  ...CONFIRM_REQUIRED_TOOLS,
  ...DISPLAY_ONLY_TOOLS,
];

export type GovernanceMode = 'read_only' | 'confirm_required' | 'display_only';

export function isToolName(value: string): value is ToolName {
  return TOOL_NAMES.some((name) => name === value);
}

export function isReadOnlyTool(name: ToolName): name is ReadOnlyToolName {
  return READ_ONLY_TOOLS.some((tool) => tool === name);
}

export function isDisplayTool(name: ToolName): name is DisplayToolName {
  return DISPLAY_ONLY_TOOLS.some((tool) => tool === name);
}

export function isConfirmRequiredTool(name: ToolName): name is ConfirmRequiredToolName {
  return CONFIRM_REQUIRED_TOOLS.some((tool) => tool === name);
}

// ───── Arguments per tool ─────

export interface AddressArgs {
  street: string;
  city: string;
  postal_code: string;
  country: string;
  state?: string;
}

export interface ToolArgs {
  get_subscription: Record<string, never>;
  get_customer_history: { limit?: number };
  get_payment_history: { limit?: number };
  track_package: { order_id?: string };
  get_box_contents: { month?: string };
  generate_cancel_link: Record<string, never>;
  pause_subscription: { duration_months: number };
  skip_month: { month: string };
  change_frequency: { new_frequency: 'monthly' | 'bi-monthly' | 'quarterly' };
  change_address: AddressArgs;
  create_damage_claim: { item_description: string; damage_description: string };
  request_photos: { claim_id?: string };
}

// ───── Execution ─────

export interface ToolContext {
  turnId: string;
  sessionId: string;
  /** Contact key of the identified customer; tools that act on an account need it */
  customerEmail?: string;
}

export interface ToolResult {
  success: boolean;
  data?: unknown;
  error?: string;
}

/** External action collaborator */
export interface ActionExecutor {
  execute(toolName: ActionToolName, args: Record<string, unknown>, ctx: ToolContext): Promise<ToolResult>;
}
