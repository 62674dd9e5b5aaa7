import { createHash } from 'crypto';
import * as fs from 'fs';
import * as path from 'path';
import yaml from 'js-yaml';
import Ajv from 'ajv';
import { formatToolResult } from './tool-results';
import { cleanName, extractSignatureName } from './name-extractor';
import { Channel } from '../config/types';
import { TEMPLATE_GROUPS, TemplateGroup } from '../config/category-config';
import { GovernedToolCall } from '../governance/types';
import { TOOL_CATALOG } from '../tools/catalog';
import { isToolName } from '../tools/types';
import { logger } from '../observability/logger';

export interface ReplyTemplates {
  openers: Record<TemplateGroup, string[]>;
  closers: string[];
  sign_off: string[];
}

export interface AssembleInput {
  body: string;
  templateGroup: TemplateGroup;
  sessionId: string;
  channel: Channel;
  /** Name from the identity record */
  customerName?: string;
  /** Name supplied by the channel (chat widget profile, email display name) */
  contactName?: string;
  /** Customer's message, searched for a signature when neither name is usable */
  messageText?: string;
  /** Governed calls of the turn, in proposal order */
  calls: GovernedToolCall[];
}

export interface AssembledReply {
  text: string;
  format: 'html' | 'text';
  /** False for hand-off replies, which are passed through untouched */
  wrapped: boolean;
  notes: string[];
}

const validateTemplates = new Ajv({ allErrors: true }).compile<ReplyTemplates>({
  type: 'object',
  properties: {
    openers: {
      type: 'object',
      properties: Object.fromEntries(
        TEMPLATE_GROUPS.map((g) => [g, { type: 'array', items: { type: 'string' }, minItems: 1 }]),
      ),
      required: [...TEMPLATE_GROUPS],
    },
    closers: { type: 'array', items: { type: 'string' }, minItems: 1 },
    sign_off: { type: 'array', items: { type: 'string' }, minItems: 1 },
  },
  required: ['openers', 'closers', 'sign_off'],
});

const DEFAULT_TEMPLATE_FILE = path.resolve(__dirname, '..', '..', 'config', 'reply-templates.yaml');

export function loadReplyTemplates(filePath = DEFAULT_TEMPLATE_FILE): ReplyTemplates {
  const document: unknown = yaml.load(fs.readFileSync(filePath, 'utf-8'));
  if (!validateTemplates(document)) {
    const errors = validateTemplates.errors?.map((e) => `${e.instancePath} ${e.message}`).join('; ');
    throw new Error(`Invalid reply templates: ${errors}`);
  }
  logger.info({ filePath }, 'Reply templates loaded');
  return document;
}

const FALLBACK_NAME = 'Customer';

const HANDOFF_PHRASES = [
  'connecting you with a support agent',
  'connect you with a human',
  'having trouble processing',
  'let me connect you',
];

/** Deterministic template index for a session: md5 of the id, as an integer */
export function templateIndex(sessionId: string, size: number): number {
  const digest = createHash('md5').update(sessionId).digest('hex');
  return Number(BigInt(`0x${digest}`) % BigInt(size));
}

export function isHandoffText(text: string): boolean {
  const lower = text.toLowerCase();
  return HANDOFF_PHRASES.some((phrase) => lower.includes(phrase));
}

function escapeRegExp(text: string): string {
  return text.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

export function stripExistingGreeting(text: string, name: string): string {
  const named = new RegExp(`^(Dear|Hi|Hello|Hey)\\s+${escapeRegExp(name)}[,!]?\\s*`, 'i');
  const generic = /^(Dear Customer|Dear Client|Hello|Hi there)[,!]?\s*/i;
  return text.trim().replace(named, '').replace(generic, '').trim();
}

function escapeHtml(text: string): string {
  return text.replace(/&/g, '&amp;').replace(/</g, '&lt;').replace(/>/g, '&gt;');
}

/**
 * Replace `{{tool_name}}` placeholders with the result of the latest call of
 * that tool that produced data. Placeholders with nothing to show are removed.
 */
export function substituteToolResults(body: string, calls: GovernedToolCall[]): string {
  return body
    .replace(/\{\{\s*([a-z_]+)\s*\}\}/g, (_match, name: string) => {
      if (!isToolName(name)) return '';
      const call = [...calls].reverse().find((c) => c.name === name && c.result?.success);
      return call ? formatToolResult(name, call.result?.data) : '';
    })
    .replace(/[ \t]{2,}/g, ' ')
    .trim();
}

/** Customer-facing notes for confirmation calls that have not (or not successfully) run */
export function actionNotes(calls: GovernedToolCall[]): string[] {
  const notes: string[] = [];
  for (const call of calls) {
    const entry = TOOL_CATALOG[call.name];
    if (entry.mode !== 'confirm_required') continue;

    if (call.state === 'awaiting_confirmation') {
      notes.push(`${entry.label}: this request is awaiting confirmation from our team.`);
    } else if (call.state === 'cancelled') {
      notes.push(
        call.cancelReason === 'rejected' || call.cancelReason === 'confirmation_expired'
          ? `${entry.label}: this action was not taken.`
          : `${entry.label}: we could not process this request, so no change was made.`,
      );
    } else if (call.state === 'completed' && !call.result?.success) {
      notes.push(`${entry.label}: we were unable to complete this change. A team member will follow up.`);
    }
  }
  return notes;
}

/**
 * Deterministic reply framing: greeting, opener, body, notes, closer, sign-off.
 * No inference call.
 */
export class ResponseAssembler {
  constructor(private readonly templates: ReplyTemplates) {}

  assemble(input: AssembleInput): AssembledReply {
    if (isHandoffText(input.body)) {
      return { text: input.body.trim(), format: 'text', wrapped: false, notes: [] };
    }

    const name =
      cleanName(input.customerName) ??
      cleanName(input.contactName) ??
      extractSignatureName(input.messageText) ??
      FALLBACK_NAME;
    const openers = this.templates.openers[input.templateGroup];
    const opener = openers[templateIndex(input.sessionId, openers.length)];
    const closer = this.templates.closers[templateIndex(input.sessionId, this.templates.closers.length)];

    const body = substituteToolResults(stripExistingGreeting(input.body, name), input.calls);
    const notes = actionNotes(input.calls);
    const sections = [`Dear ${name},`, opener, body, ...notes, closer].filter((s) => s.length > 0);

    if (input.channel === 'chat') {
      return {
        text: [...sections, this.templates.sign_off.join('\n')].join('\n\n'),
        format: 'text',
        wrapped: true,
        notes,
      };
    }

    const html = [
      ...sections.map((s) => `<div>${escapeHtml(s).replace(/\n/g, '<br>')}</div>`),
      `<div>${this.templates.sign_off.map(escapeHtml).join('<br>')}</div>`,
    ];
    return { text: html.join('\n'), format: 'html', wrapped: true, notes };
  }
}
