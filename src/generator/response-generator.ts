import type { Logger } from 'pino';
import { v4 as uuid } from 'uuid';
import { GENERATION_CONTRACT_SCHEMA, normalizeToolName, validateGeneration } from './response-contract';
import { Category } from '../config/types';
import { CategoryConfigTable } from '../config/category-config';
import { ContextBundle } from '../context/types';
import { renderContext } from '../context/context-assembler';
import { KnowledgeDocument, KnowledgeLookup } from '../knowledge/types';
import { InferenceService } from '../llm/inference-service';
import { CostLedger } from '../llm/cost-ledger';
import { describeTools } from '../tools/catalog';
import { isToolName, ToolName } from '../tools/types';
import { CorrectionStore } from '../learning/types';
import { buildFewShotBlock } from '../learning/few-shot';
import { getAuditService } from '../audit/audit-service';
import { logger } from '../observability/logger';
import { governanceViolations } from '../observability/metrics';

export interface ProposedToolCall {
  callId: string;
  turnId: string;
  name: ToolName;
  args: Record<string, unknown>;
}

export interface RejectedToolCall {
  name: string;
  args: Record<string, unknown>;
  reason: 'tool_not_allowed';
}

export type GenerationResult =
  | {
      ok: true;
      draftBody: string;
      toolCalls: ProposedToolCall[];
      rejected: RejectedToolCall[];
      knowledgeIds: string[];
    }
  | { ok: false; error: string };

export interface GenerateOptions {
  turnId: string;
  signal?: AbortSignal;
  ledger?: CostLedger;
}

export interface GeneratorOptions {
  timeoutMs: number;
  /** Recent human corrections shown per category; 0 turns injection off */
  fewShotExamples?: number;
}

const KNOWLEDGE_LIMIT = 3;

/**
 * Category-configured draft generation. Proposed tool calls are checked
 * against the closed tool set and the category allow-list before anything
 * downstream sees them.
 */
export class ResponseGenerator {
  private readonly log = logger.child({ component: 'response-generator' });

  constructor(
    private readonly inference: InferenceService,
    private readonly categories: CategoryConfigTable,
    private readonly knowledge: KnowledgeLookup,
    private readonly options: GeneratorOptions,
    private readonly corrections?: CorrectionStore,
  ) {}

  async generate(category: Category, bundle: ContextBundle, text: string, opts: GenerateOptions): Promise<GenerationResult> {
    const config = this.categories.get(category);
    const log = this.log.child({ turnId: opts.turnId, category });

    let documents: KnowledgeDocument[] = [];
    try {
      documents = await this.knowledge.search(config.knowledgePartition, text, KNOWLEDGE_LIMIT);
    } catch (err) {
      log.warn({ err, partition: config.knowledgePartition }, 'Knowledge search failed (non-blocking)');
    }

    const fewShot = await this.fewShotBlock(category, log);

    const systemPrompt = [
      config.instructions,
      ...(fewShot ? ['', fewShot] : []),
      '',
      '--- KNOWLEDGE ---',
      documents.length > 0 ? documents.map((d) => `[${d.id}] ${d.title}: ${d.content}`).join('\n') : '(none)',
      '',
      '--- TOOLS ---',
      config.tools.length > 0 ? JSON.stringify(describeTools(config.tools), null, 2) : 'No tools are available for this request.',
      '',
      '--- RESPONSE FORMAT ---',
      'You MUST respond with a JSON object matching this schema:',
      JSON.stringify(GENERATION_CONTRACT_SCHEMA, null, 2),
    ].join('\n');

    const result = await this.inference.infer({
      purpose: 'generate',
      messages: [
        { role: 'system', content: systemPrompt },
        { role: 'user', content: `${renderContext(bundle)}\n\n--- CUSTOMER MESSAGE ---\n${text}` },
      ],
      validate: validateGeneration,
      timeoutMs: this.options.timeoutMs,
      provider: config.provider,
      model: config.model,
      maxTokens: config.maxTokens,
      signal: opts.signal,
    });
    opts.ledger?.record('generate', result.meta);

    if (!result.ok) {
      log.warn({ kind: result.error.kind }, 'Generation failed');
      return { ok: false, error: result.error.kind };
    }

    const toolCalls: ProposedToolCall[] = [];
    const rejected: RejectedToolCall[] = [];

    for (const raw of result.data.tool_calls) {
      const name = normalizeToolName(raw.name);
      const args = raw.args ?? {};
      if (isToolName(name) && config.tools.includes(name)) {
        toolCalls.push({ callId: uuid(), turnId: opts.turnId, name, args });
      } else {
        rejected.push({ name, args, reason: 'tool_not_allowed' });
        this.recordViolation(name, category, opts.turnId, bundle.sessionId);
      }
    }

    log.info(
      {
        provider: result.meta.provider,
        model: result.meta.model,
        latencyMs: result.meta.latencyMs,
        proposed: toolCalls.map((c) => c.name),
        rejected: rejected.map((c) => c.name),
      },
      'Draft generated',
    );

    return {
      ok: true,
      draftBody: result.data.reply.trim(),
      toolCalls,
      rejected,
      knowledgeIds: documents.map((d) => d.id),
    };
  }

  private async fewShotBlock(category: Category, log: Logger): Promise<string | undefined> {
    const limit = this.options.fewShotExamples ?? 0;
    if (!this.corrections || limit <= 0) return undefined;
    try {
      return buildFewShotBlock(await this.corrections.recent(category, limit));
    } catch (err) {
      log.warn({ err }, 'Correction lookup failed; generating without examples');
      return undefined;
    }
  }

  private recordViolation(toolName: string, category: Category, turnId: string, sessionId: string): void {
    governanceViolations.inc({ kind: 'tool_not_allowed' });
    this.log.warn({ toolName, category, turnId }, 'Governance violation: tool not allowed for category');

    getAuditService()?.recordQuietly({
      category: 'governance_violation',
      action: 'tool_not_allowed',
      actor: 'pipeline',
      sessionId,
      turnId,
      details: { tool: toolName, category },
    });
  }
}
