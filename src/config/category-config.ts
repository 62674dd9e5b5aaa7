import * as fs from 'fs';
import * as path from 'path';
import yaml from 'js-yaml';
import Ajv from 'ajv';
import { Category, CATEGORIES } from './types';
import { TOOL_NAMES, ToolName } from '../tools/types';
import { LLM_PROVIDER_NAMES, LLMProviderName } from '../llm/types';
import { logger } from '../observability/logger';

export const TEMPLATE_GROUPS = ['shipping', 'payment', 'subscription', 'damage', 'retention', 'gratitude', 'general'] as const;
export type TemplateGroup = (typeof TEMPLATE_GROUPS)[number];

export interface CategoryConfig {
  readonly category: Category;
  readonly provider?: LLMProviderName;
  readonly model?: string;
  readonly tools: readonly ToolName[];
  readonly knowledgePartition: string;
  readonly templateGroup: TemplateGroup;
  /** Rollout phase; the category can auto-send once the deployment phase reaches it */
  readonly autoSendPhase: number;
  readonly maxTokens: number;
  /** Universal rules followed by the category instructions */
  readonly instructions: string;
}

interface RawCategoryEntry {
  provider?: LLMProviderName;
  model?: string;
  tools: ToolName[];
  knowledge_partition: string;
  template_group: TemplateGroup;
  auto_send_phase: number;
  max_tokens?: number;
  instructions: string;
}

interface RawCategoryFile {
  universal_rules: string[];
  categories: Record<Category, RawCategoryEntry>;
}

const ENTRY_SCHEMA = {
  type: 'object',
  properties: {
    provider: { type: 'string', enum: [...LLM_PROVIDER_NAMES] },
    model: { type: 'string', minLength: 1 },
    tools: { type: 'array', items: { type: 'string', enum: [...TOOL_NAMES] }, uniqueItems: true },
    knowledge_partition: { type: 'string', minLength: 1 },
    template_group: { type: 'string', enum: [...TEMPLATE_GROUPS] },
    auto_send_phase: { type: 'integer', minimum: 1 },
    max_tokens: { type: 'integer', minimum: 50 },
    instructions: { type: 'string', minLength: 1 },
  },
  required: ['tools', 'knowledge_partition', 'template_group', 'auto_send_phase', 'instructions'],
  additionalProperties: false,
};

const FILE_SCHEMA = {
  type: 'object',
  properties: {
    universal_rules: { type: 'array', items: { type: 'string', minLength: 1 }, minItems: 1 },
    categories: {
      type: 'object',
      properties: Object.fromEntries(CATEGORIES.map((c) => [c, ENTRY_SCHEMA])),
      required: [...CATEGORIES],
      additionalProperties: false,
    },
  },
  required: ['universal_rules', 'categories'],
  additionalProperties: false,
};

const validateFile = new Ajv({ allErrors: true }).compile<RawCategoryFile>(FILE_SCHEMA);

const DEFAULT_CONFIG_FILE = path.resolve(__dirname, '..', '..', 'config', 'categories.yaml');
const DEFAULT_MAX_TOKENS = 800;

/** Immutable category → configuration table */
export class CategoryConfigTable {
  constructor(private readonly table: ReadonlyMap<Category, CategoryConfig>) {}

  get(category: Category): CategoryConfig {
    const config = this.table.get(category);
    if (!config) {
      // construction guarantees every category is present
      throw new Error(`No configuration for category ${category}`);
    }
    return config;
  }

  categories(): Category[] {
    return [...this.table.keys()];
  }
}

function composeInstructions(universalRules: string[], instructions: string): string {
  const rules = universalRules.map((rule, i) => `${i + 1}. ${rule}`).join('\n');
  return `SAFETY RULES (NEVER VIOLATE):\n${rules}\n\n${instructions.trim()}`;
}

/** Build the table from an already-parsed document */
export function buildCategoryTable(document: unknown): CategoryConfigTable {
  if (!validateFile(document)) {
    const errors = validateFile.errors?.map((e) => `${e.instancePath} ${e.message}`).join('; ');
    throw new Error(`Invalid category configuration: ${errors}`);
  }

  const table = new Map<Category, CategoryConfig>();
  for (const category of CATEGORIES) {
    const raw = document.categories[category];
    table.set(
      category,
      Object.freeze({
        category,
        provider: raw.provider,
        model: raw.model,
        tools: Object.freeze([...raw.tools]),
        knowledgePartition: raw.knowledge_partition,
        templateGroup: raw.template_group,
        autoSendPhase: raw.auto_send_phase,
        maxTokens: raw.max_tokens ?? DEFAULT_MAX_TOKENS,
        instructions: composeInstructions(document.universal_rules, raw.instructions),
      }),
    );
  }
  return new CategoryConfigTable(table);
}

export function loadCategoryConfig(filePath = DEFAULT_CONFIG_FILE): CategoryConfigTable {
  const document: unknown = yaml.load(fs.readFileSync(filePath, 'utf-8'));
  const table = buildCategoryTable(document);
  logger.info({ filePath, categories: table.categories().length }, 'Category configuration loaded');
  return table;
}
