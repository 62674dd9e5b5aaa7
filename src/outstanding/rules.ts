import * as fs from 'fs';
import * as path from 'path';
import yaml from 'js-yaml';
import Ajv from 'ajv';
import { logger } from '../observability/logger';

export interface OutstandingRule {
  readonly id: string;
  readonly trigger: string;
  readonly patterns: readonly RegExp[];
}

interface RawRuleFile {
  rules: Array<{ id: string; trigger: string; patterns: string[] }>;
}

const validateRuleFile = new Ajv({ allErrors: true }).compile<RawRuleFile>({
  type: 'object',
  properties: {
    rules: {
      type: 'array',
      items: {
        type: 'object',
        properties: {
          id: { type: 'string', minLength: 1 },
          trigger: { type: 'string', pattern: '^[a-z][a-z0-9_]*$' },
          patterns: { type: 'array', items: { type: 'string', minLength: 1 }, minItems: 1 },
        },
        required: ['id', 'trigger', 'patterns'],
        additionalProperties: false,
      },
    },
  },
  required: ['rules'],
});

const DEFAULT_RULES_FILE = path.resolve(__dirname, '..', '..', 'config', 'outstanding-rules.yaml');

/** Compile an already-parsed rule document */
export function buildRules(document: unknown): OutstandingRule[] {
  if (!validateRuleFile(document)) {
    const errors = validateRuleFile.errors?.map((e) => `${e.instancePath} ${e.message}`).join('; ');
    throw new Error(`Invalid outstanding rules: ${errors}`);
  }
  return document.rules.map((rule) =>
    Object.freeze({
      id: rule.id,
      trigger: rule.trigger,
      patterns: Object.freeze(rule.patterns.map((p) => new RegExp(p, 'i'))),
    }),
  );
}

export function loadOutstandingRules(filePath = DEFAULT_RULES_FILE): OutstandingRule[] {
  const rules = buildRules(yaml.load(fs.readFileSync(filePath, 'utf-8')));
  logger.info({ filePath, rules: rules.length }, 'Outstanding rules loaded');
  return rules;
}

/** First rule with a matching pattern, in file order */
export function matchRule(rules: readonly OutstandingRule[], text: string): OutstandingRule | undefined {
  return rules.find((rule) => rule.patterns.some((pattern) => pattern.test(text)));
}
