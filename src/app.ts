import Fastify, { FastifyInstance } from 'fastify';
import cors from '@fastify/cors';
import Redis from 'ioredis';
import { env } from './config/env';
import { CategoryConfigTable, loadCategoryConfig } from './config/category-config';
import { logger } from './observability/logger';
import { httpRequestDuration } from './observability/metrics';
import { buildProviders, resolveRouterConfig } from './llm/provider-factory';
import { ModelRouter } from './llm/model-router';
import { InferenceService, RoutedInferenceService } from './llm/inference-service';
import { CompletionBackend } from './llm/types';
import { CommercePlatform } from './platform/types';
import { loadSeedAccounts, MockCommercePlatform } from './platform/mock-platform';
import { HttpCommercePlatform } from './platform/http-platform';
import { ActionRuntime } from './tools/runtime';
import { KnowledgeService } from './knowledge/knowledge-service';
import { KnowledgeLookup } from './knowledge/types';
import { MessageClassifier } from './classifier/message-classifier';
import { ContextAssembler } from './context/context-assembler';
import { createHistoryStore } from './memory/history-store';
import { HistoryStore } from './memory/types';
import { ResponseGenerator } from './generator/response-generator';
import { OutstandingDetector } from './outstanding/outstanding-detector';
import { loadOutstandingRules, OutstandingRule } from './outstanding/rules';
import { ToolCallGovernor } from './governance/tool-call-governor';
import { ConfirmationStore, createConfirmationStore } from './governance/confirmation-store';
import { TurnEventBus } from './governance/events';
import { loadReplyTemplates, ReplyTemplates, ResponseAssembler } from './assembler/response-assembler';
import { ReplyJudge } from './evaluation/judge';
import { EvaluationGate } from './evaluation/evaluation-gate';
import { Orchestrator } from './orchestrator/orchestrator';
import { createDedupStore, DedupStore } from './security/dedup-store';
import { createAuditStore } from './audit/audit-store';
import { initAuditService } from './audit/audit-service';
import { registerTurnRoutes } from './channels/turn-routes';
import { registerCorrectionRoutes } from './channels/correction-routes';
import { createCorrectionStore } from './learning/correction-store';
import { CorrectionStore } from './learning/types';
import { llmReadiness, redisReadiness, registerHealthRoutes } from './health/health-routes';

export interface PipelineDeps {
  inference: InferenceService;
  platform: CommercePlatform;
  redis?: Redis;
  knowledge?: KnowledgeLookup;
  categories?: CategoryConfigTable;
  rules?: OutstandingRule[];
  templates?: ReplyTemplates;
  history?: HistoryStore;
  confirmations?: ConfirmationStore;
  corrections?: CorrectionStore;
}

export interface Pipeline {
  orchestrator: Orchestrator;
  events: TurnEventBus;
  history: HistoryStore;
  confirmations: ConfirmationStore;
  corrections: CorrectionStore;
}

/** Wire every pipeline component; stores are Redis-backed when a connection is given */
export function buildPipeline(deps: PipelineDeps): Pipeline {
  const categories = deps.categories ?? loadCategoryConfig();
  const knowledge = deps.knowledge ?? new KnowledgeService();
  const history = deps.history ?? createHistoryStore(deps.redis);
  const confirmations = deps.confirmations ?? createConfirmationStore(deps.redis);
  const corrections = deps.corrections ?? createCorrectionStore(deps.redis);
  const events = new TurnEventBus();

  const executor = new ActionRuntime(
    {
      platform: deps.platform,
      cancelLink: {
        baseUrl: env.platform.cancelLinkBaseUrl,
        secret: env.platform.cancelLinkSecret,
        ttlHours: env.platform.cancelLinkTtlHours,
      },
    },
    { timeoutMs: env.timeouts.toolMs },
  );

  const orchestrator = new Orchestrator(
    {
      classifier: new MessageClassifier(deps.inference, {
        timeoutMs: env.timeouts.classifierMs,
        model: env.llm.classifierModel,
      }),
      context: new ContextAssembler(
        { identity: deps.platform, accounts: deps.platform, history },
        { ...env.context, lookupTimeoutMs: env.timeouts.lookupMs },
      ),
      generator: new ResponseGenerator(
        deps.inference,
        categories,
        knowledge,
        {
          timeoutMs: env.timeouts.generatorMs,
          fewShotExamples: env.learning.fewShotEnabled ? env.learning.fewShotExamples : 0,
        },
        corrections,
      ),
      detector: new OutstandingDetector(deps.rules ?? loadOutstandingRules(), knowledge, deps.inference, {
        similarityThreshold: env.outstanding.similarityThreshold,
        llmEnabled: env.outstanding.llmEnabled,
        timeoutMs: env.timeouts.outstandingMs,
        model: env.llm.outstandingModel,
      }),
      governor: new ToolCallGovernor(executor, confirmations, events, {
        confirmationDeadlineMs: env.governance.confirmationDeadlineMinutes * 60 * 1000,
      }),
      assembler: new ResponseAssembler(deps.templates ?? loadReplyTemplates()),
      gate: new EvaluationGate(
        new ReplyJudge(deps.inference, { timeoutMs: env.timeouts.judgeMs, model: env.llm.judgeModel }),
        categories,
        env.evaluation,
      ),
      history,
      confirmations,
      events,
      categories,
    },
    { maxMessageChars: env.turn.maxMessageChars, joinTimeoutMs: env.timeouts.joinMs },
  );

  return { orchestrator, events, history, confirmations, corrections };
}

export interface ServerDeps {
  orchestrator: Orchestrator;
  dedup: DedupStore;
  corrections: CorrectionStore;
  redis?: Redis;
  llm?: CompletionBackend;
}

export async function buildServer(deps: ServerDeps): Promise<FastifyInstance> {
  const app = Fastify({
    logger: false, // We use our own Pino logger
    trustProxy: true,
    bodyLimit: 1_048_576, // 1 MB
  });

  await app.register(cors, {
    origin: true,
    methods: ['GET', 'POST'],
  });

  // Request timing middleware
  app.addHook('onResponse', (req, reply, done) => {
    const route = req.routeOptions?.url ?? req.url;
    httpRequestDuration.observe(
      { method: req.method, route, status_code: String(reply.statusCode) },
      reply.elapsedTime / 1000,
    );
    done();
  });

  registerTurnRoutes(app, deps.orchestrator, deps.dedup);
  registerCorrectionRoutes(app, deps.corrections);
  registerHealthRoutes(app, [redisReadiness(deps.redis), llmReadiness(deps.llm)]);

  return app;
}

export interface AppContext {
  app: FastifyInstance;
  orchestrator: Orchestrator;
  redis?: Redis;
}

async function connectRedis(): Promise<Redis | undefined> {
  if (!env.redis.enabled) {
    logger.info('Redis disabled; using in-memory stores');
    return undefined;
  }
  try {
    const redisInstance = new Redis(env.redis.url, {
      maxRetriesPerRequest: 3,
      retryStrategy(times) {
        if (times > 5) return null; // stop retrying
        return Math.min(times * 200, 2000);
      },
      lazyConnect: true,
    });
    // Attach error handler BEFORE connect to prevent unhandled error events
    redisInstance.on('error', (err) => {
      logger.debug({ err: err.message }, 'Redis connection error (handled)');
    });
    await redisInstance.connect();
    logger.info('Redis connected');
    return redisInstance;
  } catch (err) {
    logger.warn({ err }, 'Redis not available; using in-memory fallback');
    return undefined;
  }
}

export async function buildApp(): Promise<AppContext> {
  const redis = await connectRedis();

  const auditService = initAuditService(createAuditStore(redis));
  await auditService.init();

  // ───── Multi-LLM provider stack ─────
  const providers = buildProviders({ openai: env.openai, anthropic: env.anthropic, gemini: env.gemini });
  const routerConfig = resolveRouterConfig(env.llm, providers);
  const modelRouter = new ModelRouter(routerConfig, providers);
  const inference = new RoutedInferenceService(modelRouter, {
    temperature: env.openai.temperature,
    maxTokens: env.openai.maxTokens,
  });

  const platform: CommercePlatform = env.platform.useMock
    ? new MockCommercePlatform(loadSeedAccounts())
    : new HttpCommercePlatform(env.platform.baseUrl, env.platform.apiKey);
  logger.info({ mock: env.platform.useMock }, 'Commerce platform initialized');

  const { orchestrator, corrections } = buildPipeline({ inference, platform, redis });
  const app = await buildServer({
    orchestrator,
    dedup: createDedupStore(redis),
    corrections,
    redis,
    llm: modelRouter,
  });

  return { app, orchestrator, redis };
}
