import type { Logger } from 'pino';
import { ActionExecutor, ActionToolName, ToolContext, ToolResult } from './types';
import { TOOL_CATALOG } from './catalog';
import { CustomerRequiredError, dispatchTool, HandlerDeps, ToolArgumentError } from './handlers';
import { TimeoutError, withTimeout } from '../resilience/timeout';
import { logger } from '../observability/logger';
import { toolCallDuration, toolRetries } from '../observability/metrics';
import { redactObject } from '../observability/pii-redactor';
import { getAuditService } from '../audit/audit-service';

const DEFAULT_RETRY_DELAY_MS = 500;

export interface ActionRuntimeOptions {
  timeoutMs: number;
  retryDelayMs?: number;
}

/**
 * Action executor over the commerce platform.
 *
 * - Argument validation against the catalog schema
 * - Timeout enforcement
 * - One retry for read-only tools; mutating tools never retry
 * - Structured, PII-redacted logging and an audit record per call
 * - Safe error messages (no upstream detail reaches the reply)
 *
 * Identical calls are not deduplicated; each call executes.
 */
export class ActionRuntime implements ActionExecutor {
  private readonly retryDelayMs: number;

  constructor(
    private readonly deps: HandlerDeps,
    private readonly options: ActionRuntimeOptions,
  ) {
    this.retryDelayMs = options.retryDelayMs ?? DEFAULT_RETRY_DELAY_MS;
  }

  async execute(toolName: ActionToolName, args: Record<string, unknown>, ctx: ToolContext): Promise<ToolResult> {
    const startTime = Date.now();
    const log = logger.child({ tool: toolName, turnId: ctx.turnId, sessionId: ctx.sessionId });
    const retryable = TOOL_CATALOG[toolName].mode === 'read_only';

    let result = await this.tryExecute(toolName, args, ctx, log);
    let attempts = 1;

    if (!result.success && retryable && result.error !== 'Invalid input' && result.error !== 'Customer not identified') {
      log.info({ retryDelayMs: this.retryDelayMs }, 'Tool failed, retrying once');
      toolRetries.inc({ tool: toolName });
      await delay(this.retryDelayMs);
      result = await this.tryExecute(toolName, args, ctx, log);
      attempts++;
    }

    const durationMs = Date.now() - startTime;
    toolCallDuration.observe({ tool: toolName, status: result.success ? 'success' : 'error' }, durationMs / 1000);

    log.info(
      {
        args: redactObject(args),
        success: result.success,
        error: result.error,
        attempts,
        durationMs,
      },
      'Tool call completed',
    );

    getAuditService()?.recordQuietly({
      category: 'tool_execution',
      action: 'tool_executed',
      actor: 'system',
      sessionId: ctx.sessionId,
      turnId: ctx.turnId,
      details: { tool: toolName, success: result.success, error: result.error, attempts, durationMs },
    });

    return result;
  }

  /** Single attempt with timeout */
  private async tryExecute(
    toolName: ActionToolName,
    args: Record<string, unknown>,
    ctx: ToolContext,
    log: Logger,
  ): Promise<ToolResult> {
    try {
      const data = await withTimeout(`tool:${toolName}`, this.options.timeoutMs, (signal) =>
        dispatchTool(toolName, args, ctx.customerEmail, this.deps, signal),
      );
      return { success: true, data };
    } catch (err) {
      if (err instanceof ToolArgumentError) {
        log.warn({ err: err.message }, 'Tool input schema validation failed');
        return { success: false, error: 'Invalid input' };
      }
      if (err instanceof CustomerRequiredError) {
        return { success: false, error: 'Customer not identified' };
      }
      log.error({ err }, 'Tool execution attempt failed');
      return {
        success: false,
        error: err instanceof TimeoutError ? 'Tool execution timed out' : 'Tool execution failed',
      };
    }
  }
}

function delay(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}
