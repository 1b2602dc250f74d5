// node/src/tools/tool-layer.ts: validated, bounded invocation of catalog tools

import type { z } from 'zod';
import { componentLogger, type AppLogger } from '@/services/logger';
import {
  AssistantError,
  errorMessage,
  isRetryable,
  TimeoutError,
  ToolInvocationError,
  TurnCancelledError,
  ValidationError,
} from '@/stability/errors';
import { retryWithBackoff } from '@/stability/retryWithBackoff';
import { withTimeout } from '@/stability/timeout';
import { CityApiError, type CityApiClient } from './city-api-client';
import {
  hasData,
  toolInputSchemas,
  type ToolCall,
  type ToolFailure,
  type ToolInvocation,
  type ToolOutcome,
  type ToolInput,
  type ToolName,
  type ToolResult,
  type ToolResultOf,
} from './tool-contract';

/** One handler per catalog entry; adding a tool without a handler does not compile. */
export type ToolHandlers = {
  [N in ToolName]: (input: ToolInput<N>, signal: AbortSignal) => Promise<ToolResultOf<N>>;
};

export function createCityToolHandlers(client: CityApiClient): ToolHandlers {
  return {
    facility_search: async (input, signal) => ({
      tool: 'facility_search',
      facilities: await client.facilities(input, signal),
    }),
    district_info: async (input, signal) => ({
      tool: 'district_info',
      report: await client.districtReport(input, signal),
    }),
    events_search: async (input, signal) => ({
      tool: 'events_search',
      events: await client.events(input, signal),
    }),
    sport_events_search: async (input, signal) => ({
      tool: 'sport_events_search',
      events: await client.sportEvents(input, signal),
    }),
  };
}

export interface ToolLayerOptions {
  timeoutMs: number;
  /** Extra attempts after the first, for retryable failures only. */
  maxRetries: number;
  retryDelayMs: number;
}

interface PreparedCall {
  args: Record<string, unknown>;
  run: (signal: AbortSignal) => Promise<ToolResult>;
}

function parseInput<S extends z.ZodTypeAny>(toolName: ToolName, schema: S, raw: unknown): z.infer<S> {
  const result = schema.safeParse(raw ?? {});
  if (!result.success) {
    throw ValidationError.fromZod(`Invalid arguments for ${toolName}`, result.error.issues, 'tool');
  }
  return result.data;
}

function asRecord(value: unknown): Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value) ? { ...value } : {};
}

function toToolError(toolName: ToolName, error: unknown): ToolInvocationError {
  if (error instanceof ToolInvocationError) return error;
  if (error instanceof CityApiError) {
    return new ToolInvocationError(error.message, toolName, error.retryable, error.status, { cause: error });
  }
  if (error instanceof TimeoutError) {
    return new ToolInvocationError(error.message, toolName, true, undefined, { cause: error });
  }
  return new ToolInvocationError(`${toolName} failed: ${errorMessage(error)}`, toolName, false, undefined, {
    cause: error,
  });
}

function toFailure(error: AssistantError): ToolFailure {
  return {
    code: error.code,
    message: error.message,
    retryable: error.retryable,
    ...(error instanceof ToolInvocationError && error.status !== undefined ? { status: error.status } : {}),
  };
}

/**
 * Uniform entry point for all tools. `invoke` never throws for tool failures: every
 * attempt yields its own frozen ToolCall, and the last one carries the result or the
 * error. Only turn cancellation propagates.
 */
export class ToolLayer {
  private readonly log: AppLogger;

  constructor(
    private readonly handlers: ToolHandlers,
    private readonly options: ToolLayerOptions,
    log?: AppLogger,
  ) {
    this.log = log ?? componentLogger('tools');
  }

  private prepare(toolName: ToolName, rawArgs: unknown): PreparedCall {
    switch (toolName) {
      case 'facility_search': {
        const input = parseInput(toolName, toolInputSchemas.facility_search, rawArgs);
        return { args: input, run: (signal) => this.handlers.facility_search(input, signal) };
      }
      case 'district_info': {
        const input = parseInput(toolName, toolInputSchemas.district_info, rawArgs);
        return { args: input, run: (signal) => this.handlers.district_info(input, signal) };
      }
      case 'events_search': {
        const input = parseInput(toolName, toolInputSchemas.events_search, rawArgs);
        return { args: input, run: (signal) => this.handlers.events_search(input, signal) };
      }
      case 'sport_events_search': {
        const input = parseInput(toolName, toolInputSchemas.sport_events_search, rawArgs);
        return { args: input, run: (signal) => this.handlers.sport_events_search(input, signal) };
      }
    }
  }

  private record(
    toolName: ToolName,
    args: Record<string, unknown>,
    outcome: ToolOutcome,
    started: number,
    attempt: number,
  ): ToolCall {
    return Object.freeze({
      toolName,
      arguments: Object.freeze(args),
      outcome: Object.freeze(outcome),
      latencyMs: Date.now() - started,
      attempt,
    });
  }

  async invoke(toolName: ToolName, rawArgs: unknown, signal?: AbortSignal): Promise<ToolInvocation> {
    const started = Date.now();

    let prepared: PreparedCall;
    try {
      prepared = this.prepare(toolName, rawArgs);
    } catch (error) {
      if (!(error instanceof ValidationError)) throw error;
      this.log.warn('tool:invalid_arguments', { toolName, error: error.message });
      const rejected = this.record(toolName, asRecord(rawArgs), { ok: false, error: toFailure(error) }, started, 0);
      return Object.freeze({ toolName, calls: Object.freeze([rejected]), final: rejected });
    }

    const calls: ToolCall[] = [];
    const attemptOnce = async (attempt: number): Promise<ToolCall> => {
      const attemptStarted = Date.now();
      try {
        const result = await withTimeout((callSignal) => prepared.run(callSignal), {
          timeoutMs: this.options.timeoutMs,
          label: `tool:${toolName}`,
          stage: 'tool',
          signal,
        });
        const done = this.record(toolName, { ...prepared.args }, { ok: true, result }, attemptStarted, attempt);
        calls.push(done);
        return done;
      } catch (error) {
        if (error instanceof TurnCancelledError) throw error;
        const failure = toToolError(toolName, error);
        const outcome: ToolOutcome = { ok: false, error: toFailure(failure) };
        calls.push(this.record(toolName, { ...prepared.args }, outcome, attemptStarted, attempt));
        throw failure;
      }
    };

    try {
      const final = await retryWithBackoff(attemptOnce, {
        maxRetries: this.options.maxRetries,
        initialDelay: this.options.retryDelayMs,
        shouldRetry: isRetryable,
        signal,
        stage: 'tool',
        onRetry: (error, attempt, delayMs) =>
          this.log.warn('tool:retry', { toolName, attempt, delayMs: Math.round(delayMs), error: errorMessage(error) }),
      });
      const outcome = final.outcome;
      this.log.info('tool:invoke_done', {
        toolName,
        attempts: calls.length,
        latencyMs: Date.now() - started,
        hasData: outcome.ok && hasData(outcome.result),
      });
      return Object.freeze({ toolName, calls: Object.freeze([...calls]), final });
    } catch (error) {
      const final = calls.at(-1);
      // only failures recorded by an attempt end here; anything else is not a tool outcome
      if (error instanceof TurnCancelledError || !final) throw error;
      this.log.warn('tool:invoke_failed', {
        toolName,
        attempts: calls.length,
        latencyMs: Date.now() - started,
        error: errorMessage(error),
      });
      return Object.freeze({ toolName, calls: Object.freeze([...calls]), final });
    }
  }
}
