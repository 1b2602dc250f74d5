/**
 * POST /chat: one conversational turn.
 *
 * The route only validates, maps fields and shapes the reply; all behavior lives in
 * the supervisor. A client disconnect or the request timeout aborts the turn.
 */

import express, { type Request, type Response } from 'express';
import { z } from 'zod';
import { GRAPH_IDS, type SupervisorGraph } from '@/agent/supervisor-graph';
import type { Route } from '@/agent/state';
import { correlationIdOf } from '@/middleware/correlation';
import { componentLogger } from '@/services/logger';
import { requestAbortController } from '@/stability/errorHandlers';
import { errorMessage, TurnCancelledError, ValidationError } from '@/stability/errors';
import { createErrorResponse, type ErrorResponse } from '@/utils/errorResponse';

const log = componentLogger('chat');

export const chatRequestSchema = z.object({
  chat_id: z.string().trim().min(1).max(200),
  message: z.string().trim().min(1, 'message must not be empty').max(4000),
  graph_id: z.enum(GRAPH_IDS).optional(),
});

export interface ChatReply {
  reply: string;
  citations: Array<{ source: string; kind: 'document' | 'tool' }>;
  route: Route;
  grounded: boolean;
}

export interface ChatHandlerResult {
  status: number;
  body: ChatReply | ErrorResponse;
}

/**
 * Transport-free handler, also used by tests.
 *
 * @throws TurnCancelledError when `signal` fires before the answer is ready
 */
export async function handleChat(
  supervisor: Pick<SupervisorGraph, 'handleTurn'>,
  body: unknown,
  signal?: AbortSignal,
): Promise<ChatHandlerResult> {
  const parsed = chatRequestSchema.safeParse(body);
  if (!parsed.success) {
    const invalid = ValidationError.fromZod('Invalid request body', parsed.error.issues);
    return { status: 400, body: createErrorResponse('Invalid request body', invalid.issues, invalid.code) };
  }

  const { chat_id: sessionId, message, graph_id: graphId } = parsed.data;
  try {
    const result = await supervisor.handleTurn(
      { sessionId, userText: message, timestamp: new Date() },
      { graphId, signal },
    );
    return {
      status: 200,
      body: {
        reply: result.finalAnswer,
        citations: result.citations.map(({ source, kind }) => ({ source, kind })),
        route: result.routeTaken,
        grounded: result.grounded,
      },
    };
  } catch (error) {
    if (error instanceof TurnCancelledError) throw error;
    log.error('chat:turn_failed', { sessionId, error: errorMessage(error) });
    return { status: 500, body: createErrorResponse('Internal server error', undefined, 'INTERNAL_ERROR') };
  }
}

export function createChatRouter(supervisor: Pick<SupervisorGraph, 'handleTurn'>): express.Router {
  const router = express.Router();

  router.post('/', async (req: Request, res: Response) => {
    // the request timeout aborts the same controller after answering 408
    const controller = requestAbortController(res) ?? new AbortController();
    res.on('close', () => {
      if (!res.writableEnded) controller.abort();
    });

    try {
      const { status, body } = await handleChat(supervisor, req.body, controller.signal);
      res.status(status).json(body);
    } catch (error) {
      if (error instanceof TurnCancelledError) {
        log.info('chat:turn_cancelled', { correlationId: correlationIdOf(res), timedOut: res.headersSent });
        return;
      }
      log.error('chat:unexpected_error', { correlationId: correlationIdOf(res), error: errorMessage(error) });
      if (!res.headersSent) {
        res.status(500).json(createErrorResponse('Internal server error', undefined, 'INTERNAL_ERROR'));
      }
    }
  });

  return router;
}
