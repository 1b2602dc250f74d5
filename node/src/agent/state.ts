/**
 * Per-turn state shared by the supervisor, RAG and hybrid graphs.
 * One GraphState is owned by one run and discarded when the turn ends.
 */

import type { ConversationEntry } from '@/memory/conversation-store';
import type { ScoredChunk } from '@/rag/types';
import type { FailureStage } from '@/stability/errors';
import type { ToolCall, ToolName } from '@/tools/tool-contract';

export type Route = 'RAG' | 'HYBRID' | 'DIRECT';

export type DocGrade = 'relevant' | 'irrelevant';

export interface Turn {
  readonly sessionId: string;
  readonly userText: string;
  readonly timestamp: Date;
}

export interface Citation {
  source: string;
  kind: 'document' | 'tool';
  title?: string;
}

/** A partial failure the turn survived. */
export interface Degradation {
  stage: FailureStage;
  reason: string;
  toolName?: ToolName;
}

export interface RouteDecision {
  route: Route;
  confidence: number;
  reason: string;
  intent?: string;
  toolHint?: ToolName[];
}

/** Read-only inputs of one run. */
export interface TurnContext {
  history: readonly ConversationEntry[];
  signal?: AbortSignal;
}

export interface GraphState {
  originalQuery: string;
  rewrittenQuery?: string;
  route: Route;
  /** Most relevant first. */
  retrievedDocs: ScoredChunk[];
  docGrades: Record<string, DocGrade>;
  /** One record per attempt, grouped by tool in invocation order. */
  toolCalls: ToolCall[];
  retryCount: number;
  finalAnswer: string;
  citations: Citation[];
  grounded: boolean;
  degradations: Degradation[];
  /** Visited states, in order. */
  trace: string[];
}

export function createGraphState(originalQuery: string, route: Route): GraphState {
  return {
    originalQuery,
    route,
    retrievedDocs: [],
    docGrades: {},
    toolCalls: [],
    retryCount: 0,
    finalAnswer: '',
    citations: [],
    grounded: false,
    degradations: [],
    trace: [],
  };
}

/** Retrieved chunks that grading did not reject, in retrieval order. */
export function contextDocuments(state: Pick<GraphState, 'retrievedDocs' | 'docGrades'>): ScoredChunk[] {
  return state.retrievedDocs.filter(({ chunk }) => state.docGrades[chunk.id] !== 'irrelevant');
}

export function recordDegradation(state: GraphState, degradation: Degradation): void {
  state.degradations.push(degradation);
}
