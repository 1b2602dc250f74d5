// node/src/agent/rag-graph.ts: rewrite → retrieve → grade → generate, with one broadening retry

import type { RagConfig } from '@/config/app.config';
import { generateGroundedAnswer } from '@/rag/answer-generator';
import { gradeDocuments } from '@/rag/document-grader';
import { rewriteForRetrieval } from '@/rag/query-rewrite';
import type { HybridRetriever } from '@/rag/retriever';
import type { ScoredChunk } from '@/rag/types';
import { componentLogger, type AppLogger } from '@/services/logger';
import type { ModelRouter } from '@/services/model-router';
import { errorMessage, GenerationError, RetrievalError } from '@/stability/errors';
import { NO_DOCUMENTS_NOTICE } from './messages';
import { contextDocuments, recordDegradation, type GraphState, type TurnContext } from './state';
import { END, StateMachine, type Next, type StepDefinition } from './state-machine';

export type RagStep = 'rewrite' | 'retrieve' | 'grade' | 'generate';

export type RagGraphOptions = Pick<RagConfig, 'useQueryRewriting' | 'useDocumentGrading' | 'maxRetries'>;

export interface RagGraphDeps {
  router: ModelRouter;
  retriever: HybridRetriever;
  options: RagGraphOptions;
  log?: AppLogger;
}

/**
 * Retrieval-grounded answering. Disabled rewriting removes the rewrite step and the
 * retry edge; disabled grading removes the grade step.
 */
export class RagGraph {
  private readonly machine: StateMachine<GraphState, RagStep, TurnContext>;
  private readonly log: AppLogger;

  constructor(private readonly deps: RagGraphDeps) {
    this.log = deps.log ?? componentLogger('rag');
    this.machine = new StateMachine(this.definition());
  }

  private definition() {
    const { useQueryRewriting, useDocumentGrading, maxRetries } = this.deps.options;
    const afterRetrieve: RagStep = useDocumentGrading ? 'grade' : 'generate';

    const steps: Array<StepDefinition<GraphState, RagStep, TurnContext>> = [];
    if (useQueryRewriting) {
      steps.push({ name: 'rewrite', next: ['retrieve'], run: (state, ctx) => this.rewrite(state, ctx) });
    }
    steps.push({ name: 'retrieve', next: [afterRetrieve], run: (state, ctx) => this.retrieve(state, ctx, afterRetrieve) });
    if (useDocumentGrading) {
      steps.push({
        name: 'grade',
        next: useQueryRewriting ? ['rewrite', 'generate'] : ['generate'],
        run: (state, ctx) => this.grade(state, ctx),
      });
    }
    steps.push({ name: 'generate', next: [END], run: (state, ctx) => this.generate(state, ctx) });

    const passLength = steps.length - 1;
    return {
      name: 'rag',
      start: useQueryRewriting ? ('rewrite' as const) : ('retrieve' as const),
      steps,
      maxSteps: passLength * (maxRetries + 1) + 1,
    };
  }

  /** Declared states of the compiled graph, for diagnostics and tests. */
  states(): RagStep[] {
    return this.machine.states();
  }

  run(state: GraphState, ctx: TurnContext): Promise<GraphState> {
    return this.machine.run(state, ctx);
  }

  /**
   * Retrieval and grading without rewriting or the retry loop, for the hybrid graph.
   * Fills `retrievedDocs` and `docGrades` and returns the chunks that survived.
   */
  async retrieveAndGrade(state: GraphState, ctx: TurnContext): Promise<ScoredChunk[]> {
    await this.retrieve(state, ctx, 'generate');
    if (this.deps.options.useDocumentGrading && state.retrievedDocs.length > 0) {
      await this.applyGrades(state, ctx);
    }
    return contextDocuments(state);
  }

  private async rewrite(state: GraphState, ctx: TurnContext): Promise<Next<RagStep>> {
    const broaden = state.retryCount > 0;
    try {
      state.rewrittenQuery = await rewriteForRetrieval(this.deps.router, state.originalQuery, ctx.history, {
        broaden,
        signal: ctx.signal,
      });
    } catch (error) {
      if (!(error instanceof GenerationError)) throw error;
      state.rewrittenQuery = state.originalQuery;
      recordDegradation(state, { stage: 'rewrite', reason: error.message });
      this.log.warn('rag:rewrite_failed', { error: error.message });
    }
    this.log.debug('rag:rewrite_done', { broaden, query: state.rewrittenQuery });
    return 'retrieve';
  }

  private async retrieve(state: GraphState, ctx: TurnContext, next: RagStep): Promise<Next<RagStep>> {
    const query = state.rewrittenQuery ?? state.originalQuery;
    try {
      state.retrievedDocs = await this.deps.retriever.retrieve(query, ctx.signal);
    } catch (error) {
      if (!(error instanceof RetrievalError)) throw error;
      state.retrievedDocs = [];
      recordDegradation(state, { stage: 'retrieve', reason: error.message });
      this.log.warn('rag:retrieve_failed', { error: errorMessage(error) });
    }
    state.docGrades = {};
    return next;
  }

  private async applyGrades(state: GraphState, ctx: TurnContext): Promise<void> {
    const { grades, failed } = await gradeDocuments(
      this.deps.router,
      state.originalQuery,
      state.retrievedDocs,
      ctx.signal,
    );
    state.docGrades = grades;
    for (const chunkId of failed) {
      recordDegradation(state, { stage: 'grade', reason: `grading failed for chunk ${chunkId}, kept` });
    }
  }

  private async grade(state: GraphState, ctx: TurnContext): Promise<Next<RagStep>> {
    if (state.retrievedDocs.length > 0) {
      await this.applyGrades(state, ctx);
    }
    const relevant = contextDocuments(state).length;
    const retrievalFailed = state.degradations.some((d) => d.stage === 'retrieve');
    this.log.debug('rag:grade_done', { retrieved: state.retrievedDocs.length, relevant });

    if (
      relevant === 0 &&
      !retrievalFailed &&
      this.deps.options.useQueryRewriting &&
      state.retryCount < this.deps.options.maxRetries
    ) {
      state.retryCount += 1;
      return 'rewrite';
    }
    return 'generate';
  }

  private async generate(state: GraphState, ctx: TurnContext): Promise<Next<RagStep>> {
    const documents = contextDocuments(state);
    const answer = await generateGroundedAnswer(this.deps.router, {
      question: state.originalQuery,
      history: ctx.history,
      documents,
      tools: [],
      signal: ctx.signal,
    });

    state.citations = answer.citations;
    state.grounded = answer.citations.length > 0;
    state.finalAnswer = documents.length === 0 ? `${NO_DOCUMENTS_NOTICE}\n\n${answer.text}` : answer.text;
    this.log.info('rag:generate_done', { documents: documents.length, citations: answer.citations.length });
    return END;
  }
}
