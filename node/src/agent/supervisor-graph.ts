// node/src/agent/supervisor-graph.ts: one conversational turn, from guard to answer

import type { ConversationEntry, ConversationStore } from '@/memory/conversation-store';
import { SessionQueue } from '@/memory/session-queue';
import type { Message } from '@/models/types';
import { componentLogger, type AppLogger } from '@/services/logger';
import type { ModelRouter } from '@/services/model-router';
import type { ToxicityFilter } from '@/services/toxicity';
import {
  AssistantError,
  errorMessage,
  RoutingAmbiguityError,
  throwIfCancelled,
  TurnCancelledError,
} from '@/stability/errors';
import { resumeClarification } from './clarification';
import type { HybridGraph } from './hybrid-graph';
import type { IntentClassifier } from './intent-classifier';
import { APOLOGY_ANSWER, isFlaggedUngrounded, UNVERIFIED_NOTICE } from './messages';
import type { RagGraph } from './rag-graph';
import {
  createGraphState,
  recordDegradation,
  type Citation,
  type Degradation,
  type GraphState,
  type Route,
  type RouteDecision,
  type Turn,
  type TurnContext,
} from './state';
import { END, StateMachine, type Next } from './state-machine';

export const GRAPH_IDS = ['supervisor', 'rag', 'hybrid'] as const;

export type GraphId = (typeof GRAPH_IDS)[number];

export type SupervisorStep = 'guard' | 'classify' | 'route_rag' | 'route_hybrid' | 'route_direct' | 'answered';

export interface TurnOptions {
  /** `rag` or `hybrid` skip classification; `supervisor` is the default. */
  graphId?: GraphId;
  signal?: AbortSignal;
}

export interface TurnResult {
  finalAnswer: string;
  citations: Citation[];
  routeTaken: Route;
  grounded: boolean;
  degradations: Degradation[];
  decision: RouteDecision;
  trace: string[];
}

interface SupervisorState extends GraphState {
  forced?: 'rag' | 'hybrid';
  decision?: RouteDecision;
}

export interface SupervisorDeps {
  router: ModelRouter;
  classifier: IntentClassifier;
  rag: RagGraph;
  hybrid: HybridGraph;
  conversations: ConversationStore;
  toxicity: ToxicityFilter;
  /** Previous turns shown to the models. */
  historyWindow: number;
  queue?: SessionQueue;
  log?: AppLogger;
}

const DIRECT_SYSTEM = `Ты вежливый городской помощник Санкт-Петербурга.
Ты помогаешь найти МФЦ, справочную информацию о районах, городские и спортивные мероприятия,
а также отвечаешь на вопросы о получении государственных услуг.
Поддержи разговор кратко и дружелюбно, на русском языке. Не приводи конкретных фактов о городе без источников.`;

const ROUTE_STEP: Record<Route, SupervisorStep> = {
  RAG: 'route_rag',
  HYBRID: 'route_hybrid',
  DIRECT: 'route_direct',
};

function routeTo(state: SupervisorState, decision: RouteDecision): Next<SupervisorStep> {
  state.decision = decision;
  state.route = decision.route;
  return ROUTE_STEP[decision.route];
}

/**
 * Entry point of the assistant. Classifies once, delegates to exactly one route,
 * then enforces the grounding rule: an answer without citations is reported as
 * ungrounded, and on factual routes it is also flagged in the text.
 */
export class SupervisorGraph {
  private readonly machine: StateMachine<SupervisorState, SupervisorStep, TurnContext>;
  private readonly queue: SessionQueue;
  private readonly log: AppLogger;

  constructor(private readonly deps: SupervisorDeps) {
    this.queue = deps.queue ?? new SessionQueue();
    this.log = deps.log ?? componentLogger('supervisor');
    this.machine = new StateMachine<SupervisorState, SupervisorStep, TurnContext>({
      name: 'supervisor',
      start: 'guard',
      maxSteps: 4,
      steps: [
        {
          name: 'guard',
          next: ['classify', 'route_rag', 'route_hybrid', 'answered'],
          run: async (state) => this.guard(state),
        },
        {
          name: 'classify',
          next: ['route_rag', 'route_hybrid', 'route_direct'],
          run: (state, ctx) => this.classify(state, ctx),
        },
        {
          name: 'route_rag',
          next: ['answered'],
          run: async (state, ctx) => {
            await this.deps.rag.run(state, ctx);
            return 'answered';
          },
        },
        {
          name: 'route_hybrid',
          next: ['answered'],
          run: async (state, ctx) => {
            await this.deps.hybrid.run(state, ctx, state.decision?.toolHint);
            return 'answered';
          },
        },
        { name: 'route_direct', next: ['answered'], run: (state, ctx) => this.direct(state, ctx) },
        { name: 'answered', next: [END], run: async (state) => this.finalize(state) },
      ],
    });
  }

  states(): SupervisorStep[] {
    return this.machine.states();
  }

  /** Turns of one session run one at a time, in arrival order. */
  handleTurn(turn: Turn, options: TurnOptions = {}): Promise<TurnResult> {
    return this.queue.run(turn.sessionId, () => this.execute(turn, options));
  }

  private async execute(turn: Turn, { graphId = 'supervisor', signal }: TurnOptions): Promise<TurnResult> {
    throwIfCancelled(signal);
    const started = Date.now();
    const state: SupervisorState = createGraphState(turn.userText, 'HYBRID');
    if (graphId !== 'supervisor') state.forced = graphId;

    const history = await this.readHistory(turn.sessionId, state);

    try {
      await this.machine.run(state, { history, signal });
    } catch (error) {
      if (error instanceof TurnCancelledError) throw error;
      this.log.error('supervisor:turn_failed', { sessionId: turn.sessionId, error: errorMessage(error) });
      recordDegradation(state, {
        stage: error instanceof AssistantError ? error.stage : 'generate',
        reason: errorMessage(error),
      });
      state.finalAnswer = APOLOGY_ANSWER;
      state.citations = [];
      state.grounded = false;
    }

    if (!state.finalAnswer.trim()) {
      state.finalAnswer = APOLOGY_ANSWER;
      state.citations = [];
      state.grounded = false;
    }

    // a cancelled turn leaves no trace in the history
    throwIfCancelled(signal);
    await this.appendTurn(turn, state);

    const decision = state.decision ?? { route: state.route, confidence: 0, reason: 'failed before routing' };
    this.log.info('supervisor:turn_done', {
      sessionId: turn.sessionId,
      route: state.route,
      reason: decision.reason,
      grounded: state.grounded,
      citations: state.citations.length,
      degradations: state.degradations.length,
      latencyMs: Date.now() - started,
    });

    return {
      finalAnswer: state.finalAnswer,
      citations: state.citations,
      routeTaken: state.route,
      grounded: state.grounded,
      degradations: state.degradations,
      decision,
      trace: state.trace,
    };
  }

  private async readHistory(sessionId: string, state: GraphState): Promise<ConversationEntry[]> {
    if (this.deps.historyWindow === 0) return [];
    try {
      // a turn is a user message and its answer
      return await this.deps.conversations.get(sessionId, this.deps.historyWindow * 2);
    } catch (error) {
      recordDegradation(state, { stage: 'memory', reason: `history unavailable: ${errorMessage(error)}` });
      this.log.warn('supervisor:history_failed', { sessionId, error: errorMessage(error) });
      return [];
    }
  }

  private async appendTurn(turn: Turn, state: GraphState): Promise<void> {
    const answeredAt = new Date().toISOString();
    try {
      await this.deps.conversations.append(
        turn.sessionId,
        { role: 'user', content: turn.userText, createdAt: turn.timestamp.toISOString() },
        { role: 'assistant', content: state.finalAnswer, createdAt: answeredAt },
      );
    } catch (error) {
      recordDegradation(state, { stage: 'memory', reason: `history not saved: ${errorMessage(error)}` });
      this.log.warn('supervisor:append_failed', { sessionId: turn.sessionId, error: errorMessage(error) });
    }
  }

  private guard(state: SupervisorState): Next<SupervisorStep> {
    const toxicity = this.deps.toxicity.check(state.originalQuery);
    const refusal = this.deps.toxicity.responseFor(toxicity);
    if (toxicity.shouldBlock && refusal) {
      this.log.warn('supervisor:toxic_blocked', { level: toxicity.level, patterns: toxicity.matchedPatterns.length });
      state.decision = { route: 'DIRECT', confidence: toxicity.confidence, reason: 'toxicity' };
      state.route = 'DIRECT';
      state.finalAnswer = refusal;
      state.citations = [];
      state.grounded = false;
      return 'answered';
    }

    if (state.forced) {
      const route: Route = state.forced === 'rag' ? 'RAG' : 'HYBRID';
      return routeTo(state, { route, confidence: 1, reason: 'requested' });
    }
    return 'classify';
  }

  private async classify(state: SupervisorState, ctx: TurnContext): Promise<Next<SupervisorStep>> {
    try {
      const classification = await this.deps.classifier.classify(state.originalQuery, ctx.history, ctx.signal);
      const decision = resumeClarification(this.deps.classifier.decide(classification), ctx.history);
      this.log.debug('supervisor:routed', { ...decision });
      return routeTo(state, decision);
    } catch (error) {
      if (!(error instanceof RoutingAmbiguityError)) throw error;
      this.log.warn('supervisor:routing_ambiguous', { error: error.message });
      recordDegradation(state, { stage: 'classify', reason: error.message });
      const fallback: RouteDecision = { route: 'HYBRID', confidence: 0, reason: 'ambiguous' };
      return routeTo(state, resumeClarification(fallback, ctx.history));
    }
  }

  private async direct(state: SupervisorState, ctx: TurnContext): Promise<Next<SupervisorStep>> {
    const messages: Message[] = [
      { role: 'system', content: DIRECT_SYSTEM },
      ...ctx.history.map((entry): Message => ({ role: entry.role, content: entry.content })),
      { role: 'user', content: state.originalQuery },
    ];
    state.finalAnswer = await this.deps.router.complete('converse', messages, ctx.signal);
    state.citations = [];
    state.grounded = false;
    return 'answered';
  }

  private finalize(state: SupervisorState): Next<SupervisorStep> {
    if (state.citations.length === 0) {
      state.grounded = false;
      if (state.route !== 'DIRECT' && !isFlaggedUngrounded(state.finalAnswer)) {
        state.finalAnswer = `${UNVERIFIED_NOTICE}\n\n${state.finalAnswer}`;
      }
    }
    return END;
  }
}
