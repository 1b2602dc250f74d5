// node/src/agent/hybrid-graph.ts: live city data plus retrieved documents

import { generateGroundedAnswer, type ToolContextBlock } from '@/rag/answer-generator';
import { componentLogger, type AppLogger } from '@/services/logger';
import type { ModelRouter } from '@/services/model-router';
import { formatToolResult } from '@/tools/formatters';
import { hasData, type ToolCall, type ToolName } from '@/tools/tool-contract';
import type { ToolLayer } from '@/tools/tool-layer';
import { clarificationStreak, MAX_CLARIFICATION_ATTEMPTS, missingLocator } from './clarification';
import { CLARIFICATION_QUESTIONS, NOT_FOUND_ANSWER, type LocatorTool } from './messages';
import type { RagGraph } from './rag-graph';
import { contextDocuments, recordDegradation, type GraphState, type TurnContext } from './state';
import { END, StateMachine, type Next } from './state-machine';
import type { PlannedCall, ToolPlanner } from './tool-planner';

export type HybridStep = 'plan_tools' | 'clarify' | 'gather' | 'generate' | 'fallback';

interface HybridState extends GraphState {
  toolHint?: ToolName[];
  plannedCalls: PlannedCall[];
  clarifyFor?: LocatorTool;
}

export interface HybridGraphDeps {
  router: ModelRouter;
  planner: ToolPlanner;
  tools: ToolLayer;
  rag: RagGraph;
  log?: AppLogger;
}

/** Blocks for every successful attempt that returned data, in invocation order. */
export function toolContextBlocks(calls: readonly ToolCall[]): ToolContextBlock[] {
  const blocks: ToolContextBlock[] = [];
  for (const call of calls) {
    if (call.outcome.ok && hasData(call.outcome.result)) {
      blocks.push({ toolName: call.toolName, text: formatToolResult(call.outcome.result) });
    }
  }
  return blocks;
}

export class HybridGraph {
  private readonly machine: StateMachine<HybridState, HybridStep, TurnContext>;
  private readonly log: AppLogger;

  constructor(private readonly deps: HybridGraphDeps) {
    this.log = deps.log ?? componentLogger('hybrid');
    this.machine = new StateMachine<HybridState, HybridStep, TurnContext>({
      name: 'hybrid',
      start: 'plan_tools',
      maxSteps: 3,
      steps: [
        { name: 'plan_tools', next: ['gather', 'clarify'], run: (state, ctx) => this.planTools(state, ctx) },
        { name: 'clarify', next: [END], run: async (state) => this.clarify(state) },
        { name: 'gather', next: ['generate', 'fallback'], run: (state, ctx) => this.gather(state, ctx) },
        { name: 'generate', next: [END], run: (state, ctx) => this.generate(state, ctx) },
        { name: 'fallback', next: [END], run: async (state) => this.fallback(state) },
      ],
    });
  }

  states(): HybridStep[] {
    return this.machine.states();
  }

  async run(state: GraphState, ctx: TurnContext, toolHint?: ToolName[]): Promise<GraphState> {
    const hybrid: HybridState = Object.assign(state, { toolHint, plannedCalls: [] });
    return this.machine.run(hybrid, ctx);
  }

  private async planTools(state: HybridState, ctx: TurnContext): Promise<Next<HybridStep>> {
    const plan = await this.deps.planner.plan(state.originalQuery, state.toolHint, ctx.history, ctx.signal);
    state.plannedCalls = plan.calls;
    if (plan.source === 'heuristic') {
      recordDegradation(state, { stage: 'plan', reason: 'tool planning fell back to heuristics' });
    }

    const missing = missingLocator(state.toolHint, state.plannedCalls);
    if (!missing) return 'gather';
    const asked = clarificationStreak(ctx.history);
    if (asked < MAX_CLARIFICATION_ATTEMPTS) {
      state.clarifyFor = missing;
      return 'clarify';
    }
    recordDegradation(state, { stage: 'plan', toolName: missing, reason: `no locator after ${asked} clarifications` });
    return 'gather';
  }

  private clarify(state: HybridState): Next<HybridStep> {
    const tool = state.clarifyFor;
    if (!tool) throw new Error('hybrid: clarify reached without a missing locator');
    state.finalAnswer = CLARIFICATION_QUESTIONS[tool];
    state.citations = [];
    state.grounded = false;
    this.log.info('hybrid:clarify', { tool });
    return END;
  }

  private async gather(state: HybridState, ctx: TurnContext): Promise<Next<HybridStep>> {
    const [invocations, documents] = await Promise.all([
      Promise.all(state.plannedCalls.map((call) => this.deps.tools.invoke(call.tool, call.arguments, ctx.signal))),
      this.deps.rag.retrieveAndGrade(state, ctx),
    ]);

    // every attempt is kept; a tool is dropped only when its last attempt failed
    state.toolCalls = invocations.flatMap((invocation) => invocation.calls);
    let failed = 0;
    for (const { toolName, final } of invocations) {
      if (!final.outcome.ok) {
        failed++;
        recordDegradation(state, { stage: 'tool', toolName, reason: final.outcome.error.message });
      }
    }

    const withData = toolContextBlocks(state.toolCalls).length;
    this.log.info('hybrid:gather_done', {
      planned: state.plannedCalls.length,
      attempts: state.toolCalls.length,
      withData,
      failed,
      documents: documents.length,
    });
    return withData > 0 || documents.length > 0 ? 'generate' : 'fallback';
  }

  private async generate(state: HybridState, ctx: TurnContext): Promise<Next<HybridStep>> {
    const answer = await generateGroundedAnswer(this.deps.router, {
      question: state.originalQuery,
      history: ctx.history,
      documents: contextDocuments(state),
      tools: toolContextBlocks(state.toolCalls),
      signal: ctx.signal,
    });
    state.finalAnswer = answer.text;
    state.citations = answer.citations;
    state.grounded = answer.citations.length > 0;
    return END;
  }

  private fallback(state: HybridState): Next<HybridStep> {
    state.finalAnswer = NOT_FOUND_ANSWER;
    state.citations = [];
    state.grounded = false;
    this.log.info('hybrid:fallback', { planned: state.plannedCalls.length });
    return END;
  }
}
