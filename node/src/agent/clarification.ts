// node/src/agent/clarification.ts: asking for a missing address or district, and resuming after the reply

import type { ConversationEntry } from '@/memory/conversation-store';
import { acceptsArguments, type ToolName } from '@/tools/tool-contract';
import { clarifiedTool, isLocatorTool, type LocatorTool } from './messages';
import type { RouteDecision } from './state';
import type { PlannedCall } from './tool-planner';

/** Consecutive clarification questions after which the turn is answered with what is known. */
export const MAX_CLARIFICATION_ATTEMPTS = 2;

/** First hinted tool that needs a locator and has no call with valid arguments. */
export function missingLocator(
  hint: readonly ToolName[] | undefined,
  calls: readonly PlannedCall[],
): LocatorTool | undefined {
  return (hint ?? []).filter(isLocatorTool).find(
    (tool) => !calls.some((call) => call.tool === tool && acceptsArguments(tool, call.arguments)),
  );
}

/** Clarification questions at the end of the history, not interrupted by another answer. */
export function clarificationStreak(history: readonly ConversationEntry[]): number {
  let streak = 0;
  for (let i = history.length - 1; i >= 0; i--) {
    const entry = history[i];
    if (entry.role !== 'assistant') continue;
    if (!clarifiedTool(entry.content)) break;
    streak++;
  }
  return streak;
}

/** Tool the previous answer asked a locator for, when that answer was a clarification question. */
export function pendingClarification(history: readonly ConversationEntry[]): LocatorTool | undefined {
  const lastAnswer = [...history].reverse().find((entry) => entry.role === 'assistant');
  return lastAnswer ? clarifiedTool(lastAnswer.content) : undefined;
}

/**
 * A reply to a clarification question rarely classifies on its own ("Невский
 * проспект 1"), so a hybrid decision without a tool hint picks up the pending tool.
 */
export function resumeClarification(decision: RouteDecision, history: readonly ConversationEntry[]): RouteDecision {
  if (decision.route !== 'HYBRID' || (decision.toolHint && decision.toolHint.length > 0)) return decision;
  const pending = pendingClarification(history);
  return pending ? { ...decision, toolHint: [pending], reason: `${decision.reason}, clarification reply` } : decision;
}
