/**
 * Explicit finite-state executor used by every graph.
 *
 * A machine is a list of named steps, each with the closed set of steps it may hand
 * over to. The definition is checked when the machine is built (unknown targets,
 * unreachable steps, steps that can never finish), so a bad graph fails at startup
 * rather than mid-turn. At run time an undeclared transition or exceeding the step
 * cap throws.
 */

import { throwIfCancelled } from '@/stability/errors';

export const END = 'END';

export type Next<N extends string> = N | typeof END;

export interface StepContext {
  signal?: AbortSignal;
}

export interface StepDefinition<S, N extends string, C extends StepContext> {
  name: N;
  run: (state: S, ctx: C) => Promise<Next<N>>;
  next: ReadonlyArray<Next<N>>;
}

export interface MachineDefinition<S, N extends string, C extends StepContext> {
  name: string;
  start: N;
  steps: ReadonlyArray<StepDefinition<S, N, C>>;
  /** Upper bound on executed steps per run. */
  maxSteps: number;
}

export class InvalidMachineError extends Error {
  constructor(machine: string, problem: string) {
    super(`Invalid state machine "${machine}": ${problem}`);
    this.name = 'InvalidMachineError';
  }
}

export class StateMachine<S extends { trace: string[] }, N extends string, C extends StepContext = StepContext> {
  private readonly steps: Map<N, StepDefinition<S, N, C>>;

  constructor(private readonly definition: MachineDefinition<S, N, C>) {
    this.steps = new Map();
    for (const step of definition.steps) {
      if (this.steps.has(step.name)) {
        throw new InvalidMachineError(definition.name, `duplicate step "${step.name}"`);
      }
      this.steps.set(step.name, step);
    }
    this.validate();
  }

  get name(): string {
    return this.definition.name;
  }

  /** Declared states, in definition order. */
  states(): N[] {
    return [...this.steps.keys()];
  }

  /** Declared transitions as `[from, to]` pairs. */
  edges(): Array<[N, Next<N>]> {
    return [...this.steps.values()].flatMap((step) => step.next.map((to): [N, Next<N>] => [step.name, to]));
  }

  private validate(): void {
    const { name, start, maxSteps } = this.definition;
    if (!this.steps.has(start)) {
      throw new InvalidMachineError(name, `start step "${start}" is not defined`);
    }
    if (!Number.isInteger(maxSteps) || maxSteps < 1) {
      throw new InvalidMachineError(name, 'maxSteps must be a positive integer');
    }

    for (const step of this.steps.values()) {
      if (step.next.length === 0) {
        throw new InvalidMachineError(name, `step "${step.name}" has no outgoing transition`);
      }
      for (const target of step.next) {
        if (target !== END && !this.steps.has(target)) {
          throw new InvalidMachineError(name, `step "${step.name}" points to unknown step "${target}"`);
        }
      }
    }

    const reachable = this.reachableFrom(start);
    for (const stepName of this.steps.keys()) {
      if (!reachable.has(stepName)) {
        throw new InvalidMachineError(name, `step "${stepName}" is unreachable from "${start}"`);
      }
      if (!this.reachableFrom(stepName).has(END)) {
        throw new InvalidMachineError(name, `step "${stepName}" can never reach ${END}`);
      }
    }
  }

  private reachableFrom(from: N): Set<Next<N>> {
    const seen = new Set<Next<N>>([from]);
    const queue: Array<Next<N>> = [from];
    while (queue.length > 0) {
      const current = queue.shift();
      if (current === undefined || current === END) continue;
      for (const target of this.steps.get(current)?.next ?? []) {
        if (!seen.has(target)) {
          seen.add(target);
          queue.push(target);
        }
      }
    }
    return seen;
  }

  async run(state: S, ctx: C): Promise<S> {
    const { name, start, maxSteps } = this.definition;
    let current: Next<N> = start;
    let executed = 0;

    while (current !== END) {
      throwIfCancelled(ctx.signal);
      const step = this.steps.get(current);
      if (!step) {
        throw new InvalidMachineError(name, `step "${current}" is not defined`);
      }
      if (++executed > maxSteps) {
        throw new InvalidMachineError(name, `step limit of ${maxSteps} exceeded at "${current}"`);
      }

      state.trace.push(`${name}:${current}`);
      const next: Next<N> = await step.run(state, ctx);
      if (!step.next.includes(next)) {
        throw new InvalidMachineError(name, `illegal transition "${current}" -> "${next}"`);
      }
      current = next;
    }
    return state;
  }
}
