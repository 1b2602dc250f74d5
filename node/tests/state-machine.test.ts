import { describe, expect, it } from 'vitest';
import { END, InvalidMachineError, StateMachine, type StepContext, type StepDefinition } from '@/agent/state-machine';
import { TurnCancelledError } from '@/stability/errors';

interface Counter {
  trace: string[];
  count: number;
}

type Step = 'a' | 'b';

function build(steps: Array<StepDefinition<Counter, Step, StepContext>>, maxSteps = 10) {
  return new StateMachine<Counter, Step, StepContext>({ name: 'm', start: 'a', steps, maxSteps });
}

const fresh = (): Counter => ({ trace: [], count: 0 });

describe('StateMachine definition checks', () => {
  it('rejects a transition to an undefined step', () => {
    expect(() => build([{ name: 'a', next: ['b'], run: async () => 'b' }])).toThrow(
      'Invalid state machine "m": step "a" points to unknown step "b"',
    );
  });

  it('rejects unreachable steps', () => {
    expect(() =>
      build([
        { name: 'a', next: [END], run: async () => END },
        { name: 'b', next: [END], run: async () => END },
      ]),
    ).toThrow('step "b" is unreachable from "a"');
  });

  it('rejects cycles that never finish', () => {
    expect(() =>
      build([
        { name: 'a', next: ['b'], run: async () => 'b' },
        { name: 'b', next: ['a'], run: async () => 'a' },
      ]),
    ).toThrow('step "a" can never reach END');
  });

  it('rejects steps without transitions and duplicates', () => {
    expect(() => build([{ name: 'a', next: [], run: async () => END }])).toThrow(
      'step "a" has no outgoing transition',
    );
    expect(() =>
      build([
        { name: 'a', next: [END], run: async () => END },
        { name: 'a', next: [END], run: async () => END },
      ]),
    ).toThrow(InvalidMachineError);
  });

  it('rejects a non-positive step cap', () => {
    expect(() => build([{ name: 'a', next: [END], run: async () => END }], 0)).toThrow(
      'maxSteps must be a positive integer',
    );
  });
});

describe('StateMachine runs', () => {
  it('records every executed step in the trace', async () => {
    const machine = build([
      {
        name: 'a',
        next: ['b'],
        run: async (state) => {
          state.count++;
          return 'b';
        },
      },
      { name: 'b', next: [END], run: async () => END },
    ]);

    const state = await machine.run(fresh(), {});

    expect(state.trace).toEqual(['m:a', 'm:b']);
    expect(state.count).toBe(1);
    expect(machine.states()).toEqual(['a', 'b']);
    expect(machine.edges()).toEqual([
      ['a', 'b'],
      ['b', END],
    ]);
  });

  it('stops a loop at the step cap', async () => {
    const machine = build([{ name: 'a', next: ['a', END], run: async () => 'a' }], 3);
    const state = fresh();

    await expect(machine.run(state, {})).rejects.toThrow('step limit of 3 exceeded at "a"');
    expect(state.trace).toHaveLength(3);
  });

  it('refuses undeclared transitions', async () => {
    const machine = build([
      { name: 'a', next: ['b'], run: async () => END },
      { name: 'b', next: [END], run: async () => END },
    ]);

    await expect(machine.run(fresh(), {})).rejects.toThrow('illegal transition "a" -> "END"');
  });

  it('does not start when the turn is already cancelled', async () => {
    const machine = build([{ name: 'a', next: [END], run: async () => END }]);
    const controller = new AbortController();
    controller.abort();
    const state = fresh();

    await expect(machine.run(state, { signal: controller.signal })).rejects.toBeInstanceOf(TurnCancelledError);
    expect(state.trace).toEqual([]);
  });
});
