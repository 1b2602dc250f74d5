import { afterEach, describe, expect, it } from 'vitest';
import { formatHistory, type ConversationEntry } from '@/memory/conversation-store';
import { InMemoryConversationStore } from '@/memory/InMemoryConversationStore';
import { SessionQueue } from '@/memory/session-queue';

const entry = (role: ConversationEntry['role'], content: string): ConversationEntry => ({
  role,
  content,
  createdAt: '2024-05-10T10:00:00.000Z',
});

function deferred(): { promise: Promise<void>; resolve: () => void } {
  let resolve: () => void = () => undefined;
  const promise = new Promise<void>((r) => {
    resolve = r;
  });
  return { promise, resolve };
}

describe('InMemoryConversationStore', () => {
  const stores: InMemoryConversationStore[] = [];
  const create = (ttlMinutes?: number, maxSessions?: number) => {
    const store = new InMemoryConversationStore(ttlMinutes, maxSessions);
    stores.push(store);
    return store;
  };

  afterEach(() => {
    stores.splice(0).forEach((store) => store.destroy());
  });

  it('returns the most recent entries in order', async () => {
    const store = create();
    await store.append('s1', entry('user', 'one'), entry('assistant', 'two'));
    await store.append('s1', entry('user', 'three'));

    const history = await store.get('s1', 2);

    expect(history.map((e) => e.content)).toEqual(['two', 'three']);
    expect(await store.get('s1', 0)).toEqual([]);
    expect(await store.get('unknown', 5)).toEqual([]);
  });

  it('hands out copies', async () => {
    const store = create();
    await store.append('s1', entry('user', 'one'));

    const [first] = await store.get('s1', 1);
    first.content = 'changed';

    expect((await store.get('s1', 1))[0].content).toBe('one');
  });

  it('drops sessions past their ttl', async () => {
    const store = create(60);
    await store.append('s1', entry('user', 'one'));

    expect(store.cleanupExpiredSessions(Date.now() + 61 * 60 * 1000)).toBe(1);
    expect(store.size()).toBe(0);
  });

  it('evicts the oldest sessions when full', async () => {
    const store = create(60, 5);
    for (let i = 0; i < 5; i++) {
      await store.append(`s${i}`, entry('user', `message ${i}`));
    }

    await store.append('s5', entry('user', 'message 5'));

    expect(store.size()).toBe(5);
    expect(await store.get('s0', 5)).toEqual([]);
    expect(await store.get('s5', 5)).toHaveLength(1);
  });
});

describe('SessionQueue', () => {
  it('runs turns of one session in arrival order', async () => {
    const queue = new SessionQueue();
    const order: string[] = [];
    const gate = deferred();

    const first = queue.run('s1', async () => {
      await gate.promise;
      order.push('first');
    });
    const second = queue.run('s1', async () => {
      order.push('second');
    });
    gate.resolve();
    await Promise.all([first, second]);

    expect(order).toEqual(['first', 'second']);
  });

  it('does not make other sessions wait', async () => {
    const queue = new SessionQueue();
    const gate = deferred();
    const blocked = queue.run('s1', () => gate.promise);

    await expect(queue.run('s2', async () => 'done')).resolves.toBe('done');

    gate.resolve();
    await blocked;
  });

  it('keeps going after a failed turn', async () => {
    const queue = new SessionQueue();

    const failed = queue.run('s1', async () => {
      throw new Error('boom');
    });
    const next = queue.run('s1', async () => 'ok');

    await expect(failed).rejects.toThrow('boom');
    await expect(next).resolves.toBe('ok');
    await new Promise((resolve) => setTimeout(resolve, 0));
    expect(queue.pending()).toBe(0);
  });
});

describe('formatHistory', () => {
  it('labels speakers', () => {
    expect(formatHistory([entry('user', 'Привет'), entry('assistant', 'Здравствуйте!')])).toBe(
      'User: Привет\nAssistant: Здравствуйте!',
    );
  });
});
