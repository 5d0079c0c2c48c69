import { describe, it, expect, beforeEach, vi } from 'vitest';

const mocks = vi.hoisted(() => ({
  list: vi.fn(),
  retrieve: vi.fn(),
  create: vi.fn(),
  get: vi.fn(),
  axiosCreate: vi.fn(),
}));

vi.mock('openai', () => ({
  default: class {
    models = { list: mocks.list, retrieve: mocks.retrieve };
    chat = { completions: { create: mocks.create } };
  },
}));

vi.mock('axios', () => ({
  default: { create: mocks.axiosCreate },
}));

import { PoeClient, type ReplyFragment } from '../src/services/poe-client.js';
import { ProviderError } from '../types/errors.js';
import { askCommand } from '../src/commands/ask.js';
import { resetCommand } from '../src/commands/reset.js';
import { createContext, createInteraction, DEFAULT_MODEL } from './helpers.js';

async function* fromArray<T>(items: T[]): AsyncGenerator<T> {
  for (const item of items) {
    yield item;
  }
}

async function* failing(message: string): AsyncGenerator<never> {
  throw new Error(message);
}

function streamOf(...texts: string[]) {
  return fromArray(texts.map((content) => ({ choices: [{ delta: { content } }] })));
}

async function collect(stream: AsyncIterable<ReplyFragment>): Promise<ReplyFragment[]> {
  const fragments: ReplyFragment[] = [];
  for await (const fragment of stream) {
    fragments.push(fragment);
  }
  return fragments;
}

describe('PoeClient', () => {
  let client: PoeClient;

  beforeEach(() => {
    vi.clearAllMocks();
    mocks.axiosCreate.mockReturnValue({ get: mocks.get });
    client = new PoeClient({ apiKey: 'test-poe-key', baseURL: 'https://api.poe.com/v1' });
  });

  it('points the usage client at the API origin', () => {
    expect(mocks.axiosCreate).toHaveBeenCalledWith({
      baseURL: 'https://api.poe.com',
      headers: { Authorization: 'Bearer test-poe-key' },
    });
  });

  describe('listModels', () => {
    it('returns every model handle', async () => {
      mocks.list.mockReturnValue(fromArray([{ id: 'GPT-4o' }, { id: 'Claude-3-Haiku' }]));
      await expect(client.listModels()).resolves.toEqual(['GPT-4o', 'Claude-3-Haiku']);
    });

    it('wraps upstream failures', async () => {
      mocks.list.mockReturnValue(failing('401 Unauthorized'));
      await expect(client.listModels()).rejects.toMatchObject({
        name: 'ProviderError',
        operation: 'listModels',
        message: 'Error fetching available models: 401 Unauthorized',
      });
    });
  });

  describe('getSettings', () => {
    it('reads the point balance', async () => {
      mocks.get.mockResolvedValue({ data: { current_point_balance: 1500 } });

      await expect(client.getSettings()).resolves.toEqual({ pointBalance: 1500 });
      expect(mocks.get).toHaveBeenCalledWith('/usage/current_balance');
    });

    it('reports a missing balance as null', async () => {
      mocks.get.mockResolvedValue({ data: {} });
      await expect(client.getSettings()).resolves.toEqual({ pointBalance: null });
    });

    it('wraps upstream failures', async () => {
      mocks.get.mockRejectedValue(new Error('Request failed with status code 500'));
      await expect(client.getSettings()).rejects.toBeInstanceOf(ProviderError);
    });
  });

  describe('getModelInfo', () => {
    it('maps model metadata', async () => {
      mocks.retrieve.mockResolvedValue({ id: 'GPT-4o', object: 'model', created: 1700000000, owned_by: 'OpenAI' });

      await expect(client.getModelInfo('GPT-4o')).resolves.toEqual({
        handle: 'GPT-4o',
        ownedBy: 'OpenAI',
        createdAt: new Date(1700000000 * 1000),
      });
      expect(mocks.retrieve).toHaveBeenCalledWith('GPT-4o');
    });
  });

  describe('sendMessage', () => {
    it('opens a new session and streams the reply', async () => {
      mocks.create.mockResolvedValue(streamOf('Hel', '', 'lo'));

      const fragments = await collect(client.sendMessage('GPT-4o', 'hi', null));

      expect(fragments.map((f) => f.text)).toEqual(['Hel', 'lo']);
      expect(fragments[0].sessionId).toMatch(/^[0-9a-f-]{36}$/);
      expect(fragments[1].sessionId).toBe(fragments[0].sessionId);
      expect(mocks.create).toHaveBeenCalledWith({
        model: 'GPT-4o',
        messages: [{ role: 'user', content: 'hi' }],
        stream: true,
      });
    });

    it('replays the transcript when continuing a session', async () => {
      mocks.create.mockResolvedValueOnce(streamOf('Hello')).mockResolvedValueOnce(streamOf('Fine'));

      const [first] = await collect(client.sendMessage('GPT-4o', 'hi', null));
      const second = await collect(client.sendMessage('GPT-4o', 'how are you?', first.sessionId));

      expect(second).toEqual([{ text: 'Fine', sessionId: first.sessionId }]);
      expect(mocks.create.mock.calls[1][0].messages).toEqual([
        { role: 'user', content: 'hi' },
        { role: 'assistant', content: 'Hello' },
        { role: 'user', content: 'how are you?' },
      ]);
    });

    it('starts over for a session it does not know', async () => {
      mocks.create.mockResolvedValue(streamOf('Hello'));

      const [fragment] = await collect(client.sendMessage('GPT-4o', 'hi', 'stale-session'));

      expect(fragment.sessionId).not.toBe('stale-session');
      expect(mocks.create.mock.calls[0][0].messages).toEqual([{ role: 'user', content: 'hi' }]);
    });

    it('wraps stream failures', async () => {
      mocks.create.mockRejectedValue(new Error('socket hang up'));

      await expect(collect(client.sendMessage('GPT-4o', 'hi', null))).rejects.toMatchObject({
        name: 'ProviderError',
        operation: 'sendMessage',
      });
    });
  });

  describe('breakSession', () => {
    it('forgets the transcript so the next message starts fresh', async () => {
      mocks.create.mockResolvedValueOnce(streamOf('Hello')).mockResolvedValueOnce(streamOf('Hi again'));

      const [first] = await collect(client.sendMessage('GPT-4o', 'hi', null));
      await client.breakSession('GPT-4o', first.sessionId);
      const [second] = await collect(client.sendMessage('GPT-4o', 'hi', first.sessionId));

      expect(second.sessionId).not.toBe(first.sessionId);
      expect(mocks.create.mock.calls[1][0].messages).toEqual([{ role: 'user', content: 'hi' }]);
    });
  });

  describe('releaseSession', () => {
    it('drops the transcript', async () => {
      mocks.create.mockResolvedValue(streamOf('Hello'));

      const [first] = await collect(client.sendMessage('GPT-4o', 'hi', null));
      expect(client.sessionCount).toBe(1);

      client.releaseSession(first.sessionId);

      expect(client.sessionCount).toBe(0);
    });

    it('ignores ids it does not hold', () => {
      expect(() => client.releaseSession('never-opened')).not.toThrow();
    });

    it('leaves nothing behind after repeated ask and reset', async () => {
      mocks.create.mockImplementation(async () => streamOf('Hello'));
      const { context, store } = createContext();
      context.provider = client;
      store.ensureDefault('g1', DEFAULT_MODEL);

      for (let i = 0; i < 5; i++) {
        await askCommand.execute(createInteraction({ options: { prompt: `question ${i}` } }), context);
        await resetCommand.execute(createInteraction({ commandName: 'reset' }), context);
      }

      expect(client.sessionCount).toBe(0);
    });
  });

  describe('session limit', () => {
    it('evicts the least recently used conversation', async () => {
      mocks.create.mockImplementation(async () => streamOf('Hello'));
      const small = new PoeClient({ apiKey: 'test-poe-key', maxSessions: 2 });

      const [a] = await collect(small.sendMessage('GPT-4o', 'a', null));
      const [b] = await collect(small.sendMessage('GPT-4o', 'b', null));
      await collect(small.sendMessage('GPT-4o', 'a again', a.sessionId));
      await collect(small.sendMessage('GPT-4o', 'c', null));

      expect(small.sessionCount).toBe(2);
      const [continuedA] = await collect(small.sendMessage('GPT-4o', 'a once more', a.sessionId));
      expect(continuedA.sessionId).toBe(a.sessionId);
      const [retriedB] = await collect(small.sendMessage('GPT-4o', 'b again', b.sessionId));
      expect(retriedB.sessionId).not.toBe(b.sessionId);
    });
  });
});
