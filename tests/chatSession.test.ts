import { ChatSession } from '../src/core/entities/ChatSession.js';
import { ChatRequest, createRequest, requestLength } from '../src/core/entities/ChatRequest.js';
import { ITokenCounter } from '../src/core/interfaces/ITokenCounter.js';
import { InvariantViolationError, ProviderFailureError } from '../src/core/errors.js';
import { FakeCompletionProvider, FakeTokenCounter, collect } from './helpers.js';

const MODEL = 'test-model';

function turn(prompt: string, response: string, model: string = MODEL): ChatRequest {
  return createRequest({ model, prompt, response, timestamp: '2024-01-01T00:00:00.000Z' });
}

describe('ChatSession', () => {
  let tokenCounter: FakeTokenCounter;
  let provider: FakeCompletionProvider;

  beforeEach(() => {
    tokenCounter = new FakeTokenCounter(
      new Map([
        ['p1', 10],
        ['r1', 10],
        ['p2', 10],
        ['r2', 10],
        ['new prompt', 12],
      ])
    );
    provider = new FakeCompletionProvider();
  });

  const deps = () => ({ tokenCounter, completionProvider: provider });

  describe('create', () => {
    test('should default the title to the start date', () => {
      const session = ChatSession.create(deps(), { systemMessage: 'Be brief.' });

      expect(session.title).toBe(session.dateStarted);
      expect(new Date(session.dateStarted).toISOString()).toBe(session.dateStarted);
      expect(session.systemMessage).toBe('Be brief.');
      expect(session.history).toHaveLength(0);
      expect(session.context).toHaveLength(0);
      expect(session.id).toBeUndefined();
      expect(session.isPersisted).toBe(false);
    });

    test('should keep a given title', () => {
      const session = ChatSession.create(deps(), { title: 'Travel plans' });
      expect(session.title).toBe('Travel plans');
    });

    test('should have no last request while empty', () => {
      const session = ChatSession.create(deps());
      expect(session.lastRequest).toBeUndefined();
      expect(session.lastResponse).toBeUndefined();
    });
  });

  describe('reconstruct', () => {
    test('should keep history and context as independent arrays', () => {
      const history = [turn('p1', 'r1'), turn('p2', 'r2')];
      const session = ChatSession.reconstruct(deps(), {
        id: 7,
        title: 'Saved',
        systemMessage: '',
        dateStarted: '2024-01-01T00:00:00.000Z',
        history,
      });

      expect(session.id).toBe(7);
      expect(session.context).toEqual(session.history);
      expect(session.context).not.toBe(session.history);

      session.resetContext();

      expect(session.context).toHaveLength(0);
      expect(session.history).toEqual(history);
      expect(history).toHaveLength(2);
    });

    test('should refuse a second id', () => {
      const session = ChatSession.reconstruct(deps(), {
        id: 3,
        title: 'Saved',
        systemMessage: '',
        dateStarted: '2024-01-01T00:00:00.000Z',
        history: [],
      });

      expect(() => session.assignId(4)).toThrow(InvariantViolationError);
      expect(session.id).toBe(3);
    });
  });

  describe('tokensUsed', () => {
    test('should bill each request against its own model', () => {
      const perModel: ITokenCounter = {
        count: (text, model) => (text ? (model === 'old-model' ? 3 : 7) : 0),
      };
      const session = ChatSession.reconstruct(
        { tokenCounter: perModel, completionProvider: provider },
        {
          title: 't',
          systemMessage: '',
          dateStarted: '2024-01-01T00:00:00.000Z',
          history: [turn('a', 'b', 'old-model')],
        }
      );

      expect(session.tokensUsed('new-model')).toBe(6);
      expect(requestLength(session.history[0], perModel)).toBe(6);
    });

    test('should count the system message plus every context entry', () => {
      const session = ChatSession.reconstruct(deps(), {
        title: 't',
        systemMessage: 'answer in one word',
        dateStarted: '2024-01-01T00:00:00.000Z',
        history: [turn('p1', 'r1'), turn('p2', 'r2')],
      });

      expect(session.tokensUsed(MODEL)).toBe(4 + 40);
    });
  });

  describe('resetContext', () => {
    test('should leave history untouched and cost only the system message', () => {
      const session = ChatSession.reconstruct(deps(), {
        title: 't',
        systemMessage: 'be brief',
        dateStarted: '2024-01-01T00:00:00.000Z',
        history: [turn('p1', 'r1')],
      });

      session.resetContext();

      expect(session.context).toHaveLength(0);
      expect(session.history).toHaveLength(1);
      expect(session.tokensUsed(MODEL)).toBe(tokenCounter.count('be brief', MODEL));
      expect(session.tokensUsed(MODEL)).toBe(2);
    });
  });

  describe('discardLastTurn', () => {
    test('should remove the newest turn from history and context', () => {
      const first = turn('p1', 'r1');
      const second = turn('p2', 'r2');
      const session = ChatSession.reconstruct(deps(), {
        title: 't',
        systemMessage: '',
        dateStarted: '2024-01-01T00:00:00.000Z',
        history: [first, second],
      });

      session.discardLastTurn(second);

      expect(session.history).toEqual([first]);
      expect(session.context).toEqual([first]);
    });

    test('should refuse any turn but the newest', () => {
      const first = turn('p1', 'r1');
      const session = ChatSession.reconstruct(deps(), {
        title: 't',
        systemMessage: '',
        dateStarted: '2024-01-01T00:00:00.000Z',
        history: [first, turn('p2', 'r2')],
      });

      expect(() => session.discardLastTurn(first)).toThrow(InvariantViolationError);
      expect(session.history).toHaveLength(2);
    });
  });

  describe('trimContext', () => {
    const twoTurnSession = () =>
      ChatSession.reconstruct(deps(), {
        title: 't',
        systemMessage: '',
        dateStarted: '2024-01-01T00:00:00.000Z',
        history: [turn('p1', 'r1'), turn('p2', 'r2')],
      });

    test('should drop only the earliest entry when that fits the budget', () => {
      const session = twoTurnSession();

      // 40 + 12 + 5 = 57 > 50, then 20 + 12 + 5 = 37 <= 50
      session.trimContext({ model: MODEL, prompt: 'new prompt', maxTokens: 50, reserveTokens: 5 });

      expect(session.context).toHaveLength(1);
      expect(session.context[0].prompt).toBe('p2');
      expect(session.history).toHaveLength(2);
    });

    test('should not trim when everything fits', () => {
      const session = twoTurnSession();

      session.trimContext({ model: MODEL, prompt: 'new prompt', maxTokens: 57, reserveTokens: 5 });

      expect(session.context).toHaveLength(2);
    });

    test('should stop at an empty context when the prompt alone is too large', () => {
      const session = twoTurnSession();

      session.trimContext({ model: MODEL, prompt: 'new prompt', maxTokens: 10, reserveTokens: 5 });

      expect(session.context).toHaveLength(0);
      expect(session.history).toHaveLength(2);
    });

    test('should be a no-op on an empty context', () => {
      const session = ChatSession.create(deps());
      tokenCounter.calls = [];

      session.trimContext({ model: MODEL, prompt: 'new prompt', maxTokens: 1, reserveTokens: 0 });

      expect(session.context).toHaveLength(0);
      expect(tokenCounter.calls).toHaveLength(0);
    });

    test('should reserve a tenth of max tokens by default', () => {
      const session = twoTurnSession();

      // 40 + 12 + floor(60 / 10) = 58 <= 60
      session.trimContext({ model: MODEL, prompt: 'new prompt', maxTokens: 60 });
      expect(session.context).toHaveLength(2);

      // 40 + 12 + floor(57 / 10) = 57 <= 57
      session.trimContext({ model: MODEL, prompt: 'new prompt', maxTokens: 57 });
      expect(session.context).toHaveLength(2);

      // 40 + 12 + floor(56 / 10) = 57 > 56
      session.trimContext({ model: MODEL, prompt: 'new prompt', maxTokens: 56 });
      expect(session.context).toHaveLength(1);
    });
  });

  describe('createCompletion', () => {
    test('should stream fragments and record the completed turn', async () => {
      provider.reply(['Hel', 'lo', '!']);
      const session = ChatSession.create(deps(), { systemMessage: 'Be kind.' });

      const { fragments, request } = await collect(
        session.createCompletion({ model: MODEL, prompt: 'Hi', temperature: 0.5 })
      );

      expect(fragments).toEqual(['Hel', 'lo', '!']);
      expect(request.model).toBe(MODEL);
      expect(request.prompt).toBe('Hi');
      expect(request.response).toBe('Hello!');
      expect(request.temperature).toBe(0.5);
      expect(request).not.toHaveProperty('topP');
      expect(Object.isFrozen(request)).toBe(true);
      expect(session.history).toEqual([request]);
      expect(session.context).toEqual([request]);
      expect(session.lastRequest).toBe(request);
      expect(session.lastResponse).toBe('Hello!');
    });

    test('should send system, prior turns and prompt with correct roles', async () => {
      const session = ChatSession.reconstruct(deps(), {
        title: 't',
        systemMessage: 'sys',
        dateStarted: '2024-01-01T00:00:00.000Z',
        history: [turn('p1', 'r1')],
      });

      await collect(session.createCompletion({ model: MODEL, prompt: 'next' }));

      expect(provider.calls[0].model).toBe(MODEL);
      expect(provider.calls[0].messages).toEqual([
        { role: 'system', content: 'sys' },
        { role: 'user', content: 'p1' },
        { role: 'assistant', content: 'r1' },
        { role: 'user', content: 'next' },
      ]);
    });

    test('should pass only supplied sampling parameters', async () => {
      const session = ChatSession.create(deps());

      await collect(
        session.createCompletion({
          model: MODEL,
          prompt: 'Hi',
          topP: 0.9,
          frequencyPenalty: -0.5,
        })
      );

      expect(provider.calls[0].params).toStrictEqual({ topP: 0.9, frequencyPenalty: -0.5 });
    });

    test('should trim the context before sending', async () => {
      const session = ChatSession.reconstruct(deps(), {
        title: 't',
        systemMessage: '',
        dateStarted: '2024-01-01T00:00:00.000Z',
        history: [turn('p1', 'r1'), turn('p2', 'r2')],
      });
      provider.reply(['done']);

      await collect(
        session.createCompletion({
          model: MODEL,
          prompt: 'new prompt',
          maxTokens: 50,
          reserveTokens: 5,
        })
      );

      expect(provider.calls[0].messages.map((message) => message.content)).toEqual([
        '',
        'p2',
        'r2',
        'new prompt',
      ]);
      expect(session.history).toHaveLength(3);
      expect(session.context.map((request) => request.prompt)).toEqual(['p2', 'new prompt']);
    });

    test('should record nothing when the provider fails mid-stream', async () => {
      const session = ChatSession.reconstruct(deps(), {
        title: 't',
        systemMessage: '',
        dateStarted: '2024-01-01T00:00:00.000Z',
        history: [turn('p1', 'r1')],
      });
      provider.failAfter(['par', 'tial'], new ProviderFailureError('connection reset'));

      const delivered: string[] = [];
      await expect(
        (async () => {
          for await (const fragment of session.createCompletion({ model: MODEL, prompt: 'Hi' })) {
            delivered.push(fragment);
          }
        })()
      ).rejects.toThrow(ProviderFailureError);

      expect(delivered).toEqual(['par', 'tial']);
      expect(session.history).toHaveLength(1);
      expect(session.context).toHaveLength(1);
      expect(session.lastResponse).toBe('r1');
    });

    test('should record nothing when the caller stops early', async () => {
      provider.reply(['a', 'b', 'c']);
      const session = ChatSession.create(deps());

      for await (const fragment of session.createCompletion({ model: MODEL, prompt: 'Hi' })) {
        if (fragment === 'a') {
          break;
        }
      }

      expect(session.history).toHaveLength(0);
    });
  });
});
