import { describe, expect, it } from 'vitest';
import { OllamaClient, parseCharacterList } from './llm-client';
import { DetectionTimeout } from '../errors';

interface Captured {
  url: string;
  init?: RequestInit;
}

function answering(response: () => Response, captured: Captured[] = []): typeof fetch {
  return async (input, init) => {
    captured.push({ url: String(input), init });
    return response();
  };
}

function clientWith(fetchFn: typeof fetch, timeoutMs = 1000): OllamaClient {
  return new OllamaClient({ baseUrl: 'http://llm.test/', model: 'test-model', timeoutMs, fetchFn });
}

async function failureOf(promise: Promise<unknown>): Promise<DetectionTimeout> {
  const error = await promise.then(
    () => null,
    (reason: unknown) => reason
  );
  if (!(error instanceof DetectionTimeout)) throw new Error(`expected DetectionTimeout, got ${String(error)}`);
  return error;
}

describe('OllamaClient', () => {
  it('posts the prompt and parses the character list out of the response', async () => {
    const captured: Captured[] = [];
    const body = JSON.stringify({ response: '{"characters":[{"name":"Alice","gender":"female"}]}' });
    const client = clientWith(answering(() => new Response(body, { status: 200 }), captured));

    const characters = await client.extractCharacters('Alice said, "Hi."');

    expect(characters).toEqual([{ name: 'Alice', gender: 'female' }]);
    expect(captured[0]?.url).toBe('http://llm.test/api/generate');
    expect(captured[0]?.init?.method).toBe('POST');

    const sent: unknown = JSON.parse(String(captured[0]?.init?.body));
    expect(sent).toMatchObject({ model: 'test-model', stream: false, format: 'json' });
  });

  it('reports a non-OK status as bad-status', async () => {
    const client = clientWith(answering(() => new Response('oops', { status: 500, statusText: 'Internal Server Error' })));

    const error = await failureOf(client.extractCharacters('text'));

    expect(error.reason).toBe('bad-status');
    expect(error.message).toBe('LLM endpoint returned 500 Internal Server Error');
  });

  it('reports a refused connection as unreachable', async () => {
    const client = clientWith(() => Promise.reject(new TypeError('fetch failed')));

    const error = await failureOf(client.extractCharacters('text'));

    expect(error.reason).toBe('unreachable');
    expect(error.message).toBe('LLM endpoint unreachable: fetch failed');
  });

  it('aborts a request that outlives the timeout', async () => {
    let aborted = false;
    const hanging: typeof fetch = (_input, init) =>
      new Promise((_resolve, reject) => {
        init?.signal?.addEventListener('abort', () => {
          aborted = true;
          reject(new Error('aborted'));
        });
      });

    const error = await failureOf(clientWith(hanging, 20).extractCharacters('text'));

    expect(error.reason).toBe('timeout');
    expect(error.message).toBe('LLM request exceeded 20ms');
    expect(aborted).toBe(true);
  });

  it('times out even when the transport ignores the abort signal', async () => {
    const deaf: typeof fetch = () => new Promise<Response>(() => {});

    const error = await failureOf(clientWith(deaf, 20).extractCharacters('text'));

    expect(error.reason).toBe('timeout');
  });
});

describe('parseCharacterList', () => {
  it('finds JSON wrapped in prose', () => {
    expect(parseCharacterList('Sure! Here you go: {"characters": ["Alice", "Bob"]} Hope that helps')).toEqual([
      { name: 'Alice' },
      { name: 'Bob' }
    ]);
  });

  it('reads a name-keyed object', () => {
    expect(parseCharacterList('{"Alice": {"gender": "female"}, "Bob": {"gender": "MALE"}}')).toEqual([
      { name: 'Alice', gender: 'female' },
      { name: 'Bob', gender: 'male' }
    ]);
  });

  it('reads bulleted and numbered lists', () => {
    expect(parseCharacterList('1. **Alice** (female)\n- Bob: male\nnot a list line')).toEqual([
      { name: 'Alice', gender: 'female' },
      { name: 'Bob', gender: 'male' }
    ]);
  });

  it('drops duplicates and names without letters', () => {
    expect(parseCharacterList('["Alice", "alice", "", "123"]')).toEqual([{ name: 'Alice' }]);
  });

  it('returns an empty list for unusable answers', () => {
    expect(parseCharacterList('I cannot help with that.')).toEqual([]);
  });
});
