import { describe, it, expect, vi, afterEach } from 'vitest';
import { LlmError, TimeoutError } from '@gleaner/shared/src/utils/errors.js';
import {
  createTextClient,
  isTransientError,
  withTextClient,
  type CompletionRequest,
  type TextModelBackend,
} from './text-client.js';

interface FakeBackend extends TextModelBackend {
  readonly connectCount: () => number;
  readonly releaseCount: () => number;
  readonly requests: CompletionRequest[];
}

function createFakeBackend(complete: (request: CompletionRequest) => Promise<string>): FakeBackend {
  let connects = 0;
  let releases = 0;
  const requests: CompletionRequest[] = [];

  return {
    name: 'fake',
    requests,
    connectCount: () => connects,
    releaseCount: () => releases,
    connect() {
      connects++;
      return Promise.resolve({
        complete(request: CompletionRequest) {
          requests.push(request);
          return complete(request);
        },
        release() {
          releases++;
          return Promise.resolve();
        },
      });
    },
  };
}

describe('createTextClient', () => {
  afterEach(() => {
    vi.useRealTimers();
  });

  it('should open lazily on first use and reuse the connection', async () => {
    const backend = createFakeBackend(() => Promise.resolve('hello'));
    const client = createTextClient(backend);

    await client.generateText('first');
    await client.generateText('second');

    expect(backend.connectCount()).toBe(1);
    expect(backend.requests.map((r) => r.prompt)).toEqual(['first', 'second']);
  });

  it('should share one connect between concurrent first calls', async () => {
    const backend = createFakeBackend(() => Promise.resolve('ok'));
    const client = createTextClient(backend);

    await Promise.all([client.generateText('a'), client.generateText('b'), client.open()]);

    expect(backend.connectCount()).toBe(1);
  });

  it('should release the connection on close and reconnect afterwards', async () => {
    const backend = createFakeBackend(() => Promise.resolve('ok'));
    const client = createTextClient(backend);

    await client.generateText('a');
    await client.close();
    await client.close();
    await client.generateText('b');

    expect(backend.releaseCount()).toBe(1);
    expect(backend.connectCount()).toBe(2);
  });

  it('should apply the default temperature unless the call overrides it', async () => {
    const backend = createFakeBackend(() => Promise.resolve('{}'));
    const client = createTextClient(backend, { defaultTemperature: 0.1 });

    await client.generateText('a');
    await client.generateJson('b', { temperature: 0.7 });

    expect(backend.requests).toEqual([
      { prompt: 'a', temperature: 0.1, json: false },
      { prompt: 'b', temperature: 0.7, json: true },
    ]);
  });

  it('should parse structured responses wrapped in a code fence', async () => {
    const backend = createFakeBackend(() => Promise.resolve('```json\n{"terms": []}\n```'));
    const client = createTextClient(backend);

    await expect(client.generateJson('p')).resolves.toEqual({ terms: [] });
  });

  it('should return an empty object when the structured response is not JSON', async () => {
    const backend = createFakeBackend(() => Promise.resolve('Sorry, I cannot help with that.'));
    const client = createTextClient(backend);

    await expect(client.generateJson('p')).resolves.toEqual({});
  });

  it('should wrap backend failures in a retryable LlmError when transient', async () => {
    const backend = createFakeBackend(() => Promise.reject(new Error('503 Service Unavailable')));
    const client = createTextClient(backend);

    const error = await client.generateText('p').catch((e: unknown) => e);

    expect(error).toBeInstanceOf(LlmError);
    expect(error).toMatchObject({ retryable: true });
    expect(backend.requests).toHaveLength(1);
  });

  it('should mark non-transient failures as not retryable', async () => {
    const backend = createFakeBackend(() => Promise.reject(new Error('invalid argument')));
    const client = createTextClient(backend);

    await expect(client.generateText('p')).rejects.toMatchObject({
      name: 'LlmError',
      retryable: false,
      message: 'fake invocation failed: invalid argument',
    });
  });

  it('should surface a hung call as TimeoutError', async () => {
    vi.useFakeTimers();
    const backend = createFakeBackend(() => new Promise<string>(() => undefined));
    const client = createTextClient(backend, { requestTimeoutMs: 1000 });

    const pending = client.generateJson('p');
    const assertion = expect(pending).rejects.toBeInstanceOf(TimeoutError);
    await vi.advanceTimersByTimeAsync(1000);

    await assertion;
  });
});

describe('withTextClient', () => {
  it('should close the client after the work completes', async () => {
    const backend = createFakeBackend(() => Promise.resolve('ok'));
    const client = createTextClient(backend);

    const result = await withTextClient(client, (c) => c.generateText('p'));

    expect(result).toBe('ok');
    expect(backend.releaseCount()).toBe(1);
  });

  it('should close the client when the work throws', async () => {
    const backend = createFakeBackend(() => Promise.resolve('ok'));
    const client = createTextClient(backend);

    await expect(
      withTextClient(client, () => Promise.reject(new Error('work failed'))),
    ).rejects.toThrow('work failed');
    expect(backend.releaseCount()).toBe(1);
  });
});

describe('isTransientError', () => {
  it('should treat rate limits, 5xx statuses and timeouts as transient', () => {
    expect(isTransientError(Object.assign(new Error('quota'), { status: 429 }))).toBe(true);
    expect(isTransientError(Object.assign(new Error('oops'), { statusCode: 502 }))).toBe(true);
    expect(isTransientError(new TimeoutError('slow', 10))).toBe(true);
    expect(isTransientError(new Error('socket hang up'))).toBe(true);
  });

  it('should treat other errors and non-errors as permanent', () => {
    expect(isTransientError(new Error('permission denied'))).toBe(false);
    expect(isTransientError('503')).toBe(false);
  });
});
