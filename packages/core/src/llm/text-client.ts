import { createChildLogger } from '@gleaner/shared/src/logger.js';
import { LlmError, TimeoutError, toError } from '@gleaner/shared/src/utils/errors.js';
import { withTimeout } from '@gleaner/shared/src/utils/timeout.js';
import { parseJsonObject, type JsonObject } from './json-extraction.js';

const log = createChildLogger('llm:text-client');

const DEFAULT_TEMPERATURE = 0.3;
const DEFAULT_REQUEST_TIMEOUT_MS = 60_000;

export interface GenerateOptions {
  readonly temperature?: number;
}

/**
 * Prompt in, text or a single JSON object out. The connection behind it is
 * opened on first use (or by `open`) and released by `close`.
 */
export interface TextClient {
  open(): Promise<void>;
  close(): Promise<void>;
  generateText(prompt: string, options?: GenerateOptions): Promise<string>;
  /** Resolves to `{}` when the response is not a JSON object. */
  generateJson(prompt: string, options?: GenerateOptions): Promise<JsonObject>;
}

export interface CompletionRequest {
  readonly prompt: string;
  readonly temperature: number;
  readonly json: boolean;
}

export interface TextModelConnection {
  complete(request: CompletionRequest): Promise<string>;
  release(): Promise<void>;
}

export interface TextModelBackend {
  readonly name: string;
  connect(): Promise<TextModelConnection>;
}

export interface TextClientOptions {
  readonly defaultTemperature?: number;
  readonly requestTimeoutMs?: number;
}

export function isTransientError(error: unknown): boolean {
  if (error instanceof TimeoutError) {
    return true;
  }
  if (!(error instanceof Error)) {
    return false;
  }

  const errorRecord = error as unknown as Record<string, unknown>;
  const statusCode =
    (typeof errorRecord['status'] === 'number' ? errorRecord['status'] : undefined) ??
    (typeof errorRecord['statusCode'] === 'number' ? errorRecord['statusCode'] : undefined);

  if (typeof statusCode === 'number' && (statusCode === 429 || statusCode >= 500)) {
    return true;
  }

  const message = error.message.toLowerCase();
  const transientPatterns = [
    '429',
    'rate limit',
    'too many requests',
    '500',
    '502',
    '503',
    'internal server error',
    'bad gateway',
    'service unavailable',
    'econnreset',
    'etimedout',
    'timeout',
    'network',
    'socket hang up',
    'econnrefused',
  ];

  return transientPatterns.some((pattern) => message.includes(pattern));
}

export function createTextClient(
  backend: TextModelBackend,
  options: TextClientOptions = {},
): TextClient {
  const defaultTemperature = options.defaultTemperature ?? DEFAULT_TEMPERATURE;
  const requestTimeoutMs = options.requestTimeoutMs ?? DEFAULT_REQUEST_TIMEOUT_MS;

  // Concurrent first calls share one pending connect.
  let connection: Promise<TextModelConnection> | undefined;

  function acquire(): Promise<TextModelConnection> {
    if (!connection) {
      log.debug({ backend: backend.name }, 'Opening text model connection');
      const pending = backend.connect();
      connection = pending;
      pending.catch(() => {
        if (connection === pending) {
          connection = undefined;
        }
      });
    }
    return connection;
  }

  async function complete(prompt: string, json: boolean, generateOptions?: GenerateOptions): Promise<string> {
    const temperature = generateOptions?.temperature ?? defaultTemperature;
    log.debug({ backend: backend.name, promptLength: prompt.length, json }, 'Text model invocation');

    try {
      const model = await acquire();
      return await withTimeout(
        model.complete({ prompt, temperature, json }),
        requestTimeoutMs,
        `${backend.name} completion`,
      );
    } catch (error) {
      if (error instanceof TimeoutError || error instanceof LlmError) {
        throw error;
      }
      const cause = toError(error);
      throw new LlmError(
        `${backend.name} invocation failed: ${cause.message}`,
        isTransientError(error),
        cause,
      );
    }
  }

  return {
    async open(): Promise<void> {
      await acquire();
    },

    async close(): Promise<void> {
      const current = connection;
      connection = undefined;
      if (!current) {
        return;
      }
      let model: TextModelConnection;
      try {
        model = await current;
      } catch (error) {
        log.debug({ backend: backend.name, error: toError(error).message }, 'Nothing to close');
        return;
      }
      await model.release();
      log.debug({ backend: backend.name }, 'Closed text model connection');
    },

    generateText(prompt: string, generateOptions?: GenerateOptions): Promise<string> {
      return complete(prompt, false, generateOptions);
    },

    async generateJson(prompt: string, generateOptions?: GenerateOptions): Promise<JsonObject> {
      const content = await complete(prompt, true, generateOptions);
      const parsed = parseJsonObject(content);
      if (Object.keys(parsed).length === 0) {
        log.warn(
          { backend: backend.name, preview: content.slice(0, 100) },
          'Structured response was not a JSON object',
        );
      }
      return parsed;
    },
  };
}

/** Opens `client`, runs `work`, and closes the client on every exit path. */
export async function withTextClient<T>(
  client: TextClient,
  work: (client: TextClient) => Promise<T>,
): Promise<T> {
  await client.open();
  try {
    return await work(client);
  } finally {
    await client.close();
  }
}
