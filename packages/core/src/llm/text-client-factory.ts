import type { LlmConfig } from '@gleaner/schemas/src/config.schema.js';
import { createTextClient, type TextClient } from './text-client.js';
import { createMockTextBackend } from './mock-text-backend.js';
import { createVertexBackend, type BackendEnv } from './vertex-text-backend.js';

export function createConfiguredTextClient(
  config: LlmConfig,
  env: BackendEnv = process.env,
): TextClient {
  const backend =
    env['GLEANER_MOCK_LLM'] === 'true' ? createMockTextBackend() : createVertexBackend(config, env);

  return createTextClient(backend, {
    defaultTemperature: config.temperature,
    requestTimeoutMs: config.requestTimeoutMs,
  });
}
