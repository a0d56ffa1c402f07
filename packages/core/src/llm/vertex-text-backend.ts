import type { ChatVertexAI } from '@langchain/google-vertexai';
import { createChildLogger } from '@gleaner/shared/src/logger.js';
import { ConfigurationError } from '@gleaner/shared/src/utils/errors.js';
import type { LlmConfig } from '@gleaner/schemas/src/config.schema.js';
import type { CompletionRequest, TextModelBackend, TextModelConnection } from './text-client.js';

const log = createChildLogger('llm:vertex');

export type BackendEnv = Readonly<Record<string, string | undefined>>;

export function createVertexBackend(
  config: Pick<LlmConfig, 'model' | 'location'>,
  env: BackendEnv = process.env,
): TextModelBackend {
  return {
    name: 'vertex-ai',

    async connect(): Promise<TextModelConnection> {
      const projectId = env['GLEANER_GCP_PROJECT_ID'] ?? env['GCP_PROJECT_ID'];
      if (!projectId) {
        throw new ConfigurationError(
          'GLEANER_GCP_PROJECT_ID environment variable is required for the Vertex AI text client',
        );
      }

      const { ChatVertexAI } = await import('@langchain/google-vertexai');

      // ChatVertexAI fixes temperature and MIME type at construction.
      const models = new Map<string, ChatVertexAI>();

      function modelFor(request: CompletionRequest): ChatVertexAI {
        const key = `${String(request.temperature)}:${String(request.json)}`;
        const cached = models.get(key);
        if (cached) {
          return cached;
        }
        const model = new ChatVertexAI({
          model: config.model,
          location: config.location,
          temperature: request.temperature,
          authOptions: { projectId },
          responseMimeType: request.json ? 'application/json' : 'text/plain',
        });
        models.set(key, model);
        return model;
      }

      log.info({ projectId, location: config.location, model: config.model }, 'Using Vertex AI');

      return {
        async complete(request: CompletionRequest): Promise<string> {
          const response = await modelFor(request).invoke([['human', request.prompt]]);
          if (response.usage_metadata) {
            log.debug(
              {
                inputTokens: response.usage_metadata.input_tokens,
                outputTokens: response.usage_metadata.output_tokens,
              },
              'Vertex AI usage',
            );
          }
          return typeof response.content === 'string'
            ? response.content
            : JSON.stringify(response.content);
        },

        release(): Promise<void> {
          models.clear();
          return Promise.resolve();
        },
      };
    },
  };
}
