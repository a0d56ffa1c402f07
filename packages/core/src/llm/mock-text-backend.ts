import { createChildLogger } from '@gleaner/shared/src/logger.js';
import type { CompletionRequest, TextModelBackend, TextModelConnection } from './text-client.js';

const log = createChildLogger('llm:mock');

function taskOf(prompt: string): string | undefined {
  return /^TASK:\s*([\w-]+)/m.exec(prompt)?.[1];
}

function createMockResponse(prompt: string): Record<string, unknown> {
  switch (taskOf(prompt)) {
    case 'thread-qna':
      return {
        is_valuable: true,
        question: 'How do I deploy to staging?',
        answer: 'Merge into the release branch and run the staging pipeline.',
        keywords: ['deploy', 'staging'],
      };
    case 'thread-insight':
    case 'section-insight':
      return {
        insights: [
          {
            type: 'insight',
            content: 'Staging deploys are blocked while the nightly migration runs.',
            keywords: ['staging', 'migration'],
          },
        ],
      };
    case 'section-instruction':
      return {
        instructions: [
          {
            title: 'Set up the CLI',
            steps: ['Install the CLI', 'Log in with your team account'],
            keywords: ['cli', 'setup'],
          },
        ],
      };
    case 'section-reference':
      return {
        references: [
          {
            reference_type: 'link',
            title: 'Runbook',
            url: 'https://docs.example.test/runbook',
            description: 'Incident runbook',
            keywords: ['runbook'],
          },
        ],
      };
    case 'glossary':
      return {
        terms: [
          {
            term: 'Staging',
            definition: 'Pre-production environment that mirrors production.',
            category: 'development',
            confidence: 'medium',
            needs_review: false,
            keywords: ['environment'],
          },
        ],
      };
    case 'glossary-review':
      return { terms: [] };
    default:
      return {};
  }
}

/** Deterministic offline backend; answers by the `TASK:` line of the prompt. */
export function createMockTextBackend(): TextModelBackend {
  return {
    name: 'mock',

    connect(): Promise<TextModelConnection> {
      log.info('Using mock text model');

      return Promise.resolve({
        complete(request: CompletionRequest): Promise<string> {
          log.debug({ task: taskOf(request.prompt), json: request.json }, 'Mock completion');
          const content = request.json
            ? JSON.stringify(createMockResponse(request.prompt))
            : 'Mock text model response';
          return Promise.resolve(content);
        },

        release(): Promise<void> {
          return Promise.resolve();
        },
      });
    },
  };
}
