import { describe, it, expect } from 'vitest';
import { LlmError } from '@gleaner/shared/src/utils/errors.js';
import {
  createFailingTextClient,
  createRespondingTextClient,
  message,
  threadItem,
} from '../test-helpers.js';
import { buildQnaPrompt, createThreadQnaStrategy } from './thread-qna.strategy.js';

const deployThread = threadItem([
  message('alice', 'How do I deploy to staging?', 'https://chat.example.com/p/1'),
  message('bob', 'Merge into release and run the pipeline.', 'https://chat.example.com/p/2'),
  message('carol', 'Thanks!'),
]);

describe('buildQnaPrompt', () => {
  it('should name the task and include both sides', () => {
    const prompt = buildQnaPrompt('Where are the logs?', 'In the ops dashboard.');

    expect(prompt.split('\n')[0]).toBe('TASK: thread-qna');
    expect(prompt).toContain('Where are the logs?');
    expect(prompt).toContain('In the ops dashboard.');
  });
});

describe('createThreadQnaStrategy', () => {
  it('should build a Q&A record from the first two messages', async () => {
    const client = createRespondingTextClient({
      is_valuable: true,
      question: ' How do I deploy to staging? ',
      answer: 'Merge into the release branch.',
      keywords: ['deploy', 'Deploy', ' staging '],
    });
    const strategy = createThreadQnaStrategy(client);

    const records = await strategy.process(deployThread);

    expect(records).toEqual([
      {
        kind: 'qna',
        payload: {
          question: 'How do I deploy to staging?',
          answer: 'Merge into the release branch.',
        },
        keywords: ['deploy', 'staging'],
        provenance: {
          origin: 'thread',
          channel: '#platform-help',
          threadId: 'thread-1',
          authors: ['alice', 'bob', 'carol'],
          questioner: 'alice',
          answerer: 'bob',
          permalinks: ['https://chat.example.com/p/1', 'https://chat.example.com/p/2'],
        },
        metadata: { strategy: 'thread-qna' },
      },
    ]);
    expect(client.generateJson).toHaveBeenCalledTimes(1);
  });

  it('should not call the text service for a single-message thread', async () => {
    const client = createRespondingTextClient({ is_valuable: true, question: 'q', answer: 'a' });
    const strategy = createThreadQnaStrategy(client);

    const records = await strategy.process(threadItem([message('alice', 'Anyone around?')]));

    expect(records).toEqual([]);
    expect(client.generateJson).not.toHaveBeenCalled();
  });

  it('should return nothing when the exchange is not valuable', async () => {
    const strategy = createThreadQnaStrategy(
      createRespondingTextClient({ is_valuable: false, question: 'hi', answer: 'hello' }),
    );

    expect(await strategy.process(deployThread)).toEqual([]);
  });

  it('should return nothing for a malformed response', async () => {
    const strategy = createThreadQnaStrategy(createRespondingTextClient({}));

    expect(await strategy.process(deployThread)).toEqual([]);
  });

  it('should return nothing when the text service fails', async () => {
    const strategy = createThreadQnaStrategy(
      createFailingTextClient(new LlmError('mock invocation failed: 503', true)),
    );

    expect(await strategy.process(deployThread)).toEqual([]);
  });

  it('should drop a pair with a blank answer', async () => {
    const strategy = createThreadQnaStrategy(
      createRespondingTextClient({ is_valuable: true, question: 'Where?', answer: '   ' }),
    );

    expect(await strategy.process(deployThread)).toEqual([]);
  });
});
