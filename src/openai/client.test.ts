import { beforeEach, describe, expect, it } from 'vitest';
import OpenAI from 'openai';
import {
  OpenAIAssistantClient,
  isTransientOpenAIError,
  toRunStatus,
  type AssistantThreads,
  type RunCreateBody,
  type RunSnapshot,
  type ThreadMessage
} from './client';

describe('isTransientOpenAIError', () => {
  it('retries rate limits, conflicts and server errors', () => {
    expect(isTransientOpenAIError(new OpenAI.RateLimitError(429, undefined, 'rate limited', undefined))).toBe(true);
    expect(isTransientOpenAIError(new OpenAI.InternalServerError(503, undefined, 'unavailable', undefined))).toBe(true);
    expect(isTransientOpenAIError(new OpenAI.ConflictError(409, undefined, 'conflict', undefined))).toBe(true);
  });

  it('retries connection problems', () => {
    expect(isTransientOpenAIError(new OpenAI.APIConnectionError({ message: 'socket hang up' }))).toBe(true);
    expect(isTransientOpenAIError(new OpenAI.APIConnectionTimeoutError())).toBe(true);
  });

  it('does not retry client errors or plain errors', () => {
    expect(isTransientOpenAIError(new OpenAI.BadRequestError(400, undefined, 'bad request', undefined))).toBe(false);
    expect(isTransientOpenAIError(new OpenAI.AuthenticationError(401, undefined, 'bad key', undefined))).toBe(false);
    expect(isTransientOpenAIError(new Error('boom'))).toBe(false);
  });
});

describe('toRunStatus', () => {
  it('passes known statuses through and folds incomplete into failed', () => {
    expect(toRunStatus('in_progress')).toBe('in_progress');
    expect(toRunStatus('expired')).toBe('expired');
    expect(toRunStatus('incomplete')).toBe('failed');
  });
});

/** Records calls and serves canned runs and messages in place of the SDK. */
class StubThreads implements AssistantThreads {
  readonly created: Array<{ threadId: string; body: RunCreateBody }> = [];
  readonly listQueries: Array<{ threadId: string; order: 'desc'; limit: number }> = [];
  run: RunSnapshot = { status: 'completed', last_error: null, incomplete_details: null };
  runIds: string[] = [];
  history: ThreadMessage[] = [];

  async create() {
    return { id: 'thread_abc' };
  }

  readonly runs = {
    create: async (threadId: string, body: RunCreateBody) => {
      this.created.push({ threadId, body });
      return { id: 'run_abc' };
    },
    retrieve: async (_threadId: string, _runId: string) => this.run,
    list: async (_threadId: string, _query: { order: 'desc'; limit: number }) => ({
      data: this.runIds.map(id => ({ id }))
    })
  };

  readonly messages = {
    list: async (threadId: string, query: { order: 'desc'; limit: number }) => {
      this.listQueries.push({ threadId, ...query });
      return { data: this.history };
    }
  };
}

const text = (value: string) => ({ type: 'text' as const, text: { value, annotations: [] } });

describe('OpenAIAssistantClient', () => {
  let threads: StubThreads;
  let client: OpenAIAssistantClient;

  beforeEach(() => {
    threads = new StubThreads();
    client = new OpenAIAssistantClient(
      { OPENAI_API_KEY: 'test-secret', ASSISTANT_ID: 'asst_test', REQUEST_TIMEOUT_MS: 30000 },
      threads
    );
  });

  it('opens a thread per conversation', async () => {
    expect(await client.createConversation()).toBe('thread_abc');
  });

  it('adds the message and starts the run in one request', async () => {
    const runId = await client.postMessage('thread_abc', 'Why am I tired?');

    expect(runId).toBe('run_abc');
    expect(threads.created).toEqual([
      {
        threadId: 'thread_abc',
        body: { assistant_id: 'asst_test', additional_messages: [{ role: 'user', content: 'Why am I tired?' }] }
      }
    ]);
  });

  it('reports the last error of a failed run', async () => {
    threads.run = {
      status: 'failed',
      last_error: { code: 'server_error', message: 'model overloaded' },
      incomplete_details: null
    };
    expect(await client.getRunStatus('thread_abc', 'run_abc')).toEqual({
      status: 'failed',
      lastError: 'server_error: model overloaded'
    });
  });

  it('reports an incomplete run as failed with its reason', async () => {
    threads.run = { status: 'incomplete', last_error: null, incomplete_details: { reason: 'max_prompt_tokens' } };
    expect(await client.getRunStatus('thread_abc', 'run_abc')).toEqual({
      status: 'failed',
      lastError: 'incomplete: max_prompt_tokens'
    });
  });

  it('has no error for a run still in progress', async () => {
    threads.run = { status: 'in_progress', last_error: null, incomplete_details: null };
    const state = await client.getRunStatus('thread_abc', 'run_abc');
    expect(state.status).toBe('in_progress');
    expect(state.lastError).toBeUndefined();
  });

  it('joins the text blocks of the newest assistant message', async () => {
    threads.history = [
      { role: 'assistant', content: [text('  Short naps help. '), text('Keep them under 30 minutes.\n')] },
      { role: 'user', content: [text('Why am I tired?')] },
      { role: 'assistant', content: [text('An older reply.')] }
    ];

    expect(await client.getLatestResponse('thread_abc')).toBe('Short naps help. Keep them under 30 minutes.');
    expect(threads.listQueries).toEqual([{ threadId: 'thread_abc', order: 'desc', limit: 20 }]);
  });

  it('skips newer user messages to reach the reply', async () => {
    threads.history = [
      { role: 'user', content: [text('Follow-up?')] },
      { role: 'assistant', content: [text('The reply.')] }
    ];
    expect(await client.getLatestResponse('thread_abc')).toBe('The reply.');
  });

  it('returns an empty reply when the assistant sent no text', async () => {
    threads.history = [{ role: 'assistant', content: [{ type: 'image_file', image_file: { file_id: 'file_1' } }] }];
    expect(await client.getLatestResponse('thread_abc')).toBe('');
  });

  it('returns an empty reply when the thread has no assistant message', async () => {
    threads.history = [{ role: 'user', content: [text('Why am I tired?')] }];
    expect(await client.getLatestResponse('thread_abc')).toBe('');
  });

  it('finds the newest run on a thread', async () => {
    expect(await client.findRun('thread_abc')).toBeNull();
    threads.runIds = ['run_new', 'run_old'];
    expect(await client.findRun('thread_abc')).toBe('run_new');
  });
});
