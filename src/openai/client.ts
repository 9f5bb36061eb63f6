import OpenAI from 'openai';
import type { AppConfig } from '../config';
import type { AssistantClient, RunState, RunStatus } from '../types';

type ApiRun = Awaited<ReturnType<OpenAI['beta']['threads']['runs']['retrieve']>>;
type ApiMessage = Awaited<ReturnType<OpenAI['beta']['threads']['messages']['retrieve']>>;

export type RunSnapshot = Pick<ApiRun, 'status' | 'last_error' | 'incomplete_details'>;
export type ThreadMessage = Pick<ApiMessage, 'role' | 'content'>;

export interface RunCreateBody {
  assistant_id: string;
  additional_messages: Array<{ role: 'user'; content: string }>;
}

/** The part of `openai.beta.threads` the adapter calls. */
export interface AssistantThreads {
  create(): Promise<{ id: string }>;
  runs: {
    create(threadId: string, body: RunCreateBody): Promise<{ id: string }>;
    retrieve(threadId: string, runId: string): Promise<RunSnapshot>;
    list(threadId: string, query: { order: 'desc'; limit: number }): Promise<{ data: Array<{ id: string }> }>;
  };
  messages: {
    list(threadId: string, query: { order: 'desc'; limit: number }): Promise<{ data: ThreadMessage[] }>;
  };
}

const RETRYABLE_STATUS = new Set([408, 409, 429]);

export function isTransientOpenAIError(error: unknown): boolean {
  // Covers connection resets and request timeouts (APIConnectionTimeoutError extends it)
  if (error instanceof OpenAI.APIConnectionError) return true;
  if (error instanceof OpenAI.APIError) {
    const status = error.status;
    return status === undefined || RETRYABLE_STATUS.has(status) || status >= 500;
  }
  return false;
}

/** Maps the API's run status onto the states the batch driver polls for. */
export function toRunStatus(status: ApiRun['status']): RunStatus {
  switch (status) {
    case 'incomplete':
      return 'failed';
    default:
      return status;
  }
}

function describeRunError(run: RunSnapshot): string | undefined {
  if (run.last_error) return `${run.last_error.code}: ${run.last_error.message}`;
  if (run.incomplete_details?.reason) return `incomplete: ${run.incomplete_details.reason}`;
  return undefined;
}

/** Assistants API (threads + runs) behind the AssistantClient contract. */
export class OpenAIAssistantClient implements AssistantClient {
  private readonly threads: AssistantThreads;
  private readonly assistantId: string;

  constructor(config: Pick<AppConfig, 'OPENAI_API_KEY' | 'ASSISTANT_ID' | 'REQUEST_TIMEOUT_MS'>, threads?: AssistantThreads) {
    this.assistantId = config.ASSISTANT_ID;
    this.threads =
      threads ??
      new OpenAI({
        apiKey: config.OPENAI_API_KEY,
        timeout: config.REQUEST_TIMEOUT_MS,
        maxRetries: 0 // retries are owned by withRetryAndBackoff
      }).beta.threads;
  }

  async createConversation(): Promise<string> {
    const thread = await this.threads.create();
    return thread.id;
  }

  async postMessage(conversationId: string, text: string): Promise<string> {
    // Message and run in one request so a retried call never leaves a dangling message
    const run = await this.threads.runs.create(conversationId, {
      assistant_id: this.assistantId,
      additional_messages: [{ role: 'user', content: text }]
    });
    return run.id;
  }

  async getRunStatus(conversationId: string, runId: string): Promise<RunState> {
    const run = await this.threads.runs.retrieve(conversationId, runId);
    return { status: toRunStatus(run.status), lastError: describeRunError(run) };
  }

  async getLatestResponse(conversationId: string): Promise<string> {
    const messages = await this.threads.messages.list(conversationId, { order: 'desc', limit: 20 });
    const reply = messages.data.find(m => m.role === 'assistant');
    if (!reply) return '';

    let text = '';
    for (const block of reply.content) {
      if (block.type === 'text') {
        text += block.text.value;
      }
    }
    return text.trim();
  }

  async findRun(conversationId: string): Promise<string | null> {
    const runs = await this.threads.runs.list(conversationId, { order: 'desc', limit: 1 });
    return runs.data[0]?.id ?? null;
  }

  isTransient(error: unknown): boolean {
    return isTransientOpenAIError(error);
  }
}
