import { errorMessage } from '../errors';
import type { AssistantClient, QuestionRecord, ResultRow, ResultStatus, RunStatus } from '../types';
import { silentLogger, type Logger } from '../util/logger';
import { sleep as realSleep, withRetryAndBackoff, type RetryPolicy, type Sleep } from '../util/retry';
import { buildPrompt } from './buildPrompt';
import { inferRole } from './inferRole';

export interface QuestionOptions {
  pollIntervalMs: number;
  runTimeoutMs: number;
  retry: Omit<RetryPolicy, 'isRetryable'>;
}

export interface QuestionDeps {
  client: AssistantClient;
  logger?: Logger;
  sleep?: Sleep;
  now?: () => number;
  random?: () => number;
}

type Phase = 'creating' | 'submitted' | 'polling' | 'fetching';

type TerminalStatus = Exclude<ResultStatus, 'timeout'>;

function terminalStatus(status: RunStatus): TerminalStatus | null {
  switch (status) {
    case 'completed':
    case 'failed':
    case 'cancelled':
    case 'expired':
      return status;
    default:
      return null;
  }
}

interface Outcome {
  status: ResultStatus;
  response: string;
  error: string;
}

function formatMinutes(ms: number): string {
  const minutes = ms / 60000;
  if (Number.isInteger(minutes)) return `${minutes} minute${minutes === 1 ? '' : 's'}`;
  return `${(ms / 1000).toFixed(0)} seconds`;
}

/**
 * Drive one question through the assistant:
 * creating -> submitted -> polling -> (completed | failed | cancelled | expired | timeout).
 *
 * Each API call is retried on transient errors. Anything that still fails
 * becomes a `failed` row; this function resolves for every API outcome so the
 * batch can carry on.
 */
export async function processQuestion(
  record: QuestionRecord,
  deps: QuestionDeps,
  options: QuestionOptions
): Promise<ResultRow> {
  const { client, logger = silentLogger, sleep = realSleep, now = Date.now, random = Math.random } = deps;
  const policy: RetryPolicy = { ...options.retry, isRetryable: error => client.isTransient(error) };
  const retry = <T>(operation: () => Promise<T>, context: string) =>
    withRetryAndBackoff(operation, policy, context, { sleep, random, logger });

  const role = inferRole(record.gender, record.hasKids);
  const prompt = buildPrompt(record, role);

  let threadId = '';
  let runId = '';
  let phase: Phase = 'creating';

  const row = (outcome: Outcome): ResultRow => ({
    topic: record.topic,
    gender: record.gender,
    careFocus: record.careFocus,
    hasKids: record.hasKids,
    role,
    prompt,
    question: record.question,
    response: outcome.response,
    threadId,
    runId,
    status: outcome.status,
    error: outcome.error
  });

  try {
    threadId = await retry(() => client.createConversation(), 'create thread');

    phase = 'submitted';
    let attempts = 0;
    runId = await retry(async () => {
      // a timed-out start may still have created the run; the thread is ours alone
      if (attempts++ > 0) {
        const started = await client.findRun(threadId);
        if (started) {
          logger.debug(`Adopting run ${started} left by an earlier attempt`);
          return started;
        }
      }
      return client.postMessage(threadId, prompt);
    }, `start run on ${threadId}`);

    phase = 'polling';
    const startedAt = now();
    for (;;) {
      const state = await retry(() => client.getRunStatus(threadId, runId), `poll run ${runId}`);

      const terminal = terminalStatus(state.status);
      if (terminal === 'completed') break;
      if (terminal) {
        const detail = state.lastError ? `: ${state.lastError}` : '';
        return row({ status: terminal, response: '', error: `Run ${terminal}${detail}` });
      }

      if (now() - startedAt >= options.runTimeoutMs) {
        logger.warn(`Run ${runId} still ${state.status}, giving up`);
        return row({ status: 'timeout', response: '', error: `Run timed out after ${formatMinutes(options.runTimeoutMs)}` });
      }

      await sleep(options.pollIntervalMs);
    }

    phase = 'fetching';
    const response = await retry(() => client.getLatestResponse(threadId), `read reply on ${threadId}`);
    if (!response) {
      return row({ status: 'failed', response: '', error: 'No assistant response found' });
    }
    return row({ status: 'completed', response, error: '' });
  } catch (error) {
    logger.debug(`Question failed while ${phase}`, { error: errorMessage(error) });
    return row({ status: 'failed', response: '', error: errorMessage(error) });
  }
}
