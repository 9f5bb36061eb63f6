export const GENDERS = ['Female', 'Male', 'Gender Neutral'] as const;
export const CARE_FOCUSES = ['Myself', 'My Kids', 'My Family'] as const;
export const HAS_KIDS = ['Yes', 'No'] as const;

export type Gender = typeof GENDERS[number];
export type CareFocus = typeof CARE_FOCUSES[number];
export type HasKids = typeof HAS_KIDS[number];
export type Role = 'mother' | 'father' | 'parent' | 'individual';

export interface QuestionRecord {
  readonly topic: string;
  readonly gender: Gender;
  readonly careFocus: CareFocus;
  readonly hasKids: HasKids;
  readonly question: string; // numbering stripped, otherwise verbatim
  readonly lineNumber: number;
}

export const RESULT_STATUSES = ['completed', 'failed', 'timeout', 'cancelled', 'expired'] as const;
export type ResultStatus = typeof RESULT_STATUSES[number];

export interface ResultRow {
  topic: string;
  gender: Gender;
  careFocus: CareFocus;
  hasKids: HasKids;
  role: Role;
  prompt: string;
  question: string;
  response: string;
  threadId: string;
  runId: string;
  status: ResultStatus;
  error: string;
}

export type RunStatus =
  | 'queued'
  | 'in_progress'
  | 'requires_action'
  | 'cancelling'
  | 'completed'
  | 'failed'
  | 'cancelled'
  | 'expired';

export interface RunState {
  status: RunStatus;
  lastError?: string;
}

/**
 * The slice of a hosted assistant the batch driver talks to.
 * One conversation (thread) is opened per question.
 */
export interface AssistantClient {
  createConversation(): Promise<string>;
  /** Adds the user message and starts a run; resolves to the run id. */
  postMessage(conversationId: string, text: string): Promise<string>;
  getRunStatus(conversationId: string, runId: string): Promise<RunState>;
  getLatestResponse(conversationId: string): Promise<string>;
  /** Newest run on the conversation, null when none was started. */
  findRun(conversationId: string): Promise<string | null>;
  /** True for failures worth another attempt (network, rate limit, 5xx). */
  isTransient(error: unknown): boolean;
}
