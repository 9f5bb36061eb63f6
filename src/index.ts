export * from './types';
export { ConfigError, ParseError, errorMessage } from './errors';
export { loadConfig, loadSettings, type AppConfig, type Settings } from './config';
export { parseTopicText, parseTopicFile, stripNumbering, matchGenderHeader, matchContextHeader } from './parse/parseTopics';
export { GENDER_HEADERS, CONTEXT_HEADERS } from './parse/markers';
export { inferRole } from './engine/inferRole';
export { buildPrompt } from './engine/buildPrompt';
export { processQuestion, type QuestionDeps, type QuestionOptions } from './engine/processQuestion';
export { runBatch, type BatchOptions, type BatchSummary } from './engine/runBatch';
export { createRandomTestFile, renderTopicSection } from './engine/randomSample';
export { loadResumeLedger, filterUnprocessed } from './state/resumeLedger';
export { OutputTable } from './state/outputTable';
export { OUTPUT_COLUMNS } from './schemas/resultRow';
export { OpenAIAssistantClient, isTransientOpenAIError, type AssistantThreads } from './openai/client';
export { withRetryAndBackoff, backoffDelay, type RetryPolicy } from './util/retry';
export { createLogger, type Logger, type LogLevel } from './util/logger';
