import { createLogger } from '../util/logger';

const logger = createLogger('CLI');

export function exitOnInterrupt(): never {
  logger.error('Processing interrupted by user');
  process.exit(1);
}
