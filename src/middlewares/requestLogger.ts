import morgan, { StreamOptions } from 'morgan';
import { logger } from '../utils';
import { env } from '../config';

const stream: StreamOptions = {
  write: (message: string) => {
    logger.http(message.trim());
  },
};

// Probes hit /health every few seconds; tests need no request log at all
const skip = (req: { url?: string }): boolean =>
  env.NODE_ENV === 'test' || (req.url ?? '').startsWith(`${env.API_PREFIX}/health`);

export const requestLogger = morgan(env.NODE_ENV === 'production' ? 'combined' : 'dev', {
  stream,
  skip,
});

export default requestLogger;
