import morgan, { StreamOptions } from 'morgan';
import { Logging } from '../utils';
import { env } from '../config';

// Morgan lines go to winston at http level
const stream: StreamOptions = {
  write: (message: string) => {
    Logging.http(message.trim());
  },
};

const skip = (): boolean => env.NODE_ENV === 'test';

export const requestLogger = morgan(env.NODE_ENV === 'production' ? 'combined' : 'dev', {
  stream,
  skip,
});

export default requestLogger;
