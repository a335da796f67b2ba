import type { Logger } from 'pino';

export type Env = {
  Variables: {
    requestId: string;
    logger: Logger;
  };
};
