import pino from 'pino';

const root = pino(
  {
    name: 'split-readout',
    level: process.env.LOG_LEVEL ?? 'info',
  },
  pino.destination(2),
);

/** Named child of the root logger. Level comes from `LOG_LEVEL` (default `info`). */
export function createLogger(name: string): pino.Logger {
  return root.child({ module: name });
}

export const logger = root;
