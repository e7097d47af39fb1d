import pino from 'pino';

// LOG_STREAM=stderr keeps stdout free for command output
const destination = pino.destination(process.env.LOG_STREAM === 'stderr' ? 2 : 1);

export const logger = pino(
  {
    name: 'bgn-eur-verifier',
    level: process.env.LOG_LEVEL ?? 'info',
  },
  destination,
);

export function createRunLogger(
  runId: string,
  sourceName?: string,
  targetName?: string,
) {
  return logger.child({
    runId,
    ...(sourceName !== undefined && { sourceName }),
    ...(targetName !== undefined && { targetName }),
  });
}
