// src/utils/logger.ts

import pino from 'pino';

// stdout carries loop results and the MCP stdio transport, so logs go to stderr.
export const logger = pino(
  { level: process.env.LOG_LEVEL || 'info' },
  pino.destination(2)
);

export type Logger = typeof logger;

export function createLoopLogger(taskId: string) {
  return logger.child({ loop: taskId });
}
