import pino from 'pino';
import { getConfig } from './config.js';

const cfg = getConfig();

// stdout carries the MCP stdio transport, so logs go to stderr
export const logger = pino(
  {
    level: cfg.logLevel,
    base: undefined,
  },
  pino.destination(2),
);
