import pino from 'pino';

const IS_TEST = process.env['NODE_ENV'] === 'test' || Boolean(process.env['VITEST']);
const BASE_LEVEL = process.env['LOG_LEVEL'] ?? (IS_TEST ? 'silent' : 'info');

/**
 * Component logger. Writes to stderr: stdout is reserved for the MCP
 * stdio transport.
 */
export function createLogger(name: string): pino.Logger {
  return pino({ name, level: BASE_LEVEL }, pino.destination(2));
}
