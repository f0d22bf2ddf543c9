import { pino, type LevelWithSilent, type Logger } from 'pino';

export type { Logger, LevelWithSilent };

/**
 * Create the root logger.
 *
 * JSON lines on stdout with ISO timestamps and string levels; every line
 * carries the service name so registry logs can be told apart when they
 * share a sink with the host application.
 */
export function createLogger(level: LevelWithSilent = 'info'): Logger {
  return pino({
    level,
    base: { service: 'agent-trust-registries' },
    timestamp: pino.stdTimeFunctions.isoTime,
    formatters: {
      level(label) {
        return { level: label };
      },
    },
    redact: {
      paths: ['agentSignature', 'signature'],
      censor: '[REDACTED]',
    },
  });
}

/** Child logger tagged with a component name */
export function componentLogger(root: Logger, component: string): Logger {
  return root.child({ component });
}
