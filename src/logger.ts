import { randomUUID } from 'node:crypto';

export interface RunLogger {
  readonly runId: string;
  info: (...a: unknown[]) => void;
  warn: (...a: unknown[]) => void;
  error: (...a: unknown[]) => void;
}

/**
 * Console logger scoped to one scrape run. Every line is prefixed with the
 * run id so interleaved output from repeated runs can be told apart.
 */
export function createRunLogger(runId: string = randomUUID().slice(0, 8)): RunLogger {
  const prefix = () => `[${new Date().toISOString()}] [run ${runId}]`;
  return {
    runId,
    info: (...a: unknown[]) => console.log(prefix(), ...a),
    warn: (...a: unknown[]) => console.warn(prefix(), ...a),
    error: (...a: unknown[]) => console.error(prefix(), ...a),
  };
}

/** Discards everything; for callers that have no run context. */
export const silentLogger: RunLogger = {
  runId: 'silent',
  info: () => {},
  warn: () => {},
  error: () => {},
};
