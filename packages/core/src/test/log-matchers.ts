import type { TestLoggingLibrary } from 'loglayer';
import { expect } from 'vitest';

/**
 * A matcher that allows defining expected log messages using a callback syntax.
 * The expected lines must appear in the recorded log in the same order;
 * other lines may come in between.
 *
 * @example
 * expect(testLogger).toHaveLogged((l) => {
 *   l.debug('Dropped cursor: excluded by since_id');
 *   l.info('Response from GET /app/data:', '200');
 * });
 */
interface LogRecorder {
  error: (...args: unknown[]) => void;
  warn: (...args: unknown[]) => void;
  info: (...args: unknown[]) => void;
  debug: (...args: unknown[]) => void;
  trace: (...args: unknown[]) => void;
}

interface LogEntry {
  level: string;
  data: unknown[];
}

type LogCallback = (logger: LogRecorder) => void;

function format(entries: LogEntry[]): unknown[][] {
  return entries.map((entry) => [entry.level, ...entry.data]);
}

expect.extend({
  toHaveLogged(received: TestLoggingLibrary, callback: LogCallback) {
    const expectedLogs: LogEntry[] = [];

    const recorder: LogRecorder = {
      error: (...args) => expectedLogs.push({ level: 'error', data: args }),
      warn: (...args) => expectedLogs.push({ level: 'warn', data: args }),
      info: (...args) => expectedLogs.push({ level: 'info', data: args }),
      debug: (...args) => expectedLogs.push({ level: 'debug', data: args }),
      trace: (...args) => expectedLogs.push({ level: 'trace', data: args }),
    };

    callback(recorder);

    const actualLogs: LogEntry[] = received.lines.map((line) => ({
      level: String(line.level),
      data: Array.isArray(line.data) ? line.data : [line.data],
    }));

    let next = 0;
    for (const actual of actualLogs) {
      const wanted = expectedLogs[next];
      if (!wanted) break;
      if (actual.level === wanted.level && this.equals(actual.data, wanted.data)) next++;
    }

    return {
      pass: next === expectedLogs.length,
      expected: format(expectedLogs),
      actual: format(actualLogs),
      message: () =>
        this.isNot
          ? 'Expected logs not to include the specified messages'
          : `Expected logs to include the specified messages in order (matched ${next} of ${expectedLogs.length})`,
    };
  },
});

declare module 'vitest' {
  interface Assertion<T> {
    toHaveLogged(callback: LogCallback): void;
  }

  interface AsymmetricMatchersContaining {
    toHaveLogged(callback: LogCallback): void;
  }
}
