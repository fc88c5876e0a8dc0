import { LogLayer, ConsoleTransport, LogLevel } from 'loglayer';

/**
 * Logger for callers that build requests without an app context.
 */
export const quiet = new LogLayer({
  enabled: false,
  transport: new ConsoleTransport({
    logger: console,
  }),
});

export function isValidLogLevel(value: string): value is LogLevel {
  return Object.values(LogLevel).some((level) => level === value);
}
