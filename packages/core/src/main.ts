/**
 * mention-client: a typed client and command line for the Mention REST API
 */

import { writeFile } from 'node:fs/promises';

import { Command, CommanderError, Option } from '@commander-js/extra-typings';
import { ConsoleTransport, LogLayer, LogLevel } from 'loglayer';
import type { ErrorSerializerType, LogLayerConfig, LogLayerTransport } from 'loglayer';
import { serializeError } from 'serialize-error';

import { MentionClient } from './client.ts';
import type { HttpTransport } from './client.ts';
import { loadEnvironmentConfig } from './config.ts';
import { MentionClientError } from './errors.ts';
import { OPERATION_KINDS, isOperationKind } from './operation/catalog.ts';
import { MentionOperation } from './operation/operation.ts';
import type { JsonValue } from './request/request-utils.ts';

export { DEFAULT_BASE_URL, MentionClient, OperationClient } from './client.ts';
export type { ExecuteOptions, HttpTransport, MentionClientOptions } from './client.ts';
export { loadEnvironmentConfig } from './config.ts';
export type { EnvironmentConfig } from './config.ts';
export { MentionClientError, TransportError, ValidationError } from './errors.ts';
export type { FieldIssue, TransportErrorDetails } from './errors.ts';
export { OPERATION_KINDS, OPERATIONS, isOperationKind } from './operation/catalog.ts';
export type { OperationKind, OperationSpec } from './operation/catalog.ts';
export { FOLDERS, SORTS, SOURCES, TONES } from './operation/fields.ts';
export type { FieldSpec, Folder, Normalizer, Sort, Source, Tone } from './operation/fields.ts';
export { MentionOperation } from './operation/operation.ts';
export type * from './operation/types.ts';
export * from './request/index.ts';
export { handleJsonResponse } from './response/response-handler.ts';

const version = '0.1.0';

export interface AppOptions {
  logLevel: LogLevel;
}

export class App {
  static default(options: AppOptions): App {
    const app = new App({
      serializer: serializeError,
      log: new ConsoleTransport({
        // stdout is reserved for command output
        logger: new console.Console(process.stderr),
      }),
    });
    app.log.setLevel(options.logLevel);
    return app;
  }

  readonly #log: LogLayer;

  constructor(options: {
    log: LogLayerTransport | LogLayerTransport[];
    serializer?: ErrorSerializerType;
  }) {
    const opts: LogLayerConfig = { transport: options.log };
    if (options.serializer) {
      opts.errorSerializer = options.serializer;
    }

    this.#log = new LogLayer(opts);
  }

  get log(): LogLayer {
    return this.#log;
  }
}

/**
 * Where the CLI writes. Replaced in tests.
 */
export interface CliIO {
  stdout: (text: string) => void;
  stderr: (text: string) => void;
  writeFile: (path: string, contents: string) => Promise<void>;
  env: NodeJS.ProcessEnv;
  /** Creates the app for a run; defaults to `App.default` */
  app?: (options: AppOptions) => App;
  /** Overrides the client's transport */
  transport?: HttpTransport;
}

const defaultIO: CliIO = {
  stdout: (text) => process.stdout.write(`${text}\n`),
  stderr: (text) => process.stderr.write(`${text}\n`),
  writeFile: (path, contents) => writeFile(path, contents, 'utf8'),
  env: process.env,
};

/**
 * Parse one  --arg  argument of the form  key=value
 * Values that start with `[` or `{` are read as JSON.
 */
export function collectArgument(
  input: string,
  prev: Record<string, JsonValue>,
): Record<string, JsonValue> {
  const [key, ...rest] = input.split('=');
  if (!key || rest.length === 0) {
    throw new MentionClientError(`--arg must be KEY=VALUE (got "${input}")`);
  }

  const value = rest.join('=');
  return { ...prev, [key]: /^[[{]/.test(value) ? parseJsonArgument(key, value) : value };
}

function parseJsonArgument(key: string, value: string): JsonValue {
  try {
    const json: JsonValue = JSON.parse(value);
    return json;
  } catch (error) {
    throw new MentionClientError(`--arg ${key} is not valid JSON`, { cause: error });
  }
}

function formatJson(value: unknown): string {
  return JSON.stringify(value, null, 2);
}

const LOG_LEVELS = Object.values(LogLevel);
const NO_ARGS: Record<string, JsonValue> = {};

export function createProgram(io: CliIO = defaultIO): Command {
  const config = loadEnvironmentConfig(io.env);
  const createApp = io.app ?? App.default;

  const program = new Command()
    .name('mention-client')
    .description('Call the Mention REST API from the command line')
    .version(version)
    .exitOverride()
    .configureOutput({
      writeOut: (text) => io.stdout(text.trimEnd()),
      writeErr: (text) => io.stderr(text.trimEnd()),
    });

  program
    .command('list')
    .description('List every operation with its method, path template and change safety')
    .action(() => {
      for (const kind of OPERATION_KINDS) {
        const op = MentionOperation.from(kind);
        io.stdout([kind, op.describe(), op.verb.describe()].join('\t'));
      }
    });

  program
    .command('call')
    .description('Build and send one request, printing the JSON response')
    .argument('<operation>', `One of: ${OPERATION_KINDS.join(', ')}`)
    .addOption(
      new Option('-a, --arg <key=value>', 'Operation argument (repeatable); JSON for [..] and {..}')
        .argParser(collectArgument)
        .default(NO_ARGS),
    )
    .option('--token <token>', 'OAuth2 access token (default: $MENTION_ACCESS_TOKEN)')
    .option('--base-url <url>', 'API base URL (default: $MENTION_BASE_URL)')
    .option('--utc-offset <offset>', 'Offset dates are interpreted in, e.g. +02:00')
    .addOption(
      new Option('-l, --log-level <level>', 'Log level')
        .choices(LOG_LEVELS)
        .default(config.LOG_LEVEL ?? LogLevel.warn),
    )
    .option('--dry-run', 'Print the request that would be sent and exit')
    .option('-o, --output <file>', 'Write the JSON response to a file')
    .action(async (operation, options) => {
      if (!isOperationKind(operation)) {
        throw new MentionClientError(
          `Unknown operation "${operation}"; expected one of ${OPERATION_KINDS.join(', ')}`,
        );
      }

      const app = createApp({ logLevel: options.logLevel });
      const accessToken =
        options.token ?? (options.dryRun && !config.MENTION_ACCESS_TOKEN ? 'dry-run' : undefined);

      const client = MentionClient.fromEnvironment(
        app,
        {
          ...(accessToken && { accessToken }),
          ...(options.baseUrl && { baseUrl: options.baseUrl }),
          ...(options.utcOffset && { utcOffset: options.utcOffset }),
          ...(io.transport && { transport: io.transport }),
        },
        io.env,
      );

      if (options.dryRun) {
        io.stdout(formatJson(client.build(operation, options.arg)));
        return;
      }

      const result = await client.execute(operation, options.arg);

      if (options.output) {
        await io.writeFile(options.output, `${formatJson(result)}\n`);
        app.log.info(`Wrote response to ${options.output}`);
      } else {
        io.stdout(formatJson(result));
      }
    });

  return program;
}

/**
 * Runs the CLI and returns its exit code. Client errors are reported on
 * stderr; anything else propagates.
 */
export async function run(argv: readonly string[], io: CliIO = defaultIO): Promise<number> {
  const program = createProgram(io);

  try {
    await program.parseAsync(argv, { from: 'user' });
    return 0;
  } catch (error) {
    if (error instanceof MentionClientError) {
      io.stderr(`${error.name}: ${error.message}`);
      return 1;
    }
    if (error instanceof CommanderError) {
      return error.exitCode;
    }
    throw error;
  }
}

// Parse CLI arguments if this is being run directly
if (import.meta.url === `file://${process.argv[1]}`) {
  process.exitCode = await run(process.argv.slice(2));
}
