import type { LogLayer } from 'loglayer';

import { loadEnvironmentConfig } from './config.ts';
import { MentionClientError, TransportError, ValidationError } from './errors.ts';
import type { OperationKind } from './operation/catalog.ts';
import { MentionOperation } from './operation/operation.ts';
import type {
  AccountArgs,
  AlertArgs,
  ArgsOf,
  CreateAlertArgs,
  CurateMentionArgs,
  FetchMentionChildrenArgs,
  FetchMentionsArgs,
  MentionArgs,
  UpdateAlertArgs,
} from './operation/types.ts';
import { DEFAULT_UTC_OFFSET, isUtcOffset } from './request/normalizers.ts';
import { buildOperationRequest, buildRequest } from './request/request-builder.ts';
import type { OperationRequest } from './request/request-builder.ts';
import type { ArgumentBag, JsonValue, NormalizedParameterSet } from './request/request-utils.ts';
import { getBaseUrl } from './request/url-utils.ts';
import { describeRequest, handleJsonResponse } from './response/response-handler.ts';

export const DEFAULT_BASE_URL = 'https://api.mention.net/api';

/**
 * Sends one request and resolves with the raw response, whatever its status.
 */
export type HttpTransport = (request: Request) => Promise<Response>;

export interface MentionClientOptions {
  /** OAuth2 bearer token */
  accessToken: string;
  baseUrl?: string;
  /** Offset `yyyy-MM-dd HH:mm` dates are interpreted in; defaults to `+00:00` */
  utcOffset?: string;
  transport?: HttpTransport;
}

export interface ExecuteOptions {
  signal?: AbortSignal;
}

/**
 * Client for one operation: builds its path and parameters and executes it.
 */
export class OperationClient<K extends OperationKind> {
  readonly #client: MentionClient;
  readonly #operation: MentionOperation;

  constructor(client: MentionClient, operation: MentionOperation) {
    this.#client = client;
    this.#operation = operation;
  }

  get op(): MentionOperation {
    return this.#operation;
  }

  buildPath(args: ArgsOf<K>): string {
    return this.build(args).path;
  }

  /**
   * The normalized parameters after exclusivity rules, path fields included
   */
  buildParams(args: ArgsOf<K>): NormalizedParameterSet {
    return this.#operation.normalize(args, { utcOffset: this.#client.utcOffset }).params;
  }

  build(args: ArgsOf<K>): OperationRequest {
    return this.#client.build(this.#operation.kind, args);
  }

  /**
   * Invokes the operation
   * @param args The arguments to pass to the operation
   * @returns The decoded JSON response
   */
  execute(args: ArgsOf<K>, options?: ExecuteOptions): Promise<JsonValue> {
    return this.#client.execute(this.#operation.kind, args, options);
  }
}

/**
 * Client for the Mention REST API.
 *
 * Every call builds a fresh request from its arguments; the client itself
 * only holds immutable settings and can be shared freely.
 */
export class MentionClient {
  /**
   * Creates a client from `MENTION_*` environment variables, with overrides
   * applied last.
   */
  static fromEnvironment(
    app: { log: LogLayer },
    overrides: Partial<MentionClientOptions> = {},
    env: NodeJS.ProcessEnv = process.env,
  ): MentionClient {
    const config = loadEnvironmentConfig(env);
    const accessToken = overrides.accessToken ?? config.MENTION_ACCESS_TOKEN;

    if (!accessToken) {
      throw new MentionClientError('MENTION_ACCESS_TOKEN environment variable is required');
    }

    const baseUrl = overrides.baseUrl ?? config.MENTION_BASE_URL;
    const utcOffset = overrides.utcOffset ?? config.MENTION_UTC_OFFSET;

    return new MentionClient(app, {
      ...overrides,
      accessToken,
      ...(baseUrl !== undefined && { baseUrl }),
      ...(utcOffset !== undefined && { utcOffset }),
    });
  }

  readonly baseUrl: string;
  readonly utcOffset: string;

  readonly #app: { log: LogLayer };
  readonly #accessToken: string;
  readonly #transport: HttpTransport;

  constructor(app: { log: LogLayer }, options: MentionClientOptions) {
    if (!options.accessToken) {
      throw new MentionClientError('An access token is required');
    }

    const utcOffset = options.utcOffset ?? DEFAULT_UTC_OFFSET;
    if (!isUtcOffset(utcOffset)) {
      throw new ValidationError([
        { field: 'utcOffset', message: `Expected an offset like +02:00, received '${utcOffset}'` },
      ]);
    }

    this.#app = app;
    this.#accessToken = options.accessToken;
    this.#transport = options.transport ?? ((request) => fetch(request));
    this.baseUrl = getBaseUrl(options.baseUrl ?? DEFAULT_BASE_URL);
    this.utcOffset = utcOffset;
  }

  operation<K extends OperationKind>(kind: K): OperationClient<K> {
    return new OperationClient(this, MentionOperation.from(kind));
  }

  /**
   * Normalizes arguments and renders the request for an operation without
   * sending it.
   *
   * @throws ValidationError if any argument is invalid
   */
  build(kind: OperationKind, args: ArgumentBag = {}): OperationRequest {
    return buildOperationRequest({
      app: this.#app,
      op: MentionOperation.from(kind),
      args,
      utcOffset: this.utcOffset,
    });
  }

  /**
   * Builds, sends and decodes one request.
   *
   * @returns The decoded JSON body, unmodified
   * @throws ValidationError before anything is sent if any argument is invalid
   * @throws TransportError for network failures, non-2xx responses and undecodable bodies
   */
  async execute(
    kind: OperationKind,
    args: ArgumentBag = {},
    options: ExecuteOptions = {},
  ): Promise<JsonValue> {
    const request = this.build(kind, args);
    const sent = buildRequest({
      app: this.#app,
      request,
      baseUrl: this.baseUrl,
      accessToken: this.#accessToken,
      ...(options.signal && { signal: options.signal }),
    });

    let response: Response;
    try {
      response = await this.#transport(sent);
    } catch (error) {
      this.#app.log.withError(error).error(`Request to ${describeRequest(request)} failed`);
      const reason = error instanceof Error ? error.message : String(error);
      throw new TransportError(`${describeRequest(request)} failed: ${reason}`, {
        method: request.method,
        url: sent.url,
        cause: error,
      });
    }

    return handleJsonResponse(response, this.#app.log, { request, url: sent.url });
  }

  /** Retrieve details about the application */
  appData(options?: ExecuteOptions): Promise<JsonValue> {
    return this.execute('app-data', {}, options);
  }

  /** List every alert of an account */
  fetchAlerts(args: AccountArgs, options?: ExecuteOptions): Promise<JsonValue> {
    return this.execute('fetch-alerts', args, options);
  }

  fetchAlert(args: AlertArgs, options?: ExecuteOptions): Promise<JsonValue> {
    return this.execute('fetch-alert', args, options);
  }

  createAlert(args: CreateAlertArgs, options?: ExecuteOptions): Promise<JsonValue> {
    return this.execute('create-alert', args, options);
  }

  updateAlert(args: UpdateAlertArgs, options?: ExecuteOptions): Promise<JsonValue> {
    return this.execute('update-alert', args, options);
  }

  fetchMention(args: MentionArgs, options?: ExecuteOptions): Promise<JsonValue> {
    return this.execute('fetch-mention', args, options);
  }

  /**
   * List the mentions of an alert. `since_id` overrides the date range and
   * cursor, `unread: true` overrides favorite, folder, q and tone, and
   * `favorite` is only sent together with the inbox or archive folder.
   */
  fetchMentions(args: FetchMentionsArgs, options?: ExecuteOptions): Promise<JsonValue> {
    return this.execute('fetch-mentions', args, options);
  }

  fetchMentionChildren(args: FetchMentionChildrenArgs, options?: ExecuteOptions): Promise<JsonValue> {
    return this.execute('fetch-mention-children', args, options);
  }

  curateMention(args: CurateMentionArgs, options?: ExecuteOptions): Promise<JsonValue> {
    return this.execute('curate-mention', args, options);
  }

  markAllMentionsRead(args: AlertArgs, options?: ExecuteOptions): Promise<JsonValue> {
    return this.execute('mark-all-mentions-read', args, options);
  }
}
