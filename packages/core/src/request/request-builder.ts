import type { LogLayer } from 'loglayer';

import { quiet } from '../log.ts';
import type { OperationKind } from '../operation/catalog.ts';
import { MentionOperation } from '../operation/operation.ts';

import { DEFAULT_UTC_OFFSET } from './normalizers.ts';
import { createSearchParams } from './request-utils.ts';
import type { ArgumentBag, JsonObject, JsonValue, NormalizedParameterSet } from './request-utils.ts';
import { parseTemplate } from './template-utils.ts';
import { joinPath } from './url-utils.ts';

/**
 * A fully normalized request for one operation, ready for any transport.
 * Frozen once built.
 */
export interface OperationRequest {
  readonly kind: OperationKind;
  /** Uppercase HTTP method */
  readonly method: string;
  /** Path template the path was expanded from */
  readonly template: string;
  /** Expanded path, relative to the API base URL */
  readonly path: string;
  /** Query parameters in their fixed order */
  readonly query: readonly (readonly [string, string])[];
  /** Rendered query string without the leading `?`; empty when there are no parameters */
  readonly search: string;
  /** JSON document for body-bearing operations */
  readonly body: Readonly<JsonObject> | undefined;
}

/**
 * Configuration for building a request
 */
interface RequestConfig {
  /** Application context with logging */
  app: { log: LogLayer };
  /** Operation to build request for */
  op: MentionOperation;
  /** Arguments for the operation */
  args: ArgumentBag;
  /** Offset wall-clock dates are interpreted in */
  utcOffset?: string;
}

/**
 * Normalizes the arguments of one operation and renders its path, query
 * string and body.
 *
 * @param config - Configuration for building the request
 * @returns The frozen request
 * @throws ValidationError before anything is rendered if any argument is invalid
 */
export function buildOperationRequest({
  app,
  op,
  args,
  utcOffset = DEFAULT_UTC_OFFSET,
}: RequestConfig): OperationRequest {
  app.log.trace(`Specified args for ${op.kind}`, JSON.stringify(args));

  const { params, dropped } = op.normalize(args, { utcOffset });
  for (const { field, by } of dropped) {
    app.log.debug(`Dropped ${field}: excluded by ${by}`);
  }

  return renderRequest({ app, op, params });
}

/**
 * Builds the request for an operation kind. This is the functional entry
 * point; `MentionClient.build` does the same with the client's settings.
 */
export function build(
  kind: OperationKind,
  args: ArgumentBag,
  options: { app?: { log: LogLayer }; utcOffset?: string } = {},
): OperationRequest {
  return buildOperationRequest({
    app: options.app ?? { log: quiet },
    op: MentionOperation.from(kind),
    args,
    ...(options.utcOffset !== undefined && { utcOffset: options.utcOffset }),
  });
}

function renderRequest({
  app,
  op,
  params,
}: {
  app: { log: LogLayer };
  op: MentionOperation;
  params: NormalizedParameterSet;
}): OperationRequest {
  const bucketed = op.bucketArgs(params);
  app.log.debug('Normalized parameters', JSON.stringify(bucketed));

  const path = parseTemplate(op.path).expand(bucketed.path);
  const searchParams = createSearchParams(bucketed.query);
  const query = Object.freeze(
    Array.from(searchParams, ([key, value]) => Object.freeze([key, value] as const)),
  );
  const search = searchParams.toString();

  app.log.debug(`Built ${op.describe()}`, search ? `${path}?${search}` : path);

  if (bucketed.body !== undefined) deepFreeze(bucketed.body);

  return Object.freeze({
    kind: op.kind,
    method: op.verb.uppercase,
    template: op.path,
    path,
    query,
    search,
    body: bucketed.body,
  });
}

function deepFreeze(value: JsonValue): void {
  if (typeof value !== 'object' || value === null) return;

  const children = Array.isArray(value) ? value : Object.values(value);
  children.forEach(deepFreeze);
  Object.freeze(value);
}

/**
 * Intermediate result containing processed request parts
 */
interface BuiltRequest {
  /** Processed URL with query parameters */
  url: URL;
  /** Request initialization options */
  init: RequestInit;
}

interface TransportConfig {
  /** Application context with logging */
  app: { log: LogLayer };
  request: OperationRequest;
  /** API base URL the request path is appended to */
  baseUrl: string;
  /** OAuth2 bearer token */
  accessToken: string;
  signal?: AbortSignal;
}

/**
 * Builds RequestInit and URL objects for a Request from a built operation request.
 * This is useful when you need more control over the request creation process.
 *
 * @param config - Configuration for sending the request
 * @returns Object containing RequestInit and URL objects
 */
export function buildRequestInit({
  app,
  request,
  baseUrl,
  accessToken,
  signal,
}: TransportConfig): BuiltRequest {
  const url = new URL(joinPath(baseUrl, request.path));
  url.search = request.search;
  app.log.debug(`Request URL: ${url.toString()}`);

  const headers = createHeaders({ accessToken, hasBody: request.body !== undefined });

  const init: RequestInit = {
    method: request.method,
    headers,
    body: request.body === undefined ? null : JSON.stringify(request.body),
  };
  if (signal) init.signal = signal;

  return { init, url };
}

/**
 * Builds a standard Request object from a built operation request.
 *
 * @param config - Configuration for sending the request
 * @returns Constructed Request object
 */
export function buildRequest(config: TransportConfig): Request {
  const { init, url } = buildRequestInit(config);
  return new Request(url, init);
}

/**
 * Creates headers for the request, including authorization, content type and accept headers
 */
function createHeaders({
  accessToken,
  hasBody,
}: {
  accessToken: string;
  hasBody: boolean;
}): Headers {
  const headers = new Headers();

  if (hasBody) {
    headers.set('Content-Type', 'application/json');
  }

  headers.set('Accept', 'application/json');
  headers.set('Authorization', `Bearer ${accessToken}`);
  return headers;
}
