import type { LogLayer } from 'loglayer';

import { TransportError } from '../errors.ts';
import type { OperationRequest } from '../request/request-builder.ts';
import type { JsonValue } from '../request/request-utils.ts';

/**
 * Describes a sent request in log lines and error messages, e.g.
 * `GET /accounts/A/alerts`. The query string is left out.
 */
export function describeRequest(request: Pick<OperationRequest, 'method' | 'path'>): string {
  return `${request.method} ${request.path}`;
}

/**
 * A built request together with the absolute URL it was sent to
 */
export interface SentRequest {
  request: OperationRequest;
  url: string;
}

/**
 * Reads the whole body. A stream that fails part way, such as a reset
 * connection or an abort, becomes a TransportError.
 */
async function readBody(response: Response, { request, url }: SentRequest): Promise<string> {
  try {
    return await response.text();
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new TransportError(`Reading the response to ${describeRequest(request)} failed: ${reason}`, {
      method: request.method,
      url,
      status: response.status,
      statusText: response.statusText,
      cause: error,
    });
  }
}

/**
 * Creates the error for a non-2xx response
 */
async function createTransportError(
  response: Response,
  log: LogLayer,
  sent: SentRequest,
): Promise<TransportError> {
  const { request, url } = sent;
  const body = await readBody(response, sent);
  log.warn(`Error response from ${describeRequest(request)}:`, `${response.status} ${body}`);

  return new TransportError(
    `${describeRequest(request)} failed with ${response.status}${response.statusText ? ` ${response.statusText}` : ''}`,
    {
      method: request.method,
      url,
      status: response.status,
      statusText: response.statusText,
      body,
    },
  );
}

/**
 * Processes a response to an operation request.
 *
 * A 2xx response is decoded as JSON and returned unmodified; an empty body
 * decodes to `null`. Anything else becomes a TransportError.
 *
 * @param response The response to process
 * @param log Logger instance
 * @param sent The request the response answers
 * @returns The decoded JSON body
 * @throws TransportError for non-2xx responses, bodies that fail to arrive and undecodable bodies
 */
export async function handleJsonResponse(
  response: Response,
  log: LogLayer,
  sent: SentRequest,
): Promise<JsonValue> {
  const { request, url } = sent;

  if (!response.ok) {
    throw await createTransportError(response, log, sent);
  }

  const text = await readBody(response, sent);
  log.info(`Response from ${describeRequest(request)}:`, String(response.status));

  if (text.trim() === '') {
    return null;
  }

  try {
    const json: JsonValue = JSON.parse(text);
    return json;
  } catch (error) {
    throw new TransportError(`${describeRequest(request)} returned a body that is not JSON`, {
      method: request.method,
      url,
      status: response.status,
      statusText: response.statusText,
      body: text,
      cause: error,
    });
  }
}
