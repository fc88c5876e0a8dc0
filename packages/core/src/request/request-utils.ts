import type { FieldLocation } from '../operation/fields.ts';

/**
 * Type for JSON values in parameters
 */
export type JsonValue =
  | string
  | number
  | boolean
  | null
  | undefined
  | JsonValue[]
  | { [key: string]: JsonValue };

/**
 * Type for JSON objects in parameters
 */
export type JsonObject = Record<string, JsonValue>;

/**
 * Loosely-typed caller arguments for one operation, keyed by API field name
 */
export type ArgumentBag = Readonly<Record<string, JsonValue>>;

/**
 * Normalized values in field-table order, followed by unrecognized extra
 * fields in caller order. Absent values are never present.
 */
export type NormalizedParameterSet = ReadonlyMap<string, JsonValue>;

/**
 * Minimal interface for operations used by bucketArgs
 */
export interface BucketOperation {
  locationOf(name: string): FieldLocation | undefined;
  readonly hasBody: boolean;
}

/**
 * Structured representation of request parameters by their location
 */
export interface BucketedArgs {
  path: Record<string, string>;
  query: [string, JsonValue][];
  body?: JsonObject;
}

/**
 * Organizes normalized parameters into their request locations. Extra fields
 * the operation does not declare go to the body when it has one, otherwise to
 * the query string.
 *
 * @param operation - Operation the parameters belong to
 * @param params - Normalized parameters
 * @returns Organized parameters by location
 */
export function bucketArgs(operation: BucketOperation, params: NormalizedParameterSet): BucketedArgs {
  const values: BucketedArgs = {
    path: {},
    query: [],
  };
  const body: JsonObject = {};
  const extras = operation.hasBody ? 'body' : 'query';

  for (const [name, value] of params) {
    switch (operation.locationOf(name) ?? extras) {
      case 'path':
        values.path[name] = String(value);
        break;
      case 'query':
        values.query.push([name, value]);
        break;
      case 'body':
        body[name] = value;
        break;
    }
  }

  if (operation.hasBody) values.body = body;

  return values;
}

/**
 * Creates URLSearchParams from key-value pairs, preserving their order
 *
 * @param input - Parameter entries
 * @param params - Optional existing URLSearchParams to add to
 * @returns URLSearchParams object with all parameters
 */
export function createSearchParams(
  input: Iterable<[string, JsonValue]>,
  params = new URLSearchParams(),
): URLSearchParams {
  for (const [key, value] of input) {
    appendData(params, key, value);
  }
  return params;
}

/**
 * Appends data to search params, handling nested objects and arrays
 *
 * @param params - URLSearchParams to append to
 * @param key - Key for the parameter
 * @param input - Value to append
 */
export function appendData(params: URLSearchParams, key: string, input: JsonValue): void {
  switch (typeof input) {
    case 'string':
    case 'number':
    case 'boolean':
      params.append(key, String(input));
      break;
    case 'undefined':
      break;
    case 'object':
      if (input === null) {
        params.append(key, '');
        break;
      }
      if (Array.isArray(input)) {
        input.forEach((v) => {
          appendData(params, key, v);
        });
      } else {
        Object.entries(input).forEach(([k, v]) => {
          appendData(params, `${key}[${k}]`, v);
        });
      }
      break;
  }
}
