/**
 * Request handling module.
 *
 * Normalizes operation arguments and renders them into path, query string
 * and JSON body.
 */

export { build, buildOperationRequest, buildRequest, buildRequestInit } from './request-builder.ts';
export type { OperationRequest } from './request-builder.ts';
export { applyExclusions } from './exclusivity.ts';
export type { DroppedField, ExclusionRule } from './exclusivity.ts';
export {
  DEFAULT_UTC_OFFSET,
  MAX_LIMIT,
  MIN_LIMIT,
  clampLimit,
  formatDate,
  isUtcOffset,
  normalizeFields,
} from './normalizers.ts';
export type { NormalizeOptions } from './normalizers.ts';
export { appendData, bucketArgs, createSearchParams } from './request-utils.ts';
export type {
  ArgumentBag,
  BucketOperation,
  BucketedArgs,
  JsonObject,
  JsonValue,
  NormalizedParameterSet,
} from './request-utils.ts';
export { getBaseUrl, joinPath } from './url-utils.ts';
export { parseTemplate, templateVariables } from './template-utils.ts';
export type { TemplateInterface } from './template-utils.ts';
