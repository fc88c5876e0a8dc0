/**
 * Field tables: what each operation accepts and how every value is normalized
 * before it reaches the query string or the request body.
 */

export const TONES = ['negative', 'neutral', 'positive'] as const;
export const SOURCES = [
  'web',
  'twitter',
  'blogs',
  'forums',
  'news',
  'facebook',
  'images',
  'videos',
] as const;
export const FOLDERS = ['inbox', 'archive', 'spam', 'trash'] as const;
export const SORTS = [
  'published_at',
  'author_influence.score',
  'direct_reach',
  'cumulative_reach',
  'domain_reach',
] as const;

export type Tone = (typeof TONES)[number];
export type Source = (typeof SOURCES)[number];
export type Folder = (typeof FOLDERS)[number];
export type Sort = (typeof SORTS)[number];

export type Vocabulary = readonly [string, ...string[]];

/**
 * Where a normalized value ends up in the HTTP request.
 */
export type FieldLocation = 'path' | 'query' | 'body';

export type Normalizer =
  /** Strings and numbers, sent as strings */
  | { kind: 'identity' }
  /** `true`/`false`, sent as the tokens "true"/"false" */
  | { kind: 'boolean' }
  /** `yyyy-MM-dd HH:mm`, sent as an ISO-8601 timestamp with offset */
  | { kind: 'date' }
  | { kind: 'enum'; values: Vocabulary }
  /** Integer clamped into [1, 1000]; below 1 is dropped */
  | { kind: 'limit' }
  | { kind: 'list'; values?: Vocabulary }
  /** Structured JSON object, e.g. an alert query */
  | { kind: 'document' };

export interface FieldSpec {
  readonly name: string;
  readonly location: FieldLocation;
  readonly normalizer: Normalizer;
  readonly required?: boolean;
  /** Raw value used when the caller leaves the field out */
  readonly default?: string | number;
}

type FieldOptions = Pick<FieldSpec, 'required' | 'default'>;

export function pathField(name: string): FieldSpec {
  return { name, location: 'path', normalizer: { kind: 'identity' }, required: true };
}

export function queryField(name: string, normalizer: Normalizer, options: FieldOptions = {}): FieldSpec {
  return { name, location: 'query', normalizer, ...options };
}

export function bodyField(name: string, normalizer: Normalizer, options: FieldOptions = {}): FieldSpec {
  return { name, location: 'body', normalizer, ...options };
}

const identity: Normalizer = { kind: 'identity' };
const boolean: Normalizer = { kind: 'boolean' };
const date: Normalizer = { kind: 'date' };
const limit: Normalizer = { kind: 'limit' };
const stringList: Normalizer = { kind: 'list' };

export const MENTION_LIST_FIELDS: readonly FieldSpec[] = [
  queryField('limit', limit, { default: 20 }),
  queryField('since_id', identity),
  queryField('before_date', date),
  queryField('not_before_date', date),
  queryField('cursor', identity),
  queryField('unread', boolean),
  queryField('favorite', boolean),
  queryField('folder', { kind: 'enum', values: FOLDERS }),
  queryField('q', identity),
  queryField('tone', { kind: 'enum', values: TONES }),
  queryField('source', { kind: 'enum', values: SOURCES }),
  queryField('countries', identity),
  queryField('include_children', boolean),
  queryField('sort', { kind: 'enum', values: SORTS }),
  queryField('languages', identity),
  queryField('timezone', identity),
];

export const MENTION_CHILDREN_FIELDS: readonly FieldSpec[] = [
  queryField('limit', limit),
  queryField('before_date', date),
];

export const ALERT_DEFINITION_FIELDS: readonly FieldSpec[] = [
  bodyField('name', identity, { required: true }),
  bodyField('query', { kind: 'document' }, { required: true }),
  bodyField('languages', stringList, { required: true }),
  bodyField('countries', stringList),
  bodyField('sources', { kind: 'list', values: SOURCES }),
  bodyField('blocked_sites', stringList),
  bodyField('noise_detection', boolean),
  bodyField('reviews_pages', stringList),
];

export const CURATION_FIELDS: readonly FieldSpec[] = [
  bodyField('favorite', boolean),
  bodyField('trashed', boolean),
  bodyField('read', boolean),
  bodyField('tags', stringList),
  bodyField('folder', { kind: 'enum', values: FOLDERS }),
  bodyField('tone', { kind: 'enum', values: TONES }),
];
