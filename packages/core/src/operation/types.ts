import type { ArgumentBag, JsonValue } from '../request/request-utils.ts';

import type { OperationKind } from './catalog.ts';
import type { Folder, Sort, Source, Tone } from './fields.ts';

/**
 * `true`/`false` or their string tokens
 */
export type BooleanInput = boolean | 'true' | 'false';

/**
 * A limit as a number or a numeric string; clamped into [1, 1000]
 */
export type LimitInput = number | string;

/**
 * A wall-clock date in `yyyy-MM-dd HH:mm` format, e.g. `2018-11-25 12:00`
 */
export type DateInput = string;

/**
 * Any argument not listed is passed through to the API untouched.
 */
export interface AccountArgs {
  [extra: string]: JsonValue;
  account_id: string;
}

export interface AlertArgs extends AccountArgs {
  alert_id: string;
}

export interface MentionArgs extends AlertArgs {
  mention_id: string;
}

export type BasicAlertQuery = {
  type: 'basic';
  included_keywords: string[];
  required_keywords?: string[];
  excluded_keywords?: string[];
  monitored_website?: { domain: string; block_self: boolean };
};

export type AdvancedAlertQuery = {
  type: 'advanced';
  query_string: string;
};

export type AlertQuery = BasicAlertQuery | AdvancedAlertQuery;

export interface AlertDefinition {
  [extra: string]: JsonValue;
  name: string;
  query: AlertQuery;
  /** Language codes, e.g. `['en']` */
  languages: string[];
  /** Country codes, e.g. `['US', 'RU', 'XX']` */
  countries?: string[];
  sources?: Source[];
  blocked_sites?: string[];
  noise_detection?: BooleanInput;
  reviews_pages?: string[];
}

export type CreateAlertArgs = AccountArgs & AlertDefinition;
export type UpdateAlertArgs = AlertArgs & AlertDefinition;

export interface FetchMentionsArgs extends AlertArgs {
  limit?: LimitInput;
  /** Cannot be combined with before_date, not_before_date or cursor */
  since_id?: string;
  before_date?: DateInput;
  not_before_date?: DateInput;
  cursor?: string;
  /** When true, favorite, folder, q and tone are ignored */
  unread?: BooleanInput;
  /** Only honoured together with folder `inbox` or `archive` */
  favorite?: BooleanInput;
  folder?: Folder;
  q?: string;
  tone?: Tone;
  source?: Source;
  countries?: string;
  include_children?: BooleanInput;
  sort?: Sort;
  languages?: string;
  timezone?: string;
}

export interface FetchMentionChildrenArgs extends MentionArgs {
  limit?: LimitInput;
  before_date?: DateInput;
}

export interface CurateMentionArgs extends MentionArgs {
  favorite?: BooleanInput;
  trashed?: BooleanInput;
  read?: BooleanInput;
  tags?: string[];
  folder?: Folder;
  tone?: Tone;
}

/**
 * Argument type of every operation kind
 */
export interface OperationArgs {
  'app-data': ArgumentBag;
  'fetch-alerts': AccountArgs;
  'fetch-alert': AlertArgs;
  'create-alert': CreateAlertArgs;
  'update-alert': UpdateAlertArgs;
  'fetch-mention': MentionArgs;
  'fetch-mentions': FetchMentionsArgs;
  'fetch-mention-children': FetchMentionChildrenArgs;
  'curate-mention': CurateMentionArgs;
  'mark-all-mentions-read': AlertArgs;
}

export type ArgsOf<K extends OperationKind> = OperationArgs[K];
