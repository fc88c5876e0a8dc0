import type { ExclusionRule } from '../request/exclusivity.ts';
import type { Verb } from '../utils.ts';

import {
  ALERT_DEFINITION_FIELDS,
  CURATION_FIELDS,
  MENTION_CHILDREN_FIELDS,
  MENTION_LIST_FIELDS,
} from './fields.ts';
import type { FieldSpec } from './fields.ts';

export const OPERATION_KINDS = [
  'app-data',
  'fetch-alerts',
  'fetch-alert',
  'create-alert',
  'update-alert',
  'fetch-mention',
  'fetch-mentions',
  'fetch-mention-children',
  'curate-mention',
  'mark-all-mentions-read',
] as const;

export type OperationKind = (typeof OPERATION_KINDS)[number];

export function isOperationKind(value: string): value is OperationKind {
  return OPERATION_KINDS.some((kind) => kind === value);
}

/**
 * One row of the operation table. Path fields are not listed: every
 * `{placeholder}` in `path` is a required path field.
 */
export interface OperationSpec {
  readonly kind: OperationKind;
  readonly method: Verb;
  readonly path: string;
  readonly summary: string;
  readonly fields: readonly FieldSpec[];
  readonly exclusions: readonly ExclusionRule[];
}

const ALERT = '/accounts/{account_id}/alerts/{alert_id}';
const MENTIONS = `${ALERT}/mentions`;

const MENTION_LIST_EXCLUSIONS: readonly ExclusionRule[] = [
  { kind: 'supersedes', field: 'since_id', drops: ['before_date', 'not_before_date', 'cursor'] },
  { kind: 'supersedes', field: 'unread', when: 'true', drops: ['favorite', 'folder', 'q', 'tone'] },
  { kind: 'requires', field: 'favorite', companion: 'folder', values: ['inbox', 'archive'] },
];

export const OPERATIONS: Readonly<Record<OperationKind, OperationSpec>> = {
  'app-data': {
    kind: 'app-data',
    method: 'get',
    path: '/app/data',
    summary: 'Retrieve details about the application',
    fields: [],
    exclusions: [],
  },
  'fetch-alerts': {
    kind: 'fetch-alerts',
    method: 'get',
    path: '/accounts/{account_id}/alerts',
    summary: 'List every alert of an account',
    fields: [],
    exclusions: [],
  },
  'fetch-alert': {
    kind: 'fetch-alert',
    method: 'get',
    path: ALERT,
    summary: 'Retrieve a single alert',
    fields: [],
    exclusions: [],
  },
  'create-alert': {
    kind: 'create-alert',
    method: 'post',
    path: '/accounts/{account_id}/alerts',
    summary: 'Create an alert',
    fields: ALERT_DEFINITION_FIELDS,
    exclusions: [],
  },
  'update-alert': {
    kind: 'update-alert',
    method: 'put',
    path: ALERT,
    summary: "Replace an alert's name, query and filters",
    fields: ALERT_DEFINITION_FIELDS,
    exclusions: [],
  },
  'fetch-mention': {
    kind: 'fetch-mention',
    method: 'get',
    path: `${MENTIONS}/{mention_id}`,
    summary: 'Retrieve a single mention',
    fields: [],
    exclusions: [],
  },
  'fetch-mentions': {
    kind: 'fetch-mentions',
    method: 'get',
    path: MENTIONS,
    summary: 'List the mentions of an alert, optionally filtered',
    fields: MENTION_LIST_FIELDS,
    exclusions: MENTION_LIST_EXCLUSIONS,
  },
  'fetch-mention-children': {
    kind: 'fetch-mention-children',
    method: 'get',
    path: `${MENTIONS}/{mention_id}/children`,
    summary: 'List the children of a mention',
    fields: MENTION_CHILDREN_FIELDS,
    exclusions: [],
  },
  'curate-mention': {
    kind: 'curate-mention',
    method: 'put',
    path: `${MENTIONS}/{mention_id}`,
    summary: 'Update the favorite, read, trash, folder, tag and tone state of a mention',
    fields: CURATION_FIELDS,
    exclusions: [],
  },
  'mark-all-mentions-read': {
    kind: 'mark-all-mentions-read',
    method: 'post',
    path: `${MENTIONS}/markallread`,
    summary: 'Mark every mention of an alert as read',
    fields: [],
    exclusions: [],
  },
};
