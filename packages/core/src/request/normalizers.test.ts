import { describe, it, expect } from 'vitest';

import { ValidationError } from '../errors.ts';
import {
  ALERT_DEFINITION_FIELDS,
  CURATION_FIELDS,
  MENTION_LIST_FIELDS,
  pathField,
} from '../operation/fields.ts';

import { clampLimit, formatDate, isUtcOffset, normalizeFields } from './normalizers.ts';
import type { ArgumentBag } from './request-utils.ts';

const UTC = { utcOffset: '+00:00' };

function issuesOf(fn: () => unknown): { field: string; message: string }[] {
  try {
    fn();
  } catch (error) {
    if (error instanceof ValidationError) return [...error.issues];
    throw error;
  }
  throw new Error('expected a ValidationError');
}

describe('formatDate', () => {
  it('reformats a wall-clock date as an ISO-8601 timestamp', () => {
    expect(formatDate('2018-11-25 12:00')).toBe('2018-11-25T12:00:00.000+00:00');
  });

  it('appends the configured offset', () => {
    expect(formatDate('2018-11-25 12:00', '+02:00')).toBe('2018-11-25T12:00:00.000+02:00');
    expect(formatDate('2020-02-29 23:59', '-05:30')).toBe('2020-02-29T23:59:00.000-05:30');
  });

  it('rejects input in another format', () => {
    expect(formatDate('2018-11-25')).toBeUndefined();
    expect(formatDate('2018-11-25T12:00')).toBeUndefined();
    expect(formatDate('25/11/2018 12:00')).toBeUndefined();
  });

  it('rejects impossible dates and times', () => {
    expect(formatDate('2018-02-30 12:00')).toBeUndefined();
    expect(formatDate('2019-02-29 12:00')).toBeUndefined();
    expect(formatDate('2018-11-25 24:00')).toBeUndefined();
    expect(formatDate('2018-11-25 12:60')).toBeUndefined();
    expect(formatDate('2018-13-01 00:00')).toBeUndefined();
  });

  it('rejects a malformed offset', () => {
    expect(formatDate('2018-11-25 12:00', '+2:00')).toBeUndefined();
  });
});

describe('isUtcOffset', () => {
  it('accepts signed hours and minutes', () => {
    expect(isUtcOffset('+00:00')).toBe(true);
    expect(isUtcOffset('-11:30')).toBe(true);
    expect(isUtcOffset('+23:59')).toBe(true);
  });

  it('rejects anything else', () => {
    expect(isUtcOffset('00:00')).toBe(false);
    expect(isUtcOffset('+24:00')).toBe(false);
    expect(isUtcOffset('Z')).toBe(false);
  });
});

describe('clampLimit', () => {
  it('caps limits above 1000', () => {
    expect(clampLimit(5000)).toBe('1000');
    expect(clampLimit(1001)).toBe('1000');
  });

  it('drops limits below 1', () => {
    expect(clampLimit(0)).toBeUndefined();
    expect(clampLimit(-3)).toBeUndefined();
  });

  it('passes limits in range through', () => {
    expect(clampLimit(1)).toBe('1');
    expect(clampLimit(20)).toBe('20');
    expect(clampLimit(1000)).toBe('1000');
  });
});

describe('normalizeFields', () => {
  const list = (args: ArgumentBag): [string, unknown][] => [
    ...normalizeFields(MENTION_LIST_FIELDS, args, UTC),
  ];

  it('fills in the default limit', () => {
    expect(list({})).toEqual([['limit', '20']]);
  });

  it('keeps table order regardless of argument order', () => {
    expect(list({ tone: 'positive', q: 'coffee', limit: '50' })).toEqual([
      ['limit', '50'],
      ['q', 'coffee'],
      ['tone', 'positive'],
    ]);
  });

  it('renders booleans as tokens, including an explicit false', () => {
    expect(list({ unread: true, include_children: 'false', favorite: false })).toEqual([
      ['limit', '20'],
      ['unread', 'true'],
      ['favorite', 'false'],
      ['include_children', 'false'],
    ]);
  });

  it('formats dates in the configured offset', () => {
    const params = normalizeFields(
      MENTION_LIST_FIELDS,
      { before_date: '2018-11-25 12:00' },
      { utcOffset: '+01:00' },
    );
    expect(params.get('before_date')).toBe('2018-11-25T12:00:00.000+01:00');
  });

  it('drops absent values and a limit below 1', () => {
    expect(list({ limit: 0, q: '', cursor: null, since_id: undefined })).toEqual([]);
  });

  it('appends unrecognized fields in caller order, skipping empty ones', () => {
    expect(list({ zeta: 'z', empty: '', alpha: ['a', 'b'], nothing: null, limit: 5 })).toEqual([
      ['limit', '5'],
      ['zeta', 'z'],
      ['alpha', ['a', 'b']],
    ]);
  });

  it('clamps infinite limits like any other', () => {
    expect(list({ limit: Infinity })).toEqual([['limit', '1000']]);
    expect(list({ limit: -Infinity })).toEqual([]);
  });

  it('drops empty extra lists and documents', () => {
    expect(list({ tags: [], meta: {}, labels: ['a'] })).toEqual([
      ['limit', '20'],
      ['labels', ['a']],
    ]);
  });

  it('stores copies of extra fields', () => {
    const labels = ['a'];
    const params = normalizeFields(MENTION_LIST_FIELDS, { labels }, UTC);
    labels.push('b');

    expect(params.get('labels')).toEqual(['a']);
  });

  it('rejects an unknown tone', () => {
    expect(issuesOf(() => list({ tone: 'happy' }))).toEqual([
      {
        field: 'tone',
        message: "Invalid enum value. Expected 'negative' | 'neutral' | 'positive', received 'happy'",
      },
    ]);
  });

  it('rejects a malformed date', () => {
    expect(issuesOf(() => list({ before_date: '2018-11-25' }))).toEqual([
      { field: 'before_date', message: "Expected a date in 'yyyy-MM-dd HH:mm' format, received '2018-11-25'" },
    ]);
  });

  it('rejects a non-integer limit', () => {
    expect(issuesOf(() => list({ limit: 2.5 })).map((issue) => issue.field)).toEqual(['limit']);
    expect(issuesOf(() => list({ limit: 'ten' })).map((issue) => issue.field)).toEqual(['limit']);
  });

  it('rejects a boolean that is not a token', () => {
    expect(issuesOf(() => list({ unread: 'yes' }))).toEqual([
      { field: 'unread', message: 'Expected a boolean or "true"/"false"' },
    ]);
  });

  it('collects every failing field of one call', () => {
    const fields = [pathField('account_id'), ...MENTION_LIST_FIELDS];
    expect(
      issuesOf(() => normalizeFields(fields, { sort: 'oldest', tone: 'happy', q: true }, UTC)).map(
        (issue) => issue.field,
      ),
    ).toEqual(['account_id', 'q', 'tone', 'sort']);
  });

  it('requires path fields', () => {
    expect(issuesOf(() => normalizeFields([pathField('alert_id')], { alert_id: '' }, UTC))).toEqual([
      { field: 'alert_id', message: 'Required' },
    ]);
  });

  describe('alert definitions', () => {
    const definition = {
      name: 'Coffee',
      query: { type: 'basic', included_keywords: ['coffee'] },
      languages: ['en'],
    };

    it('passes documents and lists through', () => {
      expect([
        ...normalizeFields(ALERT_DEFINITION_FIELDS, { ...definition, sources: ['web', 'news'] }, UTC),
      ]).toEqual([
        ['name', 'Coffee'],
        ['query', { type: 'basic', included_keywords: ['coffee'] }],
        ['languages', ['en']],
        ['sources', ['web', 'news']],
      ]);
    });

    it('treats an empty query or language list as missing', () => {
      expect(
        issuesOf(() => normalizeFields(ALERT_DEFINITION_FIELDS, { ...definition, query: {}, languages: [] }, UTC)),
      ).toEqual([
        { field: 'query', message: 'Required' },
        { field: 'languages', message: 'Required' },
      ]);
    });

    it('validates sources element-wise', () => {
      expect(
        issuesOf(() =>
          normalizeFields(ALERT_DEFINITION_FIELDS, { ...definition, sources: ['web', 'radio'] }, UTC),
        ).map((issue) => issue.field),
      ).toEqual(['sources']);
    });
  });

  it('treats curation flags as booleans', () => {
    expect([...normalizeFields(CURATION_FIELDS, { read: true, trashed: 'false' }, UTC)]).toEqual([
      ['trashed', 'false'],
      ['read', 'true'],
    ]);
  });
});
