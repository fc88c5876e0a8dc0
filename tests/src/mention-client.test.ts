import { MentionClient, TransportError, ValidationError, build } from '@mention-client/core';
import { TEST_TOKEN, fakeTransport, sentRequest, testApp } from '@mention-client/core/test';
import { describe, it, expect } from 'vitest';

describe('MentionClient against an in-process API', () => {
  it('pages through mentions with since_id', async () => {
    const { app, test } = testApp();
    const transport = fakeTransport({ mentions: [{ id: '43' }], _links: { more: null } });
    const client = MentionClient.fromEnvironment(app, { transport }, {
      MENTION_ACCESS_TOKEN: TEST_TOKEN,
      MENTION_BASE_URL: 'https://api.example.com/api/',
    });

    const page = await client.fetchMentions({
      account_id: 'acc 1',
      alert_id: 'alert-9',
      since_id: '42',
      before_date: '2018-11-25 12:00',
      not_before_date: '2018-11-01 00:00',
      limit: '100',
      sort: 'published_at',
    });

    expect(page).toEqual({ mentions: [{ id: '43' }], _links: { more: null } });
    await expect(sentRequest(transport)).toMatchRequest({
      url: 'https://api.example.com/api/accounts/acc%201/alerts/alert-9/mentions',
      query: { limit: '100', since_id: '42', sort: 'published_at' },
      method: 'GET',
    });
    expect(test).toHaveLogged((l) => {
      l.debug('Dropped before_date: excluded by since_id');
      l.debug('Dropped not_before_date: excluded by since_id');
      l.info('Response from GET /accounts/acc%201/alerts/alert-9/mentions:', '200');
    });
  });

  it('keeps the date range without since_id', () => {
    const request = build(
      'fetch-mentions',
      {
        account_id: 'A',
        alert_id: 'B',
        before_date: '2018-11-25 12:00',
        not_before_date: '2018-11-01 00:00',
        cursor: 'next-page',
      },
      { utcOffset: '-05:00' },
    );

    expect(request.query).toEqual([
      ['limit', '20'],
      ['before_date', '2018-11-25T12:00:00.000-05:00'],
      ['not_before_date', '2018-11-01T00:00:00.000-05:00'],
      ['cursor', 'next-page'],
    ]);
  });

  it('surfaces validation and transport failures as distinct errors', async () => {
    const { app } = testApp();
    const transport = fakeTransport('rate limited', { status: 429, statusText: 'Too Many Requests' });
    const client = new MentionClient(app, { accessToken: TEST_TOKEN, transport });

    await expect(
      client.execute('curate-mention', { account_id: 'A', alert_id: 'B', mention_id: 'C', tone: 'angry' }),
    ).rejects.toBeInstanceOf(ValidationError);
    expect(transport).not.toHaveBeenCalled();

    await expect(
      client.curateMention({ account_id: 'A', alert_id: 'B', mention_id: 'C', tone: 'negative' }),
    ).rejects.toMatchObject({ status: 429, body: 'rate limited' });
    await expect(client.appData()).rejects.toBeInstanceOf(TransportError);
  });
});
