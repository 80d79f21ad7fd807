import { describe, it, expect } from 'vitest';
import { AuthError } from './errors';
import { GraphMailbox } from './graph-mailbox';
import { GraphHttp, type FetchFn } from './http';
import { jsonResponse, stubFetch } from './testing/stub-fetch';

const BASE = 'https://graph.microsoft.com/v1.0/me';
const NEXT = `${BASE}/mailFolders/inbox/messages?$top=20&$skip=20`;

function mailbox(fetchFn: FetchFn, sleeps: number[] = []) {
  const http = new GraphHttp(
    { getAccessToken: async () => 'test-token' },
    {
      fetchFn,
      retry: {
        sleep: async (ms) => {
          sleeps.push(ms);
        },
      },
    }
  );
  return new GraphMailbox(http);
}

const graphMessage = {
  id: 'a',
  subject: 'Hi',
  from: { emailAddress: { name: 'Ann', address: 'ann@example.test' } },
  toRecipients: [{ emailAddress: { address: 'me@example.test' } }],
  receivedDateTime: '2026-01-01T00:00:00Z',
  isRead: false,
  hasAttachments: true,
};

describe('GraphMailbox.fetchPage', () => {
  it('requests the first page and decodes summaries', async () => {
    const { fetchFn, calls } = stubFetch(jsonResponse({ value: [graphMessage], '@odata.nextLink': NEXT }));

    const result = await mailbox(fetchFn).fetchPage({
      folderId: 'inbox',
      selectFields: ['id', 'subject'],
      orderBy: 'receivedDateTime desc',
      top: 20,
    });

    expect(result).toEqual({
      ok: true,
      value: {
        messages: [
          {
            id: 'a',
            subject: 'Hi',
            fromAddress: 'ann@example.test',
            fromName: 'Ann',
            toAddress: 'me@example.test',
            receivedDateTime: '2026-01-01T00:00:00Z',
            isRead: false,
            hasAttachments: true,
          },
        ],
        nextToken: NEXT,
      },
    });
    const url = new URL(calls[0].url);
    expect(url.pathname).toBe('/v1.0/me/mailFolders/inbox/messages');
    expect(url.searchParams.get('$select')).toBe('id,subject');
    expect(url.searchParams.get('$orderby')).toBe('receivedDateTime desc');
    expect(url.searchParams.get('$top')).toBe('20');
    expect(calls[0].headers.get('Authorization')).toBe('Bearer test-token');
    expect(calls[0].headers.get('Prefer')).toBeNull();
  });

  it('asks for plain-text bodies when the body is selected', async () => {
    const { fetchFn, calls } = stubFetch(
      jsonResponse({ value: [{ ...graphMessage, body: { contentType: 'text', content: 'hello' } }] })
    );

    const result = await mailbox(fetchFn).fetchPage({
      folderId: 'inbox',
      selectFields: ['id', 'body'],
      orderBy: 'receivedDateTime desc',
      top: 50,
    });

    expect(result.ok && result.value.messages[0].bodyText).toBe('hello');
    expect(result.ok && result.value.nextToken).toBeUndefined();
    expect(calls[0].headers.get('Prefer')).toBe('outlook.body-content-type="text"');
  });

  it('follows a continuation token with the requested page size', async () => {
    const { fetchFn, calls } = stubFetch(jsonResponse({ value: [] }));

    await mailbox(fetchFn).fetchPage({
      folderId: 'inbox',
      selectFields: ['id'],
      orderBy: 'receivedDateTime desc',
      top: 5,
      continuationToken: NEXT,
    });

    const url = new URL(calls[0].url);
    expect(url.searchParams.get('$top')).toBe('5');
    expect(url.searchParams.get('$skip')).toBe('20');
  });

  it('maps an undecodable page to a decode error', async () => {
    const { fetchFn } = stubFetch(jsonResponse({ value: [{ subject: 'no id' }] }));

    const result = await mailbox(fetchFn).fetchPage({
      folderId: 'inbox',
      selectFields: ['id'],
      orderBy: 'receivedDateTime desc',
      top: 5,
    });

    expect(result.ok || result.error.kind).toBe('decode');
  });
});

describe('GraphMailbox.rebaseContinuation', () => {
  it('moves $skip back by the removed count', () => {
    const rebased = mailbox(stubFetch().fetchFn).rebaseContinuation(NEXT, 2);
    const url = new URL(rebased);
    expect(url.searchParams.get('$skip')).toBe('18');
    expect(url.searchParams.get('$top')).toBe('20');
  });

  it('never goes below zero', () => {
    const rebased = mailbox(stubFetch().fetchFn).rebaseContinuation(NEXT, 50);
    expect(new URL(rebased).searchParams.get('$skip')).toBe('0');
  });

  it('leaves opaque tokens alone', () => {
    const token = `${BASE}/mailFolders/inbox/messages?$skiptoken=abc`;
    expect(mailbox(stubFetch().fetchFn).rebaseContinuation(token, 3)).toBe(token);
  });
});

describe('GraphMailbox messages', () => {
  it('reads a message with its attachments', async () => {
    const { fetchFn, calls } = stubFetch(
      jsonResponse({
        ...graphMessage,
        ccRecipients: [{ emailAddress: { address: 'cc@example.test' } }, { emailAddress: null }],
        body: { contentType: 'html', content: '<p>Hi</p>' },
        attachments: [
          { id: 'att1', name: 'report.pdf', size: 2048, contentType: 'application/pdf', isInline: false },
        ],
      })
    );

    const result = await mailbox(fetchFn).getMessage('a/b');

    expect(result).toEqual({
      ok: true,
      value: {
        id: 'a',
        subject: 'Hi',
        fromAddress: 'ann@example.test',
        fromName: 'Ann',
        toRecipients: ['me@example.test'],
        ccRecipients: ['cc@example.test'],
        dateTime: '2026-01-01T00:00:00Z',
        isRead: false,
        hasAttachments: true,
        bodyType: 'html',
        body: '<p>Hi</p>',
        attachments: [
          { id: 'att1', filename: 'report.pdf', size: 2048, mimeType: 'application/pdf', isInline: false },
        ],
      },
    });
    expect(new URL(calls[0].url).pathname).toBe('/v1.0/me/messages/a%2Fb');
  });

  it('decodes attachment content from base64', async () => {
    const { fetchFn } = stubFetch(
      jsonResponse({ id: 'att1', name: 'a.txt', contentType: 'text/plain', contentBytes: 'aGVsbG8=' })
    );

    const result = await mailbox(fetchFn).getAttachment('a', 'att1');

    expect(result.ok && result.value.content.toString('utf8')).toBe('hello');
    expect(result.ok && result.value.filename).toBe('a.txt');
  });

  it('moves, marks and purges with the matching requests', async () => {
    const { fetchFn, calls } = stubFetch(jsonResponse({ id: 'moved' }), new Response(null, { status: 204 }));
    const box = mailbox(fetchFn);

    await box.moveMessage('a', 'deleteditems');
    await box.markRead('a', true);
    await box.deleteMessage('a');

    expect(calls.map((c) => [c.method, new URL(c.url).pathname, c.body])).toEqual([
      ['POST', '/v1.0/me/messages/a/move', '{"destinationId":"deleteditems"}'],
      ['PATCH', '/v1.0/me/messages/a', '{"isRead":true}'],
      ['POST', '/v1.0/me/messages/a/permanentDelete', undefined],
    ]);
  });

  it('creates, attaches to and sends a draft', async () => {
    const { fetchFn, calls } = stubFetch(
      jsonResponse({ id: 'draft1' }, 201),
      jsonResponse({ id: 'att' }, 201),
      new Response(null, { status: 202 })
    );
    const box = mailbox(fetchFn);

    const created = await box.createDraft({
      to: ['a@example.test'],
      cc: [],
      subject: 'S',
      bodyHtml: '<div>x</div>',
    });
    await box.addAttachment('draft1', {
      filename: 'n.txt',
      mimeType: 'text/plain',
      content: Buffer.from('hello'),
    });
    const sent = await box.sendDraft('draft1');

    expect(created).toEqual({ ok: true, value: { id: 'draft1' } });
    expect(sent).toEqual({ ok: true, value: undefined });
    expect(JSON.parse(calls[0].body ?? '')).toEqual({
      subject: 'S',
      body: { contentType: 'HTML', content: '<div>x</div>' },
      toRecipients: [{ emailAddress: { address: 'a@example.test' } }],
      ccRecipients: [],
    });
    expect(JSON.parse(calls[1].body ?? '')).toEqual({
      '@odata.type': '#microsoft.graph.fileAttachment',
      name: 'n.txt',
      contentType: 'text/plain',
      contentBytes: 'aGVsbG8=',
    });
    expect(new URL(calls[2].url).pathname).toBe('/v1.0/me/messages/draft1/send');
  });

  it('lists folders across pages', async () => {
    const { fetchFn } = stubFetch(
      jsonResponse({
        value: [{ id: 'f1', displayName: 'Inbox', totalItemCount: 10, unreadItemCount: 2 }],
        '@odata.nextLink': `${BASE}/mailFolders?$skip=1`,
      }),
      jsonResponse({ value: [{ id: 'f2', displayName: 'Archive' }] })
    );

    const result = await mailbox(fetchFn).listFolders();

    expect(result).toEqual({
      ok: true,
      value: [
        { id: 'f1', name: 'Inbox', totalCount: 10, unreadCount: 2 },
        { id: 'f2', name: 'Archive', totalCount: 0, unreadCount: 0 },
      ],
    });
  });
});

describe('GraphMailbox errors', () => {
  it('maps Graph errors without retrying client errors', async () => {
    const { fetchFn, calls } = stubFetch(
      jsonResponse({ error: { code: 'ErrorItemNotFound', message: 'Not found.' } }, 404)
    );

    const result = await mailbox(fetchFn).getMessage('gone');

    expect(result).toEqual({
      ok: false,
      error: { kind: 'not-found', message: 'Not found. (404 ErrorItemNotFound)', status: 404 },
    });
    expect(calls).toHaveLength(1);
  });

  it('retries server errors and succeeds', async () => {
    const sleeps: number[] = [];
    const { fetchFn, calls } = stubFetch(
      new Response('busy', { status: 503 }),
      jsonResponse({ id: 'moved' })
    );

    const result = await mailbox(fetchFn, sleeps).moveMessage('a', 'junkemail');

    expect(result.ok).toBe(true);
    expect(calls).toHaveLength(2);
    expect(sleeps).toHaveLength(1);
  });

  it('waits as long as Retry-After asks when throttled', async () => {
    const sleeps: number[] = [];
    const { fetchFn } = stubFetch(
      jsonResponse({ error: { code: 'TooManyRequests', message: 'Slow down' } }, 429, { 'Retry-After': '2' }),
      new Response(null, { status: 204 })
    );

    await mailbox(fetchFn, sleeps).markRead('a', true);

    expect(sleeps).toEqual([2000]);
  });

  it('gives up after three retries', async () => {
    const { fetchFn, calls } = stubFetch(new Response('oops', { status: 500, statusText: 'Internal Server Error' }));

    const result = await mailbox(fetchFn).deleteMessage('a');

    expect(result).toEqual({
      ok: false,
      error: { kind: 'server', message: 'Graph API error 500 Internal Server Error', status: 500 },
    });
    expect(calls).toHaveLength(4);
  });

  it('reports network failures after retrying', async () => {
    const { fetchFn, calls } = stubFetch(new TypeError('fetch failed'));

    const result = await mailbox(fetchFn).sendDraft('d');

    expect(result).toEqual({
      ok: false,
      error: { kind: 'network', message: `POST ${BASE}/messages/d/send failed: fetch failed` },
    });
    expect(calls).toHaveLength(4);
  });

  it('reports a missing sign-in as an auth error without calling Graph', async () => {
    const { fetchFn, calls } = stubFetch(jsonResponse({ value: [] }));
    const http = new GraphHttp(
      {
        getAccessToken: async () => {
          throw new AuthError('Not signed in');
        },
      },
      { fetchFn }
    );

    const result = await new GraphMailbox(http).listFolders();

    expect(result).toEqual({ ok: false, error: { kind: 'auth', message: 'Not signed in' } });
    expect(calls).toHaveLength(0);
  });
});
