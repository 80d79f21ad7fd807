import {
  failure,
  success,
  type AttachmentFile,
  type DraftInput,
  type FetchPageRequest,
  type FetchPageResult,
  type MailFolder,
  type MailResult,
  type MessageDetail,
  type RawMessage,
  type RemoteMailbox,
} from '@termmail/shared';
import type { z } from 'zod';
import { toRemoteError } from './errors';
import type { GraphHttp } from './http';
import {
  createdSchema,
  fileAttachmentSchema,
  folderPageSchema,
  messageDetailSchema,
  messagePageSchema,
  type GraphMessage,
  type GraphRecipient,
} from './schemas';

const DETAIL_SELECT =
  'id,subject,from,toRecipients,ccRecipients,receivedDateTime,isRead,hasAttachments,body';
const ATTACHMENT_SELECT = 'id,name,size,contentType,isInline';
const PLAIN_TEXT_BODY = { Prefer: 'outlook.body-content-type="text"' };

const id = encodeURIComponent;

function address(recipient: GraphRecipient | null | undefined): string {
  return recipient?.emailAddress?.address ?? '';
}

function addresses(list: GraphRecipient[] | null | undefined): string[] {
  return (list ?? []).map(address).filter((a) => a !== '');
}

function recipients(list: string[]) {
  return list.map((a) => ({ emailAddress: { address: a } }));
}

export function toRawMessage(m: GraphMessage): RawMessage {
  const raw: RawMessage = {
    id: m.id,
    subject: m.subject ?? '',
    fromAddress: address(m.from),
    fromName: m.from?.emailAddress?.name ?? '',
    toAddress: addresses(m.toRecipients)[0] ?? '',
    receivedDateTime: m.receivedDateTime ?? '',
    isRead: m.isRead ?? false,
    hasAttachments: m.hasAttachments ?? false,
  };
  if (m.body) raw.bodyText = m.body.content ?? '';
  return raw;
}

/** RemoteMailbox over the Microsoft Graph REST API. */
export class GraphMailbox implements RemoteMailbox {
  constructor(private readonly http: GraphHttp) {}

  listFolders(): Promise<MailResult<MailFolder[]>> {
    return this.attempt(async () => {
      const folders: MailFolder[] = [];
      let next: string | undefined =
        '/mailFolders?$top=100&$select=id,displayName,totalItemCount,unreadItemCount';
      while (next) {
        const page: z.infer<typeof folderPageSchema> = await this.http.json(folderPageSchema, next);
        for (const f of page.value) {
          folders.push({
            id: f.id,
            name: f.displayName,
            totalCount: f.totalItemCount,
            unreadCount: f.unreadItemCount,
          });
        }
        next = page['@odata.nextLink'];
      }
      return folders;
    });
  }

  fetchPage(request: FetchPageRequest): Promise<MailResult<FetchPageResult>> {
    return this.attempt(async () => {
      const page = await this.http.json(messagePageSchema, this.pageUrl(request), {
        headers: request.selectFields.includes('body') ? PLAIN_TEXT_BODY : undefined,
      });
      return {
        messages: page.value.map(toRawMessage),
        nextToken: page['@odata.nextLink'],
      };
    });
  }

  /** Next links page with `$skip`; pull it back by the messages that left. */
  rebaseContinuation(token: string, removedCount: number): string {
    const url = new URL(token);
    const skip = url.searchParams.get('$skip');
    if (skip === null) return token;
    url.searchParams.set('$skip', String(Math.max(0, Number(skip) - removedCount)));
    return url.toString();
  }

  getMessage(messageId: string): Promise<MailResult<MessageDetail>> {
    return this.attempt(async () => {
      const m = await this.http.json(
        messageDetailSchema,
        `/messages/${id(messageId)}?$select=${DETAIL_SELECT}&$expand=attachments($select=${ATTACHMENT_SELECT})`
      );
      return {
        id: m.id,
        subject: m.subject ?? '',
        fromAddress: address(m.from),
        fromName: m.from?.emailAddress?.name ?? '',
        toRecipients: addresses(m.toRecipients),
        ccRecipients: addresses(m.ccRecipients),
        dateTime: m.receivedDateTime ?? '',
        isRead: m.isRead ?? false,
        hasAttachments: m.hasAttachments ?? false,
        bodyType: m.body?.contentType.toLowerCase() === 'html' ? 'html' : 'text',
        body: m.body?.content ?? '',
        attachments: (m.attachments ?? []).map((a) => ({
          id: a.id,
          filename: a.name ?? 'attachment',
          size: a.size,
          mimeType: a.contentType ?? 'application/octet-stream',
          isInline: a.isInline,
        })),
      };
    });
  }

  markRead(messageId: string, isRead: boolean): Promise<MailResult<void>> {
    return this.attempt(() =>
      this.http.call(`/messages/${id(messageId)}`, { method: 'PATCH', body: { isRead } })
    );
  }

  moveMessage(messageId: string, destinationFolderId: string): Promise<MailResult<void>> {
    return this.attempt(() =>
      this.http.call(`/messages/${id(messageId)}/move`, {
        method: 'POST',
        body: { destinationId: destinationFolderId },
      })
    );
  }

  deleteMessage(messageId: string): Promise<MailResult<void>> {
    return this.attempt(() =>
      this.http.call(`/messages/${id(messageId)}/permanentDelete`, { method: 'POST' })
    );
  }

  getAttachment(messageId: string, attachmentId: string): Promise<MailResult<AttachmentFile>> {
    return this.attempt(async () => {
      const a = await this.http.json(
        fileAttachmentSchema,
        `/messages/${id(messageId)}/attachments/${id(attachmentId)}`
      );
      return {
        filename: a.name ?? 'attachment',
        mimeType: a.contentType ?? 'application/octet-stream',
        content: Buffer.from(a.contentBytes, 'base64'),
      };
    });
  }

  createDraft(draft: DraftInput): Promise<MailResult<{ id: string }>> {
    return this.attempt(async () => {
      const created = await this.http.json(createdSchema, '/messages', {
        method: 'POST',
        body: {
          subject: draft.subject,
          body: { contentType: 'HTML', content: draft.bodyHtml },
          toRecipients: recipients(draft.to),
          ccRecipients: recipients(draft.cc),
        },
      });
      return { id: created.id };
    });
  }

  addAttachment(draftId: string, file: AttachmentFile): Promise<MailResult<void>> {
    return this.attempt(() =>
      this.http.call(`/messages/${id(draftId)}/attachments`, {
        method: 'POST',
        body: {
          '@odata.type': '#microsoft.graph.fileAttachment',
          name: file.filename,
          contentType: file.mimeType,
          contentBytes: file.content.toString('base64'),
        },
      })
    );
  }

  sendDraft(draftId: string): Promise<MailResult<void>> {
    return this.attempt(() => this.http.call(`/messages/${id(draftId)}/send`, { method: 'POST' }));
  }

  private pageUrl(request: FetchPageRequest): string {
    if (request.continuationToken) {
      // Next links carry the original $top; the caller may want fewer.
      const url = new URL(request.continuationToken);
      url.searchParams.set('$top', String(request.top));
      return url.toString();
    }
    const params = new URLSearchParams({
      $select: request.selectFields.join(','),
      $orderby: request.orderBy,
      $top: String(request.top),
    });
    return `/mailFolders/${id(request.folderId)}/messages?${params.toString()}`;
  }

  private async attempt<T>(fn: () => Promise<T>): Promise<MailResult<T>> {
    try {
      return success(await fn());
    } catch (err) {
      return failure(toRemoteError(err));
    }
  }
}
