import type {
  AttachmentFile,
  AttachmentInfo,
  DraftInput,
  FetchPageRequest,
  FetchPageResult,
  MailFolder,
  MailResult,
  MessageDetail,
  RawMessage,
  RemoteError,
  RemoteMailbox,
} from '@termmail/shared';

export interface MemoryAttachment extends AttachmentInfo {
  content: Buffer;
}

export interface MemoryMessage extends RawMessage {
  bodyText: string;
  toRecipients?: string[];
  ccRecipients?: string[];
  attachments?: MemoryAttachment[];
}

type MailboxMethod = keyof RemoteMailbox;

const FOLDER_NAMES: Record<string, string> = {
  inbox: 'Inbox',
  drafts: 'Drafts',
  sentitems: 'Sent Items',
  deleteditems: 'Deleted Items',
  junkemail: 'Junk Email',
};

/**
 * In-process RemoteMailbox. Folders are ordered arrays; continuation tokens
 * are offsets into them, like Graph's $skip links.
 */
export class MemoryMailbox implements RemoteMailbox {
  readonly fetchRequests: FetchPageRequest[] = [];
  readonly mutations: { method: MailboxMethod; id: string; target?: string }[] = [];
  private readonly folders = new Map<string, MemoryMessage[]>();
  private readonly failures = new Map<string, RemoteError>();
  private draftSeq = 0;

  constructor(seed: Record<string, MemoryMessage[]> = {}) {
    for (const id of Object.keys(FOLDER_NAMES)) this.folders.set(id, []);
    for (const [folderId, messages] of Object.entries(seed)) {
      this.folders.set(folderId, [...messages]);
    }
  }

  messagesIn(folderId: string): MemoryMessage[] {
    return [...(this.folders.get(folderId) ?? [])];
  }

  /** Make every call of `method` (or only those for `id`) fail. */
  failWith(method: MailboxMethod, error: Partial<RemoteError> = {}, id?: string): void {
    this.failures.set(id ? `${method}:${id}` : method, {
      kind: error.kind ?? 'server',
      message: error.message ?? `${method} failed`,
      status: error.status,
    });
  }

  clearFailures(): void {
    this.failures.clear();
  }

  async listFolders(): Promise<MailResult<MailFolder[]>> {
    const failed = this.failure('listFolders');
    if (failed) return failed;
    const folders = [...this.folders.entries()].map(([id, messages]) => ({
      id,
      name: FOLDER_NAMES[id] ?? id,
      totalCount: messages.length,
      unreadCount: messages.filter((m) => !m.isRead).length,
    }));
    return { ok: true, value: folders };
  }

  async fetchPage(request: FetchPageRequest): Promise<MailResult<FetchPageResult>> {
    this.fetchRequests.push({ ...request });
    const failed = this.failure('fetchPage');
    if (failed) return failed;

    const all = this.folders.get(request.folderId);
    if (!all) return this.notFound(`Folder ${request.folderId} not found`);

    const offset = request.continuationToken ? Number(request.continuationToken) : 0;
    const slice = all.slice(offset, offset + request.top);
    const withBody = request.selectFields.includes('body');
    const messages = slice.map((m): RawMessage => {
      const raw: RawMessage = {
        id: m.id,
        subject: m.subject,
        fromAddress: m.fromAddress,
        fromName: m.fromName,
        toAddress: m.toAddress,
        receivedDateTime: m.receivedDateTime,
        isRead: m.isRead,
        hasAttachments: m.hasAttachments,
      };
      return withBody ? { ...raw, bodyText: m.bodyText } : raw;
    });
    const next = offset + slice.length;
    return {
      ok: true,
      value: { messages, nextToken: next < all.length ? String(next) : undefined },
    };
  }

  rebaseContinuation(token: string, removedCount: number): string {
    return String(Math.max(0, Number(token) - removedCount));
  }

  async getMessage(id: string): Promise<MailResult<MessageDetail>> {
    const failed = this.failure('getMessage', id);
    if (failed) return failed;
    const found = this.find(id);
    if (!found) return this.notFound(`Message ${id} not found`);
    const m = found.message;
    return {
      ok: true,
      value: {
        id: m.id,
        subject: m.subject,
        fromAddress: m.fromAddress,
        fromName: m.fromName,
        toRecipients: m.toRecipients ?? (m.toAddress ? [m.toAddress] : []),
        ccRecipients: m.ccRecipients ?? [],
        dateTime: m.receivedDateTime,
        isRead: m.isRead,
        hasAttachments: m.hasAttachments,
        bodyType: /<[a-z][\s\S]*>/i.test(m.bodyText) ? 'html' : 'text',
        body: m.bodyText,
        attachments: (m.attachments ?? []).map(({ content: _content, ...info }) => info),
      },
    };
  }

  async markRead(id: string, isRead: boolean): Promise<MailResult<void>> {
    const failed = this.failure('markRead', id);
    if (failed) return failed;
    const found = this.find(id);
    if (!found) return this.notFound(`Message ${id} not found`);
    found.message.isRead = isRead;
    return { ok: true, value: undefined };
  }

  async moveMessage(id: string, destinationFolderId: string): Promise<MailResult<void>> {
    this.mutations.push({ method: 'moveMessage', id, target: destinationFolderId });
    const failed = this.failure('moveMessage', id);
    if (failed) return failed;
    const found = this.find(id);
    const destination = this.folders.get(destinationFolderId);
    if (!found || !destination) return this.notFound(`Cannot move ${id}`);
    found.folder.splice(found.folder.indexOf(found.message), 1);
    destination.unshift(found.message);
    return { ok: true, value: undefined };
  }

  async deleteMessage(id: string): Promise<MailResult<void>> {
    this.mutations.push({ method: 'deleteMessage', id });
    const failed = this.failure('deleteMessage', id);
    if (failed) return failed;
    const found = this.find(id);
    if (!found) return this.notFound(`Message ${id} not found`);
    found.folder.splice(found.folder.indexOf(found.message), 1);
    return { ok: true, value: undefined };
  }

  async getAttachment(
    messageId: string,
    attachmentId: string
  ): Promise<MailResult<AttachmentFile>> {
    const failed = this.failure('getAttachment', attachmentId);
    if (failed) return failed;
    const attachment = this.find(messageId)?.message.attachments?.find(
      (a) => a.id === attachmentId
    );
    if (!attachment) return this.notFound(`Attachment ${attachmentId} not found`);
    return {
      ok: true,
      value: {
        filename: attachment.filename,
        mimeType: attachment.mimeType,
        content: attachment.content,
      },
    };
  }

  async createDraft(draft: DraftInput): Promise<MailResult<{ id: string }>> {
    const failed = this.failure('createDraft');
    if (failed) return failed;
    const id = `draft-${++this.draftSeq}`;
    this.folders.get('drafts')?.unshift({
      id,
      subject: draft.subject,
      fromAddress: 'me@example.test',
      fromName: 'Me',
      toAddress: draft.to[0] ?? '',
      toRecipients: draft.to,
      ccRecipients: draft.cc,
      receivedDateTime: new Date().toISOString(),
      isRead: true,
      hasAttachments: false,
      bodyText: draft.bodyHtml,
      attachments: [],
    });
    return { ok: true, value: { id } };
  }

  async addAttachment(draftId: string, file: AttachmentFile): Promise<MailResult<void>> {
    const failed = this.failure('addAttachment', draftId);
    if (failed) return failed;
    const draft = this.find(draftId)?.message;
    if (!draft) return this.notFound(`Draft ${draftId} not found`);
    const attachments = draft.attachments ?? [];
    attachments.push({
      id: `${draftId}-att-${attachments.length + 1}`,
      filename: file.filename,
      mimeType: file.mimeType,
      size: file.content.length,
      isInline: false,
      content: file.content,
    });
    draft.attachments = attachments;
    draft.hasAttachments = true;
    return { ok: true, value: undefined };
  }

  async sendDraft(draftId: string): Promise<MailResult<void>> {
    const failed = this.failure('sendDraft', draftId);
    if (failed) return failed;
    return this.moveMessage(draftId, 'sentitems');
  }

  private find(id: string): { folder: MemoryMessage[]; message: MemoryMessage } | undefined {
    for (const folder of this.folders.values()) {
      const message = folder.find((m) => m.id === id);
      if (message) return { folder, message };
    }
    return undefined;
  }

  private failure(method: MailboxMethod, id?: string): MailResult<never> | undefined {
    const error =
      (id !== undefined ? this.failures.get(`${method}:${id}`) : undefined) ??
      this.failures.get(method);
    return error ? { ok: false, error } : undefined;
  }

  private notFound(message: string): MailResult<never> {
    return { ok: false, error: { kind: 'not-found', message, status: 404 } };
  }
}

/** Messages m1..mN, newest first, with bodies mentioning their number. */
export function makeMessages(
  count: number,
  overrides: (i: number) => Partial<MemoryMessage> = () => ({})
): MemoryMessage[] {
  return Array.from({ length: count }, (_, k) => {
    const i = k + 1;
    return {
      id: `m${i}`,
      subject: `Subject ${i}`,
      fromAddress: `sender${i}@example.test`,
      fromName: `Sender ${i}`,
      toAddress: 'me@example.test',
      receivedDateTime: new Date(Date.UTC(2026, 0, 31, 12, 0) - i * 60_000).toISOString(),
      isRead: false,
      hasAttachments: false,
      bodyText: `Body of message ${i}`,
      ...overrides(i),
    };
  });
}
