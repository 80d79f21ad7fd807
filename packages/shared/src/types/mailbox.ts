import type {
  AttachmentFile,
  DraftInput,
  MailFolder,
  MessageDetail,
} from './email';

export type RemoteErrorKind =
  | 'network'
  | 'timeout'
  | 'auth'
  | 'throttled'
  | 'not-found'
  | 'server'
  | 'decode';

export interface RemoteError {
  kind: RemoteErrorKind;
  message: string;
  status?: number;
}

/** Outcome of a remote call. Remote failures are values, never exceptions. */
export type MailResult<T> =
  | { ok: true; value: T }
  | { ok: false; error: RemoteError };

export function success<T>(value: T): MailResult<T> {
  return { ok: true, value };
}

export function failure<T = never>(error: RemoteError): MailResult<T> {
  return { ok: false, error };
}

/** A message as listed by the remote, already decoded and normalized. */
export interface RawMessage {
  id: string;
  subject: string;
  fromAddress: string;
  fromName: string;
  /** First recipient, empty when there is none */
  toAddress: string;
  receivedDateTime: string;
  isRead: boolean;
  hasAttachments: boolean;
  /** Body as plain text; only present when `body` was selected */
  bodyText?: string;
}

export type SelectField =
  | 'id'
  | 'subject'
  | 'from'
  | 'toRecipients'
  | 'receivedDateTime'
  | 'isRead'
  | 'hasAttachments'
  | 'body';

export interface FetchPageRequest {
  folderId: string;
  selectFields: readonly SelectField[];
  orderBy: string;
  top: number;
  continuationToken?: string;
}

export interface FetchPageResult {
  messages: RawMessage[];
  /** Absent when the remote has nothing further */
  nextToken?: string;
}

/**
 * Remote mailbox access. Implemented by GraphMailbox (REST) and
 * MemoryMailbox (in-process).
 */
export interface RemoteMailbox {
  listFolders(): Promise<MailResult<MailFolder[]>>;

  fetchPage(request: FetchPageRequest): Promise<MailResult<FetchPageResult>>;

  /**
   * Continuation token still pointing at the same next message after
   * `removedCount` already-listed messages left the folder.
   */
  rebaseContinuation(token: string, removedCount: number): string;

  getMessage(id: string): Promise<MailResult<MessageDetail>>;

  markRead(id: string, isRead: boolean): Promise<MailResult<void>>;

  moveMessage(id: string, destinationFolderId: string): Promise<MailResult<void>>;

  /** Permanent deletion, bypassing Deleted Items */
  deleteMessage(id: string): Promise<MailResult<void>>;

  getAttachment(
    messageId: string,
    attachmentId: string
  ): Promise<MailResult<AttachmentFile>>;

  createDraft(draft: DraftInput): Promise<MailResult<{ id: string }>>;

  addAttachment(draftId: string, file: AttachmentFile): Promise<MailResult<void>>;

  sendDraft(draftId: string): Promise<MailResult<void>>;
}
