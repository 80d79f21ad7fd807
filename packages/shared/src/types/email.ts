/** Folders every Graph mailbox has, addressable by their well-known name. */
export type WellKnownFolder =
  | 'inbox'
  | 'drafts'
  | 'sentitems'
  | 'deleteditems'
  | 'junkemail';

/** A folder of the remote mailbox. */
export interface MailFolder {
  id: string;
  name: string;
  totalCount: number;
  unreadCount: number;
}

/** The folder a session is currently viewing. */
export interface FolderRef {
  /** Graph folder id or well-known name */
  id: string;
  /** Display name */
  name: string;
  wellKnown?: WellKnownFolder;
}

export type SignatureStatus =
  | 'unsigned'
  | 'signed-trusted'
  | 'signed-untrusted'
  | 'signed-invalid';

/** Compact message summary used in list views. */
export interface MessageSummary {
  id: string;
  /** 1-based position in the current listing */
  index: number;
  subject: string;
  fromAddress: string;
  fromName: string;
  toAddress: string;
  dateTime: string; // ISO 8601, UTC
  isRead: boolean;
  hasAttachments: boolean;
  signatureStatus: SignatureStatus;
}

/** Full message returned when the user reads one. */
export interface MessageDetail {
  id: string;
  subject: string;
  fromAddress: string;
  fromName: string;
  toRecipients: string[];
  ccRecipients: string[];
  dateTime: string;
  isRead: boolean;
  hasAttachments: boolean;
  bodyType: 'text' | 'html';
  body: string;
  attachments: AttachmentInfo[];
}

/** Attachment metadata (no binary content). */
export interface AttachmentInfo {
  id: string;
  filename: string;
  size: number;
  mimeType: string;
  isInline: boolean;
}

/** Attachment with its content, as downloaded or about to be uploaded. */
export interface AttachmentFile {
  filename: string;
  mimeType: string;
  content: Buffer;
}

/** Outgoing message saved to the Drafts folder. */
export interface DraftInput {
  to: string[];
  cc: string[];
  subject: string;
  bodyHtml: string;
}
