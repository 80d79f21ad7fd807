import chalk from 'chalk';
import {
  fitColumn,
  formatDate,
  formatDateTime,
  formatFileSize,
  truncate,
  type AttachmentInfo,
  type FolderRef,
  type MailFolder,
  type MessageDetail,
  type MessageSummary,
  type SignatureStatus,
} from '@termmail/shared';
import { htmlToText, type BulkOutcome, type SearchReport } from '@termmail/mail-core';

const SIGNATURE_MARK: Record<SignatureStatus, string> = {
  unsigned: ' ',
  'signed-trusted': 'S',
  'signed-untrusted': '?',
  'signed-invalid': '!',
};

const DATE_WIDTH = 12;
const MAX_SENDER_WIDTH = 24;

/**
 * One list line: index, unread/attachment/signature markers, date, sender
 * and subject, fitted to `width`.
 */
export function renderRow(message: MessageSummary, width: number, now: Date = new Date()): string {
  const markers = `${message.isRead ? ' ' : '*'}${message.hasAttachments ? '@' : ' '}${SIGNATURE_MARK[message.signatureStatus]}`;
  const prefix = `${String(message.index).padStart(4)} ${markers} ${fitColumn(formatDate(message.dateTime, now), DATE_WIDTH)} `;
  const remaining = Math.max(20, width - prefix.length);
  const senderWidth = Math.min(MAX_SENDER_WIDTH, Math.floor(remaining * 0.35));
  const sender = fitColumn(message.fromName || message.fromAddress, senderWidth);
  const subject = truncate(message.subject || '(no subject)', remaining - senderWidth - 1);
  const line = `${prefix}${sender} ${subject}`;
  return message.isRead ? line : chalk.bold(line);
}

export interface StatusInfo {
  folder: FolderRef;
  filterText: string | null;
  shown: number;
  hasMore: boolean;
}

export function renderStatus({ folder, filterText, shown, hasMore }: StatusInfo): string {
  const parts = [chalk.cyan(folder.name)];
  if (filterText !== null) parts.push(`filter "${filterText}"`);
  parts.push(`${shown} shown${hasMore ? ', more available (M)' : ''}`);
  return parts.join(chalk.dim(' | '));
}

/** Explains a filtered fetch that stopped short; null when there is nothing to say. */
export function renderSearchReport(report: SearchReport | undefined, found: number): string | null {
  if (!report) return null;
  if (report.stopReason === 'ceiling-reached') {
    return chalk.yellow(
      `Searched ${report.searched} messages and found ${found}; M searches further.`
    );
  }
  if (report.stopReason === 'exhausted' && found === 0) {
    return chalk.yellow('No messages match the filter.');
  }
  return null;
}

export function renderMessage(message: MessageDetail): string[] {
  const body = message.bodyType === 'html' ? htmlToText(message.body) : message.body.trimEnd();
  const lines = [
    `${chalk.bold('From:')}    ${message.fromName ? `${message.fromName} <${message.fromAddress}>` : message.fromAddress}`,
    `${chalk.bold('To:')}      ${message.toRecipients.join(', ')}`,
  ];
  if (message.ccRecipients.length > 0) {
    lines.push(`${chalk.bold('Cc:')}      ${message.ccRecipients.join(', ')}`);
  }
  lines.push(
    `${chalk.bold('Date:')}    ${formatDateTime(message.dateTime)}`,
    `${chalk.bold('Subject:')} ${message.subject}`
  );
  if (message.attachments.length > 0) {
    lines.push(`${chalk.bold('Attached:')} ${message.attachments.length} file(s), A lists them`);
  }
  lines.push('', ...body.split('\n'));
  return lines;
}

export function renderAttachments(attachments: AttachmentInfo[]): string[] {
  if (attachments.length === 0) return ['No attachments.'];
  return attachments.map(
    (a, i) =>
      `${String(i + 1).padStart(3)}. ${a.filename} (${formatFileSize(a.size)}, ${a.mimeType})${a.isInline ? chalk.dim(' inline') : ''}`
  );
}

export function renderFolders(folders: MailFolder[]): string[] {
  const width = Math.max(6, ...folders.map((f) => f.name.length));
  return folders.map(
    (f) => `${f.name.padEnd(width)}  ${String(f.totalCount).padStart(6)} total  ${String(f.unreadCount).padStart(5)} unread`
  );
}

export function renderBulkOutcome(outcome: BulkOutcome): string[] {
  const { action, succeeded, failed, removal } = outcome;
  const lines = [chalk.green(`${succeeded.length} message(s) ${action.done}.`)];
  for (const f of failed) {
    lines.push(chalk.red(`  #${f.message.index} "${truncate(f.message.subject, 40)}": ${f.error.message}`));
  }
  if (failed.length > 0) {
    lines.push(chalk.red(`${failed.length} message(s) could not be ${action.done}.`));
  }
  if (removal.backfillError) {
    lines.push(chalk.yellow(`Could not refill the list: ${removal.backfillError.message}`));
  }
  return lines;
}

export const HELP_LINES = [
  'L, LIST               show the current page',
  'M, MORE               load more messages',
  'R, READ <n>           read message n',
  'F, FILTER [text]      filter by subject, sender or body; F alone clears',
  'G, GO <folder>        inbox, drafts, sent, deleted, junk or a folder name',
  'FOLDERS               list folders',
  'X <list>              delete, e.g. X 1,3-5',
  'K <list>              move to Junk',
  'INBOX <list>          move from Junk to Inbox',
  'RESTORE <list>        move from Deleted Items to Inbox',
  'PURGE <list>          delete permanently from Deleted Items',
  'C, COMPOSE            write a new message',
  'RE <n>, FW <n>        reply to or forward message n',
  'A, ATTACHMENTS <n>    list attachments of message n',
  'SAVE <n> [dir]        save attachments of message n',
  'H, HELP               this help',
  'Q, QUIT               leave',
];
