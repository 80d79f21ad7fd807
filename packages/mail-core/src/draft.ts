import PostalMime from 'postal-mime';
import { formatDateTime, type DraftInput, type MessageDetail } from '@termmail/shared';
import { htmlToText, textToHtml } from './html';

/** Draft as edited in the external editor. */
export interface DraftFields {
  to: string[];
  cc: string[];
  subject: string;
  body: string;
}

type ParsedEmail = Awaited<ReturnType<PostalMime['parse']>>;
type ParsedAddress = NonNullable<ParsedEmail['to']>[number];

export function renderDraftTemplate(fields: Partial<DraftFields> = {}): string {
  return [
    `To: ${(fields.to ?? []).join(', ')}`,
    `Cc: ${(fields.cc ?? []).join(', ')}`,
    `Subject: ${fields.subject ?? ''}`,
    '',
    fields.body ?? '',
  ].join('\n');
}

/** Read back an edited template: headers, a blank line, then the body. */
export async function parseDraft(text: string): Promise<DraftFields> {
  const parser = new PostalMime();
  const email = await parser.parse(text.replace(/\r?\n/g, '\r\n'));
  return {
    to: flattenAddresses(email.to),
    cc: flattenAddresses(email.cc),
    subject: (email.subject ?? '').trim(),
    body: (email.text ?? '').replace(/\r\n/g, '\n').replace(/\s+$/, ''),
  };
}

function flattenAddresses(list: ParsedAddress[] | undefined): string[] {
  const out: string[] = [];
  for (const entry of list ?? []) {
    if (entry.group) {
      for (const member of entry.group) {
        if (member.address) out.push(member.address);
      }
    } else if (entry.address) {
      out.push(entry.address);
    }
  }
  return out;
}

function plainBody(message: MessageDetail): string {
  return message.bodyType === 'html' ? htmlToText(message.body) : message.body.trim();
}

function sender(message: MessageDetail): string {
  return message.fromName ? `${message.fromName} <${message.fromAddress}>` : message.fromAddress;
}

function prefixed(prefix: string, subject: string): string {
  return new RegExp(`^${prefix}:`, 'i').test(subject) ? subject : `${prefix}: ${subject}`;
}

export function replyTemplate(original: MessageDetail): DraftFields {
  const quoted = plainBody(original)
    .split('\n')
    .map((line) => (line ? `> ${line}` : '>'))
    .join('\n');
  return {
    to: original.fromAddress ? [original.fromAddress] : [],
    cc: [],
    subject: prefixed('Re', original.subject),
    body: `\n\nOn ${formatDateTime(original.dateTime)}, ${sender(original)} wrote:\n${quoted}`,
  };
}

export function forwardTemplate(original: MessageDetail): DraftFields {
  const header = [
    '---------- Forwarded message ----------',
    `From: ${sender(original)}`,
    `Date: ${formatDateTime(original.dateTime)}`,
    `Subject: ${original.subject}`,
    `To: ${original.toRecipients.join(', ')}`,
  ].join('\n');
  return {
    to: [],
    cc: [],
    subject: prefixed('Fw', original.subject),
    body: `\n\n${header}\n\n${plainBody(original)}`,
  };
}

export function toDraftInput(fields: DraftFields, signature?: string): DraftInput {
  return {
    to: fields.to,
    cc: fields.cc,
    subject: fields.subject,
    bodyHtml: textToHtml(fields.body, signature),
  };
}
