import type { FolderRef, MailResult, RemoteMailbox, WellKnownFolder } from '@termmail/shared';

const WELL_KNOWN: Record<WellKnownFolder, string> = {
  inbox: 'Inbox',
  drafts: 'Drafts',
  sentitems: 'Sent Items',
  deleteditems: 'Deleted Items',
  junkemail: 'Junk Email',
};

const ALIASES: Record<string, WellKnownFolder> = {
  inbox: 'inbox',
  drafts: 'drafts',
  draft: 'drafts',
  sent: 'sentitems',
  sentitems: 'sentitems',
  deleted: 'deleteditems',
  deleteditems: 'deleteditems',
  trash: 'deleteditems',
  junk: 'junkemail',
  junkemail: 'junkemail',
  spam: 'junkemail',
};

export function wellKnownFolder(name: WellKnownFolder): FolderRef {
  return { id: name, name: WELL_KNOWN[name], wellKnown: name };
}

/** Well-known aliases first, then display names as listed by the mailbox. */
export async function resolveFolder(
  mailbox: RemoteMailbox,
  name: string
): Promise<MailResult<FolderRef | undefined>> {
  const alias = ALIASES[name.toLowerCase().replace(/\s+/g, '')];
  if (alias) return { ok: true, value: wellKnownFolder(alias) };

  const folders = await mailbox.listFolders();
  if (!folders.ok) return folders;
  const wanted = name.toLowerCase();
  const found = folders.value.find((f) => f.name.toLowerCase() === wanted);
  return { ok: true, value: found ? { id: found.id, name: found.name } : undefined };
}
