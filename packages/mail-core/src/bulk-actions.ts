import type {
  FolderRef,
  MailResult,
  MessageSummary,
  RemoteMailbox,
} from '@termmail/shared';
import type { IndexSpan } from './index-range';
import type { MessagePage } from './session-store';

export type BulkActionKind = 'delete' | 'junk' | 'inbox' | 'restore' | 'purge';

export interface BulkAction {
  kind: BulkActionKind;
  /** Shell command that triggers it */
  command: string;
  /** Imperative, for confirmation prompts */
  verb: string;
  /** Past participle, for result tallies */
  done: string;
  availableIn: (folder: FolderRef) => boolean;
  apply: (mailbox: RemoteMailbox, id: string) => Promise<MailResult<void>>;
}

const inFolder = (folder: FolderRef, name: FolderRef['wellKnown']) => folder.wellKnown === name;

export const BULK_ACTIONS: Record<BulkActionKind, BulkAction> = {
  delete: {
    kind: 'delete',
    command: 'X',
    verb: 'Delete',
    done: 'deleted',
    availableIn: (folder) => !inFolder(folder, 'deleteditems'),
    apply: (mailbox, id) => mailbox.moveMessage(id, 'deleteditems'),
  },
  junk: {
    kind: 'junk',
    command: 'K',
    verb: 'Move to Junk',
    done: 'moved to Junk',
    availableIn: (folder) => !inFolder(folder, 'junkemail') && !inFolder(folder, 'deleteditems'),
    apply: (mailbox, id) => mailbox.moveMessage(id, 'junkemail'),
  },
  inbox: {
    kind: 'inbox',
    command: 'INBOX',
    verb: 'Move to Inbox',
    done: 'moved to Inbox',
    availableIn: (folder) => inFolder(folder, 'junkemail'),
    apply: (mailbox, id) => mailbox.moveMessage(id, 'inbox'),
  },
  restore: {
    kind: 'restore',
    command: 'RESTORE',
    verb: 'Restore',
    done: 'restored',
    availableIn: (folder) => inFolder(folder, 'deleteditems'),
    apply: (mailbox, id) => mailbox.moveMessage(id, 'inbox'),
  },
  purge: {
    kind: 'purge',
    command: 'PURGE',
    verb: 'Permanently delete',
    done: 'permanently deleted',
    availableIn: (folder) => inFolder(folder, 'deleteditems'),
    apply: (mailbox, id) => mailbox.deleteMessage(id),
  },
};

export function bulkActionForCommand(command: string): BulkAction | undefined {
  const upper = command.toUpperCase();
  return Object.values(BULK_ACTIONS).find((action) => action.command === upper);
}

export interface Selection {
  /** Page messages in ascending index order */
  targets: MessageSummary[];
  /** Requested numbers past the end of the current page */
  invalid: IndexSpan[];
}

/** Clip merged spans to the page; the part past its end is reported, not fatal. */
export function resolveSelection(page: MessagePage, spans: readonly IndexSpan[]): Selection {
  const count = page.items.length;
  const targets: MessageSummary[] = [];
  const invalid: IndexSpan[] = [];
  for (const { start, end } of spans) {
    targets.push(...page.items.slice(start - 1, Math.min(end, count)));
    if (end > count) invalid.push({ start: Math.max(start, count + 1), end });
  }
  return { targets, invalid };
}
