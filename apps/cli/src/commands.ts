import chalk from 'chalk';
import type {
  AttachmentFile,
  MessageDetail,
  MessageSummary,
  RemoteError,
  RemoteMailbox,
} from '@termmail/shared';
import {
  bulkActionForCommand,
  formatSpans,
  forwardTemplate,
  parseDraft,
  parseIndexRange,
  renderDraftTemplate,
  replyTemplate,
  resolveSelection,
  toDraftInput,
  type BulkAction,
  type DraftFields,
  type ListController,
  type SearchReport,
  type SessionStore,
} from '@termmail/mail-core';
import { cleanFilePath, loadAttachment, saveAttachment } from './attachments';
import type { Editor } from './editor';
import { resolveFolder } from './folders';
import {
  HELP_LINES,
  renderAttachments,
  renderBulkOutcome,
  renderFolders,
  renderMessage,
  renderRow,
  renderSearchReport,
  renderStatus,
} from './render';
import type { Terminal } from './terminal';

export interface ShellContext {
  mailbox: RemoteMailbox;
  session: SessionStore;
  controller: ListController;
  term: Terminal;
  editor: Editor;
  signature?: string;
  cwd?: string;
  now?: () => Date;
}

export type CommandResult = 'continue' | 'quit';

type Handler = (ctx: ShellContext, arg: string) => Promise<void>;

const isYes = (answer: string) => /^(y|yes)$/i.test(answer);

function printError(ctx: ShellContext, error: RemoteError | Error | string): void {
  const message = typeof error === 'string' ? error : error.message;
  ctx.term.print(chalk.red(`Error: ${message}`));
}

export function printRows(ctx: ShellContext, rows: readonly MessageSummary[]): void {
  const now = ctx.now?.() ?? new Date();
  for (const row of rows) ctx.term.print(renderRow(row, ctx.term.columns, now));
}

export function printStatus(ctx: ShellContext, report?: SearchReport, found = 0): void {
  const { folder, filterText, page } = ctx.session.getState();
  const search = renderSearchReport(report, found);
  if (search) ctx.term.print(search);
  ctx.term.print(
    renderStatus({
      folder,
      filterText,
      shown: page.items.length,
      hasMore: page.continuationToken !== undefined,
    })
  );
}

export function printPage(ctx: ShellContext, report?: SearchReport): void {
  const { items } = ctx.controller.page;
  if (items.length === 0 && !report) ctx.term.print(chalk.dim('No messages.'));
  printRows(ctx, items);
  printStatus(ctx, report, items.length);
}

/** The message shown at `arg`, or undefined after telling the user why not. */
function messageAt(ctx: ShellContext, arg: string): MessageSummary | undefined {
  if (!/^\d+$/.test(arg)) {
    printError(ctx, 'Give a message number, e.g. R 3');
    return undefined;
  }
  const index = Number(arg);
  const message = ctx.controller.page.items[index - 1];
  if (!message) printError(ctx, `No message ${index} on this page`);
  return message;
}

async function detailAt(ctx: ShellContext, arg: string): Promise<MessageDetail | undefined> {
  const summary = messageAt(ctx, arg.split(/\s+/)[0] ?? '');
  if (!summary) return undefined;
  const result = await ctx.mailbox.getMessage(summary.id);
  if (!result.ok) {
    printError(ctx, result.error);
    return undefined;
  }
  return result.value;
}

const list: Handler = async (ctx) => {
  printPage(ctx);
};

const more: Handler = async (ctx) => {
  const result = await ctx.controller.loadMore();
  switch (result.status) {
    case 'no-more':
      ctx.term.print('No more messages.');
      return;
    case 'failed':
      printError(ctx, result.error);
      return;
    case 'appended':
      printRows(ctx, result.appended);
      printStatus(ctx, result.search, result.appended.length);
  }
};

const read: Handler = async (ctx, arg) => {
  const message = await detailAt(ctx, arg);
  if (!message) return;
  for (const line of renderMessage(message)) ctx.term.print(line);
  if (!message.isRead) {
    const marked = await ctx.mailbox.markRead(message.id, true);
    if (marked.ok) ctx.controller.markRead(message.id);
    else printError(ctx, marked.error);
  }
};

const filter: Handler = async (ctx, arg) => {
  const result = arg === '' ? await ctx.controller.clearFilter() : await ctx.controller.setFilter(arg);
  if (!result.ok) {
    printError(ctx, result.error);
    return;
  }
  printPage(ctx, result.search);
};

const go: Handler = async (ctx, arg) => {
  if (arg === '') {
    printError(ctx, 'Give a folder, e.g. G junk');
    return;
  }
  const resolved = await resolveFolder(ctx.mailbox, arg);
  if (!resolved.ok) {
    printError(ctx, resolved.error);
    return;
  }
  if (!resolved.value) {
    printError(ctx, `No folder named "${arg}"; FOLDERS lists them`);
    return;
  }
  const result = await ctx.controller.switchFolder(resolved.value);
  if (!result.ok) {
    printError(ctx, result.error);
    return;
  }
  printPage(ctx, result.search);
};

const folders: Handler = async (ctx) => {
  const result = await ctx.mailbox.listFolders();
  if (!result.ok) {
    printError(ctx, result.error);
    return;
  }
  for (const line of renderFolders(result.value)) ctx.term.print(line);
};

async function bulk(ctx: ShellContext, action: BulkAction, arg: string): Promise<void> {
  const { folder } = ctx.session.getState();
  if (!action.availableIn(folder)) {
    printError(ctx, `${action.command} is not available in ${folder.name}`);
    return;
  }
  const parsed = parseIndexRange(arg);
  if (!parsed.ok) {
    printError(ctx, parsed.message);
    return;
  }
  const { targets, invalid } = resolveSelection(ctx.controller.page, parsed.spans);
  if (invalid.length > 0) {
    ctx.term.print(chalk.yellow(`Not on this page: ${formatSpans(invalid)}`));
  }
  if (targets.length === 0) return;

  const answer = await ctx.term.ask(`${action.verb} ${targets.length} message(s)? (y/N) `);
  if (!isYes(answer)) {
    ctx.term.print('Cancelled.');
    printPage(ctx);
    return;
  }

  const outcome = await ctx.controller.runBulkAction(action, targets);
  for (const line of renderBulkOutcome(outcome)) ctx.term.print(line);
  printPage(ctx, outcome.removal.search);
}

async function compose(ctx: ShellContext, fields: Partial<DraftFields>): Promise<void> {
  const template = renderDraftTemplate(fields);
  const edited = await ctx.editor(template);
  if (edited.trim() === '' || edited === template) {
    ctx.term.print('Draft discarded (no changes).');
    return;
  }
  const draft = await parseDraft(edited);
  const files: string[] = [];

  for (;;) {
    const choice = (
      await ctx.term.ask(`[s]ave, [a]ttach${files.length ? ` (${files.length})` : ''}, send [x], [d]iscard: `)
    ).toLowerCase();
    if (choice === 'd') {
      ctx.term.print('Draft discarded.');
      return;
    }
    if (choice === 'a') {
      const path = cleanFilePath(await ctx.term.ask('File to attach: '));
      if (path !== '') files.push(path);
      continue;
    }
    if (choice === 's' || choice === 'x') {
      if (choice === 'x' && draft.to.length === 0 && draft.cc.length === 0) {
        printError(ctx, 'Add a recipient before sending');
        continue;
      }
      await storeDraft(ctx, draft, files, choice === 'x');
      return;
    }
  }
}

async function storeDraft(
  ctx: ShellContext,
  fields: DraftFields,
  files: string[],
  send: boolean
): Promise<void> {
  const loaded: AttachmentFile[] = [];
  for (const path of files) {
    try {
      loaded.push(await loadAttachment(path));
    } catch (err) {
      printError(ctx, `Cannot read ${path}: ${err instanceof Error ? err.message : String(err)}`);
      return;
    }
  }

  const created = await ctx.mailbox.createDraft(toDraftInput(fields, ctx.signature));
  if (!created.ok) {
    printError(ctx, created.error);
    return;
  }
  const draftId = created.value.id;
  for (const file of loaded) {
    const added = await ctx.mailbox.addAttachment(draftId, file);
    if (!added.ok) {
      printError(ctx, `Attaching ${file.filename} failed (${added.error.message}); the draft is kept in Drafts`);
      return;
    }
  }
  if (!send) {
    ctx.term.print(chalk.green('Draft saved to Drafts.'));
    return;
  }
  const sent = await ctx.mailbox.sendDraft(draftId);
  if (!sent.ok) {
    printError(ctx, `Sending failed (${sent.error.message}); the draft is kept in Drafts`);
    return;
  }
  ctx.term.print(chalk.green('Message sent.'));
}

const newMessage: Handler = (ctx) => compose(ctx, {});

const reply: Handler = async (ctx, arg) => {
  const message = await detailAt(ctx, arg);
  if (message) await compose(ctx, replyTemplate(message));
};

const forward: Handler = async (ctx, arg) => {
  const message = await detailAt(ctx, arg);
  if (message) await compose(ctx, forwardTemplate(message));
};

const attachments: Handler = async (ctx, arg) => {
  const message = await detailAt(ctx, arg);
  if (!message) return;
  for (const line of renderAttachments(message.attachments)) ctx.term.print(line);
};

const save: Handler = async (ctx, arg) => {
  const message = await detailAt(ctx, arg);
  if (!message) return;
  if (message.attachments.length === 0) {
    ctx.term.print('No attachments.');
    return;
  }
  const rawDir = arg.split(/\s+/).slice(1).join(' ');
  const dir = rawDir ? cleanFilePath(rawDir) : (ctx.cwd ?? process.cwd());
  for (const info of message.attachments) {
    const file = await ctx.mailbox.getAttachment(message.id, info.id);
    if (!file.ok) {
      printError(ctx, `${info.filename}: ${file.error.message}`);
      continue;
    }
    try {
      const path = await saveAttachment(dir, file.value);
      ctx.term.print(`Saved ${path}`);
    } catch (err) {
      printError(ctx, `${info.filename}: ${err instanceof Error ? err.message : String(err)}`);
    }
  }
};

const help: Handler = async (ctx) => {
  for (const line of HELP_LINES) ctx.term.print(line);
};

const HANDLERS: Record<string, Handler> = {
  L: list,
  LIST: list,
  M: more,
  MORE: more,
  R: read,
  READ: read,
  F: filter,
  FILTER: filter,
  G: go,
  GO: go,
  FOLDERS: folders,
  C: newMessage,
  COMPOSE: newMessage,
  RE: reply,
  FW: forward,
  A: attachments,
  ATTACHMENTS: attachments,
  SAVE: save,
  H: help,
  HELP: help,
  '?': help,
};

/** Run one shell line. Remote failures are printed; only input loss ends the shell. */
export async function runCommand(ctx: ShellContext, line: string): Promise<CommandResult> {
  const trimmed = line.trim();
  if (trimmed === '') return 'continue';
  const [word = ''] = trimmed.split(/\s+/, 1);
  const command = word.toUpperCase();
  const arg = trimmed.slice(word.length).trim();

  if (command === 'Q' || command === 'QUIT') return 'quit';

  const action = bulkActionForCommand(command);
  if (action) {
    await bulk(ctx, action, arg);
    return 'continue';
  }
  const handler = HANDLERS[command];
  if (!handler) {
    printError(ctx, `Unknown command "${word}"; H lists commands`);
    return 'continue';
  }
  await handler(ctx, arg);
  return 'continue';
}
