import type {
  FolderRef,
  MailResult,
  MessageSummary,
  RawMessage,
  RemoteError,
  RemoteMailbox,
} from '@termmail/shared';
import type { BulkAction } from './bulk-actions';
import {
  DEFAULT_ORDER_BY,
  FILTER_BATCH_SIZE,
  FILTER_MAX_SEARCH,
  LIST_FIELDS,
  searchFiltered,
  type SearchStopReason,
} from './message-filter';
import type { MessagePage, SessionStore } from './session-store';

export interface ListControllerOptions {
  batchSize?: number;
  maxSearch?: number;
  orderBy?: string;
}

/** How a filtered fetch ended, for telling "no matches" from "gave up". */
export interface SearchReport {
  searched: number;
  stopReason: SearchStopReason;
}

export type LoadResult =
  | { ok: true; items: MessageSummary[]; hasMore: boolean; search?: SearchReport }
  | { ok: false; error: RemoteError };

export type LoadMoreResult =
  | { status: 'appended'; appended: MessageSummary[]; hasMore: boolean; search?: SearchReport }
  | { status: 'no-more' }
  | { status: 'failed'; error: RemoteError };

export interface RemovalResult {
  removed: number;
  backfilled: MessageSummary[];
  /** Set when the removal was committed but refilling the page failed */
  backfillError?: RemoteError;
  search?: SearchReport;
}

export interface BulkFailure {
  message: MessageSummary;
  error: RemoteError;
}

export interface BulkOutcome {
  action: BulkAction;
  attempted: number;
  succeeded: string[];
  failed: BulkFailure[];
  removal: RemovalResult;
}

interface Batch {
  messages: RawMessage[];
  nextToken?: string;
  search?: SearchReport;
}

/**
 * Owns every change to the session's message page. Operations run one at a
 * time in call order, and the page is densely indexed whenever one returns.
 */
export class ListController {
  private queue: Promise<unknown> = Promise.resolve();

  constructor(
    private readonly mailbox: RemoteMailbox,
    private readonly session: SessionStore,
    private readonly options: ListControllerOptions = {}
  ) {}

  get page(): MessagePage {
    return this.session.getState().page;
  }

  switchFolder(folder: FolderRef): Promise<LoadResult> {
    return this.exclusive(() => {
      this.session.getState().setFolder(folder);
      return this.fetchInitial();
    });
  }

  setFilter(text: string): Promise<LoadResult> {
    return this.exclusive(() => {
      this.session.getState().setFilter(text);
      return this.fetchInitial();
    });
  }

  clearFilter(): Promise<LoadResult> {
    return this.exclusive(() => {
      this.session.getState().clearFilter();
      return this.fetchInitial();
    });
  }

  /** Replace the page with the first `pageSize` items of the current view. */
  loadInitial(): Promise<LoadResult> {
    return this.exclusive(() => this.fetchInitial());
  }

  loadMore(): Promise<LoadMoreResult> {
    return this.exclusive(async (): Promise<LoadMoreResult> => {
      const { page, pageSize } = this.session.getState();
      if (page.continuationToken === undefined) return { status: 'no-more' };

      const batch = await this.fetchBatch(pageSize, page.continuationToken);
      if (!batch.ok) return { status: 'failed', error: batch.error };

      const appended = this.append(batch.value.messages, batch.value.nextToken);
      return {
        status: 'appended',
        appended,
        hasMore: batch.value.nextToken !== undefined,
        search: batch.value.search,
      };
    });
  }

  /** Drop messages that left the view, then refill up to as many as were dropped. */
  applyRemoval(removedIds: ReadonlySet<string>): Promise<RemovalResult> {
    return this.exclusive(() => this.removeAndBackfill(removedIds));
  }

  /**
   * Apply a bulk action message by message. Failures are tallied and the
   * page loses exactly the messages whose remote call succeeded.
   */
  runBulkAction(action: BulkAction, targets: readonly MessageSummary[]): Promise<BulkOutcome> {
    return this.exclusive(async () => {
      const succeeded: string[] = [];
      const failed: BulkFailure[] = [];
      for (const message of targets) {
        const result = await action.apply(this.mailbox, message.id);
        if (result.ok) succeeded.push(message.id);
        else failed.push({ message, error: result.error });
      }
      const removal = await this.removeAndBackfill(new Set(succeeded));
      return { action, attempted: targets.length, succeeded, failed, removal };
    });
  }

  /** Reflect a read action on the listing. */
  markRead(id: string): void {
    this.session.getState().markRead(id, true);
  }

  private async fetchInitial(): Promise<LoadResult> {
    const { pageSize } = this.session.getState();
    const batch = await this.fetchBatch(pageSize, undefined);
    if (!batch.ok) return batch;

    const items = this.session
      .getState()
      .replacePage(batch.value.messages, batch.value.nextToken);
    return {
      ok: true,
      items,
      hasMore: batch.value.nextToken !== undefined,
      search: batch.value.search,
    };
  }

  private async removeAndBackfill(removedIds: ReadonlySet<string>): Promise<RemovalResult> {
    const removed = this.session.getState().removeMessages(removedIds);
    const { continuationToken } = this.page;
    if (removed === 0 || continuationToken === undefined) {
      return { removed, backfilled: [] };
    }

    const token = this.mailbox.rebaseContinuation(continuationToken, removed);
    this.session.getState().setContinuationToken(token);
    const batch = await this.fetchBatch(removed, token);
    if (!batch.ok) {
      return { removed, backfilled: [], backfillError: batch.error };
    }
    const backfilled = this.append(batch.value.messages.slice(0, removed), batch.value.nextToken);
    return { removed, backfilled, search: batch.value.search };
  }

  private append(messages: RawMessage[], nextToken: string | undefined): MessageSummary[] {
    const state = this.session.getState();
    const known = new Set(state.page.items.map((item) => item.id));
    return state.appendMessages(
      messages.filter((m) => !known.has(m.id)),
      nextToken
    );
  }

  private async fetchBatch(
    count: number,
    continuationToken: string | undefined
  ): Promise<MailResult<Batch>> {
    const { folder, filterText } = this.session.getState();
    const orderBy = this.options.orderBy ?? DEFAULT_ORDER_BY;

    if (filterText === null) {
      const result = await this.mailbox.fetchPage({
        folderId: folder.id,
        selectFields: LIST_FIELDS,
        orderBy,
        top: count,
        continuationToken,
      });
      if (!result.ok) return result;
      return { ok: true, value: result.value };
    }

    const result = await searchFiltered(this.mailbox, {
      folderId: folder.id,
      filterText,
      targetCount: count,
      continuationToken,
      batchSize: this.options.batchSize ?? FILTER_BATCH_SIZE,
      maxSearch: this.options.maxSearch ?? FILTER_MAX_SEARCH,
      orderBy,
    });
    if (!result.ok) return result;
    const { matches, searched, stopReason } = result.value;
    return {
      ok: true,
      value: {
        messages: matches,
        nextToken: result.value.continuationToken,
        search: { searched, stopReason },
      },
    };
  }

  private exclusive<T>(task: () => Promise<T>): Promise<T> {
    const run = this.queue.then(task);
    this.queue = run.catch(() => undefined);
    return run;
  }
}
