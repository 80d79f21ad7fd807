import { createStore, type StoreApi } from 'zustand/vanilla';
import type { FolderRef, MessageSummary, RawMessage } from '@termmail/shared';

/** What is currently visible, plus the token for fetching more. */
export interface MessagePage {
  items: MessageSummary[];
  continuationToken?: string;
}

export interface SessionState {
  folder: FolderRef;
  /** Case-insensitive substring filter; survives folder switches */
  filterText: string | null;
  page: MessagePage;
  pageSize: number;

  setFolder: (folder: FolderRef) => void;
  setFilter: (text: string) => void;
  clearFilter: () => void;
  setPageSize: (size: number) => void;
  replacePage: (messages: RawMessage[], continuationToken?: string) => MessageSummary[];
  appendMessages: (messages: RawMessage[], continuationToken?: string) => MessageSummary[];
  removeMessages: (ids: ReadonlySet<string>) => number;
  setContinuationToken: (token: string | undefined) => void;
  markRead: (id: string, isRead: boolean) => void;
}

export type SessionStore = StoreApi<SessionState>;

export interface SessionOptions {
  folder: FolderRef;
  pageSize: number;
  filterText?: string | null;
}

const emptyPage: MessagePage = { items: [] };

export function toSummary(raw: RawMessage, index: number): MessageSummary {
  return {
    id: raw.id,
    index,
    subject: raw.subject,
    fromAddress: raw.fromAddress,
    fromName: raw.fromName,
    toAddress: raw.toAddress,
    dateTime: raw.receivedDateTime,
    isRead: raw.isRead,
    hasAttachments: raw.hasAttachments,
    // Signature verification is not implemented; every message lists as unsigned.
    signatureStatus: 'unsigned',
  };
}

function reindex(items: MessageSummary[]): MessageSummary[] {
  return items.map((item, i) => (item.index === i + 1 ? item : { ...item, index: i + 1 }));
}

export function createSessionStore(options: SessionOptions): SessionStore {
  return createStore<SessionState>((set, get) => ({
    folder: options.folder,
    filterText: normalizeFilter(options.filterText ?? null),
    page: emptyPage,
    pageSize: Math.max(1, options.pageSize),

    setFolder: (folder) => set({ folder, page: emptyPage }),

    setFilter: (text) => set({ filterText: normalizeFilter(text), page: emptyPage }),

    clearFilter: () => set({ filterText: null, page: emptyPage }),

    setPageSize: (size) => set({ pageSize: Math.max(1, size) }),

    replacePage: (messages, continuationToken) => {
      const items = messages.map((raw, i) => toSummary(raw, i + 1));
      set({ page: { items, continuationToken } });
      return items;
    },

    appendMessages: (messages, continuationToken) => {
      const { page } = get();
      const appended = messages.map((raw, i) => toSummary(raw, page.items.length + i + 1));
      set({ page: { items: [...page.items, ...appended], continuationToken } });
      return appended;
    },

    removeMessages: (ids) => {
      const { page } = get();
      const remaining = page.items.filter((item) => !ids.has(item.id));
      const removed = page.items.length - remaining.length;
      if (removed > 0) {
        set({ page: { ...page, items: reindex(remaining) } });
      }
      return removed;
    },

    setContinuationToken: (continuationToken) =>
      set((state) => ({ page: { ...state.page, continuationToken } })),

    markRead: (id, isRead) =>
      set((state) => ({
        page: {
          ...state.page,
          items: state.page.items.map((item) =>
            item.id === id ? { ...item, isRead } : item
          ),
        },
      })),
  }));
}

function normalizeFilter(text: string | null): string | null {
  const trimmed = text?.trim() ?? '';
  return trimmed === '' ? null : trimmed;
}
