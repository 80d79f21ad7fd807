import type {
  MailResult,
  RawMessage,
  RemoteMailbox,
  SelectField,
} from '@termmail/shared';

/** Raw messages fetched per round trip while filtering. */
export const FILTER_BATCH_SIZE = 50;
/** Hard ceiling on raw messages scanned by one filtered fetch. */
export const FILTER_MAX_SEARCH = 200;

export const LIST_FIELDS: readonly SelectField[] = [
  'id',
  'subject',
  'from',
  'toRecipients',
  'receivedDateTime',
  'isRead',
  'hasAttachments',
];

export const SEARCH_FIELDS: readonly SelectField[] = [...LIST_FIELDS, 'body'];

export const DEFAULT_ORDER_BY = 'receivedDateTime desc';

export type SearchStopReason = 'target-reached' | 'ceiling-reached' | 'exhausted';

export interface FilteredSearchRequest {
  folderId: string;
  filterText: string;
  targetCount: number;
  continuationToken?: string;
  batchSize?: number;
  maxSearch?: number;
  orderBy?: string;
}

export interface FilteredSearchOutcome {
  matches: RawMessage[];
  /** Absent when the folder is exhausted */
  continuationToken?: string;
  /** Raw messages fetched, matching or not */
  searched: number;
  stopReason: SearchStopReason;
}

export function matchesFilter(message: RawMessage, filterText: string): boolean {
  const needle = filterText.toLowerCase();
  return [message.subject, message.fromAddress, message.fromName, message.bodyText ?? ''].some(
    (field) => field.toLowerCase().includes(needle)
  );
}

/**
 * Client-side filtering in bounded batches. The remote cannot search
 * message bodies, so batches are fetched with their body and matched
 * locally until enough matches are found, the scan ceiling is hit or the
 * folder runs out.
 */
export async function searchFiltered(
  mailbox: RemoteMailbox,
  request: FilteredSearchRequest
): Promise<MailResult<FilteredSearchOutcome>> {
  const batchSize = request.batchSize ?? FILTER_BATCH_SIZE;
  const maxSearch = request.maxSearch ?? FILTER_MAX_SEARCH;
  const matches: RawMessage[] = [];
  let searched = 0;
  let token = request.continuationToken;

  if (request.targetCount <= 0) {
    return {
      ok: true,
      value: { matches, continuationToken: token, searched, stopReason: 'target-reached' },
    };
  }

  for (;;) {
    const result = await mailbox.fetchPage({
      folderId: request.folderId,
      selectFields: SEARCH_FIELDS,
      orderBy: request.orderBy ?? DEFAULT_ORDER_BY,
      top: Math.min(batchSize, maxSearch - searched),
      continuationToken: token,
    });
    if (!result.ok) return result;

    const batch = result.value.messages;
    if (batch.length === 0) {
      return done('exhausted', undefined);
    }

    for (const message of batch) {
      if (matchesFilter(message, request.filterText)) {
        matches.push(message);
        if (matches.length === request.targetCount) break;
      }
    }
    searched += batch.length;
    token = result.value.nextToken;

    if (matches.length >= request.targetCount) return done('target-reached', token);
    if (token === undefined) return done('exhausted', undefined);
    if (searched >= maxSearch) return done('ceiling-reached', token);
  }

  function done(
    stopReason: SearchStopReason,
    continuationToken: string | undefined
  ): MailResult<FilteredSearchOutcome> {
    return { ok: true, value: { matches, continuationToken, searched, stopReason } };
  }
}
