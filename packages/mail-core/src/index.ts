export {
  parseIndexRange,
  mergeSpans,
  formatSpans,
  type IndexRangeResult,
  type IndexSpan,
} from './index-range';

export {
  createSessionStore,
  toSummary,
  type MessagePage,
  type SessionOptions,
  type SessionState,
  type SessionStore,
} from './session-store';

export {
  searchFiltered,
  matchesFilter,
  FILTER_BATCH_SIZE,
  FILTER_MAX_SEARCH,
  LIST_FIELDS,
  SEARCH_FIELDS,
  DEFAULT_ORDER_BY,
  type FilteredSearchOutcome,
  type FilteredSearchRequest,
  type SearchStopReason,
} from './message-filter';

export {
  ListController,
  type BulkFailure,
  type BulkOutcome,
  type ListControllerOptions,
  type LoadMoreResult,
  type LoadResult,
  type RemovalResult,
  type SearchReport,
} from './list-controller';

export {
  BULK_ACTIONS,
  bulkActionForCommand,
  resolveSelection,
  type BulkAction,
  type BulkActionKind,
  type Selection,
} from './bulk-actions';

export {
  parseDraft,
  renderDraftTemplate,
  replyTemplate,
  forwardTemplate,
  toDraftInput,
  type DraftFields,
} from './draft';

export { htmlToText, textToHtml, buildFooter, decodeEntities } from './html';
