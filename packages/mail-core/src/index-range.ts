/**
 * Parser for message index expressions such as "3", "2-5" or "1,3-5,7".
 * Reversed ranges are swapped. Terms are kept as spans, merged and in
 * ascending order, so "1-100000" costs no more than "1-2".
 * Any bad term rejects the whole expression.
 */

/** Inclusive run of message numbers. */
export interface IndexSpan {
  start: number;
  end: number;
}

export type IndexRangeResult =
  | { ok: true; spans: IndexSpan[] }
  | { ok: false; reason: 'empty' | 'syntax'; message: string };

const TERM = /^(\d+)(?:-(\d+))?$/;

export function parseIndexRange(input: string): IndexRangeResult {
  const trimmed = input.trim();
  if (trimmed === '') {
    return { ok: false, reason: 'empty', message: 'No message numbers given' };
  }

  const spans: IndexSpan[] = [];
  for (const rawTerm of trimmed.split(',')) {
    const term = rawTerm.trim();
    const match = TERM.exec(term);
    if (!match) {
      return syntaxError(term === '' ? 'Empty entry in list' : `Invalid entry "${term}"`);
    }

    const start = Number(match[1]);
    const end = match[2] === undefined ? start : Number(match[2]);
    if (start < 1 || end < 1) {
      return syntaxError(`Message numbers start at 1 ("${term}")`);
    }
    spans.push(start <= end ? { start, end } : { start: end, end: start });
  }

  return { ok: true, spans: mergeSpans(spans) };
}

/** Sorts spans and joins the ones that overlap or touch. */
export function mergeSpans(spans: readonly IndexSpan[]): IndexSpan[] {
  const sorted = [...spans].sort((a, b) => a.start - b.start);
  const merged: IndexSpan[] = [];
  for (const span of sorted) {
    const last = merged.at(-1);
    if (last && span.start <= last.end + 1) last.end = Math.max(last.end, span.end);
    else merged.push({ ...span });
  }
  return merged;
}

/** "3, 7-9" */
export function formatSpans(spans: readonly IndexSpan[]): string {
  return spans.map(({ start, end }) => (start === end ? `${start}` : `${start}-${end}`)).join(', ');
}

function syntaxError(message: string): IndexRangeResult {
  return { ok: false, reason: 'syntax', message };
}
