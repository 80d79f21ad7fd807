import { escapeHtml } from '@termmail/shared';

const ENTITIES: Record<string, string> = {
  nbsp: ' ',
  amp: '&',
  lt: '<',
  gt: '>',
  quot: '"',
  apos: "'",
  copy: '©',
  reg: '®',
  hellip: '…',
  mdash: '—',
  ndash: '–',
  rsquo: '’',
  lsquo: '‘',
  rdquo: '”',
  ldquo: '“',
};

export function decodeEntities(value: string): string {
  return value.replace(/&(#x[0-9a-f]+|#\d+|[a-z]+\d*);/gi, (match, name: string) => {
    const lower = name.toLowerCase();
    if (lower.startsWith('#x')) return safeCodePoint(parseInt(lower.slice(2), 16), match);
    if (lower.startsWith('#')) return safeCodePoint(parseInt(lower.slice(1), 10), match);
    return ENTITIES[lower] ?? match;
  });
}

function safeCodePoint(code: number, fallback: string): string {
  return Number.isFinite(code) && code > 0 && code <= 0x10ffff ? String.fromCodePoint(code) : fallback;
}

/** Plain-text rendering of an HTML message body for the console. */
export function htmlToText(html: string): string {
  let text = html
    .replace(/<!--\s*\[if[\s\S]*?<!\s*\[endif\s*\]\s*-->/gi, '')
    .replace(/<!--[\s\S]*?-->/g, '')
    .replace(/<(head|style|script|title)[^>]*>[\s\S]*?<\/\1>/gi, '');

  text = text
    .replace(/<a\s[^>]*href\s*=\s*["']([^"']*)["'][^>]*>([\s\S]*?)<\/a>/gi, (_m, href: string, label: string) => {
      const inner = label.replace(/<[^>]+>/g, '').trim();
      if (!href || href.startsWith('mailto:') || inner === href || inner === '') return inner || href;
      return `${inner} [${href}]`;
    })
    .replace(/<br\s*\/?>/gi, '\n')
    .replace(/<li[^>]*>/gi, '\n- ')
    .replace(/<hr[^>]*>/gi, '\n----------\n')
    .replace(/<\/(p|div|tr|h[1-6]|ul|ol|table|blockquote)>/gi, '\n')
    .replace(/<(p|h[1-6])[^>]*>/gi, '\n')
    .replace(/<\/t[dh]>/gi, '\t')
    .replace(/<[^>]+>/g, '');

  return decodeEntities(text)
    .replace(/\r\n?/g, '\n')
    .split('\n')
    .map((line) => line.replace(/[ \t\u00a0]+/g, ' ').trim())
    .join('\n')
    .replace(/\n{3,}/g, '\n\n')
    .trim();
}

/** HTML body for an outgoing message typed as plain text, with an optional footer. */
export function textToHtml(text: string, footer?: string): string {
  const body = escapeHtml(text.replace(/\r\n?/g, '\n')).split('\n').join('<br>\n');
  const parts = [`<div style="font-family: Consolas, 'Courier New', monospace;">`, body, '</div>'];
  if (footer && footer.trim()) {
    parts.push(buildFooter(footer));
  }
  return parts.join('\n');
}

export function buildFooter(signature: string): string {
  const lines = signature.trim().split(/\r?\n/).map(escapeHtml).join('<br>\n');
  return `<div class="signature" style="color: #666666; border-top: 1px solid #cccccc; margin-top: 1em; padding-top: 0.5em;">\n${lines}\n</div>`;
}
