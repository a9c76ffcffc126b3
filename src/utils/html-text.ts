import * as cheerio from 'cheerio';

const BLOCK_ELEMENTS = [
  'address',
  'article',
  'aside',
  'blockquote',
  'dd',
  'div',
  'dl',
  'dt',
  'figcaption',
  'figure',
  'footer',
  'h1',
  'h2',
  'h3',
  'h4',
  'h5',
  'h6',
  'header',
  'hr',
  'li',
  'ol',
  'p',
  'pre',
  'section',
  'table',
  'tr',
  'td',
  'th',
  'ul',
].join(', ');

// U+2028 survives whitespace collapsing and marks where a line ends.
const LINE_BREAK = '\u2028';

/**
 * True when the string contains at least one tag-like token.
 */
export function hasMarkup(content: string): boolean {
  return /<[a-zA-Z!/][^>]*>/.test(content);
}

function markupToLines(content: string): string[] {
  const $ = cheerio.load(content);
  $('head, title, style, script, template').remove();

  $('pre').each((_, element) => {
    const pre = $(element);
    pre.text(pre.text().replace(/\r?\n/g, LINE_BREAK));
  });
  $('br').replaceWith(LINE_BREAK);
  $(BLOCK_ELEMENTS).before(LINE_BREAK).after(LINE_BREAK);

  return $.root()
    .text()
    .replace(/[ \t\n\f\r]+/g, ' ')
    .replace(/\u00a0/g, ' ')
    .split(LINE_BREAK);
}

/**
 * Render rich content to plain text, one line per block.
 *
 * Markup follows HTML whitespace rules: source newlines collapse, while block
 * boundaries (table cells included) and `<br>` start a new line and `<pre>`
 * keeps its own breaks. Entities are decoded. Content without any tags is
 * taken as plain text and keeps its own line breaks. Lines are trimmed and
 * blank lines dropped, so the first line is always the first visible text.
 */
export function htmlToPlainText(content: string): string {
  if (!content) {
    return '';
  }

  const lines = hasMarkup(content) ? markupToLines(content) : content.split(/\r?\n/);
  return lines
    .map((line) => line.trim())
    .filter((line) => line.length > 0)
    .join('\n');
}
