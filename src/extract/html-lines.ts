import { JSDOM } from 'jsdom';

/** Elements whose boundaries end the current text line. */
const BLOCK_ELEMENTS = new Set([
  'ADDRESS',
  'ARTICLE',
  'ASIDE',
  'BLOCKQUOTE',
  'BR',
  'DD',
  'DIV',
  'DL',
  'DT',
  'FIGCAPTION',
  'FIGURE',
  'FOOTER',
  'H1',
  'H2',
  'H3',
  'H4',
  'H5',
  'H6',
  'HEADER',
  'HR',
  'LI',
  'MAIN',
  'NAV',
  'OL',
  'P',
  'SECTION',
  'TABLE',
  'TD',
  'TH',
  'TR',
  'UL'
]);

/** Elements whose text is never visible. */
const SKIPPED_ELEMENTS = new Set(['SCRIPT', 'STYLE', 'NOSCRIPT', 'TEMPLATE', 'SVG']);

/**
 * Convert rendered HTML into the flat visible-text line list used by the
 * anchored-segment extractor. Block boundaries break lines; whitespace inside a
 * line is collapsed and empty lines are dropped.
 */
export function htmlToLines(html: string): string[] {
  const dom = new JSDOM(html);
  try {
    const { document } = dom.window;
    const { TEXT_NODE, ELEMENT_NODE } = dom.window.Node;
    const lines: string[] = [];
    let current = '';

    const flush = (): void => {
      const line = current.replace(/\s+/g, ' ').trim();
      if (line.length > 0) {
        lines.push(line);
      }
      current = '';
    };

    const walk = (node: Node): void => {
      if (node.nodeType === TEXT_NODE) {
        current += node.textContent ?? '';
        return;
      }
      if (node.nodeType !== ELEMENT_NODE) {
        return;
      }

      const tagName = node.nodeName.toUpperCase();
      if (SKIPPED_ELEMENTS.has(tagName)) {
        return;
      }

      const isBlock = BLOCK_ELEMENTS.has(tagName);
      if (isBlock) {
        flush();
      }
      for (const child of Array.from(node.childNodes)) {
        walk(child);
      }
      if (isBlock) {
        flush();
      }
    };

    walk(document.body);
    flush();
    return lines;
  } finally {
    dom.window.close();
  }
}
