import { load } from 'cheerio';
import { hasChildren, isText, type AnyNode } from 'domhandler';
import { decodeHTML } from 'entities';

const HIDDEN_ELEMENTS = 'script, style, head, noscript, template';

/**
 * Visible text of an HTML body, one text node per line in document order.
 * Entities are decoded a second time after parsing, since some senders
 * escape their markup twice (`&amp;oacute;`).
 */
export function stripHtml(html: string): string {
  const $ = load(html);
  $(HIDDEN_ELEMENTS).remove();

  const lines: string[] = [];
  const walk = (node: AnyNode): void => {
    if (isText(node)) {
      const text = decodeHTML(node.data).trim();
      if (text) {
        lines.push(text);
      }
      return;
    }
    if (hasChildren(node)) {
      node.children.forEach(walk);
    }
  };

  $.root().toArray().forEach(walk);
  return lines.join('\n');
}
