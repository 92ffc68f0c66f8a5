import { JSDOM } from 'jsdom';

// Summary box isolation and text cleanup for rendered MediaWiki pages

const LINE_ENDING_ELEMENTS = 'tr, th, td, caption, li, p, div';

/**
 * First element whose class list contains `infobox`, in document order.
 */
export function findInfobox(html: string): Element | null {
  const { document } = new JSDOM(html).window;
  return document.querySelector('.infobox');
}

/**
 * Visible text of an element; every cell, row and line break ends a line.
 * Mutates the element, so pass one from a document you own.
 */
export function elementText(element: Element): string {
  element.querySelectorAll('style, script').forEach((node) => node.remove());
  element.querySelectorAll('br').forEach((br) => br.replaceWith('\n'));
  element.querySelectorAll(LINE_ENDING_ELEMENTS).forEach((node) => node.append('\n'));
  return element.textContent ?? '';
}

/**
 * Replace anything outside printable ASCII with a space, then collapse
 * repeated spaces and repeated newlines.
 */
export function cleanText(text: string): string {
  const printable = text.replace(/[^\x20-\x7e\t\n\r\x0b\x0c]/g, ' ');
  return printable.replace(/ +/g, ' ').replace(/\n+/g, '\n');
}

export function infoboxText(html: string): string | undefined {
  const infobox = findInfobox(html);
  return infobox === null ? undefined : cleanText(elementText(infobox));
}
