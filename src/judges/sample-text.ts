import { decode } from 'html-entities';

const NBSP = /\u00a0/g;

/**
 * Turns the inner HTML of a sample <pre> into plain text.
 *
 * Line-structuring tags (<br>, the per-line <div>s some judges use) become
 * newlines, remaining tags are dropped, entities are decoded, trailing
 * spaces and blank lines are removed.
 *
 * @example cleanSampleText('1&nbsp;2<br/>3 4') // '1 2\n3 4'
 */
export function cleanSampleText(html: string): string {
  const text = html
    .replace(/\r\n?/g, '\n')
    .replace(/<br\s*\/?>/gi, '\n')
    .replace(/<\/div>/gi, '\n')
    .replace(/<\/?[a-z][^<>]*>/gi, '');

  return decode(text)
    .replace(NBSP, ' ')
    .split('\n')
    .map((line) => line.replace(/[ \t]+$/, ''))
    .join('\n')
    .replace(/\n{2,}/g, '\n')
    .trim();
}
