/**
 * Expands a problem selection.
 *
 *   "A~E"    -> ["A", "B", "C", "D", "E"]
 *   "A B C"  -> ["A", "B", "C"]
 *   "A,B,C"  -> ["A", "B", "C"]
 *
 * Only single-character ranges are expanded (and uppercased); anything else
 * keeps its case and is split on commas and whitespace.
 */
export function parseProblemRange(input: string): string[] {
  const parts = input.split('~');
  if (parts.length === 2) {
    const start = (parts[0] ?? '').trim().toUpperCase();
    const end = (parts[1] ?? '').trim().toUpperCase();
    if (start.length === 1 && end.length === 1) {
      const problems: string[] = [];
      for (let code = start.charCodeAt(0); code <= end.charCodeAt(0); code++) {
        problems.push(String.fromCharCode(code));
      }
      return problems;
    }
  }

  return input
    .replaceAll(',', ' ')
    .split(/\s+/)
    .filter((part) => part.length > 0);
}
