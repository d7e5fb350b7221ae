/**
 * TOON (Token-Oriented Object Notation) encoding for prompt tables.
 *
 * Example:
 * Input: [{ id: 1, source: "a.md" }, { id: 2, source: "b.md" }]
 * Output:
 * ```
 * [2]{id,source}:
 *   1,a.md
 *   2,b.md
 * ```
 */

export type ToonValue = string | number | boolean | null | undefined;

export function arrayToToon<T extends Record<string, ToonValue>>(
  array: readonly T[],
  fields: ReadonlyArray<keyof T & string>,
): string {
  if (array.length === 0) {
    return '[0]';
  }

  const header = `[${array.length}]{${fields.join(',')}}:`;

  const rows = array.map(row =>
    fields
      .map(field => {
        const value = row[field];
        if (value === null || value === undefined) {
          return '';
        }
        if (typeof value === 'string') {
          // Commas separate cells and newlines separate rows
          return value.replace(/,/g, '\\,').replace(/\n/g, '\\n');
        }
        return String(value);
      })
      .join(','),
  );

  return `${header}\n  ${rows.join('\n  ')}`;
}
