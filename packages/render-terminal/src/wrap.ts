const WRAP_AFTER: ReadonlySet<string> = new Set([" ", "/", "-"]);

/**
 * Splits `chars` into rows of at most `width` characters, as `[start, end)`
 * index pairs. A row ends after the last space, `/` or `-` that fits when
 * there is one; otherwise it is cut at `width`. Always returns at least one
 * row.
 */
export function wrapRows(
  chars: readonly string[],
  width: number
): Array<readonly [number, number]> {
  const rows: Array<readonly [number, number]> = [];
  let start = 0;
  if (width > 0) {
    while (chars.length - start > width) {
      let end = start + width;
      for (let index = end - 1; index > start; index--) {
        if (WRAP_AFTER.has(chars[index] ?? "")) {
          end = index + 1;
          break;
        }
      }
      rows.push([start, end]);
      start = end;
    }
  }
  rows.push([start, chars.length]);
  return rows;
}
