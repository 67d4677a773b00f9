export type Alignment = 'left' | 'right';

/**
 * Renders rows of text as fixed-width columns separated by two spaces.
 * Trailing whitespace is stripped from every line.
 */
export const renderTextTable = (rows: readonly string[][], align: readonly Alignment[] = []): string => {
  const widths: number[] = [];
  rows.forEach(row => {
    row.forEach((cell, c) => {
      widths[c] = Math.max(widths[c] ?? 0, cell.length);
    });
  });

  return rows
    .map(row =>
      row
        .map((cell, c) => (align[c] === 'right' ? cell.padStart(widths[c]) : cell.padEnd(widths[c])))
        .join('  ')
        .trimEnd()
    )
    .join('\n');
};
