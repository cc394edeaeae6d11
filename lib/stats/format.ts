import { formatCell, type Column } from './columns'

/**
 * Render rows as a fixed-width text table (header, dashed rule, one line per row).
 * Trailing spaces are trimmed from every line.
 */
export function formatTable<Row>(columns: readonly Column<Row>[], rows: readonly Row[]): string {
  const cells = rows.map((row) => columns.map((c) => formatCell(c.value(row))))
  const widths = columns.map((c, i) => Math.max(c.label.length, ...cells.map((line) => line[i].length)))

  const render = (values: readonly string[]) =>
    values
      .map((v, i) => (columns[i].align === 'right' ? v.padStart(widths[i]) : v.padEnd(widths[i])))
      .join('  ')
      .trimEnd()

  const lines = [render(columns.map((c) => c.label)), widths.map((w) => '-'.repeat(w)).join('  ')]
  for (const line of cells) lines.push(render(line))
  return lines.join('\n')
}
