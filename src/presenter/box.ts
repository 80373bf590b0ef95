import pc from 'picocolors';

export type Colors = ReturnType<typeof pc.createColors>;
type Style = (text: string) => string;

export type Column = {
  header: string;
  align?: 'left' | 'right';
  style?: Style;
};

export type TableSpec = {
  title?: string;
  columns: Column[];
  rows: string[][];
  /** Rows drawn in bold below a separator, e.g. a total. */
  footer?: string[][];
};

export type PanelLine = {
  text: string;
  style?: Style;
};

export type PanelSpec = {
  title?: string;
  lines: PanelLine[];
};

const rule = (widths: number[], left: string, mid: string, right: string) =>
  left + widths.map((w) => '─'.repeat(w + 2)).join(mid) + right;

// Pads before styling so escape codes never count toward the width.
const cell = (text: string, width: number, align: Column['align'], style: Style) => {
  const pad = ' '.repeat(Math.max(0, width - text.length));
  return align === 'right' ? pad + style(text) : style(text) + pad;
};

export const renderTable = (table: TableSpec, colors: Colors): string[] => {
  const { columns, rows, footer = [] } = table;
  const widths = columns.map((c, i) =>
    Math.max(c.header.length, ...[...rows, ...footer].map((r) => (r[i] ?? '').length))
  );
  const border = colors.dim;

  const row = (values: string[], styleOf: (c: Column) => Style) =>
    border('│ ') +
    columns
      .map((c, i) => cell(values[i] ?? '', widths[i], c.align, styleOf(c)))
      .join(border(' │ ')) +
    border(' │');

  const lines: string[] = [];
  if (table.title) {
    const total = widths.reduce((sum, w) => sum + w + 3, 1);
    const indent = Math.max(0, Math.floor((total - table.title.length) / 2));
    lines.push(' '.repeat(indent) + colors.italic(table.title));
  }
  lines.push(border(rule(widths, '╭', '┬', '╮')));
  lines.push(row(columns.map((c) => c.header), () => (t) => colors.bold(colors.magenta(t))));
  lines.push(border(rule(widths, '├', '┼', '┤')));
  for (const values of rows) {
    lines.push(row(values, (c) => c.style ?? String));
  }
  if (footer.length > 0) {
    lines.push(border(rule(widths, '├', '┼', '┤')));
    for (const values of footer) {
      lines.push(row(values, (c) => (t) => colors.bold((c.style ?? String)(t))));
    }
  }
  lines.push(border(rule(widths, '╰', '┴', '╯')));
  return lines;
};

export const renderPanel = (panel: PanelSpec, colors: Colors): string[] => {
  const title = panel.title ? ` ${panel.title} ` : '';
  const width = Math.max(title.length - 2, ...panel.lines.map((l) => l.text.length));
  const fill = width + 2 - title.length;
  const left = Math.floor(fill / 2);
  const border = colors.blue;

  return [
    border('╭' + '─'.repeat(left) + title + '─'.repeat(fill - left) + '╮'),
    ...panel.lines.map(
      ({ text, style = String }) =>
        border('│ ') + style(text) + ' '.repeat(width - text.length) + border(' │')
    ),
    border('╰' + '─'.repeat(width + 2) + '╯'),
  ];
};
