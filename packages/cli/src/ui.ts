// ============================================================================
// @toonbench/cli — Terminal UI Helpers
// ============================================================================

export interface ThemeOptions {
  color: boolean;
  unicode: boolean;
}

const UNICODE_CHARS = {
  line: '─',
  doubleLine: '═',
  boxH: '─',
  tableH: '═',
  tableH2: '─',
  tableV: '║',
  tableTL: '╔',
  tableTR: '╗',
  tableBL: '╚',
  tableBR: '╝',
  tableJoin: '╬',
  tableLeftJoin: '╠',
  tableRightJoin: '╣',
  check: '✓',
  cross: '✗',
  arrow: '→',
};

const ASCII_CHARS: typeof UNICODE_CHARS = {
  line: '-',
  doubleLine: '=',
  boxH: '-',
  tableH: '=',
  tableH2: '-',
  tableV: '|',
  tableTL: '+',
  tableTR: '+',
  tableBL: '+',
  tableBR: '+',
  tableJoin: '+',
  tableLeftJoin: '+',
  tableRightJoin: '+',
  check: '[ok]',
  cross: '[x]',
  arrow: '->',
};

const ANSI = {
  reset: '\x1b[0m',
  bold: '\x1b[1m',
  dim: '\x1b[2m',
  red: '\x1b[31m',
  yellow: '\x1b[33m',
  cyan: '\x1b[36m',
  brightGreen: '\x1b[92m',
  brightCyan: '\x1b[96m',
  brightWhite: '\x1b[97m',
};

/** Strip ANSI escape codes for width calculation */
export function stripAnsi(str: string): string {
  return str.replace(/\x1b\[[0-9;]*m/g, '');
}

export function padR(s: string, n: number): string {
  return s + ' '.repeat(Math.max(0, n - stripAnsi(s).length));
}

export function padL(s: string, n: number): string {
  return ' '.repeat(Math.max(0, n - stripAnsi(s).length)) + s;
}

export type Theme = ReturnType<typeof createTheme>;

/**
 * Color and box-drawing helpers for one output stream.
 */
export function createTheme(options: ThemeOptions) {
  const chars = options.unicode ? UNICODE_CHARS : ASCII_CHARS;

  const clr = (color: string, text: string): string => (options.color ? `${color}${text}${ANSI.reset}` : text);
  const heading = (text: string): string => clr(ANSI.bold + ANSI.brightWhite, text);

  return {
    chars,
    clr,
    heading,
    pass: (text: string) => clr(ANSI.brightGreen, text),
    fail: (text: string) => clr(ANSI.red, text),
    warn: (text: string) => clr(ANSI.yellow, text),
    info: (text: string) => clr(ANSI.cyan, text),
    dimText: (text: string) => clr(ANSI.dim, text),
    number$: (text: string) => clr(ANSI.brightCyan, text),
    rule: (width = 60) => chars.doubleLine.repeat(width),

    /**
     * Draw a comparison table: one header row, then data rows. Cells may
     * carry color codes; widths are measured without them.
     */
    drawComparisonTable(title: string, headers: string[], rows: string[][]): string {
      const colWidths = headers.map((h, i) => {
        const maxRowVal = Math.max(0, ...rows.map((r) => stripAnsi(r[i] ?? '').length));
        return Math.max(h.length, maxRowVal);
      });

      const totalWidth = colWidths.reduce((a, b) => a + b + 3, -1);
      const borderH = clr(ANSI.dim, chars.tableH.repeat(totalWidth));
      const borderH2 = clr(ANSI.dim, chars.tableH2.repeat(totalWidth));
      const borderV = clr(ANSI.dim, chars.tableV);
      const join = clr(ANSI.dim, chars.tableJoin);

      const out: string[] = [];
      out.push(`${clr(ANSI.dim, chars.tableTL)}${borderH}${clr(ANSI.dim, chars.tableTR)}`);

      if (title) {
        const titlePadding = Math.max(0, totalWidth - title.length);
        const left = Math.floor(titlePadding / 2);
        out.push(`${borderV}${' '.repeat(left)}${heading(title)}${' '.repeat(titlePadding - left)}${borderV}`);
        out.push(`${clr(ANSI.dim, chars.tableLeftJoin)}${borderH}${clr(ANSI.dim, chars.tableRightJoin)}`);
      }

      out.push(`${borderV}${headers.map((h, i) => ` ${padR(clr(ANSI.bold, h), colWidths[i])} `).join(borderV)}${borderV}`);
      out.push(
        `${clr(ANSI.dim, chars.tableLeftJoin)}${colWidths
          .map((w) => clr(ANSI.dim, chars.boxH.repeat(w + 2)))
          .join(join)}${clr(ANSI.dim, chars.tableRightJoin)}`,
      );

      for (const row of rows) {
        const cells = colWidths.map((w, i) => {
          const cell = row[i] ?? '';
          // Left-align the first column, right-align figures.
          return ` ${i === 0 ? padR(cell, w) : padL(cell, w)} `;
        });
        out.push(`${borderV}${cells.join(borderV)}${borderV}`);
      }

      out.push(`${clr(ANSI.dim, chars.tableBL)}${borderH2}${clr(ANSI.dim, chars.tableBR)}`);
      return out.join('\n');
    },
  };
}

/**
 * Whether stdout should get color, following the usual NO_COLOR / FORCE_COLOR
 * conventions.
 */
export function supportsColor(argv: string[], env: NodeJS.ProcessEnv, isTTY: boolean): boolean {
  if (argv.includes('--no-color') || env.NO_COLOR === '1') return false;
  if (argv.includes('--color') || env.FORCE_COLOR === '1') return true;
  return isTTY;
}

export function supportsUnicode(argv: string[], env: NodeJS.ProcessEnv): boolean {
  if (argv.includes('--ascii') || env.TOONBENCH_ASCII === '1') return false;
  if (argv.includes('--unicode')) return true;
  const locale = `${env.LC_ALL ?? ''} ${env.LC_CTYPE ?? ''} ${env.LANG ?? ''}`.toLowerCase();
  return locale.includes('utf-8') || locale.includes('utf8');
}
