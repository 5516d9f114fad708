/**
 * Heuristic table-reference extraction.
 *
 * Finds the sources named by FROM and JOIN clauses, including every entry of
 * a comma-separated FROM list and parenthesised sources. This is a pattern
 * scan, not a parse: it is shared by the SQL validator (allow-list
 * enforcement) and the audit recorder (top tables) so both agree on what a
 * statement touches.
 *
 * Structure (keywords, parentheses, commas) is read from a copy of the
 * statement whose quoted sections are blanked, so nothing inside a literal or
 * a quoted identifier can open or close a clause. Identifier text is read
 * from the original at the same offsets.
 */

const IDENTIFIER_PART = '(?:"(?:[^"]|"")+"|`(?:[^`]|``)+`|\\[[^\\]]+\\]|[A-Za-z_][\\w$]*)';

const QUALIFIED_IDENTIFIER = new RegExp(
  `^${IDENTIFIER_PART}(?:\\s*\\.\\s*${IDENTIFIER_PART})*`
);
const IDENTIFIER_PARTS = new RegExp(IDENTIFIER_PART, 'g');
const SOURCE_CLAUSE = /\b(FROM|JOIN|STRAIGHT_JOIN)\b/gi;
const SUBQUERY_START = /^\s*(?:SELECT|WITH|VALUES)\b/i;
const DOLLAR_QUOTE = /\$[A-Za-z_]*\$/;

/**
 * Reserved in every supported dialect, so never an unquoted alias. A FROM
 * list ends at the first of these at its own nesting level.
 */
const LIST_TERMINATOR = /(?:WHERE|GROUP|HAVING|ORDER|LIMIT|UNION|INTERSECT|EXCEPT)\b/iy;

/**
 * Functions whose argument syntax uses FROM without naming a table.
 */
const EXPRESSION_FROM_FUNCTIONS = new Set([
  'EXTRACT',
  'SUBSTRING',
  'TRIM',
  'POSITION',
  'OVERLAY',
]);

const QUOTE_CLOSERS: Record<string, string> = {
  "'": "'",
  '"': '"',
  '`': '`',
  '[': ']',
};

export interface TableScan {
  /** Qualifier stripped, unquoted, lowercased, in order of first appearance. */
  tables: string[];
  /**
   * False when some source could not be read as a table name or a subquery,
   * or the quoting is ambiguous across dialects. `tables` may then be short.
   */
  complete: boolean;
}

interface ScanContext {
  raw: string;
  masked: string;
  add(qualified: string): void;
}

/**
 * Scan a statement for the tables it reads.
 */
export function scanTableReferences(sql: string): TableScan {
  const tables: string[] = [];
  const seen = new Set<string>();
  const masked = maskQuoted(sql);
  let complete = masked !== null;

  const ctx: ScanContext = {
    raw: sql,
    masked: masked ?? sql,
    add: (qualified) => {
      const name = unqualify(qualified);
      if (name && !seen.has(name)) {
        seen.add(name);
        tables.push(name);
      }
    },
  };

  for (const clause of ctx.masked.matchAll(SOURCE_CLAUSE)) {
    const keyword = clause[1].toUpperCase();
    const clauseStart = clause.index ?? 0;
    const sourceStart = clauseStart + clause[0].length;

    if (keyword === 'FROM') {
      // `a IS [NOT] DISTINCT FROM b` compares values
      if (/\bDISTINCT\s+$/i.test(ctx.masked.slice(0, clauseStart))) continue;
      if (isExpressionFrom(ctx.masked, clauseStart)) continue;
      if (!readSourceList(ctx, sourceStart, ctx.masked.length)) complete = false;
    } else if (readSource(ctx, sourceStart, ctx.masked.length) === null) {
      complete = false;
    }
  }

  return { tables, complete };
}

/**
 * Referenced table names; whatever the scan could read.
 */
export function extractTableReferences(sql: string): string[] {
  return scanTableReferences(sql).tables;
}

/**
 * Blank the inside of every quoted section, keeping offsets. Null when a
 * quote is unterminated, a literal holds a backslash (an escape in MySQL,
 * plain text elsewhere), or the statement uses `#` comments or dollar quotes.
 */
function maskQuoted(sql: string): string | null {
  let out = '';
  let i = 0;

  while (i < sql.length) {
    const ch = sql[i];
    const closer = QUOTE_CLOSERS[ch];

    if (closer === undefined) {
      if (ch === '#') return null;
      out += ch;
      i++;
      continue;
    }

    let j = i + 1;
    for (;;) {
      if (j >= sql.length) return null;
      const inner = sql[j];
      if (inner === closer) {
        if (closer !== ']' && sql[j + 1] === closer) {
          j += 2;
          continue;
        }
        break;
      }
      if (inner === '\\' && (closer === "'" || closer === '"')) return null;
      j++;
    }

    out += ch + ' '.repeat(j - i - 1) + closer;
    i = j + 1;
  }

  return DOLLAR_QUOTE.test(out) ? null : out;
}

/**
 * Read a FROM list between `start` and `end`: a source after the keyword and
 * after every comma at this nesting level, up to a closing parenthesis, a
 * terminating keyword or the end.
 */
function readSourceList(ctx: ScanContext, start: number, end: number): boolean {
  const { masked } = ctx;
  if (readSource(ctx, start, end) === null) return false;

  let depth = 0;
  for (let i = start; i < end; i++) {
    const ch = masked[i];
    if (ch === '(') {
      depth++;
    } else if (ch === ')') {
      if (depth === 0) return true;
      depth--;
    } else if (depth === 0) {
      if (ch === ';') return true;
      if (ch === ',') {
        if (readSource(ctx, i + 1, end) === null) return false;
      } else if (isListTerminator(masked, i)) {
        return true;
      }
    }
  }
  return true;
}

/**
 * Read one source at `start`: a table name, or a parenthesised subquery or
 * source list. Returns the offset just past it, or null when it is neither.
 */
function readSource(ctx: ScanContext, start: number, end: number): number | null {
  const { raw, masked } = ctx;
  let pos = start;
  while (pos < end && /\s/.test(masked[pos])) pos++;
  if (pos >= end) return null;

  if (masked[pos] === '(') {
    const close = matchingParen(masked, pos, end);
    if (close < 0) return null;
    // Subqueries are covered by their own FROM clauses
    if (!SUBQUERY_START.test(masked.slice(pos + 1, close)) && !readSourceList(ctx, pos + 1, close)) {
      return null;
    }
    return close + 1;
  }

  const identifier = QUALIFIED_IDENTIFIER.exec(raw.slice(pos, end));
  if (!identifier) return null;
  ctx.add(identifier[0]);
  return pos + identifier[0].length;
}

function matchingParen(masked: string, open: number, end: number): number {
  let depth = 0;
  for (let i = open; i < end; i++) {
    if (masked[i] === '(') {
      depth++;
    } else if (masked[i] === ')') {
      depth--;
      if (depth === 0) return i;
    }
  }
  return -1;
}

/**
 * A terminating keyword starting at `index`. Words after a `.` are column
 * names (MySQL lets reserved words follow a qualifier unquoted).
 */
function isListTerminator(masked: string, index: number): boolean {
  const before = masked.slice(0, index);
  if (/[\w$]$/.test(before) || /\.\s*$/.test(before)) return false;
  LIST_TERMINATOR.lastIndex = index;
  return LIST_TERMINATOR.test(masked);
}

/**
 * True when the FROM at `index` sits directly inside EXTRACT(...) and friends.
 */
function isExpressionFrom(masked: string, index: number): boolean {
  let depth = 0;
  for (let i = index - 1; i >= 0; i--) {
    const ch = masked[i];
    if (ch === ')') {
      depth++;
    } else if (ch === '(') {
      if (depth === 0) {
        const callee = /([A-Za-z_]+)\s*$/.exec(masked.slice(0, i));
        return callee !== null && EXPRESSION_FROM_FUNCTIONS.has(callee[1].toUpperCase());
      }
      depth--;
    }
  }
  return false;
}

function unqualify(qualified: string): string {
  const parts = qualified.match(IDENTIFIER_PARTS) ?? [];
  return unquote(parts[parts.length - 1] ?? '').toLowerCase();
}

function unquote(part: string): string {
  const open = part[0];
  if (open === '"' || open === '`') {
    return part.slice(1, -1).split(open + open).join(open);
  }
  if (open === '[') {
    return part.slice(1, -1);
  }
  return part;
}
