/**
 * ledgergate approval gate — Line Diff
 *
 * Deterministic line diff for showing a reviewer what a file edit changes.
 * LCS over lines (O(n*m)); edits submitted for review are source files,
 * not bulk data.
 */

export type DiffOp = 'equal' | 'insert' | 'delete';

export interface DiffLine {
  readonly op: DiffOp;
  readonly text: string;
}

/** Split text into lines. A trailing newline does not start another line. */
export function splitLines(text: string): string[] {
  if (text === '') return [];
  const lines = text.split('\n');
  if (lines[lines.length - 1] === '') lines.pop();
  return lines;
}

/** Line-level edit script turning `original` into `proposed`. */
export function diffLines(original: string, proposed: string): DiffLine[] {
  const left = splitLines(original);
  const right = splitLines(proposed);
  const n = left.length;
  const m = right.length;

  // lcs[i][j]: LCS length of left[i..] and right[j..]
  const lcs: number[][] = Array.from({ length: n + 1 }, () => new Array<number>(m + 1).fill(0));
  const at = (i: number, j: number): number => lcs[i]?.[j] ?? 0;
  for (let i = n - 1; i >= 0; i--) {
    const row = lcs[i];
    if (row === undefined) continue;
    for (let j = m - 1; j >= 0; j--) {
      row[j] = left[i] === right[j] ? 1 + at(i + 1, j + 1) : Math.max(at(i + 1, j), at(i, j + 1));
    }
  }

  const out: DiffLine[] = [];
  let i = 0;
  let j = 0;
  while (i < n && j < m) {
    const l = left[i] ?? '';
    const r = right[j] ?? '';
    if (l === r) {
      out.push({ op: 'equal', text: l });
      i++;
      j++;
    } else if (at(i + 1, j) >= at(i, j + 1)) {
      out.push({ op: 'delete', text: l });
      i++;
    } else {
      out.push({ op: 'insert', text: r });
      j++;
    }
  }
  for (; i < n; i++) out.push({ op: 'delete', text: left[i] ?? '' });
  for (; j < m; j++) out.push({ op: 'insert', text: right[j] ?? '' });
  return out;
}

export interface UnifiedDiffOptions {
  /** Unchanged lines kept around each change. Default: 3. */
  readonly context?: number;
  readonly fromFile?: string;
  readonly toFile?: string;
}

/**
 * Unified diff of two texts, one output line per array element.
 * Identical texts produce no lines at all.
 */
export function unifiedDiff(original: string, proposed: string, opts?: UnifiedDiffOptions): string[] {
  const context = opts?.context ?? 3;
  const ops = diffLines(original, proposed);

  // Old/new 0-based positions before each op.
  const positions: Array<{ readonly oldPos: number; readonly newPos: number }> = [];
  let oldPos = 0;
  let newPos = 0;
  for (const op of ops) {
    positions.push({ oldPos, newPos });
    if (op.op !== 'insert') oldPos++;
    if (op.op !== 'delete') newPos++;
  }

  const changed = ops.flatMap((op, idx) => (op.op === 'equal' ? [] : [idx]));
  if (changed.length === 0) return [];

  // Group changes whose context windows touch.
  const groups: Array<[number, number]> = [];
  for (const idx of changed) {
    const start = Math.max(0, idx - context);
    const end = Math.min(ops.length - 1, idx + context);
    const last = groups[groups.length - 1];
    if (last !== undefined && start <= last[1] + 1) {
      last[1] = end;
    } else {
      groups.push([start, end]);
    }
  }

  const out = [`--- ${opts?.fromFile ?? 'original'}`, `+++ ${opts?.toFile ?? 'proposed'}`];
  for (const [start, end] of groups) {
    const slice = ops.slice(start, end + 1);
    const origin = positions[start] ?? { oldPos: 0, newPos: 0 };
    const oldCount = slice.filter((op) => op.op !== 'insert').length;
    const newCount = slice.filter((op) => op.op !== 'delete').length;
    out.push(`@@ -${formatRange(origin.oldPos, oldCount)} +${formatRange(origin.newPos, newCount)} @@`);
    for (const op of slice) {
      out.push((op.op === 'equal' ? ' ' : op.op === 'delete' ? '-' : '+') + op.text);
    }
  }
  return out;
}

/** Hunk range: `start,count` with the single-line and empty-range short forms. */
function formatRange(start: number, count: number): string {
  if (count === 1) return `${start + 1}`;
  if (count === 0) return `${start},0`;
  return `${start + 1},${count}`;
}
