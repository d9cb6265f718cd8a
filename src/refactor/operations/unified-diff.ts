/**
 * Unified diff rendering for preview mode
 */

import { splitLines } from '../../parsers/python-tokenizer.js';

const CONTEXT_LINES = 3;

interface Edit {
  type: ' ' | '-' | '+';
  line: string;
  /** Position in the original before this edit */
  oldPos: number;
  /** Position in the fixed text before this edit */
  newPos: number;
}

type Change = Pick<Edit, 'type' | 'line'>;

/**
 * Find a point on a shortest edit path between `a[aLo..aHi)` and
 * `b[bLo..bHi)` by running the forward and backward searches until they
 * meet (Myers, "An O(ND) Difference Algorithm and Its Variations").
 * Both ranges must be non-empty.
 */
function middleSnake(
  a: string[],
  aLo: number,
  aHi: number,
  b: string[],
  bLo: number,
  bHi: number
): [number, number] | undefined {
  const n = aHi - aLo;
  const m = bHi - bLo;
  const maxD = Math.ceil((n + m) / 2);
  const offset = maxD;
  const length = 2 * maxD + 2;
  const forward = new Int32Array(length).fill(-1);
  const backward = new Int32Array(length).fill(-1);
  forward[offset + 1] = 0;
  backward[offset + 1] = 0;

  const delta = n - m;
  // With an odd delta the paths meet on a forward step, otherwise on a backward one
  const checkOnForward = delta % 2 !== 0;

  // Diagonals that ran off the grid are not extended again
  let forwardStart = 0;
  let forwardEnd = 0;
  let backwardStart = 0;
  let backwardEnd = 0;

  for (let d = 0; d < maxD; d++) {
    for (let k = -d + forwardStart; k <= d - forwardEnd; k += 2) {
      const index = offset + k;
      let x = k === -d || (k !== d && forward[index - 1] < forward[index + 1])
        ? forward[index + 1]
        : forward[index - 1] + 1;
      let y = x - k;
      while (x < n && y < m && a[aLo + x] === b[bLo + y]) {
        x++;
        y++;
      }
      forward[index] = x;

      if (x > n) {
        forwardEnd += 2;
      } else if (y > m) {
        forwardStart += 2;
      } else if (checkOnForward) {
        const other = offset + delta - k;
        if (other >= 0 && other < length && backward[other] !== -1 && x >= n - backward[other]) {
          return [aLo + x, bLo + y];
        }
      }
    }

    for (let k = -d + backwardStart; k <= d - backwardEnd; k += 2) {
      const index = offset + k;
      let x = k === -d || (k !== d && backward[index - 1] < backward[index + 1])
        ? backward[index + 1]
        : backward[index - 1] + 1;
      let y = x - k;
      while (x < n && y < m && a[aHi - 1 - x] === b[bHi - 1 - y]) {
        x++;
        y++;
      }
      backward[index] = x;

      if (x > n) {
        backwardEnd += 2;
      } else if (y > m) {
        backwardStart += 2;
      } else if (!checkOnForward) {
        const other = offset + delta - k;
        if (other >= 0 && other < length && forward[other] !== -1) {
          const forwardX = forward[other];
          const forwardY = forwardX - (delta - k);
          if (forwardX >= n - x) {
            return [aLo + forwardX, bLo + forwardY];
          }
        }
      }
    }
  }

  return undefined;
}

function pushReplacement(
  a: string[],
  aLo: number,
  aHi: number,
  b: string[],
  bLo: number,
  bHi: number,
  script: Change[]
): void {
  for (let i = aLo; i < aHi; i++) script.push({ type: '-', line: a[i] });
  for (let j = bLo; j < bHi; j++) script.push({ type: '+', line: b[j] });
}

function diffRange(
  a: string[],
  aLo: number,
  aHi: number,
  b: string[],
  bLo: number,
  bHi: number,
  script: Change[]
): void {
  while (aLo < aHi && bLo < bHi && a[aLo] === b[bLo]) {
    script.push({ type: ' ', line: a[aLo] });
    aLo++;
    bLo++;
  }

  let aEnd = aHi;
  let bEnd = bHi;
  while (aEnd > aLo && bEnd > bLo && a[aEnd - 1] === b[bEnd - 1]) {
    aEnd--;
    bEnd--;
  }

  const split = aLo === aEnd || bLo === bEnd ? undefined : middleSnake(a, aLo, aEnd, b, bLo, bEnd);

  if (split === undefined || (split[0] === aLo && split[1] === bLo) || (split[0] === aEnd && split[1] === bEnd)) {
    pushReplacement(a, aLo, aEnd, b, bLo, bEnd, script);
  } else {
    diffRange(a, aLo, split[0], b, bLo, split[1], script);
    diffRange(a, split[0], aEnd, b, split[1], bEnd, script);
  }

  for (let i = aEnd; i < aHi; i++) {
    script.push({ type: ' ', line: a[i] });
  }
}

/**
 * Line-level edit script between two line lists. Within each run of
 * changes the removed lines come before the added ones.
 */
function diffLines(original: string[], fixed: string[]): Edit[] {
  const script: Change[] = [];
  diffRange(original, 0, original.length, fixed, 0, fixed.length, script);

  const edits: Edit[] = [];
  let oldPos = 0;
  let newPos = 0;
  let i = 0;

  while (i < script.length) {
    if (script[i].type === ' ') {
      edits.push({ ...script[i], oldPos, newPos });
      oldPos++;
      newPos++;
      i++;
      continue;
    }

    let end = i;
    while (end < script.length && script[end].type !== ' ') end++;
    const run = script.slice(i, end);

    for (const change of run.filter((entry) => entry.type === '-')) {
      edits.push({ ...change, oldPos, newPos });
      oldPos++;
    }
    for (const change of run.filter((entry) => entry.type === '+')) {
      edits.push({ ...change, oldPos, newPos });
      newPos++;
    }
    i = end;
  }

  return edits;
}

/** Group edits into hunks of changes with surrounding context */
function groupHunks(edits: Edit[]): Edit[][] {
  const hunks: Edit[][] = [];
  let i = 0;

  while (i < edits.length) {
    if (edits[i].type === ' ') {
      i++;
      continue;
    }

    const start = Math.max(0, i - CONTEXT_LINES);
    let lastChange = i;
    let j = i;

    while (j < edits.length) {
      if (edits[j].type !== ' ') {
        lastChange = j;
        j++;
        continue;
      }
      let k = j;
      while (k < edits.length && edits[k].type === ' ') k++;
      // Nearby changes share a hunk
      if (k < edits.length && k - j <= CONTEXT_LINES * 2) {
        j = k;
        continue;
      }
      break;
    }

    const stop = Math.min(edits.length, lastChange + 1 + CONTEXT_LINES);
    hunks.push(edits.slice(start, stop));
    i = stop;
  }

  return hunks;
}

function formatRange(start: number, length: number): string {
  if (length === 1) return `${start + 1}`;
  if (length === 0) return `${start},0`;
  return `${start + 1},${length}`;
}

function hunkHeader(hunk: Edit[]): string {
  const oldLength = hunk.filter((edit) => edit.type !== '+').length;
  const newLength = hunk.filter((edit) => edit.type !== '-').length;
  return `@@ -${formatRange(hunk[0].oldPos, oldLength)} +${formatRange(hunk[0].newPos, newLength)} @@\n`;
}

/**
 * Unified diff of two versions of a file, `original/<name>` against
 * `fixed/<name>`. Empty when the texts are identical.
 */
export function getDiffText(original: string, fixed: string, filename: string): string {
  if (original === fixed) return '';

  const hunks = groupHunks(diffLines(splitLines(original), splitLines(fixed)));
  if (hunks.length === 0) return '';

  let text = `--- original/${filename}\n+++ fixed/${filename}\n`;

  for (const hunk of hunks) {
    text += hunkHeader(hunk);
    for (const edit of hunk) {
      text += edit.type + edit.line;
      if (!edit.line.endsWith('\n')) {
        text += '\n\\ No newline at end of file\n';
      }
    }
  }

  return text;
}
