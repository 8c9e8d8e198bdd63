import { diffArrays } from "diff";
import {
  CellChange,
  ChangePayload,
  DiffResult,
  TableCell,
  TableDiff,
  TextDiff,
  TextSpan,
  cellKey
} from "../types.js";

const SAMPLE_VALUE_LENGTH = 80;

export type TextDiffSummary = {
  kind: "text";
  charsAdded: number;
  charsRemoved: number;
  sampleSpans: TextSpan[];
};

export type TableDiffSummary = {
  kind: "table";
  changedCells: number;
  sampleCells: CellChange[];
};

export type DiffSummary = TextDiffSummary | TableDiffSummary;

export function tokenizeText(text: string): string[] {
  return text.match(/\s+|\S+/g) ?? [];
}

export function diffText(before: string, after: string): TextDiff {
  const spans: TextSpan[] = [];
  let deleted = "";
  let inserted = "";

  const flush = (): void => {
    if (deleted) {
      spans.push({ tag: "delete", text: deleted });
    }
    if (inserted) {
      spans.push({ tag: "insert", text: inserted });
    }
    deleted = "";
    inserted = "";
  };

  for (const part of diffArrays(tokenizeText(before), tokenizeText(after))) {
    const text = part.value.join("");
    if (part.removed) {
      deleted += text;
      continue;
    }
    if (part.added) {
      inserted += text;
      continue;
    }

    flush();
    const last = spans[spans.length - 1];
    if (last && last.tag === "equal") {
      last.text += text;
    } else if (text) {
      spans.push({ tag: "equal", text });
    }
  }
  flush();

  return { kind: "text", spans };
}

export function toCellMap(cells: TableCell[]): Map<string, TableCell> {
  const map = new Map<string, TableCell>();
  for (const cell of cells) {
    const key = cellKey(cell.row, cell.col);
    if (map.has(key)) {
      throw new Error(`Duplicate table cell (${cell.row}, ${cell.col}).`);
    }
    map.set(key, cell);
  }
  return map;
}

export function diffTable(before: TableCell[], after: TableCell[]): TableDiff {
  const beforeMap = toCellMap(before);
  const afterMap = toCellMap(after);
  const cells: CellChange[] = [];

  for (const [key, cell] of beforeMap.entries()) {
    const next = afterMap.get(key);
    if (next && next.value === cell.value) {
      continue;
    }
    cells.push({ row: cell.row, col: cell.col, old: cell.value, new: next ? next.value : null });
  }
  for (const [key, cell] of afterMap.entries()) {
    if (!beforeMap.has(key)) {
      cells.push({ row: cell.row, col: cell.col, old: null, new: cell.value });
    }
  }

  cells.sort((left, right) => left.row - right.row || left.col - right.col);
  return { kind: "table", cells };
}

export function computeDiff(payload: ChangePayload): DiffResult {
  if (payload.kind === "table") {
    return diffTable(payload.before, payload.after);
  }
  return diffText(payload.before, payload.after);
}

export function applyCellChanges(cells: TableCell[], changes: CellChange[]): TableCell[] {
  const map = toCellMap(cells);
  for (const change of changes) {
    const key = cellKey(change.row, change.col);
    if (change.new === null) {
      map.delete(key);
    } else {
      map.set(key, { row: change.row, col: change.col, value: change.new });
    }
  }
  return [...map.values()].sort((left, right) => left.row - right.row || left.col - right.col);
}

function truncate(value: string | null): string | null {
  return value === null ? null : value.slice(0, SAMPLE_VALUE_LENGTH);
}

export function summarizeDiff(diff: DiffResult, maxItems?: number): DiffSummary {
  if (diff.kind === "table") {
    return {
      kind: "table",
      changedCells: diff.cells.length,
      sampleCells: diff.cells.slice(0, maxItems ?? 12).map((cell) => ({
        row: cell.row,
        col: cell.col,
        old: truncate(cell.old),
        new: truncate(cell.new)
      }))
    };
  }

  let charsAdded = 0;
  let charsRemoved = 0;
  for (const span of diff.spans) {
    if (span.tag === "insert") {
      charsAdded += span.text.length;
    } else if (span.tag === "delete") {
      charsRemoved += span.text.length;
    }
  }

  return {
    kind: "text",
    charsAdded,
    charsRemoved,
    sampleSpans: diff.spans
      .filter((span) => span.tag !== "equal")
      .slice(0, maxItems ?? 8)
      .map((span) => ({ tag: span.tag, text: span.text.slice(0, SAMPLE_VALUE_LENGTH) }))
  };
}
