import { DocumentBackend, Scope, ScopeContent, TableCell, WritePayload, cellKey } from "../types.js";
import { locatorsOverlap, parseScopeLocator } from "./scopeLocator.js";

type MemoryDocument = {
  paragraphs: string[];
  tables: Array<Map<string, TableCell>>;
};

export type MemoryDocumentInit = {
  paragraphs: string[];
  tables?: TableCell[][];
};

function sortCells(cells: Iterable<TableCell>): TableCell[] {
  return [...cells]
    .map((cell) => ({ ...cell }))
    .sort((left, right) => left.row - right.row || left.col - right.col);
}

export class MemoryDocumentBackend implements DocumentBackend {
  private readonly documents = new Map<string, MemoryDocument>();
  private readonly backups = new Map<string, MemoryDocumentInit>();

  load(documentId: string, init: MemoryDocumentInit): void {
    this.documents.set(documentId, {
      paragraphs: [...init.paragraphs],
      tables: (init.tables ?? []).map(
        (cells) => new Map(cells.map((cell) => [cellKey(cell.row, cell.col), { ...cell }]))
      )
    });
  }

  export(documentId: string): MemoryDocumentInit {
    const document = this.requireDocument(documentId);
    return {
      paragraphs: [...document.paragraphs],
      tables: document.tables.map((table) => sortCells(table.values()))
    };
  }

  async read(scope: Scope): Promise<ScopeContent> {
    const document = this.requireDocument(scope.documentId);
    const locator = parseScopeLocator(scope.locator);

    if (locator.type === "document") {
      return { kind: "text", text: document.paragraphs.join("\n") };
    }
    if (locator.type === "paragraph") {
      const paragraph = document.paragraphs[locator.index];
      if (paragraph === undefined) {
        throw new Error(`Paragraph ${locator.index} does not exist.`);
      }
      return { kind: "text", text: paragraph };
    }

    const table = document.tables[locator.index];
    if (!table) {
      throw new Error(`Table ${locator.index} does not exist.`);
    }
    return { kind: "table", cells: sortCells(table.values()) };
  }

  async write(scope: Scope, payload: WritePayload): Promise<void> {
    const document = this.requireDocument(scope.documentId);
    const locator = parseScopeLocator(scope.locator);

    if (locator.type === "table") {
      const table = document.tables[locator.index];
      if (!table) {
        throw new Error(`Table ${locator.index} does not exist.`);
      }
      if (payload.kind !== "cells") {
        throw new Error("Tables accept cell patches only.");
      }
      for (const patch of payload.patches) {
        const key = cellKey(patch.row, patch.col);
        if (patch.value === null) {
          table.delete(key);
        } else {
          table.set(key, { row: patch.row, col: patch.col, value: patch.value });
        }
      }
      return;
    }

    if (payload.kind !== "text") {
      throw new Error("Text scopes accept text only.");
    }
    if (locator.type === "document") {
      document.paragraphs = payload.text.split("\n");
      return;
    }
    if (locator.index >= document.paragraphs.length) {
      throw new Error(`Paragraph ${locator.index} does not exist.`);
    }
    if (payload.text.includes("\n")) {
      throw new Error("A paragraph cannot hold line breaks.");
    }
    document.paragraphs[locator.index] = payload.text;
  }

  overlaps(left: Scope, right: Scope): boolean {
    return left.documentId === right.documentId && locatorsOverlap(left.locator, right.locator);
  }

  async backup(documentId: string): Promise<string> {
    const backupId = `${documentId}@${this.backups.size + 1}`;
    this.backups.set(backupId, this.export(documentId));
    return backupId;
  }

  getBackup(backupId: string): MemoryDocumentInit | undefined {
    return this.backups.get(backupId);
  }

  private requireDocument(documentId: string): MemoryDocument {
    const document = this.documents.get(documentId);
    if (!document) {
      throw new Error(`Document ${documentId} is not loaded.`);
    }
    return document;
  }
}
