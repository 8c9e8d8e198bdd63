import JSZip from "jszip";
import { DOMParser, XMLSerializer } from "@xmldom/xmldom";
import { v4 as uuidv4 } from "uuid";
import { CellPatch, DocumentBackend, Scope, ScopeContent, TableCell, WritePayload } from "../types.js";
import { locatorsOverlap, parseScopeLocator } from "./scopeLocator.js";

const DOCUMENT_PART = "word/document.xml";
const WORD_NAMESPACE = "http://schemas.openxmlformats.org/wordprocessingml/2006/main";
const WORD_PARAGRAPH_TAG = "w:p";
const WORD_RUN_TAG = "w:r";
const WORD_TEXT_TAG = "w:t";
const WORD_TABLE_TAG = "w:tbl";
const WORD_ROW_TAG = "w:tr";
const WORD_CELL_TAG = "w:tc";

type ElementList = {
  length: number;
  item: (index: number) => Element | null;
};

type OpenedDocument = {
  zip: JSZip;
  document: Document;
};

function nodeListToArray(nodeList: ElementList): Element[] {
  const out: Element[] = [];
  for (let i = 0; i < nodeList.length; i += 1) {
    const item = nodeList.item(i);
    if (item) {
      out.push(item);
    }
  }
  return out;
}

function childElements(parent: Element, tagName: string): Element[] {
  return nodeListToArray(parent.getElementsByTagName(tagName)).filter(
    (element) => element.parentNode === parent
  );
}

// XML parsing normalizes line endings, so a carriage return would not read back as written.
function assertStorableText(text: string): void {
  if (text.includes("\r")) {
    throw new Error("Text with carriage returns cannot be stored in a Word run.");
  }
}

function requiresXmlSpacePreserve(text: string): boolean {
  return /^\s/.test(text) || /\s$/.test(text) || text.includes("  ") || text.includes("\t");
}

function setTextNodeValue(node: Element, value: string): void {
  while (node.firstChild) {
    node.removeChild(node.firstChild);
  }
  if (value.length > 0) {
    node.appendChild(node.ownerDocument.createTextNode(value));
  }
  if (requiresXmlSpacePreserve(value)) {
    node.setAttribute("xml:space", "preserve");
  } else {
    node.removeAttribute("xml:space");
  }
}

function distributeTextAcrossNodes(textNodes: Element[], replacement: string): string[] {
  if (textNodes.length === 1) {
    return [replacement];
  }

  const originalLengths = textNodes.map((node) => (node.textContent || "").length);
  if (originalLengths.every((length) => length === 0)) {
    const chunks = textNodes.map(() => "");
    chunks[0] = replacement;
    return chunks;
  }

  const chunks: string[] = [];
  let cursor = 0;
  for (let index = 0; index < textNodes.length; index += 1) {
    if (index === textNodes.length - 1) {
      chunks.push(replacement.slice(cursor));
      break;
    }

    const take = Math.min(originalLengths[index], Math.max(replacement.length - cursor, 0));
    chunks.push(replacement.slice(cursor, cursor + take));
    cursor += take;
  }

  return chunks;
}

function paragraphText(paragraph: Element): string {
  return nodeListToArray(paragraph.getElementsByTagName(WORD_TEXT_TAG))
    .map((node) => node.textContent || "")
    .join("");
}

function writeParagraphText(paragraph: Element, text: string): void {
  let textNodes = nodeListToArray(paragraph.getElementsByTagName(WORD_TEXT_TAG));
  if (textNodes.length === 0) {
    if (!text) {
      return;
    }
    const document = paragraph.ownerDocument;
    const run = document.createElementNS(WORD_NAMESPACE, WORD_RUN_TAG);
    const textNode = document.createElementNS(WORD_NAMESPACE, WORD_TEXT_TAG);
    run.appendChild(textNode);
    paragraph.appendChild(run);
    textNodes = [textNode];
  }

  const chunks = distributeTextAcrossNodes(textNodes, text);
  textNodes.forEach((node, index) => {
    setTextNodeValue(node, chunks[index] || "");
  });
}

function readLines(paragraphs: Element[]): string {
  return paragraphs.map(paragraphText).join("\n");
}

// One line per paragraph. Paragraphs are never added or removed.
function writeLines(paragraphs: Element[], text: string): void {
  assertStorableText(text);
  if (paragraphs.length === 0) {
    if (text) {
      throw new Error("Scope has no paragraphs to write into.");
    }
    return;
  }

  const lines = text.split("\n");
  if (lines.length !== paragraphs.length) {
    throw new Error(`Text has ${lines.length} lines but the scope has ${paragraphs.length} paragraphs.`);
  }
  paragraphs.forEach((paragraph, index) => {
    writeParagraphText(paragraph, lines[index]);
  });
}

function tableRows(table: Element): Element[][] {
  return childElements(table, WORD_ROW_TAG).map((row) => childElements(row, WORD_CELL_TAG));
}

function readTable(table: Element): TableCell[] {
  const cells: TableCell[] = [];
  tableRows(table).forEach((row, rowIndex) => {
    row.forEach((cell, colIndex) => {
      cells.push({
        row: rowIndex,
        col: colIndex,
        value: readLines(childElements(cell, WORD_PARAGRAPH_TAG))
      });
    });
  });
  return cells;
}

function writeTable(table: Element, patches: CellPatch[]): void {
  const rows = tableRows(table);
  for (const patch of patches) {
    const cell = rows[patch.row]?.[patch.col];
    if (!cell) {
      throw new Error(`Cell (${patch.row}, ${patch.col}) is outside the table.`);
    }
    writeLines(childElements(cell, WORD_PARAGRAPH_TAG), patch.value ?? "");
  }
}

function bodyParagraphs(document: Document): Element[] {
  const body = nodeListToArray(document.getElementsByTagName("w:body"))[0];
  if (!body) {
    throw new Error("Document has no body.");
  }
  return childElements(body, WORD_PARAGRAPH_TAG);
}

/**
 * Document backend over .docx buffers kept in memory.
 *
 * `document` and `paragraph:<n>` address the top-level body paragraphs, `table:<n>` the n-th
 * table of the main document part.
 */
export class DocxDocumentBackend implements DocumentBackend {
  private readonly documents = new Map<string, Buffer>();
  private readonly backups = new Map<string, Buffer>();

  async load(documentId: string, buffer: Buffer): Promise<void> {
    const zip = await JSZip.loadAsync(buffer);
    if (!zip.file(DOCUMENT_PART)) {
      throw new Error(`${documentId} is not a Word document (missing ${DOCUMENT_PART}).`);
    }
    this.documents.set(documentId, Buffer.from(buffer));
  }

  getBuffer(documentId: string): Buffer | undefined {
    const buffer = this.documents.get(documentId);
    return buffer ? Buffer.from(buffer) : undefined;
  }

  getBackup(backupId: string): Buffer | undefined {
    const buffer = this.backups.get(backupId);
    return buffer ? Buffer.from(buffer) : undefined;
  }

  async read(scope: Scope): Promise<ScopeContent> {
    const { document } = await this.open(scope.documentId);
    const locator = parseScopeLocator(scope.locator);

    if (locator.type === "table") {
      return { kind: "table", cells: readTable(this.requireTable(document, locator.index)) };
    }

    const paragraphs = bodyParagraphs(document);
    if (locator.type === "document") {
      return { kind: "text", text: readLines(paragraphs) };
    }
    const paragraph = paragraphs[locator.index];
    if (!paragraph) {
      throw new Error(`Paragraph ${locator.index} does not exist.`);
    }
    return { kind: "text", text: paragraphText(paragraph) };
  }

  async write(scope: Scope, payload: WritePayload): Promise<void> {
    const { zip, document } = await this.open(scope.documentId);
    const locator = parseScopeLocator(scope.locator);

    if (locator.type === "table") {
      if (payload.kind !== "cells") {
        throw new Error("Tables accept cell patches only.");
      }
      writeTable(this.requireTable(document, locator.index), payload.patches);
    } else {
      if (payload.kind !== "text") {
        throw new Error("Text scopes accept text only.");
      }
      const paragraphs = bodyParagraphs(document);
      if (locator.type === "document") {
        writeLines(paragraphs, payload.text);
      } else {
        const paragraph = paragraphs[locator.index];
        if (!paragraph) {
          throw new Error(`Paragraph ${locator.index} does not exist.`);
        }
        writeLines([paragraph], payload.text);
      }
    }

    zip.file(DOCUMENT_PART, new XMLSerializer().serializeToString(document));
    const next = await zip.generateAsync({
      type: "nodebuffer",
      compression: "DEFLATE"
    });
    this.documents.set(scope.documentId, next);
  }

  overlaps(left: Scope, right: Scope): boolean {
    return left.documentId === right.documentId && locatorsOverlap(left.locator, right.locator);
  }

  async backup(documentId: string): Promise<string> {
    const buffer = this.documents.get(documentId);
    if (!buffer) {
      throw new Error(`Document ${documentId} is not loaded.`);
    }
    const backupId = uuidv4();
    this.backups.set(backupId, Buffer.from(buffer));
    return backupId;
  }

  private async open(documentId: string): Promise<OpenedDocument> {
    const buffer = this.documents.get(documentId);
    if (!buffer) {
      throw new Error(`Document ${documentId} is not loaded.`);
    }

    const zip = await JSZip.loadAsync(buffer);
    const file = zip.file(DOCUMENT_PART);
    if (!file) {
      throw new Error(`${documentId} is missing ${DOCUMENT_PART}.`);
    }
    const xml = await file.async("text");
    return { zip, document: new DOMParser().parseFromString(xml, "text/xml") };
  }

  private requireTable(document: Document, index: number): Element {
    const table = nodeListToArray(document.getElementsByTagName(WORD_TABLE_TAG))[index];
    if (!table) {
      throw new Error(`Table ${index} does not exist.`);
    }
    return table;
  }
}
