export type ScopeLocator =
  | { type: "document" }
  | { type: "paragraph"; index: number }
  | { type: "table"; index: number };

const INDEXED_LOCATOR = /^(paragraph|table):(\d+)$/;

export function parseScopeLocator(locator: string): ScopeLocator {
  if (locator === "document") {
    return { type: "document" };
  }

  const match = INDEXED_LOCATOR.exec(locator);
  if (!match) {
    throw new Error(`Unsupported scope locator "${locator}".`);
  }
  const index = Number(match[2]);
  return match[1] === "table" ? { type: "table", index } : { type: "paragraph", index };
}

export function formatScopeLocator(locator: ScopeLocator): string {
  return locator.type === "document" ? "document" : `${locator.type}:${locator.index}`;
}

// `document` covers every paragraph of its document; tables are addressed separately.
export function locatorsOverlap(left: string, right: string): boolean {
  if (left === right) {
    return true;
  }
  const a = parseScopeLocator(left);
  const b = parseScopeLocator(right);
  return (a.type === "document" && b.type === "paragraph") || (a.type === "paragraph" && b.type === "document");
}
