import type { ItemFilter } from "./filter.js";
import { MIME } from "./types.js";

/** Escape a value for a single-quoted string in the query grammar. */
export function quote(value: string): string {
  return `'${value.replace(/\\/g, "\\\\").replace(/'/g, "\\'")}'`;
}

function compileKind(kind: "FOLDER" | "DOCUMENT" | "OTHER"): string {
  if (kind === "OTHER") {
    return `mimeType != ${quote(MIME.FOLDER)} and mimeType != ${quote(MIME.DOCUMENT)}`;
  }
  return `mimeType = ${quote(MIME[kind])}`;
}

function needsParens(child: ItemFilter, joiner: "and" | "or"): boolean {
  // kind OTHER renders as an and-chain
  if (child.op === "kind") return child.kind === "OTHER" && joiner === "or";
  if (child.op === "and" || child.op === "or") {
    return child.op !== joiner && child.filters.length > 1;
  }
  return false;
}

function compileGroup(filters: ItemFilter[], joiner: "and" | "or"): string {
  return filters
    .map((child) => {
      const text = compileQuery(child);
      return needsParens(child, joiner) ? `(${text})` : text;
    })
    .filter((text) => text.length > 0)
    .join(` ${joiner} `);
}

/**
 * Render a filter in the remote store's query grammar, e.g.
 * `mimeType = '…' and properties has { key='path' and value='/' }`.
 */
export function compileQuery(filter: ItemFilter): string {
  switch (filter.op) {
    case "kind":
      return compileKind(filter.kind);
    case "parentIn":
      return `${quote(filter.parentId)} in parents`;
    case "nameContains":
      return `name contains ${quote(filter.value)}`;
    case "nameEquals":
      return `name = ${quote(filter.value)}`;
    case "trashed":
      return `trashed = ${filter.value}`;
    case "property":
      return `properties has { key=${quote(filter.key)} and value=${quote(filter.value)} }`;
    case "and":
      return compileGroup(filter.filters, "and");
    case "or":
      return compileGroup(filter.filters, "or");
  }
}
