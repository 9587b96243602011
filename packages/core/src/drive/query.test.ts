import { describe, it, expect } from "vitest";
import {
  allOf,
  anyOf,
  kindIs,
  nameContains,
  nameEquals,
  parentIn,
  propertyIs,
  trashedIs,
} from "./filter.js";
import { compileQuery, quote } from "./query.js";

const FOLDER = "mimeType = 'application/vnd.google-apps.folder'";
const DOCUMENT = "mimeType = 'application/vnd.google-apps.spreadsheet'";

describe("quote", () => {
  it("wraps a value in single quotes", () => {
    expect(quote("/photos/")).toBe("'/photos/'");
  });

  it("escapes quotes and backslashes", () => {
    expect(quote("it's")).toBe("'it\\'s'");
    expect(quote("a\\b")).toBe("'a\\\\b'");
  });
});

describe("compileQuery", () => {
  it("renders leaf filters", () => {
    expect(compileQuery(kindIs("FOLDER"))).toBe(FOLDER);
    expect(compileQuery(parentIn("root-id"))).toBe("'root-id' in parents");
    expect(compileQuery(nameContains("photo"))).toBe("name contains 'photo'");
    expect(compileQuery(nameEquals("sheetStore"))).toBe(
      "name = 'sheetStore'",
    );
    expect(compileQuery(trashedIs(false))).toBe("trashed = false");
    expect(compileQuery(propertyIs("path", "/"))).toBe(
      "properties has { key='path' and value='/' }",
    );
  });

  it("renders OTHER as the absence of known kinds", () => {
    expect(compileQuery(kindIs("OTHER"))).toBe(
      "mimeType != 'application/vnd.google-apps.folder' and mimeType != 'application/vnd.google-apps.spreadsheet'",
    );
  });

  it("joins an upload listing in order", () => {
    const query = allOf(
      kindIs("FOLDER"),
      propertyIs("directParent", "true"),
      propertyIs("path", "/"),
      trashedIs(false),
    );

    expect(compileQuery(query)).toBe(
      `${FOLDER} and properties has { key='directParent' and value='true' } and properties has { key='path' and value='/' } and trashed = false`,
    );
  });

  it("parenthesizes an or group inside an and group", () => {
    const query = allOf(
      anyOf(kindIs("FOLDER"), kindIs("DOCUMENT")),
      parentIn("p"),
    );

    expect(compileQuery(query)).toBe(
      `(${FOLDER} or ${DOCUMENT}) and 'p' in parents`,
    );
  });

  it("parenthesizes OTHER inside an or group", () => {
    expect(compileQuery(anyOf(kindIs("OTHER"), kindIs("FOLDER")))).toBe(
      `(mimeType != 'application/vnd.google-apps.folder' and mimeType != 'application/vnd.google-apps.spreadsheet') or ${FOLDER}`,
    );
  });

  it("flattens nested groups of the same operator", () => {
    const query = allOf(allOf(trashedIs(true), parentIn("p")), nameEquals("x"));

    expect(compileQuery(query)).toBe(
      "trashed = true and 'p' in parents and name = 'x'",
    );
  });

  it("escapes quotes in names", () => {
    expect(compileQuery(nameContains("Bob's"))).toBe(
      "name contains 'Bob\\'s'",
    );
  });
});
