import { describe, it, expect } from "vitest";
import { toPositionalPlaceholders } from "../../src/adapters/persistence/pg-placeholders.js";

describe("toPositionalPlaceholders", () => {
  it("should number placeholders left to right", () => {
    expect(toPositionalPlaceholders("SELECT * FROM t WHERE a = ? AND b = ?")).toEqual({
      text: "SELECT * FROM t WHERE a = $1 AND b = $2",
      placeholderCount: 2,
    });
  });

  it("should translate an auto-generated list", () => {
    expect(toPositionalPlaceholders("INSERT INTO t VALUES(?,?,?)").text).toBe(
      "INSERT INTO t VALUES($1,$2,$3)",
    );
  });

  it("should skip question marks in string literals", () => {
    expect(toPositionalPlaceholders("SELECT '?', ?")).toEqual({
      text: "SELECT '?', $1",
      placeholderCount: 1,
    });
    expect(toPositionalPlaceholders("SELECT 'it''s ?', ?").text).toBe(
      "SELECT 'it''s ?', $1",
    );
  });

  it("should honour backslash escapes in E strings", () => {
    expect(toPositionalPlaceholders("SELECT E'\\' ?', ?").text).toBe(
      "SELECT E'\\' ?', $1",
    );
  });

  it("should skip quoted identifiers", () => {
    expect(toPositionalPlaceholders('SELECT "col?" FROM t WHERE x = ?').text).toBe(
      'SELECT "col?" FROM t WHERE x = $1',
    );
  });

  it("should skip comments", () => {
    expect(toPositionalPlaceholders("SELECT 1 -- why?\nWHERE a = ?").text).toBe(
      "SELECT 1 -- why?\nWHERE a = $1",
    );
    expect(toPositionalPlaceholders("/* ? */ SELECT ?").text).toBe("/* ? */ SELECT $1");
  });

  it("should skip dollar-quoted bodies", () => {
    expect(toPositionalPlaceholders("SELECT $$ ? $$, ?").text).toBe("SELECT $$ ? $$, $1");
    expect(toPositionalPlaceholders("SELECT $fn$ ? $fn$, ?").text).toBe(
      "SELECT $fn$ ? $fn$, $1",
    );
  });

  it("should leave existing positional parameters alone", () => {
    expect(toPositionalPlaceholders("SELECT $1")).toEqual({
      text: "SELECT $1",
      placeholderCount: 0,
    });
  });

  it("should stop at an unterminated literal", () => {
    expect(toPositionalPlaceholders("SELECT '?")).toEqual({
      text: "SELECT '?",
      placeholderCount: 0,
    });
  });
});
