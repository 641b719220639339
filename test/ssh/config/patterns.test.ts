import { describe, expect, it } from "vitest";
import {
  compilePattern,
  compilePatterns,
  isWildcardPattern,
  patternApplies,
  tokenizePatterns,
} from "../../../src/ssh/config/patterns.js";

describe("compilePattern", () => {
  it("leaves literal patterns uncompiled", () => {
    expect(compilePattern("example.com")).toBeUndefined();
    expect(isWildcardPattern("example.com")).toBe(false);
  });

  it("anchors * and escapes dots", () => {
    const p = compilePattern("*.example.com");
    expect(p?.negated).toBe(false);
    expect(p?.regex.test("a.example.com")).toBe(true);
    expect(p?.regex.test("example.com")).toBe(false);
    expect(p?.regex.test("aexample.com")).toBe(false);
    expect(p?.regex.test("a.example.com.evil")).toBe(false);
  });

  it("matches exactly one character for ?", () => {
    const p = compilePattern("web?");
    expect(p?.regex.test("web1")).toBe(true);
    expect(p?.regex.test("web")).toBe(false);
    expect(p?.regex.test("web12")).toBe(false);
  });

  it("consumes a leading ! as negation", () => {
    const p = compilePattern("!prod*");
    expect(p?.negated).toBe(true);
    expect(p?.regex.source).toBe("^prod.*$");
  });

  it("treats a bare negated literal as a pattern", () => {
    const p = compilePattern("!example.com");
    expect(p?.negated).toBe(true);
    expect(p?.regex.test("example.com")).toBe(true);
  });

  it("escapes other regex metacharacters", () => {
    const p = compilePattern("a+b*");
    expect(p?.regex.test("a+bc")).toBe(true);
    expect(p?.regex.test("aab")).toBe(false);
  });

  it("skips literals when compiling a pattern list", () => {
    expect(compilePatterns(["a", "b*", "c"]).map((p) => p.regex.source)).toEqual(["^b.*$"]);
  });
});

describe("patternApplies", () => {
  it("applies positive patterns on match", () => {
    const p = compilePattern("db-*");
    expect(p && patternApplies(p, "db-1")).toBe(true);
    expect(p && patternApplies(p, "web-1")).toBe(false);
  });

  it("applies negated patterns when they do not match", () => {
    const p = compilePattern("!db-*");
    expect(p && patternApplies(p, "db-1")).toBe(false);
    expect(p && patternApplies(p, "web-1")).toBe(true);
  });
});

describe("tokenizePatterns", () => {
  it("splits on unquoted whitespace", () => {
    expect(tokenizePatterns("  a   b\tc ")).toEqual(["a", "b", "c"]);
  });

  it("keeps whitespace inside double quotes", () => {
    expect(tokenizePatterns('a b "c d"')).toEqual(["a", "b", "c d"]);
  });

  it("joins a quoted span onto preceding text", () => {
    expect(tokenizePatterns('x"y z"')).toEqual(["xy z"]);
  });

  it("drops empty quoted spans", () => {
    expect(tokenizePatterns('""')).toEqual([]);
  });
});
