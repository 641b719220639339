import { describe, expect, it } from "vitest";
import { entriesEqual, fillIfAbsent, overwriteEntries } from "../../../src/ssh/config/host.js";
import { entryMap as entries } from "./entryMap.js";

describe("fillIfAbsent", () => {
  it("keeps existing values and fills missing ones", () => {
    const host = entries({ Port: "22" });
    const wildcard = entries({ Port: "2222", User: "admin" });
    expect(Object.fromEntries(fillIfAbsent(host, wildcard))).toEqual({ Port: "22", User: "admin" });
  });

  it("does not touch its inputs", () => {
    const host = entries({ Port: "22" });
    const donor = entries({ User: "admin" });
    fillIfAbsent(host, donor);
    expect(Object.fromEntries(host)).toEqual({ Port: "22" });
    expect(Object.fromEntries(donor)).toEqual({ User: "admin" });
  });
});

describe("overwriteEntries", () => {
  it("lets the donor win", () => {
    const merged = overwriteEntries(entries({ Port: "22", User: "a" }), entries({ Port: "2222" }));
    expect(Object.fromEntries(merged)).toEqual({ Port: "2222", User: "a" });
  });
});

describe("entriesEqual", () => {
  it("compares keys and values regardless of insertion order", () => {
    expect(entriesEqual(entries({ Port: "1", User: "2" }), entries({ User: "2", Port: "1" }))).toBe(true);
    expect(entriesEqual(entries({ Port: "1" }), entries({ Port: "2" }))).toBe(false);
    expect(entriesEqual(entries({ Port: "1" }), entries({ Port: "1", User: "2" }))).toBe(false);
    expect(entriesEqual(entries({}), entries({}))).toBe(true);
  });
});
