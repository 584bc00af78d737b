import { describe, it, expect } from "@jest/globals";
import { inferTypeName } from "../tooling/lib/type-namer";

describe("inferTypeName", () => {
  it("should name numbers by integrality", () => {
    expect(inferTypeName(3)).toBe("integer");
    expect(inferTypeName(3.5)).toBe("float");
  });

  it("should name scalar shapes", () => {
    expect(inferTypeName(Symbol.for("ok"))).toBe("atom");
    expect(inferTypeName("text")).toBe("string");
    expect(inferTypeName(true)).toBe("boolean");
    expect(inferTypeName(null)).toBe("null");
    expect(inferTypeName(undefined)).toBe("undefined");
    expect(inferTypeName(10n)).toBe("bigint");
    expect(inferTypeName(() => 1)).toBe("function");
  });

  it("should name containers", () => {
    expect(inferTypeName(new Uint8Array(2))).toBe("binary");
    expect(inferTypeName([1, 2])).toBe("list");
    expect(inferTypeName({ a: 1 })).toBe("map");
    expect(inferTypeName({ __type: "User", name: "a" })).toBe("record User");
  });

  it("should fall back to the constructor name", () => {
    expect(inferTypeName(new Map())).toBe("Map");
    expect(inferTypeName(new Date(0))).toBe("Date");
  });
});
