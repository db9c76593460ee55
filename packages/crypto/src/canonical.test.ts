import { describe, it, expect } from "vitest";
import { canonicalize, encodeSignee, CanonicalEncodingError } from "./canonical.js";
import { decode } from "./utils.js";

describe("canonicalize", () => {
  it("sorts keys at every depth and drops whitespace", () => {
    const signee = {
      user: "u",
      timestamp: 2,
      payload: { typ: "chat", text: "hi", room: "r" },
      nonce: 1,
    };
    expect(canonicalize(signee)).toBe(
      '{"nonce":1,"payload":{"room":"r","text":"hi","typ":"chat"},"timestamp":2,"user":"u"}'
    );
  });

  it("does not depend on insertion order", () => {
    const a = { b: 1, a: [3, 2, 1], c: { y: null, x: true } };
    const b = { c: { x: true, y: null }, a: [3, 2, 1], b: 1 };
    expect(canonicalize(a)).toBe(canonicalize(b));
    expect(canonicalize(a)).toBe('{"a":[3,2,1],"b":1,"c":{"x":true,"y":null}}');
  });

  it("escapes strings like JSON and keeps non-ASCII as is", () => {
    expect(canonicalize({ a: 'line\n"q"' })).toBe('{"a":"line\\n\\"q\\""}');
    expect(canonicalize("é")).toBe('"é"');
  });

  it("keeps distinct values distinct", () => {
    expect(canonicalize({ text: 'a","b' })).not.toBe(canonicalize({ text: "a", b: "" }));
    expect(canonicalize(["1"])).not.toBe(canonicalize([1]));
  });

  it("writes negative zero as zero and keeps negative integers", () => {
    expect(canonicalize([-0, -1])).toBe("[0,-1]");
  });

  it("rejects values outside the supported domain", () => {
    expect(() => canonicalize({ a: [1, 1.5] })).toThrow("Number is not a safe integer at $.a[1]");
    expect(() => canonicalize(Number.NaN)).toThrow(CanonicalEncodingError);
    expect(() => canonicalize(Number.MAX_SAFE_INTEGER + 1)).toThrow(CanonicalEncodingError);
    expect(() => canonicalize({ a: undefined })).toThrow("Unsupported undefined value at $.a");
    expect(() => canonicalize(BigInt(1))).toThrow(CanonicalEncodingError);
    expect(() => canonicalize(new Date(0))).toThrow("Unsupported object type at $");
  });
});

describe("encodeSignee", () => {
  it("is deterministic", () => {
    const signee = {
      nonce: 670593955,
      payload: { typ: "chat", room: "7ed9e067-ec37-4054-9fc2-b1bd890929bd", text: "helloo" },
      timestamp: 1724966284,
      user: "ab".repeat(32),
    };
    const first = encodeSignee(signee);
    const second = encodeSignee({ ...signee, payload: { ...signee.payload } });
    expect(Array.from(first)).toEqual(Array.from(second));
    expect(decode(first)).toBe(
      `{"nonce":670593955,"payload":{"room":"7ed9e067-ec37-4054-9fc2-b1bd890929bd","text":"helloo","typ":"chat"},"timestamp":1724966284,"user":"${"ab".repeat(32)}"}`
    );
  });
});
