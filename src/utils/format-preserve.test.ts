import { describe, it, expect } from "vitest";
import {
  scanMemberKeys,
  sortBySourceOrder,
  stringifyWithKeyOrder,
} from "./format-preserve.js";

describe("scanMemberKeys", () => {
  it("should list root keys in file order", () => {
    expect(scanMemberKeys('{"b": 1, "10": 2, "a": [1, {"x": 3}]}', [])).toEqual([
      "b",
      "10",
      "a",
    ]);
  });

  it("should list the keys of a nested object", () => {
    const content = `{
  "sourceLanguage": "en",
  "strings": {
    "Hello \\"world\\"": { "comment": "a } brace" },
    "2": {},
    "Ok": { "localizations": { "zh-Hans": {} } }
  }
}`;

    expect(scanMemberKeys(content, ["strings"])).toEqual([
      'Hello "world"',
      "2",
      "Ok",
    ]);
  });

  it("should keep the first position of a repeated key", () => {
    expect(scanMemberKeys('{"a": 1, "b": 2, "a": 3}', [])).toEqual(["a", "b"]);
  });

  it("should return null when the path is not an object", () => {
    expect(scanMemberKeys('{"strings": []}', ["strings"])).toBeNull();
    expect(scanMemberKeys('{"version": "1.0"}', ["strings"])).toBeNull();
    expect(scanMemberKeys("[]", [])).toBeNull();
  });

  it("should return an empty list for an empty object", () => {
    expect(scanMemberKeys('{"strings": {}}', ["strings"])).toEqual([]);
  });
});

describe("sortBySourceOrder", () => {
  it("should put source keys first and keep the rest in place", () => {
    expect(sortBySourceOrder(["1", "b", "a", "new"], ["a", "1", "gone", "b"])).toEqual([
      "a",
      "1",
      "b",
      "new",
    ]);
  });
});

describe("stringifyWithKeyOrder", () => {
  const keepOrder = (_path: readonly string[], keys: string[]) => keys;

  it("should match JSON.stringify when keys keep their order", () => {
    const value = {
      a: [1, "two", null, true, { b: [] }],
      c: {},
      d: { e: "é" },
    };

    expect(stringifyWithKeyOrder(value, keepOrder)).toBe(
      JSON.stringify(value, null, 2)
    );
  });

  it("should apply the order chosen for each path", () => {
    const result = stringifyWithKeyOrder({ "1": 1, x: { "2": 2, y: 3 } }, (path, keys) =>
      path.length === 0 ? [...keys].reverse() : keys
    );

    expect(result).toBe('{\n  "x": {\n    "2": 2,\n    "y": 3\n  },\n  "1": 1\n}');
  });
});
