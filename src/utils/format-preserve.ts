/**
 * Utilities for preserving the key order of JSON files on rewrite
 *
 * JavaScript objects list integer-like keys ("1", "42") before all other
 * keys, whatever order the file had. Catalog keys are source strings and
 * can look like integers, so the order is recovered from the raw text and
 * applied again when serializing.
 */

import { isJsonObject } from "./json-parser.js";

/**
 * Chooses the order of an object's keys during serialization
 *
 * @param path Keys leading from the root to the object
 * @param keys The object's own keys in property order
 */
export type KeyOrderFn = (path: readonly string[], keys: string[]) => string[];

/**
 * List the keys of the object found at `path`, in the order the text has them.
 * The content must already be valid JSON. A key that occurs twice keeps the
 * position of its first occurrence, as JSON.parse does.
 *
 * @returns The keys, or null if there is no object at `path`
 */
export function scanMemberKeys(
  content: string,
  path: readonly string[]
): string[] | null {
  let pos = 0;

  function skipWhitespace(): void {
    while (pos < content.length && /\s/.test(content[pos])) pos++;
  }

  function readString(): string {
    const start = pos;
    pos++;
    while (pos < content.length && content[pos] !== '"') {
      if (content[pos] === "\\") pos++;
      pos++;
    }
    pos++;
    return JSON.parse(content.slice(start, pos));
  }

  function skipValue(): void {
    const first = content[pos];

    if (first === '"') {
      readString();
      return;
    }

    if (first === "{" || first === "[") {
      let depth = 0;
      while (pos < content.length) {
        const ch = content[pos];
        if (ch === '"') {
          readString();
          continue;
        }
        if (ch === "{" || ch === "[") depth++;
        if (ch === "}" || ch === "]") depth--;
        pos++;
        if (depth === 0) return;
      }
      return;
    }

    // number, true, false, null
    while (pos < content.length && !/[\s,}\]]/.test(content[pos])) pos++;
  }

  // pos is on "{"; leaves pos after the matching "}"
  function walkObject(depth: number): string[] | null {
    const keys: string[] = [];
    const seen = new Set<string>();
    let found: string[] | null = null;

    pos++;
    skipWhitespace();

    while (pos < content.length && content[pos] !== "}") {
      const key = readString();
      skipWhitespace();
      pos++; // ":"
      skipWhitespace();

      const onPath = depth < path.length && key === path[depth];
      if (onPath && content[pos] === "{") {
        found = walkObject(depth + 1);
      } else {
        if (onPath) found = null;
        skipValue();
      }

      if (!seen.has(key)) {
        seen.add(key);
        keys.push(key);
      }

      skipWhitespace();
      if (content[pos] === ",") {
        pos++;
        skipWhitespace();
      }
    }
    pos++;

    return depth === path.length ? keys : found;
  }

  skipWhitespace();
  if (content[pos] !== "{") return null;
  return walkObject(0);
}

/**
 * Put `keys` in the order of `sourceOrder`; keys the source did not have
 * follow in their current order.
 */
export function sortBySourceOrder(
  keys: string[],
  sourceOrder: readonly string[]
): string[] {
  const present = new Set(keys);
  const ordered = sourceOrder.filter((key) => present.has(key));
  const placed = new Set(ordered);

  return [...ordered, ...keys.filter((key) => !placed.has(key))];
}

/**
 * JSON.stringify(value, null, indent) with object keys ordered by `orderKeys`
 */
export function stringifyWithKeyOrder(
  value: unknown,
  orderKeys: KeyOrderFn,
  indent: string = "  "
): string {
  function write(node: unknown, path: string[], current: string): string {
    const inner = current + indent;

    if (Array.isArray(node)) {
      if (node.length === 0) return "[]";
      const items = node.map(
        (item, index) =>
          inner +
          (item === undefined ? "null" : write(item, [...path, String(index)], inner))
      );
      return `[\n${items.join(",\n")}\n${current}]`;
    }

    if (isJsonObject(node)) {
      const members: string[] = [];
      for (const key of orderKeys(path, Object.keys(node))) {
        const member = node[key];
        if (member === undefined) continue;
        members.push(
          `${inner}${JSON.stringify(key)}: ${write(member, [...path, key], inner)}`
        );
      }
      if (members.length === 0) return "{}";
      return `{\n${members.join(",\n")}\n${current}}`;
    }

    return JSON.stringify(node);
  }

  return write(value, [], "");
}
