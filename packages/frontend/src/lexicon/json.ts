/**
 * JSON reading that keeps object keys in source order.
 *
 * `JSON.parse` moves integer-like keys ahead of the others, but property and
 * definition order decide field order in the output, so the order each object
 * was written in is recorded beside the value.
 */

import jsonc from "jsonc-parser";
import type { Node, ParseError } from "jsonc-parser";
import { ok, error, type Result } from "../types/result.js";

/**
 * Keys of a parsed object in the order they were written.
 */
export type KeyOrder = (obj: object) => readonly string[];

export type ParsedJson = {
  readonly value: unknown;
  readonly keyOrder: KeyOrder;
};

const PARSE_OPTIONS = {
  disallowComments: true,
  allowTrailingComma: false,
  allowEmptyContent: false,
} as const;

export const parseJson = (text: string): Result<ParsedJson, string> => {
  const errors: ParseError[] = [];
  const root = jsonc.parseTree(text, errors, PARSE_OPTIONS);
  const first = errors[0];
  if (first !== undefined) {
    return error(`${jsonc.printParseErrorCode(first.error)} at offset ${first.offset}`);
  }
  if (root === undefined) {
    return error("ValueExpected at offset 0");
  }

  const orders = new WeakMap<object, readonly string[]>();

  const toValue = (node: Node): unknown => {
    switch (node.type) {
      case "object": {
        const obj: Record<string, unknown> = {};
        const keys: string[] = [];
        for (const property of node.children ?? []) {
          const [keyNode, valueNode] = property.children ?? [];
          const key: unknown = keyNode?.value;
          if (typeof key !== "string" || valueNode === undefined) continue;
          if (!keys.includes(key)) keys.push(key);
          // defineProperty keeps "__proto__" an ordinary key
          Object.defineProperty(obj, key, {
            value: toValue(valueNode),
            enumerable: true,
            writable: true,
            configurable: true,
          });
        }
        orders.set(obj, keys);
        return obj;
      }
      case "array":
        return (node.children ?? []).map(toValue);
      default: {
        const value: unknown = node.value;
        return value;
      }
    }
  };

  return ok({
    value: toValue(root),
    keyOrder: (obj) => orders.get(obj) ?? Object.keys(obj),
  });
};
