/**
 * Python identifier escaping
 *
 * Field names that are Python keywords, pydantic BaseModel attributes or
 * builtins used in annotations get a trailing underscore; the wire name is
 * kept through the field alias.
 */

import { createRequire } from "node:module";

const require = createRequire(import.meta.url);
const names: unknown = require("../../data/python-names.json");

const readList = (source: unknown, key: string): readonly string[] => {
  if (typeof source !== "object" || source === null || !(key in source)) {
    return [];
  }
  const list: unknown = Reflect.get(source, key);
  return Array.isArray(list)
    ? list.filter((item): item is string => typeof item === "string")
    : [];
};

const PYTHON_KEYWORDS: ReadonlySet<string> = new Set(
  readList(names, "keywords")
);

const RESERVED_FIELD_NAMES: ReadonlySet<string> = new Set([
  ...readList(names, "modelAttributes"),
  ...readList(names, "annotationNames"),
]);

/**
 * Name of the generated `$type` discriminator field.
 */
export const DISCRIMINATOR_FIELD = "type_";

/**
 * Escape a field identifier. A name that is not a valid identifier start
 * gets an `f_` prefix; pydantic treats a leading underscore as private.
 */
export const escapePythonIdentifier = (name: string): string => {
  if (name.length === 0) return "field_";
  if (/^[0-9]/.test(name)) return `f_${name}`;
  return PYTHON_KEYWORDS.has(name) || RESERVED_FIELD_NAMES.has(name)
    ? `${name}_`
    : name;
};
