/**
 * Naming policy for generated Python identifiers
 *
 * Class names are word-based PascalCase over the nsid segments; field names
 * are snake_case.
 */

import type { NestedSuffix } from "./types.js";
import { escapePythonIdentifier } from "./core/identifiers.js";

export const splitIntoWords = (name: string): readonly string[] => {
  const tokens = name.split(/[^A-Za-z0-9]+/g).filter((t) => t.length > 0);
  const words: string[] = [];

  for (const token of tokens) {
    const matches =
      token.match(/[A-Z]+(?![a-z])|[A-Z]?[a-z]+|[0-9]+/g) ?? [];
    if (matches.length === 0) {
      words.push(token);
    } else {
      words.push(...matches);
    }
  }

  return words;
};

const toPascalWord = (word: string): string => {
  if (word.length === 0) return "";
  return `${word.charAt(0).toUpperCase()}${word.slice(1)}`;
};

/**
 * PascalCase one identifier fragment: `getTimeline` → `GetTimeline`,
 * `cid-link` → `CidLink`.
 */
export const toPascalCase = (name: string): string =>
  splitIntoWords(name).map(toPascalWord).join("");

/**
 * Class name of a unit: every nsid segment, then the def name unless it is
 * `main`, then the nested suffix.
 *
 * `app.bsky.feed.post` → `AppBskyFeedPost`,
 * `app.bsky.feed.defs#postView` → `AppBskyFeedDefsPostView`,
 * `app.test.getThing` query output → `AppTestGetThingOutput`.
 */
export const toClassName = (
  nsid: string,
  defName: string,
  suffix?: NestedSuffix
): string => {
  const segments = nsid.split(".");
  if (defName !== "main") {
    segments.push(defName);
  }
  return `${segments.map(toPascalCase).join("")}${suffix ?? ""}`;
};

/**
 * Field identifier for a property: `createdAt` → `created_at`,
 * `class` → `class_`.
 */
export const toFieldName = (name: string): string =>
  escapePythonIdentifier(
    splitIntoWords(name)
      .map((word) => word.toLowerCase())
      .join("_")
  );
