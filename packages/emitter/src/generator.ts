/**
 * generate - the full pipeline from a lexicon directory to written models
 */

import {
  analyzeLexicons,
  type Diagnostic,
  type Result,
} from "@lexmodel/frontend";
import { synthesizeUnits } from "./synthesizer/index.js";
import { allocateNames } from "./core/name-allocation.js";
import { emit } from "./emitter.js";

/**
 * Load, resolve, synthesize, name and emit. Returns the written file paths;
 * nothing is written when any stage fails, or when the prefix selects no
 * documents.
 */
export const generate = (
  inputDir: string,
  outputDir: string,
  prefix?: string
): Result<readonly string[], Diagnostic> => {
  const resolution = analyzeLexicons(inputDir, { prefix });
  if (!resolution.ok) return resolution;

  const units = synthesizeUnits(resolution.value);
  if (!units.ok) return units;

  const names = allocateNames(units.value);
  if (!names.ok) return names;

  return emit(units.value, names.value, outputDir);
};
