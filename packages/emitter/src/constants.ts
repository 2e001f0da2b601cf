/**
 * Shared constants for the Python emitter
 */

import { VERSION } from "@lexmodel/frontend";

/** Every generated model goes into this one module. */
export const MODELS_FILE = "models.py";

/**
 * Module docstring for emitted Python files. No timestamps: identical input
 * must produce identical bytes.
 */
export const generateFileHeader = (version: string = VERSION): string =>
  [
    `"""Pydantic models generated by lexmodel ${version} from atproto lexicons.`,
    "",
    "Do not modify this file manually.",
    '"""',
    "",
  ].join("\n");
