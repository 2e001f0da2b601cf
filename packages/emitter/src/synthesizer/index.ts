/**
 * Type synthesizer - Public API
 */

export {
  type SynthesisContext,
  synthesizeType,
  synthesizeStruct,
} from "./type-synthesis.js";
export {
  discriminatorTag,
  synthesizeDocument,
  synthesizeUnits,
} from "./units.js";
