/**
 * lexmodel emitter - pydantic model generator
 */

export * from "./types.js";
export * from "./synthesizer/index.js";
export { toClassName, toFieldName, toPascalCase } from "./naming-policy.js";
export { allocateNames } from "./core/name-allocation.js";
export { orderUnits } from "./core/ordering.js";
export { writeFileAtomic } from "./core/file-writer.js";
export { emitType, type EmittedType } from "./type-emitter.js";
export { MODELS_FILE } from "./constants.js";
export { renderModels, emit } from "./emitter.js";
export { generate } from "./generator.js";
