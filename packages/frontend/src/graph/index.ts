/**
 * Graph utilities - Public API
 */

export type { Component } from "./components.js";
export {
  findStronglyConnectedComponents,
  isCyclicComponent,
} from "./components.js";
