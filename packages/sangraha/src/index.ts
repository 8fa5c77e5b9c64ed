// @karya/sangraha: Collections
export { Mutex } from "./mutex.js";
export { Progression } from "./progression.js";
export type { ProgressionInit, ProgressionJSON } from "./progression.js";
export { Pile } from "./pile.js";
export type { PileInit, PileJSON, PileKey, ElementClass } from "./pile.js";
