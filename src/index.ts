/**
 * Library entry point
 */

export { build } from "./parser";
export {
  verify,
  compare,
  flatten,
  normalize,
  createMapping,
  validateMapping,
  summarize,
  indexSymbols,
} from "./modules";
export { InputError, loadTree, loadMapping } from "./utils";
export * from "./types";
