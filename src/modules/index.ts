/**
 * Modules export
 */

export { verify } from "./verifier";
export {
  compare,
  flatten,
  normalize,
  renameName,
  createMapping,
  validateMapping,
  tokenKey,
  formatToken,
  DEFAULT_TOP,
  EMPTY_MAPPING,
} from "./comparator";
export { summarize, nodeLabel, countKinds } from "./summary";
export { indexSymbols, SYMBOL_KINDS } from "./symbol-index";
export { discover, extensionPatterns } from "./discover";
export {
  displayComparison,
  displayIssues,
  displayStats,
  displayVerification,
  formatComparison,
  formatDuration,
  formatVerification,
} from "./report";
