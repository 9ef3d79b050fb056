/**
 * Utility exports
 */

// String utilities
export { compareStrings, firstLine, artifactName } from "./string";

// Error utilities
export { InputError, toInputError } from "./errors";

// Filesystem utilities
export { pathKind } from "./path-kind";
export { readSource } from "./read-source";
export { loadTree, parseTree } from "./load-tree";
export { loadMapping } from "./load-mapping";
export { writeJson, writeText } from "./write-json";

// Config utilities
export {
  loadConfig,
  loadConfigFile,
  mergeConfig,
  getUserConfigPath,
  loadDefaultConfig,
} from "./load-config";

// Classes
export { Tracker } from "./tracker";
export { Logger } from "./logger";
