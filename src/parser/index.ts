/**
 * Structural parser
 */

export { build, decodeSource } from "./builder";
export { segment } from "./segmenter";
export type { Segment } from "./segmenter";
export {
  classifyDirective,
  classifyStatement,
  decideBrace,
  isTypeHead,
} from "./classifier";
export { Lexer } from "./lexer";
export { SourceIndex } from "./source-index";
