/**
 * Consolidated type definitions and Zod schemas
 */

import { z } from "zod";
import { Tracker } from "./utils/tracker";
import { Logger } from "./utils/logger";

// Re-export classes
export { Tracker, Logger };

// ============================================================================
// Node Kinds
// ============================================================================

export const NODE_KINDS = [
  "include",
  "namespace",
  "class",
  "struct",
  "function",
  "macro",
  "using",
  "other",
] as const;

export type NodeKind = (typeof NODE_KINDS)[number];

// ============================================================================
// Configuration Types & Schemas
// ============================================================================

export const BuildConfigSchema = z.object({
  extensions: z.array(z.string().startsWith(".")),
  ignore: z.array(z.string()),
  outDir: z.string(),
});

export const CompareConfigSchema = z.object({
  top: z.number().int().positive(),
  ignoreKinds: z.array(z.enum(NODE_KINDS)),
});

export const LoggingConfigSchema = z.object({
  level: z.enum(["debug", "info", "warn", "error"]),
});

export const StructmatchConfigSchema = z.object({
  build: BuildConfigSchema,
  compare: CompareConfigSchema,
  logging: LoggingConfigSchema,
});

export const PartialStructmatchConfigSchema = z.object({
  build: BuildConfigSchema.partial().optional(),
  compare: CompareConfigSchema.partial().optional(),
  logging: LoggingConfigSchema.partial().optional(),
});

export type BuildConfig = z.infer<typeof BuildConfigSchema>;
export type CompareConfig = z.infer<typeof CompareConfigSchema>;
export type LoggingConfig = z.infer<typeof LoggingConfigSchema>;
export type LogLevel = LoggingConfig["level"];
export type StructmatchConfig = z.infer<typeof StructmatchConfigSchema>;
export type PartialStructmatchConfig = z.infer<
  typeof PartialStructmatchConfigSchema
>;

// ============================================================================
// Structural Tree Types
// ============================================================================

export const TREE_VERSION = "1.0";

export const CONTAINER_KINDS = ["namespace", "class", "struct"] as const;
export const LEAF_KINDS = ["include", "macro", "using"] as const;

export type ContainerKind = (typeof CONTAINER_KINDS)[number];
export type LeafKind = (typeof LEAF_KINDS)[number];

export interface Span {
  start_byte: number;
  end_byte: number;
  start_line: number;
  end_line: number;
}

/**
 * Namespaces, classes and structs. Recognized constructs inside the body
 * become children.
 */
export interface ContainerNode {
  kind: ContainerKind;
  name?: string | null;
  span: Span;
  header_span?: Span | null;
  body_span?: Span | null;
  text: string;
  children: StructuralNode[];
}

/**
 * Function definitions and prototypes. Prototypes have no body span.
 */
export interface FunctionNode {
  kind: "function";
  name?: string | null;
  span: Span;
  header_span?: Span | null;
  body_span?: Span | null;
  text: string;
  children: StructuralNode[];
}

export interface LeafNode {
  kind: LeafKind;
  name?: string | null;
  span: Span;
  text: string;
  children: [];
}

/**
 * Bytes no construct claimed: whitespace, comments, unrecognized syntax
 */
export interface GapNode {
  kind: "other";
  name?: null;
  span: Span;
  text: string;
  children: [];
}

export type StructuralNode = ContainerNode | FunctionNode | LeafNode | GapNode;

export interface StructuralTree {
  version: string;
  file: string;
  source_hash: string;
  source_length: number;
  nodes: StructuralNode[];
}

export const SpanSchema = z.object({
  start_byte: z.number().int().nonnegative(),
  end_byte: z.number().int().nonnegative(),
  start_line: z.number().int().positive(),
  end_line: z.number().int().positive(),
});

const ContainerNodeSchema = z.object({
  kind: z.enum(CONTAINER_KINDS),
  name: z.string().nullish(),
  span: SpanSchema,
  header_span: SpanSchema.nullish(),
  body_span: SpanSchema.nullish(),
  text: z.string(),
  children: z.lazy(() => z.array(StructuralNodeSchema)),
});

const FunctionNodeSchema = z.object({
  kind: z.literal("function"),
  name: z.string().nullish(),
  span: SpanSchema,
  header_span: SpanSchema.nullish(),
  body_span: SpanSchema.nullish(),
  text: z.string(),
  children: z.lazy(() => z.array(StructuralNodeSchema)),
});

const LeafNodeSchema = z.object({
  kind: z.enum(LEAF_KINDS),
  name: z.string().nullish(),
  span: SpanSchema,
  text: z.string(),
  children: z.tuple([]),
});

const GapNodeSchema = z.object({
  kind: z.literal("other"),
  name: z.null().optional(),
  span: SpanSchema,
  text: z.string(),
  children: z.tuple([]),
});

export const StructuralNodeSchema: z.ZodType<StructuralNode> =
  z.discriminatedUnion("kind", [
    ContainerNodeSchema,
    FunctionNodeSchema,
    LeafNodeSchema,
    GapNodeSchema,
  ]);

export const StructuralTreeSchema = z.object({
  version: z.string(),
  file: z.string(),
  source_hash: z.string(),
  source_length: z.number().int().nonnegative(),
  nodes: z.array(StructuralNodeSchema),
});

export interface VerificationResult {
  ok: boolean;
  first_divergence_offset?: number;
  expected_length: number;
  actual_length: number;
}

// ============================================================================
// Comparison Types
// ============================================================================

/**
 * Normalized unit of multiset comparison. Absent names are "".
 */
export interface StructuralToken {
  kind: NodeKind;
  name: string;
}

export interface Mapping {
  renames: Record<string, string>;
  ignoreKinds: NodeKind[];
  ignoreNames: string[];
  // Token labels: "kind" or "kind name"
  ignoreTokens: string[];
}

export const MappingFileSchema = z.object({
  renames: z.record(z.string(), z.string()).optional(),
  symbol_renames: z.record(z.string(), z.string()).optional(),
  ignore_kinds: z.array(z.enum(NODE_KINDS)).optional(),
  ignore_names: z.array(z.string()).optional(),
  ignore_tokens: z.array(z.string()).optional(),
});

export type MappingFile = z.infer<typeof MappingFileSchema>;

export interface TokenDiff {
  token: StructuralToken;
  // Positive: the origin has more occurrences than the port
  delta: number;
}

export interface ComparisonResult {
  match: boolean;
  origin_multiset_size: number;
  ported_multiset_size: number;
  total_diffs: number;
  top_diffs: TokenDiff[];
}

export interface CompareOptions {
  top?: number;
}

// ============================================================================
// Reporting Types
// ============================================================================

export interface SymbolLocation {
  file: string;
  span: Span;
}

export interface SymbolEntry {
  kind: NodeKind;
  name: string;
  locations: SymbolLocation[];
}

export interface SourceDescriptor {
  inputPath: string; // Absolute path to the source file
  relativePath: string; // Path recorded in the tree's "file" field
  outputPath: string; // Target .lst.json path
}

// ============================================================================
// Context Types
// ============================================================================

export interface CommandContext {
  config: StructmatchConfig;
  tracker: Tracker;
  logger: Logger;
  verbose?: boolean;
}

// ============================================================================
// Tracker Types
// ============================================================================

export const EXIT_OK = 0;
export const EXIT_MISMATCH = 1;
export const EXIT_INPUT_ERROR = 2;

export type InputIssueReason =
  | "read-error"
  | "decode-error"
  | "invalid-json"
  | "schema-validation"
  | "invalid-mapping"
  | "write-error";

export type InputIssueType = "source" | "tree" | "mapping" | "config";

export interface InputIssue {
  type: InputIssueType;
  path: string;
  reason: InputIssueReason;
  details?: string;
}

export interface RunStats {
  totalFiles: number;
  successfulFiles: number;
  failedFiles: number;
  issues: InputIssue[];
  duration: number;
}

export interface ConfigError {
  path: string;
  error: unknown;
}
