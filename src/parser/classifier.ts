/**
 * Classifier
 * Heuristic recognition of construct kinds and names from statement heads.
 * Heads are "blanked" first: comment, directive and literal contents become
 * spaces so delimiters inside them never confuse the patterns below.
 */

import { Lexer, type LexEvent } from "./lexer";
import type { ContainerKind, LeafKind } from "../types";

export type BraceDecision = "body" | "inline";

export type Classification =
  | { kind: ContainerKind; name?: string }
  | { kind: "function"; name: string }
  | { kind: LeafKind; name?: string };

export interface StatementHead {
  // Blanked text from the statement start up to the body brace, or the
  // whole statement (";" included) when there is no body
  head: string;
  // Untouched statement text
  raw: string;
  hasBody: boolean;
  // Blanked text between the closing body brace and the statement end
  trailer?: string;
  // Unqualified name of the enclosing class or struct
  container?: string;
}

const KEYWORDS = new Set([
  "alignas",
  "alignof",
  "case",
  "catch",
  "co_await",
  "co_return",
  "co_yield",
  "decltype",
  "defined",
  "delete",
  "do",
  "else",
  "for",
  "if",
  "new",
  "noexcept",
  "requires",
  "return",
  "sizeof",
  "static_assert",
  "switch",
  "throw",
  "typeid",
  "while",
]);

const NAMESPACE_HEAD = /^(?:inline\s+)?namespace\b([\s\S]*)$/;
const NAMESPACE_ALIAS = /^namespace\s+([A-Za-z_]\w*)\s*=/;
const QUALIFIED_IDENTIFIER = /[A-Za-z_]\w*(?:\s*::\s*[A-Za-z_]\w*)*/g;
const TYPE_HEAD =
  /^(?:(?:typedef|static|const|volatile|constexpr|inline|friend|extern|mutable)\s+)*(class|struct|union|enum)\b/;
const DECORATION_CALL = /\b(?:__attribute__|__declspec|alignas)\s*\(/g;
const ATTRIBUTE_LIST = /\[\[[\s\S]*?\]\]/g;
const CTOR_INITIALIZER =
  /\)\s*(?:(?:const|noexcept|[A-Z_][A-Z0-9_]*)\s*)*:(?!:)/;
const NAME_BEFORE_PAREN =
  /((?:[A-Za-z_]\w*\s*(?:<[^<>()]*>\s*)?::\s*)*~?\s*[A-Za-z_]\w*)\s*$/;
const OPERATOR_BEFORE_PAREN =
  /((?:[A-Za-z_]\w*\s*(?:<[^<>()]*>\s*)?::\s*)*)operator\b\s*([\s\S]*?)\s*$/;
const MACRO_NAME = /^[A-Z][A-Z0-9_]*$/;
const PROTOTYPE_TAIL =
  /^(?:\s+|const\b|volatile\b|noexcept\b(?:\s*\([^()]*\))?|override\b|final\b|throw\s*\([^()]*\)|&&?|->[^;=]+|=\s*(?:0|default|delete)\b|[A-Z_][A-Z0-9_]*\b(?:\s*\([^()]*\))?)*$/;
const DIRECTIVE_INCLUDE =
  /^#\s*(?:include|include_next|import)\b\s*(<[^>\n]*>|"[^"\n]*"|[^\s/]+)?/;
const IMPORT_STATEMENT = /^(?:export\s+)?import\s+(?:static\s+)?([^;]+?)\s*;$/;

// ============================================================================
// Text helpers
// ============================================================================

/**
 * Copy of src[start, end) where comments and directive lines become spaces
 * and literals keep only their quote characters
 */
export function blankTrivia(src: string, start: number, end: number): string {
  const chars = src.slice(start, end).split("");
  const lexer = new Lexer(src, start, end);
  let event: LexEvent | null;

  while ((event = lexer.next()) !== null) {
    if (event.type === "char") continue;
    for (let i = event.start; i < event.end; i++) {
      if (src[i] !== "\n") chars[i - start] = " ";
    }
    if (event.type === "literal" && event.end - event.start >= 2) {
      chars[event.start - start] = '"';
      chars[event.end - 1 - start] = '"';
    }
  }

  return chars.join("");
}

/**
 * Index of the delimiter closing the one at `open`, or -1
 */
function findClosing(text: string, open: number): number {
  const opener = text[open];
  const closer = opener === "(" ? ")" : opener === "[" ? "]" : ">";
  let depth = 0;
  let parens = 0;

  for (let i = open; i < text.length; i++) {
    const ch = text[i];
    if (opener === "<") {
      // Parentheses shield comparison operators inside template arguments
      if (ch === "(") parens++;
      else if (ch === ")") parens--;
      if (parens > 0) continue;
    }
    if (ch === opener) depth++;
    else if (ch === closer) {
      depth--;
      if (depth === 0) return i;
    }
  }

  return -1;
}

function compact(name: string): string {
  return name.replace(/\s+/g, "");
}

function dropTemplateArguments(text: string): string {
  let previous: string;
  let current = text;
  do {
    previous = current;
    current = current.replace(/<[^<>]*>/g, "");
  } while (current !== previous);
  return current;
}

function dropGroups(text: string): string {
  let previous: string;
  let current = text;
  do {
    previous = current;
    current = current.replace(/\([^()]*\)/g, "").replace(/\[[^[\]]*\]/g, "");
  } while (current !== previous);
  return current;
}

/**
 * Head without template prefixes, attributes and export keyword
 */
export function stripDecorations(head: string): string {
  let text = head.trim();

  for (;;) {
    const template = /^template\s*</.exec(text);
    if (!template) break;
    const close = findClosing(text, template[0].length - 1);
    if (close === -1) break;
    text = text.slice(close + 1).trim();
  }

  text = text.replace(/^export\s+/, "").replace(ATTRIBUTE_LIST, " ");

  for (;;) {
    DECORATION_CALL.lastIndex = 0;
    const call = DECORATION_CALL.exec(text);
    if (!call) break;
    const open = call.index + call[0].length - 1;
    const close = findClosing(text, open);
    text = `${text.slice(0, call.index)} ${close === -1 ? "" : text.slice(close + 1)}`;
  }

  return text.trim();
}

/**
 * True when an "=" outside parentheses marks the head as an initializer
 * (operator names excluded)
 */
export function hasTopLevelAssignment(text: string): boolean {
  const withoutOperators = text.replace(
    /\boperator\s*(?:\(\)|\[\]|[^\s\w(]+)/g,
    " operator ",
  );
  return /(?:^|[^=!<>+\-*/%&|^~])=(?!=)/.test(dropGroups(withoutOperators));
}

// ============================================================================
// Brace handling
// ============================================================================

/**
 * Whether a "{" at statement level opens a body or belongs to an expression
 * (initializer lists, braced member initializers)
 */
export function decideBrace(head: string): BraceDecision {
  const text = stripDecorations(head);

  if (hasTopLevelAssignment(text)) return "inline";
  if (CTOR_INITIALIZER.test(text) && /[\w>]$/.test(text)) return "inline";

  return "body";
}

function typeKeyword(
  text: string,
): { keyword: string; rest: string } | null {
  const match = TYPE_HEAD.exec(text);
  if (!match) return null;

  const rest = text.slice(match[0].length);
  const colon = rest.search(/(?<!:):(?!:)/);
  const beforeColon = colon === -1 ? rest : rest.slice(0, colon);

  // "struct Foo* make()" declares a function returning a struct
  if (beforeColon.includes("(")) return null;

  return { keyword: match[1], rest: beforeColon };
}

/**
 * Whether the head introduces a class, struct, union or enum body, which
 * may be followed by declarators and a ";"
 */
export function isTypeHead(head: string): boolean {
  return typeKeyword(stripDecorations(head)) !== null;
}

// ============================================================================
// Classification
// ============================================================================

function classifyType(
  text: string,
  trailer: string | undefined,
): Classification | null {
  const type = typeKeyword(text);
  if (!type || type.keyword === "enum") return null;

  const kind: ContainerKind = type.keyword === "class" ? "class" : "struct";
  const candidates = dropTemplateArguments(type.rest)
    .replace(/\b(?:final|sealed)\b/g, " ")
    .match(QUALIFIED_IDENTIFIER);

  if (candidates) {
    return { kind, name: compact(candidates[candidates.length - 1]) };
  }

  // typedef struct { ... } Name;
  if (/^typedef\b/.test(text) && trailer) {
    const alias = /[A-Za-z_]\w*/.exec(trailer);
    if (alias) return { kind, name: alias[0] };
  }

  return { kind };
}

/**
 * Offset of the "(" opening the parameter list: the first parenthesis
 * outside template arguments, skipping the "()" of "operator()"
 */
function findParameterList(text: string): number {
  for (let i = 0; i < text.length; i++) {
    const ch = text[i];

    if (ch === "<") {
      const before = text.slice(0, i);
      if (/[\w>]\s*$/.test(before) && !/\boperator\s*<?$/.test(before)) {
        const close = findClosing(text, i);
        if (close !== -1) i = close;
      }
      continue;
    }

    if (ch === "(") {
      if (/\boperator\s*$/.test(text.slice(0, i)) && /^\(\s*\)\s*\(/.test(text.slice(i))) {
        i = text.indexOf(")", i);
        continue;
      }
      return i;
    }
  }

  return -1;
}

function functionName(before: string): { name: string; prefix: string } | null {
  const operator = OPERATOR_BEFORE_PAREN.exec(before);
  if (operator && operator[2].length > 0) {
    const symbol = operator[2].replace(/\s+/g, " ");
    const spaced = /^[A-Za-z_]/.test(symbol) ? ` ${symbol}` : symbol;
    return {
      name: `${dropTemplateArguments(compact(operator[1]))}operator${spaced}`,
      prefix: before.slice(0, operator.index),
    };
  }

  const match = NAME_BEFORE_PAREN.exec(before);
  if (!match) return null;

  const name = dropTemplateArguments(compact(match[1]));
  const last = name.slice(name.lastIndexOf(":") + 1).replace(/^~/, "");
  if (KEYWORDS.has(last)) return null;

  return { name, prefix: before.slice(0, match.index) };
}

function isPlausibleParameterList(params: string): boolean {
  const parts: string[] = [];
  let depth = 0;
  let current = "";

  for (const ch of params) {
    if (ch === "(" || ch === "<" || ch === "[" || ch === "{") depth++;
    else if (ch === ")" || ch === ">" || ch === "]" || ch === "}") depth--;
    if (ch === "," && depth === 0) {
      parts.push(current);
      current = "";
    } else {
      current += ch;
    }
  }
  parts.push(current);

  return parts.every((part) => {
    const p = part.trim();
    if (p === "" || p === "..." || p === "void") return true;
    if (/^(?:true|false|nullptr|NULL|this)\b/.test(p)) return false;
    return /^[A-Za-z_:]/.test(p);
  });
}

function classifyFunction(
  text: string,
  hasBody: boolean,
  container?: string,
): Classification | null {
  const open = findParameterList(text);
  if (open === -1) return null;

  const signature = functionName(text.slice(0, open));
  if (!signature) return null;

  const { name, prefix } = signature;
  if (hasTopLevelAssignment(prefix)) return null;
  // Bare ALL_CAPS calls are macro invocations, not declarations, unless
  // they name the enclosing type's constructor
  if (prefix.trim() === "" && MACRO_NAME.test(name) && name !== container) {
    return null;
  }

  const close = findClosing(text, open);
  if (close === -1) return null;

  if (!hasBody) {
    const tail = text.slice(close + 1).replace(/;\s*$/, "");
    if (!PROTOTYPE_TAIL.test(tail)) return null;
    if (!isPlausibleParameterList(text.slice(open + 1, close))) return null;
  }

  return { kind: "function", name };
}

function classifyAlias(text: string): Classification | null {
  const usingNamespace = /^using\s+namespace\s+([A-Za-z_:][\w:\s]*?)\s*;$/.exec(text);
  if (usingNamespace) return { kind: "using", name: compact(usingNamespace[1]) };

  const typeAlias = /^using\s+([A-Za-z_]\w*)\s*=/.exec(text);
  if (typeAlias) return { kind: "using", name: typeAlias[1] };

  const declaration = /^using\s+(?:typename\s+)?([A-Za-z_:][\w:\s<>,]*?)\s*;$/.exec(text);
  if (declaration) return { kind: "using", name: compact(declaration[1]) };

  const namespaceAlias = NAMESPACE_ALIAS.exec(text);
  if (namespaceAlias) return { kind: "using", name: namespaceAlias[1] };

  if (/^typedef\b/.test(text)) {
    const pointer = /\(\s*[*&^]\s*(?:[A-Za-z_]\w*\s*::\s*\*\s*)?([A-Za-z_]\w*)\s*\)\s*\(/.exec(text);
    if (pointer) return { kind: "using", name: pointer[1] };

    const identifiers = text
      .replace(/\[[^\]]*\]/g, " ")
      .replace(/;\s*$/, "")
      .match(/[A-Za-z_]\w*/g);
    const name = identifiers ? identifiers[identifiers.length - 1] : undefined;
    return name && name !== "typedef" ? { kind: "using", name } : { kind: "using" };
  }

  return null;
}

/**
 * Kind and name of a statement, or null when it is not a recognized
 * construct
 */
export function classifyStatement(statement: StatementHead): Classification | null {
  const text = stripDecorations(statement.head);

  if (statement.hasBody) {
    const namespace = NAMESPACE_HEAD.exec(text);
    if (namespace) {
      const name = /^[A-Za-z_]\w*(?:\s*::\s*(?:inline\s+)?[A-Za-z_]\w*)*/.exec(
        namespace[1].trim(),
      );
      return name
        ? { kind: "namespace", name: compact(name[0].replace(/\binline\s+/g, "")) }
        : { kind: "namespace" };
    }

    if (TYPE_HEAD.test(text)) {
      const type = classifyType(text, statement.trailer);
      if (type || typeKeyword(text)) return type;
    }

    return classifyFunction(text, true, statement.container);
  }

  const imported = IMPORT_STATEMENT.exec(statement.raw.trim());
  if (imported) return { kind: "include", name: imported[1].trim() };

  const alias = classifyAlias(text);
  if (alias) return alias;

  // Forward declarations ("class Foo;") carry no structure
  if (typeKeyword(text)) return null;

  return classifyFunction(text, false, statement.container);
}

/**
 * Include/import directives name their target; every other directive is a
 * nameless macro
 */
export function classifyDirective(text: string): {
  kind: "include" | "macro";
  name?: string;
} {
  const include = DIRECTIVE_INCLUDE.exec(text);
  if (include) {
    return include[1] ? { kind: "include", name: include[1] } : { kind: "include" };
  }
  return { kind: "macro" };
}
