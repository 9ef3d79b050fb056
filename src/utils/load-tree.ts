import { readFile } from "fs/promises";
import { toInputError } from "./errors";
import { StructuralTreeSchema, type StructuralTree } from "../types";

/**
 * Parse and validate tree JSON. Unknown fields are dropped.
 */
export function parseTree(content: string): StructuralTree {
  return StructuralTreeSchema.parse(JSON.parse(content));
}

/**
 * Load a tree artifact
 * Throws InputError when the file is unreadable, not JSON or not a tree
 */
export async function loadTree(filepath: string): Promise<StructuralTree> {
  try {
    const content = await readFile(filepath, "utf-8");
    return parseTree(content);
  } catch (error) {
    throw toInputError(filepath, error);
  }
}
