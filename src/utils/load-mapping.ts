import { readFile } from "fs/promises";
import { InputError, toInputError } from "./errors";
import { createMapping, validateMapping } from "../modules/comparator";
import { MappingFileSchema, type Mapping } from "../types";

/**
 * Load a rename/ignore mapping
 * Throws InputError on unreadable or invalid files and on mappings whose
 * renames chain
 */
export async function loadMapping(filepath: string): Promise<Mapping> {
  let mapping: Mapping;

  try {
    const content = await readFile(filepath, "utf-8");
    mapping = createMapping(MappingFileSchema.parse(JSON.parse(content)));
  } catch (error) {
    throw toInputError(filepath, error);
  }

  const problems = validateMapping(mapping);
  if (problems.length > 0) {
    throw new InputError("invalid-mapping", filepath, problems.join("; "));
  }

  return mapping;
}
