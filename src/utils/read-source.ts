import { readFile } from "fs/promises";
import { toInputError } from "./errors";

/**
 * Raw bytes of a source file
 */
export async function readSource(filepath: string): Promise<Uint8Array> {
  try {
    return await readFile(filepath);
  } catch (error) {
    throw toInputError(filepath, error);
  }
}
