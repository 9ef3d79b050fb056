import { writeFile, mkdir } from "fs/promises";
import { dirname } from "node:path";
import { toInputError } from "./errors";

/**
 * Write a file, creating its directory if it doesn't exist
 */
export async function writeText(filepath: string, content: string): Promise<void> {
  try {
    await mkdir(dirname(filepath), { recursive: true });
    await writeFile(filepath, content, "utf-8");
  } catch (error) {
    throw toInputError(filepath, error, "write");
  }
}

/**
 * Save a value as pretty-printed JSON
 */
export async function writeJson(filepath: string, value: unknown): Promise<void> {
  await writeText(filepath, `${JSON.stringify(value, null, 2)}\n`);
}
