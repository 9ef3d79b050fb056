import { stat } from "fs/promises";

/**
 * Kind of filesystem entry at a path, or null when nothing is there
 */
export async function pathKind(
  path: string,
): Promise<"file" | "directory" | null> {
  try {
    const info = await stat(path);
    if (info.isDirectory()) return "directory";
    return info.isFile() ? "file" : null;
  } catch {
    return null;
  }
}
