import * as fs from "node:fs/promises";
import * as path from "node:path";

export async function isRegularFile(filePath: string): Promise<boolean> {
  try {
    const stats = await fs.stat(filePath);
    return stats.isFile();
  } catch {
    return false;
  }
}

/**
 * True when `candidate` is `root` itself or lies below it once both are
 * resolved. `..` segments that climb out of `root` make this false.
 */
export function isWithinDirectory(root: string, candidate: string): boolean {
  const relative = path.relative(path.resolve(root), path.resolve(candidate));
  return relative === "" || (!relative.startsWith("..") && !path.isAbsolute(relative));
}

export function toPosix(filePath: string): string {
  return filePath.split(path.sep).join("/");
}

export function joinUrl(baseUrl: string, ...segments: string[]): string {
  const base = baseUrl.replace(/\/+$/, "");
  return [base, ...segments].join("/");
}
