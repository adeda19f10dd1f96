import * as path from "node:path";
import { CONTENT_DIR, CONTENT_SHORTHAND, STATIC_DIR } from "../constants.js";
import { SiteImageError } from "../errors.js";
import { isRegularFile, isWithinDirectory } from "../utils.js";

interface Candidate {
  root: string;
  filePath: string;
}

export function isAbsoluteLogicalPath(logicalPath: string): boolean {
  return logicalPath.startsWith("/") || logicalPath.startsWith("\\") || path.isAbsolute(logicalPath);
}

function startsWithDir(logicalPath: string, dir: string): boolean {
  return logicalPath.startsWith(`${dir}/`) || logicalPath.startsWith(`${dir}\\`);
}

/**
 * Lists the locations a logical path may refer to, in lookup order:
 * - `@/rest` is relative to the content root
 * - `content/...` and `static/...` are relative to the site root
 * - anything else is tried under content, then static, then the site root
 */
export function candidatePaths(baseDir: string, logicalPath: string): Candidate[] {
  const contentRoot = path.join(baseDir, CONTENT_DIR);
  const staticRoot = path.join(baseDir, STATIC_DIR);

  if (logicalPath.startsWith(CONTENT_SHORTHAND)) {
    const rest = logicalPath.slice(CONTENT_SHORTHAND.length);
    return [{ root: contentRoot, filePath: path.join(contentRoot, rest) }];
  }

  if (startsWithDir(logicalPath, CONTENT_DIR) || startsWithDir(logicalPath, STATIC_DIR)) {
    return [{ root: baseDir, filePath: path.join(baseDir, logicalPath) }];
  }

  return [contentRoot, staticRoot, baseDir].map((root) => ({
    root,
    filePath: path.join(root, logicalPath),
  }));
}

/**
 * Resolves a logical path to an existing file under the site root.
 * Returns null when no candidate exists; absolute paths throw.
 */
export async function resolveLogicalPath(baseDir: string, logicalPath: string): Promise<string | null> {
  if (isAbsoluteLogicalPath(logicalPath)) {
    throw new SiteImageError(
      "InvalidPath",
      `Absolute paths are not supported: ${logicalPath}. Use a path relative to the site, such as "@/", "content/" or "static/".`
    );
  }

  const resolvedBase = path.resolve(baseDir);
  for (const candidate of candidatePaths(resolvedBase, logicalPath)) {
    if (!isWithinDirectory(candidate.root, candidate.filePath)) continue;
    if (await isRegularFile(candidate.filePath)) {
      return candidate.filePath;
    }
  }

  return null;
}
