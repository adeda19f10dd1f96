import * as fs from "node:fs/promises";
import * as os from "node:os";
import * as path from "node:path";
import sharp from "sharp";

export const GUTENBERG = { width: 300, height: 380 };

const tempDirs: string[] = [];

export async function makeTempDir(prefix: string): Promise<string> {
  const dir = await fs.mkdtemp(path.join(os.tmpdir(), `site-image-test-${prefix}-`));
  tempDirs.push(dir);
  return dir;
}

export async function removeTempDirs(): Promise<void> {
  for (const dir of tempDirs.splice(0)) {
    await fs.rm(dir, { recursive: true, force: true }).catch(() => {});
  }
}

export async function writeJpeg(filePath: string, width = GUTENBERG.width, height = GUTENBERG.height): Promise<void> {
  await fs.mkdir(path.dirname(filePath), { recursive: true });
  await sharp({
    create: { width, height, channels: 3, background: { r: 180, g: 120, b: 60 } },
  })
    .jpeg()
    .toFile(filePath);
}

export async function writePng(filePath: string, width: number, height: number): Promise<void> {
  await fs.mkdir(path.dirname(filePath), { recursive: true });
  await sharp({
    create: { width, height, channels: 4, background: { r: 10, g: 20, b: 30, alpha: 1 } },
  })
    .png()
    .toFile(filePath);
}

/**
 * Site layout used across tests:
 *   content/gutenberg.jpg, content/gallery/asset.jpg, static/gutenberg.jpg
 * all 300×380.
 */
export async function makeSite(prefix = "site"): Promise<string> {
  const root = await makeTempDir(prefix);
  await fs.mkdir(path.join(root, "static"), { recursive: true });
  await writeJpeg(path.join(root, "content", "gutenberg.jpg"));
  await writeJpeg(path.join(root, "content", "gallery", "asset.jpg"));
  await writeJpeg(path.join(root, "static", "gutenberg.jpg"));
  return root;
}
