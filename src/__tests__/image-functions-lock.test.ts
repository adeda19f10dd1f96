import { describe, it, expect, vi, beforeAll, afterAll } from "vitest";
import { SiteImageFunctions } from "../services/image-functions.js";
import { resolveLogicalPath } from "../services/path-resolver.js";
import { makeSite, removeTempDirs } from "./helpers/site.js";

vi.mock("../services/path-resolver.js", async (importOriginal) => {
  const actual = await importOriginal<typeof import("../services/path-resolver.js")>();
  return { ...actual, resolveLogicalPath: vi.fn(actual.resolveLogicalPath) };
});

let root: string;

beforeAll(async () => {
  root = await makeSite("lock");
});

afterAll(removeTempDirs);

describe("SiteImageFunctions processor lock", () => {
  it("never interleaves resize requests", async () => {
    const actual = await vi.importActual<typeof import("../services/path-resolver.js")>(
      "../services/path-resolver.js"
    );
    const events: string[] = [];
    vi.mocked(resolveLogicalPath).mockImplementation(async (baseDir, logicalPath) => {
      events.push(`resolve:start ${logicalPath}`);
      await new Promise((resolve) => setTimeout(resolve, 10));
      const file = await actual.resolveLogicalPath(baseDir, logicalPath);
      events.push(`resolve:end ${logicalPath}`);
      return file;
    });

    const functions = new SiteImageFunctions({ rootDir: root, baseUrl: "/" });
    const insert = functions.processor.insert.bind(functions.processor);
    vi.spyOn(functions.processor, "insert").mockImplementation((operation) => {
      events.push(`insert ${operation.logicalPath}`);
      return insert(operation);
    });

    const paths = ["@/gutenberg.jpg", "static/gutenberg.jpg", "content/gutenberg.jpg"];
    await Promise.all(paths.map((p) => functions.resizeImage({ path: p, width: 20, height: 20 })));

    expect(events).toEqual(paths.flatMap((p) => [`resolve:start ${p}`, `resolve:end ${p}`, `insert ${p}`]));
  });

  it("lets metadata lookups run while a resize holds the lock", async () => {
    const actual = await vi.importActual<typeof import("../services/path-resolver.js")>(
      "../services/path-resolver.js"
    );
    const events: string[] = [];
    vi.mocked(resolveLogicalPath).mockImplementation(async (baseDir, logicalPath) => {
      events.push(`resolve:start ${logicalPath}`);
      if (logicalPath === "static/gutenberg.jpg") {
        await new Promise((resolve) => setTimeout(resolve, 20));
      }
      const file = await actual.resolveLogicalPath(baseDir, logicalPath);
      events.push(`resolve:end ${logicalPath}`);
      return file;
    });

    const functions = new SiteImageFunctions({ rootDir: root, baseUrl: "/" });
    await Promise.all([
      functions.resizeImage({ path: "static/gutenberg.jpg", width: 20, height: 20 }),
      functions.getImageMetadata({ path: "@/gutenberg.jpg" }),
    ]);

    expect(events.indexOf("resolve:end @/gutenberg.jpg")).toBeLessThan(
      events.indexOf("resolve:end static/gutenberg.jpg")
    );
  });
});
