import * as fs from "node:fs";
import * as path from "node:path";
import { z } from "zod";
import { DEFAULT_BASE_URL } from "./constants.js";
import type { SiteConfig } from "./types.js";

export class ConfigError extends Error {}

export interface CliFlags {
  version: boolean;
  help: boolean;
  root?: string;
  baseUrl?: string;
}

const VALUE_FLAGS = {
  "--root": "root",
  "--base-url": "baseUrl",
} as const;

function isValueFlag(arg: string): arg is keyof typeof VALUE_FLAGS {
  return Object.hasOwn(VALUE_FLAGS, arg);
}

export function parseCliFlags(args: string[]): CliFlags {
  const flags: CliFlags = { version: false, help: false };

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];
    if (arg === "--version" || arg === "-v") {
      flags.version = true;
      continue;
    }
    if (arg === "--help" || arg === "-h") {
      flags.help = true;
      continue;
    }

    const eq = arg.indexOf("=");
    const name = eq === -1 ? arg : arg.slice(0, eq);
    const inlineValue = eq === -1 ? undefined : arg.slice(eq + 1);
    if (!isValueFlag(name)) {
      throw new ConfigError(`Unknown option "${arg}". Run with --help for usage.`);
    }

    const value = inlineValue ?? args[++i];
    if (value === undefined || value === "") {
      throw new ConfigError(`Option "${name}" requires a value.`);
    }
    flags[VALUE_FLAGS[name]] = value;
  }

  return flags;
}

const siteConfigSchema = z.object({
  rootDir: z
    .string()
    .min(1, "Site root cannot be empty")
    .refine((dir) => fs.existsSync(dir) && fs.statSync(dir).isDirectory(), {
      message: "Site root must be an existing directory",
    }),
  baseUrl: z.string().min(1, "Base URL cannot be empty"),
});

/**
 * Builds the site configuration from command-line flags, falling back to
 * SITE_ROOT / SITE_BASE_URL and then to the working directory and "/".
 */
export function loadConfig(
  flags: Pick<CliFlags, "root" | "baseUrl">,
  env: NodeJS.ProcessEnv = process.env,
  cwd: string = process.cwd()
): SiteConfig {
  const root = flags.root ?? env.SITE_ROOT ?? cwd;
  const result = siteConfigSchema.safeParse({
    rootDir: path.resolve(cwd, root),
    baseUrl: flags.baseUrl ?? env.SITE_BASE_URL ?? DEFAULT_BASE_URL,
  });

  if (!result.success) {
    const [issue] = result.error.issues;
    const field = String(issue.path[0]);
    const received = field === "rootDir" ? path.resolve(cwd, root) : undefined;
    throw new ConfigError(received === undefined ? issue.message : `${issue.message}: ${received}`);
  }

  return result.data;
}
