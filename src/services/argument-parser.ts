import type { z } from "zod";
import {
  getImageMetadataArgsSchema,
  resizeImageArgsSchema,
  type GetImageMetadataArgs,
  type ResizeImageArgs,
} from "../schemas/index.js";
import { SiteImageError, type SiteImageErrorKind } from "../errors.js";

// Keys whose range violations are reported as InvalidRange; elsewhere a
// bound is part of the type (e.g. non-negative integers).
const RANGED_KEYS = new Set(["quality"]);

function kindForIssue(issue: z.ZodIssue): SiteImageErrorKind {
  switch (issue.code) {
    case "invalid_type":
      return issue.received === "undefined" ? "MissingArgument" : "InvalidArgumentType";
    case "unrecognized_keys":
      return "UnknownArgument";
    case "too_small":
    case "too_big":
      return RANGED_KEYS.has(String(issue.path[0])) ? "InvalidRange" : "InvalidArgumentType";
    default:
      return "InvalidArgumentType";
  }
}

function messageForIssue(functionName: string, issue: z.ZodIssue): string {
  if (issue.code === "unrecognized_keys") {
    const keys = issue.keys.map((key) => `\`${key}\``).join(", ");
    return `\`${functionName}\`: unknown argument(s) ${keys}`;
  }
  return issue.message;
}

function parseArgs<T extends z.ZodTypeAny>(functionName: string, schema: T, args: unknown): z.output<T> {
  const result = schema.safeParse(args ?? {});
  if (result.success) {
    return result.data;
  }
  const [issue] = result.error.issues;
  throw new SiteImageError(kindForIssue(issue), messageForIssue(functionName, issue), { cause: result.error });
}

/** Validates a named-argument bag for `resize_image`, applying defaults. */
export function parseResizeImageArgs(args: unknown): ResizeImageArgs {
  return parseArgs("resize_image", resizeImageArgsSchema, args);
}

/** Validates a named-argument bag for `get_image_metadata`, applying defaults. */
export function parseGetImageMetadataArgs(args: unknown): GetImageMetadataArgs {
  return parseArgs("get_image_metadata", getImageMetadataArgsSchema, args);
}
