import { z } from "zod";
import { DEFAULT_FORMAT, DEFAULT_OP, MAX_DIMENSION, MAX_QUALITY, MIN_QUALITY, OUTPUT_FORMATS, RESIZE_OPS } from "../constants.js";

export const QUALITY_RANGE_MESSAGE = `\`resize_image\`: \`quality\` must be in range ${MIN_QUALITY}-${MAX_QUALITY}`;

const dimensionField = (name: "width" | "height") => {
  const message = `\`resize_image\`: \`${name}\` must be a non-negative integer`;
  return z
    .number({ invalid_type_error: message })
    .int(message)
    .min(0, message)
    .max(MAX_DIMENSION, message)
    .optional();
};

export const ResizeImageInputSchema = {
  path: z
    .string({
      required_error: "`resize_image` requires a `path` argument with a string value",
      invalid_type_error: "`resize_image` requires a `path` argument with a string value",
    })
    .describe('Logical image path: "@/..." (content root), "content/...", "static/...", or a bare relative path'),
  width: dimensionField("width").describe("Target width in pixels"),
  height: dimensionField("height").describe("Target height in pixels"),
  op: z
    .string({ invalid_type_error: "`resize_image`: `op` must be a string" })
    .default(DEFAULT_OP)
    .describe(`Resize operation: ${RESIZE_OPS.map((op) => `"${op}"`).join(", ")}. Default: "${DEFAULT_OP}"`),
  format: z
    .string({ invalid_type_error: "`resize_image`: `format` must be a string" })
    .default(DEFAULT_FORMAT)
    .describe(`Output format: ${OUTPUT_FORMATS.map((f) => `"${f}"`).join(", ")}. Default: "${DEFAULT_FORMAT}"`),
  quality: z
    .number({ invalid_type_error: "`resize_image`: `quality` must be a number" })
    .int("`resize_image`: `quality` must be a number")
    .min(MIN_QUALITY, QUALITY_RANGE_MESSAGE)
    .max(MAX_QUALITY, QUALITY_RANGE_MESSAGE)
    .optional()
    .describe(`Encoder quality (${MIN_QUALITY}-${MAX_QUALITY}) for JPEG, WebP and AVIF output`),
};

export const GetImageMetadataInputSchema = {
  path: z
    .string({
      required_error: "`get_image_metadata` requires a `path` argument with a string value",
      invalid_type_error: "`get_image_metadata` requires a `path` argument with a string value",
    })
    .describe('Logical image path: "@/..." (content root), "content/...", "static/...", or a bare relative path'),
  allow_missing: z
    .boolean({ invalid_type_error: "`get_image_metadata`: `allow_missing` must be a boolean (true or false)" })
    .default(false)
    .describe("Return null instead of failing when the image cannot be found"),
};

export const ProcessImagesInputSchema = {};

export const resizeImageArgsSchema = z.object(ResizeImageInputSchema).strict();
export const getImageMetadataArgsSchema = z.object(GetImageMetadataInputSchema).strict();

export type ResizeImageArgs = z.output<typeof resizeImageArgsSchema>;
export type ResizeImageInput = z.input<typeof resizeImageArgsSchema>;
export type GetImageMetadataArgs = z.output<typeof getImageMetadataArgsSchema>;
export type GetImageMetadataInput = z.input<typeof getImageMetadataArgsSchema>;
