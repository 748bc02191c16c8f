/**
 * Sharp-based variant renderer
 *
 * Produces the resized renditions (full and thumbnail) uploaded for each
 * source image, and probes files to decide whether they are images at all.
 */

import sharp from "sharp";
import { promises as fs } from "fs";
import path from "path";

export type VariantName = "full" | "thumb";

export interface VariantSpec {
  name: VariantName;
  width: number;
  height: number;
}

export interface VariantRenderer {
  /** Write the variant of `sourcePath` into `outputDir` and return its path. */
  render(sourcePath: string, variant: VariantSpec, outputDir: string): Promise<string>;
}

export class ImageRenderError extends Error {
  constructor(
    message: string,
    public readonly sourcePath: string,
    options?: ErrorOptions
  ) {
    super(message, options);
    this.name = "ImageRenderError";
  }
}

/** `photo.jpg` + thumb → `photo.thumb.jpg` */
export function variantFileName(sourcePath: string, variant: VariantName): string {
  const ext = path.extname(sourcePath);
  return `${path.basename(sourcePath, ext)}.${variant}${ext}`;
}

export class SharpVariantRenderer implements VariantRenderer {
  async render(sourcePath: string, variant: VariantSpec, outputDir: string): Promise<string> {
    const outputPath = path.join(outputDir, variantFileName(sourcePath, variant.name));

    try {
      await fs.mkdir(outputDir, { recursive: true });

      // rotate() with no angle applies the EXIF orientation
      await sharp(sourcePath)
        .rotate()
        .resize(variant.width, variant.height, {
          fit: "inside",
          withoutEnlargement: true,
          kernel: sharp.kernel.lanczos3,
        })
        .toFile(outputPath);

      return outputPath;
    } catch (error) {
      throw new ImageRenderError(
        `Failed to render ${variant.name} variant of ${sourcePath}: ${error instanceof Error ? error.message : String(error)}`,
        sourcePath,
        { cause: error }
      );
    }
  }
}

/** True when sharp recognises the file as an image with known dimensions. */
export async function probeImage(filePath: string): Promise<boolean> {
  try {
    const metadata = await sharp(filePath).metadata();
    return Boolean(metadata.format && metadata.width && metadata.height);
  } catch {
    return false;
  }
}
