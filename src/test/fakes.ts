/**
 * In-process stand-ins for the hosting backend and the variant renderer,
 * plus temp directory helpers. Tests only.
 */

import { promises as fs } from "node:fs";
import os from "node:os";
import path from "node:path";
import { UploadError, type HostingBackend } from "../core/hosting/HostingBackendPort";
import type { VariantRenderer, VariantSpec } from "../platform/imageio/sharp";

export async function makeTempDir(prefix = "gallery-uploader-"): Promise<string> {
  return fs.mkdtemp(path.join(os.tmpdir(), prefix));
}

export async function removeTempDir(dir: string): Promise<void> {
  await fs.rm(dir, { recursive: true, force: true });
}

/** Returns `https://img.test/<uploaded file name>` or throws for the files told to fail. */
export class FakeHostingBackend implements HostingBackend {
  readonly name = "Fake";
  readonly uploads: string[] = [];
  private readonly failures = new Map<string, () => Error>();

  failFor(fileNamePart: string, makeError: () => Error = () => new UploadError(`upload refused for ${fileNamePart}`)): this {
    this.failures.set(fileNamePart, makeError);
    return this;
  }

  async upload(localFilePath: string): Promise<string> {
    const fileName = path.basename(localFilePath);
    this.uploads.push(fileName);
    for (const [part, makeError] of this.failures) {
      if (fileName.includes(part)) throw makeError();
    }
    return `https://img.test/${fileName}`;
  }
}

/** Writes a small marker file instead of a real rendition. */
export class FakeRenderer implements VariantRenderer {
  readonly calls: Array<{ sourcePath: string; variant: VariantSpec["name"] }> = [];

  async render(sourcePath: string, variant: VariantSpec, outputDir: string): Promise<string> {
    this.calls.push({ sourcePath, variant: variant.name });
    const ext = path.extname(sourcePath);
    const outputPath = path.join(outputDir, `${path.basename(sourcePath, ext)}.${variant.name}${ext}`);
    await fs.writeFile(outputPath, `${variant.name}:${variant.width}x${variant.height}`);
    return outputPath;
  }
}
