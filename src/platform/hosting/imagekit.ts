/**
 * ImageKit hosting backend
 *
 * Uploads rendered variants to ImageKit and returns their public URL.
 *
 * Requirements:
 * - IMAGEKIT_PUBLIC_KEY
 * - IMAGEKIT_PRIVATE_KEY
 * - IMAGEKIT_URL_ENDPOINT
 */

import ImageKit from "imagekit";
import { promises as fs } from "node:fs";
import path from "node:path";
import type { Logger } from "pino";
import {
  UploadError,
  UploadRateLimitError,
  type HostingBackend,
} from "../../core/hosting/HostingBackendPort";

export interface ImageKitConfig {
  publicKey: string;
  privateKey: string;
  urlEndpoint: string;
  folder?: string; // e.g., "/gallery"
}

/** The slice of the ImageKit SDK this backend calls. */
export interface ImageKitUploadClient {
  upload(options: {
    file: Buffer;
    fileName: string;
    folder?: string;
    useUniqueFileName?: boolean;
    tags?: string[];
  }): Promise<{ url?: string; fileId?: string }>;
}

const HTTP_TOO_MANY_REQUESTS = 429;

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null;
}

function statusCodeOf(error: unknown): number | undefined {
  if (!isRecord(error)) return undefined;
  const metadata = error.$ResponseMetadata;
  if (isRecord(metadata) && typeof metadata.statusCode === "number") {
    return metadata.statusCode;
  }
  return typeof error.statusCode === "number" ? error.statusCode : undefined;
}

function messageOf(error: unknown): string {
  if (error instanceof Error) return error.message;
  if (isRecord(error) && typeof error.message === "string") return error.message;
  return String(error);
}

export class ImageKitBackend implements HostingBackend {
  readonly name = "ImageKit";

  constructor(
    private readonly client: ImageKitUploadClient,
    private readonly config: Pick<ImageKitConfig, "folder">,
    private readonly logger: Logger
  ) {}

  async upload(localFilePath: string): Promise<string> {
    const fileName = path.basename(localFilePath);

    let fileBuffer: Buffer;
    try {
      fileBuffer = await fs.readFile(localFilePath);
    } catch (error) {
      throw new UploadError(`Cannot read ${localFilePath}: ${messageOf(error)}`, { cause: error });
    }

    try {
      const response = await this.client.upload({
        file: fileBuffer,
        fileName,
        folder: this.config.folder || "/gallery",
        useUniqueFileName: true,
        tags: ["gallery-uploader"],
      });

      if (!response.url) {
        throw new UploadError(`ImageKit returned no URL for ${fileName}`);
      }

      this.logger.debug({ fileId: response.fileId, url: response.url, fileName }, "Image uploaded to ImageKit");
      return response.url;
    } catch (error) {
      if (error instanceof UploadError) throw error;
      if (statusCodeOf(error) === HTTP_TOO_MANY_REQUESTS) {
        throw new UploadRateLimitError(`Rate limit exceeded uploading ${fileName}: ${messageOf(error)}`, {
          cause: error,
        });
      }
      throw new UploadError(`Failed to upload ${fileName} to ImageKit: ${messageOf(error)}`, { cause: error });
    }
  }
}

export function createImageKitBackend(config: ImageKitConfig, logger: Logger): ImageKitBackend {
  if (!config.publicKey || !config.privateKey || !config.urlEndpoint) {
    throw new Error("Missing ImageKit credentials");
  }

  const imagekit = new ImageKit({
    publicKey: config.publicKey,
    privateKey: config.privateKey,
    urlEndpoint: config.urlEndpoint,
  });

  logger.info({ urlEndpoint: config.urlEndpoint }, "ImageKit backend initialized");
  return new ImageKitBackend(imagekit, { folder: config.folder }, logger);
}
