import { parse as parseDotenv } from "dotenv";
import { z } from "zod";
import { promises as fs, constants as fsConstants } from "node:fs";
import os from "node:os";
import path from "node:path";
import type { ImageKitConfig } from "./platform/hosting/imagekit";
import type { VariantSpec } from "./platform/imageio/sharp";

export const CONFIG_FILE_NAME = ".gallery-uploader.env";

export class ConfigError extends Error {
  constructor(
    message: string,
    public readonly issues: string[] = []
  ) {
    super(issues.length > 0 ? `${message}:\n  - ${issues.join("\n  - ")}` : message);
    this.name = "ConfigError";
  }
}

const boolFromEnv = (defaultValue: boolean) =>
  z.preprocess((value) => {
    if (typeof value === "boolean") return value;
    if (typeof value === "string") {
      const normalized = value.trim().toLowerCase();
      if (normalized === "") return undefined;
      if (["true", "1", "yes", "y", "on"].includes(normalized)) return true;
      if (["false", "0", "no", "n", "off"].includes(normalized)) return false;
    }
    return value;
  }, z.boolean().default(defaultValue));

const pixels = (defaultValue: number) => z.coerce.number().int().positive().default(defaultValue);

const optionalString = z.preprocess(
  (value) => (typeof value === "string" && value.trim() === "" ? undefined : value),
  z.string().trim().optional()
);

const configSchema = z
  .object({
    TMP_DIR: z.string().trim().min(1, "is required"),
    OUTPUT_HTML_FILENAME: z
      .string()
      .trim()
      .regex(/^[A-Za-z0-9._-]+$/, "must contain only letters, digits, '.', '_' and '-'")
      .default("listing.html"),
    TARGET_WIDTH_PX: pixels(1280),
    TARGET_HEIGHT_PX: pixels(1280),
    THUMB_WIDTH_PX: pixels(320),
    THUMB_HEIGHT_PX: pixels(320),
    HTML_HEADER_PATH: optionalString,
    HTML_FOOTER_PATH: optionalString,
    HOSTING_BACKEND: z.enum(["imagekit"]).default("imagekit"),
    IMAGEKIT_PUBLIC_KEY: optionalString,
    IMAGEKIT_PRIVATE_KEY: optionalString,
    IMAGEKIT_URL_ENDPOINT: optionalString,
    IMAGEKIT_FOLDER: z.string().trim().default("/gallery"),
    LOG_PRETTY: boolFromEnv(true),
  })
  .superRefine((value, ctx) => {
    if (value.HOSTING_BACKEND !== "imagekit") return;
    for (const key of ["IMAGEKIT_PUBLIC_KEY", "IMAGEKIT_PRIVATE_KEY", "IMAGEKIT_URL_ENDPOINT"] as const) {
      if (!value[key]) {
        ctx.addIssue({ code: z.ZodIssueCode.custom, path: [key], message: "is required for the imagekit backend" });
      }
    }
  });

export type HostingBackendName = z.infer<typeof configSchema>["HOSTING_BACKEND"];

export interface UploaderConfig {
  configFilePath: string;
  tmpDir: string;
  outputHtmlFilename: string;
  fullVariant: VariantSpec;
  thumbVariant: VariantSpec;
  htmlHeaderPath?: string;
  htmlFooterPath?: string;
  hostingBackend: HostingBackendName;
  imageKit: ImageKitConfig;
  logPretty: boolean;
}

export interface LoadConfigOptions {
  cwd?: string;
  homeDir?: string;
  env?: NodeJS.ProcessEnv;
}

/** The user's file wins over the one in the working directory. */
export async function findConfigFile(cwd: string, homeDir: string): Promise<string> {
  const candidates = [path.join(homeDir, CONFIG_FILE_NAME), path.join(cwd, CONFIG_FILE_NAME)];
  for (const candidate of candidates) {
    try {
      await fs.access(candidate, fsConstants.R_OK);
      return candidate;
    } catch {
      continue;
    }
  }
  throw new ConfigError(`No config file was found, neither ${candidates[0]} nor ${candidates[1]}`);
}

async function checkWritableDirectory(dirPath: string): Promise<string | null> {
  try {
    const stats = await fs.stat(dirPath);
    if (!stats.isDirectory()) return `TMP_DIR: "${dirPath}" is not a directory`;
    await fs.access(dirPath, fsConstants.R_OK | fsConstants.W_OK);
    return null;
  } catch {
    return `TMP_DIR: "${dirPath}" does not exist or is not accessible`;
  }
}

/**
 * Parse already-loaded key/value pairs. Relative paths resolve against `baseDir`.
 */
export async function parseUploaderConfig(
  values: Record<string, string>,
  configFilePath: string,
  baseDir: string
): Promise<UploaderConfig> {
  const result = configSchema.safeParse(values);
  if (!result.success) {
    throw new ConfigError(
      `Invalid configuration in ${configFilePath}`,
      result.error.issues.map((issue) => `${issue.path.join(".")}: ${issue.message}`)
    );
  }

  const parsed = result.data;
  const tmpDir = path.resolve(baseDir, parsed.TMP_DIR);
  const tmpDirIssue = await checkWritableDirectory(tmpDir);
  if (tmpDirIssue) {
    throw new ConfigError(`Invalid configuration in ${configFilePath}`, [tmpDirIssue]);
  }

  return {
    configFilePath,
    tmpDir,
    outputHtmlFilename: parsed.OUTPUT_HTML_FILENAME,
    fullVariant: { name: "full", width: parsed.TARGET_WIDTH_PX, height: parsed.TARGET_HEIGHT_PX },
    thumbVariant: { name: "thumb", width: parsed.THUMB_WIDTH_PX, height: parsed.THUMB_HEIGHT_PX },
    htmlHeaderPath: parsed.HTML_HEADER_PATH ? path.resolve(baseDir, parsed.HTML_HEADER_PATH) : undefined,
    htmlFooterPath: parsed.HTML_FOOTER_PATH ? path.resolve(baseDir, parsed.HTML_FOOTER_PATH) : undefined,
    hostingBackend: parsed.HOSTING_BACKEND,
    imageKit: {
      publicKey: parsed.IMAGEKIT_PUBLIC_KEY ?? "",
      privateKey: parsed.IMAGEKIT_PRIVATE_KEY ?? "",
      urlEndpoint: parsed.IMAGEKIT_URL_ENDPOINT ?? "",
      folder: parsed.IMAGEKIT_FOLDER,
    },
    logPretty: parsed.LOG_PRETTY,
  };
}

/**
 * Locate and load `.gallery-uploader.env` (home directory first, then the
 * working directory). Variables already set in the environment override the
 * file.
 */
export async function loadUploaderConfig(options: LoadConfigOptions = {}): Promise<UploaderConfig> {
  const cwd = options.cwd ?? process.cwd();
  const homeDir = options.homeDir ?? os.homedir();
  const env = options.env ?? process.env;

  const configFilePath = await findConfigFile(cwd, homeDir);
  const fileValues = parseDotenv(await fs.readFile(configFilePath, "utf-8"));

  const values: Record<string, string> = { ...fileValues };
  for (const [key, value] of Object.entries(env)) {
    if (value !== undefined) values[key] = value;
  }

  return parseUploaderConfig(values, configFilePath, path.dirname(configFilePath));
}
