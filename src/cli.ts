#!/usr/bin/env tsx

import { Command } from "commander";
import { promises as fs } from "node:fs";
import path from "node:path";
import { pathToFileURL } from "node:url";
import { loadUploaderConfig, ConfigError, type LoadConfigOptions } from "./config";
import type { HostingBackend } from "./core/hosting/HostingBackendPort";
import { createHostingBackend } from "./platform/hosting";
import { SharpVariantRenderer } from "./platform/imageio/sharp";
import { listCandidateImages } from "./platform/source/folder";
import { writeGallery } from "./services/galleryWriter";
import { UploadOrchestrator, type UploadRunSummary } from "./services/UploadOrchestrator";
import { LedgerCorruptError, LedgerLockUnavailableError } from "./storage/errors";
import { withUploadLedger } from "./storage/UploadLedger";
import { createLogger, parseConsoleLevel, toPinoLevel } from "./utils/logger";

export interface CliOptions {
  consoleLogLevel?: string;
  directory?: string;
}

export function buildProgram(): Command {
  return new Command()
    .name("gallery-uploader")
    .description("Upload the images of a directory to an image host and write an HTML gallery")
    .option("-c, --console-log-level <level>", "numeric console log level (10 trace ... 60 fatal)")
    .option("-d, --directory <path>", "directory holding the images (default: working directory)");
}

export interface CliOverrides {
  config?: LoadConfigOptions;
  backend?: HostingBackend;
}

/** Resolve to the process exit code. */
export async function runCli(options: CliOptions, overrides: CliOverrides = {}): Promise<number> {
  const sourceDir = path.resolve(options.directory ?? process.cwd());

  try {
    const config = await loadUploaderConfig({ cwd: process.cwd(), ...overrides.config });
    const logger = createLogger({
      level: toPinoLevel(parseConsoleLevel(options.consoleLogLevel)),
      pretty: config.logPretty,
    });
    logger.info({ configFilePath: config.configFilePath, sourceDir }, "Loaded configuration");

    const backend = overrides.backend ?? createHostingBackend(config, logger);

    return await withUploadLedger(
      sourceDir,
      async (ledger) => {
        const candidates = await listCandidateImages(sourceDir, { logger });
        logger.info({ candidates: candidates.length }, "Found images to consider");

        // Runs on other directories share TMP_DIR; each gets its own scratch space.
        const workDir = await fs.mkdtemp(path.join(config.tmpDir, "gallery-uploader-"));
        let summary: UploadRunSummary;
        try {
          const orchestrator = new UploadOrchestrator({
            backend,
            renderer: new SharpVariantRenderer(),
            logger,
            sourceDir,
            workDir,
            variants: { full: config.fullVariant, thumb: config.thumbVariant },
          });
          summary = await orchestrator.run(candidates, ledger);
        } finally {
          await fs.rm(workDir, { recursive: true, force: true });
        }

        await writeGallery({
          outputPath: path.join(sourceDir, config.outputHtmlFilename),
          entries: summary.entries,
          headerPath: config.htmlHeaderPath,
          footerPath: config.htmlFooterPath,
          logger,
        });
        return 0;
      },
      { logger }
    );
  } catch (error) {
    if (error instanceof LedgerLockUnavailableError) {
      console.error(`Another instance of gallery-uploader is already running against ${sourceDir}: ${error.message}`);
      return 0;
    }
    if (error instanceof LedgerCorruptError) {
      console.error(error.message);
      return 1;
    }
    if (error instanceof ConfigError) {
      console.error(`Configuration error: ${error.message}`);
      return 1;
    }
    console.error("Unexpected error that stopped gallery-uploader:");
    console.error(error);
    return 1;
  }
}

const invokedDirectly = process.argv[1] !== undefined && import.meta.url === pathToFileURL(process.argv[1]).href;

if (invokedDirectly) {
  const program = buildProgram().parse(process.argv);
  runCli(program.opts<CliOptions>()).then(
    (code) => {
      process.exitCode = code;
    },
    (err) => {
      console.error("[gallery-uploader] fatal:", err);
      process.exit(1);
    }
  );
}
