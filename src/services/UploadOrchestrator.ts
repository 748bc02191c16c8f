/**
 * Upload Orchestrator
 *
 * Drives the per-file pipeline for one run:
 *   Pending → Skipped                       (already in the ledger)
 *   Pending → Uploading → Recorded | Failed (full, then thumbnail)
 *
 * A failed file stays Pending for the next run; it never stops the batch.
 * Ledger errors do stop the batch: a file must never count as uploaded
 * without a durable record.
 */

import { promises as fs } from "node:fs";
import path from "node:path";
import type { Logger } from "pino";
import { UploadRateLimitError, type HostingBackend } from "../core/hosting/HostingBackendPort";
import type { VariantRenderer, VariantSpec } from "../platform/imageio/sharp";
import { LedgerError } from "../storage/errors";
import type { LedgerEntry } from "../storage/ledgerCodec";

/** What the orchestrator needs from the ledger. UploadLedger satisfies it. */
export interface ProcessedImageLedger {
  isAlreadyProcessed(fileName: string): boolean;
  recordProcessed(fileName: string, fullImageURL: string, thumbImageURL: string): Promise<LedgerEntry>;
  entries(): readonly LedgerEntry[];
}

export interface UploadOrchestratorDeps {
  backend: HostingBackend;
  renderer: VariantRenderer;
  logger: Logger;
  /** Directory the candidate file names are relative to. */
  sourceDir: string;
  /** Scratch directory for rendered variants. */
  workDir: string;
  variants: { full: VariantSpec; thumb: VariantSpec };
}

export interface FailedFile {
  fileName: string;
  reason: string;
  rateLimited: boolean;
}

export interface UploadRunSummary {
  /** Every ledger entry after the run, earlier runs first. */
  entries: readonly LedgerEntry[];
  recorded: string[];
  skipped: string[];
  failed: FailedFile[];
}

export class UploadOrchestrator {
  private readonly logger: Logger;

  constructor(private readonly deps: UploadOrchestratorDeps) {
    this.logger = deps.logger.child({ module: "upload-orchestrator" });
  }

  async run(candidateFiles: readonly string[], ledger: ProcessedImageLedger): Promise<UploadRunSummary> {
    const summary: UploadRunSummary = { entries: [], recorded: [], skipped: [], failed: [] };

    for (const fileName of candidateFiles) {
      if (ledger.isAlreadyProcessed(fileName)) {
        this.logger.info({ fileName }, "Skipped already uploaded file");
        summary.skipped.push(fileName);
        continue;
      }

      this.logger.info({ fileName, backend: this.deps.backend.name }, "Processing file");

      let urls: { full: string; thumb: string };
      try {
        urls = await this.uploadVariants(fileName);
      } catch (error) {
        if (error instanceof LedgerError) throw error;
        const rateLimited = error instanceof UploadRateLimitError;
        const reason = error instanceof Error ? error.message : String(error);
        this.logger.warn({ fileName, err: error, rateLimited }, `Skipping file ${fileName}: ${reason}`);
        summary.failed.push({ fileName, reason, rateLimited });
        continue;
      }

      await ledger.recordProcessed(fileName, urls.full, urls.thumb);
      summary.recorded.push(fileName);
    }

    summary.entries = ledger.entries();
    this.logger.info(
      {
        recorded: summary.recorded.length,
        skipped: summary.skipped.length,
        failed: summary.failed.length,
        total: summary.entries.length,
      },
      "Upload run finished"
    );
    return summary;
  }

  private async uploadVariants(fileName: string): Promise<{ full: string; thumb: string }> {
    const sourcePath = path.join(this.deps.sourceDir, fileName);
    const full = await this.uploadVariant(sourcePath, this.deps.variants.full);
    this.logger.info({ fileName, url: full }, "Uploaded full image");
    const thumb = await this.uploadVariant(sourcePath, this.deps.variants.thumb);
    this.logger.info({ fileName, url: thumb }, "Uploaded thumb image");
    return { full, thumb };
  }

  private async uploadVariant(sourcePath: string, variant: VariantSpec): Promise<string> {
    this.logger.debug({ sourcePath, variant }, "Rendering variant");
    const variantPath = await this.deps.renderer.render(sourcePath, variant, this.deps.workDir);
    try {
      return await this.deps.backend.upload(variantPath);
    } finally {
      await fs.rm(variantPath, { force: true });
    }
  }
}
