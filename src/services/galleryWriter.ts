import { promises as fs } from "node:fs";
import path from "node:path";
import type { Logger } from "pino";
import type { LedgerEntry } from "../storage/ledgerCodec";

const LINK_SEPARATOR = "&nbsp;";

export function escapeHtmlAttribute(value: string): string {
  return value
    .replace(/&/g, "&amp;")
    .replace(/"/g, "&quot;")
    .replace(/</g, "&lt;")
    .replace(/>/g, "&gt;");
}

/** Thumbnail that opens the full image in a new tab. */
export function renderImageLink(entry: Pick<LedgerEntry, "fullImageURL" | "thumbImageURL">): string {
  return (
    `<a target="_blank" href="${escapeHtmlAttribute(entry.fullImageURL)}">` +
    `<img alt="Click here to enlarge the image!" src="${escapeHtmlAttribute(entry.thumbImageURL)}"></a>`
  );
}

export function renderGallery(entries: readonly LedgerEntry[], header = "", footer = ""): string {
  return header + entries.map((entry) => renderImageLink(entry) + LINK_SEPARATOR).join("") + footer;
}

async function exists(filePath: string): Promise<boolean> {
  try {
    await fs.access(filePath);
    return true;
  } catch {
    return false;
  }
}

/**
 * Move an existing file out of the way as `<name>.N`, N being the first free
 * index. Returns the new path, or null when there was nothing to move.
 */
export async function renameExistingFile(filePath: string): Promise<string | null> {
  if (!(await exists(filePath))) return null;

  for (let index = 1; ; index++) {
    const candidate = `${filePath}.${index}`;
    if (!(await exists(candidate))) {
      await fs.rename(filePath, candidate);
      return candidate;
    }
  }
}

async function loadTemplate(
  templatePath: string | undefined,
  kind: "header" | "footer",
  logger: Logger
): Promise<string> {
  if (!templatePath) return "";
  try {
    return await fs.readFile(templatePath, "utf-8");
  } catch (error) {
    logger.warn({ err: error, templatePath }, `Cannot use ${kind} HTML file, continuing without it`);
    return "";
  }
}

export interface WriteGalleryOptions {
  outputPath: string;
  entries: readonly LedgerEntry[];
  headerPath?: string;
  footerPath?: string;
  logger: Logger;
}

export async function writeGallery(options: WriteGalleryOptions): Promise<string> {
  const { outputPath, entries, logger } = options;

  const previous = await renameExistingFile(outputPath);
  if (previous) {
    logger.info({ previous }, "Kept previous gallery");
  }

  const header = await loadTemplate(options.headerPath, "header", logger);
  const footer = await loadTemplate(options.footerPath, "footer", logger);

  await fs.mkdir(path.dirname(outputPath), { recursive: true });
  await fs.writeFile(outputPath, renderGallery(entries, header, footer), "utf-8");
  logger.info({ outputPath, images: entries.length }, "Image gallery generated");
  return outputPath;
}
