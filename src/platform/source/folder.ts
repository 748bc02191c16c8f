/**
 * Folder-based candidate enumeration
 *
 * Lists the regular files of a directory that decode as images. Everything
 * else (text files, the ledger, lock files) is left out without complaint.
 */

import { promises as fs } from "fs";
import path from "path";
import type { Logger } from "pino";
import { probeImage } from "../imageio/sharp";

export type ImageProbe = (filePath: string) => Promise<boolean>;

export interface ListCandidateOptions {
  probe?: ImageProbe;
  logger?: Logger;
}

/**
 * Return the file names (not paths) of the images directly inside
 * `directory`, sorted by name.
 */
export async function listCandidateImages(
  directory: string,
  options: ListCandidateOptions = {}
): Promise<string[]> {
  const probe = options.probe ?? probeImage;
  const dirents = await fs.readdir(directory, { withFileTypes: true });
  const fileNames = dirents
    .filter((dirent) => dirent.isFile())
    .map((dirent) => dirent.name)
    .sort();

  const candidates: string[] = [];
  for (const fileName of fileNames) {
    if (await probe(path.join(directory, fileName))) {
      candidates.push(fileName);
    } else {
      options.logger?.debug({ fileName }, "Not an image, skipping");
    }
  }
  return candidates;
}
