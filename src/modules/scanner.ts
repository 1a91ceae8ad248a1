/**
 * Scanner Module
 * Lists the input folder, applies the format filter and derives output paths
 */

import glob from "fast-glob";
import path from "node:path";
import { deriveOutputPath, matchesFormatFilter } from "../utils";
import type { BatchContext, Candidate } from "../types";

/**
 * Scans the input folder (non-recursive) and populates context
 *
 * Reads from context:
 * - job
 *
 * Writes to context:
 * - candidates: Files to process, sorted by name
 */
export async function scan(ctx: BatchContext): Promise<void> {
  if (!ctx.job) {
    throw new Error("Validator must run before scanner");
  }

  const { job, tracker, logger } = ctx;

  // Same entries a shell `*` glob would expand to: no dot-files, no subfolders
  const entries = await glob("*", {
    cwd: job.inputFolder,
    onlyFiles: true,
    dot: false,
    deep: 1,
  });

  const sortedEntries = entries.sort((a, b) => a.localeCompare(b));
  tracker.setTotalFiles(sortedEntries.length);

  const candidates: Candidate[] = [];

  for (const filename of sortedEntries) {
    if (!matchesFormatFilter(filename, job.formatFilter)) {
      logger.debug(`Skipping ${filename}`);
      tracker.incrementSkipped();
      continue;
    }

    const inputPath = path.join(job.inputFolder, filename);
    candidates.push({
      inputPath,
      filename,
      outputPath: deriveOutputPath(inputPath, job.outputFolder, job.suffix),
    });
  }

  ctx.candidates = candidates;
}
