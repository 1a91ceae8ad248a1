/**
 * Updater Module
 * Downloads the effect scripts named in the remote script list into binDir
 */

import { chmod, mkdir, writeFile } from "fs/promises";
import path from "node:path";
import {
  buildDownloadUrl,
  fetchBuffer,
  fetchText,
  parseScriptList,
} from "../utils";
import type { FetchOptions } from "../utils";
import type { UpdateContext } from "../types";

const SCRIPT_MODE = 0o755;

function fetchOptions(ctx: UpdateContext): FetchOptions {
  return {
    timeout: ctx.config.timeout,
    retries: ctx.config.retries,
    retryDelay: ctx.retryDelay,
    fetch: ctx.fetch,
  };
}

/**
 * Fetches and parses the script list
 * A failed list fetch is fatal and propagates to the caller
 *
 * Writes to context:
 * - scripts: Names to download, in list order
 */
export async function fetchList(ctx: UpdateContext): Promise<void> {
  const { config, tracker, logger } = ctx;

  logger.debug(`Fetching script list from ${config.listUrl}`);
  const content = await fetchText(config.listUrl, fetchOptions(ctx));
  const { scripts, invalid } = parseScriptList(content);

  for (const entry of invalid) {
    tracker.trackIssue({
      type: "resource",
      path: config.listUrl,
      reason: "invalid-entry",
      details: `Skipped invalid script name "${entry}"`,
    });
  }

  if (ctx.only && ctx.only.length > 0) {
    const listed = new Set(scripts);
    for (const name of ctx.only) {
      if (!listed.has(name)) {
        logger.warn(`"${name}" is not in the script list`);
      }
    }
    const wanted = new Set(ctx.only);
    ctx.scripts = scripts.filter((name) => wanted.has(name));
  } else {
    ctx.scripts = scripts;
  }

  logger.debug(`${ctx.scripts.length} scripts to download`);
}

/**
 * Downloads every listed script, one at a time
 * A failed download is recorded and the loop moves on
 *
 * Reads from context:
 * - scripts
 *
 * Writes to context:
 * - written: Paths of the scripts saved to disk
 */
export async function download(ctx: UpdateContext): Promise<void> {
  if (!ctx.scripts) {
    throw new Error("fetchList must run before download");
  }

  const { config, scripts, binDir, tracker } = ctx;
  const written: string[] = [];
  ctx.written = written;

  if (!ctx.dryRun) {
    await mkdir(binDir, { recursive: true });
  }

  for (const script of scripts) {
    const url = buildDownloadUrl(config.downloadUrl, script);
    const target = path.join(binDir, `${config.prefix}${script}`);

    if (ctx.dryRun) {
      console.log(`${url} -> ${target}`);
      tracker.incrementPlanned();
      continue;
    }

    // Progress goes to stderr, the way the shell updater reports it
    console.error(`downloading ${script}`);

    // Scripts are saved byte for byte; not every one is valid UTF-8
    let body: Buffer;
    try {
      body = await fetchBuffer(url, fetchOptions(ctx));
    } catch (error) {
      tracker.trackError(script, error, "download", "fetch");
      tracker.incrementScriptsFailed();
      continue;
    }

    try {
      await writeFile(target, body);
      await chmod(target, SCRIPT_MODE);
    } catch (error) {
      tracker.trackError(target, error, "download", "write");
      tracker.incrementScriptsFailed();
      continue;
    }

    written.push(target);
    tracker.incrementScriptsDownloaded();
  }
}
