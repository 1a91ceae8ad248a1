/**
 * Processor Module
 * Invokes the job's command once per candidate, one file at a time
 */

import { buildInvocationEnv, formatCommand } from "../utils";
import type { BatchContext, InvocationResult } from "../types";

/**
 * Runs the command for every candidate
 *
 * The input and output paths are appended to the command template as two
 * separate argv entries. A failed invocation is recorded and the batch moves
 * on, unless the job's failure policy is "fail-fast".
 *
 * Reads from context:
 * - job, candidates
 *
 * Writes to context:
 * - results: One InvocationResult per invocation, in run order
 * - aborted: True when fail-fast stopped the batch
 */
export async function process(ctx: BatchContext): Promise<void> {
  if (!ctx.job || !ctx.candidates) {
    throw new Error("Validator and scanner must run before processor");
  }

  const { job, candidates, tracker, logger } = ctx;
  const env = buildInvocationEnv(job.toolPath);
  const results: InvocationResult[] = [];

  ctx.results = results;

  for (const candidate of candidates) {
    const argv = [...job.commandTemplate, candidate.inputPath, candidate.outputPath];

    if (job.dryRun) {
      console.log(formatCommand(argv));
      tracker.incrementPlanned();
      continue;
    }

    logger.debug(`$ ${formatCommand(argv)}`);

    const startTime = Date.now();
    const outcome = await ctx.invoke(argv, { env });
    const result: InvocationResult = {
      inputPath: candidate.inputPath,
      outputPath: candidate.outputPath,
      exitCode: outcome.exitCode,
      signal: outcome.signal,
      duration: Date.now() - startTime,
      ...(outcome.error ? { error: outcome.error } : {}),
    };
    results.push(result);

    if (!outcome.error && outcome.exitCode === 0) {
      tracker.incrementSuccessful();
      continue;
    }

    tracker.trackInvocation(result);
    logger.warn(`${candidate.filename} failed`);

    if (job.failurePolicy === "fail-fast") {
      logger.error(`Stopping batch after ${candidate.filename} failed (--fail-fast)`);
      ctx.aborted = true;
      break;
    }
  }
}
