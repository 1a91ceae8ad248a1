import { describe, it, expect, vi, beforeEach, afterEach } from "vitest";
import type { PathLike } from "node:fs";
import { mkdir, mkdtemp, rm, writeFile } from "fs/promises";
import { tmpdir } from "node:os";
import path from "node:path";
import { resolveJob } from "./validator";
import { BatchRunner } from "../batch-runner";
import { ConfigError, Logger, fileExists } from "../utils";
import type { CommandInvoker } from "../utils";

// Paths listed here fail every access() check, the way a folder without
// read permission would for a non-root user
const denied = vi.hoisted(() => new Set<string>());

vi.mock("fs/promises", async (importOriginal) => {
  const actual = await importOriginal<typeof import("fs/promises")>();
  return {
    ...actual,
    access: async (target: PathLike, mode?: number) => {
      if (denied.has(String(target))) {
        throw Object.assign(
          new Error(`EACCES: permission denied, access '${String(target)}'`),
          { code: "EACCES" },
        );
      }
      return actual.access(target, mode);
    },
  };
});

describe("resolveJob", () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(path.join(tmpdir(), "batchrun-validate-"));
  });

  afterEach(async () => {
    denied.clear();
    await rm(dir, { recursive: true, force: true });
  });

  describe("command", () => {
    it("is required", async () => {
      await expect(resolveJob({}, dir)).rejects.toThrow(ConfigError);
      await expect(resolveJob({ command: "   " }, dir)).rejects.toThrow(
        /No command specified/,
      );
    });

    it("cannot begin with a dash", async () => {
      await expect(resolveJob({ command: "-i photos" }, dir)).rejects.toThrow(
        /cannot begin with "-"/,
      );
    });

    it("must have balanced quotes", async () => {
      await expect(
        resolveJob({ command: 'im-colorfx -c "rgb(1, 2' }, dir),
      ).rejects.toThrow(/Unterminated double quote/);
    });

    it("must name a program", async () => {
      await expect(resolveJob({ command: '"" -a 80' }, dir)).rejects.toThrow(
        /no program to run/,
      );
    });
  });

  it("applies defaults: input is the working directory, output is the input", async () => {
    const job = await resolveJob({ command: "im-sepia -a 80" }, dir);

    expect(job).toEqual({
      commandTemplate: ["im-sepia", "-a", "80"],
      inputFolder: dir,
      outputFolder: dir,
      formatFilter: [],
      suffix: null,
      toolPath: null,
      failurePolicy: "continue",
      dryRun: false,
    });
  });

  it("resolves relative folders against the working directory", async () => {
    await mkdir(path.join(dir, "photos"));

    const job = await resolveJob(
      { command: "im-sepia", inputFolder: "photos", outputFolder: "out" },
      dir,
    );

    expect(job.inputFolder).toBe(path.join(dir, "photos"));
    expect(job.outputFolder).toBe(path.join(dir, "out"));
  });

  it("parses the format filter and normalizes the suffix", async () => {
    const job = await resolveJob(
      { command: "im-sepia", format: "JPG, png", suffix: ".tiff", failFast: true, dryRun: true },
      dir,
    );

    expect(job.formatFilter).toEqual(["jpg", "png"]);
    expect(job.suffix).toBe("tiff");
    expect(job.failurePolicy).toBe("fail-fast");
    expect(job.dryRun).toBe(true);
  });

  it("rejects a suffix that is a path", async () => {
    await expect(
      resolveJob({ command: "im-sepia", suffix: "../x" }, dir),
    ).rejects.toThrow(/must be a file extension/);
  });

  describe("input folder", () => {
    it("must not be an empty path", async () => {
      await expect(
        resolveJob({ command: "im-sepia", inputFolder: "" }, dir),
      ).rejects.toThrow(/Input folder path is empty/);
    });

    it("must exist", async () => {
      await expect(
        resolveJob({ command: "im-sepia", inputFolder: "missing" }, dir),
      ).rejects.toThrow(/does not exist/);
    });

    it("must be a directory", async () => {
      await writeFile(path.join(dir, "a.jpg"), "");
      await expect(
        resolveJob({ command: "im-sepia", inputFolder: "a.jpg" }, dir),
      ).rejects.toThrow(/Input folder .* is not a directory/);
    });

    it("must be readable", async () => {
      const input = path.join(dir, "locked");
      await mkdir(input);
      denied.add(input);

      await expect(
        resolveJob({ command: "im-sepia", inputFolder: input }, dir),
      ).rejects.toThrow(/Input folder .* is not readable/);
    });

    it("may be empty", async () => {
      await mkdir(path.join(dir, "empty"));
      const job = await resolveJob({ command: "im-sepia", inputFolder: "empty" }, dir);
      expect(job.inputFolder).toBe(path.join(dir, "empty"));
    });
  });

  describe("output folder", () => {
    it("is created when missing, including parents", async () => {
      const output = path.join(dir, "out", "sepia");

      await resolveJob({ command: "im-sepia", outputFolder: output }, dir);

      expect(await fileExists(output)).toBe(true);
    });

    it("must be a directory when it exists", async () => {
      await writeFile(path.join(dir, "out"), "");
      await expect(
        resolveJob({ command: "im-sepia", outputFolder: "out" }, dir),
      ).rejects.toThrow(/Output folder .* is not a directory/);
    });

    it("must be readable when it exists", async () => {
      const output = path.join(dir, "out");
      await mkdir(output);
      denied.add(output);

      await expect(
        resolveJob({ command: "im-sepia", outputFolder: output }, dir),
      ).rejects.toThrow(ConfigError);
    });

    it("is not created when another option is invalid", async () => {
      const output = path.join(dir, "out");

      await expect(
        resolveJob(
          { command: "im-sepia", outputFolder: output, toolPath: "no-such-dir" },
          dir,
        ),
      ).rejects.toThrow(/Image tool path .* is not an existing directory/);
      expect(await fileExists(output)).toBe(false);
    });
  });

  it("resolves an existing tool path", async () => {
    await mkdir(path.join(dir, "im-bin"));
    const job = await resolveJob({ command: "im-sepia", toolPath: "im-bin" }, dir);
    expect(job.toolPath).toBe(path.join(dir, "im-bin"));
  });

  it("runs no command when the output folder is unreadable", async () => {
    const input = path.join(dir, "in");
    const output = path.join(dir, "out");
    await mkdir(input);
    await mkdir(output);
    await writeFile(path.join(input, "a.jpg"), "");
    denied.add(output);

    const invoke = vi.fn<CommandInvoker>(async () => ({ exitCode: 0, signal: null }));
    const runner = new BatchRunner(
      { command: "im-sepia", inputFolder: input, outputFolder: output },
      { invoke, logger: new Logger("error") },
    );

    await expect(runner.run()).rejects.toThrow(/Output folder .* is not readable/);
    expect(invoke).not.toHaveBeenCalled();
  });
});
