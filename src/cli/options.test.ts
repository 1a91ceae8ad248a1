import { describe, it, expect } from "vitest";
import path from "node:path";
import { toJobOptions, toUpdateSettings } from "./options";
import { PACKAGE_ROOT } from "../utils";
import type { AppConfig } from "../types";

const config: AppConfig = {
  batch: { toolPath: "/opt/imagemagick/bin", failFast: true },
  updater: {
    listUrl: "http://scripts.test/script_list.txt",
    downloadUrl: "http://scripts.test/download/{script}",
    binDir: "bin",
    prefix: "im-",
    timeout: 1000,
    retries: 0,
  },
  logging: { level: "info" },
};

describe("toJobOptions", () => {
  it("maps the flags onto job options", () => {
    expect(
      toJobOptions(
        {
          command: "im-sepia -a 80",
          input: "photos",
          output: "sepia",
          format: "jpg,png",
          suffix: "tiff",
          dryRun: true,
        },
        config,
      ),
    ).toEqual({
      command: "im-sepia -a 80",
      inputFolder: "photos",
      outputFolder: "sepia",
      format: "jpg,png",
      suffix: "tiff",
      toolPath: "/opt/imagemagick/bin",
      failFast: true,
      dryRun: true,
    });
  });

  it("lets -p override the configured tool path", () => {
    const options = toJobOptions({ command: "im-sepia", path2imagemagick: "/usr/local/bin" }, config);
    expect(options.toolPath).toBe("/usr/local/bin");
  });

  it("falls back to the configured failure policy", () => {
    const relaxed: AppConfig = { ...config, batch: { toolPath: null, failFast: false } };

    expect(toJobOptions({ command: "im-sepia" }, relaxed)).toMatchObject({
      toolPath: null,
      failFast: false,
    });
    expect(toJobOptions({ command: "im-sepia", failFast: true }, relaxed).failFast).toBe(true);
  });
});

describe("toUpdateSettings", () => {
  const cwd = path.resolve(path.sep, "work");

  it("uses the config when no flags are given", () => {
    const settings = toUpdateSettings({}, config, cwd);

    expect(settings.config).toEqual(config.updater);
    expect(settings.binDir).toBe(path.join(PACKAGE_ROOT, "bin"));
  });

  it("keeps an absolute binDir from config", () => {
    const binDir = path.resolve(path.sep, "opt", "im-scripts");
    const settings = toUpdateSettings({}, { ...config, updater: { ...config.updater, binDir } }, cwd);

    expect(settings.binDir).toBe(binDir);
  });

  it("lets the flags override the config", () => {
    const settings = toUpdateSettings(
      { bin: "tools", prefix: "fx-", listUrl: "http://mirror.test/list.txt" },
      config,
      cwd,
    );

    expect(settings.binDir).toBe(path.join(cwd, "tools"));
    expect(settings.config).toEqual({
      ...config.updater,
      binDir: "tools",
      prefix: "fx-",
      listUrl: "http://mirror.test/list.txt",
    });
  });

  it("rejects a list URL that is not a URL", () => {
    expect(() => toUpdateSettings({ listUrl: "script_list.txt" }, config, cwd)).toThrow();
  });
});
