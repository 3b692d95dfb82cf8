import fs from "node:fs";
import os from "node:os";
import path from "node:path";

import { afterEach, describe, expect, it } from "vitest";

import {
  CONFIG_ENV_VAR,
  initRepoConfig,
  resolveProjectConfigPath,
} from "../core/config-discovery.js";
import { loadProjectConfig } from "../core/config-loader.js";
import { defaultProjectConfig } from "../core/config.js";

const tempDirs: string[] = [];

function makeDir(): string {
  const dir = fs.mkdtempSync(path.join(os.tmpdir(), "config-discovery-"));
  tempDirs.push(dir);
  return dir;
}

afterEach(() => {
  for (const dir of tempDirs) {
    fs.rmSync(dir, { recursive: true, force: true });
  }
  tempDirs.length = 0;
});

describe("resolveProjectConfigPath", () => {
  it("prefers an explicit path resolved against cwd", () => {
    const dir = makeDir();
    process.env[CONFIG_ENV_VAR] = "/tmp/ignored.yaml";

    expect(resolveProjectConfigPath({ explicitPath: "custom.yaml", cwd: dir })).toEqual({
      configPath: path.join(dir, "custom.yaml"),
      source: "explicit",
    });
  });

  it("falls back to the environment variable", () => {
    const dir = makeDir();
    process.env[CONFIG_ENV_VAR] = "conf/schedlog.yaml";

    expect(resolveProjectConfigPath({ cwd: dir })).toEqual({
      configPath: path.join(dir, "conf", "schedlog.yaml"),
      source: "env",
    });
  });

  it("finds the nearest config in a parent directory", () => {
    const root = makeDir();
    initRepoConfig({ cwd: root });
    const nested = path.join(root, "logs", "2024");
    fs.mkdirSync(nested, { recursive: true });

    expect(resolveProjectConfigPath({ cwd: nested })).toEqual({
      configPath: path.join(root, ".schedlog", "config.yaml"),
      source: "repo",
    });
  });
});

describe("initRepoConfig", () => {
  it("writes a config that loads to the built-in defaults", () => {
    const dir = makeDir();

    const result = initRepoConfig({ cwd: dir });

    expect(result).toEqual({
      configPath: path.join(dir, ".schedlog", "config.yaml"),
      status: "created",
    });
    expect(fs.readFileSync(path.join(dir, ".schedlog", ".gitignore"), "utf8")).toBe("reports/\n");

    const loaded = loadProjectConfig(result.configPath);
    const defaults = defaultProjectConfig();
    expect(loaded.log_format).toEqual(defaults.log_format);
    expect(loaded.classifier).toEqual(defaults.classifier);
    expect(loaded.aggregation).toEqual(defaults.aggregation);
    expect(loaded.report.output_dir).toBe(path.join(dir, ".schedlog", "reports"));
  });

  it("keeps an existing config unless forced", () => {
    const dir = makeDir();
    const { configPath } = initRepoConfig({ cwd: dir });
    fs.writeFileSync(configPath, "report:\n  title: Custom\n", "utf8");

    expect(initRepoConfig({ cwd: dir }).status).toBe("exists");
    expect(fs.readFileSync(configPath, "utf8")).toBe("report:\n  title: Custom\n");

    expect(initRepoConfig({ cwd: dir, force: true }).status).toBe("overwritten");
    expect(loadProjectConfig(configPath).report.title).toBe("Scheduler Log Analysis Report");
  });
});
