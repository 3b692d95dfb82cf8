import fs from "node:fs";
import path from "node:path";

import { REPO_CONFIG_DIR, repoConfigPath } from "./paths.js";

// =============================================================================
// TYPES
// =============================================================================

export type ConfigSource = "explicit" | "env" | "repo" | "defaults";

export type ConfigResolution = {
  configPath: string | null;
  source: ConfigSource;
};

export type InitResult = {
  configPath: string;
  status: "created" | "exists" | "overwritten";
};

export const CONFIG_ENV_VAR = "SCHEDLOG_CONFIG";

// =============================================================================
// PUBLIC API
// =============================================================================

/**
 * Resolution order: --config, $SCHEDLOG_CONFIG, the nearest .schedlog/config.yaml walking up
 * from cwd, then built-in defaults (configPath null).
 */
export function resolveProjectConfigPath(args: {
  explicitPath?: string;
  cwd?: string;
}): ConfigResolution {
  const cwd = args.cwd ?? process.cwd();

  if (args.explicitPath) {
    return { configPath: path.resolve(cwd, args.explicitPath), source: "explicit" };
  }

  const fromEnv = process.env[CONFIG_ENV_VAR];
  if (fromEnv && fromEnv.length > 0) {
    return { configPath: path.resolve(cwd, fromEnv), source: "env" };
  }

  const found = findConfigUpwards(cwd);
  if (found) {
    return { configPath: found, source: "repo" };
  }

  return { configPath: null, source: "defaults" };
}

export function findConfigUpwards(startDir: string): string | null {
  let current = path.resolve(startDir);
  while (true) {
    const candidate = repoConfigPath(current);
    if (fs.existsSync(candidate)) {
      return candidate;
    }

    const parent = path.dirname(current);
    if (parent === current) return null;
    current = parent;
  }
}

export function initRepoConfig(args: { cwd?: string; force?: boolean }): InitResult {
  const cwd = path.resolve(args.cwd ?? process.cwd());
  const configPath = repoConfigPath(cwd);
  const hasConfig = fs.existsSync(configPath);
  const force = args.force ?? false;

  if (hasConfig && !force) {
    return { configPath, status: "exists" };
  }

  fs.mkdirSync(path.dirname(configPath), { recursive: true });
  fs.writeFileSync(configPath, defaultRepoConfigYaml(), "utf8");
  ensureLocalGitignore(path.dirname(configPath));

  return { configPath, status: hasConfig ? "overwritten" : "created" };
}

// =============================================================================
// INTERNALS
// =============================================================================

function ensureLocalGitignore(configDir: string): void {
  const ignorePath = path.join(configDir, ".gitignore");
  if (fs.existsSync(ignorePath)) return;
  fs.writeFileSync(ignorePath, "reports/\n", "utf8");
}

function defaultRepoConfigYaml(): string {
  return [
    "# schedlog configuration",
    "#",
    `# Loaded from <dir>/${REPO_CONFIG_DIR}/config.yaml (nearest parent wins), $SCHEDLOG_CONFIG,`,
    "# or --config <path>. Relative paths resolve from this file's directory.",
    "# Env vars like ${HOME} are expanded.",
    "",
    "log_format:",
    "  # keyed: task=1,type=batch,ts=100,schedule=90-110,outcome=success",
    "  # positional: values in `columns` order (CSV export)",
    "  mode: keyed",
    '  delimiter: ","',
    '  key_separator: "="',
    "  # columns: [Id, Type, Start Time, Window, Status, Duration]",
    "  # header_lines: 1",
    "  fields:",
    "    task_id: task",
    "    task_type: type",
    "    timestamp: ts",
    "    schedule: schedule",
    "    outcome: outcome",
    "    duration: duration",
    "  required_fields: [task_id, timestamp, outcome]",
    "  # number | iso (iso timestamps are read as epoch milliseconds)",
    "  timestamp: number",
    '  window_separator: "-"',
    "  outcome_values:",
    "    success: [success, ok, completed]",
    "    failure: [failure, failed, error]",
    "    retry: [retry, retrying]",
    "",
    "# Ordered, first match wins. Events matching no rule are reported as unknown.",
    "# Condition kinds: field-equals, field-in-range, field-present, schedule, all, any, not.",
    "classifier:",
    "  rules:",
    "    - name: unreadable-schedule",
    "      when: { kind: schedule, state: unparsed }",
    "      status: unknown",
    "    - name: within-window",
    "      when: { kind: schedule, state: within }",
    "      status: scheduled",
    "    - name: outside-window",
    "      when: { kind: schedule, state: outside }",
    "      status: unscheduled",
    "    - name: no-schedule",
    "      when: { kind: schedule, state: absent }",
    "      status: unscheduled",
    "",
    "aggregation:",
    "  # Same unit as timestamps (3600000 = one hour of epoch milliseconds).",
    "  bucket_width: 3600000",
    "  max_parallel_shards: 4",
    "",
    "report:",
    "  title: Scheduler Log Analysis Report",
    "  output_dir: reports",
    "  fill_gaps: false",
    "  # max_rejected_ratio: 0.05",
    "  snapshots:",
    "    base_dir: .",
    "    patterns: []",
    "",
    "reader:",
    "  timeout_ms: 30000",
    "",
    "logging:",
    "  enabled: true",
    "  parse_error_samples: 20",
    "",
  ].join("\n");
}
