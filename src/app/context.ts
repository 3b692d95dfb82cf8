/**
 * AppContext bundles the resolved config with where it came from.
 * Purpose: keep CLI commands free of config discovery details.
 * Assumptions: config has already been validated and its paths resolved by the loader.
 * Usage: const ctx = createAppContext({ configPath, config });
 */

import path from "node:path";

import type { ProjectConfig } from "../core/config.js";

// =============================================================================
// TYPES
// =============================================================================

export type AppContext = {
  configPath: string | null;
  config: ProjectConfig;
  outputDir: string;
};

export type CreateAppContextInput = {
  configPath: string | null;
  config: ProjectConfig;
  outputDir?: string;
};

// =============================================================================
// PUBLIC API
// =============================================================================

export function createAppContext(input: CreateAppContextInput): AppContext {
  return {
    configPath: input.configPath ? path.resolve(input.configPath) : null,
    config: input.config,
    outputDir: path.resolve(input.outputDir ?? input.config.report.output_dir),
  };
}
