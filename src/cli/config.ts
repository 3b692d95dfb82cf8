import path from "node:path";

import { createAppContext, type AppContext } from "../app/context.js";
import { defaultProjectConfig } from "../core/config.js";
import { resolveConfigPaths, loadProjectConfig } from "../core/config-loader.js";
import { resolveProjectConfigPath, type ConfigSource } from "../core/config-discovery.js";

// =============================================================================
// CONFIG DISCOVERY (CLI)
//
// --config wins, then $SCHEDLOG_CONFIG, then the nearest .schedlog/config.yaml.
// With none of those the built-in defaults apply, resolved against the cwd.
// =============================================================================

export type LoadConfigForCliArgs = {
  explicitConfigPath?: string;
  outputDir?: string;
  cwd?: string;
};

export function loadConfigForCli(args: LoadConfigForCliArgs): {
  appContext: AppContext;
  source: ConfigSource;
} {
  const cwd = args.cwd ?? process.cwd();
  const resolved = resolveProjectConfigPath({ explicitPath: args.explicitConfigPath, cwd });

  const config = resolved.configPath
    ? loadProjectConfig(resolved.configPath)
    : resolveConfigPaths(defaultProjectConfig(), cwd);

  return {
    appContext: createAppContext({
      configPath: resolved.configPath,
      config,
      outputDir: args.outputDir ? path.resolve(cwd, args.outputDir) : undefined,
    }),
    source: resolved.source,
  };
}
