import { initRepoConfig } from "../core/config-discovery.js";

// =============================================================================
// INIT (repo-scoped scaffolding)
// =============================================================================

export async function initCommand(opts: {
  force?: boolean;
  cwd?: string;
}): Promise<{ created: boolean; configPath: string }> {
  const result = initRepoConfig({ force: opts.force ?? false, cwd: opts.cwd });

  if (result.status === "created") {
    console.log(`Created schedlog config at ${result.configPath}`);
  } else if (result.status === "overwritten") {
    console.log(`Overwrote schedlog config at ${result.configPath}`);
  } else {
    console.log(`schedlog config already exists at ${result.configPath}`);
  }

  return { created: result.status !== "exists", configPath: result.configPath };
}
