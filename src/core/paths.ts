import path from "node:path";

export const REPO_CONFIG_DIR = ".schedlog";
export const REPO_CONFIG_FILE = "config.yaml";

export function repoConfigPath(rootDir: string): string {
  return path.join(rootDir, REPO_CONFIG_DIR, REPO_CONFIG_FILE);
}

export function runLogPath(outputDir: string, runId: string): string {
  return path.join(outputDir, "logs", `${runId}.jsonl`);
}

export function reportJsonPath(outputDir: string, runId: string): string {
  return path.join(outputDir, `report-${runId}.json`);
}
