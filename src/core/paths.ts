import os from "node:os";
import path from "node:path";

export function defaultHomeDir(): string {
  return path.join(os.homedir(), ".config", "transport-radar");
}

export function changesDir(homeDir: string): string {
  return path.join(homeDir, "changes");
}

export function logsDir(homeDir: string): string {
  return path.join(homeDir, "logs");
}

export function exportsDir(homeDir: string): string {
  return path.join(homeDir, "exports");
}

export function analysisLogPath(homeDir: string, runId: string): string {
  return path.join(logsDir(homeDir), `${runId}.jsonl`);
}
