import { mkdirSync } from "node:fs";
import { homedir } from "node:os";
import { join } from "node:path";

export function getStateDir(): string {
  return process.env["TOOLGATE_STATE_DIR"] ?? join(homedir(), ".toolgate");
}

export function getConfigPath(): string {
  return process.env["TOOLGATE_CONFIG_PATH"] ?? "toolgate.config.json";
}

export function ensureDir(dirPath: string): string {
  mkdirSync(dirPath, { recursive: true });
  return dirPath;
}
