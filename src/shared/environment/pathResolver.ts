import { mkdirSync } from "node:fs";
import os from "node:os";
import path from "node:path";

const HOME_ENV = "ESTIMATE_PILOT_HOME";
const DIRECTORY_NAME = ".estimate-pilot";

interface ResolvedPaths {
  readonly config: string;
  readonly logs: string;
  readonly artifacts: string;
}

let cachedPaths: ResolvedPaths | null = null;

function determineRoot(): string {
  const overrideHome = process.env[HOME_ENV];
  if (overrideHome && overrideHome.trim().length > 0) {
    return path.resolve(overrideHome.trim());
  }

  if (process.platform === "win32") {
    const appData = process.env.APPDATA ?? process.env.LOCALAPPDATA ?? path.join(os.homedir(), "AppData", "Roaming");
    return path.resolve(appData, DIRECTORY_NAME);
  }

  if (process.platform === "darwin") {
    return path.resolve(os.homedir(), "Library", "Application Support", DIRECTORY_NAME);
  }

  const xdgConfig = process.env.XDG_CONFIG_HOME ?? path.join(os.homedir(), ".config");
  return path.resolve(xdgConfig, DIRECTORY_NAME);
}

function ensureDirectory(target: string): string {
  mkdirSync(target, { recursive: true });
  return target;
}

function resolvePaths(): ResolvedPaths {
  if (cachedPaths) {
    return cachedPaths;
  }

  const root = ensureDirectory(determineRoot());
  cachedPaths = {
    config: ensureDirectory(path.join(root, "config")),
    logs: ensureDirectory(path.join(root, "logs")),
    // 浏览器截图、trace 等失败现场
    artifacts: ensureDirectory(path.join(root, "artifacts"))
  };
  return cachedPaths;
}

export function getLogsDirectory(): string {
  return resolvePaths().logs;
}

export function joinConfigPath(...segments: readonly string[]): string {
  return path.join(resolvePaths().config, ...segments);
}

export function joinArtifactsPath(...segments: readonly string[]): string {
  return path.join(resolvePaths().artifacts, ...segments);
}
