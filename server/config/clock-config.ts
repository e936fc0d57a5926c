import fs from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import type { ZodIssue } from "zod";
import { clockConfigSchema, defaultClockConfig, type ClockConfig } from "@shared/clock-config";
import { createLogger } from "../utils/log";

const log = createLogger("config");

export class ConfigError extends Error {
  readonly issues: string[];
  constructor(message: string, issues: string[] = []) {
    super(issues.length > 0 ? `${message}:\n${issues.map((issue) => `  - ${issue}`).join("\n")}` : message);
    this.name = "ConfigError";
    this.issues = issues;
  }
}

export const defaultConfigPaths = (): string[] => [
  path.resolve(process.cwd(), "config.json"),
  path.join(os.homedir(), ".config", "solar-clock", "config.json"),
  "/etc/solar-clock/config.json",
];

const describeIssue = (issue: ZodIssue): string => {
  const where = issue.path.length > 0 ? issue.path.join(".") : "(root)";
  return `${where}: ${issue.message}`;
};

export const parseClockConfig = (raw: unknown): ClockConfig => {
  const result = clockConfigSchema.safeParse(raw);
  if (!result.success) {
    throw new ConfigError("Config validation errors", result.error.issues.map(describeIssue));
  }
  return result.data;
};

const fileExists = async (candidate: string): Promise<boolean> => {
  try {
    const stat = await fs.stat(candidate);
    return stat.isFile();
  } catch {
    return false;
  }
};

/**
 * Loads the first config file found. An explicit path must exist; the default
 * search falls back to built-in defaults when nothing is present.
 */
export const loadClockConfig = async (
  explicitPath?: string,
  searchPaths: string[] = defaultConfigPaths(),
): Promise<ClockConfig> => {
  const candidates = explicitPath ? [path.resolve(explicitPath)] : searchPaths;
  let found: string | null = null;
  for (const candidate of candidates) {
    if (await fileExists(candidate)) {
      found = candidate;
      break;
    }
  }

  if (!found) {
    if (explicitPath) {
      throw new ConfigError(`Config file not found: ${explicitPath}`);
    }
    log.warn("No config file found, using defaults");
    return defaultClockConfig();
  }

  log.info(`Loading config from ${found}`);
  const text = await fs.readFile(found, "utf8");
  let raw: unknown;
  try {
    raw = JSON.parse(text);
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new ConfigError(`Invalid JSON in config file ${found}: ${reason}`);
  }
  return parseClockConfig(raw);
};
