import { readFileSync } from "node:fs";
import { resolve } from "node:path";
import { AppConfigSchema, type AppConfig } from "./types.js";

const ENV_VAR_PATTERN = /\$\{([^}]+)\}/g;

const USAGE = "Usage: sql-insight-mcp [--config <path-to-config.json>] [--transport stdio|http]";

export interface CliArgs {
  configPath?: string;
  transport?: "stdio" | "http";
}

export function resolveEnvVariables(obj: unknown): unknown {
  if (typeof obj === "string") {
    return obj.replace(ENV_VAR_PATTERN, (match, varName: string) => {
      const value = process.env[varName];
      if (value === undefined) {
        throw new Error(`Environment variable "${varName}" is not defined (referenced as "${match}")`);
      }
      return value;
    });
  }
  if (Array.isArray(obj)) {
    return obj.map((item) => resolveEnvVariables(item));
  }
  if (obj !== null && typeof obj === "object") {
    const result: Record<string, unknown> = {};
    for (const [key, value] of Object.entries(obj)) {
      result[key] = resolveEnvVariables(value);
    }
    return result;
  }
  return obj;
}

/** Without a path every setting takes its default; a connection string must then come with each request. */
export function loadConfig(configPath?: string): AppConfig {
  if (!configPath) return AppConfigSchema.parse({});

  const raw = readFileSync(resolve(configPath), "utf-8");
  const json: unknown = JSON.parse(raw);
  return AppConfigSchema.parse(resolveEnvVariables(json));
}

export function parseCliArgs(args: string[]): CliArgs {
  const result: CliArgs = {};

  const configIndex = args.indexOf("--config");
  if (configIndex !== -1) {
    if (configIndex + 1 >= args.length) throw new Error(USAGE);
    result.configPath = args[configIndex + 1];
  }

  const transportIndex = args.indexOf("--transport");
  if (transportIndex !== -1) {
    const value = args[transportIndex + 1];
    if (value !== "stdio" && value !== "http") {
      throw new Error(`Invalid transport: "${value ?? ""}". Must be "stdio" or "http".`);
    }
    result.transport = value;
  }

  return result;
}
