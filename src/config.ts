import fs from "fs";
import path from "path";
import { parse as parseYaml } from "yaml";

export type Transport = "http" | "stdio";

export interface AppConfig {
  readonly serverName: string;
  readonly version: string;
  readonly authToken: string;
  readonly identifier: string;
  readonly transport: Transport;
  readonly http: { readonly host: string; readonly port: number };
  readonly logLevel: string;
}

/** Non-secret settings that may come from config/server.yaml. */
export interface FileConfig {
  serverName?: string;
  transport?: string;
  http?: { host?: string; port?: number };
  logLevel?: string;
}

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ConfigError";
  }
}

export const DEFAULT_SERVER_NAME = "text-utilities-server";
export const DEFAULT_VERSION = "0.1.0";
const DEFAULT_PORT = 8086;
const DEFAULT_HOST = "0.0.0.0";

type Env = Record<string, string | undefined>;

function candidatePaths(env: Env, customPath?: string): string[] {
  const baseDir = process.cwd();
  return [
    customPath,
    env.TEXT_UTILS_CONFIG,
    path.resolve(baseDir, "config/server.yaml"),
    path.resolve(baseDir, "config/server.yml"),
    path.resolve(baseDir, "config/server.json"),
  ].filter((p): p is string => !!p);
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function toFileConfig(raw: unknown, file: string): FileConfig {
  if (raw === null || raw === undefined) return {};
  if (!isRecord(raw)) throw new ConfigError(`${file}: expected a mapping at the top level`);
  const out: FileConfig = {};
  if (typeof raw.serverName === "string") out.serverName = raw.serverName;
  if (typeof raw.transport === "string") out.transport = raw.transport;
  if (typeof raw.logLevel === "string") out.logLevel = raw.logLevel;
  if (isRecord(raw.http)) {
    const { host, port } = raw.http;
    out.http = {
      host: typeof host === "string" ? host : undefined,
      port: typeof port === "number" ? port : undefined,
    };
  }
  return out;
}

export function loadFileConfig(env: Env = process.env, customPath?: string): FileConfig {
  const explicit = customPath ?? env.TEXT_UTILS_CONFIG;
  for (const p of candidatePaths(env, customPath)) {
    if (!fs.existsSync(p)) {
      if (p === explicit) throw new ConfigError(`config file not found: ${p}`);
      continue;
    }
    const raw = fs.readFileSync(p, "utf-8");
    try {
      return toFileConfig(/\.ya?ml$/i.test(p) ? parseYaml(raw) : JSON.parse(raw), p);
    } catch (e: unknown) {
      if (e instanceof ConfigError) throw e;
      throw new ConfigError(`${p}: ${e instanceof Error ? e.message : String(e)}`);
    }
  }
  return {};
}

function parseTransport(value: string | undefined): Transport {
  const v = (value ?? "http").toLowerCase();
  if (v === "http" || v === "stdio") return v;
  throw new ConfigError(`unknown transport '${value}' (expected http or stdio)`);
}

function parsePort(value: string | number | undefined): number {
  if (value === undefined || value === "") return DEFAULT_PORT;
  const n = Number(value);
  if (!Number.isInteger(n) || n < 0 || n > 65535) throw new ConfigError(`invalid port '${value}'`);
  return n;
}

/**
 * Builds the frozen runtime configuration. Secrets only come from the
 * environment; the optional file supplies defaults the environment overrides.
 */
export function loadConfig(env: Env = process.env, overrides: { transport?: string; configPath?: string } = {}): AppConfig {
  const authToken = env.AUTH_TOKEN;
  const identifier = env.MY_NUMBER;
  if (!authToken || !identifier) {
    throw new ConfigError("AUTH_TOKEN and MY_NUMBER must be set (see .env.example)");
  }
  const file = loadFileConfig(env, overrides.configPath);
  return Object.freeze({
    serverName: file.serverName ?? DEFAULT_SERVER_NAME,
    version: DEFAULT_VERSION,
    authToken,
    identifier,
    transport: parseTransport(overrides.transport ?? env.TRANSPORT ?? file.transport),
    http: Object.freeze({
      host: env.HOST || file.http?.host || DEFAULT_HOST,
      port: parsePort(env.PORT || file.http?.port),
    }),
    logLevel: env.LOG_LEVEL || file.logLevel || "info",
  });
}

/** Token prefix safe to print in startup logs. */
export function maskToken(token: string): string {
  return `${token.slice(0, Math.min(4, Math.floor(token.length / 2)))}...`;
}
