import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import { nanoid } from "nanoid";
import * as TOML from "@iarna/toml";
import { z } from "zod";

export const DEFAULT_PORT = 9847;

export const DEFAULT_DENIED_PATTERNS = [
  "**/.ssh/**",
  "**/*.pem",
  "**/*.key",
  "**/id_rsa*",
  "**/.gnupg/**",
  "**/.aws/credentials",
  "**/.env",
  "**/.env.*",
  "**/secrets.*",
  "**/*.secret",
  "**/.npmrc",
  "**/.pypirc",
];

export const DEFAULT_READ_ONLY_PATTERNS = ["/etc/**", "/usr/**", "/bin/**", "/sbin/**", "/System/**", "/Library/**"];

const MB = 1024 * 1024;

const ServerSchema = z.object({
  bind: z.string().default("127.0.0.1"),
  port: z.number().int().min(1).max(65535).default(DEFAULT_PORT),
});

const FilesystemSchema = z.object({
  roots: z.array(z.string()).default(["~"]),
  denied_patterns: z.array(z.string()).default(DEFAULT_DENIED_PATTERNS),
  read_only_patterns: z.array(z.string()).default(DEFAULT_READ_ONLY_PATTERNS),
  max_read_bytes: z.number().int().positive().default(50 * MB),
  max_write_bytes: z.number().int().positive().default(50 * MB),
  follow_symlinks: z.boolean().default(false),
  max_list_entries: z.number().int().positive().default(10_000),
  max_search_results: z.number().int().positive().default(1000),
  workers: z.number().int().min(1).max(64).default(8),
});

const SessionsSchema = z.object({
  scrollback_bytes: z.number().int().min(1024).default(64 * 1024),
  retention_ms: z.number().int().min(0).default(10 * 60 * 1000),
  allowed_commands: z.array(z.string()).default([]),
});

const LimitsSchema = z.object({
  requests_per_second: z.number().positive().default(100),
  burst: z.number().int().positive().default(50),
  max_message_bytes: z.number().int().positive().default(96 * MB),
});

const PushSchema = z.object({
  enabled: z.boolean().default(false),
  endpoint: z.string().url().default("https://exp.host/--/api/v2/push/send"),
});

export const ConfigSchema = z.object({
  server: ServerSchema.default({}),
  auth: z.object({ token: z.string().min(1) }),
  filesystem: FilesystemSchema.default({}),
  sessions: SessionsSchema.default({}),
  limits: LimitsSchema.default({}),
  push: PushSchema.default({}),
});

export type Config = z.infer<typeof ConfigSchema>;
export type FilesystemConfig = Config["filesystem"];
export type SessionsConfig = Config["sessions"];
export type LimitsConfig = Config["limits"];

export function configDir(): string {
  const override = typeof process.env.RELAYTERM_HOME === "string" ? process.env.RELAYTERM_HOME.trim() : "";
  if (override) return path.resolve(override);
  return path.join(os.homedir(), ".relayterm");
}

export function configPath(): string {
  return path.join(configDir(), "config.toml");
}

export function defaultConfig(): Config {
  return ConfigSchema.parse({ auth: { token: nanoid(48) } });
}

export function parseConfigToml(raw: string): Config {
  return ConfigSchema.parse(TOML.parse(raw));
}

export function stringifyConfigToml(cfg: Config): string {
  return TOML.stringify(cfg);
}

export function readConfigFile(p = configPath()): Config {
  return parseConfigToml(fs.readFileSync(p, "utf8"));
}

// Runtime-only overrides; config.toml is never rewritten with these.
export function applyEnvOverrides(cfg: Config, env: NodeJS.ProcessEnv = process.env): Config {
  const out: Config = { ...cfg, server: { ...cfg.server }, auth: { ...cfg.auth } };

  const bind = typeof env.RELAYTERM_BIND === "string" ? env.RELAYTERM_BIND.trim() : "";
  if (bind) out.server.bind = bind;

  const port = typeof env.RELAYTERM_PORT === "string" ? env.RELAYTERM_PORT.trim() : "";
  if (port) {
    const n = Number(port);
    if (Number.isFinite(n) && n > 0 && n < 65536) out.server.port = Math.floor(n);
  }

  const token = typeof env.RELAYTERM_TOKEN === "string" ? env.RELAYTERM_TOKEN.trim() : "";
  if (token) out.auth.token = token;

  return out;
}

export async function loadOrCreateConfig(): Promise<Config> {
  const p = configPath();
  let cfg: Config;
  if (!fs.existsSync(p)) {
    fs.mkdirSync(configDir(), { recursive: true });
    cfg = defaultConfig();
    fs.writeFileSync(p, stringifyConfigToml(cfg), { encoding: "utf8", mode: 0o600 });
  } else {
    cfg = readConfigFile(p);
  }
  return applyEnvOverrides(cfg);
}
