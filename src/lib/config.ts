import fs from "fs";
import path from "path";

export interface DpSyncConfig {
  /** Host of the SMS Provider serving the AdminService, e.g. cm01.corp.example */
  siteServer: string;
  /** Three-character Configuration Manager site code */
  siteCode: string;
  /** Bearer token for the AdminService (cloud management gateway / Entra ID) */
  token?: string;
  /** Basic-auth credentials, used when no token is set */
  username?: string;
  password?: string;
  /** Accept self-signed certificates on the SMS Provider */
  insecureTls: boolean;
  /** Pause between items, in milliseconds */
  itemDelayMs: number;
  /** Per-item distribution timeout in milliseconds, 0 for none */
  itemTimeoutMs: number;
  /** Timeout for individual AdminService requests, in milliseconds */
  requestTimeoutMs: number;
  /** Append-only run log */
  logFile: string;
}

export interface DpSyncConfigOptions extends Partial<DpSyncConfig> {
  /** Custom config file path */
  configPath?: string;
  /** Working directory for resolving config files */
  cwd?: string;
}

let globalConfig: Partial<DpSyncConfig> | null = null;

const DEFAULT_CONFIG = {
  siteServer: "",
  siteCode: "",
  insecureTls: false,
  itemDelayMs: 500,
  itemTimeoutMs: 0,
  requestTimeoutMs: 30000,
  logFile: "dpsync.log",
} satisfies DpSyncConfig;

const STRING_FIELDS = ["siteServer", "siteCode", "token", "username", "password", "logFile"] as const;
const NUMBER_FIELDS = ["itemDelayMs", "itemTimeoutMs", "requestTimeoutMs"] as const;

/**
 * Load configuration from multiple sources, lowest precedence first:
 * 1. Default values
 * 2. Config file (dpsync.config.json / .dpsyncrc.json)
 * 3. Environment variables (including .env, loaded by the CLI)
 * 4. Programmatically set config (via configure())
 * 5. Options passed to this function
 *
 * Does not validate: siteServer and siteCode may still be empty so the CLI
 * can prompt for them. Call validateConfig() before use.
 */
export function loadConfig(options: DpSyncConfigOptions = {}): DpSyncConfig {
  const { configPath, cwd = process.cwd(), ...overrides } = options;

  const merged: DpSyncConfig = { ...DEFAULT_CONFIG };
  assignDefined(merged, loadConfigFile(configPath, cwd));
  assignDefined(merged, loadConfigFromEnv());
  assignDefined(merged, globalConfig ?? {});
  assignDefined(merged, overrides);

  merged.siteServer = merged.siteServer.trim();
  merged.siteCode = merged.siteCode.trim().toUpperCase();
  return merged;
}

/**
 * Set configuration programmatically
 */
export function configure(config: Partial<DpSyncConfig>): void {
  globalConfig = { ...globalConfig, ...config };
}

/**
 * Reset configuration (useful for testing)
 */
export function resetConfig(): void {
  globalConfig = null;
}

/**
 * Copy the fields of `source` that are set, so an unset layer never
 * blanks out a lower one
 */
function assignDefined(target: DpSyncConfig, source: Partial<DpSyncConfig>): void {
  for (const field of STRING_FIELDS) {
    const value = source[field];
    if (value !== undefined) target[field] = value;
  }
  for (const field of NUMBER_FIELDS) {
    const value = source[field];
    if (value !== undefined) target[field] = value;
  }
  if (source.insecureTls !== undefined) {
    target.insecureTls = source.insecureTls;
  }
}

/**
 * Keep only the known, correctly typed fields of a parsed config file
 */
export function parseConfigObject(raw: unknown, source: string): Partial<DpSyncConfig> {
  if (typeof raw !== "object" || raw === null || Array.isArray(raw)) {
    throw new Error(`Config file ${source} must contain a JSON object`);
  }

  const record = new Map<string, unknown>(Object.entries(raw));
  const config: Partial<DpSyncConfig> = {};

  for (const field of STRING_FIELDS) {
    const value = record.get(field);
    if (value === undefined) continue;
    if (typeof value !== "string") {
      throw new Error(`Config file ${source}: "${field}" must be a string`);
    }
    config[field] = value;
  }

  for (const field of NUMBER_FIELDS) {
    const value = record.get(field);
    if (value === undefined) continue;
    if (typeof value !== "number" || !Number.isFinite(value)) {
      throw new Error(`Config file ${source}: "${field}" must be a number`);
    }
    config[field] = value;
  }

  const insecureTls = record.get("insecureTls");
  if (insecureTls !== undefined) {
    if (typeof insecureTls !== "boolean") {
      throw new Error(`Config file ${source}: "insecureTls" must be a boolean`);
    }
    config.insecureTls = insecureTls;
  }

  return config;
}

function loadConfigFile(configPath: string | undefined, cwd: string): Partial<DpSyncConfig> {
  if (configPath) {
    const resolved = path.resolve(cwd, configPath);
    if (!fs.existsSync(resolved)) {
      throw new Error(`Config file not found: ${resolved}`);
    }
    return readConfigFile(resolved);
  }

  const candidates = [
    path.join(cwd, "dpsync.config.json"),
    path.join(cwd, ".dpsyncrc.json"),
  ];

  for (const candidate of candidates) {
    if (fs.existsSync(candidate)) {
      return readConfigFile(candidate);
    }
  }

  return {};
}

function readConfigFile(filePath: string): Partial<DpSyncConfig> {
  let raw: unknown;
  try {
    raw = JSON.parse(fs.readFileSync(filePath, "utf-8"));
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new Error(`Failed to read config file ${filePath}: ${reason}`);
  }
  return parseConfigObject(raw, filePath);
}

function parseNumberEnv(name: string): number | undefined {
  const value = process.env[name];
  if (value === undefined || value === "") return undefined;
  const parsed = Number(value);
  if (!Number.isFinite(parsed)) {
    throw new Error(`Environment variable ${name} must be a number, got "${value}"`);
  }
  return parsed;
}

/**
 * Load configuration from DPSYNC_* environment variables
 */
function loadConfigFromEnv(): Partial<DpSyncConfig> {
  const env = process.env;
  return {
    siteServer: env.DPSYNC_SITE_SERVER || undefined,
    siteCode: env.DPSYNC_SITE_CODE || undefined,
    token: env.DPSYNC_TOKEN || undefined,
    username: env.DPSYNC_USERNAME || undefined,
    password: env.DPSYNC_PASSWORD || undefined,
    insecureTls: env.DPSYNC_INSECURE_TLS ? env.DPSYNC_INSECURE_TLS === "true" : undefined,
    itemDelayMs: parseNumberEnv("DPSYNC_ITEM_DELAY_MS"),
    itemTimeoutMs: parseNumberEnv("DPSYNC_ITEM_TIMEOUT_MS"),
    requestTimeoutMs: parseNumberEnv("DPSYNC_REQUEST_TIMEOUT_MS"),
    logFile: env.DPSYNC_LOG_FILE || undefined,
  };
}

/**
 * Validate configuration, reporting every problem at once
 */
export function validateConfig(config: DpSyncConfig): void {
  const errors: string[] = [];

  if (!config.siteServer) {
    errors.push("Missing required configuration: siteServer");
  } else if (!isValidHost(config.siteServer)) {
    errors.push(`Invalid site server host: ${config.siteServer}`);
  }

  if (!config.siteCode) {
    errors.push("Missing required configuration: siteCode");
  } else if (!/^[A-Z0-9]{3}$/.test(config.siteCode)) {
    errors.push(`Invalid site code "${config.siteCode}": expected three letters or digits`);
  }

  if (config.username && !config.password) {
    errors.push("A password is required when a username is configured");
  }

  for (const field of NUMBER_FIELDS) {
    if (config[field] < 0) {
      errors.push(`${field} must not be negative`);
    }
  }

  if (!config.logFile) {
    errors.push("Missing required configuration: logFile");
  }

  if (errors.length > 0) {
    throw new Error(`dpsync configuration errors:\n${errors.join("\n")}`);
  }
}

function isValidHost(host: string): boolean {
  try {
    return new URL(`https://${host}`).host.length > 0 && !host.includes("/");
  } catch {
    return false;
  }
}

/**
 * Write a sample configuration file
 */
export function generateConfigFile(
  filePath: string = "dpsync.config.json",
  values: Partial<Pick<DpSyncConfig, "siteServer" | "siteCode">> = {}
): string {
  const sampleConfig = {
    siteServer: values.siteServer || "cm01.corp.example",
    siteCode: (values.siteCode || "P01").toUpperCase(),
    itemDelayMs: DEFAULT_CONFIG.itemDelayMs,
    itemTimeoutMs: 600000,
    logFile: DEFAULT_CONFIG.logFile,
  };

  fs.writeFileSync(filePath, JSON.stringify(sampleConfig, null, 2) + "\n", "utf-8");
  return filePath;
}
