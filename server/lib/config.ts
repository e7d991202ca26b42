// Server and runner configuration
// Read from environment variables, every key has a default suitable for a router

import { z } from "zod";

const DEFAULT_SCRIPT_BASE = "https://raw.githubusercontent.com/peditx";

const envSchema = z.object({
  PORT: z.coerce.number().int().min(1).max(65535).default(8048),
  HOST: z.string().min(1).default("0.0.0.0"),

  RUNNER_LOG_FILE: z.string().min(1).default("/tmp/router-console.log"),
  RUNNER_LOCK_FILE: z.string().min(1).default("/tmp/router-console.lock"),
  RUNNER_WORK_DIR: z.string().min(1).default("/tmp"),
  RUN_HISTORY_FILE: z.string().min(1).default("/tmp/router-console-runs.json"),
  COMMAND_TIMEOUT_MS: z.coerce.number().int().positive().default(30 * 60 * 1000),

  SERVICE_RUNNER_URL: z
    .string()
    .url()
    .default(`${DEFAULT_SCRIPT_BASE}/PeDitXOs/refs/heads/main/services/service_runner.sh`),
  SERVICES_JSON_URL: z
    .string()
    .url()
    .default(`${DEFAULT_SCRIPT_BASE}/PeDitXOs/refs/heads/main/services/services.json`),
  SERVICES_FILE: z.string().min(1).default("/etc/config/router-console-services.json"),

  LUCI_INDEX_CACHE: z.string().min(1).default("/tmp/luci-indexcache"),
  BACKUP_GLOB: z.string().min(1).default("/tmp/backup-*.tar.gz"),

  PASSWALL1_SCRIPT_URL: z
    .string()
    .url()
    .default(`${DEFAULT_SCRIPT_BASE}/iranIPS/refs/heads/main/.files/passwall.sh`),
  PASSWALL2_SCRIPT_URL: z
    .string()
    .url()
    .default(`${DEFAULT_SCRIPT_BASE}/iranIPS/refs/heads/main/.files/passwall2.sh`),
  PASSWALL_BOTH_SCRIPT_URL: z
    .string()
    .url()
    .default(`${DEFAULT_SCRIPT_BASE}/iranIPS/refs/heads/main/.files/passwalldue.sh`),
  EXROOT_SCRIPT_URL: z
    .string()
    .url()
    .default(`${DEFAULT_SCRIPT_BASE}/ezexroot/refs/heads/main/ezexroot.sh`),
  EXPAND_SCRIPT_URL: z
    .string()
    .url()
    .default(`${DEFAULT_SCRIPT_BASE}/PeDitXOs/refs/heads/main/.files/expand.sh`),
});

export interface AppConfig {
  port: number;
  host: string;
  logFile: string;
  lockFile: string;
  workDir: string;
  historyFile: string;
  commandTimeout: number;
  serviceRunnerUrl: string;
  servicesJsonUrl: string;
  servicesFile: string;
  luciIndexCache: string;
  backupGlob: string;
  scripts: {
    passwall1: string;
    passwall2: string;
    passwallBoth: string;
    exroot: string;
    expand: string;
  };
}

export class ConfigError extends Error {
  constructor(readonly issues: string[]) {
    super(`Invalid configuration: ${issues.join("; ")}`);
    this.name = "ConfigError";
  }
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    throw new ConfigError(
      parsed.error.issues.map((issue) => `${issue.path.join(".")}: ${issue.message}`)
    );
  }

  const e = parsed.data;
  return Object.freeze({
    port: e.PORT,
    host: e.HOST,
    logFile: e.RUNNER_LOG_FILE,
    lockFile: e.RUNNER_LOCK_FILE,
    workDir: e.RUNNER_WORK_DIR,
    historyFile: e.RUN_HISTORY_FILE,
    commandTimeout: e.COMMAND_TIMEOUT_MS,
    serviceRunnerUrl: e.SERVICE_RUNNER_URL,
    servicesJsonUrl: e.SERVICES_JSON_URL,
    servicesFile: e.SERVICES_FILE,
    luciIndexCache: e.LUCI_INDEX_CACHE,
    backupGlob: e.BACKUP_GLOB,
    scripts: Object.freeze({
      passwall1: e.PASSWALL1_SCRIPT_URL,
      passwall2: e.PASSWALL2_SCRIPT_URL,
      passwallBoth: e.PASSWALL_BOTH_SCRIPT_URL,
      exroot: e.EXROOT_SCRIPT_URL,
      expand: e.EXPAND_SCRIPT_URL,
    }),
  });
}
