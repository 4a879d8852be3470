import { readFileSync, existsSync } from "fs";
import { dirname, join } from "path";
import { fileURLToPath } from "url";
import { logger } from "./logger";
import { isAts, type Ats, type CompanyRegistryEntry } from "./types";

export interface SourceDefinition {
  endpointTemplate: string;
  pageSize?: number;
  timeoutMs: number;
}

export interface SourceConfig {
  description: string;
  sources: Record<Ats, SourceDefinition>;
}

export interface CompaniesConfig {
  description: string;
  companies: CompanyRegistryEntry[];
}

export interface UserAgentsConfig {
  description: string;
  userAgents: string[];
}

export interface TermMappingsConfig {
  description: string;
  techStack: Record<string, string>;
  skills: Record<string, string>;
}

export type HiringSignalRule =
  | { signal: string; metric: "totalJobs"; min: number }
  | {
      signal: string;
      metric: "department" | "seniority" | "techStack";
      values: string[];
      min: number;
    }
  | {
      signal: string;
      metric: "recentShare";
      windowDays: number;
      min: number;
      minJobs?: number;
    };

export interface HiringSignalsConfig {
  description: string;
  rules: HiringSignalRule[];
}

export interface ProxyEndpoint {
  host: string;
  port: number;
}

export interface EnvConfig {
  nodeEnv: string;
  timezone: string;
  port: number;
  dbPath: string;
  proxies: ProxyEndpoint[];
  proxyUser: string;
  proxyPass: string;
  proxyPoolSize: number;
  proxyFailureThreshold: number;
  proxyCooldownMs: number;
  fetchWorkers: number;
  extractWorkers: number;
  fetchMaxAttempts: number;
  fetchBackoffBase: number;
  extractBatchSize: number;
  extractMaxAttempts: number;
  leaseMs: number;
  pollIntervalMs: number;
  profileDebounceMs: number;
  profileTopN: number;
  llmApiUrl: string;
  llmApiKey: string;
  llmModel: string;
  llmTimeoutMs: number;
  dispatchCron: string;
  dispatchOnStart: boolean;
}

export interface AppConfig {
  env: EnvConfig;
  sources: SourceConfig;
  companies: CompaniesConfig;
  userAgents: UserAgentsConfig;
  termMappings: TermMappingsConfig;
  hiringSignals: HiringSignalsConfig;
}

export const CONFIG_DIR = join(
  dirname(fileURLToPath(import.meta.url)),
  "../config",
);

function parseEnvInt(
  value: string | undefined,
  fallback: number,
  min?: number,
  max?: number,
): number {
  const parsed = Number.parseInt(value ?? "", 10);
  if (Number.isNaN(parsed)) return fallback;

  if (typeof min === "number" && parsed < min) return min;
  if (typeof max === "number" && parsed > max) return max;
  return parsed;
}

function parseEnvFloat(
  value: string | undefined,
  fallback: number,
  min: number,
): number {
  const parsed = Number.parseFloat(value ?? "");
  if (Number.isNaN(parsed)) return fallback;
  return Math.max(min, parsed);
}

export function parseProxyList(value: string | undefined): ProxyEndpoint[] {
  if (!value) return [];

  const proxies: ProxyEndpoint[] = [];
  for (const entry of value.split(",")) {
    const [host, port] = entry.trim().split(":");
    const portNumber = Number.parseInt(port ?? "", 10);
    if (!host || Number.isNaN(portNumber)) {
      logger.warn(`Ignoring malformed PROXY_LIST entry: "${entry.trim()}"`);
      continue;
    }
    proxies.push({ host, port: portNumber });
  }
  return proxies;
}

export function loadJsonConfig<T>(filename: string): T {
  const filepath = join(CONFIG_DIR, filename);

  if (!existsSync(filepath)) {
    throw new Error(`Config file not found: ${filepath}`);
  }

  try {
    const raw = readFileSync(filepath, "utf-8");
    // Strip comments while preserving string contents (avoid corrupting URLs).
    const json = raw.replace(
      /\\"|"(?:\\"|[^"])*"|(\/\/.*|\/\*[\s\S]*?\*\/)/g,
      (match, comment) => (comment ? "" : match),
    );
    return JSON.parse(json) as T;
  } catch (error) {
    throw new Error(`Failed to parse config file ${filename}: ${error}`);
  }
}

export function loadEnvConfig(
  source: NodeJS.ProcessEnv = process.env,
): EnvConfig {
  const dataDir = join(dirname(fileURLToPath(import.meta.url)), "../data");

  return {
    nodeEnv: source.NODE_ENV ?? "development",
    timezone: source.TZ ?? "UTC",
    port: parseEnvInt(source.PORT, 3000, 1, 65535),
    dbPath: source.DB_PATH ?? join(dataDir, "jobs.db"),
    proxies: parseProxyList(source.PROXY_LIST),
    proxyUser: source.PROXY_USER ?? "",
    proxyPass: source.PROXY_PASS ?? "",
    proxyPoolSize: parseEnvInt(source.PROXY_POOL_SIZE, 10, 1),
    proxyFailureThreshold: parseEnvInt(source.PROXY_FAILURE_THRESHOLD, 3, 1),
    proxyCooldownMs: parseEnvInt(source.PROXY_COOLDOWN_MS, 60_000, 0),
    fetchWorkers: parseEnvInt(source.FETCH_WORKERS, 50, 1, 500),
    extractWorkers: parseEnvInt(source.EXTRACT_WORKERS, 3, 1, 50),
    fetchMaxAttempts: parseEnvInt(source.FETCH_MAX_ATTEMPTS, 5, 1, 20),
    fetchBackoffBase: parseEnvFloat(source.FETCH_BACKOFF_BASE, 1.5, 1),
    extractBatchSize: parseEnvInt(source.EXTRACT_BATCH_SIZE, 20, 1, 100),
    extractMaxAttempts: parseEnvInt(source.EXTRACT_MAX_ATTEMPTS, 3, 1, 10),
    leaseMs: parseEnvInt(source.LEASE_MS, 600_000, 1000),
    pollIntervalMs: parseEnvInt(source.POLL_INTERVAL_MS, 2000, 50),
    profileDebounceMs: parseEnvInt(source.PROFILE_DEBOUNCE_MS, 5000, 0),
    profileTopN: parseEnvInt(source.PROFILE_TOP_N, 20, 1, 200),
    llmApiUrl:
      source.LLM_API_URL ?? "https://api.openai.com/v1/chat/completions",
    llmApiKey: source.LLM_API_KEY ?? "",
    llmModel: source.LLM_MODEL ?? "gpt-4o",
    llmTimeoutMs: parseEnvInt(source.LLM_TIMEOUT_MS, 120_000, 1000),
    dispatchCron: source.DISPATCH_CRON ?? "0 */6 * * *",
    dispatchOnStart: source.DISPATCH_ON_START === "true",
  };
}

function validateRegistry(companies: CompaniesConfig): CompaniesConfig {
  const valid = companies.companies.filter((entry) => {
    if (!isAts(entry.ats)) {
      logger.warn(
        `Registry entry ${entry.slug} has unknown ATS "${entry.ats}" — skipped`,
      );
      return false;
    }
    return true;
  });
  return { ...companies, companies: valid };
}

export function loadConfig(): AppConfig {
  logger.info("Loading configuration...");

  const env = loadEnvConfig();
  const sources = loadJsonConfig<SourceConfig>("sources.json");
  const companies = validateRegistry(
    loadJsonConfig<CompaniesConfig>("companies.json"),
  );
  const userAgents = loadJsonConfig<UserAgentsConfig>("user-agents.json");
  const termMappings = loadJsonConfig<TermMappingsConfig>("term-mappings.json");
  const hiringSignals = loadJsonConfig<HiringSignalsConfig>(
    "hiring-signals.json",
  );

  if (!env.llmApiKey) {
    logger.warn("LLM_API_KEY not set — extraction calls will be rejected");
  }
  if (env.proxies.length === 0) {
    logger.warn("No PROXY_LIST configured — requests will go out directly");
  } else if (!env.proxyUser || !env.proxyPass) {
    logger.warn("PROXY_USER/PROXY_PASS not set — proxies used without auth");
  }

  const active = companies.companies.filter((c) => c.active);

  logger.info(`Config loaded successfully:`);
  logger.info(
    `  - ${active.length}/${companies.companies.length} active registry entries`,
  );
  logger.info(`  - ${Math.min(env.proxies.length, env.proxyPoolSize)} proxies`);
  logger.info(`  - ${userAgents.userAgents.length} user agents`);
  logger.info(`  - ${hiringSignals.rules.length} hiring signal rules`);
  logger.info(
    `  - Workers: ${env.fetchWorkers} fetch, ${env.extractWorkers} extract`,
  );
  logger.info(`  - Environment: ${env.nodeEnv}`);

  return {
    env,
    sources,
    companies,
    userAgents,
    termMappings,
    hiringSignals,
  };
}

let _config: AppConfig | null = null;

export function getConfig(): AppConfig {
  if (!_config) {
    _config = loadConfig();
  }
  return _config;
}
