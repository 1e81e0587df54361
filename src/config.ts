import { existsSync, readFileSync } from 'node:fs';

import { z } from 'zod';

import { DEFAULT_CENSUS_API_URL } from './services/census';
import { ConfigError, errorMessage } from './errors';

const ScraperSection = z
  .object({
    max_concurrent: z.number().int().min(1).default(5),
    page_timeout_ms: z.number().int().positive().default(30_000),
    delay_between_pages_sec: z.number().min(0).default(3),
    retry_attempts: z.number().int().min(1).default(3),
    respect_robots_txt: z.boolean().default(true),
    headless: z.boolean().default(true),
    user_agent: z.string().min(1).nullable().default(null),
  })
  .default({});

const OutputSection = z
  .object({
    file: z.string().min(1).default('./output/dealership-data.md'),
    timezone: z.string().min(1).default('America/Chicago'),
    locale: z.string().min(1).default('en-US'),
  })
  .default({});

const NormalizeSection = z
  .object({
    phone: z.boolean().default(true),
    hours: z.boolean().default(true),
    urls: z.boolean().default(true),
  })
  .default({});

const EvidenceSection = z
  .object({
    links_required: z.boolean().default(true),
    capture_scores: z.boolean().default(true),
  })
  .default({});

const CensusSection = z
  .object({
    enabled: z.boolean().default(true),
    api_url: z.string().url().default(DEFAULT_CENSUS_API_URL),
  })
  .default({});

const MultiLocationSection = z
  .object({
    enabled: z.boolean().default(true),
    max_locations_per_site: z.number().int().min(1).default(10),
  })
  .default({});

const CheckpointSection = z
  .object({
    dir: z.string().min(1).default('./.checkpoints'),
    keep_sessions: z.number().int().min(1).default(10),
  })
  .default({});

const DebugSection = z
  .object({
    enabled: z.boolean().default(false),
    save_screenshots: z.boolean().default(true),
    save_html: z.boolean().default(true),
    log_file: z.string().min(1).default('./debug/debug.log'),
    log_network: z.boolean().default(true),
  })
  .default({});

const InputSection = z
  .object({
    urls: z.array(z.string()).default([]),
    url_file: z.string().min(1).optional(),
    csv_file: z.string().min(1).optional(),
    csv_column: z.string().min(1).default('url'),
  })
  .default({});

export const ConfigFileSchema = z.object({
  scraper: ScraperSection,
  output: OutputSection,
  normalize: NormalizeSection,
  evidence: EvidenceSection,
  census: CensusSection,
  multi_location: MultiLocationSection,
  checkpoint: CheckpointSection,
  debug: DebugSection,
  input: InputSection,
});

export type ConfigFile = z.infer<typeof ConfigFileSchema>;

export const DEFAULT_USER_AGENT =
  'Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/120.0.0.0 Safari/537.36';

export type ScraperConfig = {
  maxConcurrent: number;
  pageTimeoutMs: number;
  delayBetweenPagesSec: number;
  retryAttempts: number;
  respectRobotsTxt: boolean;
  headless: boolean;
  userAgent: string;
  outputFile: string;
  timezone: string;
  locale: string;
  normalizePhone: boolean;
  normalizeHours: boolean;
  normalizeUrls: boolean;
  evidenceLinksRequired: boolean;
  captureConfidenceScores: boolean;
  censusEnabled: boolean;
  censusApiUrl: string;
  multiLocationEnabled: boolean;
  maxLocationsPerSite: number;
  checkpointDir: string;
  keepSessions: number;
  debugMode: boolean;
  debugSaveScreenshots: boolean;
  debugSaveHtml: boolean;
  debugLogFile: string;
  debugLogNetwork: boolean;
};

export type CliOverrides = {
  outputFile?: string;
  debug?: boolean;
  headed?: boolean;
  timezone?: string;
};

/**
 * Reads and validates the JSON config file. A missing file is not an error:
 * `missing` is set and every default applies.
 */
export function loadConfigFile(filePath: string): { config: ConfigFile; missing: boolean } {
  if (!existsSync(filePath)) {
    return { config: ConfigFileSchema.parse({}), missing: true };
  }

  let raw: unknown;
  try {
    raw = JSON.parse(readFileSync(filePath, 'utf-8'));
  } catch (err) {
    throw new ConfigError(`Cannot read config file ${filePath}: ${errorMessage(err)}`);
  }

  const parsed = ConfigFileSchema.safeParse(raw ?? {});
  if (!parsed.success) {
    const issues = parsed.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`).join('; ');
    throw new ConfigError(`Invalid config file ${filePath}: ${issues}`);
  }
  return { config: parsed.data, missing: false };
}

/** Precedence: CLI flags, then environment, then the file, then defaults. */
export function buildScraperConfig(
  file: ConfigFile,
  cli: CliOverrides = {},
  env: NodeJS.ProcessEnv = process.env
): ScraperConfig {
  return {
    maxConcurrent: file.scraper.max_concurrent,
    pageTimeoutMs: file.scraper.page_timeout_ms,
    delayBetweenPagesSec: file.scraper.delay_between_pages_sec,
    retryAttempts: file.scraper.retry_attempts,
    respectRobotsTxt: file.scraper.respect_robots_txt,
    headless: cli.headed ? false : file.scraper.headless,
    userAgent: env.SCRAPER_USER_AGENT || file.scraper.user_agent || DEFAULT_USER_AGENT,
    outputFile: cli.outputFile ?? file.output.file,
    timezone: cli.timezone ?? (env.SCRAPER_TIMEZONE || file.output.timezone),
    locale: file.output.locale,
    normalizePhone: file.normalize.phone,
    normalizeHours: file.normalize.hours,
    normalizeUrls: file.normalize.urls,
    evidenceLinksRequired: file.evidence.links_required,
    captureConfidenceScores: file.evidence.capture_scores,
    censusEnabled: file.census.enabled,
    censusApiUrl: env.CENSUS_API_URL || file.census.api_url,
    multiLocationEnabled: file.multi_location.enabled,
    maxLocationsPerSite: file.multi_location.max_locations_per_site,
    checkpointDir: file.checkpoint.dir,
    keepSessions: file.checkpoint.keep_sessions,
    debugMode: cli.debug || file.debug.enabled,
    debugSaveScreenshots: file.debug.save_screenshots,
    debugSaveHtml: file.debug.save_html,
    debugLogFile: file.debug.log_file,
    debugLogNetwork: file.debug.log_network,
  };
}
