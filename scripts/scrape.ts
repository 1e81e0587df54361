import 'dotenv/config';
import { parseArgs } from 'node:util';

import { buildScraperConfig, loadConfigFile } from '../src/config.js';
import { ConfigError, InputError, errorMessage } from '../src/errors.js';
import { UrlInputCollector } from '../src/input.js';
import { createLogger } from '../src/logger.js';
import { runScraper } from '../src/orchestrator.js';

const USAGE = `Usage: npm run scrape -- [options]

  --url <url>            Dealership URL (repeatable)
  --urls "<a> <b>"       Space-separated URLs
  --url-file <path>      Text file, one URL per line (# comments allowed)
  --csv-file <path>      CSV file with a URL column
  --csv-column <name>    Column holding URLs (default: url)
  --config <path>        JSON config file (default: config.json)
  --output-file <path>   Override the output Markdown file
  --timezone <zone>      IANA zone for timestamps
  --debug                Debug logging, screenshots and HTML snapshots
  --headed               Show the browser window
  --resume               Continue the most recent checkpoint session
  --session-id <id>      Name the checkpoint session
  --help`;

function collectUrls(
  values: ReturnType<typeof parseCli>['values'],
  input: { urls: string[]; url_file?: string; csv_file?: string; csv_column: string }
): UrlInputCollector {
  const collector = new UrlInputCollector();

  collector.addMany(values.url ?? [], 'CLI:--url');
  if (values.urls) collector.addMany(values.urls.split(/\s+/), 'CLI:--urls');
  if (values['url-file']) collector.addFromTextFile(values['url-file']);
  if (values['csv-file']) collector.addFromCsv(values['csv-file'], values['csv-column']);

  // config-file sources only when the command line gave none
  if (!collector.size) {
    collector.addMany(input.urls, 'config');
    if (input.url_file) collector.addFromTextFile(input.url_file);
    if (input.csv_file) collector.addFromCsv(input.csv_file, input.csv_column);
  }
  return collector;
}

function parseCli() {
  return parseArgs({
    options: {
      url: { type: 'string', multiple: true },
      urls: { type: 'string' },
      'url-file': { type: 'string' },
      'csv-file': { type: 'string' },
      'csv-column': { type: 'string', default: 'url' },
      config: { type: 'string', default: 'config.json' },
      'output-file': { type: 'string' },
      timezone: { type: 'string' },
      debug: { type: 'boolean', default: false },
      headed: { type: 'boolean', default: false },
      resume: { type: 'boolean', default: false },
      'session-id': { type: 'string' },
      help: { type: 'boolean', default: false },
    },
    strict: true,
  });
}

async function main() {
  const { values } = parseCli();
  if (values.help) {
    console.log(USAGE);
    return;
  }

  const configPath = values.config ?? 'config.json';
  const { config: file, missing } = loadConfigFile(configPath);
  const config = buildScraperConfig(file, {
    outputFile: values['output-file'],
    timezone: values.timezone,
    debug: values.debug,
    headed: values.headed,
  });
  const logger = createLogger({ debugMode: config.debugMode, logFile: config.debugLogFile });
  if (missing) logger.warn(`Config file not found: ${configPath}; using defaults`);

  const collector = collectUrls(values, file.input);
  if (!collector.size && !values.resume) {
    throw new InputError('No URLs provided. Use --url, --urls, --url-file, --csv-file or input.* in the config file.');
  }
  logger.info(collector.summary());
  if (config.debugMode) logger.info(`Debug mode: logging to ${config.debugLogFile}`);

  const controller = new AbortController();
  process.once('SIGINT', () => {
    logger.warn('Interrupt received; finishing in-flight dealerships');
    controller.abort();
  });

  const summary = await runScraper(config, collector.urls(), {
    logger,
    resume: values.resume,
    sessionId: values['session-id'],
    signal: controller.signal,
  });
  logger.info(`Done: ${summary.completed} completed, ${summary.failed} failed`);
}

main().catch((err) => {
  if (err instanceof ConfigError || err instanceof InputError) {
    console.error(`Error: ${err.message}`);
  } else {
    console.error('Fatal error:', errorMessage(err));
  }
  process.exit(1);
});
