#!/usr/bin/env node

import { Command } from 'commander';
import { BenchConfig, loadConfig, parseNumber, requireSerpApiKey } from './config.js';
import { ConfigurationError, errorMessage } from './errors.js';
import { CsvDetailWriter, ensureOutputFolder, FileSummaryWriter } from './export/files.js';
import { createConsoleLogger, Logger } from './logger.js';
import { OutputFormat, printProgress, printResults } from './reporter.js';
import { runBenchmark } from './runner.js';
import {
  DEFAULT_REGIONS,
  geoProbeTargets,
  loadSerpEngines,
  parseList,
  readCountriesFile,
  selectEngines,
  serpTargets,
} from './targets/index.js';
import { RunParameters, TargetDescriptor } from './types.js';

interface RunFlags {
  concurrency?: string;
  rate?: string;
  connectTimeout?: string;
  readTimeout?: string;
  batchSize?: string;
  monitorInterval?: string;
  detail: boolean;
  outputDir?: string;
  output: string;
  verbose?: boolean;
}

interface SerpFlags extends RunFlags {
  engines?: string[];
  requestsPerEngine: string;
}

interface ProxyFlags extends RunFlags {
  regions: string;
  countries?: string;
  countriesFile?: string;
  requests: string;
  url?: string;
}

const FORMATS: readonly OutputFormat[] = ['pretty', 'json', 'csv'];

function outputFormat(raw: string): OutputFormat {
  const format = FORMATS.find(f => f === raw);
  if (!format) {
    throw new ConfigurationError(`--output must be one of ${FORMATS.join(', ')}, got "${raw}"`);
  }
  return format;
}

function runParameters(cfg: BenchConfig, flags: RunFlags, requestsPerTarget: number): RunParameters {
  return {
    concurrency: parseNumber('--concurrency', flags.concurrency, cfg.concurrency),
    ratePerSecond: parseNumber('--rate', flags.rate, cfg.ratePerSecond),
    requestsPerTarget,
    timeouts: {
      connectMs: parseNumber('--connect-timeout', flags.connectTimeout, cfg.connectTimeoutSec) * 1000,
      readMs: parseNumber('--read-timeout', flags.readTimeout, cfg.readTimeoutSec) * 1000,
    },
    detailLogging: flags.detail && cfg.detailLogging,
    batchSize: parseNumber('--batch-size', flags.batchSize, cfg.batchSize),
    insecureTls: cfg.insecureTls,
    monitorIntervalMs: parseNumber('--monitor-interval', flags.monitorInterval, cfg.monitorIntervalSec) * 1000,
  };
}

function addRunOptions(command: Command): Command {
  return command
    .option('-c, --concurrency <number>', 'Maximum requests in flight (default: BENCH_CONCURRENCY or 10)')
    .option('-r, --rate <number>', 'Requests per second, 0 = unlimited (default: BENCH_RATE_PER_SEC or 0)')
    .option('--connect-timeout <seconds>', 'Connection timeout (default: 10)')
    .option('--read-timeout <seconds>', 'Read timeout (default: 20)')
    .option('--batch-size <number>', 'Detail rows per CSV write (default: 1000)')
    .option('--monitor-interval <seconds>', 'Progress output interval (default: 10)')
    .option('--no-detail', 'Disable the detailed per-request CSV (summary is always written)')
    .option('--output-dir <path>', 'Parent directory for the dated results folder')
    .option('-o, --output <format>', 'Console output format: pretty, json, csv', 'pretty')
    .option('--verbose', 'Show debug logging');
}

interface ExecuteOptions {
  title: string;
  folderPrefix: string;
  targets: TargetDescriptor[];
  params: RunParameters;
  flags: RunFlags;
  cfg: BenchConfig;
  splitDetailByGroup: boolean;
  logger: Logger;
}

async function execute(options: ExecuteOptions): Promise<void> {
  const { params, logger } = options;
  const format = outputFormat(options.flags.output);
  const folder = await ensureOutputFolder(options.flags.outputDir ?? options.cfg.outputDir, options.folderPrefix);
  const summaryWriter = new FileSummaryWriter(folder);
  const detailWriter = new CsvDetailWriter({ folder, splitByGroup: options.splitDetailByGroup });

  const total = options.targets.reduce((sum, t) => sum + (t.requestCount ?? params.requestsPerTarget), 0);
  logger.info(`${options.title}: ${options.targets.length} targets, ${total} requests @ ${params.concurrency} concurrency`);
  logger.info(
    `  rate: ${params.ratePerSecond > 0 ? `${params.ratePerSecond} req/s` : 'unlimited'}, ` +
      `timeouts: connect ${params.timeouts.connectMs / 1000}s / read ${params.timeouts.readMs / 1000}s, ` +
      `detail log: ${params.detailLogging ? 'on' : 'off'}, connection reuse: off`
  );
  logger.info(`  output: ${folder}`);

  const controller = new AbortController();
  const onInterrupt = () => {
    logger.warn('Interrupted: finishing in-flight requests, remaining work is cancelled');
    controller.abort();
  };
  process.once('SIGINT', onInterrupt);

  try {
    const report = await runBenchmark({
      targets: options.targets,
      params,
      detailWriter,
      summaryWriter,
      logger,
      signal: controller.signal,
      onProgress: printProgress,
    });

    printResults(report, { format, title: options.title });
    logger.info(`Summary saved to:\n  - ${summaryWriter.written.join('\n  - ')}`);
    if (params.detailLogging) {
      logger.info(`Detailed results in ${folder}`);
    }
  } finally {
    process.off('SIGINT', onInterrupt);
  }
}

function fail(error: unknown): never {
  const label = error instanceof ConfigurationError ? 'Configuration error' : 'Error';
  console.error(`${label}: ${errorMessage(error)}`);
  process.exit(2);
}

function loggerFor(flags: RunFlags): Logger {
  return createConsoleLogger({ verbose: flags.verbose, stderr: flags.output !== 'pretty' });
}

const program = new Command();

program
  .name('latency-bench')
  .description('Concurrent latency benchmark for search APIs and geo-proxied endpoints')
  .version('1.0.0');

addRunOptions(
  program
    .command('serp')
    .description('Benchmark SERP API engines')
    .option('-e, --engines <names...>', 'Engines to test (default: all known engines)')
    .option('-n, --requests-per-engine <number>', 'Requests per engine', '10')
).action(async (flags: SerpFlags) => {
  try {
    const cfg = loadConfig();
    const apiKey = requireSerpApiKey(cfg);
    const engines = selectEngines(loadSerpEngines(), flags.engines);
    const requests = parseNumber('--requests-per-engine', flags.requestsPerEngine, 10);

    await execute({
      title: 'SERP API Performance Test',
      folderPrefix: 'serp_results',
      targets: serpTargets({ apiKey, baseUrl: cfg.serpBaseUrl, engines }),
      params: runParameters(cfg, flags, requests),
      flags,
      cfg,
      splitDetailByGroup: false,
      logger: loggerFor(flags),
    });
    process.exit(0);
  } catch (error) {
    fail(error);
  }
});

addRunOptions(
  program
    .command('proxy')
    .description('Benchmark latency through geo-routed proxies')
    .option('--regions <list>', 'Comma-separated proxy regions', DEFAULT_REGIONS.join(','))
    .option('--countries <list>', 'Comma-separated country codes (one target per region and country)')
    .option('--countries-file <path>', 'File with one country code per line')
    .option('-n, --requests <number>', 'Requests per target', '1000')
    .option('--url <url>', 'Probe URL (default: PROXY_TARGET_URL or https://ipinfo.io/json)')
).action(async (flags: ProxyFlags) => {
  try {
    const cfg = loadConfig();
    const countries = flags.countriesFile ? await readCountriesFile(flags.countriesFile) : parseList(flags.countries);
    const requests = parseNumber('--requests', flags.requests, 1000);
    const logger = loggerFor(flags);

    if (!cfg.proxyHostTemplate) {
      logger.warn('PROXY_HOST_TEMPLATE is not set: probes go direct, without a proxy');
    }

    await execute({
      title: 'Geo Proxy Latency Test',
      folderPrefix: 'proxy_results',
      targets: geoProbeTargets({
        url: flags.url ?? cfg.proxyTargetUrl,
        regions: parseList(flags.regions),
        countries,
        templates: { host: cfg.proxyHostTemplate, auth: cfg.proxyAuthTemplate },
      }),
      params: runParameters(cfg, flags, requests),
      flags,
      cfg,
      splitDetailByGroup: true,
      logger,
    });
    process.exit(0);
  } catch (error) {
    fail(error);
  }
});

program
  .command('engines')
  .description('List the SERP engines in the catalogue')
  .action(() => {
    try {
      for (const engine of loadSerpEngines()) {
        console.log(`${engine.name.padEnd(18)} ${engine.category}`);
      }
    } catch (error) {
      fail(error);
    }
  });

await program.parseAsync();
