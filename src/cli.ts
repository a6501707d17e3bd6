#!/usr/bin/env node
import { Command } from 'commander';
import {
  collect,
  configFromCli,
  parseInteger,
  parseNumber,
  type CliOptions,
} from './cli/options.js';
import { ConsoleReporter, VERSION } from './reporting/console-reporter.js';
import { writeReports } from './reporting/json-report.js';
import { ScanOrchestrator } from './scan-orchestrator.js';
import { errorMessage, isConfigurationError } from './utils/errors.js';
import { createLogger } from './utils/logger.js';

const EXIT_CONFIG_ERROR = 2;
const EXIT_INTERRUPTED = 130;

function buildProgram(): Command {
  return new Command()
    .name('residue')
    .description('Find leftover backup, configuration and credential files on web servers you are authorized to audit')
    .version(VERSION)
    .option('-u, --url <url>', 'Target base URL')
    .option('-l, --list <file>', 'File with one target URL per line')
    .option('-e, --extensions <list>', 'Comma-separated extensions replacing the level set')
    .option('-w, --wordlist <file>', 'Keyword file for brute-force mode')
    .option('-t, --timeout <seconds>', 'Per-request timeout in seconds', parseNumber)
    .option('--threads <count>', 'Fixed worker count (disables adaptive mode)', parseInteger)
    .option('-a, --adaptive', 'Adjust worker count from observed latency')
    .option('--max-threads <count>', 'Upper bound for adaptive mode', parseInteger)
    .option('--rate-limit <rps>', 'Global requests-per-second ceiling', parseNumber)
    .option('--delay <ms>', 'Minimum delay between requests of one worker', parseInteger)
    .option('-H, --header <header>', 'Extra request header "Name: value" (repeatable)', collect)
    .option('--user-agent <agent>', 'Custom User-Agent')
    .option('-r, --random-agent', 'Rotate User-Agent per request')
    .option('--ignore-content <types>', 'Comma-separated content types to ignore')
    .option('--status <codes>', 'Comma-separated status codes to report (allow list)')
    .option('--min-size <bytes>', 'Ignore responses smaller than this', parseInteger)
    .option('--max-size <bytes>', 'Ignore responses larger than this', parseInteger)
    .option('-b, --brute', 'Combine keywords with extensions')
    .option('--brute-recursive', 'Brute force every parent directory of the target path too')
    .option('--domain-wordlist', 'Derive backup names from the target domain')
    .option('--test-index', 'Test index.<ext> variants')
    .option('--level <0-4>', 'Scan level: 0 critical, 1 quick, 2 balanced, 3 deep, 4 exhaustive', parseInteger)
    .option('--lang <language>', 'Keyword language: en, pt-br or all')
    .option('-k, --insecure', 'Skip TLS certificate verification')
    .option('--skip-baseline', 'Do not learn the not-found signature first')
    .option('--baseline-consensus <fraction>', 'Agreement needed among baseline probes (0-1)', parseNumber)
    .option('-o, --output <file>', 'Write a JSON report')
    .option('--output-per-url', 'Write one JSON report per target next to --output')
    .option('--metrics', 'Print and export scan metrics')
    .option('-v, --verbose', 'Debug logging')
    .option('-s, --silent', 'Only print results')
    .option('--no-color', 'Disable colored output')
    .option('--log-file <file>', 'Also write logs to this file');
}

async function main(): Promise<void> {
  const program = buildProgram();
  await program.parseAsync(process.argv);
  const options = program.opts<CliOptions>();

  const config = await configFromCli(options);
  const logger = createLogger({
    name: 'residue',
    level: config.verbose ? 'debug' : config.silent ? 'error' : 'info',
    logFile: config.logFile,
  });

  const reporter = new ConsoleReporter({
    color: !config.noColor && process.stdout.isTTY === true,
    silent: config.silent,
    verbose: config.verbose,
  });

  const controller = new AbortController();
  process.on('SIGINT', () => {
    if (controller.signal.aborted) {
      process.exit(EXIT_INTERRUPTED);
    }
    console.log('\nReceived SIGINT, waiting for in-flight probes...');
    controller.abort();
  });

  const orchestrator = new ScanOrchestrator({
    config,
    logger,
    onTargetStart: info => reporter.targetStarted(info),
    onResult: result => reporter.result(result),
    onProgress: progress => reporter.progress(progress),
    onTargetComplete: report => reporter.targetCompleted(report, config.metrics),
  });

  reporter.printBanner(config);
  const reports = await orchestrator.run(controller.signal);

  if (config.output !== undefined) {
    const written = await writeReports(reports, {
      output: config.output,
      outputPerUrl: config.outputPerUrl,
      includeMetrics: config.metrics,
    });
    for (const file of written) {
      logger.info(`Report written to ${file}`);
    }
  }

  process.exitCode = controller.signal.aborted ? EXIT_INTERRUPTED : 0;
}

main().catch((error: unknown) => {
  if (isConfigurationError(error)) {
    console.error(`Configuration error [${error.code}]: ${error.message}`);
    process.exit(EXIT_CONFIG_ERROR);
  }
  console.error('Fatal error:', errorMessage(error));
  process.exit(1);
});
