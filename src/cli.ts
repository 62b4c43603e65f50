#!/usr/bin/env node
import 'dotenv/config';
import { Command, InvalidArgumentError, Option } from 'commander';
import { loadSettings } from './config/settings.js';
import { isTrackerError } from './errors.js';
import {
    IndexTrackerService,
    StaticPriceSource,
    YahooFinancePriceSource,
    csvService,
    reportService,
    type PriceSource
} from './services/index.js';
import { formatCurrency } from './utils/decimal.js';
import { LOG_LEVELS, getLogLevel, isLogLevel, logger, setLogFile, setLogLevel } from './utils/logger.js';

interface CliOptions {
    amount?: number;
    securities?: string;
    exclusion?: string;
    prices?: string;
    outputDir?: string;
    createSample?: boolean;
    createExclusionSample?: boolean;
    logLevel?: string;
    logFile?: string;
}

function parseAmount(value: string): number {
    const amount = Number(value.replace(/,/g, ''));
    if (!Number.isFinite(amount)) {
        throw new InvalidArgumentError('Investment amount must be a valid number.');
    }
    return amount;
}

const program: Command = new Command();

program
    .name('index-tracker')
    .description('Generate equal-weight buy orders that replicate an index for a given investment amount')
    .option('-a, --amount <inr>', 'investment amount in INR', parseAmount)
    .option('-s, --securities <file>', 'securities CSV file (defaults to SECURITIES_FILE)')
    .option('-e, --exclusion <file>', 'CSV of securities to leave out')
    .option('-p, --prices <file>', 'symbol,price CSV used instead of live prices')
    .option('-o, --output-dir <dir>', 'directory for the allocation CSV and summary (defaults to OUTPUT_DIR)')
    .option('--create-sample', 'write a sample securities CSV and exit')
    .option('--create-exclusion-sample', 'write a sample exclusion CSV and exit')
    .addOption(new Option('--log-level <level>', 'log level').choices([...LOG_LEVELS]))
    .option('--log-file <path>', 'also append log lines to this file')
    .addHelpText('after', `
Examples:
  $ index-tracker --amount 100000
  $ index-tracker --amount 50000 --securities data/custom.csv
  $ index-tracker --amount 100000 --exclusion data/exclusions.csv
  $ index-tracker --amount 100000 --prices data/prices.csv
  $ index-tracker --amount 100000 --log-level DEBUG --log-file logs/tracker.log
  $ index-tracker --create-sample`);

async function main(options: CliOptions): Promise<void> {
    const settings = loadSettings();
    const level = options.logLevel ?? settings.logLevel;
    if (isLogLevel(level)) setLogLevel(level);
    setLogFile(options.logFile);
    logger.debug(`Log level ${getLogLevel()}${options.logFile ? `, writing to ${options.logFile}` : ''}`);

    if (options.createSample) {
        const file = await csvService.createSampleSecuritiesCsv(options.securities ?? settings.securitiesFile);
        console.log(`✓ Sample securities data created at ${file}`);
        return;
    }
    if (options.createExclusionSample) {
        const file = await csvService.createSampleExclusionCsv(options.exclusion ?? 'data/exclusions.csv');
        console.log(`✓ Sample exclusion data created at ${file}`);
        return;
    }

    if (options.amount === undefined) {
        program.error(`error: --amount is required (minimum ${formatCurrency(settings.minInvestmentAmount)})`);
    }

    const priceSource: PriceSource = options.prices
        ? new StaticPriceSource(await csvService.loadPrices(options.prices), options.prices)
        : new YahooFinancePriceSource({
            baseUrl: settings.priceFetch.sourceUrl,
            exchangeSuffix: settings.priceFetch.exchangeSuffix
        });

    const tracker = new IndexTrackerService(settings, { priceSource, csv: csvService });

    console.log(`Investment Amount: ${formatCurrency(options.amount)}`);
    if (options.exclusion) console.log(`Exclusion List: ${options.exclusion}`);

    const result = await tracker.run({
        amount: options.amount,
        securitiesFile: options.securities,
        exclusionFile: options.exclusion,
        outputDir: options.outputDir ?? settings.outputDir
    });

    console.log('');
    console.log(reportService.buildConsoleOverview(result.run));
    if (result.failures.length > 0) {
        console.log(`\n⚠ Failed to fetch prices for: ${result.failures.map(f => f.symbol).join(', ')}`);
    }
    if (result.report) {
        console.log('\nOutput files:');
        console.log(`  • Portfolio details: ${result.report.csvPath}`);
        console.log(`  • Summary report:    ${result.report.summaryPath}`);
    }
}

program.parse();

main(program.opts<CliOptions>()).catch((error: unknown) => {
    if (isTrackerError(error)) {
        console.error(`❌ ${error.message}`);
    } else {
        logger.error('Application failed:', error);
    }
    process.exit(1);
});
