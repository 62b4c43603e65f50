import { v4 as uuidv4 } from 'uuid';
import { InvalidInputError, type FailureReport } from '../errors.js';
import { formatCurrency } from '../utils/decimal.js';
import { logger } from '../utils/logger.js';
import { AllocatorService } from './allocator.service.js';
import { CsvService, type SavedReport } from './csv.service.js';
import { PriceResolverService } from './price-resolver.service.js';
import type { TrackerSettings } from '../config/settings.js';
import type { Security } from '../models/security.js';
import type { ExclusionEntry } from '../models/exclusion.js';
import type { AllocationRun } from '../models/portfolio.js';
import type { PriceSource } from './price-sources/price-source.js';

/**
 * Input for a single tracking run. Securities and exclusions come either as
 * records or as CSV files; records win when both are given.
 */
export interface TrackerRunInput {
    amount: number;
    securities?: readonly Security[];
    securitiesFile?: string;
    exclusions?: readonly ExclusionEntry[];
    exclusionFile?: string;
    // Write the CSV and summary files to this directory
    outputDir?: string;
}

export interface TrackerRunResult {
    runId: string;
    generatedAt: Date;
    run: AllocationRun;
    failures: FailureReport[];
    report?: SavedReport;
}

export interface IndexTrackerDeps {
    priceSource: PriceSource;
    allocator?: AllocatorService;
    csv?: CsvService;
    sleep?: (ms: number) => Promise<void>;
    now?: () => Date;
}

/**
 * Index Tracker Service
 * Runs the whole pipeline: load universe -> exclude -> resolve prices ->
 * allocate -> write reports.
 */
export class IndexTrackerService {
    private readonly resolver: PriceResolverService;
    private readonly allocator: AllocatorService;
    private readonly csv: CsvService;
    private readonly now: () => Date;

    constructor(private readonly settings: TrackerSettings, deps: IndexTrackerDeps) {
        this.resolver = new PriceResolverService(deps.priceSource, settings.priceFetch, deps.sleep);
        this.allocator = deps.allocator ?? new AllocatorService();
        this.csv = deps.csv ?? new CsvService();
        this.now = deps.now ?? (() => new Date());
    }

    /**
     * Check an investment amount against the configured bounds
     */
    validateAmount(amount: number): void {
        const { minInvestmentAmount, maxInvestmentAmount } = this.settings;

        if (!Number.isFinite(amount)) {
            throw new InvalidInputError('Investment amount must be a valid number');
        }
        if (amount <= 0) {
            throw new InvalidInputError('Investment amount must be positive');
        }
        if (amount < minInvestmentAmount) {
            throw new InvalidInputError(`Investment amount must be at least ${formatCurrency(minInvestmentAmount)}`);
        }
        if (amount > maxInvestmentAmount) {
            throw new InvalidInputError(`Investment amount cannot exceed ${formatCurrency(maxInvestmentAmount)}`);
        }
    }

    async loadUniverse(input: Pick<TrackerRunInput, 'securities' | 'securitiesFile'>): Promise<Security[]> {
        if (input.securities) {
            return [...input.securities];
        }
        return this.csv.loadSecurities(input.securitiesFile ?? this.settings.securitiesFile);
    }

    async run(input: TrackerRunInput): Promise<TrackerRunResult> {
        const runId = uuidv4();
        logger.info(`Run ${runId}: investing ${formatCurrency(input.amount)}`);

        this.validateAmount(input.amount);

        logger.info('Step 1: Loading securities data');
        const universe = await this.loadUniverse(input);
        this.allocator.assertUniqueSymbols(universe);

        const exclusions = input.exclusions
            ? [...input.exclusions]
            : input.exclusionFile
                ? await this.csv.loadExclusions(input.exclusionFile)
                : [];

        // Exclusions are applied before any price lookup
        logger.info('Step 2: Filtering excluded securities');
        const { included } = this.allocator.applyExclusions(universe, exclusions);

        logger.info('Step 3: Fetching current market prices');
        const resolution = included.length > 0
            ? await this.resolver.resolve(included)
            : { securities: [], failures: [] };

        logger.info('Step 4: Calculating portfolio allocations');
        // Put priced records back in universe order; excluded ones stay as loaded
        const priced = new Map(included.map((security, i): [Security, Security] => [security, resolution.securities[i]]));
        const working = universe.map(security => priced.get(security) ?? security);
        const run = this.allocator.allocate(input.amount, working, exclusions);
        const generatedAt = this.now();

        let report: SavedReport | undefined;
        if (input.outputDir) {
            logger.info('Step 5: Generating output files');
            report = await this.csv.saveRun(run, {
                outputDir: input.outputDir,
                generatedAt,
                failures: resolution.failures
            });
        }

        return { runId, generatedAt, run, failures: resolution.failures, report };
    }
}
