import { mkdir, readFile, writeFile } from 'node:fs/promises';
import path from 'node:path';
import { InvalidInputError, type FailureReport } from '../errors.js';
import { createSecurity, normalizeSymbol, type Security, type SecurityInput } from '../models/security.js';
import { createExclusionEntry, type ExclusionEntry } from '../models/exclusion.js';
import { parseCsv, toCsv, type CsvRecord } from '../utils/csv.js';
import { formatFileTimestamp } from '../utils/date.utils.js';
import { logger } from '../utils/logger.js';
import { reportService } from './report.service.js';
import {
    SAMPLE_EXCLUSIONS,
    SAMPLE_SECURITIES,
    SECURITY_CSV_HEADERS_NEW,
    SECURITY_CSV_HEADERS_OLD
} from './sample-data.js';
import type { AllocationRun } from '../models/portfolio.js';

const PRICE_COLUMNS = ['current_price', 'Current Price', 'Price', 'price', 'close', 'Close'];

export type SecurityCsvFormat = 'new' | 'old';

export interface SavedReport {
    csvPath: string;
    summaryPath: string;
}

export interface SaveRunOptions {
    outputDir: string;
    generatedAt: Date;
    failures?: readonly FailureReport[];
    fileName?: string;
}

function parseOptionalNumber(value: string | undefined): number | undefined {
    const trimmed = value?.trim().replace(/,/g, '');
    if (!trimmed) return undefined;
    return Number(trimmed);
}

function findColumn(headers: readonly string[], candidates: readonly string[]): string | undefined {
    return candidates.find(c => headers.includes(c));
}

function findColumnIgnoreCase(headers: readonly string[], candidates: readonly string[]): string | undefined {
    const lower = candidates.map(c => c.toLowerCase());
    return headers.find(h => lower.includes(h.toLowerCase()));
}

/**
 * CSV Service
 * Reads the securities universe, exclusion lists and price files, and
 * writes allocation reports.
 */
export class CsvService {

    /**
     * Detect the securities CSV layout from its headers
     */
    detectFormat(headers: readonly string[]): SecurityCsvFormat {
        const present = new Set(headers);
        if (SECURITY_CSV_HEADERS_NEW.every(h => present.has(h))) return 'new';
        if (SECURITY_CSV_HEADERS_OLD.every(h => present.has(h))) return 'old';

        throw new InvalidInputError(
            `CSV headers don't match expected format. Found: ${headers.join(', ')}. ` +
            `Expected: ${SECURITY_CSV_HEADERS_NEW.join(', ')} or ${SECURITY_CSV_HEADERS_OLD.join(', ')}`
        );
    }

    /**
     * Parse securities from CSV text. Malformed rows and repeated symbols are
     * skipped with a warning; unrecognised headers are an error.
     */
    parseSecurities(text: string): Security[] {
        const { headers, rows } = parseCsv(text);
        const format = this.detectFormat(headers);
        const priceColumn = findColumn(headers, PRICE_COLUMNS);
        logger.debug(`Detected ${format} securities CSV format${priceColumn ? ` with ${priceColumn} column` : ''}`);

        const securities: Security[] = [];
        const seen = new Set<string>();

        for (const { line, record } of rows) {
            try {
                const security = createSecurity(this.toSecurityInput(record, format, priceColumn));
                const key = normalizeSymbol(security.symbol);
                if (seen.has(key)) {
                    logger.warn(`Skipping row ${line}: duplicate symbol ${security.symbol}`);
                    continue;
                }
                seen.add(key);
                securities.push(security);
            } catch (error) {
                if (!(error instanceof InvalidInputError)) throw error;
                logger.warn(`Skipping row ${line}: ${error.message}`);
            }
        }

        return securities;
    }

    async loadSecurities(filePath: string): Promise<Security[]> {
        logger.info(`Loading securities from ${filePath}`);
        const text = await this.readText(filePath, 'Securities file');
        const securities = this.parseSecurities(text);
        logger.info(`Successfully loaded ${securities.length} securities`);
        return securities;
    }

    /**
     * Parse an exclusion list. Either securities CSV layout works; only the
     * symbol and ISIN columns are read.
     */
    parseExclusions(text: string): ExclusionEntry[] {
        const { headers, rows } = parseCsv(text);
        const symbolColumn = findColumn(headers, ['Symbol', 'symbol']);
        const isinColumn = findColumn(headers, ['ISIN Code', 'isin']);

        if (!symbolColumn && !isinColumn) {
            throw new InvalidInputError(
                `Exclusion CSV needs a Symbol or ISIN Code column. Found: ${headers.join(', ')}`
            );
        }

        const exclusions: ExclusionEntry[] = [];
        for (const { line, record } of rows) {
            try {
                exclusions.push(createExclusionEntry({
                    symbol: symbolColumn ? record[symbolColumn] : '',
                    isin: isinColumn ? record[isinColumn] : undefined
                }));
            } catch (error) {
                if (!(error instanceof InvalidInputError)) throw error;
                logger.warn(`Skipping exclusion row ${line}: ${error.message}`);
            }
        }
        return exclusions;
    }

    async loadExclusions(filePath: string): Promise<ExclusionEntry[]> {
        logger.info(`Loading exclusion list from ${filePath}`);
        const text = await this.readText(filePath, 'Exclusion file');
        const exclusions = this.parseExclusions(text);
        logger.info(`Loaded ${exclusions.length} securities to exclude`);
        return exclusions;
    }

    /**
     * Parse a symbol,price table for offline runs
     */
    parsePrices(text: string): Record<string, number> {
        const { headers, rows } = parseCsv(text);
        const symbolColumn = findColumnIgnoreCase(headers, ['symbol']);
        const priceColumn = findColumnIgnoreCase(headers, ['price', 'current_price', 'close']);

        if (!symbolColumn || !priceColumn) {
            throw new InvalidInputError(`Prices CSV needs symbol and price columns. Found: ${headers.join(', ')}`);
        }

        const prices: Record<string, number> = {};
        for (const { line, record } of rows) {
            const symbol = record[symbolColumn].trim();
            const price = parseOptionalNumber(record[priceColumn]);
            if (!symbol || price === undefined || Number.isNaN(price)) {
                logger.warn(`Skipping price row ${line}: expected a symbol and a numeric price`);
                continue;
            }
            prices[normalizeSymbol(symbol)] = price;
        }
        return prices;
    }

    async loadPrices(filePath: string): Promise<Record<string, number>> {
        logger.info(`Loading prices from ${filePath}`);
        const text = await this.readText(filePath, 'Prices file');
        return this.parsePrices(text);
    }

    /**
     * Write the allocation CSV and its summary text file
     */
    async saveRun(run: AllocationRun, options: SaveRunOptions): Promise<SavedReport> {
        const fileName = options.fileName ?? `index_allocation_${formatFileTimestamp(options.generatedAt)}.csv`;
        await mkdir(options.outputDir, { recursive: true });

        const csvPath = path.join(options.outputDir, fileName);
        const summaryPath = csvPath.replace(/\.csv$/i, '') + '_summary.txt';

        logger.info(`Saving portfolio allocation to ${csvPath}`);
        await writeFile(csvPath, reportService.buildAllocationCsv(run, options.generatedAt), 'utf-8');
        await writeFile(
            summaryPath,
            reportService.buildSummaryText(run.summary, options.generatedAt, options.failures),
            'utf-8'
        );
        logger.info(`Saved ${run.allocations.length} allocations and summary to ${summaryPath}`);

        return { csvPath, summaryPath };
    }

    async createSampleSecuritiesCsv(filePath: string): Promise<string> {
        return this.writeRecords(filePath, SECURITY_CSV_HEADERS_NEW, SAMPLE_SECURITIES);
    }

    async createSampleExclusionCsv(filePath: string): Promise<string> {
        return this.writeRecords(filePath, SECURITY_CSV_HEADERS_NEW, SAMPLE_EXCLUSIONS);
    }

    private toSecurityInput(
        record: CsvRecord,
        format: SecurityCsvFormat,
        priceColumn: string | undefined
    ): SecurityInput {
        // Unparseable prices such as "N/A" leave the security unresolved
        const rawPrice = priceColumn ? parseOptionalNumber(record[priceColumn]) : undefined;
        const currentPrice = rawPrice !== undefined && Number.isFinite(rawPrice) ? rawPrice : undefined;

        if (format === 'new') {
            return {
                symbol: record['Symbol'],
                companyName: record['Company Name'],
                isin: record['ISIN Code'],
                industry: record['Industry'],
                series: record['Series'],
                currentPrice
            };
        }

        return {
            symbol: record['symbol'],
            companyName: record['company_name'],
            isin: record['isin'],
            marketCap: parseOptionalNumber(record['market_cap']),
            weightage: parseOptionalNumber(record['weightage']),
            currentPrice
        };
    }

    private async writeRecords(
        filePath: string,
        headers: readonly string[],
        records: readonly CsvRecord[]
    ): Promise<string> {
        await mkdir(path.dirname(filePath), { recursive: true });
        await writeFile(filePath, toCsv(headers, records.map(r => headers.map(h => r[h] ?? ''))), 'utf-8');
        logger.info(`Wrote ${records.length} rows to ${filePath}`);
        return filePath;
    }

    private async readText(filePath: string, label: string): Promise<string> {
        try {
            return await readFile(filePath, 'utf-8');
        } catch (error) {
            if (error instanceof Error && 'code' in error && error.code === 'ENOENT') {
                throw new InvalidInputError(`${label} not found: ${filePath}`);
            }
            throw error;
        }
    }
}

export const csvService = new CsvService();
