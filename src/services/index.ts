export { AllocatorService, allocator, type ExclusionResult } from './allocator.service.js';
export { PriceResolverService, type RetryPolicy, type PriceResolution } from './price-resolver.service.js';
export { CsvService, csvService, type SavedReport, type SaveRunOptions } from './csv.service.js';
export { ReportService, reportService, OUTPUT_CSV_HEADERS } from './report.service.js';
export {
    IndexTrackerService,
    type TrackerRunInput,
    type TrackerRunResult,
    type IndexTrackerDeps
} from './index-tracker.service.js';
export * from './price-sources/index.js';
