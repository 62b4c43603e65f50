import type { CsvRecord } from '../utils/csv.js';

export const SECURITY_CSV_HEADERS_NEW = ['Company Name', 'Industry', 'Symbol', 'Series', 'ISIN Code'] as const;
export const SECURITY_CSV_HEADERS_OLD = ['symbol', 'company_name', 'isin', 'market_cap', 'weightage'] as const;

// Fictional constituents for trying the tool out
export const SAMPLE_SECURITIES: CsvRecord[] = [
    { 'Company Name': 'Arunodaya Energy Limited', Industry: 'Oil Gas & Consumable Fuels', Symbol: 'ARUNENERGY', Series: 'EQ', 'ISIN Code': 'INE100A01010' },
    { 'Company Name': 'Bharatvani Telecom Limited', Industry: 'Telecommunication', Symbol: 'BVTELECOM', Series: 'EQ', 'ISIN Code': 'INE100B01018' },
    { 'Company Name': 'Chandrika Software Services Limited', Industry: 'Information Technology', Symbol: 'CHANDSOFT', Series: 'EQ', 'ISIN Code': 'INE100C01016' },
    { 'Company Name': 'Deccan Cement Works Limited', Industry: 'Construction Materials', Symbol: 'DECCEMENT', Series: 'EQ', 'ISIN Code': 'INE100D01014' },
    { 'Company Name': 'Ekam Finance Limited', Industry: 'Financial Services', Symbol: 'EKAMFIN', Series: 'EQ', 'ISIN Code': 'INE100E01012' },
    { 'Company Name': 'Gangotri Consumer Products Limited', Industry: 'Fast Moving Consumer Goods', Symbol: 'GANGOTRI', Series: 'EQ', 'ISIN Code': 'INE100G01018' },
    { 'Company Name': 'Himalaya Auto Components Limited', Industry: 'Automobile and Auto Components', Symbol: 'HIMAUTO', Series: 'EQ', 'ISIN Code': 'INE100H01016' },
    { 'Company Name': 'Indus Pharma Laboratories Limited', Industry: 'Healthcare', Symbol: 'INDUSPHARM', Series: 'EQ', 'ISIN Code': 'INE100I01014' }
];

export const SAMPLE_EXCLUSIONS: CsvRecord[] = [
    { 'Company Name': 'Ekam Finance Limited', Industry: 'Financial Services', Symbol: 'EKAMFIN', Series: 'EQ', 'ISIN Code': 'INE100E01012' },
    { 'Company Name': 'Indus Pharma Laboratories Limited', Industry: 'Healthcare', Symbol: 'INDUSPHARM', Series: 'EQ', 'ISIN Code': 'INE100I01014' }
];
