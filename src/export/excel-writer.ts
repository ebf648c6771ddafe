/**
 * Spreadsheet export
 *
 * Writes a workbook with two sheets:
 * - "Voters": one row per record, fixed column order, every cell a string
 * - "Dashboard": run statistics (totals, roll header, gender and age-group counts)
 */

import * as XLSX from 'xlsx';
import { logger } from '../utils/logger';
import type { RollMetadata, VoterField, VoterRecord } from '../types/ocr';

export interface VoterColumn {
  key: VoterField | 'pageIndex';
  header: string;
  width: number;
}

export const VOTER_COLUMNS: readonly VoterColumn[] = [
  { key: 'parliamentaryNo', header: 'Lok Sabha Constituency No', width: 12 },
  { key: 'parliamentaryName', header: 'Lok Sabha Constituency Name', width: 24 },
  { key: 'constituencyNo', header: 'Assembly Constituency No', width: 12 },
  { key: 'constituencyName', header: 'Assembly Constituency Name', width: 24 },
  { key: 'partNo', header: 'Part No', width: 8 },
  { key: 'tehsilBlock', header: 'Tehsil/Block Name', width: 18 },
  { key: 'region', header: 'Region', width: 16 },
  { key: 'division', header: 'Division', width: 16 },
  { key: 'district', header: 'District', width: 16 },
  { key: 'serialNo', header: 'Serial No', width: 8 },
  { key: 'epic', header: 'EPIC No', width: 18 },
  { key: 'name', header: 'Name', width: 28 },
  { key: 'relationType', header: 'Relation Type', width: 10 },
  { key: 'relationName', header: 'Relation Name', width: 28 },
  { key: 'houseNo', header: 'House No', width: 10 },
  { key: 'age', header: 'Age', width: 6 },
  { key: 'gender', header: 'Gender', width: 6 },
  { key: 'ageGroup', header: 'Age Group', width: 10 },
  { key: 'pageIndex', header: 'Page', width: 6 },
];

export const VOTERS_SHEET = 'Voters';
export const DASHBOARD_SHEET = 'Dashboard';

export const AGE_GROUPS = ['18-29', '30-45', '45+'] as const;

export interface SpreadsheetContext {
  source: string;
  totalPages: number;
  rollMetadata: RollMetadata;
  generatedAt: Date;
}

export interface SpreadsheetWriter {
  write(outputPath: string, records: readonly VoterRecord[], context: SpreadsheetContext): Promise<void>;
}

function cellValue(record: VoterRecord, key: VoterColumn['key']): string {
  if (key === 'pageIndex') {
    return record.pageIndex === undefined ? '' : String(record.pageIndex);
  }
  return record[key] ?? '';
}

export function buildVoterRows(records: readonly VoterRecord[]): string[][] {
  const header = VOTER_COLUMNS.map(column => column.header);
  const rows = records.map(record => VOTER_COLUMNS.map(column => cellValue(record, column.key)));
  return [header, ...rows];
}

function joinNumberName(no?: string, name?: string): string {
  return [no, name].filter(Boolean).join(' - ');
}

export function buildDashboardRows(
  records: readonly VoterRecord[],
  context: SpreadsheetContext
): Array<Array<string | number>> {
  const countWhere = (predicate: (record: VoterRecord) => boolean) => records.filter(predicate).length;
  const { rollMetadata } = context;

  return [
    ['Electoral Roll Extraction'],
    [],
    ['Processing Date', context.generatedAt.toISOString()],
    ['Source File', context.source],
    ['Total Pages', context.totalPages],
    ['Total Voters', records.length],
    [],
    ['Lok Sabha Constituency', joinNumberName(rollMetadata.parliamentaryNo, rollMetadata.parliamentaryName)],
    ['Assembly Constituency', joinNumberName(rollMetadata.constituencyNo, rollMetadata.constituencyName)],
    ['Part No', rollMetadata.partNo ?? ''],
    ['District', rollMetadata.district ?? ''],
    ['Subdivision', rollMetadata.subdivision ?? ''],
    ['Tehsil', rollMetadata.tehsil ?? ''],
    ['Block', rollMetadata.block ?? ''],
    ['Pin Code', rollMetadata.pinCode ?? ''],
    ['Region', rollMetadata.region ?? ''],
    [],
    ['Gender', 'Count'],
    ['Male', countWhere(record => record.gender === 'M')],
    ['Female', countWhere(record => record.gender === 'F')],
    ['Third Gender', countWhere(record => record.gender === 'T')],
    ['Not Recorded', countWhere(record => record.gender === undefined)],
    [],
    ['Age Group', 'Count'],
    ...AGE_GROUPS.map(group => [group, countWhere(record => record.ageGroup === group)]),
    ['Not Recorded', countWhere(record => record.ageGroup === undefined)],
  ];
}

export class ExcelWriter implements SpreadsheetWriter {
  async write(outputPath: string, records: readonly VoterRecord[], context: SpreadsheetContext): Promise<void> {
    const workbook = XLSX.utils.book_new();

    const voters = XLSX.utils.aoa_to_sheet(buildVoterRows(records));
    voters['!cols'] = VOTER_COLUMNS.map(column => ({ wch: column.width }));
    XLSX.utils.book_append_sheet(workbook, voters, VOTERS_SHEET);

    const dashboard = XLSX.utils.aoa_to_sheet(buildDashboardRows(records, context));
    dashboard['!cols'] = [{ wch: 26 }, { wch: 40 }];
    XLSX.utils.book_append_sheet(workbook, dashboard, DASHBOARD_SHEET);

    XLSX.writeFile(workbook, outputPath);

    logger.info({ outputPath, rows: records.length }, 'Spreadsheet written');
  }
}
