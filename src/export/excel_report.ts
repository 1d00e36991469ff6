/**
 * Excel workbook for one analysis run
 */

import ExcelJS from 'exceljs';
import { join } from 'path';
import { createChildLogger } from '@/utils/logger';
import type { AnalysisRun } from '@/analysis/types';
import { isCompositeFailure, type SideAnalysis } from '@/composer/types';
import { ensureExportDir, runStamp } from './paths';
import { summaryRows } from './csv_export';

const logger = createChildLogger('excel_report');

const HEADER_BG = '1A1F36';
const HEADER_FONT = 'FFFFFF';
const GREEN_BG = 'C6EFCE';
const GREEN_FONT = '006100';
const YELLOW_BG = 'FFEB9C';
const YELLOW_FONT = '9C6500';
const RED_BG = 'FFC7CE';
const RED_FONT = '9C0006';

const INDICATOR_HEADERS = [
  'Indicator',
  'Raw Value',
  'Normalized Score',
  'Weight',
  'Lower Bound',
  'Upper Bound',
  'Data Timestamp',
  'Status',
  'Error',
];

function applyScoreFormatting(cell: ExcelJS.Cell, score: number | null) {
  if (score === null) return;

  if (score >= 0.6) {
    cell.fill = { type: 'pattern', pattern: 'solid', fgColor: { argb: GREEN_BG } };
    cell.font = { color: { argb: GREEN_FONT } };
  } else if (score >= 0.4) {
    cell.fill = { type: 'pattern', pattern: 'solid', fgColor: { argb: YELLOW_BG } };
    cell.font = { color: { argb: YELLOW_FONT } };
  } else {
    cell.fill = { type: 'pattern', pattern: 'solid', fgColor: { argb: RED_BG } };
    cell.font = { color: { argb: RED_FONT } };
  }
}

function styleHeaderRow(row: ExcelJS.Row) {
  row.height = 20;
  row.eachCell((cell) => {
    cell.fill = { type: 'pattern', pattern: 'solid', fgColor: { argb: HEADER_BG } };
    cell.font = { bold: true, color: { argb: HEADER_FONT }, size: 11 };
    cell.alignment = { horizontal: 'center', vertical: 'middle' };
    cell.border = {
      top: { style: 'thin' },
      left: { style: 'thin' },
      bottom: { style: 'thin' },
      right: { style: 'thin' },
    };
  });
}

function setColumnWidths(sheet: ExcelJS.Worksheet, widths: number[]) {
  widths.forEach((width, index) => {
    sheet.getColumn(index + 1).width = width;
  });
}

function freezeHeader(sheet: ExcelJS.Worksheet) {
  sheet.views = [{ state: 'frozen', ySplit: 1 }];
}

function cellValue(value: unknown): ExcelJS.CellValue {
  if (value === null || value === undefined) return '-';
  if (typeof value === 'number' || typeof value === 'string' || typeof value === 'boolean') {
    return value;
  }
  return JSON.stringify(value);
}

function addSummarySheet(workbook: ExcelJS.Workbook, run: AnalysisRun) {
  const sheet = workbook.addWorksheet('Summary');
  sheet.addRow(['Metric', 'Value']);
  styleHeaderRow(sheet.getRow(1));

  for (const [metric, value] of summaryRows(run)) {
    const row = sheet.addRow([cellValue(metric), cellValue(value)]);
    if (typeof metric === 'string' && metric.endsWith('Composite Score') && typeof value === 'number') {
      row.getCell(2).numFmt = '0.0000';
      applyScoreFormatting(row.getCell(2), value);
    }
  }

  setColumnWidths(sheet, [28, 40]);
  freezeHeader(sheet);
}

function addIndicatorSheet(workbook: ExcelJS.Workbook, name: string, analysis: SideAnalysis) {
  const sheet = workbook.addWorksheet(name);
  sheet.addRow(INDICATOR_HEADERS);
  styleHeaderRow(sheet.getRow(1));

  if (isCompositeFailure(analysis)) {
    sheet.addRow([`Analysis failed: ${analysis.error}`]);
  } else {
    for (const result of analysis.indicators) {
      const row = sheet.addRow([
        result.name,
        cellValue(result.rawValue),
        cellValue(result.normalizedScore),
        result.weight,
        cellValue(result.bounds?.lower),
        cellValue(result.bounds?.upper),
        result.timestamp,
        result.normalizedScore !== null ? 'OK' : 'FAILED',
        cellValue(result.error),
      ]);
      row.getCell(2).numFmt = '0.0000';
      row.getCell(3).numFmt = '0.0000';
      applyScoreFormatting(row.getCell(3), result.normalizedScore);
    }
  }

  setColumnWidths(sheet, [22, 14, 16, 10, 12, 12, 26, 10, 40]);
  sheet.autoFilter = 'A1:I1';
  freezeHeader(sheet);
}

function addMarketContextSheet(workbook: ExcelJS.Workbook, run: AnalysisRun) {
  const sheet = workbook.addWorksheet('Market Context');
  sheet.addRow(['Metric', 'Value']);
  styleHeaderRow(sheet.getRow(1));

  const context = run.marketContext;
  const price = context.priceStatistics;
  const volume = context.volumeStatistics;
  const rows: [string, unknown][] = [
    ['Timeframe', context.timeframe],
    ['Lookback Periods', context.lookbackPeriods],
    ['Current Price', context.currentPrice],
    ['Price Mean', price?.mean],
    ['Price Std', price?.std],
    ['Price High', price?.high],
    ['Price Low', price?.low],
    ['Price Change %', price?.changePct],
    ['Volume Current', volume?.current],
    ['Volume Mean', volume?.mean],
    ['Volume Z-Score', volume?.zScore],
    ['Volume Percentile', volume?.percentile],
  ];
  if (context.error) {
    rows.push(['Error', context.error]);
  }

  for (const [metric, value] of rows) {
    sheet.addRow([metric, cellValue(value)]);
  }

  setColumnWidths(sheet, [24, 24]);
  freezeHeader(sheet);
}

export function buildRunWorkbook(run: AnalysisRun): ExcelJS.Workbook {
  const workbook = new ExcelJS.Workbook();
  workbook.creator = 'cycle-score';
  workbook.created = new Date(run.calculation.startTime);

  addSummarySheet(workbook, run);
  addIndicatorSheet(workbook, 'Bottom Indicators', run.bottom);
  addIndicatorSheet(workbook, 'Top Indicators', run.top);
  addMarketContextSheet(workbook, run);

  return workbook;
}

export async function createExcelReport(run: AnalysisRun, outputDir: string): Promise<string> {
  const filePath = join(ensureExportDir(outputDir, 'excel'), `cycle_report_${runStamp(run)}.xlsx`);
  await buildRunWorkbook(run).xlsx.writeFile(filePath);
  logger.info({ runId: run.runId, filePath }, 'Excel report written');
  return filePath;
}
