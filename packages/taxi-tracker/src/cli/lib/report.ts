/**
 * Taxi report rendering
 *
 * @module cli/lib/report
 */

import type { TaxiReport } from '../../core/types.js';
import type { OutputFormat } from './config.js';
import { formatCsv, formatJson, formatTable, type TableColumn } from './output.js';

const REPORT_COLUMNS: readonly TableColumn[] = [
  { key: 'rank', header: '#', align: 'right' },
  { key: 'area', header: 'Area' },
  { key: 'count', header: 'Count', align: 'right' },
  { key: 'description', header: 'Location' },
  { key: 'mapLink', header: 'Google Maps Link' },
];

function reportRows(report: TaxiReport) {
  return report.areas.map((row) => ({
    rank: row.rank,
    area: row.area,
    count: row.count,
    description: row.description,
    mapLink: row.mapLink,
  }));
}

/**
 * Render the report for stdout
 */
export function formatReport(report: TaxiReport, format: OutputFormat): string {
  switch (format) {
    case 'json':
      return formatJson(report);
    case 'csv':
      return formatCsv(reportRows(report), REPORT_COLUMNS);
    case 'table':
      return [
        `Total Available Taxis: ${report.totalTaxis}`,
        `Assigned to ${report.planningAreaCount} planning areas: ${report.assignedTaxis} (${report.unassignedTaxis} unassigned)`,
        '',
        formatTable(reportRows(report), REPORT_COLUMNS),
      ].join('\n');
  }
}
