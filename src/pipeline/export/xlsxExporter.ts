import fs from 'node:fs';
import path from 'node:path';
import ExcelJS from 'exceljs';
import { config } from '../../config.js';
import type { RefreshSnapshot, ServiceRecord } from '../../types.js';
import { isInternalKey } from '../present/state.js';

const BASELINE_FIELDS = [
  'folio',
  'billing_period_start',
  'billing_period_end',
  'total_amount',
  'customer_number',
  'address',
  'due_date',
] as const;

export type ServiceExportRow = Record<string, string | number | null>;

function cell(value: string | string[] | undefined): string | null {
  if (value === undefined) {
    return null;
  }
  return Array.isArray(value) ? value.join(', ') : value;
}

/** One row per configured service; type-specific fields are folded into `other_attributes` as JSON. */
export function buildExportRows(services: ServiceRecord[], snapshot: RefreshSnapshot): ServiceExportRow[] {
  return services.map((service) => {
    const result = snapshot.services[service.serviceId];
    const attributes = result?.attributes ?? {};
    const baseline: readonly string[] = BASELINE_FIELDS;
    const others = Object.fromEntries(
      Object.entries(attributes).filter(([key]) => !baseline.includes(key) && !isInternalKey(key)),
    );

    const row: ServiceExportRow = {
      service_id: service.serviceId,
      service_name: service.serviceName,
      service_type: service.serviceType,
      last_updated: result?.lastUpdated ?? null,
    };
    for (const field of BASELINE_FIELDS) {
      row[field] = cell(attributes[field]);
    }
    row.other_attributes = Object.keys(others).length ? JSON.stringify(others) : null;
    return row;
  });
}

/** `OUTPUT_DIR/services-YYYY-MM-DD.xlsx`, dated in UTC. */
export function defaultExportPath(now: Date = new Date()): string {
  return path.join(config.outputDir, `services-${now.toISOString().slice(0, 10)}.xlsx`);
}

export async function exportRowsToXlsx(rows: ServiceExportRow[], outputPath: string): Promise<void> {
  const workbook = new ExcelJS.Workbook();
  const sheet = workbook.addWorksheet('services');

  sheet.columns = [
    { header: 'service_id', key: 'service_id', width: 22 },
    { header: 'service_name', key: 'service_name', width: 24 },
    { header: 'service_type', key: 'service_type', width: 14 },
    { header: 'last_updated', key: 'last_updated', width: 26 },
    ...BASELINE_FIELDS.map((field) => ({ header: field, key: field, width: field === 'address' ? 40 : 18 })),
    { header: 'other_attributes', key: 'other_attributes', width: 60 },
  ];

  for (const row of rows) {
    sheet.addRow(row);
  }

  sheet.getRow(1).font = { bold: true };
  sheet.views = [{ state: 'frozen', ySplit: 1 }];
  sheet.autoFilter = {
    from: 'A1',
    to: 'L1',
  };

  fs.mkdirSync(path.dirname(outputPath), { recursive: true });
  await workbook.xlsx.writeFile(outputPath);
}
