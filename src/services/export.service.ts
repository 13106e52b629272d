import fs from 'fs/promises';
import path from 'path';
import { stringify } from 'csv-stringify/sync';
import { StandardRecord } from '../types/standard';
import { ExportFormat, ExportPayload } from '../types/tasks';
import { UnsupportedFormatError } from '../errors/http-error';
import { logger } from '../utils/logger';

const log = logger.child('export');

type Serializer = (records: StandardRecord[]) => string;

export function collectFieldNames(records: StandardRecord[]): string[] {
  const names = new Set<string>();
  for (const record of records) {
    for (const key of Object.keys(record)) {
      names.add(key);
    }
  }
  return Array.from(names).sort();
}

export function toJson(records: StandardRecord[]): string {
  return JSON.stringify(records, null, 2);
}

/** CSV with a BOM so spreadsheet tools detect UTF-8; columns are the sorted key union. */
export function toCsv(records: StandardRecord[]): string {
  const columns = collectFieldNames(records);
  if (columns.length === 0) {
    return '';
  }
  return stringify(records, { header: true, columns, bom: true });
}

export function isExportFormat(format: string): format is ExportFormat {
  return format === 'json' || format === 'csv';
}

export class ExportService {
  private readonly serializers: Record<ExportFormat, { contentType: string; serialize: Serializer }> = {
    json: { contentType: 'application/json; charset=utf-8', serialize: toJson },
    csv: { contentType: 'text/csv; charset=utf-8', serialize: toCsv },
  };

  constructor(private readonly dataDir: string) {}

  serialize(taskId: string, records: StandardRecord[], format: string): ExportPayload {
    if (!isExportFormat(format)) {
      throw new UnsupportedFormatError(format);
    }

    const { contentType, serialize } = this.serializers[format];
    return {
      filename: `standards_${taskId}.${format}`,
      contentType,
      content: serialize(records),
    };
  }

  /** Writes the completed result set to `results_<taskId>.json` and returns its path. */
  async saveSnapshot(taskId: string, records: StandardRecord[]): Promise<string> {
    await fs.mkdir(this.dataDir, { recursive: true });
    const file = path.join(this.dataDir, `results_${taskId}.json`);
    await fs.writeFile(file, toJson(records), 'utf-8');
    log.info('Result snapshot saved', { taskId, file, records: records.length });
    return file;
  }
}
