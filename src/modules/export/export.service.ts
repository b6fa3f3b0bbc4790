// modules/export/export.service.ts

import * as XLSX from 'xlsx';
import { matchesAdminKey } from '../../lib/adminKey';
import { writeFileAtomic } from '../../lib/files';
import { AccessDeniedError } from '../../lib/errors';
import type { ResultRecord, ResultStore } from '../results/result.model';

export const EXPORT_SHEET_NAME = 'Результаты';

export const EXPORT_HEADER = ['Время', 'Фамилия', 'Имя', 'Группа', 'Баллы', 'Всего'];

export function buildResultsWorkbook(records: readonly ResultRecord[]): XLSX.WorkBook {
  const rows = records.map((r) => [r.timestamp, r.surname, r.name, r.group, r.score, r.total]);
  const sheet = XLSX.utils.aoa_to_sheet([EXPORT_HEADER, ...rows]);
  const workbook = XLSX.utils.book_new();
  XLSX.utils.book_append_sheet(workbook, sheet, EXPORT_SHEET_NAME);
  return workbook;
}

export class ResultsExporter {
  constructor(
    private readonly results: ResultStore,
    private readonly adminKey: string
  ) {}

  /**
   * Writes every stored result (newest first) to `destination`, replacing
   * whatever is there, and returns the path. The key is checked before the
   * store or the file system is touched.
   */
  export(key: string, destination: string): string {
    if (!matchesAdminKey(key, this.adminKey)) {
      throw new AccessDeniedError();
    }

    const records = this.results.listAll();
    const data: Buffer = XLSX.write(buildResultsWorkbook(records), {
      type: 'buffer',
      bookType: 'xlsx',
    });

    writeFileAtomic(destination, data);

    console.log(`[export] wrote ${records.length} results to ${destination}`);
    return destination;
  }
}
