import ExcelJS from 'exceljs';
import { Readable } from 'stream';
import { CandidateRepository } from '../types/candidate';
import { WhatsAppAdapter } from './whatsapp/whatsapp.adapter';
import { normalizePhone } from '../utils/phone';
import { logger } from '../utils/logger';
import { ValidationError, toError } from '../utils/errors';

export const IMPORT_COLUMNS = ['name', 'surname', 'phone_number', 'company_name', 'job_position'] as const;
type ImportColumn = (typeof IMPORT_COLUMNS)[number];
type ImportRow = Record<ImportColumn, string>;

export interface ImportResult {
  success: boolean;
  added: string[];
  skipped: string[];
  failed: string[];
}

function isImportColumn(value: string): value is ImportColumn {
  return IMPORT_COLUMNS.some((column) => column === value);
}

export function cellText(value: ExcelJS.CellValue): string {
  if (value === null || value === undefined) return '';
  if (typeof value === 'string' || typeof value === 'number' || typeof value === 'boolean') {
    return String(value).trim();
  }
  if (value instanceof Date) return value.toISOString();
  if ('richText' in value) return value.richText.map((part) => part.text).join('').trim();
  if ('text' in value && typeof value.text === 'string') return value.text.trim();
  if ('result' in value) return cellText(value.result ?? null);
  return '';
}

/** Reads the first worksheet; the header row names the columns, in any order. */
export async function readCandidateRows(buffer: Buffer): Promise<ImportRow[]> {
  const workbook = new ExcelJS.Workbook();
  try {
    await workbook.xlsx.read(Readable.from(buffer));
  } catch (error) {
    throw new ValidationError(`Invalid spreadsheet: ${toError(error).message}`);
  }

  const sheet = workbook.worksheets[0];
  if (!sheet) {
    throw new ValidationError('Spreadsheet has no worksheets');
  }

  const columns = new Map<number, ImportColumn>();
  sheet.getRow(1).eachCell((cell, colNumber) => {
    const header = cellText(cell.value).toLowerCase();
    if (isImportColumn(header)) columns.set(colNumber, header);
  });

  if (![...columns.values()].includes('phone_number')) {
    throw new ValidationError('Spreadsheet is missing the phone_number column');
  }

  const rows: ImportRow[] = [];
  sheet.eachRow((row, rowNumber) => {
    if (rowNumber === 1) return;

    const record: ImportRow = { name: '', surname: '', phone_number: '', company_name: '', job_position: '' };
    for (const [colNumber, column] of columns) {
      record[column] = cellText(row.getCell(colNumber).value);
    }

    if (Object.values(record).some((value) => value.length > 0)) {
      rows.push(record);
    }
  });

  return rows;
}

export class ImportService {
  constructor(
    private db: CandidateRepository,
    private whatsapp: WhatsAppAdapter
  ) {}

  /** Creates new candidates and sends each the onboarding template. Existing phones are left untouched. */
  async importCandidates(buffer: Buffer): Promise<ImportResult> {
    const rows = await readCandidateRows(buffer);
    const result: ImportResult = { success: true, added: [], skipped: [], failed: [] };

    for (const [index, row] of rows.entries()) {
      const phone = normalizePhone(row.phone_number);
      if (!phone) {
        result.failed.push(`row ${index + 2}`);
        continue;
      }

      if (await this.db.getCandidate(phone)) {
        result.skipped.push(phone);
        continue;
      }

      const created = await this.db.createCandidate({
        name: row.name || 'Unknown',
        surname: row.surname || 'Unknown',
        phone_number: phone,
        company_name: row.company_name || null,
        job_position: row.job_position || null,
      });

      if (!created) {
        result.skipped.push(phone);
        continue;
      }

      try {
        await this.whatsapp.sendTemplate(phone, {
          name: row.name || null,
          company: row.company_name || null,
          position: row.job_position || null,
        });
        result.added.push(phone);
      } catch (error) {
        logger.warn('Onboarding template failed', { phone, error: toError(error).message });
        result.failed.push(phone);
      }
    }

    logger.info('Candidate import finished', {
      added: result.added.length,
      skipped: result.skipped.length,
      failed: result.failed.length,
    });
    return result;
  }
}
