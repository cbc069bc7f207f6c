import ExcelJS from 'exceljs';

import { AbsenceRecord } from './types';
import { formatDisplayDate, returnDateFor } from './utils/time';
import { truncate } from './utils/string';

export const DISPLAY_COLUMNS = ['Nome_do_Colaborador', 'Tipo', 'Motivo', 'Início', 'Dias', 'Término', 'Retorno', 'CID'] as const;

export type DisplayRow = Record<typeof DISPLAY_COLUMNS[number], string | number>;

const SHEET_NAME = 'Registros';
const SHORT_REASON_LENGTH = 30;

export function toDisplayRow(record: AbsenceRecord): DisplayRow {
    return {
        Nome_do_Colaborador: record.employee_name,
        Tipo: record.category,
        Motivo: record.reason,
        Início: formatDisplayDate(record.start_date),
        Dias: record.day_count,
        Término: formatDisplayDate(record.end_date),
        Retorno: formatDisplayDate(returnDateFor(record.end_date)),
        CID: record.medical_code,
    };
}

/**
 * One line per record for the per-person view, e.g. `Atestado de 01/02/2024 - 3 dias (M54 - Dor lombar)`.
 */
export function describeRecord(record: AbsenceRecord): string {
    const start = formatDisplayDate(record.start_date) || 'data desconhecida';

    return `${record.category} de ${start} - ${record.day_count} dias (${truncate(record.reason, SHORT_REASON_LENGTH)})`;
}

/**
 * Spreadsheet with the display columns, in the order the records are given.
 */
export async function exportWorkbook(records: AbsenceRecord[]): Promise<Buffer> {
    const wb = new ExcelJS.Workbook();
    const ws = wb.addWorksheet(SHEET_NAME);

    const headerRow = ws.addRow([...DISPLAY_COLUMNS]);
    headerRow.font = { bold: true };

    for (const record of records) {
        const row = toDisplayRow(record);
        ws.addRow(DISPLAY_COLUMNS.map(column => row[column]));
    }

    DISPLAY_COLUMNS.forEach((column, index) => {
        ws.getColumn(index + 1).width = column === 'Motivo' ? 50 : 18;
    });

    return Buffer.from(await wb.xlsx.writeBuffer());
}
