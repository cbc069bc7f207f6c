import fs from 'fs';
import path from 'path';
import Papa from 'papaparse';
import { v4 as uuidv4 } from 'uuid';

import Adapter from './adapter';
import { storageLog } from '../logging';
import { InvalidArgumentError, PersistenceReadError, errorMessage } from '../errors';
import { AbsenceRecord, CATEGORIES, isAbsenceCategory } from '../types';
import { calculateDates, daysBetween, parseDate } from '../utils/time';
import { normalizeCode } from '../utils/string';

export const COLUMNS = [
	'Nome_do_Colaborador',
	'Data_de_Inicio',
	'Dias',
	'Data_Final',
	'CID',
	'Tipo',
	'Motivo',
	'Id',
] as const;

type Column = typeof COLUMNS[number];
type CsvRow = Partial<Record<string, string>>;

export interface AbsenceFile {
	records: AbsenceRecord[];
	// true when the file is not in the current format and must be written back
	migrated: boolean;
}

// headers written by earlier versions of the register
const LEGACY_COLUMNS: { [key: string]: Column } = {
	'Nome do Colaborador': 'Nome_do_Colaborador',
	'Data de Início': 'Data_de_Inicio',
	'Data Final': 'Data_Final',
	'Descricao CID': 'Motivo',
	'Descricao_CID': 'Motivo',
	'Descricao_do_CID': 'Motivo',
};

class Absences extends Adapter {
	async init() {
		fs.mkdirSync(path.dirname(path.resolve(this.file)), { recursive: true });
	}

	/**
	 * Reads every record from the CSV file, mapping old headers and filling the fields older files lack.
	 * @throws PersistenceReadError when the file can't be read or parsed.
	 */
	read(): AbsenceFile {
		if (!this.exists()) {
			storageLog.info({ message: 'read: data file not found, starting empty', file: this.file });
			return { records: [], migrated: false };
		}

		let text: string;

		try {
			text = fs.readFileSync(this.file, 'utf8');
		} catch (error) {
			throw new PersistenceReadError(this.file, errorMessage(error));
		}

		const renamed: string[] = [];
		const { data, errors, meta } = Papa.parse<CsvRow>(text.replace(/^\uFEFF/, ''), {
			header: true,
			delimiter: ',',
			skipEmptyLines: true,
			transformHeader: (header: string) => {
				const trimmed = header.trim();
				const current = LEGACY_COLUMNS[trimmed];

				if (current) {
					renamed.push(trimmed);
					return current;
				}

				return trimmed;
			},
		});

		const fatal = errors.find(e => e.type === 'Quotes' || e.code === 'TooManyFields');

		if (fatal) {
			throw new PersistenceReadError(this.file, `linha ${(fatal.row ?? 0) + 2}: ${fatal.message}`);
		}

		const fields = meta.fields ?? [];

		if (!fields.includes('Nome_do_Colaborador')) {
			throw new PersistenceReadError(this.file, 'coluna Nome_do_Colaborador ausente');
		}

		const hasCategory = fields.includes('Tipo');
		const records: AbsenceRecord[] = [];
		let dropped = 0;
		let assignedIds = 0;

		for (const row of data) {
			const record = this.toRecord(row, hasCategory);

			if (!record) {
				dropped++;
				continue;
			}

			if (!row['Id']?.trim()) {
				assignedIds++;
			}

			records.push(record);
		}

		const migrated = !hasCategory || assignedIds > 0 || dropped > 0 || renamed.length > 0;

		if (migrated) {
			storageLog.info({ message: 'read: migrated legacy rows', file: this.file, renamed, hasCategory, assignedIds, dropped });
		}

		storageLog.debug({ message: 'read success', file: this.file, count: records.length });

		return { records, migrated };
	}

	write(records: AbsenceRecord[]) {
		const csv = Papa.unparse(
			{
				fields: [...COLUMNS],
				data: records.map(record => {
					const row = this.toRow(record);
					return COLUMNS.map(column => row[column]);
				}),
			},
			{ newline: '\n' },
		);

		fs.writeFileSync(this.file, `${csv}\n`, 'utf8');

		storageLog.debug({ message: 'write success', file: this.file, count: records.length });
	}

	private toRecord(row: CsvRow, hasCategory: boolean): AbsenceRecord | null {
		const employeeName = row['Nome_do_Colaborador']?.trim();

		if (!employeeName) {
			return null;
		}

		const tipo = row['Tipo']?.trim() ?? '';
		// rows without a category predate the other absence types
		const category = hasCategory && isAbsenceCategory(tipo) ? tipo : CATEGORIES.MedicalCertificate;

		const startDate = parseDate(row['Data_de_Inicio']);
		const storedEnd = parseDate(row['Data_Final']);
		const storedDays = Number(row['Dias']);
		const dayCount = Number.isInteger(storedDays) && storedDays >= 1
			? storedDays
			: daysBetween(startDate, storedEnd) ?? 1;

		return {
			id: row['Id']?.trim() || uuidv4(),
			employee_name: employeeName,
			start_date: startDate,
			day_count: dayCount,
			end_date: startDate ? this.endDate(startDate, dayCount, storedEnd) : storedEnd,
			medical_code: category === CATEGORIES.MedicalCertificate ? normalizeCode(row['CID']) : '',
			category,
			reason: row['Motivo'] ?? '',
		};
	}

	private endDate(startDate: string, dayCount: number, storedEnd: string | null): string | null {
		try {
			return calculateDates(startDate, dayCount).endDate;
		} catch (error) {
			if (!(error instanceof InvalidArgumentError)) {
				throw error;
			}

			storageLog.warn({ message: 'read: day count out of range, keeping stored end date', startDate, dayCount });
			return storedEnd;
		}
	}

	private toRow(record: AbsenceRecord): Record<Column, string | number> {
		return {
			Nome_do_Colaborador: record.employee_name,
			Data_de_Inicio: record.start_date ?? '',
			Dias: record.day_count,
			Data_Final: record.end_date ?? '',
			CID: record.medical_code,
			Tipo: record.category,
			Motivo: record.reason,
			Id: record.id,
		};
	}
}

export default Absences;
