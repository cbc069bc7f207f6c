import { v4 as uuidv4 } from 'uuid';

import Model from './model';
import Storage from '../storage';
import { storageLog } from '../logging';
import { NotFoundError, PersistenceReadError, ValidationError } from '../errors';
import {
	AbsenceCategory,
	AbsenceRecord,
	AbsenceUpdate,
	CATEGORIES,
	DescriptionLookup,
	EmployeeAbsences,
	NewAbsence,
	SavedAbsence,
	TIME_BANK_REASON,
	UNEXCUSED_REASON,
} from '../types';
import { calculateDates } from '../utils/time';
import { normalizeCode } from '../utils/string';

const requireName = (name: string | undefined): string => {
	const trimmed = name?.trim();

	if (!trimmed) {
		throw new ValidationError('Por favor, preencha o Nome do Colaborador.');
	}

	return trimmed;
};

const requireCode = (code: string | undefined): string => {
	const normalized = normalizeCode(code);

	if (!normalized) {
		throw new ValidationError('Por favor, preencha o Código CID.');
	}

	return normalized;
};

const byStartDateDesc = (a: AbsenceRecord, b: AbsenceRecord): number => {
	if (a.start_date === b.start_date) return 0;
	if (!a.start_date) return 1;
	if (!b.start_date) return -1;

	return b.start_date.localeCompare(a.start_date);
};

/**
 * The absence register. Holds the records in insertion order and rewrites the whole data file after every change.
 */
class Absences extends Model {
	private records: AbsenceRecord[] = [];

	constructor(storage: Storage, private lookup: DescriptionLookup) {
		super(storage);
	}

	/**
	 * Replaces the in-memory records with the data file contents. A file in an older format is written back at once
	 * so the ids given to its rows stay the same on the next load.
	 * An unreadable file leaves the register empty and adds a warning.
	 */
	load(): AbsenceRecord[] {
		try {
			const { records, migrated } = this.storage.getAbsences().read();

			if (migrated) {
				this.persist(records);
				storageLog.info({ message: 'load: data file rewritten in the current format', count: records.length });
			} else {
				this.records = records;
			}
		} catch (error) {
			if (!(error instanceof PersistenceReadError)) {
				throw error;
			}

			storageLog.warn({ message: 'load: unreadable data file, starting empty', file: error.file, error: error.message });
			this.addWarning(`${error.message} Iniciando com uma lista vazia.`);
			this.records = [];
		}

		return this.list();
	}

	async add(input: NewAbsence): Promise<SavedAbsence> {
		const employeeName = requireName(input.employee_name);
		const { endDate, returnDate } = calculateDates(input.start_date, input.day_count);
		const { medicalCode, reason } = await this.deriveReason(input.category, input.medical_code, input.free_reason);

		const record: AbsenceRecord = {
			id: uuidv4(),
			employee_name: employeeName,
			start_date: input.start_date,
			day_count: input.day_count,
			end_date: endDate,
			medical_code: medicalCode,
			category: input.category,
			reason,
		};

		this.persist([...this.records, record]);

		storageLog.info({ message: 'add success', id: record.id, category: record.category });

		return { record: { ...record }, return_date: returnDate };
	}

	/**
	 * Changes name, dates and CID of a record. The category never changes; the reason is looked up again only
	 * when the CID of an `Atestado` changes.
	 */
	async update(id: string, changes: AbsenceUpdate): Promise<SavedAbsence> {
		const current = this.find(id);
		const employeeName = requireName(changes.employee_name);
		const { endDate, returnDate } = calculateDates(changes.start_date, changes.day_count);

		let medicalCode = '';
		let reason = current.reason;

		if (current.category === CATEGORIES.MedicalCertificate) {
			// migrated rows may have no CID; it stays blank until one is given
			medicalCode = current.medical_code ? requireCode(changes.medical_code) : normalizeCode(changes.medical_code);

			if (medicalCode !== current.medical_code) {
				reason = await this.describe(medicalCode);
			}
		}

		const updated: AbsenceRecord = {
			...current,
			employee_name: employeeName,
			start_date: changes.start_date,
			day_count: changes.day_count,
			end_date: endDate,
			medical_code: medicalCode,
			reason,
		};

		// the record may have been deleted while the lookup ran
		this.find(id);
		this.persist(this.records.map(record => record.id === id ? updated : record));

		storageLog.info({ message: 'update success', id });

		return { record: { ...updated }, return_date: returnDate };
	}

	delete(id: string): AbsenceRecord {
		const removed = this.find(id);

		this.persist(this.records.filter(record => record.id !== id));

		storageLog.info({ message: 'delete success', id });

		return { ...removed };
	}

	get(id: string): AbsenceRecord | undefined {
		const record = this.records.find(r => r.id === id);

		return record && { ...record };
	}

	/**
	 * Copies of all records, most recent start date first. Records without a readable start date go last.
	 */
	list(): AbsenceRecord[] {
		return this.records.map(record => ({ ...record })).sort(byStartDateDesc);
	}

	/**
	 * Records per employee, in `list()` order, with the latest end date of each employee.
	 */
	groupByEmployee(): EmployeeAbsences[] {
		const groups = new Map<string, AbsenceRecord[]>();

		for (const record of this.list()) {
			const group = groups.get(record.employee_name) ?? [];
			group.push(record);
			groups.set(record.employee_name, group);
		}

		return [...groups.entries()]
			.sort(([a], [b]) => a.localeCompare(b, 'pt-BR'))
			.map(([employeeName, records]) => ({
				employee_name: employeeName,
				records,
				count: records.length,
				last_end_date: records.reduce<string | null>(
					(latest, { end_date }) => end_date && (!latest || end_date > latest) ? end_date : latest,
					null,
				),
			}));
	}

	get size(): number {
		return this.records.length;
	}

	private find(id: string): AbsenceRecord {
		const record = this.records.find(r => r.id === id);

		if (!record) {
			throw new NotFoundError(id);
		}

		return record;
	}

	private async deriveReason(
		category: AbsenceCategory,
		code: string | undefined,
		freeReason: string | undefined,
	): Promise<{ medicalCode: string, reason: string }> {
		switch (category) {
			case CATEGORIES.MedicalCertificate: {
				const medicalCode = requireCode(code);
				return { medicalCode, reason: await this.describe(medicalCode) };
			}
			case CATEGORIES.ScheduledLeave: {
				const reason = freeReason?.trim();

				if (!reason) {
					throw new ValidationError('Por favor, preencha o Motivo da Folga.');
				}

				return { medicalCode: '', reason };
			}
			case CATEGORIES.TimeBankCompensation:
				return { medicalCode: '', reason: TIME_BANK_REASON };
			case CATEGORIES.UnexcusedAbsence:
				return { medicalCode: '', reason: UNEXCUSED_REASON };
		}
	}

	private async describe(medicalCode: string): Promise<string> {
		const description = await this.lookup.describe(medicalCode);

		return `${medicalCode} - ${description}`;
	}

	/** Memory changes only after the file is written. */
	private persist(records: AbsenceRecord[]) {
		this.storage.getAbsences().write(records);
		this.records = records;
	}
}

export default Absences;
