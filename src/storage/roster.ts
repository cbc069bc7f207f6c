import ExcelJS from 'exceljs';

import Adapter from './adapter';
import { rosterLog } from '../logging';
import { PersistenceReadError, errorMessage } from '../errors';

export const NAME_COLUMN = 'Nome_do_Colaborador';

class Roster extends Adapter {
	/**
	 * Unique collaborator names from the `Nome_do_Colaborador` column of the first worksheet, sorted.
	 * @throws PersistenceReadError when the workbook can't be opened or lacks the column.
	 */
	async read(): Promise<string[]> {
		const workbook = new ExcelJS.Workbook();

		try {
			await workbook.xlsx.readFile(this.file);
		} catch (error) {
			throw new PersistenceReadError(this.file, errorMessage(error));
		}

		const sheet = workbook.worksheets[0];

		if (!sheet) {
			throw new PersistenceReadError(this.file, 'planilha vazia');
		}

		let nameColumn = 0;

		sheet.getRow(1).eachCell((cell, column) => {
			if (!nameColumn && cell.text.trim() === NAME_COLUMN) {
				nameColumn = column;
			}
		});

		if (!nameColumn) {
			throw new PersistenceReadError(this.file, `o arquivo deve conter uma coluna chamada '${NAME_COLUMN}'`);
		}

		const names = new Set<string>();

		sheet.getColumn(nameColumn).eachCell((cell, row) => {
			const name = cell.text.trim();

			if (row > 1 && name) {
				names.add(name);
			}
		});

		rosterLog.debug({ message: 'read success', file: this.file, count: names.size });

		return [...names].sort((a, b) => a.localeCompare(b, 'pt-BR'));
	}
}

export default Roster;
