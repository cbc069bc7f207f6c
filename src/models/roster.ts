import { Duration } from 'luxon';

import Model from './model';
import Storage from '../storage';
import { rosterLog } from '../logging';
import { errorMessage } from '../errors';
import { TtlCache } from '../utils/cache';

const CACHE_KEY = 'names';

/**
 * Collaborator names from the roster workbook. Any read problem degrades to an empty list so names can still be
 * typed freely.
 */
class Roster extends Model {
	private cache: TtlCache<string[]>;

	constructor(storage: Storage, ttl: Duration) {
		super(storage);
		this.cache = new TtlCache(ttl);
	}

	async names(): Promise<string[]> {
		const cached = this.cache.get(CACHE_KEY);

		if (cached) {
			rosterLog.debug({ message: 'names use cache' });
			return [...cached];
		}

		const names = await this.read();
		this.cache.set(CACHE_KEY, names);

		return [...names];
	}

	async includes(name: string): Promise<boolean> {
		const names = await this.names();

		return names.includes(name.trim());
	}

	private async read(): Promise<string[]> {
		const adapter = this.storage.getRoster();

		if (!adapter.exists()) {
			rosterLog.warn({ message: 'roster file not found', file: adapter.file });
			this.addWarning(`AVISO: O arquivo de colaboradores '${adapter.file}' não foi encontrado. Adicione este arquivo para habilitar a busca de nomes.`);
			return [];
		}

		try {
			return await adapter.read();
		} catch (error) {
			rosterLog.error({ message: 'roster read error', file: adapter.file, error: errorMessage(error) });
			this.addWarning(`ERRO ao ler o arquivo de colaboradores XLSX: ${errorMessage(error)}. Verifique o formato do arquivo.`);
			return [];
		}
	}
}

export default Roster;
