import Absences from './absences';
import Roster from './roster';
import Adapter from './adapter';

export interface StorageOptions {
	dataFile: string;
	rosterFile: string;
}

class Storage {
	absences: Absences;
	roster: Roster;

	constructor(options: StorageOptions) {
		this.absences = new Absences(options.dataFile);
		this.roster = new Roster(options.rosterFile);
	}

	async init() {
		const adapters: Adapter[] = [this.absences, this.roster];

		for (const adapter of adapters) {
			await adapter.init();
		}
	}

	getAbsences(): Absences {
		return this.absences;
	}

	getRoster(): Roster {
		return this.roster;
	}
}

export default Storage;
