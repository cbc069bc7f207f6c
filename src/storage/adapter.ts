import fs from 'fs';

abstract class Adapter {
	constructor(public readonly file: string) {}

	async init(): Promise<void> {}

	exists(): boolean {
		return fs.existsSync(this.file);
	}
}

export default Adapter;
