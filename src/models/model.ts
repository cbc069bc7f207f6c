import Storage from '../storage';

abstract class Model {
	/** Non-fatal problems met while reading, shown to the operator */
	warnings: string[] = [];

	constructor(public storage: Storage) {}

	protected addWarning(message: string) {
		this.warnings.push(message);
	}
}

export default Model;
