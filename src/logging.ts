import { Log } from 'debug-level';

Log.options({ json: true, colors: true });

export const appLog = new Log('app');
export const storageLog = new Log('storage');
export const lookupLog = new Log('lookup');
export const rosterLog = new Log('roster');
export const cliLog = new Log('cli');
