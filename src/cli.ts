#!/usr/bin/env node
import { Duration } from 'luxon';

import Storage from './storage';
import Absences from './models/absences';
import Roster from './models/roster';
import { Modules, runCommand } from './commands';
import { MedicalCodeLookup, OpenAICompletionClient } from './requests/medical_codes';
import { Settings, loadSettings, requireApiKey } from './settings';
import { appLog } from './logging';
import { errorMessage } from './errors';

async function initModules(settings: Settings, apiKey: string): Promise<Modules> {
    const storage = new Storage({ dataFile: settings.dataFile, rosterFile: settings.rosterFile });
    await storage.init();

    const lookup = new MedicalCodeLookup(
        new OpenAICompletionClient(apiKey, settings.lookupModel),
        Duration.fromObject({ seconds: settings.lookupCacheTtlSeconds }),
    );

    const absences = new Absences(storage, lookup);
    absences.load();

    return {
        absences,
        roster: new Roster(storage, Duration.fromObject({ seconds: settings.rosterCacheTtlSeconds })),
        settings,
    };
}

/* Entry point */
async function main(argv: string[]): Promise<number> {
    // without the key no command is accepted
    const apiKey = requireApiKey();
    const settings = loadSettings();
    const modules = await initModules(settings, apiKey);

    appLog.debug({ message: 'modules ready', dataFile: settings.dataFile, records: modules.absences.size });

    const { message, exitCode } = await runCommand(modules, argv);

    if (exitCode === 0) {
        console.log(message);
    } else {
        console.error(message);
    }

    return exitCode;
}

main(process.argv.slice(2))
    .then(exitCode => {
        process.exitCode = exitCode;
    })
    .catch(reason => {
        appLog.fatal(reason);
        console.error(errorMessage(reason));
        process.exit(1);
    });
