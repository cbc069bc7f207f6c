import config from 'config';

import { FatalConfigurationError } from './errors';

export interface Settings {
    dataFile: string;
    rosterFile: string;
    rosterCacheTtlSeconds: number;
    lookupModel: string;
    lookupCacheTtlSeconds: number;
    exportFileName: string;
}

export const loadSettings = (): Settings => ({
    dataFile: config.get<string>('storage.dataFile'),
    rosterFile: config.get<string>('roster.file'),
    rosterCacheTtlSeconds: config.get<number>('roster.cacheTtlSeconds'),
    lookupModel: config.get<string>('lookup.model'),
    lookupCacheTtlSeconds: config.get<number>('lookup.cacheTtlSeconds'),
    exportFileName: config.get<string>('export.fileName'),
});

/**
 * The OpenAI key is only read from the environment. Without it nothing starts.
 */
export const requireApiKey = (env: NodeJS.ProcessEnv = process.env): string => {
    const apiKey = env['OPENAI_API_KEY']?.trim();

    if (!apiKey) {
        throw new FatalConfigurationError("ERRO: Chave 'OPENAI_API_KEY' não encontrada. Defina a variável de ambiente antes de iniciar.");
    }

    return apiKey;
};
