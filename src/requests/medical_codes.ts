import axios from 'axios';
import { Duration } from 'luxon';
import { ChatCompletionRequestMessageRoleEnum, Configuration, OpenAIApi } from 'openai';

import { lookupLog } from '../logging';
import { LookupServiceError, errorMessage } from '../errors';
import { DescriptionLookup } from '../types';
import { TtlCache } from '../utils/cache';
import { normalizeCode } from '../utils/string';

export const NO_CODE_MESSAGE = 'N/A - Nenhum CID fornecido.';
export const INVALID_CODE_MESSAGE = 'Código não encontrado ou inválido.';

const INVALID_MARKERS = ['CÓDIGO INVÁLIDO', 'NÃO ENCONTRADO'];

export const buildPrompt = (code: string): string => [
    `Forneça uma descrição do código CID: ${code} usando APENAS termos simples, não técnicos e concisos.`,
    'A resposta deve ser ideal para um registro administrativo.',
    "Se o código for inválido, responda apenas: 'CÓDIGO INVÁLIDO'.",
].join('\n');

export interface CompletionClient {
    complete(prompt: string): Promise<string>;
}

interface OpenAIErrorBody {
    error?: {
        message?: string;
    };
}

export class OpenAICompletionClient implements CompletionClient {
    private api: OpenAIApi;

    constructor(apiKey: string, private model: string) {
        this.api = new OpenAIApi(new Configuration({ apiKey }));
    }

    /**
     * @throws LookupServiceError when the API rejects the call or can't be reached.
     */
    async complete(prompt: string): Promise<string> {
        try {
            const response = await this.api.createChatCompletion({
                model: this.model,
                messages: [{ role: ChatCompletionRequestMessageRoleEnum.User, content: prompt }],
                temperature: 0,
            });

            return response.data.choices[0]?.message?.content?.trim() ?? '';
        } catch (error) {
            if (axios.isAxiosError<OpenAIErrorBody>(error)) {
                const status = error.response?.status;
                const detail = error.response?.data?.error?.message ?? error.message;

                throw new LookupServiceError(status ? `${status} ${detail}` : detail, status);
            }

            throw error;
        }
    }
}

/**
 * Plain-language descriptions of CID codes. Answers are cached per code; failures come back as text so the record
 * is still saved.
 */
export class MedicalCodeLookup implements DescriptionLookup {
    private cache: TtlCache<string>;

    constructor(private client: CompletionClient, ttl: Duration) {
        this.cache = new TtlCache(ttl);
    }

    async describe(rawCode: string): Promise<string> {
        const code = normalizeCode(rawCode);

        if (!code) {
            return NO_CODE_MESSAGE;
        }

        const cached = this.cache.get(code);

        if (cached !== undefined) {
            lookupLog.debug({ message: 'describe use cache', code });
            return cached;
        }

        lookupLog.info({ message: 'describe start', code });

        try {
            const answer = (await this.client.complete(buildPrompt(code))).trim();
            const upper = answer.toUpperCase();
            const description = INVALID_MARKERS.some(marker => upper.includes(marker)) ? INVALID_CODE_MESSAGE : answer;

            this.cache.set(code, description);

            return description;
        } catch (error) {
            if (error instanceof LookupServiceError) {
                lookupLog.warn({ message: 'describe service error', code, status: error.status, error: error.message });
                return `Erro na API de descrição: Verifique sua chave e cota. Detalhe: ${error.message}`;
            }

            lookupLog.error({ message: 'describe unexpected error', code, error: errorMessage(error) });
            return `Erro inesperado na pesquisa do CID: ${errorMessage(error)}`;
        }
    }
}
