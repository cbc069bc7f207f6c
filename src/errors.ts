export type ErrorCode =
    | 'VALIDATION_ERROR'
    | 'INVALID_ARGUMENT'
    | 'NOT_FOUND'
    | 'PERSISTENCE_READ_ERROR'
    | 'LOOKUP_SERVICE_ERROR'
    | 'FATAL_CONFIGURATION_ERROR';

export class AppError extends Error {
    constructor(public readonly code: ErrorCode, message: string) {
        super(message);
        this.name = new.target.name;
    }
}

/** Missing required input; nothing is written. */
export class ValidationError extends AppError {
    constructor(message: string) {
        super('VALIDATION_ERROR', message);
    }
}

export class InvalidArgumentError extends AppError {
    constructor(message: string) {
        super('INVALID_ARGUMENT', message);
    }
}

export class NotFoundError extends AppError {
    constructor(public readonly id: string) {
        super('NOT_FOUND', `Registro ${id} não encontrado.`);
    }
}

export class PersistenceReadError extends AppError {
    constructor(public readonly file: string, detail: string) {
        super('PERSISTENCE_READ_ERROR', `Erro ao ler o arquivo de dados ${file} (${detail}).`);
    }
}

export class LookupServiceError extends AppError {
    constructor(detail: string, public readonly status?: number) {
        super('LOOKUP_SERVICE_ERROR', detail);
    }
}

export class FatalConfigurationError extends AppError {
    constructor(message: string) {
        super('FATAL_CONFIGURATION_ERROR', message);
    }
}

export function errorMessage(error: unknown): string {
    return error instanceof Error ? error.message : String(error);
}
