import fs from 'fs';
import path from 'path';

import Absences from './models/absences';
import Roster from './models/roster';
import { Settings } from './settings';
import { cliLog } from './logging';
import { AppError, NotFoundError, ValidationError } from './errors';
import { AbsenceCategory, AbsenceRecord, CATEGORIES } from './types';
import { describeRecord, exportWorkbook, toDisplayRow } from './reports';
import { formatDisplayDate, parseDate } from './utils/time';
import { split } from './utils/string';

export interface Modules {
    absences: Absences;
    roster: Roster;
    settings: Settings;
}

export type CommandOptions = { [key: string]: string };

interface Command {
    description: string;
    example: string;
    fn: (modules: Modules, options: CommandOptions) => Promise<string>;
}

export interface CommandOutput {
    message: string;
    exitCode: number;
}

const UPLOAD_TYPES: { [extension: string]: string } = {
    '.csv': 'text/csv',
    '.xlsx': 'application/vnd.openxmlformats-officedocument.spreadsheetml.sheet',
};

const EMPTY_REGISTER = 'ℹ️ Nenhum registro encontrado.';

/**
 * Reads `--key value` and `--key=value` pairs. A flag without a value is stored as an empty string.
 */
export function parseOptions(args: string[]): CommandOptions {
    const options: CommandOptions = {};

    for (let i = 0; i < args.length; i++) {
        const arg = args[i];

        if (!arg.startsWith('--')) {
            throw new ValidationError(`Argumento inesperado: ${arg}`);
        }

        const [key, inlineValue] = split(arg.slice(2), '=', 1);

        if (inlineValue !== undefined) {
            options[key] = inlineValue;
            continue;
        }

        const next = args[i + 1];

        if (next === undefined || next.startsWith('--')) {
            options[key] = '';
        } else {
            options[key] = next;
            i++;
        }
    }

    return options;
}

const requireStartDate = (value: string | undefined): string => {
    const startDate = parseDate(value);

    if (!startDate) {
        throw new ValidationError('Informe uma data de início válida (--inicio AAAA-MM-DD ou DD/MM/AAAA).');
    }

    return startDate;
};

const readDays = (value: string | undefined, fallback: number): number => value ? Number(value) : fallback;

const requireId = (options: CommandOptions): string => {
    const id = options['id']?.trim();

    if (!id) {
        throw new ValidationError('Informe o identificador do registro (--id).');
    }

    return id;
};

const rosterWarning = async (roster: Roster, name: string): Promise<string[]> => {
    const names = await roster.names();

    if (!names.length || await roster.includes(name)) {
        return [];
    }

    return [`⚠️ ${name} não consta na lista de colaboradores.`];
};

const formatRecordLine = (record: AbsenceRecord): string => {
    const row = toDisplayRow(record);

    return [
        record.id,
        row.Nome_do_Colaborador,
        row.Tipo,
        `${row.Início || '?'} a ${row.Término || '?'}`,
        `${row.Dias} dias`,
        `Retorno: ${row.Retorno || 'N/A'}`,
        row.Motivo,
    ].join(' | ');
};

const addAbsence = (category: AbsenceCategory) => async ({ absences, roster }: Modules, options: CommandOptions): Promise<string> => {
    const { record, return_date } = await absences.add({
        employee_name: options['nome'] ?? '',
        start_date: requireStartDate(options['inicio']),
        day_count: readDays(options['dias'], 1),
        category,
        medical_code: options['cid'],
        free_reason: options['motivo'],
    });

    return [
        `✅ Registro de ${record.category} para ${record.employee_name} adicionado! Retorno: ${formatDisplayDate(return_date)}`,
        `🆔 ${record.id}`,
        ...(await rosterWarning(roster, record.employee_name)),
    ].join('\n');
};

export const COMMANDS: { [key: string]: Command } = {
    'help': {
        description: 'Mostrar esta mensagem de ajuda',
        example: 'ausencias help',
        fn: async () => {
            const helpMessage = Object.entries(COMMANDS)
                .map(([cmd, { description, example }]) => `${cmd} - ${description}\nExemplo: ${example}`)
                .join('\n\n');

            return `Comandos disponíveis:\n\n${helpMessage}`;
        },
    },
    'atestado': {
        description: 'Registrar atestado médico. O motivo é a descrição do CID consultada automaticamente',
        example: 'ausencias atestado --nome "Ana Souza" --inicio 2024-03-04 --dias 3 --cid M54',
        fn: addAbsence(CATEGORIES.MedicalCertificate),
    },
    'banco-horas': {
        description: 'Registrar compensação por banco de horas. Motivo: Compensação de Banco de Horas',
        example: 'ausencias banco-horas --nome "Ana Souza" --inicio 2024-03-04 --dias 1',
        fn: addAbsence(CATEGORIES.TimeBankCompensation),
    },
    'falta': {
        description: 'Registrar falta não justificada. Motivo: Falta',
        example: 'ausencias falta --nome "Ana Souza" --inicio 2024-03-04 --dias 1',
        fn: addAbsence(CATEGORIES.UnexcusedAbsence),
    },
    'folga': {
        description: 'Registrar folga programada com motivo livre (abono, acompanhamento, etc.)',
        example: 'ausencias folga --nome "Ana Souza" --inicio 2024-03-04 --dias 1 --motivo "Abono de feriado"',
        fn: addAbsence(CATEGORIES.ScheduledLeave),
    },
    'editar': {
        description: 'Editar nome, início, dias ou CID de um registro. O tipo não pode ser alterado',
        example: 'ausencias editar --id <id> --inicio 2024-03-05 --dias 2 --cid J11',
        fn: async ({ absences }: Modules, options: CommandOptions) => {
            const id = requireId(options);
            const current = absences.get(id);

            if (!current) {
                throw new NotFoundError(id);
            }

            const startDate = options['inicio'] !== undefined || !current.start_date
                ? requireStartDate(options['inicio'])
                : current.start_date;

            const { record, return_date } = await absences.update(id, {
                employee_name: options['nome'] ?? current.employee_name,
                start_date: startDate,
                day_count: readDays(options['dias'], current.day_count),
                medical_code: options['cid'] ?? current.medical_code,
            });

            return `✅ Registro de ${record.employee_name} atualizado! Retorno: ${formatDisplayDate(return_date)}\n🗓️ ${describeRecord(record)}`;
        },
    },
    'excluir': {
        description: 'Excluir um registro. A exclusão é irreversível',
        example: 'ausencias excluir --id <id>',
        fn: async ({ absences }: Modules, options: CommandOptions) => {
            const removed = absences.delete(requireId(options));

            return `🗑 Registro de ${removed.employee_name} excluído: ${describeRecord(removed)}`;
        },
    },
    'listar': {
        description: 'Tabela completa de registros, início mais recente primeiro',
        example: 'ausencias listar',
        fn: async ({ absences }: Modules) => {
            const records = absences.list();

            if (!records.length) {
                return EMPTY_REGISTER;
            }

            return [`📋 Registros (${records.length})`, ...records.map(formatRecordLine)].join('\n');
        },
    },
    'pessoas': {
        description: 'Registros agrupados por colaborador',
        example: 'ausencias pessoas',
        fn: async ({ absences }: Modules) => {
            const groups = absences.groupByEmployee();

            if (!groups.length) {
                return EMPTY_REGISTER;
            }

            return groups.map(group => [
                `👤 ${group.employee_name} (${group.count} Registros) | Último: ${formatDisplayDate(group.last_end_date) || 'N/A'}`,
                ...group.records.map(record => `   🗓️ ${describeRecord(record)} | 🆔 ${record.id}`),
            ].join('\n')).join('\n\n');
        },
    },
    'exportar': {
        description: 'Exportar a tabela completa para uma planilha XLSX',
        example: 'ausencias exportar --arquivo registros_ausencias.xlsx',
        fn: async ({ absences, settings }: Modules, options: CommandOptions) => {
            const records = absences.list();

            if (!records.length) {
                return EMPTY_REGISTER;
            }

            const file = options['arquivo'] || settings.exportFileName;
            fs.writeFileSync(file, await exportWorkbook(records));

            return `⬇️ Planilha de registros exportada: ${file} (${records.length} registros)`;
        },
    },
    'colaboradores': {
        description: 'Listar os colaboradores da planilha de referência',
        example: 'ausencias colaboradores',
        fn: async ({ roster }: Modules) => {
            const names = await roster.names();

            if (!names.length) {
                return 'ℹ️ Nenhum colaborador disponível. Os nomes podem ser digitados livremente.';
            }

            return [`👥 Colaboradores (${names.length})`, ...names].join('\n');
        },
    },
    'enviar': {
        description: 'Carregar um arquivo .csv ou .xlsx para automação',
        example: 'ausencias enviar --arquivo planilha.xlsx',
        fn: async (_modules: Modules, options: CommandOptions) => {
            const file = options['arquivo']?.trim();

            if (!file) {
                throw new ValidationError('Informe o arquivo (--arquivo).');
            }

            const type = UPLOAD_TYPES[path.extname(file).toLowerCase()];

            if (!type) {
                throw new ValidationError(`Tipo de arquivo não suportado: ${path.basename(file)}. Use .csv ou .xlsx.`);
            }

            if (!fs.existsSync(file)) {
                throw new ValidationError(`Arquivo não encontrado: ${file}`);
            }

            return [
                `✅ Arquivo carregado com sucesso: ${path.basename(file)}`,
                `Tipo: ${type}`,
                'ℹ️ O processamento automático deste arquivo ainda não está disponível.',
            ].join('\n');
        },
    },
};

const collectWarnings = ({ absences, roster }: Modules): string[] =>
    [...new Set([...absences.warnings, ...roster.warnings])].map(warning => `⚠️ ${warning}`);

/**
 * Runs one command. Validation and not-found errors become a message with exit code 1; anything else is rethrown.
 */
export async function runCommand(modules: Modules, argv: string[]): Promise<CommandOutput> {
    const [name = 'help', ...args] = argv;
    const command = Object.hasOwn(COMMANDS, name) ? COMMANDS[name] : undefined;

    if (!command) {
        return {
            message: `⚠️ Comando desconhecido: ${name}. Use \`ausencias help\` para ver os comandos disponíveis.`,
            exitCode: 1,
        };
    }

    let message: string;
    let exitCode = 0;

    try {
        message = await command.fn(modules, parseOptions(args));
    } catch (e) {
        if (!(e instanceof AppError)) {
            throw e;
        }

        cliLog.warn({ message: 'command failed', command: name, code: e.code, error: e.message });
        message = `⚠️ ${e.message}`;
        exitCode = 1;
    }

    return {
        message: [...collectWarnings(modules), message].join('\n'),
        exitCode,
    };
}
