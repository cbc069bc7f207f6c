export const CATEGORIES = {
    MedicalCertificate: 'Atestado',
    TimeBankCompensation: 'Banco de Horas',
    UnexcusedAbsence: 'Falta',
    ScheduledLeave: 'Folga',
} as const;

export type AbsenceCategory = typeof CATEGORIES[keyof typeof CATEGORIES];

const CATEGORY_VALUES: readonly string[] = Object.values(CATEGORIES);

export const isAbsenceCategory = (value: string): value is AbsenceCategory => CATEGORY_VALUES.includes(value);

export const TIME_BANK_REASON = 'Compensação de Banco de Horas';
export const UNEXCUSED_REASON = 'Falta';

export interface AbsenceRecord {
    id: string;
    employee_name: string;
    /** `yyyy-MM-dd`; null only for legacy rows with an unreadable date */
    start_date: string | null;
    day_count: number;
    end_date: string | null;
    /** CID code, only ever set for `Atestado` */
    medical_code: string;
    category: AbsenceCategory;
    reason: string;
}

export interface NewAbsence {
    employee_name: string;
    start_date: string;
    day_count: number;
    category: AbsenceCategory;
    medical_code?: string;
    free_reason?: string;
}

export interface AbsenceUpdate {
    employee_name: string;
    start_date: string;
    day_count: number;
    medical_code: string;
}

export interface SavedAbsence {
    record: AbsenceRecord;
    return_date: string;
}

export interface EmployeeAbsences {
    employee_name: string;
    records: AbsenceRecord[];
    count: number;
    last_end_date: string | null;
}

export interface DescriptionLookup {
    describe(code: string): Promise<string>;
}
