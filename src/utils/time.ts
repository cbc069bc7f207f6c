import { DateTime } from 'luxon';

import { InvalidArgumentError } from '../errors';

export const ISO_DATE = 'yyyy-MM-dd';
export const DISPLAY_DATE = 'dd/MM/yyyy';

// formats accepted from operators and from files written by older versions
const INPUT_FORMATS = [ISO_DATE, 'yyyy-MM-dd HH:mm:ss', DISPLAY_DATE];

export interface AbsenceDates {
    endDate: string;
    returnDate: string;
}

const fromIsoDate = (date: string): DateTime => DateTime.fromFormat(date, ISO_DATE, { zone: 'utc' });

/**
 * Returns the last day of the absence and the first day the employee is expected back.
 * A one day absence starts and ends on the same day.
 * @param startDate First day of absence, `yyyy-MM-dd`.
 * @param days Inclusive number of absence days.
 */
export const calculateDates = (startDate: string, days: number): AbsenceDates => {
    if (!Number.isInteger(days) || days < 1) {
        throw new InvalidArgumentError(`Quantidade de dias inválida: ${days}. Informe um número inteiro maior ou igual a 1.`);
    }

    const start = fromIsoDate(startDate);

    if (!start.isValid) {
        throw new InvalidArgumentError(`Data de início inválida: ${startDate}.`);
    }

    const end = start.plus({ days: days - 1 });
    const back = end.plus({ days: 1 });

    if (!back.isValid) {
        throw new InvalidArgumentError(`Quantidade de dias inválida: ${days}. O término ficaria fora do calendário.`);
    }

    return {
        endDate: end.toFormat(ISO_DATE),
        returnDate: back.toFormat(ISO_DATE),
    };
};

/**
 * Normalizes a date to `yyyy-MM-dd`, or null when it can't be read.
 */
export const parseDate = (value: string | null | undefined): string | null => {
    const text = value?.trim();

    if (!text) {
        return null;
    }

    for (const format of INPUT_FORMATS) {
        const parsed = DateTime.fromFormat(text, format, { zone: 'utc' });

        if (parsed.isValid) {
            return parsed.toFormat(ISO_DATE);
        }
    }

    const iso = DateTime.fromISO(text, { zone: 'utc' });

    return iso.isValid ? iso.toFormat(ISO_DATE) : null;
};

export const formatDisplayDate = (date: string | null): string => {
    if (!date) {
        return '';
    }

    const parsed = fromIsoDate(date);

    return parsed.isValid ? parsed.toFormat(DISPLAY_DATE) : '';
};

/**
 * Inclusive day count between two `yyyy-MM-dd` dates, or null when either is missing or the range is reversed.
 */
export const daysBetween = (startDate: string | null, endDate: string | null): number | null => {
    if (!startDate || !endDate) {
        return null;
    }

    const days = fromIsoDate(endDate).diff(fromIsoDate(startDate), 'days').days + 1;

    return Number.isInteger(days) && days >= 1 ? days : null;
};

/**
 * First day back at work for an absence ending on `endDate`.
 */
export const returnDateFor = (endDate: string | null): string | null => {
    if (!endDate) {
        return null;
    }

    const end = fromIsoDate(endDate);

    return end.isValid ? end.plus({ days: 1 }).toFormat(ISO_DATE) : null;
};
