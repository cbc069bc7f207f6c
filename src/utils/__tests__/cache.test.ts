import { Duration } from 'luxon';

import { TtlCache } from '../cache';

describe('TtlCache', () => {
    beforeEach(() => {
        jest.useFakeTimers();
        jest.setSystemTime(new Date('2024-01-01T12:00:00Z'));
    });

    afterEach(() => {
        jest.useRealTimers();
    });

    it('deve devolver o valor dentro da janela de validade', () => {
        const cache = new TtlCache<string>(Duration.fromObject({ hours: 1 }));
        cache.set('M54', 'Dor lombar');

        jest.advanceTimersByTime(60 * 60 * 1000 - 1);

        expect(cache.get('M54')).toBe('Dor lombar');
    });

    it('deve expirar o valor após a janela e removê-lo', () => {
        const cache = new TtlCache<string>(Duration.fromObject({ hours: 1 }));
        cache.set('M54', 'Dor lombar');

        jest.advanceTimersByTime(60 * 60 * 1000);

        expect(cache.get('M54')).toBeUndefined();

        // an expired entry is dropped, not just hidden
        jest.setSystemTime(new Date('2024-01-01T12:00:00Z'));
        expect(cache.get('M54')).toBeUndefined();
    });

    it('deve renovar a validade ao gravar de novo', () => {
        const cache = new TtlCache<string>(Duration.fromObject({ minutes: 10 }));
        cache.set('J11', 'Gripe');
        jest.advanceTimersByTime(9 * 60 * 1000);
        cache.set('J11', 'Gripe comum');
        jest.advanceTimersByTime(9 * 60 * 1000);

        expect(cache.get('J11')).toBe('Gripe comum');
    });
});
