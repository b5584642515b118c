import { describe, it, expect } from 'vitest';
import { calculateHoraPeriods, findHora, horaLord } from './hora';

describe('horaLord', () => {
    it('starts each day with its weekday lord', () => {
        expect(horaLord(0, 0)).toBe('Sun');
        expect(horaLord(1, 0)).toBe('Moon');
        expect(horaLord(6, 0)).toBe('Saturn');
    });

    it('steps through the Chaldean order', () => {
        expect(horaLord(0, 1)).toBe('Venus');
        expect(horaLord(0, 2)).toBe('Mercury');
        expect(horaLord(0, 12)).toBe('Jupiter');
    });

    it('hands the 25th hora to the next weekday lord', () => {
        for (let weekday = 0; weekday < 7; weekday++) {
            expect(horaLord(weekday, 24)).toBe(horaLord((weekday + 1) % 7, 0));
        }
    });
});

describe('calculateHoraPeriods', () => {
    const periods = calculateHoraPeriods(new Date(0), new Date(43200000), new Date(86400000), 0);

    it('splits day and night into twelve contiguous horas each', () => {
        expect(periods).toHaveLength(24);
        expect(periods[0]).toEqual({ number: 1, lord: 'Sun', start: new Date(0), end: new Date(3600000), isDay: true });
        expect(periods[11].end.getTime()).toBe(43200000);
        expect(periods[12]).toMatchObject({ number: 13, start: new Date(43200000), isDay: false });
        expect(periods[23].end.getTime()).toBe(86400000);
        periods.slice(1).forEach((period, i) => {
            expect(period.start.getTime()).toBe(periods[i].end.getTime());
        });
    });

    it('uses unequal hours when day and night differ', () => {
        const winter = calculateHoraPeriods(new Date(0), new Date(36000000), new Date(86400000), 3);
        expect(winter[0].end.getTime()).toBe(3000000);
        expect(winter[12].end.getTime() - winter[12].start.getTime()).toBe(4200000);
    });
});

describe('findHora', () => {
    const periods = calculateHoraPeriods(new Date(0), new Date(43200000), new Date(86400000), 0);

    it('includes the start and excludes the end of a hora', () => {
        expect(findHora(periods, new Date(3600000))?.number).toBe(2);
        expect(findHora(periods, new Date(3599999))?.number).toBe(1);
    });

    it('returns null outside the day', () => {
        expect(findHora(periods, new Date(86400000))).toBeNull();
    });
});
