import { describe, it, expect } from 'vitest';
import { buildTestChart } from '../testing/fixtures';
import { ASHTOTTARI_TOTAL_YEARS, calculateAshtottariDasha, isAshtottariApplicable } from './ashtottari';

const BIRTH = new Date('1985-03-10T00:00:00Z');

describe('calculateAshtottariDasha', () => {
    it('spans 108 years in the fixed lord order', () => {
        const dasha = calculateAshtottariDasha(70, BIRTH, true);
        expect(ASHTOTTARI_TOTAL_YEARS).toBe(108);
        expect(dasha.totalYears).toBe(108);
        expect(dasha.periods.map((p) => p.lord)).toEqual([
            'Sun', 'Moon', 'Mars', 'Mercury', 'Saturn', 'Jupiter', 'Rahu', 'Venus'
        ]);
    });

    it('counts the balance across the whole nakshatra group', () => {
        // Ardra, a quarter traversed: 1/16 of the Sun's four-nakshatra group
        const dasha = calculateAshtottariDasha(70, BIRTH, true);
        expect(dasha.balance.lord).toBe('Sun');
        expect(dasha.balance.elapsedYears).toBeCloseTo(0.375, 9);
        expect(dasha.balance.remainingYears).toBeCloseTo(5.625, 9);
    });

    it('puts Ashwini halfway through the Rahu group', () => {
        const dasha = calculateAshtottariDasha(0, BIRTH, false);
        expect(dasha.balance.lord).toBe('Rahu');
        expect(dasha.balance.elapsedYears).toBe(6);
        expect(dasha.applicable).toBe(false);
    });
});

describe('isAshtottariApplicable', () => {
    it('needs Rahu in a kendra or trikona from the lagna lord', () => {
        // Lagna lord Mars in Leo; Rahu in Sagittarius is 5th from it
        expect(isAshtottariApplicable(buildTestChart({ longitudes: { Rahu: 255 } }))).toBe(true);
        // Rahu in Virgo is 2nd from Leo
        expect(isAshtottariApplicable(buildTestChart({ longitudes: { Rahu: 170 } }))).toBe(false);
    });

    it('counts Rahu in the lagna conjunct the lagna lord', () => {
        expect(isAshtottariApplicable(buildTestChart({ ascendant: 5, longitudes: { Mars: 10, Rahu: 20 } }))).toBe(true);
    });

    it('accepts Rahu in the lagna when it is a trikona from the lord', () => {
        // Mars in Sagittarius; Rahu in Aries is 5th from it
        expect(isAshtottariApplicable(buildTestChart({ longitudes: { Rahu: 20, Mars: 250 } }))).toBe(true);
    });

    it('accepts Rahu tenth from the lagna lord', () => {
        // Mars in Cancer; Rahu in Aries is 10th from it
        expect(isAshtottariApplicable(buildTestChart({ longitudes: { Mars: 100, Rahu: 20 } }))).toBe(true);
    });
});
