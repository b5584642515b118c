import { describe, it, expect } from 'vitest';
import { buildTestChart } from '../testing/fixtures';
import { SEVEN_PLANETS } from '../jyotish/constants';
import {
    ASHTAKAVARGA_TABLES,
    AshtakavargaTablesZ,
    SARVA_TOTAL,
    bhinnashtakavarga,
    calculateAshtakavarga,
    classifySignBindus
} from './ashtakavarga';

const ALL_IN_ARIES = buildTestChart({
    longitudes: { Sun: 10, Moon: 10, Mars: 10, Mercury: 10, Jupiter: 10, Venus: 10, Saturn: 10 }
});

describe('bhinnashtakavarga', () => {
    it('counts every contributor that marks a sign', () => {
        const sun = bhinnashtakavarga(ALL_IN_ARIES, 'Sun');
        expect(sun[0]).toBe(3);
        expect(sun[10]).toBe(7);
        expect(bhinnashtakavarga(ALL_IN_ARIES, 'Moon')[0]).toBe(3);
    });

    it('keeps each planet total independent of placements', () => {
        const expected = { Sun: 48, Moon: 49, Mars: 39, Mercury: 54, Jupiter: 56, Venus: 52, Saturn: 39 };
        for (const chart of [ALL_IN_ARIES, buildTestChart()]) {
            for (const planet of SEVEN_PLANETS) {
                const total = bhinnashtakavarga(chart, planet).reduce((a, b) => a + b, 0);
                expect(total).toBe(expected[planet]);
            }
        }
    });
});

describe('calculateAshtakavarga', () => {
    it('sums the bhinna tables into a sarva total of 337', () => {
        const data = calculateAshtakavarga(buildTestChart());
        expect(data.total).toBe(SARVA_TOTAL);
        expect(data.sarva).toHaveLength(12);
        expect(data.sarva[3]).toBe(SEVEN_PLANETS.reduce((sum, planet) => sum + data.bhinna[planet][3], 0));
        expect(data.signStrength).toEqual(data.sarva.map(classifySignBindus));
    });

    it('stays at 337 for charts sampled around the zodiac', () => {
        for (let step = 0; step < 24; step++) {
            const base = step * 15;
            const chart = buildTestChart({
                ascendant: base * 7,
                longitudes: {
                    Sun: base, Moon: base * 13, Mars: base * 5, Mercury: base + 20,
                    Jupiter: base * 3, Venus: base + 40, Saturn: base * 11
                }
            });
            expect(calculateAshtakavarga(chart).total).toBe(337);
        }
    });
});

describe('classifySignBindus', () => {
    it('grades sign totals', () => {
        expect(classifySignBindus(29)).toBe('strong');
        expect(classifySignBindus(28)).toBe('moderate');
        expect(classifySignBindus(25)).toBe('moderate');
        expect(classifySignBindus(24)).toBe('weak');
    });
});

describe('AshtakavargaTablesZ', () => {
    it('rejects a house outside 1-12', () => {
        const broken = { ...ASHTAKAVARGA_TABLES, Sun: { ...ASHTAKAVARGA_TABLES.Sun, Lagna: [13] } };
        expect(AshtakavargaTablesZ.safeParse(broken).success).toBe(false);
    });
});
