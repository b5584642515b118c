import { describe, it, expect } from 'vitest';
import { buildTestChart } from '../testing/fixtures';
import { DIVISIONAL_TYPES, calculateAllDivisionalCharts, calculateDivisionalChart, divisionalSign } from './index';

describe('divisionalSign', () => {
    it('rounds 3.333° Aries up into the Taurus navamsa', () => {
        expect(divisionalSign(3.333, 'D9')).toBe(1);
    });

    it('keeps 0° Libra in the Libra navamsa', () => {
        expect(divisionalSign(180, 'D9')).toBe(6);
    });

    it('starts navamsas by element', () => {
        expect(divisionalSign(0, 'D9')).toBe(0);
        expect(divisionalSign(30, 'D9')).toBe(9);
        expect(divisionalSign(90, 'D9')).toBe(3);
        expect(divisionalSign(359.9, 'D9')).toBe(11);
    });

    it('alternates the Hora by sign parity', () => {
        expect(divisionalSign(10, 'D2')).toBe(4);
        expect(divisionalSign(20, 'D2')).toBe(3);
        expect(divisionalSign(40, 'D2')).toBe(3);
        expect(divisionalSign(50, 'D2')).toBe(4);
    });

    it('steps drekkanas by trines', () => {
        expect(divisionalSign(5, 'D3')).toBe(0);
        expect(divisionalSign(15, 'D3')).toBe(4);
        expect(divisionalSign(25, 'D3')).toBe(8);
    });

    it('counts even-sign saptamsas from the 7th', () => {
        expect(divisionalSign(31, 'D7')).toBe(7);
    });

    it('counts even-sign dasamsas from the 9th', () => {
        expect(divisionalSign(31, 'D10')).toBe(9);
    });

    it('uses the unequal Trimsamsa table', () => {
        expect(divisionalSign(3, 'D30')).toBe(0);
        expect(divisionalSign(7, 'D30')).toBe(10);
        expect(divisionalSign(12, 'D30')).toBe(8);
        expect(divisionalSign(33, 'D30')).toBe(1);
        expect(divisionalSign(59, 'D30')).toBe(7);
    });

    it('starts the Vimsamsa of fixed signs in Sagittarius', () => {
        expect(divisionalSign(30, 'D20')).toBe(8);
    });

    it('always returns a sign index', () => {
        for (const type of DIVISIONAL_TYPES) {
            for (let longitude = 0; longitude < 360; longitude += 0.29) {
                const sign = divisionalSign(longitude, type);
                expect(Number.isInteger(sign)).toBe(true);
                expect(sign).toBeGreaterThanOrEqual(0);
                expect(sign).toBeLessThanOrEqual(11);
            }
        }
    });
});

describe('calculateAllDivisionalCharts', () => {
    const chart = buildTestChart();

    it('builds the sixteen vargas in order', () => {
        const charts = calculateAllDivisionalCharts(chart);
        expect(charts.map((c) => c.type)).toEqual([...DIVISIONAL_TYPES]);
        for (const varga of charts) {
            expect(varga.placements).toHaveLength(9);
        }
    });

    it('matches the natal signs in the Rasi chart', () => {
        const rasi = calculateDivisionalChart(chart, 'D1');
        expect(rasi.name).toBe('Rasi');
        expect(rasi.ascendantSign).toBe(chart.ascendant.sign);
        expect(rasi.placements.find((p) => p.planet === 'Saturn')?.sign).toBe(10);
    });

    it('places the navamsa of the exalted Sun in Leo', () => {
        const navamsa = calculateDivisionalChart(chart, 'D9');
        expect(navamsa.placements.find((p) => p.planet === 'Sun')?.sign).toBe(4);
    });
});
