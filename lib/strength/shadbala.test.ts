import { describe, it, expect } from 'vitest';
import { buildTestChart } from '../testing/fixtures';
import { SEVEN_PLANETS, type Planet } from '../jyotish/constants';
import {
    NAISARGIKA_BALA,
    REQUIRED_RUPAS,
    calculateShadbala,
    chestaBala,
    compoundRelationship,
    digBala,
    drishtiValue,
    uchchaBala
} from './shadbala';

describe('uchchaBala', () => {
    it('is 60 at the exaltation point and 0 at debilitation', () => {
        expect(uchchaBala('Sun', 10)).toBe(60);
        expect(uchchaBala('Sun', 190)).toBe(0);
        expect(uchchaBala('Saturn', 20)).toBe(0);
    });

    it('falls linearly in between', () => {
        expect(uchchaBala('Moon', 123)).toBeCloseTo(30, 9);
    });
});

describe('drishtiValue', () => {
    it('follows the aspect curve', () => {
        expect(drishtiValue(180, 'Sun')).toBe(60);
        expect(drishtiValue(90, 'Venus')).toBe(45);
        expect(drishtiValue(45, 'Sun')).toBe(7.5);
        expect(drishtiValue(240, 'Sun')).toBe(30);
        expect(drishtiValue(20, 'Saturn')).toBe(0);
    });

    it('adds the special aspects and caps at 60', () => {
        expect(drishtiValue(90, 'Mars')).toBe(60);
        expect(drishtiValue(280, 'Saturn')).toBe(55);
        expect(drishtiValue(120, 'Jupiter')).toBe(60);
        expect(drishtiValue(240, 'Jupiter')).toBe(60);
    });
});

describe('compoundRelationship', () => {
    const chart = buildTestChart();

    it('combines natural and temporal relationships', () => {
        expect(compoundRelationship(chart, 'Sun', 'Moon')).toBe('great friend');
        expect(compoundRelationship(chart, 'Sun', 'Saturn')).toBe('neutral');
        expect(compoundRelationship(chart, 'Sun', 'Mercury')).toBe('friend');
        expect(compoundRelationship(chart, 'Sun', 'Jupiter')).toBe('neutral');
        expect(compoundRelationship(chart, 'Mars', 'Jupiter')).toBe('great friend');
    });
});

describe('digBala', () => {
    const chart = buildTestChart({ longitudes: { Jupiter: 5, Saturn: 5 } });

    it('is full for Jupiter on the ascendant', () => {
        expect(digBala(chart, 'Jupiter')).toBe(60);
    });

    it('is empty for Saturn on the ascendant', () => {
        expect(digBala(chart, 'Saturn')).toBe(0);
    });
});

describe('chestaBala', () => {
    it('rates speed against mean motion', () => {
        const chestaFor = (planet: 'Mars' | 'Jupiter' | 'Saturn', speed: number) => {
            const speeds: Partial<Record<Planet, number>> = {};
            speeds[planet] = speed;
            return chestaBala(buildTestChart({ speeds }), planet);
        };
        expect(chestaFor('Mars', -0.3)).toBe(60);
        expect(chestaFor('Mars', 0.524)).toBe(7.5);
        expect(chestaFor('Mars', 1)).toBe(30);
        expect(chestaFor('Jupiter', 0.1)).toBe(45);
        expect(chestaFor('Saturn', 0.01)).toBe(15);
    });
});

describe('calculateShadbala', () => {
    const shadbala = calculateShadbala(buildTestChart());

    it('scores all seven planets with consistent totals', () => {
        for (const planet of SEVEN_PLANETS) {
            const strength = shadbala[planet];
            expect(strength.naisargika).toBe(NAISARGIKA_BALA[planet]);
            expect(strength.required).toBe(REQUIRED_RUPAS[planet]);
            expect(strength.total).toBeCloseTo(
                strength.sthana + strength.dig + strength.kala + strength.chesta + strength.naisargika + strength.drik,
                9
            );
            expect(strength.rupas).toBeCloseTo(strength.total / 60, 9);
            expect(strength.isStrong).toBe(strength.rupas >= strength.required);
        }
    });

    it('computes the Sun sthana components', () => {
        expect(shadbala.Sun.sthanaDetail.uchcha).toBeCloseTo(58.333, 3);
        expect(shadbala.Sun.sthanaDetail.kendradi).toBe(60);
        expect(shadbala.Sun.sthanaDetail.drekkana).toBe(0);
        expect(shadbala.Sun.sthanaDetail.ojayugma).toBe(30);
        expect(shadbala.Moon.sthanaDetail.ojayugma).toBe(0);
        expect(shadbala.Saturn.sthanaDetail.kendradi).toBe(30);
        expect(shadbala.Saturn.sthanaDetail.drekkana).toBe(15);
    });

    it('computes the kala components for a Delhi noon birth', () => {
        expect(shadbala.Sun.kalaDetail.nathonnatha).toBeCloseTo(58.236, 2);
        expect(shadbala.Moon.kalaDetail.nathonnatha).toBeCloseTo(1.764, 2);
        expect(shadbala.Sun.kalaDetail.tribhaga).toBe(60);
        expect(shadbala.Jupiter.kalaDetail.tribhaga).toBe(60);
        expect(shadbala.Sun.kalaDetail.paksha).toBeCloseTo(40, 9);
        expect(shadbala.Moon.kalaDetail.paksha).toBeCloseTo(40, 9);
        expect(shadbala.Jupiter.kalaDetail.paksha).toBeCloseTo(20, 9);
        // Saturday sunrise, sixth hora of the day
        expect(shadbala.Saturn.kalaDetail.vara).toBe(45);
        expect(shadbala.Mercury.kalaDetail.hora).toBe(60);
    });
});
