import { describe, it, expect } from 'vitest';
import { normalize360 } from '../astronomy/math';
import { PLANETS } from '../jyotish/constants';
import { DEFAULT_SETTINGS, KP_SETTINGS } from '../settings';
import { buildNatalChart, describeLongitude, type GeoLocation } from './index';

// 2000-01-01 12:00 IST
const INSTANT = new Date('2000-01-01T06:30:00Z');
const DELHI: GeoLocation = { latitude: 28.6139, longitude: 77.209, timezone: 'Asia/Kolkata' };

describe('buildNatalChart', () => {
    const chart = buildNatalChart(INSTANT, DELHI, DEFAULT_SETTINGS);

    it('places the Sun in Sagittarius', () => {
        expect(chart.planets.Sun.sign).toBe(8);
        // 16°17′
        expect(Math.abs(chart.planets.Sun.degree - 16.282)).toBeLessThan(1 / 60);
        expect(chart.planets.Sun.dignity).toBe('friendly');
    });

    it('rises Pisces', () => {
        expect(chart.ascendant.sign).toBe(11);
        expect(Math.abs(chart.ascendant.degree - 13.19)).toBeLessThan(1 / 60);
    });

    it('puts the Sun in the 10th equal house', () => {
        expect(chart.houses.system).toBe('Equal');
        expect(chart.houses.cusps[0]).toBe(chart.ascendant.longitude);
        expect(chart.planets.Sun.house).toBe(10);
    });

    it('keeps every house and pada in range', () => {
        for (const planet of PLANETS) {
            const position = chart.planets[planet];
            expect(position.house).toBeGreaterThanOrEqual(1);
            expect(position.house).toBeLessThanOrEqual(12);
            expect(position.nakshatra.pada).toBeGreaterThanOrEqual(1);
            expect(position.nakshatra.pada).toBeLessThanOrEqual(4);
            expect(position.retrograde).toBe(position.speed < 0);
        }
    });

    it('keeps Ketu opposite Rahu after the sidereal shift', () => {
        expect(normalize360(chart.planets.Ketu.longitude - chart.planets.Rahu.longitude)).toBeCloseTo(180, 9);
    });

    it('counts whole-sign houses from the lagna sign', () => {
        const wholeSign = buildNatalChart(INSTANT, DELHI, { ...DEFAULT_SETTINGS, houseSystem: 'WholeSign' });
        expect(wholeSign.houses.cusps[0]).toBe(330);
        expect(wholeSign.planets.Sun.house).toBe(10);
    });

    it('applies the KP preset', () => {
        const kp = buildNatalChart(INSTANT, DELHI, KP_SETTINGS);
        expect(kp.houses.system).toBe('Placidus');
        expect(kp.ayanamsa).toBeLessThan(chart.ayanamsa);
        expect(kp.ascendant.sign).toBe(11);
    });
});

describe('describeLongitude', () => {
    it('assigns a longitude within tolerance of a cusp to the later sign', () => {
        const position = describeLongitude(29.9999999999);
        expect(position.sign).toBe(1);
        expect(position.degree).toBe(0);
    });

    it('keeps the last degree of Pisces in Pisces', () => {
        const position = describeLongitude(359.5);
        expect(position.sign).toBe(11);
        expect(position.degree).toBeCloseTo(29.5, 9);
    });
});
