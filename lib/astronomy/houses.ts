/**
 * House Calculations
 *
 * Features:
 * - Local sidereal time from Greenwich apparent sidereal time
 * - Ascendant / Midheaven closed forms
 * - Cusps for Equal, Whole Sign, Placidus, Koch, Sripati and Bhava Chalita
 * - House lookup with inclusive-lower / exclusive-upper cusp intervals
 */

import { UnsupportedConfiguration } from '../errors';
import type { HouseSystem } from '../settings';
import { greenwichSiderealDegrees } from './engine';
import { clamp, degrees, forwardArc, julianCenturies, normalize360, radians } from './math';

const POLAR_LATITUDE = 66.5;

export interface Angles {
    ramc: number;        // local sidereal time, degrees
    obliquity: number;
    ascendant: number;   // tropical
    midheaven: number;   // tropical
}

export interface HouseCusps {
    system: HouseSystem;
    /** Requested system differs from `system` when a polar fallback applied. */
    requested: HouseSystem;
    /** Start of each house, tropical or sidereal depending on the caller. */
    cusps: number[];
}

export function meanObliquity(date: Date): number {
    const T = julianCenturies(date);
    return 23.43929111 - (46.815 * T + 0.00059 * T * T - 0.001813 * T * T * T) / 3600;
}

export function localSiderealDegrees(date: Date, longitude: number): number {
    return normalize360(greenwichSiderealDegrees(date) + longitude);
}

/** Ecliptic longitude rising on the eastern horizon for a given RAMC. */
export function ascendantFor(ramc: number, latitude: number, obliquity: number): number {
    const theta = radians(ramc);
    const eps = radians(obliquity);
    const phi = radians(latitude);

    const y = Math.cos(theta);
    const x = -(Math.sin(theta) * Math.cos(eps) + Math.tan(phi) * Math.sin(eps));
    return normalize360(degrees(Math.atan2(y, x)));
}

export function midheavenFor(ramc: number, obliquity: number): number {
    const theta = radians(ramc);
    return normalize360(degrees(Math.atan2(Math.sin(theta), Math.cos(theta) * Math.cos(radians(obliquity)))));
}

export function calculateAngles(date: Date, latitude: number, longitude: number): Angles {
    const ramc = localSiderealDegrees(date, longitude);
    const obliquity = meanObliquity(date);
    return {
        ramc,
        obliquity,
        ascendant: ascendantFor(ramc, latitude, obliquity),
        midheaven: midheavenFor(ramc, obliquity)
    };
}

// ---- Cusp systems ----

function equalCusps(start: number): number[] {
    return Array.from({ length: 12 }, (_, i) => normalize360(start + 30 * i));
}

/** Ecliptic point whose right ascension is `ra`. */
function eclipticFromRightAscension(ra: number, obliquity: number): number {
    const alpha = radians(ra);
    return normalize360(degrees(Math.atan2(Math.sin(alpha), Math.cos(alpha) * Math.cos(radians(obliquity)))));
}

function ascensionalDifference(longitude: number, latitude: number, obliquity: number): number {
    const declination = Math.asin(Math.sin(radians(obliquity)) * Math.sin(radians(longitude)));
    const value = Math.tan(radians(latitude)) * Math.tan(declination);
    return degrees(Math.asin(clamp(value, -1, 1)));
}

/**
 * Placidus cusp by semi-arc trisection. `offset` and `adFactor` place the
 * cusp's right ascension at RAMC + offset + adFactor * AD.
 */
function placidusCusp(angles: Angles, latitude: number, offset: number, adFactor: number): number {
    let longitude = eclipticFromRightAscension(angles.ramc + offset, angles.obliquity);
    for (let i = 0; i < 50; i++) {
        const ad = ascensionalDifference(longitude, latitude, angles.obliquity);
        const next = eclipticFromRightAscension(angles.ramc + offset + adFactor * ad, angles.obliquity);
        if (Math.abs(normalize360(next - longitude + 180) - 180) < 1e-7) {
            return next;
        }
        longitude = next;
    }
    return longitude;
}

function quadrantCusps(angles: Angles, c11: number, c12: number, c2: number, c3: number): number[] {
    const c1 = angles.ascendant;
    const c10 = angles.midheaven;
    const firstSix = [c1, c2, c3, normalize360(c10 + 180), normalize360(c11 + 180), normalize360(c12 + 180)];
    return [...firstSix, ...firstSix.map((c) => normalize360(c + 180))];
}

function placidusCusps(angles: Angles, latitude: number): number[] {
    return quadrantCusps(
        angles,
        placidusCusp(angles, latitude, 30, 1 / 3),
        placidusCusp(angles, latitude, 60, 2 / 3),
        placidusCusp(angles, latitude, 120, 2 / 3),
        placidusCusp(angles, latitude, 150, 1 / 3)
    );
}

function kochCusps(angles: Angles, latitude: number): number[] {
    // Ascensional difference of the MC degree, split in thirds
    const ad = ascensionalDifference(angles.midheaven, latitude, angles.obliquity);
    const third = ad / 3;
    const asc = (ramc: number) => ascendantFor(ramc, latitude, angles.obliquity);

    return quadrantCusps(
        angles,
        asc(angles.ramc - 60 - 2 * third),
        asc(angles.ramc - 30 - third),
        asc(angles.ramc + 30 + third),
        asc(angles.ramc + 60 + 2 * third)
    );
}

/** Porphyry trisection: bhava madhyas for Sripati. */
function porphyryPoints(angles: Angles): number[] {
    const points: number[] = new Array<number>(12).fill(0);
    const quadrants: Array<[number, number, number]> = [
        [0, angles.ascendant, normalize360(angles.midheaven + 180)],
        [3, normalize360(angles.midheaven + 180), normalize360(angles.ascendant + 180)],
        [6, normalize360(angles.ascendant + 180), angles.midheaven],
        [9, angles.midheaven, angles.ascendant]
    ];
    for (const [start, from, to] of quadrants) {
        const arc = forwardArc(from, to);
        for (let k = 0; k < 3; k++) {
            points[start + k] = normalize360(from + (arc * k) / 3);
        }
    }
    return points;
}

function sripatiCusps(angles: Angles): number[] {
    const madhyas = porphyryPoints(angles);
    return madhyas.map((madhya, i) => {
        const previous = madhyas[(i + 11) % 12];
        return normalize360(previous + forwardArc(previous, madhya) / 2);
    });
}

/**
 * Tropical cusps for the requested system. Placidus and Koch are undefined
 * inside the polar circles and fall back to Equal.
 */
export function calculateCusps(system: HouseSystem, angles: Angles, latitude: number): HouseCusps {
    if ((system === 'Placidus' || system === 'Koch') && Math.abs(latitude) > POLAR_LATITUDE) {
        console.warn(`[Houses] ${system} is undefined at latitude ${latitude}, using Equal houses`);
        return { system: 'Equal', requested: system, cusps: equalCusps(angles.ascendant) };
    }

    switch (system) {
        case 'Equal':
            return { system, requested: system, cusps: equalCusps(angles.ascendant) };
        case 'WholeSign':
            return { system, requested: system, cusps: equalCusps(Math.floor(angles.ascendant / 30) * 30) };
        case 'BhavaChalita':
            return { system, requested: system, cusps: equalCusps(angles.ascendant - 15) };
        case 'Placidus':
            return { system, requested: system, cusps: placidusCusps(angles, latitude) };
        case 'Koch':
            return { system, requested: system, cusps: kochCusps(angles, latitude) };
        case 'Sripati':
            return { system, requested: system, cusps: sripatiCusps(angles) };
        default:
            throw new UnsupportedConfiguration('houseSystem', system);
    }
}

/** Shift every cusp by the ayanamsa. Whole-sign cusps are re-anchored to sidereal sign starts. */
export function toSiderealCusps(houses: HouseCusps, ayanamsa: number, siderealAscendant: number): HouseCusps {
    if (houses.system === 'WholeSign') {
        return { ...houses, cusps: equalCusps(Math.floor(siderealAscendant / 30) * 30) };
    }
    return { ...houses, cusps: houses.cusps.map((cusp) => normalize360(cusp - ayanamsa)) };
}

/**
 * House (1-12) containing `longitude`. Whole sign counts signs from the
 * ascendant; every other system uses [cusp_i, cusp_i+1) intervals.
 */
export function houseOf(longitude: number, houses: HouseCusps): number {
    const { cusps } = houses;

    if (houses.system === 'WholeSign') {
        const ascSign = Math.floor(cusps[0] / 30);
        const sign = Math.floor(normalize360(longitude) / 30);
        return ((sign - ascSign + 12) % 12) + 1;
    }

    for (let i = 0; i < 12; i++) {
        const start = cusps[i];
        const end = cusps[(i + 1) % 12];
        const span = forwardArc(start, end);
        const offset = forwardArc(start, longitude);
        if (offset < span) {
            return i + 1;
        }
    }

    // Unreachable for twelve cusps covering the circle
    return 12;
}
