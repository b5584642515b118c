import * as Astronomy from "astronomy-engine";
import { DateOutOfEphemerisRange, InvariantViolation } from "../errors";
import { NAKSHATRA_SPAN, mapPlanets, type Planet } from "../jyotish/constants";
import { DEFAULT_ENGINE_CONFIG, type AyanamsaSystem, type EngineConfig, type NodeMode } from "../settings";
import { toSidereal } from "./ayanamsa";
import { julianCenturies, normalize360, radians, segmentIndex, signedDelta } from "./math";

// Astronomy Engine is Tropical, geocentric, true ecliptic of date.
// Rahu/Ketu come from the lunar node series below.

const HALF_DAY_MS = 12 * 60 * 60 * 1000;

const BODY_MAP: Record<Exclude<Planet, 'Rahu' | 'Ketu'>, Astronomy.Body> = {
    Sun: Astronomy.Body.Sun,
    Moon: Astronomy.Body.Moon,
    Mars: Astronomy.Body.Mars,
    Mercury: Astronomy.Body.Mercury,
    Jupiter: Astronomy.Body.Jupiter,
    Venus: Astronomy.Body.Venus,
    Saturn: Astronomy.Body.Saturn
};

export interface RawPosition {
    longitude: number;  // tropical, degrees
    speed: number;      // degrees per day, negative when retrograde
}

export type RawPositions = Record<Planet, RawPosition>;

// ----------------------------------------------------
// Ephemeris adapter
// ----------------------------------------------------

export function assertInEphemerisRange(date: Date, config: EngineConfig = DEFAULT_ENGINE_CONFIG): void {
    const { minYear, maxYear } = config.ephemerisRange;
    const year = date.getUTCFullYear();
    if (!Number.isFinite(date.getTime()) || year < minYear || year > maxYear) {
        throw new DateOutOfEphemerisRange(date, minYear, maxYear);
    }
}

function bodyLongitude(body: Astronomy.Body, date: Date): number {
    const vector = Astronomy.GeoVector(body, date, true);
    return Astronomy.Ecliptic(vector).elon;
}

/** Longitude of the Moon's ascending node (Rahu), Meeus ch. 47. */
export function lunarNodeLongitude(date: Date, mode: NodeMode): number {
    const T = julianCenturies(date);
    const meanNode = 125.0445479
        - 1934.1362891 * T
        + 0.0020754 * T * T
        + (T * T * T) / 467441
        - (T * T * T * T) / 60616000;

    if (mode === 'Mean') {
        return normalize360(meanNode);
    }

    const D = radians(297.8501921 + 445267.1114034 * T - 0.0018819 * T * T);
    const M = radians(357.5291092 + 35999.0502909 * T - 0.0001536 * T * T);
    const Mp = radians(134.9633964 + 477198.8675055 * T + 0.0087414 * T * T);
    const F = radians(93.272095 + 483202.0175233 * T - 0.0036539 * T * T);

    const correction = -1.4979 * Math.sin(2 * (D - F))
        - 0.15 * Math.sin(M)
        - 0.1226 * Math.sin(2 * D)
        + 0.1176 * Math.sin(2 * F)
        - 0.0801 * Math.sin(2 * (F - Mp));

    return normalize360(meanNode + correction);
}

function tropicalLongitudeAt(planet: Planet, date: Date, nodeMode: NodeMode): number {
    switch (planet) {
        case 'Rahu':
            return lunarNodeLongitude(date, nodeMode);
        case 'Ketu':
            return normalize360(lunarNodeLongitude(date, nodeMode) + 180);
        default:
            return bodyLongitude(BODY_MAP[planet], date);
    }
}

/**
 * Tropical longitude and daily motion of the nine grahas.
 * Motion is the central difference over +/- 12 hours.
 */
export function getPositions(
    date: Date,
    nodeMode: NodeMode,
    config: EngineConfig = DEFAULT_ENGINE_CONFIG
): RawPositions {
    assertInEphemerisRange(date, config);

    const before = new Date(date.getTime() - HALF_DAY_MS);
    const after = new Date(date.getTime() + HALF_DAY_MS);

    return mapPlanets((planet) => ({
        longitude: tropicalLongitudeAt(planet, date, nodeMode),
        speed: signedDelta(
            tropicalLongitudeAt(planet, before, nodeMode),
            tropicalLongitudeAt(planet, after, nodeMode)
        )
    }));
}

export function getSiderealLongitude(
    planet: Planet,
    date: Date,
    ayanamsa: AyanamsaSystem,
    nodeMode: NodeMode = 'Mean'
): number {
    return toSidereal(tropicalLongitudeAt(planet, date, nodeMode), date, ayanamsa);
}

// ----------------------------------------------------
// Core Calculations
// ----------------------------------------------------

export function getTithi(date: Date) {
    // MoonPhase returns the phase angle (0-360) where:
    // 0 = New Moon, 90 = First Quarter, 180 = Full Moon, 270 = Last Quarter
    const phaseAngle = Astronomy.MoonPhase(date);

    // Each tithi spans 12 degrees; 1-15 Shukla paksha, 16-30 Krishna paksha
    const tithiIndex = Math.min(segmentIndex(phaseAngle, 12), 29) + 1;
    const fraction = (phaseAngle % 12) / 12;

    return {
        index: tithiIndex,
        fraction: fraction,
        phaseAngle: phaseAngle
    };
}

export function getNakshatra(date: Date, ayanamsa: AyanamsaSystem = 'Lahiri') {
    const siderealLon = getSiderealLongitude('Moon', date, ayanamsa);

    const index = Math.min(segmentIndex(siderealLon, NAKSHATRA_SPAN), 26) + 1;
    const fraction = (siderealLon % NAKSHATRA_SPAN) / NAKSHATRA_SPAN;

    return {
        index: index,
        fraction: fraction,
        longitude: siderealLon
    };
}

/** Nitya yoga: sum of sidereal Sun and Moon in 13°20' steps. */
export function getYoga(date: Date, ayanamsa: AyanamsaSystem = 'Lahiri') {
    const sum = normalize360(
        getSiderealLongitude('Sun', date, ayanamsa) + getSiderealLongitude('Moon', date, ayanamsa)
    );

    const index = Math.min(segmentIndex(sum, NAKSHATRA_SPAN), 26) + 1;
    const fraction = (sum % NAKSHATRA_SPAN) / NAKSHATRA_SPAN;

    return {
        index: index,
        fraction: fraction,
        longitude: sum
    };
}

// ----------------------------------------------------
// Solvers (Next Event)
// ----------------------------------------------------

export interface ChangeSearchOptions {
    stepMinutes?: number;
    maxSteps?: number;
    precisionMs?: number;
}

/**
 * Coarse forward scan for the step where `indexAt` changes, then a binary
 * search inside that step down to `precisionMs`.
 */
export function findNextChange(
    startDate: Date,
    indexAt: (date: Date) => number,
    options: ChangeSearchOptions = {}
): Date {
    const stepMs = (options.stepMinutes ?? 60) * 60000;
    const maxSteps = options.maxSteps ?? 48;   // 2 days at the default step
    const precisionMs = options.precisionMs ?? 5000;
    const startIndex = indexAt(startDate);

    let t1 = startDate.getTime();
    for (let i = 0; i < maxSteps; i++) {
        t1 += stepMs;
        if (indexAt(new Date(t1)) !== startIndex) {
            return binarySearchChange(t1 - stepMs, t1, startIndex, indexAt, precisionMs);
        }
    }

    return new Date(t1);
}

function binarySearchChange(
    lowMs: number,
    highMs: number,
    originalIndex: number,
    indexAt: (date: Date) => number,
    precisionMs: number
): Date {
    let low = lowMs;
    let high = highMs;

    while ((high - low) > precisionMs) {
        const mid = (low + high) / 2;
        if (indexAt(new Date(mid)) === originalIndex) {
            // Change is after mid
            low = mid;
        } else {
            high = mid;
        }
    }
    return new Date(Math.round(high));
}

export function getNextTithiChange(startDate: Date): Date {
    return findNextChange(startDate, (date) => getTithi(date).index);
}

export function getNextNakshatraChange(startDate: Date, ayanamsa: AyanamsaSystem = 'Lahiri'): Date {
    return findNextChange(startDate, (date) => getNakshatra(date, ayanamsa).index);
}

export function getNextYogaChange(startDate: Date, ayanamsa: AyanamsaSystem = 'Lahiri'): Date {
    return findNextChange(startDate, (date) => getYoga(date, ayanamsa).index);
}

/** Next instant after `startDate` when the Moon-Sun elongation reaches `phaseAngle` (0 new, 180 full). */
export function searchMoonPhase(phaseAngle: number, startDate: Date): Date {
    // A synodic month is under 30 days, so a miss means the search itself failed
    const moon = Astronomy.SearchMoonPhase(phaseAngle, startDate, 30);
    if (!moon) {
        throw new InvariantViolation(`No Moon phase ${phaseAngle} within 30 days of ${startDate.toISOString()}`);
    }
    return moon.date;
}

export function getMoonIllumination(date: Date): number {
    return Astronomy.Illumination(Astronomy.Body.Moon, date).phase_fraction;
}

// ----------------------------------------------------
// Rise / Set
// ----------------------------------------------------

export type RiseSet = 'rise' | 'set';

/** First sunrise or sunset after `start` within `limitDays`, or null (polar day/night). */
export function searchSunEvent(
    kind: RiseSet,
    start: Date,
    latitude: number,
    longitude: number,
    limitDays = 1.5
): Date | null {
    const observer = new Astronomy.Observer(latitude, longitude, 0);
    const event = Astronomy.SearchRiseSet(Astronomy.Body.Sun, observer, kind === 'rise' ? +1 : -1, start, limitDays);
    return event ? event.date : null;
}

export function searchMoonEvent(
    kind: RiseSet,
    start: Date,
    latitude: number,
    longitude: number,
    limitDays = 1
): Date | null {
    const observer = new Astronomy.Observer(latitude, longitude, 0);
    const event = Astronomy.SearchRiseSet(Astronomy.Body.Moon, observer, kind === 'rise' ? +1 : -1, start, limitDays);
    return event ? event.date : null;
}

/** Latest sunrise or sunset at or before `instant`, looking back up to two days. */
export function previousSunEvent(kind: RiseSet, instant: Date, latitude: number, longitude: number): Date | null {
    let cursor = new Date(instant.getTime() - 2 * 24 * 3600 * 1000);
    let latest: Date | null = null;

    for (;;) {
        const event = searchSunEvent(kind, cursor, latitude, longitude, 2);
        if (!event || event.getTime() > instant.getTime()) {
            return latest;
        }
        latest = event;
        cursor = new Date(event.getTime() + 60000);
    }
}

/** Greenwich apparent sidereal time in degrees. */
export function greenwichSiderealDegrees(date: Date): number {
    return Astronomy.SiderealTime(date) * 15;
}
