/**
 * Transits (Gochara)
 *
 * Features:
 * - Current positions mapped onto the natal houses
 * - Transit-to-natal aspects with orbs, applying/separating and strength
 * - Sade Sati phase from Saturn's sign relative to the natal Moon
 * - Ingress and station timeline, refined to the minute
 */

import { getAyanamsa } from '../astronomy/ayanamsa';
import {
    assertInEphemerisRange,
    findNextChange,
    getPositions,
    getSiderealLongitude
} from '../astronomy/engine';
import { angularDistance, forwardArc, signedDelta } from '../astronomy/math';
import { buildPlanetPosition, type NatalChart, type PlanetPosition } from '../chart';
import { PLANETS, mapPlanets, type Planet } from '../jyotish/constants';
import { DEFAULT_ENGINE_CONFIG, type CalculationSettings, type EngineConfig } from '../settings';
import { DAY_MS } from '../time';

export type AspectType = 'conjunction' | 'sextile' | 'square' | 'trine' | 'opposition' | 'special';
export type AspectStrength = 'strong' | 'moderate' | 'weak';
export type SadeSatiPhase = 'rising' | 'peak' | 'setting';

export interface TransitAspect {
    transitPlanet: Planet;
    natalPlanet: Planet;
    type: AspectType;
    angle: number;
    orb: number;
    applying: boolean;
    strength: AspectStrength;
}

export interface TransitData {
    at: Date;
    /** Transit positions; `house` is the natal house occupied. */
    positions: Record<Planet, PlanetPosition>;
    aspects: TransitAspect[];
    sadeSati: SadeSatiPhase | null;
}

interface AspectDefinition {
    type: AspectType;
    angle: number;
    maxOrb: number;
    /** Special aspects are measured along the forward arc from the transit body. */
    forward: boolean;
}

const MAJOR_ASPECTS: AspectDefinition[] = [
    { type: 'conjunction', angle: 0, maxOrb: 8, forward: false },
    { type: 'sextile', angle: 60, maxOrb: 4, forward: false },
    { type: 'square', angle: 90, maxOrb: 6, forward: false },
    { type: 'trine', angle: 120, maxOrb: 6, forward: false },
    { type: 'opposition', angle: 180, maxOrb: 8, forward: false }
];

const SPECIAL_ORB = 6;
const SPECIAL_ANGLES: Partial<Record<Planet, number[]>> = {
    Mars: [90, 210],
    Jupiter: [120, 240],
    Saturn: [60, 270]
};

// Step used to decide whether an orb is closing
const APPLYING_STEP_DAYS = 0.01;

function aspectDefinitions(planet: Planet): AspectDefinition[] {
    const special = (SPECIAL_ANGLES[planet] ?? []).map((angle) => ({
        type: 'special' as const,
        angle,
        maxOrb: SPECIAL_ORB,
        forward: true
    }));
    // Specials first so that they win ties
    return [...special, ...MAJOR_ASPECTS];
}

function orbOf(definition: AspectDefinition, transitLongitude: number, natalLongitude: number): number {
    if (definition.forward) {
        return Math.abs(signedDelta(definition.angle, forwardArc(transitLongitude, natalLongitude)));
    }
    return Math.abs(angularDistance(transitLongitude, natalLongitude) - definition.angle);
}

export function aspectStrength(orb: number): AspectStrength {
    if (orb < 2) return 'strong';
    if (orb < 5) return 'moderate';
    return 'weak';
}

/** Tightest aspect `transit` makes to `natal`, or null outside every orb. */
export function findAspect(transit: PlanetPosition, natal: PlanetPosition): TransitAspect | null {
    let best: { definition: AspectDefinition; orb: number } | null = null;
    for (const definition of aspectDefinitions(transit.planet)) {
        const orb = orbOf(definition, transit.longitude, natal.longitude);
        if (orb <= definition.maxOrb && (best === null || orb < best.orb)) {
            best = { definition, orb };
        }
    }
    if (best === null) return null;

    const later = transit.longitude + transit.speed * APPLYING_STEP_DAYS;
    return {
        transitPlanet: transit.planet,
        natalPlanet: natal.planet,
        type: best.definition.type,
        angle: best.definition.angle,
        orb: best.orb,
        applying: orbOf(best.definition, later, natal.longitude) < best.orb,
        strength: aspectStrength(best.orb)
    };
}

export function sadeSatiPhase(saturnSign: number, natalMoonSign: number): SadeSatiPhase | null {
    switch ((saturnSign - natalMoonSign + 12) % 12) {
        case 11:
            return 'rising';
        case 0:
            return 'peak';
        case 1:
            return 'setting';
        default:
            return null;
    }
}

/** Transit positions at `at`, computed with the natal chart's settings. */
export function calculateTransits(
    natal: NatalChart,
    at: Date,
    config: EngineConfig = DEFAULT_ENGINE_CONFIG
): TransitData {
    const raw = getPositions(at, natal.settings.nodeMode, config);
    const ayanamsa = getAyanamsa(at, natal.settings.ayanamsa);

    const positions = mapPlanets((planet) =>
        buildPlanetPosition(planet, raw[planet].longitude - ayanamsa, raw[planet].speed, natal.houses)
    );

    const aspects: TransitAspect[] = [];
    for (const transitPlanet of PLANETS) {
        for (const natalPlanet of PLANETS) {
            const aspect = findAspect(positions[transitPlanet], natal.planets[natalPlanet]);
            if (aspect) {
                aspects.push(aspect);
            }
        }
    }

    return {
        at,
        positions,
        aspects,
        sadeSati: sadeSatiPhase(positions.Saturn.sign, natal.planets.Moon.sign)
    };
}

// ----------------------------------------------------
// Timeline
// ----------------------------------------------------

export type TransitEventKind = 'ingress' | 'retrograde' | 'direct';

export interface TransitEvent {
    planet: Planet;
    kind: TransitEventKind;
    at: Date;
    /** Sign entered for an ingress, sign occupied for a station. */
    sign: number;
}

const MINUTE_MS = 60000;

export interface IndexChange {
    at: Date;
    from: number;
    to: number;
}

/**
 * Every change of `indexAt` between `start` and `end`, sampled every
 * `stepMs` and refined to the minute. The scan resumes from each refined
 * instant, so two changes inside one step are both reported.
 */
export function scanChanges(
    start: Date,
    end: Date,
    indexAt: (date: Date) => number,
    stepMs: number
): IndexChange[] {
    const changes: IndexChange[] = [];
    let cursor = start;
    let index = indexAt(cursor);

    while (cursor.getTime() < end.getTime()) {
        const next = new Date(Math.min(cursor.getTime() + stepMs, end.getTime()));
        if (indexAt(next) === index) {
            cursor = next;
            continue;
        }
        const at = findNextChange(cursor, indexAt, {
            stepMinutes: (next.getTime() - cursor.getTime()) / MINUTE_MS,
            maxSteps: 1,
            precisionMs: MINUTE_MS
        });
        const to = indexAt(at);
        if (to !== index) {
            changes.push({ at, from: index, to });
        }
        cursor = at;
        index = to;
    }
    return changes;
}

function addMonths(date: Date, months: number): Date {
    const end = new Date(date.getTime());
    end.setUTCMonth(end.getUTCMonth() + months);
    return end;
}

/**
 * Sign ingresses and retrograde/direct stations of the nine grahas between
 * `start` and `months` later (config.transitTimelineMonths when omitted),
 * sorted by time.
 */
export function calculateTransitTimeline(
    start: Date,
    months: number | undefined,
    settings: CalculationSettings,
    config: EngineConfig = DEFAULT_ENGINE_CONFIG
): TransitEvent[] {
    const end = addMonths(start, months ?? config.transitTimelineMonths);
    assertInEphemerisRange(start, config);
    assertInEphemerisRange(end, config);

    const longitudeAt = (planet: Planet, date: Date) =>
        getSiderealLongitude(planet, date, settings.ayanamsa, settings.nodeMode);
    const signAt = (planet: Planet, date: Date) => Math.floor(longitudeAt(planet, date) / 30);
    const motionAt = (planet: Planet, date: Date) => {
        const delta = signedDelta(
            longitudeAt(planet, new Date(date.getTime() - DAY_MS / 2)),
            longitudeAt(planet, new Date(date.getTime() + DAY_MS / 2))
        );
        return delta < 0 ? -1 : 1;
    };

    const events: TransitEvent[] = [];
    for (const planet of PLANETS) {
        for (const change of scanChanges(start, end, (date) => signAt(planet, date), DAY_MS)) {
            events.push({ planet, kind: 'ingress', at: change.at, sign: change.to });
        }
        for (const change of scanChanges(start, end, (date) => motionAt(planet, date), DAY_MS)) {
            events.push({
                planet,
                kind: change.to < 0 ? 'retrograde' : 'direct',
                at: change.at,
                sign: signAt(planet, change.at)
            });
        }
    }

    return events.sort((a, b) => a.at.getTime() - b.at.getTime());
}
