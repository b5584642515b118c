/**
 * Chart Builder
 *
 * Resolves one birth instant + location into the canonical sidereal chart:
 * positions, ascendant, midheaven, cusps, houses, nakshatras and dignities.
 * Every downstream engine reads this object instead of recomputing positions.
 */

import { getAyanamsa } from '../astronomy/ayanamsa';
import { getPositions } from '../astronomy/engine';
import { calculateAngles, calculateCusps, houseOf, toSiderealCusps, type HouseCusps } from '../astronomy/houses';
import { normalize360, segmentIndex } from '../astronomy/math';
import { mapPlanets, type Planet } from '../jyotish/constants';
import { DEFAULT_ENGINE_CONFIG, type CalculationSettings, type EngineConfig } from '../settings';
import { dignityOf, type Dignity } from './dignity';
import { nakshatraOf, type NakshatraPosition } from './nakshatra';

export interface GeoLocation {
    latitude: number;
    longitude: number;
    timezone: string;
}

export interface AscendantPosition {
    longitude: number;      // sidereal, 0-360
    sign: number;           // 0-11
    degree: number;         // 0-30
    nakshatra: NakshatraPosition;
}

export interface PlanetPosition extends AscendantPosition {
    planet: Planet;
    house: number;          // 1-12
    speed: number;          // degrees per day
    retrograde: boolean;
    dignity: Dignity;
}

export interface NatalChart {
    instant: Date;
    location: GeoLocation;
    settings: CalculationSettings;
    ayanamsa: number;
    ascendant: AscendantPosition;
    midheaven: number;      // sidereal
    houses: HouseCusps;     // sidereal cusps
    planets: Record<Planet, PlanetPosition>;
}

export function describeLongitude(longitude: number): AscendantPosition {
    const normalized = normalize360(longitude);
    const sign = Math.min(segmentIndex(normalized, 30), 11);
    return {
        longitude: normalized,
        sign,
        degree: Math.max(0, normalized - sign * 30),
        nakshatra: nakshatraOf(normalized)
    };
}

export function buildPlanetPosition(
    planet: Planet,
    longitude: number,
    speed: number,
    houses: HouseCusps
): PlanetPosition {
    const base = describeLongitude(longitude);
    return {
        ...base,
        planet,
        house: houseOf(base.longitude, houses),
        speed,
        retrograde: speed < 0,
        dignity: dignityOf(planet, base.sign, base.degree)
    };
}

export function buildNatalChart(
    instant: Date,
    location: GeoLocation,
    settings: CalculationSettings,
    config: EngineConfig = DEFAULT_ENGINE_CONFIG
): NatalChart {
    const raw = getPositions(instant, settings.nodeMode, config);
    const ayanamsa = getAyanamsa(instant, settings.ayanamsa);

    const angles = calculateAngles(instant, location.latitude, location.longitude);
    const ascendant = describeLongitude(angles.ascendant - ayanamsa);
    const tropicalCusps = calculateCusps(settings.houseSystem, angles, location.latitude);
    const houses = toSiderealCusps(tropicalCusps, ayanamsa, ascendant.longitude);

    const planets = mapPlanets((planet) =>
        buildPlanetPosition(planet, raw[planet].longitude - ayanamsa, raw[planet].speed, houses)
    );

    return {
        instant,
        location,
        settings,
        ayanamsa,
        ascendant,
        midheaven: normalize360(angles.midheaven - ayanamsa),
        houses,
        planets
    };
}

export { dignityOf, isStrongDignity, type Dignity } from './dignity';
export { nakshatraOf, type NakshatraPosition } from './nakshatra';
