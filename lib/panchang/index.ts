/**
 * Panchang
 *
 * The five limbs of the Hindu day (vara, tithi, nakshatra, yoga, karana)
 * taken at local sunrise, with the inauspicious Kaal windows, Moon phase
 * and the 24 horas of the day.
 */

import { getAyanamsa } from '../astronomy/ayanamsa';
import {
    assertInEphemerisRange,
    getMoonIllumination,
    getNakshatra,
    getNextNakshatraChange,
    getNextTithiChange,
    getNextYogaChange,
    getTithi,
    getYoga,
    searchMoonEvent,
    searchMoonPhase,
    searchSunEvent
} from '../astronomy/engine';
import { segmentIndex } from '../astronomy/math';
import { nakshatraOf } from '../chart/nakshatra';
import { NAKSHATRAS, SEVEN_PLANETS, nakshatraLord, type NakshatraName, type Planet, type SevenPlanet } from '../jyotish/constants';
import { DEFAULT_ENGINE_CONFIG, DEFAULT_SETTINGS, type CalculationSettings, type EngineConfig } from '../settings';
import { getZonedParts, startOfLocalDay, toDateKey, toUtcDate } from '../time';
import { calculateHoraPeriods, type HoraPeriod } from './hora';

// ----------------------------------------------------
// Names
// ----------------------------------------------------

const TITHI_NAMES = [
    'Pratipada', 'Dwitiya', 'Tritiya', 'Chaturthi', 'Panchami', 'Shashthi', 'Saptami',
    'Ashtami', 'Navami', 'Dashami', 'Ekadashi', 'Dwadashi', 'Trayodashi', 'Chaturdashi'
] as const;

export const YOGA_NAMES = [
    'Vishkumbha', 'Preeti', 'Ayushman', 'Saubhagya', 'Shobhana', 'Atiganda', 'Sukarma',
    'Dhriti', 'Shoola', 'Ganda', 'Vriddhi', 'Dhruva', 'Vyaghata', 'Harshana',
    'Vajra', 'Siddhi', 'Vyatipata', 'Variyan', 'Parigha', 'Shiva', 'Siddha',
    'Sadhya', 'Shubha', 'Shukla', 'Brahma', 'Indra', 'Vaidhriti'
] as const;

const MOVABLE_KARANAS = ['Bava', 'Balava', 'Kaulava', 'Taitila', 'Gara', 'Vanija', 'Vishti'] as const;

const VARA_NAMES = ['Ravivara', 'Somavara', 'Mangalavara', 'Budhavara', 'Guruvara', 'Shukravara', 'Shanivara'] as const;
const WEEKDAY_NAMES = ['Sunday', 'Monday', 'Tuesday', 'Wednesday', 'Thursday', 'Friday', 'Saturday'] as const;

const MOON_PHASE_NAMES = [
    'New Moon', 'Waxing Crescent', 'First Quarter', 'Waxing Gibbous',
    'Full Moon', 'Waning Gibbous', 'Last Quarter', 'Waning Crescent'
] as const;

// 1-based eighth of daylight, indexed by weekday (Sunday first)
const RAHU_KAAL_SEGMENT = [8, 2, 7, 5, 6, 4, 3];
const YAMAGANDA_SEGMENT = [5, 4, 3, 2, 1, 7, 6];
const GULIKA_SEGMENT = [7, 6, 5, 4, 3, 2, 1];

// ----------------------------------------------------
// Types
// ----------------------------------------------------

export type Paksha = 'Shukla' | 'Krishna';

export interface TimeWindow {
    start: Date;
    end: Date;
}

export interface Panchang {
    date: string;               // YYYY-MM-DD in the requested time zone
    timezone: string;
    /** Instant the limbs were computed for: sunrise, or local noon without one */
    calculatedAt: Date;
    vara: { weekday: number; name: string; sanskritName: string; lord: SevenPlanet };
    tithi: { index: number; name: string; paksha: Paksha; fraction: number; endsAt: Date };
    nakshatra: { index: number; name: NakshatraName; lord: Planet; pada: number; endsAt: Date };
    yoga: { index: number; name: string; endsAt: Date };
    karana: { index: number; name: string };
    sunrise: Date | null;
    sunset: Date | null;
    nextSunrise: Date | null;
    moonrise: Date | null;
    moonset: Date | null;
    rahuKaal: TimeWindow | null;
    yamaganda: TimeWindow | null;
    gulikaKaal: TimeWindow | null;
    moonPhase: { angle: number; name: string; illumination: number };
    nextPurnima: Date;
    nextAmavasya: Date;
    ayanamsa: number;
    horas: HoraPeriod[];
}

// ----------------------------------------------------
// Element helpers
// ----------------------------------------------------

export function tithiName(index: number): string {
    if (index === 15) return 'Purnima';
    if (index === 30) return 'Amavasya';
    return TITHI_NAMES[(index - 1) % 15];
}

/** Karana name for the half-tithi index 0-59. */
export function karanaName(index: number): string {
    if (index === 0) return 'Kimstughna';
    if (index === 57) return 'Shakuni';
    if (index === 58) return 'Chatushpada';
    if (index === 59) return 'Nagava';
    return MOVABLE_KARANAS[(index - 1) % 7];
}

export function moonPhaseName(angle: number): string {
    return MOON_PHASE_NAMES[Math.floor((((angle + 22.5) % 360) + 360) % 360 / 45)];
}

/** The `segment`-th (1-based) eighth of the interval from sunrise to sunset. */
export function kaalWindow(sunrise: Date, sunset: Date, segment: number): TimeWindow {
    const eighth = (sunset.getTime() - sunrise.getTime()) / 8;
    return {
        start: new Date(sunrise.getTime() + Math.round(eighth * (segment - 1))),
        end: new Date(sunrise.getTime() + Math.round(eighth * segment))
    };
}

// ----------------------------------------------------
// Panchang
// ----------------------------------------------------

/**
 * Panchang for the civil date of `date` in `timezone` at the given place.
 */
export function generatePanchang(
    date: Date,
    latitude: number,
    longitude: number,
    timezone: string,
    settings: CalculationSettings = DEFAULT_SETTINGS,
    config: EngineConfig = DEFAULT_ENGINE_CONFIG
): Panchang {
    const parts = getZonedParts(date, timezone);
    const dateKey = toDateKey(parts);
    const midnight = startOfLocalDay(date, timezone);
    assertInEphemerisRange(midnight, config);

    const sunrise = searchSunEvent('rise', midnight, latitude, longitude, 1);
    const sunset = searchSunEvent('set', sunrise ?? midnight, latitude, longitude, 1);
    const nextSunrise = sunrise
        ? searchSunEvent('rise', new Date(sunrise.getTime() + 60000), latitude, longitude, 1.5)
        : null;

    if (!sunrise) {
        console.warn(`[Panchang] No sunrise on ${dateKey} at ${latitude}, ${longitude}; using local noon`);
    }
    const anchor = sunrise ?? toUtcDate(parts.year, parts.month, parts.day, 12, 0, 0, timezone);

    const tithi = getTithi(anchor);
    const nakshatra = getNakshatra(anchor, settings.ayanamsa);
    const yoga = getYoga(anchor, settings.ayanamsa);
    const karanaIndex = Math.min(segmentIndex(tithi.phaseAngle, 6), 59);
    const weekday = parts.weekday;

    const kaal = (segments: number[]) => (sunrise && sunset ? kaalWindow(sunrise, sunset, segments[weekday]) : null);

    return {
        date: dateKey,
        timezone,
        calculatedAt: anchor,
        vara: {
            weekday,
            name: WEEKDAY_NAMES[weekday],
            sanskritName: VARA_NAMES[weekday],
            lord: SEVEN_PLANETS[weekday]
        },
        tithi: {
            index: tithi.index,
            name: tithiName(tithi.index),
            paksha: tithi.phaseAngle < 180 ? 'Shukla' : 'Krishna',
            fraction: tithi.fraction,
            endsAt: getNextTithiChange(anchor)
        },
        nakshatra: {
            index: nakshatra.index,
            name: NAKSHATRAS[nakshatra.index - 1],
            lord: nakshatraLord(nakshatra.index - 1),
            pada: nakshatraOf(nakshatra.longitude).pada,
            endsAt: getNextNakshatraChange(anchor, settings.ayanamsa)
        },
        yoga: {
            index: yoga.index,
            name: YOGA_NAMES[yoga.index - 1],
            endsAt: getNextYogaChange(anchor, settings.ayanamsa)
        },
        karana: {
            index: karanaIndex + 1,
            name: karanaName(karanaIndex)
        },
        sunrise,
        sunset,
        nextSunrise,
        moonrise: searchMoonEvent('rise', midnight, latitude, longitude),
        moonset: searchMoonEvent('set', midnight, latitude, longitude),
        rahuKaal: kaal(RAHU_KAAL_SEGMENT),
        yamaganda: kaal(YAMAGANDA_SEGMENT),
        gulikaKaal: kaal(GULIKA_SEGMENT),
        moonPhase: {
            angle: tithi.phaseAngle,
            name: moonPhaseName(tithi.phaseAngle),
            illumination: getMoonIllumination(anchor)
        },
        nextPurnima: searchMoonPhase(180, anchor),
        nextAmavasya: searchMoonPhase(0, anchor),
        ayanamsa: getAyanamsa(anchor, settings.ayanamsa),
        horas: sunrise && sunset && nextSunrise ? calculateHoraPeriods(sunrise, sunset, nextSunrise, weekday) : []
    };
}

export { CHALDEAN_ORDER, calculateHoraPeriods, findHora, horaLord, type HoraPeriod } from './hora';
