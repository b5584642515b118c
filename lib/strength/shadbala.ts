/**
 * Shadbala
 *
 * Six-fold planetary strength in virupas (60 virupas = 1 rupa):
 * - Sthana: uchcha, saptavargaja, ojayugma, kendradi, drekkana
 * - Dig: distance from the directional weak point
 * - Kala: nathonnatha, paksha, tribhaga, year/month/weekday/hora lords, ayana
 * - Chesta: motional strength
 * - Naisargika: fixed natural strength
 * - Drik: aspectual strength
 *
 * Yuddha (planetary war) bala is not applied.
 */

import { getSiderealLongitude, previousSunEvent, searchSunEvent } from '../astronomy/engine';
import { angularDistance, clamp, degrees, forwardArc, normalize360, radians, signedDelta } from '../astronomy/math';
import { meanObliquity } from '../astronomy/houses';
import type { NatalChart } from '../chart';
import { dignityOf } from '../chart/dignity';
import { divisionalSign, type DivisionalType } from '../divisional';
import {
    KENDRA_HOUSES,
    SEVEN_PLANETS,
    houseFromSign,
    isOddSign,
    naturalRelationship,
    signLord,
    type SevenPlanet
} from '../jyotish/constants';
import { horaLord } from '../panchang/hora';
import { DAY_MS, getZonedParts } from '../time';

// ----------------------------------------------------
// Tables
// ----------------------------------------------------

const EXALTATION_POINT: Record<SevenPlanet, number> = {
    Sun: 10, Moon: 33, Mars: 298, Mercury: 165, Jupiter: 95, Venus: 357, Saturn: 200
};

export const NAISARGIKA_BALA: Record<SevenPlanet, number> = {
    Sun: 60, Moon: 51.43, Venus: 42.86, Jupiter: 34.29, Mercury: 25.71, Mars: 17.14, Saturn: 8.57
};

export const REQUIRED_RUPAS: Record<SevenPlanet, number> = {
    Sun: 6.5, Moon: 6, Mars: 5, Mercury: 7, Jupiter: 6.5, Venus: 5.5, Saturn: 5
};

// Mean daily motion in degrees
const MEAN_MOTION: Record<'Mars' | 'Mercury' | 'Jupiter' | 'Venus' | 'Saturn', number> = {
    Mars: 0.524, Mercury: 0.9856, Jupiter: 0.0831, Venus: 0.9856, Saturn: 0.0335
};

const SAPTAVARGA: readonly DivisionalType[] = ['D1', 'D2', 'D3', 'D7', 'D9', 'D12', 'D30'];

type CompoundRelationship = 'great friend' | 'friend' | 'neutral' | 'enemy' | 'great enemy';

const VARGA_POINTS: Record<CompoundRelationship, number> = {
    'great friend': 22.5,
    friend: 15,
    neutral: 7.5,
    enemy: 3.75,
    'great enemy': 1.875
};

const DAY_PLANETS: readonly SevenPlanet[] = ['Sun', 'Jupiter', 'Venus'];
const PAKSHA_MALEFICS: readonly SevenPlanet[] = ['Sun', 'Mars', 'Saturn'];

export interface SthanaBala {
    uchcha: number;
    saptavargaja: number;
    ojayugma: number;
    kendradi: number;
    drekkana: number;
}

export interface KalaBala {
    nathonnatha: number;
    paksha: number;
    tribhaga: number;
    abda: number;
    masa: number;
    vara: number;
    hora: number;
    ayana: number;
}

export interface PlanetStrength {
    planet: SevenPlanet;
    sthana: number;
    dig: number;
    kala: number;
    chesta: number;
    naisargika: number;
    drik: number;
    total: number;          // virupas
    rupas: number;
    required: number;       // rupas
    ratio: number;
    isStrong: boolean;
    sthanaDetail: SthanaBala;
    kalaDetail: KalaBala;
}

export type ShadbalaData = Record<SevenPlanet, PlanetStrength>;

const sum = (values: number[]) => values.reduce((total, value) => total + value, 0);

// ----------------------------------------------------
// Sthana Bala
// ----------------------------------------------------

export function uchchaBala(planet: SevenPlanet, longitude: number): number {
    const debilitation = normalize360(EXALTATION_POINT[planet] + 180);
    return angularDistance(longitude, debilitation) / 3;
}

/** Tatkalika maitri: planets 2, 3, 4, 10, 11 or 12 signs away are temporary friends. */
function temporalFriend(chart: NatalChart, planet: SevenPlanet, other: SevenPlanet): boolean {
    const house = houseFromSign(chart.planets[planet].sign, chart.planets[other].sign);
    return [2, 3, 4, 10, 11, 12].includes(house);
}

export function compoundRelationship(chart: NatalChart, planet: SevenPlanet, other: SevenPlanet): CompoundRelationship {
    const natural = naturalRelationship(planet, other);
    const temporal = temporalFriend(chart, planet, other);
    if (natural === 'friend') return temporal ? 'great friend' : 'neutral';
    if (natural === 'enemy') return temporal ? 'neutral' : 'great enemy';
    return temporal ? 'friend' : 'enemy';
}

function saptavargajaBala(chart: NatalChart, planet: SevenPlanet): number {
    const position = chart.planets[planet];
    return sum(SAPTAVARGA.map((type) => {
        if (type === 'D1' && dignityOf(planet, position.sign, position.degree) === 'moolatrikona') {
            return 45;
        }
        const lord = signLord(divisionalSign(position.longitude, type));
        if (lord === planet) return 30;
        return VARGA_POINTS[compoundRelationship(chart, planet, lord)];
    }));
}

function ojayugmaBala(planet: SevenPlanet, longitude: number): number {
    const prefersEven = planet === 'Moon' || planet === 'Venus';
    return sum((['D1', 'D9'] as const).map((type) =>
        isOddSign(divisionalSign(longitude, type)) !== prefersEven ? 15 : 0
    ));
}

function kendradiBala(house: number): number {
    if (KENDRA_HOUSES.includes(house)) return 60;
    if ([2, 5, 8, 11].includes(house)) return 30;
    return 15;
}

function drekkanaBala(planet: SevenPlanet, degree: number): number {
    const decanate = degree < 10 ? 1 : degree < 20 ? 2 : 3;
    const favoured = ['Sun', 'Mars', 'Jupiter'].includes(planet) ? 1
        : ['Mercury', 'Saturn'].includes(planet) ? 2
        : 3;
    return decanate === favoured ? 15 : 0;
}

function sthanaBala(chart: NatalChart, planet: SevenPlanet): SthanaBala {
    const position = chart.planets[planet];
    return {
        uchcha: uchchaBala(planet, position.longitude),
        saptavargaja: saptavargajaBala(chart, planet),
        ojayugma: ojayugmaBala(planet, position.longitude),
        kendradi: kendradiBala(position.house),
        drekkana: drekkanaBala(planet, position.degree)
    };
}

// ----------------------------------------------------
// Dig Bala
// ----------------------------------------------------

export function digBala(chart: NatalChart, planet: SevenPlanet): number {
    const asc = chart.ascendant.longitude;
    const mc = chart.midheaven;
    const weakPoint: Record<SevenPlanet, number> = {
        Sun: mc + 180,
        Mars: mc + 180,
        Jupiter: asc + 180,
        Mercury: asc + 180,
        Moon: mc,
        Venus: mc,
        Saturn: asc
    };
    return angularDistance(chart.planets[planet].longitude, normalize360(weakPoint[planet])) / 3;
}

// ----------------------------------------------------
// Kala Bala
// ----------------------------------------------------

interface DayFrame {
    isDay: boolean;
    /** Portion of the current day or night already elapsed, 0..1 */
    fraction: number;
    /** Weekday (0 = Sunday) of the sunrise that opened the current vedic day */
    weekday: number;
}

function localMeanHours(chart: NatalChart): number {
    const instant = chart.instant;
    const utcHours = instant.getUTCHours() + instant.getUTCMinutes() / 60 + instant.getUTCSeconds() / 3600;
    return normalize360((utcHours + chart.location.longitude / 15) * 15) / 15;
}

/** Day or night at the chart instant, from actual sunrise and sunset where they exist. */
export function dayFrame(chart: NatalChart): DayFrame {
    const { instant, location } = chart;
    const sunrise = previousSunEvent('rise', instant, location.latitude, location.longitude);
    const sunset = previousSunEvent('set', instant, location.latitude, location.longitude);

    if (sunrise && sunset) {
        const weekday = getZonedParts(sunrise, location.timezone).weekday;
        const isDay = sunrise.getTime() > sunset.getTime();
        const start = isDay ? sunrise : sunset;
        const end = searchSunEvent(isDay ? 'set' : 'rise', start, location.latitude, location.longitude)
            ?? new Date(start.getTime() + DAY_MS / 2);
        return {
            isDay,
            fraction: clamp((instant.getTime() - start.getTime()) / (end.getTime() - start.getTime()), 0, 1),
            weekday
        };
    }

    // Polar day or night: 06:00-18:00 local mean time counts as day
    const hours = localMeanHours(chart);
    const isDay = hours >= 6 && hours < 18;
    const civil = getZonedParts(instant, location.timezone).weekday;
    return {
        isDay,
        fraction: isDay ? (hours - 6) / 12 : normalize360((hours - 18) * 15) / 180,
        weekday: !isDay && hours < 6 ? (civil + 6) % 7 : civil
    };
}

function nathonnathaBala(chart: NatalChart, planet: SevenPlanet): number {
    if (planet === 'Mercury') return 60;
    const fromNoon = Math.abs(signedDelta(12 * 15, localMeanHours(chart) * 15)) / 15;
    return DAY_PLANETS.includes(planet) ? (12 - fromNoon) * 5 : fromNoon * 5;
}

/** Moon-Sun elongation folded into 0..180. */
function elongation(chart: NatalChart): number {
    return angularDistance(chart.planets.Sun.longitude, chart.planets.Moon.longitude);
}

function pakshaValue(chart: NatalChart, planet: SevenPlanet): number {
    const benefic = elongation(chart) / 3;
    return PAKSHA_MALEFICS.includes(planet) ? 60 - benefic : benefic;
}

function tribhagaBala(frame: DayFrame, planet: SevenPlanet): number {
    if (planet === 'Jupiter') return 60;
    const third = Math.min(Math.floor(frame.fraction * 3), 2);
    const rulers: SevenPlanet[] = frame.isDay ? ['Mercury', 'Sun', 'Saturn'] : ['Moon', 'Venus', 'Mars'];
    return rulers[third] === planet ? 60 : 0;
}

/** Latest instant before `before` at which the sidereal Sun stood at `target`. */
export function previousSunIngress(chart: NatalChart, target: number, before: Date): Date {
    const { ayanamsa } = chart.settings;
    const current = getSiderealLongitude('Sun', before, ayanamsa);
    let t = before.getTime() - (forwardArc(target, current) / 0.9856) * DAY_MS;
    for (let i = 0; i < 5; i++) {
        const longitude = getSiderealLongitude('Sun', new Date(t), ayanamsa);
        t -= (signedDelta(target, longitude) / 0.9856) * DAY_MS;
    }
    return new Date(t);
}

function weekdayLord(chart: NatalChart, instant: Date): SevenPlanet {
    return SEVEN_PLANETS[getZonedParts(instant, chart.location.timezone).weekday];
}

/** Declination-based ayana value, before the Sun's doubling. */
function ayanaValue(chart: NatalChart, planet: SevenPlanet): number {
    const tropical = chart.planets[planet].longitude + chart.ayanamsa;
    const obliquity = meanObliquity(chart.instant);
    const declination = degrees(Math.asin(Math.sin(radians(obliquity)) * Math.sin(radians(tropical))));

    let value: number;
    if (planet === 'Mercury') {
        value = 23.45 + Math.abs(declination);
    } else if (planet === 'Moon' || planet === 'Saturn') {
        value = 23.45 - declination;
    } else {
        value = 23.45 + declination;
    }
    return clamp((60 * value) / 46.9, 0, 60);
}

interface KalaLords {
    abda: SevenPlanet;
    masa: SevenPlanet;
    vara: SevenPlanet;
    hora: SevenPlanet;
}

function kalaLords(chart: NatalChart, frame: DayFrame): KalaLords {
    const sunSign = chart.planets.Sun.sign;
    const yearStart = previousSunIngress(chart, 0, chart.instant);
    const monthStart = previousSunIngress(chart, sunSign * 30, chart.instant);
    const horaIndex = (frame.isDay ? 0 : 12) + Math.min(Math.floor(frame.fraction * 12), 11);

    return {
        abda: weekdayLord(chart, yearStart),
        masa: weekdayLord(chart, monthStart),
        vara: SEVEN_PLANETS[frame.weekday],
        hora: horaLord(frame.weekday, horaIndex)
    };
}

function kalaBala(chart: NatalChart, planet: SevenPlanet, frame: DayFrame, lords: KalaLords): KalaBala {
    const paksha = pakshaValue(chart, planet);
    const ayana = ayanaValue(chart, planet);
    return {
        nathonnatha: nathonnathaBala(chart, planet),
        paksha: planet === 'Moon' ? paksha * 2 : paksha,
        tribhaga: tribhagaBala(frame, planet),
        abda: lords.abda === planet ? 15 : 0,
        masa: lords.masa === planet ? 30 : 0,
        vara: lords.vara === planet ? 45 : 0,
        hora: lords.hora === planet ? 60 : 0,
        ayana: planet === 'Sun' ? ayana * 2 : ayana
    };
}

// ----------------------------------------------------
// Chesta Bala
// ----------------------------------------------------

export function chestaBala(chart: NatalChart, planet: SevenPlanet): number {
    if (planet === 'Sun') return ayanaValue(chart, 'Sun');
    if (planet === 'Moon') return pakshaValue(chart, 'Moon');

    const { speed } = chart.planets[planet];
    if (speed < 0) return 60;

    const ratio = speed / MEAN_MOTION[planet];
    if (ratio < 0.5) return 15;
    if (ratio < 0.9) return 30;
    if (ratio <= 1.1) return 7.5;
    if (ratio <= 1.5) return 45;
    return 30;
}

// ----------------------------------------------------
// Drik Bala
// ----------------------------------------------------

/** Virupas of the aspect cast across a forward arc of `angle` degrees. */
export function drishtiValue(angle: number, aspecting: SevenPlanet): number {
    const a = normalize360(angle);
    let value: number;
    if (a < 30) value = 0;
    else if (a < 60) value = (a - 30) / 2;
    else if (a < 90) value = a - 60 + 15;
    else if (a < 120) value = (120 - a) / 2 + 30;
    else if (a < 150) value = 150 - a;
    else if (a < 180) value = (a - 150) * 2;
    else if (a < 300) value = (300 - a) / 2;
    else value = 0;

    const within = (from: number, to: number) => a >= from && a <= to;
    if (aspecting === 'Saturn' && (within(60, 90) || within(270, 300))) value += 45;
    if (aspecting === 'Jupiter' && (within(120, 150) || within(240, 270))) value += 30;
    if (aspecting === 'Mars' && (within(90, 120) || within(210, 240))) value += 15;

    return Math.min(value, 60);
}

function isDrikBenefic(chart: NatalChart, planet: SevenPlanet): boolean {
    if (planet === 'Moon') return forwardArc(chart.planets.Sun.longitude, chart.planets.Moon.longitude) < 180;
    return planet === 'Jupiter' || planet === 'Venus' || planet === 'Mercury';
}

export function drikBala(chart: NatalChart, planet: SevenPlanet): number {
    const target = chart.planets[planet].longitude;
    let total = 0;
    for (const other of SEVEN_PLANETS) {
        if (other === planet) continue;
        const value = drishtiValue(forwardArc(chart.planets[other].longitude, target), other);
        total += isDrikBenefic(chart, other) ? value : -value;
    }
    return total / 4;
}

// ----------------------------------------------------
// Total
// ----------------------------------------------------

export function calculateShadbala(chart: NatalChart): ShadbalaData {
    const frame = dayFrame(chart);
    const lords = kalaLords(chart, frame);

    const strengthOf = (planet: SevenPlanet): PlanetStrength => {
        const sthanaDetail = sthanaBala(chart, planet);
        const kalaDetail = kalaBala(chart, planet, frame, lords);
        const sthana = sum(Object.values(sthanaDetail));
        const kala = sum(Object.values(kalaDetail));
        const dig = digBala(chart, planet);
        const chesta = chestaBala(chart, planet);
        const naisargika = NAISARGIKA_BALA[planet];
        const drik = drikBala(chart, planet);

        const total = sthana + dig + kala + chesta + naisargika + drik;
        const rupas = total / 60;
        const required = REQUIRED_RUPAS[planet];

        return {
            planet,
            sthana,
            dig,
            kala,
            chesta,
            naisargika,
            drik,
            total,
            rupas,
            required,
            ratio: rupas / required,
            isStrong: rupas >= required,
            sthanaDetail,
            kalaDetail
        };
    };

    return {
        Sun: strengthOf('Sun'),
        Moon: strengthOf('Moon'),
        Mars: strengthOf('Mars'),
        Mercury: strengthOf('Mercury'),
        Jupiter: strengthOf('Jupiter'),
        Venus: strengthOf('Venus'),
        Saturn: strengthOf('Saturn')
    };
}
