/**
 * Classical reference tables: grahas, rashis, nakshatras, dignities and
 * natural relationships.
 */

export const PLANETS = ['Sun', 'Moon', 'Mars', 'Mercury', 'Jupiter', 'Venus', 'Saturn', 'Rahu', 'Ketu'] as const;
export type Planet = typeof PLANETS[number];

export const SEVEN_PLANETS = ['Sun', 'Moon', 'Mars', 'Mercury', 'Jupiter', 'Venus', 'Saturn'] as const;
export type SevenPlanet = typeof SEVEN_PLANETS[number];

export const SIGNS = [
    'Aries', 'Taurus', 'Gemini', 'Cancer', 'Leo', 'Virgo',
    'Libra', 'Scorpio', 'Sagittarius', 'Capricorn', 'Aquarius', 'Pisces'
] as const;
export type SignName = typeof SIGNS[number];

export const SIGN_LORDS: readonly SevenPlanet[] = [
    'Mars', 'Venus', 'Mercury', 'Moon', 'Sun', 'Mercury',
    'Venus', 'Mars', 'Jupiter', 'Saturn', 'Saturn', 'Jupiter'
];

export type Modality = 'movable' | 'fixed' | 'dual';
export type Element = 'fire' | 'earth' | 'air' | 'water';

export function signModality(sign: number): Modality {
    const value = sign % 3;
    return value === 0 ? 'movable' : value === 1 ? 'fixed' : 'dual';
}

export function signElement(sign: number): Element {
    const elements: Element[] = ['fire', 'earth', 'air', 'water'];
    return elements[sign % 4];
}

/** Aries, Gemini, Leo... (index 0, 2, 4...) are the odd signs. */
export function isOddSign(sign: number): boolean {
    return sign % 2 === 0;
}

export function signLord(sign: number): SevenPlanet {
    return SIGN_LORDS[((sign % 12) + 12) % 12];
}

// ---- Nakshatras ----

export const NAKSHATRA_SPAN = 360 / 27;
export const PADA_SPAN = NAKSHATRA_SPAN / 4;

export const NAKSHATRAS = [
    'Ashwini', 'Bharani', 'Krittika', 'Rohini', 'Mrigashira', 'Ardra',
    'Punarvasu', 'Pushya', 'Ashlesha', 'Magha', 'Purva Phalguni', 'Uttara Phalguni',
    'Hasta', 'Chitra', 'Swati', 'Vishakha', 'Anuradha', 'Jyeshtha',
    'Mula', 'Purva Ashadha', 'Uttara Ashadha', 'Shravana', 'Dhanishta', 'Shatabhisha',
    'Purva Bhadrapada', 'Uttara Bhadrapada', 'Revati'
] as const;
export type NakshatraName = typeof NAKSHATRAS[number];

// ---- Vimshottari ----

export const VIMSHOTTARI_SEQUENCE: readonly Planet[] = [
    'Ketu', 'Venus', 'Sun', 'Moon', 'Mars', 'Rahu', 'Jupiter', 'Saturn', 'Mercury'
];

export const VIMSHOTTARI_YEARS: Record<Planet, number> = {
    Ketu: 7,
    Venus: 20,
    Sun: 6,
    Moon: 10,
    Mars: 7,
    Rahu: 18,
    Jupiter: 16,
    Saturn: 19,
    Mercury: 17
};

export function nakshatraLord(index: number): Planet {
    return VIMSHOTTARI_SEQUENCE[index % 9];
}

// ---- Dignities ----

export interface DignityConfig {
    exaltationSign: number;
    exaltationDegree: number | null;
    debilitationSign: number;
    ownSigns: number[];
    moolatrikona: { sign: number; from: number; to: number } | null;
}

export const DIGNITY_TABLE: Record<Planet, DignityConfig> = {
    Sun: { exaltationSign: 0, exaltationDegree: 10, debilitationSign: 6, ownSigns: [4], moolatrikona: { sign: 4, from: 0, to: 20 } },
    Moon: { exaltationSign: 1, exaltationDegree: 3, debilitationSign: 7, ownSigns: [3], moolatrikona: { sign: 1, from: 3, to: 30 } },
    Mars: { exaltationSign: 9, exaltationDegree: 28, debilitationSign: 3, ownSigns: [0, 7], moolatrikona: { sign: 0, from: 0, to: 12 } },
    Mercury: { exaltationSign: 5, exaltationDegree: 15, debilitationSign: 11, ownSigns: [2, 5], moolatrikona: { sign: 5, from: 15, to: 20 } },
    Jupiter: { exaltationSign: 3, exaltationDegree: 5, debilitationSign: 9, ownSigns: [8, 11], moolatrikona: { sign: 8, from: 0, to: 10 } },
    Venus: { exaltationSign: 11, exaltationDegree: 27, debilitationSign: 5, ownSigns: [1, 6], moolatrikona: { sign: 6, from: 0, to: 15 } },
    Saturn: { exaltationSign: 6, exaltationDegree: 20, debilitationSign: 0, ownSigns: [9, 10], moolatrikona: { sign: 10, from: 0, to: 20 } },
    Rahu: { exaltationSign: 1, exaltationDegree: null, debilitationSign: 7, ownSigns: [10], moolatrikona: null },
    Ketu: { exaltationSign: 7, exaltationDegree: null, debilitationSign: 1, ownSigns: [7], moolatrikona: null }
};

// ---- Natural relationships (Naisargika Maitri) ----

export type Relationship = 'friend' | 'neutral' | 'enemy';

const FRIENDS: Record<Planet, Planet[]> = {
    Sun: ['Moon', 'Mars', 'Jupiter'],
    Moon: ['Sun', 'Mercury'],
    Mars: ['Sun', 'Moon', 'Jupiter'],
    Mercury: ['Sun', 'Venus'],
    Jupiter: ['Sun', 'Moon', 'Mars'],
    Venus: ['Mercury', 'Saturn'],
    Saturn: ['Mercury', 'Venus'],
    Rahu: ['Mercury', 'Venus', 'Saturn'],
    Ketu: ['Mars', 'Venus', 'Saturn']
};

const ENEMIES: Record<Planet, Planet[]> = {
    Sun: ['Venus', 'Saturn'],
    Moon: [],
    Mars: ['Mercury'],
    Mercury: ['Moon'],
    Jupiter: ['Mercury', 'Venus'],
    Venus: ['Sun', 'Moon'],
    Saturn: ['Sun', 'Moon', 'Mars'],
    Rahu: ['Sun', 'Moon', 'Mars'],
    Ketu: ['Sun', 'Moon']
};

export function naturalRelationship(planet: Planet, other: Planet): Relationship {
    if (FRIENDS[planet].includes(other)) return 'friend';
    if (ENEMIES[planet].includes(other)) return 'enemy';
    return 'neutral';
}

// ---- Houses ----

export const KENDRA_HOUSES: readonly number[] = [1, 4, 7, 10];

/** House number (1-12) of `toSign` counted from `fromSign`. */
export function houseFromSign(fromSign: number, toSign: number): number {
    return ((toSign - fromSign + 12) % 12) + 1;
}

export function mapPlanets<T>(fn: (planet: Planet) => T): Record<Planet, T> {
    return {
        Sun: fn('Sun'),
        Moon: fn('Moon'),
        Mars: fn('Mars'),
        Mercury: fn('Mercury'),
        Jupiter: fn('Jupiter'),
        Venus: fn('Venus'),
        Saturn: fn('Saturn'),
        Rahu: fn('Rahu'),
        Ketu: fn('Ketu')
    };
}
