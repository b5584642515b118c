/**
 * Divisional (Varga) Charts
 *
 * Each 30° sign is cut into n parts; the part index picks a destination sign
 * through a chart-specific starting point keyed on the sign's parity,
 * modality or element. D30 uses the unequal Trimsamsa degree table.
 */

import { normalize360 } from '../astronomy/math';
import type { NatalChart } from '../chart';
import { PLANETS, isOddSign, signElement, signModality, type Planet } from '../jyotish/constants';

export const DIVISIONAL_TYPES = [
    'D1', 'D2', 'D3', 'D4', 'D7', 'D9', 'D10', 'D12',
    'D16', 'D20', 'D24', 'D27', 'D30', 'D40', 'D45', 'D60'
] as const;
export type DivisionalType = typeof DIVISIONAL_TYPES[number];

export interface DivisionalChartData {
    type: DivisionalType;
    name: string;
    ascendantSign: number;
    placements: Array<{ planet: Planet; sign: number }>;
}

// Longitudes within this distance below a part boundary count as the next part
const PART_TOLERANCE = 0.0005;

interface VargaRule {
    name: string;
    parts: number;
    /** Destination sign for (sign, part index, degree in sign). */
    map: (sign: number, part: number, degree: number) => number;
}

const MODALITY_START = {
    D16: { movable: 0, fixed: 4, dual: 8 },
    D20: { movable: 0, fixed: 8, dual: 4 },
    D45: { movable: 0, fixed: 4, dual: 8 }
} as const;

const ELEMENT_START_D27 = { fire: 0, earth: 3, air: 6, water: 9 } as const;

const fromSign = (start: number, part: number) => start + part;

const VARGA_RULES: Record<DivisionalType, VargaRule> = {
    D1: { name: 'Rasi', parts: 1, map: (sign) => sign },
    D2: {
        name: 'Hora',
        parts: 2,
        // Odd signs: Sun's hora (Leo) then Moon's (Cancer); even signs reversed
        map: (sign, part) => (isOddSign(sign) === (part === 0) ? 4 : 3)
    },
    D3: { name: 'Drekkana', parts: 3, map: (sign, part) => sign + 4 * part },
    D4: { name: 'Chaturthamsa', parts: 4, map: (sign, part) => sign + 3 * part },
    D7: { name: 'Saptamsa', parts: 7, map: (sign, part) => fromSign(isOddSign(sign) ? sign : sign + 6, part) },
    D9: {
        name: 'Navamsa',
        parts: 9,
        // fire: Aries, earth: Capricorn, air: Libra, water: Cancer
        map: (sign, part) => fromSign([0, 9, 6, 3][sign % 4], part)
    },
    D10: { name: 'Dasamsa', parts: 10, map: (sign, part) => fromSign(isOddSign(sign) ? sign : sign + 8, part) },
    D12: { name: 'Dwadasamsa', parts: 12, map: (sign, part) => fromSign(sign, part) },
    D16: { name: 'Shodasamsa', parts: 16, map: (sign, part) => fromSign(MODALITY_START.D16[signModality(sign)], part) },
    D20: { name: 'Vimsamsa', parts: 20, map: (sign, part) => fromSign(MODALITY_START.D20[signModality(sign)], part) },
    D24: { name: 'Chaturvimsamsa', parts: 24, map: (sign, part) => fromSign(isOddSign(sign) ? 4 : 3, part) },
    D27: {
        name: 'Saptavimsamsa',
        parts: 27,
        map: (sign, part) => fromSign(ELEMENT_START_D27[signElement(sign)], part)
    },
    D30: { name: 'Trimsamsa', parts: 30, map: (sign, _part, degree) => trimsamsaSign(sign, degree) },
    D40: { name: 'Khavedamsa', parts: 40, map: (sign, part) => fromSign(isOddSign(sign) ? 0 : 6, part) },
    D45: { name: 'Akshavedamsa', parts: 45, map: (sign, part) => fromSign(MODALITY_START.D45[signModality(sign)], part) },
    D60: { name: 'Shashtiamsa', parts: 60, map: (sign, part) => fromSign(sign, part) }
};

// Trimsamsa: [upper degree bound, destination sign]
const TRIMSAMSA_ODD: Array<[number, number]> = [[5, 0], [10, 10], [18, 8], [25, 2], [30, 6]];
const TRIMSAMSA_EVEN: Array<[number, number]> = [[5, 1], [12, 5], [20, 11], [25, 9], [30, 7]];

function trimsamsaSign(sign: number, degree: number): number {
    const table = isOddSign(sign) ? TRIMSAMSA_ODD : TRIMSAMSA_EVEN;
    const adjusted = degree + PART_TOLERANCE;
    for (const [upper, destination] of table) {
        if (adjusted < upper) {
            return destination;
        }
    }
    return table[table.length - 1][1];
}

/** Sign index (0-11) of a sidereal longitude in the given divisional chart. */
export function divisionalSign(longitude: number, type: DivisionalType): number {
    const rule = VARGA_RULES[type];
    const normalized = normalize360(longitude);
    const sign = Math.min(Math.floor(normalized / 30), 11);
    const degree = normalized - sign * 30;
    const partWidth = 30 / rule.parts;
    const part = Math.min(Math.floor((degree + PART_TOLERANCE) / partWidth), rule.parts - 1);

    return ((rule.map(sign, part, degree) % 12) + 12) % 12;
}

export function calculateDivisionalChart(chart: NatalChart, type: DivisionalType): DivisionalChartData {
    return {
        type,
        name: VARGA_RULES[type].name,
        ascendantSign: divisionalSign(chart.ascendant.longitude, type),
        placements: PLANETS.map((planet) => ({
            planet,
            sign: divisionalSign(chart.planets[planet].longitude, type)
        }))
    };
}

export function calculateAllDivisionalCharts(chart: NatalChart): DivisionalChartData[] {
    return DIVISIONAL_TYPES.map((type) => calculateDivisionalChart(chart, type));
}
