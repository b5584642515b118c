/**
 * Jaimini Chara dasha and Chara karakas.
 */

import type { NatalChart } from '../chart';
import {
    DIGNITY_TABLE,
    SEVEN_PLANETS,
    SIGNS,
    houseFromSign,
    signLord,
    type SevenPlanet
} from '../jyotish/constants';
import { buildTimeline, type DashaLord, type DashaTimeline } from './timeline';

// Signs counted zodiacally (savya); the rest are counted in reverse
const SAVYA_SIGNS = [0, 1, 2, 6, 7, 8];

export type CharaDirection = 1 | -1;

export interface CharaDasha extends DashaTimeline {
    direction: CharaDirection;
}

export function charaDirection(lagnaSign: number): CharaDirection {
    return SAVYA_SIGNS.includes((lagnaSign + 8) % 12) ? 1 : -1;
}

/**
 * Period of a sign: count from the sign to its lord (forward for savya signs,
 * backward otherwise) less one, with a lord in the sign giving 12. An exalted
 * lord adds a year, a debilitated one removes a year.
 */
export function charaDashaYears(sign: number, chart: NatalChart): number {
    const lord = signLord(sign);
    const lordSign = chart.planets[lord].sign;
    const count = SAVYA_SIGNS.includes(sign)
        ? houseFromSign(sign, lordSign)
        : houseFromSign(lordSign, sign);

    let years = count - 1 === 0 ? 12 : count - 1;
    if (lordSign === DIGNITY_TABLE[lord].exaltationSign) years += 1;
    if (lordSign === DIGNITY_TABLE[lord].debilitationSign) years -= 1;
    return Math.max(1, years);
}

function signLordEntry(sign: number, weight: number): DashaLord {
    const normalized = ((sign % 12) + 12) % 12;
    return { lord: SIGNS[normalized], planet: signLord(normalized), weight };
}

export function calculateCharaDasha(chart: NatalChart, birth: Date, depth = 3): CharaDasha {
    const lagna = chart.ascendant.sign;
    const direction = charaDirection(lagna);

    const cycle = Array.from({ length: 12 }, (_, k) => {
        const sign = (((lagna + k * direction) % 12) + 12) % 12;
        return signLordEntry(sign, charaDashaYears(sign, chart));
    });

    // Twelve equal sub-periods from the next sign onward, ending with the parent sign
    const children = (parent: DashaLord) => {
        const parentSign = SIGNS.findIndex((name) => name === parent.lord);
        return Array.from({ length: 12 }, (_, k) => signLordEntry(parentSign + (k + 1) * direction, 1));
    };

    const timeline = buildTimeline({
        system: 'Chara',
        cycle,
        children,
        cycleStartMs: birth.getTime(),
        depth
    });

    return { ...timeline, direction };
}

// ---- Chara karakas ----

export const KARAKA_NAMES = [
    'Atmakaraka', 'Amatyakaraka', 'Bhratrikaraka', 'Matrikaraka',
    'Putrakaraka', 'Gnatikaraka', 'Darakaraka'
] as const;
export type KarakaName = typeof KARAKA_NAMES[number];

export interface JaiminiKaraka {
    karaka: KarakaName;
    planet: SevenPlanet;
    degree: number;
}

/** Seven planets ranked by degree within their sign, highest first. */
export function calculateKarakas(chart: NatalChart): JaiminiKaraka[] {
    const ranked = [...SEVEN_PLANETS].sort((a, b) => chart.planets[b].degree - chart.planets[a].degree);
    return ranked.map((planet, index) => ({
        karaka: KARAKA_NAMES[index],
        planet,
        degree: chart.planets[planet].degree
    }));
}
