import type { NatalChart } from '../chart';
import { houseFromSign, signLord, type Planet } from '../jyotish/constants';

// Graha drishti: every planet aspects the 7th; Mars, Jupiter and Saturn add
// their special aspects (house counts from the aspecting planet).
const SPECIAL_ASPECTS: Partial<Record<Planet, number[]>> = {
    Mars: [4, 8],
    Jupiter: [5, 9],
    Saturn: [3, 10]
};

export function aspectedHouses(planet: Planet): number[] {
    return [7, ...(SPECIAL_ASPECTS[planet] ?? [])];
}

/** Whether `planet` in `fromSign` casts a full aspect on `toSign`. */
export function aspectsSign(planet: Planet, fromSign: number, toSign: number): boolean {
    return aspectedHouses(planet).includes(houseFromSign(fromSign, toSign));
}

export function aspects(chart: NatalChart, from: Planet, to: Planet): boolean {
    return aspectsSign(from, chart.planets[from].sign, chart.planets[to].sign);
}

export function conjunct(chart: NatalChart, a: Planet, b: Planet): boolean {
    return chart.planets[a].sign === chart.planets[b].sign;
}

/** Sign of house `house` (1-12) counted from the ascendant. */
export function houseSign(chart: NatalChart, house: number): number {
    return (chart.ascendant.sign + house - 1) % 12;
}

export function houseLord(chart: NatalChart, house: number): Planet {
    return signLord(houseSign(chart, house));
}

/** House of `planet` counted by sign from `reference`. */
export function houseFrom(chart: NatalChart, reference: Planet, planet: Planet): number {
    return houseFromSign(chart.planets[reference].sign, chart.planets[planet].sign);
}
