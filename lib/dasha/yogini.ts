import { nakshatraOf } from '../chart/nakshatra';
import type { Planet } from '../jyotish/constants';
import {
    DASHA_YEAR_MS,
    buildTimeline,
    rotateFrom,
    type DashaBalance,
    type DashaLord,
    type DashaTimeline
} from './timeline';

export interface YoginiConfig {
    lord: string;
    planet: Planet;
    weight: number;
}

export const YOGINIS: YoginiConfig[] = [
    { lord: 'Mangala', planet: 'Moon', weight: 1 },
    { lord: 'Pingala', planet: 'Sun', weight: 2 },
    { lord: 'Dhanya', planet: 'Jupiter', weight: 3 },
    { lord: 'Bhramari', planet: 'Mars', weight: 4 },
    { lord: 'Bhadrika', planet: 'Mercury', weight: 5 },
    { lord: 'Ulka', planet: 'Saturn', weight: 6 },
    { lord: 'Siddha', planet: 'Venus', weight: 7 },
    { lord: 'Sankata', planet: 'Rahu', weight: 8 }
];

export const YOGINI_TOTAL_YEARS = 36;

export interface YoginiDasha extends DashaTimeline {
    balance: DashaBalance;
}

/** Starting yogini: (nakshatra number + 3) mod 8, where 0 is the eighth. */
export function startingYogini(nakshatraIndex: number): YoginiConfig {
    const remainder = (nakshatraIndex + 1 + 3) % 8;
    return YOGINIS[(remainder === 0 ? 8 : remainder) - 1];
}

export function calculateYoginiDasha(moonLongitude: number, birth: Date, depth = 3): YoginiDasha {
    const nakshatra = nakshatraOf(moonLongitude);
    const first: DashaLord = startingYogini(nakshatra.index);
    const elapsedYears = nakshatra.fraction * first.weight;

    const timeline = buildTimeline({
        system: 'Yogini',
        cycle: rotateFrom(YOGINIS, first.lord),
        children: (parent) => rotateFrom(YOGINIS, parent.lord),
        cycleStartMs: birth.getTime() - elapsedYears * DASHA_YEAR_MS,
        depth
    });

    return {
        ...timeline,
        balance: {
            lord: first.lord,
            planet: first.planet,
            elapsedYears,
            remainingYears: first.weight - elapsedYears
        }
    };
}
