import { nakshatraOf } from '../chart/nakshatra';
import { VIMSHOTTARI_SEQUENCE, VIMSHOTTARI_YEARS } from '../jyotish/constants';
import {
    DASHA_YEAR_MS,
    buildTimeline,
    rotateFrom,
    type DashaBalance,
    type DashaLord,
    type DashaTimeline
} from './timeline';

export const VIMSHOTTARI_TOTAL_YEARS = 120;

const VIMSHOTTARI_CYCLE: DashaLord[] = VIMSHOTTARI_SEQUENCE.map((planet) => ({
    lord: planet,
    planet,
    weight: VIMSHOTTARI_YEARS[planet]
}));

export interface VimshottariDasha extends DashaTimeline {
    balance: DashaBalance;
}

/**
 * Vimshottari dasha from the Moon's sidereal longitude. The first lord is the
 * nakshatra lord; the portion of the nakshatra already crossed is the part of
 * that lord's period elapsed before birth.
 */
export function calculateVimshottariDasha(moonLongitude: number, birth: Date, depth = 3): VimshottariDasha {
    const nakshatra = nakshatraOf(moonLongitude);
    const years = VIMSHOTTARI_YEARS[nakshatra.lord];
    const elapsedYears = nakshatra.fraction * years;

    const timeline = buildTimeline({
        system: 'Vimshottari',
        cycle: rotateFrom(VIMSHOTTARI_CYCLE, nakshatra.lord),
        children: (parent) => rotateFrom(VIMSHOTTARI_CYCLE, parent.lord),
        cycleStartMs: birth.getTime() - elapsedYears * DASHA_YEAR_MS,
        depth
    });

    return {
        ...timeline,
        balance: {
            lord: nakshatra.lord,
            planet: nakshatra.lord,
            elapsedYears,
            remainingYears: years - elapsedYears
        }
    };
}
