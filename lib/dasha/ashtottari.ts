import type { NatalChart } from '../chart';
import { nakshatraOf } from '../chart/nakshatra';
import { InvariantViolation } from '../errors';
import { houseFromSign, signLord, type Planet } from '../jyotish/constants';
import {
    DASHA_YEAR_MS,
    buildTimeline,
    rotateFrom,
    type DashaBalance,
    type DashaLord,
    type DashaTimeline
} from './timeline';

interface AshtottariGroup extends DashaLord {
    nakshatras: number[];   // nakshatra indices, counted from Ardra
}

const ASHTOTTARI_GROUPS: AshtottariGroup[] = [
    { lord: 'Sun', planet: 'Sun', weight: 6, nakshatras: [5, 6, 7, 8] },
    { lord: 'Moon', planet: 'Moon', weight: 15, nakshatras: [9, 10, 11] },
    { lord: 'Mars', planet: 'Mars', weight: 8, nakshatras: [12, 13, 14, 15] },
    { lord: 'Mercury', planet: 'Mercury', weight: 17, nakshatras: [16, 17, 18] },
    { lord: 'Saturn', planet: 'Saturn', weight: 10, nakshatras: [19, 20, 21] },
    { lord: 'Jupiter', planet: 'Jupiter', weight: 19, nakshatras: [22, 23, 24] },
    { lord: 'Rahu', planet: 'Rahu', weight: 12, nakshatras: [25, 26, 0, 1] },
    { lord: 'Venus', planet: 'Venus', weight: 21, nakshatras: [2, 3, 4] }
];

export const ASHTOTTARI_TOTAL_YEARS = 108;

const APPLICABLE_HOUSES = [1, 4, 5, 7, 9, 10];

export interface AshtottariDasha extends DashaTimeline {
    balance: DashaBalance;
    applicable: boolean;
}

function groupFor(nakshatraIndex: number): { group: AshtottariGroup; position: number } {
    for (const group of ASHTOTTARI_GROUPS) {
        const position = group.nakshatras.indexOf(nakshatraIndex);
        if (position >= 0) {
            return { group, position };
        }
    }
    throw new InvariantViolation(`Nakshatra ${nakshatraIndex} has no Ashtottari group`);
}

/**
 * Classical condition for using Ashtottari: Rahu in a kendra or trikona
 * counted from the lagna lord.
 */
export function isAshtottariApplicable(chart: NatalChart): boolean {
    const lagnaLord: Planet = signLord(chart.ascendant.sign);
    const rahuSign = chart.planets.Rahu.sign;
    return APPLICABLE_HOUSES.includes(houseFromSign(chart.planets[lagnaLord].sign, rahuSign));
}

export function calculateAshtottariDasha(
    moonLongitude: number,
    birth: Date,
    applicable: boolean,
    depth = 3
): AshtottariDasha {
    const nakshatra = nakshatraOf(moonLongitude);
    const { group, position } = groupFor(nakshatra.index);
    const traversed = (position + nakshatra.fraction) / group.nakshatras.length;
    const elapsedYears = traversed * group.weight;

    const timeline = buildTimeline({
        system: 'Ashtottari',
        cycle: rotateFrom(ASHTOTTARI_GROUPS, group.lord),
        children: (parent) => rotateFrom(ASHTOTTARI_GROUPS, parent.lord),
        cycleStartMs: birth.getTime() - elapsedYears * DASHA_YEAR_MS,
        depth
    });

    return {
        ...timeline,
        applicable,
        balance: {
            lord: group.lord,
            planet: group.planet,
            elapsedYears,
            remainingYears: group.weight - elapsedYears
        }
    };
}
