import { angularDistance, forwardArc } from '../astronomy/math';
import type { NatalChart } from '../chart';
import { isStrongDignity } from '../chart/dignity';
import { KENDRA_HOUSES, NAKSHATRAS, SEVEN_PLANETS, type Planet } from '../jyotish/constants';
import { aspects, conjunct, houseFrom } from './aspects';
import { evaluateRules, type Dosha, type DoshaSeverity, type RuleDescriptor } from './engine';

const MANGLIK_HOUSES = [1, 4, 7, 8, 12];
const GRAHAN_ORB = 12;
// Ashwini, Ashlesha, Magha, Jyeshtha, Mula, Revati
const GANDMOOL_NAKSHATRAS = [0, 8, 9, 17, 18, 26];
// Gandanta pada: the first pada after a water/fire junction, or the last before it
const GANDANTA_PADA: Record<number, number> = { 0: 1, 8: 4, 9: 1, 17: 4, 18: 1, 26: 4 };

const NON_LUMINARY: Planet[] = ['Mars', 'Mercury', 'Jupiter', 'Venus', 'Saturn'];

function dosha(
    fields: Omit<Dosha, 'nature' | 'cancelled' | 'cancellationReason'> & { cancellationReason?: string | null }
): Dosha {
    const cancellationReason = fields.cancellationReason ?? null;
    return {
        ...fields,
        nature: 'malefic',
        cancelled: cancellationReason !== null,
        cancellationReason
    };
}

// ---- Manglik ----

function manglik(chart: NatalChart): Dosha | null {
    const mars = chart.planets.Mars;
    if (!MANGLIK_HOUSES.includes(mars.house)) return null;

    let cancellationReason: string | null = null;
    if (isStrongDignity(mars.dignity)) {
        cancellationReason = `Mars is ${mars.dignity === 'exalted' ? 'exalted' : 'in its own sign'}`;
    } else if (conjunct(chart, 'Jupiter', 'Mars')) {
        cancellationReason = 'Jupiter conjoins Mars';
    } else if (aspects(chart, 'Jupiter', 'Mars')) {
        cancellationReason = 'Jupiter aspects Mars';
    }

    const fromMoon = MANGLIK_HOUSES.includes(houseFrom(chart, 'Moon', 'Mars'));
    const fromVenus = MANGLIK_HOUSES.includes(houseFrom(chart, 'Venus', 'Mars'));
    let severity: DoshaSeverity = 'medium';
    if (fromMoon || fromVenus) {
        severity = 'high';
    } else if (aspects(chart, 'Venus', 'Mars')) {
        severity = 'low';
    }

    return dosha({
        id: 'manglik',
        name: 'Manglik Dosha',
        sanskritName: 'Kuja Dosha',
        severity,
        cancellationReason,
        description: `Mars in house ${mars.house} from the ascendant.`,
        planets: ['Mars']
    });
}

// ---- Kaal Sarp ----

function kaalSarp(chart: NatalChart): Dosha | null {
    const rahu = chart.planets.Rahu.longitude;
    const onRahuSide = SEVEN_PLANETS.filter((planet) => forwardArc(rahu, chart.planets[planet].longitude) < 180);
    const hemmed = Math.max(onRahuSide.length, SEVEN_PLANETS.length - onRahuSide.length);
    if (hemmed < 5) return null;

    const full = hemmed === SEVEN_PLANETS.length;
    return dosha({
        id: 'kaal-sarp',
        name: full ? 'Kaal Sarp Dosha' : 'Partial Kaal Sarp Dosha',
        sanskritName: 'Kala Sarpa',
        severity: full ? 'high' : 'low',
        description: full
            ? 'All seven planets lie on one side of the Rahu-Ketu axis.'
            : `${hemmed} of seven planets lie on one side of the Rahu-Ketu axis.`,
        planets: ['Rahu', 'Ketu']
    });
}

// ---- Kemdrum ----

function kemdrum(chart: NatalChart): Dosha | null {
    const flanked = NON_LUMINARY.some((planet) => [2, 12].includes(houseFrom(chart, 'Moon', planet)));
    if (flanked) return null;

    const moon = chart.planets.Moon;
    let cancellationReason: string | null = null;
    const kendraFromMoon = NON_LUMINARY.find((planet) => KENDRA_HOUSES.includes(houseFrom(chart, 'Moon', planet)));
    if (kendraFromMoon) {
        cancellationReason = `${kendraFromMoon} in a kendra from the Moon`;
    } else if (KENDRA_HOUSES.includes(moon.house)) {
        cancellationReason = `Moon in house ${moon.house}, a kendra`;
    } else if (isStrongDignity(moon.dignity)) {
        cancellationReason = 'Moon in its own or exaltation sign';
    }

    return dosha({
        id: 'kemdrum',
        name: 'Kemdrum Dosha',
        sanskritName: 'Kemadruma',
        severity: 'medium',
        cancellationReason,
        description: 'No planet in the 2nd or 12th from the Moon.',
        planets: ['Moon']
    });
}

// ---- Catalog ----

export const DOSHA_RULES: ReadonlyArray<RuleDescriptor<Dosha>> = [
    { id: 'manglik', kind: 'dosha', evaluate: manglik },
    { id: 'kaal-sarp', kind: 'dosha', evaluate: kaalSarp },
    { id: 'kemdrum', kind: 'dosha', evaluate: kemdrum },
    {
        id: 'pitra',
        kind: 'dosha',
        evaluate: (chart) => {
            const reasons: string[] = [];
            const planets: Planet[] = ['Sun'];
            if (conjunct(chart, 'Sun', 'Rahu')) {
                reasons.push('Sun with Rahu');
                planets.push('Rahu');
            }
            if (conjunct(chart, 'Sun', 'Saturn')) {
                reasons.push('Sun with Saturn');
                planets.push('Saturn');
            } else if (aspects(chart, 'Saturn', 'Sun')) {
                reasons.push('Saturn aspects the Sun');
                planets.push('Saturn');
            }
            if (chart.planets.Rahu.house === 9) {
                reasons.push('Rahu in the 9th house');
                if (!planets.includes('Rahu')) planets.push('Rahu');
            }
            if (reasons.length === 0) return null;
            return dosha({
                id: 'pitra',
                name: 'Pitra Dosha',
                sanskritName: 'Pitru Dosha',
                severity: reasons.length > 1 ? 'high' : 'medium',
                description: `${reasons.join('; ')}.`,
                planets
            });
        }
    },
    {
        id: 'grahan',
        kind: 'dosha',
        evaluate: (chart) => {
            const nearNode = (planet: Planet) =>
                angularDistance(chart.planets[planet].longitude, chart.planets.Rahu.longitude) <= GRAHAN_ORB
                || angularDistance(chart.planets[planet].longitude, chart.planets.Ketu.longitude) <= GRAHAN_ORB;
            const eclipsed = (['Sun', 'Moon'] as const).filter(nearNode);
            if (eclipsed.length === 0) return null;
            return dosha({
                id: 'grahan',
                name: 'Grahan Dosha',
                sanskritName: 'Grahana',
                severity: eclipsed.length === 2 ? 'high' : 'medium',
                description: `${eclipsed.join(' and ')} within ${GRAHAN_ORB}° of a lunar node.`,
                planets: [...eclipsed, 'Rahu', 'Ketu']
            });
        }
    },
    {
        id: 'guru-chandal',
        kind: 'dosha',
        evaluate: (chart) => {
            if (!conjunct(chart, 'Jupiter', 'Rahu')) return null;
            return dosha({
                id: 'guru-chandal',
                name: 'Guru Chandal Dosha',
                sanskritName: 'Guru Chandala',
                severity: 'medium',
                cancellationReason: isStrongDignity(chart.planets.Jupiter.dignity)
                    ? 'Jupiter in its own or exaltation sign'
                    : null,
                description: 'Jupiter and Rahu in the same sign.',
                planets: ['Jupiter', 'Rahu']
            });
        }
    },
    {
        id: 'shrapit',
        kind: 'dosha',
        evaluate: (chart) => {
            if (!conjunct(chart, 'Saturn', 'Rahu')) return null;
            return dosha({
                id: 'shrapit',
                name: 'Shrapit Dosha',
                sanskritName: 'Shrapita',
                severity: 'high',
                description: 'Saturn and Rahu in the same sign.',
                planets: ['Saturn', 'Rahu']
            });
        }
    },
    {
        id: 'gandmool',
        kind: 'dosha',
        evaluate: (chart) => {
            const { index, pada } = chart.planets.Moon.nakshatra;
            if (!GANDMOOL_NAKSHATRAS.includes(index)) return null;
            return dosha({
                id: 'gandmool',
                name: 'Gandmool Dosha',
                sanskritName: 'Ganda Moola',
                severity: GANDANTA_PADA[index] === pada ? 'high' : 'low',
                description: `Moon in ${NAKSHATRAS[index]} pada ${pada}.`,
                planets: ['Moon']
            });
        }
    }
];

export function detectDoshas(chart: NatalChart): Dosha[] {
    return evaluateRules(DOSHA_RULES, chart);
}
