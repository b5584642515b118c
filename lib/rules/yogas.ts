import type { NatalChart } from '../chart';
import { isStrongDignity } from '../chart/dignity';
import {
    KENDRA_HOUSES,
    PLANETS,
    SEVEN_PLANETS,
    signLord,
    type Planet
} from '../jyotish/constants';
import { conjunct, houseFrom, houseLord } from './aspects';
import { evaluateRules, type RuleDescriptor, type Yoga, type YogaStrength } from './engine';

const BENEFICS: Planet[] = ['Mercury', 'Jupiter', 'Venus'];
// Planets that form Moon/Sun-flank yogas (luminaries and nodes excluded)
const FLANK_PLANETS: Planet[] = ['Mars', 'Mercury', 'Jupiter', 'Venus', 'Saturn'];

const isKendra = (house: number) => KENDRA_HOUSES.includes(house);
const houseOf = (chart: NatalChart, planet: Planet) => chart.planets[planet].house;

export function yogaStrength(chart: NatalChart, planets: Planet[]): YogaStrength {
    const dignities = planets.map((planet) => chart.planets[planet].dignity);
    if (dignities.includes('exalted')) return 'strong';
    if (dignities.includes('debilitated')) return 'weak';
    return 'moderate';
}

function unique(planets: Planet[]): Planet[] {
    return PLANETS.filter((planet) => planets.includes(planet));
}

function yoga(
    chart: NatalChart,
    fields: Omit<Yoga, 'strength' | 'nature' | 'planets'> & { planets: Planet[]; strength?: YogaStrength }
): Yoga {
    const planets = unique(fields.planets);
    return {
        ...fields,
        nature: 'benefic',
        planets,
        strength: fields.strength ?? yogaStrength(chart, planets)
    };
}

// ---- Pancha Mahapurusha ----

const MAHAPURUSHA: Array<{ id: string; planet: Planet; name: string }> = [
    { id: 'ruchaka', planet: 'Mars', name: 'Ruchaka' },
    { id: 'bhadra', planet: 'Mercury', name: 'Bhadra' },
    { id: 'hamsa', planet: 'Jupiter', name: 'Hamsa' },
    { id: 'malavya', planet: 'Venus', name: 'Malavya' },
    { id: 'sasa', planet: 'Saturn', name: 'Sasa' }
];

const mahapurushaRules: RuleDescriptor<Yoga>[] = MAHAPURUSHA.map(({ id, planet, name }) => ({
    id,
    kind: 'yoga',
    evaluate: (chart) => {
        const position = chart.planets[planet];
        if (!isStrongDignity(position.dignity) || !isKendra(position.house)) return null;
        return yoga(chart, {
            id,
            name: `${name} Yoga`,
            sanskritName: name,
            description: `${planet} in its own or exaltation sign in house ${position.house}, a kendra.`,
            planets: [planet]
        });
    }
}));

// ---- Lunar / solar flank yogas ----

function flankYoga(chart: NatalChart, reference: 'Moon' | 'Sun'): Yoga | null {
    const second = FLANK_PLANETS.filter((planet) => houseFrom(chart, reference, planet) === 2);
    const twelfth = FLANK_PLANETS.filter((planet) => houseFrom(chart, reference, planet) === 12);
    if (second.length === 0 && twelfth.length === 0) return null;

    const names = reference === 'Moon'
        ? { both: 'Durudhara', second: 'Sunapha', twelfth: 'Anapha' }
        : { both: 'Ubhayachari', second: 'Vesi', twelfth: 'Vosi' };

    const name = second.length > 0 && twelfth.length > 0
        ? names.both
        : second.length > 0 ? names.second : names.twelfth;

    const flank = second.length > 0 && twelfth.length > 0
        ? `the 2nd and 12th from the ${reference}`
        : second.length > 0 ? `the 2nd from the ${reference}` : `the 12th from the ${reference}`;

    return yoga(chart, {
        id: name.toLowerCase(),
        name: `${name} Yoga`,
        sanskritName: name,
        description: `${[...second, ...twelfth].join(', ')} in ${flank}.`,
        planets: [reference, ...second, ...twelfth]
    });
}

// ---- Catalog ----

export const YOGA_RULES: ReadonlyArray<RuleDescriptor<Yoga>> = [
    ...mahapurushaRules,
    {
        id: 'gaja-kesari',
        kind: 'yoga',
        evaluate: (chart) => {
            const house = houseFrom(chart, 'Moon', 'Jupiter');
            if (!isKendra(house)) return null;
            return yoga(chart, {
                id: 'gaja-kesari',
                name: 'Gaja Kesari Yoga',
                sanskritName: 'Gajakesari',
                description: `Jupiter in house ${house} from the Moon.`,
                planets: ['Jupiter', 'Moon']
            });
        }
    },
    {
        id: 'budhaditya',
        kind: 'yoga',
        evaluate: (chart) => {
            if (!conjunct(chart, 'Sun', 'Mercury')) return null;
            return yoga(chart, {
                id: 'budhaditya',
                name: 'Budhaditya Yoga',
                sanskritName: 'Budha-Aditya',
                description: 'Sun and Mercury in the same sign.',
                planets: ['Sun', 'Mercury']
            });
        }
    },
    {
        id: 'raja',
        kind: 'yoga',
        evaluate: (chart) => {
            const pairs: Array<[Planet, Planet]> = [];
            for (const kendra of KENDRA_HOUSES) {
                for (const trikona of [5, 9]) {
                    const a = houseLord(chart, kendra);
                    const b = houseLord(chart, trikona);
                    if (a !== b && conjunct(chart, a, b) && !pairs.some(([x, y]) => (x === a && y === b) || (x === b && y === a))) {
                        pairs.push([a, b]);
                    }
                }
            }
            if (pairs.length === 0) return null;
            const planets = pairs.flat();
            return yoga(chart, {
                id: 'raja',
                name: 'Raja Yoga',
                sanskritName: 'Raja',
                description: `Kendra and trikona lords together: ${pairs.map(([a, b]) => `${a}-${b}`).join(', ')}.`,
                planets,
                strength: pairs.length > 1 ? 'strong' : yogaStrength(chart, unique(planets))
            });
        }
    },
    { id: 'moon-flank', kind: 'yoga', evaluate: (chart) => flankYoga(chart, 'Moon') },
    { id: 'sun-flank', kind: 'yoga', evaluate: (chart) => flankYoga(chart, 'Sun') },
    {
        id: 'adhi',
        kind: 'yoga',
        evaluate: (chart) => {
            const placed = BENEFICS.filter((planet) => [6, 7, 8].includes(houseFrom(chart, 'Moon', planet)));
            if (placed.length < 2) return null;
            return yoga(chart, {
                id: 'adhi',
                name: 'Adhi Yoga',
                sanskritName: 'Adhi',
                description: `${placed.join(', ')} in the 6th, 7th or 8th from the Moon.`,
                planets: placed,
                strength: placed.length === 3 ? 'strong' : 'moderate'
            });
        }
    },
    {
        id: 'dhana',
        kind: 'yoga',
        evaluate: (chart) => {
            const second = houseLord(chart, 2);
            const eleventh = houseLord(chart, 11);
            if (second === eleventh) return null;
            const together = conjunct(chart, second, eleventh);
            const exchanged = chart.planets[second].house === 11 && chart.planets[eleventh].house === 2;
            if (!together && !exchanged) return null;
            return yoga(chart, {
                id: 'dhana',
                name: 'Dhana Yoga',
                sanskritName: 'Dhana',
                description: together
                    ? `Lords of the 2nd (${second}) and 11th (${eleventh}) in the same sign.`
                    : `Lords of the 2nd (${second}) and 11th (${eleventh}) in each other's houses.`,
                planets: [second, eleventh]
            });
        }
    },
    {
        id: 'lakshmi',
        kind: 'yoga',
        evaluate: (chart) => {
            const ninth = houseLord(chart, 9);
            if (!isKendra(houseOf(chart, ninth)) || !isStrongDignity(chart.planets.Venus.dignity)) return null;
            return yoga(chart, {
                id: 'lakshmi',
                name: 'Lakshmi Yoga',
                sanskritName: 'Lakshmi',
                description: `9th lord ${ninth} in a kendra with Venus in its own or exaltation sign.`,
                planets: [ninth, 'Venus']
            });
        }
    },
    {
        id: 'chandra-mangal',
        kind: 'yoga',
        evaluate: (chart) => {
            if (!conjunct(chart, 'Moon', 'Mars')) return null;
            return yoga(chart, {
                id: 'chandra-mangal',
                name: 'Chandra-Mangal Yoga',
                sanskritName: 'Chandra-Mangala',
                description: 'Moon and Mars in the same sign.',
                planets: ['Moon', 'Mars']
            });
        }
    },
    {
        id: 'shubh-kartari',
        kind: 'yoga',
        evaluate: (chart) => {
            const inTwelfth = BENEFICS.filter((planet) => houseOf(chart, planet) === 12);
            const inSecond = BENEFICS.filter((planet) => houseOf(chart, planet) === 2);
            if (inTwelfth.length === 0 || inSecond.length === 0) return null;
            return yoga(chart, {
                id: 'shubh-kartari',
                name: 'Shubh Kartari Yoga',
                sanskritName: 'Shubha Kartari',
                description: 'Lagna hemmed between benefics in the 12th and 2nd houses.',
                planets: [...inTwelfth, ...inSecond]
            });
        }
    },
    {
        id: 'viparita-raja',
        kind: 'yoga',
        evaluate: (chart) => {
            const dusthanas = [6, 8, 12];
            const lords = dusthanas
                .map((house) => houseLord(chart, house))
                .filter((lord) => dusthanas.includes(houseOf(chart, lord)));
            if (lords.length === 0) return null;
            return yoga(chart, {
                id: 'viparita-raja',
                name: 'Viparita Raja Yoga',
                sanskritName: 'Viparita Raja',
                description: `Dusthana lords placed in dusthanas: ${unique(lords).join(', ')}.`,
                planets: lords
            });
        }
    },
    {
        id: 'neecha-bhanga',
        kind: 'yoga',
        evaluate: (chart) => {
            const cancelled = SEVEN_PLANETS.filter((planet) => {
                const position = chart.planets[planet];
                if (position.dignity !== 'debilitated') return false;
                const dispositor = signLord(position.sign);
                return isKendra(houseOf(chart, dispositor)) || isKendra(houseFrom(chart, 'Moon', dispositor));
            });
            if (cancelled.length === 0) return null;
            return yoga(chart, {
                id: 'neecha-bhanga',
                name: 'Neecha Bhanga Raja Yoga',
                sanskritName: 'Neecha Bhanga',
                description: `Debilitation cancelled by a dispositor in a kendra: ${cancelled.join(', ')}.`,
                planets: cancelled,
                strength: 'moderate'
            });
        }
    },
    {
        id: 'parivartana',
        kind: 'yoga',
        evaluate: (chart) => {
            const pairs: Array<[Planet, Planet]> = [];
            SEVEN_PLANETS.forEach((a, i) => {
                SEVEN_PLANETS.slice(i + 1).forEach((b) => {
                    if (signLord(chart.planets[a].sign) === b && signLord(chart.planets[b].sign) === a) {
                        pairs.push([a, b]);
                    }
                });
            });
            if (pairs.length === 0) return null;
            return yoga(chart, {
                id: 'parivartana',
                name: 'Parivartana Yoga',
                sanskritName: 'Parivartana',
                description: `Sign exchange: ${pairs.map(([a, b]) => `${a}-${b}`).join(', ')}.`,
                planets: pairs.flat()
            });
        }
    },
    {
        id: 'amala',
        kind: 'yoga',
        evaluate: (chart) => {
            const tenth = BENEFICS.filter((planet) => houseOf(chart, planet) === 10);
            if (tenth.length === 0) return null;
            return yoga(chart, {
                id: 'amala',
                name: 'Amala Yoga',
                sanskritName: 'Amala',
                description: `${tenth.join(', ')} in the 10th house.`,
                planets: tenth
            });
        }
    },
    {
        id: 'parvata',
        kind: 'yoga',
        evaluate: (chart) => {
            const inKendra = BENEFICS.filter((planet) => isKendra(houseOf(chart, planet)));
            const sixthOrEighthOccupied = PLANETS.some((planet) => [6, 8].includes(houseOf(chart, planet)));
            if (inKendra.length === 0 || sixthOrEighthOccupied) return null;
            return yoga(chart, {
                id: 'parvata',
                name: 'Parvata Yoga',
                sanskritName: 'Parvata',
                description: `Benefics in kendras (${inKendra.join(', ')}) with the 6th and 8th houses empty.`,
                planets: inKendra
            });
        }
    },
    {
        id: 'kahala',
        kind: 'yoga',
        evaluate: (chart) => {
            const fourth = houseLord(chart, 4);
            const ninth = houseLord(chart, 9);
            const lagnaLord = houseLord(chart, 1);
            if (fourth === ninth) return null;
            if (!isKendra(houseOf(chart, fourth)) || !isKendra(houseOf(chart, ninth))) return null;
            if (chart.planets[lagnaLord].dignity === 'debilitated') return null;
            return yoga(chart, {
                id: 'kahala',
                name: 'Kahala Yoga',
                sanskritName: 'Kahala',
                description: `Lords of the 4th (${fourth}) and 9th (${ninth}) both in kendras.`,
                planets: [fourth, ninth]
            });
        }
    },
    {
        id: 'chamara',
        kind: 'yoga',
        evaluate: (chart) => {
            const lagnaLord = houseLord(chart, 1);
            const position = chart.planets[lagnaLord];
            if (position.dignity !== 'exalted' || !isKendra(position.house)) return null;
            return yoga(chart, {
                id: 'chamara',
                name: 'Chamara Yoga',
                sanskritName: 'Chamara',
                description: `Lagna lord ${lagnaLord} exalted in house ${position.house}.`,
                planets: [lagnaLord]
            });
        }
    }
];

export function detectYogas(chart: NatalChart): Yoga[] {
    return evaluateRules(YOGA_RULES, chart);
}
