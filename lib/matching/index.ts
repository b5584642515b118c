/**
 * Kundli matching (Guna Milan)
 *
 * Features:
 * - Ashtakoota: eight kootas from the Moon sign and nakshatra of both partners, 36 points in all
 * - Nakshatra yoni/gana/nadi and the score matrices loaded from data/ashtakoota.json
 * - Manglik comparison from each chart's uncancelled Manglik dosha
 * - Compatibility bands on the total
 */

import { z } from 'zod';
import rawTables from '../../data/ashtakoota.json';
import { segmentIndex } from '../astronomy/math';
import type { NatalChart } from '../chart';
import { nakshatraOf } from '../chart/nakshatra';
import { InvariantViolation } from '../errors';
import { houseFromSign, naturalRelationship, signElement, signLord, type Relationship } from '../jyotish/constants';
import { activeDoshas, detectDoshas, type Dosha } from '../rules';

// ----------------------------------------------------
// Tables
// ----------------------------------------------------

const YONIS = [
    'Horse', 'Elephant', 'Sheep', 'Serpent', 'Dog', 'Cat', 'Rat',
    'Cow', 'Buffalo', 'Tiger', 'Deer', 'Monkey', 'Mongoose', 'Lion'
] as const;
const GANAS = ['Deva', 'Manushya', 'Rakshasa'] as const;
const NADIS = ['Adi', 'Madhya', 'Antya'] as const;
const VASHYAS = ['Chatushpada', 'Manava', 'Jalachara', 'Vanachara', 'Keeta'] as const;

export type Yoni = typeof YONIS[number];
export type Gana = typeof GANAS[number];
export type Nadi = typeof NADIS[number];
export type Vashya = typeof VASHYAS[number];

const scoreTable = (keys: readonly string[]) =>
    z.record(z.string(), z.record(z.string(), z.number().min(0))).refine(
        (table) => keys.every((row) => keys.every((column) => typeof table[row]?.[column] === 'number')),
        { message: `Score table must cover ${keys.join(', ')}` }
    );

export const AshtakootaTablesZ = z.object({
    nakshatras: z.array(z.object({
        yoni: z.enum(YONIS),
        gana: z.enum(GANAS),
        nadi: z.enum(NADIS)
    })).length(27),
    yoniScores: scoreTable(YONIS),
    vashyaScores: scoreTable(VASHYAS),
    ganaScores: scoreTable(GANAS)
});
export type AshtakootaTables = z.infer<typeof AshtakootaTablesZ>;

export const ASHTAKOOTA_TABLES: AshtakootaTables = AshtakootaTablesZ.parse(rawTables);

function tableScore(table: Record<string, Record<string, number>>, row: string, column: string): number {
    const score = table[row]?.[column];
    if (score === undefined) {
        throw new InvariantViolation(`No Ashtakoota score for ${row} and ${column}`);
    }
    return score;
}

// ----------------------------------------------------
// Types
// ----------------------------------------------------

export type Koota = 'varna' | 'vashya' | 'tara' | 'yoni' | 'grahaMaitri' | 'gana' | 'bhakoot' | 'nadi';

export interface KootaScore {
    koota: Koota;
    name: string;
    score: number;
    maxScore: number;
    description: string;
}

export type CompatibilityLevel = 'excellent' | 'good' | 'average' | 'poor';

export interface GunaMilan {
    kootas: KootaScore[];
    total: number;
    maxTotal: number;
    percentage: number;
    level: CompatibilityLevel;
    levelDescription: string;
}

export interface ManglikComparison {
    groomManglik: boolean;
    brideManglik: boolean;
    compatible: boolean;
    remedySuggested: boolean;
    status: string;
}

export interface KundliMatch {
    gunaMilan: GunaMilan;
    manglik: ManglikComparison;
}

const KOOTAS: Record<Koota, { name: string; maxScore: number; description: string }> = {
    varna: { name: 'Varna', maxScore: 1, description: 'Spiritual compatibility' },
    vashya: { name: 'Vashya', maxScore: 2, description: 'Dominance in relationship' },
    tara: { name: 'Tara', maxScore: 3, description: 'Destiny and luck' },
    yoni: { name: 'Yoni', maxScore: 4, description: 'Physical compatibility' },
    grahaMaitri: { name: 'Graha Maitri', maxScore: 5, description: 'Mental compatibility' },
    gana: { name: 'Gana', maxScore: 6, description: 'Temperament' },
    bhakoot: { name: 'Bhakoot', maxScore: 7, description: 'Love and family' },
    nadi: { name: 'Nadi', maxScore: 8, description: 'Health and genes' }
};

export const MAX_GUNA = 36;

const LEVEL_DESCRIPTIONS: Record<CompatibilityLevel, string> = {
    excellent: 'Highly compatible match with excellent prospects',
    good: 'Good compatibility with positive outlook',
    average: 'Average compatibility, consider other factors',
    poor: 'Lower compatibility, remedies recommended'
};

// ----------------------------------------------------
// Koota helpers
// ----------------------------------------------------

// Water signs rank highest, then fire, earth and air
const VARNA_RANK = { water: 4, fire: 3, earth: 2, air: 1 } as const;

export function varnaRank(sign: number): number {
    return VARNA_RANK[signElement(sign)];
}

/** Vashya group of a sidereal Moon longitude; Sagittarius and Capricorn split at 15°. */
export function vashyaOf(longitude: number): Vashya {
    const sign = Math.min(segmentIndex(longitude, 30), 11);
    const secondHalf = longitude - sign * 30 >= 15;
    switch (sign) {
        case 0:
        case 1:
            return 'Chatushpada';
        case 3:
        case 11:
            return 'Jalachara';
        case 4:
            return 'Vanachara';
        case 7:
            return 'Keeta';
        case 8:
            return secondHalf ? 'Chatushpada' : 'Manava';
        case 9:
            return secondHalf ? 'Jalachara' : 'Chatushpada';
        default:
            return 'Manava';
    }
}

// Vipat, Pratyari and Vadha
const INAUSPICIOUS_TARAS = [3, 5, 7];

/** Tara (1-9) of nakshatra `to` counted from nakshatra `from`, both 0-26. */
export function taraOf(from: number, to: number): number {
    const count = ((to - from + 27) % 27) + 1;
    return ((count - 1) % 9) + 1;
}

function maitriScore(a: Relationship, b: Relationship): number {
    if (a === b) {
        return a === 'friend' ? 5 : a === 'neutral' ? 3 : 0;
    }
    const pair = [a, b];
    if (!pair.includes('enemy')) return 4;
    return pair.includes('friend') ? 1 : 0.5;
}

// 2/12, 6/8 and 5/9 sign relationships
const INAUSPICIOUS_BHAKOOT = ['2/12', '6/8', '5/9'];

function bhakootScore(groomSign: number, brideSign: number): number {
    const counts = [houseFromSign(groomSign, brideSign), houseFromSign(brideSign, groomSign)].sort((a, b) => a - b);
    return INAUSPICIOUS_BHAKOOT.includes(`${counts[0]}/${counts[1]}`) ? 0 : 7;
}

export function compatibilityLevel(total: number): CompatibilityLevel {
    if (total >= 28) return 'excellent';
    if (total >= 21) return 'good';
    if (total >= 14) return 'average';
    return 'poor';
}

// ----------------------------------------------------
// Guna Milan
// ----------------------------------------------------

/**
 * Ashtakoota score from the sidereal Moon longitudes of the groom and the
 * bride. Varna and Gana are read groom-first; the other kootas are symmetric.
 */
export function calculateGunaMilan(
    groomMoon: number,
    brideMoon: number,
    tables: AshtakootaTables = ASHTAKOOTA_TABLES
): GunaMilan {
    const groomSign = Math.min(segmentIndex(groomMoon, 30), 11);
    const brideSign = Math.min(segmentIndex(brideMoon, 30), 11);
    const groomNakshatra = nakshatraOf(groomMoon).index;
    const brideNakshatra = nakshatraOf(brideMoon).index;
    const groom = tables.nakshatras[groomNakshatra];
    const bride = tables.nakshatras[brideNakshatra];

    const groomLord = signLord(groomSign);
    const brideLord = signLord(brideSign);
    const taraPoints = (tara: number) => (INAUSPICIOUS_TARAS.includes(tara) ? 0 : 1.5);

    const scores: Record<Koota, number> = {
        varna: varnaRank(groomSign) >= varnaRank(brideSign) ? 1 : 0,
        vashya: tableScore(tables.vashyaScores, vashyaOf(groomMoon), vashyaOf(brideMoon)),
        tara: taraPoints(taraOf(brideNakshatra, groomNakshatra)) + taraPoints(taraOf(groomNakshatra, brideNakshatra)),
        yoni: tableScore(tables.yoniScores, groom.yoni, bride.yoni),
        grahaMaitri: groomLord === brideLord
            ? 5
            : maitriScore(naturalRelationship(groomLord, brideLord), naturalRelationship(brideLord, groomLord)),
        gana: tableScore(tables.ganaScores, groom.gana, bride.gana),
        bhakoot: bhakootScore(groomSign, brideSign),
        nadi: groom.nadi === bride.nadi ? 0 : 8
    };

    const order: Koota[] = ['varna', 'vashya', 'tara', 'yoni', 'grahaMaitri', 'gana', 'bhakoot', 'nadi'];
    const kootas = order.map((koota) => ({ koota, ...KOOTAS[koota], score: scores[koota] }));
    const total = kootas.reduce((sum, koota) => sum + koota.score, 0);
    const level = compatibilityLevel(total);

    return {
        kootas,
        total,
        maxTotal: MAX_GUNA,
        percentage: (total / MAX_GUNA) * 100,
        level,
        levelDescription: LEVEL_DESCRIPTIONS[level]
    };
}

// ----------------------------------------------------
// Manglik comparison
// ----------------------------------------------------

export function isManglik(doshas: Dosha[]): boolean {
    return activeDoshas(doshas).some((dosha) => dosha.id === 'manglik');
}

export function compareManglik(groomManglik: boolean, brideManglik: boolean): ManglikComparison {
    const compatible = groomManglik === brideManglik;
    let status: string;
    if (!groomManglik && !brideManglik) {
        status = 'Neither partner is Manglik - Compatible';
    } else if (compatible) {
        status = 'Both partners are Manglik - Compatible';
    } else {
        status = `${groomManglik ? 'Groom' : 'Bride'} is Manglik - Remedies may be needed`;
    }
    return { groomManglik, brideManglik, compatible, remedySuggested: !compatible, status };
}

export function matchCharts(groom: NatalChart, bride: NatalChart): KundliMatch {
    return {
        gunaMilan: calculateGunaMilan(groom.planets.Moon.longitude, bride.planets.Moon.longitude),
        manglik: compareManglik(isManglik(detectDoshas(groom)), isManglik(detectDoshas(bride)))
    };
}
