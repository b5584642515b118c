/**
 * Ashtakavarga
 *
 * Features:
 * - Bindu tables loaded from data/ashtakavarga.json and validated on load
 * - Bhinnashtakavarga: 12 bindu counts for each of the seven planets
 * - Sarvashtakavarga: per-sign totals (always 337 in all)
 */

import { z } from 'zod';
import rawTables from '../../data/ashtakavarga.json';
import type { NatalChart } from '../chart';
import { SEVEN_PLANETS, type SevenPlanet } from '../jyotish/constants';

const HousesZ = z.array(z.number().int().min(1).max(12));

const ContributionsZ = z.object({
    Sun: HousesZ,
    Moon: HousesZ,
    Mars: HousesZ,
    Mercury: HousesZ,
    Jupiter: HousesZ,
    Venus: HousesZ,
    Saturn: HousesZ,
    Lagna: HousesZ
});

export const AshtakavargaTablesZ = z.object({
    Sun: ContributionsZ,
    Moon: ContributionsZ,
    Mars: ContributionsZ,
    Mercury: ContributionsZ,
    Jupiter: ContributionsZ,
    Venus: ContributionsZ,
    Saturn: ContributionsZ
});
export type AshtakavargaTables = z.infer<typeof AshtakavargaTablesZ>;

export const ASHTAKAVARGA_TABLES: AshtakavargaTables = AshtakavargaTablesZ.parse(rawTables);

export type Contributor = SevenPlanet | 'Lagna';
const CONTRIBUTORS: readonly Contributor[] = [...SEVEN_PLANETS, 'Lagna'];

export const SARVA_TOTAL = 337;

export type SignStrengthClass = 'strong' | 'moderate' | 'weak';

export interface AshtakavargaData {
    bhinna: Record<SevenPlanet, number[]>;
    sarva: number[];
    signStrength: SignStrengthClass[];
    total: number;
}

export function classifySignBindus(bindus: number): SignStrengthClass {
    if (bindus > 28) return 'strong';
    if (bindus >= 25) return 'moderate';
    return 'weak';
}

function contributorSign(chart: NatalChart, contributor: Contributor): number {
    return contributor === 'Lagna' ? chart.ascendant.sign : chart.planets[contributor].sign;
}

/** Bindus a planet receives in each of the twelve signs. */
export function bhinnashtakavarga(
    chart: NatalChart,
    planet: SevenPlanet,
    tables: AshtakavargaTables = ASHTAKAVARGA_TABLES
): number[] {
    const bindus = new Array<number>(12).fill(0);
    for (const contributor of CONTRIBUTORS) {
        const from = contributorSign(chart, contributor);
        for (const house of tables[planet][contributor]) {
            bindus[(from + house - 1) % 12] += 1;
        }
    }
    return bindus;
}

export function calculateAshtakavarga(chart: NatalChart): AshtakavargaData {
    const bhinna = {
        Sun: bhinnashtakavarga(chart, 'Sun'),
        Moon: bhinnashtakavarga(chart, 'Moon'),
        Mars: bhinnashtakavarga(chart, 'Mars'),
        Mercury: bhinnashtakavarga(chart, 'Mercury'),
        Jupiter: bhinnashtakavarga(chart, 'Jupiter'),
        Venus: bhinnashtakavarga(chart, 'Venus'),
        Saturn: bhinnashtakavarga(chart, 'Saturn')
    };

    const sarva = Array.from({ length: 12 }, (_, sign) =>
        SEVEN_PLANETS.reduce((sum, planet) => sum + bhinna[planet][sign], 0)
    );

    return {
        bhinna,
        sarva,
        signStrength: sarva.map(classifySignBindus),
        total: sarva.reduce((sum, value) => sum + value, 0)
    };
}
