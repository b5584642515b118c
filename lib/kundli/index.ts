/**
 * Kundli
 *
 * Single entry point for a birth chart: validates the inputs, builds the
 * natal chart once and feeds that same chart to every analysis engine.
 */

import { buildNatalChart, type NatalChart } from '../chart';
import {
    calculateAshtottariDasha,
    calculateCharaDasha,
    calculateKarakas,
    calculateVimshottariDasha,
    calculateYoginiDasha,
    isAshtottariApplicable,
    type AshtottariDasha,
    type CharaDasha,
    type JaiminiKaraka,
    type VimshottariDasha,
    type YoginiDasha
} from '../dasha';
import { calculateAllDivisionalCharts, type DivisionalChartData } from '../divisional';
import { detectDoshas, detectYogas, type Dosha, type Yoga } from '../rules';
import {
    DEFAULT_ENGINE_CONFIG,
    birthInstant,
    parseBirthDetails,
    parseSettings,
    type BirthDetails,
    type CalculationSettings,
    type EngineConfig
} from '../settings';
import { calculateAshtakavarga, type AshtakavargaData } from '../strength/ashtakavarga';
import { calculateShadbala, type ShadbalaData } from '../strength/shadbala';
import { calculateTransits, type TransitData } from '../transit';

export interface KundliDashas {
    vimshottari: VimshottariDasha;
    yogini: YoginiDasha;
    ashtottari: AshtottariDasha;
    chara: CharaDasha;
}

export interface KundliData {
    birthDetails: BirthDetails;
    settings: CalculationSettings;
    instant: Date;
    chart: NatalChart;
    divisionalCharts: DivisionalChartData[];
    dashas: KundliDashas;
    karakas: JaiminiKaraka[];
    yogas: Yoga[];
    doshas: Dosha[];
    ashtakavarga: AshtakavargaData;
    shadbala: ShadbalaData;
}

/**
 * Full birth chart analysis. Throws InvalidBirthDetails or
 * UnsupportedConfiguration before any calculation runs.
 */
export function generateChart(
    birthDetails: unknown,
    settings: unknown = {},
    config: EngineConfig = DEFAULT_ENGINE_CONFIG
): KundliData {
    const details = parseBirthDetails(birthDetails);
    const resolvedSettings = parseSettings(settings);
    const instant = birthInstant(details);

    const chart = buildNatalChart(
        instant,
        { latitude: details.latitude, longitude: details.longitude, timezone: details.timezone },
        resolvedSettings,
        config
    );

    const moon = chart.planets.Moon.longitude;
    const depth = config.dashaDepth;

    return {
        birthDetails: details,
        settings: resolvedSettings,
        instant,
        chart,
        divisionalCharts: calculateAllDivisionalCharts(chart),
        dashas: {
            vimshottari: calculateVimshottariDasha(moon, instant, depth),
            yogini: calculateYoginiDasha(moon, instant, depth),
            ashtottari: calculateAshtottariDasha(moon, instant, isAshtottariApplicable(chart), depth),
            chara: calculateCharaDasha(chart, instant, depth)
        },
        karakas: calculateKarakas(chart),
        yogas: detectYogas(chart),
        doshas: detectDoshas(chart),
        ashtakavarga: calculateAshtakavarga(chart),
        shadbala: calculateShadbala(chart)
    };
}

/** Transits over a generated kundli at `at` (usually now). */
export function generateTransits(
    kundli: KundliData,
    at: Date,
    config: EngineConfig = DEFAULT_ENGINE_CONFIG
): TransitData {
    return calculateTransits(kundli.chart, at, config);
}
