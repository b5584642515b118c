export { generateChart, generateTransits, type KundliData, type KundliDashas } from './kundli';
export { generatePanchang, findHora, type HoraPeriod, type Panchang, type TimeWindow } from './panchang';
export {
    abhijitMuhurta,
    brahmaMuhurta,
    calculateMuhurtas,
    evaluateActivity,
    findMuhurta,
    isTithiFavourable,
    nextAuspiciousMuhurta,
    type Muhurta,
    type MuhurtaActivity,
    type MuhurtaRecommendation
} from './panchang/muhurta';
export {
    calculateGunaMilan,
    compareManglik,
    matchCharts,
    type GunaMilan,
    type KootaScore,
    type KundliMatch,
    type ManglikComparison
} from './matching';
export { calculateTransitTimeline, calculateTransits, type TransitAspect, type TransitData, type TransitEvent } from './transit';
export { buildNatalChart, type NatalChart, type PlanetPosition, type AscendantPosition, type GeoLocation } from './chart';
export { calculateAllDivisionalCharts, calculateDivisionalChart, divisionalSign, DIVISIONAL_TYPES, type DivisionalType, type DivisionalChartData } from './divisional';
export * from './dasha';
export { activeDoshas, detectDoshas, detectYogas, type Dosha, type Yoga } from './rules';
export { calculateAshtakavarga, type AshtakavargaData } from './strength/ashtakavarga';
export { calculateShadbala, type PlanetStrength, type ShadbalaData } from './strength/shadbala';
export { getAyanamsa, toSidereal } from './astronomy/ayanamsa';
export {
    DEFAULT_ENGINE_CONFIG,
    DEFAULT_SETTINGS,
    KP_SETTINGS,
    birthInstant,
    loadEngineConfig,
    parseBirthDetails,
    parseSettings,
    type AyanamsaSystem,
    type BirthDetails,
    type BirthDetailsInput,
    type CalculationSettings,
    type EngineConfig,
    type HouseSystem,
    type NodeMode
} from './settings';
export {
    DateOutOfEphemerisRange,
    InvalidBirthDetails,
    InvariantViolation,
    KundliError,
    UnsupportedConfiguration
} from './errors';
export { PLANETS, SIGNS, NAKSHATRAS, type Planet } from './jyotish/constants';
