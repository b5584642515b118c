export {
    DASHA_LEVELS,
    DASHA_YEAR_MS,
    MAX_DASHA_DEPTH,
    buildTimeline,
    findActivePeriods,
    isPeriodActive,
    validateTimeline,
    yearsBetween,
    type DashaBalance,
    type DashaLevelName,
    type DashaPeriod,
    type DashaSystem,
    type DashaTimeline
} from './timeline';
export { VIMSHOTTARI_TOTAL_YEARS, calculateVimshottariDasha, type VimshottariDasha } from './vimshottari';
export { YOGINIS, YOGINI_TOTAL_YEARS, calculateYoginiDasha, startingYogini, type YoginiDasha } from './yogini';
export {
    ASHTOTTARI_TOTAL_YEARS,
    calculateAshtottariDasha,
    isAshtottariApplicable,
    type AshtottariDasha
} from './ashtottari';
export {
    KARAKA_NAMES,
    calculateCharaDasha,
    calculateKarakas,
    charaDashaYears,
    charaDirection,
    type CharaDasha,
    type JaiminiKaraka,
    type KarakaName
} from './chara';
