/**
 * Muhurta
 *
 * Features:
 * - 15 day and 15 night muhurtas between sunrise, sunset and the next sunrise
 * - Abhijit (the 8th day muhurta) and Brahma muhurta windows
 * - Activity check against the day's nakshatra, tithi, yoga, karana and Rahu Kaal
 *
 * Names, flags and activity rules live in data/muhurta.json.
 */

import { z } from 'zod';
import rawRules from '../../data/muhurta.json';
import { NAKSHATRAS } from '../jyotish/constants';
import type { Panchang, TimeWindow } from './index';

// ----------------------------------------------------
// Rules
// ----------------------------------------------------

const MuhurtaNameZ = z.object({ name: z.string(), auspicious: z.boolean() });

const ActivityRuleZ = z.object({
    nakshatras: z.array(z.enum(NAKSHATRAS)),
    // Tithis within the paksha (1-15); null falls back to avoiding the rikta tithis
    tithis: z.array(z.number().int().min(1).max(15)).nullable(),
    shuklaOnly: z.boolean()
});

export const MuhurtaRulesZ = z.object({
    dayMuhurtas: z.array(MuhurtaNameZ).length(15),
    nightMuhurtas: z.array(MuhurtaNameZ).length(15),
    activities: z.object({
        marriage: ActivityRuleZ,
        travel: ActivityRuleZ,
        business: ActivityRuleZ,
        education: ActivityRuleZ,
        property: ActivityRuleZ,
        medical: ActivityRuleZ,
        spiritual: ActivityRuleZ,
        haircut: ActivityRuleZ
    })
});
export type MuhurtaRules = z.infer<typeof MuhurtaRulesZ>;
export type MuhurtaActivity = keyof MuhurtaRules['activities'];

export const MUHURTA_RULES: MuhurtaRules = MuhurtaRulesZ.parse(rawRules);

// Chaturthi, Navami, Chaturdashi and the full/new Moon
const AVOIDED_TITHIS = [4, 9, 14, 15];

const AUSPICIOUS_YOGAS = new Set([
    'Preeti', 'Ayushman', 'Saubhagya', 'Shobhana', 'Sukarma', 'Dhriti', 'Vriddhi', 'Dhruva', 'Harshana',
    'Siddhi', 'Variyan', 'Shiva', 'Siddha', 'Sadhya', 'Shubha', 'Shukla', 'Brahma', 'Indra'
]);

// Vishti (Bhadra) and the fixed karanas around the new Moon
const INAUSPICIOUS_KARANAS = new Set(['Vishti', 'Shakuni', 'Chatushpada', 'Nagava']);

const MINUTE_MS = 60000;

// ----------------------------------------------------
// Types
// ----------------------------------------------------

export interface Muhurta {
    number: number;     // 1-30, counted from sunrise
    name: string;
    start: Date;
    end: Date;
    auspicious: boolean;
    isDay: boolean;
}

export type DayBounds = Pick<Panchang, 'sunrise' | 'sunset' | 'nextSunrise'>;
export type ActivityLimbs = Pick<Panchang, 'tithi' | 'nakshatra' | 'yoga' | 'karana' | 'rahuKaal'>;

export type RecommendationLevel = 'excellent' | 'good' | 'fair' | 'avoid';

export interface MuhurtaRecommendation {
    activity: MuhurtaActivity;
    score: number;
    level: RecommendationLevel;
    reasons: string[];
    warnings: string[];
}

// ----------------------------------------------------
// Muhurta periods
// ----------------------------------------------------

function split(
    startMs: number,
    endMs: number,
    names: MuhurtaRules['dayMuhurtas'],
    offset: number,
    isDay: boolean
): Muhurta[] {
    return names.map(({ name, auspicious }, i) => ({
        number: offset + i + 1,
        name,
        start: new Date(startMs + Math.round(((endMs - startMs) * i) / 15)),
        end: new Date(i === 14 ? endMs : startMs + Math.round(((endMs - startMs) * (i + 1)) / 15)),
        auspicious,
        isDay
    }));
}

/** Thirty muhurtas of the day; empty where the Sun does not rise or set. */
export function calculateMuhurtas(day: DayBounds, rules: MuhurtaRules = MUHURTA_RULES): Muhurta[] {
    const { sunrise, sunset, nextSunrise } = day;
    if (!sunrise || !sunset || !nextSunrise) return [];
    return [
        ...split(sunrise.getTime(), sunset.getTime(), rules.dayMuhurtas, 0, true),
        ...split(sunset.getTime(), nextSunrise.getTime(), rules.nightMuhurtas, 15, false)
    ];
}

export function abhijitMuhurta(day: DayBounds): TimeWindow | null {
    if (!day.sunrise || !day.sunset) return null;
    const start = day.sunrise.getTime();
    const length = day.sunset.getTime() - start;
    return {
        start: new Date(start + Math.round((length * 7) / 15)),
        end: new Date(start + Math.round((length * 8) / 15))
    };
}

/** 96 to 48 minutes before sunrise. */
export function brahmaMuhurta(day: DayBounds): TimeWindow | null {
    if (!day.sunrise) return null;
    const sunrise = day.sunrise.getTime();
    return { start: new Date(sunrise - 96 * MINUTE_MS), end: new Date(sunrise - 48 * MINUTE_MS) };
}

export function findMuhurta(muhurtas: Muhurta[], at: Date): Muhurta | null {
    const t = at.getTime();
    return muhurtas.find((muhurta) => t >= muhurta.start.getTime() && t < muhurta.end.getTime()) ?? null;
}

export function nextAuspiciousMuhurta(muhurtas: Muhurta[], after: Date): Muhurta | null {
    return muhurtas.find((muhurta) => muhurta.auspicious && muhurta.start.getTime() > after.getTime()) ?? null;
}

// ----------------------------------------------------
// Activities
// ----------------------------------------------------

export function isTithiFavourable(
    tithi: Pick<Panchang['tithi'], 'index' | 'paksha'>,
    activity: MuhurtaActivity,
    rules: MuhurtaRules = MUHURTA_RULES
): boolean {
    if (tithi.index === 30) {
        return activity === 'spiritual';
    }
    const day = ((tithi.index - 1) % 15) + 1;
    const rule = rules.activities[activity];
    if (rule.tithis === null) {
        return !AVOIDED_TITHIS.includes(day);
    }
    return rule.tithis.includes(day) && (!rule.shuklaOnly || tithi.paksha === 'Shukla');
}

function recommendationLevel(score: number): RecommendationLevel {
    if (score >= 5) return 'excellent';
    if (score >= 3) return 'good';
    if (score >= 1) return 'fair';
    return 'avoid';
}

/**
 * Scores the day's limbs for an activity: +2 for a favourable nakshatra,
 * +2 for a favourable tithi, +1 each for the yoga and karana, and -3 when
 * `at` falls in Rahu Kaal.
 */
export function evaluateActivity(
    limbs: ActivityLimbs,
    activity: MuhurtaActivity,
    at: Date,
    rules: MuhurtaRules = MUHURTA_RULES
): MuhurtaRecommendation {
    const reasons: string[] = [];
    const warnings: string[] = [];
    let score = 0;

    const nakshatra = limbs.nakshatra.name;
    if (rules.activities[activity].nakshatras.includes(nakshatra)) {
        score += 2;
        reasons.push(`${nakshatra} is favorable for ${activity}`);
    } else {
        warnings.push(`${nakshatra} is not ideal for ${activity}`);
    }

    if (isTithiFavourable(limbs.tithi, activity, rules)) {
        score += 2;
        reasons.push(`${limbs.tithi.paksha} ${limbs.tithi.name} is auspicious`);
    }

    if (AUSPICIOUS_YOGAS.has(limbs.yoga.name)) {
        score += 1;
        reasons.push(`${limbs.yoga.name} yoga is favorable`);
    } else {
        warnings.push('Current yoga is not auspicious');
    }

    if (INAUSPICIOUS_KARANAS.has(limbs.karana.name)) {
        warnings.push('Current karana is not favorable');
    } else {
        score += 1;
        reasons.push(`${limbs.karana.name} karana is good`);
    }

    const rahuKaal = limbs.rahuKaal;
    if (rahuKaal && at.getTime() >= rahuKaal.start.getTime() && at.getTime() < rahuKaal.end.getTime()) {
        score -= 3;
        warnings.push('Rahu Kaal is active - avoid important activities');
    }

    return { activity, score, level: recommendationLevel(score), reasons, warnings };
}
