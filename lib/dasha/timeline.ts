/**
 * Dasha timeline builder shared by every dasha system.
 *
 * A level is partitioned from cumulative weights, so period k ends on the
 * exact millisecond period k+1 starts, and the last child always ends on its
 * parent's end.
 */

import { JULIAN_YEAR_MS } from '../astronomy/math';
import { assertInvariant } from '../errors';
import type { Planet } from '../jyotish/constants';

export type DashaSystem = 'Vimshottari' | 'Yogini' | 'Ashtottari' | 'Chara';

export const DASHA_LEVELS = ['Mahadasha', 'Antardasha', 'Pratyantardasha', 'Sookshma', 'Prana'] as const;
export type DashaLevelName = typeof DASHA_LEVELS[number];

export const MAX_DASHA_DEPTH = DASHA_LEVELS.length;
export const DASHA_YEAR_MS = JULIAN_YEAR_MS;

export interface DashaPeriod {
    system: DashaSystem;
    level: number;              // 1 = Mahadasha
    levelName: DashaLevelName;
    lord: string;               // planet, yogini or sign name
    planet: Planet;             // ruling planet of the lord
    start: Date;
    end: Date;
    subPeriods: DashaPeriod[];
}

export interface DashaLord {
    lord: string;
    planet: Planet;
    weight: number;             // years for top-level lords
}

export interface DashaBalance {
    lord: string;
    planet: Planet;
    elapsedYears: number;
    remainingYears: number;
}

export interface DashaTimeline {
    system: DashaSystem;
    cycleStart: Date;
    totalYears: number;
    periods: DashaPeriod[];
}

export interface TimelinePlan {
    system: DashaSystem;
    cycle: DashaLord[];
    /** Child lords of a period, in order. */
    children: (parent: DashaLord) => DashaLord[];
    cycleStartMs: number;
    depth: number;
}

function partition(
    plan: TimelinePlan,
    lords: DashaLord[],
    startMs: number,
    endMs: number,
    level: number
): DashaPeriod[] {
    const totalWeight = lords.reduce((sum, lord) => sum + lord.weight, 0);
    const duration = endMs - startMs;
    const periods: DashaPeriod[] = [];

    let cumulative = 0;
    let cursor = startMs;
    lords.forEach((lord, index) => {
        cumulative += lord.weight;
        const boundary = index === lords.length - 1
            ? endMs
            : startMs + Math.round((duration * cumulative) / totalWeight);

        periods.push({
            system: plan.system,
            level,
            levelName: DASHA_LEVELS[level - 1],
            lord: lord.lord,
            planet: lord.planet,
            start: new Date(cursor),
            end: new Date(boundary),
            subPeriods: level < plan.depth
                ? partition(plan, plan.children(lord), cursor, boundary, level + 1)
                : []
        });
        cursor = boundary;
    });

    return periods;
}

export function buildTimeline(plan: TimelinePlan): DashaTimeline {
    assertInvariant(
        Number.isInteger(plan.depth) && plan.depth >= 1 && plan.depth <= MAX_DASHA_DEPTH,
        `Dasha depth must be 1-${MAX_DASHA_DEPTH}, got ${plan.depth}`
    );

    const totalYears = plan.cycle.reduce((sum, lord) => sum + lord.weight, 0);
    const startMs = Math.round(plan.cycleStartMs);
    const endMs = startMs + Math.round(totalYears * DASHA_YEAR_MS);
    const periods = partition(plan, plan.cycle, startMs, endMs, 1);

    validateTimeline(periods);

    return {
        system: plan.system,
        cycleStart: new Date(startMs),
        totalYears,
        periods
    };
}

/** Lords of `cycle` rotated to begin at `lord`. */
export function rotateFrom<T extends { lord: string }>(cycle: readonly T[], lord: string): T[] {
    const index = cycle.findIndex((entry) => entry.lord === lord);
    assertInvariant(index >= 0, `Unknown dasha lord ${lord}`);
    return [...cycle.slice(index), ...cycle.slice(0, index)];
}

/**
 * Checks ordering and contiguity at every level. A failure is a defect in the
 * builder and raises InvariantViolation.
 */
export function validateTimeline(periods: DashaPeriod[], parent?: DashaPeriod): void {
    periods.forEach((period, index) => {
        assertInvariant(
            period.end.getTime() > period.start.getTime(),
            `${period.system} ${period.levelName} ${period.lord} has non-positive duration`
        );
        const next = periods[index + 1];
        if (next) {
            assertInvariant(
                period.end.getTime() === next.start.getTime(),
                `${period.system} ${period.levelName} ${period.lord} is not contiguous with ${next.lord}`
            );
        }
        if (period.subPeriods.length > 0) {
            validateTimeline(period.subPeriods, period);
        }
    });

    if (parent && periods.length > 0) {
        assertInvariant(
            periods[0].start.getTime() === parent.start.getTime()
                && periods[periods.length - 1].end.getTime() === parent.end.getTime(),
            `${parent.system} sub-periods of ${parent.lord} do not cover their parent`
        );
    }
}

export function isPeriodActive(period: DashaPeriod, at: Date): boolean {
    const time = at.getTime();
    return period.start.getTime() <= time && time < period.end.getTime();
}

/** Active period at each level, outermost first. Empty outside the timeline. */
export function findActivePeriods(periods: DashaPeriod[], at: Date): DashaPeriod[] {
    const chain: DashaPeriod[] = [];
    let level = periods;
    for (;;) {
        const active = level.find((period) => isPeriodActive(period, at));
        if (!active) {
            return chain;
        }
        chain.push(active);
        level = active.subPeriods;
    }
}

export function yearsBetween(start: Date, end: Date): number {
    return (end.getTime() - start.getTime()) / DASHA_YEAR_MS;
}
