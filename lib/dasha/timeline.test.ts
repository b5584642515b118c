import { describe, it, expect } from 'vitest';
import { InvariantViolation } from '../errors';
import { buildTimeline, rotateFrom, yearsBetween, type DashaLord } from './timeline';

const CYCLE: DashaLord[] = [
    { lord: 'Sun', planet: 'Sun', weight: 1 },
    { lord: 'Moon', planet: 'Moon', weight: 2 }
];

describe('rotateFrom', () => {
    it('begins the cycle at the given lord', () => {
        expect(rotateFrom(CYCLE, 'Moon').map((l) => l.lord)).toEqual(['Moon', 'Sun']);
    });

    it('rejects an unknown lord', () => {
        expect(() => rotateFrom(CYCLE, 'Pluto')).toThrow(InvariantViolation);
    });
});

describe('buildTimeline', () => {
    const timeline = buildTimeline({
        system: 'Vimshottari',
        cycle: CYCLE,
        children: () => CYCLE,
        cycleStartMs: 0,
        depth: 2
    });

    it('splits a level in proportion to the weights', () => {
        expect(timeline.totalYears).toBe(3);
        expect(yearsBetween(timeline.periods[0].start, timeline.periods[0].end)).toBe(1);
        expect(yearsBetween(timeline.periods[1].start, timeline.periods[1].end)).toBe(2);
    });

    it('ends the last child on the parent end', () => {
        const moon = timeline.periods[1];
        expect(moon.subPeriods[1].end.getTime()).toBe(moon.end.getTime());
        expect(moon.subPeriods[0].subPeriods).toEqual([]);
    });

    it('rejects a zero depth', () => {
        expect(() => buildTimeline({ system: 'Yogini', cycle: CYCLE, children: () => CYCLE, cycleStartMs: 0, depth: 0 }))
            .toThrow('Dasha depth must be 1-5, got 0');
    });
});
