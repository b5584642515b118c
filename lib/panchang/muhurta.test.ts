import { describe, it, expect } from 'vitest';
import { generatePanchang } from './index';
import {
    MUHURTA_RULES,
    abhijitMuhurta,
    brahmaMuhurta,
    calculateMuhurtas,
    evaluateActivity,
    findMuhurta,
    isTithiFavourable,
    nextAuspiciousMuhurta,
    type ActivityLimbs
} from './muhurta';

// A 15-hour day gives one-hour day muhurtas; the 9-hour night gives 36 minutes each
const DAY = {
    sunrise: new Date('2024-01-15T00:00:00Z'),
    sunset: new Date('2024-01-15T15:00:00Z'),
    nextSunrise: new Date('2024-01-16T00:00:00Z')
};

const ENDS = new Date('2024-01-16T00:00:00Z');

function limbs(overrides: Partial<ActivityLimbs> = {}): ActivityLimbs {
    return {
        tithi: { index: 2, name: 'Dwitiya', paksha: 'Shukla', fraction: 0.5, endsAt: ENDS },
        nakshatra: { index: 4, name: 'Rohini', lord: 'Moon', pada: 2, endsAt: ENDS },
        yoga: { index: 2, name: 'Preeti', endsAt: ENDS },
        karana: { index: 3, name: 'Balava' },
        rahuKaal: { start: new Date('2024-01-15T08:00:00Z'), end: new Date('2024-01-15T09:30:00Z') },
        ...overrides
    };
}

describe('calculateMuhurtas', () => {
    const muhurtas = calculateMuhurtas(DAY);

    it('splits day and night into fifteen muhurtas each', () => {
        expect(muhurtas).toHaveLength(30);
        expect(muhurtas[0]).toEqual({
            number: 1,
            name: 'Rudra',
            start: new Date('2024-01-15T00:00:00Z'),
            end: new Date('2024-01-15T01:00:00Z'),
            auspicious: false,
            isDay: true
        });
        expect(muhurtas[15]).toEqual({
            number: 16,
            name: 'Shiva',
            start: new Date('2024-01-15T15:00:00Z'),
            end: new Date('2024-01-15T15:36:00Z'),
            auspicious: true,
            isDay: false
        });
        expect(muhurtas[29].end).toEqual(DAY.nextSunrise);
    });

    it('places Abhijit eighth in the day', () => {
        expect(muhurtas[7].name).toBe('Abhijit');
        expect(abhijitMuhurta(DAY)).toEqual({
            start: new Date('2024-01-15T07:00:00Z'),
            end: new Date('2024-01-15T08:00:00Z')
        });
    });

    it('puts Brahma muhurta 96 to 48 minutes before sunrise', () => {
        expect(brahmaMuhurta(DAY)).toEqual({
            start: new Date('2024-01-14T22:24:00Z'),
            end: new Date('2024-01-14T23:12:00Z')
        });
    });

    it('finds the muhurta in force', () => {
        expect(findMuhurta(muhurtas, new Date('2024-01-15T07:30:00Z'))?.name).toBe('Abhijit');
        expect(findMuhurta(muhurtas, new Date('2024-01-15T15:40:00Z'))?.number).toBe(17);
        expect(findMuhurta(muhurtas, new Date('2024-01-14T23:00:00Z'))).toBeNull();
    });

    it('skips inauspicious muhurtas when looking ahead', () => {
        expect(nextAuspiciousMuhurta(muhurtas, new Date('2024-01-15T00:30:00Z'))?.name).toBe('Mitra');
        expect(nextAuspiciousMuhurta(muhurtas, new Date('2024-01-15T10:30:00Z'))?.name).toBe('Varuna');
    });

    it('is empty without sun events', () => {
        expect(calculateMuhurtas({ ...DAY, sunrise: null })).toEqual([]);
        expect(abhijitMuhurta({ ...DAY, sunset: null })).toBeNull();
        expect(brahmaMuhurta({ ...DAY, sunrise: null })).toBeNull();
    });

    it('follows the Panchang day at New Delhi', () => {
        const panchang = generatePanchang(new Date('2024-01-15T06:30:00Z'), 28.6139, 77.209, 'Asia/Kolkata');
        const day = calculateMuhurtas(panchang);
        expect(day[0].start).toEqual(panchang.sunrise);
        expect(day[15].start).toEqual(panchang.sunset);
        expect(day[29].end).toEqual(panchang.nextSunrise);
    });
});

describe('isTithiFavourable', () => {
    it('keeps Amavasya for spiritual work only', () => {
        expect(isTithiFavourable({ index: 30, paksha: 'Krishna' }, 'spiritual')).toBe(true);
        expect(isTithiFavourable({ index: 30, paksha: 'Krishna' }, 'travel')).toBe(false);
    });

    it('takes marriage tithis from the bright half only', () => {
        expect(isTithiFavourable({ index: 2, paksha: 'Shukla' }, 'marriage')).toBe(true);
        expect(isTithiFavourable({ index: 17, paksha: 'Krishna' }, 'marriage')).toBe(false);
        expect(isTithiFavourable({ index: 17, paksha: 'Krishna' }, 'travel')).toBe(true);
    });

    it('avoids the rikta tithis where an activity lists none', () => {
        expect(MUHURTA_RULES.activities.education.tithis).toBeNull();
        expect(isTithiFavourable({ index: 4, paksha: 'Shukla' }, 'education')).toBe(false);
        expect(isTithiFavourable({ index: 5, paksha: 'Shukla' }, 'education')).toBe(true);
        expect(isTithiFavourable({ index: 15, paksha: 'Shukla' }, 'haircut')).toBe(false);
    });

    it('allows Purnima for spiritual work', () => {
        expect(isTithiFavourable({ index: 15, paksha: 'Shukla' }, 'spiritual')).toBe(true);
    });
});

describe('evaluateActivity', () => {
    it('rates a day with every limb favourable as excellent', () => {
        expect(evaluateActivity(limbs(), 'marriage', new Date('2024-01-15T10:00:00Z'))).toEqual({
            activity: 'marriage',
            score: 6,
            level: 'excellent',
            reasons: [
                'Rohini is favorable for marriage',
                'Shukla Dwitiya is auspicious',
                'Preeti yoga is favorable',
                'Balava karana is good'
            ],
            warnings: []
        });
    });

    it('takes three points inside Rahu Kaal', () => {
        const recommendation = evaluateActivity(limbs(), 'marriage', new Date('2024-01-15T08:30:00Z'));
        expect(recommendation.score).toBe(3);
        expect(recommendation.level).toBe('good');
        expect(recommendation.warnings).toEqual(['Rahu Kaal is active - avoid important activities']);
    });

    it('advises against a day with no favourable limb', () => {
        const day = limbs({
            tithi: { index: 4, name: 'Chaturthi', paksha: 'Shukla', fraction: 0.5, endsAt: ENDS },
            nakshatra: { index: 2, name: 'Bharani', lord: 'Venus', pada: 1, endsAt: ENDS },
            yoga: { index: 13, name: 'Vyaghata', endsAt: ENDS },
            karana: { index: 8, name: 'Vishti' }
        });
        expect(evaluateActivity(day, 'travel', new Date('2024-01-15T09:00:00Z'))).toEqual({
            activity: 'travel',
            score: -3,
            level: 'avoid',
            reasons: [],
            warnings: [
                'Bharani is not ideal for travel',
                'Current yoga is not auspicious',
                'Current karana is not favorable',
                'Rahu Kaal is active - avoid important activities'
            ]
        });
    });
});
