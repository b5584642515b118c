import { describe, it, expect } from 'vitest';
import { buildTestChart } from '../testing/fixtures';
import { activeDoshas } from './engine';
import { detectDoshas } from './doshas';

const find = (longitudes: Parameters<typeof buildTestChart>[0], id: string) =>
    detectDoshas(buildTestChart(longitudes)).find((dosha) => dosha.id === id);

describe('detectDoshas', () => {
    it('finds only Pitra dosha in the default chart', () => {
        const doshas = detectDoshas(buildTestChart());
        expect(doshas.map((dosha) => dosha.id)).toEqual(['pitra']);
        expect(doshas[0]).toMatchObject({
            severity: 'medium',
            description: 'Saturn aspects the Sun.',
            planets: ['Sun', 'Saturn'],
            cancelled: false,
            cancellationReason: null,
            nature: 'malefic'
        });
    });
});

describe('Manglik dosha', () => {
    it.each([10, 100, 190, 220, 340])('is flagged for Mars at %d°', (mars) => {
        expect(find({ longitudes: { Mars: mars } }, 'manglik')).toBeDefined();
    });

    it.each([40, 70, 130, 160, 250, 280, 310])('is absent for Mars at %d°', (mars) => {
        expect(find({ longitudes: { Mars: mars } }, 'manglik')).toBeUndefined();
    });

    it('is high when Mars is also afflicting from Venus', () => {
        const manglik = find({ longitudes: { Mars: 105, Jupiter: 255 } }, 'manglik');
        expect(manglik).toMatchObject({
            severity: 'high',
            cancelled: false,
            description: 'Mars in house 4 from the ascendant.'
        });
    });

    it('is cancelled for Mars in its own sign', () => {
        const manglik = find({ longitudes: { Mars: 220 } }, 'manglik');
        expect(manglik).toMatchObject({ cancelled: true, cancellationReason: 'Mars is in its own sign' });
    });

    it('is cancelled for Mars exalted', () => {
        expect(find({ longitudes: { Mars: 280 } }, 'manglik')?.cancellationReason).toBe('Mars is exalted');
    });

    it('is cancelled when Jupiter joins Mars', () => {
        const manglik = find({ longitudes: { Mars: 100, Jupiter: 95 } }, 'manglik');
        expect(manglik?.cancellationReason).toBe('Jupiter conjoins Mars');
    });

    it('is cancelled when Jupiter aspects Mars', () => {
        // Jupiter in Capricorn casts its 7th aspect on Cancer
        const manglik = find({ longitudes: { Mars: 100, Jupiter: 280 } }, 'manglik');
        expect(manglik?.cancellationReason).toBe('Jupiter aspects Mars');
    });
});

describe('Kaal Sarp dosha', () => {
    it('is full when all seven planets lie on one side of the nodes', () => {
        const kaalSarp = find({
            longitudes: { Sun: 200, Moon: 210, Mars: 220, Mercury: 230, Jupiter: 240, Venus: 250, Saturn: 260 }
        }, 'kaal-sarp');
        expect(kaalSarp).toMatchObject({ name: 'Kaal Sarp Dosha', severity: 'high', planets: ['Rahu', 'Ketu'] });
    });

    it('is partial when five or six planets are hemmed', () => {
        const kaalSarp = find({ longitudes: { Jupiter: 100 } }, 'kaal-sarp');
        expect(kaalSarp).toMatchObject({
            name: 'Partial Kaal Sarp Dosha',
            severity: 'low',
            description: '5 of seven planets lie on one side of the Rahu-Ketu axis.'
        });
    });

    it('is absent with planets spread across the axis', () => {
        expect(find({}, 'kaal-sarp')).toBeUndefined();
    });
});

describe('Kemdrum dosha', () => {
    it('is flagged with the 2nd and 12th from the Moon empty', () => {
        const kemdrum = find({ longitudes: { Mercury: 15 } }, 'kemdrum');
        expect(kemdrum).toMatchObject({ cancelled: false, severity: 'medium', planets: ['Moon'] });
    });

    it('is cancelled by a planet in a kendra from the Moon', () => {
        const kemdrum = find({ longitudes: { Mercury: 15, Jupiter: 255 } }, 'kemdrum');
        expect(kemdrum).toMatchObject({ cancelled: true, cancellationReason: 'Jupiter in a kendra from the Moon' });
    });

    it('is dropped by activeDoshas once cancelled', () => {
        const doshas = detectDoshas(buildTestChart({ longitudes: { Mercury: 15, Jupiter: 255 } }));
        expect(doshas.map((dosha) => dosha.id)).toContain('kemdrum');
        expect(activeDoshas(doshas).map((dosha) => dosha.id)).not.toContain('kemdrum');
    });
});

describe('node and nakshatra doshas', () => {
    it('flags Grahan dosha for the Sun near Rahu', () => {
        const grahan = find({ longitudes: { Sun: 165 } }, 'grahan');
        expect(grahan).toMatchObject({
            severity: 'medium',
            description: 'Sun within 12° of a lunar node.',
            planets: ['Sun', 'Rahu', 'Ketu']
        });
    });

    it('flags Guru Chandal dosha for Jupiter with Rahu', () => {
        expect(find({ longitudes: { Jupiter: 175 } }, 'guru-chandal')?.cancelled).toBe(false);
    });

    it('cancels Guru Chandal dosha for Jupiter in its own sign', () => {
        const guruChandal = find({ longitudes: { Jupiter: 260, Rahu: 255 } }, 'guru-chandal');
        expect(guruChandal?.cancellationReason).toBe('Jupiter in its own or exaltation sign');
    });

    it('flags Shrapit dosha for Saturn with Rahu', () => {
        expect(find({ longitudes: { Saturn: 160 } }, 'shrapit')?.severity).toBe('high');
    });

    it('rates Gandmool by pada', () => {
        expect(find({ longitudes: { Moon: 1 } }, 'gandmool')).toMatchObject({
            severity: 'high',
            description: 'Moon in Ashwini pada 1.'
        });
        expect(find({ longitudes: { Moon: 5 } }, 'gandmool')?.severity).toBe('low');
        expect(find({}, 'gandmool')).toBeUndefined();
    });
});
