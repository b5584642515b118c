import { describe, it, expect } from 'vitest';
import { buildTestChart } from '../testing/fixtures';
import { detectYogas, yogaStrength } from './yogas';

const find = (yogas: ReturnType<typeof detectYogas>, id: string) => yogas.find((yoga) => yoga.id === id);

describe('detectYogas', () => {
    it('detects the yogas of the default chart in catalog order', () => {
        const yogas = detectYogas(buildTestChart());
        expect(yogas.map((yoga) => yoga.id)).toEqual(['anapha', 'vesi', 'adhi', 'viparita-raja', 'parivartana', 'amala']);
    });

    it('reports planets and strength for each detection', () => {
        const yogas = detectYogas(buildTestChart());
        expect(find(yogas, 'anapha')?.planets).toEqual(['Moon', 'Mercury']);
        expect(find(yogas, 'adhi')).toMatchObject({ planets: ['Jupiter', 'Venus'], strength: 'moderate' });
        expect(find(yogas, 'viparita-raja')?.planets).toEqual(['Jupiter']);
        expect(find(yogas, 'parivartana')).toMatchObject({
            description: 'Sign exchange: Sun-Mars.',
            planets: ['Sun', 'Mars'],
            strength: 'strong',
            nature: 'benefic'
        });
    });

    it('detects Sasa for Saturn exalted in the 7th', () => {
        const sasa = find(detectYogas(buildTestChart({ longitudes: { Saturn: 195 } })), 'sasa');
        expect(sasa).toMatchObject({ name: 'Sasa Yoga', strength: 'strong', planets: ['Saturn'] });
    });

    it('detects Hamsa for Jupiter exalted in the 4th', () => {
        const hamsa = find(detectYogas(buildTestChart({ longitudes: { Jupiter: 100 } })), 'hamsa');
        expect(hamsa?.strength).toBe('strong');
    });

    it('skips a mahapurusha planet in its own sign outside a kendra', () => {
        // Saturn in Aquarius is the 11th house
        expect(find(detectYogas(buildTestChart()), 'sasa')).toBeUndefined();
    });

    it('detects Gaja Kesari for Jupiter in a kendra from the Moon', () => {
        const gaja = find(detectYogas(buildTestChart({ longitudes: { Jupiter: 255 } })), 'gaja-kesari');
        expect(gaja).toMatchObject({
            description: 'Jupiter in house 7 from the Moon.',
            planets: ['Moon', 'Jupiter'],
            strength: 'moderate'
        });
    });

    it('detects Budhaditya for Sun and Mercury together', () => {
        const budhaditya = find(detectYogas(buildTestChart({ longitudes: { Mercury: 20 } })), 'budhaditya');
        expect(budhaditya).toMatchObject({ planets: ['Sun', 'Mercury'], strength: 'strong' });
    });

    it('detects Raja yoga for a kendra lord joining a trikona lord', () => {
        const raja = find(detectYogas(buildTestChart({ longitudes: { Mars: 20 } })), 'raja');
        expect(raja).toMatchObject({
            description: 'Kendra and trikona lords together: Mars-Sun.',
            strength: 'strong'
        });
    });
});

describe('yogaStrength', () => {
    const chart = buildTestChart({ longitudes: { Moon: 215 } });

    it('is strong with an exalted participant', () => {
        expect(yogaStrength(chart, ['Sun', 'Moon'])).toBe('strong');
    });

    it('is weak with a debilitated participant and none exalted', () => {
        expect(yogaStrength(chart, ['Moon', 'Mars'])).toBe('weak');
    });

    it('is moderate otherwise', () => {
        expect(yogaStrength(chart, ['Mars', 'Mercury'])).toBe('moderate');
    });
});
