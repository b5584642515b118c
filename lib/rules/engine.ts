/**
 * Rule evaluation
 *
 * Yogas and doshas are fixed arrays of rule descriptors. Each rule is a pure
 * predicate over the natal chart; evaluation iterates the array and isolates
 * every rule, so one failing rule is logged and counted as "no detection".
 */

import type { NatalChart } from '../chart';
import type { Planet } from '../jyotish/constants';

export type Nature = 'benefic' | 'malefic' | 'neutral';
export type YogaStrength = 'strong' | 'moderate' | 'weak';
export type DoshaSeverity = 'high' | 'medium' | 'low';

export interface Yoga {
    id: string;
    name: string;
    sanskritName: string;
    nature: Nature;
    strength: YogaStrength;
    description: string;
    planets: Planet[];
}

export interface Dosha {
    id: string;
    name: string;
    sanskritName: string;
    nature: Nature;
    severity: DoshaSeverity;
    cancelled: boolean;
    cancellationReason: string | null;
    description: string;
    planets: Planet[];
}

export interface RuleDescriptor<T> {
    id: string;
    kind: 'yoga' | 'dosha';
    evaluate: (chart: NatalChart) => T | null;
}

export function evaluateRules<T>(rules: ReadonlyArray<RuleDescriptor<T>>, chart: NatalChart): T[] {
    const detections: T[] = [];
    for (const rule of rules) {
        try {
            const result = rule.evaluate(chart);
            if (result !== null) {
                detections.push(result);
            }
        } catch (error) {
            console.error(`[Rules] ${rule.kind} rule "${rule.id}" failed:`, error);
        }
    }
    return detections;
}

export function activeDoshas(doshas: Dosha[]): Dosha[] {
    return doshas.filter((dosha) => !dosha.cancelled);
}
