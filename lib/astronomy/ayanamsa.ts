import { UnsupportedConfiguration } from '../errors';
import type { AyanamsaSystem } from '../settings';
import { julianCenturies, normalize360, radians, yearsSinceJ2000 } from './math';

// Sidereal = Tropical - Ayanamsa.
// Each system is a linear model anchored at J2000 with its own epoch value.

export interface AyanamsaConfig {
    name: string;
    valueAtJ2000: number;   // degrees
    ratePerYear: number;    // degrees per Julian year
    withNutation: boolean;
}

const PRECESSION_RATE = 50.2875 / 3600;

export const AYANAMSA_CONFIGS: Record<AyanamsaSystem, AyanamsaConfig> = {
    Lahiri: { name: 'Lahiri (Chitrapaksha)', valueAtJ2000: 23.85306, ratePerYear: PRECESSION_RATE, withNutation: false },
    Raman: { name: 'B.V. Raman', valueAtJ2000: 22.41, ratePerYear: PRECESSION_RATE, withNutation: false },
    Krishnamurti: { name: 'Krishnamurti (KP)', valueAtJ2000: 23.7574, ratePerYear: PRECESSION_RATE, withNutation: false },
    FaganBradley: { name: 'Fagan-Bradley', valueAtJ2000: 24.7403, ratePerYear: PRECESSION_RATE, withNutation: false },
    TrueChitrapaksha: { name: 'True Chitrapaksha', valueAtJ2000: 23.85306, ratePerYear: PRECESSION_RATE, withNutation: true }
};

/** Nutation in longitude in degrees (low-precision series). */
export function nutationInLongitude(date: Date): number {
    const T = julianCenturies(date);
    const omega = radians(125.04452 - 1934.136261 * T);
    const sunMean = radians(280.4665 + 36000.7698 * T);
    const moonMean = radians(218.3165 + 481267.8813 * T);

    const arcsec = -17.2 * Math.sin(omega)
        - 1.32 * Math.sin(2 * sunMean)
        - 0.23 * Math.sin(2 * moonMean)
        + 0.21 * Math.sin(2 * omega);

    return arcsec / 3600;
}

export function getAyanamsa(date: Date, system: AyanamsaSystem): number {
    const config = AYANAMSA_CONFIGS[system];
    if (!config) {
        throw new UnsupportedConfiguration('ayanamsa', system);
    }

    const value = config.valueAtJ2000 + yearsSinceJ2000(date) * config.ratePerYear;
    return config.withNutation ? value + nutationInLongitude(date) : value;
}

export function toSidereal(tropicalLongitude: number, date: Date, system: AyanamsaSystem): number {
    return normalize360(tropicalLongitude - getAyanamsa(date, system));
}
