import type { HouseCusps } from '../astronomy/houses';
import { normalize360 } from '../astronomy/math';
import { buildPlanetPosition, describeLongitude, type GeoLocation, type NatalChart } from '../chart';
import { mapPlanets, type Planet } from '../jyotish/constants';
import { DEFAULT_SETTINGS } from '../settings';

export const TEST_INSTANT = new Date('2000-01-01T06:30:00Z');

export const TEST_LOCATION: GeoLocation = {
    latitude: 28.6139,
    longitude: 77.209,
    timezone: 'Asia/Kolkata'
};

// Aries lagna; Sun exalted, Saturn in its own sign
const DEFAULT_LONGITUDES: Record<Planet, number> = {
    Sun: 15,
    Moon: 75,
    Mars: 135,
    Mercury: 45,
    Jupiter: 225,
    Venus: 285,
    Saturn: 315,
    Rahu: 170,
    Ketu: 350
};

export interface ChartFixture {
    ascendant?: number;
    longitudes?: Partial<Record<Planet, number>>;
    speeds?: Partial<Record<Planet, number>>;
    midheaven?: number;
}

/**
 * Hand-built sidereal chart with whole-sign houses from the ascendant sign.
 * Ketu follows Rahu unless given explicitly.
 */
export function buildTestChart(fixture: ChartFixture = {}): NatalChart {
    const ascendant = describeLongitude(fixture.ascendant ?? 5);
    const houses: HouseCusps = {
        system: 'WholeSign',
        requested: 'WholeSign',
        cusps: Array.from({ length: 12 }, (_, i) => ((ascendant.sign + i) % 12) * 30)
    };

    const longitudes: Record<Planet, number> = { ...DEFAULT_LONGITUDES, ...fixture.longitudes };
    if (fixture.longitudes?.Rahu !== undefined && fixture.longitudes.Ketu === undefined) {
        longitudes.Ketu = normalize360(longitudes.Rahu + 180);
    }

    const defaultSpeed = (planet: Planet) => (planet === 'Rahu' || planet === 'Ketu' ? -0.053 : 1);

    return {
        instant: TEST_INSTANT,
        location: TEST_LOCATION,
        settings: DEFAULT_SETTINGS,
        ayanamsa: 23.85,
        ascendant,
        midheaven: normalize360(fixture.midheaven ?? ascendant.longitude + 270),
        houses,
        planets: mapPlanets((planet) =>
            buildPlanetPosition(planet, longitudes[planet], fixture.speeds?.[planet] ?? defaultSpeed(planet), houses)
        )
    };
}
