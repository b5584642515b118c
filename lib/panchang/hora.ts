import { SEVEN_PLANETS, type SevenPlanet } from '../jyotish/constants';

// Descending orbital period; each hour passes to the next planet in this list
export const CHALDEAN_ORDER: readonly SevenPlanet[] = ['Saturn', 'Jupiter', 'Mars', 'Sun', 'Venus', 'Mercury', 'Moon'];

export interface HoraPeriod {
    number: number;     // 1-24, counted from sunrise
    lord: SevenPlanet;
    start: Date;
    end: Date;
    isDay: boolean;
}

/** Lord of the hora `index` (0-23) of a day whose weekday (0 = Sunday) lord rules the first hora. */
export function horaLord(weekday: number, index: number): SevenPlanet {
    const first = CHALDEAN_ORDER.indexOf(SEVEN_PLANETS[weekday]);
    return CHALDEAN_ORDER[(first + index) % 7];
}

function split(startMs: number, endMs: number, offset: number, weekday: number, isDay: boolean): HoraPeriod[] {
    const periods: HoraPeriod[] = [];
    for (let i = 0; i < 12; i++) {
        const from = startMs + Math.round(((endMs - startMs) * i) / 12);
        const to = i === 11 ? endMs : startMs + Math.round(((endMs - startMs) * (i + 1)) / 12);
        periods.push({
            number: offset + i + 1,
            lord: horaLord(weekday, offset + i),
            start: new Date(from),
            end: new Date(to),
            isDay
        });
    }
    return periods;
}

/**
 * Twelve day horas from sunrise to sunset, then twelve night horas from
 * sunset to the next sunrise.
 */
export function calculateHoraPeriods(sunrise: Date, sunset: Date, nextSunrise: Date, weekday: number): HoraPeriod[] {
    return [
        ...split(sunrise.getTime(), sunset.getTime(), 0, weekday, true),
        ...split(sunset.getTime(), nextSunrise.getTime(), 12, weekday, false)
    ];
}

export function findHora(periods: HoraPeriod[], at: Date): HoraPeriod | null {
    const t = at.getTime();
    return periods.find((period) => t >= period.start.getTime() && t < period.end.getTime()) ?? null;
}
