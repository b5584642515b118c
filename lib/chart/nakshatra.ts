import { segmentIndex } from '../astronomy/math';
import {
    NAKSHATRAS,
    NAKSHATRA_SPAN,
    PADA_SPAN,
    nakshatraLord,
    type NakshatraName,
    type Planet
} from '../jyotish/constants';

export interface NakshatraPosition {
    index: number;          // 0-26
    name: NakshatraName;
    lord: Planet;
    pada: number;           // 1-4
    fraction: number;       // portion of the nakshatra already traversed, 0..1
}

export function nakshatraOf(longitude: number): NakshatraPosition {
    const index = Math.min(segmentIndex(longitude, NAKSHATRA_SPAN), 26);
    const remainder = Math.max(0, longitude - index * NAKSHATRA_SPAN);
    const pada = Math.min(Math.max(segmentIndex(remainder, PADA_SPAN) + 1, 1), 4);

    return {
        index,
        name: NAKSHATRAS[index],
        lord: nakshatraLord(index),
        pada,
        fraction: Math.min(remainder / NAKSHATRA_SPAN, 1)
    };
}
