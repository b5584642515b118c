// Angle helpers shared by the astronomy and chart modules

export function radians(degrees: number): number {
    return degrees * Math.PI / 180;
}

export function degrees(radians: number): number {
    return radians * 180 / Math.PI;
}

export function normalize360(angle: number): number {
    const value = ((angle % 360) + 360) % 360;
    // -1e-15 % 360 + 360 rounds to exactly 360
    return value === 360 ? 0 : value;
}

/** Signed difference b - a folded into [-180, 180). */
export function signedDelta(a: number, b: number): number {
    return normalize360(b - a + 180) - 180;
}

/** Unsigned separation of two longitudes, 0..180. */
export function angularDistance(a: number, b: number): number {
    return Math.abs(signedDelta(a, b));
}

/** Forward arc from a to b, 0..360. */
export function forwardArc(from: number, to: number): number {
    return normalize360(to - from);
}

/**
 * floor(value / width) with a small tolerance, so a value that sits on a
 * boundary up to float noise lands in the upper segment.
 */
export function segmentIndex(value: number, width: number, tolerance = 1e-9): number {
    return Math.floor(value / width + tolerance);
}

export function clamp(value: number, min: number, max: number): number {
    return Math.min(max, Math.max(min, value));
}

export const J2000_MS = Date.UTC(2000, 0, 1, 12, 0, 0);
export const JULIAN_YEAR_MS = 365.25 * 24 * 60 * 60 * 1000;

export function yearsSinceJ2000(date: Date): number {
    return (date.getTime() - J2000_MS) / JULIAN_YEAR_MS;
}

export function julianCenturies(date: Date): number {
    return yearsSinceJ2000(date) / 100;
}
