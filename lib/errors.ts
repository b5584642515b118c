/**
 * Error taxonomy for the calculation core.
 *
 * - InvalidBirthDetails: rejected input, raised before any computation
 * - DateOutOfEphemerisRange: instant outside the configured ephemeris span
 * - UnsupportedConfiguration: unknown ayanamsa / house system / node mode
 * - InvariantViolation: internal consistency failure (a defect)
 */

export type KundliErrorCode =
    | 'INVALID_BIRTH_DETAILS'
    | 'DATE_OUT_OF_EPHEMERIS_RANGE'
    | 'UNSUPPORTED_CONFIGURATION'
    | 'INVARIANT_VIOLATION';

export class KundliError extends Error {
    readonly code: KundliErrorCode;

    constructor(code: KundliErrorCode, message: string) {
        super(message);
        this.name = new.target.name;
        this.code = code;
    }
}

export class InvalidBirthDetails extends KundliError {
    readonly errors: string[];

    constructor(errors: string[]) {
        super('INVALID_BIRTH_DETAILS', `Invalid birth details: ${errors.join('; ')}`);
        this.errors = errors;
    }
}

export class DateOutOfEphemerisRange extends KundliError {
    readonly instant: Date;

    constructor(instant: Date, minYear: number, maxYear: number) {
        super(
            'DATE_OUT_OF_EPHEMERIS_RANGE',
            `${instant.toISOString()} is outside the supported ephemeris range ${minYear}-${maxYear}`
        );
        this.instant = instant;
    }
}

export class UnsupportedConfiguration extends KundliError {
    constructor(setting: string, value: unknown) {
        super('UNSUPPORTED_CONFIGURATION', `Unsupported ${setting}: ${String(value)}`);
    }
}

export class InvariantViolation extends KundliError {
    constructor(message: string) {
        super('INVARIANT_VIOLATION', message);
    }
}

export function assertInvariant(condition: boolean, message: string): asserts condition {
    if (!condition) {
        throw new InvariantViolation(message);
    }
}
