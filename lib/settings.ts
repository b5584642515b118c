import { z } from 'zod';
import { InvalidBirthDetails, UnsupportedConfiguration } from './errors';
import { isValidTimeZone, toUtcDate } from './time';

// ---- Calculation settings ----

export const AyanamsaZ = z.enum(['Lahiri', 'Raman', 'Krishnamurti', 'FaganBradley', 'TrueChitrapaksha']);
export type AyanamsaSystem = z.infer<typeof AyanamsaZ>;

export const HouseSystemZ = z.enum(['WholeSign', 'Equal', 'Placidus', 'Koch', 'Sripati', 'BhavaChalita']);
export type HouseSystem = z.infer<typeof HouseSystemZ>;

export const NodeModeZ = z.enum(['Mean', 'True']);
export type NodeMode = z.infer<typeof NodeModeZ>;

export const CalculationSettingsZ = z.object({
    ayanamsa: AyanamsaZ.default('Lahiri'),
    houseSystem: HouseSystemZ.default('Equal'),
    nodeMode: NodeModeZ.default('Mean'),
});

export type CalculationSettings = z.infer<typeof CalculationSettingsZ>;

export const DEFAULT_SETTINGS: CalculationSettings = CalculationSettingsZ.parse({});

export const KP_SETTINGS: CalculationSettings = {
    ayanamsa: 'Krishnamurti',
    houseSystem: 'Placidus',
    nodeMode: 'Mean',
};

export function parseSettings(input: unknown = {}): CalculationSettings {
    const result = CalculationSettingsZ.safeParse(input);
    if (!result.success) {
        const issue = result.error.issues[0];
        const setting = issue ? issue.path.join('.') : 'settings';
        const value = issue && typeof input === 'object' && input !== null
            ? Reflect.get(input, setting)
            : input;
        throw new UnsupportedConfiguration(setting, value);
    }
    return result.data;
}

// ---- Engine configuration ----

export const EngineConfigZ = z.object({
    ephemerisRange: z.object({
        minYear: z.number().int().default(1700),
        maxYear: z.number().int().default(2200),
    }).default({}),
    dashaDepth: z.number().int().min(1).max(5).default(3),
    transitTimelineMonths: z.number().int().min(1).max(120).default(12),
});

export type EngineConfig = z.infer<typeof EngineConfigZ>;

export const DEFAULT_ENGINE_CONFIG: EngineConfig = EngineConfigZ.parse({});

/**
 * Build an EngineConfig from environment variables. Unset variables keep
 * their defaults; malformed ones are rejected by the schema.
 */
export function loadEngineConfig(env: Record<string, string | undefined>): EngineConfig {
    const numeric = (value: string | undefined) => (value === undefined || value === '' ? undefined : Number(value));

    return EngineConfigZ.parse({
        ephemerisRange: {
            minYear: numeric(env.KUNDLI_EPHEMERIS_MIN_YEAR),
            maxYear: numeric(env.KUNDLI_EPHEMERIS_MAX_YEAR),
        },
        dashaDepth: numeric(env.KUNDLI_DASHA_DEPTH),
        transitTimelineMonths: numeric(env.KUNDLI_TRANSIT_MONTHS),
    });
}

// ---- Birth details ----

const DATE_PATTERN = /^(\d{4})-(\d{2})-(\d{2})$/;
const TIME_PATTERN = /^(\d{2}):(\d{2})(?::(\d{2}))?$/;

export const GenderZ = z.enum(['Male', 'Female', 'Other']);
export type Gender = z.infer<typeof GenderZ>;

export const BirthDetailsZ = z.object({
    name: z.string().trim().min(1, 'name must not be empty'),
    date: z.string().regex(DATE_PATTERN, 'date must be YYYY-MM-DD'),
    time: z.string().regex(TIME_PATTERN, 'time must be HH:mm or HH:mm:ss'),
    latitude: z.number().finite().min(-90).max(90),
    longitude: z.number().finite().min(-180).max(180),
    timezone: z.string().refine(isValidTimeZone, 'timezone must be a valid IANA identifier'),
    gender: GenderZ.default('Other'),
    city: z.string().optional(),
}).superRefine((value, ctx) => {
    const dateMatch = DATE_PATTERN.exec(value.date);
    if (dateMatch) {
        const [year, month, day] = [Number(dateMatch[1]), Number(dateMatch[2]), Number(dateMatch[3])];
        const probe = new Date(Date.UTC(year, month - 1, day));
        if (probe.getUTCFullYear() !== year || probe.getUTCMonth() !== month - 1 || probe.getUTCDate() !== day) {
            ctx.addIssue({ code: z.ZodIssueCode.custom, path: ['date'], message: 'date is not a calendar date' });
        }
    }
    const timeMatch = TIME_PATTERN.exec(value.time);
    if (timeMatch) {
        const hour = Number(timeMatch[1]);
        const minute = Number(timeMatch[2]);
        const second = timeMatch[3] === undefined ? 0 : Number(timeMatch[3]);
        if (hour > 23 || minute > 59 || second > 59) {
            ctx.addIssue({ code: z.ZodIssueCode.custom, path: ['time'], message: 'time is out of range' });
        }
    }
});

export type BirthDetails = z.infer<typeof BirthDetailsZ>;
export type BirthDetailsInput = z.input<typeof BirthDetailsZ>;

export function parseBirthDetails(input: unknown): BirthDetails {
    const result = BirthDetailsZ.safeParse(input);
    if (!result.success) {
        const errors = result.error.issues.map((issue) => {
            const path = issue.path.join('.');
            return path ? `${path}: ${issue.message}` : issue.message;
        });
        throw new InvalidBirthDetails(errors);
    }
    return result.data;
}

/** Civil birth date/time in the birth time zone, as a UTC instant. */
export function birthInstant(details: BirthDetails): Date {
    const [year, month, day] = details.date.split('-').map(Number);
    const [hour, minute, second = 0] = details.time.split(':').map(Number);
    return toUtcDate(year, month, day, hour, minute, second, details.timezone);
}
