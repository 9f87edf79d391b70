import { InvalidInputCountError, InvalidInputPairError } from './AtmosphereErrors';

/**
 * The two independent values that fix a flight level, one variant per supported pair.
 * Values are expressed in the display units requested for the solve.
 */
export type FlightInput =
    | { kind: 'mach-altitude'; mach: number; altitude: number }
    | { kind: 'mach-eas'; mach: number; eas: number }
    | { kind: 'mach-cas'; mach: number; cas: number }
    | { kind: 'altitude-eas'; altitude: number; eas: number }
    | { kind: 'altitude-cas'; altitude: number; cas: number }
    | { kind: 'altitude-tas'; altitude: number; tas: number };

export type FlightInputKind = FlightInput['kind'];

/**
 * Loose form where any of the five quantities may be set
 */
export interface FlightLevelQuery {
    mach?: number | null;
    altitude?: number | null;
    eas?: number | null;
    cas?: number | null;
    tas?: number | null;
}

const QUERY_KEYS = ['mach', 'altitude', 'eas', 'cas', 'tas'] as const;

/**
 * Turn a loose query into one of the six supported input pairs
 */
export function parseFlightInput(query: FlightLevelQuery): FlightInput {
    const provided = QUERY_KEYS.filter(key => query[key] !== undefined && query[key] !== null);
    if (provided.length !== 2) {
        throw new InvalidInputCountError(provided);
    }

    const { mach, altitude, eas, cas, tas } = query;

    if (mach != null) {
        if (altitude != null) return { kind: 'mach-altitude', mach, altitude };
        if (eas != null) return { kind: 'mach-eas', mach, eas };
        if (cas != null) return { kind: 'mach-cas', mach, cas };
    } else if (altitude != null) {
        if (eas != null) return { kind: 'altitude-eas', altitude, eas };
        if (cas != null) return { kind: 'altitude-cas', altitude, cas };
        if (tas != null) return { kind: 'altitude-tas', altitude, tas };
    }

    throw new InvalidInputPairError(provided);
}
