export const METERS_PER_FOOT = 0.3048;
export const MPS_PER_KNOT = 0.5144444;
export const KELVIN_OFFSET = 273.15;

/** Convert feet to meters */
export function feetToMeters(feet: number): number {
    return feet * METERS_PER_FOOT;
}

/** Convert meters to feet */
export function metersToFeet(meters: number): number {
    return meters / METERS_PER_FOOT;
}

/** Convert knots to meters per second */
export function knotsToMps(knots: number): number {
    return knots * MPS_PER_KNOT;
}

/** Convert meters per second to knots */
export function mpsToKnots(mps: number): number {
    return mps / MPS_PER_KNOT;
}

export function kelvinToCelsius(kelvin: number): number {
    return kelvin - KELVIN_OFFSET;
}

export function celsiusToKelvin(celsius: number): number {
    return celsius + KELVIN_OFFSET;
}
