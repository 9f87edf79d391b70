import {
    density,
    pressure,
    pressureAltitude,
    soundSpeed,
    temperature,
    viscosity,
} from './Atmosphere';
import type { AltitudeSolution } from './Atmosphere';
import { SupersonicCasError } from './AtmosphereErrors';
import type { CasSource } from './AtmosphereErrors';
import { FlightCondition, SI_UNITS } from './FlightCondition';
import type { DisplayUnits } from './FlightCondition';
import { parseFlightInput } from './FlightInput';
import type { FlightInput, FlightLevelQuery } from './FlightInput';
import {
    SEA_LEVEL_DENSITY,
    SEA_LEVEL_PRESSURE,
    SEA_LEVEL_SOUND_SPEED,
} from './IsaConstants';
import {
    feetToMeters,
    kelvinToCelsius,
    knotsToMps,
    metersToFeet,
    mpsToKnots,
} from '../utils/units';

export interface SolverConfig {
    /** Altitude tolerance of the pressure-altitude search (m) */
    tolerance: number;
    maxIterations: number;
    /** Log every solve to the console */
    verbose: boolean;
}

export interface SolveOptions {
    /** Temperature deviation from ISA in Kelvin */
    deltaT?: number;
    /** Units of the input values and of the returned condition */
    units?: Partial<DisplayUnits>;
}

// (1 + 0.2·M²)^3.5 − 1: impact pressure over static pressure for subsonic flow
function impactPressureRatio(mach: number): number {
    return Math.pow(1 + 0.2 * mach * mach, 3.5) - 1;
}

// Inverse of impactPressureRatio
function machFromImpactRatio(ratio: number): number {
    return Math.sqrt(5 * (Math.pow(ratio + 1, 2 / 7) - 1));
}

interface SuppliedValues {
    altitude?: number;
    eas?: number;
    cas?: number;
    tas?: number;
}

// Only the pair named by `kind` counts as given, whatever else the object carries
function suppliedValues(input: FlightInput): SuppliedValues {
    switch (input.kind) {
        case 'mach-altitude':
            return { altitude: input.altitude };
        case 'mach-eas':
            return { eas: input.eas };
        case 'mach-cas':
            return { cas: input.cas };
        case 'altitude-eas':
            return { altitude: input.altitude, eas: input.eas };
        case 'altitude-cas':
            return { altitude: input.altitude, cas: input.cas };
        case 'altitude-tas':
            return { altitude: input.altitude, tas: input.tas };
    }
}

/**
 * Resolves a flight level from two independent quantities.
 * Altitude comes either straight from the input or from the static pressure the two speeds imply;
 * everything else follows from the ISA at that altitude.
 */
export class FlightLevelSolver {
    private config: SolverConfig;

    constructor(config: Partial<SolverConfig> = {}) {
        this.config = {
            tolerance: config.tolerance ?? 1e-9,
            maxIterations: config.maxIterations ?? 200,
            verbose: config.verbose ?? false,
        };
    }

    public solve(input: FlightInput, options: SolveOptions = {}): FlightCondition {
        const deltaT = options.deltaT ?? 0;
        const units: DisplayUnits = {
            feet: options.units?.feet ?? SI_UNITS.feet,
            knots: options.units?.knots ?? SI_UNITS.knots,
            celsius: options.units?.celsius ?? SI_UNITS.celsius,
        };
        const given = suppliedValues(input);

        const lengthIn = (value: number): number => (units.feet ? feetToMeters(value) : value);
        const speedIn = (value: number): number => (units.knots ? knotsToMps(value) : value);
        const lengthOut = (value: number): number => (units.feet ? metersToFeet(value) : value);
        const speedOut = (value: number): number => (units.knots ? mpsToKnots(value) : value);

        // Static pressure at the flight level, and the altitude it belongs to
        let altitude: number;
        let staticPressure: number;
        let iterations = 0;
        switch (input.kind) {
            case 'mach-eas': {
                staticPressure = Math.pow(speedIn(input.eas) / SEA_LEVEL_SOUND_SPEED / input.mach, 2) *
                                 SEA_LEVEL_PRESSURE;
                ({ altitude, iterations } = this.solveAltitude(staticPressure));
                break;
            }
            case 'mach-cas': {
                const cas = speedIn(input.cas);
                this.assertSubsonicCas(input.mach, cas, 'input');
                staticPressure = SEA_LEVEL_PRESSURE *
                                 impactPressureRatio(cas / SEA_LEVEL_SOUND_SPEED) /
                                 impactPressureRatio(input.mach);
                ({ altitude, iterations } = this.solveAltitude(staticPressure));
                break;
            }
            default:
                altitude = lengthIn(input.altitude);
                staticPressure = pressure(altitude);
        }

        const temperatureK = temperature(altitude, deltaT);
        const rho = density(altitude, deltaT);
        const mu = viscosity(altitude, deltaT);
        const nu = mu / rho;
        const a = soundSpeed(altitude, deltaT);

        let mach: number;
        switch (input.kind) {
            case 'altitude-tas':
                mach = speedIn(input.tas) / a;
                break;
            case 'altitude-eas':
                mach = speedIn(input.eas) / SEA_LEVEL_SOUND_SPEED * Math.sqrt(SEA_LEVEL_PRESSURE / staticPressure);
                break;
            case 'altitude-cas': {
                const cas = speedIn(input.cas);
                mach = machFromImpactRatio(
                    SEA_LEVEL_PRESSURE / staticPressure * impactPressureRatio(cas / SEA_LEVEL_SOUND_SPEED)
                );
                this.assertSubsonicCas(mach, cas, 'input');
                break;
            }
            default:
                mach = input.mach;
        }

        const tas = given.tas !== undefined ? speedIn(given.tas) : a * mach;
        const eas = given.eas !== undefined ? speedIn(given.eas) : tas * Math.sqrt(rho / SEA_LEVEL_DENSITY);
        let cas: number;
        if (given.cas !== undefined) {
            cas = speedIn(given.cas);
        } else {
            cas = SEA_LEVEL_SOUND_SPEED *
                  machFromImpactRatio(staticPressure / SEA_LEVEL_PRESSURE * impactPressureRatio(mach));
            this.assertSubsonicCas(mach, cas, 'back-fill');
        }

        const dynamicPressure = rho * tas * tas / 2;
        let reynoldsPerLength = tas / nu;
        if (units.feet) {
            reynoldsPerLength /= metersToFeet(1);
        }

        // Caller-supplied values are passed through untouched to avoid round-trip drift
        const condition = new FlightCondition({
            mach,
            altitude: given.altitude ?? lengthOut(altitude),
            eas: given.eas ?? speedOut(eas),
            cas: given.cas ?? speedOut(cas),
            tas: given.tas ?? speedOut(tas),
            soundSpeed: speedOut(a),
            pressure: staticPressure,
            temperature: units.celsius ? kelvinToCelsius(temperatureK) : temperatureK,
            density: rho,
            dynamicViscosity: mu,
            kinematicViscosity: nu,
            dynamicPressure,
            reynoldsPerLength,
            deltaT,
            units,
        });

        if (this.config.verbose) {
            const search = iterations > 0 ? ` (pressure ${staticPressure} Pa, ${iterations} iterations)` : '';
            console.log(
                `FlightLevelSolver: ${input.kind} resolved to ${altitude.toFixed(2)} m, Mach ${mach.toFixed(4)}${search}`
            );
        }

        return condition;
    }

    /**
     * Same as solve, for a query that sets any two of the five quantities
     */
    public solveQuery(query: FlightLevelQuery, options: SolveOptions = {}): FlightCondition {
        return this.solve(parseFlightInput(query), options);
    }

    private solveAltitude(staticPressure: number): AltitudeSolution {
        return pressureAltitude(staticPressure, {
            tolerance: this.config.tolerance,
            maxIterations: this.config.maxIterations,
        });
    }

    private assertSubsonicCas(mach: number, cas: number, source: CasSource): void {
        if (mach > 1 || cas > SEA_LEVEL_SOUND_SPEED) {
            throw new SupersonicCasError(mach, cas, source);
        }
    }
}

const defaultSolver = new FlightLevelSolver();

/**
 * Resolve a flight condition with the default solver configuration
 */
export function solveFlightCondition(input: FlightInput, options: SolveOptions = {}): FlightCondition {
    return defaultSolver.solve(input, options);
}

/**
 * Resolve a flight condition from any two of Mach, altitude, EAS, CAS and TAS
 */
export function flightConditionFrom(query: FlightLevelQuery, options: SolveOptions = {}): FlightCondition {
    return defaultSolver.solveQuery(query, options);
}
