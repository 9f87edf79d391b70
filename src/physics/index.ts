/**
 * Physics Module - International Standard Atmosphere and flight levels
 *
 * The atmosphere functions take altitudes in meters and an optional temperature
 * deviation in Kelvin, and return SI values. The flight level solver builds a
 * complete FlightCondition from any supported pair of Mach, altitude, EAS, CAS and TAS.
 */

export * from './IsaConstants';

export {
    getLayers,
    layerIndex,
    temperature,
    pressure,
    density,
    viscosity,
    soundSpeed,
    kinematicViscosity,
    reynoldsNumber,
    getProperties,
    pressureAltitude,
    densityAltitude,
} from './Atmosphere';
export type { AtmosphereLayer, AtmosphericProperties, AltitudeSolution } from './Atmosphere';

export {
    AtmosphereError,
    OutOfRangeError,
    InvalidInputCountError,
    InvalidInputPairError,
    AltitudeSolveError,
    SupersonicCasError,
} from './AtmosphereErrors';

export { parseFlightInput } from './FlightInput';
export type { FlightInput, FlightInputKind, FlightLevelQuery } from './FlightInput';

export { FlightCondition, SI_UNITS } from './FlightCondition';
export type { DisplayUnits, FlightConditionProps } from './FlightCondition';

export { FlightLevelSolver, solveFlightCondition, flightConditionFrom } from './FlightLevelSolver';
export type { SolverConfig, SolveOptions } from './FlightLevelSolver';

/**
 * Quick Start Example:
 *
 * ```typescript
 * import { flightConditionFrom, solveFlightCondition } from './physics';
 *
 * // Cruise at FL350, Mach 0.78, displayed in feet / knots / Celsius
 * const cruise = flightConditionFrom(
 *     { altitude: 35000, mach: 0.78 },
 *     { units: { feet: true, knots: true, celsius: true } }
 * );
 * console.log(`CAS: ${cruise.cas.toFixed(1)} kts`);
 *
 * // Same thing with the typed input
 * const hot = solveFlightCondition({ kind: 'altitude-tas', altitude: 3000, tas: 120 }, { deltaT: 15 });
 * console.log(`Mach: ${hot.mach.toFixed(3)}`);
 * ```
 */
