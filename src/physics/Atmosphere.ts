import {
    GAMMA,
    GAS_CONSTANT,
    GRAVITY,
    LAYER_BASE_ALTITUDES,
    LAYER_LAPSE_RATES,
    MAX_ALTITUDE,
    MIN_ALTITUDE,
    SEA_LEVEL_DENSITY,
    SEA_LEVEL_PRESSURE,
    SEA_LEVEL_TEMPERATURE,
    SEA_LEVEL_VISCOSITY,
    SUTHERLAND_CONSTANT,
} from './IsaConstants';
import { AltitudeSolveError, OutOfRangeError } from './AtmosphereErrors';
import { findRoot, RootFindingError } from '../core/math/RootFinder';
import type { RootFinderOptions } from '../core/math/RootFinder';

/**
 * International Standard Atmosphere (ISA) Model
 * Seven layers, each with a constant lapse rate and a closed-form solution
 * seeded from the values at its base altitude.
 */

export interface AtmosphereLayer {
    readonly baseAltitude: number;    // m
    readonly lapseRate: number;       // K/m
    readonly baseTemperature: number; // K
    readonly basePressure: number;    // Pa
    readonly baseDensity: number;     // kg/m³
}

/**
 * Interface for atmospheric properties
 */
export interface AtmosphericProperties {
    altitude: number;           // meters
    temperature: number;        // Kelvin
    pressure: number;           // Pascals
    density: number;            // kg/m³
    speedOfSound: number;       // m/s
    dynamicViscosity: number;   // Pa·s
    kinematicViscosity: number; // m²/s
}

export interface AltitudeSolution {
    altitude: number;   // meters
    iterations: number;
}

/** Below this magnitude a temperature deviation is treated as a standard day */
const STANDARD_DAY_EPSILON = 1e-12;

// Closed forms of a single layer, valid between its base and the next base

function layerTemperature(layer: AtmosphereLayer, altitude: number): number {
    return layer.baseTemperature + layer.lapseRate * (altitude - layer.baseAltitude);
}

function layerPressure(layer: AtmosphereLayer, altitude: number): number {
    if (layer.lapseRate === 0) {
        return layer.basePressure *
               Math.exp(-GRAVITY * (altitude - layer.baseAltitude) / (GAS_CONSTANT * layer.baseTemperature));
    }
    const tempRatio = layerTemperature(layer, altitude) / layer.baseTemperature;
    return layer.basePressure * Math.pow(tempRatio, -GRAVITY / (GAS_CONSTANT * layer.lapseRate));
}

function layerDensity(layer: AtmosphereLayer, altitude: number): number {
    if (layer.lapseRate === 0) {
        return layer.baseDensity *
               Math.exp(-GRAVITY * (altitude - layer.baseAltitude) / (GAS_CONSTANT * layer.baseTemperature));
    }
    const tempRatio = layerTemperature(layer, altitude) / layer.baseTemperature;
    return layer.baseDensity * Math.pow(tempRatio, -GRAVITY / (GAS_CONSTANT * layer.lapseRate) - 1);
}

/**
 * Each layer's base state is the previous layer's closed form evaluated at its base altitude,
 * so the table has to be filled bottom-up.
 */
function buildLayerTable(): readonly AtmosphereLayer[] {
    const layers: AtmosphereLayer[] = [
        Object.freeze({
            baseAltitude: LAYER_BASE_ALTITUDES[0],
            lapseRate: LAYER_LAPSE_RATES[0],
            baseTemperature: SEA_LEVEL_TEMPERATURE,
            basePressure: SEA_LEVEL_PRESSURE,
            baseDensity: SEA_LEVEL_DENSITY,
        }),
    ];

    for (let i = 1; i < LAYER_LAPSE_RATES.length; i++) {
        const below = layers[i - 1];
        const baseAltitude = LAYER_BASE_ALTITUDES[i];
        layers.push(Object.freeze({
            baseAltitude,
            lapseRate: LAYER_LAPSE_RATES[i],
            baseTemperature: layerTemperature(below, baseAltitude),
            basePressure: layerPressure(below, baseAltitude),
            baseDensity: layerDensity(below, baseAltitude),
        }));
    }

    return Object.freeze(layers);
}

let layerTable: readonly AtmosphereLayer[] | null = null;

/**
 * The seven ISA layers, built on first use
 */
export function getLayers(): readonly AtmosphereLayer[] {
    if (layerTable === null) {
        layerTable = buildLayerTable();
    }
    return layerTable;
}

/**
 * Index of the layer containing an altitude
 * @param altitude Altitude in meters
 * @returns 0 (troposphere) to 6 (high mesosphere)
 */
export function layerIndex(altitude: number): number {
    if (!(altitude >= MIN_ALTITUDE && altitude <= MAX_ALTITUDE)) {
        throw new OutOfRangeError(altitude);
    }
    if (altitude <= 0) return 0;
    return LAYER_BASE_ALTITUDES.findIndex(base => base >= altitude) - 1;
}

function layerAt(altitude: number): AtmosphereLayer {
    return getLayers()[layerIndex(altitude)];
}

/**
 * Temperature at altitude
 * @param altitude Altitude in meters
 * @param deltaT Deviation from ISA in Kelvin
 * @returns Temperature in Kelvin
 */
export function temperature(altitude: number, deltaT = 0): number {
    return layerTemperature(layerAt(altitude), altitude) + deltaT;
}

/**
 * Static pressure at altitude. Independent of the temperature deviation.
 * @param altitude Altitude in meters
 * @returns Pressure in Pascals
 */
export function pressure(altitude: number): number {
    return layerPressure(layerAt(altitude), altitude);
}

/**
 * Air density at altitude. Off-standard days fall back to the ideal gas law.
 * @param altitude Altitude in meters
 * @param deltaT Deviation from ISA in Kelvin
 * @returns Density in kg/m³
 */
export function density(altitude: number, deltaT = 0): number {
    if (Math.abs(deltaT) <= STANDARD_DAY_EPSILON) {
        return layerDensity(layerAt(altitude), altitude);
    }
    return pressure(altitude) / (GAS_CONSTANT * temperature(altitude, deltaT));
}

/**
 * Dynamic viscosity from Sutherland's formula
 * @returns Dynamic viscosity in Pa·s
 */
export function viscosity(altitude: number, deltaT = 0): number {
    const t = temperature(altitude, deltaT);
    return SEA_LEVEL_VISCOSITY * Math.pow(t / SEA_LEVEL_TEMPERATURE, 1.5) *
           (SEA_LEVEL_TEMPERATURE + SUTHERLAND_CONSTANT) / (t + SUTHERLAND_CONSTANT);
}

/**
 * @returns Speed of sound in m/s
 */
export function soundSpeed(altitude: number, deltaT = 0): number {
    return Math.sqrt(GAMMA * GAS_CONSTANT * temperature(altitude, deltaT));
}

/**
 * @returns Kinematic viscosity in m²/s
 */
export function kinematicViscosity(altitude: number, deltaT = 0): number {
    return viscosity(altitude, deltaT) / density(altitude, deltaT);
}

/**
 * Calculate Reynolds number for an object
 * @param velocity Velocity in m/s
 * @param characteristicLength Characteristic length in meters
 * @param altitude Altitude in meters
 * @param deltaT Deviation from ISA in Kelvin
 */
export function reynoldsNumber(
    velocity: number,
    characteristicLength: number,
    altitude: number,
    deltaT = 0
): number {
    return (velocity * characteristicLength) / kinematicViscosity(altitude, deltaT);
}

/**
 * Get all atmospheric properties at altitude
 */
export function getProperties(altitude: number, deltaT = 0): AtmosphericProperties {
    const rho = density(altitude, deltaT);
    const mu = viscosity(altitude, deltaT);
    return {
        altitude,
        temperature: temperature(altitude, deltaT),
        pressure: pressure(altitude),
        density: rho,
        speedOfSound: soundSpeed(altitude, deltaT),
        dynamicViscosity: mu,
        kinematicViscosity: mu / rho,
    };
}

function solveAltitude(
    residual: (altitude: number) => number,
    target: number,
    quantity: string,
    options: Partial<RootFinderOptions>
): AltitudeSolution {
    try {
        const { root, iterations } = findRoot(residual, [MIN_ALTITUDE, MAX_ALTITUDE], options);
        return { altitude: root, iterations };
    } catch (error) {
        if (error instanceof RootFindingError) {
            throw new AltitudeSolveError(target, quantity, { cause: error });
        }
        throw error;
    }
}

/**
 * Standard altitude at which the static pressure equals the given value
 * @param p Pressure in Pascals
 */
export function pressureAltitude(p: number, options: Partial<RootFinderOptions> = {}): AltitudeSolution {
    return solveAltitude(h => pressure(h) - p, p, 'pressure', options);
}

/**
 * Standard-day altitude at which the density equals the given value
 * @param rho Density in kg/m³
 */
export function densityAltitude(rho: number, options: Partial<RootFinderOptions> = {}): AltitudeSolution {
    return solveAltitude(h => density(h) - rho, rho, 'density', options);
}
