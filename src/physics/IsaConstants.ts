/**
 * International Standard Atmosphere constants
 *
 * Sea-level seeds, gas properties and the fixed layer boundary / lapse rate tables
 * the atmosphere model is built from.
 */

/** Sea-level pressure in Pascals */
export const SEA_LEVEL_PRESSURE = 101325;

/** Sea-level temperature in Kelvin (15°C) */
export const SEA_LEVEL_TEMPERATURE = 288.15;

/** Sea-level density in kg/m³ */
export const SEA_LEVEL_DENSITY = 1.225;

/** Dynamic viscosity at sea-level temperature in Pa·s */
export const SEA_LEVEL_VISCOSITY = 1.7894e-5;

/** Specific heat ratio for air */
export const GAMMA = 1.4;

/** Standard gravity in m/s² */
export const GRAVITY = 9.80665;

/** Sutherland's constant for air in Kelvin */
export const SUTHERLAND_CONSTANT = 110;

/** Specific gas constant in J/(kg·K), taken from the sea-level seeds */
export const GAS_CONSTANT = SEA_LEVEL_PRESSURE / (SEA_LEVEL_DENSITY * SEA_LEVEL_TEMPERATURE);

/** Speed of sound at sea level in m/s */
export const SEA_LEVEL_SOUND_SPEED = Math.sqrt(GAMMA * GAS_CONSTANT * SEA_LEVEL_TEMPERATURE);

/** Lowest altitude the model accepts (m) */
export const MIN_ALTITUDE = -610;

/** Highest altitude the model accepts (m) */
export const MAX_ALTITUDE = 84852;

/**
 * Layer base altitudes in meters. The last entry closes the top layer.
 * 0: troposphere, 1: tropopause, 2: low stratosphere, 3: high stratosphere,
 * 4: stratopause, 5: low mesosphere, 6: high mesosphere
 */
export const LAYER_BASE_ALTITUDES: readonly number[] = [
    0, 11000, 20000, 32000, 47000, 51000, 71000, MAX_ALTITUDE,
];

/** Temperature lapse rate per layer in K/m */
export const LAYER_LAPSE_RATES: readonly number[] = [
    -0.0065, 0, 0.001, 0.0028, 0, -0.0028, -0.002,
];
