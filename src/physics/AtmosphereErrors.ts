import { MAX_ALTITUDE, MIN_ALTITUDE } from './IsaConstants';

/**
 * Base class for every failure raised by the atmosphere model and the flight level solver
 */
export class AtmosphereError extends Error {
    constructor(message: string, options?: ErrorOptions) {
        super(message, options);
        this.name = 'AtmosphereError';
    }
}

export class OutOfRangeError extends AtmosphereError {
    constructor(public readonly altitude: number) {
        super(
            altitude < MIN_ALTITUDE
                ? `Altitude ${altitude} m is below the ISA minimum ${MIN_ALTITUDE} m`
                : `Altitude ${altitude} m is above the ISA maximum ${MAX_ALTITUDE} m`
        );
        this.name = 'OutOfRangeError';
    }
}

export class InvalidInputCountError extends AtmosphereError {
    constructor(public readonly provided: readonly string[]) {
        super(
            'From Mach number, altitude, EAS, CAS and TAS exactly 2 must be defined, ' +
            `got ${provided.length}${provided.length > 0 ? ` (${provided.join(', ')})` : ''}`
        );
        this.name = 'InvalidInputCountError';
    }
}

export class InvalidInputPairError extends AtmosphereError {
    constructor(public readonly provided: readonly string[]) {
        super(`Pair of values [${provided.join(', ')}] is not valid to define a flight level`);
        this.name = 'InvalidInputPairError';
    }
}

export class AltitudeSolveError extends AtmosphereError {
    constructor(public readonly target: number, quantity: string, options?: ErrorOptions) {
        super(`No ISA altitude in [${MIN_ALTITUDE}, ${MAX_ALTITUDE}] m matches ${quantity} ${target}`, options);
        this.name = 'AltitudeSolveError';
    }
}

/** Whether the rejected CAS was supplied by the caller or derived to complete the condition */
export type CasSource = 'input' | 'back-fill';

export class SupersonicCasError extends AtmosphereError {
    constructor(
        public readonly mach: number,
        public readonly cas: number,
        public readonly source: CasSource = 'input'
    ) {
        super(
            source === 'back-fill'
                ? `Cannot back-fill calibrated airspeed for supersonic flow (Mach ${mach}, CAS ${cas} m/s); ` +
                  'only subsonic CAS is derived'
                : `Calibrated airspeed is only defined here for subsonic flow (Mach ${mach}, CAS ${cas} m/s)`
        );
        this.name = 'SupersonicCasError';
    }
}
