import {
    celsiusToKelvin,
    feetToMeters,
    kelvinToCelsius,
    knotsToMps,
    metersToFeet,
    mpsToKnots,
} from '../utils/units';

/**
 * Display units of a flight condition. Physics is always solved in SI.
 */
export interface DisplayUnits {
    /** Length magnitudes in feet (true) or meters (false) */
    feet: boolean;
    /** Speed magnitudes in knots (true) or m/s (false) */
    knots: boolean;
    /** Temperature in Celsius (true) or Kelvin (false) */
    celsius: boolean;
}

export const SI_UNITS: Readonly<DisplayUnits> = Object.freeze({
    feet: false,
    knots: false,
    celsius: false,
});

export interface FlightConditionProps {
    mach: number;
    altitude: number;           // ft or m
    eas: number;                // kts or m/s
    cas: number;                // kts or m/s
    tas: number;                // kts or m/s
    soundSpeed: number;         // kts or m/s
    pressure: number;           // Pa
    temperature: number;        // °C or K
    density: number;            // kg/m³
    dynamicViscosity: number;   // Pa·s
    kinematicViscosity: number; // m²/s
    dynamicPressure: number;    // Pa
    reynoldsPerLength: number;  // 1/ft or 1/m
    deltaT: number;             // K (same step in °C)
    units: DisplayUnits;
}

/**
 * Fully resolved flight level: one consistent set of airspeeds and atmospheric data.
 * Instances are never mutated; changing display units yields a new instance.
 */
export class FlightCondition {
    public readonly mach: number;
    public readonly altitude: number;
    public readonly eas: number;
    public readonly cas: number;
    public readonly tas: number;
    public readonly soundSpeed: number;
    public readonly pressure: number;
    public readonly temperature: number;
    public readonly density: number;
    public readonly dynamicViscosity: number;
    public readonly kinematicViscosity: number;
    public readonly dynamicPressure: number;
    public readonly reynoldsPerLength: number;
    public readonly deltaT: number;
    public readonly units: Readonly<DisplayUnits>;

    constructor(props: FlightConditionProps) {
        this.mach = props.mach;
        this.altitude = props.altitude;
        this.eas = props.eas;
        this.cas = props.cas;
        this.tas = props.tas;
        this.soundSpeed = props.soundSpeed;
        this.pressure = props.pressure;
        this.temperature = props.temperature;
        this.density = props.density;
        this.dynamicViscosity = props.dynamicViscosity;
        this.kinematicViscosity = props.kinematicViscosity;
        this.dynamicPressure = props.dynamicPressure;
        this.reynoldsPerLength = props.reynoldsPerLength;
        this.deltaT = props.deltaT;
        this.units = Object.freeze({ ...props.units });
    }

    /**
     * Copy of this condition with length, speed and temperature magnitudes in other units.
     * Pressure and viscosities stay in SI.
     */
    public withUnits(units: Partial<DisplayUnits>): FlightCondition {
        const target: DisplayUnits = {
            feet: units.feet ?? this.units.feet,
            knots: units.knots ?? this.units.knots,
            celsius: units.celsius ?? this.units.celsius,
        };

        let altitude = this.altitude;
        let reynoldsPerLength = this.reynoldsPerLength;
        if (target.feet && !this.units.feet) {
            altitude = metersToFeet(altitude);
            reynoldsPerLength /= metersToFeet(1);
        } else if (!target.feet && this.units.feet) {
            altitude = feetToMeters(altitude);
            reynoldsPerLength /= feetToMeters(1);
        }

        let speeds = [this.eas, this.cas, this.tas, this.soundSpeed];
        if (target.knots && !this.units.knots) {
            speeds = speeds.map(mpsToKnots);
        } else if (!target.knots && this.units.knots) {
            speeds = speeds.map(knotsToMps);
        }
        const [eas, cas, tas, soundSpeed] = speeds;

        let temperature = this.temperature;
        if (target.celsius && !this.units.celsius) {
            temperature = kelvinToCelsius(temperature);
        } else if (!target.celsius && this.units.celsius) {
            temperature = celsiusToKelvin(temperature);
        }

        return new FlightCondition({
            ...this.toProps(),
            altitude,
            eas,
            cas,
            tas,
            soundSpeed,
            temperature,
            reynoldsPerLength,
            units: target,
        });
    }

    public toProps(): FlightConditionProps {
        return {
            mach: this.mach,
            altitude: this.altitude,
            eas: this.eas,
            cas: this.cas,
            tas: this.tas,
            soundSpeed: this.soundSpeed,
            pressure: this.pressure,
            temperature: this.temperature,
            density: this.density,
            dynamicViscosity: this.dynamicViscosity,
            kinematicViscosity: this.kinematicViscosity,
            dynamicPressure: this.dynamicPressure,
            reynoldsPerLength: this.reynoldsPerLength,
            deltaT: this.deltaT,
            units: { ...this.units },
        };
    }

    public toString(): string {
        const distUnit = this.units.feet ? 'ft' : 'm';
        const velUnit = this.units.knots ? 'kts' : 'm/s';
        const tempUnit = this.units.celsius ? 'C' : 'K';

        return [
            'Flight condition defined by:',
            `Mach number (.mach) = ${this.mach}`,
            `Altitude (.altitude) = ${this.altitude} ${distUnit}`,
            `Equivalent Air Speed (.eas) = ${this.eas} ${velUnit}`,
            `Calibrated Air Speed (.cas) = ${this.cas} ${velUnit}`,
            `True Air Speed (.tas) = ${this.tas} ${velUnit}`,
            `Sound Speed (.soundSpeed) = ${this.soundSpeed} ${velUnit}`,
            `Pressure (.pressure) = ${this.pressure} Pa`,
            `Temperature (.temperature) = ${this.temperature} ${tempUnit}`,
            `Density (.density) = ${this.density} kg/m3`,
            `Viscosity (.dynamicViscosity) = ${this.dynamicViscosity} Pa·s`,
            `Kinematic viscosity (.kinematicViscosity) = ${this.kinematicViscosity} m2/s`,
            `Dynamic pressure (.dynamicPressure) = ${this.dynamicPressure} Pa`,
            `Reynolds / distance (.reynoldsPerLength) = ${this.reynoldsPerLength} ${distUnit}^-1`,
            `Temperature deviation from ISA (.deltaT) = ${this.deltaT} ${tempUnit}`,
        ].join('\n');
    }
}
