import { describe, it, expect } from 'vitest';
import { FlightCondition } from '@physics/FlightCondition';
import { solveFlightCondition } from '@physics/FlightLevelSolver';

const IMPERIAL = { feet: true, knots: true, celsius: true };
const SI = { feet: false, knots: false, celsius: false };

describe('FlightCondition', () => {
  const si = solveFlightCondition({ kind: 'mach-altitude', mach: 0.8, altitude: 11000 });

  describe('withUnits', () => {
    it('should convert length, speed and temperature', () => {
      const imperial = si.withUnits(IMPERIAL);
      expect(imperial.units).toEqual(IMPERIAL);
      expect(imperial.altitude).toBeCloseTo(11000 / 0.3048, 8);
      expect(imperial.tas).toBeCloseTo(si.tas / 0.5144444, 8);
      expect(imperial.soundSpeed).toBeCloseTo(si.soundSpeed / 0.5144444, 8);
      expect(imperial.temperature).toBeCloseTo(si.temperature - 273.15, 10);
      expect(imperial.reynoldsPerLength / (si.reynoldsPerLength * 0.3048)).toBeCloseTo(1, 12);
    });

    it('should leave pressure, density and viscosities in SI', () => {
      const imperial = si.withUnits(IMPERIAL);
      expect(imperial.mach).toBe(si.mach);
      expect(imperial.pressure).toBe(si.pressure);
      expect(imperial.density).toBe(si.density);
      expect(imperial.dynamicViscosity).toBe(si.dynamicViscosity);
      expect(imperial.kinematicViscosity).toBe(si.kinematicViscosity);
      expect(imperial.dynamicPressure).toBe(si.dynamicPressure);
      expect(imperial.deltaT).toBe(si.deltaT);
    });

    it('should round-trip back to SI', () => {
      const back = si.withUnits(IMPERIAL).withUnits(SI);
      expect(back.units).toEqual(SI);
      expect(back.altitude).toBeCloseTo(si.altitude, 8);
      expect(back.eas).toBeCloseTo(si.eas, 10);
      expect(back.cas).toBeCloseTo(si.cas, 10);
      expect(back.tas).toBeCloseTo(si.tas, 10);
      expect(back.soundSpeed).toBeCloseTo(si.soundSpeed, 10);
      expect(back.temperature).toBeCloseTo(si.temperature, 10);
      expect(back.reynoldsPerLength / si.reynoldsPerLength).toBeCloseTo(1, 12);
    });

    it('should convert only the flags that change', () => {
      const knotsOnly = si.withUnits({ knots: true });
      expect(knotsOnly.units).toEqual({ feet: false, knots: true, celsius: false });
      expect(knotsOnly.altitude).toBe(si.altitude);
      expect(knotsOnly.temperature).toBe(si.temperature);
      expect(knotsOnly.reynoldsPerLength).toBe(si.reynoldsPerLength);
    });

    it('should keep the current flag when a unit is left undefined', () => {
      const imperial = si.withUnits(IMPERIAL);
      const kept = imperial.withUnits({ knots: undefined, celsius: false });
      expect(kept.units).toEqual({ feet: true, knots: true, celsius: false });
      expect(kept.tas).toBe(imperial.tas);
      expect(kept.temperature).toBeCloseTo(si.temperature, 10);
    });

    it('should return a new instance', () => {
      const same = si.withUnits({});
      expect(same).not.toBe(si);
      expect(same.toProps()).toEqual(si.toProps());
    });
  });

  it('should not share its units object', () => {
    const units = { feet: true, knots: false, celsius: false };
    const fl = new FlightCondition({ ...si.toProps(), units });
    units.feet = false;
    expect(fl.units.feet).toBe(true);
    expect(Object.isFrozen(fl.units)).toBe(true);
  });

  describe('toString', () => {
    it('should report every field with its unit', () => {
      const lines = si.toString().split('\n');
      expect(lines).toHaveLength(15);
      expect(lines[0]).toBe('Flight condition defined by:');
      expect(lines[1]).toBe('Mach number (.mach) = 0.8');
      expect(lines[2]).toBe('Altitude (.altitude) = 11000 m');
      expect(lines[3]).toBe(`Equivalent Air Speed (.eas) = ${si.eas} m/s`);
      expect(lines[7]).toBe(`Pressure (.pressure) = ${si.pressure} Pa`);
      expect(lines[13]).toBe(`Reynolds / distance (.reynoldsPerLength) = ${si.reynoldsPerLength} m^-1`);
      expect(lines[14]).toBe('Temperature deviation from ISA (.deltaT) = 0 K');
    });

    it('should label display units', () => {
      const fl = solveFlightCondition(
        { kind: 'mach-altitude', mach: 0.8, altitude: 36000 },
        { units: IMPERIAL }
      );
      const lines = fl.toString().split('\n');
      expect(lines[2]).toBe('Altitude (.altitude) = 36000 ft');
      expect(lines[5]).toBe(`True Air Speed (.tas) = ${fl.tas} kts`);
      expect(lines[8]).toBe(`Temperature (.temperature) = ${fl.temperature} C`);
    });
  });
});
