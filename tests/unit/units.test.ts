import { describe, it, expect } from 'vitest';
import {
  feetToMeters,
  metersToFeet,
  knotsToMps,
  mpsToKnots,
  kelvinToCelsius,
  celsiusToKelvin,
} from '@utils/units';

describe('Unit conversions', () => {
  it('should convert lengths', () => {
    expect(feetToMeters(1000)).toBeCloseTo(304.8, 10);
    expect(metersToFeet(304.8)).toBeCloseTo(1000, 10);
    expect(metersToFeet(feetToMeters(35000))).toBeCloseTo(35000, 9);
  });

  it('should convert speeds', () => {
    expect(knotsToMps(100)).toBeCloseTo(51.44444, 10);
    expect(mpsToKnots(51.44444)).toBeCloseTo(100, 10);
    expect(knotsToMps(mpsToKnots(250))).toBeCloseTo(250, 10);
  });

  it('should convert temperatures', () => {
    expect(kelvinToCelsius(273.15)).toBe(0);
    expect(celsiusToKelvin(15)).toBeCloseTo(288.15, 10);
    expect(kelvinToCelsius(216.65)).toBeCloseTo(-56.5, 10);
  });
});
