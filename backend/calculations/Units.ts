// Unit conversions used across the calculators. Every quantity crossing a
// module boundary carries its unit in its name (Mm, Cm2, Mpa, ...).

export const MM2_PER_CM2 = 100;
export const MM3_PER_CM3 = 1000;
export const NEWTONS_PER_KILONEWTON = 1000;

/** Standard gravity (m/s²): converts kN to metric tons-force. */
export const STANDARD_GRAVITY = 9.80665;

export const cm2ToMm2 = (areaCm2: number): number => areaCm2 * MM2_PER_CM2;

export const mm2ToCm2 = (areaMm2: number): number => areaMm2 / MM2_PER_CM2;

export const mm3ToCm3 = (volumeMm3: number): number =>
  volumeMm3 / MM3_PER_CM3;

export const newtonsToKilonewtons = (forceN: number): number =>
  forceN / NEWTONS_PER_KILONEWTON;

export const kilonewtonsToMetricTons = (forceKn: number): number =>
  forceKn / STANDARD_GRAVITY;

/** Rounds for display; engine results stay unrounded. */
export const roundTo = (value: number, decimals: number): number => {
  const factor = 10 ** decimals;
  return Math.round(value * factor) / factor;
};
