import { calculateTonnage } from '../TonnageCalculator';

describe('calculateTonnage', () => {
  test('100 cm² at 100 MPa with SF 1.15 recommends about 117 T', () => {
    const result = calculateTonnage({
      projectedAreaCm2: 100,
      cavityCount: 1,
      cavityPressureMpa: 100,
      safetyFactor: 1.15,
    });

    expect(result.ok).toBe(true);
    if (!result.ok) return;

    expect(result.value.clampForceKn).toBe(1000);
    expect(result.value.minimum).toBeCloseTo(101.972, 2);
    expect(result.value.recommended).toBeCloseTo(117.267, 2);
    expect(Math.abs(result.value.recommended - 117.7) / 117.7).toBeLessThan(
      0.01,
    );
    expect(result.value.conservative).toBeCloseTo(
      result.value.recommended * 1.1,
      10,
    );
  });

  test('scales linearly with cavity count', () => {
    const one = calculateTonnage({
      projectedAreaCm2: 40,
      cavityCount: 1,
      cavityPressureMpa: 60,
      safetyFactor: 1.2,
    });
    const four = calculateTonnage({
      projectedAreaCm2: 40,
      cavityCount: 4,
      cavityPressureMpa: 60,
      safetyFactor: 1.2,
    });

    expect(one.ok && four.ok).toBe(true);
    if (!one.ok || !four.ok) return;
    expect(four.value.recommended).toBeCloseTo(one.value.recommended * 4, 9);
  });

  test('is monotone in area, pressure and safety factor', () => {
    const base = {
      projectedAreaCm2: 80,
      cavityCount: 2,
      cavityPressureMpa: 70,
      safetyFactor: 1.1,
    };
    const recommended = (overrides: Partial<typeof base>) => {
      const result = calculateTonnage({ ...base, ...overrides });
      if (!result.ok) throw new Error(result.error.message);
      return result.value.recommended;
    };

    const reference = recommended({});
    expect(recommended({ projectedAreaCm2: 81 })).toBeGreaterThan(reference);
    expect(recommended({ cavityPressureMpa: 71 })).toBeGreaterThan(reference);
    expect(recommended({ safetyFactor: 1.2 })).toBeGreaterThan(reference);
  });

  test.each([
    [{ projectedAreaCm2: 0 }, 'InvalidGeometry', 'projectedAreaCm2'],
    [{ cavityCount: 0 }, 'InvalidConfig', 'cavityCount'],
    [{ cavityCount: 1.5 }, 'InvalidConfig', 'cavityCount'],
    [{ cavityPressureMpa: -5 }, 'InvalidMaterial', 'cavityPressureMpa'],
    [{ safetyFactor: 0 }, 'InvalidConfig', 'safetyFactor'],
  ])('rejects %p without throwing', (overrides, kind, field) => {
    const result = calculateTonnage({
      projectedAreaCm2: 100,
      cavityCount: 1,
      cavityPressureMpa: 100,
      safetyFactor: 1.15,
      ...overrides,
    });

    expect(result).toEqual({
      ok: false,
      error: expect.objectContaining({ kind, field }),
    });
  });

  test('reports overflow for an area too large to represent', () => {
    const result = calculateTonnage({
      projectedAreaCm2: Number.MAX_VALUE,
      cavityCount: 1,
      cavityPressureMpa: 100,
      safetyFactor: 1.15,
    });

    expect(result.ok).toBe(false);
    if (result.ok) return;
    expect(result.error.kind).toBe('ComputationOverflow');
  });
});
