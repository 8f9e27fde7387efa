import { calculateCycleTime, resolveMorphology } from '../CycleTimeCalculator';

describe('calculateCycleTime', () => {
  test('total is exactly the sum of the four components', () => {
    const result = calculateCycleTime({
      fillTimeS: 0.5,
      maxThicknessMm: 3,
      morphology: 'amorphous',
    });

    expect(result.ok).toBe(true);
    if (!result.ok) return;
    const { fill, pack, cool, overhead, total } = result.value;
    expect(total).toBe(fill + pack + cool + overhead);
    expect(cool).toBe(18);
    expect(pack).toBeCloseTo(5.4, 10);
    expect(overhead).toBe(3);
    expect(total).toBeCloseTo(26.9, 10);
  });

  test('crystalline materials cool longer than amorphous ones', () => {
    const cool = (morphology: 'crystalline' | 'amorphous') => {
      const result = calculateCycleTime({
        fillTimeS: 1,
        maxThicknessMm: 2,
        morphology,
      });
      if (!result.ok) throw new Error(result.error.message);
      return result.value.cool;
    };

    expect(cool('crystalline')).toBe(10);
    expect(cool('amorphous')).toBe(8);
  });

  test('rejects a non-positive max thickness', () => {
    const result = calculateCycleTime({
      fillTimeS: 1,
      maxThicknessMm: 0,
      morphology: 'amorphous',
    });

    expect(result.ok).toBe(false);
    if (result.ok) return;
    expect(result.error).toEqual(
      expect.objectContaining({
        kind: 'InvalidGeometry',
        field: 'wallThicknessMm.max',
      }),
    );
  });
});

describe('resolveMorphology', () => {
  test('maps categories case-insensitively', () => {
    expect(resolveMorphology({ category: ' pp ' })).toEqual({
      ok: true,
      value: 'crystalline',
    });
    expect(resolveMorphology({ category: 'PC+ABS' })).toEqual({
      ok: true,
      value: 'amorphous',
    });
  });

  test('an explicit morphology wins over the category table', () => {
    expect(
      resolveMorphology({ category: 'PP', morphology: 'amorphous' }),
    ).toEqual({ ok: true, value: 'amorphous' });
  });

  test('an unmapped category is an invalid material', () => {
    const result = resolveMorphology({ category: 'TPU' });

    expect(result.ok).toBe(false);
    if (result.ok) return;
    expect(result.error.kind).toBe('InvalidMaterial');
    expect(result.error.field).toBe('category');
  });
});
