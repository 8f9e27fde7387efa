import { calculateFlowFill, estimateFill } from '../FlowFillCalculator';
import type { FlowFillInput } from '../FlowFillCalculator';

const baseInput = (overrides?: Partial<FlowFillInput>): FlowFillInput => ({
  volumeCm3: 50,
  wallThicknessMm: { min: 1.5, avg: 2.5, max: 3 },
  boundingBoxMm: { x: 150, y: 100, z: 30 },
  viscosityClass: 'medium',
  maxFlowLengthRatio: 150,
  cavityPressureMpa: { min: 80, max: 120 },
  gateType: 'edge',
  ...(overrides ?? {}),
});

describe('estimateFill', () => {
  test('50 cm³ through a 3 mm gate fills in about 0.59 s', () => {
    const result = estimateFill({
      volumeCm3: 50,
      gateDiameterMm: 3,
      viscosityClass: 'medium',
      avgThicknessMm: 2.5,
    });

    expect(result.ok).toBe(true);
    if (!result.ok) return;
    expect(result.value.fillTimeS).toBeGreaterThanOrEqual(0.5);
    expect(result.value.fillTimeS).toBeLessThanOrEqual(5);
    expect(result.value.fillTimeS).toBeCloseTo(0.5895, 3);
    expect(result.value.gateAreaMm2).toBeCloseTo(7.0686, 4);
  });

  test('higher viscosity fills slower', () => {
    const fill = (viscosityClass: 'low' | 'high') => {
      const result = estimateFill({
        volumeCm3: 50,
        gateDiameterMm: 3,
        viscosityClass,
        avgThicknessMm: 2.5,
      });
      if (!result.ok) throw new Error(result.error.message);
      return result.value.fillTimeS;
    };

    expect(fill('high')).toBeGreaterThan(fill('low'));
  });

  test.each([0, -1])('rejects gate diameter %p as invalid config', (d) => {
    const result = estimateFill({
      volumeCm3: 50,
      gateDiameterMm: d,
      viscosityClass: 'medium',
      avgThicknessMm: 2.5,
    });

    expect(result).toEqual({
      ok: false,
      error: expect.objectContaining({
        kind: 'InvalidConfig',
        field: 'gateDiameterMm',
      }),
    });
  });
});

describe('calculateFlowFill', () => {
  test('sizes gate and runner from max thickness when not overridden', () => {
    const result = calculateFlowFill(baseInput());

    expect(result.ok).toBe(true);
    if (!result.ok) return;
    // 3 mm × (0.6 + 0.01)
    expect(result.value.gateDiameterMm).toBeCloseTo(1.83, 10);
    expect(result.value.gateDiameterSource).toBe('recommended');
    expect(result.value.runnerDiameterMm).toBeCloseTo(1.83 * 1.75, 10);
    expect(result.value.fillTimeS).toBeCloseTo(1.5842, 3);
  });

  test('uses the gate and runner overrides as given', () => {
    const result = calculateFlowFill(
      baseInput({ gateDiameterMm: 2.5, runnerDiameterMm: 6 }),
    );

    expect(result.ok).toBe(true);
    if (!result.ok) return;
    expect(result.value.gateDiameterMm).toBe(2.5);
    expect(result.value.gateDiameterSource).toBe('override');
    expect(result.value.runnerDiameterMm).toBe(6);
    expect(result.value.runnerDiameterSource).toBe('override');
  });

  test('flow length is the half-diagonal of the largest face', () => {
    const result = calculateFlowFill(
      baseInput({ boundingBoxMm: { x: 60, y: 80, z: 20 } }),
    );

    expect(result.ok).toBe(true);
    if (!result.ok) return;
    expect(result.value.flowLengthMm).toBe(50);
    expect(result.value.flowRatio).toBe(20);
    expect(result.value.flowLengthRisk.status).toBe('safe');
  });

  test('a corner gate doubles the reach of a centred one', () => {
    const result = calculateFlowFill(
      baseInput({
        boundingBoxMm: { x: 60, y: 80, z: 20 },
        gateLocationMm: { x: 0, y: 0, z: 0 },
      }),
    );

    expect(result.ok).toBe(true);
    if (!result.ok) return;
    expect(result.value.flowLengthMm).toBe(100);
  });

  test('adds pressure only above the reference flow ratio', () => {
    const short = calculateFlowFill(
      baseInput({ boundingBoxMm: { x: 60, y: 80, z: 20 } }),
    );
    // 300 × 400 face: 250 mm over 2.5 mm → ratio 100
    const long = calculateFlowFill(
      baseInput({ boundingBoxMm: { x: 300, y: 400, z: 20 } }),
    );

    expect(short.ok && long.ok).toBe(true);
    if (!short.ok || !long.ok) return;
    expect(short.value.injectionPressureMpa).toBe(100);
    expect(long.value.injectionPressureMpa).toBeCloseTo(
      100 * (1 + 0.3 * Math.log10(2)),
      10,
    );
  });

  test('rejects a non-positive runner override', () => {
    const result = calculateFlowFill(baseInput({ runnerDiameterMm: 0 }));

    expect(result.ok).toBe(false);
    if (result.ok) return;
    expect(result.error.field).toBe('runnerDiameterMm');
  });
});
