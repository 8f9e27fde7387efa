import {
  FeasibilityEvaluator,
  noSuitableMachineWarning,
  scoreWarnings,
  statusForScore,
  summarizeFeasibility,
} from '../FeasibilityEvaluator';
import { STANDARD_WARNING_RULES } from '../StandardWarningRuleSet';
import type { WarningRuleContext } from '../WarningRule';

const context = (overrides?: Partial<WarningRuleContext>): WarningRuleContext => ({
  minThicknessMm: 2,
  maxThicknessMm: 3,
  projectedAreaCm2: 100,
  flowRatio: 36,
  maxFlowLengthRatio: 150,
  recommendedTonnage: 117,
  materialName: 'Test ABS',
  ...(overrides ?? {}),
});

describe('FeasibilityEvaluator', () => {
  const evaluator = new FeasibilityEvaluator();

  test('a clean part raises nothing and scores 100', () => {
    const { warnings, feasibility } = evaluator.evaluate(context());

    expect(warnings).toEqual([]);
    expect(feasibility).toEqual({
      status: 'feasible',
      score: 100,
      statusMessage: 'Part appears feasible for injection molding.',
      warningCount: 0,
      highSeverityCount: 0,
    });
  });

  test('an 8 mm wall raises both thick and very thick, scoring 55', () => {
    const { warnings, feasibility } = evaluator.evaluate(
      context({ maxThicknessMm: 8, flowRatio: 10 }),
    );

    expect(warnings.map((w) => w.kind)).toEqual([
      'thick_section',
      'very_thick_section',
    ]);
    expect(warnings[0].designerMessage).toBe(
      'Max thickness 8.0mm may cause sink marks and extended cooling time.',
    );
    expect(feasibility.score).toBe(55);
    expect(feasibility.status).toBe('borderline');
    expect(feasibility.highSeverityCount).toBe(1);
  });

  test('a 7.9 mm wall is thick but not very thick', () => {
    const { warnings } = evaluator.evaluate(context({ maxThicknessMm: 7.9 }));
    expect(warnings.map((w) => w.kind)).toEqual(['thick_section']);
  });

  test('flow ratio exactly at the limit is borderline only', () => {
    const { warnings, feasibility } = evaluator.evaluate(
      context({ flowRatio: 100, maxFlowLengthRatio: 100 }),
    );

    expect(warnings.map((w) => w.kind)).toEqual(['borderline_flow_ratio']);
    expect(warnings[0].designerMessage).toBe(
      'Flow L/t ratio 100 is approaching the 100 limit of Test ABS.',
    );
    expect(feasibility.score).toBe(95);
  });

  test('flow ratio above the limit is high only', () => {
    const { warnings, feasibility } = evaluator.evaluate(
      context({ flowRatio: 100.5, maxFlowLengthRatio: 100 }),
    );

    expect(warnings.map((w) => w.kind)).toEqual(['high_flow_ratio']);
    expect(feasibility.score).toBe(70);
    expect(feasibility.status).toBe('feasible');
  });

  test('flow ratio below 70% of the limit raises nothing', () => {
    const { warnings } = evaluator.evaluate(
      context({ flowRatio: 69, maxFlowLengthRatio: 100 }),
    );
    expect(warnings).toEqual([]);
  });

  test('warnings follow rule order, not trigger order', () => {
    const { warnings, feasibility } = evaluator.evaluate(
      context({
        minThicknessMm: 0.5,
        maxThicknessMm: 9,
        flowRatio: 200,
        projectedAreaCm2: 600,
        recommendedTonnage: 700,
      }),
    );

    expect(warnings.map((w) => w.kind)).toEqual([
      'thick_section',
      'very_thick_section',
      'thin_section',
      'high_flow_ratio',
      'large_projected_area',
      'high_tonnage',
    ]);
    // 15 + 30 + 15 + 30 + 5 + 15 = 110
    expect(feasibility.score).toBe(0);
    expect(feasibility.status).toBe('not_recommended');
  });

  test('warnings carry customer messages and remediation', () => {
    const { warnings } = evaluator.evaluate(
      context({ minThicknessMm: 0.8 }),
    );

    expect(warnings).toHaveLength(1);
    expect(warnings[0]).toEqual({
      kind: 'thin_section',
      severity: 'medium',
      designerMessage:
        'Min thickness 0.8mm risks short shots, especially far from the gate.',
      customerMessage: 'Very thin areas may be difficult to fill completely.',
      remediation:
        'Position the gate near thin sections or increase wall thickness.',
    });
    expect(Object.isFrozen(warnings[0])).toBe(true);
  });

  test('accepts a custom rule list', () => {
    const onlyTonnage = new FeasibilityEvaluator(
      STANDARD_WARNING_RULES.filter((rule) => rule.kind === 'high_tonnage'),
    );
    const { warnings } = onlyTonnage.evaluate(
      context({ maxThicknessMm: 9, recommendedTonnage: 501 }),
    );
    expect(warnings.map((w) => w.kind)).toEqual(['high_tonnage']);
  });
});

describe('scoring', () => {
  test('re-scoring a stored warning list reproduces the stored score', () => {
    const { warnings, feasibility } = new FeasibilityEvaluator().evaluate(
      context({ maxThicknessMm: 5, flowRatio: 120, maxFlowLengthRatio: 150 }),
    );

    expect(scoreWarnings(warnings)).toBe(feasibility.score);
    expect(summarizeFeasibility(warnings)).toEqual(feasibility);
  });

  test('score is floored at 0', () => {
    const high = { severity: 'high' as const };
    expect(scoreWarnings([high, high, high, high])).toBe(0);
  });

  test.each([
    [100, 'feasible'],
    [70, 'feasible'],
    [69, 'borderline'],
    [40, 'borderline'],
    [39, 'not_recommended'],
    [0, 'not_recommended'],
  ] as const)('score %d maps to %s', (score, status) => {
    expect(statusForScore(score)).toBe(status);
  });
});

describe('noSuitableMachineWarning', () => {
  test('describes the requirement against a non-empty catalog', () => {
    const warning = noSuitableMachineWarning({
      requiredTonnage: 117.3,
      requiredShotVolumeCm3: 50,
      catalogSize: 4,
    });

    expect(warning.kind).toBe('no_suitable_machine');
    expect(warning.severity).toBe('medium');
    expect(warning.designerMessage).toBe(
      'None of 4 catalog machines can shoot 50.0 cm³ for a 117T requirement.',
    );
  });

  test('names an empty catalog', () => {
    const warning = noSuitableMachineWarning({
      requiredTonnage: 100,
      requiredShotVolumeCm3: 10,
      catalogSize: 0,
    });
    expect(warning.designerMessage).toBe(
      'Machine catalog is empty - no machine could be ranked.',
    );
  });
});
