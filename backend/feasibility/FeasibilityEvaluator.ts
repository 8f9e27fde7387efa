import type { AnalysisWarning, WarningSeverity } from './AnalysisWarning';
import { STANDARD_WARNING_RULES } from './StandardWarningRuleSet';
import {
  applyWarningRule,
  type WarningRule,
  type WarningRuleContext,
} from './WarningRule';

export type FeasibilityStatus = 'feasible' | 'borderline' | 'not_recommended';

export type FeasibilitySummary = {
  status: FeasibilityStatus;
  /** Integer 0–100. */
  score: number;
  statusMessage: string;
  warningCount: number;
  highSeverityCount: number;
};

export const STARTING_SCORE = 100;

/** Explicit penalties per triggered warning; keep stable for auditability. */
export const SEVERITY_PENALTY: Readonly<Record<WarningSeverity, number>> =
  Object.freeze({
    low: 5,
    medium: 15,
    high: 30,
  });

export const FEASIBLE_MIN_SCORE = 70;
export const BORDERLINE_MIN_SCORE = 40;

const STATUS_MESSAGE: Record<FeasibilityStatus, string> = {
  feasible: 'Part appears feasible for injection molding.',
  borderline: 'Part is moldable but has some concerns to address.',
  not_recommended:
    'Significant concerns - design review recommended before proceeding.',
};

/**
 * Score as a pure fold over warning severities.
 *
 * Re-scoring a stored warning list always reproduces the stored score.
 */
export const scoreWarnings = (
  warnings: readonly Pick<AnalysisWarning, 'severity'>[],
): number => {
  const penalty = warnings.reduce(
    (sum, w) => sum + SEVERITY_PENALTY[w.severity],
    0,
  );
  return Math.max(0, STARTING_SCORE - penalty);
};

export const statusForScore = (score: number): FeasibilityStatus => {
  if (score >= FEASIBLE_MIN_SCORE) return 'feasible';
  if (score >= BORDERLINE_MIN_SCORE) return 'borderline';
  return 'not_recommended';
};

export const summarizeFeasibility = (
  warnings: readonly AnalysisWarning[],
): FeasibilitySummary => {
  const score = scoreWarnings(warnings);
  const status = statusForScore(score);
  return {
    status,
    score,
    statusMessage: STATUS_MESSAGE[status],
    warningCount: warnings.length,
    highSeverityCount: warnings.filter((w) => w.severity === 'high').length,
  };
};

export type FeasibilityEvaluation = {
  warnings: readonly AnalysisWarning[];
  feasibility: FeasibilitySummary;
};

/**
 * FeasibilityEvaluator
 *
 * Responsibilities:
 * - Apply an ordered rule set to precomputed analysis values.
 * - Emit warnings in rule order and fold them into a score and status.
 *
 * Non-responsibilities:
 * - No calculation of tonnage, flow or cycle values.
 * - No presentation (audience selection happens in the report view).
 */
export class FeasibilityEvaluator {
  private readonly rules: readonly WarningRule[];

  constructor(rules: readonly WarningRule[] = STANDARD_WARNING_RULES) {
    this.rules = rules;
  }

  evaluate(context: WarningRuleContext): FeasibilityEvaluation {
    const warnings: AnalysisWarning[] = [];
    for (const rule of this.rules) {
      const warning = applyWarningRule(rule, context);
      if (warning) warnings.push(warning);
    }

    return {
      warnings,
      feasibility: summarizeFeasibility(warnings),
    };
  }
}

export const feasibilityEvaluator = new FeasibilityEvaluator();

/**
 * Warning raised when the recommender finds no machine. An empty catalog
 * match is a finding, not a failure.
 */
export const noSuitableMachineWarning = (params: {
  requiredTonnage: number;
  requiredShotVolumeCm3: number;
  catalogSize: number;
}): AnalysisWarning =>
  Object.freeze({
    kind: 'no_suitable_machine',
    severity: 'medium',
    designerMessage:
      params.catalogSize === 0
        ? 'Machine catalog is empty - no machine could be ranked.'
        : `None of ${params.catalogSize} catalog machines can shoot ${params.requiredShotVolumeCm3.toFixed(1)} cm³ for a ${params.requiredTonnage.toFixed(0)}T requirement.`,
    customerMessage:
      'No machine in the current fleet fits this part - an external molder may be needed.',
    remediation:
      'Reduce cavity count, or add a machine with sufficient shot volume to the catalog.',
  });
