import type {
  AnalysisWarning,
  WarningKind,
  WarningSeverity,
} from './AnalysisWarning';

/**
 * Values a warning rule may inspect. Everything is already computed by the
 * calculators; rules only compare.
 */
export type WarningRuleContext = {
  minThicknessMm: number;
  maxThicknessMm: number;
  projectedAreaCm2: number;
  flowRatio: number;
  maxFlowLengthRatio: number;
  recommendedTonnage: number;
  materialName: string;
};

/**
 * WarningRule (typed rule record).
 *
 * - `condition` is a pure predicate over the context.
 * - Messages are rendered from the same context that triggered the rule.
 * - Rules are evaluated in the order of the rule set that holds them.
 */
export type WarningRule = {
  kind: WarningKind;
  severity: WarningSeverity;
  /** Human-readable statement of the trigger, for audits and docs. */
  trigger: string;
  condition: (context: WarningRuleContext) => boolean;
  designerMessage: (context: WarningRuleContext) => string;
  customerMessage: string;
  remediation?: string;
};

export const applyWarningRule = (
  rule: WarningRule,
  context: WarningRuleContext,
): AnalysisWarning | null => {
  if (!rule.condition(context)) return null;

  const warning: AnalysisWarning = {
    kind: rule.kind,
    severity: rule.severity,
    designerMessage: rule.designerMessage(context),
    customerMessage: rule.customerMessage,
    ...(rule.remediation ? { remediation: rule.remediation } : {}),
  };
  return Object.freeze(warning);
};
