export type WarningSeverity = 'low' | 'medium' | 'high';

export type WarningKind =
  | 'thick_section'
  | 'very_thick_section'
  | 'thin_section'
  | 'high_flow_ratio'
  | 'borderline_flow_ratio'
  | 'large_projected_area'
  | 'high_tonnage'
  | 'no_suitable_machine';

/**
 * AnalysisWarning (value object).
 *
 * Generated fresh per analysis and only ever stored inside its
 * AnalysisResult. Carries one message per audience so reports never
 * recompute anything.
 */
export type AnalysisWarning = {
  readonly kind: WarningKind;
  readonly severity: WarningSeverity;
  readonly designerMessage: string;
  readonly customerMessage: string;
  readonly remediation?: string;
};
