export * from './analysis/AnalysisError';
export * from './analysis/AnalysisOrchestrator';
export type * from './analysis/AnalysisResult';
export * from './analysis/InputValidation';
export * from './calculations/CycleTimeCalculator';
export * from './calculations/FlowFillCalculator';
export * from './calculations/PartWeight';
export * from './calculations/TonnageCalculator';
export * from './catalog/CatalogSnapshot';
export * from './domain/GeometrySummary';
export * from './domain/MachineSpec';
export * from './domain/MaterialProperties';
export * from './domain/ProcessConfig';
export * from './feasibility/AnalysisWarning';
export * from './feasibility/FeasibilityEvaluator';
export * from './feasibility/StandardWarningRuleSet';
export * from './feasibility/WarningRule';
export * from './geometry/ManualGeometryEstimator';
export * from './machines/MachineRecommender';
export * from './reports/AnalysisReportView';
