import { BORDERLINE_FLOW_RATIO_FRACTION } from '../calculations/Formulas';

import type { WarningRule } from './WarningRule';

/**
 * Standard warning rule set (read-only).
 *
 * Evaluation order is the array order and is part of the result contract:
 * the warning list of an analysis follows this sequence exactly.
 * - No execution state
 * - No persistence
 * - Frozen exports
 */

export const THICK_SECTION_MM = 4;
export const VERY_THICK_SECTION_MM = 8;
export const THIN_SECTION_MM = 1;
export const LARGE_PROJECTED_AREA_CM2 = 500;
export const HIGH_TONNAGE_TONS = 500;

const freezeRule = (rule: WarningRule): Readonly<WarningRule> =>
  Object.freeze({ ...rule });

export const STANDARD_WARNING_RULE_SET_VERSION = 1 as const;

export const STANDARD_WARNING_RULES: readonly Readonly<WarningRule>[] =
  Object.freeze([
    // --- Wall thickness ---
    freezeRule({
      kind: 'thick_section',
      severity: 'medium',
      trigger: `max wall thickness > ${THICK_SECTION_MM} mm`,
      condition: (c) => c.maxThicknessMm > THICK_SECTION_MM,
      designerMessage: (c) =>
        `Max thickness ${c.maxThicknessMm.toFixed(1)}mm may cause sink marks and extended cooling time.`,
      customerMessage:
        'Thick section detected - may affect surface quality and increase cycle time.',
      remediation:
        'Consider coring out thick sections or reducing wall thickness.',
    }),

    // Independent of thick_section: a very thick wall raises both.
    freezeRule({
      kind: 'very_thick_section',
      severity: 'high',
      trigger: `max wall thickness >= ${VERY_THICK_SECTION_MM} mm`,
      condition: (c) => c.maxThicknessMm >= VERY_THICK_SECTION_MM,
      designerMessage: (c) =>
        `Max thickness ${c.maxThicknessMm.toFixed(1)}mm will significantly increase cycle time and risk of voids.`,
      customerMessage:
        'Very thick section - will increase production time and may affect part quality.',
      remediation: 'Strongly recommend a design review to reduce thickness.',
    }),

    freezeRule({
      kind: 'thin_section',
      severity: 'medium',
      trigger: `min wall thickness < ${THIN_SECTION_MM} mm`,
      condition: (c) => c.minThicknessMm < THIN_SECTION_MM,
      designerMessage: (c) =>
        `Min thickness ${c.minThicknessMm.toFixed(1)}mm risks short shots, especially far from the gate.`,
      customerMessage: 'Very thin areas may be difficult to fill completely.',
      remediation:
        'Position the gate near thin sections or increase wall thickness.',
    }),

    // --- Flow length (mutually exclusive bands) ---
    freezeRule({
      kind: 'high_flow_ratio',
      severity: 'high',
      trigger: 'flow length / avg thickness > material limit',
      condition: (c) => c.flowRatio > c.maxFlowLengthRatio,
      designerMessage: (c) =>
        `Flow L/t ratio ${c.flowRatio.toFixed(0)} exceeds the ${c.maxFlowLengthRatio.toFixed(0)} limit of ${c.materialName}.`,
      customerMessage:
        'Part geometry is challenging for this material - may need additional gates.',
      remediation:
        'Consider multiple gates, a higher-flow material, or thicker walls.',
    }),

    freezeRule({
      kind: 'borderline_flow_ratio',
      severity: 'low',
      trigger: `${BORDERLINE_FLOW_RATIO_FRACTION} x material limit <= flow length / avg thickness <= material limit`,
      condition: (c) =>
        c.flowRatio >= c.maxFlowLengthRatio * BORDERLINE_FLOW_RATIO_FRACTION &&
        c.flowRatio <= c.maxFlowLengthRatio,
      designerMessage: (c) =>
        `Flow L/t ratio ${c.flowRatio.toFixed(0)} is approaching the ${c.maxFlowLengthRatio.toFixed(0)} limit of ${c.materialName}.`,
      customerMessage:
        'Part is near the flow limit of this material - filling should be verified.',
      remediation:
        'Check gate position and consider a slightly thicker wall for margin.',
    }),

    // --- Size ---
    freezeRule({
      kind: 'large_projected_area',
      severity: 'low',
      trigger: `projected area > ${LARGE_PROJECTED_AREA_CM2} cm²`,
      condition: (c) => c.projectedAreaCm2 > LARGE_PROJECTED_AREA_CM2,
      designerMessage: (c) =>
        `Large projected area (${c.projectedAreaCm2.toFixed(0)} cm²) requires careful venting.`,
      customerMessage: 'Large part size - ensure adequate machine capacity.',
      remediation: 'Plan for adequate venting and balanced fill.',
    }),

    freezeRule({
      kind: 'high_tonnage',
      severity: 'medium',
      trigger: `recommended tonnage > ${HIGH_TONNAGE_TONS} T`,
      condition: (c) => c.recommendedTonnage > HIGH_TONNAGE_TONS,
      designerMessage: (c) =>
        `High tonnage requirement (${c.recommendedTonnage.toFixed(0)}T) - verify machine availability.`,
      customerMessage:
        'Requires a larger machine - may affect production costs.',
      remediation: 'Confirm machine availability with the molder.',
    }),
  ]);
