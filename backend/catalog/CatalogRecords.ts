import type { MachineSpec } from '../domain/MachineSpec';
import {
  MATERIAL_MORPHOLOGIES,
  type MaterialProperties,
  VISCOSITY_CLASSES,
} from '../domain/MaterialProperties';
import {
  readNumber,
  readOneOf,
  readOptionalBoolean,
  readOptionalNumber,
  readOptionalOneOf,
  readOptionalString,
  readRange,
  readRecord,
  readString,
  requireRecord,
} from '../validation/RecordParsing';

/** Builds a typed material record from untrusted JSON. */
export const parseMaterialRecord = (
  raw: unknown,
  path = '',
): MaterialProperties => {
  const record = requireRecord(raw, path ? path.replace(/\.$/, '') : 'body');
  return {
    id: readString(record, 'id', path),
    name: readString(record, 'name', path),
    manufacturer: readOptionalString(record, 'manufacturer', path),
    grade: readOptionalString(record, 'grade', path),
    category: readString(record, 'category', path),
    morphology: readOptionalOneOf(
      record,
      'morphology',
      MATERIAL_MORPHOLOGIES,
      path,
    ),
    meltTempC: readRange(record, 'meltTempC', path),
    moldTempC: readRange(record, 'moldTempC', path),
    densityGPerCm3: readNumber(record, 'densityGPerCm3', path),
    shrinkagePercent: readRange(record, 'shrinkagePercent', path),
    meltFlowIndex: readOptionalNumber(record, 'meltFlowIndex', path),
    viscosityClass: readOneOf(
      record,
      'viscosityClass',
      VISCOSITY_CLASSES,
      path,
    ),
    maxFlowLengthRatio: readNumber(record, 'maxFlowLengthRatio', path),
    cavityPressureMpa: readRange(record, 'cavityPressureMpa', path),
    isCustom: readOptionalBoolean(record, 'isCustom', path),
    source: readOptionalString(record, 'source', path),
  };
};

/** Builds a typed machine record from untrusted JSON. */
export const parseMachineRecord = (raw: unknown, path = ''): MachineSpec => {
  const record = requireRecord(raw, path ? path.replace(/\.$/, '') : 'body');
  const platen = readRecord(record, 'platenMm', path);
  const tieBars = readRecord(record, 'tieBarSpacingMm', path);
  return {
    id: readString(record, 'id', path),
    name: readString(record, 'name', path),
    manufacturer: readOptionalString(record, 'manufacturer', path),
    tonnage: readNumber(record, 'tonnage', path),
    maxShotVolumeCm3: readNumber(record, 'maxShotVolumeCm3', path),
    screwDiameterMm: readOptionalNumber(record, 'screwDiameterMm', path),
    platenMm: {
      width: readNumber(platen, 'width', `${path}platenMm.`),
      height: readNumber(platen, 'height', `${path}platenMm.`),
    },
    tieBarSpacingMm: {
      horizontal: readNumber(tieBars, 'horizontal', `${path}tieBarSpacingMm.`),
      vertical: readNumber(tieBars, 'vertical', `${path}tieBarSpacingMm.`),
    },
    typicalUse: readOptionalString(record, 'typicalUse', path),
    isCustom: readOptionalBoolean(record, 'isCustom', path),
  };
};
