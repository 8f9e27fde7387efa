import { GATE_TYPES } from '../../domain/ProcessConfig';
import { validationError } from '../../reliability/DomainError';
import {
  REPORT_AUDIENCES,
  type ReportAudience,
} from '../../reports/AnalysisReportView';
import {
  readNumber,
  readOptionalNumber,
  readOptionalOneOf,
  readOptionalString,
  readRecord,
  readString,
  requireArray,
  requireRecord,
  type UnknownRecord,
} from '../../validation/RecordParsing';
import { handle, queryString, routeParam, sendData } from '../shared/http';
import {
  createAnalysis,
  getAnalysis,
  getAnalysisReport,
  recalculateAnalysis,
} from './analysis.service';
import type {
  CreateAnalysisRequest,
  ProcessConfigRequest,
  RecalculateAnalysisRequest,
} from './analysis.types';

const parseMachineIds = (body: UnknownRecord): string[] | undefined => {
  if (body.machineIds === undefined || body.machineIds === null) {
    return undefined;
  }
  return requireArray(body.machineIds, 'machineIds').map((id, index) => {
    if (typeof id !== 'string' || !id.trim()) {
      throw validationError(
        `machineIds[${index}]`,
        `machineIds[${index}] must be a non-empty string.`,
      );
    }
    return id.trim();
  });
};

const parseProcessConfig = (body: UnknownRecord): ProcessConfigRequest => {
  const config: ProcessConfigRequest = {
    cavityCount: readOptionalNumber(body, 'cavityCount'),
    gateType: readOptionalOneOf(body, 'gateType', GATE_TYPES),
    safetyFactor: readOptionalNumber(body, 'safetyFactor'),
    gateDiameterMm: readOptionalNumber(body, 'gateDiameterMm'),
    runnerDiameterMm: readOptionalNumber(body, 'runnerDiameterMm'),
  };
  if (body.gateLocationMm === undefined || body.gateLocationMm === null) {
    return config;
  }
  const gate = readRecord(body, 'gateLocationMm');
  const path = 'gateLocationMm.';
  return {
    ...config,
    gateLocationMm: {
      x: readNumber(gate, 'x', path),
      y: readNumber(gate, 'y', path),
      z: readNumber(gate, 'z', path),
    },
  };
};

const parseCreateRequest = (raw: unknown): CreateAnalysisRequest => {
  const body = requireRecord(raw, 'body');
  return {
    ...parseProcessConfig(body),
    partId: readString(body, 'partId'),
    materialId: readString(body, 'materialId'),
    machineIds: parseMachineIds(body),
  };
};

const parseRecalculateRequest = (raw: unknown): RecalculateAnalysisRequest => {
  const body = requireRecord(raw ?? {}, 'body');
  return {
    ...parseProcessConfig(body),
    materialId: readOptionalString(body, 'materialId'),
    machineIds: parseMachineIds(body),
  };
};

const parseAudience = (value: string | undefined): ReportAudience => {
  if (value === undefined) return 'designer';
  const audience = REPORT_AUDIENCES.find((a) => a === value);
  if (!audience) {
    throw validationError(
      'view',
      `view must be one of ${REPORT_AUDIENCES.join(', ')}.`,
    );
  }
  return audience;
};

export const postAnalysis = handle('analyses.create', (req, res) => {
  sendData(res, createAnalysis(parseCreateRequest(req.body)), 201);
});

export const getAnalysisDetail = handle('analyses.get', (req, res) => {
  sendData(res, getAnalysis(routeParam(req, 'id')));
});

export const postRecalculation = handle('analyses.recalculate', (req, res) => {
  const stored = recalculateAnalysis(
    routeParam(req, 'id'),
    parseRecalculateRequest(req.body),
  );
  sendData(res, stored, 201);
});

export const getReport = handle('analyses.report', (req, res) => {
  const audience = parseAudience(queryString(req, 'view'));
  sendData(res, getAnalysisReport(routeParam(req, 'id'), audience));
});
