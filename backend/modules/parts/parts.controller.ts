import {
  readNumber,
  readOptionalNumber,
  readOptionalString,
  readRecord,
  readString,
  requireRecord,
  type UnknownRecord,
} from '../../validation/RecordParsing';
import { listAnalysesForPart } from '../analysis/analysis.service';
import { handle, routeParam, sendData } from '../shared/http';
import { createCadPart, createManualPart, getPart } from './parts.service';
import type { CadPartRequest, ManualPartRequest } from './parts.types';

const parseThickness = (body: UnknownRecord) => {
  if (body.wallThicknessMm === undefined || body.wallThicknessMm === null) {
    return undefined;
  }
  const range = readRecord(body, 'wallThicknessMm');
  const path = 'wallThicknessMm.';
  return {
    min: readNumber(range, 'min', path),
    avg: readNumber(range, 'avg', path),
    max: readNumber(range, 'max', path),
  };
};

const parseCadPart = (raw: unknown): CadPartRequest => {
  const body = requireRecord(raw, 'body');
  const bbox = readRecord(body, 'boundingBoxMm');
  const path = 'boundingBoxMm.';
  return {
    name: readString(body, 'name'),
    projectId: readOptionalString(body, 'projectId'),
    volumeCm3: readNumber(body, 'volumeCm3'),
    projectedAreaCm2: readNumber(body, 'projectedAreaCm2'),
    surfaceAreaCm2: readOptionalNumber(body, 'surfaceAreaCm2'),
    wallThicknessMm: parseThickness(body),
    boundingBoxMm: {
      x: readNumber(bbox, 'x', path),
      y: readNumber(bbox, 'y', path),
      z: readNumber(bbox, 'z', path),
    },
  };
};

const parseManualPart = (raw: unknown): ManualPartRequest => {
  const body = requireRecord(raw, 'body');
  return {
    name: readString(body, 'name'),
    projectId: readOptionalString(body, 'projectId'),
    lengthMm: readNumber(body, 'lengthMm'),
    widthMm: readNumber(body, 'widthMm'),
    heightMm: readNumber(body, 'heightMm'),
    avgThicknessMm: readNumber(body, 'avgThicknessMm'),
  };
};

export const postCadPart = handle('parts.create', (req, res) => {
  sendData(res, createCadPart(parseCadPart(req.body)), 201);
});

export const postManualPart = handle('parts.createManual', (req, res) => {
  sendData(res, createManualPart(parseManualPart(req.body)), 201);
});

export const getPartDetail = handle('parts.get', (req, res) => {
  sendData(res, getPart(routeParam(req, 'id')));
});

export const getPartAnalyses = handle('parts.analyses', (req, res) => {
  const part = getPart(routeParam(req, 'id'));
  sendData(res, listAnalysesForPart(part.id));
});
