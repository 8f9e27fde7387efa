import type { Request, Response } from 'express';

import {
  parseMachineRecord,
  parseMaterialRecord,
} from '../../catalog/CatalogRecords';
import { VISCOSITY_CLASSES } from '../../domain/MaterialProperties';
import { validationError } from '../../reliability/DomainError';
import { handle, queryString, routeParam, sendData } from '../shared/http';
import {
  createCustomMachine,
  createCustomMaterial,
  getMachine,
  getMaterial,
  listMaterialCategories,
  queryMachines,
  queryMaterials,
  recommendMachines,
} from './catalog.service';
import type { PageRequest, PaginatedResult } from './catalog.types';

const parseBoolean = (value: unknown): boolean | undefined => {
  if (value === undefined || value === null) return undefined;
  if (value === 'true' || value === true) return true;
  if (value === 'false' || value === false) return false;
  return undefined;
};

const parseNumber = (value: unknown): number | undefined => {
  if (value === undefined || value === '') return undefined;
  const num = Number(value);
  return Number.isFinite(num) ? num : undefined;
};

/** Strict variant for required inputs: a non-numeric value is an error. */
const readQueryNumber = (req: Request, name: string): number | undefined => {
  const raw = queryString(req, name);
  if (raw === undefined) return undefined;
  const num = Number(raw);
  if (!Number.isFinite(num)) {
    throw validationError(name, `${name} must be a finite number.`);
  }
  return num;
};

const parsePage = (req: Request): PageRequest => ({
  page: parseNumber(req.query.page),
  pageSize: parseNumber(req.query.pageSize),
});

const sendPage = <T>(res: Response, result: PaginatedResult<T>) => {
  res.json({
    success: true,
    data: result.items,
    pagination: {
      total: result.total,
      page: result.page,
      pageSize: result.pageSize,
    },
  });
};

export const listMaterials = handle('materials.list', (req, res) => {
  const viscosity = queryString(req, 'viscosityClass');
  sendPage(
    res,
    queryMaterials(
      {
        category: queryString(req, 'category'),
        viscosityClass: VISCOSITY_CLASSES.find((v) => v === viscosity),
        search: queryString(req, 'search'),
        customOnly: parseBoolean(req.query.customOnly),
      },
      parsePage(req),
    ),
  );
});

export const listCategories = handle('materials.categories', (_req, res) => {
  sendData(res, listMaterialCategories());
});

export const getMaterialDetail = handle('materials.get', (req, res) => {
  sendData(res, getMaterial(routeParam(req, 'id')));
});

export const createMaterial = handle('materials.create', (req, res) => {
  sendData(res, createCustomMaterial(parseMaterialRecord(req.body)), 201);
});

export const listMachines = handle('machines.list', (req, res) => {
  sendPage(
    res,
    queryMachines(
      {
        minTonnage: parseNumber(req.query.minTonnage),
        maxTonnage: parseNumber(req.query.maxTonnage),
        minShotVolumeCm3: parseNumber(req.query.minShotVolumeCm3),
      },
      parsePage(req),
    ),
  );
});

export const getMachineRecommendations = handle(
  'machines.recommend',
  (req, res) => {
    sendData(
      res,
      recommendMachines({
        tonnage: readQueryNumber(req, 'tonnage'),
        shotVolumeCm3: readQueryNumber(req, 'shotVolumeCm3'),
      }),
    );
  },
);

export const getMachineDetail = handle('machines.get', (req, res) => {
  sendData(res, getMachine(routeParam(req, 'id')));
});

export const createMachine = handle('machines.create', (req, res) => {
  sendData(res, createCustomMachine(parseMachineRecord(req.body)), 201);
});
