import { PROJECT_STATUSES } from '../../persistence/ProjectStore';
import {
  readOptionalOneOf,
  readOptionalString,
  readString,
  requireRecord,
} from '../../validation/RecordParsing';
import { handle, routeParam, sendData } from '../shared/http';
import {
  createProject,
  deleteProject,
  getProject,
  listProjectParts,
  listProjects,
  updateProject,
} from './projects.service';
import type {
  CreateProjectRequest,
  UpdateProjectRequest,
} from './projects.types';

const parseCreateProject = (raw: unknown): CreateProjectRequest => {
  const body = requireRecord(raw, 'body');
  return {
    name: readString(body, 'name'),
    description: readOptionalString(body, 'description'),
    customerName: readOptionalString(body, 'customerName'),
    designerName: readOptionalString(body, 'designerName'),
  };
};

const parseUpdateProject = (raw: unknown): UpdateProjectRequest => {
  const body = requireRecord(raw, 'body');
  return {
    name: readOptionalString(body, 'name'),
    description: readOptionalString(body, 'description'),
    customerName: readOptionalString(body, 'customerName'),
    designerName: readOptionalString(body, 'designerName'),
    status: readOptionalOneOf(body, 'status', PROJECT_STATUSES),
  };
};

export const getProjects = handle('projects.list', (_req, res) => {
  sendData(res, listProjects());
});

export const getProjectDetail = handle('projects.get', (req, res) => {
  sendData(res, getProject(routeParam(req, 'id')));
});

export const postProject = handle('projects.create', (req, res) => {
  sendData(res, createProject(parseCreateProject(req.body)), 201);
});

export const putProject = handle('projects.update', (req, res) => {
  sendData(
    res,
    updateProject(routeParam(req, 'id'), parseUpdateProject(req.body)),
  );
});

export const removeProject = handle('projects.delete', (req, res) => {
  sendData(res, deleteProject(routeParam(req, 'id')));
});

export const getProjectParts = handle('projects.parts', (req, res) => {
  sendData(res, listProjectParts(routeParam(req, 'id')));
});
