import { analysisStore } from '../../persistence/AnalysisStore';
import { partStore, type StoredPart } from '../../persistence/PartStore';
import {
  projectStore,
  type StoredProject,
} from '../../persistence/ProjectStore';
import { notFoundError } from '../../reliability/DomainError';
import type {
  CreateProjectRequest,
  ProjectDeletion,
  UpdateProjectRequest,
} from './projects.types';

export function listProjects(): StoredProject[] {
  return projectStore.list();
}

export function getProject(id: string): StoredProject {
  const project = projectStore.get(id);
  if (!project) throw notFoundError('Project', id);
  return project;
}

export function createProject(request: CreateProjectRequest): StoredProject {
  return projectStore.create(request);
}

export function updateProject(
  id: string,
  request: UpdateProjectRequest,
): StoredProject {
  const updated = projectStore.update(id, request);
  if (!updated) throw notFoundError('Project', id);
  return updated;
}

/** Deletes the project with its parts and their analysis history. */
export function deleteProject(id: string): ProjectDeletion {
  getProject(id);
  const deletedPartIds = partStore.deleteForProject(id);
  const deletedAnalysisCount = deletedPartIds.reduce(
    (count, partId) => count + analysisStore.deleteForPart(partId),
    0,
  );
  projectStore.delete(id);
  return { id, deletedPartIds, deletedAnalysisCount };
}

export function listProjectParts(id: string): StoredPart[] {
  return partStore.listForProject(getProject(id).id);
}

/** A first analysis moves a draft project on; later states are kept. */
export function markProjectAnalyzed(id: string): void {
  if (projectStore.get(id)?.status === 'draft') {
    projectStore.update(id, { status: 'analyzed' });
  }
}
