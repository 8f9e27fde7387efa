import type {
  ProjectFields,
  ProjectPatch,
} from '../../persistence/ProjectStore';

export type CreateProjectRequest = ProjectFields;

export type UpdateProjectRequest = ProjectPatch;

/** What a project deletion removed along with the project. */
export type ProjectDeletion = {
  id: string;
  deletedPartIds: string[];
  deletedAnalysisCount: number;
};
