import { v4 as uuid } from 'uuid';

export const PROJECT_STATUSES = ['draft', 'analyzed', 'reported'] as const;
export type ProjectStatus = (typeof PROJECT_STATUSES)[number];

/** Descriptive fields a caller may set; the store owns the rest. */
export type ProjectFields = {
  name: string;
  description?: string;
  customerName?: string;
  designerName?: string;
};

export type ProjectPatch = Partial<ProjectFields> & { status?: ProjectStatus };

export type StoredProject = Readonly<ProjectFields> & {
  readonly id: string;
  readonly status: ProjectStatus;
  readonly createdAt: string;
  readonly updatedAt?: string;
};

export type ProjectStoreOptions = {
  createId?: () => string;
  now?: () => Date;
};

/**
 * In-memory project registry. Projects group parts for one customer job.
 *
 * - Updates replace the stored record; earlier references stay unchanged.
 * - Listing is newest first.
 */
export class ProjectStore {
  private readonly projects = new Map<string, StoredProject>();
  private readonly createId: () => string;
  private readonly now: () => Date;

  constructor(options: ProjectStoreOptions = {}) {
    this.createId = options.createId ?? (() => uuid());
    this.now = options.now ?? (() => new Date());
  }

  create(fields: ProjectFields): StoredProject {
    const project: StoredProject = {
      id: this.createId(),
      name: fields.name,
      description: fields.description,
      customerName: fields.customerName,
      designerName: fields.designerName,
      status: 'draft',
      createdAt: this.now().toISOString(),
    };
    this.projects.set(project.id, Object.freeze(project));
    return project;
  }

  get(id: string): StoredProject | undefined {
    return this.projects.get(id);
  }

  list(): StoredProject[] {
    return Array.from(this.projects.values()).reverse();
  }

  /** Applies the given fields; absent ones keep their value. */
  update(id: string, patch: ProjectPatch): StoredProject | undefined {
    const current = this.projects.get(id);
    if (!current) return undefined;

    const next: StoredProject = Object.freeze({
      ...current,
      name: patch.name ?? current.name,
      description: patch.description ?? current.description,
      customerName: patch.customerName ?? current.customerName,
      designerName: patch.designerName ?? current.designerName,
      status: patch.status ?? current.status,
      updatedAt: this.now().toISOString(),
    });
    this.projects.set(id, next);
    return next;
  }

  delete(id: string): boolean {
    return this.projects.delete(id);
  }

  reset(): void {
    this.projects.clear();
  }
}

export const projectStore = new ProjectStore();
