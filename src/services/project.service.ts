import type { EntityStore, ProjectRecord } from '../store/types.js';
import { NotFoundError, ValidationError } from '../utils/errors.js';
import type { AuditContext, AuditService } from './audit.service.js';

export class ProjectService {
  constructor(
    private readonly store: EntityStore,
    private readonly audit: AuditService,
  ) {}

  async getProject(id: number): Promise<ProjectRecord> {
    const project = await this.store.projects.findById(id);
    if (!project) throw new NotFoundError('project', id);
    return project;
  }

  listProjects(): Promise<ProjectRecord[]> {
    return this.store.projects.findAll();
  }

  async createProject(name: string, context: AuditContext): Promise<ProjectRecord> {
    if (name.trim().length === 0) throw ValidationError.field('name', 'name is required');
    return this.store.transaction(async (uow) => {
      const project = await uow.projects.create(name.trim());
      await this.audit.logCreate(uow, context, 'project', project.id, { name: project.name });
      return project;
    });
  }
}
