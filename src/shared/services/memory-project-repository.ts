import { ProjectRecord, Stage } from "../types/index.js";
import { ProjectRepository, SaveStagesOptions } from "./project-repository.js";

type StoredProject = {
    project: ProjectRecord;
    stages: Map<string, Stage>;
};

/**
 * Process-local repository. Used by tests and by `PROJECT_STORE_DRIVER=memory`.
 * Values are cloned on the way in and out so callers never share state with the store.
 */
export class InMemoryProjectRepository implements ProjectRepository {
    private readonly projects = new Map<string, StoredProject>();

    async createProject(project: ProjectRecord, stages: Stage[]): Promise<void> {
        if (this.projects.has(project.id)) {
            throw new Error(`Project ${project.id} already exists`);
        }
        this.projects.set(project.id, {
            project: structuredClone(project),
            stages: new Map(stages.map(s => [ s.id, structuredClone(s) ])),
        });
    }

    async getProject(projectId: string): Promise<ProjectRecord | null> {
        const stored = this.projects.get(projectId);
        return stored ? structuredClone(stored.project) : null;
    }

    async loadStages(projectId: string): Promise<Stage[]> {
        const stored = this.projects.get(projectId);
        if (!stored) return [];
        return [ ...stored.stages.values() ]
            .sort((a, b) => a.index - b.index)
            .map(s => structuredClone(s));
    }

    async saveStages(projectId: string, stages: Stage[], options: SaveStagesOptions = {}): Promise<void> {
        const stored = this.projects.get(projectId);
        if (!stored) {
            throw new Error(`Project ${projectId} not found`);
        }
        for (const stage of stages) {
            stored.stages.set(stage.id, structuredClone(stage));
        }
        for (const scene of options.scenes ?? []) {
            const target = stored.project.scenes.find(s => s.sceneNumber === scene.sceneNumber);
            if (target) target.assets = { ...scene.assets };
        }
        stored.project = {
            ...stored.project,
            ...structuredClone(options.project ?? {}),
            updatedAt: new Date(),
        };
    }

    async listRecoverableProjects(): Promise<string[]> {
        const ids: string[] = [];
        for (const [ id, stored ] of this.projects) {
            if (stored.project.cancelRequestedAt) continue;
            const live = [ ...stored.stages.values() ].some(s =>
                s.state === "PENDING" || s.state === "READY" || s.state === "RUNNING" ||
                (s.state === "FAILED" && s.retryAt !== null));
            if (live) ids.push(id);
        }
        return ids;
    }

    async deleteProject(projectId: string): Promise<void> {
        this.projects.delete(projectId);
    }

    async ping(): Promise<void> { }
}
