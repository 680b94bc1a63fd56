import { and, asc, eq, inArray, isNotNull, isNull, or, sql } from "drizzle-orm";
import { PgColumn } from "drizzle-orm/pg-core";
import { Database } from "../db/index.js";
import { projects, scenes, stages } from "../db/schema.js";
import {
    mapDbProjectToDomain,
    mapDbStageToDomain,
    mapDomainProjectToDb,
    mapDomainSceneToDb,
    mapDomainStageToDb,
} from "../domain/stage-mappers.js";
import { ProjectRecord, SceneRecord, Stage } from "../types/index.js";
import { PoolManager } from "./pool-manager.js";

export type ProjectFieldsUpdate = Partial<Pick<ProjectRecord, "cancelRequestedAt" | "finalOutputKey">>;

export type SaveStagesOptions = {
    /** Scenes whose asset references changed with these transitions. */
    scenes?: SceneRecord[];
    project?: ProjectFieldsUpdate;
};

/**
 * Durable store for projects, scenes and stage state.
 * A stage transition and everything it implies is written in one `saveStages` call.
 */
export interface ProjectRepository {
    createProject(project: ProjectRecord, stages: Stage[]): Promise<void>;
    getProject(projectId: string): Promise<ProjectRecord | null>;
    loadStages(projectId: string): Promise<Stage[]>;
    saveStages(projectId: string, stages: Stage[], options?: SaveStagesOptions): Promise<void>;
    /** Ids of projects that still have stages to run or retry. */
    listRecoverableProjects(): Promise<string[]>;
    deleteProject(projectId: string): Promise<void>;
    ping(): Promise<void>;
}

/** `SET col = excluded.col` for upserts. */
function excluded(column: PgColumn) {
    return sql.raw(`excluded.${column.name}`);
}

export class PostgresProjectRepository implements ProjectRepository {

    constructor(
        private readonly db: Database,
        private readonly poolManager: PoolManager,
    ) { }

    private async guarded<T>(operation: string, fn: () => Promise<T>): Promise<T> {
        if (this.poolManager.getCircuitState() === "open") {
            throw new Error(`[ProjectRepository] ${operation} refused: breaker open`);
        }
        try {
            return await fn();
        } catch (error) {
            this.poolManager.recordError(error);
            throw error;
        }
    }

    async createProject(project: ProjectRecord, stageList: Stage[]): Promise<void> {
        await this.guarded("createProject", () => this.db.transaction(async (tx) => {
            await tx.insert(projects).values(mapDomainProjectToDb(project));
            if (project.scenes.length > 0) {
                await tx.insert(scenes).values(project.scenes.map(s => mapDomainSceneToDb(project.id, s)));
            }
            if (stageList.length > 0) {
                await tx.insert(stages).values(stageList.map(mapDomainStageToDb));
            }
        }));
        console.debug({ projectId: project.id, stages: stageList.length }, "[ProjectRepository] project created");
    }

    async getProject(projectId: string): Promise<ProjectRecord | null> {
        return this.guarded("getProject", async () => {
            const [ record ] = await this.db.select().from(projects).where(eq(projects.id, projectId));
            if (!record) return null;

            const sceneRows = await this.db.select().from(scenes)
                .where(eq(scenes.projectId, projectId))
                .orderBy(asc(scenes.sceneNumber));
            return mapDbProjectToDomain(record, sceneRows);
        });
    }

    async loadStages(projectId: string): Promise<Stage[]> {
        return this.guarded("loadStages", async () => {
            const rows = await this.db.select().from(stages)
                .where(eq(stages.projectId, projectId))
                .orderBy(asc(stages.stageIndex));
            return rows.map(mapDbStageToDomain);
        });
    }

    async saveStages(projectId: string, stageList: Stage[], options: SaveStagesOptions = {}): Promise<void> {
        const now = new Date();
        await this.guarded("saveStages", () => this.db.transaction(async (tx) => {
            if (stageList.length > 0) {
                await tx.insert(stages)
                    .values(stageList.map(mapDomainStageToDb))
                    .onConflictDoUpdate({
                        target: stages.id,
                        set: {
                            state: excluded(stages.state),
                            attempt: excluded(stages.attempt),
                            retryCount: excluded(stages.retryCount),
                            lastError: excluded(stages.lastError),
                            retryAt: excluded(stages.retryAt),
                            outputKey: excluded(stages.outputKey),
                            updatedAt: excluded(stages.updatedAt),
                        },
                    });
            }

            for (const scene of options.scenes ?? []) {
                await tx.update(scenes)
                    .set({ imageKey: scene.assets.imageKey ?? null, clipKey: scene.assets.clipKey ?? null, updatedAt: now })
                    .where(and(eq(scenes.projectId, projectId), eq(scenes.sceneNumber, scene.sceneNumber)));
            }

            await tx.update(projects)
                .set({ ...options.project, updatedAt: now })
                .where(eq(projects.id, projectId));
        }));
    }

    async listRecoverableProjects(): Promise<string[]> {
        return this.guarded("listRecoverableProjects", async () => {
            const rows = await this.db.selectDistinct({ projectId: stages.projectId })
                .from(stages)
                .innerJoin(projects, eq(projects.id, stages.projectId))
                .where(and(
                    isNull(projects.cancelRequestedAt),
                    or(
                        inArray(stages.state, [ "PENDING", "READY", "RUNNING" ]),
                        and(eq(stages.state, "FAILED"), isNotNull(stages.retryAt)),
                    ),
                ));
            return rows.map(r => r.projectId);
        });
    }

    async deleteProject(projectId: string): Promise<void> {
        // scenes and stages cascade
        await this.guarded("deleteProject", () => this.db.delete(projects).where(eq(projects.id, projectId)));
    }

    async ping(): Promise<void> {
        await this.poolManager.query("SELECT 1");
    }
}
