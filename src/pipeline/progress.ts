import { STAGE_WEIGHTS } from "../shared/constants.js";
import {
    ProjectProgress,
    ProjectStatus,
    SceneProgress,
    Stage,
    StageProgress,
} from "../shared/types/index.js";
import { ProjectRun } from "./project-run.js";

function weightedPercent(stages: Stage[]): number {
    const total = stages.reduce((sum, s) => sum + STAGE_WEIGHTS[ s.kind ], 0);
    if (total === 0) return 0;
    const done = stages
        .filter(s => s.state === "SUCCEEDED")
        .reduce((sum, s) => sum + STAGE_WEIGHTS[ s.kind ], 0);
    return Math.floor((100 * done) / total);
}

function toStageProgress(stage: Stage): StageProgress {
    return {
        id: stage.id,
        kind: stage.kind,
        state: stage.state,
        attempt: stage.attempt,
        retryCount: stage.retryCount,
        lastError: stage.lastError ? { ...stage.lastError } : null,
    };
}

function sceneStatus(stages: Stage[], projectCancelled: boolean): ProjectStatus {
    if (stages.every(s => s.state === "SUCCEEDED")) return "COMPLETED";
    if (projectCancelled) return "CANCELLED";
    // a cancelled stage inside a live scene means an upstream stage of that scene failed
    if (stages.some(s => (s.state === "FAILED" && s.retryAt === null) || s.state === "CANCELLED")) return "FAILED";
    if (stages.some(s => s.state === "RUNNING" || s.state === "SUCCEEDED" || s.state === "FAILED")) return "RUNNING";
    return "QUEUED";
}

/**
 * Weighted completion snapshot for a project. COMPLETED always reports 100.
 */
export function computeProgress(run: ProjectRun): ProjectProgress {
    const status = run.status();
    const cancelled = run.isCancelled();

    const perScene: SceneProgress[] = run.graph.scenes.map(group => {
        const stages = group.stageIndexes.map(i => run.stage(i));
        const scene = run.scene(group.sceneNumber);
        return {
            sceneNumber: group.sceneNumber,
            status: sceneStatus(stages, cancelled),
            percent: weightedPercent(stages),
            imageKey: scene.assets.imageKey ?? null,
            clipKey: scene.assets.clipKey ?? null,
            stages: stages.map(toStageProgress),
        };
    });

    return {
        projectId: run.projectId,
        title: run.project.title,
        status,
        percent: status === "COMPLETED" ? 100 : weightedPercent(run.stages),
        perScene,
        composition: toStageProgress(run.stage(run.graph.compositionIndex)),
        finalOutputKey: run.project.finalOutputKey,
        updatedAt: run.project.updatedAt.toISOString(),
    };
}
