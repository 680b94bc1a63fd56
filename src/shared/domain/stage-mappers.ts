import { z } from "zod";
import {
    ProjectRecord,
    SceneRecord,
    SoundEffectSpec,
    Stage,
    StageFailure,
    Transition,
} from "../types/index.js";
import {
    InsertProjectRow,
    InsertSceneRow,
    InsertStageRow,
    ProjectRow,
    SceneRow,
    StageRow,
    StoredStageFailure,
} from "../db/schema.js";

const SceneTransitionSchema = z.object({
    fromScene: z.number().int(),
    toScene: z.number().int(),
    transition: Transition,
});

/** Validates a stored payload against the stage kind it belongs to. */
const StoredStagePayload = z.discriminatedUnion("kind", [
    z.object({ kind: z.literal("SAFETY_CHECK"), payload: z.object({ prompt: z.string() }) }),
    z.object({ kind: z.literal("IMAGE_GEN"), payload: z.object({ prompt: z.string(), stylePreset: z.string() }) }),
    z.object({ kind: z.literal("ANIMATE"), payload: z.object({ prompt: z.string(), durationSeconds: z.number() }) }),
    z.object({ kind: z.literal("AUDIO_MIX"), payload: z.object({ soundEffects: z.array(SoundEffectSpec) }) }),
    z.object({
        kind: z.literal("COMPOSITION"),
        payload: z.object({ sceneNumbers: z.array(z.number().int()), transitions: z.array(SceneTransitionSchema) }),
    }),
]);

function toStoredFailure(failure: StageFailure | null): StoredStageFailure | null {
    if (!failure) return null;
    return { ...failure, at: failure.at.toISOString() };
}

function fromStoredFailure(failure: StoredStageFailure | null): StageFailure | null {
    if (!failure) return null;
    return { ...failure, at: new Date(failure.at) };
}

export function mapDbStageToDomain(row: StageRow): Stage {
    const typed = StoredStagePayload.parse({ kind: row.kind, payload: row.payload });
    return {
        id: row.id,
        projectId: row.projectId,
        index: row.stageIndex,
        sceneNumber: row.sceneNumber,
        resourceClass: row.resourceClass,
        dependsOn: [ ...row.dependsOn ],
        state: row.state,
        attempt: row.attempt,
        retryCount: row.retryCount,
        lastError: fromStoredFailure(row.lastError),
        retryAt: row.retryAt,
        outputKey: row.outputKey,
        timeoutMs: row.timeoutMs,
        updatedAt: row.updatedAt,
        ...typed,
    };
}

export function mapDomainStageToDb(stage: Stage): InsertStageRow {
    return {
        id: stage.id,
        projectId: stage.projectId,
        stageIndex: stage.index,
        kind: stage.kind,
        sceneNumber: stage.sceneNumber,
        resourceClass: stage.resourceClass,
        dependsOn: stage.dependsOn,
        state: stage.state,
        attempt: stage.attempt,
        retryCount: stage.retryCount,
        lastError: toStoredFailure(stage.lastError),
        retryAt: stage.retryAt,
        outputKey: stage.outputKey,
        timeoutMs: stage.timeoutMs,
        payload: { ...stage.payload },
        updatedAt: stage.updatedAt,
    };
}

export function mapDbSceneToDomain(row: SceneRow): SceneRecord {
    return {
        sceneNumber: row.sceneNumber,
        prompt: row.prompt,
        durationSeconds: row.durationSeconds,
        stylePreset: row.stylePreset,
        soundEffects: row.soundEffects,
        transitionToNext: row.transitionToNext,
        assets: {
            ...(row.imageKey ? { imageKey: row.imageKey } : {}),
            ...(row.clipKey ? { clipKey: row.clipKey } : {}),
        },
    };
}

export function mapDomainSceneToDb(projectId: string, scene: SceneRecord): InsertSceneRow {
    return {
        projectId,
        sceneNumber: scene.sceneNumber,
        prompt: scene.prompt,
        durationSeconds: scene.durationSeconds,
        stylePreset: scene.stylePreset,
        soundEffects: scene.soundEffects,
        transitionToNext: scene.transitionToNext,
        imageKey: scene.assets.imageKey ?? null,
        clipKey: scene.assets.clipKey ?? null,
        updatedAt: new Date(),
    };
}

export function mapDbProjectToDomain(row: ProjectRow, sceneRows: SceneRow[]): ProjectRecord {
    return {
        id: row.id,
        title: row.title,
        compositionPolicy: row.compositionPolicy,
        cancelRequestedAt: row.cancelRequestedAt,
        finalOutputKey: row.finalOutputKey,
        createdAt: row.createdAt,
        updatedAt: row.updatedAt,
        scenes: [ ...sceneRows ]
            .sort((a, b) => a.sceneNumber - b.sceneNumber)
            .map(mapDbSceneToDomain),
    };
}

export function mapDomainProjectToDb(project: ProjectRecord): InsertProjectRow {
    return {
        id: project.id,
        title: project.title,
        compositionPolicy: project.compositionPolicy,
        cancelRequestedAt: project.cancelRequestedAt,
        finalOutputKey: project.finalOutputKey,
        createdAt: project.createdAt,
        updatedAt: project.updatedAt,
    };
}
