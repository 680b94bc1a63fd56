// shared/types/stage.types.ts
import { SoundEffectSpec, Transition } from "./project.types.js";

// ============================================================================
// STAGE PROPERTIES
// ============================================================================

export const STAGE_KINDS = [
    "SAFETY_CHECK",
    "IMAGE_GEN",
    "ANIMATE",
    "AUDIO_MIX",
    "COMPOSITION"
] as const;
export type StageKind = (typeof STAGE_KINDS)[ number ];

export const STAGE_STATES = [
    "PENDING",
    "READY",
    "RUNNING",
    "SUCCEEDED",
    "FAILED",
    "CANCELLED"
] as const;
export type StageState = (typeof STAGE_STATES)[ number ];

export const RESOURCE_CLASSES = [ "GPU", "CPU" ] as const;
export type ResourceClass = (typeof RESOURCE_CLASSES)[ number ];

export const FAILURE_CLASSES = [ "TRANSIENT", "PERMANENT", "POLICY" ] as const;
export type FailureClass = (typeof FAILURE_CLASSES)[ number ];

export const RESOURCE_CLASS_BY_KIND: Record<StageKind, ResourceClass> = {
    SAFETY_CHECK: "CPU",
    IMAGE_GEN: "GPU",
    ANIMATE: "GPU",
    AUDIO_MIX: "CPU",
    COMPOSITION: "CPU",
};

export type StageFailure = {
    class: FailureClass;
    name: string;
    message: string;
    at: Date;
};

// ============================================================================
// STAGE PAYLOADS
// ============================================================================

export type SceneTransition = {
    fromScene: number;
    toScene: number;
    transition: Transition;
};

export type StagePayload =
    | { kind: "SAFETY_CHECK"; payload: { prompt: string; }; }
    | { kind: "IMAGE_GEN"; payload: { prompt: string; stylePreset: string; }; }
    | { kind: "ANIMATE"; payload: { prompt: string; durationSeconds: number; }; }
    | { kind: "AUDIO_MIX"; payload: { soundEffects: SoundEffectSpec[]; }; }
    | { kind: "COMPOSITION"; payload: { sceneNumbers: number[]; transitions: SceneTransition[]; }; };

type StageBase = {
    id: string;
    projectId: string;
    /** Position in the project's stage arena. Dependencies always point to lower indexes. */
    index: number;
    sceneNumber: number | null;
    resourceClass: ResourceClass;
    dependsOn: number[];
    state: StageState;
    attempt: number;
    retryCount: number;
    lastError: StageFailure | null;
    /** Set while an automatic retry is waiting out its backoff. */
    retryAt: Date | null;
    outputKey: string | null;
    timeoutMs: number;
    updatedAt: Date;
};

export type Stage = StageBase & StagePayload;
export type StageOfKind<K extends StageKind> = Extract<Stage, { kind: K; }>;

export type SceneStageGroup = {
    sceneNumber: number;
    stageIndexes: number[];
    /** Last stage of the scene chain; its output feeds composition. */
    outputIndex: number;
};

export type StageGraph = {
    projectId: string;
    stages: Stage[];
    /** Reverse adjacency: dependents[i] lists the stages that depend on stage i. */
    dependents: number[][];
    scenes: SceneStageGroup[];
    compositionIndex: number;
};

export type StageChange = {
    index: number;
    from: StageState;
    to: StageState;
};
