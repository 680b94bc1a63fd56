// shared/types/progress.types.ts
import { ProjectStatus } from "./project.types.js";
import { StageFailure, StageKind, StageState } from "./stage.types.js";

export type StageProgress = {
    id: string;
    kind: StageKind;
    state: StageState;
    attempt: number;
    retryCount: number;
    lastError: StageFailure | null;
};

export type SceneProgress = {
    sceneNumber: number;
    status: ProjectStatus;
    percent: number;
    imageKey: string | null;
    clipKey: string | null;
    stages: StageProgress[];
};

export type ProjectProgress = {
    projectId: string;
    title: string;
    status: ProjectStatus;
    percent: number;
    perScene: SceneProgress[];
    composition: StageProgress;
    finalOutputKey: string | null;
    updatedAt: string;
};
