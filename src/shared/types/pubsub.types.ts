// shared/types/pubsub.types.ts
import { ProjectInput, ProjectStatus } from "./project.types.js";
import { ProjectProgress } from "./progress.types.js";
import { FailureClass, StageKind, StageState } from "./stage.types.js";

export type PubSubMessage<T extends string, P = undefined> = P extends undefined ? {
    type: T;
    projectId: string;
    commandId?: string;
    timestamp: string;
} : {
    type: T;
    projectId: string;
    commandId?: string;
    timestamp: string;
    payload: P;
};

// ===== COMMANDS (API -> Pipeline) =====

export type PipelineCommand =
    | SubmitProjectCommand
    | CancelProjectCommand
    | RetryProjectCommand
    | RequestProgressCommand
    | DeleteProjectCommand;

export type SubmitProjectCommand = PubSubMessage<
    "SUBMIT_PROJECT",
    {
        project: ProjectInput;
    }
>;

export type CancelProjectCommand = PubSubMessage<"CANCEL_PROJECT">;

export type RetryProjectCommand = PubSubMessage<"RETRY_PROJECT">;

export type RequestProgressCommand = PubSubMessage<"REQUEST_PROGRESS">;

export type DeleteProjectCommand = PubSubMessage<"DELETE_PROJECT">;

export const PIPELINE_COMMAND_TYPES = [
    "SUBMIT_PROJECT",
    "CANCEL_PROJECT",
    "RETRY_PROJECT",
    "REQUEST_PROGRESS",
    "DELETE_PROJECT"
] as const satisfies readonly PipelineCommand[ "type" ][];

// ===== EVENTS (Pipeline -> API) =====

export type PipelineEvent =
    | ProjectSubmittedEvent
    | StageStateChangedEvent
    | ProjectProgressEvent
    | ProjectStatusChangedEvent
    | ProjectCompletedEvent
    | ProjectFailedEvent
    | ProjectCancelledEvent
    | ProjectRetriedEvent
    | ProjectDeletedEvent
    | CommandFailedEvent
    | LogEvent;

export type ProjectSubmittedEvent = PubSubMessage<
    "PROJECT_SUBMITTED",
    {
        title: string;
        sceneCount: number;
        totalStages: number;
    }
>;

export type StageStateChangedEvent = PubSubMessage<
    "STAGE_STATE_CHANGED",
    {
        stageId: string;
        kind: StageKind;
        sceneNumber: number | null;
        from: StageState;
        to: StageState;
        attempt: number;
        retryCount: number;
        error?: string;
    }
>;

export type ProjectProgressEvent = PubSubMessage<
    "PROJECT_PROGRESS",
    {
        progress: ProjectProgress;
    }
>;

export type ProjectStatusChangedEvent = PubSubMessage<
    "PROJECT_STATUS_CHANGED",
    {
        from: ProjectStatus;
        to: ProjectStatus;
    }
>;

export type ProjectCompletedEvent = PubSubMessage<
    "PROJECT_COMPLETED",
    {
        finalOutputKey: string | null;
    }
>;

export type ProjectFailedEvent = PubSubMessage<
    "PROJECT_FAILED",
    {
        failures: {
            stageId: string;
            kind: StageKind;
            sceneNumber: number | null;
            class: FailureClass;
            message: string;
        }[];
    }
>;

export type ProjectCancelledEvent = PubSubMessage<"PROJECT_CANCELLED">;

export type ProjectRetriedEvent = PubSubMessage<
    "PROJECT_RETRIED",
    {
        resetStages: string[];
    }
>;

export type ProjectDeletedEvent = PubSubMessage<"PROJECT_DELETED">;

export type CommandFailedEvent = PubSubMessage<
    "COMMAND_FAILED",
    {
        command: PipelineCommand[ "type" ];
        errorName: string;
        error: string;
    }
>;

export type LogEvent = PubSubMessage<
    "LOG",
    {
        level: "info" | "warn" | "error" | "debug";
        message: string;
        stageId?: string;
        workerId?: string;
    }
>;

export type PipelineEventSink = (event: PipelineEvent) => Promise<void>;
