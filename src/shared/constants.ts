import { StageKind } from "./types/index.js";

export const PIPELINE_EVENTS_TOPIC_NAME = "pipeline-events";
export const PIPELINE_COMMANDS_TOPIC_NAME = "pipeline-commands";

export const PIPELINE_COMMANDS_SUBSCRIPTION = "pipeline-commands-subscription";

export const SOUND_LIBRARY_PREFIX = "sfx";

/** Relative cost of each stage kind, used for the progress percentage. */
export const STAGE_WEIGHTS: Record<StageKind, number> = {
    SAFETY_CHECK: 1,
    IMAGE_GEN: 6,
    ANIMATE: 8,
    AUDIO_MIX: 2,
    COMPOSITION: 5,
};

export const DEFAULT_STAGE_TIMEOUTS_MS: Record<StageKind, number> = {
    SAFETY_CHECK: 30_000,
    IMAGE_GEN: 120_000,
    ANIMATE: 300_000,
    AUDIO_MIX: 120_000,
    COMPOSITION: 300_000,
};
