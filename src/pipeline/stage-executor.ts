import { v7 as uuidv7 } from "uuid";
import { Capabilities } from "../shared/capabilities/capability-types.js";
import { logContextStore } from "../shared/format-loggers.js";
import { AssetStore, getAssetKey } from "../shared/services/storage-manager.js";
import { ClipAsset, StageOfKind, Transition } from "../shared/types/index.js";
import { InvariantViolation, StageTimeoutError } from "../shared/utils/errors.js";
import { SafetyGate } from "./safety-gate.js";

export type CompositionInput = {
    sceneNumber: number;
    clipKey: string;
    transitionToNext: Transition;
};

export type StageTask =
    | { kind: "SAFETY_CHECK"; stage: StageOfKind<"SAFETY_CHECK">; }
    | { kind: "IMAGE_GEN"; stage: StageOfKind<"IMAGE_GEN">; }
    | { kind: "ANIMATE"; stage: StageOfKind<"ANIMATE">; imageKey: string; }
    | { kind: "AUDIO_MIX"; stage: StageOfKind<"AUDIO_MIX">; clipKey: string; }
    | { kind: "COMPOSITION"; stage: StageOfKind<"COMPOSITION">; clips: CompositionInput[]; };

export type StageResult = {
    /** Asset store key of the stage output; null for stages without an artifact. */
    outputKey: string | null;
};

export interface StageRunner {
    execute(task: StageTask, signal: AbortSignal): Promise<StageResult>;
}

export type StageExecutorDeps = {
    capabilities: Capabilities;
    safetyGate: SafetyGate;
    assetStore: AssetStore;
    workerId: string;
};

function sceneOf(stage: { id: string; sceneNumber: number | null; }): number {
    if (stage.sceneNumber === null) {
        throw new InvariantViolation(`Stage ${stage.id} has no scene`);
    }
    return stage.sceneNumber;
}

function abortReason(signal: AbortSignal): unknown {
    if (signal.reason !== undefined) return signal.reason;
    const error = new Error("Stage aborted");
    error.name = "AbortError";
    return error;
}

/**
 * Runs one stage against the capability adapters, moving bytes through the asset store.
 * Enforces the stage timeout and the caller's abort signal.
 */
export class StageExecutor implements StageRunner {

    constructor(private readonly deps: StageExecutorDeps) { }

    async execute(task: StageTask, signal: AbortSignal): Promise<StageResult> {
        const { stage } = task;
        const context = {
            projectId: stage.projectId,
            stageId: stage.id,
            workerId: this.deps.workerId,
            correlationId: uuidv7(),
            shouldPublishLog: true,
        };
        return logContextStore.run(context, async () => {
            console.log(`[StageExecutor] ${stage.kind} attempt ${stage.attempt} started`);
            const startedAt = Date.now();
            const result = await this.withLimits(task, signal);
            console.log({ durationMs: Date.now() - startedAt, outputKey: result.outputKey }, `[StageExecutor] ${stage.kind} finished`);
            return result;
        });
    }

    private async withLimits(task: StageTask, parent: AbortSignal): Promise<StageResult> {
        if (parent.aborted) throw abortReason(parent);

        const controller = new AbortController();
        const timeoutMs = task.stage.timeoutMs;
        let timer: NodeJS.Timeout | undefined;
        let onAbort: (() => void) | undefined;

        const limits = new Promise<never>((_, reject) => {
            timer = setTimeout(() => {
                const error = new StageTimeoutError(timeoutMs);
                controller.abort(error);
                reject(error);
            }, timeoutMs);
            onAbort = () => {
                const reason = abortReason(parent);
                controller.abort(reason);
                reject(reason);
            };
            parent.addEventListener("abort", onAbort, { once: true });
        });

        try {
            return await Promise.race([ this.run(task, controller.signal), limits ]);
        } finally {
            clearTimeout(timer);
            if (onAbort) parent.removeEventListener("abort", onAbort);
        }
    }

    private async run(task: StageTask, signal: AbortSignal): Promise<StageResult> {
        const { capabilities, safetyGate, assetStore } = this.deps;
        const options = { signal };

        switch (task.kind) {
            case "SAFETY_CHECK": {
                await safetyGate.enforce({ kind: "prompt", text: task.stage.payload.prompt }, options);
                return { outputKey: null };
            }
            case "IMAGE_GEN": {
                const { stage } = task;
                const image = await capabilities.imageGenerator.generateImage(
                    stage.payload.prompt,
                    { stylePreset: stage.payload.stylePreset },
                    options,
                );
                await safetyGate.screenAsset({ kind: "image", asset: image }, options);
                const key = getAssetKey({ type: "scene_image", projectId: stage.projectId, sceneNumber: sceneOf(stage), attempt: stage.attempt });
                return { outputKey: await assetStore.put(key, image.bytes, image.mimeType) };
            }
            case "ANIMATE": {
                const { stage } = task;
                const bytes = await assetStore.get(task.imageKey);
                const clip = await capabilities.animator.animate(
                    { bytes, mimeType: "image/png" },
                    { prompt: stage.payload.prompt, durationSeconds: stage.payload.durationSeconds },
                    options,
                );
                await safetyGate.screenAsset({ kind: "clip", asset: clip }, options);
                const key = getAssetKey({ type: "scene_clip", projectId: stage.projectId, sceneNumber: sceneOf(stage), attempt: stage.attempt });
                return { outputKey: await assetStore.put(key, clip.bytes, clip.mimeType) };
            }
            case "AUDIO_MIX": {
                const { stage } = task;
                const bytes = await assetStore.get(task.clipKey);
                const mixed = await capabilities.audioMixer.mixAudio({ bytes, mimeType: "video/mp4" }, stage.payload.soundEffects, options);
                const key = getAssetKey({ type: "scene_mixed_clip", projectId: stage.projectId, sceneNumber: sceneOf(stage), attempt: stage.attempt });
                return { outputKey: await assetStore.put(key, mixed.bytes, mixed.mimeType) };
            }
            case "COMPOSITION": {
                const { stage } = task;
                const clips = await Promise.all(task.clips.map(async (input) => {
                    const clip: ClipAsset = { bytes: await assetStore.get(input.clipKey), mimeType: "video/mp4" };
                    return { sceneNumber: input.sceneNumber, clip, transitionToNext: input.transitionToNext };
                }));
                const movie = await capabilities.compositor.compose(clips, options);
                const key = getAssetKey({ type: "final_video", projectId: stage.projectId });
                return { outputKey: await assetStore.put(key, movie.bytes, movie.mimeType) };
            }
        }
    }
}
