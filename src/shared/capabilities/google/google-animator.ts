import { GenerateVideosOperation, GoogleGenAI } from "@google/genai";
import { setTimeout as sleep } from "timers/promises";
import { ClipAsset, ImageAsset } from "../../types/index.js";
import { PermanentError, PolicyRejection, TransientError } from "../../utils/errors.js";
import { AnimationParams, Animator, CapabilityOptions } from "../capability-types.js";
import { isSafetyMessage, toCapabilityError } from "./provider-errors.js";

export const MIN_VIDEO_DURATION_SECONDS = 4;
export const MAX_VIDEO_DURATION_SECONDS = 8;

/** Veo accepts whole seconds between 4 and 8. */
export function clampVideoDuration(durationSeconds: number): number {
    const rounded = Math.round(durationSeconds);
    return Math.min(MAX_VIDEO_DURATION_SECONDS, Math.max(MIN_VIDEO_DURATION_SECONDS, rounded));
}

export type GoogleAnimatorOptions = {
    pollIntervalMs?: number;
};

/**
 * Veo image-to-video through @google/genai. Polls the long-running operation until done.
 */
export class GoogleAnimator implements Animator {
    private readonly pollIntervalMs: number;

    constructor(
        private readonly client: GoogleGenAI,
        private readonly model: string,
        options: GoogleAnimatorOptions = {},
    ) {
        this.pollIntervalMs = options.pollIntervalMs ?? 10000;
    }

    async animate(image: ImageAsset, params: AnimationParams, options: CapabilityOptions = {}): Promise<ClipAsset> {
        const durationSeconds = clampVideoDuration(params.durationSeconds);
        const { signal } = options;

        let operation: GenerateVideosOperation;
        try {
            operation = await this.client.models.generateVideos({
                model: this.model,
                prompt: params.prompt,
                image: {
                    imageBytes: image.bytes.toString("base64"),
                    mimeType: image.mimeType,
                },
                config: {
                    numberOfVideos: 1,
                    durationSeconds,
                    aspectRatio: "16:9",
                    resolution: "720p",
                    abortSignal: signal,
                },
            });

            console.log(`   ... Operation started: ${operation.name}`);

            while (!operation.done) {
                await sleep(this.pollIntervalMs, undefined, { signal });
                operation = await this.client.operations.getVideosOperation({ operation, config: { abortSignal: signal } });
            }
        } catch (error) {
            throw toCapabilityError(error, "Video generation failed");
        }

        if (operation.error) {
            const message = String(operation.error.message ?? JSON.stringify(operation.error));
            if (isSafetyMessage(message)) {
                throw new PolicyRejection(message);
            }
            const code = Number(operation.error.code);
            // google.rpc codes: 4 deadline, 8 resource exhausted, 13 internal, 14 unavailable
            if ([ 4, 8, 13, 14 ].includes(code)) {
                throw new TransientError(`Video operation failed: ${message}`);
            }
            throw new PermanentError(`Video operation failed: ${message}`);
        }

        const response = operation.response;
        if (response?.raiMediaFilteredCount && response.raiMediaFilteredCount > 0) {
            const reasons = response.raiMediaFilteredReasons ?? [];
            throw new PolicyRejection(reasons.length > 0 ? reasons.join(". ") : "Video generation violated AI usage guidelines");
        }

        const videoBytes = response?.generatedVideos?.[ 0 ]?.video?.videoBytes;
        if (!videoBytes) {
            throw new PermanentError("Operation completed but no video data returned.");
        }

        return {
            bytes: Buffer.from(videoBytes, "base64"),
            mimeType: "video/mp4",
            durationSeconds,
            model: this.model,
        };
    }
}
