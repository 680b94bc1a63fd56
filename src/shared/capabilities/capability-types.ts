import { ClipAsset, ImageAsset, SoundEffectSpec, Transition } from "../types/index.js";

export type SafetyVerdict =
    | { decision: "allow"; }
    | { decision: "reject"; reason: string; };

export type ModerationContent =
    | { kind: "prompt"; text: string; }
    | { kind: "image"; asset: ImageAsset; }
    | { kind: "clip"; asset: ClipAsset; };

/** Per-call options every adapter accepts. */
export type CapabilityOptions = {
    signal?: AbortSignal;
};

export type ImageGenerationParams = {
    stylePreset: string;
    aspectRatio?: "16:9" | "9:16" | "1:1";
};

export type AnimationParams = {
    prompt: string;
    durationSeconds: number;
};

export type CompositionClip = {
    sceneNumber: number;
    clip: ClipAsset;
    /** Join into the next clip; ignored on the last one. */
    transitionToNext: Transition;
};

/*
 * Capability adapters. Each one fails with TransientError, PermanentError or PolicyRejection.
 */

export interface ImageGenerator {
    generateImage(prompt: string, params: ImageGenerationParams, options?: CapabilityOptions): Promise<ImageAsset>;
}

export interface Animator {
    animate(image: ImageAsset, params: AnimationParams, options?: CapabilityOptions): Promise<ClipAsset>;
}

export interface AudioMixer {
    mixAudio(clip: ClipAsset, soundEffects: SoundEffectSpec[], options?: CapabilityOptions): Promise<ClipAsset>;
}

export interface Compositor {
    compose(clips: CompositionClip[], options?: CapabilityOptions): Promise<ClipAsset>;
}

export interface ModerationAdapter {
    moderate(content: ModerationContent, options?: CapabilityOptions): Promise<SafetyVerdict>;
}

export type Capabilities = {
    imageGenerator: ImageGenerator;
    animator: Animator;
    audioMixer: AudioMixer;
    compositor: Compositor;
};
