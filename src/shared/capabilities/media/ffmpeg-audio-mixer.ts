import ffmpeg from "fluent-ffmpeg";
import fs from "fs/promises";
import path from "path";
import { ClipAsset, SoundEffectSpec } from "../../types/index.js";
import { AssetStore, getSoundEffectKey } from "../../services/storage-manager.js";
import { PermanentError } from "../../utils/errors.js";
import { AudioMixer, CapabilityOptions } from "../capability-types.js";
import { formatSeconds, inspectMedia, readOutput, runFfmpeg, withTempDir } from "./ffmpeg-utils.js";

export type AudioMixFilter = {
    filters: string[];
    outputLabel: string;
};

/**
 * Filter graph that overlays `effectCount` effects (inputs 1..n) on the clip's own track,
 * or on silence when the clip has none. Output length follows the clip.
 */
export function buildAudioMixFilter(effectCount: number, clipHasAudio: boolean, clipDurationSeconds: number, effectVolume = 0.8): AudioMixFilter {
    const duration = formatSeconds(clipDurationSeconds);
    const filters: string[] = [
        clipHasAudio
            ? `[0:a]aformat=sample_rates=44100:channel_layouts=stereo,apad,atrim=duration=${duration}[base]`
            : `anullsrc=r=44100:cl=stereo,atrim=duration=${duration}[base]`,
    ];

    const labels = [ "[base]" ];
    for (let i = 0; i < effectCount; i++) {
        filters.push(`[${i + 1}:a]aformat=sample_rates=44100:channel_layouts=stereo,volume=${effectVolume}[sfx${i}]`);
        labels.push(`[sfx${i}]`);
    }

    filters.push(`${labels.join("")}amix=inputs=${labels.length}:duration=first:dropout_transition=0:normalize=0[aout]`);
    return { filters, outputLabel: "aout" };
}

/**
 * Overlays sound effects from the asset store's sound library onto a clip.
 */
export class FfmpegAudioMixer implements AudioMixer {

    constructor(private readonly assetStore: AssetStore) { }

    private async loadEffects(soundEffects: SoundEffectSpec[]): Promise<Buffer[]> {
        const keys = soundEffects.map(sfx => getSoundEffectKey(sfx.type));
        const missing: string[] = [];
        for (const [ i, key ] of keys.entries()) {
            if (!(await this.assetStore.exists(key))) missing.push(soundEffects[ i ].type);
        }
        if (missing.length > 0) {
            throw new PermanentError(`Unknown sound effect type(s): ${missing.join(", ")}`);
        }
        return Promise.all(keys.map(key => this.assetStore.get(key)));
    }

    async mixAudio(clip: ClipAsset, soundEffects: SoundEffectSpec[], options: CapabilityOptions = {}): Promise<ClipAsset> {
        if (soundEffects.length === 0) return clip;

        const effects = await this.loadEffects(soundEffects);

        return withTempDir("audio-mix", async (dir) => {
            const clipPath = path.join(dir, "clip.mp4");
            const outputPath = path.join(dir, "mixed.mp4");
            await fs.writeFile(clipPath, clip.bytes);

            const effectPaths = await Promise.all(effects.map(async (bytes, i) => {
                const effectPath = path.join(dir, `sfx_${i}.mp3`);
                await fs.writeFile(effectPath, bytes);
                return effectPath;
            }));

            const info = await inspectMedia(clipPath);
            const { filters, outputLabel } = buildAudioMixFilter(effectPaths.length, info.hasAudio, info.durationSeconds);

            const command = ffmpeg(clipPath);
            effectPaths.forEach(p => command.input(p));
            command
                .complexFilter(filters)
                .outputOptions([
                    "-map", "0:v",
                    "-map", `[${outputLabel}]`,
                    "-c:v", "copy",
                    "-c:a", "aac",
                    "-shortest",
                ]);

            await runFfmpeg(command, outputPath, "mixing audio", options.signal);

            return {
                bytes: await readOutput(outputPath, "Audio mix"),
                mimeType: "video/mp4",
                durationSeconds: info.durationSeconds,
            };
        });
    }
}
