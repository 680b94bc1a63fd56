import ffmpeg from "fluent-ffmpeg";
import fs from "fs/promises";
import path from "path";
import { ClipAsset, Transition } from "../../types/index.js";
import { PermanentError } from "../../utils/errors.js";
import { CapabilityOptions, CompositionClip, Compositor } from "../capability-types.js";
import { formatSeconds, inspectMedia, readOutput, runFfmpeg, withTempDir } from "./ffmpeg-utils.js";

export const OUTPUT_WIDTH = 1280;
export const OUTPUT_HEIGHT = 720;
export const OUTPUT_FPS = 24;
export const MAX_TRANSITION_SECONDS = 0.5;

export type TransitionInput = {
    durationSeconds: number;
    hasAudio: boolean;
    transitionToNext: Transition;
};

export type TransitionFilter = {
    filters: string[];
    videoLabel: string;
    audioLabel: string;
    /** Length of the composed video. */
    durationSeconds: number;
};

const XFADE_BY_TRANSITION: Partial<Record<Transition, string>> = {
    crossfade: "fade",
    fade: "fadeblack",
};

/**
 * Filter graph joining clips in input order.
 * `cut` and `none` concatenate; `crossfade` and `fade` overlap by up to half a second.
 */
export function buildTransitionFilter(clips: TransitionInput[]): TransitionFilter {
    if (clips.length === 0) {
        throw new PermanentError("Nothing to compose: no clips");
    }

    const filters: string[] = [];
    clips.forEach((clip, i) => {
        const duration = formatSeconds(clip.durationSeconds);
        filters.push(
            `[${i}:v]scale=${OUTPUT_WIDTH}:${OUTPUT_HEIGHT}:force_original_aspect_ratio=decrease,` +
            `pad=${OUTPUT_WIDTH}:${OUTPUT_HEIGHT}:(ow-iw)/2:(oh-ih)/2,setsar=1,fps=${OUTPUT_FPS},format=yuv420p,` +
            `trim=duration=${duration},setpts=PTS-STARTPTS[v${i}]`
        );
        filters.push(clip.hasAudio
            ? `[${i}:a]aformat=sample_rates=44100:channel_layouts=stereo,apad,atrim=duration=${duration},asetpts=PTS-STARTPTS[a${i}]`
            : `anullsrc=r=44100:cl=stereo,atrim=duration=${duration}[a${i}]`);
    });

    let videoLabel = "v0";
    let audioLabel = "a0";
    let elapsed = clips[ 0 ].durationSeconds;

    for (let i = 1; i < clips.length; i++) {
        const previous = clips[ i - 1 ];
        const current = clips[ i ];
        const xfade = XFADE_BY_TRANSITION[ previous.transitionToNext ];
        const nextVideo = `vj${i}`;
        const nextAudio = `aj${i}`;

        if (xfade) {
            const overlap = Math.min(MAX_TRANSITION_SECONDS, previous.durationSeconds, current.durationSeconds);
            const offset = elapsed - overlap;
            filters.push(`[${videoLabel}][v${i}]xfade=transition=${xfade}:duration=${formatSeconds(overlap)}:offset=${formatSeconds(offset)}[${nextVideo}]`);
            filters.push(`[${audioLabel}][a${i}]acrossfade=d=${formatSeconds(overlap)}[${nextAudio}]`);
            elapsed += current.durationSeconds - overlap;
        } else {
            filters.push(`[${videoLabel}][${audioLabel}][v${i}][a${i}]concat=n=2:v=1:a=1[${nextVideo}][${nextAudio}]`);
            elapsed += current.durationSeconds;
        }

        videoLabel = nextVideo;
        audioLabel = nextAudio;
    }

    return { filters, videoLabel, audioLabel, durationSeconds: Number(elapsed.toFixed(3)) };
}

/**
 * Concatenates scene clips into the final video.
 */
export class FfmpegCompositor implements Compositor {

    async compose(clips: CompositionClip[], options: CapabilityOptions = {}): Promise<ClipAsset> {
        if (clips.length === 0) {
            throw new PermanentError("Nothing to compose: no clips");
        }
        const ordered = [ ...clips ].sort((a, b) => a.sceneNumber - b.sceneNumber);

        return withTempDir("composition", async (dir) => {
            const inputs = await Promise.all(ordered.map(async (entry) => {
                const clipPath = path.join(dir, `scene_${entry.sceneNumber}.mp4`);
                await fs.writeFile(clipPath, entry.clip.bytes);
                const info = await inspectMedia(clipPath);
                return { clipPath, info, transitionToNext: entry.transitionToNext };
            }));

            const graph = buildTransitionFilter(inputs.map(input => ({
                durationSeconds: input.info.durationSeconds,
                hasAudio: input.info.hasAudio,
                transitionToNext: input.transitionToNext,
            })));

            const outputPath = path.join(dir, "movie.mp4");
            const command = ffmpeg();
            inputs.forEach(input => command.input(input.clipPath));
            command
                .complexFilter(graph.filters)
                .outputOptions([
                    "-map", `[${graph.videoLabel}]`,
                    "-map", `[${graph.audioLabel}]`,
                    "-c:v", "libx264",
                    "-preset", "veryfast",
                    "-pix_fmt", "yuv420p",
                    "-c:a", "aac",
                    "-movflags", "+faststart",
                ]);

            await runFfmpeg(command, outputPath, "composing final video", options.signal);

            return {
                bytes: await readOutput(outputPath, "Composition"),
                mimeType: "video/mp4",
                durationSeconds: graph.durationSeconds,
            };
        });
    }
}
