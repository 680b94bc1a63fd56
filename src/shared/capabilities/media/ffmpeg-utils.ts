import ffmpeg, { FfmpegCommand } from "fluent-ffmpeg";
import fs from "fs/promises";
import os from "os";
import path from "path";
import { PermanentError, TransientError } from "../../utils/errors.js";

export type MediaInfo = {
    durationSeconds: number;
    hasAudio: boolean;
};

/** Seconds with at most millisecond precision, without trailing zeros. */
export function formatSeconds(value: number): string {
    return Number(value.toFixed(3)).toString();
}

export async function withTempDir<T>(prefix: string, fn: (dir: string) => Promise<T>): Promise<T> {
    const dir = await fs.mkdtemp(path.join(os.tmpdir(), `${prefix}-`));
    try {
        return await fn(dir);
    } finally {
        await fs.rm(dir, { recursive: true, force: true });
    }
}

export function inspectMedia(filePath: string): Promise<MediaInfo> {
    return new Promise((resolve, reject) => {
        ffmpeg.ffprobe(filePath, (err, metadata) => {
            if (err) {
                reject(new PermanentError(`Failed to inspect media: ${err.message}`, { cause: err }));
                return;
            }

            const duration = metadata.format.duration;
            if (!duration || duration <= 0) {
                reject(new PermanentError(`Invalid media duration: ${duration}`));
                return;
            }

            resolve({
                durationSeconds: duration,
                hasAudio: metadata.streams.some(s => s.codec_type === "audio"),
            });
        });
    });
}

/**
 * Runs a prepared command to completion. A raised abort signal kills ffmpeg.
 */
export function runFfmpeg(command: FfmpegCommand, outputPath: string, label: string, signal?: AbortSignal): Promise<void> {
    return new Promise((resolve, reject) => {
        let stderr = '';

        const onAbort = () => command.kill("SIGKILL");
        signal?.addEventListener("abort", onAbort, { once: true });

        command
            .on("start", (commandLine: string) => {
                console.log(`   [ffmpeg] ${label}: ${commandLine}`);
            })
            .on("stderr", (line: string) => {
                stderr += line + "\n";
            })
            .on("error", (err: Error) => {
                signal?.removeEventListener("abort", onAbort);
                if (signal?.aborted) {
                    reject(signal.reason);
                    return;
                }
                // ffmpeg exits non-zero on corrupt or incompatible input
                reject(new PermanentError(`ffmpeg ${label} failed: ${err.message}\nFFMPEG stderr:\n${stderr.slice(-2000)}`, { cause: err }));
            })
            .on("end", () => {
                signal?.removeEventListener("abort", onAbort);
                resolve();
            })
            .save(outputPath);
    });
}

export async function readOutput(outputPath: string, label: string): Promise<Buffer> {
    try {
        return await fs.readFile(outputPath);
    } catch (error) {
        throw new TransientError(`${label} produced no output at ${outputPath}`, { cause: error });
    }
}
