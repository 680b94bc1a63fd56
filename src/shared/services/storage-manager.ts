import { ApiError, Storage } from "@google-cloud/storage";
import path from "path";
import { AssetKeyParams } from "../types/index.js";
import { SOUND_LIBRARY_PREFIX } from "../constants.js";
import { StorageError } from "../utils/errors.js";

/**
 * Opaque binary store. Keys are bucket-relative paths.
 */
export interface AssetStore {
  put(key: string, bytes: Buffer, contentType: string): Promise<string>;
  get(key: string): Promise<Buffer>;
  exists(key: string): Promise<boolean>;
}

const pad = (value: number, width: number) => value.toString().padStart(width, '0');

/**
 * Standardized asset key.
 * Structure: [projectId]/[category]/[filename]
 */
export function getAssetKey(params: AssetKeyParams): string {
  switch (params.type) {
    case 'scene_image':
      return path.posix.join(params.projectId, 'images', `scene_${pad(params.sceneNumber, 3)}_${pad(params.attempt, 2)}.png`);

    case 'scene_clip':
      return path.posix.join(params.projectId, 'scenes', `scene_${pad(params.sceneNumber, 3)}_${pad(params.attempt, 2)}.mp4`);

    case 'scene_mixed_clip':
      return path.posix.join(params.projectId, 'scenes', `scene_${pad(params.sceneNumber, 3)}_mixed_${pad(params.attempt, 2)}.mp4`);

    case 'final_video':
      return path.posix.join(params.projectId, 'final', 'movie.mp4');
  }
}

export function getSoundEffectKey(type: string): string {
  const slug = type.trim().toLowerCase().replace(/[^a-z0-9_-]+/g, '_');
  return path.posix.join(SOUND_LIBRARY_PREFIX, `${slug}.mp3`);
}

/**
 * Asset store backed by a Google Cloud Storage bucket.
 * Every failure surfaces as a `StorageError` so the scheduler retries it.
 */
export class GCSAssetStore implements AssetStore {

  constructor(
    private readonly storage: Storage,
    private readonly bucketName: string,
  ) { }

  static create(gcpProjectId: string | undefined, bucketName: string): GCSAssetStore {
    return new GCSAssetStore(new Storage({ projectId: gcpProjectId }), bucketName);
  }

  private normalizeKey(key: string): string {
    let cleanPath = key.replace(/^gs:\/\//, '');
    cleanPath = cleanPath.replace(/^https:\/\/storage\.googleapis\.com\//, '');
    cleanPath = path.posix.normalize(cleanPath);
    while (cleanPath.startsWith('/')) {
      cleanPath = cleanPath.substring(1);
    }
    if (cleanPath.startsWith(this.bucketName + '/')) {
      return cleanPath.substring(this.bucketName.length + 1);
    }
    return cleanPath;
  }

  private wrap(operation: string, key: string, error: unknown): StorageError {
    const status = error instanceof ApiError ? ` (Code ${error.code})` : '';
    const message = error instanceof Error ? error.message : String(error);
    return new StorageError(`GCS ${operation} failed for ${key}${status}: ${message}`, { cause: error });
  }

  async put(key: string, bytes: Buffer, contentType: string): Promise<string> {
    const relative = this.normalizeKey(key);
    try {
      await this.storage.bucket(this.bucketName).file(relative).save(bytes, {
        contentType,
        resumable: false,
        metadata: {
          cacheControl: "public, max-age=31536000",
        },
      });
    } catch (error) {
      throw this.wrap('upload', relative, error);
    }
    return relative;
  }

  async get(key: string): Promise<Buffer> {
    const relative = this.normalizeKey(key);
    try {
      const [ contents ] = await this.storage.bucket(this.bucketName).file(relative).download();
      return contents;
    } catch (error) {
      throw this.wrap('download', relative, error);
    }
  }

  async exists(key: string): Promise<boolean> {
    const relative = this.normalizeKey(key);
    try {
      const [ exists ] = await this.storage.bucket(this.bucketName).file(relative).exists();
      return exists;
    } catch (error) {
      throw this.wrap('exists', relative, error);
    }
  }
}
