// shared/types/assets.types.ts

export type ImageAsset = {
    bytes: Buffer;
    mimeType: string;
    model?: string;
};

export type ClipAsset = {
    bytes: Buffer;
    mimeType: string;
    /** Known when the producer reports it; media adapters read it from the bytes otherwise. */
    durationSeconds?: number;
    model?: string;
};

type AssetKeyParam<T extends string> = { type: T; projectId: string; };

export type AssetKeyParams =
    | AssetKeyParam<"scene_image"> & { sceneNumber: number; attempt: number; }
    | AssetKeyParam<"scene_clip"> & { sceneNumber: number; attempt: number; }
    | AssetKeyParam<"scene_mixed_clip"> & { sceneNumber: number; attempt: number; }
    | AssetKeyParam<"final_video">;
