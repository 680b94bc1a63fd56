import { z } from "zod";
import { CompositionPolicy } from "./types/index.js";
import { DEFAULT_STAGE_TIMEOUTS_MS } from "./constants.js";
import { defaultBackoffConfig } from "./utils/backoff.js";

const positiveInt = (fallback: number) => z.coerce.number().int().positive().default(fallback);
const optionalString = z.string().trim().min(1).optional();

export const PipelineConfigSchema = z.object({
    NODE_ENV: z.enum([ "development", "production", "test" ]).default("development"),
    LOG_LEVEL: z.enum([ "fatal", "error", "warn", "info", "debug", "trace" ]).default("info"),

    GCP_PROJECT_ID: optionalString,
    GCP_BUCKET_NAME: optionalString,
    GOOGLE_CLOUD_LOCATION: z.string().default("us-central1"),
    PUBSUB_EMULATOR_HOST: optionalString,
    POSTGRES_URL: optionalString,

    PROJECT_STORE_DRIVER: z.enum([ "postgres", "memory" ]).default("postgres"),
    ASSET_STORE_DRIVER: z.enum([ "gcs", "memory" ]).default("gcs"),

    MODERATION_PROVIDER: z.enum([ "keyword", "google" ]).default("keyword"),
    SAFETY_BLOCKLIST: z.string().default("")
        .transform((list) => list.split(",").map((term) => term.trim().toLowerCase()).filter(Boolean)),
    SAFETY_SCREEN_ASSETS: z.stringbool().default(false),

    IMAGE_MODEL: z.string().default("imagen-4.0-generate-001"),
    VIDEO_MODEL: z.string().default("veo-3.1-fast-generate-preview"),
    TEXT_MODEL: z.string().default("gemini-2.5-flash"),

    GPU_WORKER_SLOTS: positiveInt(2),
    CPU_WORKER_SLOTS: positiveInt(4),

    STAGE_MAX_ATTEMPTS: positiveInt(3),
    STAGE_RETRY_INITIAL_DELAY_MS: z.coerce.number().int().nonnegative().default(defaultBackoffConfig.initialDelayMs),
    STAGE_RETRY_BACKOFF_FACTOR: z.coerce.number().min(1).default(defaultBackoffConfig.backoffFactor),
    STAGE_RETRY_MAX_DELAY_MS: z.coerce.number().int().nonnegative().default(defaultBackoffConfig.maxDelayMs),

    STAGE_TIMEOUT_SAFETY_CHECK_MS: positiveInt(DEFAULT_STAGE_TIMEOUTS_MS.SAFETY_CHECK),
    STAGE_TIMEOUT_IMAGE_GEN_MS: positiveInt(DEFAULT_STAGE_TIMEOUTS_MS.IMAGE_GEN),
    STAGE_TIMEOUT_ANIMATE_MS: positiveInt(DEFAULT_STAGE_TIMEOUTS_MS.ANIMATE),
    STAGE_TIMEOUT_AUDIO_MIX_MS: positiveInt(DEFAULT_STAGE_TIMEOUTS_MS.AUDIO_MIX),
    STAGE_TIMEOUT_COMPOSITION_MS: positiveInt(DEFAULT_STAGE_TIMEOUTS_MS.COMPOSITION),

    COMPOSITION_POLICY: CompositionPolicy.default("require_all"),
    CONTROL_PLANE_RECHECK_INTERVAL_MS: positiveInt(5000),
}).superRefine((env, ctx) => {
    if (env.PROJECT_STORE_DRIVER === "postgres" && !env.POSTGRES_URL) {
        ctx.addIssue({ code: "custom", path: [ "POSTGRES_URL" ], message: "POSTGRES_URL is required when PROJECT_STORE_DRIVER=postgres" });
    }
    if (env.ASSET_STORE_DRIVER === "gcs" && !env.GCP_BUCKET_NAME) {
        ctx.addIssue({ code: "custom", path: [ "GCP_BUCKET_NAME" ], message: "GCP_BUCKET_NAME is required when ASSET_STORE_DRIVER=gcs" });
    }
});

export type PipelineEnv = z.infer<typeof PipelineConfigSchema>;

export type PipelineConfig = {
    env: PipelineEnv[ "NODE_ENV" ];
    gcp: {
        projectId?: string;
        bucketName?: string;
        location: string;
        pubsubEmulatorHost?: string;
    };
    postgresUrl?: string;
    projectStoreDriver: PipelineEnv[ "PROJECT_STORE_DRIVER" ];
    assetStoreDriver: PipelineEnv[ "ASSET_STORE_DRIVER" ];
    safety: {
        provider: PipelineEnv[ "MODERATION_PROVIDER" ];
        blocklist: string[];
        screenGeneratedAssets: boolean;
    };
    models: {
        image: string;
        video: string;
        text: string;
    };
    scheduler: SchedulerSettings;
};

export type SchedulerSettings = {
    slots: { GPU: number; CPU: number; };
    maxAttempts: number;
    backoff: { initialDelayMs: number; backoffFactor: number; maxDelayMs: number; };
    timeouts: typeof DEFAULT_STAGE_TIMEOUTS_MS;
    compositionPolicy: CompositionPolicy;
    recheckIntervalMs: number;
};

export class ConfigError extends Error {
    constructor(message: string) {
        super(message);
        this.name = "ConfigError";
    }
}

export function loadConfig(source: NodeJS.ProcessEnv = process.env): PipelineConfig {
    const parsed = PipelineConfigSchema.safeParse(source);
    if (!parsed.success) {
        throw new ConfigError(`Invalid configuration:\n${z.prettifyError(parsed.error)}`);
    }
    const env = parsed.data;

    return {
        env: env.NODE_ENV,
        gcp: {
            projectId: env.GCP_PROJECT_ID,
            bucketName: env.GCP_BUCKET_NAME,
            location: env.GOOGLE_CLOUD_LOCATION,
            pubsubEmulatorHost: env.PUBSUB_EMULATOR_HOST,
        },
        postgresUrl: env.POSTGRES_URL,
        projectStoreDriver: env.PROJECT_STORE_DRIVER,
        assetStoreDriver: env.ASSET_STORE_DRIVER,
        safety: {
            provider: env.MODERATION_PROVIDER,
            blocklist: env.SAFETY_BLOCKLIST,
            screenGeneratedAssets: env.SAFETY_SCREEN_ASSETS,
        },
        models: {
            image: env.IMAGE_MODEL,
            video: env.VIDEO_MODEL,
            text: env.TEXT_MODEL,
        },
        scheduler: {
            slots: { GPU: env.GPU_WORKER_SLOTS, CPU: env.CPU_WORKER_SLOTS },
            maxAttempts: env.STAGE_MAX_ATTEMPTS,
            backoff: {
                initialDelayMs: env.STAGE_RETRY_INITIAL_DELAY_MS,
                backoffFactor: env.STAGE_RETRY_BACKOFF_FACTOR,
                maxDelayMs: env.STAGE_RETRY_MAX_DELAY_MS,
            },
            timeouts: {
                SAFETY_CHECK: env.STAGE_TIMEOUT_SAFETY_CHECK_MS,
                IMAGE_GEN: env.STAGE_TIMEOUT_IMAGE_GEN_MS,
                ANIMATE: env.STAGE_TIMEOUT_ANIMATE_MS,
                AUDIO_MIX: env.STAGE_TIMEOUT_AUDIO_MIX_MS,
                COMPOSITION: env.STAGE_TIMEOUT_COMPOSITION_MS,
            },
            compositionPolicy: env.COMPOSITION_POLICY,
            recheckIntervalMs: env.CONTROL_PLANE_RECHECK_INTERVAL_MS,
        },
    };
}
