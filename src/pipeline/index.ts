// src/pipeline/index.ts
import "dotenv/config";
import { PubSub } from "@google-cloud/pubsub";
import { GoogleGenAI } from "@google/genai";
import ffmpeg from "fluent-ffmpeg";
import ffmpegBin from "@ffmpeg-installer/ffmpeg";
import ffprobeBin from "@ffprobe-installer/ffprobe";
import { v7 as uuidv7 } from "uuid";
import { loadConfig, PipelineConfig } from "../shared/config.js";
import {
    PIPELINE_COMMANDS_SUBSCRIPTION,
    PIPELINE_COMMANDS_TOPIC_NAME,
    PIPELINE_EVENTS_TOPIC_NAME,
} from "../shared/constants.js";
import { createDatabase, createPool } from "../shared/db/index.js";
import { formatLoggers, logContextStore } from "../shared/format-loggers.js";
import { logger } from "../shared/logger.js";
import { ModerationAdapter } from "../shared/capabilities/capability-types.js";
import { GoogleAnimator } from "../shared/capabilities/google/google-animator.js";
import { GoogleImageGenerator } from "../shared/capabilities/google/google-image-generator.js";
import { GoogleModerationAdapter } from "../shared/capabilities/google/google-moderation.js";
import { KeywordModerationAdapter } from "../shared/capabilities/keyword-moderation.js";
import { FfmpegAudioMixer } from "../shared/capabilities/media/ffmpeg-audio-mixer.js";
import { FfmpegCompositor } from "../shared/capabilities/media/ffmpeg-compositor.js";
import { InMemoryAssetStore } from "../shared/services/memory-asset-store.js";
import { InMemoryProjectRepository } from "../shared/services/memory-project-repository.js";
import { PoolManager } from "../shared/services/pool-manager.js";
import { PostgresProjectRepository, ProjectRepository } from "../shared/services/project-repository.js";
import { AssetStore, GCSAssetStore } from "../shared/services/storage-manager.js";
import { PipelineEvent } from "../shared/types/index.js";
import { parseCommand } from "./command-parser.js";
import { publishCommandFailure } from "./handlers/command-failure.js";
import { handleCancelProjectCommand } from "./handlers/handleCancelProjectCommand.js";
import { handleDeleteProjectCommand } from "./handlers/handleDeleteProjectCommand.js";
import { handleRequestProgressCommand } from "./handlers/handleRequestProgressCommand.js";
import { handleRetryProjectCommand } from "./handlers/handleRetryProjectCommand.js";
import { handleSubmitProjectCommand } from "./handlers/handleSubmitProjectCommand.js";
import { SafetyGate } from "./safety-gate.js";
import { PipelineScheduler } from "./scheduler.js";
import { StageExecutor } from "./stage-executor.js";

ffmpeg.setFfmpegPath(ffmpegBin.path);
ffmpeg.setFfprobePath(ffprobeBin.path);

const workerId = uuidv7();
const config = loadConfig();

const pubsub = new PubSub({
    projectId: config.gcp.projectId,
    apiEndpoint: config.gcp.pubsubEmulatorHost,
});
const pipelineEventsTopicPublisher = pubsub.topic(PIPELINE_EVENTS_TOPIC_NAME);

export async function publishPipelineEvent(event: PipelineEvent) {
    const dataBuffer = Buffer.from(JSON.stringify(event));
    await pipelineEventsTopicPublisher.publishMessage({ data: dataBuffer });
}

function createProjectStore(settings: PipelineConfig): { repository: ProjectRepository; poolManager?: PoolManager; } {
    if (settings.projectStoreDriver === "memory" || !settings.postgresUrl) {
        console.warn("[Pipeline] Using in-memory project store; state is lost on restart");
        return { repository: new InMemoryProjectRepository() };
    }
    const pool = createPool(settings.postgresUrl);
    const poolManager = new PoolManager(pool);
    return { repository: new PostgresProjectRepository(createDatabase(pool), poolManager), poolManager };
}

function createAssetStore(settings: PipelineConfig): AssetStore {
    if (settings.assetStoreDriver === "memory" || !settings.gcp.bucketName) {
        console.warn("[Pipeline] Using in-memory asset store");
        return new InMemoryAssetStore();
    }
    return GCSAssetStore.create(settings.gcp.projectId, settings.gcp.bucketName);
}

async function main() {
    formatLoggers(logContextStore, publishPipelineEvent);
    console.log({ env: config.env, slots: config.scheduler.slots }, `Starting pipeline service ${workerId}...`);

    const { repository, poolManager } = createProjectStore(config);
    const assetStore = createAssetStore(config);

    const genai = new GoogleGenAI({
        vertexai: true,
        project: config.gcp.projectId,
        location: config.gcp.location,
    });
    const moderation: ModerationAdapter = config.safety.provider === "google"
        ? new GoogleModerationAdapter(genai, config.models.text)
        : new KeywordModerationAdapter(config.safety.blocklist);

    const executor = new StageExecutor({
        workerId,
        assetStore,
        safetyGate: new SafetyGate(moderation, { screenGeneratedAssets: config.safety.screenGeneratedAssets }),
        capabilities: {
            imageGenerator: new GoogleImageGenerator(genai, config.models.image),
            animator: new GoogleAnimator(genai, config.models.video),
            audioMixer: new FfmpegAudioMixer(assetStore),
            compositor: new FfmpegCompositor(),
        },
    });

    const scheduler = new PipelineScheduler({
        repository,
        executor,
        settings: config.scheduler,
        publishEvent: publishPipelineEvent,
    });

    poolManager?.on("circuit-open", () => scheduler.pause("database-circuit"));
    poolManager?.on("circuit-closed", () => scheduler.resume("database-circuit"));

    try {
        console.log(`[Pipeline ${workerId}] Ensuring topics and subscription exist...`);
        await pubsub.topic(PIPELINE_EVENTS_TOPIC_NAME).get({ autoCreate: true });
        const [ commandsTopic ] = await pubsub.topic(PIPELINE_COMMANDS_TOPIC_NAME).get({ autoCreate: true });
        await commandsTopic.subscription(PIPELINE_COMMANDS_SUBSCRIPTION).get({ autoCreate: true });
    } catch (error) {
        console.error(`[Pipeline ${workerId}] FATAL: PubSub initialization failed:`, error);
        process.exit(1);
    }

    const recovered = await scheduler.recover();
    console.log(`[Pipeline ${workerId}] Recovered ${recovered.length} project(s)`);

    const commandsSubscription = pubsub.subscription(PIPELINE_COMMANDS_SUBSCRIPTION);
    console.log(`Listening for commands on ${PIPELINE_COMMANDS_SUBSCRIPTION}...`);

    commandsSubscription.on("message", async (message) => {
        message.ack();
        const parsed = parseCommand(message.data);
        if (!parsed.ok) {
            console.warn({ messageId: message.id, error: parsed.error.message }, "[Pipeline Command] Rejected command");
            if (parsed.envelope) {
                await publishCommandFailure(parsed.envelope, parsed.error, publishPipelineEvent).catch((error: unknown) => {
                    console.error("[Pipeline Command] Failed to report rejected command:", error);
                });
            }
            return;
        }

        const dispatch = parsed.command;
        console.log(`[Pipeline Command] Received command: ${dispatch.type} for projectId: ${dispatch.projectId} (Msg ID: ${message.id})`);

        const context = {
            workerId,
            correlationId: uuidv7(),
            projectId: dispatch.projectId,
            commandId: dispatch.commandId,
        };
        await logContextStore.run(context, async () => {
            switch (dispatch.type) {
                case "SUBMIT_PROJECT":
                    await handleSubmitProjectCommand(dispatch, scheduler, publishPipelineEvent);
                    break;
                case "CANCEL_PROJECT":
                    await handleCancelProjectCommand(dispatch, scheduler, publishPipelineEvent);
                    break;
                case "RETRY_PROJECT":
                    await handleRetryProjectCommand(dispatch, scheduler, publishPipelineEvent);
                    break;
                case "REQUEST_PROGRESS":
                    await handleRequestProgressCommand(dispatch, scheduler, publishPipelineEvent);
                    break;
                case "DELETE_PROJECT":
                    await handleDeleteProjectCommand(dispatch, scheduler, publishPipelineEvent);
                    break;
            }
        }).catch((error: unknown) => {
            console.error(`[Pipeline Command] Error processing command for project ${dispatch.projectId}:`, error);
        });
    });

    process.on("SIGINT", async () => {
        console.log("Shutting down pipeline service...");
        await commandsSubscription.close();
        await scheduler.shutdown();
        await poolManager?.close();
        logger.flush();
        process.exit(0);
    });
}

main().catch((error: unknown) => {
    logger.fatal({ err: error }, "Pipeline service failed to start");
    process.exit(1);
});
