import { PipelineCommand } from "../../shared/types/index.js";
import { PipelineScheduler } from "../scheduler.js";
import { PublishPipelineEvent, publishCommandFailure } from "./command-failure.js";

/** Answers with a PROJECT_PROGRESS snapshot for clients that join late. */
export async function handleRequestProgressCommand(
    command: Extract<PipelineCommand, { type: "REQUEST_PROGRESS"; }>,
    scheduler: PipelineScheduler,
    publishEvent: PublishPipelineEvent,
) {
    const { projectId, commandId } = command;
    try {
        const progress = await scheduler.progress(projectId);
        await publishEvent({
            type: "PROJECT_PROGRESS",
            projectId,
            commandId,
            timestamp: new Date().toISOString(),
            payload: { progress },
        });
    } catch (error) {
        console.error(`[handleRequestProgressCommand] Error for ${projectId}:`, error);
        await publishCommandFailure(command, error, publishEvent);
    }
}
