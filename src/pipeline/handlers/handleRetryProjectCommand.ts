import { PipelineCommand } from "../../shared/types/index.js";
import { PipelineScheduler } from "../scheduler.js";
import { PublishPipelineEvent, publishCommandFailure } from "./command-failure.js";

export async function handleRetryProjectCommand(
    command: Extract<PipelineCommand, { type: "RETRY_PROJECT"; }>,
    scheduler: PipelineScheduler,
    publishEvent: PublishPipelineEvent,
) {
    console.log(`[handleRetryProjectCommand] Retrying project ${command.projectId}`);
    try {
        await scheduler.retry(command.projectId);
    } catch (error) {
        console.error(`[handleRetryProjectCommand] Error for ${command.projectId}:`, error);
        await publishCommandFailure(command, error, publishEvent);
    }
}
