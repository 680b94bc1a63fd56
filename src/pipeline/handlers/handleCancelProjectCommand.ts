import { PipelineCommand } from "../../shared/types/index.js";
import { PipelineScheduler } from "../scheduler.js";
import { PublishPipelineEvent, publishCommandFailure } from "./command-failure.js";

export async function handleCancelProjectCommand(
    command: Extract<PipelineCommand, { type: "CANCEL_PROJECT"; }>,
    scheduler: PipelineScheduler,
    publishEvent: PublishPipelineEvent,
) {
    console.log(`[handleCancelProjectCommand] Cancelling project ${command.projectId}`);
    try {
        await scheduler.cancel(command.projectId);
    } catch (error) {
        console.error(`[handleCancelProjectCommand] Error for ${command.projectId}:`, error);
        await publishCommandFailure(command, error, publishEvent);
    }
}
