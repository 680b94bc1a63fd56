import { PipelineCommand } from "../../shared/types/index.js";
import { PipelineScheduler } from "../scheduler.js";
import { PublishPipelineEvent, publishCommandFailure } from "./command-failure.js";

export async function handleDeleteProjectCommand(
    command: Extract<PipelineCommand, { type: "DELETE_PROJECT"; }>,
    scheduler: PipelineScheduler,
    publishEvent: PublishPipelineEvent,
) {
    try {
        await scheduler.deleteProject(command.projectId);
    } catch (error) {
        console.error(`[handleDeleteProjectCommand] Could not delete ${command.projectId}:`, error);
        await publishCommandFailure(command, error, publishEvent);
    }
}
