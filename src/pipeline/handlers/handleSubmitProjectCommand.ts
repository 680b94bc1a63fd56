import { PipelineCommand } from "../../shared/types/index.js";
import { PipelineScheduler } from "../scheduler.js";
import { PublishPipelineEvent, publishCommandFailure } from "./command-failure.js";

export async function handleSubmitProjectCommand(
    command: Extract<PipelineCommand, { type: "SUBMIT_PROJECT"; }>,
    scheduler: PipelineScheduler,
    publishEvent: PublishPipelineEvent,
) {
    const { projectId, payload } = command;
    console.log(`[handleSubmitProjectCommand] Submitting project ${projectId}`);
    try {
        await scheduler.submit({ ...payload.project, id: payload.project.id ?? projectId });
    } catch (error) {
        console.error(`[handleSubmitProjectCommand] Error submitting project ${projectId}:`, error);
        await publishCommandFailure(command, error, publishEvent);
    }
}
