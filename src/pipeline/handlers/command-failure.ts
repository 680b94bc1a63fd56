import { PipelineCommand, PipelineEvent } from "../../shared/types/index.js";
import { extractErrorMessage } from "../../shared/utils/errors.js";

export type PublishPipelineEvent = (event: PipelineEvent) => Promise<void>;

export type CommandReference = Pick<PipelineCommand, "type" | "projectId" | "commandId">;

export async function publishCommandFailure(command: CommandReference, error: unknown, publishEvent: PublishPipelineEvent) {
    await publishEvent({
        type: "COMMAND_FAILED",
        projectId: command.projectId,
        commandId: command.commandId,
        timestamp: new Date().toISOString(),
        payload: {
            command: command.type,
            errorName: error instanceof Error ? error.name : "Error",
            error: extractErrorMessage(error),
        },
    });
}
