import { z } from "zod";
import { PIPELINE_COMMAND_TYPES, PipelineCommand, ProjectInput } from "../shared/types/index.js";
import { BuildError } from "../shared/utils/errors.js";

const CommandEnvelope = z.object({
    type: z.enum(PIPELINE_COMMAND_TYPES),
    projectId: z.string().min(1),
    commandId: z.string().optional(),
    timestamp: z.string().optional(),
    payload: z.unknown().optional(),
});
export type CommandEnvelope = z.infer<typeof CommandEnvelope>;

const SubmitPayload = z.object({ project: ProjectInput });

export type ParsedCommand =
    | { ok: true; command: PipelineCommand; }
    | { ok: false; envelope: CommandEnvelope | null; error: Error; };

/**
 * Decodes a command message. Undecodable messages carry no envelope; a decodable
 * SUBMIT_PROJECT with an invalid project keeps its envelope so the failure can be reported.
 */
export function parseCommand(data: Buffer | string): ParsedCommand {
    let json: unknown;
    try {
        json = JSON.parse(data.toString());
    } catch (error) {
        return { ok: false, envelope: null, error: error instanceof Error ? error : new Error(String(error)) };
    }

    const envelope = CommandEnvelope.safeParse(json);
    if (!envelope.success) {
        return { ok: false, envelope: null, error: new Error(`Unrecognized command: ${z.prettifyError(envelope.error)}`) };
    }

    const { type, projectId, commandId, payload } = envelope.data;
    const base = { projectId, commandId, timestamp: envelope.data.timestamp ?? new Date().toISOString() };

    switch (type) {
        case "SUBMIT_PROJECT": {
            const submit = SubmitPayload.safeParse(payload);
            if (!submit.success) {
                const issues = submit.error.issues.map(issue => `${issue.path.join(".")}: ${issue.message}`);
                return { ok: false, envelope: envelope.data, error: new BuildError(`Invalid project: ${z.prettifyError(submit.error)}`, issues) };
            }
            return { ok: true, command: { ...base, type, payload: { project: submit.data.project } } };
        }
        case "CANCEL_PROJECT":
        case "RETRY_PROJECT":
        case "REQUEST_PROGRESS":
        case "DELETE_PROJECT":
            return { ok: true, command: { ...base, type } };
    }
}
