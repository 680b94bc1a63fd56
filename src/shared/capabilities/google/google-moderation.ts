import { GenerateContentResponse, GoogleGenAI, Part } from "@google/genai";
import { z } from "zod";
import { PermanentError, TransientError } from "../../utils/errors.js";
import { cleanJsonOutput, getJSONSchema } from "../../utils/utils.js";
import { CapabilityOptions, ModerationAdapter, ModerationContent, SafetyVerdict } from "../capability-types.js";
import { toCapabilityError } from "./provider-errors.js";

export const ModerationVerdict = z.object({
    allowed: z.boolean().describe("false when the content must not be used in a published video"),
    reason: z.string().describe("Short explanation, required when not allowed"),
});
export type ModerationVerdict = z.infer<typeof ModerationVerdict>;

const MODERATION_INSTRUCTION = [
    "You are a content-safety reviewer for a video generation service.",
    "Reject content that depicts sexual content involving minors, sexual violence, graphic gore,",
    "instructions for weapons or self-harm, hateful slurs, or real public figures in compromising situations.",
    "Allow everything else, including fictional violence, horror and mature themes treated non-graphically.",
    "Answer with JSON only.",
].join(" ");

function contentParts(content: ModerationContent): Part[] {
    switch (content.kind) {
        case "prompt":
            return [ { text: `Review this scene prompt:\n${content.text}` } ];
        case "image":
        case "clip":
            return [
                { text: `Review this generated ${content.kind === "image" ? "image" : "video clip"}.` },
                { inlineData: { data: content.asset.bytes.toString("base64"), mimeType: content.asset.mimeType } },
            ];
    }
}

/**
 * Gemini-backed moderation. A prompt the provider itself blocks is a rejection.
 */
export class GoogleModerationAdapter implements ModerationAdapter {

    constructor(
        private readonly client: GoogleGenAI,
        private readonly model: string,
    ) { }

    async moderate(content: ModerationContent, options: CapabilityOptions = {}): Promise<SafetyVerdict> {
        let response: GenerateContentResponse;
        try {
            response = await this.client.models.generateContent({
                model: this.model,
                contents: [ { role: "user", parts: contentParts(content) } ],
                config: {
                    systemInstruction: MODERATION_INSTRUCTION,
                    responseMimeType: "application/json",
                    responseJsonSchema: getJSONSchema(ModerationVerdict),
                    temperature: 0,
                    abortSignal: options.signal,
                },
            });
        } catch (error) {
            throw toCapabilityError(error, "Moderation request failed");
        }

        const blockReason = response.promptFeedback?.blockReason;
        if (blockReason) {
            return { decision: "reject", reason: `Blocked by provider safety filter (${blockReason})` };
        }

        const text = response.text;
        if (!text) {
            throw new PermanentError("Moderation model returned an empty answer");
        }

        let verdict: ModerationVerdict;
        try {
            verdict = ModerationVerdict.parse(JSON.parse(cleanJsonOutput(text)));
        } catch (error) {
            throw new TransientError(`Moderation model returned malformed JSON: ${text.slice(0, 200)}`, { cause: error });
        }

        return verdict.allowed
            ? { decision: "allow" }
            : { decision: "reject", reason: verdict.reason || "Rejected by moderation model" };
    }
}
