import { ModerationAdapter, ModerationContent, SafetyVerdict } from "./capability-types.js";

const tokenize = (text: string) =>
    text.normalize("NFC").toLowerCase().split(/[^\p{L}\p{M}\p{N}']+/u).filter(Boolean);

/**
 * Blocklist moderation for prompt text. Generated media always passes.
 */
export class KeywordModerationAdapter implements ModerationAdapter {
    private readonly terms: string[];

    constructor(blocklist: string[]) {
        this.terms = blocklist.map(t => tokenize(t).join(" ")).filter(Boolean);
    }

    async moderate(content: ModerationContent): Promise<SafetyVerdict> {
        if (content.kind !== "prompt") return { decision: "allow" };

        const tokens = tokenize(content.text);
        const words = new Set(tokens);
        const normalized = ` ${tokens.join(" ")} `;
        const hit = this.terms.find(term =>
            term.includes(" ") ? normalized.includes(` ${term} `) : words.has(term));

        return hit
            ? { decision: "reject", reason: `Prompt contains blocked term "${hit}"` }
            : { decision: "allow" };
    }
}
