import {
    CapabilityOptions,
    ModerationAdapter,
    ModerationContent,
    SafetyVerdict,
} from "../shared/capabilities/capability-types.js";
import { PolicyRejection } from "../shared/utils/errors.js";

export type SafetyGateOptions = {
    /** Also screen generated images and clips before they feed dependents. */
    screenGeneratedAssets?: boolean;
};

function describe(content: ModerationContent): string {
    return content.kind === "prompt" ? `prompt "${content.text.slice(0, 40)}"` : `generated ${content.kind}`;
}

/**
 * Moderation checkpoint. A rejection surfaces as `PolicyRejection`, which is never retried.
 */
export class SafetyGate {
    readonly screenGeneratedAssets: boolean;

    constructor(
        private readonly moderation: ModerationAdapter,
        options: SafetyGateOptions = {},
    ) {
        this.screenGeneratedAssets = options.screenGeneratedAssets ?? false;
    }

    async evaluate(content: ModerationContent, options?: CapabilityOptions): Promise<SafetyVerdict> {
        const verdict = await this.moderation.moderate(content, options);
        if (verdict.decision === "reject") {
            console.warn({ reason: verdict.reason }, `[SafetyGate] Rejected ${describe(content)}`);
        } else {
            console.debug(`[SafetyGate] Allowed ${describe(content)}`);
        }
        return verdict;
    }

    async enforce(content: ModerationContent, options?: CapabilityOptions): Promise<void> {
        const verdict = await this.evaluate(content, options);
        if (verdict.decision === "reject") {
            throw new PolicyRejection(verdict.reason);
        }
    }

    /** Enforces the gate on generated media when asset screening is enabled. */
    async screenAsset(content: Exclude<ModerationContent, { kind: "prompt"; }>, options?: CapabilityOptions): Promise<void> {
        if (!this.screenGeneratedAssets) return;
        await this.enforce(content, options);
    }
}
