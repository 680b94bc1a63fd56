import { describe, it, expect, vi } from 'vitest';
import { SafetyGate } from '../safety-gate.js';
import { KeywordModerationAdapter } from '../../shared/capabilities/keyword-moderation.js';
import { ModerationAdapter } from '../../shared/capabilities/capability-types.js';
import { PolicyRejection } from '../../shared/utils/errors.js';

const image = { kind: 'image' as const, asset: { bytes: Buffer.from('png'), mimeType: 'image/png' } };

describe('KeywordModerationAdapter', () => {
    const adapter = new KeywordModerationAdapter([ 'Gore', 'blood bath', '' ]);

    it('should allow prompts without blocked terms', async () => {
        await expect(adapter.moderate({ kind: 'prompt', text: 'A quiet forest at dawn' })).resolves.toEqual({ decision: 'allow' });
    });

    it('should match single words case-insensitively and only as whole words', async () => {
        await expect(adapter.moderate({ kind: 'prompt', text: 'Close-up of GORE in the snow' })).resolves.toEqual({
            decision: 'reject',
            reason: 'Prompt contains blocked term "gore"',
        });
        await expect(adapter.moderate({ kind: 'prompt', text: 'A gorey sunset' })).resolves.toEqual({ decision: 'allow' });
    });

    it('should match phrases across punctuation', async () => {
        await expect(adapter.moderate({ kind: 'prompt', text: 'The arena became a blood, bath.' })).resolves.toEqual({
            decision: 'reject',
            reason: 'Prompt contains blocked term "blood bath"',
        });
        await expect(adapter.moderate({ kind: 'prompt', text: 'A bath of blood-red roses' })).resolves.toEqual({ decision: 'allow' });
    });

    it('should match accented terms whatever their Unicode composition', async () => {
        const accented = new KeywordModerationAdapter([ 'ma\u0301u' ]);

        await expect(accented.moderate({ kind: 'prompt', text: 'Một cảnh đầy m\u00e1u trên sàn nhà' })).resolves.toEqual({
            decision: 'reject',
            reason: 'Prompt contains blocked term "m\u00e1u"',
        });
        await expect(accented.moderate({ kind: 'prompt', text: 'Một mẫu vải đỏ trên sàn nhà' })).resolves.toEqual({ decision: 'allow' });
    });

    it('should let generated media through', async () => {
        await expect(adapter.moderate(image)).resolves.toEqual({ decision: 'allow' });
    });
});

describe('SafetyGate', () => {
    const rejecting: ModerationAdapter = {
        moderate: vi.fn().mockResolvedValue({ decision: 'reject', reason: 'violence' }),
    };

    it('should return the verdict from evaluate without throwing', async () => {
        const gate = new SafetyGate(rejecting);

        await expect(gate.evaluate({ kind: 'prompt', text: 'x' })).resolves.toEqual({ decision: 'reject', reason: 'violence' });
    });

    it('should throw a PolicyRejection from enforce', async () => {
        const gate = new SafetyGate(rejecting);

        const error = await gate.enforce({ kind: 'prompt', text: 'x' }).catch((e: unknown) => e);

        expect(error).toBeInstanceOf(PolicyRejection);
        expect(error).toMatchObject({ reason: 'violence', message: 'Content rejected: violence' });
    });

    it('should skip asset screening unless enabled', async () => {
        const moderate = vi.fn().mockResolvedValue({ decision: 'reject', reason: 'nsfw' });
        const gate = new SafetyGate({ moderate });

        await expect(gate.screenAsset(image)).resolves.toBeUndefined();
        expect(moderate).not.toHaveBeenCalled();
        expect(gate.screenGeneratedAssets).toBe(false);
    });

    it('should enforce asset screening when enabled', async () => {
        const moderate = vi.fn().mockResolvedValue({ decision: 'reject', reason: 'nsfw' });
        const gate = new SafetyGate({ moderate }, { screenGeneratedAssets: true });

        await expect(gate.screenAsset(image)).rejects.toThrow('Content rejected: nsfw');
        expect(moderate).toHaveBeenCalledWith(image, undefined);
    });
});
