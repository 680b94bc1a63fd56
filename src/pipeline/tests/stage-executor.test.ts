import { describe, it, expect, vi, beforeEach } from 'vitest';
import { StageExecutor } from '../stage-executor.js';
import { SafetyGate } from '../safety-gate.js';
import { Capabilities, ModerationAdapter, ModerationContent } from '../../shared/capabilities/capability-types.js';
import { KeywordModerationAdapter } from '../../shared/capabilities/keyword-moderation.js';
import { InMemoryAssetStore } from '../../shared/services/memory-asset-store.js';
import { PolicyRejection, StageTimeoutError } from '../../shared/utils/errors.js';
import { makeRun, scene, succeed, untilAborted } from './helpers/fakes.js';

// 0 SAFETY_CHECK, 1 IMAGE_GEN, 2 ANIMATE, 3 AUDIO_MIX, 4 COMPOSITION
const newRun = () => makeRun([ scene(1, { soundEffects: [ { type: 'thunder' } ], prompt: 'Storm over the valley' }) ]);

describe('StageExecutor', () => {
    let assetStore: InMemoryAssetStore;
    let capabilities: {
        imageGenerator: { generateImage: ReturnType<typeof vi.fn>; };
        animator: { animate: ReturnType<typeof vi.fn>; };
        audioMixer: { mixAudio: ReturnType<typeof vi.fn>; };
        compositor: { compose: ReturnType<typeof vi.fn>; };
    };
    let executor: StageExecutor;

    const signal = () => new AbortController().signal;

    /** Succeeds every stage before `index`, storing their outputs, then starts `index`. */
    async function taskAt(run: ReturnType<typeof newRun>, index: number) {
        run.initialReady();
        for (let i = 0; i < index; i++) {
            const result = succeed(run, i);
            const key = run.stage(i).outputKey;
            if (key) await assetStore.put(key, Buffer.from(`bytes of ${key}`), 'video/mp4');
            expect(result.changes[ 0 ].to).toBe('SUCCEEDED');
        }
        run.markRunning(index);
        return run.buildTask(index);
    }

    function createExecutor(moderation: ModerationAdapter = new KeywordModerationAdapter([ 'forbidden' ]), screenGeneratedAssets = false) {
        return new StageExecutor({
            capabilities: capabilities as unknown as Capabilities,
            safetyGate: new SafetyGate(moderation, { screenGeneratedAssets }),
            assetStore,
            workerId: 'worker-test',
        });
    }

    beforeEach(() => {
        assetStore = new InMemoryAssetStore();
        capabilities = {
            imageGenerator: { generateImage: vi.fn().mockResolvedValue({ bytes: Buffer.from('png'), mimeType: 'image/png' }) },
            animator: { animate: vi.fn().mockResolvedValue({ bytes: Buffer.from('clip'), mimeType: 'video/mp4' }) },
            audioMixer: { mixAudio: vi.fn().mockResolvedValue({ bytes: Buffer.from('mixed'), mimeType: 'video/mp4' }) },
            compositor: { compose: vi.fn().mockResolvedValue({ bytes: Buffer.from('movie'), mimeType: 'video/mp4' }) },
        };
        executor = createExecutor();
    });

    it('should pass an allowed prompt through the safety check without output', async () => {
        const task = await taskAt(newRun(), 0);

        await expect(executor.execute(task, signal())).resolves.toEqual({ outputKey: null });
    });

    it('should reject a blocked prompt as a policy failure', async () => {
        const run = makeRun([ scene(1, { prompt: 'A forbidden ritual at midnight' }) ]);
        const task = await taskAt(run, 0);

        const error = await executor.execute(task, signal()).catch((e: unknown) => e);

        expect(error).toBeInstanceOf(PolicyRejection);
        expect(error).toMatchObject({ reason: 'Prompt contains blocked term "forbidden"' });
    });

    it('should store the generated image under the attempt-scoped key', async () => {
        const task = await taskAt(newRun(), 1);

        const result = await executor.execute(task, signal());

        expect(result.outputKey).toBe('p1/images/scene_001_01.png');
        expect(assetStore.contentType('p1/images/scene_001_01.png')).toBe('image/png');
        expect(capabilities.imageGenerator.generateImage).toHaveBeenCalledWith(
            'Storm over the valley',
            { stylePreset: 'cinematic' },
            { signal: expect.any(AbortSignal) },
        );
    });

    it('should animate the upstream image', async () => {
        const task = await taskAt(newRun(), 2);

        const result = await executor.execute(task, signal());

        expect(result.outputKey).toBe('p1/scenes/scene_001_01.mp4');
        const [ image, params ] = capabilities.animator.animate.mock.calls[ 0 ];
        expect(image).toEqual({ bytes: Buffer.from('bytes of out/p1-scene_001-image_gen'), mimeType: 'image/png' });
        expect(params).toEqual({ prompt: 'Storm over the valley', durationSeconds: 5 });
    });

    it('should mix sound effects into the upstream clip', async () => {
        const task = await taskAt(newRun(), 3);

        const result = await executor.execute(task, signal());

        expect(result.outputKey).toBe('p1/scenes/scene_001_mixed_01.mp4');
        const [ clip, effects ] = capabilities.audioMixer.mixAudio.mock.calls[ 0 ];
        expect(clip.bytes.toString()).toBe('bytes of out/p1-scene_001-animate');
        expect(effects).toEqual([ { type: 'thunder', description: '' } ]);
    });

    it('should compose every scene clip into the final video', async () => {
        const task = await taskAt(newRun(), 4);

        const result = await executor.execute(task, signal());

        expect(result.outputKey).toBe('p1/final/movie.mp4');
        expect(await assetStore.get('p1/final/movie.mp4')).toEqual(Buffer.from('movie'));
        const [ clips ] = capabilities.compositor.compose.mock.calls[ 0 ];
        expect(clips).toEqual([ {
            sceneNumber: 1,
            clip: { bytes: Buffer.from('bytes of out/p1-scene_001-audio_mix'), mimeType: 'video/mp4' },
            transitionToNext: 'none',
        } ]);
    });

    it('should fail with a timeout and abort the capability call', async () => {
        let capabilitySignal: AbortSignal | undefined;
        capabilities.animator.animate.mockImplementation((_image: unknown, _params: unknown, options: { signal: AbortSignal; }) => {
            capabilitySignal = options.signal;
            return untilAborted(options.signal);
        });
        const run = newRun();
        const task = await taskAt(run, 2);
        task.stage.timeoutMs = 20;

        const error = await executor.execute(task, signal()).catch((e: unknown) => e);

        expect(error).toBeInstanceOf(StageTimeoutError);
        expect(error).toMatchObject({ message: 'Stage exceeded its 20ms execution limit' });
        expect(capabilitySignal?.aborted).toBe(true);
    });

    it('should stop when the caller aborts', async () => {
        capabilities.imageGenerator.generateImage.mockImplementation((_prompt: string, _params: unknown, options: { signal: AbortSignal; }) =>
            untilAborted(options.signal));
        const task = await taskAt(newRun(), 1);
        const controller = new AbortController();

        const pending = executor.execute(task, controller.signal);
        controller.abort(new Error('Project cancelled'));

        await expect(pending).rejects.toThrow('Project cancelled');
    });

    it('should not call the capability when already aborted', async () => {
        const task = await taskAt(newRun(), 1);
        const controller = new AbortController();
        controller.abort(new Error('shutting down'));

        await expect(executor.execute(task, controller.signal)).rejects.toThrow('shutting down');
        expect(capabilities.imageGenerator.generateImage).not.toHaveBeenCalled();
    });

    it('should screen generated images when asset screening is on', async () => {
        const moderation: ModerationAdapter = {
            moderate: vi.fn(async (content: ModerationContent) => content.kind === 'image'
                ? { decision: 'reject' as const, reason: 'graphic content' }
                : { decision: 'allow' as const }),
        };
        executor = createExecutor(moderation, true);
        const task = await taskAt(newRun(), 1);

        await expect(executor.execute(task, signal())).rejects.toThrow('Content rejected: graphic content');
        expect(assetStore.keys()).toEqual([]);
    });
});
