import { describe, it, expect } from 'vitest';
import { computeProgress } from '../progress.js';
import { PermanentError } from '../../shared/utils/errors.js';
import { makeRun, scene, succeed } from './helpers/fakes.js';

// one scene: SAFETY_CHECK (1) + IMAGE_GEN (6) + ANIMATE (8) + COMPOSITION (5) = 20
describe('computeProgress', () => {
    it('should start queued at zero', () => {
        const run = makeRun([ scene(1) ]);
        run.initialReady();

        const progress = computeProgress(run);

        expect(progress).toMatchObject({
            projectId: 'p1',
            title: 'Test project',
            status: 'QUEUED',
            percent: 0,
            finalOutputKey: null,
            updatedAt: '2026-03-01T12:00:00.000Z',
        });
        expect(progress.perScene[ 0 ]).toMatchObject({ sceneNumber: 1, status: 'QUEUED', percent: 0, imageKey: null, clipKey: null });
    });

    it('should weight stages by kind', () => {
        const run = makeRun([ scene(1) ]);
        run.initialReady();
        succeed(run, 0);
        succeed(run, 1);

        const progress = computeProgress(run);

        expect(progress.percent).toBe(35);
        expect(progress.perScene[ 0 ]).toMatchObject({
            status: 'RUNNING',
            percent: 46,
            imageKey: 'out/p1-scene_001-image_gen',
            clipKey: null,
        });
        expect(progress.perScene[ 0 ].stages.map(s => s.state)).toEqual([ 'SUCCEEDED', 'SUCCEEDED', 'READY' ]);
    });

    it('should report 100 with the final output once completed', () => {
        const run = makeRun([ scene(1) ]);
        run.initialReady();
        [ 0, 1, 2, 3 ].forEach(i => succeed(run, i));

        const progress = computeProgress(run);

        expect(progress.status).toBe('COMPLETED');
        expect(progress.percent).toBe(100);
        expect(progress.finalOutputKey).toBe('out/p1-composition');
        expect(progress.composition).toEqual({
            id: 'p1-composition',
            kind: 'COMPOSITION',
            state: 'SUCCEEDED',
            attempt: 1,
            retryCount: 0,
            lastError: null,
        });
    });

    it('should mark a scene failed when its chain was cut short', () => {
        const run = makeRun([ scene(1), scene(2) ]);
        run.initialReady();
        run.markRunning(3);
        run.markFailed(3, new PermanentError('bad prompt'));

        const progress = computeProgress(run);

        expect(progress.perScene.map(s => s.status)).toEqual([ 'QUEUED', 'FAILED' ]);
        expect(progress.perScene[ 1 ].stages[ 0 ].lastError).toMatchObject({ class: 'PERMANENT', message: 'bad prompt' });
    });

    it('should show unfinished scenes as cancelled after a cancel', () => {
        const run = makeRun([ scene(1) ]);
        run.initialReady();
        run.cancel();

        const progress = computeProgress(run);

        expect(progress.status).toBe('CANCELLED');
        expect(progress.perScene[ 0 ].status).toBe('CANCELLED');
    });
});
