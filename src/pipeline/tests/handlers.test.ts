import { describe, it, expect, vi } from 'vitest';
import { handleSubmitProjectCommand } from '../handlers/handleSubmitProjectCommand.js';
import { handleCancelProjectCommand } from '../handlers/handleCancelProjectCommand.js';
import { handleRetryProjectCommand } from '../handlers/handleRetryProjectCommand.js';
import { handleRequestProgressCommand } from '../handlers/handleRequestProgressCommand.js';
import { handleDeleteProjectCommand } from '../handlers/handleDeleteProjectCommand.js';
import { PipelineScheduler } from '../scheduler.js';
import { InMemoryProjectRepository } from '../../shared/services/memory-project-repository.js';
import { PipelineEvent } from '../../shared/types/index.js';
import { FakeStageRunner, PROJECT_ID, testSettings, twoSceneProject } from './helpers/fakes.js';

const timestamp = '2026-03-01T12:00:00.000Z';

function setup() {
    const scheduler = new PipelineScheduler({
        repository: new InMemoryProjectRepository(),
        executor: new FakeStageRunner(),
        settings: testSettings(),
    });
    const published: PipelineEvent[] = [];
    const publishEvent = vi.fn(async (event: PipelineEvent) => {
        published.push(event);
    });
    return { scheduler, published, publishEvent };
}

describe('command handlers', () => {
    it('should submit the project under the command project id', async () => {
        const { scheduler, publishEvent } = setup();
        const { id: _id, ...project } = twoSceneProject();

        await handleSubmitProjectCommand(
            { type: 'SUBMIT_PROJECT', projectId: PROJECT_ID, timestamp, payload: { project } },
            scheduler,
            publishEvent,
        );

        await expect(scheduler.settled(PROJECT_ID)).resolves.toMatchObject({ status: 'COMPLETED' });
        expect(publishEvent).not.toHaveBeenCalled();
        await scheduler.shutdown();
    });

    it('should report a rejected submit as COMMAND_FAILED', async () => {
        const { scheduler, published, publishEvent } = setup();

        await handleSubmitProjectCommand(
            { type: 'SUBMIT_PROJECT', projectId: PROJECT_ID, commandId: 'cmd-7', timestamp, payload: { project: twoSceneProject({ scenes: [] }) } },
            scheduler,
            publishEvent,
        );

        expect(published).toHaveLength(1);
        expect(published[ 0 ]).toMatchObject({
            type: 'COMMAND_FAILED',
            projectId: PROJECT_ID,
            commandId: 'cmd-7',
            payload: { command: 'SUBMIT_PROJECT', errorName: 'BuildError', error: 'Invalid project: Project has no scenes' },
        });
    });

    it('should report cancel, retry and delete of an unknown project', async () => {
        const { scheduler, published, publishEvent } = setup();

        await handleCancelProjectCommand({ type: 'CANCEL_PROJECT', projectId: PROJECT_ID, timestamp }, scheduler, publishEvent);
        await handleRetryProjectCommand({ type: 'RETRY_PROJECT', projectId: PROJECT_ID, timestamp }, scheduler, publishEvent);
        await handleDeleteProjectCommand({ type: 'DELETE_PROJECT', projectId: PROJECT_ID, timestamp }, scheduler, publishEvent);

        expect(published.map(e => e.type === 'COMMAND_FAILED' ? [ e.payload.command, e.payload.errorName, e.payload.error ] : [])).toEqual([
            [ 'CANCEL_PROJECT', 'ProjectNotFoundError', `Project ${PROJECT_ID} not found` ],
            [ 'RETRY_PROJECT', 'ProjectNotFoundError', `Project ${PROJECT_ID} not found` ],
            [ 'DELETE_PROJECT', 'ProjectNotFoundError', `Project ${PROJECT_ID} not found` ],
        ]);
    });

    it('should answer a progress request with a snapshot', async () => {
        const { scheduler, published, publishEvent } = setup();
        await scheduler.submit(twoSceneProject());
        await scheduler.settled(PROJECT_ID);

        await handleRequestProgressCommand({ type: 'REQUEST_PROGRESS', projectId: PROJECT_ID, commandId: 'cmd-2', timestamp }, scheduler, publishEvent);

        expect(published).toHaveLength(1);
        expect(published[ 0 ]).toMatchObject({
            type: 'PROJECT_PROGRESS',
            commandId: 'cmd-2',
            payload: { progress: { projectId: PROJECT_ID, status: 'COMPLETED', percent: 100 } },
        });
        await scheduler.shutdown();
    });
});
