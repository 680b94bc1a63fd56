import { describe, it, expect, vi } from 'vitest';
import { ProjectEventStream } from '../event-stream.js';
import { PipelineEvent } from '../../shared/types/index.js';

const deleted = (projectId: string): PipelineEvent => ({ type: 'PROJECT_DELETED', projectId, timestamp: '2026-03-01T12:00:00.000Z' });

describe('ProjectEventStream', () => {
    it('should deliver events only to listeners of the same project', () => {
        const stream = new ProjectEventStream();
        const first = vi.fn();
        const second = vi.fn();
        stream.subscribe('p1', first);
        stream.subscribe('p2', second);

        stream.publish(deleted('p1'));

        expect(first).toHaveBeenCalledWith(deleted('p1'));
        expect(second).not.toHaveBeenCalled();
    });

    it('should stop delivering after unsubscribe', () => {
        const stream = new ProjectEventStream();
        const listener = vi.fn();
        const unsubscribe = stream.subscribe('p1', listener);

        unsubscribe();
        stream.publish(deleted('p1'));

        expect(listener).not.toHaveBeenCalled();
        expect(stream.listenerCount('p1')).toBe(0);
    });
});
