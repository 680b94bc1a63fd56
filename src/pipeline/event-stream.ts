import { EventEmitter } from "events";
import { PipelineEvent } from "../shared/types/index.js";

export type PipelineEventListener = (event: PipelineEvent) => void;

/**
 * In-process fan-out of pipeline events, keyed by project.
 */
export class ProjectEventStream {
    private emitter = new EventEmitter();

    constructor() {
        // one listener per watching client
        this.emitter.setMaxListeners(0);
    }

    /** Returns the unsubscribe function. */
    subscribe(projectId: string, listener: PipelineEventListener): () => void {
        this.emitter.on(projectId, listener);
        return () => {
            this.emitter.off(projectId, listener);
        };
    }

    publish(event: PipelineEvent) {
        this.emitter.emit(event.projectId, event);
    }

    listenerCount(projectId: string): number {
        return this.emitter.listenerCount(projectId);
    }
}
