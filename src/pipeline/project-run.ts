import {
    CompositionPolicy,
    ProjectRecord,
    ProjectStatus,
    SceneRecord,
    Stage,
    StageChange,
    StageGraph,
    StageState,
} from "../shared/types/index.js";
import { BackoffConfig, computeBackoffDelay } from "../shared/utils/backoff.js";
import {
    InvalidStateError,
    InvariantViolation,
    TransientError,
    classifyFailure,
    extractErrorMessage,
} from "../shared/utils/errors.js";
import { StageTask } from "./stage-executor.js";

const ALLOWED_TRANSITIONS: Record<StageState, readonly StageState[]> = {
    PENDING: [ "READY", "CANCELLED" ],
    READY: [ "RUNNING", "CANCELLED" ],
    RUNNING: [ "SUCCEEDED", "FAILED", "CANCELLED", "READY" ],
    SUCCEEDED: [],
    FAILED: [ "READY", "PENDING", "CANCELLED" ],
    CANCELLED: [ "PENDING", "READY" ],
};

export type RunSettings = {
    maxAttempts: number;
    backoff: BackoffConfig;
};

export type InFlightDispatch = {
    token: number;
    controller: AbortController;
};

export type TransitionResult = {
    changes: StageChange[];
    /** Stages that became READY and must be enqueued. */
    ready: number[];
};

export type FailureResult = TransitionResult & {
    /** Set when the failure will be retried automatically after this delay. */
    retryDelayMs: number | null;
};

export type SuccessResult = TransitionResult & {
    scene: SceneRecord | null;
    finalOutputKey: string | null;
};

const isPendingRetry = (stage: Stage) => stage.state === "FAILED" && stage.retryAt !== null;
const isTerminalFailure = (stage: Stage) => stage.state === "FAILED" && stage.retryAt === null;

/** Folds several moves of one stage into a single first-from, last-to change. */
function collapseChanges(changes: StageChange[]): StageChange[] {
    const byIndex = new Map<number, StageChange>();
    for (const change of changes) {
        const seen = byIndex.get(change.index);
        byIndex.set(change.index, seen ? { index: change.index, from: seen.from, to: change.to } : change);
    }
    return [ ...byIndex.values() ].filter(change => change.from !== change.to);
}

/**
 * Per-project stage state machine. Every mutation is synchronous, so one call is
 * atomic with respect to other completions on the event loop.
 */
export class ProjectRun {
    readonly inFlight: Map<number, InFlightDispatch> = new Map();

    constructor(
        readonly project: ProjectRecord,
        readonly graph: StageGraph,
        private readonly settings: RunSettings,
        private readonly clock: () => Date = () => new Date(),
    ) { }

    get projectId(): string {
        return this.project.id;
    }

    get stages(): Stage[] {
        return this.graph.stages;
    }

    get compositionPolicy(): CompositionPolicy {
        return this.project.compositionPolicy;
    }

    stage(index: number): Stage {
        const stage = this.graph.stages[ index ];
        if (!stage) {
            throw new InvariantViolation(`Project ${this.projectId} has no stage at index ${index}`);
        }
        return stage;
    }

    isCancelled(): boolean {
        return this.project.cancelRequestedAt !== null;
    }

    /** No stage can make further progress without outside intervention. */
    isQuiesced(): boolean {
        return !this.stages.some(s =>
            s.state === "PENDING" || s.state === "READY" || s.state === "RUNNING" || isPendingRetry(s));
    }

    status(): ProjectStatus {
        if (this.isCancelled()) return "CANCELLED";

        if (this.stages.every(s => s.state === "SUCCEEDED")) return "COMPLETED";
        if (this.compositionPolicy === "allow_partial"
            && this.stage(this.graph.compositionIndex).state === "SUCCEEDED"
            && this.isQuiesced()) {
            return "COMPLETED";
        }

        const failed = this.stages.some(isTerminalFailure);
        if (failed && this.isQuiesced()) return "FAILED";

        const started = this.stages.some(s => s.state === "RUNNING" || s.state === "SUCCEEDED" || s.state === "FAILED");
        return started ? "RUNNING" : "QUEUED";
    }

    // ========================================================================
    // READINESS
    // ========================================================================

    /**
     * Whether a stage may move to READY now. Composition under `allow_partial` waits
     * for every scene output to be terminal with at least one success.
     */
    canBecomeReady(index: number): boolean {
        const stage = this.stage(index);
        const deps = stage.dependsOn.map(d => this.stage(d));

        if (stage.kind === "COMPOSITION" && this.compositionPolicy === "allow_partial") {
            const settled = deps.every(d => d.state === "SUCCEEDED" || d.state === "CANCELLED" || isTerminalFailure(d));
            return settled && deps.some(d => d.state === "SUCCEEDED");
        }
        return deps.every(d => d.state === "SUCCEEDED");
    }

    private transition(index: number, to: StageState, changes: StageChange[]) {
        const stage = this.stage(index);
        const from = stage.state;
        if (!ALLOWED_TRANSITIONS[ from ].includes(to)) {
            throw new InvariantViolation(`Illegal transition ${from} -> ${to} for stage ${stage.id}`);
        }
        if (to === "READY" && !this.canBecomeReady(index)) {
            throw new InvariantViolation(`Stage ${stage.id} cannot become READY: dependencies have not succeeded`);
        }
        const now = this.clock();
        stage.state = to;
        stage.updatedAt = now;
        this.project.updatedAt = now;
        changes.push({ index, from, to });
    }

    /** Marks every dependency-free PENDING stage READY. */
    initialReady(): TransitionResult {
        const changes: StageChange[] = [];
        const ready: number[] = [];
        for (const stage of this.stages) {
            if (stage.state === "PENDING" && this.canBecomeReady(stage.index)) {
                this.transition(stage.index, "READY", changes);
                ready.push(stage.index);
            }
        }
        return { changes, ready };
    }

    /** Stages currently READY, oldest index first. */
    readyStages(): number[] {
        return this.stages.filter(s => s.state === "READY").map(s => s.index);
    }

    // ========================================================================
    // DISPATCH & COMPLETION
    // ========================================================================

    markRunning(index: number): StageChange {
        if (this.isCancelled()) {
            throw new InvariantViolation(`Project ${this.projectId} is cancelled; stage ${index} cannot start`);
        }
        const changes: StageChange[] = [];
        this.transition(index, "RUNNING", changes);
        this.stage(index).attempt++;
        return changes[ 0 ];
    }

    /** Undoes `markRunning` when its durable write failed. */
    revertRunning(index: number): StageChange {
        const changes: StageChange[] = [];
        this.transition(index, "READY", changes);
        this.stage(index).attempt--;
        return changes[ 0 ];
    }

    markSucceeded(index: number, outputKey: string | null): SuccessResult {
        const stage = this.stage(index);
        const changes: StageChange[] = [];
        this.transition(index, "SUCCEEDED", changes);
        stage.outputKey = outputKey;
        stage.retryAt = null;

        let scene: SceneRecord | null = null;
        let finalOutputKey: string | null = null;
        if (outputKey !== null) {
            if (stage.kind === "COMPOSITION") {
                this.project.finalOutputKey = outputKey;
                finalOutputKey = outputKey;
            } else if (stage.sceneNumber !== null && stage.kind !== "SAFETY_CHECK") {
                scene = this.scene(stage.sceneNumber);
                if (stage.kind === "IMAGE_GEN") {
                    scene.assets.imageKey = outputKey;
                } else {
                    scene.assets.clipKey = outputKey;
                }
            }
        }

        const ready: number[] = [];
        for (const dependent of this.graph.dependents[ index ]) {
            if (this.stage(dependent).state === "PENDING" && this.canBecomeReady(dependent)) {
                this.transition(dependent, "READY", changes);
                ready.push(dependent);
            }
        }
        return { changes, ready, scene, finalOutputKey };
    }

    /**
     * Records a failed execution. Retryable failures within the attempt budget wait for
     * backoff; anything else is terminal and cascades to every transitive dependent.
     */
    markFailed(index: number, error: unknown): FailureResult {
        const stage = this.stage(index);
        const changes: StageChange[] = [];
        const failureClass = classifyFailure(error);
        const now = this.clock();

        this.transition(index, "FAILED", changes);
        stage.lastError = {
            class: failureClass,
            name: error instanceof Error ? error.name : "Error",
            message: extractErrorMessage(error),
            at: now,
        };

        if (failureClass === "TRANSIENT" && stage.attempt < this.settings.maxAttempts) {
            const retryDelayMs = computeBackoffDelay(stage.attempt, this.settings.backoff);
            stage.retryAt = new Date(now.getTime() + retryDelayMs);
            return { changes, ready: [], retryDelayMs };
        }

        stage.retryAt = null;
        const ready = this.cascadeFrom(index, changes);
        return { changes, ready, retryDelayMs: null };
    }

    /**
     * Cancels every transitive dependent of a terminally failed stage.
     * Composition under `allow_partial` is re-evaluated instead.
     */
    private cascadeFrom(index: number, changes: StageChange[]): number[] {
        const ready: number[] = [];
        const queue = [ ...this.graph.dependents[ index ] ];
        const visited = new Set<number>();

        while (queue.length > 0) {
            const next = queue.shift();
            if (next === undefined || visited.has(next)) continue;
            visited.add(next);

            const dependent = this.stage(next);
            if (dependent.state !== "PENDING" && dependent.state !== "READY") continue;

            if (dependent.kind === "COMPOSITION" && this.compositionPolicy === "allow_partial") {
                if (this.canBecomeReady(next)) {
                    this.transition(next, "READY", changes);
                    ready.push(next);
                } else if (this.allCompositionInputsSettled(next)) {
                    // every scene output ended without a success
                    this.transition(next, "CANCELLED", changes);
                }
                continue;
            }

            this.transition(next, "CANCELLED", changes);
            queue.push(...this.graph.dependents[ next ]);
        }
        return ready;
    }

    private allCompositionInputsSettled(index: number): boolean {
        return this.stage(index).dependsOn
            .map(d => this.stage(d))
            .every(d => d.state === "SUCCEEDED" || d.state === "CANCELLED" || isTerminalFailure(d));
    }

    /** Backoff elapsed: FAILED -> READY for another attempt. Returns null when no longer applicable. */
    markRetryReady(index: number): StageChange | null {
        const stage = this.stage(index);
        if (!isPendingRetry(stage) || this.isCancelled()) return null;

        const changes: StageChange[] = [];
        this.transition(index, "READY", changes);
        stage.retryAt = null;
        stage.retryCount++;
        return changes[ 0 ];
    }

    // ========================================================================
    // CANCEL / RETRY / RECOVERY
    // ========================================================================

    /**
     * Records cancellation and cancels every live stage. Returns null when there is
     * nothing to do: the project already completed or was already cancelled.
     */
    cancel(): StageChange[] | null {
        const status = this.status();
        if (status === "COMPLETED" || status === "CANCELLED") return null;

        const now = this.clock();
        this.project.cancelRequestedAt = now;

        const changes: StageChange[] = [];
        for (const stage of this.stages) {
            const live = stage.state === "PENDING" || stage.state === "READY" || stage.state === "RUNNING" || isPendingRetry(stage);
            if (!live) continue;
            this.transition(stage.index, "CANCELLED", changes);
            stage.retryAt = null;
        }
        return changes;
    }

    /**
     * Manual retry of a FAILED project. Throws without mutating anything when the
     * project is not FAILED or has no retryable stage.
     */
    retryFailed(): TransitionResult & { reset: number[]; } {
        const status = this.status();
        if (status !== "FAILED") {
            throw new InvalidStateError(`Project ${this.projectId} is ${status}; only FAILED projects can be retried`);
        }

        const retryable = this.stages.filter(s => isTerminalFailure(s) && s.lastError?.class === "TRANSIENT");
        if (retryable.length === 0) {
            throw new InvalidStateError(`Project ${this.projectId} has no retryable failed stages`);
        }

        const changes: StageChange[] = [];
        const ready: number[] = [];
        for (const stage of retryable) {
            this.transition(stage.index, "PENDING", changes);
            stage.attempt = 0;
            stage.retryCount++;
        }

        // Arena order is topological, so dependencies are revived before their dependents.
        for (const stage of this.stages) {
            if (stage.state === "CANCELLED" && this.canStillSucceed(stage.index)) {
                this.transition(stage.index, "PENDING", changes);
            }
        }

        // Readiness is decided only once every revivable stage is back in the graph.
        for (const stage of this.stages) {
            if (stage.state === "PENDING" && this.canBecomeReady(stage.index)) {
                this.transition(stage.index, "READY", changes);
                ready.push(stage.index);
            }
        }

        return { changes: collapseChanges(changes), ready, reset: retryable.map(s => s.index) };
    }

    private canStillSucceed(index: number): boolean {
        const stage = this.stage(index);
        const viable = (d: Stage) => d.state === "SUCCEEDED" || d.state === "READY" || d.state === "PENDING";
        const deps = stage.dependsOn.map(d => this.stage(d));
        if (stage.kind === "COMPOSITION" && this.compositionPolicy === "allow_partial") {
            return deps.some(viable);
        }
        return deps.every(viable);
    }

    /**
     * Startup recovery: a stage found RUNNING has no record of its outcome, so it is
     * failed as transient and takes the normal retry path.
     */
    recoverInterrupted(): { changes: StageChange[]; ready: number[]; retries: { index: number; delayMs: number; }[]; } {
        const changes: StageChange[] = [];
        const ready: number[] = [];
        const retries: { index: number; delayMs: number; }[] = [];
        const now = this.clock().getTime();

        for (const stage of this.stages) {
            if (stage.state !== "RUNNING") continue;
            const result = this.markFailed(stage.index, new TransientError("Stage interrupted by orchestrator restart"));
            changes.push(...result.changes);
            ready.push(...result.ready);
        }

        for (const stage of this.stages) {
            if (isPendingRetry(stage) && stage.retryAt) {
                retries.push({ index: stage.index, delayMs: Math.max(0, stage.retryAt.getTime() - now) });
            }
        }
        return { changes, ready, retries };
    }

    // ========================================================================
    // TASKS
    // ========================================================================

    scene(sceneNumber: number): SceneRecord {
        const scene = this.project.scenes.find(s => s.sceneNumber === sceneNumber);
        if (!scene) {
            throw new InvariantViolation(`Project ${this.projectId} has no scene ${sceneNumber}`);
        }
        return scene;
    }

    private upstreamKey(stage: Stage): string {
        const [ dep ] = stage.dependsOn;
        const key = dep === undefined ? null : this.stage(dep).outputKey;
        if (!key) {
            throw new InvariantViolation(`Stage ${stage.id} has no upstream output to consume`);
        }
        return key;
    }

    /** Everything the executor needs to run one stage. */
    buildTask(index: number): StageTask {
        const stage = this.stage(index);
        switch (stage.kind) {
            case "SAFETY_CHECK":
                return { kind: stage.kind, stage };
            case "IMAGE_GEN":
                return { kind: stage.kind, stage };
            case "ANIMATE":
                return { kind: stage.kind, stage, imageKey: this.upstreamKey(stage) };
            case "AUDIO_MIX":
                return { kind: stage.kind, stage, clipKey: this.upstreamKey(stage) };
            case "COMPOSITION": {
                const clips = this.graph.scenes.flatMap(group => {
                    const output = this.stage(group.outputIndex);
                    if (output.state !== "SUCCEEDED" || !output.outputKey) return [];
                    return [ {
                        sceneNumber: group.sceneNumber,
                        clipKey: output.outputKey,
                        transitionToNext: this.scene(group.sceneNumber).transitionToNext,
                    } ];
                });
                return { kind: stage.kind, stage, clips };
            }
        }
    }
}
