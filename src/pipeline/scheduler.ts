import { z } from "zod";
import { v7 as uuidv7 } from "uuid";
import { SchedulerSettings } from "../shared/config.js";
import { ProjectRepository, SaveStagesOptions } from "../shared/services/project-repository.js";
import {
    PipelineEvent,
    ProjectHandle,
    ProjectInput,
    ProjectProgress,
    ProjectRecord,
    ProjectStatus,
    RESOURCE_CLASSES,
    ResourceClass,
    Stage,
    StageChange,
    TERMINAL_PROJECT_STATUSES,
} from "../shared/types/index.js";
import {
    BuildError,
    InvalidStateError,
    ProjectNotFoundError,
    extractErrorDetails,
    extractErrorMessage,
} from "../shared/utils/errors.js";
import { ProjectEventStream } from "./event-stream.js";
import { computeProgress } from "./progress.js";
import { ProjectRun } from "./project-run.js";
import { ResourcePool } from "./resource-pool.js";
import { ProjectLockManager } from "./services/lock-manager.js";
import { StageResult, StageRunner, StageTask } from "./stage-executor.js";
import { buildStageGraph, restoreStageGraph } from "./stage-graph.js";

export type SchedulerDeps = {
    repository: ProjectRepository;
    executor: StageRunner;
    settings: SchedulerSettings;
    publishEvent?: (event: PipelineEvent) => Promise<void>;
    eventStream?: ProjectEventStream;
    lockManager?: ProjectLockManager;
    clock?: () => Date;
};

type Ticket = {
    projectId: string;
    index: number;
};

type StartedDispatch = {
    token: number;
    task: StageTask;
    signal: AbortSignal;
};

type ExecutionOutcome =
    | { ok: true; result: StageResult; }
    | { ok: false; error: unknown; };

export type PoolStats = Record<ResourceClass, { capacity: number; active: number; queued: number; }>;

const CONTROL_PLANE = "control-plane";

const isTerminal = (status: ProjectStatus) => TERMINAL_PROJECT_STATUSES.includes(status);

function abortError(message: string): Error {
    const error = new Error(message);
    error.name = "AbortError";
    return error;
}

/**
 * Drives every submitted project through its stage graph. Ready stages from all
 * projects share one FIFO per resource class; each class runs at most its slot count
 * concurrently. State changes for a project are serialized by its lock and written to
 * the repository before they are announced.
 *
 * When the repository is unreachable, dispatching pauses, in-flight stages finish and
 * their outcomes are kept in memory until the store answers again and they are flushed.
 */
export class PipelineScheduler {
    private runs = new Map<string, ProjectRun>();
    private lastStatus = new Map<string, ProjectStatus>();
    private pools: Record<ResourceClass, ResourcePool<Ticket>>;
    private retryTimers = new Map<string, NodeJS.Timeout>();
    private dirty = new Set<string>();
    private pauseReasons = new Set<string>();
    private recheckTimer: NodeJS.Timeout | undefined;
    private settledWaiters = new Map<string, Array<(progress: ProjectProgress) => void>>();
    private activeDispatches = new Set<Promise<void>>();
    private dispatchesByProject = new Map<string, number>();
    private dispatchCounter = 0;
    private stopped = false;

    private readonly repository: ProjectRepository;
    private readonly executor: StageRunner;
    private readonly settings: SchedulerSettings;
    private readonly lockManager: ProjectLockManager;
    private readonly clock: () => Date;

    constructor(private readonly deps: SchedulerDeps) {
        this.repository = deps.repository;
        this.executor = deps.executor;
        this.settings = deps.settings;
        this.lockManager = deps.lockManager ?? new ProjectLockManager();
        this.clock = deps.clock ?? (() => new Date());
        this.pools = {
            GPU: new ResourcePool<Ticket>("GPU", deps.settings.slots.GPU),
            CPU: new ResourcePool<Ticket>("CPU", deps.settings.slots.CPU),
        };
    }

    // ========================================================================
    // PUBLIC OPERATIONS
    // ========================================================================

    async submit(input: ProjectInput): Promise<ProjectHandle> {
        const parsed = ProjectInput.safeParse(input);
        if (!parsed.success) {
            const issues = parsed.error.issues.map(issue => `${issue.path.join(".") || "project"}: ${issue.message}`);
            throw new BuildError(`Invalid project: ${z.prettifyError(parsed.error)}`, issues);
        }
        if (this.stopped) {
            throw new InvalidStateError("Scheduler is shut down");
        }

        const data = parsed.data;
        const projectId = data.id ?? uuidv7();
        if (this.runs.has(projectId) || await this.repository.getProject(projectId)) {
            throw new InvalidStateError(`Project ${projectId} already exists`);
        }

        const now = this.clock();
        const graph = buildStageGraph({ id: projectId, scenes: data.scenes }, { timeouts: this.settings.timeouts, now });
        const project: ProjectRecord = {
            id: projectId,
            title: data.title,
            scenes: [ ...data.scenes ]
                .sort((a, b) => a.sceneNumber - b.sceneNumber)
                .map(scene => ({ ...scene, assets: {} })),
            compositionPolicy: data.compositionPolicy ?? this.settings.compositionPolicy,
            cancelRequestedAt: null,
            finalOutputKey: null,
            createdAt: now,
            updatedAt: now,
        };

        const run = new ProjectRun(project, graph, this.runSettings(), this.clock);
        const { changes, ready } = run.initialReady();
        await this.repository.createProject(project, run.stages);

        this.runs.set(projectId, run);
        this.lastStatus.set(projectId, run.status());
        console.log({ projectId, scenes: project.scenes.length, stages: run.stages.length }, `[Scheduler] Submitted project "${project.title}"`);

        this.emit({
            type: "PROJECT_SUBMITTED",
            projectId,
            timestamp: now.toISOString(),
            payload: { title: project.title, sceneCount: project.scenes.length, totalStages: run.stages.length },
        });
        this.emitStageChanges(run, changes);
        this.announce(run);
        this.enqueue(run, ready);
        this.pump();

        return {
            projectId,
            title: project.title,
            status: run.status(),
            totalStages: run.stages.length,
            submittedAt: now.toISOString(),
        };
    }

    async progress(projectId: string): Promise<ProjectProgress> {
        const run = this.runs.get(projectId) ?? await this.loadRun(projectId);
        if (!run) throw new ProjectNotFoundError(projectId);
        return computeProgress(run);
    }

    /**
     * Stops every live stage of the project. Completed or already cancelled
     * projects are left untouched.
     */
    async cancel(projectId: string): Promise<ProjectProgress> {
        return this.lockManager.runExclusive(projectId, async () => {
            const run = await this.resolveRun(projectId);
            const changes = run.cancel();
            if (changes === null) {
                console.log({ projectId, status: run.status() }, "[Scheduler] Cancel ignored");
                this.settleIfIdle(run);
                return computeProgress(run);
            }

            this.clearRetryTimers(projectId);
            for (const pool of this.poolList()) {
                pool.drop(ticket => ticket.projectId === projectId);
            }
            for (const dispatch of run.inFlight.values()) {
                dispatch.controller.abort(abortError(`Project ${projectId} cancelled`));
            }
            run.inFlight.clear();

            await this.persist(run, this.changedStages(run, changes), {
                project: { cancelRequestedAt: run.project.cancelRequestedAt },
            });
            console.log({ projectId, cancelledStages: changes.length }, "[Scheduler] Project cancelled");

            this.emitStageChanges(run, changes);
            this.announce(run);
            return computeProgress(run);
        });
    }

    /**
     * Resets the transiently failed stages of a FAILED project and revives the
     * stages that were cancelled because of them.
     */
    async retry(projectId: string): Promise<ProjectProgress> {
        return this.lockManager.runExclusive(projectId, async () => {
            const run = await this.resolveRun(projectId);
            let result: ReturnType<ProjectRun["retryFailed"]>;
            try {
                result = run.retryFailed();
            } catch (error) {
                this.settleIfIdle(run);
                throw error;
            }
            const { changes, ready, reset } = result;
            await this.persist(run, this.changedStages(run, changes));
            console.log({ projectId, reset: reset.length }, "[Scheduler] Retrying failed stages");

            this.emit({
                type: "PROJECT_RETRIED",
                projectId,
                timestamp: this.clock().toISOString(),
                payload: { resetStages: reset.map(i => run.stage(i).id) },
            });
            this.emitStageChanges(run, changes);
            this.announce(run);
            this.enqueue(run, ready);
            this.pump();
            return computeProgress(run);
        });
    }

    /** Removes a COMPLETED, FAILED or CANCELLED project and its stages. */
    async deleteProject(projectId: string): Promise<void> {
        await this.lockManager.runExclusive(projectId, async () => {
            const run = await this.resolveRun(projectId);
            const status = run.status();
            if (!isTerminal(status)) {
                throw new InvalidStateError(`Project ${projectId} is ${status}; cancel it before deleting`);
            }
            await this.repository.deleteProject(projectId);
            this.runs.delete(projectId);
            this.lastStatus.delete(projectId);
            this.dirty.delete(projectId);
            console.log({ projectId }, "[Scheduler] Project deleted");
            this.emit({ type: "PROJECT_DELETED", projectId, timestamp: this.clock().toISOString() });
        });
    }

    /**
     * Resolves once the project reaches COMPLETED, FAILED or CANCELLED and none of
     * its stages is still executing, aborted ones included.
     */
    async settled(projectId: string): Promise<ProjectProgress> {
        if (!this.runs.has(projectId)) {
            const stored = await this.loadRun(projectId);
            if (!stored) throw new ProjectNotFoundError(projectId);
            if (isTerminal(stored.status())) return computeProgress(stored);
        }
        const run = await this.requireRun(projectId);
        if (isTerminal(run.status()) && !this.isBusy(run)) return computeProgress(run);
        return new Promise((resolve) => {
            const waiters = this.settledWaiters.get(projectId) ?? [];
            waiters.push(resolve);
            this.settledWaiters.set(projectId, waiters);
        });
    }

    /**
     * Reloads every project with unfinished work. Stages interrupted mid-run take
     * the transient retry path; pending backoffs are rescheduled for their remaining time.
     */
    async recover(): Promise<string[]> {
        const projectIds = await this.repository.listRecoverableProjects();
        const recovered: string[] = [];

        for (const projectId of projectIds) {
            if (this.runs.has(projectId)) continue;
            await this.lockManager.runExclusive(projectId, async () => {
                const run = await this.loadRun(projectId);
                if (!run) return;
                const { changes, retries } = run.recoverInterrupted();

                this.runs.set(projectId, run);
                this.lastStatus.set(projectId, run.status());
                await this.persist(run, this.changedStages(run, changes));

                for (const retry of retries) {
                    this.scheduleRetry(projectId, retry.index, retry.delayMs);
                }
                this.emitStageChanges(run, changes);
                this.announce(run);
                this.enqueue(run, run.readyStages());
                recovered.push(projectId);
            });
        }

        console.log({ recovered: recovered.length }, "[Scheduler] Recovery complete");
        this.pump();
        return recovered;
    }

    pause(reason: string) {
        const wasPaused = this.isPaused();
        this.pauseReasons.add(reason);
        if (!wasPaused) {
            console.warn({ reason }, "[Scheduler] Dispatching paused");
        }
    }

    resume(reason: string) {
        if (!this.pauseReasons.delete(reason)) return;
        if (this.isPaused()) return;

        if (this.dirty.size > 0) {
            // buffered outcomes go out before anything new is dispatched
            this.pauseReasons.add(CONTROL_PLANE);
            this.scheduleRecheck(0);
            return;
        }
        console.log({ reason }, "[Scheduler] Dispatching resumed");
        this.pump();
    }

    isPaused(): boolean {
        return this.pauseReasons.size > 0;
    }

    poolStats(): PoolStats {
        const stats = (pool: ResourcePool<Ticket>) => ({ capacity: pool.capacity, active: pool.active, queued: pool.queued });
        return { GPU: stats(this.pools.GPU), CPU: stats(this.pools.CPU) };
    }

    /** Aborts in-flight stages and waits for their outcomes to be recorded. */
    async shutdown(): Promise<void> {
        if (this.stopped) return;
        this.stopped = true;
        console.log({ inFlight: this.activeDispatches.size }, "[Scheduler] Shutting down");

        for (const timer of this.retryTimers.values()) clearTimeout(timer);
        this.retryTimers.clear();
        for (const run of this.runs.values()) {
            for (const dispatch of run.inFlight.values()) {
                dispatch.controller.abort(abortError("Scheduler shutting down"));
            }
        }

        await Promise.allSettled([ ...this.activeDispatches ]);
        clearTimeout(this.recheckTimer);
        this.recheckTimer = undefined;
    }

    // ========================================================================
    // DISPATCH
    // ========================================================================

    private runSettings() {
        return { maxAttempts: this.settings.maxAttempts, backoff: this.settings.backoff };
    }

    private poolList(): ResourcePool<Ticket>[] {
        return RESOURCE_CLASSES.map(resourceClass => this.pools[ resourceClass ]);
    }

    private enqueue(run: ProjectRun, indexes: number[]) {
        for (const index of indexes) {
            const stage = run.stage(index);
            this.pools[ stage.resourceClass ].enqueue({ projectId: run.projectId, index });
        }
    }

    private pump() {
        if (this.stopped || this.isPaused()) return;
        for (const pool of this.poolList()) {
            let ticket = pool.tryAcquire();
            while (ticket !== undefined) {
                this.launch(pool, ticket);
                ticket = pool.tryAcquire();
            }
        }
    }

    private launch(pool: ResourcePool<Ticket>, ticket: Ticket) {
        const { projectId } = ticket;
        this.dispatchesByProject.set(projectId, (this.dispatchesByProject.get(projectId) ?? 0) + 1);

        const dispatch: Promise<void> = this.dispatch(pool, ticket)
            .catch((error: unknown) => {
                console.error({ projectId, index: ticket.index, error: extractErrorDetails(error) },
                    "[Scheduler] Dispatch failed unexpectedly");
            })
            .finally(() => {
                this.activeDispatches.delete(dispatch);
                const remaining = (this.dispatchesByProject.get(projectId) ?? 1) - 1;
                if (remaining > 0) {
                    this.dispatchesByProject.set(projectId, remaining);
                } else {
                    this.dispatchesByProject.delete(projectId);
                    const run = this.runs.get(projectId);
                    if (run) this.settleIfIdle(run);
                }
            });
        this.activeDispatches.add(dispatch);
    }

    /** Owns one pool slot from acquisition until the adapter returns. */
    private async dispatch(pool: ResourcePool<Ticket>, ticket: Ticket): Promise<void> {
        let released = false;
        const release = () => {
            if (released) return;
            released = true;
            pool.release();
            this.pump();
        };

        try {
            const started = await this.lockManager.runExclusive(ticket.projectId, () => this.start(pool, ticket));
            if (!started) return;

            let outcome: ExecutionOutcome;
            try {
                outcome = { ok: true, result: await this.executor.execute(started.task, started.signal) };
            } catch (error) {
                outcome = { ok: false, error };
            }
            release();

            await this.lockManager.runExclusive(ticket.projectId, () => this.complete(ticket, started, outcome));
        } finally {
            release();
        }
    }

    private async start(pool: ResourcePool<Ticket>, ticket: Ticket): Promise<StartedDispatch | null> {
        const run = this.runs.get(ticket.projectId);
        if (!run || run.isCancelled()) return null;

        const stage = run.stage(ticket.index);
        if (stage.state !== "READY") return null;
        if (this.isPaused() || this.stopped) {
            pool.enqueueFront(ticket);
            return null;
        }

        const change = run.markRunning(ticket.index);
        try {
            await this.repository.saveStages(run.projectId, [ stage ]);
        } catch (error) {
            run.revertRunning(ticket.index);
            pool.enqueueFront(ticket);
            this.enterDegraded(error);
            return null;
        }

        const token = ++this.dispatchCounter;
        const controller = new AbortController();
        run.inFlight.set(ticket.index, { token, controller });
        console.debug({ projectId: run.projectId, stageId: stage.id, attempt: stage.attempt }, `[Scheduler] Dispatching ${stage.kind}`);

        this.emitStageChanges(run, [ change ]);
        this.announce(run);
        return { token, task: run.buildTask(ticket.index), signal: controller.signal };
    }

    private async complete(ticket: Ticket, started: StartedDispatch, outcome: ExecutionOutcome): Promise<void> {
        const run = this.runs.get(ticket.projectId);
        const current = run?.inFlight.get(ticket.index);
        if (!run || !current || current.token !== started.token) {
            console.debug({ projectId: ticket.projectId, index: ticket.index }, "[Scheduler] Discarding stale stage outcome");
            return;
        }
        run.inFlight.delete(ticket.index);

        const stage = run.stage(ticket.index);
        if (stage.state !== "RUNNING") return;

        if (outcome.ok) {
            const result = run.markSucceeded(ticket.index, outcome.result.outputKey);
            const options: SaveStagesOptions = {};
            if (result.scene) options.scenes = [ result.scene ];
            if (result.finalOutputKey) options.project = { finalOutputKey: result.finalOutputKey };

            await this.persist(run, this.changedStages(run, result.changes), options);
            this.emitStageChanges(run, result.changes);
            this.enqueue(run, result.ready);
        } else {
            const result = run.markFailed(ticket.index, outcome.error);
            const failure = stage.lastError;
            console.warn({
                projectId: run.projectId,
                stageId: stage.id,
                attempt: stage.attempt,
                failureClass: failure?.class,
                retryInMs: result.retryDelayMs,
                error: extractErrorMessage(outcome.error),
            }, `[Scheduler] ${stage.kind} failed`);

            await this.persist(run, this.changedStages(run, result.changes));
            if (result.retryDelayMs !== null) {
                this.scheduleRetry(run.projectId, ticket.index, result.retryDelayMs);
            }
            this.emitStageChanges(run, result.changes);
            this.enqueue(run, result.ready);
        }

        this.announce(run);
        this.pump();
    }

    // ========================================================================
    // RETRIES
    // ========================================================================

    private retryKey(projectId: string, index: number) {
        return `${projectId}:${index}`;
    }

    private scheduleRetry(projectId: string, index: number, delayMs: number) {
        if (this.stopped) return;
        const key = this.retryKey(projectId, index);
        clearTimeout(this.retryTimers.get(key));

        const timer = setTimeout(() => {
            this.retryTimers.delete(key);
            this.fireRetry(projectId, index).catch((error: unknown) => {
                console.error({ projectId, index, error: extractErrorDetails(error) }, "[Scheduler] Retry failed to start");
            });
        }, delayMs);
        this.retryTimers.set(key, timer);
    }

    private async fireRetry(projectId: string, index: number): Promise<void> {
        await this.lockManager.runExclusive(projectId, async () => {
            const run = this.runs.get(projectId);
            if (!run) return;
            const change = run.markRetryReady(index);
            if (!change) return;

            await this.persist(run, [ run.stage(index) ]);
            this.emitStageChanges(run, [ change ]);
            this.announce(run);
            this.enqueue(run, [ index ]);
        });
        this.pump();
    }

    private clearRetryTimers(projectId: string) {
        for (const [ key, timer ] of this.retryTimers) {
            if (key.startsWith(`${projectId}:`)) {
                clearTimeout(timer);
                this.retryTimers.delete(key);
            }
        }
    }

    // ========================================================================
    // PERSISTENCE
    // ========================================================================

    private changedStages(run: ProjectRun, changes: StageChange[]): Stage[] {
        const indexes = [ ...new Set(changes.map(c => c.index)) ].sort((a, b) => a - b);
        return indexes.map(i => run.stage(i));
    }

    private async persist(run: ProjectRun, stages: Stage[], options: SaveStagesOptions = {}): Promise<void> {
        const projectId = run.projectId;
        if (this.isPaused() || this.dirty.has(projectId)) {
            this.dirty.add(projectId);
            return;
        }
        try {
            await this.repository.saveStages(projectId, stages, options);
        } catch (error) {
            this.dirty.add(projectId);
            this.enterDegraded(error);
        }
    }

    private enterDegraded(error: unknown) {
        console.error({ error: extractErrorDetails(error) }, "[Scheduler] Project store write failed");
        this.pause(CONTROL_PLANE);
        this.scheduleRecheck(this.settings.recheckIntervalMs);
    }

    private scheduleRecheck(delayMs: number) {
        if (this.recheckTimer || this.stopped) return;
        this.recheckTimer = setTimeout(() => {
            this.recheckTimer = undefined;
            this.recheckStore().catch((error: unknown) => {
                console.warn({ error: extractErrorMessage(error) }, "[Scheduler] Project store still unavailable");
                this.scheduleRecheck(this.settings.recheckIntervalMs);
            });
        }, delayMs);
    }

    /** Pings the store, flushes full snapshots of every buffered project, then resumes. */
    private async recheckStore(): Promise<void> {
        await this.repository.ping();

        let projectId = this.nextDirty();
        while (projectId !== undefined) {
            const id = projectId;
            await this.lockManager.runExclusive(id, async () => {
                const run = this.runs.get(id);
                if (run) {
                    await this.repository.saveStages(id, run.stages, {
                        scenes: run.project.scenes,
                        project: { cancelRequestedAt: run.project.cancelRequestedAt, finalOutputKey: run.project.finalOutputKey },
                    });
                }
                this.dirty.delete(id);
                if (run) this.settleIfIdle(run);
            });
            projectId = this.nextDirty();
        }

        console.log("[Scheduler] Project store reachable again");
        this.resume(CONTROL_PLANE);
    }

    private nextDirty(): string | undefined {
        return this.dirty.values().next().value;
    }

    // ========================================================================
    // LOOKUP
    // ========================================================================

    private async loadRun(projectId: string): Promise<ProjectRun | null> {
        const project = await this.repository.getProject(projectId);
        if (!project) return null;
        const stages = await this.repository.loadStages(projectId);
        const graph = restoreStageGraph(projectId, stages);
        return new ProjectRun(project, graph, this.runSettings(), this.clock);
    }

    private async requireRun(projectId: string): Promise<ProjectRun> {
        const cached = this.runs.get(projectId);
        if (cached) return cached;
        return this.lockManager.runExclusive(projectId, () => this.resolveRun(projectId));
    }

    /** Cached run, or one reloaded from the repository. Callers hold the project lock. */
    private async resolveRun(projectId: string): Promise<ProjectRun> {
        const existing = this.runs.get(projectId);
        if (existing) return existing;
        const loaded = await this.loadRun(projectId);
        if (!loaded) throw new ProjectNotFoundError(projectId);
        this.runs.set(projectId, loaded);
        this.lastStatus.set(projectId, loaded.status());
        return loaded;
    }

    // ========================================================================
    // EVENTS
    // ========================================================================

    private emit(event: PipelineEvent) {
        try {
            this.deps.eventStream?.publish(event);
        } catch (error) {
            console.error({ type: event.type, error: extractErrorDetails(error) }, "[Scheduler] Event listener threw");
        }
        this.deps.publishEvent?.(event).catch((error: unknown) => {
            console.error({ type: event.type, error: extractErrorMessage(error) }, "[Scheduler] Failed to publish event");
        });
    }

    private emitStageChanges(run: ProjectRun, changes: StageChange[]) {
        const timestamp = this.clock().toISOString();
        for (const change of changes) {
            const stage = run.stage(change.index);
            this.emit({
                type: "STAGE_STATE_CHANGED",
                projectId: run.projectId,
                timestamp,
                payload: {
                    stageId: stage.id,
                    kind: stage.kind,
                    sceneNumber: stage.sceneNumber,
                    from: change.from,
                    to: change.to,
                    attempt: stage.attempt,
                    retryCount: stage.retryCount,
                    ...(change.to === "FAILED" && stage.lastError ? { error: stage.lastError.message } : {}),
                },
            });
        }
    }

    /** Publishes progress, and on a status change the matching project events. */
    private announce(run: ProjectRun) {
        const projectId = run.projectId;
        const progress = computeProgress(run);
        const timestamp = this.clock().toISOString();
        this.emit({ type: "PROJECT_PROGRESS", projectId, timestamp, payload: { progress } });

        const previous = this.lastStatus.get(projectId);
        const status = progress.status;
        if (previous === status) return;
        this.lastStatus.set(projectId, status);

        if (previous !== undefined) {
            this.emit({ type: "PROJECT_STATUS_CHANGED", projectId, timestamp, payload: { from: previous, to: status } });
        }

        switch (status) {
            case "COMPLETED":
                console.log({ projectId, finalOutputKey: run.project.finalOutputKey }, "[Scheduler] Project completed");
                this.emit({ type: "PROJECT_COMPLETED", projectId, timestamp, payload: { finalOutputKey: run.project.finalOutputKey } });
                break;
            case "FAILED":
                console.warn({ projectId }, "[Scheduler] Project failed");
                this.emit({
                    type: "PROJECT_FAILED",
                    projectId,
                    timestamp,
                    payload: {
                        failures: run.stages.flatMap(stage => stage.state === "FAILED" && stage.lastError ? [ {
                            stageId: stage.id,
                            kind: stage.kind,
                            sceneNumber: stage.sceneNumber,
                            class: stage.lastError.class,
                            message: stage.lastError.message,
                        } ] : []),
                    },
                });
                break;
            case "CANCELLED":
                this.emit({ type: "PROJECT_CANCELLED", projectId, timestamp });
                break;
        }

        this.settleIfIdle(run);
    }

    // ========================================================================
    // SETTLING
    // ========================================================================

    private isBusy(run: ProjectRun): boolean {
        return run.inFlight.size > 0 || this.dispatchesByProject.has(run.projectId);
    }

    /**
     * Wakes `settled()` callers of a terminal project with nothing left executing, then
     * drops the run from memory. Later calls reload it from the repository.
     */
    private settleIfIdle(run: ProjectRun) {
        const projectId = run.projectId;
        if (!isTerminal(run.status()) || this.isBusy(run)) return;

        const waiters = this.settledWaiters.get(projectId) ?? [];
        this.settledWaiters.delete(projectId);
        if (waiters.length > 0) {
            const progress = computeProgress(run);
            for (const resolve of waiters) resolve(progress);
        }

        // buffered outcomes exist only in memory until the store is reachable again
        if (this.dirty.has(projectId) || this.runs.get(projectId) !== run) return;
        this.runs.delete(projectId);
        this.lastStatus.delete(projectId);
        console.debug({ projectId, status: run.status() }, "[Scheduler] Released settled project");
    }
}
