import { DEFAULT_STAGE_TIMEOUTS_MS } from "../shared/constants.js";
import {
    RESOURCE_CLASS_BY_KIND,
    SceneSpec,
    SceneStageGroup,
    Stage,
    StageGraph,
    StageKind,
    StagePayload,
} from "../shared/types/index.js";
import { BuildError, InvariantViolation } from "../shared/utils/errors.js";

export type StageGraphOptions = {
    timeouts?: Record<StageKind, number>;
    now?: Date;
};

type GraphSource = {
    id: string;
    scenes: SceneSpec[];
};

const pad = (n: number) => n.toString().padStart(3, "0");

export function stageId(projectId: string, kind: StageKind, sceneNumber: number | null): string {
    const suffix = kind.toLowerCase();
    return sceneNumber === null
        ? `${projectId}-${suffix}`
        : `${projectId}-scene_${pad(sceneNumber)}-${suffix}`;
}

/**
 * Collects every structural problem with the scene list.
 */
export function validateScenes(scenes: SceneSpec[]): string[] {
    const issues: string[] = [];
    if (scenes.length === 0) {
        issues.push("Project has no scenes");
        return issues;
    }

    const seen = new Set<number>();
    for (const scene of scenes) {
        if (seen.has(scene.sceneNumber)) {
            issues.push(`Duplicate sceneNumber ${scene.sceneNumber}`);
        }
        seen.add(scene.sceneNumber);

        if (!Number.isFinite(scene.durationSeconds) || scene.durationSeconds <= 0) {
            issues.push(`Scene ${scene.sceneNumber} has invalid duration ${scene.durationSeconds}; must be > 0`);
        }
    }

    const numbers = [ ...seen ].sort((a, b) => a - b);
    const contiguous = numbers.every((n, i) => n === i + 1);
    if (!contiguous) {
        issues.push(`Scene numbers must be contiguous from 1, got [${numbers.join(", ")}]`);
    }
    return issues;
}

/**
 * Reverse adjacency, scene groups and the composition index for an arena of stages.
 * Every dependency must point to a lower index.
 */
function indexArena(projectId: string, stages: Stage[]): StageGraph {
    const dependents: number[][] = stages.map(() => []);
    const groups = new Map<number, SceneStageGroup>();
    let compositionIndex = -1;

    stages.forEach((stage, index) => {
        if (stage.index !== index) {
            throw new InvariantViolation(`Stage ${stage.id} stored at ${index} claims index ${stage.index}`);
        }
        for (const dep of stage.dependsOn) {
            if (!Number.isInteger(dep) || dep < 0 || dep >= index) {
                throw new InvariantViolation(`Stage ${stage.id} depends on ${dep}; dependencies must precede it`);
            }
            dependents[ dep ].push(index);
        }

        if (stage.kind === "COMPOSITION") {
            compositionIndex = index;
            return;
        }
        if (stage.sceneNumber === null) {
            throw new InvariantViolation(`Stage ${stage.id} of kind ${stage.kind} has no scene`);
        }
        const group = groups.get(stage.sceneNumber);
        if (group) {
            group.stageIndexes.push(index);
            group.outputIndex = index;
        } else {
            groups.set(stage.sceneNumber, { sceneNumber: stage.sceneNumber, stageIndexes: [ index ], outputIndex: index });
        }
    });

    if (compositionIndex !== stages.length - 1) {
        throw new InvariantViolation(`Project ${projectId} must end with exactly one COMPOSITION stage`);
    }

    return {
        projectId,
        stages,
        dependents,
        scenes: [ ...groups.values() ].sort((a, b) => a.sceneNumber - b.sceneNumber),
        compositionIndex,
    };
}

/**
 * Turns a project into its stage arena: per scene
 * SAFETY_CHECK -> IMAGE_GEN -> ANIMATE [-> AUDIO_MIX], then one COMPOSITION over every scene output.
 */
export function buildStageGraph(project: GraphSource, options: StageGraphOptions = {}): StageGraph {
    const issues = validateScenes(project.scenes);
    if (issues.length > 0) {
        throw new BuildError(`Invalid project: ${issues.join("; ")}`, issues);
    }

    const timeouts = options.timeouts ?? DEFAULT_STAGE_TIMEOUTS_MS;
    const now = options.now ?? new Date();
    const ordered = [ ...project.scenes ].sort((a, b) => a.sceneNumber - b.sceneNumber);
    const stages: Stage[] = [];

    const push = (sceneNumber: number | null, dependsOn: number[], payload: StagePayload): number => {
        const index = stages.length;
        stages.push({
            id: stageId(project.id, payload.kind, sceneNumber),
            projectId: project.id,
            index,
            sceneNumber,
            resourceClass: RESOURCE_CLASS_BY_KIND[ payload.kind ],
            dependsOn,
            state: "PENDING",
            attempt: 0,
            retryCount: 0,
            lastError: null,
            retryAt: null,
            outputKey: null,
            timeoutMs: timeouts[ payload.kind ],
            updatedAt: now,
            ...payload,
        });
        return index;
    };

    const sceneOutputs: number[] = [];
    for (const scene of ordered) {
        const safety = push(scene.sceneNumber, [], { kind: "SAFETY_CHECK", payload: { prompt: scene.prompt } });
        const image = push(scene.sceneNumber, [ safety ], {
            kind: "IMAGE_GEN",
            payload: { prompt: scene.prompt, stylePreset: scene.stylePreset },
        });
        let output = push(scene.sceneNumber, [ image ], {
            kind: "ANIMATE",
            payload: { prompt: scene.prompt, durationSeconds: scene.durationSeconds },
        });
        if (scene.soundEffects.length > 0) {
            output = push(scene.sceneNumber, [ output ], {
                kind: "AUDIO_MIX",
                payload: { soundEffects: scene.soundEffects.map(sfx => ({ ...sfx })) },
            });
        }
        sceneOutputs.push(output);
    }

    push(null, sceneOutputs, {
        kind: "COMPOSITION",
        payload: {
            sceneNumbers: ordered.map(s => s.sceneNumber),
            transitions: ordered.slice(0, -1).map((scene, i) => ({
                fromScene: scene.sceneNumber,
                toScene: ordered[ i + 1 ].sceneNumber,
                transition: scene.transitionToNext,
            })),
        },
    });

    return indexArena(project.id, stages);
}

/**
 * Rebuilds the graph from persisted stages.
 */
export function restoreStageGraph(projectId: string, stages: Stage[]): StageGraph {
    if (stages.length === 0) {
        throw new InvariantViolation(`Project ${projectId} has no stored stages`);
    }
    const ordered = [ ...stages ].sort((a, b) => a.index - b.index);
    return indexArena(projectId, ordered);
}
