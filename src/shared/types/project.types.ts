// shared/types/project.types.ts
import { z } from "zod";

// ============================================================================
// SCENE INPUT
// ============================================================================

export const TRANSITIONS = [ "none", "crossfade", "cut", "fade" ] as const;
export const Transition = z.enum(TRANSITIONS).describe("Transition into the next scene");
export type Transition = z.infer<typeof Transition>;

export const COMPOSITION_POLICIES = [ "require_all", "allow_partial" ] as const;
export const CompositionPolicy = z.enum(COMPOSITION_POLICIES);
export type CompositionPolicy = z.infer<typeof CompositionPolicy>;

export const SoundEffectSpec = z.object({
  type: z.string().trim().min(1).describe("Sound library identifier, e.g. 'rain', 'thunder'"),
  description: z.string().default("").describe("Free-form direction for the effect"),
});
export type SoundEffectSpec = z.infer<typeof SoundEffectSpec>;

/**
 * Shape validation only. Ordering, contiguity and duration rules are
 * checked by the stage graph builder so they surface as `BuildError`.
 */
export const SceneSpec = z.object({
  sceneNumber: z.number().int().describe("1-based position of the scene in the video"),
  prompt: z.string().trim().min(1).describe("Visual description used for image generation"),
  durationSeconds: z.number().describe("Length of the animated clip"),
  stylePreset: z.string().trim().min(1).default("cinematic"),
  soundEffects: z.array(SoundEffectSpec).default([]),
  transitionToNext: Transition.default("none"),
});
export type SceneSpec = z.infer<typeof SceneSpec>;
export type SceneSpecInput = z.input<typeof SceneSpec>;

export const ProjectInput = z.object({
  id: z.uuid().optional(),
  title: z.string().trim().min(1),
  scenes: z.array(SceneSpec),
  compositionPolicy: CompositionPolicy.optional(),
});
export type ProjectInput = z.input<typeof ProjectInput>;
export type ParsedProjectInput = z.infer<typeof ProjectInput>;

// ============================================================================
// PROJECT RECORDS
// ============================================================================

export const PROJECT_STATUSES = [
  "QUEUED",
  "RUNNING",
  "COMPLETED",
  "FAILED",
  "CANCELLED"
] as const;
export type ProjectStatus = (typeof PROJECT_STATUSES)[ number ];

export const TERMINAL_PROJECT_STATUSES: readonly ProjectStatus[] = [ "COMPLETED", "FAILED", "CANCELLED" ];

export type SceneAssets = {
  imageKey?: string;
  clipKey?: string;
};

export type SceneRecord = SceneSpec & {
  assets: SceneAssets;
};

export type ProjectRecord = {
  id: string;
  title: string;
  scenes: SceneRecord[];
  compositionPolicy: CompositionPolicy;
  cancelRequestedAt: Date | null;
  finalOutputKey: string | null;
  createdAt: Date;
  updatedAt: Date;
};

export type ProjectHandle = {
  projectId: string;
  title: string;
  status: ProjectStatus;
  totalStages: number;
  submittedAt: string;
};
