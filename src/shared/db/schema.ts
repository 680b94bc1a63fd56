import {
  pgTable, uuid, text, timestamp, integer,
  jsonb, real, pgEnum,
  index, uniqueIndex,
  primaryKey
} from "drizzle-orm/pg-core";
import { v7 as uuidv7 } from "uuid";
import {
  COMPOSITION_POLICIES,
  FailureClass,
  RESOURCE_CLASSES,
  STAGE_KINDS,
  STAGE_STATES,
  SoundEffectSpec,
  Transition,
} from "../types/index.js";

// --- ENUMS ---
export const stageStateEnum = pgEnum("stage_state", STAGE_STATES);
export const stageKindEnum = pgEnum("stage_kind", STAGE_KINDS);
export const resourceClassEnum = pgEnum("resource_class", RESOURCE_CLASSES);
export const compositionPolicyEnum = pgEnum("composition_policy", COMPOSITION_POLICIES);

/** Failure as stored in jsonb; `at` is an ISO string. */
export type StoredStageFailure = {
  class: FailureClass;
  name: string;
  message: string;
  at: string;
};

// --- TABLES ---

export const projects = pgTable("projects", {
  id: uuid("id").notNull().primaryKey().$defaultFn(() => uuidv7()),
  createdAt: timestamp("created_at").defaultNow().notNull(),
  updatedAt: timestamp("updated_at").defaultNow().notNull(),
  title: text("title").notNull(),
  compositionPolicy: compositionPolicyEnum("composition_policy").default("require_all").notNull(),
  // Fact of cancellation. Project status itself is derived from stage states.
  cancelRequestedAt: timestamp("cancel_requested_at"),
  finalOutputKey: text("final_output_key"),
});

export const scenes = pgTable("scenes", {
  projectId: uuid("project_id").references(() => projects.id, { onDelete: "cascade" }).notNull(),
  sceneNumber: integer("scene_number").notNull(),
  prompt: text("prompt").notNull(),
  durationSeconds: real("duration_seconds").notNull(),
  stylePreset: text("style_preset").default("cinematic").notNull(),
  soundEffects: jsonb("sound_effects").$type<SoundEffectSpec[]>().default([]).notNull(),
  transitionToNext: text("transition_to_next").$type<Transition>().default("none").notNull(),
  imageKey: text("image_key"),
  clipKey: text("clip_key"),
  updatedAt: timestamp("updated_at").defaultNow().notNull(),
}, (t) => [
  primaryKey({ columns: [ t.projectId, t.sceneNumber ] }),
]);

export const stages = pgTable("stages", {
  id: text("id").notNull().primaryKey(),
  projectId: uuid("project_id").references(() => projects.id, { onDelete: "cascade" }).notNull(),
  stageIndex: integer("stage_index").notNull(),
  kind: stageKindEnum("kind").notNull(),
  sceneNumber: integer("scene_number"),
  resourceClass: resourceClassEnum("resource_class").notNull(),
  dependsOn: integer("depends_on").array().default([]).notNull(),
  state: stageStateEnum("state").default("PENDING").notNull(),
  attempt: integer("attempt").default(0).notNull(),
  retryCount: integer("retry_count").default(0).notNull(),
  lastError: jsonb("last_error").$type<StoredStageFailure>(),
  retryAt: timestamp("retry_at"),
  outputKey: text("output_key"),
  timeoutMs: integer("timeout_ms").notNull(),
  payload: jsonb("payload").$type<Record<string, unknown>>().notNull(),
  updatedAt: timestamp("updated_at").defaultNow().notNull(),
}, (table) => [
  // Arena position is unique within a project; dependency edges reference it.
  uniqueIndex("idx_stage_project_index").on(table.projectId, table.stageIndex),

  // Recovery scans for projects that still have live stages.
  index("idx_stages_state_updated").on(table.state, table.updatedAt),
]);

export type ProjectRow = typeof projects.$inferSelect;
export type InsertProjectRow = typeof projects.$inferInsert;
export type SceneRow = typeof scenes.$inferSelect;
export type InsertSceneRow = typeof scenes.$inferInsert;
export type StageRow = typeof stages.$inferSelect;
export type InsertStageRow = typeof stages.$inferInsert;
