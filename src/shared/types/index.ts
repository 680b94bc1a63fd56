// Domain primitives
export * from "./project.types.js";
export * from "./stage.types.js";
export * from "./assets.types.js";

// Read models
export * from "./progress.types.js";

// Messaging (depends on everything above)
export * from "./pubsub.types.js";
