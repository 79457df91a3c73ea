export * from "./features/track/track.errors";
export * from "./features/track/track.types";

export * from "./features/track/source/table.source";
export * from "./features/track/source/value.parse";

export * from "./features/track/schema/schema.types";
export * from "./features/track/schema/schema.ranges";
export * from "./features/track/schema/schema.cache";

export * from "./features/track/inference/chat.client";
export * from "./features/track/inference/roles.inference";

export * from "./features/track/chunk/data.chunk";
export * from "./features/track/point/traj.point";
export * from "./features/track/trajectory/trajectory";
export * from "./features/track/trajectory/trajectory.series";
export * from "./features/track/store/trajectory.store";

export * from "./features/env/geo/geo.math";
export * from "./features/env/grid/grid.types";
export * from "./features/env/grid/grid.interp";
export * from "./features/env/grid/grid.source";
export * from "./features/env/fusion/fusion.config.store";
export * from "./features/env/fusion/env.fusion";

export * from "./config/app.config";
