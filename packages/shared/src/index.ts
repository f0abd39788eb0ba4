export type * from "./templates.js";
export type * from "./instances.js";
export type * from "./conditions.js";
export type * from "./api.js";
