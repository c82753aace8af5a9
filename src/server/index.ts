// biome-ignore lint/performance/noBarrelFile: Public API entry point for the server
export { createTaskServer } from "./server";
export type { TaskServer, TaskServerOverrides } from "./types";
