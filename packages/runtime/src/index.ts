export { createRuntime } from "./runtime.js";
export type { Runtime, RuntimeOverrides } from "./runtime.js";
export { initialize } from "./initialize.js";
