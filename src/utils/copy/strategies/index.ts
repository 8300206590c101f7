export { StandardStrategy } from "./standard.ts";
export type { StandardStrategyOptions } from "./standard.ts";
