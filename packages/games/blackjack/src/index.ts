export * from "./cards";
export * from "./ruleset";
export * from "./state";
export * from "./actions";
export * from "./deck";
export * from "./dealer";
export * from "./evaluation";
export * from "./rules";
export { SeededRng } from "./prng";
