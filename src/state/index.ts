export { RunStateStore } from "./run-state";
