export type { RunStore } from "./types";
export { InMemoryRunStore, createInMemoryData } from "./in-memory";
export type { InMemoryData } from "./in-memory";
