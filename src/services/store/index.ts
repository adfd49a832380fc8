export * from "./types";
export { InMemoryMessageStore } from "./InMemoryMessageStore";
export { InMemoryDedupIndex } from "./InMemoryDedupIndex";
