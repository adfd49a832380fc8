export { StoreThreadContextRepository, type ThreadContextRepository } from "./ThreadContextRepository";
export { ThreadContextCache } from "./ThreadContextCache";
