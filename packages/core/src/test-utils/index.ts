export {
  createMemoryStore,
  matchesFilter,
  type MemoryStore,
  type SeedItem,
  type StoreMethod,
} from "./memory-store.js";
