export {
  FileTextStore,
  MemoryTextStore,
  type TextStore,
} from "./textStore";

export {
  createFileStorePair,
  createMemoryStorePair,
  type StorePair,
  type MemoryStorePair,
} from "./storePair";

export { bootstrapStores, type BootstrapResult } from "./bootstrap";
