export {
  FINGERPRINT_ALGORITHM,
  computeFingerprint,
  fingerprintOf,
  type FileReader,
} from "./checksum";

export {
  reconcile,
  type ReconcileOptions,
  type ReconcileResult,
  type ReconcileState,
} from "./reconciler";

export {
  inspectStores,
  type StoreStatus,
  type SyncStatus,
} from "./status";

export {
  FileWatcher,
  startWatcher,
  type WatcherOptions,
  type WatcherHandle,
} from "./watcher";
