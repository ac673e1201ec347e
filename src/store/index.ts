export { createProcessExecutor, runAttached, tryRunCommand } from "./exec.js";
export { NixStore } from "./nix-store.js";
export type {
  BuildUnit,
  CommandExecutor,
  FlakeMetadata,
  OutputDescriptor,
  Result,
  StoreQuery,
} from "./types.js";
