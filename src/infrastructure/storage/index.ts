/**
 * Storage infrastructure exports.
 */

export { WorkspaceState } from "./workspace-state.js";
export { MemoryStore, MEMORY_FILE, HISTORY_FILE } from "./memory-store.js";
