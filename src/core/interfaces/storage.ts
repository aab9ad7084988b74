/**
 * Storage interfaces.
 */

/**
 * Directory entry as returned by {@link IWorkspaceState.list}.
 */
export interface WorkspaceEntry {
  name: string;
  isDirectory: boolean;
}

/**
 * Sole owner of workspace file access.
 *
 * Paths are relative to the workspace root unless absolute.
 */
export interface IWorkspaceState {
  readonly root: string;

  /**
   * Resolve a path against the workspace root.
   */
  resolve(path: string): string;

  /**
   * Read a file; an absent file reads as "".
   */
  read(path: string): Promise<string>;

  /**
   * Append text; concurrent appends never interleave.
   */
  append(path: string, text: string): Promise<void>;

  /**
   * Replace a file's content atomically.
   */
  write(path: string, content: string): Promise<void>;

  /**
   * Read, transform and write a file under an exclusive per-path lock.
   * Returns the content written.
   */
  readModifyWrite(
    path: string,
    fn: (current: string) => string | Promise<string>,
  ): Promise<string>;

  exists(path: string): Promise<boolean>;

  stat(path: string): Promise<{ isFile: boolean; isDirectory: boolean } | null>;

  list(path: string): Promise<WorkspaceEntry[]>;
}

/**
 * Long-term memory and append-only history.
 */
export interface IMemoryStore {
  readLongTerm(): Promise<string>;

  writeLongTerm(content: string): Promise<void>;

  /**
   * Update long-term memory without losing concurrent updates.
   */
  updateLongTerm(fn: (current: string) => string): Promise<string>;

  /**
   * Append one timestamped entry to the history log.
   */
  appendHistory(entry: string): Promise<void>;

  readHistory(): Promise<string>;

  /**
   * Get combined memory context for prompts.
   */
  getMemoryContext(): Promise<string>;
}
