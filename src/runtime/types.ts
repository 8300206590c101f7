/**
 * Runtime abstraction layer types
 *
 * Commands reach the file system, environment, terminal and process
 * through these interfaces so that tests can substitute any part of them.
 */

// ===== File System Types =====

/**
 * File information returned by stat operations
 */
export interface FileInfo {
  isFile: boolean;
  isDirectory: boolean;
  isSymlink: boolean;
  size: number;
}

/**
 * Directory entry returned by readDir operations
 */
export interface DirEntry {
  name: string;
  isFile: boolean;
  isDirectory: boolean;
  isSymlink: boolean;
}

/**
 * Options for mkdir operations
 */
export interface MkdirOptions {
  recursive?: boolean;
}

/**
 * Runtime file system interface
 */
export interface RuntimeFS {
  /**
   * Read file contents as UTF-8 string
   */
  readTextFile(path: string): Promise<string>;

  /**
   * Create a directory
   */
  mkdir(path: string, options?: MkdirOptions): Promise<void>;

  /**
   * Get file/directory information, following symlinks
   */
  stat(path: string): Promise<FileInfo>;

  /**
   * Get file/directory information without following symlinks
   */
  lstat(path: string): Promise<FileInfo>;

  /**
   * Read directory entries
   */
  readDir(path: string): AsyncIterable<DirEntry>;

  /**
   * Read the target of a symbolic link
   */
  readLink(path: string): Promise<string>;

  /**
   * Create a symbolic link at `path` pointing to `target`
   */
  symlink(target: string, path: string): Promise<void>;

  /**
   * Remove a file, link or (recursively) a directory
   */
  remove(path: string): Promise<void>;

  /**
   * Check if a path exists
   */
  exists(path: string): Promise<boolean>;
}

// ===== Environment Types =====

/**
 * Runtime environment interface
 */
export interface RuntimeEnv {
  /**
   * Get an environment variable
   */
  get(key: string): string | undefined;
}

// ===== Process Control Types =====

/**
 * Runtime process control interface
 */
export interface RuntimeControl {
  /**
   * Exit the process with the given code
   */
  exit(code: number): never;

  /**
   * Get the current working directory
   */
  cwd(): string;

  /**
   * Command-line arguments (excluding runtime and script name)
   */
  readonly args: readonly string[];
}

// ===== I/O Types =====

/**
 * Standard input stream
 */
export interface StdinStream {
  /**
   * Read bytes into buffer, returns number of bytes read or null if EOF
   */
  read(buffer: Uint8Array): Promise<number | null>;

  /**
   * Check if stdin is a terminal (TTY)
   */
  isTerminal(): boolean;
}

/**
 * Writable output stream carrying the box display
 */
export interface OutputStream {
  /**
   * Write bytes synchronously, returns number of bytes written
   */
  writeSync(data: Uint8Array): number;

  /**
   * Check if the stream is a terminal (TTY)
   */
  isTerminal(): boolean;
}

/**
 * Runtime I/O interface
 */
export interface RuntimeIO {
  readonly stdin: StdinStream;
  readonly stdout: OutputStream;
}

// ===== Error Types =====

/**
 * Classification of platform file system errors
 */
export interface RuntimeErrors {
  /**
   * Check if error is NotFound
   */
  isNotFound(error: unknown): boolean;

  /**
   * Check if error is PermissionDenied
   */
  isPermissionDenied(error: unknown): boolean;

  /**
   * Check if error reports an exhausted device
   */
  isNoSpace(error: unknown): boolean;

  /**
   * Check if a path component that must be a directory is not one
   */
  isNotDirectory(error: unknown): boolean;
}

// ===== Signal Types =====

/**
 * Signal types for process signals
 */
export type Signal = "SIGINT" | "SIGTERM";

/**
 * Signal handler interface
 */
export interface RuntimeSignals {
  /**
   * Add a signal listener
   */
  addListener(signal: Signal, handler: () => void): void;

  /**
   * Remove a signal listener
   */
  removeListener(signal: Signal, handler: () => void): void;
}

// ===== Unified Runtime Interface =====

/**
 * Unified runtime interface providing access to file system,
 * environment, terminal I/O and process control.
 */
export interface Runtime {
  readonly fs: RuntimeFS;
  readonly env: RuntimeEnv;
  readonly control: RuntimeControl;
  readonly io: RuntimeIO;
  readonly errors: RuntimeErrors;
  readonly signals: RuntimeSignals;
}
