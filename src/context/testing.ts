/**
 * Testing utilities for AppContext
 *
 * Mock factories for testing components that depend on AppContext
 * without touching the real process, terminal or file system.
 */

import type { AppContext } from "./index.ts";
import type {
  OutputStream,
  Runtime,
  RuntimeControl,
  RuntimeEnv,
  RuntimeErrors,
  RuntimeFS,
  RuntimeIO,
  RuntimeSignals,
} from "../runtime/types.ts";
import type { DecopyConfig } from "../types/config.ts";

/**
 * Options for creating a mock runtime
 */
export interface MockRuntimeOptions {
  fs?: Partial<RuntimeFS>;
  env?: Partial<RuntimeEnv>;
  control?: Partial<RuntimeControl>;
  io?: Partial<RuntimeIO>;
  errors?: Partial<RuntimeErrors>;
  signals?: Partial<RuntimeSignals>;
}

/**
 * Create a mock RuntimeFS
 */
function createMockFS(overrides: Partial<RuntimeFS> = {}): RuntimeFS {
  return {
    readTextFile: () => Promise.resolve(""),
    mkdir: () => Promise.resolve(),
    stat: () =>
      Promise.resolve({
        isFile: true,
        isDirectory: false,
        isSymlink: false,
        size: 0,
      }),
    lstat: () =>
      Promise.resolve({
        isFile: true,
        isDirectory: false,
        isSymlink: false,
        size: 0,
      }),
    readDir: async function* () {},
    readLink: () => Promise.resolve(""),
    symlink: () => Promise.resolve(),
    remove: () => Promise.resolve(),
    exists: () => Promise.resolve(false),
    ...overrides,
  };
}

/**
 * Create a mock RuntimeEnv backed by a plain record
 */
function createMockEnv(overrides: Partial<RuntimeEnv> = {}): RuntimeEnv {
  return {
    get: () => undefined,
    ...overrides,
  };
}

/**
 * Create a mock RuntimeControl
 */
function createMockControl(overrides: Partial<RuntimeControl> = {}): RuntimeControl {
  return {
    exit: (code: number): never => {
      throw new Error(`exit called with ${code}`);
    },
    cwd: () => "/mock/cwd",
    args: [],
    ...overrides,
  };
}

/**
 * Output stream that records everything written to it
 */
export interface CapturedStream extends OutputStream {
  /** Everything written so far, decoded as UTF-8 */
  text(): string;
}

/**
 * Create an output stream that keeps written bytes in memory
 */
export function createCapturedStream(isTerminal = false): CapturedStream {
  const decoder = new TextDecoder();
  let written = "";
  return {
    writeSync(data: Uint8Array): number {
      written += decoder.decode(data);
      return data.length;
    },
    isTerminal: () => isTerminal,
    text: () => written,
  };
}

/**
 * Create a mock RuntimeIO
 */
function createMockIO(overrides: Partial<RuntimeIO> = {}): RuntimeIO {
  return {
    stdin: {
      read: () => Promise.resolve(null),
      isTerminal: () => false,
    },
    stdout: {
      writeSync: (data) => data.length,
      isTerminal: () => false,
    },
    ...overrides,
  };
}

/**
 * Create a mock RuntimeErrors that classifies by Node.js error codes
 */
function createMockErrors(overrides: Partial<RuntimeErrors> = {}): RuntimeErrors {
  const codeOf = (error: unknown): string | undefined =>
    error instanceof Error && "code" in error ? String(error.code) : undefined;

  return {
    isNotFound: (error) => codeOf(error) === "ENOENT",
    isPermissionDenied: (error) => codeOf(error) === "EACCES",
    isNoSpace: (error) => codeOf(error) === "ENOSPC",
    isNotDirectory: (error) => codeOf(error) === "ENOTDIR",
    ...overrides,
  };
}

/**
 * Create a mock RuntimeSignals
 */
function createMockSignals(overrides: Partial<RuntimeSignals> = {}): RuntimeSignals {
  return {
    addListener: () => {},
    removeListener: () => {},
    ...overrides,
  };
}

/**
 * Create a mock Runtime for testing
 */
export function createMockRuntime(options: MockRuntimeOptions = {}): Runtime {
  return {
    fs: createMockFS(options.fs),
    env: createMockEnv(options.env),
    control: createMockControl(options.control),
    io: createMockIO(options.io),
    errors: createMockErrors(options.errors),
    signals: createMockSignals(options.signals),
  };
}

/**
 * Options for creating a mock AppContext
 */
export interface MockAppContextOptions extends MockRuntimeOptions {
  config?: DecopyConfig;
}

/**
 * Create a mock AppContext for testing
 */
export function createMockContext(options: MockAppContextOptions = {}): AppContext {
  const { config, ...runtimeOptions } = options;
  return {
    runtime: createMockRuntime(runtimeOptions),
    config,
  };
}

