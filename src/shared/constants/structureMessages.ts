export const STRUCTURE_MESSAGES = {
  ERRORS: {
    ENUMERATION_FAILED: (path: string, error: string) =>
      `Skipping unreadable directory ${path}: ${error}`,
    IGNORE_READ_FAILED: (path: string, error: string) =>
      `Could not load .gitignore patterns from ${path}: ${error}`,
    INVALID_MAX_DEPTH: (value: unknown) =>
      `maxDepth must be a non-negative integer or null, got ${String(value)}`,
    INVALID_TIMEOUT: (value: unknown) =>
      `enumerationTimeoutMs must be a positive number or null, got ${String(
        value
      )}`,
    ROOT_REQUIRED: "rootPath is required",
    UNKNOWN_PRESET: (value: string) => `Unknown exclusion preset: ${value}`,
    INVALID_SOURCE_URL: (url: string) =>
      `source.url must be a repository URL, got "${url}"`,
    TOKEN_REQUIRES_HTTPS: "Token-based clone requires an https:// URL.",
  },
  INFO: {
    ALREADY_CLONED: (path: string) => `Repository already cloned at: ${path}`,
    CLONING: (url: string, path: string) =>
      `Cloning repository from ${url} into ${path}`,
    IGNORE_LOADED: (count: number) =>
      `Loaded ${count} .gitignore rules from repository root`,
    STARTED: (path: string) => `🚀 Building structure for: ${path}`,
    COMPLETED: "🎉 Structure built successfully.",
    NO_IGNORE_FILE: "No .gitignore found at repository root",
  },
} as const;
