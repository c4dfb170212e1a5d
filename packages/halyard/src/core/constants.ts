// Agent loop
export const DEFAULT_MAX_CYCLES = 50;
export const DEFAULT_MAX_MALFORMED_RESPONSES = 2;

// Dispatcher
export const DEFAULT_TOOL_TIMEOUT_MS = 120_000;
export const DEFAULT_MAX_OUTPUT_CHARS = 30_000;

// Context manager
export const DEFAULT_CONTEXT_BUDGET = 100_000;
export const DEFAULT_PRESERVE_RECENT_TURNS = 5;
export const DEFAULT_TRIGGER_RATIO = 0.8;
export const CHARS_PER_TOKEN = 4;

// Built-in tools
export const DEFAULT_STREAM_CAP_CHARS = 16_000;
export const DEFAULT_GREP_MAX_RESULTS = 100;
export const GREP_HARD_MAX_RESULTS = 1_000;
export const DEFAULT_TREE_DEPTH = 3;
