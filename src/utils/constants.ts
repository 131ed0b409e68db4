/**
 * Application-wide constants
 */

// Rebalancing
export const DEFAULT_CONNECTIONS = 4; // Segments (and connections) per download
export const DEFAULT_SPLIT_THRESHOLD_BYTES = 4096 * 2; // Below this, splitting is not worth a new request

// Progress reporting
export const DEFAULT_PROGRESS_INTERVAL_MS = 3000; // First sample after one interval
export const BYTES_PER_KB = 1024;

// CLI display constants
export const GID_LENGTH = 6; // Number of hex characters in GID (excluding # prefix)
export const GID_PREFIX = "#"; // GID prefix character

// File system constants
export const STAGING_FILE_EXTENSION = ".part"; // Suffix of the in-progress file
export const FALLBACK_FILENAME = "download";

// Network constants
export const DEFAULT_TIMEOUT_MS = 30000; // Default network timeout (30s)
export const DEFAULT_CONNECT_TIMEOUT_MS = 10000;
export const DEFAULT_RETRIES = 3; // Consecutive empty attempts before a segment gives up
export const DEFAULT_RETRY_DELAY_MS = 1000;

// Logging
export const LOG_LEVEL_TOKEN_WIDTH = "[PROGRESS]".length; // Width of log level tokens
