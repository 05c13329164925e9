/**
 * Shared default constants used across the codebase.
 *
 * Any value that appears in 2+ files belongs here.
 */

/** Maximum number of simultaneous (non-closed) sessions. */
export const DEFAULT_MAX_SESSIONS = 3;

/** Maximum number of open tabs per session. */
export const DEFAULT_MAX_TABS_PER_SESSION = 5;

/** Deadline for a single supervised browser operation. */
export const DEFAULT_OPERATION_TIMEOUT_MS = 30000;

/** Fixed pause after a corrective action (cleanup, session replacement) before retrying. */
export const DEFAULT_SETTLE_DELAY_MS = 2500;

/** Original attempt plus exactly one retry. */
export const MAX_RECOVERY_ATTEMPTS = 2;

/** How long a SIGTERM'd worker gets to exit before SIGKILL. */
export const DEFAULT_GRACE_PERIOD_MS = 5000;

/** How long to wait for SIGKILL'd workers to disappear. */
export const DEFAULT_KILL_WAIT_MS = 2000;

/** Liveness poll interval while waiting for signalled processes to exit. */
export const DEFAULT_EXIT_POLL_INTERVAL_MS = 100;

/** Timeout for a single `ps` / PowerShell enumeration. */
export const DEFAULT_SCAN_TIMEOUT_MS = 10000;

/** Per-item timeout in request queue (ms). Safety net against indefinitely hung bookkeeping. */
export const DEFAULT_QUEUE_ITEM_TIMEOUT_MS = 120000;

/** Stale threshold for the cross-process cleanup lock (ms). */
export const DEFAULT_CLEANUP_LOCK_STALE_MS = 60000;

/** Retries (100ms → 1s backoff) before a held cleanup lock is a LockConflict. */
export const DEFAULT_CLEANUP_LOCK_RETRIES = 30;

/** Explicit timeout for puppeteer.connect() WebSocket handshake (ms). */
export const DEFAULT_PUPPETEER_CONNECT_TIMEOUT_MS = 15000;

/** CDP protocol timeout in milliseconds. Prevents 180s default hangs. */
export const DEFAULT_PROTOCOL_TIMEOUT_MS = 30000;

/** Number of finished recovery attempts kept for inspection. */
export const MAX_RECOVERY_HISTORY = 50;

/** Command-line token identifying the automation-control server. Never a cleanup target. */
export const DEFAULT_SUPERVISOR_MARKERS: readonly string[] = ['mcp-server-playwright'];

/** Command-line token naming the browser worker profile directory. */
export const DEFAULT_WORKER_MARKERS: readonly string[] = ['mcp-chrome-profile'];

/**
 * Executable names a worker must carry. Empty disables the filter.
 * Matched case-insensitively as a substring of the executable basename
 * ("chrome" covers chrome.exe, google-chrome and Google Chrome Helper).
 */
export const DEFAULT_WORKER_EXECUTABLES: readonly string[] = ['chrome'];

/** Chrome remote debugging port used by the puppeteer backend. */
export const DEFAULT_DEBUG_PORT = 9222;
