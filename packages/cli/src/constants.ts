/** Default port for the dashboard server. */
export const DEFAULT_PORT = 3000;

/** Interval in milliseconds between SSE keepalive heartbeat comments. */
export const SSE_HEARTBEAT_INTERVAL_MS = 30_000;

/** Suggested reconnection delay in milliseconds sent to SSE clients. */
export const SSE_RETRY_MS = 5_000;

/** Rows in the terminal value chart. */
export const CHART_HEIGHT = 10;

/** Periods advanced by POST /api/step when the body names none. */
export const DEFAULT_STEP_PERIODS = 1;
