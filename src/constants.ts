export const NAME = "outbox-guard";
export const VERSION = "0.1.0";

export const APPROVAL_TIMEOUT_MS = 5 * 60 * 1000; // 5 minutes
// Must outlive APPROVAL_TIMEOUT_MS or the requester gives up before the daemon answers
export const IPC_DEADLINE_MS = APPROVAL_TIMEOUT_MS + 60 * 1000;
export const POLL_INTERVAL_MS = 1000;

export const PREVIEW_LIMIT = 200;

export const TOPIC_PREFIX = `${NAME}-`;
export const DEFAULT_NTFY_BASE_URL = "https://ntfy.sh";
export const DEFAULT_DASHBOARD_PORT = 8787;

export const CONFIG_FILE_NAME = "daemon.json";
export const SOCKET_FILE_NAME = "approval.sock";
