import os from "node:os";
import path from "node:path";

export type AlertPolicy = "always" | "attention";

export type MonitorConfig = {
	cookieFile: string;
	logFile: string | null;
	alertThresholdDays: number;
	discordWebhookUrl: string | null;
	alertPolicy: AlertPolicy;
	statusUrl: string | null;
	probeTimeoutMs: number | null;
	webhookTimeoutMs: number;
	serviceName: string;
	restartCommand: string | null;
	refreshDoc: string | null;
};

export enum ExitCode {
	OK = 0,
	WARNING = 1,
	CRITICAL = 2
}

export const SECONDS_PER_DAY = 86400;
export const DEFAULT_ALERT_THRESHOLD_DAYS = 7;
export const DEFAULT_WEBHOOK_TIMEOUT_MS = 15000;
export const DEFAULT_STATUS_URL = "http://localhost:6666/cookies/status";
export const DEFAULT_LOG_FILE = path.join(os.homedir(), "cookie-monitor.log");
export const DEFAULT_SERVICE_NAME = "Instagram";

export const COOKIE_VALID_MARKER = '"cookies_valid":true';

// Discord embed colors
export const COLOR_RED = 16711680;
export const COLOR_YELLOW = 16776960;
export const COLOR_GREEN = 65280;

export const ANSI = {
	red: "\x1b[0;31m",
	yellow: "\x1b[1;33m",
	green: "\x1b[0;32m",
	reset: "\x1b[0m"
} as const;

export type AnsiColor = Exclude<keyof typeof ANSI, "reset">;
