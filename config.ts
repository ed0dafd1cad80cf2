import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import { parseWebhookURL } from "discord.js";
import { parse as parseEnv } from "dotenv";
import {
	type AlertPolicy,
	DEFAULT_ALERT_THRESHOLD_DAYS,
	DEFAULT_LOG_FILE,
	DEFAULT_SERVICE_NAME,
	DEFAULT_STATUS_URL,
	DEFAULT_WEBHOOK_TIMEOUT_MS,
	type MonitorConfig
} from "./constants.ts";
import { isNumeric, optionalString } from "./util.ts";

const ALERT_POLICIES: readonly AlertPolicy[] = ["always", "attention"];

export interface LoadConfigOptions {
	/** Directory the default config, cookie and data paths are resolved from */
	baseDir: string;
	env?: Record<string, string | undefined>;
	/** Overrides MONITOR_CONFIG and the default `monitor.config` */
	configPath?: string;
}

function positiveInteger(values: Record<string, string | undefined>, key: string): number | null {
	const raw = optionalString(values[key]);
	if (raw == null) return null;
	if (!isNumeric(raw, { allowNegative: false, allowDecimal: false }) || Number(raw) < 1) {
		throw new Error(`${key} must be a positive integer, got "${raw}"`);
	}
	return Number(raw);
}

function urlSetting(values: Record<string, string | undefined>, key: string): string | null {
	const raw = optionalString(values[key]);
	if (raw == null) return null;
	if (!URL.canParse(raw)) {
		throw new Error(`${key} is not a valid URL: "${raw}"`);
	}
	return raw;
}

function discordWebhookSetting(values: Record<string, string | undefined>): string | null {
	const raw = optionalString(values.DISCORD_WEBHOOK_URL);
	if (raw == null) return null;
	// WebhookClient rejects anything outside this pattern when it is constructed
	if (parseWebhookURL(raw) == null) {
		throw new Error(`DISCORD_WEBHOOK_URL is not a valid Discord webhook URL: "${raw}"`);
	}
	return raw;
}

function expandHome(filePath: string): string {
	return filePath == "~" || filePath.startsWith("~/")
		? path.join(os.homedir(), filePath.slice(1))
		: filePath;
}

/**
 * Reads a KEY=VALUE config file without touching process.env. File values
 * take precedence over `env`, the way a sourced shell config would.
 */
export function readConfigFile(configPath: string): Record<string, string> {
	if (!fs.existsSync(configPath)) return {};
	return parseEnv(fs.readFileSync(configPath, "utf8"));
}

export function loadConfig(options: LoadConfigOptions): MonitorConfig {
	const env = options.env ?? process.env;
	const configPath =
		options.configPath ??
		optionalString(env.MONITOR_CONFIG) ??
		path.join(options.baseDir, "monitor.config");
	const values: Record<string, string | undefined> = {
		...env,
		...readConfigFile(configPath)
	};

	const policy = optionalString(values.ALERT_POLICY) ?? "always";
	const alertPolicy = ALERT_POLICIES.find((p) => p == policy);
	if (alertPolicy == undefined) {
		throw new Error(
			`ALERT_POLICY must be one of ${ALERT_POLICIES.join(", ")}, got "${policy}"`
		);
	}

	// An explicitly empty LOG_FILE or STATUS_URL switches that output off
	const logFileSetting =
		values.LOG_FILE == undefined ? DEFAULT_LOG_FILE : optionalString(values.LOG_FILE);
	const statusUrl =
		values.STATUS_URL == undefined ? DEFAULT_STATUS_URL : urlSetting(values, "STATUS_URL");

	const cookieFile =
		optionalString(values.COOKIE_FILE) ?? path.join("data", "cookies.txt");

	return {
		cookieFile: path.resolve(options.baseDir, expandHome(cookieFile)),
		logFile: logFileSetting == null ? null : path.resolve(options.baseDir, expandHome(logFileSetting)),
		alertThresholdDays:
			positiveInteger(values, "ALERT_THRESHOLD_DAYS") ?? DEFAULT_ALERT_THRESHOLD_DAYS,
		discordWebhookUrl: discordWebhookSetting(values),
		alertPolicy,
		statusUrl,
		probeTimeoutMs: positiveInteger(values, "PROBE_TIMEOUT_MS"),
		webhookTimeoutMs:
			positiveInteger(values, "WEBHOOK_TIMEOUT_MS") ?? DEFAULT_WEBHOOK_TIMEOUT_MS,
		serviceName: optionalString(values.SERVICE_NAME) ?? DEFAULT_SERVICE_NAME,
		restartCommand: optionalString(values.RESTART_COMMAND),
		refreshDoc: optionalString(values.REFRESH_DOC)
	};
}
