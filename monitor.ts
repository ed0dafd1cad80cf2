import type { AlertChannel, DeliveryResult } from "./AlertChannel.ts";
import { type CookieClassification, classifyCookie } from "./classifier.ts";
import { ExitCode, type MonitorConfig } from "./constants.ts";
import { type ProbeResult, probeCookieService } from "./probe.ts";
import {
	buildAlertEmbed,
	formatCookieLine,
	formatRecommendations,
	formatSummary,
	type RunSummary,
	shouldNotify,
	summarize
} from "./report.ts";
import {
	CookieStore,
	CookieStoreEmptyError,
	CookieStoreNotFoundError
} from "./structures/CookieStore.ts";
import type { RunLog } from "./structures/RunLog.ts";

const RULE = "================================================";

export interface MonitorDependencies {
	log: RunLog;
	alertChannel: AlertChannel | null;
	/** Epoch milliseconds */
	now?: () => number;
	fetch?: typeof fetch;
}

export interface ClassifiedCookie {
	name: string;
	domain: string;
	classification: CookieClassification;
}

export interface RunResult {
	exitCode: ExitCode;
	summary: RunSummary | null;
	cookies: ClassifiedCookie[];
	probe: ProbeResult | null;
	delivery: DeliveryResult;
}

const NOT_ATTEMPTED: Readonly<DeliveryResult> = { attempted: false, delivered: false };

export function exitCodeFor(summary: RunSummary): ExitCode {
	if (summary.expired > 0) return ExitCode.CRITICAL;
	if (summary.warning > 0) return ExitCode.WARNING;
	return ExitCode.OK;
}

export async function runHealthCheck(
	config: MonitorConfig,
	deps: MonitorDependencies
): Promise<RunResult> {
	const { log } = deps;
	const nowMs = (deps.now ?? Date.now)();
	const nowSeconds = Math.floor(nowMs / 1000);

	log.line(`🍪 ${config.serviceName} Cookie Health Check - ${new Date(nowMs).toString()}`);
	log.line(RULE);

	let store: CookieStore;
	try {
		store = CookieStore.open(config.cookieFile);
	} catch (err) {
		if (err instanceof CookieStoreNotFoundError || err instanceof CookieStoreEmptyError) {
			log.line(`❌ ${err.message}`, "red");
			return {
				exitCode: ExitCode.CRITICAL,
				summary: null,
				cookies: [],
				probe: null,
				delivery: { ...NOT_ATTEMPTED }
			};
		}
		throw err;
	}

	const cookies: ClassifiedCookie[] = [];
	let skipped = 0;
	for await (const entry of store.entries()) {
		if (entry.kind == "skip") continue;
		if (entry.kind == "malformed") {
			skipped++;
			continue;
		}
		const classification = classifyCookie(
			entry.record,
			nowSeconds,
			config.alertThresholdDays
		);
		cookies.push({
			name: entry.record.name,
			domain: entry.record.domain,
			classification
		});
		const line = formatCookieLine(entry.record.name, classification);
		log.line(line.text, line.color);
	}

	const summary = summarize(
		cookies.map((c) => c.classification),
		skipped
	);
	log.blank();
	for (const line of formatSummary(summary, config.alertThresholdDays)) {
		log.line(line);
	}

	let probe: ProbeResult | null = null;
	log.blank();
	log.line("🔍 Service Health Test:");
	if (config.statusUrl == null) {
		log.line("   Skipped: no status URL configured");
	} else {
		probe = await probeCookieService(config.statusUrl, {
			timeoutMs: config.probeTimeoutMs,
			fetch: deps.fetch
		});
		if (probe.valid) {
			log.line(`✅ ${config.serviceName} service: Cookies working`, "green");
		} else {
			log.line(`❌ ${config.serviceName} service: Cookies not working`, "red");
			log.line(`   Response: ${probe.reachable ? probe.body : probe.error}`);
		}
	}

	log.blank();
	let delivery: DeliveryResult = { ...NOT_ATTEMPTED };
	const channel = deps.alertChannel;
	if (channel != null && shouldNotify(summary, config.alertPolicy)) {
		delivery = await channel.deliver(
			buildAlertEmbed(
				summary,
				config.alertThresholdDays,
				config.serviceName,
				new Date(nowMs),
				config.refreshDoc
			)
		);
		if (!delivery.delivered) {
			log.line(`   ${channel.name} alert not delivered: ${delivery.error ?? "unknown error"}`);
		}
	}

	for (const line of formatRecommendations(
		summary,
		config.cookieFile,
		config.restartCommand,
		config.refreshDoc
	)) {
		log.line(line.text, line.color);
	}
	log.line(RULE);
	log.blank();

	return {
		exitCode: exitCodeFor(summary),
		summary,
		cookies,
		probe,
		delivery
	};
}
