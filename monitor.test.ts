import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { AlertChannel } from "./AlertChannel.ts";
import { formatExpiryDate } from "./classifier.ts";
import { COLOR_GREEN, COLOR_RED, ExitCode, type MonitorConfig } from "./constants.ts";
import { exitCodeFor, runHealthCheck } from "./monitor.ts";
import type { AlertEmbed } from "./report.ts";
import { RunLog } from "./structures/RunLog.ts";

const NOW_MS = 1_700_000_000_000;
const NOW = NOW_MS / 1000;
const DAY = 86400;
const STATUS_URL = "http://localhost:6666/cookies/status";

class FakeChannel extends AlertChannel {
	override readonly name = "Fake";
	sent: AlertEmbed[] = [];

	constructor(private readonly failWith: string | null = null) {
		super();
	}

	override async send(embed: AlertEmbed): Promise<void> {
		if (this.failWith != null) throw new Error(this.failWith);
		this.sent.push(embed);
	}

	override destroy(): void {}
}

function cookieLine(name: string, expiry: number) {
	return `.example.com\tTRUE\t/\tTRUE\t${expiry}\t${name}\ttest-value`;
}

const stripAnsi = (line: string) => line.replace(/\x1b\[[0-9;]*m/g, "");

let dir: string;
let cookieFile: string;
let output: string[];

function writeStore(lines: string[]) {
	fs.writeFileSync(cookieFile, ["# Netscape HTTP Cookie File", ...lines].join("\n"));
}

function makeConfig(overrides: Partial<MonitorConfig> = {}): MonitorConfig {
	return {
		cookieFile,
		logFile: null,
		alertThresholdDays: 7,
		discordWebhookUrl: null,
		alertPolicy: "always",
		statusUrl: STATUS_URL,
		probeTimeoutMs: null,
		webhookTimeoutMs: 1000,
		serviceName: "Instagram",
		restartCommand: null,
		refreshDoc: null,
		...overrides
	};
}

function okFetch(body = '{"cookies_valid":true}') {
	return vi.fn<typeof fetch>(async () => new Response(body));
}

function deps(channel: AlertChannel | null, fetchImpl = okFetch()) {
	return {
		log: new RunLog(null, (line: string) => output.push(stripAnsi(line))),
		alertChannel: channel,
		now: () => NOW_MS,
		fetch: fetchImpl
	};
}

beforeEach(() => {
	dir = fs.mkdtempSync(path.join(os.tmpdir(), "cookie-monitor-"));
	cookieFile = path.join(dir, "cookies.txt");
	output = [];
});

afterEach(() => {
	fs.rmSync(dir, { recursive: true, force: true });
});

describe("exitCodeFor", () => {
	it("reduces a summary to OK, WARNING or CRITICAL", () => {
		expect(exitCodeFor({ healthy: 3, warning: 0, expired: 0, skipped: 4 })).toBe(ExitCode.OK);
		expect(exitCodeFor({ healthy: 3, warning: 2, expired: 0, skipped: 0 })).toBe(ExitCode.WARNING);
		expect(exitCodeFor({ healthy: 0, warning: 2, expired: 1, skipped: 0 })).toBe(ExitCode.CRITICAL);
	});
});

describe("runHealthCheck", () => {
	it("classifies a mixed store and exits critical", async () => {
		writeStore([
			cookieLine("sessionid", 0),
			cookieLine("csrftoken", NOW + 3 * DAY),
			cookieLine("rur", NOW - 10 * DAY)
		]);
		const channel = new FakeChannel();
		const result = await runHealthCheck(makeConfig(), deps(channel));

		expect(result.exitCode).toBe(ExitCode.CRITICAL);
		expect(result.summary).toEqual({ healthy: 1, warning: 1, expired: 1, skipped: 0 });
		expect(output).toContain("✅ sessionid: Session cookie");
		expect(output).toContain(
			`⚠️  csrftoken: Expires in 3 days (${formatExpiryDate(NOW + 3 * DAY)})`
		);
		expect(output).toContain(`❌ rur: EXPIRED 10 days ago (${formatExpiryDate(NOW - 10 * DAY)})`);
		expect(output).toContain("🔄 RECOMMENDATION: Refresh cookies soon");
		expect(channel.sent).toHaveLength(1);
		expect(channel.sent[0]?.color).toBe(COLOR_RED);
		expect(result.delivery).toEqual({ attempted: true, delivered: true });
	});

	it("prints the header, summary and footer in order", async () => {
		writeStore([cookieLine("sessionid", 0)]);
		await runHealthCheck(makeConfig(), deps(null));

		expect(output[0]).toBe(`🍪 Instagram Cookie Health Check - ${new Date(NOW_MS).toString()}`);
		expect(output[1]).toBe("================================================");
		const summaryAt = output.indexOf("📊 Summary:");
		expect(output.slice(summaryAt, summaryAt + 4)).toEqual([
			"📊 Summary:",
			"   ✅ Good: 1 cookies",
			"   ⚠️  Warning: 0 cookies (< 7 days)",
			"   ❌ Expired: 0 cookies"
		]);
		expect(output.slice(-3)).toEqual([
			"✅ All cookies healthy - no action needed",
			"================================================",
			""
		]);
	});

	it("exits critical without a summary when the store is missing", async () => {
		const channel = new FakeChannel();
		const fetchImpl = okFetch();
		const result = await runHealthCheck(makeConfig(), deps(channel, fetchImpl));

		expect(result).toEqual({
			exitCode: ExitCode.CRITICAL,
			summary: null,
			cookies: [],
			probe: null,
			delivery: { attempted: false, delivered: false }
		});
		expect(output).toContain(`❌ Cookie file not found: ${cookieFile}`);
		expect(output).not.toContain("📊 Summary:");
		expect(channel.sent).toHaveLength(0);
		expect(fetchImpl).not.toHaveBeenCalled();
	});

	it("treats an empty store as critical", async () => {
		fs.writeFileSync(cookieFile, "");
		const result = await runHealthCheck(makeConfig(), deps(null));
		expect(result.exitCode).toBe(ExitCode.CRITICAL);
		expect(output).toContain(`❌ Cookie file is empty: ${cookieFile}`);
	});

	it("exits OK for long-lived cookies and still alerts under the always policy", async () => {
		writeStore([
			cookieLine("a", NOW + 30 * DAY),
			cookieLine("b", NOW + 90 * DAY),
			cookieLine("c", NOW + 365 * DAY)
		]);
		const channel = new FakeChannel();
		const result = await runHealthCheck(makeConfig(), deps(channel));

		expect(result.exitCode).toBe(ExitCode.OK);
		expect(result.summary).toEqual({ healthy: 3, warning: 0, expired: 0, skipped: 0 });
		expect(channel.sent).toHaveLength(1);
		expect(channel.sent[0]?.color).toBe(COLOR_GREEN);
	});

	it("stays quiet on a healthy run under the attention policy", async () => {
		writeStore([cookieLine("a", NOW + 30 * DAY)]);
		const channel = new FakeChannel();
		const result = await runHealthCheck(makeConfig({ alertPolicy: "attention" }), deps(channel));

		expect(channel.sent).toHaveLength(0);
		expect(result.delivery).toEqual({ attempted: false, delivered: false });
	});

	it("alerts on a warning under the attention policy", async () => {
		writeStore([cookieLine("a", NOW + 2 * DAY)]);
		const channel = new FakeChannel();
		const result = await runHealthCheck(makeConfig({ alertPolicy: "attention" }), deps(channel));

		expect(result.exitCode).toBe(ExitCode.WARNING);
		expect(channel.sent).toHaveLength(1);
	});

	it("adds the refresh doc to the alert and the recommendations", async () => {
		writeStore([cookieLine("a", NOW + 2 * DAY)]);
		const channel = new FakeChannel();
		await runHealthCheck(makeConfig({ refreshDoc: "docs/cookie-refresh.md" }), deps(channel));

		expect(channel.sent[0]?.description.endsWith("\nSee: `docs/cookie-refresh.md`")).toBe(true);
		expect(output).toContain("   See: docs/cookie-refresh.md");
	});

	it("reports a failed delivery without changing the exit code", async () => {
		writeStore([cookieLine("a", NOW + 2 * DAY)]);
		const result = await runHealthCheck(
			makeConfig(),
			deps(new FakeChannel("connect ECONNREFUSED"))
		);

		expect(result.exitCode).toBe(ExitCode.WARNING);
		expect(result.delivery).toEqual({
			attempted: true,
			delivered: false,
			error: "connect ECONNREFUSED"
		});
		expect(output).toContain("   Fake alert not delivered: connect ECONNREFUSED");
	});

	it("counts malformed lines as skipped", async () => {
		writeStore([cookieLine("a", NOW + 30 * DAY), "not a cookie", cookieLine("b", 0).replace("\t0\t", "\tnever\t")]);
		const result = await runHealthCheck(makeConfig(), deps(null));

		expect(result.summary).toEqual({ healthy: 1, warning: 0, expired: 0, skipped: 2 });
		expect(output).toContain("   ⏭️  Skipped: 2 malformed lines");
		expect(result.exitCode).toBe(ExitCode.OK);
	});

	it("reports the liveness probe without affecting the exit code", async () => {
		writeStore([cookieLine("a", NOW + 30 * DAY)]);
		const fetchImpl = okFetch('{"cookies_valid":false}');
		const result = await runHealthCheck(makeConfig(), deps(null, fetchImpl));

		expect(fetchImpl).toHaveBeenCalledWith(STATUS_URL, { signal: undefined });
		expect(result.probe).toMatchObject({ reachable: true, valid: false });
		expect(output).toContain("❌ Instagram service: Cookies not working");
		expect(output).toContain('   Response: {"cookies_valid":false}');
		expect(result.exitCode).toBe(ExitCode.OK);
	});

	it("reports a working service", async () => {
		writeStore([cookieLine("a", NOW + 30 * DAY)]);
		await runHealthCheck(makeConfig(), deps(null));
		expect(output).toContain("✅ Instagram service: Cookies working");
	});

	it("skips the probe without a status URL", async () => {
		writeStore([cookieLine("a", NOW + 30 * DAY)]);
		const fetchImpl = okFetch();
		const result = await runHealthCheck(makeConfig({ statusUrl: null }), deps(null, fetchImpl));

		expect(fetchImpl).not.toHaveBeenCalled();
		expect(result.probe).toBeNull();
		expect(output).toContain("   Skipped: no status URL configured");
	});

	it("appends the uncolored report to the log file", async () => {
		const logFile = path.join(dir, "cookie-monitor.log");
		writeStore([cookieLine("rur", NOW - 10 * DAY)]);
		await runHealthCheck(makeConfig({ logFile }), {
			...deps(null),
			log: new RunLog(logFile, () => {})
		});

		const lines = fs.readFileSync(logFile, "utf8").split("\n");
		expect(lines[0]).toBe(`🍪 Instagram Cookie Health Check - ${new Date(NOW_MS).toString()}`);
		expect(lines).toContain(`❌ rur: EXPIRED 10 days ago (${formatExpiryDate(NOW - 10 * DAY)})`);
	});

	it("gives identical results for an unchanged store and clock", async () => {
		writeStore([
			cookieLine("sessionid", 0),
			cookieLine("csrftoken", NOW + 3 * DAY),
			cookieLine("rur", NOW - 10 * DAY)
		]);
		const first = await runHealthCheck(makeConfig(), deps(null));
		const firstOutput = output;
		output = [];
		const second = await runHealthCheck(makeConfig(), deps(null));

		expect(second.cookies).toEqual(first.cookies);
		expect(second.exitCode).toBe(first.exitCode);
		expect(output).toEqual(firstOutput);
	});
});
