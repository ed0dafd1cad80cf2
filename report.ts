import type { CookieClassification } from "./classifier.ts";
import {
	type AlertPolicy,
	type AnsiColor,
	COLOR_GREEN,
	COLOR_RED,
	COLOR_YELLOW
} from "./constants.ts";

export interface RunSummary {
	healthy: number;
	warning: number;
	expired: number;
	skipped: number; // Malformed lines, not counted in any category
}

export interface AlertEmbed {
	title: string;
	description: string;
	color: number;
	timestamp: string;
}

export interface ReportLine {
	text: string;
	color?: AnsiColor;
}

export function summarize(
	classifications: Iterable<CookieClassification>,
	skipped = 0
): RunSummary {
	const summary: RunSummary = { healthy: 0, warning: 0, expired: 0, skipped };
	for (const classification of classifications) {
		summary[classification.status]++;
	}
	return summary;
}

export function needsAttention(summary: RunSummary): boolean {
	return summary.warning > 0 || summary.expired > 0;
}

export function shouldNotify(summary: RunSummary, policy: AlertPolicy): boolean {
	return policy == "always" || needsAttention(summary);
}

export function formatCookieLine(
	name: string,
	classification: CookieClassification
): ReportLine {
	const { status, daysLeft, expiresAt } = classification;
	if (classification.session || daysLeft == null) {
		return { text: `✅ ${name}: Session cookie`, color: "green" };
	}
	switch (status) {
		case "expired":
			return {
				text: `❌ ${name}: EXPIRED ${Math.abs(daysLeft)} days ago (${expiresAt})`,
				color: "red"
			};
		case "warning":
			return {
				text: `⚠️  ${name}: Expires in ${daysLeft} days (${expiresAt})`,
				color: "yellow"
			};
		case "healthy":
			return {
				text: `✅ ${name}: ${daysLeft} days remaining (${expiresAt})`,
				color: "green"
			};
	}
}

export function formatSummary(summary: RunSummary, thresholdDays: number): string[] {
	const lines = [
		"📊 Summary:",
		`   ✅ Good: ${summary.healthy} cookies`,
		`   ⚠️  Warning: ${summary.warning} cookies (< ${thresholdDays} days)`,
		`   ❌ Expired: ${summary.expired} cookies`
	];
	if (summary.skipped > 0) {
		lines.push(`   ⏭️  Skipped: ${summary.skipped} malformed lines`);
	}
	return lines;
}

export function formatRecommendations(
	summary: RunSummary,
	cookieFile: string,
	restartCommand: string | null,
	refreshDoc: string | null = null
): ReportLine[] {
	if (!needsAttention(summary)) {
		return [{ text: "✅ All cookies healthy - no action needed", color: "green" }];
	}
	const lines: ReportLine[] = [
		{ text: "🔄 RECOMMENDATION: Refresh cookies soon", color: "yellow" },
		{ text: "   1. Log in to the site in a browser" },
		{ text: "   2. Export the session with a cookies.txt exporter extension" },
		{ text: `   3. Replace ${cookieFile}` },
		{
			text:
				restartCommand == null
					? "   4. Restart the downloader service"
					: `   4. Restart the downloader service: ${restartCommand}`
		}
	];
	if (refreshDoc != null) {
		lines.push({ text: `   See: ${refreshDoc}` });
	}
	return lines;
}

export function buildAlertEmbed(
	summary: RunSummary,
	thresholdDays: number,
	serviceName: string,
	now: Date,
	refreshDoc: string | null = null
): AlertEmbed {
	let emoji = "✅";
	let color = COLOR_GREEN;
	if (summary.expired > 0) {
		emoji = "❌";
		color = COLOR_RED;
	} else if (summary.warning > 0) {
		emoji = "⚠️";
		color = COLOR_YELLOW;
	}
	const lines = [
		`${emoji} **${serviceName} Cookie Alert**`,
		"",
		`✅ Good: ${summary.healthy} cookies`,
		`⚠️  Warning: ${summary.warning} cookies (< ${thresholdDays} days)`,
		`❌ Expired: ${summary.expired} cookies`,
		"",
		needsAttention(summary)
			? "**Action Required:** Refresh cookies soon"
			: "No action needed"
	];
	if (refreshDoc != null) {
		lines.push(`See: \`${refreshDoc}\``);
	}
	return {
		title: "🍪 Cookie Health Alert",
		description: lines.join("\n"),
		color,
		timestamp: now.toISOString()
	};
}
