import { SECONDS_PER_DAY } from "./constants.ts";
import type { CookieRecord } from "./structures/CookieStore.ts";

export type CookieStatus = "healthy" | "warning" | "expired";

export interface CookieClassification {
	status: CookieStatus;
	session: boolean;
	daysLeft: number | null; // Negative once expired, null for session cookies
	expiresAt: string;
}

function pad(n: number) {
	return String(n).padStart(2, "0");
}

/**
 * Local `YYYY-MM-DD HH:MM` for a Unix timestamp, or `N/A` when the instant
 * is outside the range a Date can hold.
 */
export function formatExpiryDate(expirySeconds: number): string {
	const date = new Date(expirySeconds * 1000);
	if (Number.isNaN(date.getTime())) {
		return "N/A";
	}
	return `${date.getFullYear()}-${pad(date.getMonth() + 1)}-${pad(date.getDate())} ${pad(date.getHours())}:${pad(date.getMinutes())}`;
}

export function classifyCookie(
	record: Pick<CookieRecord, "expiry">,
	nowSeconds: number,
	thresholdDays: number
): CookieClassification {
	if (record.expiry == 0) {
		return { status: "healthy", session: true, daysLeft: null, expiresAt: "N/A" };
	}
	// Truncates toward zero, so anything within the last day still counts as 0
	const daysLeft = Math.trunc((record.expiry - nowSeconds) / SECONDS_PER_DAY) || 0;
	let status: CookieStatus;
	if (daysLeft < 0) {
		status = "expired";
	} else if (daysLeft < thresholdDays) {
		status = "warning";
	} else {
		status = "healthy";
	}
	return {
		status,
		session: false,
		daysLeft,
		expiresAt: formatExpiryDate(record.expiry)
	};
}
