import { COOKIE_VALID_MARKER } from "./constants.ts";
import { errorMessage } from "./util.ts";

export type ProbeResult =
	| { reachable: true; valid: boolean; status: number; body: string }
	| { reachable: false; valid: false; error: string };

export interface ProbeOptions {
	timeoutMs?: number | null;
	fetch?: typeof fetch;
}

export async function probeCookieService(
	url: string,
	options: ProbeOptions = {}
): Promise<ProbeResult> {
	const fetchImpl = options.fetch ?? fetch;
	try {
		const res = await fetchImpl(url, {
			signal: options.timeoutMs == null ? undefined : AbortSignal.timeout(options.timeoutMs)
		});
		const body = await res.text();
		// Only the body marker counts; the status code is reported but not judged
		return {
			reachable: true,
			valid: body.includes(COOKIE_VALID_MARKER),
			status: res.status,
			body
		};
	} catch (err) {
		return {
			reachable: false,
			valid: false,
			error: errorMessage(err)
		};
	}
}
