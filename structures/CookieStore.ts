import fs from "node:fs";
import readline from "node:readline";

export interface CookieRecord {
	domain: string;
	flag: string;
	path: string;
	secure: string;
	expiry: number; // Unix seconds, 0 for session cookies
	name: string;
	value: string;
}

export type ParsedLine =
	| { kind: "record"; lineNumber: number; record: CookieRecord }
	| { kind: "skip"; lineNumber: number }
	| { kind: "malformed"; lineNumber: number; reason: string };

export class CookieStoreNotFoundError extends Error {
	constructor(public readonly filePath: string) {
		super(`Cookie file not found: ${filePath}`);
		this.name = "CookieStoreNotFoundError";
	}
}

export class CookieStoreEmptyError extends Error {
	constructor(public readonly filePath: string) {
		super(`Cookie file is empty: ${filePath}`);
		this.name = "CookieStoreEmptyError";
	}
}

const EXPIRY_PATTERN = /^-?\d+$/;

export function parseCookieLine(rawLine: string, lineNumber: number): ParsedLine {
	const line = rawLine.endsWith("\r") ? rawLine.slice(0, -1) : rawLine;
	if (line.trim() == "" || line.startsWith("#")) {
		return { kind: "skip", lineNumber };
	}
	const fields = line.split("\t");
	if (fields.length < 7) {
		return {
			kind: "malformed",
			lineNumber,
			reason: `expected 7 tab-separated fields, got ${fields.length}`
		};
	}
	const [domain, flag, cookiePath, secure, expiryField, name] = fields;
	if (
		domain == undefined ||
		flag == undefined ||
		cookiePath == undefined ||
		secure == undefined ||
		expiryField == undefined ||
		name == undefined
	) {
		throw new Error("Array doesn't work");
	}
	if (!EXPIRY_PATTERN.test(expiryField)) {
		return {
			kind: "malformed",
			lineNumber,
			reason: `expiry "${expiryField}" is not an integer`
		};
	}
	return {
		kind: "record",
		lineNumber,
		record: {
			domain,
			flag,
			path: cookiePath,
			secure,
			expiry: Number(expiryField),
			name,
			// The last field keeps any tabs the value itself contains
			value: fields.slice(6).join("\t")
		}
	};
}

export class CookieStore {
	private constructor(readonly filePath: string) {}

	static open(filePath: string): CookieStore {
		if (!fs.existsSync(filePath) || !fs.statSync(filePath).isFile()) {
			throw new CookieStoreNotFoundError(filePath);
		}
		if (fs.statSync(filePath).size == 0) {
			throw new CookieStoreEmptyError(filePath);
		}
		return new CookieStore(filePath);
	}

	async *entries(): AsyncGenerator<ParsedLine> {
		const lines = readline.createInterface({
			input: fs.createReadStream(this.filePath, { encoding: "utf8" }),
			crlfDelay: Number.POSITIVE_INFINITY
		});
		let lineNumber = 0;
		try {
			for await (const line of lines) {
				lineNumber++;
				yield parseCookieLine(line, lineNumber);
			}
		} finally {
			lines.close();
		}
	}
}
