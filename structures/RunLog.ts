import fs from "node:fs";
import path from "node:path";
import { ANSI, type AnsiColor } from "../constants.ts";
import { errorMessage } from "../util.ts";

export type LineWriter = (line: string) => void;

/**
 * Writes each report line to stdout (colored) and appends it, uncolored, to
 * the log file. The file is opened and closed per line.
 */
export class RunLog {
	private fileFailed = false;

	constructor(
		readonly logFile: string | null,
		private readonly stdout: LineWriter = console.log,
		private readonly stderr: LineWriter = console.error
	) {}

	line(text: string, color?: AnsiColor) {
		this.stdout(color == undefined ? text : `${ANSI[color]}${text}${ANSI.reset}`);
		this.append(text);
	}

	blank() {
		this.line("");
	}

	private append(text: string) {
		if (this.logFile == null || this.fileFailed) return;
		try {
			fs.mkdirSync(path.dirname(this.logFile), { recursive: true });
			fs.appendFileSync(this.logFile, `${text}\n`);
		} catch (err) {
			// Keep reporting to stdout; only the first failure is surfaced
			this.fileFailed = true;
			this.stderr(
				`Could not write to log file ${this.logFile}: ${errorMessage(err)}`
			);
		}
	}
}
