import path from "node:path";
import { fileURLToPath } from "node:url";
import { inspect } from "node:util";
import { loadConfig } from "./config.ts";
import { ExitCode } from "./constants.ts";
import { runHealthCheck } from "./monitor.ts";
import { Channels } from "./structures/Channels.ts";
import { RunLog } from "./structures/RunLog.ts";

const __dirname = path.dirname(fileURLToPath(import.meta.url));

function logUncaughtException(err: unknown) {
	console.error("UNCAUGHT (Cookie Health Monitor)");
	console.error(inspect(err));
	process.exitCode = ExitCode.CRITICAL;
}

process.on("uncaughtException", logUncaughtException);
process.on("unhandledRejection", logUncaughtException);

async function main() {
	const config = loadConfig({ baseDir: __dirname });
	const channels = new Channels(config);
	try {
		const result = await runHealthCheck(config, {
			log: new RunLog(config.logFile),
			alertChannel: channels.alert
		});
		process.exitCode = result.exitCode;
	} finally {
		channels.destroy();
	}
}

main().catch(logUncaughtException);
