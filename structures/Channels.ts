import type { AlertChannel } from "../AlertChannel.ts";
import Discord from "../channels/Discord.ts";
import type { MonitorConfig } from "../constants.ts";

export class Channels {
	alert: AlertChannel | null;

	constructor(config: Pick<MonitorConfig, "discordWebhookUrl" | "webhookTimeoutMs">) {
		this.alert =
			config.discordWebhookUrl == null
				? null
				: new Discord(config.discordWebhookUrl, { timeoutMs: config.webhookTimeoutMs });
	}

	destroy() {
		this.alert?.destroy();
	}
}
