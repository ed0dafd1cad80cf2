import { WebhookClient } from "discord.js";
import { AlertChannel } from "../AlertChannel.ts";
import type { AlertEmbed } from "../report.ts";

export interface DiscordOptions {
	timeoutMs: number;
	/** Base of the Discord REST API, e.g. `https://discord.com/api` */
	api?: string;
}

export default class Discord extends AlertChannel {
	override readonly name = "Discord";
	private webhook: WebhookClient;

	constructor(url: string, options: DiscordOptions) {
		super();
		this.webhook = new WebhookClient(
			{ url },
			{
				rest: {
					globalRequestsPerSecond: 1,
					timeout: options.timeoutMs,
					// One attempt per run, including on 5xx and timeouts
					retries: 0,
					...(options.api == undefined ? {} : { api: options.api })
				}
			}
		);
	}

	override async send(embed: AlertEmbed): Promise<void> {
		// The created message is not needed
		await this.webhook.send({ embeds: [embed] });
	}

	override destroy(): void {
		this.webhook.destroy();
	}
}
