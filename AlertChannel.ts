import type { AlertEmbed } from "./report.ts";
import { errorMessage } from "./util.ts";

export interface DeliveryResult {
	attempted: boolean;
	delivered: boolean;
	error?: string;
}

export abstract class AlertChannel {
	abstract readonly name: string;

	abstract send(embed: AlertEmbed): Promise<void>;

	abstract destroy(): void;

	/** Single delivery attempt. Failures land in the result and are never thrown. */
	async deliver(embed: AlertEmbed): Promise<DeliveryResult> {
		try {
			await this.send(embed);
			return { attempted: true, delivered: true };
		} catch (err) {
			return {
				attempted: true,
				delivered: false,
				error: errorMessage(err)
			};
		}
	}
}
