export function isNumeric(
	value: string,
	options: { allowNegative: boolean; allowDecimal: boolean }
): boolean {
	const sign = options.allowNegative ? "-?" : "";
	const fraction = options.allowDecimal ? "(\\.\\d+)?" : "";
	return new RegExp(`^${sign}\\d+${fraction}$`).test(value);
}

export function errorMessage(err: unknown): string {
	return err instanceof Error ? err.message : String(err);
}

/** Empty and whitespace-only values count as unset. */
export function optionalString(value: string | undefined): string | null {
	if (value == undefined) return null;
	const trimmed = value.trim();
	return trimmed == "" ? null : trimmed;
}
