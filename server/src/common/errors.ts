/**
 * Normalizes a thrown value so it can be logged with a message and stack.
 */
export function toError(thrown: unknown): Error {
	if (thrown instanceof Error) return thrown;
	const message =
		typeof thrown === "string" ? thrown : `Non-error thrown: ${String(thrown)}`;
	return new Error(message, { cause: thrown });
}
