/**
 * Lifecycle types
 */

/**
 * One node of a lifecycle: where each permitted action leads.
 */
export interface LifecycleState<TState extends string, TAction extends string> {
	on: Partial<Record<TAction, TState>>;
	final?: boolean;
	description?: string;
}

export interface LifecycleDefinition<
	TState extends string,
	TAction extends string,
> {
	initial: TState;
	actions: readonly TAction[];
	states: Record<TState, LifecycleState<TState, TAction>>;
}

/**
 * Base error of the SDK. `code` is a stable machine-readable name.
 */
export class LedgerError extends Error {
	constructor(
		message: string,
		public readonly code?: string,
		public readonly details?: unknown,
	) {
		super(message);
		this.name = "LedgerError";
	}
}
