import type { LifecycleDefinition, LifecycleState } from "./types.js";
import { LedgerError } from "./types.js";

/**
 * Immutable transition table over string states.
 *
 * A lifecycle holds no current state: callers pass the state they loaded
 * and get back the state an action leads to, so one instance serves every
 * record.
 *
 * @example
 * ```typescript
 * const door = new Lifecycle<"open" | "shut", "close">({
 *   initial: "open",
 *   actions: ["close"],
 *   states: {
 *     open: { on: { close: "shut" } },
 *     shut: { on: {}, final: true },
 *   },
 * });
 * door.next("open", "close"); // "shut"
 * ```
 */
export class Lifecycle<TState extends string, TAction extends string> {
	readonly initial: TState;
	readonly actions: readonly TAction[];
	private readonly states: Map<string, LifecycleState<TState, TAction>>;

	constructor(definition: LifecycleDefinition<TState, TAction>) {
		this.initial = definition.initial;
		this.actions = definition.actions;
		this.states = new Map(Object.entries(definition.states));

		if (!this.states.has(this.initial)) {
			throw new LedgerError(
				`Unknown initial state: ${this.initial}`,
				"UNKNOWN_STATE",
				{ state: this.initial },
			);
		}
		for (const [name, state] of this.states) {
			const names = Object.keys(state.on);
			const unknownAction = names.find(
				(action) => !this.actions.some((known) => known === action),
			);
			if (unknownAction !== undefined) {
				throw new LedgerError(
					`State ${name} names unknown action ${unknownAction}`,
					"INVALID_LIFECYCLE",
					{ state: name, action: unknownAction },
				);
			}
			const targets: unknown[] = Object.values(state.on);
			if (state.final && targets.length > 0) {
				throw new LedgerError(
					`Final state ${name} must not allow actions`,
					"INVALID_LIFECYCLE",
					{ state: name },
				);
			}
			for (const target of targets) {
				if (typeof target !== "string" || !this.states.has(target)) {
					throw new LedgerError(
						`State ${name} leads to unknown state ${String(target)}`,
						"INVALID_LIFECYCLE",
						{ state: name, target },
					);
				}
			}
		}
	}

	has(state: string): state is TState {
		return this.states.has(state);
	}

	isFinal(state: TState): boolean {
		return this.states.get(state)?.final ?? false;
	}

	can(state: TState, action: TAction): boolean {
		return this.states.get(state)?.on[action] !== undefined;
	}

	actionsFrom(state: TState): TAction[] {
		const on: Partial<Record<TAction, TState>> =
			this.states.get(state)?.on ?? {};
		return this.actions.filter((action) => on[action] !== undefined);
	}

	finalStates(): TState[] {
		return [...this.states.keys()].filter(
			(name): name is TState => this.has(name) && this.isFinal(name),
		);
	}

	/**
	 * The state `action` leads to from `state`.
	 *
	 * @throws LedgerError `UNKNOWN_STATE` or `ACTION_NOT_ALLOWED`
	 */
	next(state: TState, action: TAction): TState {
		const node = this.states.get(state);
		if (!node) {
			throw new LedgerError(`Unknown state: ${state}`, "UNKNOWN_STATE", {
				state,
			});
		}
		const target = node.on[action];
		if (target === undefined) {
			throw new LedgerError(
				`Action "${action}" is not allowed from state "${state}"`,
				"ACTION_NOT_ALLOWED",
				{ state, action, allowed: this.actionsFrom(state) },
			);
		}
		return target;
	}
}
