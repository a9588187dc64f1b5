import { Lifecycle } from "../../lifecycle/index.js";
import type { EscrowAction, EscrowStatus } from "./types.js";

/**
 * An escrow is funded `active` and settles exactly once: `reveal` pays the
 * taker, `cancel` refunds the owner. Both outcomes are terminal.
 */
export const HTLC_LIFECYCLE = new Lifecycle<EscrowStatus, EscrowAction>({
	initial: "active",
	actions: ["reveal", "cancel"],
	states: {
		active: {
			on: { reveal: "completed", cancel: "cancelled" },
			description: "Funds in custody, awaiting secret or timelock expiry",
		},
		completed: {
			on: {},
			final: true,
			description: "Secret revealed, funds released to the taker",
		},
		cancelled: {
			on: {},
			final: true,
			description: "Timelock expired, funds returned to the owner",
		},
	},
});

export function isFinalStatus(status: EscrowStatus): boolean {
	return HTLC_LIFECYCLE.isFinal(status);
}
