import { type Clock, systemClock } from "@htlc-ledger/sdk";

/** Injection token for the ledger's time source; tests swap in a ManualClock. */
export const LEDGER_CLOCK = "LEDGER_CLOCK";

export const ledgerClockProvider = {
	provide: LEDGER_CLOCK,
	useValue: systemClock satisfies Clock,
};
