/**
 * Core module - Hashlock primitives and time sources
 */

export {
	DIGEST_LENGTH,
	ZERO_DIGEST,
	sha256Hex,
	hashSecret,
	parseDigest,
	isZeroDigest,
	verifySecret,
	deriveEscrowKey,
} from "./hashing.js";

export { type Clock, systemClock, ManualClock } from "./clock.js";
