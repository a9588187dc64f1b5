/**
 * Utility functions for the SDK
 */

export {
	bytesToHex,
	hexToBytes,
	isHex,
	stringToBytes,
	concatBytes,
	bytesEqual,
} from "./encoding.js";
