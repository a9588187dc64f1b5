import { ValueTransformer } from "typeorm";

/**
 * Stores bigints as decimal text. SQLite integers stop at 64 bits and
 * amounts go up to 2^256 - 1.
 */
export const bigintTransformer: ValueTransformer = {
	to: (value: bigint | undefined) =>
		value === undefined ? undefined : value.toString(),
	from: (value: string | null) => (value === null ? null : BigInt(value)),
};
