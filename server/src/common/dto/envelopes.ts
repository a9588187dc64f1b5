import { ApiProperty, getSchemaPath } from "@nestjs/swagger";
import type { SchemaObject } from "@nestjs/swagger/dist/interfaces/open-api-spec.interface";

type SchemaTarget = Parameters<typeof getSchemaPath>[0];

/** Every response body is `{ data }`; list endpoints add `meta`. */
export type ApiEnvelope<T> = { data: T };

export type PageMeta = {
	total: number;
	offset: number;
	hasMore: boolean;
};

export type ApiPageEnvelope<T> = ApiEnvelope<T[]> & { meta: PageMeta };

export function envelope<T>(data: T): ApiEnvelope<T> {
	return { data };
}

/**
 * Wraps one page of `items` taken at `offset` out of `total`.
 */
export function pageEnvelope<T>(
	items: T[],
	page: { total: number; offset: number },
): ApiPageEnvelope<T> {
	return {
		data: items,
		meta: {
			total: page.total,
			offset: page.offset,
			hasMore: page.offset + items.length < page.total,
		},
	};
}

export class PageMetaDto implements PageMeta {
	@ApiProperty({ description: "Items matching the query", example: 42 })
	total!: number;

	@ApiProperty({ description: "Items skipped before this page", example: 0 })
	offset!: number;

	@ApiProperty({ description: "Whether more items follow this page" })
	hasMore!: boolean;
}

// Swagger only: `data` is narrowed per route by envelopeSchema
export class ApiEnvelopeDto {
	@ApiProperty()
	data!: unknown;
}

export function envelopeSchema(
	dto: SchemaTarget,
	options?: { page?: true },
): SchemaObject {
	const item = { $ref: getSchemaPath(dto) };
	const body: SchemaObject = options?.page
		? {
				type: "object",
				properties: {
					data: { type: "array", items: item },
					meta: { $ref: getSchemaPath(PageMetaDto) },
				},
				required: ["data", "meta"],
			}
		: {
				type: "object",
				properties: { data: item },
				required: ["data"],
			};
	return { allOf: [{ $ref: getSchemaPath(ApiEnvelopeDto) }, body] };
}
