import { z } from "zod";

/**
 * Maps one API path to a local JSON fixture
 */
export interface MockEntry {
	/** Exact URL path to match, e.g. "/v1/users" */
	readonly path: string;
	/** Fixture file name without the .json extension */
	readonly fixture: string;
	/** Directory holding the fixture; the dispatcher's default root when absent */
	readonly root?: string;
}

/**
 * Zod schema for mock entries received through the mapper channel
 */
export const MockEntrySchema = z.object({
	path: z.string({ message: "Invalid field type: path must be string" }),
	fixture: z
		.string({ message: "Invalid field type: fixture must be string" })
		.min(1, { message: "fixture must not be empty" }),
	root: z
		.string({ message: "Invalid field type: root must be string" })
		.optional(),
});

export const MockEntryListSchema = z.array(MockEntrySchema, {
	message: "Invalid mapper: expected an array of mock entries",
});
