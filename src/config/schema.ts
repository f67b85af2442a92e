import * as z from "zod";

import { assertSafeComponentName } from "../component-name";
import { isOptionLikeRef } from "../git/repository";

export const LATEST_VERSION = "latest";

export const ComponentSchema = z
	.object({
		version: z.string().min(1).refine((value) => !isOptionLikeRef(value), {
			message: "must not start with '-'",
		}),
		locked_version: z
			.string()
			.refine((value) => !isOptionLikeRef(value), {
				message: "must not start with '-'",
			})
			.nullable(),
		url: z.string().nullable(),
		npm_install: z.boolean(),
		npm_build: z.boolean(),
	})
	.strip();

export const ComponentInputSchema = ComponentSchema.partial();

const ComponentNameSchema = z.string().superRefine((value, ctx) => {
	try {
		assertSafeComponentName(value);
	} catch (error) {
		ctx.addIssue({
			code: z.ZodIssueCode.custom,
			message:
				error instanceof Error ? error.message : "Invalid component name.",
		});
	}
});

export const ComponentInputMapSchema = z.record(
	ComponentNameSchema,
	ComponentInputSchema,
);

export const VersionsDocumentSchema = z.object({
	_comment: z.string().optional(),
	components: ComponentInputMapSchema,
});

export type ComponentEntry = z.infer<typeof ComponentSchema>;
export type ComponentInput = z.infer<typeof ComponentInputSchema>;
export type ComponentMap = Record<string, ComponentEntry>;
export type ComponentInputMap = Record<string, ComponentInput>;
export type VersionsDocument = {
	_comment: string;
	components: ComponentMap;
};

const isObject = (value: unknown): value is Record<string, unknown> =>
	typeof value === "object" && value !== null && !Array.isArray(value);

/**
 * Accepts the `{ _comment, components }` envelope and the older layout where
 * the component map sits at the top level.
 */
export const parseVersionsDocument = (input: unknown): ComponentInputMap => {
	if (!isObject(input)) {
		throw new Error("Versions file must be a JSON object.");
	}
	const parsed =
		"components" in input
			? VersionsDocumentSchema.safeParse(input)
			: ComponentInputMapSchema.transform((components) => ({
					components,
				})).safeParse(input);
	if (!parsed.success) {
		const details = parsed.error.issues
			.map((issue) => `${issue.path.join(".") || "document"} ${issue.message}`)
			.join("; ");
		throw new Error(`Versions file does not match schema: ${details}.`);
	}
	return parsed.data.components;
};
