import { z } from 'zod';

const optionalString = z.string().nullish().transform((value) => value ?? undefined);

export const lightListEntrySchema = z.object({
	name: z.string(),
	type: optionalString,
	manufacturername: optionalString,
	modelid: optionalString,
	uniqueid: optionalString,
	hascolor: z.boolean().nullish().transform((value) => value ?? undefined),
});

export const lightListSchema = z.record(z.string(), lightListEntrySchema);

export type LightListEntry = z.infer<typeof lightListEntrySchema>;

function colorField(max: number) {
	return z.number().int().min(0).max(max).nullish().transform((value) => value ?? undefined);
}

export const lightStateSchema = z.object({
	on: z.boolean(),
	reachable: z.boolean(),
	hue: colorField(65535),
	bri: colorField(255),
	sat: colorField(255),
});

export const lightDetailsSchema = z.object({
	state: lightStateSchema,
});

// deCONZ answers failed requests with a list of { error: { type, address, description } }
export const bridgeErrorListSchema = z.array(
	z.object({
		error: z.object({
			type: z.number().optional(),
			address: z.string().optional(),
			description: z.string(),
		}),
	}),
).nonempty();

export function describeIssues(error: z.ZodError): string {
	return error.issues
		.map((issue) => (issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message))
		.join('; ');
}
