import { z } from 'zod';
import { PatternSpecError } from './types.js';

const CARDINALITIES = ['single', 'multi'] as const;

const RegexSourceSchema = z.union([z.string().min(1), z.instanceof(RegExp)]);

const LabelRuleInputSchema = z.object({
    pattern: RegexSourceSchema,
    template: z.string().min(1).optional(),
    separator: z.string().optional(),
});

const PatternSpecInputSchema = z.object({
    name: z.string().min(1).optional(),
    patterns: z.array(RegexSourceSchema).min(1),
    cardinality: z.enum(CARDINALITIES).optional(),
    completeness: z.union([z.literal('all'), z.array(RegexSourceSchema).min(1)]).optional(),
    auxiliary: z.array(z.string().min(1)).optional(),
    labeler: z.union([RegexSourceSchema, LabelRuleInputSchema]).optional(),
});

const CatalogInputSchema = z.record(z.string().min(1), PatternSpecInputSchema);

export type PatternSpecInput = z.input<typeof PatternSpecInputSchema>;
export type LabelRuleInput = z.input<typeof LabelRuleInputSchema>;
export type CatalogInput = z.input<typeof CatalogInputSchema>;

function formatZodErrors(error: z.ZodError): string[] {
    return error.issues.map((issue) => {
        const path = issue.path.join('.');
        return path ? `${path}: ${issue.message}` : issue.message;
    });
}

function validate<T>(value: unknown, schema: z.ZodSchema<T>, errorContext: string): T {
    const result = schema.safeParse(value);

    if (!result.success) {
        throw new PatternSpecError(`${errorContext} validation failed`, formatZodErrors(result.error));
    }

    return result.data;
}

export function validatePatternInput(input: unknown): PatternSpecInput {
    return validate(input, PatternSpecInputSchema, 'Pattern spec');
}

export function validateCatalogInput(input: unknown): CatalogInput {
    return validate(input, CatalogInputSchema, 'Catalog');
}

export function parseCatalogJson(raw: string): CatalogInput {
    let parsed: unknown;

    try {
        parsed = JSON.parse(raw);
    } catch {
        throw new PatternSpecError('Invalid JSON in catalog', ['Failed to parse JSON']);
    }

    return validateCatalogInput(parsed);
}
