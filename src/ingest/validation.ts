import { z } from 'zod';
import type { Paper } from '../types/index.js';
import { parseIsoDate } from '../utils/dates.js';
import { ValidationError } from '../utils/errors.js';

/**
 * Invariants every Paper must hold before it is stored.
 */
export const PaperSchema = z.object({
    uuid: z.string().uuid(),
    title: z.string().trim().min(1, 'title must not be empty'),
    abstract: z.string().nullable(),
    publication_date: z
        .string()
        .refine((value) => parseIsoDate(value) !== null, 'publication_date must be a YYYY-MM-DD calendar date')
        .nullable(),
    journal: z.string().nullable(),
    doi: z
        .string()
        .refine((value) => value.startsWith('10.'), 'DOI must start with "10."')
        .nullable(),
    url: z.string().nullable(),
    citations: z.number().int().nonnegative(),
    keywords: z.array(z.string()),
    source: z.string().min(1),
    source_id: z.string().nullable(),
    metadata: z.record(z.unknown()),
    author_uuids: z.array(z.string().uuid()),
});

/**
 * Throw a ValidationError naming the first broken field.
 */
export function validatePaper(paper: Paper): void {
    const result = PaperSchema.safeParse(paper);
    if (result.success) return;

    const issue = result.error.issues[0];
    const field = issue ? issue.path.join('.') : undefined;
    const message = issue ? `${field}: ${issue.message}` : 'Invalid paper';
    throw new ValidationError(message, field);
}
