import { ValidationError } from '../utils/errors.js';

/**
 * Accepted date bound inputs: a year, a parseable date string, or a Date.
 * `null` clears the bound.
 */
export type DateInput = number | string | Date | null;

type TermCategory = 'terms' | 'inclusions' | 'exclusions';

/**
 * Read-only view of a builder's state.
 */
export interface QuerySnapshot {
    terms: readonly string[];
    inclusions: readonly string[];
    exclusions: readonly string[];
    constraints: readonly string[];
    startYear: number | null;
    endYear: number | null;
}

/**
 * Format a phrase for the provider query language.
 * Bare words stay as they are; phrases with whitespace or commas, or any
 * phrase marked exact, are wrapped in double quotes (never twice).
 */
export function formatPhrase(text: string, exact = false): string {
    const phrase = text.trim();
    if (!phrase) {
        throw new ValidationError('Phrase cannot be empty', 'phrase');
    }

    if (isQuoted(phrase)) return phrase;
    if (!exact && !/[\s,]/.test(phrase)) return phrase;
    return `"${phrase}"`;
}

/**
 * Builds a Scopus-style boolean query.
 *
 * A phrase lives in exactly one of the free, included and excluded
 * categories: adding it to one moves it out of the others.
 *
 * @example
 * new QueryBuilder()
 *     .addTerm('graph neural networks')
 *     .addExclusion('survey')
 *     .after(2020)
 *     .render();
 * // '"graph neural networks" AND NOT survey AND PUBYEAR > 2019'
 */
export class QueryBuilder {
    private readonly categories: Record<TermCategory, Set<string>> = {
        terms: new Set(),
        inclusions: new Set(),
        exclusions: new Set(),
    };
    private readonly constraints = new Set<string>();
    private afterYear: number | null = null;
    private beforeYear: number | null = null;

    addTerm(text: string, exact = false): this {
        return this.place('terms', text, exact);
    }

    addTerms(texts: readonly string[], exact: boolean | readonly boolean[] = false): this {
        return this.placeMany('terms', texts, exact);
    }

    addInclusion(text: string, exact = false): this {
        return this.place('inclusions', text, exact);
    }

    addInclusions(texts: readonly string[], exact: boolean | readonly boolean[] = false): this {
        return this.placeMany('inclusions', texts, exact);
    }

    addExclusion(text: string, exact = false): this {
        return this.place('exclusions', text, exact);
    }

    addExclusions(texts: readonly string[], exact: boolean | readonly boolean[] = false): this {
        return this.placeMany('exclusions', texts, exact);
    }

    /**
     * Add a raw boolean expression, e.g. `TITLE-ABS-KEY(protein)` or `DOCTYPE(ar)`.
     */
    addConstraint(raw: string): this {
        const constraint = raw.trim();
        if (!constraint) {
            throw new ValidationError('Constraint cannot be empty', 'constraint');
        }
        this.constraints.add(constraint);
        return this;
    }

    addConstraints(raws: readonly string[]): this {
        for (const raw of raws) this.addConstraint(raw);
        return this;
    }

    /**
     * Remove phrases from every term category. Matches the bare and the quoted form.
     */
    remove(texts: string | readonly string[]): this {
        const list = typeof texts === 'string' ? [texts] : texts;
        for (const text of list) {
            const forms = phraseForms(text);
            for (const set of Object.values(this.categories)) {
                for (const form of forms) set.delete(form);
            }
        }
        return this;
    }

    removeConstraint(raw: string): this {
        this.constraints.delete(raw.trim());
        return this;
    }

    /**
     * Lower bound: only papers published in or after the bound's year.
     */
    after(date: DateInput): this {
        this.afterYear = toBoundYear(date, 'after');
        return this;
    }

    /**
     * Upper bound: only papers published in or before the bound's year.
     */
    before(date: DateInput): this {
        this.beforeYear = toBoundYear(date, 'before');
        return this;
    }

    get startYear(): number | null {
        return this.afterYear;
    }

    get endYear(): number | null {
        return this.beforeYear;
    }

    isEmpty(): boolean {
        return (
            this.categories.terms.size === 0 &&
            this.categories.inclusions.size === 0 &&
            this.constraints.size === 0 &&
            this.categories.exclusions.size === 0
        );
    }

    snapshot(): QuerySnapshot {
        return {
            terms: [...this.categories.terms],
            inclusions: [...this.categories.inclusions],
            exclusions: [...this.categories.exclusions],
            constraints: [...this.constraints],
            startYear: this.startYear,
            endYear: this.endYear,
        };
    }

    /**
     * Render the provider query string.
     */
    render(): string {
        const parts = [
            ...this.categories.terms,
            ...this.categories.inclusions,
            ...this.constraints,
            ...[...this.categories.exclusions].map((phrase) => `NOT ${phrase}`),
        ];

        const { startYear, endYear } = this;
        if (startYear !== null) parts.push(`PUBYEAR > ${startYear - 1}`);
        if (endYear !== null) parts.push(`PUBYEAR < ${endYear + 1}`);

        return parts.join(' AND ');
    }

    toString(): string {
        return this.render();
    }

    private place(category: TermCategory, text: string, exact: boolean): this {
        const phrase = formatPhrase(text, exact);
        // Drop both spellings so "deep" and "\"deep\"" cannot coexist across categories
        for (const set of Object.values(this.categories)) {
            for (const form of phraseForms(phrase)) set.delete(form);
        }
        this.categories[category].add(phrase);
        return this;
    }

    private placeMany(category: TermCategory, texts: readonly string[], exact: boolean | readonly boolean[]): this {
        if (typeof exact !== 'boolean' && exact.length !== texts.length) {
            throw new ValidationError(
                `Phrase and flag inputs must have the same length. Got ${texts.length} and ${exact.length}`,
                'exact'
            );
        }

        texts.forEach((text, i) => {
            const flag = typeof exact === 'boolean' ? exact : exact[i] ?? false;
            this.place(category, text, flag);
        });
        return this;
    }
}

function isQuoted(phrase: string): boolean {
    return phrase.length >= 2 && phrase.startsWith('"') && phrase.endsWith('"');
}

/**
 * The bare and quoted spellings of a phrase.
 */
function phraseForms(text: string): string[] {
    const phrase = text.trim();
    const bare = isQuoted(phrase) ? phrase.slice(1, -1) : phrase;
    return [bare, `"${bare}"`];
}

/**
 * Year of a bound, as the caller wrote it: a Date's local calendar year, or
 * the leading year of a date string.
 */
function toBoundYear(value: DateInput, bound: 'after' | 'before'): number | null {
    if (value === null) return null;

    if (typeof value === 'number') {
        if (!Number.isInteger(value) || value < 1 || value > 9999) {
            throw new ValidationError(`Invalid year for ${bound}(): ${value}`, bound);
        }
        return value;
    }

    if (typeof value === 'string') {
        const text = value.trim();
        if (/^\d{4}$/.test(text)) return Number(text);

        const date = new Date(text);
        if (isNaN(date.getTime())) {
            throw new ValidationError(`Invalid date string for ${bound}(): "${value}"`, bound);
        }
        const leadingYear = /^(\d{4})-/.exec(text);
        return leadingYear ? Number(leadingYear[1]) : date.getFullYear();
    }

    if (value instanceof Date) {
        if (isNaN(value.getTime())) {
            throw new ValidationError(`Invalid Date for ${bound}()`, bound);
        }
        return value.getFullYear();
    }

    throw new ValidationError(
        `Invalid date format ${typeof value}. Expected number, string, or Date.`,
        bound
    );
}
