/**
 * Static SQL vocabulary for completion.
 *
 * Loaded once from keywords.json beside this module.
 */
import { readFileSync } from 'node:fs';
import { fileURLToPath } from 'node:url';
import { z } from 'zod';

const VocabularySchema = z.object({
    keywords: z.array(z.string().min(1)),
    reserved: z.array(z.string().min(1)),
});

const vocabulary = VocabularySchema.parse(
    JSON.parse(readFileSync(fileURLToPath(new URL('./keywords.json', import.meta.url)), 'utf8')),
);

/**
 * Keywords offered as completion candidates, upper case, no duplicates.
 */
export const SQL_KEYWORDS: readonly string[] = [...new Set(vocabulary.keywords.map((k) => k.toUpperCase()))];

const RESERVED = new Set([
    ...vocabulary.reserved.map((w) => w.toLowerCase()),
    ...SQL_KEYWORDS.map((k) => k.toLowerCase()),
]);

/**
 * Whether a word can not be a table alias.
 */
export function isReservedWord(word: string): boolean {

    return RESERVED.has(word.toLowerCase());

}
