/**
 * Query history type definitions.
 */
import { z } from 'zod';

/**
 * A single executed query.
 *
 * Result rows are stored separately in a gzipped file referenced by
 * `resultsFile`.
 */
export interface HistoryEntry {

    /** Unique identifier (UUID v4) */
    id: string;

    query: string;

    executedAt: Date;

    durationMs: number;

    success: boolean;

    /** Server or driver message when the query failed */
    errorMessage?: string;

    /** Rows returned, or rows affected for DML */
    rowCount?: number;

    /** Results file name, relative to the connection's results directory */
    resultsFile?: string;

}

/**
 * Outcome of one query, as recorded.
 */
export interface HistoryResult {

    success: boolean;
    errorMessage?: string;
    columns?: string[];
    rows?: Record<string, unknown>[];
    rowsAffected?: number;
    durationMs: number;

}

export interface ClearResult {

    entriesRemoved: number;
    filesRemoved: number;

}

export const HistoryEntrySchema = z.object({
    id: z.string(),
    query: z.string(),
    executedAt: z.string().datetime(),
    durationMs: z.number(),
    success: z.boolean(),
    errorMessage: z.string().optional(),
    rowCount: z.number().optional(),
    resultsFile: z.string().optional(),
});

/**
 * History index as written to disk. Dates are ISO strings.
 */
export const HistoryFileSchema = z.object({
    version: z.string(),
    entries: z.array(HistoryEntrySchema),
});

export const ResultsFileSchema = z.object({
    columns: z.array(z.string()),
    rows: z.array(z.record(z.unknown())),
});

export type HistoryEntrySerialized = z.infer<typeof HistoryEntrySchema>;
export type HistoryFileSerialized = z.infer<typeof HistoryFileSchema>;
