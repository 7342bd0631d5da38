/**
 * Logger
 *
 * Subscribes to every core observer event and writes it to a console
 * stream (human-readable lines) and/or a file stream (JSON lines), after
 * level filtering and redaction.
 *
 * @example
 * ```typescript
 * const logger = createLogger(settings.logging, { console: process.stderr })
 * logger.start()
 *
 * // Logger now captures all observer events
 * await logger.stop()
 * ```
 */
import { createWriteStream, mkdirSync } from 'node:fs';
import { dirname } from 'node:path';
import type { Writable } from 'node:stream';

import { isCi } from '../environment.js';
import { observer as defaultObserver, type CoreObserver } from '../observer.js';
import { classifyEvent, shouldLog } from './classifier.js';
import { formatEntry, formatLine, generateMessage, serializeEntry } from './formatter.js';
import { filterData } from './redact.js';
import type { EntryLevel, LogLevel, LoggerState } from './types.js';

export interface LoggerOptions {

    level?: LogLevel;

    /** Observer to capture (default: the shared core observer) */
    observer?: CoreObserver;

    /** Human-readable lines; null for none */
    console?: Writable | null;

    /** JSON lines; null for none */
    file?: Writable | null;

    /** Path of the file stream, for the `logger:started` event */
    filePath?: string;

    /** Context included with every file entry */
    context?: Record<string, unknown>;

    /** Clock, injectable for tests */
    now?: () => Date;
}

function toRecord(data: unknown): Record<string, unknown> {

    if (typeof data !== 'object' || data === null) {

        return {};

    }

    return Object.fromEntries(Object.entries(data));

}

export class Logger {

    readonly #level: LogLevel;
    readonly #observer: CoreObserver;
    readonly #console: Writable | null;
    readonly #file: Writable | null;
    readonly #filePath: string | null;
    readonly #now: () => Date;

    #context: Record<string, unknown>;
    #state: LoggerState = 'idle';
    #cleanup: (() => void) | null = null;

    constructor(options: LoggerOptions = {}) {

        this.#level = options.level ?? 'info';
        this.#observer = options.observer ?? defaultObserver;
        this.#console = options.console ?? null;
        this.#file = options.file ?? null;
        this.#filePath = options.filePath ?? null;
        this.#context = options.context ?? {};
        this.#now = options.now ?? (() => new Date());

    }

    get state(): LoggerState {

        return this.#state;

    }

    get level(): LogLevel {

        return this.#level;

    }

    get isEnabled(): boolean {

        return this.#level !== 'silent' && (this.#console !== null || this.#file !== null);

    }

    /**
     * Merge into the context included with every file entry.
     */
    setContext(context: Record<string, unknown>): void {

        this.#context = { ...this.#context, ...context };

    }

    clearContext(): void {

        this.#context = {};

    }

    /**
     * Begin capturing observer events.
     */
    start(): void {

        if (this.#state !== 'idle' || !this.isEnabled) {

            return;

        }

        this.#cleanup = this.#observer.on(/./, ({ event, data }) => {

            this.#handleEvent(String(event), toRecord(data));

        });

        this.#state = 'running';

        this.#observer.emit('logger:started', { level: this.#level, file: this.#filePath });

    }

    /**
     * Stop capturing and close the file stream.
     */
    async stop(): Promise<void> {

        if (this.#state !== 'running') {

            return;

        }

        this.#cleanup?.();
        this.#cleanup = null;
        this.#state = 'stopped';

        const file = this.#file;

        if (file && file !== process.stdout && file !== process.stderr) {

            await new Promise<void>((resolve) => {

                file.end(() => resolve());

            });

        }

    }

    // ─────────────────────────────────────────────────────────────
    // Direct logging methods
    // ─────────────────────────────────────────────────────────────

    info(message: string, data?: Record<string, unknown>): void {

        this.#log('info', message, data);

    }

    warn(message: string, data?: Record<string, unknown>): void {

        this.#log('warn', message, data);

    }

    error(message: string, data?: Record<string, unknown>): void {

        this.#log('error', message, data);

    }

    debug(message: string, data?: Record<string, unknown>): void {

        this.#log('debug', message, data);

    }

    #handleEvent(event: string, data: Record<string, unknown>): void {

        // Skip logger's own events to avoid loops
        if (event.startsWith('logger:') && event !== 'logger:started') {

            return;

        }

        const level = classifyEvent(event, data);

        if (!shouldLog(level, this.#level)) {

            return;

        }

        const filtered = filterData(data, this.#level);
        const at = this.#now();

        this.#console?.write(formatLine(level, event, generateMessage(event, filtered), at));

        if (this.#file) {

            const entry = formatEntry(level, event, filtered, this.#context, this.#level === 'verbose', at);

            this.#file.write(serializeEntry(entry));

        }

    }

    #log(level: EntryLevel, message: string, data?: Record<string, unknown>): void {

        if (this.#state !== 'running' || !shouldLog(level, this.#level)) {

            return;

        }

        const filtered = data ? filterData(data, this.#level) : {};
        const suffix = this.#level === 'verbose' && Object.keys(filtered).length > 0
            ? ` ${JSON.stringify(filtered)}`
            : '';
        const line = `[${this.#now().toISOString()}] [${level.toUpperCase().padEnd(5)}] ${message}${suffix}\n`;

        this.#console?.write(line);
        this.#file?.write(line);

    }

}

// ─────────────────────────────────────────────────────────────
// Factory
// ─────────────────────────────────────────────────────────────

export interface CreateLoggerOptions {

    /** Console stream; defaults to stdout in CI, none otherwise */
    console?: Writable | null;

    observer?: CoreObserver;
}

/**
 * Build a logger from the `logging` settings section.
 *
 * Opens the log file for appending when one is configured.
 */
export function createLogger(
    config: { level: LogLevel; file: string | null },
    options: CreateLoggerOptions = {},
): Logger {

    let file: Writable | null = null;

    if (config.file && config.level !== 'silent') {

        mkdirSync(dirname(config.file), { recursive: true });
        file = createWriteStream(config.file, { flags: 'a' });

    }

    const consoleStream = options.console === undefined
        ? (isCi() ? process.stdout : null)
        : options.console;

    const loggerOptions: LoggerOptions = {
        level: config.level,
        console: consoleStream,
        file,
    };

    if (config.file) loggerOptions.filePath = config.file;
    if (options.observer) loggerOptions.observer = options.observer;

    return new Logger(loggerOptions);

}
