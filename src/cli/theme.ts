/**
 * Terminal colors for CLI messages. Uses ansis truecolor; ansis drops the
 * escapes itself when the stream is not a TTY or NO_COLOR is set.
 *
 * @example
 * ```typescript
 * process.stderr.write(theme.error('Connection failed') + '\n')
 * ```
 */
import ansis from 'ansis';

export const palette = {

    primary: '#3B82F6',      // Bright Blue
    error: '#EF4444',        // Red
    muted: '#9CA3AF',        // Gray-400

} as const;

export const theme = {

    primary: (text: string) => ansis.hex(palette.primary)(text),
    error: (text: string) => ansis.hex(palette.error)(text),
    muted: (text: string) => ansis.hex(palette.muted)(text),
    bold: ansis.bold,

} as const;
