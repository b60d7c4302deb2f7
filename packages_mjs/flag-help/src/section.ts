/**
 * Help sections: an optional title and indented lines, optionally in
 * tab-separated columns.
 */

export const DEFAULT_LINE_PREFIX = '  ';
export const COLUMN_PADDING = 3;

export interface SectionOptions {
    linePrefix?: string;
    /** Align tab-separated cells into columns. */
    columns?: boolean;
}

export class Section {
    public readonly linePrefix: string;
    public readonly columns: boolean;

    constructor(
        public readonly title: string,
        public readonly lines: string[],
        options: SectionOptions = {}
    ) {
        this.linePrefix = options.linePrefix ?? (title ? DEFAULT_LINE_PREFIX : '');
        this.columns = options.columns ?? false;
    }

    public toString(): string {
        const out: string[] = [];
        if (this.title) {
            out.push(this.title);
        }
        const lines = this.columns ? alignColumns(this.lines.map(l => l.split('\t'))) : this.lines;
        for (const line of lines) {
            out.push(this.linePrefix + line);
        }
        return out.map(l => `${l.replace(/\n+$/, '')}\n`).join('');
    }
}

/**
 * Renders sections separated by blank lines.
 */
export function renderSections(sections: readonly Section[]): string {
    return sections.map(s => s.toString()).join('\n');
}

/**
 * Pads every cell but the last in each row to its column's widest cell plus
 * COLUMN_PADDING. Trailing whitespace is dropped.
 */
export function alignColumns(rows: readonly string[][], padding: number = COLUMN_PADDING): string[] {
    const widths: number[] = [];
    for (const row of rows) {
        row.slice(0, -1).forEach((cell, i) => {
            widths[i] = Math.max(widths[i] ?? 0, [...cell].length);
        });
    }

    return rows.map(row =>
        row
            .map((cell, i) => (i < row.length - 1 ? cell + ' '.repeat(widths[i] - [...cell].length + padding) : cell))
            .join('')
            .trimEnd()
    );
}
