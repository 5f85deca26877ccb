import { PuzzleDefinitionError } from '../Errors';

// [run size, value]
export type DefinitionEntry = [number, string];

export type DefinitionLine = DefinitionEntry[];

export interface PuzzleDefinition {
    title?: string;
    author?: string;
    // When given, these must match the number of columns and rows
    width?: number;
    height?: number;
    rows: DefinitionLine[];
    columns: DefinitionLine[];
}

function isRecord(value: unknown): value is Record<string, unknown> {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function parseEntry(entry: unknown, path: string): DefinitionEntry {
    if (!Array.isArray(entry) || entry.length !== 2) {
        throw new PuzzleDefinitionError(`${path} must be a [size, value] pair: ${JSON.stringify(entry)}`);
    }
    const [size, value]: unknown[] = entry;
    if (typeof size !== 'number' || !Number.isInteger(size) || size < 1) {
        throw new PuzzleDefinitionError(`${path} size must be a positive integer: ${JSON.stringify(size)}`);
    }
    if (typeof value !== 'string' || value.length === 0) {
        throw new PuzzleDefinitionError(`${path} value must be a non-empty string: ${JSON.stringify(value)}`);
    }
    return [size, value];
}

function parseLines(lines: unknown, path: string): DefinitionLine[] {
    if (!Array.isArray(lines)) {
        throw new PuzzleDefinitionError(`${path} is missing or is not an array`);
    }
    return lines.map((line: unknown, lineIndex) => {
        const linePath = `${path}[${lineIndex}]`;
        if (!Array.isArray(line)) {
            throw new PuzzleDefinitionError(`${linePath} is not an array: ${JSON.stringify(line)}`);
        }
        return line.map((entry: unknown, entryIndex) => parseEntry(entry, `${linePath}[${entryIndex}]`));
    });
}

function parseOptionalString(data: Record<string, unknown>, key: string): string | undefined {
    const value = data[key];
    if (value === undefined || typeof value === 'string') {
        return value;
    }
    throw new PuzzleDefinitionError(`puzzle.${key} is not a string: ${JSON.stringify(value)}`);
}

function parseOptionalDimension(data: Record<string, unknown>, key: string): number | undefined {
    const value = data[key];
    if (value === undefined || (typeof value === 'number' && Number.isInteger(value) && value >= 1)) {
        return value;
    }
    throw new PuzzleDefinitionError(`puzzle.${key} is not a positive integer: ${JSON.stringify(value)}`);
}

// Validates untrusted data (usually parsed JSON) as a puzzle definition. Unknown fields are dropped.
export function parsePuzzleDefinition(data: unknown): PuzzleDefinition {
    if (!isRecord(data)) {
        throw new PuzzleDefinitionError(`puzzle is not an object: ${JSON.stringify(data)}`);
    }

    const definition: PuzzleDefinition = {
        rows: parseLines(data.rows, 'puzzle.rows'),
        columns: parseLines(data.columns, 'puzzle.columns'),
    };

    const title = parseOptionalString(data, 'title');
    const author = parseOptionalString(data, 'author');
    const width = parseOptionalDimension(data, 'width');
    const height = parseOptionalDimension(data, 'height');
    if (title !== undefined) definition.title = title;
    if (author !== undefined) definition.author = author;
    if (width !== undefined) definition.width = width;
    if (height !== undefined) definition.height = height;
    return definition;
}
