// Thrown when a puzzle's constraint groups cannot describe a board: mismatched dimensions,
// missing rows or columns, or run sizes that are not positive integers.
export class PuzzleShapeError extends Error {
    constructor(message: string) {
        super(message);
        this.name = 'PuzzleShapeError';
    }
}

// Thrown when puzzle definition data is malformed or cannot be decoded.
export class PuzzleDefinitionError extends Error {
    constructor(message: string) {
        super(message);
        this.name = 'PuzzleDefinitionError';
    }
}

export class OutOfBoundsError extends Error {
    readonly row: number;
    readonly col: number;

    constructor(row: number, col: number, width: number, height: number) {
        super(`Cell (${row}, ${col}) is outside of the ${width}x${height} board`);
        this.name = 'OutOfBoundsError';
        this.row = row;
        this.col = col;
    }
}
