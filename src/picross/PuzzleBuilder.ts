import { ReadonlyBoard } from './Board';
import { CellValue } from './Cell';
import { PuzzleDefinition } from './Definition/PuzzleDefinition';
import { PuzzleShapeError } from './Errors';
import { ConstraintGroup, Puzzle } from './Puzzle';
import { constraintFromLine } from './RunMatcher';

// Builds a constraint group from [size, value] tuples, one array of tuples per line.
// Example:
// constraintGroup([[[2, '#']], [[1, '#'], [1, '#']], []])
export function constraintGroup<V extends CellValue>(lines: readonly (readonly (readonly [number, V])[])[]): ConstraintGroup<V> {
    return lines.map(line => line.map(([size, value]) => ({ value, size })));
}

export function buildPuzzle(definition: PuzzleDefinition): Puzzle<string> {
    const { width, height, rows, columns } = definition;
    if (height !== undefined && height !== rows.length) {
        throw new PuzzleShapeError(`Puzzle declares a height of ${height} but has ${rows.length} row constraints`);
    }
    if (width !== undefined && width !== columns.length) {
        throw new PuzzleShapeError(`Puzzle declares a width of ${width} but has ${columns.length} column constraints`);
    }
    return new Puzzle(constraintGroup(rows), constraintGroup(columns));
}

// Derives the puzzle that a finished picture is the solution of
export function puzzleFromBoard<V extends CellValue>(board: ReadonlyBoard<V>): Puzzle<V> {
    return new Puzzle(
        Array.from(board.rows(), line => constraintFromLine(line)),
        Array.from(board.columns(), line => constraintFromLine(line))
    );
}

// The inverse of buildPuzzle, for writing a puzzle back out as definition data
export function definitionFromPuzzle(puzzle: Puzzle<string>, title?: string, author?: string): PuzzleDefinition {
    const toLines = (group: ConstraintGroup<string>) => group.map(constraint => constraint.map((entry): [number, string] => [entry.size, entry.value]));
    return {
        ...(title !== undefined ? { title } : {}),
        ...(author !== undefined ? { author } : {}),
        width: puzzle.width,
        height: puzzle.height,
        rows: toLines(puzzle.rowConstraints),
        columns: toLines(puzzle.columnConstraints),
    };
}
