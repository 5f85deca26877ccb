import { ReadonlyBoard } from './Board';
import { CellValue } from './Cell';
import { OutOfBoundsError, PuzzleShapeError } from './Errors';
import { lineSatisfies } from './RunMatcher';

// `size` contiguous cells filled with `value`
export interface ConstraintEntry<V extends CellValue> {
    value: V;
    size: number;
}

// Fully describes one row or column. Entries must appear in this order, left to right or top to bottom.
export type Constraint<V extends CellValue> = readonly Readonly<ConstraintEntry<V>>[];

// One constraint per row, or one per column
export type ConstraintGroup<V extends CellValue> = readonly Constraint<V>[];

function freezeGroup<V extends CellValue>(group: ConstraintGroup<V>, groupName: string): ConstraintGroup<V> {
    return Object.freeze(
        group.map((constraint, lineIndex) =>
            Object.freeze(
                constraint.map((entry, entryIndex) => {
                    if (!Number.isInteger(entry.size) || entry.size < 1) {
                        throw new PuzzleShapeError(
                            `${groupName} ${lineIndex + 1}, entry ${entryIndex + 1}: run size must be a positive integer, got ${entry.size}`
                        );
                    }
                    return Object.freeze({ value: entry.value, size: entry.size });
                })
            )
        )
    );
}

// An immutable pair of row and column constraint groups. The board's height is the number of
// row constraints and its width is the number of column constraints.
export class Puzzle<V extends CellValue> {
    readonly rowConstraints: ConstraintGroup<V>;
    readonly columnConstraints: ConstraintGroup<V>;

    constructor(rowConstraints: ConstraintGroup<V>, columnConstraints: ConstraintGroup<V>) {
        if (rowConstraints.length === 0 || columnConstraints.length === 0) {
            throw new PuzzleShapeError(
                `A puzzle needs at least one row and one column, got ${rowConstraints.length} rows and ${columnConstraints.length} columns`
            );
        }
        this.rowConstraints = freezeGroup(rowConstraints, 'Row');
        this.columnConstraints = freezeGroup(columnConstraints, 'Column');
    }

    get width(): number {
        return this.columnConstraints.length;
    }

    get height(): number {
        return this.rowConstraints.length;
    }

    // Assumes the board has the same width and height as this puzzle
    rowIsSolved(board: ReadonlyBoard<V>, index: number): boolean {
        if (!Number.isInteger(index) || index < 0 || index >= this.height) {
            throw new OutOfBoundsError(index, 0, this.width, this.height);
        }
        return lineSatisfies(this.rowConstraints[index], board.row(index));
    }

    columnIsSolved(board: ReadonlyBoard<V>, index: number): boolean {
        if (!Number.isInteger(index) || index < 0 || index >= this.width) {
            throw new OutOfBoundsError(0, index, this.width, this.height);
        }
        return lineSatisfies(this.columnConstraints[index], board.column(index));
    }

    isSolvedBy(board: ReadonlyBoard<V>): boolean {
        if (board.width !== this.width || board.height !== this.height) {
            return false;
        }

        for (let row = 0; row < this.height; row++) {
            if (!this.rowIsSolved(board, row)) {
                return false;
            }
        }
        for (let col = 0; col < this.width; col++) {
            if (!this.columnIsSolved(board, col)) {
                return false;
            }
        }
        return true;
    }
}
