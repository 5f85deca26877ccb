import { Board, ReadonlyBoard } from './Board';
import { Cell, CellValue, CrossedOutCell, EmptyCell, filledCell } from './Cell';
import { ConstraintGroup, Puzzle } from './Puzzle';

export type PicrossOptions = {
    // Cross out the remaining empty cells of a line once it is solved, and revert those
    // cross outs when the line stops being solved. Defaults to true.
    autoCrossCompleted?: boolean;
};

export type PicrossStatus = {
    rows: boolean[];
    columns: boolean[];
};

/**
 * A picross game. Owns the puzzle, the board being played, and whether each row and column is currently solved.
 */
export class Picross<V extends CellValue> {
    readonly puzzle: Puzzle<V>;
    readonly autoCrossCompleted: boolean;
    private _board: Board<V>;
    private rowStatus: boolean[];
    private columnStatus: boolean[];

    constructor(puzzle: Puzzle<V>, options: PicrossOptions = {}) {
        const { autoCrossCompleted = true } = options;
        this.puzzle = puzzle;
        this.autoCrossCompleted = autoCrossCompleted;
        this._board = new Board<V>(puzzle.width, puzzle.height);

        // An empty line may already satisfy an empty constraint
        this.rowStatus = Array.from({ length: this.height }, (_, row) => puzzle.rowIsSolved(this._board, row));
        this.columnStatus = Array.from({ length: this.width }, (_, col) => puzzle.columnIsSolved(this._board, col));
        for (let row = 0; row < this.height; row++) {
            this.annotateRow(row);
        }
        for (let col = 0; col < this.width; col++) {
            this.annotateColumn(col);
        }
    }

    get width(): number {
        return this._board.width;
    }

    get height(): number {
        return this._board.height;
    }

    get board(): ReadonlyBoard<V> {
        return this._board;
    }

    get rowConstraints(): ConstraintGroup<V> {
        return this.puzzle.rowConstraints;
    }

    get columnConstraints(): ConstraintGroup<V> {
        return this.puzzle.columnConstraints;
    }

    get(row: number, col: number): Cell<V> {
        return this._board.get(row, col);
    }

    cells(): IterableIterator<[number, number, Cell<V>]> {
        return this._board.cells();
    }

    /**
     * Places `value` into the cell at `row` and `col`.
     * @returns Whether the puzzle is solved afterwards.
     */
    place(value: V, row: number, col: number): boolean {
        this._board.set(row, col, filledCell(value));
        this.recheck(row, col);
        return this.isSolved();
    }

    /**
     * Crosses out the cell at `row` and `col`.
     * @returns Whether the puzzle is solved afterwards.
     */
    crossOut(row: number, col: number): boolean {
        this._board.set(row, col, CrossedOutCell);
        this.recheck(row, col);
        return this.isSolved();
    }

    /**
     * Clears the cell at `row` and `col`.
     * @returns Whether the puzzle is solved afterwards.
     */
    clear(row: number, col: number): boolean {
        this._board.set(row, col, EmptyCell);
        this.recheck(row, col);
        return this.isSolved();
    }

    // Recomputes whether the row and column through a cell are solved, then annotates both.
    // Both solved bits are refreshed before either annotation pass reads them.
    recheck(row: number, col: number) {
        this._board.checkBounds(row, col);
        this.rowStatus[row] = this.puzzle.rowIsSolved(this._board, row);
        this.columnStatus[col] = this.puzzle.columnIsSolved(this._board, col);
        this.annotateRow(row);
        this.annotateColumn(col);
    }

    // Annotation only swaps empty and crossed out cells, both of which are ignored by the run matcher,
    // so it never changes any line's solved bit.
    private annotateRow(row: number) {
        if (!this.autoCrossCompleted) {
            return;
        }

        const solved = this.rowStatus[row];
        for (let col = 0; col < this.width; col++) {
            const cell = this._board.get(row, col);
            if (solved && cell.state === 'empty') {
                this._board.set(row, col, CrossedOutCell);
            } else if (!solved && cell.state === 'crossedOut' && !this.columnStatus[col]) {
                this._board.set(row, col, EmptyCell);
            }
        }
    }

    private annotateColumn(col: number) {
        if (!this.autoCrossCompleted) {
            return;
        }

        const solved = this.columnStatus[col];
        for (let row = 0; row < this.height; row++) {
            const cell = this._board.get(row, col);
            if (solved && cell.state === 'empty') {
                this._board.set(row, col, CrossedOutCell);
            } else if (!solved && cell.state === 'crossedOut' && !this.rowStatus[row]) {
                this._board.set(row, col, EmptyCell);
            }
        }
    }

    rowIsSolved(row: number): boolean {
        this._board.checkBounds(row, 0);
        return this.rowStatus[row];
    }

    columnIsSolved(col: number): boolean {
        this._board.checkBounds(0, col);
        return this.columnStatus[col];
    }

    status(): PicrossStatus {
        return { rows: this.rowStatus.slice(), columns: this.columnStatus.slice() };
    }

    isSolved(): boolean {
        return this.rowStatus.every(solved => solved) && this.columnStatus.every(solved => solved);
    }
}
