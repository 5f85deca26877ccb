import { Cell, CellValue, EmptyCell } from './Cell';
import { OutOfBoundsError } from './Errors';
import { CellCoords, CellIndex } from './PicrossUtility';

// A view over one row or column of a board. Obtaining one is O(1): it reads through to the
// board's backing array using a start offset and a stride, so it always reflects the latest cells.
export class BoardLine<V extends CellValue> implements Iterable<Cell<V>> {
    private cells: readonly Cell<V>[];
    private start: CellIndex;
    private stride: number;
    readonly length: number;

    constructor(cells: readonly Cell<V>[], start: CellIndex, stride: number, length: number) {
        this.cells = cells;
        this.start = start;
        this.stride = stride;
        this.length = length;
    }

    get(index: number): Cell<V> {
        if (!Number.isInteger(index) || index < 0 || index >= this.length) {
            throw new RangeError(`Line index ${index} is outside of a line of length ${this.length}`);
        }
        return this.cells[this.start + index * this.stride];
    }

    *[Symbol.iterator](): IterableIterator<Cell<V>> {
        for (let i = 0; i < this.length; i++) {
            yield this.cells[this.start + i * this.stride];
        }
    }

    toArray(): Cell<V>[] {
        return Array.from(this);
    }
}

export class Board<V extends CellValue> {
    readonly width: number;
    readonly height: number;
    // Row-major: index = row * width + col
    private items: Cell<V>[];

    constructor(width: number, height: number) {
        if (!Number.isInteger(width) || !Number.isInteger(height) || width < 0 || height < 0) {
            throw new RangeError(`Invalid board size ${width}x${height}`);
        }
        this.width = width;
        this.height = height;
        this.items = new Array<Cell<V>>(width * height).fill(EmptyCell);
    }

    cellIndex(row: number, col: number): CellIndex {
        this.checkBounds(row, col);
        return row * this.width + col;
    }

    cellCoords(cellIndex: CellIndex): CellCoords {
        return { row: Math.floor(cellIndex / this.width), col: cellIndex % this.width };
    }

    inBounds(row: number, col: number): boolean {
        return Number.isInteger(row) && Number.isInteger(col) && row >= 0 && col >= 0 && row < this.height && col < this.width;
    }

    checkBounds(row: number, col: number) {
        if (!this.inBounds(row, col)) {
            throw new OutOfBoundsError(row, col, this.width, this.height);
        }
    }

    get(row: number, col: number): Cell<V> {
        return this.items[this.cellIndex(row, col)];
    }

    // The only write path into the board
    set(row: number, col: number, cell: Cell<V>) {
        this.items[this.cellIndex(row, col)] = cell;
    }

    row(index: number): BoardLine<V> {
        if (!Number.isInteger(index) || index < 0 || index >= this.height) {
            throw new OutOfBoundsError(index, 0, this.width, this.height);
        }
        return new BoardLine(this.items, index * this.width, 1, this.width);
    }

    column(index: number): BoardLine<V> {
        if (!Number.isInteger(index) || index < 0 || index >= this.width) {
            throw new OutOfBoundsError(0, index, this.width, this.height);
        }
        return new BoardLine(this.items, index, this.width, this.height);
    }

    *rows(): IterableIterator<BoardLine<V>> {
        for (let row = 0; row < this.height; row++) {
            yield this.row(row);
        }
    }

    *columns(): IterableIterator<BoardLine<V>> {
        for (let col = 0; col < this.width; col++) {
            yield this.column(col);
        }
    }

    *cells(): IterableIterator<[number, number, Cell<V>]> {
        for (let cellIndex = 0; cellIndex < this.items.length; cellIndex++) {
            const { row, col } = this.cellCoords(cellIndex);
            yield [row, col, this.items[cellIndex]];
        }
    }
}

export type ReadonlyBoard<V extends CellValue> = Omit<Board<V>, 'set'>;
