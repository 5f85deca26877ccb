import { Board, ReadonlyBoard } from './Board';
import { Cell, CrossedOutCell, EmptyCell, filledCell } from './Cell';

export type CellIndex = number;

export interface CellCoords {
    row: number;
    col: number;
}

export const emptyChar = '.';
export const crossedOutChar = '/';

export function cellName(row: number, col: number): string {
    return `R${row + 1}C${col + 1}`;
}

// Renders solved bits as a string of 0s and 1s, e.g. "0110"
export function statusString(bits: readonly boolean[]): string {
    return bits.map(bit => (bit ? '1' : '0')).join('');
}

export function sequenceEqual<T>(arr1: readonly T[], arr2: readonly T[]): boolean {
    if (arr1.length !== arr2.length) {
        return false;
    }

    return arr1.every((value, index) => value === arr2[index]);
}

export function cellChar(cell: Cell<string>): string {
    switch (cell.state) {
        case 'empty':
            return emptyChar;
        case 'crossedOut':
            return crossedOutChar;
        case 'filled':
            return cell.value;
    }
}

// Builds a board from one string per row.
// '.' is an empty cell, '/' is a crossed out cell, and any other character is a cell filled with that character.
export function boardFromRows(rows: readonly string[]): Board<string> {
    const height = rows.length;
    // Counted in characters, not UTF-16 code units
    const width = height > 0 ? Array.from(rows[0]).length : 0;
    const board = new Board<string>(width, height);
    for (let row = 0; row < height; row++) {
        const chars = Array.from(rows[row]);
        if (chars.length !== width) {
            throw new Error(`Row ${row + 1} has ${chars.length} cells, expected ${width}`);
        }
        chars.forEach((char, col) => {
            if (char === emptyChar) {
                board.set(row, col, EmptyCell);
            } else if (char === crossedOutChar) {
                board.set(row, col, CrossedOutCell);
            } else {
                board.set(row, col, filledCell(char));
            }
        });
    }
    return board;
}

export function boardToRows(board: ReadonlyBoard<string>): string[] {
    return Array.from(board.rows(), line => Array.from(line, cellChar).join(''));
}
