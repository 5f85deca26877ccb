// Values placed into cells. They are compared with ===, so only primitives are allowed.
export type CellValue = string | number | boolean;

export type EmptyCellState = { readonly state: 'empty' };
export type CrossedOutCellState = { readonly state: 'crossedOut' };
export type FilledCellState<V extends CellValue> = { readonly state: 'filled'; readonly value: V };

// A cell is either empty, crossed out (marked as definitely not filled), or filled with a value.
export type Cell<V extends CellValue> = EmptyCellState | CrossedOutCellState | FilledCellState<V>;

export const EmptyCell: EmptyCellState = Object.freeze({ state: 'empty' });
export const CrossedOutCell: CrossedOutCellState = Object.freeze({ state: 'crossedOut' });

export function filledCell<V extends CellValue>(value: V): FilledCellState<V> {
    return Object.freeze({ state: 'filled', value });
}

// Empty and crossed out cells never take part in run matching
export function isIgnored<V extends CellValue>(cell: Cell<V>): cell is EmptyCellState | CrossedOutCellState {
    return cell.state !== 'filled';
}

export function cellsEqual<V extends CellValue>(cell1: Cell<V>, cell2: Cell<V>): boolean {
    if (cell1.state === 'filled' && cell2.state === 'filled') {
        return cell1.value === cell2.value;
    }
    return cell1.state === cell2.state;
}
