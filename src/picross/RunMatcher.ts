import { Cell, CellValue, isIgnored } from './Cell';
import { Constraint, ConstraintEntry } from './Puzzle';

// Collects the maximal runs of equal filled values in a line, in order.
// Ignored cells end the current run, and so does a change of value between two adjacent filled cells.
export function findRuns<V extends CellValue>(line: Iterable<Cell<V>>): ConstraintEntry<V>[] {
    const runs: ConstraintEntry<V>[] = [];
    let current: ConstraintEntry<V> | null = null;
    for (const cell of line) {
        if (isIgnored(cell)) {
            current = null;
            continue;
        }

        if (current !== null && current.value === cell.value) {
            current.size++;
        } else {
            current = { value: cell.value, size: 1 };
            runs.push(current);
        }
    }
    return runs;
}

// Whether the runs observed in the line are exactly the constraint's entries, in the same order.
// An empty constraint is satisfied only by a line with no filled cells.
export function lineSatisfies<V extends CellValue>(constraint: Constraint<V>, line: Iterable<Cell<V>>): boolean {
    let entryIndex = 0;
    let runSize = 0;
    let runValue: V | undefined = undefined;

    // Compares the run that just ended against the next expected entry
    const closeRun = (): boolean => {
        if (runSize === 0) {
            return true;
        }
        const entry = constraint[entryIndex];
        if (entry === undefined || entry.value !== runValue || entry.size !== runSize) {
            return false;
        }
        entryIndex++;
        runSize = 0;
        return true;
    };

    for (const cell of line) {
        if (isIgnored(cell)) {
            if (!closeRun()) {
                return false;
            }
            continue;
        }

        if (runSize > 0 && cell.value !== runValue) {
            if (!closeRun()) {
                return false;
            }
        }
        runValue = cell.value;
        runSize++;
    }

    return closeRun() && entryIndex === constraint.length;
}

// The constraint a finished line would need to be solved, i.e. its runs.
export function constraintFromLine<V extends CellValue>(line: Iterable<Cell<V>>): Constraint<V> {
    return Object.freeze(findRuns(line).map(run => Object.freeze(run)));
}
