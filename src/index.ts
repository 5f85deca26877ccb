import { Cell, cellsEqual } from './picross/Cell';
import { PuzzleDefinition, parsePuzzleDefinition } from './picross/Definition/PuzzleDefinition';
import { decodePuzzle } from './picross/Definition/PuzzleEncoding';
import { PuzzleDefinitionError, PuzzleShapeError } from './picross/Errors';
import { Picross, PicrossOptions } from './picross/Picross';
import { buildPuzzle } from './picross/PuzzleBuilder';

export * from './picross/Board';
export * from './picross/Cell';
export * from './picross/Definition/PuzzleDefinition';
export * from './picross/Definition/PuzzleEncoding';
export * from './picross/Errors';
export * from './picross/Picross';
export * from './picross/PicrossUtility';
export * from './picross/Puzzle';
export * from './picross/PuzzleBuilder';
export * from './picross/RunMatcher';

// A definition object, or its encoded string form
export type SessionInputData = { puzzle: PuzzleDefinition | string; options?: PicrossOptions };

export type CellChange = { row: number; col: number; cell: Cell<string> };

export type SessionStatus = {
    width: number;
    height: number;
    rowStatus: boolean[];
    columnStatus: boolean[];
    solved: boolean;
};

export type SessionResult =
    | { result: 'invalid'; reason: string }
    | ({ result: 'loaded'; title?: string; author?: string } & SessionStatus)
    | ({ result: 'update'; row: number; col: number; changes: CellChange[] } & SessionStatus)
    | { result: 'solved' };

/**
 * Plays a puzzle on behalf of a front end. Results of every call are delivered through the message callback.
 */
class PicrossSession {
    messageCallback: (result: SessionResult) => void;
    game: Picross<string> | null = null;

    constructor(messageCallback: (result: SessionResult) => void) {
        this.messageCallback = messageCallback;
    }

    /**
     * Starts a new game. An invalid definition is reported as an 'invalid' message rather than thrown.
     * @param data - The puzzle definition (or its encoded form) and the game options.
     * @returns Whether the puzzle was loaded.
     */
    load(data: SessionInputData): boolean {
        let definition: PuzzleDefinition;
        let game: Picross<string>;
        try {
            definition = typeof data.puzzle === 'string' ? decodePuzzle(data.puzzle) : parsePuzzleDefinition(data.puzzle);
            game = new Picross(buildPuzzle(definition), data.options || {});
        } catch (error) {
            if (error instanceof PuzzleDefinitionError || error instanceof PuzzleShapeError) {
                this.messageCallback({ result: 'invalid', reason: error.message });
                return false;
            }
            throw error;
        }

        this.game = game;
        this.messageCallback({
            result: 'loaded',
            ...(definition.title !== undefined ? { title: definition.title } : {}),
            ...(definition.author !== undefined ? { author: definition.author } : {}),
            ...this.status(game),
        });
        return true;
    }

    /**
     * Fills the cell at `row` and `col` with `value`.
     * @returns Whether the puzzle is solved afterwards.
     */
    place(value: string, row: number, col: number): boolean {
        return this.applyMove(row, col, game => game.place(value, row, col));
    }

    crossOut(row: number, col: number): boolean {
        return this.applyMove(row, col, game => game.crossOut(row, col));
    }

    clear(row: number, col: number): boolean {
        return this.applyMove(row, col, game => game.clear(row, col));
    }

    private applyMove(row: number, col: number, move: (game: Picross<string>) => boolean): boolean {
        const game = this.requireGame();
        game.board.checkBounds(row, col);

        // A move only ever touches the cells of its own row and column
        const before = this.lineCells(game, row, col);
        const wasSolved = game.isSolved();
        const solved = move(game);
        const changes = this.lineCells(game, row, col).filter(change => {
            const previous = before.find(other => other.row === change.row && other.col === change.col);
            return previous === undefined || !cellsEqual(previous.cell, change.cell);
        });

        this.messageCallback({ result: 'update', row, col, changes, ...this.status(game) });
        if (solved && !wasSolved) {
            this.messageCallback({ result: 'solved' });
        }
        return solved;
    }

    private lineCells(game: Picross<string>, row: number, col: number): CellChange[] {
        const cells: CellChange[] = [];
        for (let c = 0; c < game.width; c++) {
            cells.push({ row, col: c, cell: game.get(row, c) });
        }
        for (let r = 0; r < game.height; r++) {
            if (r !== row) {
                cells.push({ row: r, col, cell: game.get(r, col) });
            }
        }
        return cells;
    }

    private requireGame(): Picross<string> {
        if (this.game === null) {
            throw new Error('No puzzle has been loaded');
        }
        return this.game;
    }

    private status(game: Picross<string>): SessionStatus {
        const { rows, columns } = game.status();
        return { width: game.width, height: game.height, rowStatus: rows, columnStatus: columns, solved: game.isSolved() };
    }
}

export default PicrossSession;
