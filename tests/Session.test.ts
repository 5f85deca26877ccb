import { default as PicrossSession, SessionResult } from '../src/index';
import { CrossedOutCell, EmptyCell, filledCell } from '../src/picross/Cell';
import { PuzzleDefinition } from '../src/picross/Definition/PuzzleDefinition';
import { encodePuzzle } from '../src/picross/Definition/PuzzleEncoding';
import { OutOfBoundsError } from '../src/picross/Errors';
import { barsSolution } from './TestUtility';

const barsDefinition: PuzzleDefinition = {
    title: 'Bars',
    rows: [[[2, '#']], [[1, '#'], [1, '#']], [[2, '#']]],
    columns: [[[1, '#']], [[1, '#'], [1, '#']], [[1, '#'], [1, '#']], [[1, '#']], []],
};

function createSession(): [PicrossSession, SessionResult[]] {
    const messages: SessionResult[] = [];
    return [new PicrossSession(result => messages.push(result)), messages];
}

describe('PicrossSession', () => {
    it('reports the status of a loaded puzzle', () => {
        const [session, messages] = createSession();
        expect(session.load({ puzzle: barsDefinition })).toBe(true);
        expect(messages).toEqual([
            {
                result: 'loaded',
                title: 'Bars',
                width: 5,
                height: 3,
                rowStatus: [false, false, false],
                columnStatus: [false, false, false, false, true],
                solved: false,
            },
        ]);
    });

    it('loads encoded puzzles', () => {
        const [session, messages] = createSession();
        expect(session.load({ puzzle: encodePuzzle(barsDefinition) })).toBe(true);
        expect(messages[0].result).toBe('loaded');
        expect(session.game?.width).toBe(5);
    });

    it('reports invalid definitions instead of throwing', () => {
        const [session, messages] = createSession();
        expect(session.load({ puzzle: { rows: [[[0, '#']]], columns: [] } })).toBe(false);
        expect(session.load({ puzzle: { height: 2, rows: [[]], columns: [[]] } })).toBe(false);
        expect(session.load({ puzzle: '  ' })).toBe(false);
        expect(messages).toEqual([
            { result: 'invalid', reason: 'puzzle.rows[0][0] size must be a positive integer: 0' },
            { result: 'invalid', reason: 'Puzzle declares a height of 2 but has 1 row constraints' },
            { result: 'invalid', reason: 'Encoded puzzle could not be decompressed' },
        ]);
        expect(session.game).toBeNull();
    });

    it('reports the cells each move changed', () => {
        const [session, messages] = createSession();
        session.load({ puzzle: barsDefinition });

        expect(session.place('#', 0, 1)).toBe(false);
        expect(messages[1]).toEqual({
            result: 'update',
            row: 0,
            col: 1,
            changes: [{ row: 0, col: 1, cell: filledCell('#') }],
            width: 5,
            height: 3,
            rowStatus: [false, false, false],
            columnStatus: [false, false, false, false, true],
            solved: false,
        });

        session.place('#', 0, 2);
        const update = messages[2];
        expect(update.result === 'update' && update.changes).toEqual([
            { row: 0, col: 0, cell: CrossedOutCell },
            { row: 0, col: 2, cell: filledCell('#') },
            { row: 0, col: 3, cell: CrossedOutCell },
        ]);
    });

    it('reports each time the puzzle becomes solved', () => {
        const [session, messages] = createSession();
        session.load({ puzzle: barsDefinition });
        for (const [row, col] of barsSolution) {
            session.place('#', row, col);
        }
        expect(messages[messages.length - 1]).toEqual({ result: 'solved' });

        expect(session.place('#', 0, 4)).toBe(false);
        expect(session.clear(0, 4)).toBe(true);
        expect(messages.filter(message => message.result === 'solved')).toHaveLength(2);
        expect(session.game?.get(0, 4)).toEqual(CrossedOutCell);
    });

    it('passes options to the game', () => {
        const [session] = createSession();
        session.load({ puzzle: barsDefinition, options: { autoCrossCompleted: false } });
        expect(session.game?.get(0, 4)).toEqual(EmptyCell);
        session.crossOut(1, 1);
        expect(session.game?.get(1, 1)).toEqual(CrossedOutCell);
    });

    it('rejects moves before a puzzle is loaded', () => {
        const [session] = createSession();
        expect(() => session.place('#', 0, 0)).toThrow('No puzzle has been loaded');
    });

    it('rejects moves outside of the board without reporting them', () => {
        const [session, messages] = createSession();
        session.load({ puzzle: barsDefinition });
        expect(() => session.crossOut(3, 0)).toThrow(OutOfBoundsError);
        expect(messages).toHaveLength(1);
    });
});
