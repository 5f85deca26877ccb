// Script that loads puzzles from stdin, replays their solutions, and prints out whether they passed
import * as fs from 'fs';
import * as process from 'process';
import { parseArgs } from 'node:util';
import { parsePuzzlesJson } from './ParsePuzzles';
import { puzzleChecks, runChecksOnPuzzles, serializeCheckFailure } from './PuzzleChecks';

function main(): number {
    const args = parseArgs({
        options: {
            printFailed: { type: 'boolean' },
            printAll: { type: 'boolean' },
            verbose: { type: 'boolean', short: 'v' },
            help: { type: 'boolean', short: 'h' },
        },
        allowPositionals: true,
    });

    if (args.values.help) {
        console.log('Example usage:');
        console.log('    npx tsx tests/CheckPuzzles.ts < puzzles/puzzles.json');
        console.log();
        console.log('Flags:');
        console.log();
        console.log('    --printFailed      Print JSON for failed puzzles, including their failure reason.');
        console.log('                       --verbose can be passed to include replay output.');
        console.log('    --printAll         Print JSON for all puzzles, do not run any checks.');
        console.log('    --verbose, -v      Print replay output in addition to any failed puzzles.');
        console.log('    --help             Print help message.');
        console.log();
        console.log('Positional arguments can be used to filter puzzles by which check they failed.');
        console.log();
        console.log('More examples:');
        console.log();
        console.log('- Get puzzles that failed and store them in `failures.json`:');
        console.log('    npx tsx tests/CheckPuzzles.ts --printFailed < puzzles/puzzles.json > failures.json');
        console.log();
        console.log('- Get all puzzles whose clues do not match their drawn solution:');
        console.log('    npx tsx tests/CheckPuzzles.ts --printFailed CluesMatchSolutionCheck < puzzles/puzzles.json');
        return 0;
    }

    const verbose = args.values.verbose === true;
    const printFailed = args.values.printFailed;
    const printChecks = args.positionals;
    const printAll = args.values.printAll;

    // Validate args
    if (printFailed && printAll) {
        console.log('At most one of --printFailed and --printAll can be used');
        return 1;
    }
    for (const printCheck of printChecks) {
        if (!puzzleChecks.some(check => check.constructor.name === printCheck)) {
            console.log(`Unknown check name: ${printCheck}`);
            return 1;
        }
    }

    // Read puzzles from stdin
    const puzzles = parsePuzzlesJson(fs.readFileSync(0, 'utf-8'));

    // If simply printing all puzzles, skip checks
    if (printAll) {
        console.log(JSON.stringify(puzzles.map(puzzle => puzzle.serialize()).concat([{}]), undefined, 4));
        return 0;
    }

    const [failures, numPuzzlesFailed] = runChecksOnPuzzles(puzzles);

    if (!printFailed) {
        // Just print a summary of how many failures there were for each check
        let numChecksFailed = 0;
        for (const check of puzzleChecks) {
            const checkFailures = failures.get(check.constructor.name) ?? [];
            numChecksFailed += checkFailures.length > 0 ? 1 : 0;
            console.log(`${check.constructor.name}:`, checkFailures.length, 'failed');
        }
        console.log();
        // Don't use format strings so we get coloured numbers on the console
        console.log('Checks:', numChecksFailed, 'failed', puzzleChecks.length - numChecksFailed, 'passed', puzzleChecks.length, 'total');
        console.log('Puzzles:', numPuzzlesFailed, 'failed', puzzles.length - numPuzzlesFailed, 'passed', puzzles.length, 'total');
    } else {
        let collectedFailures: object[] = [];

        const checkNames = printChecks.length === 0 ? Array.from(failures.keys()) : printChecks;
        for (const checkName of checkNames) {
            const checkFailures = failures.get(checkName) ?? [];
            collectedFailures = collectedFailures.concat(checkFailures.map(checkFailure => serializeCheckFailure(checkFailure, verbose)));
        }

        // Add an empty object so we get a trailing comma
        collectedFailures.push({});

        console.log(JSON.stringify(collectedFailures, undefined, 4));
    }

    return numPuzzlesFailed > 0 ? 1 : 0;
}

process.exit(main());
