import * as lz from 'lz-string';
import { PuzzleDefinitionError } from '../Errors';
import { PuzzleDefinition, parsePuzzleDefinition } from './PuzzleDefinition';

// Compact, URL-friendly form of a definition: its JSON compressed with lz-string and written as base64.
export function encodePuzzle(definition: PuzzleDefinition): string {
    return lz.compressToBase64(JSON.stringify(definition));
}

export function decodePuzzle(encoded: string): PuzzleDefinition {
    const json = lz.decompressFromBase64(encoded.trim());
    if (!json) {
        throw new PuzzleDefinitionError('Encoded puzzle could not be decompressed');
    }

    let data: unknown;
    try {
        data = JSON.parse(json);
    } catch (error) {
        const reason = error instanceof Error ? error.message : String(error);
        throw new PuzzleDefinitionError(`Encoded puzzle is not valid JSON: ${reason}`);
    }
    return parsePuzzleDefinition(data);
}
