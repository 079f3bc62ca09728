import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { InputError, loadGameData, loadLegacyMoves } from './input';
import { WireWriter, creatureTemplate, typeTemplate } from './testing/wireWriter';

let dir: string;

beforeEach(() => {
  dir = fs.mkdtempSync(path.join(os.tmpdir(), 'moveset-ranker-'));
});

afterEach(() => {
  fs.rmSync(dir, { recursive: true, force: true });
});

function writeFile(name: string, contents: string | Uint8Array): string {
  const filePath = path.join(dir, name);
  fs.writeFileSync(filePath, contents);
  return filePath;
}

function gameMaster(): Uint8Array {
  const writer = new WireWriter();
  typeTemplate(writer, { id: 1, name: 'NORMAL', multipliers: [1] });
  const base = { types: [1], attack: 100, defense: 100, stamina: 100, fast: [], charged: [] };
  creatureTemplate(writer, { ...base, id: 1, name: 'BLOB' });
  creatureTemplate(writer, { ...base, id: 2, name: 'MEWTWO' });
  return writer.finish();
}

function inputErrorOf(fn: () => unknown): InputError {
  try {
    fn();
  } catch (error) {
    if (error instanceof InputError) return error;
    throw error;
  }
  throw new Error('expected an InputError');
}

describe('loadGameData', () => {
  it('reads a game master and applies the exclusion list', () => {
    const input = writeFile('gm.bin', gameMaster());
    const exclude = writeFile('exclude.txt', '# legendaries\nmewtwo\n');

    const gameData = loadGameData(input, exclude);

    expect([...gameData.creatures.keys()]).toEqual([1]);
  });

  it('reports a missing game master', () => {
    const input = path.join(dir, 'missing.bin');
    expect(inputErrorOf(() => loadGameData(input)).message).toBe(`File not found: ${input}`);
  });

  it('reports a missing exclusion list', () => {
    const input = writeFile('gm.bin', gameMaster());
    const exclude = path.join(dir, 'missing.txt');

    expect(inputErrorOf(() => loadGameData(input, exclude)).message).toBe(
      `Exclusion list not found: ${exclude}`,
    );
  });

  it('reports a game master whose outer message is malformed', () => {
    // item template declaring 16 bytes with one present
    const input = writeFile('gm.bin', new Uint8Array([0x12, 0x10, 0x01]));

    expect(inputErrorOf(() => loadGameData(input)).message).toBe(
      `Could not decode ${input}: Invalid message: field 2 declares 16 bytes, 1 left at position 0`,
    );
  });
});

describe('loadLegacyMoves', () => {
  it('reads the legacy move pairs', () => {
    const legacy = writeFile('legacy.txt', 'BLOB TACKLE\n');
    expect(loadLegacyMoves(legacy)).toEqual([{ creature: 'BLOB', ability: 'TACKLE' }]);
  });

  it('reports a missing legacy list', () => {
    const legacy = path.join(dir, 'missing.txt');
    expect(inputErrorOf(() => loadLegacyMoves(legacy)).message).toBe(
      `Legacy move list not found: ${legacy}`,
    );
  });

  it('reports a malformed legacy line with the file it came from', () => {
    const legacy = writeFile('legacy.txt', 'BLOB\n');
    expect(inputErrorOf(() => loadLegacyMoves(legacy)).message).toBe(
      `${legacy}: Invalid legacy move line: "BLOB"`,
    );
  });
});
