import { mkdtemp, readFile, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { Readable } from 'node:stream';
import { setTimeout as delay } from 'node:timers/promises';
import { fileURLToPath } from 'node:url';
import { describe, it, expect, beforeAll, afterAll, vi } from 'vitest';

import { EntryKind } from '../src/constants/constants.js';
import {
  DbcIoError,
  DbcMissingContextError,
  DbcUnsupportedEntryError,
} from '../src/errors.js';
import { DbcLibrary } from '../src/library.js';
import { logger } from '../src/logger.js';
import { parseEntry, parseFrameDefinition } from '../src/parser/entry-parser.js';

const FIXTURE = fileURLToPath(new URL('./fixtures/sample.dbc', import.meta.url));
const MISSING = fileURLToPath(new URL('./fixtures/does-not-exist.dbc', import.meta.url));

const EEC1 = 2364539904;
const CCVS1 = 2566844926;
const MSG = [0x11, 0x22, 0x33, 0x44, 0x55, 0x66, 0x77, 0x88];

function entry(line: string) {
  const parsed = parseEntry(line);
  if (!parsed) throw new Error(`fixture line did not parse: ${line}`);
  return parsed;
}

beforeAll(() => {
  vi.spyOn(console, 'error').mockImplementation(() => undefined);
});

afterAll(() => {
  vi.restoreAllMocks();
});

describe('DbcLibrary.addEntry', () => {
  it('refuses a signal definition before any frame', () => {
    const lib = new DbcLibrary();
    expect(() => lib.addEntry(entry(' SG_ A : 0|8@1+ (1,0) [0|255] "" E'))).toThrow(
      DbcMissingContextError
    );
    expect(lib.isEmpty()).toBe(true);
    expect(lib.lastFrameId).toBeNull();
  });

  it('refuses entries outside the frame model', () => {
    const lib = new DbcLibrary();
    expect(() => lib.addEntry({ kind: EntryKind.VERSION, version: '1.0' })).toThrow(
      DbcUnsupportedEntryError
    );
    expect(() => lib.addEntry({ kind: EntryKind.BUS_CONFIGURATION, speed: 250 })).toThrow(
      'Unsupported entry: BusConfiguration'
    );
    expect(() => lib.addEntry({ kind: EntryKind.UNKNOWN, rawText: 'NS_ :' })).toThrow(
      'Unsupported entry: Unknown'
    );
    expect(lib.size).toBe(0);
  });

  it('attaches a signal definition to the last frame touched', () => {
    const lib = new DbcLibrary();
    lib.addEntry(entry('BO_ 1 First : 8 E'));
    lib.addEntry(entry('BO_ 2 Second : 8 E'));
    lib.addEntry(entry('CM_ SG_ 1 Described "touches frame 1";'));
    expect(lib.lastFrameId).toBe(1);

    lib.addEntry(entry(' SG_ Late : 0|8@1+ (1,0) [0|255] "" E'));
    expect(lib.getFrame(1)?.signalNames).toEqual(['Described', 'Late']);
    expect(lib.getFrame(2)?.signalCount).toBe(0);
  });

  it('creates a frame from a signal-only entry and fills it in later', () => {
    const lib = new DbcLibrary();
    lib.addEntry(entry('BA_ "SPN" SG_ 7 Speed 84;'));
    expect(lib.getFrame(7)?.name).toBe('');

    lib.addEntry(entry('BO_ 7 CCVS : 8 ECU1'));
    const frame = lib.getFrame(7);
    expect(frame?.name).toBe('CCVS');
    expect(frame?.getSignal('Speed')?.getAttribute('SPN')).toBe('84');
    expect(lib.size).toBe(1);
  });

  it('finds signals by name across frames', () => {
    const lib = new DbcLibrary();
    lib.addEntry(entry('BO_ 1 First : 8 E'));
    lib.addEntry(entry(' SG_ Shared : 0|8@1+ (1,0) [0|255] "" E'));
    lib.addEntry(entry('BO_ 2 Second : 8 E'));
    lib.addEntry(entry(' SG_ Shared : 8|8@1+ (1,0) [0|255] "" E'));
    lib.addEntry(entry(' SG_ Only : 16|8@1+ (1,0) [0|255] "" E'));

    expect(lib.getSignal('Shared')?.layout?.startBit).toBe(0);
    expect(lib.getSignal('Only')?.layout?.startBit).toBe(16);
    expect(lib.getSignal('Nope')).toBeUndefined();
    expect(lib.frameIds).toEqual([1, 2]);
  });
});

describe('DbcLibrary.fromText', () => {
  it('skips unparsed lines and rejected entries', async () => {
    const source = await readFile(FIXTURE, 'latin1');
    const lib = new DbcLibrary();
    expect(lib.mergeText(source)).toEqual({ lines: 18, added: 13, untokenized: 3, rejected: 2 });
    expect(lib.frameIds).toEqual([EEC1, CCVS1]);
  });

  it('never throws on content', () => {
    const lib = DbcLibrary.fromText(' SG_ Orphan : 0|8@1+ (1,0) [0|255] "" E\nVERSION ""\ngarbage');
    expect(lib.isEmpty()).toBe(true);
  });

  it('uses a custom tokenizer', async () => {
    const source = await readFile(FIXTURE, 'latin1');
    const lib = DbcLibrary.fromText(source, { tokenizer: parseFrameDefinition });
    expect(lib.size).toBe(2);
    expect(lib.getFrame(EEC1)?.signalCount).toBe(0);
  });
});

describe('DbcLibrary.fromFile', () => {
  it('loads the sample database', async () => {
    const lib = await DbcLibrary.fromFile(FIXTURE);
    const eec1 = lib.getFrame(EEC1);

    expect(eec1?.name).toBe('EEC1');
    expect(eec1?.sender).toBe('ECU1');
    expect(eec1?.description).toBe('Engine controller 1');
    expect(eec1?.getAttribute('SingleFrame')).toBe('0');
    expect(eec1?.getSignal('Engine_Speed')?.description).toBe('Actual engine speed.');
    expect(eec1?.getSignal('Torque_Mode')?.describeValue(15)).toBe('Not available');
    expect(lib.getSignal('Vehicle_Speed')?.longName).toBe('Wheel_Based_Vehicle_Speed');
    expect(lib.getSignal('Engine_Speed')?.layout?.receivers).toBe('DASH');
    expect(lib.lastFrameId).toBe(EEC1);
  });

  it('fails with the underlying error code for a missing file', async () => {
    await expect(DbcLibrary.fromFile(MISSING)).rejects.toBeInstanceOf(DbcIoError);
    await expect(DbcLibrary.fromFile(MISSING)).rejects.toMatchObject({
      name: 'DbcIoError',
      code: 'ENOENT',
      path: MISSING,
    });
  });

  describe('encoding', () => {
    let dir: string;
    let file: string;

    beforeAll(async () => {
      dir = await mkdtemp(join(tmpdir(), 'candb-'));
      file = join(dir, 'degrees.dbc');
      // "Temp °C" with ° as the single Latin-1 byte 0xB0
      const line = Buffer.concat([
        Buffer.from('CM_ BO_ 100 "Temp ', 'ascii'),
        Buffer.from([0xb0]),
        Buffer.from('C";\n', 'ascii'),
      ]);
      await writeFile(file, line);
    });

    afterAll(async () => {
      await rm(dir, { recursive: true, force: true });
    });

    it('reads Latin-1 by default', async () => {
      const lib = await DbcLibrary.fromFile(file);
      expect(lib.getFrame(100)?.description).toBe('Temp °C');
    });

    it('replaces invalid bytes when reading as UTF-8', async () => {
      const lib = await DbcLibrary.fromFile(file, { encoding: 'utf8' });
      expect(lib.getFrame(100)?.description).toBe('Temp \uFFFDC');
    });

    it('streams with the configured encoding', async () => {
      const lib = new DbcLibrary();
      await lib.loadFile(file);
      expect(lib.getFrame(100)?.description).toBe('Temp °C');
    });
  });
});

describe('DbcLibrary streaming', () => {
  it('merges a line stream', async () => {
    const lib = new DbcLibrary();
    const report = await lib.loadStream(
      Readable.from(['BO_ 10 Msg : 8 E\n', ' SG_ Sig : 0|8@1+ (2,1) [0|511] "" E\n'])
    );
    expect(report).toEqual({ lines: 2, added: 2, untokenized: 0, rejected: 0 });
    expect(lib.decodeCanFrame({ id: 10, data: [3] })).toEqual(new Map([['Sig', 7]]));
  });

  it('streams a file into an existing library', async () => {
    const lib = new DbcLibrary();
    lib.addEntry(entry('BO_ 5 Existing : 8 E'));
    const report = await lib.loadFile(FIXTURE);
    expect(report).toEqual({ lines: 18, added: 13, untokenized: 3, rejected: 2 });
    expect(lib.frameIds).toEqual([5, EEC1, CCVS1]);
  });

  it('fails with DbcIoError for a missing file', async () => {
    const lib = new DbcLibrary();
    await expect(lib.loadFile(MISSING)).rejects.toMatchObject({ code: 'ENOENT' });
  });

  it('passes tokenizer failures through unwrapped and releases the lock', async () => {
    const lib = new DbcLibrary(new Map(), {
      tokenizer: line => {
        if (line.startsWith('BOOM')) throw new TypeError('tokenizer bug');
        return parseEntry(line);
      },
    });

    const failed = lib.loadStream(Readable.from(['BO_ 1 A : 8 E\n', 'BOOM\n']));
    await expect(failed).rejects.toThrow(TypeError);
    await expect(failed).rejects.not.toBeInstanceOf(DbcIoError);

    const report = await lib.loadStream(Readable.from(['BO_ 2 B : 8 E\n']));
    expect(report.added).toBe(1);
    expect(lib.frameIds).toEqual([1, 2]);
  });

  it('runs concurrent loads one after another', async () => {
    async function* slowSource(id: number, signal: string) {
      yield `BO_ ${id} Frame${id} : 8 E\n`;
      await delay(10);
      yield ` SG_ ${signal} : 0|8@1+ (1,0) [0|255] "" E\n`;
    }

    const lib = new DbcLibrary();
    await Promise.all([
      lib.loadStream(Readable.from(slowSource(1, 'First'))),
      lib.loadStream(Readable.from(slowSource(2, 'Second'))),
    ]);

    expect(lib.getFrame(1)?.signalNames).toEqual(['First']);
    expect(lib.getFrame(2)?.signalNames).toEqual(['Second']);
  });
});

describe('DbcLibrary.decodeCanFrame', () => {
  it('decodes every signal of a known frame', async () => {
    const lib = await DbcLibrary.fromFile(FIXTURE);
    expect(lib.decodeCanFrame({ id: EEC1, data: MSG })).toEqual(
      new Map([
        ['Engine_Speed', 2728.5],
        ['Torque_Mode', 1],
      ])
    );
    expect(lib.decodeCanFrame({ id: CCVS1, data: Uint8Array.from(MSG) })).toEqual(
      new Map([['Vehicle_Speed', 51.1328125]])
    );
  });

  it('traces the payload of frames it has no definition for', () => {
    const seen = vi.fn();
    vi.spyOn(console, 'debug').mockImplementation(() => undefined);
    const lib = new DbcLibrary(new Map(), { logLevel: 'trace' });
    logger.watch(seen);
    try {
      expect(lib.decodeCanFrame({ id: 0x123, data: [0x00, 0xa9, 0xe8] })).toBeNull();
    } finally {
      logger.clearWatch();
      logger.setLevelFor('DbcLibrary', 'error');
    }
    expect(seen).toHaveBeenCalledWith({
      level: 'trace',
      args: ['No definition for frame, payload 00a9e8'],
      context: { frameId: 0x123, logger: 'DbcLibrary' },
    });
  });

  it('returns null for unknown IDs and empty payloads', async () => {
    const lib = await DbcLibrary.fromFile(FIXTURE);
    expect(lib.decodeCanFrame({ id: 0x123, data: MSG })).toBeNull();
    expect(lib.decodeCanFrame({ id: EEC1, data: [] })).toBeNull();
  });
});
