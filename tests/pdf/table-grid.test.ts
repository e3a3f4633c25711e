import { describe, expect, it } from 'vitest';

import {
  DEFAULT_TABLE_SETTINGS,
  type Segment,
  type Word,
  findTables,
  groupCells,
  wordsToText,
} from '../../src/pdf/table-grid.js';

function horizontal(top: number, x0: number, x1: number): Segment {
  return { x0, top0: top, x1, top1: top };
}

function vertical(x: number, top0: number, top1: number): Segment {
  return { x0: x, top0, x1: x, top1 };
}

function word(text: string, x0: number, x1: number, top: number, bottom: number): Word {
  return { text, x0, x1, top, bottom };
}

/** Two columns (x 0-50-100), two rows (top 0-20-40). */
const GRID: Segment[] = [
  horizontal(0, 0, 100),
  horizontal(20, 0, 100),
  horizontal(40, 0, 100),
  vertical(0, 0, 40),
  vertical(50, 0, 40),
  vertical(100, 0, 40),
];

const WORDS: Word[] = [
  word('ID', 5, 15, 5, 12),
  word('Name', 55, 75, 5, 12),
  word('1', 5, 8, 25, 32),
  word('Alpha', 55, 70, 25, 32),
  word('Beta', 72, 85, 25, 32),
  word('Gamma', 55, 75, 33, 39),
];

describe('findTables', () => {
  it('builds rows and columns from ruling lines', () => {
    expect(findTables(GRID, WORDS)).toEqual([
      [
        ['ID', 'Name'],
        ['1', 'Alpha Beta\nGamma'],
      ],
    ]);
  });

  it('returns null for cells without text', () => {
    expect(findTables(GRID, [])).toEqual([
      [
        [null, null],
        [null, null],
      ],
    ]);
  });

  it('absorbs jitter within the snap tolerance and joins split lines', () => {
    const jittered: Segment[] = [
      horizontal(0, 0, 100),
      horizontal(20, 0, 100),
      horizontal(40, 0, 60),
      horizontal(40.5, 62, 100),
      vertical(0, 0, 40),
      vertical(50, 0, 20),
      vertical(51.5, 20, 40),
      vertical(100, 0, 40),
    ];

    const tables = findTables(jittered, WORDS);

    expect(tables).toEqual([
      [
        ['ID', 'Name'],
        ['1', 'Alpha Beta\nGamma'],
      ],
    ]);
  });

  it('does not treat a single box as a table', () => {
    const box: Segment[] = [horizontal(0, 0, 100), horizontal(20, 0, 100), vertical(0, 0, 20), vertical(100, 0, 20)];

    expect(findTables(box, [word('Title', 10, 40, 5, 12)])).toEqual([]);
  });

  it('returns separate tables top to bottom', () => {
    const lower = GRID.map((segment) => ({ ...segment, top0: segment.top0 + 100, top1: segment.top1 + 100 }));

    const tables = findTables([...lower, ...GRID], [word('Top', 5, 20, 5, 12), word('Bottom', 5, 30, 105, 112)]);

    expect(tables).toHaveLength(2);
    expect(tables[0][0][0]).toBe('Top');
    expect(tables[1][0][0]).toBe('Bottom');
  });

});

describe('findTables with the text strategy', () => {
  const TEXT_SETTINGS = { ...DEFAULT_TABLE_SETTINGS, verticalStrategy: 'text', horizontalStrategy: 'text' } as const;

  /** Three aligned columns (x0 10, 110, 210) over three lines (top 100, 120, 140), no ruling lines. */
  const ALIGNED: Word[] = [100, 120, 140].flatMap((top, row) =>
    [10, 110, 210].map((x0, column) => word(`r${row + 1}c${column + 1}`, x0, x0 + 40, top, top + 10)),
  );

  it('derives rows and columns from word alignment', () => {
    expect(findTables([], ALIGNED, TEXT_SETTINGS)).toEqual([
      [
        ['r1c1', 'r1c2', 'r1c3'],
        ['r2c1', 'r2c2', 'r2c3'],
        ['r3c1', 'r3c2', 'r3c3'],
      ],
    ]);
  });

  it('combines text columns with ruled rows', () => {
    const rows: Segment[] = [horizontal(100, 0, 300), horizontal(130, 0, 300), horizontal(150, 0, 300)];

    const tables = findTables(rows, ALIGNED, { ...DEFAULT_TABLE_SETTINGS, verticalStrategy: 'text' });

    expect(tables).toEqual([
      [
        ['r1c1\nr2c1', 'r1c2\nr2c2', 'r1c3\nr2c3'],
        ['r3c1', 'r3c2', 'r3c3'],
      ],
    ]);
  });

  it('finds no columns when too few words line up', () => {
    expect(findTables([], ALIGNED.slice(0, 6), TEXT_SETTINGS)).toEqual([]);
  });
});

describe('groupCells', () => {
  it('groups cells that share a corner', () => {
    const groups = groupCells([
      { x0: 0, top: 0, x1: 10, bottom: 10 },
      { x0: 10, top: 0, x1: 20, bottom: 10 },
      { x0: 50, top: 50, x1: 60, bottom: 60 },
    ]);

    expect(groups).toEqual([
      [
        { x0: 0, top: 0, x1: 10, bottom: 10 },
        { x0: 10, top: 0, x1: 20, bottom: 10 },
      ],
    ]);
  });
});

describe('wordsToText', () => {
  it('orders words into lines and separates spaced words', () => {
    const text = wordsToText(
      [word('B.', 10, 20, 100, 110), word('GROUP', 22, 60, 101, 110), word('Senarai', 10, 50, 80, 90)],
      DEFAULT_TABLE_SETTINGS.textTolerance,
    );

    expect(text).toBe('Senarai\nB. GROUP');
  });

  it('joins touching fragments without a space', () => {
    expect(wordsToText([word('KD', 0, 10, 0, 8), word('N', 10, 15, 0, 8)], 5)).toBe('KDN');
  });
});
