import type { RawTable } from '../extract/column-schema.js';

/**
 * Page geometry uses top-down coordinates: `top` grows towards the bottom of the page.
 */
export interface Segment {
  x0: number;
  top0: number;
  x1: number;
  top1: number;
}

export interface Word {
  text: string;
  x0: number;
  x1: number;
  top: number;
  bottom: number;
}

export type GridStrategy = 'lines' | 'text';

export interface TableSettings {
  verticalStrategy: GridStrategy;
  horizontalStrategy: GridStrategy;
  snapTolerance: number;
  joinTolerance: number;
  textTolerance: number;
  intersectionTolerance: number;
  edgeMinLength: number;
  /** `text` strategy: words a column alignment needs before it becomes an edge */
  minWordsVertical: number;
  /** `text` strategy: words a line needs before its top becomes an edge */
  minWordsHorizontal: number;
}

export const DEFAULT_TABLE_SETTINGS: TableSettings = {
  verticalStrategy: 'lines',
  horizontalStrategy: 'lines',
  snapTolerance: 5,
  joinTolerance: 5,
  textTolerance: 5,
  intersectionTolerance: 3,
  edgeMinLength: 3,
  minWordsVertical: 3,
  minWordsHorizontal: 1,
};

interface Edge {
  id: number;
  orientation: 'h' | 'v';
  /** y for horizontal edges, x for vertical ones */
  pos: number;
  start: number;
  end: number;
}

interface Point {
  x: number;
  y: number;
  hEdges: Set<number>;
  vEdges: Set<number>;
}

export interface Cell {
  x0: number;
  top: number;
  x1: number;
  bottom: number;
}

const AXIS_EPSILON = 1;

const WORD_ALIGN_TOLERANCE = 1;

function toEdges(segments: readonly Segment[]): Edge[] {
  const edges: Edge[] = [];

  for (const segment of segments) {
    if (Math.abs(segment.top0 - segment.top1) <= AXIS_EPSILON) {
      edges.push({
        id: 0,
        orientation: 'h',
        pos: (segment.top0 + segment.top1) / 2,
        start: Math.min(segment.x0, segment.x1),
        end: Math.max(segment.x0, segment.x1),
      });
    } else if (Math.abs(segment.x0 - segment.x1) <= AXIS_EPSILON) {
      edges.push({
        id: 0,
        orientation: 'v',
        pos: (segment.x0 + segment.x1) / 2,
        start: Math.min(segment.top0, segment.top1),
        end: Math.max(segment.top0, segment.top1),
      });
    }
  }

  return edges;
}

/** Clusters sorted values whose neighbours lie within `tolerance`; returns the mean per value. */
function clusterPositions(values: number[], tolerance: number): Map<number, number> {
  const sorted = [...new Set(values)].sort((a, b) => a - b);
  const snapped = new Map<number, number>();
  let group: number[] = [];

  const flush = () => {
    if (group.length === 0) {
      return;
    }
    const mean = group.reduce((sum, value) => sum + value, 0) / group.length;
    for (const value of group) {
      snapped.set(value, mean);
    }
    group = [];
  };

  for (const value of sorted) {
    if (group.length > 0 && value - group[group.length - 1] > tolerance) {
      flush();
    }
    group.push(value);
  }
  flush();

  return snapped;
}

/** Groups items whose sorted keys lie within `tolerance` of their neighbour. */
function clusterBy<T>(items: readonly T[], key: (item: T) => number, tolerance: number): T[][] {
  const sorted = [...items].sort((a, b) => key(a) - key(b));
  const clusters: T[][] = [];

  for (const item of sorted) {
    const cluster = clusters[clusters.length - 1];
    if (cluster && key(item) - key(cluster[cluster.length - 1]) <= tolerance) {
      cluster.push(item);
    } else {
      clusters.push([item]);
    }
  }

  return clusters;
}

function wordsBounds(words: readonly Word[]): Cell {
  return {
    x0: Math.min(...words.map((word) => word.x0)),
    top: Math.min(...words.map((word) => word.top)),
    x1: Math.max(...words.map((word) => word.x1)),
    bottom: Math.max(...words.map((word) => word.bottom)),
  };
}

function boundsOverlap(a: Cell, b: Cell): boolean {
  const width = Math.min(a.x1, b.x1) - Math.max(a.x0, b.x0);
  const height = Math.min(a.bottom, b.bottom) - Math.max(a.top, b.top);
  return width >= 0 && height >= 0 && width + height > 0;
}

/**
 * Virtual row separators: the top of every text line with enough words, plus the
 * bottom of the last one, each spanning the full width of those lines.
 */
function textHorizontalEdges(words: readonly Word[], minWords: number): Edge[] {
  const rows = clusterBy(words, (word) => word.top, WORD_ALIGN_TOLERANCE)
    .filter((cluster) => cluster.length >= minWords)
    .map(wordsBounds);
  if (rows.length === 0) {
    return [];
  }

  const start = Math.min(...rows.map((row) => row.x0));
  const end = Math.max(...rows.map((row) => row.x1));
  const edges: Edge[] = rows.map((row) => ({ id: 0, orientation: 'h', pos: row.top, start, end }));
  edges.push({ id: 0, orientation: 'h', pos: Math.max(...rows.map((row) => row.bottom)), start, end });
  return edges;
}

/**
 * Virtual column separators from words sharing a left edge, right edge or centre.
 * The largest alignments win; overlapping ones are dropped. Each kept column adds
 * an edge at its left side and the rightmost column also closes the grid.
 */
function textVerticalEdges(words: readonly Word[], minWords: number): Edge[] {
  const alignments = [
    ...clusterBy(words, (word) => word.x0, WORD_ALIGN_TOLERANCE),
    ...clusterBy(words, (word) => word.x1, WORD_ALIGN_TOLERANCE),
    ...clusterBy(words, (word) => (word.x0 + word.x1) / 2, WORD_ALIGN_TOLERANCE),
  ]
    .filter((cluster) => cluster.length >= minWords)
    .sort((a, b) => b.length - a.length);

  const columns: Cell[] = [];
  for (const cluster of alignments) {
    const bounds = wordsBounds(cluster);
    if (!columns.some((column) => boundsOverlap(column, bounds))) {
      columns.push(bounds);
    }
  }
  if (columns.length === 0) {
    return [];
  }

  columns.sort((a, b) => a.x0 - b.x0);
  const start = Math.min(...columns.map((column) => column.top));
  const end = Math.max(...columns.map((column) => column.bottom));
  const edges: Edge[] = columns.map((column) => ({ id: 0, orientation: 'v', pos: column.x0, start, end }));
  edges.push({ id: 0, orientation: 'v', pos: Math.max(...columns.map((column) => column.x1)), start, end });
  return edges;
}

function snapEdges(edges: readonly Edge[], tolerance: number): Edge[] {
  const result: Edge[] = [];

  for (const orientation of ['h', 'v'] as const) {
    const subset = edges.filter((edge) => edge.orientation === orientation);
    const snapped = clusterPositions(
      subset.map((edge) => edge.pos),
      tolerance,
    );
    for (const edge of subset) {
      result.push({ ...edge, pos: snapped.get(edge.pos) ?? edge.pos });
    }
  }

  return result;
}

function joinEdges(edges: readonly Edge[], tolerance: number): Edge[] {
  const byLine = new Map<string, Edge[]>();
  for (const edge of edges) {
    const key = `${edge.orientation}:${edge.pos}`;
    const line = byLine.get(key) ?? [];
    line.push(edge);
    byLine.set(key, line);
  }

  const joined: Edge[] = [];
  for (const line of byLine.values()) {
    line.sort((a, b) => a.start - b.start);
    let current = { ...line[0] };
    for (const edge of line.slice(1)) {
      if (edge.start <= current.end + tolerance) {
        current.end = Math.max(current.end, edge.end);
      } else {
        joined.push(current);
        current = { ...edge };
      }
    }
    joined.push(current);
  }

  return joined.map((edge, index) => ({ ...edge, id: index }));
}

function findIntersections(edges: readonly Edge[], tolerance: number): Map<string, Point> {
  const horizontals = edges.filter((edge) => edge.orientation === 'h');
  const verticals = edges.filter((edge) => edge.orientation === 'v');
  const points = new Map<string, Point>();

  for (const v of verticals) {
    for (const h of horizontals) {
      const crosses =
        v.pos >= h.start - tolerance &&
        v.pos <= h.end + tolerance &&
        h.pos >= v.start - tolerance &&
        h.pos <= v.end + tolerance;
      if (!crosses) {
        continue;
      }

      const key = pointKey(v.pos, h.pos);
      const point = points.get(key) ?? { x: v.pos, y: h.pos, hEdges: new Set<number>(), vEdges: new Set<number>() };
      point.hEdges.add(h.id);
      point.vEdges.add(v.id);
      points.set(key, point);
    }
  }

  return points;
}

function pointKey(x: number, y: number): string {
  return `${x}|${y}`;
}

function shares(a: Set<number>, b: Set<number>): boolean {
  for (const id of a) {
    if (b.has(id)) {
      return true;
    }
  }
  return false;
}

/** Smallest rectangles whose four corners are intersections joined by edges. */
function intersectionsToCells(points: Map<string, Point>): Cell[] {
  const ordered = [...points.values()].sort((a, b) => a.y - b.y || a.x - b.x);
  const cells: Cell[] = [];

  for (const point of ordered) {
    const below = ordered.filter((other) => other.x === point.x && other.y > point.y);
    const right = ordered.filter((other) => other.y === point.y && other.x > point.x);

    search: for (const bottomLeft of below) {
      if (!shares(point.vEdges, bottomLeft.vEdges)) {
        continue;
      }
      for (const topRight of right) {
        if (!shares(point.hEdges, topRight.hEdges)) {
          continue;
        }
        const corner = points.get(pointKey(topRight.x, bottomLeft.y));
        if (corner && shares(corner.vEdges, topRight.vEdges) && shares(corner.hEdges, bottomLeft.hEdges)) {
          cells.push({ x0: point.x, top: point.y, x1: topRight.x, bottom: bottomLeft.y });
          break search;
        }
      }
    }
  }

  return cells;
}

function cellCorners(cell: Cell): string[] {
  return [
    pointKey(cell.x0, cell.top),
    pointKey(cell.x1, cell.top),
    pointKey(cell.x0, cell.bottom),
    pointKey(cell.x1, cell.bottom),
  ];
}

/** Groups cells that share a corner; single-cell groups are not tables. */
export function groupCells(cells: readonly Cell[]): Cell[][] {
  const parent = cells.map((_cell, index) => index);
  const find = (index: number): number => {
    let root = index;
    while (parent[root] !== root) {
      root = parent[root];
    }
    parent[index] = root;
    return root;
  };

  const owner = new Map<string, number>();
  cells.forEach((cell, index) => {
    for (const corner of cellCorners(cell)) {
      const seen = owner.get(corner);
      if (seen === undefined) {
        owner.set(corner, index);
      } else {
        parent[find(index)] = find(seen);
      }
    }
  });

  const groups = new Map<number, Cell[]>();
  cells.forEach((cell, index) => {
    const root = find(index);
    const group = groups.get(root) ?? [];
    group.push(cell);
    groups.set(root, group);
  });

  const bounds = (group: Cell[]) => ({
    top: Math.min(...group.map((cell) => cell.top)),
    x0: Math.min(...group.map((cell) => cell.x0)),
  });

  return [...groups.values()]
    .filter((group) => group.length > 1)
    .sort((a, b) => bounds(a).top - bounds(b).top || bounds(a).x0 - bounds(b).x0);
}

function centreInside(word: Word, cell: Cell): boolean {
  const cx = (word.x0 + word.x1) / 2;
  const cy = (word.top + word.bottom) / 2;
  return cx >= cell.x0 && cx <= cell.x1 && cy >= cell.top && cy <= cell.bottom;
}

/**
 * Lays words out as text: lines are words whose tops lie within `tolerance` of the
 * line's first word, ordered left to right and separated by newlines.
 */
export function wordsToText(words: readonly Word[], tolerance: number): string {
  const sorted = [...words].sort((a, b) => a.top - b.top || a.x0 - b.x0);
  const lines: Word[][] = [];

  for (const word of sorted) {
    const line = lines[lines.length - 1];
    if (line && Math.abs(word.top - line[0].top) <= tolerance) {
      line.push(word);
    } else {
      lines.push([word]);
    }
  }

  return lines
    .map((line) => {
      line.sort((a, b) => a.x0 - b.x0);
      let text = '';
      let previous: Word | null = null;
      for (const word of line) {
        const needsSpace =
          previous !== null &&
          word.x0 - previous.x1 > 0.5 &&
          !/\s$/.test(text) &&
          !/^\s/.test(word.text);
        text += needsSpace ? ` ${word.text}` : word.text;
        previous = word;
      }
      return text.replace(/\s+/g, ' ').trim();
    })
    .filter((line) => line.length > 0)
    .join('\n');
}

function tableToRows(cells: readonly Cell[], words: readonly Word[], tolerance: number): RawTable {
  const columns = [...new Set(cells.map((cell) => cell.x0))].sort((a, b) => a - b);
  const rowTops = [...new Set(cells.map((cell) => cell.top))].sort((a, b) => a - b);

  return rowTops.map((top) => {
    const rowCells = cells.filter((cell) => cell.top === top);
    return columns.map((x0) => {
      const cell = rowCells.find((candidate) => candidate.x0 === x0);
      if (!cell) {
        return null;
      }
      const text = wordsToText(
        words.filter((word) => centreInside(word, cell)),
        tolerance,
      );
      return text.length > 0 ? text : null;
    });
  });
}

/**
 * Grid detection: collect edges per axis (ruling lines, or text alignment for the
 * `text` strategy), then snap, join, intersect, build cells and group into tables.
 */
export function findTables(
  segments: readonly Segment[],
  words: readonly Word[],
  settings: TableSettings = DEFAULT_TABLE_SETTINGS,
): RawTable[] {
  const ruled = toEdges(segments);
  const candidates = [
    ...(settings.horizontalStrategy === 'lines'
      ? ruled.filter((edge) => edge.orientation === 'h')
      : textHorizontalEdges(words, settings.minWordsHorizontal)),
    ...(settings.verticalStrategy === 'lines'
      ? ruled.filter((edge) => edge.orientation === 'v')
      : textVerticalEdges(words, settings.minWordsVertical)),
  ];

  const edges = joinEdges(snapEdges(candidates, settings.snapTolerance), settings.joinTolerance).filter(
    (edge) => edge.end - edge.start >= settings.edgeMinLength,
  );
  const points = findIntersections(edges, settings.intersectionTolerance);
  const tables = groupCells(intersectionsToCells(points));

  return tables.map((cells) => tableToRows(cells, words, settings.textTolerance));
}
