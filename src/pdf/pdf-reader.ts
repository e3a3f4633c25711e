import { getDocument, OPS } from 'pdfjs-dist/legacy/build/pdf.mjs';
import type { PDFDocumentProxy, PDFPageProxy, TextItem } from 'pdfjs-dist/types/src/display/api.js';

import { DocumentFormatError, errorMessage } from '../errors.js';
import type { PdfPageContent } from '../extract/pdf-records.js';
import { DEFAULT_TABLE_SETTINGS, type Segment, type TableSettings, type Word, findTables, wordsToText } from './table-grid.js';

type Matrix = [number, number, number, number, number, number];

const IDENTITY: Matrix = [1, 0, 0, 1, 0, 0];

const PAINT_OPS = new Set<number>([
  OPS.stroke,
  OPS.closeStroke,
  OPS.fill,
  OPS.eoFill,
  OPS.fillStroke,
  OPS.eoFillStroke,
  OPS.closeFillStroke,
  OPS.closeEOFillStroke,
]);

/** `inner` applied first, then `outer`. */
function multiply(outer: Matrix, inner: Matrix): Matrix {
  return [
    outer[0] * inner[0] + outer[2] * inner[1],
    outer[1] * inner[0] + outer[3] * inner[1],
    outer[0] * inner[2] + outer[2] * inner[3],
    outer[1] * inner[2] + outer[3] * inner[3],
    outer[0] * inner[4] + outer[2] * inner[5] + outer[4],
    outer[1] * inner[4] + outer[3] * inner[5] + outer[5],
  ];
}

function applyMatrix(matrix: Matrix, x: number, y: number): [number, number] {
  return [matrix[0] * x + matrix[2] * y + matrix[4], matrix[1] * x + matrix[3] * y + matrix[5]];
}

function toMatrix(value: unknown): Matrix | null {
  if (!Array.isArray(value) || value.length < 6) {
    return null;
  }
  const numbers = value.slice(0, 6).map(Number);
  if (numbers.some((n) => !Number.isFinite(n))) {
    return null;
  }
  return [numbers[0], numbers[1], numbers[2], numbers[3], numbers[4], numbers[5]];
}

function numberArray(value: unknown): number[] {
  return Array.isArray(value) ? value.map(Number) : [];
}

/**
 * Walks one `constructPath` operator and returns its straight segments in user space.
 * Curves only move the current point.
 */
function pathSegments(ops: number[], coords: number[], ctm: Matrix, pageTop: number): Segment[] {
  const segments: Segment[] = [];
  let cursor = 0;
  let current: [number, number] | null = null;
  let subpathStart: [number, number] | null = null;

  const point = (x: number, y: number): [number, number] => {
    const [ux, uy] = applyMatrix(ctm, x, y);
    return [ux, pageTop - uy];
  };
  const line = (from: [number, number], to: [number, number]) => {
    segments.push({ x0: from[0], top0: from[1], x1: to[0], top1: to[1] });
  };

  for (const op of ops) {
    switch (op) {
      case OPS.moveTo: {
        current = point(coords[cursor], coords[cursor + 1]);
        subpathStart = current;
        cursor += 2;
        break;
      }
      case OPS.lineTo: {
        const next = point(coords[cursor], coords[cursor + 1]);
        if (current) {
          line(current, next);
        }
        current = next;
        cursor += 2;
        break;
      }
      case OPS.curveTo: {
        current = point(coords[cursor + 4], coords[cursor + 5]);
        cursor += 6;
        break;
      }
      case OPS.curveTo2:
      case OPS.curveTo3: {
        current = point(coords[cursor + 2], coords[cursor + 3]);
        cursor += 4;
        break;
      }
      case OPS.closePath: {
        if (current && subpathStart) {
          line(current, subpathStart);
        }
        current = subpathStart;
        break;
      }
      case OPS.rectangle: {
        const x = coords[cursor];
        const y = coords[cursor + 1];
        const width = coords[cursor + 2];
        const height = coords[cursor + 3];
        const a = point(x, y);
        const b = point(x + width, y);
        const c = point(x + width, y + height);
        const d = point(x, y + height);
        line(a, b);
        line(b, c);
        line(c, d);
        line(d, a);
        current = a;
        subpathStart = a;
        cursor += 4;
        break;
      }
      default:
        break;
    }
  }

  return segments;
}

async function pageSegments(page: PDFPageProxy, pageTop: number): Promise<Segment[]> {
  const operatorList = await page.getOperatorList();
  const segments: Segment[] = [];
  const stack: Matrix[] = [];
  let ctm: Matrix = IDENTITY;
  let pending: Segment[] = [];

  operatorList.fnArray.forEach((fn, index) => {
    const args: unknown = operatorList.argsArray[index];

    if (fn === OPS.save) {
      stack.push(ctm);
    } else if (fn === OPS.restore) {
      ctm = stack.pop() ?? IDENTITY;
    } else if (fn === OPS.transform) {
      const matrix = toMatrix(args);
      if (matrix) {
        ctm = multiply(ctm, matrix);
      }
    } else if (fn === OPS.constructPath && Array.isArray(args)) {
      pending.push(...pathSegments(numberArray(args[0]), numberArray(args[1]), ctm, pageTop));
    } else if (PAINT_OPS.has(fn)) {
      segments.push(...pending);
      pending = [];
    } else if (fn === OPS.endPath) {
      pending = [];
    }
  });

  return segments;
}

function isTextItem(item: unknown): item is TextItem {
  return typeof item === 'object' && item !== null && 'str' in item && 'transform' in item;
}

async function pageWords(page: PDFPageProxy, pageTop: number): Promise<Word[]> {
  const content = await page.getTextContent();
  const words: Word[] = [];

  for (const item of content.items) {
    if (!isTextItem(item) || item.str.trim().length === 0) {
      continue;
    }
    const matrix = toMatrix(item.transform);
    if (!matrix) {
      continue;
    }
    const height = item.height > 0 ? item.height : Math.hypot(matrix[2], matrix[3]);
    const baseline = pageTop - matrix[5];
    words.push({
      text: item.str,
      x0: matrix[4],
      x1: matrix[4] + item.width,
      top: baseline - height,
      bottom: baseline,
    });
  }

  return words;
}

/**
 * Loads a PDF and returns, per page, its plain text and the table grids found on it.
 */
export async function readPdfPages(
  bytes: Uint8Array,
  settings: TableSettings = DEFAULT_TABLE_SETTINGS,
): Promise<PdfPageContent[]> {
  let pdf: PDFDocumentProxy;
  try {
    pdf = await getDocument({
      data: new Uint8Array(bytes),
      useSystemFonts: false,
      isEvalSupported: false,
    }).promise;
  } catch (error) {
    throw new DocumentFormatError(`unreadable PDF: ${errorMessage(error)}`, { cause: error });
  }

  try {
    const pages: PdfPageContent[] = [];
    for (let pageNumber = 1; pageNumber <= pdf.numPages; pageNumber += 1) {
      const page = await pdf.getPage(pageNumber);
      const pageTop = page.view[3];
      const [segments, words] = await Promise.all([pageSegments(page, pageTop), pageWords(page, pageTop)]);

      pages.push({
        index: pageNumber - 1,
        text: wordsToText(words, settings.textTolerance),
        tables: findTables(segments, words, settings),
      });
      page.cleanup();
    }
    return pages;
  } finally {
    await pdf.destroy();
  }
}
