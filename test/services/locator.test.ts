import { describe, it, expect } from 'vitest';
import {
  alignRows,
  commonColumns,
  producePairs,
  readCell,
  resolveColumns,
} from '../../src/services/locator/index.js';
import type { Grid } from '../../src/domain/types.js';

const source: Grid = {
  columns: ['Item', 'Price', 'Qty', 'Note'],
  rows: [
    { Item: 'Apples', Price: 10, Qty: '2', Note: null },
    { Item: 'Pears', Price: 'n/a', Qty: null, Note: 'seasonal' },
  ],
};

const target: Grid = {
  columns: ['Item', 'Price', 'Qty', 'Note'],
  rows: [
    { Item: 'Apples', Price: 5.11, Qty: '1.02', Note: null },
    { Item: 'Pears', Price: 'n/a', Qty: null, Note: 'seasonal' },
  ],
};

describe('resolveColumns', () => {
  it('infers columns with at least one numeric source cell, in source order', () => {
    const result = resolveColumns(source, target, { mode: 'all' });
    expect(result).toEqual({ ok: true, value: ['Price', 'Qty'] });
  });

  it('keeps inferred columns the target lacks', () => {
    const narrowTarget: Grid = { columns: ['Item', 'Price'], rows: [] };
    const result = resolveColumns(source, narrowTarget, { mode: 'all' });
    expect(result).toEqual({ ok: true, value: ['Price', 'Qty'] });
  });

  it('returns explicit columns in the requested order', () => {
    const result = resolveColumns(source, target, { mode: 'explicit', columns: ['Qty', 'Price'] });
    expect(result).toEqual({ ok: true, value: ['Qty', 'Price'] });
  });

  it('collapses repeated explicit columns', () => {
    const result = resolveColumns(source, target, { mode: 'explicit', columns: ['Price', 'Qty', 'Price'] });
    expect(result).toEqual({ ok: true, value: ['Price', 'Qty'] });
  });

  it('fails with UNKNOWN_COLUMN when the source lacks a column', () => {
    const result = resolveColumns(source, target, { mode: 'explicit', columns: ['Price', 'Total'] });
    expect(result.ok).toBe(false);
    if (result.ok) return;
    expect(result.error.code).toBe('UNKNOWN_COLUMN');
    expect(result.error.message).toBe("Column 'Total' not found in source report");
    expect(result.error.details).toBe('Available source columns: Item, Price, Qty, Note');
  });

  it('fails with UNKNOWN_COLUMN when the target lacks a column', () => {
    const narrowTarget: Grid = { columns: ['Item', 'Price'], rows: [] };
    const result = resolveColumns(source, narrowTarget, { mode: 'explicit', columns: ['Qty'] });
    expect(result.ok).toBe(false);
    if (result.ok) return;
    expect(result.error.code).toBe('UNKNOWN_COLUMN');
    expect(result.error.message).toBe("Column 'Qty' not found in target report");
  });

  it('fails with EMPTY_COLUMN_SELECTION for an empty explicit list', () => {
    const result = resolveColumns(source, target, { mode: 'explicit', columns: [] });
    expect(result.ok).toBe(false);
    if (result.ok) return;
    expect(result.error.code).toBe('EMPTY_COLUMN_SELECTION');
  });
});

describe('alignRows', () => {
  it('pairs every row when counts match', () => {
    expect(alignRows(source, target)).toEqual({ rowIndices: [0, 1], sourceRowCount: 2, targetRowCount: 2 });
  });

  it('covers only the overlapping rows when counts differ', () => {
    const shortTarget: Grid = { columns: target.columns, rows: target.rows.slice(0, 1) };
    expect(alignRows(source, shortTarget)).toEqual({ rowIndices: [0], sourceRowCount: 2, targetRowCount: 1 });
  });
});

describe('producePairs', () => {
  it('yields pairs row-major in column order', () => {
    const pairs = [...producePairs(source, target, ['Qty', 'Price'], alignRows(source, target))];
    expect(pairs).toEqual([
      { rowIndex: 0, column: 'Qty', sourceRaw: '2', targetRaw: '1.02' },
      { rowIndex: 0, column: 'Price', sourceRaw: 10, targetRaw: 5.11 },
      { rowIndex: 1, column: 'Qty', sourceRaw: null, targetRaw: null },
      { rowIndex: 1, column: 'Price', sourceRaw: 'n/a', targetRaw: 'n/a' },
    ]);
  });

  it('reads a column missing from the target as null', () => {
    const narrowTarget: Grid = { columns: ['Item'], rows: [{ Item: 'Apples' }] };
    const pairs = [...producePairs(source, narrowTarget, ['Price'], alignRows(source, narrowTarget))];
    expect(pairs).toEqual([{ rowIndex: 0, column: 'Price', sourceRaw: 10, targetRaw: null }]);
  });
});

describe('readCell', () => {
  it('ignores inherited properties', () => {
    expect(readCell({}, 'constructor')).toBeNull();
  });

  it('reads undefined rows as null', () => {
    expect(readCell(undefined, 'Price')).toBeNull();
  });
});

describe('commonColumns', () => {
  it('lists shared columns in source order', () => {
    const other: Grid = { columns: ['Qty', 'Total', 'Item'], rows: [] };
    expect(commonColumns(source, other)).toEqual(['Item', 'Qty']);
  });
});
