export type GridSide = 'source' | 'target';

export interface RowAlignment {
  rowIndices: number[];
  sourceRowCount: number;
  targetRowCount: number;
}
