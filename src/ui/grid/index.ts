/**
 * Grid 모듈
 */

export { SheetGrid } from './SheetGrid';
export type { SheetGridOptions } from './SheetGrid';
export { GridCell } from './GridCell';
export { hitTest, locateIndex } from './layout';
export type { HitTestContext } from './layout';
