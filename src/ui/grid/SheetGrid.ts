/**
 * SheetGrid - 메모리 기반 그리드 표면
 *
 * SelectableGrid 계약의 기본 구현입니다.
 * 데이터 소스에서 행/컬럼 수를 읽어 셀 핸들을 만들고,
 * 레이아웃을 이용해 좌표를 셀 주소로 변환합니다.
 *
 * @example
 * const grid = new SheetGrid({ dataSource: model, layout: { columnWidth: 120 } });
 * grid.resolveCoordinateToCell({ x: 130, y: 70 }); // { row: 1, column: 1 }
 */

import type {
  CellAddress,
  GridDataSource,
  GridPoint,
  SelectableGrid,
} from '../../types';
import type { ResolvedLayout, SheetLayoutOptions } from '../types';
import { resolveLayout } from '../utils/configAdapter';
import { GridCell } from './GridCell';
import { hitTest, spanOf } from './layout';

/**
 * SheetGrid 설정
 */
export interface SheetGridOptions {
  /** 행/컬럼 수 제공자 */
  dataSource: GridDataSource;
  /** 레이아웃 */
  layout?: SheetLayoutOptions;
}

export class SheetGrid implements SelectableGrid {
  private readonly dataSource: GridDataSource;
  private readonly layout: ResolvedLayout;

  private cells: GridCell[][] = [];
  private columns = 0;
  private contentOffset: GridPoint = { x: 0, y: 0 };

  constructor(options: SheetGridOptions) {
    this.dataSource = options.dataSource;
    this.layout = resolveLayout(options.layout);
    this.refreshFromModel();
  }

  // ===========================================================================
  // SelectableGrid
  // ===========================================================================

  get cellCountPerRow(): number {
    return this.columns;
  }

  get rowCount(): number {
    return this.cells.length;
  }

  cellAt(row: number, column: number): GridCell | undefined {
    return this.cells[row]?.[column];
  }

  resolveCoordinateToCell(point: GridPoint): CellAddress | null {
    return hitTest(point, {
      rowCount: this.rowCount,
      columnCount: this.columns,
      layout: this.layout,
      contentOffset: this.contentOffset,
    });
  }

  /**
   * 데이터 소스에서 크기를 다시 읽고 셀을 재생성
   *
   * 셀의 선택/하이라이트 상태는 모두 초기화됩니다.
   */
  refreshFromModel(): void {
    const rows = this.readCount(this.dataSource.numberOfRows(), 'numberOfRows');
    const columns = this.readCount(this.dataSource.numberOfColumns(), 'numberOfColumns');

    this.columns = columns;
    this.cells = Array.from({ length: rows }, (_, row) =>
      Array.from({ length: columns }, (_, column) => new GridCell(row, column))
    );
  }

  // ===========================================================================
  // 스크롤 / 좌표
  // ===========================================================================

  /**
   * 스크롤 오프셋 설정 (음수는 0으로)
   */
  setContentOffset(offset: GridPoint): void {
    this.contentOffset = {
      x: Math.max(0, offset.x),
      y: Math.max(0, offset.y),
    };
  }

  getContentOffset(): GridPoint {
    return { ...this.contentOffset };
  }

  /**
   * 셀 중앙의 뷰포트 좌표 (범위 밖이면 null)
   */
  centerOfCell(row: number, column: number): GridPoint | null {
    if (!this.cellAt(row, column)) return null;

    const { layout, contentOffset } = this;
    const x = spanOf(column, contentOffset.x, layout.widthForColumn, layout.frozenColumns);
    const y = spanOf(row, contentOffset.y, layout.heightForRow, layout.frozenRows);

    return { x: x.start + x.size / 2, y: y.start + y.size / 2 };
  }

  // ===========================================================================
  // Private
  // ===========================================================================

  private readCount(value: number, name: string): number {
    if (!Number.isInteger(value) || value < 0) {
      console.warn(`[SheetGrid] ${name}() returned ${value}; treating as 0`);
      return 0;
    }
    return value;
  }
}
