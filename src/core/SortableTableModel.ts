/**
 * SortableTableModel - 정렬 가능한 문자열 테이블 모델
 *
 * RowActionsDelegate와 GridDataSource를 함께 구현하는 기본 협력자입니다.
 * - 같은 컬럼을 다시 정렬하면 방향이 바뀌고, 다른 컬럼은 오름차순으로 시작
 * - 정렬은 Arquero orderby로 순서 인덱스를 구한 뒤 행 배열을 재배치
 * - 행 식별자는 식별 컬럼(기본 0)의 문자열, 비교는 ===
 * - 선택/길게 누르기 알림은 이벤트로 발행
 *
 * @example
 * const model = new SortableTableModel({
 *   header: ['Name', 'City'],
 *   rows: [['Kim', 'Seoul'], ['Lee', 'Busan']],
 * });
 * model.on('rowSelected', ({ row, values }) => console.log(row, values));
 * const sheet = new SingleRowSheet({ dataSource: model, delegate: model });
 */

import * as aq from 'arquero';
import { SimpleEventEmitter } from './SimpleEventEmitter';
import type {
  GridDataSource,
  RowActionsDelegate,
  SortDirection,
  SortState,
  TableModelEvents,
} from '../types';

/**
 * 정렬 방향 표시 기호
 */
const SORT_SYMBOLS: Record<SortDirection, string> = {
  asc: '▲',
  desc: '▼',
};

/**
 * SortableTableModel 설정
 */
export interface SortableTableModelOptions {
  /** 헤더 라벨 (컬럼 수 결정) */
  header: readonly string[];
  /** 데이터 행 */
  rows: readonly (readonly string[])[];
  /**
   * 식별자로 사용할 컬럼
   * @default 0
   */
  identityColumn?: number;
  /** 초기 정렬 상태 (데이터는 이미 이 순서라고 가정) */
  initialSort?: SortState | null;
}

/**
 * Arquero 테이블 컬럼 키
 */
function columnKey(column: number): string {
  return `c${column}`;
}

export class SortableTableModel
  extends SimpleEventEmitter<TableModelEvents>
  implements RowActionsDelegate<string | undefined>, GridDataSource
{
  private readonly header: string[];
  private readonly identityColumn: number;
  private rows: string[][];
  private sort: SortState | null;

  constructor(options: SortableTableModelOptions) {
    super();

    const identityColumn = options.identityColumn ?? 0;
    if (!Number.isInteger(identityColumn) || identityColumn < 0 || identityColumn >= options.header.length) {
      throw new Error(
        `SortableTableModel: identityColumn ${identityColumn} is outside 0..${options.header.length - 1}`
      );
    }

    this.header = [...options.header];
    this.identityColumn = identityColumn;
    this.rows = options.rows.map((row) => [...row]);
    this.sort = options.initialSort ? { ...options.initialSort } : null;
  }

  // ===========================================================================
  // GridDataSource
  // ===========================================================================

  numberOfColumns(): number {
    return this.header.length;
  }

  /** 헤더 행 포함 */
  numberOfRows(): number {
    return 1 + this.rows.length;
  }

  // ===========================================================================
  // RowActionsDelegate
  // ===========================================================================

  /**
   * 컬럼 정렬
   *
   * 같은 컬럼이면 방향 반전, 아니면 오름차순.
   */
  sortBy(column: number): void {
    if (!this.isColumn(column)) {
      console.warn(`[SortableTableModel] sortBy: column ${column} out of range`);
      return;
    }

    const direction: SortDirection =
      this.sort?.column === column && this.sort.direction === 'asc' ? 'desc' : 'asc';
    this.sort = { column, direction };

    // 행이 0~1개면 순서가 바뀌지 않음
    if (this.rows.length > 1) {
      this.rows = this.orderRows(column, direction);
    }

    this.emit('sorted', { ...this.sort });
  }

  didSelectRow(row: number): void {
    this.emit('rowSelected', { row, values: this.rowValues(row) });
  }

  longPressStart(row: number): void {
    this.emit('longPressStarted', { row, values: this.rowValues(row) });
  }

  longPressEnd(row: number): void {
    this.emit('longPressEnded', { row, values: this.rowValues(row) });
  }

  /**
   * 행 식별자 (범위 밖이면 undefined)
   */
  identityForRow(row: number): string | undefined {
    return this.rows[row - 1]?.[this.identityColumn];
  }

  /**
   * 식별자가 없는 행(범위 밖, 식별자 컬럼까지 닿지 않는 짧은 행)은 어떤 행과도 같지 않음
   */
  identitiesEqual(a: string | undefined, b: string | undefined): boolean {
    return a !== undefined && a === b;
  }

  // ===========================================================================
  // 표시용 텍스트
  // ===========================================================================

  /**
   * 헤더 라벨 (정렬된 컬럼은 ▲/▼ 표시)
   */
  headerText(column: number): string {
    const label = this.header[column] ?? '';
    if (this.sort?.column !== column) return label;
    return `${label} ${SORT_SYMBOLS[this.sort.direction]}`;
  }

  /**
   * 셀 텍스트 (행 0은 헤더)
   */
  cellText(row: number, column: number): string {
    if (row === 0) return this.headerText(column);
    return this.rows[row - 1]?.[column] ?? '';
  }

  // ===========================================================================
  // 데이터 접근 / 변경
  // ===========================================================================

  getSortState(): SortState | null {
    return this.sort ? { ...this.sort } : null;
  }

  getRows(): string[][] {
    return this.rows.map((row) => [...row]);
  }

  /**
   * 전체 행 교체 (정렬 상태는 유지, 재정렬은 하지 않음)
   */
  setRows(rows: readonly (readonly string[])[]): void {
    this.rows = rows.map((row) => [...row]);
  }

  /**
   * 셀 값 변경
   *
   * @param row - 데이터 행 인덱스 (1부터)
   */
  updateCell(row: number, column: number, value: string): void {
    const target = this.rows[row - 1];
    if (row < 1 || !target || !this.isColumn(column)) {
      throw new Error(`SortableTableModel: cell (${row}, ${column}) does not exist`);
    }
    target[column] = value;
  }

  // ===========================================================================
  // Private
  // ===========================================================================

  private orderRows(column: number, direction: SortDirection): string[][] {
    const key = columnKey(column);
    const records = this.rows.map((row) =>
      Object.fromEntries(this.header.map((_, index) => [columnKey(index), row[index] ?? '']))
    );

    const ordered = aq
      .from(records)
      .orderby(direction === 'desc' ? aq.desc(key) : key)
      .indices();

    const rows = this.rows;
    return Array.from(ordered, (index) => rows[index]);
  }

  private rowValues(row: number): readonly string[] {
    const values = this.rows[row - 1];
    return values ? [...values] : [];
  }

  private isColumn(column: number): boolean {
    return Number.isInteger(column) && column >= 0 && column < this.header.length;
  }
}
