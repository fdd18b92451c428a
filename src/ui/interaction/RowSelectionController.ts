/**
 * RowSelectionController - 단일 행 선택 및 정렬 후 재선택
 *
 * 입력(탭/길게 누르기)을 행 선택, 헤더 정렬, 길게 누르기 알림으로 변환합니다.
 * - 한 번에 하나의 데이터 행만 선택 (행 0은 헤더)
 * - 헤더 탭: 선택 행의 식별자 저장 → 정렬 → 다시 그리기 → 같은 식별자의 행 재선택
 * - 길게 누르기: 누르는 동안은 하이라이트만, 손을 뗄 때 선택 + 알림
 *
 * 선택 상태를 따로 캐시하지 않고 그리드 셀의 선택 플래그를 그대로 조회하므로
 * 컨트롤러와 그리드의 선택 상태가 어긋나지 않습니다.
 */

import { SimpleEventEmitter } from '../../core/SimpleEventEmitter';
import type {
  CellAddress,
  GridPoint,
  LongPressEvent,
  RowActionsDelegate,
  RowSelectionEvents,
  SelectableGrid,
  SelectedRow,
} from '../../types';

/**
 * RowSelectionController 설정
 */
export interface RowSelectionControllerOptions<Identity> {
  /** 선택 대상 그리드 */
  grid: SelectableGrid;
  /** 협력자 (없으면 입력 처리는 no-op) */
  delegate?: RowActionsDelegate<Identity> | null;
}

/**
 * 헤더 행 인덱스
 */
const HEADER_ROW = 0;

/**
 * 단일 행 선택 컨트롤러
 *
 * @template Identity - 협력자가 돌려주는 행 식별자 타입
 */
export class RowSelectionController<Identity> extends SimpleEventEmitter<RowSelectionEvents> {
  private readonly grid: SelectableGrid;
  private delegate: RowActionsDelegate<Identity> | null;

  // 진행 중인 길게 누르기 대상 (헤더일 수도 있음)
  private pressTarget: CellAddress | null = null;

  constructor(options: RowSelectionControllerOptions<Identity>) {
    super();
    this.grid = options.grid;
    this.delegate = options.delegate ?? null;
  }

  // ===========================================================================
  // 협력자
  // ===========================================================================

  /**
   * 협력자 연결/해제
   *
   * 해제 시 진행 중인 길게 누르기도 잊습니다.
   */
  setDelegate(delegate: RowActionsDelegate<Identity> | null): void {
    this.delegate = delegate;
    if (!delegate) {
      this.pressTarget = null;
    }
  }

  get hasDelegate(): boolean {
    return this.delegate !== null;
  }

  // ===========================================================================
  // 탭 (activation)
  // ===========================================================================

  /**
   * 탭 처리
   *
   * 헤더면 정렬 후 재선택, 데이터 행이면 선택 후 didSelectRow 알림.
   * 셀 밖이거나 협력자가 없으면 아무것도 하지 않습니다.
   */
  handleActivation(point: GridPoint): void {
    const address = this.grid.resolveCoordinateToCell(point);
    if (!address) return;

    const delegate = this.delegate;
    if (!delegate) return;

    if (address.row === HEADER_ROW) {
      this.sortByHeader(delegate, address.column);
      return;
    }

    if (this.selectRow(address.row)) {
      delegate.didSelectRow(address.row);
    }
  }

  // ===========================================================================
  // 길게 누르기
  // ===========================================================================

  /**
   * 길게 누르기 단계별 처리
   */
  handleLongPress(event: LongPressEvent): void {
    switch (event.phase) {
      case 'start':
        this.beginLongPress(event.point);
        break;
      case 'changed':
        this.updateLongPress(event.point);
        break;
      case 'end':
        this.endLongPress(event.point);
        break;
      case 'other':
        this.cancelLongPress();
        break;
    }
  }

  /**
   * 길게 누르기 시작
   *
   * 데이터 행이면 모든 선택/하이라이트를 지우고 그 행만 하이라이트합니다.
   * 헤더면 대상만 기억합니다 (손을 뗄 때 정렬).
   */
  beginLongPress(point: GridPoint): void {
    const delegate = this.delegate;
    if (!delegate) return;

    const address = this.grid.resolveCoordinateToCell(point);
    this.pressTarget = address;
    if (!address || address.row === HEADER_ROW) return;

    this.deselectAll();
    this.clearHighlights();
    this.setHighlight(address.row, true);
    delegate.longPressStart?.(address.row);
  }

  /**
   * 누른 채 이동 - 다른 데이터 행으로 옮겨가면 하이라이트도 옮김
   */
  updateLongPress(point: GridPoint): void {
    const target = this.pressTarget;
    if (!this.delegate || !target || target.row === HEADER_ROW) return;

    const address = this.grid.resolveCoordinateToCell(point);
    if (!address || address.row === HEADER_ROW || address.row === target.row) return;

    this.setHighlight(target.row, false);
    this.setHighlight(address.row, true);
    this.pressTarget = address;
  }

  /**
   * 길게 누르기 종료
   *
   * 누름은 시작한 영역 안에서만 끝납니다.
   * - 셀 밖에서 시작: 알림 없이 종료
   * - 데이터 행에서 시작: 뗀 위치가 데이터 행이면 그 행, 아니면 마지막 대상 행.
   *   selectRow → didSelectRow → longPressEnd (각 1회, 이 순서)
   * - 헤더에서 시작: 뗀 위치가 헤더면 그 컬럼, 셀 밖이면 누른 컬럼으로 정렬.
   *   데이터 행 위에서 떼면 알림 없이 종료
   */
  endLongPress(point: GridPoint): void {
    const previous = this.pressTarget;
    this.pressTarget = null;

    const delegate = this.delegate;
    if (!delegate || !previous) return;

    const released = this.grid.resolveCoordinateToCell(point);

    if (previous.row === HEADER_ROW) {
      if (!released) {
        this.sortByHeader(delegate, previous.column);
      } else if (released.row === HEADER_ROW) {
        this.sortByHeader(delegate, released.column);
      }
      return;
    }

    this.setHighlight(previous.row, false);

    const row = released && this.isDataRow(released.row) ? released.row : previous.row;
    if (this.selectRow(row)) {
      delegate.didSelectRow(row);
      delegate.longPressEnd(row);
    }
  }

  /**
   * 길게 누르기 취소 - 하이라이트만 되돌리고 알림은 없음
   */
  cancelLongPress(): void {
    const previous = this.pressTarget;
    this.pressTarget = null;

    if (previous && previous.row !== HEADER_ROW) {
      this.setHighlight(previous.row, false);
    }
  }

  /**
   * 진행 중인 길게 누르기 대상 행
   */
  getPressedRow(): SelectedRow {
    return this.pressTarget?.row ?? null;
  }

  // ===========================================================================
  // 선택
  // ===========================================================================

  /**
   * 행 선택 (다른 행은 모두 해제)
   *
   * @returns 선택했으면 true, 헤더/범위 밖이면 false
   */
  selectRow(row: number): boolean {
    if (!this.isDataRow(row)) return false;

    this.clearSelectionFlags();
    const columns = this.grid.cellCountPerRow;
    for (let column = 0; column < columns; column++) {
      this.grid.cellAt(row, column)?.setSelected(true);
    }

    this.emit('selectionChanged', { row });
    return true;
  }

  /**
   * 모든 셀 선택 해제
   */
  deselectAll(): void {
    this.clearSelectionFlags();
    this.emit('selectionChanged', { row: null });
  }

  /**
   * 현재 선택된 행
   *
   * 데이터 행의 첫 번째 셀(컬럼 0)이 선택된 첫 행을 돌려줍니다.
   */
  currentSelectedRow(): SelectedRow {
    const rowCount = this.grid.rowCount;
    for (let row = 1; row < rowCount; row++) {
      if (this.grid.cellAt(row, 0)?.isSelected) {
        return row;
      }
    }
    return null;
  }

  /**
   * 식별자로 행 재선택
   *
   * 데이터 행을 오름차순으로 훑어 처음 일치하는 행을 선택합니다.
   * 일치하는 행이 없거나 데이터 행이 없으면 선택을 모두 해제합니다.
   *
   * @returns 선택했으면 true
   */
  reselect(identity: Identity): boolean {
    const delegate = this.delegate;
    if (!delegate) return false;

    const rowCount = this.grid.rowCount;
    for (let row = 1; row < rowCount; row++) {
      if (delegate.identitiesEqual(identity, delegate.identityForRow(row))) {
        return this.selectRow(row);
      }
    }

    this.deselectAll();
    return false;
  }

  // ===========================================================================
  // 하이라이트
  // ===========================================================================

  /**
   * 행의 모든 셀 하이라이트 on/off (선택과 무관)
   */
  setHighlight(row: number, on: boolean): void {
    if (row < 0 || row >= this.grid.rowCount) return;

    const columns = this.grid.cellCountPerRow;
    for (let column = 0; column < columns; column++) {
      this.grid.cellAt(row, column)?.setHighlighted(on);
    }
  }

  /**
   * 모든 행 하이라이트 해제
   */
  clearHighlights(): void {
    const rowCount = this.grid.rowCount;
    for (let row = 0; row < rowCount; row++) {
      this.setHighlight(row, false);
    }
  }

  // ===========================================================================
  // Private
  // ===========================================================================

  /**
   * 헤더 정렬
   *
   * sortBy는 탭마다 정확히 1회, 재선택은 항상 refreshFromModel 이후.
   */
  private sortByHeader(delegate: RowActionsDelegate<Identity>, column: number): void {
    const selectedRow = this.currentSelectedRow();
    const captured = selectedRow !== null ? { identity: delegate.identityForRow(selectedRow) } : null;

    delegate.sortBy(column);
    this.grid.refreshFromModel();

    let reselectedRow: SelectedRow = null;
    if (captured && this.reselect(captured.identity)) {
      reselectedRow = this.currentSelectedRow();
    }

    this.emit('sorted', { column, reselectedRow });
  }

  private isDataRow(row: number): boolean {
    return Number.isInteger(row) && row > HEADER_ROW && row < this.grid.rowCount;
  }

  private clearSelectionFlags(): void {
    const rowCount = this.grid.rowCount;
    const columns = this.grid.cellCountPerRow;
    for (let row = 0; row < rowCount; row++) {
      for (let column = 0; column < columns; column++) {
        this.grid.cellAt(row, column)?.setSelected(false);
      }
    }
  }
}
