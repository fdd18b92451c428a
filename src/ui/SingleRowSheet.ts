/**
 * SingleRowSheet - 최상위 파사드 클래스
 *
 * 그리드 표면, 입력 정규화, 선택 컨트롤러를 하나로 묶습니다.
 * 사용자는 포인터 입력만 넘기면 탭/길게 누르기에 따른 행 선택과
 * 헤더 정렬(선택 유지)을 얻습니다.
 *
 * @example
 * const model = new SortableTableModel({ header, rows });
 * const sheet = new SingleRowSheet({
 *   dataSource: model,
 *   delegate: model,
 *   gestures: { minLongPressDuration: 300 },
 * });
 *
 * element.addEventListener('pointerdown', (e) => sheet.pointerDown({ x: e.offsetX, y: e.offsetY }));
 * element.addEventListener('pointerup', (e) => sheet.pointerUp({ x: e.offsetX, y: e.offsetY }));
 */

import type {
  GridPoint,
  RowActionsDelegate,
  RowSelectionEvents,
  SelectedRow,
  Unsubscribe,
} from '../types';
import { SheetGrid } from './grid/SheetGrid';
import { GestureNormalizer } from './interaction/GestureNormalizer';
import { RowSelectionController } from './interaction/RowSelectionController';
import type { SingleRowSheetOptions } from './types';

export class SingleRowSheet<Identity> {
  readonly grid: SheetGrid;
  readonly controller: RowSelectionController<Identity>;

  private readonly gestures: GestureNormalizer;
  private readonly subscriptions: Unsubscribe[] = [];

  constructor(options: SingleRowSheetOptions<Identity>) {
    this.grid = new SheetGrid({ dataSource: options.dataSource, layout: options.layout });
    this.gestures = new GestureNormalizer(options.gestures);
    this.controller = new RowSelectionController<Identity>({
      grid: this.grid,
      delegate: options.delegate,
    });

    // 짧은 누름은 activate 하나로만 도착하므로 탭/길게 누르기 중복 처리가 없음
    this.subscriptions.push(
      this.gestures.on('activate', (point) => this.controller.handleActivation(point)),
      this.gestures.on('longPress', (event) => this.controller.handleLongPress(event))
    );
  }

  // ===========================================================================
  // 포인터 입력
  // ===========================================================================

  pointerDown(point: GridPoint): void {
    this.gestures.pointerDown(point);
  }

  pointerMove(point: GridPoint): void {
    this.gestures.pointerMove(point);
  }

  pointerUp(point: GridPoint): void {
    this.gestures.pointerUp(point);
  }

  pointerCancel(): void {
    this.gestures.pointerCancel();
  }

  // ===========================================================================
  // 공개 API
  // ===========================================================================

  /**
   * 협력자 연결/해제
   */
  setDelegate(delegate: RowActionsDelegate<Identity> | null): void {
    this.controller.setDelegate(delegate);
  }

  /**
   * 모델 변경 후 다시 그리기 (선택은 해제됨)
   */
  refresh(): void {
    this.grid.refreshFromModel();
  }

  /**
   * 현재 선택된 행
   */
  getSelectedRow(): SelectedRow {
    return this.controller.currentSelectedRow();
  }

  /**
   * 행 선택 (협력자에게 알리지 않음)
   */
  selectRow(row: number): boolean {
    return this.controller.selectRow(row);
  }

  /**
   * 스크롤 오프셋 설정
   */
  setContentOffset(offset: GridPoint): void {
    this.grid.setContentOffset(offset);
  }

  /**
   * 컨트롤러 이벤트 구독
   */
  on<K extends keyof RowSelectionEvents>(
    event: K,
    handler: (payload: RowSelectionEvents[K]) => void
  ): Unsubscribe {
    return this.controller.on(event, handler);
  }

  /**
   * 리소스 정리
   */
  destroy(): void {
    for (const unsubscribe of this.subscriptions.splice(0)) {
      unsubscribe();
    }
    this.gestures.destroy();
    this.controller.destroy();
  }
}
