/**
 * 타입 정의 모듈
 *
 * 모든 모듈에서 공유하는 타입들을 정의합니다.
 *
 * @example
 * import type { SelectableGrid, RowActionsDelegate } from './types';
 */

// 그리드 표면
export type {
  GridPoint,
  CellAddress,
  SelectableCell,
  SelectableGrid,
  GridDataSource,
} from './grid.types';

// 협력자
export type { RowActionsDelegate } from './delegate.types';

// 상태 타입
export type { SortDirection, SortState, SelectedRow } from './state.types';

// 이벤트 타입
export type {
  LongPressPhase,
  LongPressEvent,
  GestureEvents,
  SelectionChangedPayload,
  SortedPayload,
  RowSelectionEvents,
  RowNoticePayload,
  TableModelEvents,
  Unsubscribe,
} from './event.types';
