/**
 * 이벤트 타입 정의
 *
 * 입력 정규화 계층과 선택 컨트롤러가 발행하는 이벤트들입니다.
 *
 * @example
 * const unsubscribe = sheet.on('selectionChanged', ({ row }) => {
 *   statusLabel.textContent = row === null ? '' : `${row}행 선택`;
 * });
 */

import type { GridPoint } from './grid.types';
import type { SelectedRow, SortState } from './state.types';

// ============================================================================
// 입력 이벤트
// ============================================================================

/**
 * 길게 누르기 단계
 *
 * - start: 최소 누름 시간 경과
 * - changed: 누른 채 이동
 * - end: 손을 뗌
 * - other: 취소/실패
 */
export type LongPressPhase = 'start' | 'changed' | 'end' | 'other';

/**
 * 길게 누르기 이벤트
 */
export interface LongPressEvent {
  phase: LongPressPhase;
  /** 'other' 단계에서는 마지막으로 알려진 위치 */
  point: GridPoint;
}

/**
 * GestureNormalizer 이벤트 맵
 */
export interface GestureEvents {
  /** 짧은 누름 1회 = activate 1회 */
  activate: GridPoint;
  longPress: LongPressEvent;
}

// ============================================================================
// 선택 이벤트
// ============================================================================

/**
 * 선택 변경 페이로드
 */
export interface SelectionChangedPayload {
  row: SelectedRow;
}

/**
 * 헤더 정렬 완료 페이로드
 */
export interface SortedPayload {
  /** 탭한 헤더 컬럼 */
  column: number;
  /** 정렬 후 다시 선택된 행 (없으면 null) */
  reselectedRow: SelectedRow;
}

/**
 * RowSelectionController 이벤트 맵
 */
export interface RowSelectionEvents {
  selectionChanged: SelectionChangedPayload;
  sorted: SortedPayload;
}

// ============================================================================
// 모델 이벤트
// ============================================================================

/**
 * 행 알림 페이로드 (SortableTableModel)
 */
export interface RowNoticePayload {
  row: number;
  values: readonly string[];
}

/**
 * SortableTableModel 이벤트 맵
 */
export interface TableModelEvents {
  rowSelected: RowNoticePayload;
  longPressStarted: RowNoticePayload;
  longPressEnded: RowNoticePayload;
  sorted: SortState;
}

/**
 * 구독 해제 함수
 */
export type Unsubscribe = () => void;
