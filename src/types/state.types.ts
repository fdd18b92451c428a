/**
 * 상태 타입 정의
 *
 * 정렬 상태처럼 화면을 다시 그리게 만드는 상태들입니다.
 */

// ============================================================================
// 정렬 상태
// ============================================================================

/**
 * 정렬 방향
 */
export type SortDirection = 'asc' | 'desc';

/**
 * 정렬 상태
 *
 * @example
 * // 두 번째 컬럼 내림차순
 * const sort: SortState = { column: 1, direction: 'desc' };
 */
export interface SortState {
  /** 정렬한 컬럼 인덱스 */
  column: number;

  /** 정렬 방향 */
  direction: SortDirection;
}

// ============================================================================
// 선택 상태
// ============================================================================

/**
 * 단일 행 선택 상태
 *
 * 선택된 데이터 행 인덱스(1 이상) 또는 null
 */
export type SelectedRow = number | null;
