/**
 * UI Layer 타입 정의
 *
 * 그리드 레이아웃, 입력 정규화, 시트 파사드 옵션을 정의합니다.
 */

import type { GridDataSource, RowActionsDelegate } from '../types';

// =============================================================================
// 레이아웃
// =============================================================================

/**
 * 고정 값 또는 인덱스별 계산 함수
 */
export type SizeResolver = number | ((index: number) => number);

/**
 * 그리드 레이아웃 설정
 */
export interface SheetLayoutOptions {
  /**
   * 컬럼 너비 (px)
   * @default 140
   */
  columnWidth?: SizeResolver;

  /**
   * 헤더 행 높이 (px)
   * @default 60
   */
  headerHeight?: number;

  /**
   * 데이터 행 높이 (px)
   * @default 24
   */
  rowHeight?: SizeResolver;

  /**
   * 스크롤해도 위치가 고정되는 행 수 (헤더 포함)
   * @default 1
   */
  frozenRows?: number;

  /**
   * 스크롤해도 위치가 고정되는 컬럼 수
   *
   * 첫 컬럼을 행 이름처럼 쓰는 시트는 1로 지정합니다.
   * @default 0
   */
  frozenColumns?: number;
}

/**
 * 검증을 마친 레이아웃 (모든 값 채워짐)
 */
export interface ResolvedLayout {
  widthForColumn: (column: number) => number;
  heightForRow: (row: number) => number;
  frozenRows: number;
  frozenColumns: number;
}

// =============================================================================
// 입력 정규화
// =============================================================================

/**
 * GestureNormalizer 설정
 */
export interface GestureOptions {
  /**
   * 길게 누르기로 인정되는 최소 시간 (ms)
   * @default 300
   */
  minLongPressDuration?: number;

  /**
   * 길게 누르기 시작 전 허용 이동 거리 (px)
   * 넘으면 누름이 실패 처리되어 activate도 발생하지 않습니다.
   * @default 10
   */
  allowableMovement?: number;
}

// =============================================================================
// SingleRowSheet 옵션
// =============================================================================

/**
 * SingleRowSheet 초기화 옵션
 */
export interface SingleRowSheetOptions<Identity> {
  /** 행/컬럼 수 제공자 */
  dataSource: GridDataSource;

  /** 정렬/식별자/알림 협력자 (없으면 입력 처리는 no-op) */
  delegate?: RowActionsDelegate<Identity> | null;

  /** 레이아웃 */
  layout?: SheetLayoutOptions;

  /** 길게 누르기 설정 */
  gestures?: GestureOptions;
}
