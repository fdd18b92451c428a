/**
 * Config Adapter - 시트 옵션을 내부 구조로 변환
 *
 * 사용자 옵션에 기본값을 채우고 값의 범위를 검증합니다.
 * 잘못된 설정은 생성 시점에 Error로 알립니다.
 */

import type { GestureOptions, ResolvedLayout, SheetLayoutOptions, SizeResolver } from '../types';

/** 기본 컬럼 너비 (px) */
export const DEFAULT_COLUMN_WIDTH = 140;
/** 기본 헤더 높이 (px) */
export const DEFAULT_HEADER_HEIGHT = 60;
/** 기본 데이터 행 높이 (px) */
export const DEFAULT_ROW_HEIGHT = 24;
/** 기본 최소 길게 누르기 시간 (ms) */
export const DEFAULT_MIN_LONG_PRESS_DURATION = 300;
/** 기본 허용 이동 거리 (px) */
export const DEFAULT_ALLOWABLE_MOVEMENT = 10;

/**
 * 검증을 마친 입력 정규화 설정
 */
export interface ResolvedGestureOptions {
  minLongPressDuration: number;
  allowableMovement: number;
}

/**
 * 크기 값을 검증된 함수로 변환
 *
 * 함수형 크기는 호출 시점마다 검증합니다 (잘못된 값은 0으로 취급).
 */
function toSizeFunction(value: SizeResolver, name: string): (index: number) => number {
  if (typeof value === 'number') {
    assertPositive(value, name);
    return () => value;
  }

  return (index: number) => {
    const size = value(index);
    if (!Number.isFinite(size) || size < 0) {
      console.warn(`[configAdapter] ${name}(${index}) returned invalid size ${size}; using 0`);
      return 0;
    }
    return size;
  };
}

function assertPositive(value: number, name: string): void {
  if (!Number.isFinite(value) || value <= 0) {
    throw new Error(`configAdapter: ${name} must be a positive number (got ${value})`);
  }
}

function assertCount(value: number, name: string): void {
  if (!Number.isInteger(value) || value < 0) {
    throw new Error(`configAdapter: ${name} must be a non-negative integer (got ${value})`);
  }
}

/**
 * 레이아웃 옵션 변환
 */
export function resolveLayout(options: SheetLayoutOptions = {}): ResolvedLayout {
  const columnWidth = toSizeFunction(options.columnWidth ?? DEFAULT_COLUMN_WIDTH, 'columnWidth');
  const rowHeight = toSizeFunction(options.rowHeight ?? DEFAULT_ROW_HEIGHT, 'rowHeight');

  const headerHeight = options.headerHeight ?? DEFAULT_HEADER_HEIGHT;
  assertPositive(headerHeight, 'headerHeight');

  const frozenRows = options.frozenRows ?? 1;
  const frozenColumns = options.frozenColumns ?? 0;
  assertCount(frozenRows, 'frozenRows');
  assertCount(frozenColumns, 'frozenColumns');

  return {
    widthForColumn: columnWidth,
    // 헤더(행 0)만 별도 높이
    heightForRow: (row) => (row === 0 ? headerHeight : rowHeight(row)),
    frozenRows,
    frozenColumns,
  };
}

/**
 * 입력 정규화 옵션 변환
 */
export function resolveGestureOptions(options: GestureOptions = {}): ResolvedGestureOptions {
  const minLongPressDuration = options.minLongPressDuration ?? DEFAULT_MIN_LONG_PRESS_DURATION;
  const allowableMovement = options.allowableMovement ?? DEFAULT_ALLOWABLE_MOVEMENT;

  if (!Number.isFinite(minLongPressDuration) || minLongPressDuration < 0) {
    throw new Error(
      `configAdapter: minLongPressDuration must be a non-negative number (got ${minLongPressDuration})`
    );
  }
  if (!Number.isFinite(allowableMovement) || allowableMovement < 0) {
    throw new Error(
      `configAdapter: allowableMovement must be a non-negative number (got ${allowableMovement})`
    );
  }

  return { minLongPressDuration, allowableMovement };
}
