/**
 * 그리드 히트 테스트
 *
 * 뷰포트 좌표를 행/컬럼 인덱스로 변환합니다.
 * 고정(frozen) 영역은 스크롤 오프셋의 영향을 받지 않고,
 * 나머지 영역은 오프셋만큼 이동한 콘텐츠 좌표로 계산합니다.
 */

import type { CellAddress, GridPoint } from '../../types';
import type { ResolvedLayout } from '../types';

/**
 * 히트 테스트 입력
 */
export interface HitTestContext {
  rowCount: number;
  columnCount: number;
  layout: ResolvedLayout;
  contentOffset: GridPoint;
}

/**
 * 한 축에서 위치에 해당하는 인덱스 찾기
 *
 * @param position - 뷰포트 기준 위치
 * @param scroll - 해당 축의 스크롤 오프셋
 * @param frozen - 고정된 앞쪽 인덱스 수
 * @returns 인덱스, 범위 밖이면 null
 */
export function locateIndex(
  position: number,
  scroll: number,
  count: number,
  sizeOf: (index: number) => number,
  frozen: number
): number | null {
  if (!Number.isFinite(position) || position < 0) return null;

  const frozenCount = Math.min(frozen, count);
  let start = 0;

  for (let i = 0; i < frozenCount; i++) {
    const size = sizeOf(i);
    if (position < start + size) return i;
    start += size;
  }

  // 고정 영역 뒤는 콘텐츠 좌표 (고정 영역 아래로 스크롤된 셀은 가려짐)
  const contentPosition = position + scroll;
  for (let i = frozenCount; i < count; i++) {
    const size = sizeOf(i);
    if (contentPosition < start + size) return i;
    start += size;
  }

  return null;
}

/**
 * 좌표 → 셀 주소
 */
export function hitTest(point: GridPoint, ctx: HitTestContext): CellAddress | null {
  const { layout, contentOffset } = ctx;

  const row = locateIndex(point.y, contentOffset.y, ctx.rowCount, layout.heightForRow, layout.frozenRows);
  if (row === null) return null;

  const column = locateIndex(
    point.x,
    contentOffset.x,
    ctx.columnCount,
    layout.widthForColumn,
    layout.frozenColumns
  );
  if (column === null) return null;

  return { row, column };
}

/**
 * 한 축에서 인덱스의 뷰포트 시작 위치와 크기
 */
export function spanOf(
  index: number,
  scroll: number,
  sizeOf: (index: number) => number,
  frozen: number
): { start: number; size: number } {
  let start = 0;
  for (let i = 0; i < index; i++) {
    start += sizeOf(i);
  }
  return { start: index < frozen ? start : start - scroll, size: sizeOf(index) };
}
