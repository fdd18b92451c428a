/**
 * UI Layer 진입점
 *
 * 그리드 표면과 상호작용 모듈을 export합니다.
 */

// 메인 파사드
export { SingleRowSheet } from './SingleRowSheet';

// 타입
export type * from './types';

// Grid 모듈
export { SheetGrid, GridCell, hitTest, locateIndex } from './grid';
export type { SheetGridOptions, HitTestContext } from './grid';

// Interaction 모듈
export { RowSelectionController, GestureNormalizer } from './interaction';
export type { RowSelectionControllerOptions, PressState } from './interaction';

// Config 유틸리티
export {
  resolveLayout,
  resolveGestureOptions,
  DEFAULT_COLUMN_WIDTH,
  DEFAULT_HEADER_HEIGHT,
  DEFAULT_ROW_HEIGHT,
  DEFAULT_MIN_LONG_PRESS_DURATION,
  DEFAULT_ALLOWABLE_MOVEMENT,
} from './utils/configAdapter';
export type { ResolvedGestureOptions } from './utils/configAdapter';
