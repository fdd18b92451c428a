/**
 * Interaction 모듈
 */

export { RowSelectionController } from './RowSelectionController';
export type { RowSelectionControllerOptions } from './RowSelectionController';
export { GestureNormalizer } from './GestureNormalizer';
export type { PressState } from './GestureNormalizer';
