/**
 * 코어 모듈
 *
 * DOM에 의존하지 않는 이벤트 시스템과 기본 테이블 모델입니다.
 */

export { SimpleEventEmitter } from './SimpleEventEmitter';
export { SortableTableModel } from './SortableTableModel';
export type { SortableTableModelOptions } from './SortableTableModel';
