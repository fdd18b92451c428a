/**
 * single-row-sheet - 단일 행 선택 + 정렬 유지 그리드 라이브러리
 *
 * 그리드 위젯에 한 행만 선택하는 동작과 헤더 탭 정렬을 붙입니다.
 * 정렬로 행이 이동해도 협력자가 제공하는 식별자로 선택 행을 다시 찾습니다.
 */

// 타입 내보내기
export type * from './types';

// 코어 모듈 내보내기
export * from './core';

// UI 모듈 내보내기
export * from './ui';
