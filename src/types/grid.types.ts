/**
 * 그리드 표면 타입 정의
 *
 * 선택 컨트롤러가 다루는 그리드의 최소 계약입니다.
 * 행 0은 헤더, 행 1 이상은 데이터 행입니다.
 */

// ============================================================================
// 좌표 / 셀 주소
// ============================================================================

/**
 * 뷰포트 기준 좌표 (px)
 */
export interface GridPoint {
  x: number;
  y: number;
}

/**
 * 셀 주소
 *
 * @example
 * const header: CellAddress = { row: 0, column: 2 };  // 헤더의 세 번째 컬럼
 * const first: CellAddress = { row: 1, column: 0 };   // 첫 번째 데이터 행
 */
export interface CellAddress {
  /** 행 인덱스 (0 = 헤더) */
  row: number;
  /** 컬럼 인덱스 */
  column: number;
}

// ============================================================================
// 셀 / 그리드 계약
// ============================================================================

/**
 * 선택/하이라이트 상태를 가지는 셀 핸들
 */
export interface SelectableCell {
  readonly isSelected: boolean;
  readonly isHighlighted: boolean;
  setSelected(selected: boolean): void;
  /** 눌림 표시 (선택과 독립적인 일시 상태) */
  setHighlighted(highlighted: boolean): void;
}

/**
 * 선택 가능한 그리드 표면
 *
 * 외부 그리드 위젯이 구현합니다. 컨트롤러는 이 인터페이스로만 접근하며,
 * 행 데이터는 전혀 보관하지 않습니다.
 */
export interface SelectableGrid {
  /** 행당 셀 수 (컬럼 수) */
  readonly cellCountPerRow: number;
  /** 헤더 포함 행 수 */
  readonly rowCount: number;
  /** 셀 조회 (범위 밖이거나 셀이 없으면 undefined) */
  cellAt(row: number, column: number): SelectableCell | undefined;
  /** 좌표 → 셀 주소 (어떤 셀에도 속하지 않으면 null) */
  resolveCoordinateToCell(point: GridPoint): CellAddress | null;
  /** 모델에서 다시 읽어 그리기 */
  refreshFromModel(): void;
}

/**
 * 그리드 크기를 제공하는 데이터 소스
 */
export interface GridDataSource {
  numberOfColumns(): number;
  /** 헤더 행 포함 */
  numberOfRows(): number;
}
