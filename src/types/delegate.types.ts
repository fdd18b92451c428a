/**
 * 협력자(delegate) 계약
 *
 * 정렬 실행, 행 식별자, 식별자 비교, 선택 알림을 제공합니다.
 * 알림 메서드는 선택 상태를 직접 바꾸면 안 됩니다 (선택은 컨트롤러 소유).
 */

/**
 * 행 동작 협력자
 *
 * @template Identity - 행 식별자 타입. 비교는 항상 identitiesEqual로만 합니다.
 *
 * @example
 * const delegate: RowActionsDelegate<string> = {
 *   sortBy: (column) => model.sortBy(column),
 *   didSelectRow: (row) => console.log('selected', row),
 *   longPressEnd: (row) => console.log('long press', row),
 *   identityForRow: (row) => model.rows[row - 1][0],
 *   identitiesEqual: (a, b) => a === b,
 * };
 */
export interface RowActionsDelegate<Identity> {
  /** 컬럼 기준으로 외부 모델 재정렬 (동기) */
  sortBy(column: number): void;

  /** 데이터 행(row > 0)이 선택됨 */
  didSelectRow(row: number): void;

  /** 데이터 행에서 길게 누르기 시작 */
  longPressStart?(row: number): void;

  /** 데이터 행에서 길게 누르기 종료 */
  longPressEnd(row: number): void;

  /**
   * 행 식별자
   *
   * 행 내용에 대한 순수 함수여야 합니다. 정렬로 인덱스가 바뀌어도
   * 같은 내용이면 같은(identitiesEqual) 값을 돌려줘야 합니다.
   */
  identityForRow(row: number): Identity;

  /** 식별자 동치 관계 (반사/대칭/추이) */
  identitiesEqual(a: Identity, b: Identity): boolean;
}
