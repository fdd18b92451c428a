/**
 * SortableTableModel 테스트
 *
 * Arquero 정렬, 방향 토글, 식별자, 알림 이벤트를 검증합니다.
 */

import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { SortableTableModel } from '../../src/core/SortableTableModel';
import type { RowNoticePayload, SortState } from '../../src/types';
import { CITY_HEADER, CITY_ROWS } from '../fixtures/cityTable';

describe('SortableTableModel', () => {
  let model: SortableTableModel;

  beforeEach(() => {
    model = new SortableTableModel({ header: CITY_HEADER, rows: CITY_ROWS });
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  // ===========================================================================
  // 데이터 소스
  // ===========================================================================

  describe('데이터 소스', () => {
    it('헤더 행을 포함한 크기', () => {
      expect(model.numberOfColumns()).toBe(3);
      expect(model.numberOfRows()).toBe(4);
    });

    it('셀 텍스트 (행 0은 헤더)', () => {
      expect(model.cellText(0, 1)).toBe('City');
      expect(model.cellText(1, 0)).toBe('kim');
      expect(model.cellText(9, 0)).toBe('');
    });

    it('입력 배열을 복사해서 보관', () => {
      const rows = [['b'], ['a']];
      const copy = new SortableTableModel({ header: ['Name'], rows });
      rows[0][0] = 'changed';

      expect(copy.identityForRow(1)).toBe('b');
    });
  });

  // ===========================================================================
  // 정렬
  // ===========================================================================

  describe('sortBy', () => {
    it('처음 정렬은 오름차순', () => {
      model.sortBy(1);

      expect(model.getRows()).toEqual([
        ['lee', 'busan', '1'],
        ['park', 'incheon', '2'],
        ['kim', 'seoul', '3'],
      ]);
      expect(model.getSortState()).toEqual({ column: 1, direction: 'asc' });
    });

    it('같은 컬럼을 다시 정렬하면 내림차순', () => {
      model.sortBy(1);
      model.sortBy(1);

      expect(model.getRows().map((row) => row[0])).toEqual(['kim', 'park', 'lee']);
      expect(model.getSortState()).toEqual({ column: 1, direction: 'desc' });
    });

    it('다른 컬럼은 다시 오름차순으로 시작', () => {
      model.sortBy(1);
      model.sortBy(1);
      model.sortBy(2);

      expect(model.getRows().map((row) => row[0])).toEqual(['lee', 'park', 'kim']);
      expect(model.getSortState()).toEqual({ column: 2, direction: 'asc' });
    });

    it('초기 정렬 상태에서 같은 컬럼은 방향 반전', () => {
      const sorted = new SortableTableModel({
        header: CITY_HEADER,
        rows: CITY_ROWS,
        initialSort: { column: 0, direction: 'asc' },
      });

      sorted.sortBy(0);

      expect(sorted.getRows().map((row) => row[0])).toEqual(['park', 'lee', 'kim']);
    });

    it('범위 밖 컬럼은 경고 후 무시', () => {
      const warn = vi.spyOn(console, 'warn').mockImplementation(() => {});

      model.sortBy(5);

      expect(warn).toHaveBeenCalledWith('[SortableTableModel] sortBy: column 5 out of range');
      expect(model.getSortState()).toBeNull();
      expect(model.getRows()[0]).toEqual(['kim', 'seoul', '3']);
    });

    it('빈 테이블도 정렬 상태는 갱신', () => {
      const empty = new SortableTableModel({ header: ['Name'], rows: [] });

      empty.sortBy(0);

      expect(empty.numberOfRows()).toBe(1);
      expect(empty.getSortState()).toEqual({ column: 0, direction: 'asc' });
    });

    it('정렬된 컬럼 헤더에 방향 표시', () => {
      model.sortBy(1);
      expect(model.headerText(1)).toBe('City ▲');
      expect(model.headerText(0)).toBe('Name');

      model.sortBy(1);
      expect(model.headerText(1)).toBe('City ▼');
    });

    it('sorted 이벤트 발행', () => {
      const states: SortState[] = [];
      model.on('sorted', (state) => states.push(state));

      model.sortBy(0);
      model.sortBy(0);

      expect(states).toEqual([
        { column: 0, direction: 'asc' },
        { column: 0, direction: 'desc' },
      ]);
    });
  });

  // ===========================================================================
  // 식별자
  // ===========================================================================

  describe('식별자', () => {
    it('식별 컬럼 값, 범위 밖은 undefined', () => {
      expect(model.identityForRow(2)).toBe('lee');
      expect(model.identityForRow(0)).toBeUndefined();
      expect(model.identityForRow(4)).toBeUndefined();
    });

    it('정렬 후에도 같은 내용이면 같은 식별자', () => {
      const before = model.identityForRow(2);
      model.sortBy(1);

      expect(model.identitiesEqual(before, model.identityForRow(1))).toBe(true);
    });

    it('식별 컬럼까지 닿지 않는 짧은 행끼리는 같지 않음', () => {
      const ragged = new SortableTableModel({
        header: ['Name', 'City'],
        rows: [['kim'], ['lee'], ['park', 'seoul']],
        identityColumn: 1,
      });

      expect(ragged.identityForRow(1)).toBeUndefined();
      expect(ragged.identitiesEqual(ragged.identityForRow(1), ragged.identityForRow(2))).toBe(false);
      expect(ragged.identitiesEqual(ragged.identityForRow(3), 'seoul')).toBe(true);
    });

    it('식별 컬럼 지정', () => {
      const byCity = new SortableTableModel({ header: CITY_HEADER, rows: CITY_ROWS, identityColumn: 1 });
      expect(byCity.identityForRow(1)).toBe('seoul');
    });

    it('범위 밖 식별 컬럼은 생성 시 오류', () => {
      expect(
        () => new SortableTableModel({ header: CITY_HEADER, rows: CITY_ROWS, identityColumn: 3 })
      ).toThrow('SortableTableModel: identityColumn 3 is outside 0..2');
    });
  });

  // ===========================================================================
  // 알림 / 변경
  // ===========================================================================

  describe('알림', () => {
    it('선택/길게 누르기 알림을 행 값과 함께 발행', () => {
      const notices: string[] = [];
      const push = (kind: string) => (payload: RowNoticePayload) =>
        notices.push(`${kind}:${payload.row}:${payload.values.join('|')}`);

      model.on('rowSelected', push('selected'));
      model.on('longPressStarted', push('started'));
      model.on('longPressEnded', push('ended'));

      model.longPressStart(3);
      model.didSelectRow(3);
      model.longPressEnd(3);
      model.didSelectRow(7);

      expect(notices).toEqual([
        'started:3:park|incheon|2',
        'selected:3:park|incheon|2',
        'ended:3:park|incheon|2',
        'selected:7:',
      ]);
    });
  });

  describe('변경', () => {
    it('updateCell은 식별자를 바꿀 수 있음', () => {
      model.updateCell(1, 0, 'choi');
      expect(model.identityForRow(1)).toBe('choi');
    });

    it('없는 셀 변경은 오류', () => {
      expect(() => model.updateCell(0, 0, 'x')).toThrow('SortableTableModel: cell (0, 0) does not exist');
      expect(() => model.updateCell(1, 3, 'x')).toThrow('SortableTableModel: cell (1, 3) does not exist');
    });

    it('setRows는 행을 교체', () => {
      model.setRows([['solo', 'ulsan', '9']]);

      expect(model.numberOfRows()).toBe(2);
      expect(model.identityForRow(1)).toBe('solo');
    });
  });
});
