/**
 * GestureNormalizer 테스트
 *
 * 짧은 누름 1회 = activate 1회, 길게 누르기는 단계 이벤트로만 끝나는지 확인합니다.
 */

import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { GestureNormalizer } from '../../../src/ui/interaction/GestureNormalizer';
import type { GridPoint, LongPressEvent } from '../../../src/types';

describe('GestureNormalizer', () => {
  let gestures: GestureNormalizer;
  let activations: GridPoint[];
  let longPresses: LongPressEvent[];

  beforeEach(() => {
    vi.useFakeTimers();
    gestures = new GestureNormalizer({ minLongPressDuration: 300, allowableMovement: 10 });
    activations = [];
    longPresses = [];
    gestures.on('activate', (point) => activations.push(point));
    gestures.on('longPress', (event) => longPresses.push(event));
  });

  afterEach(() => {
    gestures.destroy();
    vi.useRealTimers();
  });

  // ===========================================================================
  // 짧은 누름
  // ===========================================================================

  describe('짧은 누름', () => {
    it('시간 전에 떼면 activate 1회', () => {
      gestures.pointerDown({ x: 5, y: 5 });
      vi.advanceTimersByTime(299);
      gestures.pointerUp({ x: 6, y: 5 });
      vi.advanceTimersByTime(1000);

      expect(activations).toEqual([{ x: 6, y: 5 }]);
      expect(longPresses).toEqual([]);
      expect(gestures.getState()).toBe('idle');
    });

    it('허용 범위 안의 이동은 그대로 activate', () => {
      gestures.pointerDown({ x: 0, y: 0 });
      gestures.pointerMove({ x: 6, y: 8 });
      gestures.pointerUp({ x: 6, y: 8 });

      expect(activations).toEqual([{ x: 6, y: 8 }]);
    });

    it('허용 범위를 넘으면 아무 이벤트도 없음', () => {
      gestures.pointerDown({ x: 0, y: 0 });
      gestures.pointerMove({ x: 30, y: 0 });
      expect(gestures.getState()).toBe('failed');

      vi.advanceTimersByTime(1000);
      gestures.pointerUp({ x: 30, y: 0 });

      expect(activations).toEqual([]);
      expect(longPresses).toEqual([]);
    });

    it('대기 중 취소는 조용히 종료', () => {
      gestures.pointerDown({ x: 0, y: 0 });
      gestures.pointerCancel();
      vi.advanceTimersByTime(1000);

      expect(activations).toEqual([]);
      expect(longPresses).toEqual([]);
    });

    it('누르는 중 두 번째 pointerDown은 무시', () => {
      gestures.pointerDown({ x: 1, y: 1 });
      gestures.pointerDown({ x: 100, y: 100 });
      gestures.pointerUp({ x: 1, y: 1 });

      expect(activations).toEqual([{ x: 1, y: 1 }]);
    });
  });

  // ===========================================================================
  // 길게 누르기
  // ===========================================================================

  describe('길게 누르기', () => {
    it('start → changed → end, activate 없음', () => {
      gestures.pointerDown({ x: 10, y: 20 });
      vi.advanceTimersByTime(300);

      expect(gestures.getState()).toBe('pressing');
      expect(longPresses).toEqual([{ phase: 'start', point: { x: 10, y: 20 } }]);

      gestures.pointerMove({ x: 80, y: 20 });
      gestures.pointerUp({ x: 80, y: 21 });

      expect(longPresses).toEqual([
        { phase: 'start', point: { x: 10, y: 20 } },
        { phase: 'changed', point: { x: 80, y: 20 } },
        { phase: 'end', point: { x: 80, y: 21 } },
      ]);
      expect(activations).toEqual([]);
    });

    it('start 시점 위치는 마지막 이동 위치', () => {
      gestures.pointerDown({ x: 0, y: 0 });
      gestures.pointerMove({ x: 3, y: 4 });
      vi.advanceTimersByTime(300);

      expect(longPresses).toEqual([{ phase: 'start', point: { x: 3, y: 4 } }]);
    });

    it('취소는 마지막 위치로 other 단계', () => {
      gestures.pointerDown({ x: 0, y: 0 });
      vi.advanceTimersByTime(300);
      gestures.pointerMove({ x: 40, y: 40 });
      gestures.pointerCancel();

      expect(longPresses.map((event) => event.phase)).toEqual(['start', 'changed', 'other']);
      expect(longPresses[2]).toEqual({ phase: 'other', point: { x: 40, y: 40 } });
      expect(gestures.getState()).toBe('idle');
    });
  });

  // ===========================================================================
  // 설정 / 정리
  // ===========================================================================

  describe('설정', () => {
    it('기본 최소 시간은 300ms', () => {
      const defaults = new GestureNormalizer();
      const phases: string[] = [];
      defaults.on('longPress', (event) => phases.push(event.phase));

      defaults.pointerDown({ x: 0, y: 0 });
      vi.advanceTimersByTime(299);
      expect(phases).toEqual([]);
      vi.advanceTimersByTime(1);
      expect(phases).toEqual(['start']);

      defaults.destroy();
    });

    it('음수 시간은 생성 시 오류', () => {
      expect(() => new GestureNormalizer({ minLongPressDuration: -1 })).toThrow(
        'configAdapter: minLongPressDuration must be a non-negative number (got -1)'
      );
    });

    it('destroy 후 타이머는 발화하지 않음', () => {
      gestures.pointerDown({ x: 0, y: 0 });
      gestures.destroy();
      vi.advanceTimersByTime(1000);

      expect(longPresses).toEqual([]);
      expect(gestures.getState()).toBe('idle');
    });
  });
});
