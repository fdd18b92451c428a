/**
 * GestureNormalizer - 포인터 입력 정규화
 *
 * 원시 포인터 입력(down/move/up/cancel)을 두 가지 논리 이벤트로 바꿉니다.
 * - activate: 짧은 누름 1회당 정확히 1회
 * - longPress: start → changed* → end | other
 *
 * 하나의 누름은 activate 또는 longPress 중 하나로만 끝납니다.
 *
 * @example
 * const gestures = new GestureNormalizer({ minLongPressDuration: 300 });
 * gestures.on('activate', (point) => controller.handleActivation(point));
 * gestures.on('longPress', (event) => controller.handleLongPress(event));
 *
 * element.addEventListener('pointerdown', (e) => gestures.pointerDown({ x: e.offsetX, y: e.offsetY }));
 */

import { SimpleEventEmitter } from '../../core/SimpleEventEmitter';
import type { GestureEvents, GridPoint } from '../../types';
import type { GestureOptions } from '../types';
import { resolveGestureOptions } from '../utils/configAdapter';
import type { ResolvedGestureOptions } from '../utils/configAdapter';

/**
 * 누름 상태
 *
 * - idle: 누르고 있지 않음
 * - pending: 눌렀지만 아직 길게 누르기로 인정되지 않음
 * - pressing: 길게 누르기 진행 중
 * - failed: 허용 이동 거리를 넘어 이번 누름은 무시
 */
export type PressState = 'idle' | 'pending' | 'pressing' | 'failed';

export class GestureNormalizer extends SimpleEventEmitter<GestureEvents> {
  private readonly options: ResolvedGestureOptions;

  private state: PressState = 'idle';
  private origin: GridPoint = { x: 0, y: 0 };
  private lastPoint: GridPoint = { x: 0, y: 0 };
  private timer: ReturnType<typeof setTimeout> | null = null;

  constructor(options: GestureOptions = {}) {
    super();
    this.options = resolveGestureOptions(options);
  }

  /**
   * 현재 누름 상태
   */
  getState(): PressState {
    return this.state;
  }

  // ===========================================================================
  // 포인터 입력
  // ===========================================================================

  /**
   * 누름 시작 (이미 누르고 있으면 무시)
   */
  pointerDown(point: GridPoint): void {
    if (this.state !== 'idle') return;

    this.state = 'pending';
    this.origin = { ...point };
    this.lastPoint = { ...point };
    this.timer = setTimeout(() => this.promoteToLongPress(), this.options.minLongPressDuration);
  }

  /**
   * 누른 채 이동
   */
  pointerMove(point: GridPoint): void {
    if (this.state === 'idle' || this.state === 'failed') return;

    this.lastPoint = { ...point };

    if (this.state === 'pending') {
      if (this.distanceFromOrigin(point) > this.options.allowableMovement) {
        this.clearTimer();
        this.state = 'failed';
      }
      return;
    }

    this.emit('longPress', { phase: 'changed', point: { ...point } });
  }

  /**
   * 누름 종료
   */
  pointerUp(point: GridPoint): void {
    const state = this.state;
    this.reset();

    if (state === 'pending') {
      this.emit('activate', { ...point });
    } else if (state === 'pressing') {
      this.emit('longPress', { phase: 'end', point: { ...point } });
    }
  }

  /**
   * 입력 시스템이 누름을 취소함
   */
  pointerCancel(): void {
    const state = this.state;
    const point = { ...this.lastPoint };
    this.reset();

    if (state === 'pressing') {
      this.emit('longPress', { phase: 'other', point });
    }
  }

  /**
   * 리소스 정리
   */
  override destroy(): void {
    this.reset();
    super.destroy();
  }

  // ===========================================================================
  // Private
  // ===========================================================================

  private promoteToLongPress(): void {
    this.timer = null;
    if (this.state !== 'pending') return;

    this.state = 'pressing';
    this.emit('longPress', { phase: 'start', point: { ...this.lastPoint } });
  }

  private distanceFromOrigin(point: GridPoint): number {
    return Math.hypot(point.x - this.origin.x, point.y - this.origin.y);
  }

  private clearTimer(): void {
    if (this.timer !== null) {
      clearTimeout(this.timer);
      this.timer = null;
    }
  }

  private reset(): void {
    this.clearTimer();
    this.state = 'idle';
  }
}
