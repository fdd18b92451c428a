/**
 * SimpleEventEmitter - 제네릭 이벤트 발행/구독 시스템
 *
 * 컨트롤러, 입력 정규화 계층, 테이블 모델이 공통으로 사용하는 단순한 이벤트 시스템입니다.
 * 이벤트 이름과 페이로드 타입을 자유롭게 정의할 수 있습니다.
 */

/**
 * 이벤트 핸들러 타입
 */
type EventHandler<T> = (payload: T) => void;

/**
 * 이벤트별 핸들러 저장소
 */
type ListenerMap<Events> = { [K in keyof Events]?: Set<EventHandler<Events[K]>> };

/**
 * 제네릭 이벤트 발행/구독 클래스
 *
 * @template Events - 이벤트 이름과 페이로드 타입의 맵
 *
 * @example
 * ```ts
 * interface MyEvents {
 *   activate: { x: number; y: number };
 *   reset: null;
 * }
 *
 * const emitter = new SimpleEventEmitter<MyEvents>();
 * emitter.on('activate', ({ x, y }) => console.log(x, y));
 * emitter.emit('activate', { x: 10, y: 20 });
 * ```
 */
export class SimpleEventEmitter<Events extends object> {
  private listeners: ListenerMap<Events> = {};

  /**
   * 이벤트 구독
   *
   * @returns 구독 해제 함수
   */
  on<K extends keyof Events>(event: K, handler: EventHandler<Events[K]>): () => void {
    let handlers: Set<EventHandler<Events[K]>> | undefined = this.listeners[event];
    if (!handlers) {
      handlers = new Set<EventHandler<Events[K]>>();
      this.listeners[event] = handlers;
    }
    handlers.add(handler);

    const registered = handlers;
    return () => {
      registered.delete(handler);
      if (registered.size === 0 && this.listeners[event] === registered) {
        delete this.listeners[event];
      }
    };
  }

  /**
   * 이벤트 발행
   *
   * 핸들러 하나가 던진 예외는 기록만 하고 나머지 핸들러는 계속 호출합니다.
   */
  emit<K extends keyof Events>(event: K, payload: Events[K]): void {
    const handlers = this.listeners[event];
    if (!handlers) return;

    for (const handler of [...handlers]) {
      try {
        handler(payload);
      } catch (error) {
        console.error(`[SimpleEventEmitter] Handler error for "${String(event)}":`, error);
      }
    }
  }

  /**
   * 리스너 수
   */
  listenerCount(event: keyof Events): number {
    return this.listeners[event]?.size ?? 0;
  }

  /**
   * 모든 리스너 제거
   */
  removeAllListeners(event?: keyof Events): void {
    if (event !== undefined) {
      delete this.listeners[event];
    } else {
      this.listeners = {};
    }
  }

  /**
   * 리소스 정리
   */
  destroy(): void {
    this.removeAllListeners();
  }
}
