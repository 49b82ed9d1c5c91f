import type { Point3, ViewportMetrics } from '../overlay/types';
import type { DrawColor, Drawable, HostAdapter, HostBackground, Unsubscribe } from './types';

/**
 * 기록된 그리기 프리미티브
 */
export type RecordedPrimitive =
  | { kind: 'triangle'; color: DrawColor; points: [Point3, Point3, Point3] }
  | { kind: 'text'; color: DrawColor; position: Point3; text: string; size: number };

/**
 * 메모리 Drawable
 *
 * 추가된 프리미티브를 순서대로 기록
 */
export class MemoryDrawable implements Drawable {
  readonly id: number;
  private primitives: RecordedPrimitive[] = [];
  private color: DrawColor = 'white';
  private clearCount = 0;

  constructor(id: number) {
    this.id = id;
  }

  clear(): void {
    this.primitives = [];
    this.clearCount++;
  }

  setColor(color: DrawColor): void {
    this.color = color;
  }

  addTriangle(p1: Point3, p2: Point3, p3: Point3): void {
    this.primitives.push({ kind: 'triangle', color: this.color, points: [p1, p2, p3] });
  }

  addText(position: Point3, text: string, size: number): void {
    this.primitives.push({ kind: 'text', color: this.color, position, text, size });
  }

  getPrimitives(): RecordedPrimitive[] {
    return [...this.primitives];
  }

  getClearCount(): number {
    return this.clearCount;
  }
}

/**
 * MemoryHost 옵션
 */
export interface MemoryHostOptions {
  /** 초기 뷰포트 (기본: 800x600, 배율 1, 원근 투영) */
  viewport?: Partial<ViewportMetrics>;
  /** 총 프레임 수 (기본: 0) */
  totalFrames?: number;
  /** 현재 프레임 (기본: 0) */
  currentFrame?: number;
  /** 배경색 (기본: 검정) */
  background?: HostBackground;
}

const DEFAULT_VIEWPORT: ViewportMetrics = {
  pixelWidth: 800,
  pixelHeight: 600,
  scaleFactor: 1,
  nearClip: 0.5,
  projection: 'perspective',
};

/**
 * 메모리 호스트
 *
 * 왜 필요한가?
 * - 실제 시각화 앱 없이 오버레이 엔진을 구동 (헤드리스 임베딩, 테스트)
 * - HostAdapter와 동일한 인터페이스, 이벤트는 동기적으로 전달
 *
 * 작동 방식:
 * 1. setFrame()으로 프레임 변경 → 구독자 호출
 * 2. setViewport()로 뷰 변경 → 뷰 구독자 호출
 * 3. requestQuit()으로 종료 이벤트 전달
 * 4. createDrawable()로 만든 MemoryDrawable에 프리미티브 기록
 */
export class MemoryHost implements HostAdapter {
  private viewport: ViewportMetrics;
  private totalFrames: number;
  private currentFrame: number;
  private background: HostBackground;

  private frameListeners: Set<() => void> = new Set();
  private viewListeners: Set<() => void> = new Set();
  private quitListeners: Set<() => void> = new Set();

  private drawables: Map<number, MemoryDrawable> = new Map();
  private nextDrawableId = 1;

  constructor(options: MemoryHostOptions = {}) {
    this.viewport = { ...DEFAULT_VIEWPORT, ...options.viewport };
    this.totalFrames = options.totalFrames ?? 0;
    this.currentFrame = options.currentFrame ?? 0;
    this.background = options.background ?? { color: [0, 0, 0] };
  }

  // ---------------------------------------------------------------------------
  // HostAdapter
  // ---------------------------------------------------------------------------

  onFrameChanged(callback: () => void): Unsubscribe {
    // 같은 콜백 함수도 구독마다 별도로 관리
    const listener = (): void => callback();
    this.frameListeners.add(listener);
    return () => {
      this.frameListeners.delete(listener);
    };
  }

  onViewChanged(callback: () => void): Unsubscribe {
    const listener = (): void => callback();
    this.viewListeners.add(listener);
    return () => {
      this.viewListeners.delete(listener);
    };
  }

  onQuitRequested(callback: () => void): Unsubscribe {
    const listener = (): void => callback();
    this.quitListeners.add(listener);
    return () => {
      this.quitListeners.delete(listener);
    };
  }

  getActiveViewport(): ViewportMetrics {
    return { ...this.viewport };
  }

  getCurrentFrameIndex(): number {
    return this.currentFrame;
  }

  getTotalFrameCount(): number {
    return this.totalFrames;
  }

  createDrawable(): MemoryDrawable {
    const drawable = new MemoryDrawable(this.nextDrawableId++);
    this.drawables.set(drawable.id, drawable);
    return drawable;
  }

  destroyDrawable(drawable: Drawable): void {
    for (const [id, owned] of this.drawables) {
      if (owned === drawable) {
        this.drawables.delete(id);
        return;
      }
    }
  }

  getBackgroundColor(): HostBackground {
    return this.background;
  }

  // ---------------------------------------------------------------------------
  // 호스트 상태 조작
  // ---------------------------------------------------------------------------

  /**
   * 현재 프레임 변경 및 구독자 알림
   */
  setFrame(frameIndex: number): void {
    this.currentFrame = frameIndex;
    this.emit(this.frameListeners);
  }

  /**
   * 총 프레임 수 변경 (이벤트 없음, 다음 redraw에서 반영)
   */
  setTotalFrames(totalFrames: number): void {
    this.totalFrames = totalFrames;
  }

  /**
   * 뷰포트 변경 및 뷰 구독자 알림
   */
  setViewport(viewport: Partial<ViewportMetrics>): void {
    this.viewport = { ...this.viewport, ...viewport };
    this.emit(this.viewListeners);
  }

  setBackground(background: HostBackground): void {
    this.background = background;
  }

  /**
   * 종료 이벤트 전달
   */
  requestQuit(): void {
    this.emit(this.quitListeners);
  }

  /**
   * 살아있는 drawable 목록
   */
  getDrawables(): MemoryDrawable[] {
    return Array.from(this.drawables.values());
  }

  getFrameListenerCount(): number {
    return this.frameListeners.size;
  }

  getViewListenerCount(): number {
    return this.viewListeners.size;
  }

  getQuitListenerCount(): number {
    return this.quitListeners.size;
  }

  private emit(listeners: Set<() => void>): void {
    // 콜백 안에서 구독 해제될 수 있으므로 복사본으로 순회
    for (const listener of Array.from(listeners)) {
      listener();
    }
  }
}
