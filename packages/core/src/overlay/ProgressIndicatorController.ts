/**
 * ProgressIndicatorController
 *
 * 학습 포인트:
 * - 상태는 두 개뿐: Disabled(초기) / Enabled
 * - Enabled 여부 = 소유한 drawable 핸들이 있는지 (null이면 Disabled)
 * - 구독 수명은 Enabled 상태에 묶임 (enable에서 구독, disable에서 해제)
 * - 모든 이벤트는 호스트가 동기적으로 전달 → 이벤트마다 redraw 한 번, 배칭 없음
 *
 * 이벤트 흐름:
 * 1. 호스트 프레임 변경 / 뷰 변경 / 설정 변경
 * 2. redraw(): 뷰포트 측정 → RenderState 계산 → 레이아웃 계산
 * 3. OverlayRenderer가 drawable에 프리미티브 출력
 * 4. UI 구독자에게 스냅샷 알림
 *
 * 사용 예시:
 * ```ts
 * const controller = new ProgressIndicatorController(host, {
 *   config: { timestep: 0.004, header: 'Temperature: 1000 K' },
 * });
 * controller.toggle(true); // 즉시 redraw
 * controller.setUnit('ns'); // 설정 변경 → redraw
 * controller.toggle(false); // 구독 해제 + drawable 삭제
 * ```
 */

import type { Drawable, HostAdapter, Unsubscribe } from '../host/types';
import type {
  ForegroundColor,
  IndicatorConfig,
  OverlayLayout,
  RenderState,
  TimeUnit,
} from './types';
import { IndicatorState, INITIAL_RENDER_STATE, computeRenderState } from './IndicatorState';
import type { IndicatorConfigKey } from './IndicatorState';
import { OverlayRenderer } from './OverlayRenderer';
import { computeOverlayLayout } from './layout';
import { luminanceSum, pickForeground } from './colorPolicy';

/**
 * 컨트롤러 옵션
 */
export interface ProgressIndicatorOptions {
  /** 초기 설정 (enabled: true면 생성 즉시 활성화) */
  config?: Partial<IndicatorConfig>;
  /** 디버그 로그 출력 (기본값: false) */
  debug?: boolean;
}

/**
 * UI용 상태 스냅샷
 */
export interface ProgressIndicatorSnapshot {
  enabled: boolean;
  config: IndicatorConfig;
  renderState: RenderState;
  /** 마지막으로 계산한 레이아웃 (한 번도 그리지 않았으면 null) */
  layout: OverlayLayout | null;
}

/**
 * 스냅샷 변경 리스너
 */
export type ProgressIndicatorListener = (snapshot: ProgressIndicatorSnapshot) => void;

/** redraw를 일으키는 설정 필드 */
const REDRAW_KEYS: ReadonlySet<IndicatorConfigKey> = new Set(['timestep', 'header', 'unit']);

const LOG_PREFIX = '[ProgressIndicator]';

/**
 * 진행 표시 오버레이 컨트롤러
 */
export class ProgressIndicatorController {
  private host: HostAdapter;
  private state: IndicatorState;
  private debugEnabled: boolean;

  // Enabled 상태에서만 존재
  private drawable: Drawable | null = null;
  private renderer: OverlayRenderer | null = null;
  private subscriptions: Unsubscribe[] = [];

  // 파생 상태
  private renderState: RenderState = INITIAL_RENDER_STATE;
  private layout: OverlayLayout | null = null;
  private foregroundColor: ForegroundColor = 'white';

  private listeners: Set<ProgressIndicatorListener> = new Set();

  constructor(host: HostAdapter, options: ProgressIndicatorOptions = {}) {
    this.host = host;
    this.debugEnabled = options.debug ?? false;

    const { enabled = false, ...config }: Partial<IndicatorConfig> = options.config ?? {};
    this.state = new IndicatorState(config);

    if (enabled) {
      this.toggle(true);
    }
  }

  // ---------------------------------------------------------------------------
  // 상태 전환
  // ---------------------------------------------------------------------------

  /**
   * Enabled 여부
   */
  isEnabled(): boolean {
    return this.drawable !== null;
  }

  /**
   * Enabled 상태로 전환
   *
   * 이미 drawable이 있으면 아무것도 하지 않음 (중복 drawable/구독 방지).
   * redraw는 하지 않음 (toggle에서 수행)
   *
   * @returns 새로 활성화되었는지 여부
   */
  enable(): boolean {
    if (this.drawable !== null) {
      return false;
    }

    this.drawable = this.host.createDrawable();
    this.renderer = new OverlayRenderer(this.drawable);
    this.sampleBackground();

    this.subscriptions = [
      this.host.onFrameChanged(() => this.redraw()),
      this.host.onViewChanged(() => this.redraw()),
      this.host.onQuitRequested(() => this.handleQuit()),
      this.state.subscribe((key) => {
        if (REDRAW_KEYS.has(key)) {
          this.redraw();
        }
      }),
    ];

    this.state.set('enabled', true);
    this.log('enabled');
    return true;
  }

  /**
   * Disabled 상태로 전환
   *
   * @param cleanup - true면 drawable 삭제. false면 핸들만 버림 (호스트 종료 중)
   */
  disable(cleanup: boolean): void {
    for (const unsubscribe of this.subscriptions) {
      unsubscribe();
    }
    this.subscriptions = [];

    if (cleanup && this.drawable !== null) {
      this.host.destroyDrawable(this.drawable);
    }
    this.drawable = null;
    this.renderer = null;

    this.state.set('enabled', false);
    this.log(`disabled (cleanup: ${cleanup})`);
  }

  /**
   * 오버레이 켜기/끄기
   *
   * 켜질 때 즉시 redraw. 이미 요청한 상태면 아무것도 하지 않음
   */
  toggle(enabled: boolean): void {
    if (enabled && !this.isEnabled()) {
      this.enable();
      this.redraw();
    } else if (!enabled && this.isEnabled()) {
      this.disable(true);
      this.notify();
    }
  }

  // ---------------------------------------------------------------------------
  // 설정
  // ---------------------------------------------------------------------------

  getConfig(): IndicatorConfig {
    return this.state.getConfig();
  }

  /**
   * timestep 변경
   *
   * 0 이하 값도 저장됨 (다음 redraw에서 에러 메시지로 표시)
   */
  setTimestep(timestep: number): void {
    this.applyConfig('timestep', timestep);
  }

  setHeader(header: string): void {
    this.applyConfig('header', header);
  }

  setUnit(unit: TimeUnit): void {
    this.applyConfig('unit', unit);
  }

  private applyConfig<K extends 'timestep' | 'header' | 'unit'>(
    key: K,
    value: IndicatorConfig[K],
  ): void {
    const changed = this.state.set(key, value);
    // Enabled면 설정 구독이 redraw 후 알림
    if (changed && !this.isEnabled()) {
      this.notify();
    }
  }

  /**
   * 배경색 다시 샘플링 후 redraw
   *
   * 배경색은 매 프레임 읽지 않으므로 호스트 배경이 바뀌면 호출 필요
   */
  resetColors(): void {
    this.sampleBackground();
    this.redraw();
  }

  private sampleBackground(): void {
    const background = this.host.getBackgroundColor();
    const color = background.gradientBottom ?? background.color;
    this.foregroundColor = pickForeground(luminanceSum(color));
  }

  // ---------------------------------------------------------------------------
  // Redraw
  // ---------------------------------------------------------------------------

  /**
   * Redraw 사이클 한 번
   *
   * Disabled 상태면 아무것도 하지 않음. 에러가 있으면 이전 프리미티브만
   * 지우고 새로 그리지 않음 (오버레이가 사라짐)
   */
  redraw(): void {
    const renderer = this.renderer;
    if (renderer === null) {
      return;
    }

    const config = this.state.getConfig();
    const metrics = this.host.getActiveViewport();

    const renderState = computeRenderState({
      frameIndex: this.host.getCurrentFrameIndex(),
      totalFrames: this.host.getTotalFrameCount(),
      timestep: config.timestep,
      unit: config.unit,
      foregroundColor: this.foregroundColor,
    });
    const layout = computeOverlayLayout(metrics, renderState.percentage);

    renderer.render({ layout, state: renderState, header: config.header });

    if (renderState.errorMessage) {
      this.log(renderState.errorMessage);
    }

    this.renderState = renderState;
    this.layout = layout;
    this.notify();
  }

  private handleQuit(): void {
    console.info(`${LOG_PREFIX} Got host quit event`);
    // 호스트가 종료 중이므로 drawable은 건드리지 않음
    this.disable(false);
    this.notify();
  }

  // ---------------------------------------------------------------------------
  // UI 구독
  // ---------------------------------------------------------------------------

  getRenderState(): RenderState {
    return { ...this.renderState };
  }

  getSnapshot(): ProgressIndicatorSnapshot {
    return {
      enabled: this.isEnabled(),
      config: this.state.getConfig(),
      renderState: { ...this.renderState },
      layout: this.layout,
    };
  }

  /**
   * 스냅샷 변경 구독 (redraw, 켜기/끄기, 설정 변경마다 호출)
   *
   * @returns 구독 해제 함수
   */
  subscribe(listener: ProgressIndicatorListener): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  private notify(): void {
    if (this.listeners.size === 0) return;
    const snapshot = this.getSnapshot();
    for (const listener of Array.from(this.listeners)) {
      listener(snapshot);
    }
  }

  private log(message: string): void {
    if (this.debugEnabled) {
      console.debug(`${LOG_PREFIX} ${message}`);
    }
  }

  /**
   * 리소스 정리
   */
  dispose(): void {
    this.disable(true);
    this.listeners.clear();
  }
}
