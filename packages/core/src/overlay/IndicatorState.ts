/**
 * Indicator State
 *
 * 진행 표시기 설정 저장소 + 진행률/라벨 계산
 *
 * 책임:
 * - IndicatorConfig 소유 (외부 설정 화면/명령은 이 클래스를 통해서만 변경)
 * - 필드 변경 알림 (값이 같으면 알리지 않음)
 * - 프레임 정보로부터 RenderState 계산 (순수 함수)
 */

import type { ForegroundColor, IndicatorConfig, RenderState } from './types';
import { DEFAULT_INDICATOR_CONFIG } from './types';
import { clampPercentage } from './layout';

// =============================================================================
// Render State 계산
// =============================================================================

export const NO_FRAMES_MESSAGE = 'Error: top molecule has no frames';
export const SINGLE_FRAME_MESSAGE = 'Error: top molecule needs at least two frames';
export const INVALID_TIMESTEP_MESSAGE = 'Error: timestep must be > 0';

/**
 * RenderState 계산 입력
 */
export interface RenderStateInput {
  /** 현재 프레임 인덱스 */
  frameIndex: number;
  /** 총 프레임 수 */
  totalFrames: number;
  /** 프레임당 시간 */
  timestep: number;
  /** 시간 단위 */
  unit: IndicatorConfig['unit'];
  /** 전경색 */
  foregroundColor: ForegroundColor;
}

/**
 * 시간 라벨 포맷
 *
 * @example
 * ```ts
 * formatTimeLabel(0.05, 0.1, 'ps'); // "Time: 0.05 / 0.10 ps"
 * ```
 */
export function formatTimeLabel(current: number, total: number, unit: string): string {
  return `Time: ${current.toFixed(2)} / ${total.toFixed(2)} ${unit}`;
}

/**
 * 진행률, 시간 라벨, 에러 메시지 계산
 *
 * 에러 조건 (검사 순서):
 * 1. timestep <= 0 (또는 유한수가 아님)
 * 2. 총 프레임 0개
 * 3. 총 프레임 1개 (진행률 분모가 0)
 *
 * 에러가 있으면 percentage = 0, timeLabel = ''
 */
export function computeRenderState(input: RenderStateInput): RenderState {
  const { frameIndex, totalFrames, timestep, unit, foregroundColor } = input;

  const fail = (errorMessage: string): RenderState => ({
    percentage: 0,
    timeLabel: '',
    errorMessage,
    errorType: 'UNRENDERABLE_STATE',
    foregroundColor,
  });

  if (!Number.isFinite(timestep) || timestep <= 0) {
    return fail(INVALID_TIMESTEP_MESSAGE);
  }
  if (totalFrames <= 0) {
    return fail(NO_FRAMES_MESSAGE);
  }
  if (totalFrames === 1) {
    return fail(SINGLE_FRAME_MESSAGE);
  }

  const lastFrame = totalFrames - 1;
  return {
    percentage: clampPercentage(frameIndex / lastFrame),
    timeLabel: formatTimeLabel(frameIndex * timestep, lastFrame * timestep, unit),
    errorMessage: '',
    errorType: null,
    foregroundColor,
  };
}

export const INITIAL_RENDER_STATE: RenderState = {
  percentage: 0,
  timeLabel: '',
  errorMessage: '',
  errorType: null,
  foregroundColor: 'white',
};

// =============================================================================
// Indicator State
// =============================================================================

/**
 * 설정 필드 이름
 */
export type IndicatorConfigKey = keyof IndicatorConfig;

/**
 * 설정 변경 리스너
 */
export type ConfigChangeListener = (key: IndicatorConfigKey, config: IndicatorConfig) => void;

/**
 * 진행 표시기 설정 저장소
 *
 * @example
 * ```ts
 * const state = new IndicatorState({ timestep: 0.004 });
 * const off = state.subscribe((key, config) => console.log(key, config[key]));
 * state.set('header', 'Temperature: 1000 K');
 * off();
 * ```
 */
export class IndicatorState {
  private config: IndicatorConfig;
  private listeners: Set<ConfigChangeListener> = new Set();

  constructor(initial: Partial<IndicatorConfig> = {}) {
    this.config = { ...DEFAULT_INDICATOR_CONFIG, ...initial };
  }

  /**
   * 현재 설정 (복사본)
   */
  getConfig(): IndicatorConfig {
    return { ...this.config };
  }

  get<K extends IndicatorConfigKey>(key: K): IndicatorConfig[K] {
    return this.config[key];
  }

  /**
   * 설정 필드 변경
   *
   * @returns 값이 실제로 바뀌었는지 여부
   */
  set<K extends IndicatorConfigKey>(key: K, value: IndicatorConfig[K]): boolean {
    if (Object.is(this.config[key], value)) {
      return false;
    }
    const next = { ...this.config };
    next[key] = value;
    this.config = next;
    for (const listener of Array.from(this.listeners)) {
      listener(key, this.getConfig());
    }
    return true;
  }

  /**
   * 설정 변경 구독
   *
   * @returns 구독 해제 함수
   */
  subscribe(listener: ConfigChangeListener): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  getListenerCount(): number {
    return this.listeners.size;
  }
}
