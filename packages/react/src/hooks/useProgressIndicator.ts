/**
 * useProgressIndicator - 진행 표시기 상태 훅
 *
 * 학습 포인트:
 * - 컨트롤러는 React 밖(호스트 이벤트)에서 상태가 바뀜
 * - subscribe로 스냅샷을 받아 React state로 반영
 * - 변경 함수는 컨트롤러에 위임 (훅은 상태를 소유하지 않음)
 */

import { useState, useEffect, useCallback } from 'react';
import type {
  IndicatorConfig,
  OverlayLayout,
  ProgressIndicatorController,
  RenderState,
  TimeUnit,
} from '@progress-hud/core';

/**
 * useProgressIndicator 반환 타입
 */
export interface UseProgressIndicatorReturn {
  /** 오버레이 표시 여부 */
  enabled: boolean;
  /** 현재 설정 */
  config: IndicatorConfig;
  /** 마지막 redraw 결과 */
  renderState: RenderState;
  /** 마지막 레이아웃 (아직 그리지 않았으면 null) */
  layout: OverlayLayout | null;
  /** 켜기/끄기 */
  setEnabled: (enabled: boolean) => void;
  /** timestep 설정 */
  setTimestep: (timestep: number) => void;
  /** 헤더 설정 */
  setHeader: (header: string) => void;
  /** 단위 설정 */
  setUnit: (unit: TimeUnit) => void;
}

/**
 * 진행 표시기 상태 훅
 *
 * @example
 * ```tsx
 * const { enabled, config, renderState, setEnabled } = useProgressIndicator(controller);
 *
 * <input type="checkbox" checked={enabled} onChange={(e) => setEnabled(e.target.checked)} />
 * {renderState.errorMessage && <span>{renderState.errorMessage}</span>}
 * ```
 */
export function useProgressIndicator(
  controller: ProgressIndicatorController,
): UseProgressIndicatorReturn {
  const [snapshot, setSnapshot] = useState(() => controller.getSnapshot());

  useEffect(() => {
    // 컨트롤러가 바뀌었거나 마운트 사이에 변경이 있었을 수 있음
    setSnapshot(controller.getSnapshot());
    return controller.subscribe(setSnapshot);
  }, [controller]);

  const setEnabled = useCallback((enabled: boolean) => {
    controller.toggle(enabled);
  }, [controller]);

  const setTimestep = useCallback((timestep: number) => {
    controller.setTimestep(timestep);
  }, [controller]);

  const setHeader = useCallback((header: string) => {
    controller.setHeader(header);
  }, [controller]);

  const setUnit = useCallback((unit: TimeUnit) => {
    controller.setUnit(unit);
  }, [controller]);

  return {
    enabled: snapshot.enabled,
    config: snapshot.config,
    renderState: snapshot.renderState,
    layout: snapshot.layout,
    setEnabled,
    setTimestep,
    setHeader,
    setUnit,
  };
}
