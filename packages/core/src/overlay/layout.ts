/**
 * 오버레이 레이아웃 계산 (Geometry Engine)
 *
 * 학습 포인트:
 * - 픽셀 크기 → 디스플레이 단위 변환 (화면 높이의 1/4을 기준 높이로 사용)
 * - 테두리는 "1픽셀"이지만 디스플레이 단위로 계산해야 줌과 무관하게 1픽셀 유지
 * - 사각형마다 깊이를 조금씩 다르게 → 렌더러 depth-fighting 방지
 *
 * 좌표 흐름:
 * 1. displayHeight = 0.25 * pixelHeight / scaleFactor
 * 2. displayWidth = displayHeight * 종횡비
 * 3. 막대 위치/두께는 displayHeight 비율로 결정
 * 4. 내부 사각형 = 외곽에서 1픽셀 단위씩 안쪽
 */

import type { DisplayRect, OverlayLayout, ViewportMetrics } from './types';

/** 직교 투영에서 clip 볼륨 안쪽으로 밀어넣는 거리 */
export const ORTHO_FRONT_EPSILON = 0.001;

const BAR_THICKNESS_RATIO = 0.02;
const BAR_MARGIN_RATIO = 0.01;
const BAR_WIDTH_RATIO = 0.95;
const TIME_LABEL_Y_RATIO = -0.87;
const HEADER_PIXEL_OFFSET = 10;
const TIME_LABEL_SIZE = 2.0;
const HEADER_SIZE = 1.0;

/**
 * 진행률을 [0, 1] 범위로 제한
 *
 * NaN은 0으로 처리
 */
export function clampPercentage(percentage: number): number {
  if (Number.isNaN(percentage)) return 0;
  return Math.max(0, Math.min(1, percentage));
}

/**
 * 뷰포트 크기를 디스플레이 공간 반폭/반높이로 변환
 */
export function computeDisplayExtent(metrics: ViewportMetrics): {
  displayWidth: number;
  displayHeight: number;
} {
  const displayHeight = (0.25 * metrics.pixelHeight) / metrics.scaleFactor;
  const displayWidth = (displayHeight * metrics.pixelWidth) / metrics.pixelHeight;
  return { displayWidth, displayHeight };
}

/**
 * 오버레이를 놓을 앞쪽 깊이
 *
 * 원근 투영에서는 원점 깊이(0)에 고정
 */
export function computeFrontDepth(metrics: ViewportMetrics): number {
  if (metrics.projection === 'orthographic') {
    return (2 - metrics.nearClip - ORTHO_FRONT_EPSILON) / metrics.scaleFactor;
  }
  return 0;
}

function insetRect(rect: DisplayRect, dx: number, dy: number, z: number): DisplayRect {
  return {
    left: rect.left + dx,
    top: rect.top - dy,
    right: rect.right - dx,
    bottom: rect.bottom + dy,
    z,
  };
}

/**
 * 뷰포트 측정값과 진행률로 오버레이 레이아웃 계산
 *
 * 실패하지 않는 순수 함수. percentage는 호출 측에서 제한하지만
 * 범위를 벗어난 값이 들어와도 막대가 내부 사각형을 넘지 않도록 다시 제한함
 *
 * @param metrics - 현재 뷰포트 측정값
 * @param percentage - 진행률 (0.0 ~ 1.0)
 *
 * @example
 * ```ts
 * const layout = computeOverlayLayout(
 *   { pixelWidth: 800, pixelHeight: 600, scaleFactor: 1, nearClip: 0.5, projection: 'perspective' },
 *   0.5,
 * );
 * // layout.displayHeight === 150, layout.displayWidth === 200
 * ```
 */
export function computeOverlayLayout(metrics: ViewportMetrics, percentage: number): OverlayLayout {
  const p = clampPercentage(percentage);
  const { displayWidth, displayHeight } = computeDisplayExtent(metrics);
  const front = computeFrontDepth(metrics);

  const pixelWidthUnit = (2 * displayWidth) / metrics.pixelWidth;
  const pixelHeightUnit = (2 * displayHeight) / metrics.pixelHeight;

  const thickness = BAR_THICKNESS_RATIO * 2 * displayHeight;
  const margin = BAR_MARGIN_RATIO * 2 * displayHeight;
  const bottom = -displayHeight + margin;

  // 외곽은 2픽셀, 내부는 1픽셀 뒤에 그려야 렌더러가 순서를 지킴
  const outer: DisplayRect = {
    left: -BAR_WIDTH_RATIO * displayWidth,
    top: bottom + thickness,
    right: BAR_WIDTH_RATIO * displayWidth,
    bottom,
    z: front - 2 * pixelWidthUnit,
  };
  // 막대가 2픽셀보다 얇아지는 작은 뷰포트에서는 테두리를 막대의 1/4로 제한
  const insetX = Math.min(pixelWidthUnit, (outer.right - outer.left) / 4);
  const insetY = Math.min(pixelHeightUnit, thickness / 4);
  const inner = insetRect(outer, insetX, insetY, front - pixelWidthUnit);
  const fill: DisplayRect = {
    ...inner,
    right: inner.left + p * (inner.right - inner.left),
    z: front,
  };

  return {
    displayWidth,
    displayHeight,
    front,
    pixelWidthUnit,
    pixelHeightUnit,
    outer,
    inner,
    fill,
    timeLabel: {
      position: { x: inner.left, y: TIME_LABEL_Y_RATIO * displayHeight, z: front },
      size: TIME_LABEL_SIZE,
    },
    header: {
      position: {
        x: inner.left,
        y: displayHeight - margin - HEADER_PIXEL_OFFSET * pixelHeightUnit,
        z: front,
      },
      size: HEADER_SIZE,
    },
  };
}
