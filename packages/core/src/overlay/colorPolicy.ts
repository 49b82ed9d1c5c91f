import type { ForegroundColor } from './types';

/**
 * RGB 색상 (각 채널 0.0 ~ 1.0)
 */
export type RGB = readonly [number, number, number];

/** 이 값보다 밝은 배경이면 검정 텍스트 */
export const LUMINANCE_THRESHOLD = 1.2;

/**
 * 배경 밝기 합으로 전경색 결정
 *
 * 정확히 1.2는 흰색 (비교는 > 사용)
 */
export function pickForeground(backgroundLuminanceSum: number): ForegroundColor {
  return backgroundLuminanceSum > LUMINANCE_THRESHOLD ? 'black' : 'white';
}

/**
 * R + G + B 합
 */
export function luminanceSum(color: RGB): number {
  return color[0] + color[1] + color[2];
}
