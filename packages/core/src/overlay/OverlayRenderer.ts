/**
 * OverlayRenderer
 *
 * 학습 포인트:
 * - 사각형 하나 = 삼각형 두 개 (QuadRenderer의 정점 구성과 같은 방식)
 * - 그리기 순서: 회색 외곽 → 흰색 내부 → 은색 진행 막대 → 라벨
 * - 깊이는 레이아웃에서 이미 분리되어 있으므로 여기서는 그대로 전달
 *
 * 렌더링 흐름:
 * 1. drawable.clear() (이전 프리미티브 제거)
 * 2. 에러가 있으면 종료 (오버레이가 사라짐)
 * 3. 사각형 3개 + 텍스트 2개 추가
 */

import type { Drawable } from '../host/types';
import type { DisplayRect, OverlayLayout, RenderState } from './types';

/**
 * 렌더링 입력
 */
export interface OverlayFrame {
  layout: OverlayLayout;
  state: RenderState;
  header: string;
}

/**
 * 사각형을 삼각형 두 개로 추가
 *
 * (left, top) ─ (right, top)
 *      │      ╲      │
 * (left, bottom) ─ (right, bottom)
 */
export function drawRectangle(drawable: Drawable, rect: DisplayRect): void {
  const { left, top, right, bottom, z } = rect;
  drawable.addTriangle({ x: left, y: top, z }, { x: right, y: top, z }, { x: left, y: bottom, z });
  drawable.addTriangle({ x: left, y: bottom, z }, { x: right, y: top, z }, { x: right, y: bottom, z });
}

/**
 * 오버레이 렌더러
 *
 * drawable 한 개만 다루며 상태를 가지지 않음
 */
export class OverlayRenderer {
  private drawable: Drawable;

  constructor(drawable: Drawable) {
    this.drawable = drawable;
  }

  /**
   * 한 프레임 렌더링
   *
   * @returns 프리미티브를 그렸는지 여부 (에러가 있으면 false)
   */
  render({ layout, state, header }: OverlayFrame): boolean {
    this.drawable.clear();

    if (state.errorMessage) {
      return false;
    }

    const drawable = this.drawable;

    drawable.setColor('gray');
    drawRectangle(drawable, layout.outer);

    drawable.setColor('white');
    drawRectangle(drawable, layout.inner);

    drawable.setColor('silver');
    drawRectangle(drawable, layout.fill);

    drawable.setColor(state.foregroundColor);
    drawable.addText(layout.timeLabel.position, state.timeLabel, layout.timeLabel.size);
    drawable.addText(layout.header.position, header, layout.header.size);

    return true;
  }
}
