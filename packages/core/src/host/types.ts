/**
 * 호스트 연동 타입 정의
 *
 * 학습 포인트:
 * - 오버레이 엔진은 호스트(3D 시각화 앱)의 렌더링/카메라/프레임 진행에 관여하지 않음
 * - 필요한 것은 좁은 인터페이스뿐: 이벤트 구독, 뷰포트 조회, drawable 생성/삭제
 * - 호스트 상태는 읽기 전용으로만 사용
 */

import type { Point3, ViewportMetrics } from '../overlay/types';
import type { RGB } from '../overlay/colorPolicy';

/**
 * 구독 해제 함수
 */
export type Unsubscribe = () => void;

/**
 * 호스트 색상 이름 (graphics color)
 */
export type DrawColor = 'gray' | 'white' | 'silver' | 'black';

/**
 * 오버레이가 소유하는 그리기 대상
 *
 * 호스트가 생성하고, 오버레이만 변경함
 */
export interface Drawable {
  /** 이 drawable의 모든 프리미티브 삭제 */
  clear(): void;
  /** 이후 추가되는 프리미티브의 색상 */
  setColor(color: DrawColor): void;
  /** 삼각형 추가 */
  addTriangle(p1: Point3, p2: Point3, p3: Point3): void;
  /** 텍스트 추가 */
  addText(position: Point3, text: string, size: number): void;
}

/**
 * 호스트 배경색
 *
 * 그라데이션 배경이면 gradientBottom이 채워짐
 */
export interface HostBackground {
  color: RGB;
  gradientBottom?: RGB;
}

/**
 * 호스트 어댑터
 *
 * 호스트 앱이 구현해야 하는 인터페이스. 모든 콜백은 호스트의
 * 단일 이벤트 디스패치 스레드에서 동기적으로 호출되어야 함
 */
export interface HostAdapter {
  /** 현재 프레임 변경 이벤트 */
  onFrameChanged(callback: () => void): Unsubscribe;
  /** 뷰 변경 이벤트 (크기, 줌, 투영 모드 등 프레임 외 호스트 명령) */
  onViewChanged(callback: () => void): Unsubscribe;
  /** 호스트 종료 이벤트 */
  onQuitRequested(callback: () => void): Unsubscribe;
  /** 활성 뷰포트 측정값 */
  getActiveViewport(): ViewportMetrics;
  /** 현재 프레임 인덱스 (0부터 시작) */
  getCurrentFrameIndex(): number;
  /** 총 프레임 수 */
  getTotalFrameCount(): number;
  /** 오버레이 전용 drawable 생성 */
  createDrawable(): Drawable;
  /** drawable 삭제 */
  destroyDrawable(drawable: Drawable): void;
  /** 배경색 조회 */
  getBackgroundColor(): HostBackground;
}
