/**
 * 진행 표시 오버레이 타입 정의
 *
 * 학습 포인트:
 * - 오버레이는 호스트의 정규화된 디스플레이 좌표계에 그려짐
 * - 화면 픽셀 → 디스플레이 단위 변환은 매 redraw마다 다시 계산
 * - 설정(IndicatorConfig)만 프레임 사이에 유지되고 나머지는 모두 파생 값
 */

/**
 * 투영 모드
 *
 * - orthographic: 직교 투영 (near clip 바로 안쪽에 오버레이 배치)
 * - perspective: 원근 투영 (z = 0 평면에 고정)
 */
export type Projection = 'orthographic' | 'perspective';

/**
 * 뷰포트 측정값
 *
 * 호스트의 활성 뷰포트에서 redraw마다 읽어옴 (저장하지 않음)
 */
export interface ViewportMetrics {
  /** 뷰포트 너비 (픽셀, > 0) */
  pixelWidth: number;
  /** 뷰포트 높이 (픽셀, > 0) */
  pixelHeight: number;
  /** 디스플레이 배율 (> 0, 호스트 카메라 줌) */
  scaleFactor: number;
  /** Near clip 거리 */
  nearClip: number;
  /** 투영 모드 */
  projection: Projection;
}

/**
 * 시간 단위
 */
export type TimeUnit = 'fs' | 'ps' | 'ns';

export const TIME_UNITS: readonly TimeUnit[] = ['fs', 'ps', 'ns'];

/**
 * 진행 표시기 설정
 */
export interface IndicatorConfig {
  /** 프레임당 시간 간격 */
  timestep: number;
  /** 상단 헤더 텍스트 */
  header: string;
  /** 시간 단위 */
  unit: TimeUnit;
  /** 오버레이 표시 여부 */
  enabled: boolean;
}

export const DEFAULT_INDICATOR_CONFIG: IndicatorConfig = {
  timestep: 0.001,
  header: '',
  unit: 'ps',
  enabled: false,
};

/**
 * 전경색 (배경 밝기에 따라 결정)
 */
export type ForegroundColor = 'black' | 'white';

/**
 * 렌더 상태 (redraw마다 새로 계산)
 *
 * errorMessage가 비어있지 않으면 해당 redraw에서는 아무것도 그리지 않음
 */
export interface RenderState {
  /** 진행률 (0.0 ~ 1.0) */
  percentage: number;
  /** 시간 라벨 (예: "Time: 0.05 / 0.10 ps") */
  timeLabel: string;
  /** 에러 메시지 (없으면 빈 문자열) */
  errorMessage: string;
  /** 에러 종류 (없으면 null) */
  errorType: 'UNRENDERABLE_STATE' | null;
  /** 텍스트 전경색 */
  foregroundColor: ForegroundColor;
}

/**
 * 3D 좌표 (디스플레이 공간)
 */
export interface Point3 {
  x: number;
  y: number;
  z: number;
}

/**
 * 디스플레이 공간의 사각형
 *
 * 좌표 시스템:
 * - 원점은 뷰 중앙, y는 위로 증가
 * - top > bottom, right > left
 */
export interface DisplayRect {
  left: number;
  top: number;
  right: number;
  bottom: number;
  /** 깊이 (클수록 카메라에 가까움) */
  z: number;
}

/**
 * 텍스트 앵커
 */
export interface LabelAnchor {
  position: Point3;
  /** 호스트 텍스트 크기 */
  size: number;
}

/**
 * 오버레이 레이아웃 (Geometry Engine 출력)
 */
export interface OverlayLayout {
  /** 디스플레이 반폭 (뷰는 대략 [-width, width] 범위) */
  displayWidth: number;
  /** 디스플레이 반높이 */
  displayHeight: number;
  /** 가장 앞쪽 깊이 */
  front: number;
  /** 1픽셀에 해당하는 디스플레이 가로 길이 */
  pixelWidthUnit: number;
  /** 1픽셀에 해당하는 디스플레이 세로 길이 */
  pixelHeightUnit: number;
  /** 회색 외곽 사각형 */
  outer: DisplayRect;
  /** 흰색 내부 사각형 (외곽에서 1픽셀 안쪽) */
  inner: DisplayRect;
  /** 은색 진행 막대 */
  fill: DisplayRect;
  /** 시간 라벨 위치 */
  timeLabel: LabelAnchor;
  /** 헤더 위치 */
  header: LabelAnchor;
}
