/**
 * @progress-hud/core
 *
 * 3D 뷰포트 위 진행 표시 오버레이 엔진
 *
 * 모듈 구조:
 * - overlay: 레이아웃 계산, 설정/렌더 상태, 색상 정책, 컨트롤러, 렌더러
 * - host: 호스트 연동 인터페이스 + 메모리 호스트
 * - commands: 명령 인자 처리
 */

export const VERSION = '0.1.0';

// Overlay
export * from './overlay';

// Host
export * from './host';

// Commands
export * from './commands';
