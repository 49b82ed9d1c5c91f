/**
 * @progress-hud/react
 *
 * React bindings for the progress HUD overlay engine
 *
 * 구성:
 * - useProgressIndicator: 컨트롤러 스냅샷을 React state로 반영하는 훅
 * - ProgressIndicatorSettings: 타임라인/timestep/단위/헤더 설정 패널
 *
 * 스타일:
 * - 컴포넌트는 Tailwind 클래스만 사용하고 CSS를 번들하지 않음
 * - 사용하는 앱이 루트 tailwind.config.ts의 테마(커스텀 색상)와
 *   @tailwindcss/forms 플러그인으로 클래스를 컴파일해야 함
 */

export const VERSION = '0.1.0';

// Hooks
export { useProgressIndicator, type UseProgressIndicatorReturn } from './hooks';

// Components
export {
  ProgressIndicatorSettings,
  type ProgressIndicatorSettingsProps,
} from './components/settings/ProgressIndicatorSettings';
