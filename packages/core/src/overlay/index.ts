export { ProgressIndicatorController } from './ProgressIndicatorController';
export { OverlayRenderer, drawRectangle } from './OverlayRenderer';
export {
  IndicatorState,
  computeRenderState,
  formatTimeLabel,
  INITIAL_RENDER_STATE,
  NO_FRAMES_MESSAGE,
  SINGLE_FRAME_MESSAGE,
  INVALID_TIMESTEP_MESSAGE,
} from './IndicatorState';
export {
  computeOverlayLayout,
  computeDisplayExtent,
  computeFrontDepth,
  clampPercentage,
  ORTHO_FRONT_EPSILON,
} from './layout';
export { pickForeground, luminanceSum, LUMINANCE_THRESHOLD } from './colorPolicy';
export { IndicatorError } from './errors';
export { DEFAULT_INDICATOR_CONFIG, TIME_UNITS } from './types';
export type {
  ProgressIndicatorOptions,
  ProgressIndicatorSnapshot,
  ProgressIndicatorListener,
} from './ProgressIndicatorController';
export type { OverlayFrame } from './OverlayRenderer';
export type {
  RenderStateInput,
  IndicatorConfigKey,
  ConfigChangeListener,
} from './IndicatorState';
export type { RGB } from './colorPolicy';
export type { IndicatorErrorType } from './errors';
export type {
  Projection,
  ViewportMetrics,
  TimeUnit,
  IndicatorConfig,
  ForegroundColor,
  RenderState,
  Point3,
  DisplayRect,
  LabelAnchor,
  OverlayLayout,
} from './types';
