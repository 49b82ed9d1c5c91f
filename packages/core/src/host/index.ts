export { MemoryHost, MemoryDrawable } from './MemoryHost';
export type { MemoryHostOptions, RecordedPrimitive } from './MemoryHost';
export type {
  Unsubscribe,
  DrawColor,
  Drawable,
  HostBackground,
  HostAdapter,
} from './types';
