/**
 * React Hooks for Progress HUD
 */

export { useProgressIndicator } from './useProgressIndicator';
export type { UseProgressIndicatorReturn } from './useProgressIndicator';
