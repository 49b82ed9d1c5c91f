export {
  runIndicatorCommand,
  parseTimestep,
  isTimestepInput,
  INDICATOR_USAGE,
} from './indicatorCommand';
export type { CommandResult } from './indicatorCommand';
