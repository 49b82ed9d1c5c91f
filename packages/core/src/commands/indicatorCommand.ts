/**
 * 진행 표시기 명령 처리
 *
 * 외부 CLI/콘솔이 전달하는 인자 목록을 해석해 컨트롤러에 반영
 *
 * 지원 옵션 (앞의 '-'는 생략 가능):
 * - progress on|off
 * - timestep <실수>
 * - header <문자열>
 * - unit fs|ps|ns
 *
 * @example
 * ```ts
 * runIndicatorCommand(controller, ['-progress', 'on', '-timestep', '0.004']);
 * runIndicatorCommand(controller, ['header', 'Temperature: 1000 K']);
 * ```
 */

import type { ProgressIndicatorController } from '../overlay/ProgressIndicatorController';
import type { TimeUnit } from '../overlay/types';
import { TIME_UNITS } from '../overlay/types';
import { IndicatorError } from '../overlay/errors';

export const INDICATOR_USAGE = [
  'usage: progress-hud -progress [on|off] -timestep [timestep] -unit [fs|ps|ns] -header [string]',
  'Displays a dynamic progress indicator for the active trajectory.',
  'Timestep per frame is given in the current unit (default ps). Defaults to 0.001.',
].join('\n');

/**
 * 명령 실행 결과
 */
export interface CommandResult {
  /** 인자가 없어 사용법만 반환했는지 여부 */
  usage: string | null;
  /** 반영된 옵션 이름 */
  applied: string[];
  /** 무시된 입력에 대한 경고 */
  warnings: string[];
}

const LOG_PREFIX = '[IndicatorCommand]';

/**
 * timestep 문자열 파싱
 *
 * @returns 유한한 실수면 값, 아니면 null (빈 문자열 포함)
 */
export function parseTimestep(text: string): number | null {
  if (text.trim() === '') return null;
  const value = Number(text);
  return Number.isFinite(value) ? value : null;
}

/**
 * 입력 중인 timestep 텍스트 허용 여부 (빈 값 또는 실수)
 */
export function isTimestepInput(text: string): boolean {
  return text === '' || parseTimestep(text) !== null;
}

function isTimeUnit(value: string): value is TimeUnit {
  return TIME_UNITS.some((unit) => unit === value);
}

/**
 * 명령 인자 실행
 *
 * 숫자가 아닌 timestep, 잘못된 on/off 값, 알 수 없는 단위는 경고 후 무시.
 * 알 수 없는 옵션은 IndicatorError(UNKNOWN_COMMAND)를 던짐
 * (그 전에 처리된 옵션은 이미 반영됨)
 *
 * @param controller - 대상 컨트롤러
 * @param args - 옵션/값 쌍 목록
 */
export function runIndicatorCommand(
  controller: ProgressIndicatorController,
  args: readonly string[],
): CommandResult {
  const result: CommandResult = { usage: null, applied: [], warnings: [] };

  if (args.length === 0) {
    result.usage = INDICATOR_USAGE;
    return result;
  }

  const warn = (message: string): void => {
    console.warn(`${LOG_PREFIX} ${message}`);
    result.warnings.push(message);
  };

  for (let i = 0; i < args.length; i += 2) {
    const option = args[i];
    const value = args[i + 1] ?? '';

    switch (option.replace(/^-/, '')) {
      case 'progress':
        if (value === 'on' || value === 'off') {
          controller.toggle(value === 'on');
          result.applied.push('progress');
        } else {
          warn(`progress expects on|off, got "${value}"`);
        }
        break;

      case 'timestep': {
        const timestep = parseTimestep(value);
        if (timestep === null) {
          warn(`timestep must be a number, got "${value}"`);
          break;
        }
        console.info(`${LOG_PREFIX} Setting timestep to ${timestep} ${controller.getConfig().unit}`);
        controller.setTimestep(timestep);
        result.applied.push('timestep');
        break;
      }

      case 'header':
        controller.setHeader(value);
        result.applied.push('header');
        break;

      case 'unit':
        if (isTimeUnit(value)) {
          controller.setUnit(value);
          result.applied.push('unit');
        } else {
          warn(`unit must be one of ${TIME_UNITS.join('|')}, got "${value}"`);
        }
        break;

      default:
        throw IndicatorError.unknownCommand(option);
    }
  }

  return result;
}
