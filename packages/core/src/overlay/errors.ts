/**
 * 진행 표시기 에러 타입
 *
 * - INVALID_CONFIGURATION: 숫자가 아닌 timestep 등 잘못된 설정 입력 (경고 후 무시)
 * - UNRENDERABLE_STATE: 프레임 없음, timestep <= 0 (errorMessage로만 노출)
 * - UNKNOWN_COMMAND: 알 수 없는 명령 옵션 (호출 측에 throw)
 */
export type IndicatorErrorType =
  | 'INVALID_CONFIGURATION'
  | 'UNRENDERABLE_STATE'
  | 'UNKNOWN_COMMAND';

/**
 * 진행 표시기 에러 클래스
 *
 * 엔진 자체는 에러를 던지지 않고 "아무것도 그리지 않음"으로 대응함.
 * 명령 처리 단계의 실패만 이 클래스로 전달됨
 */
export class IndicatorError extends Error {
  readonly type: IndicatorErrorType;

  constructor(message: string, type: IndicatorErrorType) {
    super(message);
    this.name = 'IndicatorError';
    this.type = type;

    // Error 클래스를 상속할 때 필요한 프로토타입 체인 수정
    Object.setPrototypeOf(this, IndicatorError.prototype);
  }

  static unknownCommand(option: string): IndicatorError {
    return new IndicatorError(`unknown option: ${option}`, 'UNKNOWN_COMMAND');
  }
}
