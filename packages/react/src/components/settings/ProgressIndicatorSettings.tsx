import { useEffect, useId, useState } from 'react';
import { TIME_UNITS, isTimestepInput, parseTimestep } from '@progress-hud/core';
import type { ProgressIndicatorController, TimeUnit } from '@progress-hud/core';
import { useProgressIndicator } from '../../hooks/useProgressIndicator';
import { cn } from '../../utils';

/**
 * ProgressIndicatorSettings Props
 */
export interface ProgressIndicatorSettingsProps {
  /** 설정 대상 컨트롤러 */
  controller: ProgressIndicatorController;
  /** 패널 제목 (기본값: 'Progress indicator settings') */
  title?: string;
  /** 커스텀 스타일 */
  style?: React.CSSProperties;
  /** 커스텀 클래스명 */
  className?: string;
}

function isTimeUnit(value: string): value is TimeUnit {
  return TIME_UNITS.some((unit) => unit === value);
}

/**
 * ProgressIndicatorSettings
 *
 * 진행 표시기 설정 패널
 * - 타임라인 표시 체크박스
 * - timestep 입력 (빈 값 또는 숫자만 입력 가능) + 단위 선택
 * - 헤더 입력
 * - 에러 메시지 (redraw가 실패한 경우)
 *
 * @example
 * ```tsx
 * const controller = useMemo(() => new ProgressIndicatorController(host), [host]);
 *
 * <ProgressIndicatorSettings controller={controller} />
 * ```
 */
export function ProgressIndicatorSettings({
  controller,
  title = 'Progress indicator settings',
  style,
  className,
}: ProgressIndicatorSettingsProps) {
  const { enabled, config, renderState, setEnabled, setTimestep, setHeader, setUnit } =
    useProgressIndicator(controller);

  const timestepId = useId();
  const headerId = useId();

  // 입력 중인 텍스트 (빈 값, "0." 같은 중간 상태 유지)
  const [timestepText, setTimestepText] = useState(() => String(config.timestep));

  // 외부(명령 등)에서 timestep이 바뀌면 입력란 동기화
  useEffect(() => {
    setTimestepText((text) => (parseTimestep(text) === config.timestep ? text : String(config.timestep)));
  }, [config.timestep]);

  const handleTimestepChange = (text: string) => {
    if (!isTimestepInput(text)) return;
    setTimestepText(text);

    const value = parseTimestep(text);
    if (value !== null) {
      setTimestep(value);
    }
  };

  return (
    <div
      className={cn('p-3 bg-viewer-surface rounded-md text-text-primary text-base', className)}
      style={style}
    >
      <div className="mb-2.5 text-lg">{title}</div>

      {/* 타임라인 표시 */}
      <label className="flex items-center gap-2 mb-2 cursor-pointer">
        <input
          type="checkbox"
          checked={enabled}
          onChange={(e) => setEnabled(e.target.checked)}
        />
        Draw timeline
      </label>

      {/* Timestep + 단위 */}
      <div className="grid grid-cols-[auto_1fr_auto] items-center gap-2 mb-2">
        <label htmlFor={timestepId}>Timestep:</label>
        <input
          id={timestepId}
          type="text"
          inputMode="decimal"
          value={timestepText}
          onChange={(e) => handleTimestepChange(e.target.value)}
          className="w-full p-0.5 bg-viewer-panel text-text-primary"
        />
        <select
          aria-label="Unit"
          value={config.unit}
          onChange={(e) => {
            if (isTimeUnit(e.target.value)) setUnit(e.target.value);
          }}
          className="p-0.5 bg-viewer-panel text-text-primary"
        >
          {TIME_UNITS.map((unit) => (
            <option key={unit} value={unit}>
              {unit}
            </option>
          ))}
        </select>
      </div>

      {/* 헤더 */}
      <div className="grid grid-cols-[auto_1fr] items-center gap-2">
        <label htmlFor={headerId}>Header:</label>
        <input
          id={headerId}
          type="text"
          value={config.header}
          onChange={(e) => setHeader(e.target.value)}
          className="w-full p-0.5 bg-viewer-panel text-text-primary"
        />
      </div>

      {/* 에러 메시지 */}
      {renderState.errorMessage && (
        <div role="alert" className="mt-2 text-accent-error">
          {renderState.errorMessage}
        </div>
      )}
    </div>
  );
}
