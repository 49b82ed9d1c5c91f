import { clsx, type ClassValue } from 'clsx'
import { extendTailwindMerge } from 'tailwind-merge'

/**
 * 커스텀 Tailwind 테마를 인식하는 twMerge 설정
 *
 * tailwind.config.ts의 커스텀 색상과 폰트 크기를 알려줘야
 * twMerge가 충돌하는 클래스를 올바르게 병합함
 */
const customTwMerge = extendTailwindMerge({
  extend: {
    classGroups: {
      'font-size': [{ text: ['xs', 'sm', 'base', 'lg'] }],
    },
    theme: {
      colors: [
        'viewer-surface',
        'viewer-panel',
        'accent-error',
        'text-primary',
      ],
    },
  },
})

/**
 * cn() - 조건부 클래스 병합 유틸리티
 *
 * @example
 * ```tsx
 * cn('p-3 bg-viewer-surface', className)
 * ```
 */
export function cn(...inputs: ClassValue[]) {
  return customTwMerge(clsx(inputs))
}
