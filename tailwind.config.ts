import type { Config } from 'tailwindcss'
import forms from '@tailwindcss/forms'
import { resolve, dirname } from 'path'
import { fileURLToPath } from 'url'

// ESM에서 __dirname 대체 (Windows 호환)
const __dirname = dirname(fileURLToPath(import.meta.url))

export default {
  content: [resolve(__dirname, 'packages/react/src/**/*.{ts,tsx}')],
  darkMode: 'class',
  theme: {
    extend: {
      colors: {
        // 패널 배경
        viewer: {
          surface: '#1a1a2e',
          panel: '#2a2a4a',
        },
        // 액센트
        accent: {
          error: '#c44',
        },
        // 텍스트
        text: {
          primary: '#ffffff',
        },
      },
      spacing: {
        '0.5': '2px',
        '1': '4px',
        '2': '8px',
        '2.5': '10px',
        '3': '12px',
      },
      fontSize: {
        'xs': ['11px', '15px'],
        'sm': ['12px', '16px'],
        'base': ['13px', '18px'],
        'lg': ['14px', '20px'],
      },
      borderRadius: {
        'md': '4px',
      },
    },
  },
  plugins: [forms],
} satisfies Config
