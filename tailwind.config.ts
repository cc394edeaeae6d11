import type { Config } from 'tailwindcss'

export default {
  darkMode: ['class'],
  content: ['./app/**/*.{ts,tsx}', './components/**/*.{ts,tsx}'],
  theme: {
    extend: {
      colors: {
        background: '#0b0b10',
        card: '#12121a',
        border: '#1f2735',
        accent: '#3a7bfd',
      },
    },
  },
  plugins: [],
} satisfies Config
