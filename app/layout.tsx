import './globals.css'
import type { Metadata } from 'next'
import { Analytics } from '@vercel/analytics/next'

export const metadata: Metadata = {
  title: 'NFL Matchup Analyzer',
  description: 'Touchdowns allowed by every defense per position, weekly matchup scores, touchdown leaders and consistency ratings.',
  openGraph: {
    title: 'NFL Matchup Analyzer',
    description: 'Find the defenses that give up touchdowns and the players who face them this week.'
  },
}

export default function RootLayout({ children }: { children: React.ReactNode }) {
  return (
    <html lang="en" className="dark">
      <body>
        {children}
        <Analytics />
      </body>
    </html>
  )
}
