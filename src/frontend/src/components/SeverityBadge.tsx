import clsx from 'clsx'
import type { Severity } from '../types'

const severityStyles: Record<Severity | 'Unknown', string> = {
  Low: 'bg-green-100 text-green-800',
  Medium: 'bg-yellow-100 text-yellow-800',
  High: 'bg-red-100 text-red-800',
  Unknown: 'bg-gray-100 text-gray-700',
}

// Knowledge-base entries without a severity render as "Unknown"
export default function SeverityBadge({ level, compact = false }: { level?: Severity; compact?: boolean }) {
  const label = level ?? 'Unknown'
  return (
    <span
      title={`Severity: ${label}`}
      className={clsx(
        'inline-flex items-center rounded-full font-medium',
        compact ? 'px-2 py-0.5 text-xs' : 'px-2.5 py-1 text-sm',
        severityStyles[label]
      )}
    >
      {label}
    </span>
  )
}
