import { useState } from 'react'
import { BarChart3, ChevronDown, ChevronUp } from 'lucide-react'
import ProbabilityChart from './ProbabilityChart'
import { formatConfidence } from '../lib/report'
import type { RankedProbability } from '../types'

interface ProbabilityListProps {
  ranking: RankedProbability[]
}

export default function ProbabilityList({ ranking }: ProbabilityListProps) {
  const [expanded, setExpanded] = useState(false)

  return (
    <div className="border rounded-lg">
      <button
        type="button"
        onClick={() => setExpanded((value) => !value)}
        aria-expanded={expanded}
        className="w-full flex items-center justify-between px-4 py-3 text-left font-medium text-gray-700 hover:bg-gray-50"
      >
        <span className="flex items-center gap-2">
          <BarChart3 className="h-4 w-4" />
          View All Predictions
        </span>
        {expanded ? <ChevronUp className="h-4 w-4" /> : <ChevronDown className="h-4 w-4" />}
      </button>

      {expanded && (
        <div className="px-4 pb-4 space-y-4">
          <ul className="space-y-2">
            {ranking.map((p) => (
              <li key={p.label}>
                <div className="flex justify-between text-sm">
                  <span>{p.label}</span>
                  <span>{formatConfidence(p.probability)}</span>
                </div>
                <div className="h-2 bg-gray-200 rounded-full overflow-hidden">
                  <div
                    className="h-full bg-primary-500 rounded-full"
                    style={{ width: `${p.probability * 100}%` }}
                  />
                </div>
              </li>
            ))}
          </ul>
          <ProbabilityChart ranking={ranking} />
        </div>
      )}
    </div>
  )
}
