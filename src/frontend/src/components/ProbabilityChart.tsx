import {
  BarChart,
  Bar,
  XAxis,
  YAxis,
  CartesianGrid,
  Tooltip,
  ResponsiveContainer,
  Cell,
} from 'recharts'
import type { RankedProbability } from '../types'

interface ProbabilityChartProps {
  ranking: RankedProbability[]
}

export default function ProbabilityChart({ ranking }: ProbabilityChartProps) {
  const data = ranking.map(({ label, probability }, index) => ({
    label,
    probability,
    top: index === 0,
  }))

  return (
    <div className="h-72">
      <ResponsiveContainer width="100%" height="100%">
        <BarChart data={data} layout="vertical" margin={{ left: 24 }}>
          <CartesianGrid strokeDasharray="3 3" horizontal={false} />
          <XAxis type="number" domain={[0, 1]} fontSize={12} tickFormatter={(v: number) => `${v * 100}%`} />
          <YAxis type="category" dataKey="label" width={160} fontSize={12} />
          <Tooltip
            content={({ active, payload }) => {
              if (active && payload && payload.length) {
                const entry = payload[0].payload
                return (
                  <div className="bg-white shadow-lg rounded p-3 border">
                    <p className="font-semibold">{entry.label}</p>
                    <p className="text-sm text-gray-600">{(entry.probability * 100).toFixed(1)}%</p>
                  </div>
                )
              }
              return null
            }}
          />
          <Bar dataKey="probability" radius={[0, 4, 4, 0]}>
            {data.map((entry) => (
              <Cell key={entry.label} fill={entry.top ? '#d97706' : '#fbbf24'} />
            ))}
          </Bar>
        </BarChart>
      </ResponsiveContainer>
    </div>
  )
}
