import clsx from 'clsx'
import { AlertOctagon, AlertTriangle, CheckCircle, Info } from 'lucide-react'
import type { ResultTone } from '../lib/faultInfo'
import { formatConfidence } from '../lib/report'
import type { FaultPrediction } from '../types'

interface ResultBannerProps {
  prediction: FaultPrediction
  tone: ResultTone
}

const toneStyles = {
  success: { box: 'bg-green-50 border-green-200 text-green-800', icon: CheckCircle },
  error: { box: 'bg-red-50 border-red-200 text-red-800', icon: AlertOctagon },
  warning: { box: 'bg-yellow-50 border-yellow-200 text-yellow-800', icon: AlertTriangle },
  info: { box: 'bg-blue-50 border-blue-200 text-blue-800', icon: Info },
} satisfies Record<ResultTone, { box: string; icon: typeof Info }>

export default function ResultBanner({ prediction, tone }: ResultBannerProps) {
  const { box, icon: Icon } = toneStyles[tone]

  return (
    <div role="status" className={clsx('p-4 border rounded-lg flex items-center gap-3', box)}>
      <Icon className="h-6 w-6 flex-shrink-0" />
      <p>
        <span className="font-semibold">{prediction.label}</span> (Confidence:{' '}
        {formatConfidence(prediction.confidence)})
      </p>
    </div>
  )
}
